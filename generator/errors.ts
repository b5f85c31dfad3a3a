/**
 * Raised when the canonical source cannot be used as a vector document
 */
export class DocumentError extends Error {
  constructor(
    message: string,
    readonly origin: string,
    options?: { cause?: unknown },
  ) {
    super(`${origin}: ${message}`, options);
    this.name = "DocumentError";
  }
}

/**
 * Raised when an image engine fails to produce a bitmap
 */
export class EngineError extends Error {
  constructor(
    message: string,
    readonly command: string,
    readonly exitCode: number | null = null,
    readonly stderr = "",
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EngineError";
  }
}
