/**
 * Prefixed console logging
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function createLogger(tag = "icons"): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.error(`${prefix} ${message}`),
    error: (message, err) => {
      if (err === undefined) {
        console.error(`${prefix} ${message}`);
      } else {
        console.error(`${prefix} ${message}`, err);
      }
    },
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
