/**
 * Image Engine
 *
 * The pipeline never shells out or touches pixels itself. Everything that
 * produces a bitmap goes through this capability, so tests can swap in a fake.
 */

/** Erase the base wherever the overlay is opaque */
export type BlendMode = "destination-out";

export interface ImageEngine {
  /** Engine name for log lines */
  readonly name: string;

  /** Whether the engine can run on this machine */
  check(): Promise<boolean>;

  /** Render an SVG file to a PNG with a transparent background */
  rasterize(vectorPath: string, bitmapPath: string): Promise<void>;

  /**
   * Blend `overlayPath` onto `basePath` and write the result.
   * Both bitmaps must share canvas dimensions.
   */
  composite(basePath: string, overlayPath: string, mode: BlendMode, outputPath: string): Promise<void>;
}
