/**
 * sharp engine - in-process rendering through libvips
 */

import sharp from "sharp";
import type { BlendMode, ImageEngine } from "../core/engine.ts";
import { EngineError } from "../errors.ts";

const BLEND_MODES: Record<BlendMode, sharp.Blend> = {
  "destination-out": "dest-out",
};

export class SharpEngine implements ImageEngine {
  readonly name = "sharp";

  /**
   * @param density - DPI used to rasterize SVG input (72 keeps viewBox units as pixels)
   */
  constructor(private readonly density = 72) {}

  async check(): Promise<boolean> {
    return sharp.format.svg.input.file;
  }

  async rasterize(vectorPath: string, bitmapPath: string): Promise<void> {
    try {
      await sharp(vectorPath, { density: this.density }).png().toFile(bitmapPath);
    } catch (err) {
      throw new EngineError(`Failed to rasterize ${vectorPath}`, `sharp ${vectorPath}`, null, "", {
        cause: err,
      });
    }
  }

  async composite(
    basePath: string,
    overlayPath: string,
    mode: BlendMode,
    outputPath: string,
  ): Promise<void> {
    try {
      await sharp(basePath)
        .composite([{ input: overlayPath, blend: BLEND_MODES[mode] }])
        .png()
        .toFile(outputPath);
    } catch (err) {
      throw new EngineError(`Failed to composite ${outputPath}`, `sharp ${basePath} ${overlayPath}`, null, "", {
        cause: err,
      });
    }
  }
}
