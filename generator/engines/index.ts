/**
 * Engines Module
 */

import type { EngineConfig } from "../config.ts";
import type { ImageEngine } from "../core/engine.ts";
import { MagickEngine } from "./magick.ts";
import { SharpEngine } from "./sharp.ts";

export function createEngine(config: EngineConfig): ImageEngine {
  switch (config.kind) {
    case "magick":
      return new MagickEngine(config.binary);
    case "sharp":
      return new SharpEngine();
  }
}

export { MagickEngine, SharpEngine };
export * from "./command.ts";
