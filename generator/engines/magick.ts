/**
 * ImageMagick engine
 *
 * Drives the `magick` binary (or IM6 `convert`) as a subprocess.
 */

import type { BlendMode, ImageEngine } from "../core/engine.ts";
import { EngineError } from "../errors.ts";
import { formatCommand, runCommand, type CommandRunner } from "./command.ts";

// ImageMagick names for the blend modes we use
const COMPOSE_OPERATORS: Record<BlendMode, string> = {
  "destination-out": "DstOut",
};

export class MagickEngine implements ImageEngine {
  readonly name = "imagemagick";

  constructor(
    private readonly binary = "magick",
    private readonly run: CommandRunner = runCommand,
  ) {}

  async check(): Promise<boolean> {
    const result = await this.run(this.binary, ["-version"]);
    return result.success;
  }

  async rasterize(vectorPath: string, bitmapPath: string): Promise<void> {
    await this.exec(["-background", "none", vectorPath, bitmapPath]);
  }

  async composite(
    basePath: string,
    overlayPath: string,
    mode: BlendMode,
    outputPath: string,
  ): Promise<void> {
    await this.exec([basePath, overlayPath, "-compose", COMPOSE_OPERATORS[mode], "-composite", outputPath]);
  }

  private async exec(args: string[]): Promise<void> {
    const command = formatCommand(this.binary, args);
    const result = await this.run(this.binary, args);
    if (result.success) return;

    const reason = result.error ?? (result.stderr || `exit code ${result.exitCode}`);
    throw new EngineError(
      `Command failed: ${command} (${reason})`,
      command,
      result.exitCode,
      result.stderr,
    );
  }
}
