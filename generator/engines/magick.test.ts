import { describe, expect, it, vi } from "vitest";
import { EngineError } from "../errors.ts";
import type { CommandResult, CommandRunner } from "./command.ts";
import { createEngine, MagickEngine, SharpEngine } from "./index.ts";

const ok: CommandResult = { success: true, stdout: "", stderr: "", exitCode: 0 };

function fakeRunner(result: CommandResult = ok) {
  return vi.fn<CommandRunner>(async () => result);
}

describe("MagickEngine", () => {
  it("rasterizes with a transparent background", async () => {
    const run = fakeRunner();
    await new MagickEngine("magick", run).rasterize("in.svg", "out.png");

    expect(run).toHaveBeenCalledWith("magick", ["-background", "none", "in.svg", "out.png"]);
  });

  it("composites with DstOut", async () => {
    const run = fakeRunner();
    await new MagickEngine("magick", run).composite("body.png", "pads.png", "destination-out", "icon.png");

    expect(run).toHaveBeenCalledWith("magick", [
      "body.png",
      "pads.png",
      "-compose",
      "DstOut",
      "-composite",
      "icon.png",
    ]);
  });

  it("uses the configured binary", async () => {
    const run = fakeRunner();
    await new MagickEngine("convert", run).rasterize("a.svg", "a.png");

    expect(run.mock.calls[0][0]).toBe("convert");
  });

  it("throws EngineError on a nonzero exit", async () => {
    const run = fakeRunner({ success: false, stdout: "", stderr: "no decode delegate", exitCode: 1 });
    const engine = new MagickEngine("magick", run);

    const failure = engine.rasterize("in.svg", "out.png");
    await expect(failure).rejects.toBeInstanceOf(EngineError);
    await expect(failure).rejects.toMatchObject({
      message: "Command failed: magick -background none in.svg out.png (no decode delegate)",
      command: "magick -background none in.svg out.png",
      exitCode: 1,
      stderr: "no decode delegate",
    });
  });

  it("reports spawn errors", async () => {
    const run = fakeRunner({ success: false, stdout: "", stderr: "", exitCode: 1, error: "spawn magick ENOENT" });

    await expect(new MagickEngine("magick", run).rasterize("in.svg", "out.png")).rejects.toThrow(
      "Command failed: magick -background none in.svg out.png (spawn magick ENOENT)",
    );
  });

  it("checks availability with -version", async () => {
    const run = fakeRunner();
    expect(await new MagickEngine("magick", run).check()).toBe(true);
    expect(run).toHaveBeenCalledWith("magick", ["-version"]);

    const missing = fakeRunner({ success: false, stdout: "", stderr: "", exitCode: 127 });
    expect(await new MagickEngine("magick", missing).check()).toBe(false);
  });
});

describe("createEngine", () => {
  it("picks the engine from config", () => {
    expect(createEngine({ kind: "magick", binary: "magick" })).toBeInstanceOf(MagickEngine);
    expect(createEngine({ kind: "sharp", binary: "magick" })).toBeInstanceOf(SharpEngine);
  });
});
