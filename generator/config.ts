/**
 * Configuration for the icon generator
 *
 * Everything the pipeline needs to know (palette, pad geometry, file layout,
 * image engine) lives here. There are no environment variables: the defaults
 * below are the run configuration, and tests pass overrides.
 */

import { dirname, isAbsolute, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

// Project root - one level above generator/
const PROJECT_ROOT = dirname(dirname(fileURLToPath(import.meta.url)));

const color = z.string().min(1);
const length = z.number().finite().nonnegative();

export const configSchema = z.object({
  palette: z.object({
    /** Accent color in the canonical source */
    sourceAccent: color,
    /** Accent color the app icon uses instead */
    appAccent: color,
    appPads: color,
    trayLight: color,
    trayDark: color,
    /** Pad color of the cutout mask; only its opacity matters */
    trayPads: color,
  }),

  pads: z.object({
    size: length.positive(),
    gap: length,
    radius: length,
    // Picked by eye to sit on the belly of the artwork
    startY: z.number().finite(),
  }),

  // Canvas the pad layout was designed against
  referenceCanvas: z.object({
    width: length.positive(),
    height: length.positive(),
  }),

  paths: z.object({
    root: z.string().min(1),
    source: z.string().min(1),
    workDir: z.string().min(1),
    appIcon: z.string().min(1),
    trayIcon: z.string().min(1),
    trayIconDark: z.string().min(1),
  }),

  engine: z.object({
    kind: z.enum(["magick", "sharp"]),
    /** ImageMagick executable (IM7 ships `magick`, IM6 only `convert`) */
    binary: z.string().min(1),
  }),
});

export type GeneratorConfig = z.infer<typeof configSchema>;
export type Palette = GeneratorConfig["palette"];
export type PadLayout = GeneratorConfig["pads"] & {
  referenceCanvas: GeneratorConfig["referenceCanvas"];
};
export type EngineConfig = GeneratorConfig["engine"];

export type ConfigOverrides = {
  [K in keyof GeneratorConfig]?: Partial<GeneratorConfig[K]>;
};

export const defaults: GeneratorConfig = {
  palette: {
    sourceAccent: "#6AD7E5",
    appAccent: "#00ADD8",
    appPads: "#FFFFFF",
    trayLight: "white",
    trayDark: "black",
    trayPads: "black",
  },
  pads: {
    size: 85,
    gap: 14,
    radius: 10,
    startY: 260,
  },
  referenceCanvas: {
    width: 401.98,
    height: 559.472,
  },
  paths: {
    root: PROJECT_ROOT,
    source: "assets/mascot.svg",
    workDir: "build/icons",
    appIcon: "assets/app_icon.png",
    trayIcon: "assets/tray_icon.png",
    trayIconDark: "assets/tray_icon_black.png",
  },
  engine: {
    kind: "magick",
    binary: "magick",
  },
};

/**
 * Merge overrides over the defaults and validate the result
 */
export function loadConfig(overrides: ConfigOverrides = {}): GeneratorConfig {
  return configSchema.parse({
    palette: { ...defaults.palette, ...overrides.palette },
    pads: { ...defaults.pads, ...overrides.pads },
    referenceCanvas: { ...defaults.referenceCanvas, ...overrides.referenceCanvas },
    paths: { ...defaults.paths, ...overrides.paths },
    engine: { ...defaults.engine, ...overrides.engine },
  });
}

export function padLayout(config: GeneratorConfig): PadLayout {
  return { ...config.pads, referenceCanvas: config.referenceCanvas };
}

/**
 * Resolve a configured path against the project root
 */
export function resolvePath(config: GeneratorConfig, path: string): string {
  return isAbsolute(path) ? path : resolve(config.paths.root, path);
}

/**
 * Resolve a file name inside the work directory
 */
export function workFile(config: GeneratorConfig, name: string): string {
  return resolve(resolvePath(config, config.paths.workDir), name);
}
