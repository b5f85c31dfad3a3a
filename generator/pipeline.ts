/**
 * Icon Pipeline
 *
 * App Icon → Tray Layers → Render → Composite → Cleanup, strictly in order.
 * Stages hand files to each other through the work directory.
 *
 * Document and filesystem errors abort the run. Engine errors are logged and
 * recorded in the report, and the run carries on, so a broken render leaves
 * the dependent output missing or stale. Callers should surface
 * `report.failures`.
 */

import { existsSync, mkdirSync, rmSync } from "node:fs";
import { basename, dirname } from "node:path";
import { padLayout, resolvePath, workFile, type GeneratorConfig } from "./config.ts";
import { loadDocument, writeDocument, type VectorElement } from "./core/document.ts";
import type { ImageEngine } from "./core/engine.ts";
import {
  appendChild,
  createPads,
  createTrayBody,
  makeSquare,
  recolorFill,
  withChildren,
} from "./core/transforms.ts";
import { errorMessage, type Logger } from "./logger.ts";

// ============================================================================
// Types
// ============================================================================

export interface PipelineContext {
  config: GeneratorConfig;
  engine: ImageEngine;
  logger: Logger;
}

export type Stage = "render" | "composite";

export interface StageFailure {
  stage: Stage;
  /** The file the stage was trying to produce */
  path: string;
  error: string;
}

export interface PipelineReport {
  outputs: string[];
  failures: StageFailure[];
  removed: string[];
}

export interface TrayLayers {
  light: string;
  dark: string;
  pads: string;
}

// Intermediate file names inside the work directory
export const WORK_FILES = {
  appIcon: "app_icon.svg",
  trayBody: "tray_body.svg",
  trayBodyPng: "tray_body.png",
  trayBodyDark: "tray_body_black.svg",
  trayBodyDarkPng: "tray_body_black.png",
  trayPads: "tray_pads.svg",
  trayPadsPng: "tray_pads.png",
} as const;

// ============================================================================
// Vector stages
// ============================================================================

function loadSource({ config }: PipelineContext): VectorElement {
  return loadDocument(resolvePath(config, config.paths.source));
}

function writeVector({ logger }: PipelineContext, path: string, root: VectorElement): string {
  writeDocument(path, root);
  logger.info(`Created ${basename(path)}`);
  return path;
}

/**
 * Accent-recolored source with white pads on a square canvas
 */
export function createAppIcon(ctx: PipelineContext): string {
  const { palette } = ctx.config;
  const recolored = recolorFill(loadSource(ctx), palette.sourceAccent, palette.appAccent);
  const withPads = appendChild(recolored, createPads(palette.appPads, padLayout(ctx.config)));
  return writeVector(ctx, workFile(ctx.config, WORK_FILES.appIcon), makeSquare(withPads));
}

export function createTrayBodyFile(ctx: PipelineContext, fileName: string, color: string): string {
  const body = createTrayBody(loadSource(ctx), color);
  return writeVector(ctx, workFile(ctx.config, fileName), makeSquare(body));
}

/**
 * Light body, dark body, and the pad mask. The mask is squared from the same
 * source viewBox so it lines up with the bodies.
 */
export function createTrayLayers(ctx: PipelineContext): TrayLayers {
  const { palette } = ctx.config;
  const light = createTrayBodyFile(ctx, WORK_FILES.trayBody, palette.trayLight);
  const dark = createTrayBodyFile(ctx, WORK_FILES.trayBodyDark, palette.trayDark);

  const empty = withChildren(loadSource(ctx), []);
  const mask = appendChild(empty, createPads(palette.trayPads, padLayout(ctx.config)));
  const pads = writeVector(ctx, workFile(ctx.config, WORK_FILES.trayPads), makeSquare(mask));

  return { light, dark, pads };
}

// ============================================================================
// Bitmap stages
// ============================================================================

/**
 * Rasterize one SVG. Failures are logged and returned, never thrown.
 */
export async function renderAsset(
  { engine, logger }: PipelineContext,
  svgPath: string,
  pngPath: string,
): Promise<StageFailure | null> {
  try {
    mkdirSync(dirname(pngPath), { recursive: true });
    await engine.rasterize(svgPath, pngPath);
    logger.info(`Rendered ${pngPath}`);
    return null;
  } catch (err) {
    logger.error(`Error rendering ${svgPath}: ${errorMessage(err)}`);
    return { stage: "render", path: pngPath, error: errorMessage(err) };
  }
}

/**
 * Cut the pads out of a body bitmap. Failures are logged and returned, never thrown.
 */
export async function compositeTrayIcon(
  { engine, logger }: PipelineContext,
  bodyPng: string,
  padsPng: string,
  outputPng: string,
): Promise<StageFailure | null> {
  try {
    mkdirSync(dirname(outputPng), { recursive: true });
    await engine.composite(bodyPng, padsPng, "destination-out", outputPng);
    logger.info(`Composited ${outputPng}`);
    return null;
  } catch (err) {
    logger.error(`Error compositing ${outputPng}: ${errorMessage(err)}`);
    return { stage: "composite", path: outputPng, error: errorMessage(err) };
  }
}

// ============================================================================
// Cleanup
// ============================================================================

/**
 * Delete whichever of `paths` exist. Missing files are skipped.
 */
export function cleanupTempFiles(paths: readonly string[], logger: Logger): string[] {
  const removed: string[] = [];
  for (const path of paths) {
    if (!existsSync(path)) continue;
    rmSync(path, { force: true });
    logger.info(`Removed temp file ${basename(path)}`);
    removed.push(path);
  }
  return removed;
}

// ============================================================================
// Run
// ============================================================================

export async function runPipeline(ctx: PipelineContext): Promise<PipelineReport> {
  const { config, logger } = ctx;
  const work = (name: string) => workFile(config, name);
  const appIconPng = resolvePath(config, config.paths.appIcon);
  const trayIconPng = resolvePath(config, config.paths.trayIcon);
  const trayIconDarkPng = resolvePath(config, config.paths.trayIconDark);

  // 1. App icon
  const appIconSvg = createAppIcon(ctx);

  // 2. Tray layers
  const layers = createTrayLayers(ctx);

  // 3. Render
  const failures: StageFailure[] = [];
  const record = (failure: StageFailure | null) => {
    if (failure) failures.push(failure);
  };

  record(await renderAsset(ctx, appIconSvg, appIconPng));
  record(await renderAsset(ctx, layers.light, work(WORK_FILES.trayBodyPng)));
  record(await renderAsset(ctx, layers.dark, work(WORK_FILES.trayBodyDarkPng)));
  record(await renderAsset(ctx, layers.pads, work(WORK_FILES.trayPadsPng)));

  // 4. Composite (light and dark tray icons share the pad mask)
  record(
    await compositeTrayIcon(ctx, work(WORK_FILES.trayBodyPng), work(WORK_FILES.trayPadsPng), trayIconPng),
  );
  record(
    await compositeTrayIcon(
      ctx,
      work(WORK_FILES.trayBodyDarkPng),
      work(WORK_FILES.trayPadsPng),
      trayIconDarkPng,
    ),
  );

  // 5. Cleanup
  const removed = cleanupTempFiles(Object.values(WORK_FILES).map(work), logger);

  const failed = new Set(failures.map((f) => f.path));
  const outputs = [appIconPng, trayIconPng, trayIconDarkPng].filter((path) => !failed.has(path));

  logger.info("Icon generation complete.");
  return { outputs, failures, removed };
}
