#!/usr/bin/env tsx
/**
 * Icon Generator CLI
 *
 * Builds the app icon and the light/dark tray icons from the canonical
 * mascot artwork.
 *
 * Usage:
 *   npm run icons
 */

import {
  createEngine,
  createLogger,
  loadConfig,
  resolvePath,
  runPipeline,
  type Logger,
  type PipelineReport,
} from "../generator/index.ts";

const GENERATOR_VERSION = "0.1.0";

// ============================================================================
// Colors
// ============================================================================

const c = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
};

// ============================================================================
// UI Helpers
// ============================================================================

function printBanner(): void {
  console.log(`
${c.cyan}╔════════════════════════════════════════╗${c.reset}
${c.cyan}║${c.reset}  ${c.bold}ICON GENERATOR${c.reset} ${c.dim}v${GENERATOR_VERSION}${c.reset}                  ${c.cyan}║${c.reset}
${c.cyan}║${c.reset}  ${c.dim}app icon · tray icons (light/dark)${c.reset}    ${c.cyan}║${c.reset}
${c.cyan}╚════════════════════════════════════════╝${c.reset}
`);
}

function formatTime(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour12: false,
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  });
}

function createCliLogger(): Logger {
  const base = createLogger("icons");
  const stamp = () => c.dim + formatTime() + c.reset;
  return {
    info: (message) => base.info(`${stamp()} ${message}`),
    warn: (message) => base.warn(`${stamp()} ${c.yellow}${message}${c.reset}`),
    error: (message, err) => base.error(`${stamp()} ${c.red}${message}${c.reset}`, err),
  };
}

function printSummary(report: PipelineReport): void {
  console.log("");
  for (const output of report.outputs) {
    console.log(`  ${c.green}✓${c.reset} ${output}`);
  }
  for (const failure of report.failures) {
    console.log(`  ${c.red}✗${c.reset} ${failure.path} ${c.dim}(${failure.stage}: ${failure.error})${c.reset}`);
  }
  console.log(`  ${c.dim}${report.removed.length} temp files removed${c.reset}`);
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  printBanner();

  const logger = createCliLogger();
  const config = loadConfig();
  const engine = createEngine(config.engine);

  logger.info(`Source: ${resolvePath(config, config.paths.source)}`);
  logger.info(`Engine: ${engine.name}`);

  if (!(await engine.check())) {
    logger.warn(`Engine ${engine.name} is not available; renders will fail`);
  }

  const report = await runPipeline({ config, engine, logger });
  printSummary(report);

  if (report.failures.length > 0) {
    logger.warn(
      `${report.failures.length} step(s) failed. Outputs that depend on them may be missing or stale.`,
    );
  }
}

main().catch((error) => {
  console.error("[icons] Fatal error:", error);
  process.exit(1);
});
