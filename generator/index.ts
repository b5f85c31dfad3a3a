/**
 * Generator Module
 *
 * Exports everything the CLI and tests need.
 */

export * from "./config.ts";
export * from "./errors.ts";
export * from "./logger.ts";
export * from "./core/document.ts";
export * from "./core/engine.ts";
export * from "./core/transforms.ts";
export * from "./engines/index.ts";
export * from "./pipeline.ts";
