/**
 * shapecast: infer static type declarations from line-delimited JSON arrays
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/collector/index.js";
export * from "./lib/synthesizer/index.js";
export * from "./lib/renderer/index.js";
export * from "./lib/reader/index.js";
export * from "./lib/pipeline/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
