/**
 * CLI configuration types
 */

import type { ConflictPolicy } from "../../lib/collector/types.js";
import type { RenderOptions, RenderTarget } from "../../lib/renderer/types.js";
import type { SynthesizerOptions } from "../../lib/synthesizer/types.js";

/**
 * Collection configuration
 */
export interface CollectionConfig {
  conflictPolicy: ConflictPolicy;
  maxLines?: number;
}

/**
 * Output configuration
 */
export interface OutputConfig extends RenderOptions {
  /** Write the document here instead of stdout */
  file?: string;
}

/**
 * Resolved configuration for one infer run
 */
export interface InferConfig {
  collection: CollectionConfig;
  synthesis: SynthesizerOptions;
  output: OutputConfig;
}

/**
 * Configuration file structure; every key is optional
 */
export interface ShapecastConfigFile {
  collection?: {
    conflictPolicy?: ConflictPolicy;
    maxLines?: number;
  };
  synthesis?: {
    literalThreshold?: number;
    optionalFields?: boolean;
    rootStructName?: string;
  };
  output?: {
    target?: RenderTarget;
    rootTypeName?: string;
    file?: string;
  };
}

/**
 * Options as commander hands them to the infer action
 */
export interface InferCommandOptions {
  target?: string;
  literalThreshold?: number;
  conflictPolicy?: string;
  optionalFields?: boolean;
  rootName?: string;
  rootStructName?: string;
  maxLines?: number;
  output?: string;
  config?: string;
  logLevel?: string;
}
