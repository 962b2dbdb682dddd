/**
 * Pipeline module - collect, synthesize and render in one call
 */

import type { JsonValue } from "../../types/json.js";
import { logger } from "../../utils/logger.js";
import { ObservationCollector, validateCollectorOptions } from "../collector/index.js";
import type { CollectorOptions, CollectorStats } from "../collector/types.js";
import {
  DEFAULT_RENDER_OPTIONS,
  render,
  reservedStructNames,
  validateRenderOptions,
} from "../renderer/index.js";
import type { RenderOptions } from "../renderer/types.js";
import { synthesize, validateSynthesizerOptions, DEFAULT_SYNTHESIZER_OPTIONS } from "../synthesizer/index.js";
import type { SynthesisResult, SynthesizerOptions } from "../synthesizer/types.js";
import { DEFAULT_COLLECTOR_OPTIONS } from "../collector/merge.js";

export type InferenceOptions = CollectorOptions & SynthesizerOptions & RenderOptions;

export interface InferenceResult {
  /** Rendered type document */
  document: string;
  synthesis: SynthesisResult;
  stats: CollectorStats;
}

export const DEFAULT_INFERENCE_OPTIONS: InferenceOptions = {
  ...DEFAULT_COLLECTOR_OPTIONS,
  ...DEFAULT_SYNTHESIZER_OPTIONS,
  ...DEFAULT_RENDER_OPTIONS,
};

function resolveOptions(options: Partial<InferenceOptions>): InferenceOptions {
  const resolved = { ...DEFAULT_INFERENCE_OPTIONS, ...options };
  // Fail before reading any input
  validateCollectorOptions(resolved);
  validateSynthesizerOptions(resolved);
  validateRenderOptions(resolved);
  return resolved;
}

function finish(collector: ObservationCollector, options: InferenceOptions): InferenceResult {
  const stats = collector.stats();
  logger.info("Collection complete", stats);

  // Struct names must stay clear of what the chosen target declares itself
  const synthesis = synthesize(collector.result(), {
    ...options,
    reservedNames: [...(options.reservedNames ?? []), ...reservedStructNames(options)],
  });
  const document = render(synthesis, options);
  return { document, synthesis, stats };
}

/**
 * Infer and render types from an async stream of decoded lines
 */
export async function inferFromStream(
  lines: AsyncIterable<JsonValue>,
  options: Partial<InferenceOptions> = {},
): Promise<InferenceResult> {
  const opts = resolveOptions(options);
  const collector = new ObservationCollector(opts);
  await collector.addStream(lines);
  return finish(collector, opts);
}

/**
 * Infer and render types from decoded lines already in memory
 */
export function inferFromValues(
  lines: Iterable<JsonValue>,
  options: Partial<InferenceOptions> = {},
): InferenceResult {
  const opts = resolveOptions(options);
  const collector = new ObservationCollector(opts);
  collector.addAll(lines);
  return finish(collector, opts);
}
