/**
 * Synthesizer module - turns a merged row observation into type definitions
 */

import type { Observation, ObjectObservation } from "../collector/types.js";
import { elementPath, fieldPath } from "../collector/merge.js";
import { ROW_PATH } from "../collector/index.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { sortScalars } from "../../utils/ordering.js";
import { NameRegistry, toPascalCase } from "./naming.js";
import type {
  LiteralType,
  ScalarType,
  ScalarTypeName,
  StructField,
  StructType,
  SynthesisResult,
  SynthesizerOptions,
  TypeDefinition,
} from "./types.js";

export * from "./types.js";
export * from "./naming.js";

/**
 * Default synthesizer options
 */
export const DEFAULT_SYNTHESIZER_OPTIONS: SynthesizerOptions = {
  literalThreshold: 9,
  optionalFields: true,
  rootStructName: "Root",
};

const TYPE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

interface SynthesisContext {
  options: SynthesizerOptions;
  registry: NameRegistry;
  structs: StructType[];
  fieldsProcessed: number;
  literalSlots: number;
}

export function validateSynthesizerOptions(options: SynthesizerOptions): void {
  if (!Number.isInteger(options.literalThreshold) || options.literalThreshold < 0) {
    throw new ConfigError(
      `literalThreshold must be a non-negative integer, got ${options.literalThreshold}`,
      { literalThreshold: options.literalThreshold },
    );
  }
  if (!TYPE_NAME.test(options.rootStructName)) {
    throw new ConfigError(
      `rootStructName must be an identifier, got "${options.rootStructName}"`,
      { rootStructName: options.rootStructName },
    );
  }
}

/** Permitted values of a literal, whichever scalar it holds */
export function literalValues(type: LiteralType): readonly (string | boolean)[] {
  return type.values;
}

function scalar(name: ScalarTypeName): ScalarType {
  return { kind: "scalar", scalar: name };
}

function collapses(distinct: number, context: SynthesisContext): boolean {
  if (distinct > context.options.literalThreshold) {
    return false;
  }
  context.literalSlots++;
  return true;
}

function synthesizeSlot(
  observation: Observation,
  segments: readonly string[],
  path: string,
  context: SynthesisContext,
): TypeDefinition {
  switch (observation.kind) {
    case "null":
    case "unknown":
      return scalar(observation.kind);
    // Numbers never collapse, however few values were seen
    case "integer":
    case "float":
      return scalar(observation.kind);
    case "boolean":
      return collapses(observation.values.size, context)
        ? { kind: "literal", scalar: "boolean", values: sortScalars(observation.values.keys()) }
        : scalar("boolean");
    case "string":
      return collapses(observation.values.size, context)
        ? { kind: "literal", scalar: "string", values: sortScalars(observation.values.keys()) }
        : scalar("string");
    case "array":
      return {
        kind: "list",
        element: observation.element
          ? synthesizeSlot(observation.element, segments, elementPath(path), context)
          : scalar("unknown"),
      };
    case "object":
      return synthesizeObject(observation, segments, path, context);
    case "union":
      return {
        kind: "union",
        members: observation.members.map((member) =>
          synthesizeSlot(member, segments, path, context),
        ),
      };
  }
}

function synthesizeObject(
  observation: ObjectObservation,
  segments: readonly string[],
  path: string,
  context: SynthesisContext,
): TypeDefinition {
  if (observation.fields.size === 0) {
    return { kind: "dictionary" };
  }

  // Claimed before the fields are visited so outer structs win name collisions
  const name = context.registry.claim(
    segments.length === 0 ? context.options.rootStructName : toPascalCase(segments),
  );

  const fields: StructField[] = [];
  for (const [key, field] of observation.fields) {
    context.fieldsProcessed++;
    fields.push({
      name: key,
      type: synthesizeSlot(field.observation, [...segments, key], fieldPath(path, key), context),
      optional: context.options.optionalFields && field.presence < observation.count,
    });
  }

  const struct: StructType = { kind: "struct", name, path, fields };
  context.structs.push(struct);
  return struct;
}

/**
 * Synthesize the corpus type from the merged row observation.
 * With no observation at all the corpus is a list of unknown.
 */
export function synthesize(
  row: Observation | undefined,
  options: Partial<SynthesizerOptions> = {},
): SynthesisResult {
  const opts = { ...DEFAULT_SYNTHESIZER_OPTIONS, ...options };
  validateSynthesizerOptions(opts);

  logger.info("Synthesizing type definitions", { options: opts });

  const context: SynthesisContext = {
    options: opts,
    registry: new NameRegistry(opts.reservedNames),
    structs: [],
    fieldsProcessed: 0,
    literalSlots: 0,
  };

  const element = row
    ? synthesizeSlot(row, [], ROW_PATH, context)
    : scalar("unknown");

  const result: SynthesisResult = {
    root: { kind: "list", element },
    structs: context.structs,
    metadata: {
      structCount: context.structs.length,
      fieldsProcessed: context.fieldsProcessed,
      literalSlots: context.literalSlots,
    },
  };

  logger.info("Synthesis complete", result.metadata);
  return result;
}

/**
 * Main synthesizer class
 */
export class Synthesizer {
  private options: SynthesizerOptions;

  constructor(options: Partial<SynthesizerOptions> = {}) {
    this.options = { ...DEFAULT_SYNTHESIZER_OPTIONS, ...options };
    validateSynthesizerOptions(this.options);
  }

  synthesize(row: Observation | undefined): SynthesisResult {
    return synthesize(row, this.options);
  }
}
