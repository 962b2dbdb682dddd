/**
 * JSON Schema for configuration files, checked with Ajv
 */

import type { SchemaObject } from "ajv";
import { CONFLICT_POLICIES } from "../../lib/collector/types.js";
import { RENDER_TARGETS } from "../../lib/renderer/types.js";

const identifier = { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_]*$" };

export const CONFIG_FILE_SCHEMA: SchemaObject = {
  type: "object",
  additionalProperties: false,
  properties: {
    collection: {
      type: "object",
      additionalProperties: false,
      properties: {
        conflictPolicy: { type: "string", enum: [...CONFLICT_POLICIES] },
        maxLines: { type: "integer", minimum: 1 },
      },
    },
    synthesis: {
      type: "object",
      additionalProperties: false,
      properties: {
        literalThreshold: { type: "integer", minimum: 0 },
        optionalFields: { type: "boolean" },
        rootStructName: identifier,
      },
    },
    output: {
      type: "object",
      additionalProperties: false,
      properties: {
        target: { type: "string", enum: [...RENDER_TARGETS] },
        rootTypeName: identifier,
        file: { type: "string", minLength: 1 },
      },
    },
  },
};
