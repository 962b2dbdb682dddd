/**
 * TypeScript declarations: one exported interface per struct, then the
 * corpus alias
 */

import { literalValues } from "../synthesizer/index.js";
import type {
  StructType,
  SynthesisResult,
  TypeDefinition,
} from "../synthesizer/types.js";

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

// Global types the document refers to, and predefined type names
export const TYPESCRIPT_RESERVED_NAMES: ReadonlySet<string> = new Set([
  "Record", "any", "bigint", "boolean", "never", "null", "number",
  "object", "string", "symbol", "undefined", "unknown", "void",
]);

function renderKey(name: string): string {
  return IDENTIFIER.test(name) ? name : JSON.stringify(name);
}

function needsParens(type: TypeDefinition): boolean {
  return (
    type.kind === "union" ||
    (type.kind === "literal" && type.values.length > 1)
  );
}

export function renderTypeScriptType(type: TypeDefinition): string {
  switch (type.kind) {
    case "scalar":
      switch (type.scalar) {
        case "integer":
        case "float":
          return "number";
        default:
          return type.scalar;
      }
    case "literal":
      return literalValues(type).map((value) => JSON.stringify(value)).join(" | ");
    case "struct":
      return type.name;
    case "list": {
      const element = renderTypeScriptType(type.element);
      return needsParens(type.element) ? `(${element})[]` : `${element}[]`;
    }
    case "union": {
      const nullable = type.members.some(
        (member) => member.kind === "scalar" && member.scalar === "null",
      );
      const rendered = type.members
        .filter((member) => !(member.kind === "scalar" && member.scalar === "null"))
        .map(renderTypeScriptType);
      return [...rendered, ...(nullable ? ["null"] : [])].join(" | ");
    }
    case "dictionary":
      return "Record<string, unknown>";
  }
}

function renderInterface(struct: StructType): string {
  const lines = [`export interface ${struct.name} {`];
  for (const field of struct.fields) {
    const key = renderKey(field.name) + (field.optional ? "?" : "");
    lines.push(`  ${key}: ${renderTypeScriptType(field.type)};`);
  }
  lines.push("}");
  return lines.join("\n") + "\n";
}

export function renderTypeScript(
  result: SynthesisResult,
  rootTypeName: string,
): string {
  const blocks = result.structs.map(renderInterface);
  blocks.push(`export type ${rootTypeName} = ${renderTypeScriptType(result.root)};\n`);
  return blocks.join("\n");
}
