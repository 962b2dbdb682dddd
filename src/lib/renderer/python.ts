/**
 * Python declarations: `typing.TypedDict` classes, then the corpus alias
 */

import { literalValues } from "../synthesizer/index.js";
import type {
  StructType,
  SynthesisResult,
  TypeDefinition,
} from "../synthesizer/types.js";

export const PYTHON_PRELUDE = "import typing as t";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const PYTHON_CLASS_SUFFIX = "Dict";

export const PYTHON_KEYWORDS: ReadonlySet<string> = new Set([
  "False", "None", "True", "and", "as", "assert", "async", "await",
  "break", "class", "continue", "def", "del", "elif", "else", "except",
  "finally", "for", "from", "global", "if", "import", "in", "is",
  "lambda", "nonlocal", "not", "or", "pass", "raise", "return", "try",
  "while", "with", "yield",
]);

// Keywords, plus the builtins and module alias the document refers to
export const PYTHON_RESERVED_NAMES: ReadonlySet<string> = new Set([
  ...PYTHON_KEYWORDS,
  "bool", "float", "int", "list", "str", "t",
]);

const SCALARS = {
  integer: "int",
  float: "float",
  string: "str",
  boolean: "bool",
  null: "None",
  unknown: "t.Any",
} as const;

export function isPythonIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && !PYTHON_KEYWORDS.has(name);
}

/**
 * Quote a string the way Python's repr() does: single quotes unless the
 * text holds a single quote and no double quote
 */
export function pythonRepr(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let body = "";
  for (const char of value) {
    const code = char.codePointAt(0) ?? 0;
    if (char === "\\" || char === quote) {
      body += `\\${char}`;
    } else if (char === "\n") {
      body += "\\n";
    } else if (char === "\r") {
      body += "\\r";
    } else if (char === "\t") {
      body += "\\t";
    } else if (code < 0x20 || code === 0x7f) {
      body += `\\x${code.toString(16).padStart(2, "0")}`;
    } else {
      body += char;
    }
  }
  return quote + body + quote;
}

export function pythonClassName(struct: StructType): string {
  return `${struct.name}${PYTHON_CLASS_SUFFIX}`;
}

/**
 * Struct name whose class would be called `declaration`
 */
export function pythonStructName(declaration: string): string | undefined {
  return declaration.endsWith(PYTHON_CLASS_SUFFIX) && declaration.length > PYTHON_CLASS_SUFFIX.length
    ? declaration.slice(0, -PYTHON_CLASS_SUFFIX.length)
    : undefined;
}

export function renderPythonType(type: TypeDefinition): string {
  switch (type.kind) {
    case "scalar":
      return SCALARS[type.scalar];
    case "literal": {
      const values = literalValues(type).map((value) =>
        typeof value === "boolean" ? (value ? "True" : "False") : pythonRepr(value),
      );
      return `t.Literal[${values.join(", ")}]`;
    }
    case "struct":
      return pythonClassName(type);
    case "list":
      return `list[${renderPythonType(type.element)}]`;
    case "union": {
      const others = type.members.filter(
        (member) => !(member.kind === "scalar" && member.scalar === "null"),
      );
      const [only] = others;
      const inner =
        others.length === 1 && only
          ? renderPythonType(only)
          : `t.Union[${others.map(renderPythonType).join(", ")}]`;
      return others.length < type.members.length ? `t.Optional[${inner}]` : inner;
    }
    case "dictionary":
      return "dict[str, t.Any]";
  }
}

function renderFieldType(type: TypeDefinition, optional: boolean): string {
  const rendered = renderPythonType(type);
  return optional ? `t.NotRequired[${rendered}]` : rendered;
}

function renderClass(struct: StructType): string {
  const name = pythonClassName(struct);

  // Keys that cannot be attribute names need the functional syntax
  if (!struct.fields.every((field) => isPythonIdentifier(field.name))) {
    const entries = struct.fields.map(
      (field) => `${pythonRepr(field.name)}: ${renderFieldType(field.type, field.optional)}`,
    );
    return `${name} = t.TypedDict(${pythonRepr(name)}, {${entries.join(", ")}})\n`;
  }

  const lines = [`class ${name}(t.TypedDict):`];
  for (const field of struct.fields) {
    lines.push(`    ${field.name}: ${renderFieldType(field.type, field.optional)}`);
  }
  return lines.join("\n") + "\n";
}

export function renderPython(
  result: SynthesisResult,
  rootTypeName: string,
): string {
  const blocks = [`${PYTHON_PRELUDE}\n`, ...result.structs.map(renderClass)];
  blocks.push(`${rootTypeName} = ${renderPythonType(result.root)}\n`);
  return blocks.join("\n");
}
