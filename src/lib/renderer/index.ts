/**
 * Renderer module - serializes a synthesis result as type declarations
 */

import type { SynthesisResult } from "../synthesizer/types.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { PYTHON_CLASS_SUFFIX, PYTHON_RESERVED_NAMES, pythonStructName, renderPython } from "./python.js";
import { TYPESCRIPT_RESERVED_NAMES, renderTypeScript } from "./typescript.js";
import { RENDER_TARGETS, type RenderOptions, type RenderTarget, type TargetRenderer } from "./types.js";

export * from "./types.js";
export * from "./typescript.js";
export * from "./python.js";

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  target: "typescript",
  rootTypeName: "RootType",
};

const RENDERERS: Record<RenderTarget, TargetRenderer> = {
  typescript: {
    render: renderTypeScript,
    reservedNames: TYPESCRIPT_RESERVED_NAMES,
    declarationName: (structName) => structName,
    structNameOf: (declaration) => declaration,
  },
  python: {
    render: renderPython,
    reservedNames: PYTHON_RESERVED_NAMES,
    declarationName: (structName) => `${structName}${PYTHON_CLASS_SUFFIX}`,
    structNameOf: pythonStructName,
  },
};

// Valid in both target languages
const ALIAS_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isRenderTarget(value: unknown): value is RenderTarget {
  return RENDER_TARGETS.some((target) => target === value);
}

export function validateRenderOptions(options: RenderOptions): void {
  if (!isRenderTarget(options.target)) {
    throw new ConfigError(
      `Unsupported target "${String(options.target)}". Must be one of: ${RENDER_TARGETS.join(", ")}`,
      { target: options.target },
    );
  }
  if (!ALIAS_NAME.test(options.rootTypeName)) {
    throw new ConfigError(
      `rootTypeName must be an identifier, got "${options.rootTypeName}"`,
      { rootTypeName: options.rootTypeName },
    );
  }
  if (RENDERERS[options.target].reservedNames.has(options.rootTypeName)) {
    throw new ConfigError(
      `rootTypeName "${options.rootTypeName}" is reserved in ${options.target} output`,
      { rootTypeName: options.rootTypeName, target: options.target },
    );
  }
}

/**
 * Struct names the synthesizer must not hand out, because their
 * declarations would clash with the corpus alias or a reserved identifier
 */
export function reservedStructNames(options: Partial<RenderOptions> = {}): string[] {
  const opts = { ...DEFAULT_RENDER_OPTIONS, ...options };
  const renderer = RENDERERS[opts.target];

  const names = new Set<string>();
  for (const declaration of [opts.rootTypeName, ...renderer.reservedNames]) {
    const structName = renderer.structNameOf(declaration);
    if (structName !== undefined) {
      names.add(structName);
    }
  }
  return [...names];
}

/**
 * Render the whole document. The result always ends with one newline.
 */
export function render(
  result: SynthesisResult,
  options: Partial<RenderOptions> = {},
): string {
  const opts = { ...DEFAULT_RENDER_OPTIONS, ...options };
  validateRenderOptions(opts);

  logger.debug("Rendering type document", {
    target: opts.target,
    structs: result.structs.length,
  });

  const renderer = RENDERERS[opts.target];
  for (const struct of result.structs) {
    const declaration = renderer.declarationName(struct.name);
    if (declaration === opts.rootTypeName || renderer.reservedNames.has(declaration)) {
      throw new ConfigError(
        `Struct ${struct.path} would be declared as "${declaration}", which ${opts.target} output already uses`,
        { path: struct.path, declaration, target: opts.target },
      );
    }
  }

  return renderer.render(result, opts.rootTypeName);
}
