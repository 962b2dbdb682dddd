/**
 * Renderer module types
 */

import type { SynthesisResult } from "../synthesizer/types.js";

export type RenderTarget = "typescript" | "python";

export const RENDER_TARGETS: readonly RenderTarget[] = ["typescript", "python"];

export interface RenderOptions {
  target: RenderTarget;
  /** Name of the alias describing the whole corpus */
  rootTypeName: string;
}

export interface TargetRenderer {
  render(result: SynthesisResult, rootTypeName: string): string;
  /** Identifiers no declaration in the document may take */
  reservedNames: ReadonlySet<string>;
  /** Name a struct is declared under */
  declarationName(structName: string): string;
  /** Struct name that would be declared as `declaration`, if any */
  structNameOf(declaration: string): string | undefined;
}
