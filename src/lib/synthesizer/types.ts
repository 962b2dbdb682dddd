/**
 * Synthesizer module types
 */

export type ScalarTypeName =
  | "integer"
  | "float"
  | "string"
  | "boolean"
  | "null"
  | "unknown";

export type LiteralType =
  | { kind: "literal"; scalar: "string"; values: string[] }
  | { kind: "literal"; scalar: "boolean"; values: boolean[] };

export interface ScalarType {
  kind: "scalar";
  scalar: ScalarTypeName;
}

export interface StructField {
  name: string;
  type: TypeDefinition;
  /** Absent from some records at this slot */
  optional: boolean;
}

export interface StructType {
  kind: "struct";
  name: string;
  /** Slot path the struct was derived from, e.g. `$[].address` */
  path: string;
  fields: StructField[];
}

export interface ListType {
  kind: "list";
  element: TypeDefinition;
}

export interface UnionType {
  kind: "union";
  members: TypeDefinition[];
}

/** Object slot that never carried a field */
export interface DictionaryType {
  kind: "dictionary";
}

export type TypeDefinition =
  | LiteralType
  | ScalarType
  | StructType
  | ListType
  | UnionType
  | DictionaryType;

export interface SynthesizerOptions {
  /** Largest distinct-value count that still collapses to a literal */
  literalThreshold: number;
  /** Mark fields missing from some records as optional */
  optionalFields: boolean;
  /** Name of the struct describing one record */
  rootStructName: string;
  /** Names no struct may take; a clash gets the next numeric suffix */
  reservedNames?: readonly string[];
}

export interface SynthesisResult {
  /** Type of the whole corpus: a list of records */
  root: ListType;
  /** Every struct in the tree, each listed after the structs it references */
  structs: StructType[];
  metadata: {
    structCount: number;
    fieldsProcessed: number;
    literalSlots: number;
  };
}
