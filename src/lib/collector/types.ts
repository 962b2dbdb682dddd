/**
 * Collector module types
 */

export type ConflictPolicy = "union" | "widen" | "error";

export const CONFLICT_POLICIES: readonly ConflictPolicy[] = ["union", "widen", "error"];

export interface CollectorOptions {
  /**
   * What happens when two non-null kinds meet at one slot:
   * keep both as a union, widen to unknown, or throw SchemaConflictError
   */
  conflictPolicy: ConflictPolicy;
}

interface ObservationBase {
  /** Number of values merged into this observation */
  count: number;
}

export interface NullObservation extends ObservationBase {
  kind: "null";
}

export interface ValueSetObservation<K extends string, V> extends ObservationBase {
  kind: K;
  /** Distinct value -> occurrences. Uncapped; the literal threshold applies at synthesis. */
  values: Map<V, number>;
}

export type BooleanObservation = ValueSetObservation<"boolean", boolean>;
export type IntegerObservation = ValueSetObservation<"integer", number>;
export type FloatObservation = ValueSetObservation<"float", number>;
export type StringObservation = ValueSetObservation<"string", string>;

export type ScalarObservation =
  | BooleanObservation
  | IntegerObservation
  | FloatObservation
  | StringObservation;

export interface ArrayObservation extends ObservationBase {
  kind: "array";
  /** Shared element observation; absent while only empty arrays were seen */
  element?: Observation;
  minLength: number;
  maxLength: number;
}

export interface FieldObservation {
  /** Number of objects at this slot that carried the field */
  presence: number;
  observation: Observation;
}

export interface ObjectObservation extends ObservationBase {
  kind: "object";
  /** Insertion order is first-seen order */
  fields: Map<string, FieldObservation>;
}

export interface UnknownObservation extends ObservationBase {
  kind: "unknown";
}

export type MemberObservation =
  | NullObservation
  | ScalarObservation
  | ArrayObservation
  | ObjectObservation
  | UnknownObservation;

export interface UnionObservation extends ObservationBase {
  kind: "union";
  /** One member per kind class, in canonical kind order */
  members: MemberObservation[];
}

export type Observation = MemberObservation | UnionObservation;

export type ObservationKind = Observation["kind"];

export interface CollectorStats {
  /** Non-blank lines handed to the collector */
  lines: number;
  /** Lines that were empty arrays */
  emptyLines: number;
  /** Records merged into the row observation */
  records: number;
}
