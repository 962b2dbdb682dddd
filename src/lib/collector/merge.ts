/**
 * Observation merge rules
 *
 * `absorb` folds one observation into another in place and is what the
 * collector runs per record. `merge` and `mergeObservations` are the pure
 * entry points: they clone before absorbing, so callers keep their inputs.
 */

import type { JsonObject, JsonValue } from "../../types/json.js";
import { SchemaConflictError } from "../../utils/errors.js";
import { compareStrings, sortScalars, type ScalarValue } from "../../utils/ordering.js";
import type {
  ArrayObservation,
  CollectorOptions,
  FieldObservation,
  FloatObservation,
  IntegerObservation,
  MemberObservation,
  ObjectObservation,
  Observation,
  ValueSetObservation,
} from "./types.js";

export const DEFAULT_COLLECTOR_OPTIONS: CollectorOptions = {
  conflictPolicy: "union",
};

export const ROOT_PATH = "$";

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Kinds sharing a class merge with each other; integer and float share one.
 * The numbers also give the canonical member order inside a union.
 */
const KIND_CLASS: Record<MemberObservation["kind"], number> = {
  null: 0,
  boolean: 1,
  integer: 2,
  float: 2,
  string: 3,
  array: 4,
  object: 5,
  unknown: 6,
};

export function fieldPath(parent: string, key: string): string {
  return IDENTIFIER.test(key)
    ? `${parent}.${key}`
    : `${parent}[${JSON.stringify(key)}]`;
}

export function elementPath(parent: string): string {
  return `${parent}[]`;
}

function sameClass(a: MemberObservation, b: MemberObservation): boolean {
  return KIND_CLASS[a.kind] === KIND_CLASS[b.kind];
}

function byKindClass(a: MemberObservation, b: MemberObservation): number {
  return KIND_CLASS[a.kind] - KIND_CLASS[b.kind];
}

function countValue<V>(values: Map<V, number>, value: V, by = 1): void {
  values.set(value, (values.get(value) ?? 0) + by);
}

function singleValue<K extends string, V>(
  kind: K,
  value: V,
): ValueSetObservation<K, V> {
  return { kind, count: 1, values: new Map([[value, 1]]) };
}

/**
 * Build a fresh observation from one decoded value
 */
export function observe(
  value: JsonValue,
  options: CollectorOptions = DEFAULT_COLLECTOR_OPTIONS,
  path = ROOT_PATH,
): Observation {
  if (value === null) {
    return { kind: "null", count: 1 };
  }
  if (Array.isArray(value)) {
    return observeArray(value, options, path);
  }
  if (typeof value === "string") {
    return singleValue("string", value);
  }
  if (typeof value === "boolean") {
    return singleValue("boolean", value);
  }
  if (typeof value === "number") {
    return Number.isInteger(value)
      ? singleValue("integer", value)
      : singleValue("float", value);
  }
  return observeObject(value, options, path);
}

function observeArray(
  items: JsonValue[],
  options: CollectorOptions,
  path: string,
): ArrayObservation {
  const itemPath = elementPath(path);
  let element: Observation | undefined;

  for (const item of items) {
    const observed = observe(item, options, itemPath);
    element = element ? absorb(element, observed, options, itemPath) : observed;
  }

  const observation: ArrayObservation = {
    kind: "array",
    count: 1,
    minLength: items.length,
    maxLength: items.length,
  };
  if (element) {
    observation.element = element;
  }
  return observation;
}

function observeObject(
  value: JsonObject,
  options: CollectorOptions,
  path: string,
): ObjectObservation {
  const fields = new Map<string, FieldObservation>();
  for (const [key, item] of Object.entries(value)) {
    fields.set(key, {
      presence: 1,
      observation: observe(item, options, fieldPath(path, key)),
    });
  }
  return { kind: "object", count: 1, fields };
}

function membersOf(observation: Observation): MemberObservation[] {
  return observation.kind === "union" ? observation.members : [observation];
}

function fromMembers(members: MemberObservation[]): Observation {
  const [only] = members;
  if (members.length === 1 && only) {
    return only;
  }
  return {
    kind: "union",
    count: members.reduce((sum, member) => sum + member.count, 0),
    members,
  };
}

/**
 * Fold `source` into `target`. Mutates and may return `target`, and may
 * take ownership of parts of `source`.
 */
export function absorb(
  target: Observation,
  source: Observation,
  options: CollectorOptions,
  path: string,
): Observation {
  if (
    target.kind !== "union" &&
    source.kind !== "union" &&
    sameClass(target, source)
  ) {
    return absorbMember(target, source, options, path);
  }

  const members = membersOf(target);
  for (const incoming of membersOf(source)) {
    insertMember(members, incoming, options, path);
  }
  return fromMembers(members);
}

function insertMember(
  members: MemberObservation[],
  incoming: MemberObservation,
  options: CollectorOptions,
  path: string,
): void {
  const index = members.findIndex((member) => sameClass(member, incoming));
  const existing = members[index];
  if (existing) {
    members[index] = absorbMember(existing, incoming, options, path);
    return;
  }

  // null sits beside any other kind under every policy
  const rival =
    incoming.kind === "null"
      ? undefined
      : members.find((member) => member.kind !== "null");

  if (!rival || options.conflictPolicy === "union") {
    members.push(incoming);
    members.sort(byKindClass);
    return;
  }

  if (options.conflictPolicy === "error") {
    throw new SchemaConflictError(path, [rival.kind, incoming.kind]);
  }

  members[members.indexOf(rival)] = {
    kind: "unknown",
    count: rival.count + incoming.count,
  };
  members.sort(byKindClass);
}

function absorbMember(
  target: MemberObservation,
  source: MemberObservation,
  options: CollectorOptions,
  path: string,
): MemberObservation {
  switch (target.kind) {
    case "null":
    case "unknown":
      target.count += source.count;
      return target;
    case "boolean":
      if (source.kind === "boolean") return absorbValues(target, source);
      break;
    case "string":
      if (source.kind === "string") return absorbValues(target, source);
      break;
    case "integer":
    case "float":
      if (source.kind === "integer" || source.kind === "float") {
        return absorbNumbers(target, source);
      }
      break;
    case "array":
      if (source.kind === "array") return absorbArray(target, source, options, path);
      break;
    case "object":
      if (source.kind === "object") return absorbObject(target, source, options, path);
      break;
  }
  throw new Error(`Cannot merge ${source.kind} into ${target.kind} at ${path}`);
}

function absorbValues<K extends string, V>(
  target: ValueSetObservation<K, V>,
  source: ValueSetObservation<K, V>,
): ValueSetObservation<K, V> {
  target.count += source.count;
  for (const [value, count] of source.values) {
    countValue(target.values, value, count);
  }
  return target;
}

// integer + float widens to float; the value sets stay numeric either way
function absorbNumbers(
  target: IntegerObservation | FloatObservation,
  source: IntegerObservation | FloatObservation,
): IntegerObservation | FloatObservation {
  const values = target.values;
  for (const [value, count] of source.values) {
    countValue(values, value, count);
  }
  const count = target.count + source.count;
  return target.kind === "float" || source.kind === "float"
    ? { kind: "float", count, values }
    : { kind: "integer", count, values };
}

function absorbArray(
  target: ArrayObservation,
  source: ArrayObservation,
  options: CollectorOptions,
  path: string,
): ArrayObservation {
  target.count += source.count;
  target.minLength = Math.min(target.minLength, source.minLength);
  target.maxLength = Math.max(target.maxLength, source.maxLength);

  if (source.element) {
    target.element = target.element
      ? absorb(target.element, source.element, options, elementPath(path))
      : source.element;
  }
  return target;
}

function absorbObject(
  target: ObjectObservation,
  source: ObjectObservation,
  options: CollectorOptions,
  path: string,
): ObjectObservation {
  target.count += source.count;
  for (const [key, incoming] of source.fields) {
    const existing = target.fields.get(key);
    if (existing) {
      existing.presence += incoming.presence;
      existing.observation = absorb(
        existing.observation,
        incoming.observation,
        options,
        fieldPath(path, key),
      );
    } else {
      target.fields.set(key, incoming);
    }
  }
  return target;
}

export function cloneObservation(observation: Observation): Observation {
  if (observation.kind === "union") {
    return {
      kind: "union",
      count: observation.count,
      members: observation.members.map(cloneMember),
    };
  }
  return cloneMember(observation);
}

function cloneMember(observation: MemberObservation): MemberObservation {
  switch (observation.kind) {
    case "null":
    case "unknown":
      return { ...observation };
    case "boolean":
      return { ...observation, values: new Map(observation.values) };
    case "integer":
      return { ...observation, values: new Map(observation.values) };
    case "float":
      return { ...observation, values: new Map(observation.values) };
    case "string":
      return { ...observation, values: new Map(observation.values) };
    case "array": {
      const copy: ArrayObservation = {
        kind: "array",
        count: observation.count,
        minLength: observation.minLength,
        maxLength: observation.maxLength,
      };
      if (observation.element) {
        copy.element = cloneObservation(observation.element);
      }
      return copy;
    }
    case "object": {
      const fields = new Map<string, FieldObservation>();
      for (const [key, field] of observation.fields) {
        fields.set(key, {
          presence: field.presence,
          observation: cloneObservation(field.observation),
        });
      }
      return { kind: "object", count: observation.count, fields };
    }
  }
}

/**
 * Merge two observations of one slot without touching either
 */
export function mergeObservations(
  a: Observation,
  b: Observation,
  options: CollectorOptions = DEFAULT_COLLECTOR_OPTIONS,
  path = ROOT_PATH,
): Observation {
  return absorb(cloneObservation(a), cloneObservation(b), options, path);
}

/**
 * Merge one decoded value into the observation of its slot. With no
 * existing observation the result comes from `value` alone.
 */
export function merge(
  existing: Observation | undefined,
  value: JsonValue,
  options: CollectorOptions = DEFAULT_COLLECTOR_OPTIONS,
  path = ROOT_PATH,
): Observation {
  const observed = observe(value, options, path);
  return existing
    ? absorb(cloneObservation(existing), observed, options, path)
    : observed;
}

function canonicalValues<V extends ScalarValue>(
  values: Map<V, number>,
): JsonValue[] {
  return sortScalars(values.keys()).map((value): JsonValue[] => [
    value,
    values.get(value) ?? 0,
  ]);
}

/**
 * Plain JSON form of an observation with every set sorted, so two
 * observations are equivalent exactly when their canonical forms are equal.
 * Field order is first-seen and does not take part.
 */
export function canonicalizeObservation(observation: Observation): JsonValue {
  switch (observation.kind) {
    case "null":
    case "unknown":
      return { kind: observation.kind, count: observation.count };
    case "boolean":
      return { kind: observation.kind, count: observation.count, values: canonicalValues(observation.values) };
    case "integer":
      return { kind: observation.kind, count: observation.count, values: canonicalValues(observation.values) };
    case "float":
      return { kind: observation.kind, count: observation.count, values: canonicalValues(observation.values) };
    case "string":
      return { kind: observation.kind, count: observation.count, values: canonicalValues(observation.values) };
    case "array":
      return {
        kind: "array",
        count: observation.count,
        minLength: observation.minLength,
        maxLength: observation.maxLength,
        element: observation.element
          ? canonicalizeObservation(observation.element)
          : null,
      };
    case "object":
      return {
        kind: "object",
        count: observation.count,
        fields: [...observation.fields]
          .sort(([a], [b]) => compareStrings(a, b))
          .map(([name, field]) => ({
            name,
            presence: field.presence,
            observation: canonicalizeObservation(field.observation),
          })),
      };
    case "union":
      return {
        kind: "union",
        count: observation.count,
        members: observation.members.map(canonicalizeObservation),
      };
  }
}
