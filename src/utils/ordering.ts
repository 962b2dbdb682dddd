/**
 * Deterministic orderings shared by the collector and the synthesizer
 */

export type ScalarValue = string | number | boolean;

/**
 * Total order over scalar values of one kind: false before true,
 * numbers ascending, strings by UTF-16 code unit.
 * No localeCompare: the order must not vary with the host's ICU data.
 */
export function compareScalars<T extends ScalarValue>(a: T, b: T): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

export function sortScalars<T extends ScalarValue>(values: Iterable<T>): T[] {
  return [...values].sort(compareScalars);
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
