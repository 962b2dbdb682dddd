/**
 * Struct naming: PascalCase names derived from the field names on a
 * slot's path, unique within one synthesis run
 */

/**
 * Join path segments into one PascalCase identifier.
 * Characters outside [A-Za-z0-9] separate words.
 *
 * @example
 * toPascalCase(["address", "geo_point"]) // "AddressGeoPoint"
 */
export function toPascalCase(segments: readonly string[]): string {
  const words = segments
    .flatMap((segment) => segment.split(/[^A-Za-z0-9]+/))
    .filter((word) => word.length > 0);

  const name = words
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");

  return /^[0-9]/.test(name) ? `_${name}` : name;
}

export class NameRegistry {
  private readonly used: Set<string>;

  /**
   * @param reserved - names never handed out, such as identifiers the
   * rendered document declares itself
   */
  constructor(reserved: Iterable<string> = [], private readonly fallback = "Struct") {
    this.used = new Set(reserved);
  }

  /**
   * Reserve `base` (or the fallback when empty); collisions get the
   * suffix 2, 3, ... in claim order
   */
  claim(base: string): string {
    const stem = base.length > 0 ? base : this.fallback;
    let name = stem;
    for (let suffix = 2; this.used.has(name); suffix++) {
      name = `${stem}${suffix}`;
    }
    this.used.add(name);
    return name;
  }
}
