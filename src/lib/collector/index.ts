/**
 * Collector module - folds decoded lines into one row observation
 */

import type { JsonValue } from "../../types/json.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { absorb, DEFAULT_COLLECTOR_OPTIONS, elementPath, observe, ROOT_PATH } from "./merge.js";
import {
  CONFLICT_POLICIES,
  type CollectorOptions,
  type CollectorStats,
  type ConflictPolicy,
  type Observation,
} from "./types.js";

export * from "./types.js";
export * from "./merge.js";

/** Slot path of one record: an element of the corpus-wide array */
export const ROW_PATH = elementPath(ROOT_PATH);

export function isConflictPolicy(value: unknown): value is ConflictPolicy {
  return CONFLICT_POLICIES.some((policy) => policy === value);
}

export function validateCollectorOptions(options: CollectorOptions): void {
  if (!isConflictPolicy(options.conflictPolicy)) {
    throw new ConfigError(
      `Unsupported conflict policy "${String(options.conflictPolicy)}". Must be one of: ${CONFLICT_POLICIES.join(", ")}`,
      { conflictPolicy: options.conflictPolicy },
    );
  }
}

/**
 * Main collector class
 *
 * Each line is a JSON array of records; every record is merged into the
 * same running observation. The collector owns that observation and
 * updates it in place.
 */
export class ObservationCollector {
  private options: CollectorOptions;
  private row: Observation | undefined;
  private counters: CollectorStats = { lines: 0, emptyLines: 0, records: 0 };

  constructor(options: Partial<CollectorOptions> = {}) {
    this.options = { ...DEFAULT_COLLECTOR_OPTIONS, ...options };
    validateCollectorOptions(this.options);
  }

  add(line: JsonValue): void {
    this.counters.lines++;

    if (!Array.isArray(line)) {
      logger.debug("Line is not an array, treating it as a single record", {
        line: this.counters.lines,
      });
      this.addRecord(line);
      return;
    }

    if (line.length === 0) {
      this.counters.emptyLines++;
      return;
    }

    for (const record of line) {
      this.addRecord(record);
    }
  }

  addAll(lines: Iterable<JsonValue>): this {
    for (const line of lines) {
      this.add(line);
    }
    return this;
  }

  async addStream(lines: AsyncIterable<JsonValue>): Promise<this> {
    for await (const line of lines) {
      this.add(line);
    }
    return this;
  }

  private addRecord(record: JsonValue): void {
    const observed = observe(record, this.options, ROW_PATH);
    this.row = this.row
      ? absorb(this.row, observed, this.options, ROW_PATH)
      : observed;
    this.counters.records++;
  }

  /**
   * The merged row observation, or undefined when no record was seen
   */
  result(): Observation | undefined {
    return this.row;
  }

  stats(): CollectorStats {
    return { ...this.counters };
  }
}

/**
 * Collect a whole corpus of decoded lines
 */
export function collect(
  lines: Iterable<JsonValue>,
  options: Partial<CollectorOptions> = {},
): Observation | undefined {
  return new ObservationCollector(options).addAll(lines).result();
}
