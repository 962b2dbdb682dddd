/**
 * NDJSON reader - decodes one JSON value per non-blank line
 */

import { createReadStream } from "fs";
import { access, constants, stat } from "fs/promises";
import * as readline from "readline";
import type { Readable } from "stream";
import type { JsonValue } from "../../types/json.js";
import { DecodeError, FileIOError, InputLimitError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

export interface ReaderOptions {
  /** Abort once more than this many non-blank lines arrive */
  maxLines?: number;
}

const SNIPPET_LENGTH = 100;

function snippet(line: string): string {
  return line.length > SNIPPET_LENGTH
    ? `${line.substring(0, SNIPPET_LENGTH)}...`
    : line;
}

export function isStdinPath(inputPath: string): boolean {
  return inputPath === "-" || inputPath === "stdin";
}

/**
 * Open a file for reading, or stdin for "-", "stdin" or no path
 */
export async function openInput(inputPath?: string): Promise<Readable> {
  if (inputPath === undefined || isStdinPath(inputPath)) {
    return process.stdin;
  }

  let isReadableFile: boolean;
  try {
    await access(inputPath, constants.R_OK);
    const stats = await stat(inputPath);
    // Named pipes carry process substitution, e.g. `shapecast <(zcat rows.gz)`
    isReadableFile = stats.isFile() || stats.isFIFO();
  } catch (err) {
    throw new FileIOError(`Cannot read input file: ${inputPath}`, { path: inputPath }, {
      cause: err,
    });
  }
  if (!isReadableFile) {
    throw new FileIOError(`Input is not a file: ${inputPath}`, { path: inputPath });
  }
  return createReadStream(inputPath, { encoding: "utf8" });
}

/**
 * Decodes lines one at a time, counting them against the line cap
 */
export class LineDecoder {
  private decoded = 0;

  constructor(private readonly options: ReaderOptions = {}) {}

  /**
   * Decode one physical line; blank lines yield undefined
   */
  decode(line: string, lineNumber: number): JsonValue | undefined {
    const trimmed = line.trim();
    if (trimmed === "") return undefined;

    this.decoded++;
    if (this.options.maxLines !== undefined && this.decoded > this.options.maxLines) {
      throw new InputLimitError(this.options.maxLines);
    }

    try {
      return JSON.parse(trimmed);
    } catch (err) {
      throw new DecodeError(
        lineNumber,
        `Invalid JSON on line ${lineNumber}: ${snippet(trimmed)}`,
        { cause: err },
      );
    }
  }

  get count(): number {
    return this.decoded;
  }
}

/**
 * Yield decoded values from a line stream. Blank lines are skipped; line
 * numbers in errors count every physical line.
 */
export async function* readJsonLines(
  input: Readable,
  options: ReaderOptions = {},
): AsyncGenerator<JsonValue> {
  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity, // Handle all line endings
  });
  const decoder = new LineDecoder(options);
  let lineNumber = 0;

  try {
    for await (const line of rl) {
      lineNumber++;
      const value = decoder.decode(line, lineNumber);
      if (value !== undefined) {
        yield value;
      }
    }
  } finally {
    rl.close();
  }

  logger.debug("Input exhausted", { lines: lineNumber, decoded: decoder.count });
}

/**
 * Decode in-memory text the same way as a stream
 */
export function parseJsonLines(text: string, options: ReaderOptions = {}): JsonValue[] {
  const decoder = new LineDecoder(options);
  const values: JsonValue[] = [];

  text.split(/\r?\n/).forEach((line, index) => {
    const value = decoder.decode(line, index + 1);
    if (value !== undefined) {
      values.push(value);
    }
  });

  return values;
}
