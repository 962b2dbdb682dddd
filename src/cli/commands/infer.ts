/**
 * Infer command - read line-delimited JSON arrays and print type declarations
 */

import { Command } from "commander";
import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { InferCommandOptions, InferConfig, ShapecastConfigFile } from "../config/types.js";
import { parseConfigFile } from "../config/parser.js";
import {
  CONFLICT_POLICIES,
  DEFAULT_COLLECTOR_OPTIONS,
  isConflictPolicy,
  validateCollectorOptions,
} from "../../lib/collector/index.js";
import { inferFromStream } from "../../lib/pipeline/index.js";
import { openInput, readJsonLines } from "../../lib/reader/index.js";
import {
  DEFAULT_RENDER_OPTIONS,
  RENDER_TARGETS,
  isRenderTarget,
  validateRenderOptions,
} from "../../lib/renderer/index.js";
import { DEFAULT_SYNTHESIZER_OPTIONS, validateSynthesizerOptions } from "../../lib/synthesizer/index.js";
import { ConfigError, ErrorCode, FileIOError, toShapecastError } from "../../utils/errors.js";
import { LOG_LEVELS, isLogLevel, logger } from "../../utils/logger.js";

export interface TextSink {
  write(text: string): unknown;
}

export interface CommandIO {
  stdout: TextSink;
  stderr: TextSink;
}

/**
 * Merge CLI options with config file (CLI options take precedence)
 */
export function resolveInferConfig(
  options: InferCommandOptions,
  configFile: ShapecastConfigFile = {},
): InferConfig {
  const conflictPolicy =
    options.conflictPolicy ??
    configFile.collection?.conflictPolicy ??
    DEFAULT_COLLECTOR_OPTIONS.conflictPolicy;
  if (!isConflictPolicy(conflictPolicy)) {
    throw new ConfigError(
      `Unsupported conflict policy "${conflictPolicy}". Must be one of: ${CONFLICT_POLICIES.join(", ")}`,
      { conflictPolicy },
    );
  }

  const target = options.target ?? configFile.output?.target ?? DEFAULT_RENDER_OPTIONS.target;
  if (!isRenderTarget(target)) {
    throw new ConfigError(
      `Unsupported target "${target}". Must be one of: ${RENDER_TARGETS.join(", ")}`,
      { target },
    );
  }

  const maxLines = options.maxLines ?? configFile.collection?.maxLines;
  if (maxLines !== undefined && (!Number.isInteger(maxLines) || maxLines < 1)) {
    throw new ConfigError(`maxLines must be a positive integer, got ${maxLines}`, {
      maxLines,
    });
  }

  const file = options.output ?? configFile.output?.file;

  const config: InferConfig = {
    collection: {
      conflictPolicy,
      ...(maxLines !== undefined ? { maxLines } : {}),
    },
    synthesis: {
      literalThreshold:
        options.literalThreshold ??
        configFile.synthesis?.literalThreshold ??
        DEFAULT_SYNTHESIZER_OPTIONS.literalThreshold,
      optionalFields:
        options.optionalFields ??
        configFile.synthesis?.optionalFields ??
        DEFAULT_SYNTHESIZER_OPTIONS.optionalFields,
      rootStructName:
        options.rootStructName ??
        configFile.synthesis?.rootStructName ??
        DEFAULT_SYNTHESIZER_OPTIONS.rootStructName,
    },
    output: {
      target,
      rootTypeName:
        options.rootName ??
        configFile.output?.rootTypeName ??
        DEFAULT_RENDER_OPTIONS.rootTypeName,
      ...(file !== undefined ? { file } : {}),
    },
  };

  validateCollectorOptions(config.collection);
  validateSynthesizerOptions(config.synthesis);
  validateRenderOptions(config.output);

  return config;
}

async function writeDocument(document: string, config: InferConfig, io: CommandIO): Promise<void> {
  const file = config.output.file;
  if (file === undefined) {
    io.stdout.write(document);
    return;
  }

  try {
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, document, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to write output to ${file}`, { path: file }, {
      cause: error,
    });
  }
  logger.info("Type document written", { file });
}

/**
 * Execute infer command. Resolves to the process exit code; nothing
 * reaches stdout unless every stage succeeded.
 */
export async function runInfer(
  inputPath: string | undefined,
  options: InferCommandOptions,
  io: CommandIO = { stdout: process.stdout, stderr: process.stderr },
): Promise<number> {
  const startTime = Date.now();

  try {
    // Set log level if provided
    if (options.logLevel !== undefined) {
      if (!isLogLevel(options.logLevel)) {
        throw new ConfigError(
          `Unsupported log level "${options.logLevel}". Must be one of: ${LOG_LEVELS.join(", ")}`,
          { logLevel: options.logLevel },
        );
      }
      logger.setLevel(options.logLevel);
    }

    const configFile = options.config ? parseConfigFile(options.config) : undefined;
    const config = resolveInferConfig(options, configFile);

    logger.info("Starting inference", { input: inputPath ?? "stdin", config });

    const input = await openInput(inputPath);
    const { document, synthesis, stats } = await inferFromStream(
      readJsonLines(input, { maxLines: config.collection.maxLines }),
      {
        conflictPolicy: config.collection.conflictPolicy,
        ...config.synthesis,
        target: config.output.target,
        rootTypeName: config.output.rootTypeName,
      },
    );

    await writeDocument(document, config, io);

    logger.info("Inference complete", {
      lines: stats.lines,
      records: stats.records,
      structs: synthesis.metadata.structCount,
      durationMs: Date.now() - startTime,
    });
    return 0;
  } catch (error) {
    const shapecastError = toShapecastError(error);
    io.stderr.write(JSON.stringify(shapecastError.toResponse("inference"), null, 2) + "\n");

    return shapecastError.code === ErrorCode.CONFIG_ERROR ? 2 : 1;
  }
}

/**
 * `--no-optional-fields` makes commander default optionalFields to true,
 * which would shadow the config file; only an explicit flag counts
 */
export function explicitOptions(
  options: InferCommandOptions,
  command: Command,
): InferCommandOptions {
  return {
    ...options,
    optionalFields:
      command.getOptionValueSource("optionalFields") === "default"
        ? undefined
        : options.optionalFields,
  };
}

/**
 * Whole-string numeric parse: "3x" gives NaN, which the option checks reject
 */
function parseCount(value: string): number {
  return value.trim() === "" ? Number.NaN : Number(value);
}

/**
 * Create infer command
 */
export function createInferCommand(): Command {
  const command = new Command("infer");

  command
    .description(
      "Infer type declarations from line-delimited JSON arrays read from a file or stdin",
    )
    .argument("[input]", "Input file; '-' or omitted reads stdin")
    .option("-t, --target <target>", "Output language: typescript, python")
    .option(
      "--literal-threshold <count>",
      "Most distinct string/boolean values still rendered as a literal union (default: 9)",
      parseCount,
    )
    .option(
      "--conflict-policy <policy>",
      "When kinds conflict at one field: union, widen, error (default: union)",
    )
    .option("--no-optional-fields", "Do not mark fields missing from some records as optional")
    .option("--root-name <name>", "Name of the alias for the whole corpus (default: RootType)")
    .option("--root-struct-name <name>", "Name of the record struct (default: Root)")
    .option("--max-lines <count>", "Fail once input exceeds this many lines", parseCount)
    .option("-o, --output <path>", "Write the document to a file instead of stdout")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .action(async (input: string | undefined, options: InferCommandOptions, cmd: Command) => {
      process.exitCode = await runInfer(input, explicitOptions(options, cmd));
    });

  return command;
}
