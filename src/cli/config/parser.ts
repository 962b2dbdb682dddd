/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import AjvModule from "ajv";
import { parse as parseYaml } from "yaml";
import type { ShapecastConfigFile } from "./types.js";
import { CONFIG_FILE_SCHEMA } from "./schema.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

// ajv is CommonJS; its class sits on the default export's `default`
const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<ShapecastConfigFile>(CONFIG_FILE_SCHEMA);

/**
 * Check a decoded document against the config file schema
 */
export function validateConfigDocument(
  document: unknown,
  filePath: string,
): ShapecastConfigFile {
  // An empty YAML file decodes to null
  const candidate = document ?? {};

  if (!validateConfigFile(candidate)) {
    throw new ConfigError(
      `Invalid config file ${filePath}: ${ajv.errorsText(validateConfigFile.errors)}`,
      {
        filePath,
        errors: (validateConfigFile.errors ?? []).map((error) => ({
          path: error.instancePath || "/",
          message: error.message ?? error.keyword,
        })),
      },
    );
  }
  return candidate;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): ShapecastConfigFile {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
      { filePath },
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, { filePath }, {
      cause: error,
    });
  }

  const config = validateConfigDocument(document, filePath);

  logger.info("Configuration file parsed successfully", {
    hasCollectionConfig: !!config.collection,
    hasSynthesisConfig: !!config.synthesis,
    hasOutputConfig: !!config.output,
  });

  return config;
}
