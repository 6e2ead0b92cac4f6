/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { SchemaObject } from "ajv";
import { FIELD_ORDERS } from "../../types/data-model.js";
import { OUTPUT_FORMATS, type FhirSchemaConfig } from "../../types/config.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { assertValid, compileValidator } from "../../utils/json-validator.js";
import { LOG_LEVELS, logger } from "../../utils/logger.js";

const configSchema: SchemaObject = {
  type: "object",
  additionalProperties: false,
  properties: {
    logLevel: { type: "string", enum: [...LOG_LEVELS] },
    infer: {
      type: "object",
      additionalProperties: false,
      properties: {
        input: {
          type: "object",
          additionalProperties: false,
          properties: {
            path: { type: "string", minLength: 1 },
            recursive: { type: "boolean" },
            resourceTypes: {
              type: "array",
              items: { type: "string", minLength: 1 },
            },
          },
        },
        defaults: {
          type: "object",
          additionalProperties: false,
          properties: {
            bundled: { type: "boolean" },
            file: { type: "string", minLength: 1 },
          },
        },
        output: {
          type: "object",
          additionalProperties: false,
          properties: {
            format: { type: "string", enum: [...OUTPUT_FORMATS] },
            dir: { type: "string", minLength: 1 },
          },
        },
        fieldOrder: { type: "string", enum: [...FIELD_ORDERS] },
        partitions: { type: "integer", minimum: 1 },
      },
    },
  },
};

const validateConfig = compileValidator<FhirSchemaConfig>(configSchema);

/**
 * Parse configuration text. YAML is a superset of JSON, but JSON files go
 * through JSON.parse so syntax errors read the way users expect.
 */
export function parseConfigContent(
  content: string,
  format: "json" | "yaml",
  source = "configuration",
): FhirSchemaConfig {
  let data: unknown;
  try {
    data = format === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${source}`, undefined, {
      cause: error,
    });
  }
  // An empty YAML document parses to null
  return assertValid(validateConfig, data ?? {}, `config file ${source}`);
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): FhirSchemaConfig {
  logger.info("Parsing configuration file", { filePath });

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = parseConfigContent(content, isYaml ? "yaml" : "json", filePath);

  logger.info("Configuration file parsed successfully", {
    hasInferConfig: !!config.infer,
    logLevel: config.logLevel,
  });

  return config;
}
