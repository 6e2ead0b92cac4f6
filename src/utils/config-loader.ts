/**
 * Configuration loader for inference runs
 */

import { FIELD_ORDERS, type FieldOrder } from "../types/data-model.js";
import {
  OUTPUT_FORMATS,
  type InferConfig,
  type InferConfigSection,
  type OutputFormat,
} from "../types/config.js";
import type { InferCommandOptions } from "../cli/config/types.js";
import { ConfigError } from "./errors.js";
import { logger } from "./logger.js";

export const DEFAULT_INFER_CONFIG = {
  recursive: false,
  bundledDefaults: true,
  format: "json",
  fieldOrder: "observed",
  partitions: 1,
} as const;

const fieldOrders: readonly string[] = FIELD_ORDERS;
const outputFormats: readonly string[] = OUTPUT_FORMATS;

function isFieldOrder(value: string): value is FieldOrder {
  return fieldOrders.includes(value);
}

function isOutputFormat(value: string): value is OutputFormat {
  return outputFormats.includes(value);
}

/**
 * Split a comma-separated flag value, dropping blanks
 */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
  return items.length > 0 ? items : undefined;
}

/**
 * Merge CLI options with the config file section
 *
 * Precedence: CLI > config file > defaults. `--no-bundled-defaults` only
 * overrides when given, since commander reports `true` otherwise.
 *
 * @param inputPath - positional input directory, if given
 * @throws ConfigError when a value is missing or out of range
 */
export function loadInferConfig(
  inputPath: string | undefined,
  cliOptions: InferCommandOptions = {},
  configFile: InferConfigSection = {},
): InferConfig {
  const path = inputPath ?? configFile.input?.path;
  if (!path) {
    throw new ConfigError(
      "Missing required input directory: pass <input-dir> or set infer.input.path",
    );
  }

  const fieldOrder =
    cliOptions.fieldOrder ?? configFile.fieldOrder ?? DEFAULT_INFER_CONFIG.fieldOrder;
  if (!isFieldOrder(fieldOrder)) {
    throw new ConfigError(
      `Invalid field order: ${fieldOrder}. Must be one of ${FIELD_ORDERS.join(", ")}`,
    );
  }

  const format =
    cliOptions.format ?? configFile.output?.format ?? DEFAULT_INFER_CONFIG.format;
  if (!isOutputFormat(format)) {
    throw new ConfigError(
      `Invalid output format: ${format}. Must be one of ${OUTPUT_FORMATS.join(", ")}`,
    );
  }

  const partitions =
    cliOptions.partitions ?? configFile.partitions ?? DEFAULT_INFER_CONFIG.partitions;
  if (!Number.isInteger(partitions) || partitions < 1) {
    throw new ConfigError(`Partition count must be a positive integer, got ${partitions}`);
  }

  const dir = cliOptions.outputDir ?? configFile.output?.dir;
  if (format === "arrow" && !dir) {
    throw new ConfigError("Arrow output needs an output directory (--output-dir)");
  }

  const config: InferConfig = {
    input: {
      path,
      recursive:
        cliOptions.recursive ??
        configFile.input?.recursive ??
        DEFAULT_INFER_CONFIG.recursive,
      resourceTypes:
        parseList(cliOptions.resource) ?? configFile.input?.resourceTypes,
    },
    defaults: {
      bundled:
        cliOptions.bundledDefaults === false
          ? false
          : (configFile.defaults?.bundled ?? DEFAULT_INFER_CONFIG.bundledDefaults),
      file: cliOptions.defaults ?? configFile.defaults?.file,
    },
    output: { format, dir },
    fieldOrder,
    partitions,
  };

  logger.debug("Infer config loaded", {
    input: config.input.path,
    format: config.output.format,
    fieldOrder: config.fieldOrder,
    partitions: config.partitions,
  });

  return config;
}
