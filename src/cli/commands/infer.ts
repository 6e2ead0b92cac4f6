/**
 * Infer command - build one columnar schema per FHIR resource type
 */

import { Command } from "commander";
import { mkdir, writeFile } from "fs/promises";
import { resolve } from "path";
import type { InferCommandOptions } from "../config/types.js";
import { parseConfigFile } from "../config/parser.js";
import type { FhirSchemaConfig, InferConfig } from "../../types/config.js";
import type { ColumnarSchema } from "../../types/data-model.js";
import { buildSchemaPartitioned } from "../../lib/builder/index.js";
import { schemaToIPC } from "../../lib/arrow/index.js";
import { listNdjsonFiles, readNdjsonRecords } from "../../lib/reader/index.js";
import {
  StaticReferenceDefaults,
  bundledReferenceDefaults,
  loadReferenceDefaults,
  mergeReferenceDefaults,
  type ReferenceDefaults,
} from "../../lib/reference/index.js";
import { loadInferConfig } from "../../utils/config-loader.js";
import { ErrorCode, toFhirSchemaError } from "../../utils/errors.js";
import { isLogLevel, logger, type LogLevel } from "../../utils/logger.js";

export interface KindSummary {
  files: number;
  recordsFolded: number;
  fieldsObserved: number;
  fieldsWidened: number;
}

export interface InferRunResult {
  schemas: Record<string, ColumnarSchema>;
  artifacts: Record<string, string>;
  summary: Record<string, KindSummary>;
}

/**
 * Bundled table first, a user file on top
 */
async function loadDefaults(config: InferConfig): Promise<ReferenceDefaults> {
  const sources: ReferenceDefaults[] = [];
  if (config.defaults.bundled) {
    sources.push(bundledReferenceDefaults());
  }
  if (config.defaults.file) {
    sources.push(await loadReferenceDefaults(config.defaults.file));
  }
  return sources.length > 0
    ? mergeReferenceDefaults(...sources)
    : new StaticReferenceDefaults();
}

/**
 * Group listed files by resource type. Requested kinds without files still
 * get an (empty) entry so their schema is built from the reference table.
 */
function groupByKind(
  files: Map<string, string | null>,
  requested: string[] | undefined,
): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const kind of requested ?? []) {
    groups.set(kind, []);
  }
  for (const [path, kind] of files) {
    if (kind === null) {
      logger.warn("Skipping file without a resourceType", { path });
      continue;
    }
    const group = groups.get(kind) ?? [];
    group.push(path);
    groups.set(kind, group);
  }
  return groups;
}

async function writeArtifact(
  dir: string,
  schema: ColumnarSchema,
  format: InferConfig["output"]["format"],
): Promise<string> {
  if (format === "arrow") {
    const path = resolve(dir, `${schema.recordKind}.arrow`);
    await writeFile(path, schemaToIPC(schema));
    return path;
  }
  const path = resolve(dir, `${schema.recordKind}.schema.json`);
  await writeFile(path, JSON.stringify(schema, null, 2) + "\n", "utf-8");
  return path;
}

/**
 * Run inference for a resolved configuration
 */
export async function runInfer(config: InferConfig): Promise<InferRunResult> {
  const referenceDefaults = await loadDefaults(config);
  const files = await listNdjsonFiles(config.input.path, {
    resourceTypes: config.input.resourceTypes,
    recursive: config.input.recursive,
  });
  const groups = groupByKind(files, config.input.resourceTypes);

  logger.info("Starting schema inference", {
    files: files.size,
    kinds: Array.from(groups.keys()),
  });

  if (config.output.dir) {
    await mkdir(config.output.dir, { recursive: true });
  }

  const result: InferRunResult = { schemas: {}, artifacts: {}, summary: {} };
  for (const [kind, paths] of groups) {
    const { schema, metadata } = await buildSchemaPartitioned(
      kind,
      readNdjsonRecords(paths),
      config.partitions,
      referenceDefaults,
      { fieldOrder: config.fieldOrder },
    );
    result.schemas[kind] = schema;
    result.summary[kind] = {
      files: paths.length,
      recordsFolded: metadata.recordsFolded,
      fieldsObserved: metadata.fieldsObserved,
      fieldsWidened: metadata.fieldsWidened.length,
    };
    if (config.output.dir) {
      result.artifacts[kind] = await writeArtifact(
        config.output.dir,
        schema,
        config.output.format,
      );
    }
  }

  return result;
}

/**
 * A config file's logLevel applies unless `--log-level` was given on the
 * command line, before or after the subcommand
 */
export function applyConfigLogLevel(command: Command, level: LogLevel | undefined): void {
  if (level && !logLevelFromCli(command)) {
    logger.setLevel(level);
  }
}

// A parent's defaulted option would mask a subcommand's own flag in
// getOptionValueSourceWithGlobals, so each level is checked on its own.
function logLevelFromCli(command: Command): boolean {
  for (let current: Command | null = command; current; current = current.parent) {
    if (current.getOptionValueSource("logLevel") === "cli") {
      return true;
    }
  }
  return false;
}

/**
 * Execute infer command
 */
async function executeInfer(
  inputDir: string | undefined,
  options: InferCommandOptions,
  command: Command,
): Promise<void> {
  const startTime = Date.now();

  try {
    let configFile: FhirSchemaConfig | undefined;
    if (options.config) {
      configFile = parseConfigFile(options.config);
      applyConfigLogLevel(command, configFile.logLevel);
    }

    const config = loadInferConfig(inputDir, options, configFile?.infer);
    const { schemas, artifacts, summary } = await runInfer(config);

    const response = {
      status: "success",
      phase: "inference",
      ...(config.output.dir ? { artifacts } : { schemas }),
      summary: {
        kinds: summary,
        durationMs: Date.now() - startTime,
      },
    };

    console.log(JSON.stringify(response, null, 2));
    process.exit(0);
  } catch (error) {
    const schemaError = toFhirSchemaError(error);
    console.error(JSON.stringify(schemaError.toResponse("inference"), null, 2));
    process.exit(schemaError.code === ErrorCode.CONFIG_ERROR ? 2 : 1);
  }
}

/**
 * Create infer command
 */
export function createInferCommand(): Command {
  const command = new Command("infer");

  command
    .description(
      "Read NDJSON FHIR exports and infer a wide, deep columnar schema per resource type",
    )
    .argument("[input-dir]", "Directory holding .ndjson / .jsonl (optionally .gz) files")
    .option("--resource <types>", "Resource types to include (comma-separated)")
    .option("--recursive", "Search subdirectories too")
    .option("--defaults <path>", "Extra reference field table (JSON/YAML)")
    .option("--no-bundled-defaults", "Do not widen with the bundled FHIR R4 field table")
    .option("--field-order <order>", "Field order: observed, reference, alphabetical")
    .option("--partitions <count>", "Independent partial trees to fold into", (val) =>
      parseInt(val, 10),
    )
    .option("--format <format>", "Output format: json, arrow")
    .option("--output-dir <path>", "Directory for schema artifacts (stdout if omitted)")
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug")
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (isLogLevel(level)) {
        logger.setLevel(level);
      }
    })
    .action(executeInfer);

  return command;
}
