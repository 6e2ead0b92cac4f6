#!/usr/bin/env node

/**
 * fhir-schema CLI - columnar schema inference for FHIR NDJSON exports
 */

import { Command } from "commander";
import { createInferCommand } from "./commands/infer.js";
import { isLogLevel, logger } from "../utils/logger.js";

const pkg = {
  name: "fhir-schema",
  version: "0.1.0",
  description:
    "Infer wide and deep columnar (Apache Arrow) schemas from heterogeneous FHIR NDJSON",
};

/**
 * Main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version)
    .option("--log-level <level>", "Logging verbosity: error, warn, info, debug", "info")
    .hook("preAction", (thisCommand) => {
      const level: unknown = thisCommand.opts().logLevel;
      if (isLogLevel(level)) {
        logger.setLevel(level);
      }
    });

  program.addCommand(createInferCommand());

  return program;
}

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      { status: "error", error: { code: "UNEXPECTED_ERROR", message } },
      null,
      2,
    ),
  );
  process.exit(1);
});
