/**
 * Configuration types for fhir-columnar-schema
 */

import type { LogLevel } from "../utils/logger.js";
import type { FieldOrder } from "./data-model.js";

export type OutputFormat = "json" | "arrow";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "arrow"];

/**
 * InputConfig - where the NDJSON exports live
 */
export interface InputConfig {
  path: string;
  recursive: boolean;
  resourceTypes?: string[]; // Restrict to these record kinds
}

/**
 * DefaultsConfig - which reference tables widen the schema
 */
export interface DefaultsConfig {
  bundled: boolean; // Bundled FHIR R4 top-level fields
  file?: string; // Extra JSON/YAML table, wins over the bundled one per kind
}

/**
 * OutputConfig - schema artifact destination
 */
export interface OutputConfig {
  format: OutputFormat;
  dir?: string; // stdout when omitted (json only)
}

/**
 * InferConfig - resolved settings for one inference run
 */
export interface InferConfig {
  input: InputConfig;
  defaults: DefaultsConfig;
  output: OutputConfig;
  fieldOrder: FieldOrder;
  partitions: number;
}

/**
 * InferConfigSection - `infer` section of a config file, every key optional
 */
export interface InferConfigSection {
  input?: Partial<InputConfig>;
  defaults?: Partial<DefaultsConfig>;
  output?: Partial<OutputConfig>;
  fieldOrder?: FieldOrder;
  partitions?: number;
}

/**
 * FhirSchemaConfig - complete configuration file
 */
export interface FhirSchemaConfig {
  infer?: InferConfigSection;
  logLevel?: LogLevel;
}
