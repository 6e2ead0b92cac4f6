/**
 * CLI option types
 */

/**
 * Flags accepted by `fhir-schema infer`, as commander hands them over
 */
export interface InferCommandOptions {
  resource?: string; // Comma-separated resource types
  recursive?: boolean;
  defaults?: string;
  bundledDefaults?: boolean; // false when --no-bundled-defaults is given
  fieldOrder?: string;
  partitions?: number;
  format?: string;
  outputDir?: string;
  config?: string;
  logLevel?: string;
}
