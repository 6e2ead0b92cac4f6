/**
 * fhir-columnar-schema: wide and deep columnar schema inference for FHIR records
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/data-model.js";
export * from "./types/config.js";

// Modules
export * from "./lib/walker/index.js";
export * from "./lib/unifier/index.js";
export * from "./lib/builder/index.js";
export * from "./lib/reference/index.js";
export * from "./lib/arrow/index.js";
export * from "./lib/reader/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
