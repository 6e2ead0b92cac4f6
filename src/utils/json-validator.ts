/**
 * JSON Schema validation for configuration inputs, using Ajv
 */

import AjvModule from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";
import { ConfigError } from "./errors.js";

// ajv is published as CommonJS; its class is the `default` export
const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true, // Report every problem in a config file at once
});

export function compileValidator<T>(schema: SchemaObject): ValidateFunction<T> {
  return ajv.compile<T>(schema);
}

export function formatValidationErrors(
  errors: ErrorObject[] | null | undefined,
): string[] {
  return (errors ?? []).map(
    (error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`,
  );
}

/**
 * Validate `data` and return it typed, or throw a ConfigError listing problems
 */
export function assertValid<T>(
  validate: ValidateFunction<T>,
  data: unknown,
  description: string,
): T {
  if (validate(data)) {
    return data;
  }
  throw new ConfigError(`Invalid ${description}`, {
    errors: formatValidationErrors(validate.errors),
  });
}
