/**
 * Standard error classes for fhir-columnar-schema
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  INVALID_RECORD = "INVALID_RECORD",
  SCHEMA_STATE_ERROR = "SCHEMA_STATE_ERROR",
}

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    cause?: string;
  };
}

export class FhirSchemaError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "FhirSchemaError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/**
 * Raised by the path walker for input that is not a JSON object record
 */
export class InvalidRecordError extends FhirSchemaError {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.INVALID_RECORD, message, { path }, options);
    this.name = "InvalidRecordError";
  }
}

export class SchemaStateError extends FhirSchemaError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_STATE_ERROR, message, details, options);
    this.name = "SchemaStateError";
  }
}

export class ConfigError extends FhirSchemaError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends FhirSchemaError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

/**
 * Wrap any thrown value into a FhirSchemaError
 */
export function toFhirSchemaError(error: unknown): FhirSchemaError {
  if (error instanceof FhirSchemaError) {
    return error;
  }
  return new FhirSchemaError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
