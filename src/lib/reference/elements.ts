/**
 * Element templates - full shapes of common FHIR data types
 *
 * Once any part of a CodeableConcept, Coding, Period or Reference is seen,
 * every field of that type is kept in the schema.
 */

import { readFileSync } from "fs";
import type { SchemaObject } from "ajv";
import type { SchemaType, StructType } from "../../types/data-model.js";
import { ConfigError } from "../../utils/errors.js";
import { assertValid, compileValidator } from "../../utils/json-validator.js";
import {
  BOOLEAN_TYPE,
  FLOAT_TYPE,
  INTEGER_TYPE,
  STRING_TYPE,
  listOf,
} from "../unifier/index.js";
import type { ElementTable, ElementTemplates } from "./types.js";

const pathMap = {
  type: "object",
  additionalProperties: { type: "string", minLength: 1 },
};

const elementTableSchema: SchemaObject = {
  type: "object",
  required: ["elementTypes", "paths"],
  additionalProperties: false,
  properties: {
    elementTypes: {
      type: "object",
      additionalProperties: {
        type: "object",
        additionalProperties: { type: "string", pattern: "^[A-Za-z]+(\\[\\])?$" },
      },
    },
    shared: pathMap,
    paths: { type: "object", additionalProperties: pathMap },
  },
};

const validateElementTable = compileValidator<ElementTable>(elementTableSchema);

const BUNDLED_ELEMENTS_URL = new URL("../../../data/fhir-r4-elements.json", import.meta.url);

const SCALAR_TYPES: ReadonlyMap<string, SchemaType> = new Map<string, SchemaType>([
  ["string", STRING_TYPE],
  ["boolean", BOOLEAN_TYPE],
  ["integer", INTEGER_TYPE],
  ["float", FLOAT_TYPE],
]);

export function parseElementTable(
  content: string,
  source = "element table",
): ElementTable {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${source}`, undefined, { cause: error });
  }
  return assertValid(validateElementTable, data, source);
}

/**
 * Resolve element type names into struct templates, per record kind
 *
 * @throws ConfigError on an unknown or self-referencing type name
 */
export function resolveElementTemplates(
  table: ElementTable,
  source = "element table",
): ElementTemplates {
  const resolved = new Map<string, StructType>();

  const structFor = (name: string, stack: string[]): StructType => {
    const cached = resolved.get(name);
    if (cached) return cached;

    const fields = table.elementTypes[name];
    if (!fields) {
      throw new ConfigError(`Unknown element type ${name} in ${source}`);
    }
    if (stack.includes(name)) {
      throw new ConfigError(`Element type ${name} refers to itself in ${source}`, {
        chain: [...stack, name],
      });
    }

    const shape = new Map<string, SchemaType>();
    for (const [field, declared] of Object.entries(fields)) {
      const isList = declared.endsWith("[]");
      const base = isList ? declared.slice(0, -2) : declared;
      const type = SCALAR_TYPES.get(base) ?? structFor(base, [...stack, name]);
      shape.set(field, isList ? listOf(type) : type);
    }

    const struct: StructType = { kind: "struct", fields: shape };
    resolved.set(name, struct);
    return struct;
  };

  const templates = new Map<string, ReadonlyMap<string, StructType>>();
  for (const [kind, paths] of Object.entries(table.paths)) {
    const byPath = new Map<string, StructType>();
    for (const [path, name] of Object.entries({ ...table.shared, ...paths })) {
      byPath.set(path, structFor(name, []));
    }
    templates.set(kind, byPath);
  }
  return templates;
}

let bundled: ElementTemplates | undefined;

/**
 * FHIR R4 element templates shipped with the package
 */
export function bundledElementTemplates(): ElementTemplates {
  bundled ??= resolveElementTemplates(
    parseElementTable(
      readFileSync(BUNDLED_ELEMENTS_URL, "utf-8"),
      "bundled FHIR R4 element table",
    ),
    "bundled FHIR R4 element table",
  );
  return bundled;
}
