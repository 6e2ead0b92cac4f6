/**
 * Reference defaults module - top-level fields each record kind should carry
 */

import { readFileSync } from "fs";
import { readFile } from "fs/promises";
import { extname } from "path";
import { parse as parseYaml } from "yaml";
import type { SchemaObject } from "ajv";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { assertValid, compileValidator } from "../../utils/json-validator.js";
import { logger } from "../../utils/logger.js";
import type { StructType } from "../../types/data-model.js";
import { bundledElementTemplates } from "./elements.js";
import type { ElementTemplates, ReferenceDefaults, ReferenceTable } from "./types.js";

export * from "./types.js";
export * from "./elements.js";

const referenceTableSchema: SchemaObject = {
  type: "object",
  additionalProperties: {
    type: "array",
    items: { type: "string", minLength: 1 },
  },
};

const validateReferenceTable = compileValidator<ReferenceTable>(referenceTableSchema);

const BUNDLED_TABLE_URL = new URL("../../../data/fhir-r4-fields.json", import.meta.url);

/**
 * In-memory reference table, optionally with element templates
 */
export class StaticReferenceDefaults implements ReferenceDefaults {
  private readonly table = new Map<string, readonly string[]>();

  constructor(
    table: ReferenceTable = {},
    private readonly elements: ElementTemplates = new Map(),
  ) {
    for (const [kind, fields] of Object.entries(table)) {
      this.table.set(kind, Object.freeze(Array.from(new Set(fields))));
    }
  }

  fieldsFor(recordKind: string): readonly string[] | undefined {
    return this.table.get(recordKind);
  }

  elementsFor(recordKind: string): ReadonlyMap<string, StructType> | undefined {
    return this.elements.get(recordKind);
  }

  kinds(): string[] {
    return Array.from(new Set([...this.table.keys(), ...this.elements.keys()])).sort();
  }

  toTable(): ReferenceTable {
    return Object.fromEntries(
      Array.from(this.table, ([kind, fields]) => [kind, [...fields]]),
    );
  }
}

/**
 * Combine several lookups; a later source replaces an earlier one per kind,
 * separately for fields and element templates
 */
export function mergeReferenceDefaults(
  ...sources: ReferenceDefaults[]
): StaticReferenceDefaults {
  const table: ReferenceTable = {};
  const elements = new Map<string, ReadonlyMap<string, StructType>>();
  for (const source of sources) {
    for (const kind of source.kinds()) {
      const fields = source.fieldsFor(kind);
      if (fields) {
        table[kind] = [...fields];
      }
      const templates = source.elementsFor(kind);
      if (templates) {
        elements.set(kind, templates);
      }
    }
  }
  return new StaticReferenceDefaults(table, elements);
}

/**
 * Parse and validate a reference table from JSON or YAML text
 */
export function parseReferenceTable(
  content: string,
  format: "json" | "yaml",
  source = "reference table",
): ReferenceTable {
  let data: unknown;
  try {
    data = format === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${source}`, undefined, { cause: error });
  }
  return assertValid(validateReferenceTable, data, source);
}

/**
 * Load a reference table file (.json, .yaml or .yml)
 */
export async function loadReferenceDefaults(
  filePath: string,
): Promise<StaticReferenceDefaults> {
  const extension = extname(filePath).toLowerCase();
  if (![".json", ".yaml", ".yml"].includes(extension)) {
    throw new ConfigError(
      `Unsupported reference defaults format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read reference defaults: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const table = parseReferenceTable(
    content,
    extension === ".json" ? "json" : "yaml",
    filePath,
  );
  logger.info("Reference defaults loaded", {
    filePath,
    kinds: Object.keys(table).length,
  });
  return new StaticReferenceDefaults(table);
}

let bundled: StaticReferenceDefaults | undefined;

/**
 * FHIR R4 top-level fields and element templates for common resources,
 * shipped with the package
 */
export function bundledReferenceDefaults(): StaticReferenceDefaults {
  if (!bundled) {
    const content = readFileSync(BUNDLED_TABLE_URL, "utf-8");
    bundled = new StaticReferenceDefaults(
      parseReferenceTable(content, "json", "bundled FHIR R4 field table"),
      bundledElementTemplates(),
    );
  }
  return bundled;
}
