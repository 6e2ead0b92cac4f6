/**
 * Reference defaults module types
 */

import type { StructType } from "../../types/data-model.js";

/**
 * Record kind → ordered top-level field names
 */
export type ReferenceTable = Record<string, string[]>;

/**
 * Element type table as stored on disk. Field types are a scalar kind
 * (`string`, `boolean`, `integer`, `float`) or another element type name,
 * with a `[]` suffix for lists.
 */
export interface ElementTable {
  elementTypes: Record<string, Record<string, string>>;
  /** Dotted path → element type, applied to every kind listed in `paths` */
  shared?: Record<string, string>;
  /** Record kind → dotted path → element type */
  paths: Record<string, Record<string, string>>;
}

/**
 * Record kind → dotted path → full element shape
 */
export type ElementTemplates = ReadonlyMap<string, ReadonlyMap<string, StructType>>;

/**
 * Lookup of the fields a record kind is expected to carry. Passed explicitly
 * to the builder; an unknown kind yields `undefined`.
 */
export interface ReferenceDefaults {
  fieldsFor(recordKind: string): readonly string[] | undefined;
  /**
   * Paths whose observed structs are completed to their full element shape
   */
  elementsFor(recordKind: string): ReadonlyMap<string, StructType> | undefined;
  kinds(): string[];
}
