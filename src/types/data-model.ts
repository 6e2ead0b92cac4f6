/**
 * Core data model types for fhir-columnar-schema
 * These structures flow through the pipeline: walk → unify → build → render
 */

export type ScalarKind = "boolean" | "integer" | "float" | "string";

export interface NullType {
  readonly kind: "null";
}

export interface ScalarType<K extends ScalarKind = ScalarKind> {
  readonly kind: K;
}

export interface ListType {
  readonly kind: "list";
  readonly element: SchemaType;
}

/**
 * Struct fields keep the order in which each key was first seen
 */
export interface StructType {
  readonly kind: "struct";
  readonly fields: ReadonlyMap<string, SchemaType>;
}

/**
 * A type observed at one path, or the union of many observations
 */
export type SchemaType = NullType | ScalarType | ListType | StructType;

/**
 * One step of a field path. `listDepth` is the number of sequence levels the
 * value at `key` was wrapped in (0 for a direct mapping value).
 */
export interface PathSegment {
  readonly key: string;
  readonly listDepth: number;
}

export type FieldPath = readonly PathSegment[];

/**
 * A single (path, type) fact derived from one record. For sequence values the
 * type is the merged element type and the last segment carries the list depth.
 */
export interface Observation {
  readonly path: FieldPath;
  readonly type: SchemaType;
}

/**
 * Rendered columnar schema
 */
export type ColumnType =
  | { readonly type: "boolean" }
  | { readonly type: "integer" }
  | { readonly type: "float" }
  | { readonly type: "string" }
  | { readonly type: "list"; readonly element: ColumnType }
  | { readonly type: "struct"; readonly fields: readonly ColumnField[] };

export interface ColumnField {
  readonly name: string;
  readonly nullable: boolean;
  readonly type: ColumnType;
}

export interface ColumnarSchema {
  readonly recordKind: string;
  readonly fields: readonly ColumnField[];
}

/**
 * Ordering applied to struct fields at render time
 */
export type FieldOrder = "observed" | "reference" | "alphabetical";

export const FIELD_ORDERS: readonly FieldOrder[] = [
  "observed",
  "reference",
  "alphabetical",
];
