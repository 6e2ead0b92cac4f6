/**
 * Unifier module - merges two observed types into one that can hold both
 */

import type {
  ListType,
  NullType,
  ScalarType,
  SchemaType,
  StructType,
} from "../../types/data-model.js";

export const NULL_TYPE: NullType = { kind: "null" };
export const BOOLEAN_TYPE: ScalarType<"boolean"> = { kind: "boolean" };
export const INTEGER_TYPE: ScalarType<"integer"> = { kind: "integer" };
export const FLOAT_TYPE: ScalarType<"float"> = { kind: "float" };
export const STRING_TYPE: ScalarType<"string"> = { kind: "string" };
export const EMPTY_STRUCT: StructType = { kind: "struct", fields: new Map() };

export function listOf(element: SchemaType): ListType {
  return { kind: "list", element };
}

/**
 * Wrap a type in `depth` list levels
 */
export function wrapList(type: SchemaType, depth: number): SchemaType {
  let wrapped = type;
  for (let i = 0; i < depth; i++) {
    wrapped = listOf(wrapped);
  }
  return wrapped;
}

export function structOf(fields: Record<string, SchemaType>): StructType {
  return { kind: "struct", fields: new Map(Object.entries(fields)) };
}

/**
 * The element type produced by an empty sequence: nothing is known yet
 */
export function isEmptyList(type: SchemaType): boolean {
  return type.kind === "list" && type.element.kind === "null";
}

function isNumeric(type: SchemaType): boolean {
  return type.kind === "integer" || type.kind === "float";
}

/**
 * Merge two types. Total, associative, commutative (up to struct key order)
 * and idempotent. Returns `a` itself when `b` contributes nothing new.
 */
export function unify(a: SchemaType, b: SchemaType): SchemaType {
  if (a === b) return a;

  // Null is the identity; an empty list only says "some sequence, unknown"
  if (b.kind === "null") return a;
  if (a.kind === "null") return b;
  if (isEmptyList(b)) return a;
  if (isEmptyList(a)) return b;

  if (a.kind === "struct" && b.kind === "struct") {
    return unifyStructs(a, b);
  }

  if (a.kind === "list" && b.kind === "list") {
    const element = unify(a.element, b.element);
    if (element === a.element) return a;
    if (element === b.element) return b;
    return listOf(element);
  }

  if (a.kind === b.kind) return a;
  if (isNumeric(a) && isNumeric(b)) return FLOAT_TYPE;

  // Incompatible scalars, or a struct / list colliding with something else
  return STRING_TYPE;
}

/**
 * Field-by-field struct merge. Keys of `a` keep their position, keys only in
 * `b` are appended in `b`'s order.
 */
export function unifyStructs(a: StructType, b: StructType): StructType {
  let fields: Map<string, SchemaType> | undefined;

  for (const [name, incoming] of b.fields) {
    const existing = a.fields.get(name);
    const merged = existing === undefined ? incoming : unify(existing, incoming);
    if (merged !== existing) {
      fields ??= new Map(a.fields);
      fields.set(name, merged);
    }
  }

  return fields ? { kind: "struct", fields } : a;
}

/**
 * Structural equality; struct key order is not significant
 */
export function typesEqual(a: SchemaType, b: SchemaType): boolean {
  if (a === b) return true;
  if (a.kind !== b.kind) return false;

  if (a.kind === "list" && b.kind === "list") {
    return typesEqual(a.element, b.element);
  }

  if (a.kind === "struct" && b.kind === "struct") {
    if (a.fields.size !== b.fields.size) return false;
    for (const [name, type] of a.fields) {
      const other = b.fields.get(name);
      if (other === undefined || !typesEqual(type, other)) return false;
    }
  }

  return true;
}

/**
 * Compact, human-readable form used in logs and error details
 */
export function describeType(type: SchemaType): string {
  switch (type.kind) {
    case "list":
      return `list<${describeType(type.element)}>`;
    case "struct":
      return `struct<{${Array.from(type.fields, ([name, field]) => `${name}: ${describeType(field)}`).join(", ")}}>`;
    default:
      return type.kind;
  }
}
