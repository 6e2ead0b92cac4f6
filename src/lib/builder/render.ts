/**
 * Render a merged tree into the columnar schema
 */

import type {
  ColumnField,
  ColumnType,
  ColumnarSchema,
  FieldOrder,
  SchemaType,
  StructType,
} from "../../types/data-model.js";
import type { RenderOptions } from "./types.js";

type Entry = [string, SchemaType];

function byName(a: Entry, b: Entry): number {
  return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
}

function orderEntries(
  struct: StructType,
  order: FieldOrder,
  referenceFields?: readonly string[],
): Entry[] {
  const entries = Array.from(struct.fields);
  if (order === "alphabetical") {
    return entries.sort(byName);
  }
  if (order === "reference" && referenceFields) {
    const known = referenceFields.filter((name) => struct.fields.has(name));
    const rank = new Map(known.map((name, i) => [name, i]));
    return [
      ...entries
        .filter(([name]) => rank.has(name))
        .sort(([a], [b]) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0)),
      ...entries.filter(([name]) => !rank.has(name)),
    ];
  }
  return entries;
}

function renderFields(
  struct: StructType,
  order: FieldOrder,
  referenceFields?: readonly string[],
): ColumnField[] {
  return orderEntries(struct, order, referenceFields).map(([name, type]) => ({
    name,
    nullable: true,
    type: renderType(type, order),
  }));
}

/**
 * Null-only leaves become strings: no concrete type was ever seen
 */
export function renderType(
  type: SchemaType,
  order: FieldOrder = "observed",
): ColumnType {
  switch (type.kind) {
    case "null":
    case "string":
      return { type: "string" };
    case "boolean":
      return { type: "boolean" };
    case "integer":
      return { type: "integer" };
    case "float":
      return { type: "float" };
    case "list":
      return { type: "list", element: renderType(type.element, order) };
    case "struct":
      return { type: "struct", fields: renderFields(type, order) };
  }
}

export function renderSchema(
  recordKind: string,
  root: StructType,
  options: RenderOptions,
): ColumnarSchema {
  return {
    recordKind,
    fields: renderFields(root, options.fieldOrder, options.referenceFields),
  };
}

/**
 * Look up a field by dotted name, descending through lists and structs
 */
export function findColumn(
  schema: ColumnarSchema,
  dottedPath: string,
): ColumnField | undefined {
  let fields: readonly ColumnField[] = schema.fields;
  let found: ColumnField | undefined;

  for (const name of dottedPath.split(".")) {
    found = fields.find((field) => field.name === name);
    if (!found) return undefined;

    let type = found.type;
    while (type.type === "list") {
      type = type.element;
    }
    fields = type.type === "struct" ? type.fields : [];
  }

  return found;
}
