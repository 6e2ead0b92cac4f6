/**
 * Arrow module - expresses the columnar schema as an Apache Arrow schema
 */

import {
  Bool,
  Field,
  Float64,
  Int64,
  List,
  Schema,
  Struct,
  Table,
  Utf8,
  tableToIPC,
} from "apache-arrow";
import type { DataType } from "apache-arrow";
import type {
  ColumnField,
  ColumnType,
  ColumnarSchema,
} from "../../types/data-model.js";

/**
 * Element field name inside list types, following the Arrow C++ convention
 */
export const LIST_ITEM_NAME = "item";

export function toArrowType(type: ColumnType): DataType {
  switch (type.type) {
    case "boolean":
      return new Bool();
    case "integer":
      return new Int64();
    case "float":
      return new Float64();
    case "string":
      return new Utf8();
    case "list":
      return new List(new Field(LIST_ITEM_NAME, toArrowType(type.element), true));
    case "struct":
      return new Struct(type.fields.map(toArrowField));
  }
}

export function toArrowField(field: ColumnField): Field {
  return new Field(field.name, toArrowType(field.type), field.nullable);
}

export function toArrowSchema(schema: ColumnarSchema): Schema {
  return new Schema(
    schema.fields.map(toArrowField),
    new Map([["fhir.resourceType", schema.recordKind]]),
  );
}

/**
 * Arrow IPC file holding an empty table with the schema
 */
export function schemaToIPC(schema: ColumnarSchema): Uint8Array {
  return tableToIPC(new Table(toArrowSchema(schema)), "file");
}
