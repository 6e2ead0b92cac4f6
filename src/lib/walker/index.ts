/**
 * Walker module - flattens one record into (field path, observed type) pairs
 */

import type {
  FieldPath,
  Observation,
  SchemaType,
} from "../../types/data-model.js";
import { InvalidRecordError } from "../../utils/errors.js";
import {
  BOOLEAN_TYPE,
  EMPTY_STRUCT,
  FLOAT_TYPE,
  INTEGER_TYPE,
  NULL_TYPE,
  STRING_TYPE,
  listOf,
  unify,
} from "../unifier/index.js";
import { appendSegment, formatPath, pathKey, segment } from "./path.js";

export * from "./path.js";

interface NestedStruct {
  value: Record<string, unknown>;
  depth: number;
}

interface Frame {
  record: Record<string, unknown>;
  path: FieldPath;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") {
    return Object.prototype.toString.call(value).slice(8, -1);
  }
  return typeof value;
}

/**
 * Type of a single value with structs left shallow; struct values found on the
 * way (directly or inside sequences) are collected with their list depth.
 */
function shapeOf(
  value: unknown,
  where: string,
  depth: number,
  structs: NestedStruct[],
): SchemaType {
  if (value === null || value === undefined) return NULL_TYPE;
  if (typeof value === "boolean") return BOOLEAN_TYPE;
  if (typeof value === "string") return STRING_TYPE;
  if (typeof value === "bigint") return INTEGER_TYPE;
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new InvalidRecordError(`Non-finite number at ${where}`, where);
    }
    return Number.isInteger(value) ? INTEGER_TYPE : FLOAT_TYPE;
  }

  if (Array.isArray(value)) {
    let element: SchemaType = NULL_TYPE;
    for (const item of value) {
      element = unify(element, shapeOf(item, `${where}[]`, depth + 1, structs));
    }
    return listOf(element);
  }

  if (isPlainObject(value)) {
    structs.push({ value, depth });
    return EMPTY_STRUCT;
  }

  throw new InvalidRecordError(
    `Unsupported ${describeValue(value)} value at ${where}`,
    where,
  );
}

/**
 * Walk a record breadth-first and return one observation per distinct path,
 * in first-seen order. Sequences do not extend the path: their merged element
 * type is observed and the segment's `listDepth` records the nesting.
 */
export function walk(record: unknown): Observation[] {
  if (!isPlainObject(record)) {
    throw new InvalidRecordError(
      `Record must be a JSON object, got ${describeValue(record)}`,
      "$",
    );
  }

  const observations = new Map<string, Observation>();
  const queue: Frame[] = [{ record, path: [] }];

  for (let head = 0; head < queue.length; head++) {
    const { record: current, path } = queue[head];

    for (const [key, value] of Object.entries(current)) {
      // absent, as opposed to an explicit null
      if (value === undefined) continue;

      const where = path.length > 0 ? `${formatPath(path)}.${key}` : key;
      const structs: NestedStruct[] = [];
      let type = shapeOf(value, where, 0, structs);
      let listDepth = 0;
      while (type.kind === "list") {
        type = type.element;
        listDepth++;
      }

      const fieldPath = appendSegment(path, segment(key, listDepth));
      const id = pathKey(fieldPath);
      const previous = observations.get(id);
      observations.set(id, {
        path: fieldPath,
        type: previous ? unify(previous.type, type) : type,
      });

      for (const nested of structs) {
        queue.push({
          record: nested.value,
          path: appendSegment(path, segment(key, nested.depth)),
        });
      }
    }
  }

  return Array.from(observations.values());
}
