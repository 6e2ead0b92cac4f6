/**
 * Element completion - fill observed structs out to their full element shape
 */

import type { SchemaType, StructType } from "../../types/data-model.js";
import { listOf, unifyStructs } from "../unifier/index.js";

/**
 * Apply `update` below every list level of `node`
 */
function underLists(
  node: SchemaType,
  update: (inner: SchemaType) => SchemaType,
): SchemaType {
  if (node.kind !== "list") return update(node);
  const element = underLists(node.element, update);
  return element === node.element ? node : listOf(element);
}

function completeAt(
  struct: StructType,
  keys: readonly string[],
  index: number,
  template: StructType,
): StructType {
  const child = struct.fields.get(keys[index]);
  if (child === undefined) return struct;

  const last = index === keys.length - 1;
  const next = underLists(child, (inner) => {
    if (inner.kind !== "struct") return inner;
    return last
      ? unifyStructs(inner, template)
      : completeAt(inner, keys, index + 1, template);
  });

  if (next === child) return struct;
  const fields = new Map(struct.fields);
  fields.set(keys[index], next);
  return { kind: "struct", fields };
}

/**
 * For each dotted path (list levels are implied) that was observed as a
 * struct, add the template's missing fields. Paths never observed, or that
 * fell back to a scalar, are left alone.
 */
export function completeElements(
  root: StructType,
  templates: ReadonlyMap<string, StructType> | undefined,
): { root: StructType; completed: string[] } {
  const completed: string[] = [];
  let current = root;

  for (const [path, template] of templates ?? []) {
    const next = completeAt(current, path.split("."), 0, template);
    if (next !== current) {
      completed.push(path);
      current = next;
    }
  }

  return { root: current, completed };
}
