/**
 * Widening - add reference fields that no record carried
 */

import type { StructType } from "../../types/data-model.js";
import { NULL_TYPE } from "../unifier/index.js";

export function widen(
  root: StructType,
  fieldNames: readonly string[] | undefined,
): { root: StructType; added: string[] } {
  const added = (fieldNames ?? []).filter((name) => !root.fields.has(name));
  if (added.length === 0) {
    return { root, added };
  }

  const fields = new Map(root.fields);
  for (const name of added) {
    fields.set(name, NULL_TYPE);
  }
  return { root: { kind: "struct", fields }, added };
}
