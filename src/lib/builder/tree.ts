/**
 * Accumulating path → type tree for one record kind
 */

import type {
  FieldPath,
  Observation,
  SchemaType,
  StructType,
} from "../../types/data-model.js";
import { SchemaStateError } from "../../utils/errors.js";
import {
  EMPTY_STRUCT,
  NULL_TYPE,
  listOf,
  unify,
  unifyStructs,
  wrapList,
} from "../unifier/index.js";
import { walk } from "../walker/index.js";

/**
 * Apply `update` to the node `depth` list levels below `node`, rebuilding the
 * wrappers only when something changed
 */
function throughLists(
  node: SchemaType,
  depth: number,
  update: (inner: SchemaType) => SchemaType,
): SchemaType {
  if (depth === 0) return update(node);
  if (node.kind !== "list") return node;
  const element = throughLists(node.element, depth - 1, update);
  return element === node.element ? node : listOf(element);
}

/**
 * Merge `type` at `path[index..]` below `struct`. Intermediate segments are
 * first unified with the struct (or list-of-struct) shape they imply; if that
 * collapses to a scalar, the deeper observation is absorbed by it.
 */
export function mergeAtPath(
  struct: StructType,
  path: FieldPath,
  index: number,
  type: SchemaType,
): StructType {
  const { key, listDepth } = path[index];
  const child = struct.fields.get(key);
  const current = child ?? NULL_TYPE;

  let next: SchemaType;
  if (index === path.length - 1) {
    next = unify(current, wrapList(type, listDepth));
  } else {
    const shaped = unify(current, wrapList(EMPTY_STRUCT, listDepth));
    next = throughLists(shaped, listDepth, (inner) =>
      inner.kind === "struct" ? mergeAtPath(inner, path, index + 1, type) : inner,
    );
  }

  if (next === child) return struct;
  const fields = new Map(struct.fields);
  fields.set(key, next);
  return { kind: "struct", fields };
}

export class SchemaTree {
  private root: StructType = EMPTY_STRUCT;
  private folded = 0;

  constructor(public readonly recordKind: string) {}

  get type(): StructType {
    return this.root;
  }

  get recordCount(): number {
    return this.folded;
  }

  mergeObservation(observation: Observation): void {
    if (observation.path.length === 0) {
      throw new SchemaStateError("Observation path must not be empty", {
        recordKind: this.recordKind,
      });
    }
    this.root = mergeAtPath(this.root, observation.path, 0, observation.type);
  }

  /**
   * Walk one record and fold all of its observations into the tree
   */
  mergeRecord(record: unknown): void {
    for (const observation of walk(record)) {
      this.mergeObservation(observation);
    }
    this.folded++;
  }

  /**
   * Combine a partial tree built independently for the same record kind
   */
  mergeTree(other: SchemaTree): void {
    if (other === this) return;
    if (other.recordKind !== this.recordKind) {
      throw new SchemaStateError(
        `Cannot merge a ${other.recordKind} schema tree into a ${this.recordKind} tree`,
        { expected: this.recordKind, received: other.recordKind },
      );
    }
    this.root = unifyStructs(this.root, other.root);
    this.folded += other.folded;
  }
}
