/**
 * Field path helpers
 */

import type { FieldPath, PathSegment } from "../../types/data-model.js";

export function segment(key: string, listDepth = 0): PathSegment {
  return Object.freeze({ key, listDepth });
}

export function appendSegment(path: FieldPath, next: PathSegment): FieldPath {
  return Object.freeze([...path, next]);
}

/**
 * Dotted form with one `[]` per list level, e.g. `extension[].valueCoding.system`
 */
export function formatPath(path: FieldPath): string {
  return path.map((s) => s.key + "[]".repeat(s.listDepth)).join(".");
}

/**
 * Unambiguous key for maps; keys may contain dots or brackets
 */
export function pathKey(path: FieldPath): string {
  return JSON.stringify(path.map((s) => [s.key, s.listDepth]));
}

export function pathsEqual(a: FieldPath, b: FieldPath): boolean {
  return (
    a.length === b.length &&
    a.every((s, i) => s.key === b[i].key && s.listDepth === b[i].listDepth)
  );
}
