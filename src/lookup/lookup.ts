import { arrayAt, isContainer, objectGet, UNKNOWN, ValueType } from "../value/value.js";
import type { ContainerValue, Value } from "../value/value.js";

export type PathSegment = string | number;

const searchContainer = (container: ContainerValue, key: string): Value => {
  if (container.type === ValueType.Object) {
    for (const entry of container.members) {
      if (entry.key === key) {
        return entry.value;
      }
      if (isContainer(entry.value)) {
        const found = searchContainer(entry.value, key);
        if (found.type !== ValueType.Unknown) {
          return found;
        }
      }
    }
    return UNKNOWN;
  }

  for (const item of container.items) {
    if (isContainer(item)) {
      const found = searchContainer(item, key);
      if (found.type !== ValueType.Unknown) {
        return found;
      }
    }
  }
  return UNKNOWN;
};

/**
 * Tree-wide key search, depth-first and pre-order: a member whose key matches
 * wins over anything nested inside it, and a nested match wins over later
 * siblings. Returns `UNKNOWN` when no member anywhere has the key.
 */
export const get = (root: Value, key: string): Value =>
  isContainer(root) ? searchContainer(root, key) : UNKNOWN;

/**
 * Exact navigation: number segments select array elements, and any segment
 * selects an object member by key (first match).
 */
export const getPath = (root: Value, path: readonly PathSegment[]): Value => {
  let current = root;
  for (const segment of path) {
    if (current.type === ValueType.Array && typeof segment === "number") {
      current = arrayAt(current, segment);
    } else if (current.type === ValueType.Object) {
      current = objectGet(current, String(segment));
    } else {
      return UNKNOWN;
    }
    if (current.type === ValueType.Unknown) {
      return UNKNOWN;
    }
  }
  return current;
};

const INDEX_SEGMENT = /^(0|[1-9][0-9]*)$/;

/** Splits `a.b.0` into `["a", "b", 0]`. Empty input is the empty path. */
export const parsePath = (text: string): PathSegment[] => {
  if (text === "") {
    return [];
  }
  return text
    .split(".")
    .map((segment) => (INDEX_SEGMENT.test(segment) ? Number(segment) : segment));
};
