import { ValueType } from "./value.js";
import type { Value } from "./value.js";

export type DocumentStats = {
  tokens: {
    objects: number;
    arrays: number;
    keys: number;
    strings: number;
    numbers: number;
    booleans: number;
    nulls: number;
  };
  /** Deepest container nesting; a scalar root is 0. */
  maxDepth: number;
};

export const collectStats = (root: Value): DocumentStats => {
  const stats: DocumentStats = {
    tokens: {
      objects: 0,
      arrays: 0,
      keys: 0,
      strings: 0,
      numbers: 0,
      booleans: 0,
      nulls: 0,
    },
    maxDepth: 0,
  };

  const visit = (value: Value, depth: number): void => {
    switch (value.type) {
      case ValueType.Null:
        stats.tokens.nulls += 1;
        return;
      case ValueType.True:
      case ValueType.False:
        stats.tokens.booleans += 1;
        return;
      case ValueType.Number:
        stats.tokens.numbers += 1;
        return;
      case ValueType.String:
        stats.tokens.strings += 1;
        return;
      case ValueType.Array:
        stats.tokens.arrays += 1;
        stats.maxDepth = Math.max(stats.maxDepth, depth + 1);
        for (const item of value.items) {
          visit(item, depth + 1);
        }
        return;
      case ValueType.Object:
        stats.tokens.objects += 1;
        stats.maxDepth = Math.max(stats.maxDepth, depth + 1);
        for (const entry of value.members) {
          stats.tokens.keys += 1;
          visit(entry.value, depth + 1);
        }
        return;
      case ValueType.Unknown:
        return;
    }
  };

  visit(root, 0);
  return stats;
};
