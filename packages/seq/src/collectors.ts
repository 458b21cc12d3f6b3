/**
 * Built-in collectors for `collect()`, `collectWithSizeHint()` and
 * `partition()`.
 */

import type { Collector } from "./types.js";

/** Collects into an array. */
export function toArray<T>(): Collector<T, T[]> {
  return {
    init: () => [],
    add(container, item) {
      container.push(item);
      return container;
    },
  };
}

/** Collects into a Set; later duplicates are dropped. */
export function toSet<T>(): Collector<T, Set<T>> {
  return {
    init: () => new Set<T>(),
    add: (container, item) => container.add(item),
  };
}

/** Collects `[key, value]` pairs into a Map; a later pair overwrites an earlier key. */
export function toMap<K, V>(): Collector<readonly [K, V], Map<K, V>> {
  return {
    init: () => new Map<K, V>(),
    add: (container, [key, value]) => container.set(key, value),
  };
}

/** Groups items into arrays under `key(item)`, keeping encounter order within each group. */
export function groupingBy<T, K>(key: (item: T) => K): Collector<T, Map<K, T[]>> {
  return {
    init: () => new Map<K, T[]>(),
    add(container, item) {
      const k = key(item);
      const group = container.get(k);
      if (group === undefined) container.set(k, [item]);
      else group.push(item);
      return container;
    },
  };
}
