/**
 * @pullseq/seq: lazy, pull-based sequences
 *
 * Every stage exposes one primitive, `advance()`, which returns the next
 * item or `DONE`. Adaptors pull from their upstream only when asked, so
 * chains like `.filter().map().take()` run in a single pass and stop as
 * soon as the consumer has what it needs.
 *
 * @example
 * ```typescript
 * import { range, fromCollection } from "@pullseq/seq";
 *
 * range(0, 10).stepBy(3).collect(); // [0, 3, 6, 9]
 *
 * // Infinite sources are fine as long as something bounds them
 * range(0, 3).cycle().take(7).collect(); // [0, 1, 2, 0, 1, 2, 0]
 *
 * fromCollection([0, 1]).cmp(range(0, 10)); // LT
 * ```
 */

export { Sequence, PeekableSequence, type SequenceSource } from "./sequence.js";
export {
  fromCollection,
  fromCursorPair,
  fromIterable,
  range,
  rangeInclusive,
  infiniteRange,
  empty,
  once,
  onceWith,
  repeat,
  infiniteGenerator,
  repeatWith,
  finiteGenerator,
  fromFn,
  successors,
} from "./entry.js";
export { toArray, toSet, toMap, groupingBy } from "./collectors.js";
export {
  LT,
  EQ,
  GT,
  naturalOrder,
  reverseOrder,
  partialOrder,
  comparing,
  reversed,
  fromNumeric,
  toOrdering,
} from "./ordering.js";
export type {
  Ordering,
  PartialOrdering,
  Comparator,
  PartialComparator,
  Comparable,
} from "./ordering.js";

export { DONE, isCursor } from "./types.js";
export type { Done, Step, Option, Nullable, Cursor, Nested, Collector } from "./types.js";

export { SequenceContractError, type SequenceContractReason } from "@pullseq/core";
