/**
 * Three-way ordering for comparisons between items and between sequences.
 *
 * Inspired by:
 * - Rust (Ordering, PartialOrd returning Option<Ordering>)
 * - Haskell (Ord, compare, comparing)
 */

import type { Option } from "./types.js";

// ============================================================================
// Ordering
// ============================================================================

/** Result of a total comparison: less, equal, or greater. */
export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ: Ordering = 0;
export const GT: Ordering = 1;

/** Result of a partial comparison; null when the operands are incomparable. */
export type PartialOrdering = Option<Ordering>;

export type Comparator<T> = (a: T, b: T) => Ordering;
export type PartialComparator<T> = (a: T, b: T) => PartialOrdering;

/** Types the built-in `<` and `>` order consistently. */
export type Comparable = number | string | bigint;

// ============================================================================
// Built-in comparators
// ============================================================================

export function naturalOrder<T extends Comparable>(a: T, b: T): Ordering {
  return a < b ? LT : a > b ? GT : EQ;
}

export function reverseOrder<T extends Comparable>(a: T, b: T): Ordering {
  return naturalOrder(b, a);
}

/**
 * Like `naturalOrder`, but reports values that are neither equal, less nor
 * greater (NaN against anything) as incomparable.
 */
export function partialOrder<T extends Comparable>(a: T, b: T): PartialOrdering {
  if (a === b) return EQ;
  if (a < b) return LT;
  if (a > b) return GT;
  return null;
}

/** Orders items by a derived key. */
export function comparing<T, K extends Comparable>(key: (item: T) => K): Comparator<T> {
  return (a, b) => naturalOrder(key(a), key(b));
}

/** Flips a comparator. */
export function reversed<T>(compare: Comparator<T>): Comparator<T> {
  return (a, b) => compare(b, a);
}

/** Adapts a sign-returning comparator such as `(a, b) => a - b`. */
export function fromNumeric<T>(compare: (a: T, b: T) => number): Comparator<T> {
  return (a, b) => toOrdering(compare(a, b));
}

/** Collapses a signed number to an Ordering; NaN maps to EQ. */
export function toOrdering(n: number): Ordering {
  return n < 0 ? LT : n > 0 ? GT : EQ;
}
