/**
 * Terminal consumers: drive a cursor and produce a result.
 *
 * Short-circuiting consumers stop pulling as soon as the answer is known.
 * The cross-sequence comparisons advance both cursors once per round.
 */

import { EQ, GT, LT, type Ordering, type PartialOrdering } from "./ordering.js";
import { DONE, type Collector, type Cursor, type Option } from "./types.js";

// ============================================================================
// Full traversal
// ============================================================================

export function forEach<T>(cursor: Cursor<T>, f: (item: T) => void): void {
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    f(item);
  }
}

export function collectInto<T, C>(
  cursor: Cursor<T>,
  collector: Collector<T, C>,
  sizeHint?: number
): C {
  let container = sizeHint === undefined ? collector.init() : collector.init(sizeHint);
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    container = collector.add(container, item);
  }
  return container;
}

/** `[rejected, accepted]`: index 0 holds the items the predicate refused. */
export function partition<T, C>(
  cursor: Cursor<T>,
  predicate: (item: T) => boolean,
  collector: Collector<T, C>
): [C, C] {
  let rejected = collector.init();
  let accepted = collector.init();
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    if (predicate(item)) accepted = collector.add(accepted, item);
    else rejected = collector.add(rejected, item);
  }
  return [rejected, accepted];
}

export function count<T>(cursor: Cursor<T>): number {
  let n = 0;
  while (cursor.advance() !== DONE) n++;
  return n;
}

export function last<T>(cursor: Cursor<T>): Option<T> {
  let result: Option<T> = null;
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    result = item;
  }
  return result;
}

export function fold<T, Acc>(cursor: Cursor<T>, seed: Acc, f: (acc: Acc, item: T) => Acc): Acc {
  let acc = seed;
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    acc = f(acc, item);
  }
  return acc;
}

/** Folds with the first item as the seed; null on an empty sequence. */
export function reduce<T>(cursor: Cursor<T>, f: (acc: T, item: T) => T): Option<T> {
  const first = cursor.advance();
  if (first === DONE) return null;
  return fold(cursor, first, f);
}

// ============================================================================
// Short-circuiting
// ============================================================================

export function all<T>(cursor: Cursor<T>, predicate: (item: T) => boolean): boolean {
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    if (!predicate(item)) return false;
  }
  return true;
}

export function any<T>(cursor: Cursor<T>, predicate: (item: T) => boolean): boolean {
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    if (predicate(item)) return true;
  }
  return false;
}

export function find<T>(cursor: Cursor<T>, predicate: (item: T) => boolean): Option<T> {
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    if (predicate(item)) return item;
  }
  return null;
}

export function position<T>(cursor: Cursor<T>, predicate: (item: T) => boolean): Option<number> {
  let index = 0;
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    if (predicate(item)) return index;
    index++;
  }
  return null;
}

/** The item at zero-based `index`. Negative or fractional indices pull nothing. */
export function nth<T>(cursor: Cursor<T>, index: number): Option<T> {
  if (!Number.isInteger(index) || index < 0) return null;
  for (let i = 0; i < index; i++) {
    if (cursor.advance() === DONE) return null;
  }
  const item = cursor.advance();
  return item === DONE ? null : item;
}

// ============================================================================
// Extremum
// ============================================================================

/** Smallest item under `compare`; the first of several equal minima wins. */
export function minBy<T>(cursor: Cursor<T>, compare: (a: T, b: T) => Ordering): Option<T> {
  return extremum(cursor, compare, LT);
}

/** Largest item under `compare`; the first of several equal maxima wins. */
export function maxBy<T>(cursor: Cursor<T>, compare: (a: T, b: T) => Ordering): Option<T> {
  return extremum(cursor, compare, GT);
}

function extremum<T>(cursor: Cursor<T>, compare: (a: T, b: T) => Ordering, wanted: Ordering): Option<T> {
  let best = cursor.advance();
  if (best === DONE) return null;
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    if (compare(item, best) === wanted) best = item;
  }
  return best;
}

/** True unless some adjacent pair compares `GT`. Stops at the first such pair. */
export function isSortedBy<T>(cursor: Cursor<T>, compare: (a: T, b: T) => Ordering): boolean {
  let prev = cursor.advance();
  if (prev === DONE) return true;
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    if (compare(prev, item) === GT) return false;
    prev = item;
  }
  return true;
}

// ============================================================================
// Cross-sequence comparison
// ============================================================================

/**
 * Lexicographic comparison. Each round advances both cursors; the first
 * round whose items do not compare `EQ` decides. A sequence that ends first
 * is the lesser one. An incomparable pair makes the whole result null.
 */
export function partialCmpBy<A, B>(
  a: Cursor<A>,
  b: Cursor<B>,
  compare: (x: A, y: B) => PartialOrdering
): PartialOrdering {
  for (;;) {
    const x = a.advance();
    const y = b.advance();
    if (x === DONE) return y === DONE ? EQ : LT;
    if (y === DONE) return GT;
    const c = compare(x, y);
    if (c !== EQ) return c;
  }
}

export function cmpBy<A, B>(
  a: Cursor<A>,
  b: Cursor<B>,
  compare: (x: A, y: B) => Ordering
): Ordering {
  for (;;) {
    const x = a.advance();
    const y = b.advance();
    if (x === DONE) return y === DONE ? EQ : LT;
    if (y === DONE) return GT;
    const c = compare(x, y);
    if (c !== EQ) return c;
  }
}

/** Same length and pairwise equal under `eq`. */
export function eqBy<A, B>(a: Cursor<A>, b: Cursor<B>, eq: (x: A, y: B) => boolean): boolean {
  for (;;) {
    const x = a.advance();
    const y = b.advance();
    if (x === DONE || y === DONE) return x === DONE && y === DONE;
    if (!eq(x, y)) return false;
  }
}

