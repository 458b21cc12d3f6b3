/**
 * Entry points for creating sequences.
 *
 * `fromCollection()` and `fromIterable()` wrap host data; `range()`,
 * `repeat()`, `successors()` and the generator constructors create common
 * source patterns.
 */

import { openNested } from "./adaptors.js";
import { checkCallback } from "./contracts.js";
import {
  CountingCursor,
  EmptyCursor,
  FiniteGeneratorCursor,
  GeneratorCursor,
  IndexCursor,
  IterableCursor,
  OnceCursor,
  OnceWithCursor,
  RangeCursor,
  RepeatCursor,
  SuccessorsCursor,
} from "./producers.js";
import { Sequence } from "./sequence.js";
import type { Nullable } from "./types.js";

/**
 * Create a sequence over a host collection.
 *
 * Arrays, strings and other array-likes are walked by index and can be
 * forked or cycled freely. Other iterables go through their iterator.
 */
export function fromCollection<T>(source: ArrayLike<T> | Iterable<T>): Sequence<T> {
  return new Sequence(openNested(source));
}

/** Create a sequence over `source[start..end)`; `end` is clamped to `source.length` */
export function fromCursorPair<T>(source: ArrayLike<T>, start: number, end: number): Sequence<T> {
  return new Sequence(new IndexCursor(source, start, end));
}

/**
 * Create a sequence from any iterable.
 *
 * Passing an iterator or generator object gives a one-shot sequence: it
 * cannot be forked or cycled.
 */
export function fromIterable<T>(source: Iterable<T>): Sequence<T> {
  return new Sequence(new IterableCursor(source));
}

/** Create a sequence over `[start, end)` with optional step */
export function range(start: number, end: number, step: number = 1): Sequence<number> {
  return new Sequence(new RangeCursor(start, end, step, false));
}

/** Create a sequence over `[start, end]` with optional step */
export function rangeInclusive(start: number, end: number, step: number = 1): Sequence<number> {
  return new Sequence(new RangeCursor(start, end, step, true));
}

/** Create an infinite sequence `start, start + step, ...` */
export function infiniteRange(start: number = 0, step: number = 1): Sequence<number> {
  return new Sequence(new CountingCursor(start, step));
}

export function empty<T>(): Sequence<T> {
  return new Sequence(new EmptyCursor<T>());
}

/** Create a single-element sequence */
export function once<T>(value: T): Sequence<T> {
  return new Sequence(new OnceCursor(value));
}

/** Create a single-element sequence whose element is computed on first pull */
export function onceWith<T>(compute: () => T): Sequence<T> {
  checkCallback("onceWith", compute, 0);
  return new Sequence(new OnceWithCursor(compute));
}

/** Create an infinite sequence that repeats a single value */
export function repeat<T>(value: T): Sequence<T> {
  return new Sequence(new RepeatCursor(value));
}

/** Create an infinite sequence from a generator function */
export function infiniteGenerator<T>(generate: () => T): Sequence<T> {
  checkCallback("infiniteGenerator", generate, 0);
  return new Sequence(new GeneratorCursor(generate));
}

export const repeatWith = infiniteGenerator;

/** Create a sequence that calls `generate` until it returns null or undefined */
export function finiteGenerator<T>(generate: () => Nullable<T>): Sequence<T> {
  checkCallback("finiteGenerator", generate, 0);
  return new Sequence(new FiniteGeneratorCursor(generate));
}

export const fromFn = finiteGenerator;

/**
 * Create a sequence by repeatedly applying `successor`, starting from
 * `seed`, until either is null or undefined.
 */
export function successors<T>(seed: Nullable<T>, successor: (prev: T) => Nullable<T>): Sequence<T> {
  checkCallback("successors", successor, 1);
  return new Sequence(new SuccessorsCursor(seed, successor));
}
