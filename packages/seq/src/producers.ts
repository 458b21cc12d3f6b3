/**
 * Leaf cursors: sequences with no upstream.
 *
 * Every producer keeps its whole cursor state in plain fields, so `fork()`
 * is a field copy. Callbacks are shared between forks.
 */

import { SequenceContractError } from "@pullseq/core";
import { DONE, type Cursor, type Nullable, type Step } from "./types.js";

// ---------------------------------------------------------------------------
// Collections
// ---------------------------------------------------------------------------

/** Walks `source[start..end)` by moving `start` toward `end`. A `NaN` bound means the array's own. */
export class IndexCursor<T> implements Cursor<T> {
  private start: number;
  private readonly end: number;

  constructor(
    private readonly source: ArrayLike<T>,
    start: number = 0,
    end: number = source.length
  ) {
    this.start = Number.isNaN(start) ? 0 : Math.max(0, Math.trunc(start));
    this.end = Number.isNaN(end) ? source.length : Math.min(Math.trunc(end), source.length);
  }

  advance(): Step<T> {
    if (this.start >= this.end) return DONE;
    return this.source[this.start++];
  }

  fork(): Cursor<T> {
    return new IndexCursor(this.source, this.start, this.end);
  }
}

/**
 * Bridges a host iterable. The iterator is opened on the first advance.
 *
 * Re-iterable sources (Set, Map, custom iterables) fork by reopening and
 * skipping what was already consumed. Iterators and generator objects are
 * one-shot and refuse to fork.
 */
export class IterableCursor<T> implements Cursor<T> {
  private iterator: Iterator<T> | null = null;
  /** Items pulled from the iterator so far, skipped ones included. */
  private position = 0;
  private done = false;

  constructor(
    private readonly source: Iterable<T>,
    private readonly skip: number = 0
  ) {}

  advance(): Step<T> {
    if (this.done) return DONE;
    if (this.iterator === null) this.iterator = this.source[Symbol.iterator]();

    while (this.position < this.skip) {
      this.position++;
      if (this.iterator.next().done) {
        this.done = true;
        return DONE;
      }
    }

    const result = this.iterator.next();
    if (result.done) {
      this.done = true;
      return DONE;
    }
    this.position++;
    return result.value;
  }

  fork(): Cursor<T> {
    if (isOneShot(this.source)) {
      throw new SequenceContractError(
        "fromIterable",
        "not_restartable",
        "a one-shot iterator cannot be restarted; build the sequence from a re-iterable collection instead"
      );
    }
    const copy = new IterableCursor(this.source, Math.max(this.position, this.skip));
    copy.done = this.done;
    return copy;
  }
}

function isOneShot<T>(source: Iterable<T>): boolean {
  return "next" in source && typeof source.next === "function";
}

// ---------------------------------------------------------------------------
// Numeric ranges
// ---------------------------------------------------------------------------

/**
 * `current` while it is below (or, inclusive, not above) `bound`, then
 * `current += step`. The bound test runs before each yield and its first
 * failure is final. A zero or negative step is accepted as given.
 */
export class RangeCursor implements Cursor<number> {
  private done = false;

  constructor(
    private current: number,
    private readonly bound: number,
    private readonly step: number,
    private readonly inclusive: boolean
  ) {}

  advance(): Step<number> {
    if (this.done) return DONE;
    const inBounds = this.inclusive ? this.current <= this.bound : this.current < this.bound;
    if (!inBounds) {
      this.done = true;
      return DONE;
    }
    const value = this.current;
    this.current += this.step;
    return value;
  }

  fork(): Cursor<number> {
    const copy = new RangeCursor(this.current, this.bound, this.step, this.inclusive);
    copy.done = this.done;
    return copy;
  }
}

/** `value`, `value + step`, ... forever. */
export class CountingCursor implements Cursor<number> {
  constructor(
    private value: number,
    private readonly step: number
  ) {}

  advance(): Step<number> {
    const value = this.value;
    this.value += this.step;
    return value;
  }

  fork(): Cursor<number> {
    return new CountingCursor(this.value, this.step);
  }
}

// ---------------------------------------------------------------------------
// Single values
// ---------------------------------------------------------------------------

export class EmptyCursor<T> implements Cursor<T> {
  advance(): Step<T> {
    return DONE;
  }

  fork(): Cursor<T> {
    return this;
  }
}

export class OnceCursor<T> implements Cursor<T> {
  constructor(
    private readonly value: T,
    private done: boolean = false
  ) {}

  advance(): Step<T> {
    if (this.done) return DONE;
    this.done = true;
    return this.value;
  }

  fork(): Cursor<T> {
    return new OnceCursor(this.value, this.done);
  }
}

/** Calls `compute` on the first advance only. */
export class OnceWithCursor<T> implements Cursor<T> {
  constructor(
    private readonly compute: () => T,
    private done: boolean = false
  ) {}

  advance(): Step<T> {
    if (this.done) return DONE;
    this.done = true;
    return this.compute();
  }

  fork(): Cursor<T> {
    return new OnceWithCursor(this.compute, this.done);
  }
}

export class RepeatCursor<T> implements Cursor<T> {
  constructor(private readonly value: T) {}

  advance(): Step<T> {
    return this.value;
  }

  fork(): Cursor<T> {
    return this;
  }
}

// ---------------------------------------------------------------------------
// Function-driven
// ---------------------------------------------------------------------------

/** Calls `generate` on every advance; never exhausted. */
export class GeneratorCursor<T> implements Cursor<T> {
  constructor(private readonly generate: () => T) {}

  advance(): Step<T> {
    return this.generate();
  }

  fork(): Cursor<T> {
    return new GeneratorCursor(this.generate);
  }
}

/**
 * Calls `generate` until it returns null or undefined. The first empty
 * result is final even if `generate` would produce values again.
 */
export class FiniteGeneratorCursor<T> implements Cursor<T> {
  constructor(
    private readonly generate: () => Nullable<T>,
    private done: boolean = false
  ) {}

  advance(): Step<T> {
    if (this.done) return DONE;
    const value = this.generate();
    if (value === null || value === undefined) {
      this.done = true;
      return DONE;
    }
    return value;
  }

  fork(): Cursor<T> {
    return new FiniteGeneratorCursor(this.generate, this.done);
  }
}

/** Yields `current`, then replaces it with `successor(current)`. */
export class SuccessorsCursor<T> implements Cursor<T> {
  constructor(
    private current: Nullable<T>,
    private readonly successor: (prev: T) => Nullable<T>
  ) {}

  advance(): Step<T> {
    const prev = this.current;
    if (prev === null || prev === undefined) return DONE;
    this.current = this.successor(prev);
    return prev;
  }

  fork(): Cursor<T> {
    return new SuccessorsCursor(this.current, this.successor);
  }
}
