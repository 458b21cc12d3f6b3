/**
 * Adaptor cursors: each one exclusively owns its upstream cursor(s) and
 * produces its own items by pulling from them on demand.
 *
 * No adaptor requests an upstream item before it needs one to answer the
 * current `advance()`, except `PeekableCursor`'s single lookahead slot.
 */

import { SequenceContractError } from "@pullseq/core";
import { CountingCursor, IndexCursor, IterableCursor } from "./producers.js";
import { DONE, isCursor, type Cursor, type Nested, type Nullable, type Step } from "./types.js";

// ---------------------------------------------------------------------------
// Element-wise
// ---------------------------------------------------------------------------

export class MapCursor<T, U> implements Cursor<U> {
  constructor(
    private readonly upstream: Cursor<T>,
    private readonly f: (item: T) => U
  ) {}

  advance(): Step<U> {
    const item = this.upstream.advance();
    return item === DONE ? DONE : this.f(item);
  }

  fork(): Cursor<U> {
    return new MapCursor(this.upstream.fork(), this.f);
  }
}

export class FilterCursor<T> implements Cursor<T> {
  constructor(
    private readonly upstream: Cursor<T>,
    private readonly predicate: (item: T) => boolean
  ) {}

  advance(): Step<T> {
    for (;;) {
      const item = this.upstream.advance();
      if (item === DONE || this.predicate(item)) return item;
    }
  }

  fork(): Cursor<T> {
    return new FilterCursor(this.upstream.fork(), this.predicate);
  }
}

/** Keeps the non-nullish results of `f`. */
export class FilterMapCursor<T, U> implements Cursor<U> {
  constructor(
    private readonly upstream: Cursor<T>,
    private readonly f: (item: T) => Nullable<U>
  ) {}

  advance(): Step<U> {
    for (;;) {
      const item = this.upstream.advance();
      if (item === DONE) return DONE;
      const mapped = this.f(item);
      if (mapped !== null && mapped !== undefined) return mapped;
    }
  }

  fork(): Cursor<U> {
    return new FilterMapCursor(this.upstream.fork(), this.f);
  }
}

export class InspectCursor<T> implements Cursor<T> {
  constructor(
    private readonly upstream: Cursor<T>,
    private readonly observe: (item: T) => void
  ) {}

  advance(): Step<T> {
    const item = this.upstream.advance();
    if (item !== DONE) this.observe(item);
    return item;
  }

  fork(): Cursor<T> {
    return new InspectCursor(this.upstream.fork(), this.observe);
  }
}

// ---------------------------------------------------------------------------
// Two upstreams
// ---------------------------------------------------------------------------

/** All of `first`, then all of `second`. `first` is never touched again once it ends. */
export class ChainCursor<T> implements Cursor<T> {
  constructor(
    private readonly first: Cursor<T>,
    private readonly second: Cursor<T>,
    private firstDone: boolean = false
  ) {}

  advance(): Step<T> {
    if (!this.firstDone) {
      const item = this.first.advance();
      if (item !== DONE) return item;
      this.firstDone = true;
    }
    return this.second.advance();
  }

  fork(): Cursor<T> {
    return new ChainCursor(this.first.fork(), this.second.fork(), this.firstDone);
  }
}

/**
 * Pairs items from both sides, advancing both on every step. Ends as soon
 * as either side ends; the other side's item for that step is dropped.
 */
export class ZipCursor<A, B> implements Cursor<[A, B]> {
  constructor(
    private readonly left: Cursor<A>,
    private readonly right: Cursor<B>,
    private done: boolean = false
  ) {}

  advance(): Step<[A, B]> {
    if (this.done) return DONE;
    const a = this.left.advance();
    const b = this.right.advance();
    if (a === DONE || b === DONE) {
      this.done = true;
      return DONE;
    }
    return [a, b];
  }

  fork(): Cursor<[A, B]> {
    return new ZipCursor(this.left.fork(), this.right.fork(), this.done);
  }
}

/** `[0, item0], [1, item1], ...`: a zip against a counter. */
export function enumerateCursor<T>(upstream: Cursor<T>): Cursor<[number, T]> {
  return new ZipCursor(new CountingCursor(0, 1), upstream);
}

// ---------------------------------------------------------------------------
// Striding and separators
// ---------------------------------------------------------------------------

/**
 * The first item, then every `step`-th item after it. A step below 1
 * yields nothing and never pulls upstream.
 */
export class StepByCursor<T> implements Cursor<T> {
  private readonly step: number;

  constructor(
    private readonly upstream: Cursor<T>,
    step: number,
    private first: boolean = true,
    private done: boolean = false
  ) {
    this.step = Math.trunc(step);
    if (!(this.step >= 1)) this.done = true;
  }

  advance(): Step<T> {
    if (this.done) return DONE;
    if (this.first) {
      this.first = false;
      return this.pull();
    }
    let item: Step<T> = DONE;
    for (let i = 0; i < this.step && !this.done; i++) {
      item = this.pull();
    }
    return item;
  }

  private pull(): Step<T> {
    const item = this.upstream.advance();
    if (item === DONE) this.done = true;
    return item;
  }

  fork(): Cursor<T> {
    return new StepByCursor(this.upstream.fork(), this.step, this.first, this.done);
  }
}

/**
 * Puts `separator()` between consecutive items, never before the first or
 * after the last. After each item the next upstream item is pulled only on
 * the following call; when it exists it is held back and the separator is
 * returned in its place.
 */
export class IntersperseCursor<T> implements Cursor<T> {
  private started = false;
  private held: Step<T> = DONE;
  private done = false;

  constructor(
    private readonly upstream: Cursor<T>,
    private readonly separator: () => T
  ) {}

  advance(): Step<T> {
    if (this.held !== DONE) {
      const item = this.held;
      this.held = DONE;
      return item;
    }
    if (this.done) return DONE;

    const item = this.upstream.advance();
    if (item === DONE) {
      this.done = true;
      return DONE;
    }
    if (!this.started) {
      this.started = true;
      return item;
    }
    this.held = item;
    return this.separator();
  }

  fork(): Cursor<T> {
    const copy = new IntersperseCursor(this.upstream.fork(), this.separator);
    copy.started = this.started;
    copy.held = this.held;
    copy.done = this.done;
    return copy;
  }
}

// ---------------------------------------------------------------------------
// Skip / take
// ---------------------------------------------------------------------------

/**
 * The test behind skipWhile/takeWhile. `closed()` lets takeWhile stop
 * without pulling once a countdown has run out.
 */
export interface Gate<T> {
  test(item: T): boolean;
  closed(): boolean;
  fork(): Gate<T>;
}

export function predicateGate<T>(predicate: (item: T) => boolean): Gate<T> {
  return {
    test: predicate,
    closed: () => false,
    fork() {
      return this;
    },
  };
}

/** Passes the first `count` items it is asked about. */
export class CountdownGate<T> implements Gate<T> {
  private remaining: number;

  constructor(count: number) {
    this.remaining = count > 0 ? Math.trunc(count) : 0;
  }

  test(_item: T): boolean {
    if (this.remaining <= 0) return false;
    this.remaining--;
    return true;
  }

  closed(): boolean {
    return this.remaining <= 0;
  }

  fork(): Gate<T> {
    return new CountdownGate(this.remaining);
  }
}

/** Drops leading items while the gate passes; the gate is not consulted after its first rejection. */
export class SkipWhileCursor<T> implements Cursor<T> {
  constructor(
    private readonly upstream: Cursor<T>,
    private readonly gate: Gate<T>,
    private skipping: boolean = true
  ) {}

  advance(): Step<T> {
    if (this.skipping) {
      this.skipping = false;
      for (;;) {
        const item = this.upstream.advance();
        if (item === DONE || !this.gate.test(item)) return item;
      }
    }
    return this.upstream.advance();
  }

  fork(): Cursor<T> {
    return new SkipWhileCursor(this.upstream.fork(), this.gate.fork(), this.skipping);
  }
}

/** Yields items while the gate passes. The first rejected item is discarded and the cursor stays exhausted. */
export class TakeWhileCursor<T> implements Cursor<T> {
  constructor(
    private readonly upstream: Cursor<T>,
    private readonly gate: Gate<T>,
    private done: boolean = false
  ) {}

  advance(): Step<T> {
    if (this.done) return DONE;
    if (!this.gate.closed()) {
      const item = this.upstream.advance();
      if (item !== DONE && this.gate.test(item)) return item;
    }
    this.done = true;
    return DONE;
  }

  fork(): Cursor<T> {
    return new TakeWhileCursor(this.upstream.fork(), this.gate.fork(), this.done);
  }
}

// ---------------------------------------------------------------------------
// Nesting and repetition
// ---------------------------------------------------------------------------

/** Opens a nested item as a cursor. Strings and arrays are walked by index. */
export function openNested<T>(nested: Nested<T>): Cursor<T> {
  if (isCursor(nested)) return nested;
  if (!isIterableObject(nested)) return new IndexCursor(nested);
  return Array.isArray(nested) ? new IndexCursor<T>(nested) : new IterableCursor(nested);
}

function isIterableObject<T>(value: Iterable<T> | ArrayLike<T>): value is Iterable<T> {
  return typeof value === "object" && value !== null && Symbol.iterator in value;
}

/**
 * Opens an inner item for flattening. Cursor items are forked so the outer
 * item stays at its position and a replayed outer pass sees it whole again;
 * a one-shot cursor is used as it is.
 */
function openInner<T>(nested: Nested<T>): Cursor<T> {
  if (!isCursor(nested)) return openNested(nested);
  try {
    return nested.fork();
  } catch (error) {
    if (error instanceof SequenceContractError && error.reason === "not_restartable") return nested;
    throw error;
  }
}

/** Yields every item of each inner sequence in turn, removing one level of nesting. */
export class FlattenCursor<T> implements Cursor<T> {
  constructor(
    private readonly outer: Cursor<Nested<T>>,
    private inner: Cursor<T> | null = null
  ) {}

  advance(): Step<T> {
    for (;;) {
      if (this.inner !== null) {
        const item = this.inner.advance();
        if (item !== DONE) return item;
      }
      const next = this.outer.advance();
      if (next === DONE) {
        this.inner = null;
        return DONE;
      }
      this.inner = openInner(next);
    }
  }

  fork(): Cursor<T> {
    return new FlattenCursor(this.outer.fork(), this.inner?.fork() ?? null);
  }
}

/**
 * Replays `original` (a fork taken when the cycle was built) every time the
 * current pass ends. A pass that yields nothing ends the cycle for good, so
 * an empty source never spins.
 */
export class CycleCursor<T> implements Cursor<T> {
  private constructor(
    private readonly original: Cursor<T>,
    private current: Cursor<T>,
    private passYielded: boolean
  ) {}

  /** Throws `SequenceContractError` when `upstream` cannot fork. */
  static over<T>(upstream: Cursor<T>): CycleCursor<T> {
    return new CycleCursor(upstream.fork(), upstream, false);
  }

  advance(): Step<T> {
    const item = this.current.advance();
    if (item !== DONE) {
      this.passYielded = true;
      return item;
    }
    if (!this.passYielded) return DONE;

    this.current = this.original.fork();
    this.passYielded = false;
    const restarted = this.current.advance();
    if (restarted !== DONE) this.passYielded = true;
    return restarted;
  }

  fork(): Cursor<T> {
    return new CycleCursor(this.original, this.current.fork(), this.passYielded);
  }
}

// ---------------------------------------------------------------------------
// Lookahead
// ---------------------------------------------------------------------------

/** Peek buffer: nothing fetched yet, a fetched item, or a fetched end. */
export type Lookahead<T> =
  | { readonly kind: "unresolved" }
  | { readonly kind: "item"; readonly value: T }
  | { readonly kind: "end" };

const UNRESOLVED = { kind: "unresolved" } as const;
const END = { kind: "end" } as const;

export class PeekableCursor<T> implements Cursor<T> {
  constructor(
    private readonly upstream: Cursor<T>,
    private lookahead: Lookahead<T> = UNRESOLVED
  ) {}

  /** The next item without consuming it. Upstream is touched at most once per item. */
  peek(): Step<T> {
    switch (this.lookahead.kind) {
      case "item":
        return this.lookahead.value;
      case "end":
        return DONE;
      case "unresolved": {
        const item = this.upstream.advance();
        this.lookahead = item === DONE ? END : { kind: "item", value: item };
        return item;
      }
    }
  }

  advance(): Step<T> {
    switch (this.lookahead.kind) {
      case "item": {
        const { value } = this.lookahead;
        this.lookahead = UNRESOLVED;
        return value;
      }
      case "end":
        return DONE;
      case "unresolved":
        return this.upstream.advance();
    }
  }

  fork(): PeekableCursor<T> {
    return new PeekableCursor(this.upstream.fork(), this.lookahead);
  }
}
