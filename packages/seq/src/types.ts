/**
 * Pull protocol types for @pullseq/seq
 *
 * Every producer and adaptor is a `Cursor`: a single `advance()` primitive
 * that returns the next item or the `DONE` sentinel.
 */

/**
 * Sentinel returned by `advance()` once a sequence is exhausted.
 * Distinct from every live item, including `undefined` and `null`.
 */
export const DONE: unique symbol = Symbol("pullseq.done");
export type Done = typeof DONE;

/** Result of one advancement: an item, or `DONE`. */
export type Step<T> = T | Done;

/**
 * Option data type: a value, or null for "no result".
 *
 * Consumers that may find nothing (`find`, `min`, `nth`, ...) return
 * `Option<T>`. An item type that itself includes null cannot tell the two
 * apart; use `advance()` and `DONE` for such sequences.
 */
export type Option<A> = A | null;

/** What producer and filter callbacks may return to mean "no value". */
export type Nullable<A> = A | null | undefined;

/**
 * The single-step protocol every sequence implements.
 *
 * Contract:
 * - `advance()` never throws on its own account; after it returns `DONE`
 *   every later call returns `DONE` too.
 * - `fork()` returns an independent cursor at the same position, sharing
 *   callbacks. Cursors over one-shot host iterators throw
 *   `SequenceContractError` with reason `not_restartable`.
 */
export interface Cursor<T> {
  advance(): Step<T>;
  fork(): Cursor<T>;
}

/** Anything `flatten()` can open as an inner sequence. */
export type Nested<T> = Cursor<T> | Iterable<T> | ArrayLike<T>;

export function isCursor<T>(value: Nested<T>): value is Cursor<T> {
  return (
    typeof value === "object" &&
    value !== null &&
    "advance" in value &&
    typeof value.advance === "function" &&
    "fork" in value &&
    typeof value.fork === "function"
  );
}

/**
 * Builds a container out of the items of a sequence.
 *
 * `init` receives the caller's size hint when there is one
 * (`collectWithSizeHint`); collectors that cannot preallocate ignore it.
 */
export interface Collector<T, C> {
  init(sizeHint?: number): C;
  add(container: C, item: T): C;
}
