/**
 * The fluent sequence wrapper.
 *
 * Adaptor methods wrap the current cursor in a new stage and hand back a
 * new `Sequence`; nothing is pulled until a terminal method (or a host
 * `for...of`) asks for items. Each `Sequence` can be composed into exactly
 * one stage.
 */

import { SequenceContractError, createLogger } from "@pullseq/core";
import {
  ChainCursor,
  CountdownGate,
  CycleCursor,
  FilterCursor,
  FilterMapCursor,
  FlattenCursor,
  InspectCursor,
  IntersperseCursor,
  MapCursor,
  PeekableCursor,
  SkipWhileCursor,
  StepByCursor,
  TakeWhileCursor,
  ZipCursor,
  enumerateCursor,
  openNested,
  predicateGate,
} from "./adaptors.js";
import { toArray } from "./collectors.js";
import * as consume from "./consumers.js";
import { checkCallback } from "./contracts.js";
import {
  naturalOrder,
  partialOrder,
  reverseOrder,
  comparing,
  EQ,
  GT,
  LT,
  type Comparable,
  type Ordering,
  type PartialOrdering,
} from "./ordering.js";
import { DONE, type Collector, type Cursor, type Nested, type Nullable, type Option, type Step } from "./types.js";

const log = createLogger("seq");

/** Another sequence, or any host collection, on the far side of a two-input stage. */
export type SequenceSource<T> = Sequence<T> | Iterable<T> | ArrayLike<T>;

/**
 * A lazy, pull-based sequence.
 *
 * @example
 * ```typescript
 * range(0, 10)
 *   .filter((x) => x % 2 === 0)
 *   .map((x) => x * x)
 *   .collect(); // [0, 4, 16, 36, 64]
 * ```
 */
export class Sequence<T> implements Cursor<T>, Iterable<T> {
  /** Stage this sequence was composed into, once it has been. */
  private owner: string | null = null;

  constructor(private readonly cursor: Cursor<T>) {}

  /** Pulls the next item, or `DONE`. */
  advance(): Step<T> {
    return this.drain("advance").advance();
  }

  /** An independent copy at the current position. */
  fork(): Sequence<T> {
    return new Sequence(this.cursor.fork());
  }

  [Symbol.iterator](): Iterator<T> {
    return iterate(this.drain("iterate"));
  }

  // ---------------------------------------------------------------------------
  // Ownership
  // ---------------------------------------------------------------------------

  protected claim(stage: string): void {
    if (this.owner !== null) {
      throw new SequenceContractError(
        stage,
        "already_owned",
        `sequence is already consumed by a ${this.owner} stage; fork() it to use it twice`
      );
    }
  }

  /** Cursor for a terminal operation, which leaves the sequence unowned. */
  private drain(stage: string): Cursor<T> {
    this.claim(stage);
    return this.cursor;
  }

  /** Both cursors of a comparison; `other` may not be this sequence. */
  private against<U>(stage: string, other: SequenceSource<U>): [Cursor<T>, Cursor<U>] {
    this.claim(stage);
    const right = Sequence.open(stage, other);
    // Adopting `other` owns this sequence when the two are the same.
    this.claim(stage);
    return [this.cursor, right];
  }

  /** Marks this sequence as owned by `stage` and returns its cursor. */
  private adopt(stage: string): Cursor<T> {
    this.claim(stage);
    this.owner = stage;
    log.debug("assembled", stage);
    return this.cursor;
  }

  /** Opens the second input of a two-input stage. */
  private static open<U>(stage: string, source: SequenceSource<U>): Cursor<U> {
    if (source instanceof Sequence) return source.adopt(stage);
    return openNested(source);
  }

  // ---------------------------------------------------------------------------
  // Adaptors
  // ---------------------------------------------------------------------------

  /** Transform each element */
  map<U>(f: (item: T) => U): Sequence<U> {
    checkCallback("map", f, 1);
    return new Sequence(new MapCursor(this.adopt("map"), f));
  }

  /** Keep only elements that satisfy the predicate */
  filter(predicate: (item: T) => boolean): Sequence<T> {
    checkCallback("filter", predicate, 1);
    return new Sequence(new FilterCursor(this.adopt("filter"), predicate));
  }

  /** Transform each element, dropping null and undefined results */
  filterMap<U>(f: (item: T) => Nullable<U>): Sequence<U> {
    checkCallback("filterMap", f, 1);
    return new Sequence(new FilterMapCursor(this.adopt("filterMap"), f));
  }

  /** All of this sequence, then all of `other` */
  chain(other: SequenceSource<T>): Sequence<T> {
    const second = Sequence.open("chain", other);
    return new Sequence(new ChainCursor(this.adopt("chain"), second));
  }

  /** Pairs with `other` until either side runs out */
  zip<U>(other: SequenceSource<U>): Sequence<[T, U]> {
    const right = Sequence.open("zip", other);
    return new Sequence(new ZipCursor(this.adopt("zip"), right));
  }

  /** The first element, then every `step`-th one */
  stepBy(step: number): Sequence<T> {
    return new Sequence(new StepByCursor(this.adopt("stepBy"), step));
  }

  /** Puts `separator` between adjacent elements */
  intersperse(separator: T): Sequence<T> {
    return new Sequence(new IntersperseCursor(this.adopt("intersperse"), () => separator));
  }

  /** Puts `separator()` between adjacent elements; called once per gap */
  intersperseWith(separator: () => T): Sequence<T> {
    checkCallback("intersperseWith", separator, 0);
    return new Sequence(new IntersperseCursor(this.adopt("intersperseWith"), separator));
  }

  /** Skip elements while predicate holds, emit everything after */
  skipWhile(predicate: (item: T) => boolean): Sequence<T> {
    checkCallback("skipWhile", predicate, 1);
    return new Sequence(new SkipWhileCursor(this.adopt("skipWhile"), predicateGate(predicate)));
  }

  /** Take elements while predicate holds, stop at first failure */
  takeWhile(predicate: (item: T) => boolean): Sequence<T> {
    checkCallback("takeWhile", predicate, 1);
    return new Sequence(new TakeWhileCursor(this.adopt("takeWhile"), predicateGate(predicate)));
  }

  /** Skip the first `count` elements */
  skip(count: number): Sequence<T> {
    return new Sequence(new SkipWhileCursor(this.adopt("skip"), new CountdownGate<T>(count)));
  }

  /** Take the first `count` elements */
  take(count: number): Sequence<T> {
    return new Sequence(new TakeWhileCursor(this.adopt("take"), new CountdownGate<T>(count)));
  }

  /** Pairs each element with its zero-based index */
  enumerate(): Sequence<[number, T]> {
    return new Sequence(enumerateCursor(this.adopt("enumerate")));
  }

  /** Removes one level of nesting */
  flatten<U>(this: Sequence<Nested<U>>): Sequence<U> {
    return new Sequence(new FlattenCursor<U>(this.adopt("flatten")));
  }

  /** Observe each element without changing it */
  inspect(f: (item: T) => void): Sequence<T> {
    checkCallback("inspect", f, 1);
    return new Sequence(new InspectCursor(this.adopt("inspect"), f));
  }

  /**
   * Repeats the sequence endlessly. An empty sequence stays empty.
   *
   * Throws `SequenceContractError` (`not_restartable`) when the source is a
   * one-shot iterator.
   */
  cycle(): Sequence<T> {
    this.claim("cycle");
    let cycled: CycleCursor<T>;
    try {
      cycled = CycleCursor.over(this.cursor);
    } catch (error) {
      if (error instanceof SequenceContractError && error.reason === "not_restartable") {
        throw new SequenceContractError("cycle", error.reason, error.detail);
      }
      throw error;
    }
    this.adopt("cycle");
    return new Sequence(cycled);
  }

  /** Adds one element of lookahead */
  peekable(): PeekableSequence<T> {
    return new PeekableSequence(new PeekableCursor(this.adopt("peekable")));
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  /** Execute a side effect for each element */
  forEach(f: (item: T) => void): void {
    checkCallback("forEach", f, 1);
    consume.forEach(this.drain("forEach"), f);
  }

  /** Collect into an array, or into whatever `collector` builds */
  collect(): T[];
  collect<C>(collector: Collector<T, C>): C;
  collect<C>(collector?: Collector<T, C>): T[] | C {
    if (collector === undefined) return consume.collectInto(this.drain("collect"), toArray<T>());
    return consume.collectInto(this.drain("collect"), collector);
  }

  /** Like `collect`, passing the expected number of elements to `collector.init` */
  collectWithSizeHint<C>(collector: Collector<T, C>, sizeHint: number): C {
    return consume.collectInto(this.drain("collectWithSizeHint"), collector, sizeHint);
  }

  /** Splits into `[rejected, accepted]` by the predicate */
  partition(predicate: (item: T) => boolean): [T[], T[]];
  partition<C>(predicate: (item: T) => boolean, collector: Collector<T, C>): [C, C];
  partition<C>(predicate: (item: T) => boolean, collector?: Collector<T, C>): [T[], T[]] | [C, C] {
    checkCallback("partition", predicate, 1);
    if (collector === undefined) return consume.partition(this.drain("partition"), predicate, toArray<T>());
    return consume.partition(this.drain("partition"), predicate, collector);
  }

  /** Count the number of elements */
  count(): number {
    return consume.count(this.drain("count"));
  }

  /** Last element, or null if empty */
  last(): Option<T> {
    return consume.last(this.drain("last"));
  }

  /** First element, or null if empty */
  first(): Option<T> {
    return consume.nth(this.drain("first"), 0);
  }

  /** Element at zero-based `index`, or null */
  nth(index: number): Option<T> {
    return consume.nth(this.drain("nth"), index);
  }

  /** Sum of numeric elements; 0 when empty */
  sum(this: Sequence<number>): number {
    return consume.fold(this.drain("sum"), 0, (acc, item) => acc + item);
  }

  /** Product of numeric elements; 1 when empty */
  product(this: Sequence<number>): number {
    return consume.fold(this.drain("product"), 1, (acc, item) => acc * item);
  }

  /** Fold elements left-to-right into a single value */
  fold<Acc>(seed: Acc, f: (acc: Acc, item: T) => Acc): Acc {
    checkCallback("fold", f, 2);
    return consume.fold(this.drain("fold"), seed, f);
  }

  /** Fold using the first element as the seed; null if empty */
  reduce(f: (acc: T, item: T) => T): Option<T> {
    checkCallback("reduce", f, 2);
    return consume.reduce(this.drain("reduce"), f);
  }

  /** True if all elements satisfy the predicate */
  all(predicate: (item: T) => boolean): boolean {
    checkCallback("all", predicate, 1);
    return consume.all(this.drain("all"), predicate);
  }

  /** True if any element satisfies the predicate */
  any(predicate: (item: T) => boolean): boolean {
    checkCallback("any", predicate, 1);
    return consume.any(this.drain("any"), predicate);
  }

  /** Find the first element matching the predicate */
  find(predicate: (item: T) => boolean): Option<T> {
    checkCallback("find", predicate, 1);
    return consume.find(this.drain("find"), predicate);
  }

  /** Index of the first element matching the predicate */
  position(predicate: (item: T) => boolean): Option<number> {
    checkCallback("position", predicate, 1);
    return consume.position(this.drain("position"), predicate);
  }

  /** Minimum element; the first of equal minima */
  min<U extends Comparable>(this: Sequence<U>): Option<U> {
    return consume.minBy(this.drain("min"), naturalOrder);
  }

  /** Maximum element; the first of equal maxima */
  max<U extends Comparable>(this: Sequence<U>): Option<U> {
    return consume.maxBy(this.drain("max"), naturalOrder);
  }

  minBy(compare: (a: T, b: T) => Ordering): Option<T> {
    checkCallback("minBy", compare, 2);
    return consume.minBy(this.drain("minBy"), compare);
  }

  maxBy(compare: (a: T, b: T) => Ordering): Option<T> {
    checkCallback("maxBy", compare, 2);
    return consume.maxBy(this.drain("maxBy"), compare);
  }

  minByKey<K extends Comparable>(key: (item: T) => K): Option<T> {
    checkCallback("minByKey", key, 1);
    return consume.minBy(this.drain("minByKey"), comparing(key));
  }

  maxByKey<K extends Comparable>(key: (item: T) => K): Option<T> {
    checkCallback("maxByKey", key, 1);
    return consume.maxBy(this.drain("maxByKey"), comparing(key));
  }

  isSortedAscending<U extends Comparable>(this: Sequence<U>): boolean {
    return consume.isSortedBy(this.drain("isSortedAscending"), naturalOrder);
  }

  isSortedDescending<U extends Comparable>(this: Sequence<U>): boolean {
    return consume.isSortedBy(this.drain("isSortedDescending"), reverseOrder);
  }

  isSortedBy(compare: (a: T, b: T) => Ordering): boolean {
    checkCallback("isSortedBy", compare, 2);
    return consume.isSortedBy(this.drain("isSortedBy"), compare);
  }

  // ---------------------------------------------------------------------------
  // Lexicographic comparison with another sequence
  // ---------------------------------------------------------------------------

  cmp<U extends Comparable>(this: Sequence<U>, other: SequenceSource<U>): Ordering {
    const [left, right] = this.against("cmp", other);
    return consume.cmpBy(left, right, naturalOrder);
  }

  cmpBy<U>(other: SequenceSource<U>, compare: (a: T, b: U) => Ordering): Ordering {
    checkCallback("cmpBy", compare, 2);
    const [left, right] = this.against("cmpBy", other);
    return consume.cmpBy(left, right, compare);
  }

  /** Like `cmp`, but null as soon as two elements are incomparable (NaN) */
  partialCmp<U extends Comparable>(this: Sequence<U>, other: SequenceSource<U>): PartialOrdering {
    const [left, right] = this.against("partialCmp", other);
    return consume.partialCmpBy(left, right, partialOrder);
  }

  partialCmpBy<U>(other: SequenceSource<U>, compare: (a: T, b: U) => PartialOrdering): PartialOrdering {
    checkCallback("partialCmpBy", compare, 2);
    const [left, right] = this.against("partialCmpBy", other);
    return consume.partialCmpBy(left, right, compare);
  }

  /** Same length and pairwise `===` */
  eq(other: SequenceSource<T>): boolean {
    const [left, right] = this.against("eq", other);
    return consume.eqBy(left, right, (a, b) => a === b);
  }

  eqBy<U>(other: SequenceSource<U>, eq: (a: T, b: U) => boolean): boolean {
    checkCallback("eqBy", eq, 2);
    const [left, right] = this.against("eqBy", other);
    return consume.eqBy(left, right, eq);
  }

  ne(other: SequenceSource<T>): boolean {
    return !this.eq(other);
  }

  lt<U extends Comparable>(this: Sequence<U>, other: SequenceSource<U>): boolean {
    return this.partialCmp(other) === LT;
  }

  le<U extends Comparable>(this: Sequence<U>, other: SequenceSource<U>): boolean {
    const c = this.partialCmp(other);
    return c === LT || c === EQ;
  }

  gt<U extends Comparable>(this: Sequence<U>, other: SequenceSource<U>): boolean {
    return this.partialCmp(other) === GT;
  }

  ge<U extends Comparable>(this: Sequence<U>, other: SequenceSource<U>): boolean {
    const c = this.partialCmp(other);
    return c === GT || c === EQ;
  }
}

function* iterate<T>(cursor: Cursor<T>): Generator<T> {
  for (let item = cursor.advance(); item !== DONE; item = cursor.advance()) {
    yield item;
  }
}

/** A sequence with one element of lookahead. */
export class PeekableSequence<T> extends Sequence<T> {
  constructor(private readonly lookahead: PeekableCursor<T>) {
    super(lookahead);
  }

  /** The next element without consuming it, or `DONE`. */
  peek(): Step<T> {
    this.claim("peek");
    return this.lookahead.peek();
  }

  /** Consumes and returns the next element only if it satisfies `predicate`; `DONE` otherwise. */
  nextIf(predicate: (item: T) => boolean): Step<T> {
    checkCallback("nextIf", predicate, 1);
    this.claim("nextIf");
    const item = this.lookahead.peek();
    if (item === DONE || !predicate(item)) return DONE;
    return this.lookahead.advance();
  }

  override fork(): PeekableSequence<T> {
    return new PeekableSequence(this.lookahead.fork());
  }
}
