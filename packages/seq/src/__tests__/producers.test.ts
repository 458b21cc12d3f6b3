import { describe, it, expect } from "vitest";
import {
  DONE,
  empty,
  finiteGenerator,
  fromCollection,
  fromCursorPair,
  fromFn,
  fromIterable,
  infiniteGenerator,
  infiniteRange,
  once,
  onceWith,
  range,
  rangeInclusive,
  repeat,
  repeatWith,
  successors,
} from "../index.js";

// ===========================================================================
// Collections
// ===========================================================================

describe("fromCollection", () => {
  it("walks arrays in order", () => {
    expect(fromCollection([3, 1, 2]).collect()).toEqual([3, 1, 2]);
  });

  it("walks strings by character", () => {
    expect(fromCollection("abc").collect()).toEqual(["a", "b", "c"]);
  });

  it("walks array-likes by index", () => {
    const arrayLike: ArrayLike<string> = { length: 2, 0: "x", 1: "y" };
    expect(fromCollection(arrayLike).collect()).toEqual(["x", "y"]);
  });

  it("walks sets and maps through their iterators", () => {
    expect(fromCollection(new Set([1, 2, 2, 3])).collect()).toEqual([1, 2, 3]);
    expect(
      fromCollection(
        new Map([
          ["a", 1],
          ["b", 2],
        ])
      ).collect()
    ).toEqual([
      ["a", 1],
      ["b", 2],
    ]);
  });

  it("keeps undefined and null items", () => {
    expect(fromCollection([undefined, null, 0]).count()).toBe(3);
  });

  it("sees the collection's length as of construction", () => {
    const source = [1, 2];
    const seq = fromCollection(source);
    source.push(3);
    expect(seq.collect()).toEqual([1, 2]);
  });
});

describe("fromCursorPair", () => {
  const source = [1, 2, 3, 4, 5];

  it("yields source[start..end)", () => {
    expect(fromCursorPair(source, 1, 4).collect()).toEqual([2, 3, 4]);
  });

  it("clamps end to the source length", () => {
    expect(fromCursorPair(source, 3, 99).collect()).toEqual([4, 5]);
  });

  it("is empty when start is not before end", () => {
    expect(fromCursorPair(source, 4, 4).collect()).toEqual([]);
    expect(fromCursorPair(source, 4, 2).collect()).toEqual([]);
  });

  it("reads a NaN bound as the edge of the source", () => {
    expect(fromCursorPair([1, 2], 0, NaN).take(4).collect()).toEqual([1, 2]);
    expect(fromCursorPair([1, 2], NaN, 1).collect()).toEqual([1]);
  });
});

describe("fromIterable", () => {
  it("drains a generator object", () => {
    function* letters() {
      yield "a";
      yield "b";
    }
    expect(fromIterable(letters()).collect()).toEqual(["a", "b"]);
  });

  it("opens the iterator only on the first pull", () => {
    let opened = 0;
    const source: Iterable<number> = {
      [Symbol.iterator]() {
        opened++;
        return [1, 2][Symbol.iterator]();
      },
    };

    const seq = fromIterable(source);
    expect(opened).toBe(0);
    expect(seq.collect()).toEqual([1, 2]);
    expect(opened).toBe(1);
  });
});

// ===========================================================================
// Ranges
// ===========================================================================

describe("range", () => {
  it("is half-open", () => {
    expect(range(0, 5).collect()).toEqual([0, 1, 2, 3, 4]);
  });

  it("honours the step", () => {
    expect(range(0, 10, 4).collect()).toEqual([0, 4, 8]);
  });

  it("is empty when start is past the bound", () => {
    expect(range(10, 0).collect()).toEqual([]);
  });

  it("runs forever with a negative step below the bound", () => {
    expect(range(0, 10, -1).take(3).collect()).toEqual([0, -1, -2]);
  });

  it("stays exhausted", () => {
    const seq = range(0, 1);
    expect(seq.advance()).toBe(0);
    expect(seq.advance()).toBe(DONE);
    expect(seq.advance()).toBe(DONE);
  });
});

describe("rangeInclusive", () => {
  it("includes the bound", () => {
    expect(rangeInclusive(1, 3).collect()).toEqual([1, 2, 3]);
    expect(rangeInclusive(0, 1, 0.5).collect()).toEqual([0, 0.5, 1]);
  });

  it("yields a single item when start equals the bound", () => {
    expect(rangeInclusive(4, 4).collect()).toEqual([4]);
  });
});

describe("infiniteRange", () => {
  it("counts from start by step", () => {
    expect(infiniteRange(5, 2).take(3).collect()).toEqual([5, 7, 9]);
  });

  it("defaults to the naturals", () => {
    expect(infiniteRange().take(4).collect()).toEqual([0, 1, 2, 3]);
  });
});

// ===========================================================================
// Single values
// ===========================================================================

describe("empty / once / repeat", () => {
  it("empty never yields", () => {
    const seq = empty<string>();
    expect(seq.advance()).toBe(DONE);
    expect(seq.advance()).toBe(DONE);
  });

  it("once yields exactly one item", () => {
    const seq = once(7);
    expect(seq.advance()).toBe(7);
    expect(seq.advance()).toBe(DONE);
    expect(seq.advance()).toBe(DONE);
  });

  it("onceWith computes lazily, once", () => {
    let calls = 0;
    const seq = onceWith(() => {
      calls++;
      return "computed";
    });

    expect(calls).toBe(0);
    expect(seq.collect()).toEqual(["computed"]);
    expect(seq.advance()).toBe(DONE);
    expect(calls).toBe(1);
  });

  it("repeat yields the same value forever", () => {
    expect(repeat("x").take(3).collect()).toEqual(["x", "x", "x"]);
  });
});

// ===========================================================================
// Function-driven
// ===========================================================================

describe("generators", () => {
  it("infiniteGenerator calls its function on every pull", () => {
    let n = 0;
    expect(infiniteGenerator(() => n++).take(3).collect()).toEqual([0, 1, 2]);
    expect(n).toBe(3);
  });

  it("repeatWith is infiniteGenerator", () => {
    expect(repeatWith).toBe(infiniteGenerator);
  });

  it("finiteGenerator stops at the first null", () => {
    let n = 0;
    expect(finiteGenerator(() => (n < 3 ? n++ : null)).collect()).toEqual([0, 1, 2]);
  });

  it("finiteGenerator stays exhausted even if the function recovers", () => {
    const values: Array<number | undefined> = [1, undefined, 2];
    let i = 0;
    const seq = finiteGenerator(() => values[i++]);

    expect(seq.collect()).toEqual([1]);
    expect(seq.advance()).toBe(DONE);
    expect(i).toBe(2);
  });

  it("fromFn is finiteGenerator", () => {
    expect(fromFn).toBe(finiteGenerator);
  });
});

describe("successors", () => {
  it("applies the successor until it returns null", () => {
    expect(successors(1, (n) => (n < 100 ? n * 10 : null)).collect()).toEqual([1, 10, 100]);
  });

  it("is empty for a null seed", () => {
    expect(successors<number>(null, (n) => n + 1).collect()).toEqual([]);
  });

  it("computes each successor only when the previous item is pulled", () => {
    const calls: number[] = [];
    const seq = successors(1, (n) => {
      calls.push(n);
      return n + 1;
    });

    expect(seq.advance()).toBe(1);
    expect(calls).toEqual([1]);
    expect(seq.advance()).toBe(2);
    expect(calls).toEqual([1, 2]);
  });
});
