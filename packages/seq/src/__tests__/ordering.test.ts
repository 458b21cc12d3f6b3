import { describe, it, expect } from "vitest";
import {
  EQ,
  GT,
  LT,
  comparing,
  fromCollection,
  fromNumeric,
  naturalOrder,
  partialOrder,
  range,
  reverseOrder,
  reversed,
  toOrdering,
} from "../index.js";

function pulls<T>(): { seen: T[]; record: (item: T) => void } {
  const seen: T[] = [];
  return { seen, record: (item) => void seen.push(item) };
}

// ===========================================================================
// Comparators
// ===========================================================================

describe("comparators", () => {
  it("naturalOrder and reverseOrder", () => {
    expect(naturalOrder(1, 2)).toBe(LT);
    expect(naturalOrder("b", "a")).toBe(GT);
    expect(naturalOrder(3n, 3n)).toBe(EQ);
    expect(reverseOrder(1, 2)).toBe(GT);
  });

  it("partialOrder reports NaN as incomparable", () => {
    expect(partialOrder(NaN, 1)).toBeNull();
    expect(partialOrder(1, NaN)).toBeNull();
    expect(partialOrder(2, 2)).toBe(EQ);
    expect(partialOrder(1, 2)).toBe(LT);
  });

  it("comparing orders by a derived key", () => {
    const byLength = comparing((s: string) => s.length);
    expect(byLength("aaa", "b")).toBe(GT);
    expect(reversed(byLength)("aaa", "b")).toBe(LT);
  });

  it("fromNumeric and toOrdering collapse signed numbers", () => {
    expect(fromNumeric((a: number, b: number) => a - b)(5, 3)).toBe(GT);
    expect(toOrdering(-7)).toBe(LT);
    expect(toOrdering(0)).toBe(EQ);
    expect(toOrdering(NaN)).toBe(EQ);
  });
});

// ===========================================================================
// Lexicographic comparison between sequences
// ===========================================================================

describe("cmp", () => {
  it("treats a proper prefix as lesser", () => {
    expect(fromCollection([0, 1]).cmp(range(0, 10))).toBe(LT);
    expect(range(0, 4).cmp([0, 1, 2])).toBe(GT);
  });

  it("is decided by the first differing item", () => {
    expect(fromCollection([1, 5]).cmp([1, 3, 9])).toBe(GT);
    expect(fromCollection(["a", "b"]).cmp(["a", "c"])).toBe(LT);
  });

  it("is EQ for equal sequences", () => {
    expect(range(0, 3).cmp([0, 1, 2])).toBe(EQ);
    expect(fromCollection<number>([]).cmp([])).toBe(EQ);
  });

  it("advances both sides every round", () => {
    const a = pulls<number>();
    const b = pulls<number>();
    const result = range(0, 2).inspect(a.record).cmp(range(0, 5).inspect(b.record));

    expect(result).toBe(LT);
    expect(a.seen).toEqual([0, 1]);
    expect(b.seen).toEqual([0, 1, 2]);
  });

  it("stops at the deciding round", () => {
    const b = pulls<number>();
    expect(fromCollection([0, 9]).cmp(range(0, 100).inspect(b.record))).toBe(GT);
    expect(b.seen).toEqual([0, 1]);
  });
});

describe("cmpBy / partialCmp / partialCmpBy", () => {
  it("cmpBy compares across item types", () => {
    const byLength = (x: string, y: number) => naturalOrder(x.length, y);
    expect(fromCollection(["aa", "b"]).cmpBy([2, 3], byLength)).toBe(LT);
    expect(fromCollection(["aa"]).cmpBy([1], byLength)).toBe(GT);
  });

  it("partialCmp is null once a pair is incomparable", () => {
    expect(fromCollection([1, NaN]).partialCmp([1, 2])).toBeNull();
    expect(fromCollection([1, 2]).partialCmp([1, 3])).toBe(LT);
  });

  it("partialCmp is decided before reaching an incomparable pair", () => {
    expect(fromCollection([0, NaN]).partialCmp([1, NaN])).toBe(LT);
  });

  it("partialCmpBy uses the given comparator", () => {
    const ignoreOdd = (x: number, y: number) => (x % 2 === 1 || y % 2 === 1 ? null : naturalOrder(x, y));
    expect(fromCollection([2, 4]).partialCmpBy([2, 6], ignoreOdd)).toBe(LT);
    expect(fromCollection([2, 3]).partialCmpBy([2, 4], ignoreOdd)).toBeNull();
  });
});

describe("eq / ne / eqBy", () => {
  it("eq needs the same length and equal items", () => {
    expect(range(0, 3).eq([0, 1, 2])).toBe(true);
    expect(range(0, 3).eq([0, 1])).toBe(false);
    expect(range(0, 2).eq([0, 1, 2])).toBe(false);
    expect(range(0, 3).ne([0, 1, 5])).toBe(true);
  });

  it("eq uses strict equality", () => {
    expect(fromCollection([NaN]).eq([NaN])).toBe(false);
    expect(fromCollection([{}]).eq([{}])).toBe(false);
  });

  it("eqBy uses the given predicate", () => {
    const sameLetter = (x: string, y: string) => x.toLowerCase() === y.toLowerCase();
    expect(fromCollection(["a", "B"]).eqBy(["A", "b"], sameLetter)).toBe(true);
    expect(fromCollection(["a"]).eqBy(["b"], sameLetter)).toBe(false);
  });
});

describe("lt / le / gt / ge", () => {
  it("follow partialCmp", () => {
    expect(fromCollection([1, 2]).lt([1, 3])).toBe(true);
    expect(fromCollection([1, 2]).le([1, 2])).toBe(true);
    expect(fromCollection([1, 2]).gt([1, 2])).toBe(false);
    expect(fromCollection([1, 2]).ge([1, 2])).toBe(true);
    expect(fromCollection([1, 3]).gt([1, 2, 9])).toBe(true);
  });

  it("are all false for incomparable sequences", () => {
    const nan = () => fromCollection([NaN]);
    expect(nan().lt([1])).toBe(false);
    expect(nan().le([1])).toBe(false);
    expect(nan().gt([1])).toBe(false);
    expect(nan().ge([1])).toBe(false);
  });
});
