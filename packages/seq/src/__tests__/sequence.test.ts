import { describe, it, expect } from "vitest";
import {
  DONE,
  LT,
  Sequence,
  empty,
  fromCollection,
  infiniteRange,
  isCursor,
  range,
  successors,
  type Cursor,
  type Step,
} from "../index.js";

// ---------------------------------------------------------------------------
// Helper: hand-written cursor counting its pulls
// ---------------------------------------------------------------------------

class CountingSource implements Cursor<number> {
  pulls = 0;

  constructor(
    private next: number,
    private readonly end: number
  ) {}

  advance(): Step<number> {
    this.pulls++;
    return this.next < this.end ? this.next++ : DONE;
  }

  fork(): Cursor<number> {
    return new CountingSource(this.next, this.end);
  }
}

// ===========================================================================
// Host iteration bridge
// ===========================================================================

describe("host iteration", () => {
  it("spreads and destructures", () => {
    expect([...range(0, 3)]).toEqual([0, 1, 2]);
    const [a, b] = range(10, 20);
    expect([a, b]).toEqual([10, 11]);
  });

  it("works with for...of and keeps the position after break", () => {
    const seq = range(0, 5);
    const seen: number[] = [];
    for (const x of seq) {
      seen.push(x);
      if (x === 1) break;
    }
    expect(seen).toEqual([0, 1]);
    expect(seq.collect()).toEqual([2, 3, 4]);
  });

  it("feeds host collections", () => {
    expect(new Set(fromCollection([1, 1, 2]))).toEqual(new Set([1, 2]));
    expect(Array.from(infiniteRange(1).take(3))).toEqual([1, 2, 3]);
  });
});

// ===========================================================================
// Custom cursors
// ===========================================================================

describe("custom cursors", () => {
  it("can be wrapped in a Sequence", () => {
    const source = new CountingSource(0, 4);
    const seq = new Sequence(source).map((x) => x * x);
    expect(seq.collect()).toEqual([0, 1, 4, 9]);
    expect(source.pulls).toBe(5);
  });

  it("are pulled no further than the consumer needs", () => {
    const source = new CountingSource(0, 1000);
    expect(new Sequence(source).filter((x) => x % 7 === 6).nth(1)).toBe(13);
    expect(source.pulls).toBe(14);
  });

  it("are recognised by isCursor", () => {
    expect(isCursor(new CountingSource(0, 1))).toBe(true);
    expect(isCursor(range(0, 1))).toBe(true);
    expect(isCursor([1, 2])).toBe(false);
  });
});

// ===========================================================================
// fork
// ===========================================================================

describe("fork", () => {
  it("copies the position of a whole pipeline", () => {
    const seq = range(0, 6)
      .map((x) => x * 10)
      .filter((x) => x !== 20);
    expect(seq.advance()).toBe(0);

    const copy = seq.fork();
    expect(copy.collect()).toEqual([10, 30, 40, 50]);
    expect(seq.collect()).toEqual([10, 30, 40, 50]);
  });

  it("copies adaptor state", () => {
    const seq = range(0, 10).stepBy(3).intersperse(-1);
    expect(seq.advance()).toBe(0);
    expect(seq.advance()).toBe(-1);

    const copy = seq.fork();
    expect(copy.collect()).toEqual([3, -1, 6, -1, 9]);
    expect(seq.collect()).toEqual([3, -1, 6, -1, 9]);
  });
});

// ===========================================================================
// Whole pipelines
// ===========================================================================

describe("pipelines", () => {
  it("stride over a range", () => {
    expect(range(0, 10).stepBy(3).collect()).toEqual([0, 3, 6, 9]);
  });

  it("intersperse a range", () => {
    expect(range(0, 4).intersperse(-1).collect()).toEqual([0, -1, 1, -1, 2, -1, 3]);
    expect(range(0, 10).intersperse(-1).count()).toBe(19);
  });

  it("zip a long range with a short collection", () => {
    const letters = fromCollection("abcdefghij");
    expect(range(0, 20).zip(letters).count()).toBe(10);
  });

  it("cycle a range", () => {
    expect(range(0, 3).cycle().take(10).collect()).toEqual([0, 1, 2, 0, 1, 2, 0, 1, 2, 0]);
  });

  it("cycle nothing", () => {
    expect(empty<number>().cycle().count()).toBe(0);
  });

  it("compare a short collection with a longer range", () => {
    expect(fromCollection([0, 1]).cmp(range(0, 10))).toBe(LT);
  });

  it("filter, map and take from an infinite source", () => {
    expect(
      infiniteRange(1)
        .filter((x) => x % 2 === 1)
        .map((x) => x * x)
        .takeWhile((x) => x < 100)
        .collect()
    ).toEqual([1, 9, 25, 49, 81]);
  });

  it("number lines with enumerate and skip", () => {
    const lines = fromCollection(["# header", "alpha", "beta"])
      .skip(1)
      .enumerate()
      .map(([i, line]) => `${i + 1}: ${line}`)
      .collect();

    expect(lines).toEqual(["1: alpha", "2: beta"]);
  });

  it("find the first power of two above a bound", () => {
    expect(successors(1, (n) => n * 2).find((n) => n > 1000)).toBe(1024);
  });

  it("chain, flatten and sum", () => {
    const total = fromCollection([[1, 2], [3]])
      .flatten()
      .chain(range(4, 6))
      .sum();
    expect(total).toBe(15);
  });
});
