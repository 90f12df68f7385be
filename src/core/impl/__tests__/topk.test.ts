import { describe, expect, it } from "vitest";
import { MinHeapTopKSelector } from "../minHeapTopK.js";

describe("MinHeapTopKSelector", () => {
  it("returns best K by comparator", () => {
    const sel = new MinHeapTopKSelector<number>();
    const out = sel.topK([5, 1, 3, 2, 4], 3, (a, b) => b - a); // descending
    expect(out).toEqual([5, 4, 3]);
  });

  it("returns everything sorted when there are fewer than K items", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([2, 9, 4], 10, (a, b) => b - a)).toEqual([9, 4, 2]);
  });

  it("returns nothing for k <= 0", () => {
    const sel = new MinHeapTopKSelector<number>();
    expect(sel.topK([1, 2, 3], 0, (a, b) => a - b)).toEqual([]);
  });

  it("keeps the comparator's tie-break", () => {
    const sel = new MinHeapTopKSelector<{ w: string; n: number }>();
    const out = sel.topK(
      [
        { w: "d", n: 1 },
        { w: "b", n: 2 },
        { w: "c", n: 2 },
        { w: "a", n: 2 },
      ],
      2,
      (x, y) => y.n - x.n || (x.w < y.w ? -1 : x.w > y.w ? 1 : 0),
    );
    expect(out.map((x) => x.w)).toEqual(["a", "b"]);
  });
});
