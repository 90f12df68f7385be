import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../../errors.js";
import { ScanLineIndex } from "../scanLineIndex.js";

describe("ScanLineIndex", () => {
  it("lists rows then columns read top-to-bottom", () => {
    const index = ScanLineIndex.build(["abc", "def"]);
    expect(index.rowCount).toBe(2);
    expect(index.colCount).toBe(3);
    expect(index.scanLines()).toEqual(["abc", "def", "ad", "be", "cf"]);
    expect(index.rows()).toEqual(["abc", "def"]);
    expect(index.columns()).toEqual(["ad", "be", "cf"]);
  });

  it("sizes every line by the opposite dimension", () => {
    const index = ScanLineIndex.build(["abcd", "efgh", "ijkl"]);
    expect(index.scanLines()).toHaveLength(3 + 4);
    for (const row of index.rows()) expect(row).toHaveLength(4);
    for (const col of index.columns()) expect(col).toHaveLength(3);
  });

  it("accepts any iterable of rows", () => {
    function* rows(): Generator<string> {
      yield "xy";
      yield "zw";
    }
    expect(ScanLineIndex.build(rows()).scanLines()).toEqual(["xy", "zw", "xz", "yw"]);
  });

  it("handles a single cell", () => {
    expect(ScanLineIndex.build(["q"]).scanLines()).toEqual(["q", "q"]);
  });

  it("freezes the scan set", () => {
    expect(Object.isFrozen(ScanLineIndex.build(["ab"]).scanLines())).toBe(true);
  });

  it("rejects malformed grids", () => {
    expect(() => ScanLineIndex.build(null)).toThrow(InvalidInputError);
    expect(() => ScanLineIndex.build([])).toThrow("Must have rows.");
    expect(() => ScanLineIndex.build([""])).toThrow("Rows must have at least one char.");
    expect(() => ScanLineIndex.build(["ab", "abc"])).toThrow("All rows must be the same length.");
    expect(() => ScanLineIndex.build(["abc", "ab", "abc"])).toThrow(InvalidInputError);
  });
});
