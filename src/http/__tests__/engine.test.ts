import { describe, expect, it } from "vitest";
import { DEFAULT_MAX_GRIDS, createInMemoryStore, positiveInt } from "../engine.js";

describe("createInMemoryStore", () => {
  it("keeps the default bound when maxGrids is not a number", () => {
    const store = createInMemoryStore({ maxGrids: Number("abc") });
    for (let i = 0; i <= DEFAULT_MAX_GRIDS; i++) store.create(["ab"]);
    expect(store.size()).toBe(DEFAULT_MAX_GRIDS);
  });

  it("evicts in insertion order", () => {
    let n = 0;
    const store = createInMemoryStore({ maxGrids: 2, newId: () => `g${++n}` });
    store.create(["a"]);
    store.create(["b"]);
    store.create(["c"]);
    expect(store.get("g1")).toBeUndefined();
    expect(store.get("g2")?.index.rows()).toEqual(["b"]);
    expect(store.get("g3")?.index.rows()).toEqual(["c"]);
  });

  it("searches by id", () => {
    const store = createInMemoryStore({ newId: () => "only" });
    store.create(["abc", "def"]);
    expect(store.search("only", ["cf", null, "abc"])).toEqual(["abc", "cf"]);
    expect(store.search("missing", ["a"])).toBeUndefined();
  });
});

describe("positiveInt", () => {
  it("accepts integers from 1", () => {
    expect(positiveInt(3)).toBe(3);
    expect(positiveInt(0)).toBeUndefined();
    expect(positiveInt(1.5)).toBeUndefined();
    expect(positiveInt(Number.NaN)).toBeUndefined();
    expect(positiveInt(undefined)).toBeUndefined();
  });
});
