import { describe, expect, it } from "vitest";
import { DEFAULT_PORT, loadConfig } from "../config.js";
import { DEFAULT_MAX_GRIDS } from "../http/engine.js";

describe("loadConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({ port: DEFAULT_PORT, maxGrids: DEFAULT_MAX_GRIDS });
  });

  it("reads valid values", () => {
    expect(loadConfig({ PORT: "0", MAX_GRIDS: "5" })).toEqual({ port: 0, maxGrids: 5 });
  });

  it("falls back on unusable values", () => {
    expect(loadConfig({ PORT: "abc", MAX_GRIDS: "abc" })).toEqual({ port: 3000, maxGrids: 1000 });
    expect(loadConfig({ PORT: "70000", MAX_GRIDS: "0" })).toEqual({ port: 3000, maxGrids: 1000 });
    expect(loadConfig({ PORT: "80.5", MAX_GRIDS: " " })).toEqual({ port: 3000, maxGrids: 1000 });
  });
});
