import { DEFAULT_MAX_GRIDS } from "./http/engine.js";

export interface Config {
  port: number;
  maxGrids: number;
}

export const DEFAULT_PORT = 3000;

function intFromEnv(raw: string | undefined, min: number, max: number, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= min && n <= max ? n : fallback;
}

/** Reads PORT and MAX_GRIDS; unusable values fall back to the defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    port: intFromEnv(env.PORT, 0, 65535, DEFAULT_PORT),
    maxGrids: intFromEnv(env.MAX_GRIDS, 1, Number.MAX_SAFE_INTEGER, DEFAULT_MAX_GRIDS),
  };
}
