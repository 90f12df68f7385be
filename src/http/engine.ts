import { randomUUID } from "node:crypto";

import { build, createWordRanker, type GridIndex, type Word, type WordRanker } from "../core/index.js";

export interface GridRecord {
  id: string;
  index: GridIndex;
  createdAt: number;
}

export interface GridStore {
  /** Builds and registers a grid. Throws InvalidInputError for a malformed one. */
  create(rows: string[]): GridRecord;
  get(id: string): GridRecord | undefined;
  delete(id: string): boolean;
  size(): number;
  /** Ranked words for a registered grid, or undefined when `id` is unknown. */
  search(id: string, words: Array<Word | null>): Word[] | undefined;
}

export interface StoreOptions {
  /** Grids kept before the oldest is evicted. */
  maxGrids?: number;
  ranker?: WordRanker;
  newId?: () => string;
}

export const DEFAULT_MAX_GRIDS = 1000;

export function positiveInt(n: number | undefined): number | undefined {
  return n !== undefined && Number.isInteger(n) && n >= 1 ? n : undefined;
}

export function createInMemoryStore(opts: StoreOptions = {}): GridStore {
  const maxGrids = positiveInt(opts.maxGrids) ?? DEFAULT_MAX_GRIDS;
  const ranker = opts.ranker ?? createWordRanker();
  const newId = opts.newId ?? randomUUID;

  // Map keeps insertion order, so the first key is the oldest grid
  const grids = new Map<string, GridRecord>();

  return {
    create(rows) {
      const index = build(rows);
      while (grids.size >= maxGrids) {
        const oldest = grids.keys().next();
        if (oldest.done) break;
        grids.delete(oldest.value);
      }
      const record: GridRecord = { id: newId(), index, createdAt: Date.now() };
      grids.set(record.id, record);
      return record;
    },
    get(id) {
      return grids.get(id);
    },
    delete(id) {
      return grids.delete(id);
    },
    size() {
      return grids.size;
    },
    search(id, words) {
      const record = grids.get(id);
      if (!record) return undefined;
      return ranker.findTopWords(record.index, words);
    },
  };
}
