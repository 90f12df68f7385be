import type { Word } from "./types.js";
import type { GridIndex } from "./gridIndex.js";

export interface RankOptions {
  /** Maximum number of words returned. Defaults to 10, and never exceeds it. */
  limit?: number;
}

/**
 * Picks the most frequent query words found in a grid.
 *
 * Ordering is count descending, then word ascending by code unit.
 * Words that never occur are left out.
 */
export interface WordRanker {
  findTopWords(
    index: GridIndex,
    words: Iterable<Word | null | undefined> | null | undefined,
    options?: RankOptions,
  ): Word[];
}
