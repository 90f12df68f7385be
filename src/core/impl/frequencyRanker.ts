import type { Word, WordCount } from "../types.js";
import type { GridIndex } from "../gridIndex.js";
import type { OccurrenceCounter } from "../counter.js";
import type { TopKSelector } from "../topK.js";
import type { RankOptions, WordRanker } from "../ranker.js";
import { InvalidInputError } from "../errors.js";

export const DEFAULT_LIMIT = 10;

export interface RankerDeps {
  counter: OccurrenceCounter;
  topK: TopKSelector<WordCount>;
}

function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// never more than DEFAULT_LIMIT; non-finite falls back to it
function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_LIMIT;
  return Math.min(DEFAULT_LIMIT, Math.max(0, Math.floor(limit)));
}

export function byCountThenWord(a: WordCount, b: WordCount): number {
  return b.count - a.count || compareOrdinal(a.word, b.word);
}

/**
 * Ranks query words by how often they occur across all scan lines.
 *
 * - empty / absent entries are dropped, the rest deduplicated
 * - each unique word is counted against every scan line
 * - zero totals never reach the selector
 */
export class FrequencyRanker implements WordRanker {
  constructor(private readonly deps: RankerDeps) {}

  findTopWords(
    index: GridIndex,
    words: Iterable<Word | null | undefined> | null | undefined,
    options?: RankOptions,
  ): Word[] {
    if (words == null) throw new InvalidInputError("Word stream is required.");

    const limit = clampLimit(options?.limit);

    const unique = new Set<Word>();
    for (const w of words) {
      if (w) unique.add(w);
    }
    if (unique.size === 0) return [];

    const lines = index.scanLines();
    const counts: WordCount[] = [];
    for (const word of unique) {
      let count = 0;
      for (const line of lines) count += this.deps.counter.count(line, word);
      if (count > 0) counts.push({ word, count });
    }

    return this.deps.topK.topK(counts, limit, byCountThenWord).map((c) => c.word);
  }
}
