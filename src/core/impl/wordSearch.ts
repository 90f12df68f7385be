import type { Row, Word } from "../types.js";
import type { GridIndex } from "../gridIndex.js";
import type { WordRanker } from "../ranker.js";
import { FrequencyRanker, DEFAULT_LIMIT } from "./frequencyRanker.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import { OverlappingCounter } from "./overlappingCounter.js";
import { ScanLineIndex } from "./scanLineIndex.js";

export function createWordRanker(): WordRanker {
  return new FrequencyRanker({
    counter: new OverlappingCounter(),
    topK: new MinHeapTopKSelector(),
  });
}

const defaultRanker = createWordRanker();

/** Validates `rows` and builds the scan-line index. Throws InvalidInputError. */
export function build(rows: Iterable<Row> | null | undefined): GridIndex {
  return ScanLineIndex.build(rows);
}

/** Up to ten of `words`, most frequent first. */
export function findTopWords(
  index: GridIndex,
  words: Iterable<Word | null | undefined> | null | undefined,
): Word[] {
  return defaultRanker.findTopWords(index, words, { limit: DEFAULT_LIMIT });
}
