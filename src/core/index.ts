export type { Row, ScanLine, Word, WordCount } from "./types.js";
export type { GridIndex } from "./gridIndex.js";
export type { OccurrenceCounter } from "./counter.js";
export type { RankOptions, WordRanker } from "./ranker.js";
export type { TopKSelector } from "./topK.js";
export { InvalidInputError, isInvalidInput } from "./errors.js";
export * from "./impl/index.js";
