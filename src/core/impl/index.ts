export { ScanLineIndex } from "./scanLineIndex.js";
export { OverlappingCounter } from "./overlappingCounter.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
export { FrequencyRanker, DEFAULT_LIMIT, byCountThenWord, type RankerDeps } from "./frequencyRanker.js";
export { build, findTopWords, createWordRanker } from "./wordSearch.js";
