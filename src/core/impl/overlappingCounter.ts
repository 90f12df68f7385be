import type { OccurrenceCounter } from "../counter.js";

/**
 * Linear `indexOf` scan that resumes one position past each match start,
 * so overlapping occurrences are all counted ("aa" in "aaa" is 2).
 */
export class OverlappingCounter implements OccurrenceCounter {
  count(text: string, pattern: string): number {
    if (pattern.length === 0 || pattern.length > text.length) return 0;

    let count = 0;
    let from = 0;
    for (;;) {
      const at = text.indexOf(pattern, from);
      if (at < 0) break;
      count++;
      from = at + 1;
    }
    return count;
  }
}
