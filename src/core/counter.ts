/**
 * Counts occurrences of a pattern inside a single scan line.
 *
 * Comparison is ordinal. An empty pattern, or one longer than the text,
 * counts 0.
 */
export interface OccurrenceCounter {
  count(text: string, pattern: string): number;
}
