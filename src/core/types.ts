/** Shared core types used by module contracts. */

export type Row = string;
export type Word = string;

/**
 * A contiguous run of grid characters searched by the counter:
 * an original row, or a column read top-to-bottom.
 */
export type ScanLine = string;

/** Total occurrences of one unique query word across every scan line. */
export interface WordCount {
  word: Word;
  count: number;
}
