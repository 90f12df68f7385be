import type { Row, ScanLine } from "./types.js";

/**
 * Read-only scan-line index over a rectangular character grid.
 *
 * Contract notes:
 * - built once per grid; nothing is recomputed after construction
 * - `scanLines()` is every row followed by every column, so its length is
 *   `rowCount + colCount`
 */
export interface GridIndex {
  readonly rowCount: number;
  readonly colCount: number;

  rows(): readonly Row[];
  /** Columns read top-to-bottom, left to right. */
  columns(): readonly ScanLine[];
  scanLines(): readonly ScanLine[];
}
