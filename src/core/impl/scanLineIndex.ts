import type { Row, ScanLine } from "../types.js";
import type { GridIndex } from "../gridIndex.js";
import { InvalidInputError } from "../errors.js";

/**
 * Grid index that materializes every column as a string up front.
 *
 * Layout of `scanLines()`:
 * - [0, rowCount)            original rows
 * - [rowCount, rowCount+cols) columns, top-to-bottom
 *
 * Rows and columns then share one direction-agnostic counter.
 */
export class ScanLineIndex implements GridIndex {
  readonly rowCount: number;
  readonly colCount: number;
  private readonly lines: readonly ScanLine[];

  private constructor(rows: Row[], columns: ScanLine[]) {
    this.rowCount = rows.length;
    this.colCount = columns.length;
    this.lines = Object.freeze([...rows, ...columns]);
  }

  static build(matrix: Iterable<Row> | null | undefined): ScanLineIndex {
    if (matrix == null) throw new InvalidInputError("Matrix is required.");

    const rows = Array.from(matrix);
    if (rows.length === 0) throw new InvalidInputError("Must have rows.");

    const cols = rows[0]!.length;
    if (cols === 0) throw new InvalidInputError("Rows must have at least one char.");

    for (let r = 1; r < rows.length; r++) {
      if (rows[r]!.length !== cols) {
        throw new InvalidInputError("All rows must be the same length.");
      }
    }

    const columns: ScanLine[] = [];
    for (let c = 0; c < cols; c++) {
      let column = "";
      for (const row of rows) column += row.charAt(c);
      columns.push(column);
    }

    return new ScanLineIndex(rows, columns);
  }

  rows(): readonly Row[] {
    return this.lines.slice(0, this.rowCount);
  }

  columns(): readonly ScanLine[] {
    return this.lines.slice(this.rowCount);
  }

  scanLines(): readonly ScanLine[] {
    return this.lines;
  }
}
