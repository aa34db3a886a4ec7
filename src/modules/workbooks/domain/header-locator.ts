import type { CellGrid } from '@/modules/workbooks/domain/cell-grid';
import type { CellToText } from '@/modules/workbooks/domain/cell-value';

/** Column name → zero-based absolute column. */
export type ColumnIndex = ReadonlyMap<string, number>;

export interface LocatedHeader {
  columns: ColumnIndex;
  /** 1-based row number of the header itself */
  headerRow: number;
  /** 1-based, first data row (headerRow + 1) */
  firstRow: number;
  /** 1-based, last row of the bounding box; may be < firstRow when there is no data */
  lastRow: number;
  /** zero-based, bounding box columns */
  firstCol: number;
  lastCol: number;
}

/**
 * Finds the first row that has a value in every column of the bounding box and
 * takes it as the header. Title rows and merged banners above the real header
 * fill fewer cells than that, so they are skipped.
 *
 * Returns `null` when no row qualifies or the grid is empty.
 */
export function locateHeader(grid: CellGrid, toText: CellToText): LocatedHeader | null {
  const start = grid.start();
  const end = grid.end();
  if (!start || !end) return null;

  const minCols = end.col - start.col + 1;
  let rowIndex = start.row;

  for (const row of grid.rows()) {
    const texts = row.map(toText);
    const filled = texts.filter((text) => text.length > 0).length;

    if (filled >= minCols) {
      const columns = new Map<string, number>();
      // Duplicate names: the rightmost column wins.
      texts.forEach((name, offset) => {
        columns.set(name, start.col + offset);
      });

      return {
        columns,
        headerRow: rowIndex + 1,
        firstRow: rowIndex + 2,
        lastRow: end.row + 1,
        firstCol: start.col,
        lastCol: end.col,
      };
    }

    rowIndex++;
  }

  return null;
}
