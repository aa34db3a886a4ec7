import type { CellGrid } from '@/modules/workbooks/domain/cell-grid';
import type { CellToText } from '@/modules/workbooks/domain/cell-value';
import {
  type ColumnIndex,
  type LocatedHeader,
  locateHeader,
} from '@/modules/workbooks/domain/header-locator';
import { RowHandle } from '@/modules/workbooks/domain/row-handle';

export interface TabularViewParams {
  grid: CellGrid;
  header: LocatedHeader;
  toText: CellToText;
  sheetName?: string;
}

/**
 * Read-only, header-addressed view over a sheet. Row numbers are 1-based
 * spreadsheet rows; data rows are `firstRow..lastRow`.
 */
export class TabularView implements Iterable<RowHandle> {
  readonly sheetName: string | undefined;
  readonly headerRow: number;
  readonly firstRow: number;
  readonly lastRow: number;
  readonly firstCol: number;
  readonly lastCol: number;

  private readonly grid: CellGrid;
  private readonly columns: ColumnIndex;
  private readonly toText: CellToText;

  constructor(params: TabularViewParams) {
    this.grid = params.grid;
    this.columns = params.header.columns;
    this.toText = params.toText;
    this.sheetName = params.sheetName;
    this.headerRow = params.header.headerRow;
    this.firstRow = params.header.firstRow;
    this.lastRow = params.header.lastRow;
    this.firstCol = params.header.firstCol;
    this.lastCol = params.header.lastCol;
  }

  /**
   * Locates the header of `grid` and wraps it, or `null` when the grid has none.
   */
  static fromGrid(grid: CellGrid, toText: CellToText, sheetName?: string): TabularView | null {
    const header = locateHeader(grid, toText);
    if (!header) return null;
    return new TabularView({ grid, header, toText, sheetName });
  }

  get rowCount(): number {
    return Math.max(0, this.lastRow - this.firstRow + 1);
  }

  /** Header names ordered by column. */
  columnNames(): string[] {
    return [...this.columns.entries()].sort((a, b) => a[1] - b[1]).map(([name]) => name);
  }

  hasColumn(column: string): boolean {
    return this.columns.has(column);
  }

  /**
   * Text of the cell under `column` in `rowNumber`. `undefined` when the row is
   * outside the data rows, the column is unknown or the sheet has no cell there.
   */
  get(rowNumber: number, column: string): string | undefined {
    if (!Number.isInteger(rowNumber)) return undefined;
    if (rowNumber < this.firstRow || rowNumber > this.lastRow) return undefined;

    const col = this.columns.get(column);
    if (col === undefined) return undefined;

    const value = this.grid.getValue({ row: rowNumber - 1, col });
    if (value === undefined) return undefined;

    return this.toText(value);
  }

  isRowEmpty(rowNumber: number): boolean {
    for (const column of this.columns.keys()) {
      const value = this.get(rowNumber, column);
      if (value !== undefined && value !== '') return false;
    }
    return true;
  }

  row(rowNumber: number): RowHandle {
    return new RowHandle(this, rowNumber);
  }

  *rows(): Generator<RowHandle> {
    for (let rowNumber = this.firstRow; rowNumber <= this.lastRow; rowNumber++) {
      yield new RowHandle(this, rowNumber);
    }
  }

  [Symbol.iterator](): Iterator<RowHandle> {
    return this.rows();
  }
}
