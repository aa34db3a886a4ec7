import type { CellPosition, CellValue } from '@/modules/workbooks/domain/cell-value';

export interface PositionedCell extends CellPosition {
  value: CellValue;
}

/**
 * Rectangular block of decoded cells. Coordinates are zero-based and absolute
 * (row 0 / col 0 is A1), bounded by the sheet's bounding box.
 */
export class CellGrid {
  private readonly width: number;

  private constructor(
    private readonly origin: CellPosition,
    private readonly cells: CellValue[][],
  ) {
    this.width = cells.reduce((max, row) => Math.max(max, row.length), 0);
  }

  static empty(): CellGrid {
    return new CellGrid({ row: 0, col: 0 }, []);
  }

  /**
   * Rows as given, anchored at `origin`. Short rows are padded with empty cells.
   */
  static fromRows(rows: CellValue[][], origin: CellPosition = { row: 0, col: 0 }): CellGrid {
    return new CellGrid(origin, rows.map((row) => [...row]));
  }

  /**
   * Builds the smallest grid holding every non-empty cell.
   */
  static fromCells(cells: Iterable<PositionedCell>): CellGrid {
    const present: PositionedCell[] = [];
    let minRow = Number.POSITIVE_INFINITY;
    let minCol = Number.POSITIVE_INFINITY;
    let maxRow = -1;
    let maxCol = -1;

    for (const cell of cells) {
      if (cell.value === null) continue;
      present.push(cell);
      minRow = Math.min(minRow, cell.row);
      minCol = Math.min(minCol, cell.col);
      maxRow = Math.max(maxRow, cell.row);
      maxCol = Math.max(maxCol, cell.col);
    }

    if (present.length === 0) return CellGrid.empty();

    const rows: CellValue[][] = Array.from({ length: maxRow - minRow + 1 }, () =>
      Array<CellValue>(maxCol - minCol + 1).fill(null),
    );
    for (const cell of present) {
      rows[cell.row - minRow][cell.col - minCol] = cell.value;
    }

    return new CellGrid({ row: minRow, col: minCol }, rows);
  }

  get height(): number {
    return this.width === 0 ? 0 : this.cells.length;
  }

  isEmpty(): boolean {
    return this.height === 0;
  }

  /** Top-left corner of the bounding box, `undefined` for an empty grid. */
  start(): CellPosition | undefined {
    if (this.isEmpty()) return undefined;
    return { ...this.origin };
  }

  /** Bottom-right corner of the bounding box (inclusive). */
  end(): CellPosition | undefined {
    if (this.isEmpty()) return undefined;
    return {
      row: this.origin.row + this.cells.length - 1,
      col: this.origin.col + this.width - 1,
    };
  }

  /**
   * Value at an absolute position. `undefined` outside the bounding box,
   * `null` for an empty cell inside it.
   */
  getValue(position: CellPosition): CellValue | undefined {
    const r = position.row - this.origin.row;
    const c = position.col - this.origin.col;
    if (!Number.isInteger(r) || !Number.isInteger(c)) return undefined;
    if (r < 0 || c < 0 || r >= this.height || c >= this.width) return undefined;
    return this.cells[r][c] ?? null;
  }

  *rows(): Generator<readonly CellValue[]> {
    if (this.isEmpty()) return;
    for (const row of this.cells) {
      yield Array.from({ length: this.width }, (_, c) => row[c] ?? null);
    }
  }
}
