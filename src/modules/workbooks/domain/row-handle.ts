import type { CellParser } from '@/modules/workbooks/domain/cell-parsers';
import type { TabularView } from '@/modules/workbooks/domain/tabular-view';
import { RowParseError, RowValueMissingError } from '@/modules/workbooks/domain/workbook-errors';

/**
 * One row of a {@link TabularView}. Holds no cell data; every lookup goes back
 * to the view.
 */
export class RowHandle {
  constructor(
    private readonly view: TabularView,
    readonly rowNumber: number,
  ) {}

  tryGet(column: string): string | undefined {
    return this.view.get(this.rowNumber, column);
  }

  /**
   * @throws RowValueMissingError when the column is unknown or the row has no cell there
   */
  get(column: string): string {
    const value = this.view.get(this.rowNumber, column);
    if (value === undefined) {
      throw new RowValueMissingError(column, this.rowNumber);
    }
    return value;
  }

  /**
   * Reads `column` and converts it with `parser`.
   *
   * @example row.parse('Qty', cellParsers.integer)
   * @throws RowValueMissingError
   * @throws RowParseError when `parser` rejects the text
   */
  parse<T>(column: string, parser: CellParser<T>): T {
    const raw = this.get(column);
    const value = parser(raw);
    if (value === undefined) {
      throw new RowParseError(column, raw, this.rowNumber, parser.name || undefined);
    }
    return value;
  }

  isEmpty(): boolean {
    return this.view.isRowEmpty(this.rowNumber);
  }

  toRecord(): Record<string, string | null> {
    return Object.fromEntries(
      this.view.columnNames().map((column) => [column, this.view.get(this.rowNumber, column) ?? null]),
    );
  }

  toJSON(): { row: number; values: Record<string, string | null> } {
    return { row: this.rowNumber, values: this.toRecord() };
  }
}
