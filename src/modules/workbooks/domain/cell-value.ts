/**
 * Error value stored in a cell (`#DIV/0!`, `#N/A`, ...).
 */
export class CellError {
  constructor(readonly code: string) {}

  toString(): string {
    return this.code;
  }
}

/** `null` is an empty cell inside the sheet's bounding box. */
export type CellValue = string | number | boolean | Date | CellError | null;

export type CellToText = (value: CellValue) => string;

export interface CellPosition {
  row: number;
  col: number;
}
