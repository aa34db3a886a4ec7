import { CellGrid } from '@/modules/workbooks/domain/cell-grid';
import type { CellValue } from '@/modules/workbooks/domain/cell-value';
import { TabularView } from '@/modules/workbooks/domain/tabular-view';

export function textOf(value: CellValue): string {
  if (value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/** Stock list with a title banner and a blank line above the header (header on row 3). */
export const stockRows: CellValue[][] = [
  ['Stock report', null, null],
  [null, null, null],
  ['Item', 'Qty', 'Price'],
  ['Bolt', 42, 0.25],
  ['Nut', 'abc', 0.1],
  [null, null, null],
  ['Washer', 7, null],
];

export function stockView(): TabularView {
  const view = TabularView.fromGrid(CellGrid.fromRows(stockRows), textOf, 'Stock');
  if (!view) throw new Error('fixture has no header');
  return view;
}
