import { CellGrid } from '@/modules/workbooks/domain/cell-grid';
import { TabularView } from '@/modules/workbooks/domain/tabular-view';
import { stockView, textOf } from '@/modules/workbooks/domain/__fixtures__/grids';

describe('TabularView', () => {
  describe('fromGrid', () => {
    it('exposes the located bounds', () => {
      const view = stockView();

      expect(view.sheetName).toBe('Stock');
      expect(view.headerRow).toBe(3);
      expect(view.firstRow).toBe(4);
      expect(view.lastRow).toBe(7);
      expect(view.firstCol).toBe(0);
      expect(view.lastCol).toBe(2);
      expect(view.rowCount).toBe(4);
      expect(view.columnNames()).toEqual(['Item', 'Qty', 'Price']);
    });

    it('returns null when the grid has no header', () => {
      expect(TabularView.fromGrid(CellGrid.empty(), textOf)).toBeNull();
      expect(TabularView.fromGrid(CellGrid.fromRows([['only', null]]), textOf)).toBeNull();
    });
  });

  describe('get', () => {
    const view = stockView();

    it('returns the text of cells in data rows', () => {
      expect(view.get(4, 'Item')).toBe('Bolt');
      expect(view.get(4, 'Qty')).toBe('42');
      expect(view.get(4, 'Price')).toBe('0.25');
      expect(view.get(5, 'Qty')).toBe('abc');
      expect(view.get(7, 'Item')).toBe('Washer');
    });

    it('returns an empty string for blank cells inside the sheet', () => {
      expect(view.get(7, 'Price')).toBe('');
    });

    it('returns undefined outside the data rows', () => {
      expect(view.get(3, 'Item')).toBeUndefined();
      expect(view.get(1, 'Item')).toBeUndefined();
      expect(view.get(8, 'Item')).toBeUndefined();
    });

    it('returns undefined for row numbers that are not integers', () => {
      expect(view.get(4.5, 'Item')).toBeUndefined();
      expect(view.get(Number.NaN, 'Item')).toBeUndefined();
      expect(view.get(Number.POSITIVE_INFINITY, 'Item')).toBeUndefined();
      expect(view.isRowEmpty(4.5)).toBe(true);
    });

    it('returns undefined for unknown columns', () => {
      expect(view.get(4, 'Colour')).toBeUndefined();
      expect(view.get(4, 'item')).toBeUndefined();
    });
  });

  describe('isRowEmpty', () => {
    const view = stockView();

    it('is true when every column is blank', () => {
      expect(view.isRowEmpty(6)).toBe(true);
    });

    it('is false when any column has a value', () => {
      expect(view.isRowEmpty(4)).toBe(false);
      expect(view.isRowEmpty(7)).toBe(false);
    });

    it('is true for rows outside the data rows', () => {
      expect(view.isRowEmpty(42)).toBe(true);
    });
  });

  describe('rows', () => {
    const grid = CellGrid.fromRows([
      ['Inventory', null],
      [null, null],
      [null, null],
      ['Sku', 'Qty'],
      ['s-1', 1],
      ['s-2', 2],
      ['s-3', 3],
    ]);

    it('yields every data row in order', () => {
      const view = TabularView.fromGrid(grid, textOf);

      expect(view?.firstRow).toBe(5);
      expect(view?.lastRow).toBe(7);
      expect([...(view?.rows() ?? [])].map((row) => row.rowNumber)).toEqual([5, 6, 7]);
    });

    it('restarts on every call', () => {
      const view = TabularView.fromGrid(grid, textOf);
      if (!view) throw new Error('no header');

      const first = view.rows();
      first.next();
      first.next();

      expect([...view].map((row) => row.rowNumber)).toEqual([5, 6, 7]);
      expect([...first].map((row) => row.rowNumber)).toEqual([7]);
      expect([...first]).toEqual([]);
    });

    it('yields nothing when the header is the last row', () => {
      const view = TabularView.fromGrid(CellGrid.fromRows([['A', 'B']]), textOf);

      expect(view?.rowCount).toBe(0);
      expect([...(view?.rows() ?? [])]).toEqual([]);
    });

    it('keeps going past blank rows', () => {
      const numbers = [...stockView()].filter((row) => !row.isEmpty()).map((row) => row.rowNumber);

      expect(numbers).toEqual([4, 5, 7]);
    });
  });
});
