import { CellGrid } from '@/modules/workbooks/domain/cell-grid';

describe('CellGrid', () => {
  it('has no bounds when empty', () => {
    const grid = CellGrid.empty();

    expect(grid.isEmpty()).toBe(true);
    expect(grid.start()).toBeUndefined();
    expect(grid.end()).toBeUndefined();
    expect([...grid.rows()]).toEqual([]);
  });

  it('treats rows without columns as empty', () => {
    const grid = CellGrid.fromRows([[], []]);

    expect(grid.isEmpty()).toBe(true);
    expect(grid.start()).toBeUndefined();
  });

  it('pads short rows to the widest one', () => {
    const grid = CellGrid.fromRows([['a', 'b', 'c'], ['d']]);

    expect(grid.end()).toEqual({ row: 1, col: 2 });
    expect([...grid.rows()]).toEqual([
      ['a', 'b', 'c'],
      ['d', null, null],
    ]);
  });

  it('addresses cells by absolute position', () => {
    const grid = CellGrid.fromRows(
      [
        ['a', 'b'],
        ['c', null],
      ],
      { row: 4, col: 2 },
    );

    expect(grid.start()).toEqual({ row: 4, col: 2 });
    expect(grid.end()).toEqual({ row: 5, col: 3 });
    expect(grid.getValue({ row: 4, col: 3 })).toBe('b');
    expect(grid.getValue({ row: 5, col: 3 })).toBeNull();
    expect(grid.getValue({ row: 3, col: 2 })).toBeUndefined();
    expect(grid.getValue({ row: 4, col: 4 })).toBeUndefined();
    expect(grid.getValue({ row: 6, col: 2 })).toBeUndefined();
  });

  it('returns undefined for positions that are not integers', () => {
    const grid = CellGrid.fromRows([['a', 'b']]);

    expect(grid.getValue({ row: 0.5, col: 0 })).toBeUndefined();
    expect(grid.getValue({ row: 0, col: Number.NaN })).toBeUndefined();
  });

  it('builds the bounding box of sparse cells', () => {
    const grid = CellGrid.fromCells([
      { row: 2, col: 1, value: 'x' },
      { row: 5, col: 3, value: 10 },
      { row: 9, col: 9, value: null },
    ]);

    expect(grid.start()).toEqual({ row: 2, col: 1 });
    expect(grid.end()).toEqual({ row: 5, col: 3 });
    expect(grid.height).toBe(4);
    expect(grid.getValue({ row: 5, col: 3 })).toBe(10);
    expect(grid.getValue({ row: 3, col: 2 })).toBeNull();
  });

  it('is empty when every sparse cell is empty', () => {
    expect(CellGrid.fromCells([{ row: 0, col: 0, value: null }]).isEmpty()).toBe(true);
  });
});
