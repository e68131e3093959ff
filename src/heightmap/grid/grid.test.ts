import { describe, it, expect } from 'vitest';
import { createGrid, getCell, gridFromRows, gridToRows, countLand } from './grid.js';
import { ConfigurationError } from '../errors.js';

describe('createGrid', () => {
  it('allocates a zero-filled grid at resolution 1', () => {
    const grid = createGrid(3, 2);
    expect(grid).toEqual({ width: 3, height: 2, resolution: 1, cells: [0, 0, 0, 0, 0, 0] });
  });

  it('accepts a fill value', () => {
    expect(countLand(createGrid(4, 4, 1))).toBe(16);
  });
});

describe('gridFromRows', () => {
  it('stores rows in row-major order', () => {
    const grid = gridFromRows([
      [0, 1, 0],
      [1, 1, 0],
    ]);
    expect(grid.cells).toEqual([0, 1, 0, 1, 1, 0]);
    expect(getCell(grid, 1, 0)).toBe(1);
    expect(getCell(grid, 0, 1)).toBe(1);
    expect(getCell(grid, 2, 1)).toBe(0);
  });

  it('round-trips through gridToRows', () => {
    const rows = [
      [1, 0],
      [0, 0],
      [1, 1],
    ];
    expect(gridToRows(gridFromRows(rows))).toEqual(rows);
  });

  it('rejects ragged rows', () => {
    expect(() => gridFromRows([[0, 1], [0]])).toThrow(ConfigurationError);
  });

  it('reports every out-of-domain value', () => {
    try {
      gridFromRows([[0, 2], [3, 1]]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toEqual([
          'cell (1, 0) is 2, expected 0 or 1',
          'cell (0, 1) is 3, expected 0 or 1',
        ]);
      }
    }
  });

  it('rejects an empty grid', () => {
    expect(() => gridFromRows([])).toThrow('Grid must have at least one row and one column');
  });
});
