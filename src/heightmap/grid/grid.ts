import type { CellState, Grid } from '../types/index.js';
import { ConfigurationError } from '../errors.js';

export function isCellState(value: number): value is CellState {
  return value === 0 || value === 1;
}

export function createGrid(width: number, height: number, fill: CellState = 0): Grid {
  return {
    width,
    height,
    resolution: 1,
    cells: new Array<CellState>(width * height).fill(fill),
  };
}

export function getCell(grid: Grid, x: number, y: number): CellState {
  return grid.cells[y * grid.width + x];
}

/**
 * Build a grid from rows of cell values (rows[y][x]).
 * Rejects empty input, ragged rows and values outside {0, 1}.
 */
export function gridFromRows(rows: ReadonlyArray<readonly number[]>, resolution = 1): Grid {
  if (rows.length === 0 || rows[0].length === 0) {
    throw new ConfigurationError('Grid must have at least one row and one column');
  }

  const width = rows[0].length;
  const cells: CellState[] = [];
  const issues: string[] = [];

  rows.forEach((row, y) => {
    if (row.length !== width) {
      issues.push(`row ${y} has ${row.length} cells, expected ${width}`);
      return;
    }
    row.forEach((value, x) => {
      if (isCellState(value)) {
        cells.push(value);
      } else {
        issues.push(`cell (${x}, ${y}) is ${value}, expected 0 or 1`);
      }
    });
  });

  if (issues.length > 0) {
    throw new ConfigurationError('Malformed grid', issues);
  }

  return { width, height: rows.length, resolution, cells };
}

export function gridToRows(grid: Grid): CellState[][] {
  const rows: CellState[][] = [];
  for (let y = 0; y < grid.height; y++) {
    rows.push(grid.cells.slice(y * grid.width, (y + 1) * grid.width));
  }
  return rows;
}

export function countLand(grid: Grid): number {
  return grid.cells.filter(c => c === 1).length;
}
