import type { Grid, CellState } from '../types/index.js';
import { ConfigurationError } from '../errors.js';

/**
 * Nearest-neighbor magnification: every cell becomes a factor x factor
 * block. Resolution is multiplied by the same factor.
 */
export function zoom(grid: Grid, factor: number): Grid {
  if (!Number.isInteger(factor) || factor < 1) {
    throw new ConfigurationError('Invalid zoom factor', [`factor must be an integer >= 1, got ${factor}`]);
  }

  const width = grid.width * factor;
  const height = grid.height * factor;
  const cells = new Array<CellState>(width * height);

  for (let y = 0; y < height; y++) {
    const srcRow = Math.floor(y / factor) * grid.width;
    for (let x = 0; x < width; x++) {
      cells[y * width + x] = grid.cells[srcRow + Math.floor(x / factor)];
    }
  }

  return { width, height, resolution: grid.resolution * factor, cells };
}
