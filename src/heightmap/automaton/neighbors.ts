import type { Grid } from '../types/index.js';

const OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0],           [1, 0],
  [-1, 1],  [0, 1],  [1, 1],
];

/**
 * Count live cells (value exactly 1) in the Moore neighborhood of (x, y).
 * Offsets that fall outside the grid are skipped, so edge cells see at most
 * 5 neighbors and corner cells at most 3.
 */
export function countNeighbors(grid: Grid, x: number, y: number): number {
  let count = 0;
  for (const [dx, dy] of OFFSETS) {
    const nx = x + dx;
    const ny = y + dy;
    if (nx < 0 || nx >= grid.width || ny < 0 || ny >= grid.height) continue;
    if (grid.cells[ny * grid.width + nx] === 1) count++;
  }
  return count;
}
