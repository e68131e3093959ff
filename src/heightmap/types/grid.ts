/** 0 = ocean, 1 = land */
export type CellState = 0 | 1;

export interface Grid {
  width: number;
  height: number;
  /** Cumulative zoom factor applied since the seed grid (1 for a fresh grid) */
  resolution: number;
  cells: readonly CellState[]; // flat 2D array, row-major, index y * width + x
}
