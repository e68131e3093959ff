import type { CellState, Grid, StageDescriptor } from '../types/index.js';
import type { RandomStream } from '../random/random-stream.js';

export const DEFAULT_SIZE: readonly [number, number] = [4, 4];

export const DEFAULT_FILL_PROBABILITY = 0.1;

/** Block-world island layers: 4x4 seed grown to 64x64 at resolution 16 */
export const REFERENCE_STAGES: readonly StageDescriptor[] = [
  { kind: 'seed', fillProbability: DEFAULT_FILL_PROBABILITY },
  { kind: 'zoom', factor: 2 },
  { kind: 'automaton', rule: 'addIsland', iterations: 1 },
  { kind: 'zoom', factor: 2 },
  { kind: 'automaton', rule: 'addIsland', iterations: 3 },
  { kind: 'automaton', rule: 'removeOcean', iterations: 1 },
  { kind: 'zoom', factor: 2 },
  { kind: 'zoom', factor: 2 },
  { kind: 'automaton', rule: 'addIsland', iterations: 1 },
];

/**
 * Zero-filled grid with each cell turned to land when its draw falls below
 * fillProbability. One draw per cell, row-major.
 */
export function seedGrid(width: number, height: number, fillProbability: number, rand: RandomStream): Grid {
  const cells = new Array<CellState>(width * height).fill(0);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (rand.next() < fillProbability) {
        cells[y * width + x] = 1;
      }
    }
  }
  return { width, height, resolution: 1, cells };
}

export function describeStage(stage: StageDescriptor): string {
  switch (stage.kind) {
    case 'seed':
      return `seed (fill ${stage.fillProbability})`;
    case 'zoom':
      return `zoom x${stage.factor}`;
    case 'automaton':
      return `${stage.rule} x${stage.iterations}`;
  }
}
