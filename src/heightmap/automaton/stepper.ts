import type { Grid, CellState, RuleName } from '../types/index.js';
import type { RandomStream } from '../random/random-stream.js';
import { ConfigurationError } from '../errors.js';
import { countNeighbors } from './neighbors.js';
import { applyRule, isStochastic } from './rules.js';

function checkRandom(rule: RuleName, rand: RandomStream | undefined): void {
  if (isStochastic(rule) && !rand) {
    throw new ConfigurationError(`Rule "${rule}" needs a RandomStream`);
  }
}

/**
 * Apply a rule to every cell. Neighbor counts always come from the input
 * grid, never from cells already written in this pass; the output is a new
 * grid with the same dimensions and resolution. Cells are visited in
 * row-major order, which fixes the order of random draws.
 */
export function step(grid: Grid, rule: RuleName, rand?: RandomStream): Grid {
  checkRandom(rule, rand);

  const cells = new Array<CellState>(grid.cells.length);
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      const i = y * grid.width + x;
      cells[i] = applyRule(rule, grid.cells[i], countNeighbors(grid, x, y), rand);
    }
  }

  return { ...grid, cells };
}

/** Run `iterations` sequential steps, each reading the previous output. */
export function iterate(grid: Grid, rule: RuleName, iterations: number, rand?: RandomStream): Grid {
  if (!Number.isInteger(iterations) || iterations < 1) {
    throw new ConfigurationError('Invalid iteration count', [`iterations must be an integer >= 1, got ${iterations}`]);
  }
  checkRandom(rule, rand);

  let current = grid;
  for (let i = 0; i < iterations; i++) {
    current = step(current, rule, rand);
  }
  return current;
}
