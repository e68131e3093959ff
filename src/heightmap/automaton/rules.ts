import type { CellState, RuleName } from '../types/index.js';
import type { RandomStream } from '../random/random-stream.js';
import { ConfigurationError, InvariantError } from '../errors.js';

export const RULE_NAMES = ['gameOfLife', 'briansBrain', 'addIsland', 'removeOcean'] as const satisfies readonly RuleName[];

/** Rules that consume exactly one draw per cell, live or dead */
const STOCHASTIC_RULES: ReadonlySet<RuleName> = new Set<RuleName>(['addIsland', 'removeOcean']);

export function isStochastic(rule: RuleName): boolean {
  return STOCHASTIC_RULES.has(rule);
}

/**
 * Island growth odds. Both ends compress into [8/24, 16/24]: a crowded
 * cell is likely to stay or become land, an isolated one is not.
 */
export function addIslandChances(neighbors: number): { die: number; live: number } {
  const live = (neighbors + 8) / 24;
  return { die: 1 - live, live };
}

/** Chance for open ocean (no land around it) to turn into land */
export const REMOVE_OCEAN_CHANCE = 0.5;

function gameOfLife(cell: CellState, neighbors: number): CellState {
  if (cell === 1) {
    return neighbors === 2 || neighbors === 3 ? 1 : 0;
  }
  return neighbors === 3 ? 1 : 0;
}

// Two-state variant: no "dying" state, births need a crowded neighborhood.
function briansBrain(cell: CellState, neighbors: number): CellState {
  if (cell === 1) return 0;
  return neighbors >= 6 ? 1 : 0;
}

function addIsland(cell: CellState, neighbors: number, rand: RandomStream): CellState {
  const draw = rand.next();
  const { die, live } = addIslandChances(neighbors);
  if (cell === 1) {
    return draw < die ? 0 : 1;
  }
  return draw < live ? 1 : 0;
}

function removeOcean(cell: CellState, neighbors: number, rand: RandomStream): CellState {
  const draw = rand.next();
  if (cell === 1) return 1;
  return neighbors === 0 && draw < REMOVE_OCEAN_CHANCE ? 1 : 0;
}

function requireRandom(rule: RuleName, rand: RandomStream | undefined): RandomStream {
  if (!rand) {
    throw new ConfigurationError(`Rule "${rule}" needs a RandomStream`);
  }
  return rand;
}

/**
 * Next state of a single cell under the given rule.
 * Stochastic rules throw ConfigurationError when no stream is supplied.
 */
export function applyRule(
  rule: RuleName,
  cell: CellState,
  neighbors: number,
  rand?: RandomStream,
): CellState {
  if (cell !== 0 && cell !== 1) {
    throw new InvariantError(`Cell state ${cell} is outside {0, 1}`);
  }
  if (!Number.isInteger(neighbors) || neighbors < 0 || neighbors > 8) {
    throw new InvariantError(`Neighbor count ${neighbors} is outside 0..8`);
  }

  switch (rule) {
    case 'gameOfLife':
      return gameOfLife(cell, neighbors);
    case 'briansBrain':
      return briansBrain(cell, neighbors);
    case 'addIsland':
      return addIsland(cell, neighbors, requireRandom(rule, rand));
    case 'removeOcean':
      return removeOcean(cell, neighbors, requireRandom(rule, rand));
  }
}
