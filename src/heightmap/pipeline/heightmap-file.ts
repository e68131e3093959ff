import { mkdirSync, writeFileSync } from 'fs';
import { resolve } from 'path';
import type { Grid, Seed } from '../types/index.js';
import { gridFromRows, gridToRows } from '../grid/grid.js';

/** One row per line, cells separated by single spaces, trailing newline. */
export function serializeHeightmap(grid: Grid): string {
  return gridToRows(grid).map(row => row.join(' ')).join('\n') + '\n';
}

/** Inverse of serializeHeightmap. Blank lines are ignored. */
export function parseHeightmap(text: string): Grid {
  const rows = text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .map(line => line.split(/\s+/).map(Number));
  return gridFromRows(rows);
}

export function heightmapFileName(seed: Seed): string {
  return `heightmap_${seed}.txt`;
}

/** Write heightmap_<seed>.txt into outputDir, creating it if needed. Returns the file path. */
export function writeHeightmap(grid: Grid, seed: Seed, outputDir: string): string {
  const dir = resolve(outputDir);
  mkdirSync(dir, { recursive: true });
  const outputPath = resolve(dir, heightmapFileName(seed));
  writeFileSync(outputPath, serializeHeightmap(grid));
  return outputPath;
}
