import Alea from 'alea';
import { createNoise2D } from 'simplex-noise';
import type { Grid, Seed } from '../types/index.js';

/**
 * Continuous scalar field for elevation shaping. Coordinates are grid cells
 * at the given resolution; the same world point samples the same value at
 * every zoom level.
 */
export interface NoiseSource {
  sample(x: number, y: number, resolution: number): number;
}

export interface NoiseConfig {
  octaves: number;
  frequency: number;
  amplitude: number;
  persistence: number;
  lacunarity: number;
}

export const defaultElevationConfig: NoiseConfig = {
  octaves: 6,
  frequency: 0.5,
  amplitude: 1.0,
  persistence: 0.5,
  lacunarity: 2.0,
};

/**
 * Octave-summed simplex noise in [0, 1], seeded through Alea so the field is
 * independent of the pipeline's own RandomStream.
 */
export function createNoiseSource(seed: Seed, config: NoiseConfig = defaultElevationConfig): NoiseSource {
  const noise2D = createNoise2D(Alea(`${seed}-elevation`));

  return {
    sample(x, y, resolution) {
      const wx = x / resolution;
      const wy = y / resolution;
      let value = 0;
      let freq = config.frequency;
      let amp = config.amplitude;
      let maxAmp = 0;

      for (let o = 0; o < config.octaves; o++) {
        value += noise2D(wx * freq, wy * freq) * amp;
        maxAmp += amp;
        freq *= config.lacunarity;
        amp *= config.persistence;
      }

      // Normalize to [-1, 1] then remap to [0, 1]
      value /= maxAmp;
      value = (value + 1) / 2;

      return Math.max(0, Math.min(1, value));
    },
  };
}

/** Sample a source over every cell of a grid, row-major. */
export function sampleNoiseField(source: NoiseSource, grid: Grid): number[] {
  const field = new Array<number>(grid.width * grid.height);
  for (let y = 0; y < grid.height; y++) {
    for (let x = 0; x < grid.width; x++) {
      field[y * grid.width + x] = source.sample(x, y, grid.resolution);
    }
  }
  return field;
}
