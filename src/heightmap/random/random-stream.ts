import Alea from 'alea';
import type { Seed } from '../types/index.js';

/** Identifies the draw algorithm that pinned fixtures were recorded with */
export const RANDOM_STREAM_ALGORITHM = 'alea-0.9';

/** Source of uniform draws in [0, 1). */
export interface RandomStream {
  next(): number;
}

/**
 * Alea stream seeded from the decimal form of an integer seed, so the
 * number 42 and the bigint 42n produce the same sequence.
 */
export class AleaRandomStream implements RandomStream {
  private readonly prng: ReturnType<typeof Alea>;
  private drawn = 0;

  constructor(seed: Seed) {
    this.prng = Alea(String(seed));
  }

  /** Number of values drawn so far */
  get draws(): number {
    return this.drawn;
  }

  next(): number {
    this.drawn++;
    return this.prng();
  }
}
