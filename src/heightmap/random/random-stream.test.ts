import { describe, it, expect } from 'vitest';
import { AleaRandomStream } from './random-stream.js';

function take(stream: AleaRandomStream, n: number): number[] {
  return Array.from({ length: n }, () => stream.next());
}

describe('AleaRandomStream', () => {
  it('produces the pinned sequence for seed 0', () => {
    const stream = new AleaRandomStream(0);
    expect(take(stream, 3)).toEqual([0.5945264333859086, 0.8065849216654897, 0.12979769078083336]);
  });

  it('is deterministic for the same seed and draw order', () => {
    expect(take(new AleaRandomStream(-91), 50)).toEqual(take(new AleaRandomStream(-91), 50));
  });

  it('treats number and bigint seeds of the same value alike', () => {
    expect(take(new AleaRandomStream(1234n), 10)).toEqual(take(new AleaRandomStream(1234), 10));
  });

  it('accepts seeds beyond the safe integer range', () => {
    const a = take(new AleaRandomStream(2n ** 63n - 1n), 10);
    const b = take(new AleaRandomStream(2n ** 63n - 2n), 10);
    expect(a).not.toEqual(b);
  });

  it('draws values in [0, 1)', () => {
    const stream = new AleaRandomStream(7);
    for (const v of take(stream, 1000)) {
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('counts draws', () => {
    const stream = new AleaRandomStream(3);
    take(stream, 17);
    expect(stream.draws).toBe(17);
  });
});
