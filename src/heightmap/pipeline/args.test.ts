import { describe, it, expect } from 'vitest';
import { parseArgs, parseSeed, failureLines } from './args.js';
import { ConfigurationError } from '../errors.js';

const argv = (...args: string[]) => ['node', 'cli.ts', ...args];

describe('parseSeed', () => {
  it('returns safe integers as numbers', () => {
    expect(parseSeed('42')).toBe(42);
    expect(parseSeed(' -7 ')).toBe(-7);
  });

  it('returns larger integers as bigints', () => {
    expect(parseSeed('9007199254740993')).toBe(9007199254740993n);
    expect(parseSeed('-18446744073709551616')).toBe(-18446744073709551616n);
  });

  it('rejects anything that is not an integer', () => {
    expect(() => parseSeed('abc')).toThrow(ConfigurationError);
    expect(() => parseSeed('1.5')).toThrow(ConfigurationError);
    expect(() => parseSeed('')).toThrow(ConfigurationError);
  });
});

describe('parseArgs', () => {
  it('reads every flag', () => {
    expect(parseArgs(argv('--seed', '5', '--width', '6', '--height', '3', '--fill', '0.2', '--output-dir', 'maps'), {})).toEqual({
      seed: 5,
      width: 6,
      height: 3,
      fillProbability: 0.2,
      outputDir: 'maps',
    });
  });

  it('falls back to the environment', () => {
    const options = parseArgs(argv(), { HEIGHTMAP_SEED: '11', HEIGHTMAP_OUTPUT_DIR: 'env-out' });
    expect(options.seed).toBe(11);
    expect(options.outputDir).toBe('env-out');
    expect(options.width).toBe(4);
    expect(options.height).toBe(4);
    expect(options.fillProbability).toBeUndefined();
  });

  it('lets flags override the environment', () => {
    const options = parseArgs(argv('--seed', '-2'), { HEIGHTMAP_SEED: '11' });
    expect(options.seed).toBe(-2);
    expect(options.outputDir).toBe('output');
  });

  it('rejects unknown flags and missing values', () => {
    expect(() => parseArgs(argv('--zoom', '2'), {})).toThrow('Unknown argument "--zoom"');
    expect(() => parseArgs(argv('--seed'), {})).toThrow('--seed requires a value');
  });
});

describe('failureLines', () => {
  it('prints the message and then each configuration issue on its own line', () => {
    const err = new ConfigurationError('Invalid pipeline configuration', ['seed: Invalid input', 'size.0: too small']);
    expect(failureLines(err)).toEqual([
      'Generation failed: Invalid pipeline configuration',
      '  - seed: Invalid input',
      '  - size.0: too small',
    ]);
  });

  it('prints only the message for other errors', () => {
    expect(failureLines(new Error('disk full'))).toEqual(['Generation failed: disk full']);
    expect(failureLines('boom')).toEqual(['Generation failed: boom']);
  });
});
