import type { Seed } from '../types/index.js';
import { ConfigurationError } from '../errors.js';

export interface CliOptions {
  seed: Seed;
  width: number;
  height: number;
  /** Overrides the seed stage fill probability when set */
  fillProbability?: number;
  outputDir: string;
}

/** Decimal integer to number when it is safe, to bigint otherwise. */
export function parseSeed(raw: string): Seed {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigurationError('Invalid seed', [`seed must be an integer, got "${raw}"`]);
  }
  const big = BigInt(trimmed);
  const asNumber = Number(big);
  return Number.isSafeInteger(asNumber) ? asNumber : big;
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const args = argv.slice(2);
  let seed: Seed = env.HEIGHTMAP_SEED ? parseSeed(env.HEIGHTMAP_SEED) : Date.now();
  let width = 4;
  let height = 4;
  let fillProbability: number | undefined;
  let outputDir = env.HEIGHTMAP_OUTPUT_DIR || 'output';

  const valueFor = (flag: string, i: number): string => {
    const value = args[i];
    if (value === undefined) {
      throw new ConfigurationError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    switch (flag) {
      case '--seed':
        seed = parseSeed(valueFor(flag, ++i));
        break;
      case '--width':
        width = parseInt(valueFor(flag, ++i), 10);
        break;
      case '--height':
        height = parseInt(valueFor(flag, ++i), 10);
        break;
      case '--fill':
        fillProbability = parseFloat(valueFor(flag, ++i));
        break;
      case '--output-dir':
        outputDir = valueFor(flag, ++i);
        break;
      default:
        throw new ConfigurationError(`Unknown argument "${flag}"`);
    }
  }

  return { seed, width, height, fillProbability, outputDir };
}

/** Lines the CLI prints for a failed run: the message, then one line per configuration issue. */
export function failureLines(err: unknown): string[] {
  if (err instanceof ConfigurationError) {
    return [`Generation failed: ${err.summary}`, ...err.issues.map(issue => `  - ${issue}`)];
  }
  return [`Generation failed: ${err instanceof Error ? err.message : String(err)}`];
}
