import { z } from 'zod';
import type { Seed, StageDescriptor } from '../types/index.js';
import { ConfigurationError } from '../errors.js';
import { RULE_NAMES } from '../automaton/rules.js';
import { DEFAULT_SIZE, REFERENCE_STAGES } from './stages.js';

export interface PipelineConfig {
  seed: Seed;
  /** Seed grid [width, height], default [4, 4] */
  size?: [number, number];
  /** Default REFERENCE_STAGES */
  stages?: StageDescriptor[];
}

export interface ResolvedPipelineConfig {
  seed: Seed;
  size: [number, number];
  stages: StageDescriptor[];
}

const SeedSchema = z.union([z.number().int().safe(), z.bigint()]);

const SizeSchema = z.tuple([z.number().int().positive(), z.number().int().positive()]);

const StageSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('seed'),
    fillProbability: z.number().min(0).max(1),
  }),
  z.object({
    kind: z.literal('zoom'),
    factor: z.number().int().min(1),
  }),
  z.object({
    kind: z.literal('automaton'),
    rule: z.enum(RULE_NAMES),
    iterations: z.number().int().min(1),
  }),
]);

const StagesSchema = z
  .array(StageSchema)
  .min(1)
  .superRefine((stages, ctx) => {
    if (stages.length > 0 && stages[0].kind !== 'seed') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [0, 'kind'], message: 'first stage must be a seed stage' });
    }
    stages.forEach((stage, i) => {
      if (i > 0 && stage.kind === 'seed') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [i, 'kind'], message: 'only the first stage may seed the grid' });
      }
    });
  });

/** Largest grid any stage may produce (4096 x 4096) */
export const MAX_GRID_CELLS = 4096 * 4096;

/** Cell count of the largest grid the stage list produces from a seed grid of the given size */
export function peakGridCells(size: readonly [number, number], stages: readonly StageDescriptor[]): number {
  let cells = size[0] * size[1];
  for (const stage of stages) {
    if (stage.kind === 'zoom') cells *= stage.factor * stage.factor;
  }
  return cells;
}

const PipelineConfigSchema = z
  .object({
    seed: SeedSchema,
    size: SizeSchema.default([DEFAULT_SIZE[0], DEFAULT_SIZE[1]]),
    stages: StagesSchema.default(() => [...REFERENCE_STAGES]),
  })
  .superRefine(({ size, stages }, ctx) => {
    const cells = peakGridCells(size, stages);
    if (cells > MAX_GRID_CELLS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['size'],
        message: `grid would reach ${cells} cells, limit is ${MAX_GRID_CELLS}`,
      });
    }
  });

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
  return `${path}: ${issue.message}`;
}

/**
 * Validate pipeline input at the boundary. Every problem is collected into
 * one ConfigurationError before any grid work starts.
 */
export function parsePipelineConfig(input: unknown): ResolvedPipelineConfig {
  const result = PipelineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid pipeline configuration', result.error.issues.map(formatIssue));
  }
  return result.data;
}
