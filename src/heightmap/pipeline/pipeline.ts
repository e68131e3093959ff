import type { Grid, PipelineState, Seed, StageDescriptor } from '../types/index.js';
import { AleaRandomStream } from '../random/random-stream.js';
import { iterate } from '../automaton/stepper.js';
import { zoom } from '../zoom/upsample.js';
import { countLand } from '../grid/grid.js';
import { InvariantError } from '../errors.js';
import { parsePipelineConfig, type PipelineConfig } from './config.js';
import { EventBus, type PipelineEventMap } from './events.js';
import { seedGrid } from './stages.js';

/**
 * Grows a heightmap from a seed grid through an ordered list of seed, zoom
 * and automaton stages. Configuration is validated on construction.
 *
 * Calling run() again on a finalized pipeline replays every stage from the
 * seed with a fresh RandomStream and yields an identical grid.
 */
export class TerrainPipeline {
  readonly seed: Seed;
  readonly size: readonly [number, number];
  readonly stages: readonly StageDescriptor[];
  readonly events = new EventBus<PipelineEventMap>();

  private currentState: PipelineState = 'uninitialized';
  private current: Grid | undefined;

  constructor(config: PipelineConfig) {
    const { seed, size, stages } = parsePipelineConfig(config);
    this.seed = seed;
    this.size = size;
    this.stages = stages;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  /** Cumulative zoom factor of the grid held so far (1 before seeding) */
  get resolution(): number {
    return this.current?.resolution ?? 1;
  }

  /** Final grid of the last completed run */
  get result(): Grid | undefined {
    return this.currentState === 'finalized' ? this.current : undefined;
  }

  run(): Grid {
    const rand = new AleaRandomStream(this.seed);
    this.currentState = 'uninitialized';
    this.current = undefined;

    this.stages.forEach((stage, index) => {
      const grid = this.applyStage(stage, rand);
      this.current = grid;
      this.events.emit('stageCompleted', {
        index,
        stage,
        state: this.currentState,
        grid,
        landCells: countLand(grid),
      });
    });

    const grid = this.requireGrid();
    this.currentState = 'finalized';
    this.events.emit('finalized', {
      seed: this.seed,
      grid,
      landCells: countLand(grid),
      draws: rand.draws,
    });
    return grid;
  }

  private applyStage(stage: StageDescriptor, rand: AleaRandomStream): Grid {
    switch (stage.kind) {
      case 'seed': {
        const [width, height] = this.size;
        this.currentState = 'seeded';
        return seedGrid(width, height, stage.fillProbability, rand);
      }
      case 'zoom':
        this.currentState = 'zoomed';
        return zoom(this.requireGrid(), stage.factor);
      case 'automaton':
        this.currentState = 'automated';
        return iterate(this.requireGrid(), stage.rule, stage.iterations, rand);
    }
  }

  private requireGrid(): Grid {
    if (!this.current) {
      throw new InvariantError(`Pipeline has no grid in state "${this.currentState}"`);
    }
    return this.current;
  }
}

/** Build a pipeline, run it once and return the final grid. */
export function generateHeightmap(config: PipelineConfig): Grid {
  return new TerrainPipeline(config).run();
}
