export type RuleName = 'gameOfLife' | 'briansBrain' | 'addIsland' | 'removeOcean';

export interface SeedStage {
  kind: 'seed';
  fillProbability: number;  // chance for each cell to start as land
}

export interface ZoomStage {
  kind: 'zoom';
  factor: number;
}

export interface AutomatonStage {
  kind: 'automaton';
  rule: RuleName;
  iterations: number;
}

export type StageDescriptor = SeedStage | ZoomStage | AutomatonStage;

export type PipelineState = 'uninitialized' | 'seeded' | 'zoomed' | 'automated' | 'finalized';

/** Signed integer seed; bigint covers values past Number.MAX_SAFE_INTEGER */
export type Seed = number | bigint;
