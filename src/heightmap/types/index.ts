export type {
  CellState,
  Grid,
} from './grid.js';

export type {
  RuleName,
  SeedStage,
  ZoomStage,
  AutomatonStage,
  StageDescriptor,
  PipelineState,
  Seed,
} from './stage.js';
