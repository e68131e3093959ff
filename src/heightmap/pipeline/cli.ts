import 'dotenv/config';
import { TerrainPipeline } from './pipeline.js';
import { parseArgs, failureLines } from './args.js';
import { writeHeightmap } from './heightmap-file.js';
import { describeStage, REFERENCE_STAGES } from './stages.js';
import { countLand } from '../grid/grid.js';
import { RANDOM_STREAM_ALGORITHM } from '../random/random-stream.js';

function main(): void {
  const options = parseArgs(process.argv);
  const startTime = Date.now();

  const stages = REFERENCE_STAGES.map(stage =>
    stage.kind === 'seed' && options.fillProbability !== undefined
      ? { ...stage, fillProbability: options.fillProbability }
      : stage,
  );

  const pipeline = new TerrainPipeline({
    seed: options.seed,
    size: [options.width, options.height],
    stages,
  });

  console.log('=== Heightmap Generation ===');
  console.log(`Seed: ${pipeline.seed}`);
  console.log(`Seed grid: ${pipeline.size[0]}x${pipeline.size[1]}`);
  console.log(`Stages: ${pipeline.stages.length}`);
  console.log(`Random stream: ${RANDOM_STREAM_ALGORITHM}`);
  console.log();

  pipeline.events.on('stageCompleted', ({ index, stage, grid, landCells }) => {
    console.log(`[Stage ${index + 1}] ${describeStage(stage)} -> ${grid.width}x${grid.height}, ${landCells} land cells`);
  });

  let draws = 0;
  pipeline.events.on('finalized', event => {
    draws = event.draws;
  });

  const grid = pipeline.run();
  const outputPath = writeHeightmap(grid, pipeline.seed, options.outputDir);

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
  const landCells = countLand(grid);
  console.log();
  console.log('=== Generation Complete ===');
  console.log(`Dimensions: ${grid.width}x${grid.height} (resolution ${grid.resolution})`);
  console.log(`Land: ${landCells}/${grid.cells.length} cells`);
  console.log(`Random draws: ${draws}`);
  console.log(`Time: ${elapsed}s`);
  console.log(`Output: ${outputPath}`);
}

try {
  main();
} catch (err) {
  for (const line of failureLines(err)) console.error(line);
  process.exit(1);
}
