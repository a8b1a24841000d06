import path from 'path';
import { loadConfig } from '../config';
import { loadDataset } from '../evaluation/datasetLoader';
import { createServiceContext } from '../services/serviceContext';

interface CliArgs {
  datasetPath: string | null;
  submitName: string | null;
}

function parseArgs(argv: string[]): CliArgs {
  let datasetPath: string | null = null;
  let submitName: string | null = null;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--submit') {
      const name = argv[index + 1];
      if (!name || name.startsWith('--')) {
        throw new Error('--submit requires a name');
      }
      submitName = name;
      index += 1;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      datasetPath = path.resolve(arg);
    }
  }

  return { datasetPath, submitName };
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

async function run(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const context = createServiceContext(config);

  const datasetPath = args.datasetPath ?? path.join(config.dataDir, config.evaluationDatasetFile);
  const dataset = loadDataset(datasetPath);

  if (args.submitName) {
    const response = await context.submissions.submit(args.submitName, dataset);
    console.log(`Submission accepted (${response.status}):`, response.body);
    return;
  }

  const { metrics } = await context.engine.evaluate(dataset);

  console.log(`Evaluation of ${datasetPath}`);
  console.log(`  Model: ${context.processor.model}`);
  console.log(`  Records: ${metrics.totalRecords} (failed ${metrics.failedRecords}, review ${metrics.needsHumanReview})`);
  console.log(`  Accuracy@1/2/3: ${percent(metrics.accuracyAt1)} / ${percent(metrics.accuracyAt2)} / ${percent(metrics.accuracyAt3)}`);
  console.log(`  Weighted accuracy: ${percent(metrics.weightedAccuracy)}`);
  console.log(`  Exact match@1/2/3: ${percent(metrics.exactMatchAt1)} / ${percent(metrics.exactMatchAt2)} / ${percent(metrics.exactMatchAt3)}`);
  console.log(`  Precision ${metrics.precision.toFixed(3)} recall ${metrics.recall.toFixed(3)} f1 ${metrics.f1Score.toFixed(3)}`);
  console.log(`  Tokens: ${metrics.totalTokensUsed} (cost $${metrics.totalEstimatedCost.toFixed(4)})`);

  if (metrics.mostConfusedTags.length > 0) {
    console.log('  Most confused:');
    for (const pair of metrics.mostConfusedTags) {
      console.log(`    ${pair.groundTruth} -> ${pair.predicted}: ${pair.count}`);
    }
  }
}

run().then(
  () => {
    console.log('Done.');
    process.exit(0);
  },
  error => {
    console.error('Evaluation failed', error);
    process.exit(1);
  },
);
