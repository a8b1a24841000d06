import assert from 'node:assert/strict';
import test from 'node:test';
import type { DatasetEntry } from '../models/event';
import type { LlmClient, LlmRequest, RawModelOutput } from '../models/tagging';
import { EventProcessor } from '../tagging/eventProcessor';
import type { EventProcessorSettings } from '../tagging/eventProcessor';
import { EventInputValidator } from '../tagging/inputValidator';
import { JsonTagOutputParser } from '../tagging/outputParser';
import { TaxonomyPromptGenerator } from '../tagging/promptGenerator';
import { ClampedConfidenceEvaluator, ThresholdHumanReviewChecker } from '../tagging/review';
import { TagRegistry } from '../tagging/tagRegistry';
import { EvaluationEngine } from './evaluationEngine';

const registry = new TagRegistry(['CONCERT', 'LECTURE', 'WORKSHOP', 'RUNNING'].map(tag => ({
  tag,
  mainCategory: 'Test',
  subCategory: tag,
  description: '',
  examples: [],
  displayName: tag,
})));

// Replies keyed by event title; delays vary so concurrent runs finish out of order.
const REPLIES: Record<string, { content: string; delayMs: number }> = {
  'Jazz evening': { content: '{"tag1": "CONCERT", "confidence": 0.9}', delayMs: 20 },
  'History talk': { content: '{"tag1": "WORKSHOP", "tag2": "LECTURE", "confidence": 0.6}', delayMs: 1 },
  'Pottery class': { content: '{"tag1": "WORKSHOP", "confidence": 0.8}', delayMs: 12 },
  'Spring run': { content: '{"tag1": "CONCERT", "confidence": 0.7}', delayMs: 3 },
  'Broken output': { content: 'not json', delayMs: 8 },
};

class TitleLlmClient implements LlmClient {
  readonly model = 'stub-model';

  async generate(request: LlmRequest): Promise<RawModelOutput> {
    const title = /^Title: (.*)$/m.exec(request.prompt)?.[1] ?? '';
    const reply = REPLIES[title] ?? { content: '', delayMs: 0 };
    await new Promise(resolve => setTimeout(resolve, reply.delayMs));
    return { content: reply.content, tokensUsed: 10 };
  }
}

function entry(id: string, title: string, tags: string[]): DatasetEntry {
  return { event: { id, title }, groundTruth: { eventId: id, tags } };
}

const DATASET: DatasetEntry[] = [
  entry('1', 'Jazz evening', ['CONCERT']),
  entry('2', 'History talk', ['LECTURE']),
  entry('3', 'Pottery class', ['WORKSHOP']),
  entry('4', 'Spring run', ['RUNNING']),
  entry('5', 'Broken output', ['CONCERT']),
  entry('6', 'Ok', ['LECTURE']),
];

function createEngine(settings: Partial<EventProcessorSettings> = {}): EvaluationEngine {
  const processor = new EventProcessor(
    {
      inputValidator: new EventInputValidator(),
      promptGenerator: new TaxonomyPromptGenerator(registry),
      llmClient: new TitleLlmClient(),
      outputParser: new JsonTagOutputParser(),
      confidenceEvaluator: new ClampedConfidenceEvaluator(),
      humanReviewChecker: new ThresholdHumanReviewChecker({ confidenceThreshold: 0.7, humanReviewThreshold: 0.5 }),
    },
    registry,
    {
      llmTemperature: 0.3,
      costPerToken: 0.00003,
      backgroundProcessingThreshold: 50,
      evaluationConcurrency: 5,
      ...settings,
    },
    { now: () => 0 },
  );
  return new EvaluationEngine(processor, { weights: [0.5, 0.3, 0.2], mostConfusedTopN: 5 });
}

test('evaluate scores every record and keeps failures as rows', async () => {
  const { metrics, rows } = await createEngine().evaluate(DATASET);

  assert.deepEqual(rows.map(row => row.result.eventId), ['1', '2', '3', '4', '5', '6']);
  assert.deepEqual(rows.map(row => row.matchRank), [1, 2, 1, null, null, null]);
  assert.equal(rows[5].errorMessage, 'Event title must be at least 3 characters');
  assert.equal(rows[4].errorMessage, undefined);

  assert.equal(metrics.totalRecords, 6);
  assert.equal(metrics.failedRecords, 1);
  assert.equal(metrics.correctPredictions, 2);
  assert.equal(metrics.accuracyAt1, 2 / 6);
  assert.equal(metrics.accuracyAt2, 3 / 6);
  assert.equal(metrics.totalTokensUsed, 50);
  assert.deepEqual(metrics.mostConfusedTags, [
    { groundTruth: 'LECTURE', predicted: 'WORKSHOP', count: 1 },
    { groundTruth: 'RUNNING', predicted: 'CONCERT', count: 1 },
  ]);
});

test('unparseable output is flagged for review', async () => {
  const { rows, metrics } = await createEngine().evaluate(DATASET);
  const broken = rows[4].result;

  assert.ok(broken.ok);
  assert.equal(broken.prediction.isValid, false);
  assert.equal(broken.prediction.needsHumanReview, true);
  assert.equal(metrics.needsHumanReview, 2);
});

test('concurrent evaluation yields the same metrics as a sequential run', async () => {
  const sequential = await createEngine({ backgroundProcessingThreshold: 100 }).evaluate(DATASET);
  const concurrent = await createEngine({ backgroundProcessingThreshold: 1, evaluationConcurrency: 4 }).evaluate(DATASET);

  assert.deepEqual(concurrent.metrics, sequential.metrics);
  assert.deepEqual(
    concurrent.rows.map(row => row.result.eventId),
    sequential.rows.map(row => row.result.eventId),
  );
});
