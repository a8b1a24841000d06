import assert from 'node:assert/strict';
import test from 'node:test';
import type { ProcessingFailure, ProcessingResult, ProcessingSuccess } from '../models/tagging';
import {
  buildEvaluationRow,
  computeMetrics,
  correctnessFromRank,
  findMatchRank,
  isExactMatch,
} from './metrics';

const OPTIONS = { weights: [0.5, 0.3, 0.2] as const, mostConfusedTopN: 5 };

function assertClose(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${actual} to be close to ${expected}`);
}

function success(
  eventId: string,
  tags: string[],
  confidence = 0.9,
  extra: Partial<Pick<ProcessingSuccess, 'processingTimeMs' | 'tokensUsed' | 'estimatedCost'>> & { needsHumanReview?: boolean } = {},
): ProcessingSuccess {
  return {
    ok: true,
    eventId,
    prediction: {
      tags,
      confidence,
      reasoning: '',
      isValid: tags.length > 0,
      finalConfidence: confidence,
      needsHumanReview: extra.needsHumanReview ?? false,
    },
    processingTimeMs: extra.processingTimeMs ?? 0,
    tokensUsed: extra.tokensUsed ?? 0,
    estimatedCost: extra.estimatedCost ?? 0,
  };
}

function failure(eventId: string, message: string): ProcessingFailure {
  return {
    ok: false,
    eventId,
    error: { kind: 'validation', message },
    processingTimeMs: 0,
    tokensUsed: 0,
    estimatedCost: 0,
  };
}

function row(result: ProcessingResult, truth: string[]) {
  return buildEvaluationRow(`Event ${result.eventId}`, result, { eventId: result.eventId, tags: truth });
}

test('findMatchRank returns the position of the first hit', () => {
  assert.equal(findMatchRank(['A', 'B', 'C'], ['C', 'B']), 2);
  assert.equal(findMatchRank(['A'], ['B']), null);
  assert.equal(findMatchRank([], ['B']), null);
});

test('correctnessFromRank is cumulative', () => {
  assert.deepEqual(correctnessFromRank(2), { 1: false, 2: true, 3: true });
  assert.deepEqual(correctnessFromRank(null), { 1: false, 2: false, 3: false });
});

test('isExactMatch compares slot by slot in priority order', () => {
  assert.equal(isExactMatch(['A', 'B'], ['A', 'B'], 3), true);
  assert.equal(isExactMatch(['B', 'A'], ['A', 'B'], 2), false);
  assert.equal(isExactMatch(['A', 'B'], ['A'], 1), true);
  assert.equal(isExactMatch(['A', 'B'], ['A'], 2), false);
});

test('one record with extra predicted tags is correct at every k but not an exact match at 3', () => {
  const metrics = computeMetrics([row(success('1', ['TAG_X', 'TAG_Y', 'TAG_Z']), ['TAG_X'])], OPTIONS);

  assert.equal(metrics.accuracyAt1, 1);
  assert.equal(metrics.accuracyAt2, 1);
  assert.equal(metrics.accuracyAt3, 1);
  assert.equal(metrics.exactMatchAt1, 1);
  assert.equal(metrics.exactMatchAt3, 0);
  assertClose(metrics.precision, 1 / 3);
  assert.equal(metrics.recall, 1);
  assertClose(metrics.f1Score, 0.5);
});

test('precision and recall are pooled over every tag occurrence', () => {
  const metrics = computeMetrics([
    row(success('1', ['A', 'B']), ['A']),
    row(success('2', ['C']), ['D', 'E']),
  ], OPTIONS);

  assert.equal(metrics.accuracyAt1, 0.5);
  assert.equal(metrics.correctPredictions, 1);
  assertClose(metrics.precision, 1 / 3);
  assertClose(metrics.recall, 1 / 3);
  assertClose(metrics.f1Score, 1 / 3);
  assert.deepEqual(metrics.mostConfusedTags, [{ groundTruth: 'D', predicted: 'C', count: 1 }]);
  assert.deepEqual(metrics.categoryAccuracy, [
    { tag: 'A', total: 1, correct: 1, accuracy: 1 },
    { tag: 'D', total: 1, correct: 0, accuracy: 0 },
    { tag: 'E', total: 1, correct: 0, accuracy: 0 },
  ]);
  assert.deepEqual(metrics.bestCategories, ['A', 'D', 'E']);
  assert.deepEqual(metrics.worstCategories, ['D', 'E', 'A']);
});

test('per-category accuracy counts every ground-truth tag and credits the predicted one', () => {
  const metrics = computeMetrics([
    row(success('1', ['LECTURE']), ['KIDS', 'LECTURE']),
    row(success('2', ['KIDS']), ['KIDS']),
    row(failure('3', 'Event title must be at least 3 characters'), ['LECTURE']),
  ], OPTIONS);

  assert.deepEqual(metrics.categoryAccuracy, [
    { tag: 'KIDS', total: 2, correct: 1, accuracy: 0.5 },
    { tag: 'LECTURE', total: 2, correct: 1, accuracy: 0.5 },
  ]);
});

test('failed records count toward the total but not toward correct or confidence', () => {
  const rows = [
    row(success('1', ['A'], 0.8), ['A']),
    row(failure('2', 'Event title must be at least 3 characters'), ['B']),
  ];
  const metrics = computeMetrics(rows, OPTIONS);

  assert.equal(rows[1].errorMessage, 'Event title must be at least 3 characters');
  assert.equal(rows[1].matchRank, null);
  assert.equal(metrics.totalRecords, 2);
  assert.equal(metrics.failedRecords, 1);
  assert.equal(metrics.correctPredictions, 1);
  assert.equal(metrics.accuracyAt1, 0.5);
  assert.equal(metrics.exactMatchAt1, 0.5);
  assert.equal(metrics.averageConfidence, 0.8);
  assert.equal(metrics.needsHumanReview, 1);
  assert.equal(metrics.precision, 1);
  assert.equal(metrics.recall, 0.5);
  assert.deepEqual(metrics.mostConfusedTags, []);
});

test('weighted accuracy combines accuracy at 1, 2 and 3', () => {
  const metrics = computeMetrics([
    row(success('1', ['A', 'X', 'Y']), ['A']),
    row(success('2', ['X', 'B', 'Y']), ['B']),
    row(success('3', ['X', 'Y', 'C']), ['C']),
    row(success('4', ['X', 'Y', 'Z']), ['D']),
  ], OPTIONS);

  assert.equal(metrics.accuracyAt1, 0.25);
  assert.equal(metrics.accuracyAt2, 0.5);
  assert.equal(metrics.accuracyAt3, 0.75);
  assert.ok(metrics.accuracyAt1 <= metrics.accuracyAt2 && metrics.accuracyAt2 <= metrics.accuracyAt3);
  assertClose(metrics.weightedAccuracy, 0.425);
  assertClose(
    computeMetrics([row(success('1', ['X', 'B']), ['B'])], { ...OPTIONS, weights: [1, 0, 0] }).weightedAccuracy,
    0,
  );
});

test('most confused pairs are ranked by count with ties in first-seen order', () => {
  const pairs: Array<[string, string]> = [
    ['A', 'B'], ['C', 'D'], ['A', 'B'], ['E', 'F'],
    ['G', 'H'], ['C', 'D'], ['G', 'H'], ['G', 'H'],
  ];
  const rows = pairs.map(([truth, predicted], index) => row(success(String(index), [predicted]), [truth]));

  const top = computeMetrics(rows, { ...OPTIONS, mostConfusedTopN: 3 }).mostConfusedTags;
  assert.deepEqual(top, [
    { groundTruth: 'G', predicted: 'H', count: 3 },
    { groundTruth: 'A', predicted: 'B', count: 2 },
    { groundTruth: 'C', predicted: 'D', count: 2 },
  ]);

  const all = computeMetrics(rows, { ...OPTIONS, mostConfusedTopN: 10 }).mostConfusedTags;
  assert.equal(all.reduce((sum, pair) => sum + pair.count, 0), rows.length);
});

test('review, token and cost totals are summed across records', () => {
  const metrics = computeMetrics([
    row(success('1', ['A'], 0.4, { needsHumanReview: true, processingTimeMs: 12, tokensUsed: 100, estimatedCost: 0.5 }), ['A']),
    row(success('2', ['A'], 0.9, { processingTimeMs: 8, tokensUsed: 50, estimatedCost: 0.25 }), ['A']),
  ], OPTIONS);

  assert.equal(metrics.needsHumanReview, 1);
  assert.equal(metrics.totalProcessingTimeMs, 20);
  assert.equal(metrics.totalTokensUsed, 150);
  assert.equal(metrics.totalEstimatedCost, 0.75);
  assertClose(metrics.averageConfidence, 0.65);
});

test('an empty dataset yields zeroed metrics', () => {
  const metrics = computeMetrics([], OPTIONS);

  assert.equal(metrics.totalRecords, 0);
  assert.equal(metrics.accuracyAt1, 0);
  assert.equal(metrics.weightedAccuracy, 0);
  assert.equal(metrics.f1Score, 0);
  assert.equal(metrics.averageConfidence, 0);
  assert.deepEqual(metrics.mostConfusedTags, []);
  assert.deepEqual(metrics.bestCategories, []);
});
