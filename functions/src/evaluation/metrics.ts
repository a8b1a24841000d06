import type { AccuracyWeights } from '../config';
import type { GroundTruthRecord } from '../models/event';
import type {
  AggregateMetrics,
  CategoryAccuracy,
  ConfusionPair,
  CorrectnessAtK,
  EvaluationRow,
} from '../models/evaluation';
import type { ProcessingResult } from '../models/tagging';

export interface MetricsOptions {
  weights: AccuracyWeights;
  mostConfusedTopN: number;
  categoryInsightSize?: number;
}

const K_VALUES = [1, 2, 3] as const;
const DEFAULT_CATEGORY_INSIGHT_SIZE = 3;

export function predictedTags(result: ProcessingResult): readonly string[] {
  return result.ok ? result.prediction.tags : [];
}

/**
 * 1-based position of the first predicted tag that appears anywhere in the
 * ground truth, or null when none does.
 */
export function findMatchRank(predicted: readonly string[], groundTruth: readonly string[]): number | null {
  const truth = new Set(groundTruth);
  const index = predicted.findIndex(tag => truth.has(tag));
  return index === -1 ? null : index + 1;
}

export function correctnessFromRank(matchRank: number | null): CorrectnessAtK {
  return {
    1: matchRank !== null && matchRank <= 1,
    2: matchRank !== null && matchRank <= 2,
    3: matchRank !== null && matchRank <= 3,
  };
}

/**
 * Slot-by-slot comparison of the first `k` predictions against the
 * ground truth in priority order; an empty slot only matches an empty slot.
 */
export function isExactMatch(predicted: readonly string[], groundTruth: readonly string[], k: number): boolean {
  for (let index = 0; index < k; index += 1) {
    if ((predicted[index] ?? null) !== (groundTruth[index] ?? null)) {
      return false;
    }
  }
  return true;
}

export function buildEvaluationRow(title: string, result: ProcessingResult, groundTruth: GroundTruthRecord): EvaluationRow {
  const matchRank = result.ok ? findMatchRank(result.prediction.tags, groundTruth.tags) : null;
  const row: EvaluationRow = {
    title,
    result,
    groundTruth,
    correctAt: correctnessFromRank(matchRank),
    matchRank,
  };
  if (!result.ok) {
    row.errorMessage = result.error.message;
  }
  return row;
}

export function computeMetrics(rows: readonly EvaluationRow[], options: MetricsOptions): AggregateMetrics {
  const total = rows.length;
  const ratio = (count: number): number => (total > 0 ? count / total : 0);

  const correctCounts = { 1: 0, 2: 0, 3: 0 };
  const exactCounts = { 1: 0, 2: 0, 3: 0 };
  let predictedOccurrences = 0;
  let truthOccurrences = 0;
  let correctOccurrences = 0;
  let confidenceSum = 0;
  let scoredRecords = 0;
  let failedRecords = 0;
  let needsHumanReview = 0;
  let totalProcessingTimeMs = 0;
  let totalTokensUsed = 0;
  let totalEstimatedCost = 0;

  const confusion = new Map<string, ConfusionPair>();
  const categories = new Map<string, CategoryAccuracy>();

  for (const row of rows) {
    const predicted = predictedTags(row.result);
    const truth = row.groundTruth.tags;
    const truthSet = new Set(truth);

    for (const k of K_VALUES) {
      if (row.correctAt[k]) {
        correctCounts[k] += 1;
      }
      if (row.result.ok && isExactMatch(predicted, truth, k)) {
        exactCounts[k] += 1;
      }
    }

    predictedOccurrences += predicted.length;
    truthOccurrences += truth.length;
    correctOccurrences += predicted.filter(tag => truthSet.has(tag)).length;

    totalProcessingTimeMs += row.result.processingTimeMs;
    totalTokensUsed += row.result.tokensUsed;
    totalEstimatedCost += row.result.estimatedCost;

    if (row.result.ok) {
      confidenceSum += row.result.prediction.finalConfidence;
      scoredRecords += 1;
      if (row.result.prediction.needsHumanReview) {
        needsHumanReview += 1;
      }
    } else {
      failedRecords += 1;
      needsHumanReview += 1;
    }

    const primaryTruth = truth[0];
    const top1 = predicted[0];
    if (primaryTruth && top1 && !truthSet.has(top1)) {
      const key = `${primaryTruth}\u0000${top1}`;
      const pair = confusion.get(key);
      if (pair) {
        pair.count += 1;
      } else {
        confusion.set(key, { groundTruth: primaryTruth, predicted: top1, count: 1 });
      }
    }

    for (const tag of truthSet) {
      const category = categories.get(tag) ?? { tag, total: 0, correct: 0, accuracy: 0 };
      category.total += 1;
      if (row.correctAt[1] && tag === top1) {
        category.correct += 1;
      }
      categories.set(tag, category);
    }
  }

  const precision = predictedOccurrences > 0 ? correctOccurrences / predictedOccurrences : 0;
  const recall = truthOccurrences > 0 ? correctOccurrences / truthOccurrences : 0;
  const f1Score = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;

  const accuracyAt1 = ratio(correctCounts[1]);
  const accuracyAt2 = ratio(correctCounts[2]);
  const accuracyAt3 = ratio(correctCounts[3]);
  const [w1, w2, w3] = options.weights;

  const categoryAccuracy = Array.from(categories.values()).map(category => ({
    ...category,
    accuracy: category.correct / category.total,
  }));
  const insightSize = options.categoryInsightSize ?? DEFAULT_CATEGORY_INSIGHT_SIZE;

  return {
    accuracyAt1,
    accuracyAt2,
    accuracyAt3,
    weightedAccuracy: w1 * accuracyAt1 + w2 * accuracyAt2 + w3 * accuracyAt3,
    exactMatchAt1: ratio(exactCounts[1]),
    exactMatchAt2: ratio(exactCounts[2]),
    exactMatchAt3: ratio(exactCounts[3]),
    precision,
    recall,
    f1Score,
    averageConfidence: scoredRecords > 0 ? confidenceSum / scoredRecords : 0,
    totalRecords: total,
    correctPredictions: correctCounts[1],
    failedRecords,
    needsHumanReview,
    totalProcessingTimeMs,
    totalTokensUsed,
    totalEstimatedCost,
    mostConfusedTags: rankConfusion(Array.from(confusion.values()), options.mostConfusedTopN),
    categoryAccuracy,
    bestCategories: stableSortBy(categoryAccuracy, (a, b) => b.accuracy - a.accuracy)
      .slice(0, insightSize)
      .map(category => category.tag),
    worstCategories: stableSortBy(categoryAccuracy, (a, b) => a.accuracy - b.accuracy)
      .slice(0, insightSize)
      .map(category => category.tag),
  };
}

// Map iteration order is insertion order, so ties keep first-seen order.
function rankConfusion(pairs: ConfusionPair[], topN: number): ConfusionPair[] {
  return stableSortBy(pairs, (a, b) => b.count - a.count).slice(0, topN);
}

function stableSortBy<T>(items: readonly T[], compare: (a: T, b: T) => number): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => compare(a.item, b.item) || a.index - b.index)
    .map(entry => entry.item);
}
