import type { GroundTruthRecord } from './event';
import type { ProcessingResult } from './tagging';

export interface CorrectnessAtK {
  1: boolean;
  2: boolean;
  3: boolean;
}

export interface EvaluationRow {
  title: string;
  result: ProcessingResult;
  groundTruth: GroundTruthRecord;
  correctAt: CorrectnessAtK;
  matchRank: number | null;
  errorMessage?: string;
}

export interface ConfusionPair {
  groundTruth: string;
  predicted: string;
  count: number;
}

export interface CategoryAccuracy {
  tag: string;
  total: number;
  correct: number;
  accuracy: number;
}

export interface AggregateMetrics {
  accuracyAt1: number;
  accuracyAt2: number;
  accuracyAt3: number;
  weightedAccuracy: number;
  exactMatchAt1: number;
  exactMatchAt2: number;
  exactMatchAt3: number;
  precision: number;
  recall: number;
  f1Score: number;
  averageConfidence: number;
  totalRecords: number;
  correctPredictions: number;
  failedRecords: number;
  needsHumanReview: number;
  totalProcessingTimeMs: number;
  totalTokensUsed: number;
  totalEstimatedCost: number;
  mostConfusedTags: ConfusionPair[];
  categoryAccuracy: CategoryAccuracy[];
  bestCategories: string[];
  worstCategories: string[];
}

export interface EvaluationOutcome {
  metrics: AggregateMetrics;
  rows: EvaluationRow[];
}
