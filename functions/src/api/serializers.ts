import type { EvaluationRow } from '../models/evaluation';
import type { ProcessingResult } from '../models/tagging';
import { predictedTags } from '../evaluation/metrics';
import type { TagRequestOptions } from './requestParsing';

export interface TagResponse {
  eventId: string;
  status: 'success' | 'needs_review' | 'error';
  tag1: string | null;
  tag2: string | null;
  tag3: string | null;
  confidence?: number;
  reasoning?: string;
  isValid: boolean;
  needsHumanReview: boolean;
  processingTimeMs: number;
  tokensUsed: number;
  estimatedCost: number;
  errorKind?: string;
  errorMessage?: string;
}

export function serializeResult(result: ProcessingResult, options: TagRequestOptions): TagResponse {
  const tags = predictedTags(result);
  const base = {
    eventId: result.eventId,
    tag1: tags[0] ?? null,
    tag2: tags[1] ?? null,
    tag3: tags[2] ?? null,
    processingTimeMs: result.processingTimeMs,
    tokensUsed: result.tokensUsed,
    estimatedCost: result.estimatedCost,
  };

  if (!result.ok) {
    return {
      ...base,
      status: 'error',
      isValid: false,
      needsHumanReview: true,
      errorKind: result.error.kind,
      errorMessage: result.error.message,
    };
  }

  const { prediction } = result;
  const response: TagResponse = {
    ...base,
    status: prediction.needsHumanReview ? 'needs_review' : 'success',
    isValid: prediction.isValid,
    needsHumanReview: prediction.needsHumanReview,
  };
  if (options.requireConfidence) {
    response.confidence = prediction.finalConfidence;
  }
  if (options.includeReasoning) {
    response.reasoning = prediction.reasoning;
  }
  if (!prediction.isValid && prediction.error) {
    response.errorMessage = prediction.error;
  }
  return response;
}

export function serializeRow(row: EvaluationRow) {
  const tags = predictedTags(row.result);
  return {
    eventId: row.result.eventId,
    title: row.title,
    predictedTags: [...tags],
    confidence: row.result.ok ? row.result.prediction.finalConfidence : null,
    groundTruthTags: row.groundTruth.tags,
    correctAt1: row.correctAt[1],
    correctAt2: row.correctAt[2],
    correctAt3: row.correctAt[3],
    matchRank: row.matchRank,
    needsHumanReview: row.result.ok ? row.result.prediction.needsHumanReview : true,
    errorMessage: row.errorMessage ?? null,
  };
}
