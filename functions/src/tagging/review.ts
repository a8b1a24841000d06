import type { ConfidenceEvaluator, HumanReviewChecker, ParsedTagResult } from '../models/tagging';
import { ComputationError } from './errors';

export interface ReviewThresholds {
  confidenceThreshold: number;
  humanReviewThreshold: number;
}

/**
 * Final confidence is the parser's value clamped to [0, 1]. Invalid output
 * scores 0 so the review decision is always reachable.
 */
export class ClampedConfidenceEvaluator implements ConfidenceEvaluator {
  evaluate(parsed: ParsedTagResult): number {
    if (!parsed.isValid || parsed.tags.length === 0) {
      return 0;
    }
    if (typeof parsed.confidence !== 'number' || !Number.isFinite(parsed.confidence)) {
      throw new ComputationError(`Confidence must be a finite number, got ${String(parsed.confidence)}`);
    }
    return Math.min(1, Math.max(0, parsed.confidence));
  }
}

/**
 * Flags a prediction when:
 * - the output was invalid or carried no tags,
 * - confidence is below the human-review threshold, or
 * - confidence is below the confidence threshold and only one tag came back.
 */
export class ThresholdHumanReviewChecker implements HumanReviewChecker {
  constructor(private readonly thresholds: ReviewThresholds) {}

  needsReview(parsed: ParsedTagResult, confidence: number): boolean {
    if (!parsed.isValid || parsed.tags.length === 0) {
      return true;
    }
    if (confidence < this.thresholds.humanReviewThreshold) {
      return true;
    }
    return confidence < this.thresholds.confidenceThreshold && parsed.tags.length === 1;
  }
}
