import type { EventRecord } from '../models/event';
import type {
  EvaluatedPrediction,
  ProcessingFailure,
  ProcessingResult,
  ProcessingSuccess,
  TaggingStages,
} from '../models/tagging';
import { mapInOrder, mapSequentially } from '../utils/concurrency';
import { describeError } from './errors';
import type { TagRegistry } from './tagRegistry';

export interface EventProcessorSettings {
  llmTemperature: number;
  llmMaxTokens?: number;
  costPerToken: number;
  backgroundProcessingThreshold: number;
  evaluationConcurrency: number;
  debug?: boolean;
}

export interface BatchSummary {
  totalEvents: number;
  successful: number;
  failed: number;
  needsHumanReview: number;
  totalProcessingTimeMs: number;
  averageConfidence: number;
}

export interface BatchOutcome {
  results: ProcessingResult[];
  summary: BatchSummary;
}

export function estimateCost(tokensUsed: number, costPerToken: number): number {
  return Math.round(tokensUsed * costPerToken * 1e6) / 1e6;
}

export class EventProcessor {
  private readonly now: () => number;

  constructor(
    private readonly stages: TaggingStages,
    private readonly registry: TagRegistry,
    private readonly settings: EventProcessorSettings,
    options?: { now?: () => number },
  ) {
    this.now = options?.now ?? (() => performance.now());
  }

  get model(): string {
    return this.stages.llmClient.model;
  }

  async processSingleEvent(record: EventRecord): Promise<ProcessingResult> {
    const startedAt = this.now();
    const eventId = record.id;
    let tokensUsed = 0;

    try {
      const cleaned = this.stages.inputValidator.validate(record);
      const payload = this.stages.promptGenerator.generate(cleaned, this.registry.tagNames);

      const output = await this.stages.llmClient.generate({
        prompt: payload.prompt,
        temperature: this.settings.llmTemperature,
        maxTokens: this.settings.llmMaxTokens,
      });
      tokensUsed = output.tokensUsed;

      const parsed = this.stages.outputParser.parse(output.content, payload.availableTags);
      if (!parsed.isValid) {
        console.warn(`[TAGGING] Invalid model output for event ${eventId}: ${parsed.error ?? 'unknown reason'}`);
        if (this.settings.debug) {
          console.log('[TAGGING_DEBUG] Raw model output', { eventId, content: output.content });
        }
      }

      const finalConfidence = this.stages.confidenceEvaluator.evaluate(parsed);
      const needsHumanReview = this.stages.humanReviewChecker.needsReview(parsed, finalConfidence);
      const prediction: EvaluatedPrediction = Object.freeze({
        ...parsed,
        tags: Object.freeze([...parsed.tags]),
        finalConfidence,
        needsHumanReview,
      });

      const result: ProcessingSuccess = {
        ok: true,
        eventId,
        prediction,
        processingTimeMs: this.now() - startedAt,
        tokensUsed,
        estimatedCost: estimateCost(tokensUsed, this.settings.costPerToken),
      };
      return Object.freeze(result);
    } catch (error) {
      const described = describeError(error);
      if (described.kind === 'internal' || described.kind === 'computation') {
        console.error(`[TAGGING] Error processing event ${eventId}`, error);
      } else {
        console.warn(`[TAGGING] Event ${eventId} failed (${described.kind}): ${described.message}`);
      }

      const result: ProcessingFailure = {
        ok: false,
        eventId,
        error: described,
        processingTimeMs: this.now() - startedAt,
        tokensUsed,
        estimatedCost: estimateCost(tokensUsed, this.settings.costPerToken),
      };
      return Object.freeze(result);
    }
  }

  /**
   * Runs every record through the pipeline. Above the background-processing
   * threshold records are dispatched concurrently; results keep input order.
   */
  async processMany(records: readonly EventRecord[]): Promise<ProcessingResult[]> {
    if (records.length > this.settings.backgroundProcessingThreshold) {
      return mapInOrder(records, this.settings.evaluationConcurrency, record => this.processSingleEvent(record));
    }
    return mapSequentially(records, record => this.processSingleEvent(record));
  }

  async processBatch(records: readonly EventRecord[]): Promise<BatchOutcome> {
    const results = await this.processMany(records);
    return { results, summary: summarizeBatch(results) };
  }
}

export function summarizeBatch(results: readonly ProcessingResult[]): BatchSummary {
  const successes = results.filter((result): result is ProcessingSuccess => result.ok);
  const confidenceSum = successes.reduce((sum, result) => sum + result.prediction.finalConfidence, 0);

  return {
    totalEvents: results.length,
    successful: successes.length,
    failed: results.length - successes.length,
    needsHumanReview: results.filter(result => !result.ok || result.prediction.needsHumanReview).length,
    totalProcessingTimeMs: results.reduce((sum, result) => sum + result.processingTimeMs, 0),
    averageConfidence: successes.length > 0 ? confidenceSum / successes.length : 0,
  };
}
