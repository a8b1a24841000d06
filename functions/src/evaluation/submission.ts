import type { DatasetEntry } from '../models/event';
import type { AggregateMetrics, EvaluationOutcome } from '../models/evaluation';
import { UpstreamError } from '../tagging/errors';
import { predictedTags } from './metrics';
import type { EvaluationEngine } from './evaluationEngine';

export interface SubmissionMetrics extends AggregateMetrics {
  modelUsed: string;
  averageProcessingTimeMs: number;
}

export interface SubmissionPrediction {
  eventId: string;
  tag1: string | null;
  tag2: string | null;
  tag3: string | null;
  confidence: number;
  errorMessage?: string;
}

export interface SubmissionPayload {
  name: string;
  submittedAt: string;
  metrics: SubmissionMetrics;
  predictions: SubmissionPrediction[];
}

export interface SubmissionResponse {
  status: number;
  body: unknown;
}

export interface SubmissionServiceOptions {
  engine: Pick<EvaluationEngine, 'evaluate'>;
  dashboardUrl: string | null;
  model: string;
  loadDataset: () => DatasetEntry[];
  now?: () => Date;
}

export function buildSubmissionPayload(
  name: string,
  outcome: EvaluationOutcome,
  model: string,
  submittedAt: Date,
): SubmissionPayload {
  const { metrics, rows } = outcome;
  return {
    name,
    submittedAt: submittedAt.toISOString(),
    metrics: {
      ...metrics,
      modelUsed: model,
      averageProcessingTimeMs: metrics.totalRecords > 0 ? metrics.totalProcessingTimeMs / metrics.totalRecords : 0,
    },
    predictions: rows.map(row => {
      const tags = predictedTags(row.result);
      const prediction: SubmissionPrediction = {
        eventId: row.result.eventId,
        tag1: tags[0] ?? null,
        tag2: tags[1] ?? null,
        tag3: tags[2] ?? null,
        confidence: row.result.ok ? row.result.prediction.finalConfidence : 0,
      };
      if (row.errorMessage) {
        prediction.errorMessage = row.errorMessage;
      }
      return prediction;
    }),
  };
}

export class SubmissionService {
  private readonly now: () => Date;

  constructor(private readonly options: SubmissionServiceOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Evaluates the designated test dataset and posts the result to the
   * leaderboard. Whatever status and body the leaderboard answers with are
   * returned untouched; only a missing URL or a network failure throws.
   */
  async submit(name: string, dataset?: DatasetEntry[]): Promise<SubmissionResponse> {
    const dashboardUrl = this.options.dashboardUrl;
    if (!dashboardUrl) {
      throw new UpstreamError('DASHBOARD_URL is not configured');
    }

    const outcome = await this.options.engine.evaluate(dataset ?? this.options.loadDataset());
    const payload = buildSubmissionPayload(name, outcome, this.options.model, this.now());

    console.log(`[SUBMISSION] Sending ${payload.predictions.length} predictions for ${name}`);

    let response: Response;
    try {
      response = await fetch(dashboardUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      });
    } catch (error) {
      throw new UpstreamError(`Submission failed: ${error instanceof Error ? error.message : 'network error'}`);
    }

    const text = await response.text();
    if (response.ok) {
      console.log(`[SUBMISSION] Dashboard accepted submission for ${name} (${response.status})`);
    } else {
      console.warn(`[SUBMISSION] Dashboard rejected submission for ${name} (${response.status}): ${text}`);
    }
    return { status: response.status, body: parseBody(text) };
  }
}

function parseBody(text: string): unknown {
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
