import type { EventRecord } from './event';

export interface TagRule {
  tag: string;
  mainCategory: string;
  subCategory: string;
  description: string;
  examples: readonly string[];
  displayName: string;
}

export interface PromptPayload {
  prompt: string;
  availableTags: readonly string[];
}

export interface RawModelOutput {
  content: string;
  tokensUsed: number;
  model?: string;
  finishReason?: string;
}

export interface ParsedTagResult {
  tags: readonly string[];
  confidence: number;
  reasoning: string;
  isValid: boolean;
  error?: string;
}

export interface EvaluatedPrediction extends ParsedTagResult {
  finalConfidence: number;
  needsHumanReview: boolean;
}

export type ProcessingErrorKind = 'validation' | 'upstream' | 'computation' | 'internal';

interface ProcessingResultBase {
  eventId: string;
  processingTimeMs: number;
  tokensUsed: number;
  estimatedCost: number;
}

export interface ProcessingSuccess extends ProcessingResultBase {
  ok: true;
  prediction: EvaluatedPrediction;
}

export interface ProcessingFailure extends ProcessingResultBase {
  ok: false;
  error: {
    kind: ProcessingErrorKind;
    message: string;
  };
}

export type ProcessingResult = ProcessingSuccess | ProcessingFailure;

export interface LlmRequest {
  prompt: string;
  temperature: number;
  maxTokens?: number;
}

export interface InputValidator {
  validate(record: EventRecord): EventRecord;
}

export interface PromptGenerator {
  generate(record: EventRecord, availableTags: readonly string[]): PromptPayload;
}

export interface LlmClient {
  readonly model: string;
  generate(request: LlmRequest): Promise<RawModelOutput>;
}

export interface OutputParser {
  parse(content: string, availableTags: readonly string[]): ParsedTagResult;
}

export interface ConfidenceEvaluator {
  evaluate(parsed: ParsedTagResult): number;
}

export interface HumanReviewChecker {
  needsReview(parsed: ParsedTagResult, confidence: number): boolean;
}

export interface TaggingStages {
  inputValidator: InputValidator;
  promptGenerator: PromptGenerator;
  llmClient: LlmClient;
  outputParser: OutputParser;
  confidenceEvaluator: ConfidenceEvaluator;
  humanReviewChecker: HumanReviewChecker;
}
