import path from 'path';
import type { TaggingConfig } from '../config';
import type { LlmClient } from '../models/tagging';
import { EvaluationEngine } from '../evaluation/evaluationEngine';
import { loadDataset } from '../evaluation/datasetLoader';
import { SubmissionService } from '../evaluation/submission';
import { EventProcessor } from '../tagging/eventProcessor';
import { EventInputValidator } from '../tagging/inputValidator';
import { NoopLlmClient, OpenAIChatClient } from '../tagging/llm';
import { JsonTagOutputParser } from '../tagging/outputParser';
import { TaxonomyPromptGenerator } from '../tagging/promptGenerator';
import { ClampedConfidenceEvaluator, ThresholdHumanReviewChecker } from '../tagging/review';
import { loadTagRegistry, TagRegistry } from '../tagging/tagRegistry';

export interface ServiceContext {
  config: TaggingConfig;
  registry: TagRegistry;
  processor: EventProcessor;
  engine: EvaluationEngine;
  submissions: SubmissionService;
  promptGenerator: TaxonomyPromptGenerator;
}

export function createServiceContext(
  config: TaggingConfig,
  overrides?: { registry?: TagRegistry; llmClient?: LlmClient },
): ServiceContext {
  const registry = overrides?.registry ?? loadTagRegistry(path.join(config.dataDir, config.tagRulesFile));
  const promptGenerator = new TaxonomyPromptGenerator(registry);

  const processor = new EventProcessor(
    {
      inputValidator: new EventInputValidator({ sensitiveKeywords: config.sensitiveKeywords }),
      promptGenerator,
      llmClient: overrides?.llmClient ?? createLlmClient(config),
      outputParser: new JsonTagOutputParser(),
      confidenceEvaluator: new ClampedConfidenceEvaluator(),
      humanReviewChecker: new ThresholdHumanReviewChecker({
        confidenceThreshold: config.confidenceThreshold,
        humanReviewThreshold: config.humanReviewThreshold,
      }),
    },
    registry,
    {
      llmTemperature: config.llmTemperature,
      llmMaxTokens: config.llmMaxTokens,
      costPerToken: config.costPerToken,
      backgroundProcessingThreshold: config.backgroundProcessingThreshold,
      evaluationConcurrency: config.evaluationConcurrency,
      debug: config.debug,
    },
  );

  const engine = new EvaluationEngine(processor, {
    weights: config.weightedAccuracyWeights,
    mostConfusedTopN: config.mostConfusedTopN,
  });

  const submissions = new SubmissionService({
    engine,
    dashboardUrl: config.dashboardUrl,
    model: processor.model,
    loadDataset: () => loadDataset(path.join(config.dataDir, config.evaluationDatasetFile)),
  });

  return { config, registry, processor, engine, submissions, promptGenerator };
}

function createLlmClient(config: TaggingConfig): LlmClient {
  if (!config.openAiApiKey) {
    console.warn('[TAGGING] OPENAI_API_KEY is not set; predictions will be empty and flagged for review');
    return new NoopLlmClient();
  }

  return new OpenAIChatClient({
    apiKey: config.openAiApiKey,
    model: config.openAiModel,
    baseUrl: config.openAiBaseUrl,
    timeoutMs: config.llmTimeoutMs,
    maxRetries: config.llmMaxRetries,
    debug: config.debug,
  });
}
