import path from 'path';

export type AccuracyWeights = readonly [number, number, number];

export interface TaggingConfig {
  openAiApiKey: string | null;
  openAiModel: string;
  openAiBaseUrl: string;
  llmTemperature: number;
  llmMaxTokens?: number;
  llmTimeoutMs: number;
  llmMaxRetries: number;
  confidenceThreshold: number;
  humanReviewThreshold: number;
  costPerToken: number;
  backgroundProcessingThreshold: number;
  evaluationConcurrency: number;
  mostConfusedTopN: number;
  weightedAccuracyWeights: AccuracyWeights;
  sensitiveKeywords: string[];
  dataDir: string;
  tagRulesFile: string;
  evaluationDatasetFile: string;
  dashboardUrl: string | null;
  allowedOrigins: string[] | true;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

const DEFAULT_DATA_DIR = path.resolve(__dirname, '..', 'data');

export const DEFAULT_SENSITIVE_KEYWORDS = [
  'classified',
  'confidential',
  'top secret',
  'private',
  'personal data',
  'gdpr',
  'data protection',
];

export function loadConfig(env: Env = process.env): TaggingConfig {
  const maxTokensRaw = readString(env, 'LLM_MAX_TOKENS');
  const llmMaxTokens = maxTokensRaw === null
    ? 500
    : ['none', 'null'].includes(maxTokensRaw.toLowerCase())
      ? undefined
      : parsePositiveInt(maxTokensRaw, 'LLM_MAX_TOKENS');

  return {
    openAiApiKey: readString(env, 'OPENAI_API_KEY'),
    openAiModel: readString(env, 'OPENAI_MODEL') ?? 'gpt-4o-mini',
    openAiBaseUrl: readString(env, 'OPENAI_BASE_URL') ?? 'https://api.openai.com/v1',
    llmTemperature: readNumber(env, 'LLM_TEMPERATURE', 0.3, { min: 0, max: 2 }),
    llmMaxTokens,
    llmTimeoutMs: readInt(env, 'LLM_TIMEOUT_MS', 30_000),
    llmMaxRetries: readInt(env, 'LLM_MAX_RETRIES', 2, { allowZero: true }),
    confidenceThreshold: readNumber(env, 'CONFIDENCE_THRESHOLD', 0.7, { min: 0, max: 1 }),
    humanReviewThreshold: readNumber(env, 'HUMAN_REVIEW_THRESHOLD', 0.5, { min: 0, max: 1 }),
    costPerToken: readNumber(env, 'COST_PER_TOKEN', 0.00003, { min: 0 }),
    backgroundProcessingThreshold: readInt(env, 'BACKGROUND_PROCESSING_THRESHOLD', 50, { allowZero: true }),
    evaluationConcurrency: readInt(env, 'EVALUATION_CONCURRENCY', 5),
    mostConfusedTopN: readInt(env, 'MOST_CONFUSED_TOP_N', 5),
    weightedAccuracyWeights: parseWeights(readString(env, 'WEIGHTED_ACCURACY_WEIGHTS') ?? '0.5,0.3,0.2'),
    sensitiveKeywords: parseList(readString(env, 'SENSITIVE_KEYWORDS')) ?? DEFAULT_SENSITIVE_KEYWORDS,
    dataDir: readString(env, 'DATA_DIR') ?? DEFAULT_DATA_DIR,
    tagRulesFile: readString(env, 'TAG_RULES_FILE') ?? 'tag_rules.csv',
    evaluationDatasetFile: readString(env, 'EVALUATION_DATASET_FILE') ?? 'evaluation_set.csv',
    dashboardUrl: readString(env, 'DASHBOARD_URL'),
    allowedOrigins: parseOrigins(readString(env, 'ALLOWED_ORIGINS')),
    debug: env.ENABLE_TAGGING_DEBUG === 'true',
  };
}

/**
 * Weights for accuracy@1..3. They must form a convex combination so the
 * weighted accuracy stays inside [0, 1].
 */
export function parseWeights(raw: string): AccuracyWeights {
  const parts = raw.split(',').map(part => Number.parseFloat(part.trim()));
  if (parts.length !== 3 || parts.some(part => !Number.isFinite(part) || part < 0)) {
    throw new Error('WEIGHTED_ACCURACY_WEIGHTS must be three non-negative numbers');
  }

  const sum = parts[0] + parts[1] + parts[2];
  if (Math.abs(sum - 1) > 1e-9) {
    throw new Error(`WEIGHTED_ACCURACY_WEIGHTS must sum to 1 (got ${sum})`);
  }

  return [parts[0], parts[1], parts[2]];
}

function readString(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readNumber(env: Env, name: string, fallback: number, bounds: { min?: number; max?: number } = {}): number {
  const raw = readString(env, name);
  if (raw === null) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number`);
  }
  if ((bounds.min !== undefined && parsed < bounds.min) || (bounds.max !== undefined && parsed > bounds.max)) {
    throw new Error(`${name} must be between ${bounds.min ?? '-Infinity'} and ${bounds.max ?? 'Infinity'}`);
  }
  return parsed;
}

function readInt(env: Env, name: string, fallback: number, options: { allowZero?: boolean } = {}): number {
  const raw = readString(env, name);
  if (raw === null) {
    return fallback;
  }
  if (options.allowZero && raw === '0') {
    return 0;
  }
  return parsePositiveInt(raw, name);
}

function parsePositiveInt(raw: string, name: string): number {
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== raw) {
    throw new Error(`${name} must be a positive integer`);
  }
  return parsed;
}

function parseList(raw: string | null): string[] | null {
  if (raw === null) {
    return null;
  }
  return raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function parseOrigins(raw: string | null): string[] | true {
  const origins = parseList(raw);
  if (!origins || origins.length === 0 || origins.includes('*')) {
    return true;
  }
  return origins;
}
