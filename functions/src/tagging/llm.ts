import type { LlmClient, LlmRequest, RawModelOutput } from '../models/tagging';
import { UpstreamError } from './errors';

const SYSTEM_MESSAGE = 'You are an expert at tagging events with categories from a fixed taxonomy. You always answer with JSON.';
const RETRYABLE_STATUSES = new Set([408, 409, 429, 500, 502, 503, 504]);

export interface OpenAIChatClientOptions {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  debug?: boolean;
  sleep?: (ms: number) => Promise<void>;
}

interface ChatCompletionResponse {
  model?: string;
  choices?: Array<{ message?: { content?: string | null }; finish_reason?: string }>;
  usage?: { total_tokens?: number };
}

/**
 * Used when no API key is configured. Every call yields empty content, which
 * the parser reports as an invalid, review-flagged prediction.
 */
export class NoopLlmClient implements LlmClient {
  readonly model = 'none';

  async generate(): Promise<RawModelOutput> {
    return { content: '', tokensUsed: 0, model: this.model };
  }
}

export class OpenAIChatClient implements LlmClient {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly debug: boolean;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options?: OpenAIChatClientOptions) {
    const apiKey = options?.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is not set');
    }
    this.apiKey = apiKey;
    this.model = options?.model ?? 'gpt-4o-mini';
    this.baseUrl = (options?.baseUrl ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.timeoutMs = options?.timeoutMs ?? 30_000;
    this.maxRetries = options?.maxRetries ?? 2;
    this.retryDelayMs = options?.retryDelayMs ?? 500;
    this.debug = options?.debug ?? false;
    this.sleep = options?.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  async generate(request: LlmRequest): Promise<RawModelOutput> {
    let lastError: UpstreamError | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt += 1) {
      if (attempt > 0) {
        await this.sleep(this.retryDelayMs * 2 ** (attempt - 1));
      }

      try {
        return await this.send(request);
      } catch (error) {
        if (!(error instanceof UpstreamError)) {
          throw error;
        }
        lastError = error;
        const retryable = error.status === undefined || RETRYABLE_STATUSES.has(error.status);
        console.warn(`[TAGGING] LLM attempt ${attempt + 1} failed: ${error.message}`);
        if (!retryable) {
          break;
        }
      }
    }

    throw lastError ?? new UpstreamError('LLM request failed');
  }

  private async send(request: LlmRequest): Promise<RawModelOutput> {
    if (this.debug) {
      console.log('[TAGGING_DEBUG] Sending prompt', {
        model: this.model,
        temperature: request.temperature,
        maxTokens: request.maxTokens,
        prompt: request.prompt,
      });
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_MESSAGE },
            { role: 'user', content: request.prompt },
          ],
          temperature: request.temperature,
          ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
          response_format: { type: 'json_object' },
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error && error.name === 'TimeoutError'
        ? `timed out after ${this.timeoutMs}ms`
        : error instanceof Error ? error.message : 'network error';
      throw new UpstreamError(`LLM request failed: ${reason}`);
    }

    if (!response.ok) {
      const body = await response.text();
      throw new UpstreamError(`LLM request failed: ${response.status} ${body}`, { status: response.status });
    }

    let json: ChatCompletionResponse;
    try {
      json = (await response.json()) as ChatCompletionResponse;
    } catch {
      throw new UpstreamError('LLM response was not valid JSON', { status: response.status });
    }

    const choice = json.choices?.[0];
    if (!choice?.message || typeof choice.message.content !== 'string') {
      throw new UpstreamError('LLM response did not contain a message', { status: response.status });
    }

    if (this.debug) {
      console.log('[TAGGING_DEBUG] LLM response', {
        content: choice.message.content,
        usage: json.usage,
      });
    }

    return {
      content: choice.message.content,
      tokensUsed: json.usage?.total_tokens ?? 0,
      model: json.model ?? this.model,
      finishReason: choice.finish_reason,
    };
  }
}
