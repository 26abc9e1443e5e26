/**
 * OpenAI-compatible chat completion client
 *
 * Every call goes through the client-side limiter, the circuit breaker and
 * a bounded retry on server errors. HTTP 429 is never retried here: it is
 * surfaced as RateLimitError so the Cost & Rate Governor can decide between
 * stopping the run and deferring the page.
 */

import { z } from 'zod';
import { withRetry } from '../../utils/backoff.js';
import { type LlmConfig, type LlmConfigOverrides, loadLlmConfig } from './config.js';
import { CircuitBreaker, isServerError } from './circuit-breaker.js';
import { LlmRateLimiter } from './rate-limiter.js';
import { LlmError, RateLimitError, isDailyLimitBody, parseRetryAfter } from './errors.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Used to reserve room in the per-minute token window */
  estimatedTokens?: number;
}

export interface CompletionResult {
  text: string;
  model: string;
  /** Null when the provider omits usage */
  usage: TokenUsage | null;
  processingTimeMs: number;
}

/**
 * The chat completion collaborator consumed by the classifier and the
 * Correction Engine. Tests substitute scripted fakes.
 */
export interface LlmCompletion {
  readonly model: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export class LlmClient implements LlmCompletion {
  private readonly config: LlmConfig;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly rateLimiter: LlmRateLimiter;

  constructor(
    configOverrides?: LlmConfigOverrides,
    deps: { circuitBreaker?: CircuitBreaker; rateLimiter?: LlmRateLimiter } = {}
  ) {
    this.config = loadLlmConfig(configOverrides);
    this.circuitBreaker =
      deps.circuitBreaker ??
      new CircuitBreaker({
        failureThreshold: this.config.circuitBreaker.failureThreshold,
        recoveryTimeMs: this.config.circuitBreaker.recoveryTimeMs,
      });
    this.rateLimiter =
      deps.rateLimiter ??
      new LlmRateLimiter(this.config.maxRequestsPerMinute, this.config.maxTokensPerMinute);
  }

  get model(): string {
    return this.config.model;
  }

  /**
   * Send a chat completion. Falls back to the secondary model once when the
   * provider reports the primary model as unknown.
   */
  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const model = request.model ?? this.config.model;
    try {
      return await this.completeWith(model, request);
    } catch (error) {
      if (isUnknownModelError(error) && model !== this.config.fallbackModel) {
        console.error(
          `[LlmClient] Model ${model} unavailable, falling back to ${this.config.fallbackModel}`
        );
        return this.completeWith(this.config.fallbackModel, request);
      }
      throw error;
    }
  }

  private async completeWith(model: string, request: CompletionRequest): Promise<CompletionResult> {
    const startTime = Date.now();
    const estimatedTokens = request.estimatedTokens ?? 1000;
    await this.rateLimiter.acquire(estimatedTokens);

    const result = await this.circuitBreaker.execute(() =>
      withRetry(() => this.callChatCompletions(model, request), isServerError, {
        ...this.config.retry,
        label: 'LlmClient',
      })
    );

    if (result.usage) {
      this.rateLimiter.recordUsage(estimatedTokens, result.usage.totalTokens);
    }
    return { ...result, processingTimeMs: Date.now() - startTime };
  }

  private async callChatCompletions(
    model: string,
    request: CompletionRequest
  ): Promise<Omit<CompletionResult, 'processingTimeMs'>> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    let rawResponse: Response;
    try {
      rawResponse = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages: request.messages,
          temperature: request.temperature ?? this.config.temperature,
          max_tokens: request.maxTokens ?? this.config.maxTokensPerRequest,
        }),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new LlmError(
          `LLM request timed out after ${this.config.requestTimeoutMs}ms`,
          'LLM_TIMEOUT',
          undefined,
          error
        );
      }
      throw new LlmError(
        `LLM request failed: ${error instanceof Error ? error.message : String(error)}`,
        'LLM_API_ERROR',
        undefined,
        error
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!rawResponse.ok) {
      const body = await rawResponse.text().catch(() => '');
      const detail = `${rawResponse.status} ${rawResponse.statusText}. ${body.slice(0, 200)}`;
      if (rawResponse.status === 429) {
        throw new RateLimitError(
          `LLM rate limit: ${detail}`,
          isDailyLimitBody(body),
          parseRetryAfter(rawResponse.headers.get('retry-after'))
        );
      }
      if (rawResponse.status === 401 || rawResponse.status === 403) {
        throw new LlmError(`LLM auth error: ${detail}`, 'LLM_AUTH_ERROR', rawResponse.status);
      }
      throw new LlmError(`LLM API error ${detail}`, 'LLM_API_ERROR', rawResponse.status);
    }

    const json: unknown = await rawResponse.json();
    const parsed = ChatCompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new LlmError(
        `Malformed chat completion response: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`,
        'LLM_API_ERROR',
        rawResponse.status
      );
    }

    const data = parsed.data;
    const usage = data.usage
      ? {
          inputTokens: data.usage.prompt_tokens,
          outputTokens: data.usage.completion_tokens,
          totalTokens:
            data.usage.total_tokens ?? data.usage.prompt_tokens + data.usage.completion_tokens,
        }
      : null;

    return {
      text: data.choices[0].message.content ?? '',
      model: data.model ?? model,
      usage,
    };
  }

  getStatus() {
    return {
      model: this.config.model,
      baseUrl: this.config.baseUrl,
      rateLimiter: this.rateLimiter.getStatus(),
      circuitBreaker: this.circuitBreaker.getStatus(),
    };
  }
}

function isUnknownModelError(error: unknown): boolean {
  return (
    error instanceof LlmError &&
    error.category === 'LLM_API_ERROR' &&
    (error.status === 404 || (error.status === 400 && /model/i.test(error.message)))
  );
}
