/**
 * LLM client error types
 *
 * @module llm/errors
 */

import { z } from 'zod';

export type LlmErrorCategory = 'LLM_API_ERROR' | 'LLM_RATE_LIMIT' | 'LLM_TIMEOUT' | 'LLM_AUTH_ERROR';

/**
 * Failure of a chat completion call
 */
export class LlmError extends Error {
  constructor(
    message: string,
    public readonly category: LlmErrorCategory,
    public readonly status?: number,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LlmError';
  }
}

/**
 * HTTP 429 from the provider. `daily` means the caller must stop issuing
 * billed requests for the rest of the period; it is never retried.
 */
export class RateLimitError extends LlmError {
  constructor(
    message: string,
    public readonly daily: boolean,
    public readonly retryAfterSeconds: number | null
  ) {
    super(message, 'LLM_RATE_LIMIT', 429);
    this.name = 'RateLimitError';
  }
}

const DAILY_LIMIT_PATTERN = /daily|per.?day|quota/i;

const ErrorFieldsSchema = z.object({
  message: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
  type: z.string().optional(),
});

const ErrorBodySchema = ErrorFieldsSchema.extend({
  error: z.union([z.string(), ErrorFieldsSchema]).optional(),
});

/**
 * Decide whether a 429 body signals a daily limit. Accepts both
 * `{ error: { message, code } }` and flat `{ message, code }` bodies, and
 * falls back to the raw text.
 */
export function isDailyLimitBody(body: string): boolean {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return DAILY_LIMIT_PATTERN.test(body);
  }

  const parsed = ErrorBodySchema.safeParse(json);
  if (!parsed.success) {
    return DAILY_LIMIT_PATTERN.test(body);
  }

  const { error, ...flat } = parsed.data;
  const fields = [flat.message, flat.code, flat.type];
  if (typeof error === 'string') {
    fields.push(error);
  } else if (error) {
    fields.push(error.message, error.code, error.type);
  }
  return fields.some((f) => f !== undefined && DAILY_LIMIT_PATTERN.test(String(f)));
}

/**
 * Parse a Retry-After header given in seconds
 */
export function parseRetryAfter(header: string | null): number | null {
  if (header === null || header.trim() === '') return null;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}
