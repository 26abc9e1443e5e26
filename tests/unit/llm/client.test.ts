/**
 * LLM chat completion client against a stubbed fetch
 *
 * @module tests/unit/llm/client
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { LlmClient } from '../../../src/services/llm/client.js';
import { LlmError, RateLimitError } from '../../../src/services/llm/errors.js';

type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

function completionBody(content: string, withUsage = true): string {
  return JSON.stringify({
    model: 'served-model',
    choices: [{ message: { content } }],
    ...(withUsage ? { usage: { prompt_tokens: 120, completion_tokens: 8 } } : {}),
  });
}

function reply(status: number, body: string, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

function sentBody(fetchMock: Mock<FetchFn>, call: number): unknown {
  return JSON.parse(String(fetchMock.mock.calls[call][1].body));
}

describe('LlmClient', () => {
  let fetchMock: Mock<FetchFn>;

  function createClient(): LlmClient {
    return new LlmClient({
      apiKey: 'test-secret',
      baseUrl: 'https://llm.test/v1/',
      model: 'primary-model',
      fallbackModel: 'fallback-model',
      temperature: 0.1,
      maxTokensPerRequest: 500,
      retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5 },
      circuitBreaker: { failureThreshold: 10 },
    });
  }

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a chat completion and maps the response', async () => {
    fetchMock.mockResolvedValueOnce(reply(200, completionBody('ACCEPTABLE')));

    const result = await createClient().complete({
      messages: [{ role: 'user', content: 'Page text' }],
      temperature: 0,
      maxTokens: 10,
    });

    expect(result.text).toBe('ACCEPTABLE');
    expect(result.model).toBe('served-model');
    expect(result.usage).toEqual({ inputTokens: 120, outputTokens: 8, totalTokens: 128 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://llm.test/v1/chat/completions');
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(sentBody(fetchMock, 0)).toEqual({
      model: 'primary-model',
      messages: [{ role: 'user', content: 'Page text' }],
      temperature: 0,
      max_tokens: 10,
    });
  });

  it('uses configured defaults and reports missing usage as null', async () => {
    fetchMock.mockResolvedValueOnce(reply(200, completionBody('ok', false)));

    const result = await createClient().complete({ messages: [{ role: 'user', content: 'x' }] });

    expect(result.usage).toBeNull();
    expect(sentBody(fetchMock, 0)).toMatchObject({ temperature: 0.1, max_tokens: 500 });
  });

  it('surfaces a daily 429 without retrying', async () => {
    fetchMock.mockResolvedValueOnce(
      reply(429, JSON.stringify({ error: { message: 'Daily request quota exceeded' } }), {
        'retry-after': '30',
      })
    );

    const error = await createClient()
      .complete({ messages: [{ role: 'user', content: 'x' }] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ daily: true, retryAfterSeconds: 30, category: 'LLM_RATE_LIMIT' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('surfaces a short 429 as a non-daily rate limit', async () => {
    fetchMock.mockResolvedValueOnce(reply(429, '{"message":"Too many requests"}'));

    const error = await createClient()
      .complete({ messages: [{ role: 'user', content: 'x' }] })
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ daily: false, retryAfterSeconds: null });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('reports auth failures without retrying', async () => {
    fetchMock.mockResolvedValueOnce(reply(401, 'invalid key'));

    const error = await createClient()
      .complete({ messages: [{ role: 'user', content: 'x' }] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({ category: 'LLM_AUTH_ERROR', status: 401 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries server errors and returns the eventual answer', async () => {
    fetchMock
      .mockResolvedValueOnce(reply(503, 'unavailable'))
      .mockResolvedValueOnce(reply(200, completionBody('fixed')));

    const result = await createClient().complete({ messages: [{ role: 'user', content: 'x' }] });

    expect(result.text).toBe('fixed');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('gives up after the configured attempts', async () => {
    fetchMock.mockImplementation(async () => reply(500, 'boom'));

    const error = await createClient()
      .complete({ messages: [{ role: 'user', content: 'x' }] })
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ category: 'LLM_API_ERROR', status: 500 });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('falls back to the secondary model once when the primary is unknown', async () => {
    fetchMock
      .mockResolvedValueOnce(reply(404, 'model not found'))
      .mockResolvedValueOnce(reply(200, completionBody('from fallback')));

    const result = await createClient().complete({ messages: [{ role: 'user', content: 'x' }] });

    expect(result.text).toBe('from fallback');
    expect(sentBody(fetchMock, 0)).toMatchObject({ model: 'primary-model' });
    expect(sentBody(fetchMock, 1)).toMatchObject({ model: 'fallback-model' });
  });

  it('rejects a malformed response body', async () => {
    fetchMock.mockResolvedValueOnce(reply(200, JSON.stringify({ choices: [] })));

    const error = await createClient()
      .complete({ messages: [{ role: 'user', content: 'x' }] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({ category: 'LLM_API_ERROR' });
    expect(String(error)).toContain('Malformed chat completion response');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('exposes its model and status', () => {
    const client = createClient();
    expect(client.model).toBe('primary-model');
    expect(client.getStatus()).toMatchObject({
      model: 'primary-model',
      baseUrl: 'https://llm.test/v1/',
      circuitBreaker: { state: 'CLOSED', failureCount: 0 },
    });
  });
});
