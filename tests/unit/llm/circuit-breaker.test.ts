/**
 * Circuit breaker and server-error classification
 *
 * @module tests/unit/llm/circuit-breaker
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  CircuitBreaker,
  CircuitBreakerOpenError,
  CircuitState,
  isServerError,
} from '../../../src/services/llm/circuit-breaker.js';
import { LlmError, RateLimitError } from '../../../src/services/llm/errors.js';

const serverFailure = () => Promise.reject(new LlmError('LLM API error 502', 'LLM_API_ERROR', 502));
const clientFailure = () => Promise.reject(new LlmError('bad request', 'LLM_API_ERROR', 400));
const ok = () => Promise.resolve('ok');

async function fail(breaker: CircuitBreaker, fn: () => Promise<string>, times: number): Promise<void> {
  for (let i = 0; i < times; i++) {
    await expect(breaker.execute(fn)).rejects.toThrow();
  }
}

describe('isServerError', () => {
  it('classifies provider errors by status and category', () => {
    expect(isServerError(new LlmError('x', 'LLM_API_ERROR', 503))).toBe(true);
    expect(isServerError(new LlmError('x', 'LLM_API_ERROR'))).toBe(true);
    expect(isServerError(new LlmError('x', 'LLM_TIMEOUT'))).toBe(true);
    expect(isServerError(new LlmError('x', 'LLM_API_ERROR', 400))).toBe(false);
    expect(isServerError(new LlmError('x', 'LLM_AUTH_ERROR', 401))).toBe(false);
    expect(isServerError(new RateLimitError('x', false, null))).toBe(false);
  });

  it('recognises network failures in plain errors', () => {
    expect(isServerError(new Error('socket hang up'))).toBe(true);
    expect(isServerError(new Error('upstream', { cause: new Error('ECONNRESET') }))).toBe(true);
    expect(isServerError(new Error('got 502 from proxy'))).toBe(true);
    expect(isServerError(new Error('bad input'))).toBe(false);
    expect(isServerError('oops')).toBe(false);
  });
});

describe('CircuitBreaker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('opens after the failure threshold and rejects without calling', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, recoveryTimeMs: 1000 });
    await fail(breaker, serverFailure, 2);
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    const fn = vi.fn(ok);
    await expect(breaker.execute(fn)).rejects.toBeInstanceOf(CircuitBreakerOpenError);
    expect(fn).not.toHaveBeenCalled();
  });

  it('does not count client errors', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2 });
    await fail(breaker, clientFailure, 5);
    expect(breaker.getStatus()).toMatchObject({ state: CircuitState.CLOSED, failureCount: 0 });
  });

  it('a success in the closed state clears the failure count', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 3 });
    await fail(breaker, serverFailure, 2);
    await breaker.execute(ok);
    await fail(breaker, serverFailure, 2);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('recovers through half-open after the recovery time', async () => {
    vi.useFakeTimers();
    const breaker = new CircuitBreaker({
      failureThreshold: 1,
      recoveryTimeMs: 1000,
      halfOpenSuccessThreshold: 2,
    });
    await fail(breaker, serverFailure, 1);
    expect(breaker.isOpen()).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    await breaker.execute(ok);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
    await breaker.execute(ok);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('a failure while half-open reopens with a doubled recovery time', async () => {
    vi.useFakeTimers();
    const breaker = new CircuitBreaker({ failureThreshold: 1, recoveryTimeMs: 1000 });
    await fail(breaker, serverFailure, 1);
    vi.advanceTimersByTime(1000);

    await fail(breaker, serverFailure, 1);

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.getRecoveryTimeMs()).toBe(2000);
    vi.advanceTimersByTime(1000);
    expect(breaker.getState()).toBe(CircuitState.OPEN);
  });

  it('reset closes the circuit', async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 });
    await fail(breaker, serverFailure, 1);
    breaker.reset();
    expect(breaker.getStatus()).toEqual({
      state: CircuitState.CLOSED,
      failureCount: 0,
      lastFailureTime: null,
      timeToRecovery: null,
    });
  });
});
