/**
 * Circuit Breaker for the LLM endpoint
 *
 * Only server-side failures (HTTP 5xx, timeouts, network errors) trip the
 * breaker. Rate limits are handled by the Cost & Rate Governor and never
 * count as failures here, nor do client errors (auth, bad request).
 */

import { LlmError, RateLimitError } from './errors.js';

export enum CircuitState {
  CLOSED = 'CLOSED', // Normal operation
  OPEN = 'OPEN', // Failing, reject requests
  HALF_OPEN = 'HALF_OPEN', // Testing recovery
}

/**
 * Determine whether an error represents a server-side / transient failure
 * that should trip the circuit breaker.
 */
export function isServerError(error: unknown): boolean {
  if (error instanceof RateLimitError) {
    return false;
  }
  if (error instanceof LlmError) {
    if (error.category === 'LLM_TIMEOUT') return true;
    if (error.category === 'LLM_AUTH_ERROR') return false;
    return error.status === undefined || error.status >= 500;
  }
  if (!(error instanceof Error)) {
    return false;
  }

  const cause: unknown = error.cause;
  const causeMsg = cause instanceof Error ? cause.message : '';
  const combined = `${error.message} ${causeMsg}`;

  if (/\b(500|502|503|504)\b/.test(combined)) {
    return true;
  }

  return /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|socket hang up|fetch failed/i.test(combined);
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60000,
  halfOpenSuccessThreshold: 3, // Successes needed to close
};

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount: number = 0;
  private successCount: number = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;
  /** Consecutive trips, for exponential recovery backoff */
  private consecutiveTrips: number = 0;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Recovery time doubles with each consecutive trip, capped at 16x.
   */
  getRecoveryTimeMs(): number {
    const tripExponent = Math.max(0, this.consecutiveTrips - 1);
    const multiplier = Math.pow(2, Math.min(tripExponent, 4));
    return this.config.recoveryTimeMs * multiplier;
  }

  /**
   * Execute a function with circuit breaker protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === CircuitState.OPEN) {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isServerError(error)) {
        this.recordFailure();
      } else {
        console.error(
          `[CircuitBreaker] Non-server error (not counted): ${error instanceof Error ? error.message : String(error)}`
        );
      }
      throw error;
    }
  }

  private checkRecovery(): void {
    if (this.state === CircuitState.OPEN && this.lastFailureTime !== null) {
      const elapsed = Date.now() - this.lastFailureTime;
      const recoveryTime = this.getRecoveryTimeMs();
      if (elapsed >= recoveryTime) {
        console.error(
          `[CircuitBreaker] Transitioning from OPEN to HALF_OPEN (recovery: ${recoveryTime}ms, trip #${this.consecutiveTrips})`
        );
        this.state = CircuitState.HALF_OPEN;
        this.successCount = 0;
      }
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        console.error('[CircuitBreaker] Recovery confirmed, transitioning to CLOSED');
        this.state = CircuitState.CLOSED;
        this.failureCount = 0;
        this.successCount = 0;
        this.lastFailureTime = null;
        this.consecutiveTrips = 0;
      }
    } else if (this.state === CircuitState.CLOSED) {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    console.error(
      `[CircuitBreaker] Failure recorded (${this.failureCount}/${this.config.failureThreshold})`
    );

    if (this.state === CircuitState.HALF_OPEN) {
      // Any failure in HALF_OPEN reopens the circuit
      this.consecutiveTrips++;
      this.state = CircuitState.OPEN;
      this.successCount = 0;
    } else if (this.failureCount >= this.config.failureThreshold) {
      this.consecutiveTrips++;
      console.error(
        `[CircuitBreaker] Threshold reached, transitioning to OPEN (trip #${this.consecutiveTrips}, recovery: ${this.getRecoveryTimeMs()}ms)`
      );
      this.state = CircuitState.OPEN;
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    const elapsed = Date.now() - this.lastFailureTime;
    return Math.max(0, this.getRecoveryTimeMs() - elapsed);
  }

  isOpen(): boolean {
    this.checkRecovery();
    return this.state === CircuitState.OPEN;
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === CircuitState.OPEN ? this.getTimeToRecovery() : null,
    };
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.lastFailureTime = null;
    this.consecutiveTrips = 0;
  }
}

/**
 * Error thrown when circuit breaker is open
 */
export class CircuitBreakerOpenError extends Error {
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}
