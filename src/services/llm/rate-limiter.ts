/**
 * Client-side request limiter for the LLM endpoint
 * Keeps requests per minute and tokens per minute under the configured window.
 */

export interface RateLimiterStatus {
  requestsRemaining: number;
  tokensRemaining: number;
  resetInMs: number;
}

export class LlmRateLimiter {
  private requestCount: number = 0;
  private tokenCount: number = 0;
  private windowStart: number = Date.now();
  private readonly windowMs: number = 60000;

  /**
   * Serializes acquire() so concurrent workers cannot all pass the check
   * before any of them increments the counters.
   */
  private acquireQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly maxRPM: number,
    private readonly maxTPM: number
  ) {}

  private checkWindow(): void {
    const now = Date.now();
    if (now - this.windowStart >= this.windowMs) {
      this.requestCount = 0;
      this.tokenCount = 0;
      this.windowStart = now;
    }
  }

  /**
   * Wait until a request of `estimatedTokens` fits in the current window
   */
  async acquire(estimatedTokens: number = 1000): Promise<void> {
    const prev = this.acquireQueue;
    let release: () => void = () => undefined;
    this.acquireQueue = new Promise<void>((r) => {
      release = r;
    });

    try {
      await prev;
      await this.doAcquire(estimatedTokens);
    } finally {
      release();
    }
  }

  private async doAcquire(estimatedTokens: number): Promise<void> {
    this.checkWindow();

    if (this.requestCount >= this.maxRPM || this.tokenCount + estimatedTokens > this.maxTPM) {
      const waitTime = this.windowMs - (Date.now() - this.windowStart);
      if (waitTime > 0) {
        console.error(`[RateLimiter] Window full, waiting ${waitTime}ms`);
        await new Promise((resolve) => setTimeout(resolve, waitTime));
        this.requestCount = 0;
        this.tokenCount = 0;
        this.windowStart = Date.now();
      }
    }

    this.requestCount++;
    this.tokenCount += estimatedTokens;
  }

  /**
   * Adjust the window once the provider reports actual usage
   */
  recordUsage(estimatedTokens: number, actualTokens: number): void {
    this.tokenCount = Math.max(0, this.tokenCount + actualTokens - estimatedTokens);
  }

  getStatus(): RateLimiterStatus {
    this.checkWindow();
    return {
      requestsRemaining: Math.max(0, this.maxRPM - this.requestCount),
      tokensRemaining: Math.max(0, this.maxTPM - this.tokenCount),
      resetInMs: Math.max(0, this.windowMs - (Date.now() - this.windowStart)),
    };
  }

  reset(): void {
    this.requestCount = 0;
    this.tokenCount = 0;
    this.windowStart = Date.now();
  }
}
