/**
 * LLM Service Module
 */

export {
  LlmClient,
  type LlmCompletion,
  type ChatMessage,
  type CompletionRequest,
  type CompletionResult,
  type TokenUsage,
} from './client.js';
export { loadLlmConfig, LlmConfigSchema, LLM_MODELS, type LlmConfig, type LlmConfigOverrides } from './config.js';
export { CircuitBreaker, CircuitBreakerOpenError, CircuitState, isServerError } from './circuit-breaker.js';
export { LlmRateLimiter } from './rate-limiter.js';
export { LlmError, RateLimitError, isDailyLimitBody, type LlmErrorCategory } from './errors.js';
