/**
 * LLM Configuration
 *
 * OpenAI-compatible chat completion endpoint used by the remote quality
 * classifier and the two-round correction workflow.
 */

import { z } from 'zod';

export const DEFAULT_LLM_BASE_URL = 'https://api.venice.ai/api/v1';

export const LLM_MODELS = {
  PRIMARY: 'llama-3.3-70b',
  FALLBACK: 'qwen-2.5-qwq-32b',
} as const;

export const LlmConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_LLM_BASE_URL),

  apiKey: z.string().default(''),

  model: z.string().min(1).default(LLM_MODELS.PRIMARY),

  fallbackModel: z.string().min(1).default(LLM_MODELS.FALLBACK),

  temperature: z.number().min(0).max(2).default(0.1),

  maxTokensPerRequest: z.number().int().positive().default(8000),

  requestTimeoutMs: z.number().int().positive().default(120_000),

  // Window limits for the client-side limiter
  maxRequestsPerMinute: z.number().int().positive().default(60),
  maxTokensPerMinute: z.number().int().positive().default(200_000),

  // USD per 1M tokens
  inputCostPerMTok: z.number().nonnegative().default(0.7),
  outputCostPerMTok: z.number().nonnegative().default(2.8),

  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(3),
      baseDelayMs: z.number().int().nonnegative().default(1000),
      maxDelayMs: z.number().int().positive().default(30000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().positive().default(5),
      recoveryTimeMs: z.number().int().positive().default(60000),
    })
    .default({}),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export type LlmConfigOverrides = Partial<
  Omit<LlmConfig, 'retry' | 'circuitBreaker'> & {
    retry: Partial<LlmConfig['retry']>;
    circuitBreaker: Partial<LlmConfig['circuitBreaker']>;
  }
>;

export function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

export function parseFloatEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

/**
 * Load LLM configuration from environment variables.
 *
 * Environment variables:
 *   LLM_BASE_URL                OpenAI-compatible API root (default: https://api.venice.ai/api/v1)
 *   LLM_API_KEY                 Bearer token
 *   LLM_MODEL                   Primary model (default: llama-3.3-70b)
 *   LLM_FALLBACK_MODEL          Model used when the primary is unavailable
 *   LLM_TEMPERATURE             Generation temperature (default: 0.1)
 *   LLM_MAX_TOKENS_PER_REQUEST  Completion token cap (default: 8000)
 *   LLM_REQUEST_TIMEOUT_MS      Per-request timeout (default: 120000)
 *   LLM_MAX_RPM, LLM_MAX_TPM    Client-side window limits
 *   LLM_INPUT_COST_PER_MTOK,
 *   LLM_OUTPUT_COST_PER_MTOK    Pricing in USD per million tokens
 */
export function loadLlmConfig(overrides?: LlmConfigOverrides): LlmConfig {
  const envConfig = {
    baseUrl: process.env.LLM_BASE_URL || DEFAULT_LLM_BASE_URL,
    apiKey: process.env.LLM_API_KEY ?? '',
    model: process.env.LLM_MODEL || LLM_MODELS.PRIMARY,
    fallbackModel: process.env.LLM_FALLBACK_MODEL || LLM_MODELS.FALLBACK,
    temperature: parseFloatEnv('LLM_TEMPERATURE', 0.1),
    maxTokensPerRequest: parseIntEnv('LLM_MAX_TOKENS_PER_REQUEST', 8000),
    requestTimeoutMs: parseIntEnv('LLM_REQUEST_TIMEOUT_MS', 120_000),
    maxRequestsPerMinute: parseIntEnv('LLM_MAX_RPM', 60),
    maxTokensPerMinute: parseIntEnv('LLM_MAX_TPM', 200_000),
    inputCostPerMTok: parseFloatEnv('LLM_INPUT_COST_PER_MTOK', 0.7),
    outputCostPerMTok: parseFloatEnv('LLM_OUTPUT_COST_PER_MTOK', 2.8),
    retry: {
      maxAttempts: parseIntEnv('LLM_RETRY_MAX_ATTEMPTS', 3),
      baseDelayMs: parseIntEnv('LLM_RETRY_BASE_DELAY_MS', 1000),
      maxDelayMs: parseIntEnv('LLM_RETRY_MAX_DELAY_MS', 30000),
    },
    circuitBreaker: {
      failureThreshold: parseIntEnv('LLM_CIRCUIT_FAILURE_THRESHOLD', 5),
      recoveryTimeMs: parseIntEnv('LLM_CIRCUIT_RECOVERY_MS', 60000),
    },
  };

  return LlmConfigSchema.parse({
    ...envConfig,
    ...overrides,
    retry: { ...envConfig.retry, ...overrides?.retry },
    circuitBreaker: { ...envConfig.circuitBreaker, ...overrides?.circuitBreaker },
  });
}
