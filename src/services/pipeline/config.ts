/**
 * Pipeline Configuration
 *
 * Thresholds, caps and switches for one convergence run. LLM endpoint and
 * pricing live in the LLM config.
 */

import { z } from 'zod';
import { parseFloatEnv, parseIntEnv, type LlmConfig } from '../llm/config.js';

export const CORRECTION_SCOPES = ['all', 'flagged', 'off'] as const;

export type CorrectionScope = (typeof CORRECTION_SCOPES)[number];

export const PipelineConfigSchema = z.object({
  minTextLength: z.number().int().nonnegative().default(10),

  maxRescanAttempts: z.number().int().nonnegative().default(3),

  tokenBufferRatio: z.number().min(0).max(1).default(0.03),

  // Rolling 24h ceiling
  maxDailyCostUsd: z.number().nonnegative().default(5),

  concurrency: z.number().int().min(1).max(64).default(4),

  claimTtlMinutes: z.number().int().positive().default(30),

  minConfidenceForAutoApproval: z.number().int().min(1).max(100).default(80),

  enableHumanReview: z.boolean().default(true),

  // all: acceptable and needs_correction pages; flagged: needs_correction only
  correctionScope: z.enum(CORRECTION_SCOPES).default('all'),

  classifierEnabled: z.boolean().default(true),

  documentType: z.string().min(1).default('Legal Document'),

  dataDir: z.string().min(1).default('./data'),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export function parseBoolEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`Invalid boolean env var ${name}: "${raw}"`);
}

/**
 * Load pipeline configuration from environment variables.
 *
 * Environment variables:
 *   OCR_MIN_TEXT_LENGTH, OCR_MAX_RESCAN_ATTEMPTS, OCR_TOKEN_BUFFER_RATIO,
 *   MAX_DAILY_API_COST_USD, OCR_PIPELINE_CONCURRENCY, OCR_CLAIM_TTL_MINUTES,
 *   OCR_MIN_CONFIDENCE_FOR_AUTO_APPROVAL, OCR_ENABLE_HUMAN_REVIEW,
 *   OCR_CORRECTION_SCOPE (all | flagged | off), OCR_CLASSIFIER_ENABLED,
 *   OCR_DOCUMENT_TYPE, OCR_DATA_DIR
 */
export function loadPipelineConfig(overrides?: Partial<PipelineConfig>): PipelineConfig {
  const envConfig = {
    minTextLength: parseIntEnv('OCR_MIN_TEXT_LENGTH', 10),
    maxRescanAttempts: parseIntEnv('OCR_MAX_RESCAN_ATTEMPTS', 3),
    tokenBufferRatio: parseFloatEnv('OCR_TOKEN_BUFFER_RATIO', 0.03),
    maxDailyCostUsd: parseFloatEnv('MAX_DAILY_API_COST_USD', 5),
    concurrency: parseIntEnv('OCR_PIPELINE_CONCURRENCY', 4),
    claimTtlMinutes: parseIntEnv('OCR_CLAIM_TTL_MINUTES', 30),
    minConfidenceForAutoApproval: parseIntEnv('OCR_MIN_CONFIDENCE_FOR_AUTO_APPROVAL', 80),
    enableHumanReview: parseBoolEnv('OCR_ENABLE_HUMAN_REVIEW', true),
    correctionScope: process.env.OCR_CORRECTION_SCOPE || 'all',
    classifierEnabled: parseBoolEnv('OCR_CLASSIFIER_ENABLED', true),
    documentType: process.env.OCR_DOCUMENT_TYPE || 'Legal Document',
    dataDir: process.env.OCR_DATA_DIR || './data',
  };

  return PipelineConfigSchema.parse({ ...envConfig, ...overrides });
}

export interface ConfigValidation {
  /** Problems that prevent a run */
  issues: string[];
  warnings: string[];
}

export function validatePipelineConfig(config: PipelineConfig, llm: LlmConfig): ConfigValidation {
  const issues: string[] = [];
  const warnings: string[] = [];

  const needsLlm = config.classifierEnabled || config.correctionScope !== 'off';
  if (needsLlm && llm.apiKey.length === 0) {
    issues.push(
      'LLM_API_KEY is not set but the classifier or correction is enabled ' +
        '(set OCR_CLASSIFIER_ENABLED=false and OCR_CORRECTION_SCOPE=off to run locally)'
    );
  }
  if (config.maxDailyCostUsd === 0 && needsLlm) {
    warnings.push('MAX_DAILY_API_COST_USD is 0: every billed call will stop the run');
  }
  if (config.maxRescanAttempts === 0) {
    warnings.push('OCR_MAX_RESCAN_ATTEMPTS is 0: low-quality pages fail without a rescan');
  }
  if (!config.enableHumanReview && config.correctionScope !== 'off') {
    warnings.push('Human review is disabled: every correction is auto-approved');
  }
  if (config.tokenBufferRatio === 0) {
    warnings.push('OCR_TOKEN_BUFFER_RATIO is 0: cost estimates carry no safety margin');
  }

  return { issues, warnings };
}
