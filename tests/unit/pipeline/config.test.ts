/**
 * Pipeline configuration loading and validation
 *
 * @module tests/unit/pipeline/config
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  loadPipelineConfig,
  validatePipelineConfig,
  parseBoolEnv,
} from '../../../src/services/pipeline/config.js';
import { loadLlmConfig } from '../../../src/services/llm/config.js';

const PIPELINE_ENV = [
  'OCR_MIN_TEXT_LENGTH',
  'OCR_MAX_RESCAN_ATTEMPTS',
  'OCR_TOKEN_BUFFER_RATIO',
  'MAX_DAILY_API_COST_USD',
  'OCR_PIPELINE_CONCURRENCY',
  'OCR_CLAIM_TTL_MINUTES',
  'OCR_MIN_CONFIDENCE_FOR_AUTO_APPROVAL',
  'OCR_ENABLE_HUMAN_REVIEW',
  'OCR_CORRECTION_SCOPE',
  'OCR_CLASSIFIER_ENABLED',
  'OCR_DOCUMENT_TYPE',
  'OCR_DATA_DIR',
  'LLM_API_KEY',
];

describe('pipeline configuration', () => {
  beforeEach(() => {
    for (const name of PIPELINE_ENV) {
      vi.stubEnv(name, '');
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('falls back to the documented defaults', () => {
    expect(loadPipelineConfig()).toEqual({
      minTextLength: 10,
      maxRescanAttempts: 3,
      tokenBufferRatio: 0.03,
      maxDailyCostUsd: 5,
      concurrency: 4,
      claimTtlMinutes: 30,
      minConfidenceForAutoApproval: 80,
      enableHumanReview: true,
      correctionScope: 'all',
      classifierEnabled: true,
      documentType: 'Legal Document',
      dataDir: './data',
    });
  });

  it('reads environment variables and lets overrides win', () => {
    vi.stubEnv('OCR_MAX_RESCAN_ATTEMPTS', '5');
    vi.stubEnv('MAX_DAILY_API_COST_USD', '12.5');
    vi.stubEnv('OCR_CORRECTION_SCOPE', 'flagged');
    vi.stubEnv('OCR_ENABLE_HUMAN_REVIEW', 'off');

    const config = loadPipelineConfig({ maxRescanAttempts: 2 });

    expect(config.maxRescanAttempts).toBe(2);
    expect(config.maxDailyCostUsd).toBe(12.5);
    expect(config.correctionScope).toBe('flagged');
    expect(config.enableHumanReview).toBe(false);
  });

  it('rejects malformed values', () => {
    vi.stubEnv('OCR_PIPELINE_CONCURRENCY', 'many');
    expect(() => loadPipelineConfig()).toThrow('Invalid numeric env var OCR_PIPELINE_CONCURRENCY: "many"');
    vi.stubEnv('OCR_PIPELINE_CONCURRENCY', '');

    vi.stubEnv('OCR_CORRECTION_SCOPE', 'some');
    expect(() => loadPipelineConfig()).toThrow();
  });

  it('parses boolean flags strictly', () => {
    vi.stubEnv('OCR_CLASSIFIER_ENABLED', 'YES');
    expect(parseBoolEnv('OCR_CLASSIFIER_ENABLED', false)).toBe(true);
    vi.stubEnv('OCR_CLASSIFIER_ENABLED', 'maybe');
    expect(() => parseBoolEnv('OCR_CLASSIFIER_ENABLED', false)).toThrow(
      'Invalid boolean env var OCR_CLASSIFIER_ENABLED: "maybe"'
    );
  });

  it('requires an API key only when a stage needs the LLM', () => {
    const noKey = loadLlmConfig({ apiKey: '' });

    const remote = validatePipelineConfig(loadPipelineConfig(), noKey);
    expect(remote.issues).toHaveLength(1);
    expect(remote.issues[0]).toMatch(/^LLM_API_KEY is not set/);

    const local = validatePipelineConfig(
      loadPipelineConfig({ classifierEnabled: false, correctionScope: 'off' }),
      noKey
    );
    expect(local.issues).toEqual([]);
  });

  it('warns about settings that change behaviour silently', () => {
    const { issues, warnings } = validatePipelineConfig(
      loadPipelineConfig({ maxRescanAttempts: 0, enableHumanReview: false, tokenBufferRatio: 0 }),
      loadLlmConfig({ apiKey: 'test-secret' })
    );
    expect(issues).toEqual([]);
    expect(warnings).toEqual([
      'OCR_MAX_RESCAN_ATTEMPTS is 0: low-quality pages fail without a rescan',
      'Human review is disabled: every correction is auto-approved',
      'OCR_TOKEN_BUFFER_RATIO is 0: cost estimates carry no safety margin',
    ]);
  });
});
