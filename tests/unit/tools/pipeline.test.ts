/**
 * Pipeline run and budget tools
 *
 * @module tests/unit/tools/pipeline
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { handlePipelineRun, handleBudgetStatus } from '../../../src/tools/pipeline.js';
import { handleDatabaseCreate } from '../../../src/tools/database.js';
import { handlePageRegister } from '../../../src/tools/pages.js';
import { requireDatabase, resetState, updateConfig } from '../../../src/server/state.js';
import {
  createTempDir,
  cleanupTempDir,
  imagePathFor,
  parseResponse,
  stubPipelineEnv,
  textPathFor,
  writePageFiles,
  RoutingLlm,
  ScriptedExtractor,
  GOOD_TEXT,
} from '../helpers.js';

const TYPO_TEXT = 'Depositon of Jane Roe, taken on March 3, 2021.';

describe('pipeline tools', () => {
  let dir: string;
  let dataDir: string;
  let llm: RoutingLlm;

  beforeEach(async () => {
    dir = createTempDir('tools-pipeline');
    dataDir = join(dir, 'data');
    llm = new RoutingLlm();
    updateConfig({
      defaultStoragePath: join(dir, 'databases'),
      pipelineDeps: { llm, extractor: new ScriptedExtractor() },
    });
    stubPipelineEnv(dataDir);
    await handleDatabaseCreate({ name: 'pipeline' });
  });

  afterEach(() => {
    resetState();
    vi.unstubAllEnvs();
    cleanupTempDir(dir);
  });

  async function register(pageId: string, text: string): Promise<void> {
    writePageFiles(dataDir, pageId, text);
    await handlePageRegister({ page_id: pageId, image_path: imagePathFor(pageId), text_path: textPathFor(pageId) });
  }

  describe('ocr_pipeline_run', () => {
    it('runs the pipeline and returns the summary', async () => {
      await register('p-typo', TYPO_TEXT);

      const result = parseResponse(await handlePipelineRun({}));

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({
        summary: {
          status: 'completed',
          stopReason: null,
          candidates: 1,
          counts: { claimed: 1, assessed: 1, corrected: 1, reviewRequired: 0 },
        },
        next_steps: [{ tool: 'ocr_db_stats' }],
      });
      expect(requireDatabase().db.requirePage('p-typo').correction_status).toBe('completed');
    });

    it('lists candidates without claiming them on a dry run', async () => {
      await register('p-good', GOOD_TEXT);
      await register('p-typo', TYPO_TEXT);

      const result = parseResponse(await handlePipelineRun({ dry_run: true }));
      const candidates = result.data?.candidates as Array<{ page_id: string; quality_status: string }>;

      expect(result.data).toMatchObject({ dry_run: true, total: 2 });
      expect(candidates.map((c) => c.page_id).sort()).toEqual(['p-good', 'p-typo']);
      expect(llm.requests).toHaveLength(0);
      expect(requireDatabase().db.requirePage('p-good').claimed_by).toBeNull();
    });

    it('refuses to run without an API key while the classifier is on', async () => {
      stubPipelineEnv(dataDir, '');

      const result = parseResponse(await handlePipelineRun({}));

      expect(result.error?.category).toBe('CONFIGURATION_ERROR');
      expect(result.error?.message).toMatch(/^LLM_API_KEY is not set/);
    });

    it('runs locally without a key when every LLM stage is off', async () => {
      stubPipelineEnv(dataDir, '');
      vi.stubEnv('OCR_CLASSIFIER_ENABLED', 'false');
      vi.stubEnv('OCR_CORRECTION_SCOPE', 'off');
      await register('p-good', GOOD_TEXT);

      const result = parseResponse(await handlePipelineRun({}));

      expect(result.data).toMatchObject({ summary: { status: 'completed', counts: { assessed: 1 } } });
      expect(llm.requests).toHaveLength(0);
    });

    it('rejects malformed arguments', async () => {
      const result = parseResponse(await handlePipelineRun({ page_ids: [] }));
      expect(result.error?.category).toBe('VALIDATION_ERROR');
    });

    it('needs a selected database', async () => {
      resetState();
      const result = parseResponse(await handlePipelineRun({}));
      expect(result.error?.category).toBe('DATABASE_NOT_SELECTED');
    });
  });

  describe('ocr_budget_status', () => {
    it('reports rolling spend against the ceiling', async () => {
      await register('p-typo', TYPO_TEXT);
      await handlePipelineRun({});

      const result = parseResponse(await handleBudgetStatus({}));
      const data = result.data ?? {};

      // classify, correct and assess at 0.00021 each
      expect(data.spentUsd).toBeCloseTo(0.00063, 10);
      expect(data.remainingUsd).toBeCloseTo(5 - 0.00063, 10);
      expect(data).toMatchObject({ ceilingUsd: 5, billed_calls: 3 });
      expect(data.recent_calls).toHaveLength(3);
    });

    it('starts at zero', async () => {
      const result = parseResponse(await handleBudgetStatus({}));
      expect(result.data).toMatchObject({ spentUsd: 0, ceilingUsd: 5, remainingUsd: 5, billed_calls: 0 });
    });
  });
});
