/**
 * Pipeline runner and page processor: convergence, stops and claims
 *
 * @module tests/unit/pipeline/runner
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import { createPipeline, type PipelineDeps } from '../../../src/services/pipeline/factory.js';
import { loadPipelineConfig, type PipelineConfig } from '../../../src/services/pipeline/config.js';
import { loadLlmConfig } from '../../../src/services/llm/config.js';
import { RateLimitError } from '../../../src/services/llm/errors.js';
import { EXHAUSTED_REASON } from '../../../src/services/rescan/engine.js';
import {
  createTestStore,
  registerPage,
  RoutingLlm,
  ScriptedExtractor,
  GOOD_TEXT,
  type TestStore,
} from '../helpers.js';

const TYPO_TEXT = 'Depositon of Jane Roe, taken on March 3, 2021.';

describe('PipelineRunner', () => {
  let store: TestStore;
  let llm: RoutingLlm;
  let extractor: ScriptedExtractor;

  beforeEach(() => {
    store = createTestStore('runner');
    llm = new RoutingLlm();
    extractor = new ScriptedExtractor();
  });

  afterEach(() => {
    store.cleanup();
  });

  function build(overrides: Partial<PipelineConfig> = {}, deps: PipelineDeps = {}) {
    const config = loadPipelineConfig({ dataDir: store.dataDir, concurrency: 2, ...overrides });
    return createPipeline(store.db, config, loadLlmConfig({ apiKey: 'test-secret' }), {
      llm,
      extractor,
      ...deps,
    });
  }

  function spend(costUsd: number): void {
    store.db.insertLedgerEntry({
      page_id: null,
      operation: 'classify',
      model: 'test-model',
      input_tokens: 1,
      output_tokens: 1,
      cost_usd: costUsd,
    });
  }

  it('converges a batch: rescan, re-score, correct and leave clean pages unchanged', async () => {
    registerPage(store, 'p-zero', '0 0 00 0');
    registerPage(store, 'p-good', GOOD_TEXT);
    registerPage(store, 'p-typo', TYPO_TEXT);
    extractor = new ScriptedExtractor([GOOD_TEXT]);

    const summary = await build().runner.run();

    expect(summary.status).toBe('completed');
    expect(summary.stopReason).toBeNull();
    expect(summary.candidates).toBe(3);
    expect(summary.counts).toEqual({
      claimed: 3,
      skippedClaimed: 0,
      assessed: 4,
      rescanAttempts: 1,
      failed: 0,
      corrected: 1,
      reviewRequired: 0,
      unchanged: 2,
      deferred: 0,
      errors: 0,
    });
    // 3 classifier calls, 3 Round-1 calls, 1 Round-2 call at 0.00021 each
    expect(summary.spentUsd).toBeCloseTo(0.00147, 10);
    expect(summary.inFlightPageId).toBeNull();

    const zero = store.db.requirePage('p-zero');
    expect(zero).toMatchObject({
      quality_status: 'acceptable',
      quality_score: 100,
      rescan_attempts: 1,
      text_revision: 1,
      assessed_revision: 1,
      correction_status: 'unchanged',
      claimed_by: null,
    });
    expect(store.textStore.read(zero)).toBe(GOOD_TEXT);

    const typo = store.db.requirePage('p-typo');
    expect(typo.correction_status).toBe('completed');
    expect(store.db.getLatestCorrection('p-typo')?.corrected_text).toBe(
      'Deposition of Jane Roe, taken on March 3, 2021.'
    );
    expect(extractor.calls).toHaveLength(1);
  });

  it('a second run finds nothing left to do', async () => {
    registerPage(store, 'p-good', GOOD_TEXT);
    const pipeline = build();
    await pipeline.runner.run();
    const calls = llm.requests.length;

    const again = await pipeline.runner.run();

    expect(again.candidates).toBe(0);
    expect(again.counts.claimed).toBe(0);
    expect(llm.requests).toHaveLength(calls);
  });

  it('fails a page whose rescans never improve and queues it', async () => {
    registerPage(store, 'p-short', 'xx\n');
    extractor = new ScriptedExtractor(['xx', 'x', '']);

    const summary = await build().runner.run();

    expect(summary.counts).toMatchObject({ assessed: 1, rescanAttempts: 3, failed: 1, corrected: 0 });
    const page = store.db.requirePage('p-short');
    expect(page).toMatchObject({ quality_status: 'failed', needs_manual_review: true, rescan_attempts: 3 });
    expect(store.db.listQueue()).toMatchObject([{ page_id: 'p-short', reason: EXHAUSTED_REASON }]);
    expect(llm.requests).toHaveLength(0);
  });

  it('stops the run when the budget is spent and reports the page in flight', async () => {
    spend(5);
    registerPage(store, 'p-001', GOOD_TEXT);
    registerPage(store, 'p-002', GOOD_TEXT);

    const summary = await build({ concurrency: 1 }).runner.run();

    expect(summary.status).toBe('stopped');
    expect(summary.stopReason).toBe('budget_exceeded');
    expect(summary.inFlightPageId).toBe('p-001');
    expect(summary.counts).toMatchObject({ claimed: 1, deferred: 1, assessed: 0 });
    expect(summary.budget).toMatchObject({ ceilingUsd: 5, remainingUsd: 0 });
    expect(llm.requests).toHaveLength(0);
    expect(store.db.requirePage('p-001').quality_status).toBe('unchecked');
    expect(store.db.requirePage('p-002').claimed_by).toBeNull();
  });

  it('stops on a daily limit without touching the remaining pages', async () => {
    llm.classifierReply = new RateLimitError('daily quota exceeded', true, null);
    registerPage(store, 'p-001', GOOD_TEXT);
    registerPage(store, 'p-002', GOOD_TEXT);

    const summary = await build({ concurrency: 1 }).runner.run();

    expect(summary).toMatchObject({ status: 'stopped', stopReason: 'daily_limit', inFlightPageId: 'p-001' });
    expect(summary.counts.claimed).toBe(1);
    expect(llm.requests).toHaveLength(1);
    expect(store.db.requirePage('p-002').quality_status).toBe('unchecked');
  });

  it('defers a rate-limited page and keeps going', async () => {
    llm.classifierReply = new RateLimitError('slow down', false, 2);
    registerPage(store, 'p-001', GOOD_TEXT);
    registerPage(store, 'p-002', GOOD_TEXT);

    const summary = await build({ concurrency: 1 }).runner.run();

    expect(summary.status).toBe('completed');
    expect(summary.counts).toMatchObject({ claimed: 2, deferred: 2, assessed: 0 });
  });

  it('skips pages claimed by another live run and takes over stale claims', async () => {
    registerPage(store, 'p-001', GOOD_TEXT);
    registerPage(store, 'p-002', GOOD_TEXT);
    store.db.claimPage('p-002', 'other-run:0', new Date(Date.now() - 60_000).toISOString());

    const first = await build().runner.run();
    expect(first.counts).toMatchObject({ claimed: 1, skippedClaimed: 1 });
    expect(store.db.requirePage('p-002')).toMatchObject({ quality_status: 'unchecked', claimed_by: 'other-run:0' });

    const later = () => Date.now() + 31 * 60_000;
    const second = await build({}, { now: later }).runner.run();
    expect(second.counts).toMatchObject({ claimed: 1, skippedClaimed: 0 });
    expect(store.db.requirePage('p-002')).toMatchObject({ quality_status: 'acceptable', claimed_by: null });
  });

  it('two overlapping runs never process the same page', async () => {
    const pageIds = ['p-001', 'p-002', 'p-003', 'p-004', 'p-005', 'p-006'];
    for (const pageId of pageIds) {
      registerPage(store, pageId, '0 0 00 0');
    }
    extractor = new ScriptedExtractor(pageIds.map(() => GOOD_TEXT));

    const [a, b] = await Promise.all([
      build({ concurrency: 3 }).runner.run(),
      build({ concurrency: 3 }).runner.run(),
    ]);

    expect(a.candidates).toBe(6);
    expect(b.candidates).toBe(6);
    expect(a.counts.claimed + a.counts.skippedClaimed).toBe(6);
    expect(b.counts.claimed + b.counts.skippedClaimed).toBe(6);
    expect(a.counts.skippedClaimed + b.counts.skippedClaimed).toBeGreaterThan(0);
    expect(a.counts.rescanAttempts + b.counts.rescanAttempts).toBe(6);
    expect(extractor.calls).toHaveLength(6);
    expect(new Set(extractor.calls.map((call) => call.imagePath)).size).toBe(6);
    for (const pageId of pageIds) {
      expect(store.db.requirePage(pageId)).toMatchObject({
        quality_status: 'acceptable',
        rescan_attempts: 1,
        text_revision: 1,
        claimed_by: null,
      });
    }
  });

  it('skips the correction stage when asked', async () => {
    registerPage(store, 'p-typo', TYPO_TEXT);

    const summary = await build().runner.run({ correction: false });

    expect(summary.counts.corrected).toBe(0);
    expect(llm.countRequests('correct')).toBe(0);
    expect(store.db.requirePage('p-typo').correction_status).toBe('none');
  });

  it('limits candidates by page id and count', () => {
    registerPage(store, 'p-001', GOOD_TEXT);
    registerPage(store, 'p-002', GOOD_TEXT);
    registerPage(store, 'p-003', GOOD_TEXT);
    const { runner } = build();

    expect(runner.listCandidates({ pageIds: ['p-003', 'p-001'] }).map((p) => p.page_id)).toEqual([
      'p-001',
      'p-003',
    ]);
    expect(runner.listCandidates({ limit: 2 })).toHaveLength(2);
  });

  it('defers a page whose text was changed outside the pipeline', async () => {
    const page = registerPage(store, 'p-001', GOOD_TEXT);
    writeFileSync(join(store.dataDir, page.text_path), 'edited by hand', 'utf-8');

    const summary = await build().runner.run();

    expect(summary.counts).toMatchObject({ claimed: 1, deferred: 1, assessed: 0, errors: 0 });
    expect(store.db.requirePage('p-001').quality_status).toBe('unchecked');
  });

  it('runs locally with the classifier and correction switched off', async () => {
    registerPage(store, 'p-typo', TYPO_TEXT);

    const summary = await build({ classifierEnabled: false, correctionScope: 'off' }).runner.run();

    expect(summary.counts).toMatchObject({ assessed: 1, corrected: 0 });
    expect(llm.requests).toHaveLength(0);
    expect(store.db.requirePage('p-typo').quality_status).toBe('acceptable');
  });
});
