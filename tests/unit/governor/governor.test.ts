/**
 * Cost & Rate Governor
 *
 * @module tests/unit/governor/governor
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CostGovernor } from '../../../src/services/governor/governor.js';
import { RunSignal } from '../../../src/services/governor/run-signal.js';
import { countTokens, estimateTokens } from '../../../src/services/governor/tokens.js';
import { RateLimitError } from '../../../src/services/llm/errors.js';
import {
  createTestStore,
  createGovernor,
  TEST_GOVERNOR_CONFIG,
  DEFAULT_USAGE,
  type TestStore,
} from '../helpers.js';

const PROMPT = 'Correct the OCR errors in this page.';
const TEXT = 'Deposition of Jane Roe, taken on March 3, 2021.';

describe('token estimation', () => {
  it('counts nothing for empty text', () => {
    expect(countTokens('')).toBe(0);
  });

  it('budgets the prompt plus twice the text, with the buffer', () => {
    const raw = countTokens(PROMPT) + 2 * countTokens(TEXT);
    expect(estimateTokens(PROMPT, TEXT, 0)).toBe(raw);
    expect(estimateTokens(PROMPT, TEXT, 0.03)).toBe(Math.ceil(raw * 1.03));
    expect(estimateTokens(PROMPT, TEXT, 0.03)).toBeGreaterThanOrEqual(raw);
  });
});

describe('RunSignal', () => {
  it('keeps the first stop reason', () => {
    const signal = new RunSignal();
    expect(signal.stopped).toBe(false);

    signal.stop('budget_exceeded', { pageId: 'p-001' });
    signal.stop('daily_limit', { pageId: 'p-002' });

    expect(signal.reason).toBe('budget_exceeded');
    expect(signal.context.pageId).toBe('p-001');
  });
});

describe('CostGovernor', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore('governor');
  });

  afterEach(() => {
    store.cleanup();
  });

  it('prices estimates at the input rate', () => {
    const governor = createGovernor(store.db);
    expect(governor.estimateCost(1_000_000)).toBeCloseTo(0.7, 10);
    expect(governor.estimateCost(0)).toBe(0);
  });

  it('prices a completed call from reported usage, else from the estimate', () => {
    const governor = createGovernor(store.db);
    const base = { text: 'ok', model: 'test-model', processingTimeMs: 1 };
    expect(governor.actualCost({ ...base, usage: DEFAULT_USAGE }, 999)).toBeCloseTo(0.00021, 10);
    expect(governor.actualCost({ ...base, usage: null }, 1000)).toBeCloseTo(0.0007, 10);
  });

  it('recordCall appends a ledger entry and returns its cost', () => {
    const governor = createGovernor(store.db);
    const cost = governor.recordCall(
      null,
      'correct',
      { text: 'ok', model: 'test-model', usage: null, processingTimeMs: 1 },
      400
    );

    const [entry] = store.db.listLedgerEntries();
    expect(entry).toMatchObject({
      page_id: null,
      operation: 'correct',
      model: 'test-model',
      input_tokens: 400,
      output_tokens: 0,
    });
    expect(entry.cost_usd).toBeCloseTo(cost, 12);
  });

  it('preflight passes with the estimate while under the ceiling', () => {
    const governor = createGovernor(store.db);
    const result = governor.preflight(PROMPT, TEXT, 'p-001');
    expect(result).toEqual({
      ok: true,
      estimatedTokens: estimateTokens(PROMPT, TEXT, TEST_GOVERNOR_CONFIG.tokenBufferRatio),
      estimatedCostUsd: governor.estimateCost(
        estimateTokens(PROMPT, TEXT, TEST_GOVERNOR_CONFIG.tokenBufferRatio)
      ),
    });
  });

  it('preflight stops the run when the estimate would cross the ceiling', () => {
    store.db.insertLedgerEntry({
      page_id: null,
      operation: 'classify',
      model: 'test-model',
      input_tokens: 1,
      output_tokens: 1,
      cost_usd: 4.99999,
    });
    const governor = createGovernor(store.db);

    expect(governor.preflight(PROMPT, TEXT, 'p-007')).toEqual({ ok: false, reason: 'budget_exceeded' });
    expect(governor.signal.reason).toBe('budget_exceeded');
    expect(governor.signal.context).toMatchObject({ pageId: 'p-007', ceilingUsd: 5 });
    expect(governor.signal.context.spentUsd).toBeCloseTo(4.99999, 10);

    expect(governor.preflight(PROMPT, TEXT, 'p-008')).toEqual({ ok: false, reason: 'stopped' });
  });

  it('aggregates spend from the ledger so separate governors agree', () => {
    const first = createGovernor(store.db);
    first.recordSpend({
      page_id: null,
      operation: 'assess',
      model: 'test-model',
      input_tokens: 1,
      output_tokens: 1,
      cost_usd: 1.25,
    });

    const second = createGovernor(store.db);
    expect(second.getBudgetStatus()).toMatchObject({ ceilingUsd: 5 });
    expect(second.getBudgetStatus().spentUsd).toBeCloseTo(1.25, 10);
    expect(second.getBudgetStatus().remainingUsd).toBeCloseTo(3.75, 10);
  });

  it('ignores spend older than the rolling window', () => {
    store.db.insertLedgerEntry({
      page_id: null,
      operation: 'classify',
      model: 'test-model',
      input_tokens: 1,
      output_tokens: 1,
      cost_usd: 5,
    });
    const tomorrow = () => Date.now() + 25 * 60 * 60 * 1000;
    const governor = new CostGovernor(store.db, TEST_GOVERNOR_CONFIG, new RunSignal(), tomorrow);

    expect(governor.spentInWindow()).toBe(0);
    expect(governor.wouldExceedBudget(1)).toBe(false);
  });

  it('a daily limit stops everything, any other 429 defers one page', () => {
    const governor = createGovernor(store.db);

    expect(governor.handleRateLimit(new RateLimitError('slow down', false, 3), { pageId: 'p-001' })).toBe(
      'defer_page'
    );
    expect(governor.signal.stopped).toBe(false);

    expect(
      governor.handleRateLimit(new RateLimitError('daily quota exhausted', true, null), { pageId: 'p-002' })
    ).toBe('stop_all');
    expect(governor.signal.reason).toBe('daily_limit');
    expect(governor.signal.context).toMatchObject({ pageId: 'p-002', detail: 'daily quota exhausted' });
  });
});
