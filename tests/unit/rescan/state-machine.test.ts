/**
 * Rescan state machine and strategy table
 *
 * @module tests/unit/rescan/state-machine
 */

import { describe, it, expect } from 'vitest';
import {
  nextRescanState,
  rescanStateFromPage,
  type RescanState,
} from '../../../src/services/rescan/state-machine.js';
import { RESCAN_STRATEGIES, strategyForAttempt } from '../../../src/services/rescan/strategies.js';
import { IllegalTransitionError, type Page } from '../../../src/models/page.js';

const evaluate = (maxAttempts: number) => ({ type: 'evaluate' as const, maxAttempts });

function pageWith(overrides: Partial<Page>): Page {
  return {
    page_id: 'p-001',
    image_path: 'images/p-001.png',
    text_path: 'text/p-001.txt',
    raw_text_hash: 'sha256:' + '0'.repeat(64),
    raw_text_length: 0,
    text_revision: 0,
    quality_score: null,
    quality_status: 'unchecked',
    quality_reasons: [],
    assessed_revision: null,
    rescan_attempts: 0,
    last_attempt_at: null,
    needs_manual_review: false,
    correction_status: 'none',
    latest_correction_id: null,
    claimed_by: null,
    claimed_at: null,
    created_at: '2026-01-01T00:00:00.000Z',
    updated_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('nextRescanState', () => {
  it('walks a page from unchecked through a rescan to acceptable', () => {
    let state: RescanState = { kind: 'unchecked' };
    state = nextRescanState(state, { type: 'score', score: 0 });
    expect(state).toEqual({ kind: 'scored', score: 0, attempts: 0 });

    state = nextRescanState(state, evaluate(3));
    expect(state).toEqual({ kind: 'rescan_pending', attempts: 0 });

    state = nextRescanState(state, { type: 'attempt_completed', accepted: true });
    expect(state).toEqual({ kind: 'rescored', attempts: 1, accepted: true });

    state = nextRescanState(state, { type: 'score', score: 100 });
    expect(state).toEqual({ kind: 'scored', score: 100, attempts: 1 });

    expect(nextRescanState(state, evaluate(3))).toEqual({ kind: 'acceptable' });
  });

  it('fails once the attempts reach the cap', () => {
    expect(nextRescanState({ kind: 'scored', score: 0, attempts: 3 }, evaluate(3))).toEqual({
      kind: 'failed',
    });
    expect(nextRescanState({ kind: 'scored', score: 0, attempts: 0 }, evaluate(0))).toEqual({
      kind: 'failed',
    });
  });

  it('refuses events that do not apply', () => {
    expect(() => nextRescanState({ kind: 'unchecked' }, evaluate(3))).toThrow(IllegalTransitionError);
    expect(() =>
      nextRescanState({ kind: 'rescan_pending', attempts: 0 }, { type: 'score', score: 0 })
    ).toThrow('Illegal quality transition rescan_pending -> score');
  });

  it('treats acceptable and failed as terminal', () => {
    expect(() => nextRescanState({ kind: 'acceptable' }, evaluate(3))).toThrow(IllegalTransitionError);
    expect(() => nextRescanState({ kind: 'failed' }, { type: 'score', score: 100 })).toThrow(
      IllegalTransitionError
    );
  });
});

describe('rescanStateFromPage', () => {
  it('projects stored statuses onto the machine', () => {
    expect(rescanStateFromPage(pageWith({}))).toEqual({ kind: 'unchecked' });
    expect(
      rescanStateFromPage(pageWith({ quality_status: 'needs_rescan', quality_score: 0, rescan_attempts: 2 }))
    ).toEqual({ kind: 'scored', score: 0, attempts: 2 });
    expect(rescanStateFromPage(pageWith({ quality_status: 'needs_correction' }))).toEqual({
      kind: 'acceptable',
    });
    expect(rescanStateFromPage(pageWith({ quality_status: 'failed' }))).toEqual({ kind: 'failed' });
  });
});

describe('strategyForAttempt', () => {
  it('indexes the table by attempt and reuses the last entry', () => {
    expect(strategyForAttempt(0).name).toBe('permissive_segmentation');
    expect(strategyForAttempt(1).name).toBe('orientation_sweep');
    expect(strategyForAttempt(2).name).toBe('alternate_engine');
    expect(strategyForAttempt(7).name).toBe('alternate_engine');
    expect(strategyForAttempt(-1).name).toBe('permissive_segmentation');
  });

  it('gives every strategy at least one pass', () => {
    for (const strategy of RESCAN_STRATEGIES) {
      expect(strategy.passes.length).toBeGreaterThan(0);
    }
  });
});
