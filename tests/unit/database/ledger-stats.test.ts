/**
 * Cost ledger aggregation, database statistics and lifecycle
 *
 * @module tests/unit/database/ledger-stats
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { join } from 'path';
import { DatabaseService, DatabaseErrorCode } from '../../../src/services/storage/database/index.js';
import { HIGH_PRIORITY } from '../../../src/models/queue.js';
import {
  createTestStore,
  registerPage,
  createTempDir,
  cleanupTempDir,
  GOOD_TEXT,
  type TestStore,
} from '../helpers.js';

describe('cost ledger', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore('ledger');
  });

  afterEach(() => {
    store.cleanup();
  });

  it('sums spend at or after the window start', () => {
    const before = new Date(Date.now() - 1000).toISOString();
    store.db.insertLedgerEntry({
      page_id: null,
      operation: 'classify',
      model: 'test-model',
      input_tokens: 100,
      output_tokens: 2,
      cost_usd: 0.25,
    });
    store.db.insertLedgerEntry({
      page_id: null,
      operation: 'correct',
      model: 'test-model',
      input_tokens: 1000,
      output_tokens: 900,
      cost_usd: 0.5,
    });

    expect(store.db.sumSpendSince(before)).toBeCloseTo(0.75, 10);
    expect(store.db.sumSpendSince(new Date(Date.now() + 60_000).toISOString())).toBe(0);
    expect(store.db.countLedgerEntries()).toBe(2);
  });

  it('lists entries newest first, filtered by page', () => {
    registerPage(store, 'p-001', GOOD_TEXT);
    store.db.insertLedgerEntry({
      page_id: 'p-001',
      operation: 'correct',
      model: 'test-model',
      input_tokens: 10,
      output_tokens: 10,
      cost_usd: 0.1,
    });
    store.db.insertLedgerEntry({
      page_id: 'p-001',
      operation: 'assess',
      model: 'test-model',
      input_tokens: 10,
      output_tokens: 10,
      cost_usd: 0.1,
    });
    store.db.insertLedgerEntry({
      page_id: null,
      operation: 'classify',
      model: 'test-model',
      input_tokens: 10,
      output_tokens: 1,
      cost_usd: 0.01,
    });

    const forPage = store.db.listLedgerEntries({ pageId: 'p-001' });
    expect(forPage.map((e) => e.operation)).toEqual(['assess', 'correct']);
    expect(store.db.listLedgerEntries({ limit: 1 })[0].operation).toBe('classify');
  });
});

describe('getStats', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore('stats');
  });

  afterEach(() => {
    store.cleanup();
  });

  it('counts pages, corrections, queue entries and spend', () => {
    registerPage(store, 'p-001', GOOD_TEXT);
    registerPage(store, 'p-002', 'xx');
    store.db.writeAssessment('p-002', {
      quality_score: 0,
      quality_status: 'needs_rescan',
      quality_reasons: ['TOO_SHORT'],
      assessed_revision: 0,
    });
    store.db.recordRescanAttempt('p-002', 0, null);
    store.db.markPageFailed('p-002');
    store.db.enqueuePage('p-002', 'rescan_exhausted', HIGH_PRIORITY);
    store.db.insertLedgerEntry({
      page_id: null,
      operation: 'classify',
      model: 'test-model',
      input_tokens: 1,
      output_tokens: 1,
      cost_usd: 0.5,
    });

    const stats = store.db.getStats();
    expect(stats.name).toBe(store.name);
    expect(stats.total_pages).toBe(2);
    expect(stats.pages_by_quality_status).toEqual({
      unchecked: 1,
      acceptable: 0,
      needs_rescan: 0,
      needs_correction: 0,
      failed: 1,
    });
    expect(stats.pages_by_correction_status.none).toBe(2);
    expect(stats.pages_needing_review).toBe(1);
    expect(stats.total_rescan_attempts).toBe(1);
    expect(stats.total_corrections).toBe(0);
    expect(stats.queue_by_status).toEqual({ queued: 1, processing: 0, completed: 0, failed: 0 });
    expect(stats.spend_last_24h_usd).toBeCloseTo(0.5, 10);
    expect(stats.total_spend_usd).toBeCloseTo(0.5, 10);
    expect(stats.storage_size_bytes).toBeGreaterThan(0);
  });
});

describe('DatabaseService lifecycle', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir('lifecycle');
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('creates, lists, reopens and deletes a store', () => {
    const db = DatabaseService.create('alpha', 'first batch', dir);
    db.close();

    expect(DatabaseService.exists('alpha', dir)).toBe(true);
    const listed = DatabaseService.list(dir);
    expect(listed.map((d) => d.name)).toEqual(['alpha']);
    expect(listed[0].total_pages).toBe(0);

    const reopened = DatabaseService.open('alpha', dir);
    expect(reopened.getName()).toBe('alpha');
    reopened.close();

    DatabaseService.delete('alpha', dir);
    expect(existsSync(join(dir, 'alpha.db'))).toBe(false);
  });

  it('refuses invalid names and duplicates', () => {
    expect(() => DatabaseService.create('bad name!', undefined, dir)).toThrow(/Invalid database name/);
    DatabaseService.create('alpha', undefined, dir).close();
    try {
      DatabaseService.create('alpha', undefined, dir);
      expect.fail('expected DATABASE_ALREADY_EXISTS');
    } catch (error) {
      expect(error).toMatchObject({ code: DatabaseErrorCode.DATABASE_ALREADY_EXISTS });
    }
  });

  it('open throws DATABASE_NOT_FOUND for a missing store', () => {
    expect(() => DatabaseService.open('missing', dir)).toThrow(/Database "missing" not found/);
    expect(DatabaseService.exists('bad name!', dir)).toBe(false);
  });
});
