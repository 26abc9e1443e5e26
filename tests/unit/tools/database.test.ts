/**
 * Database management tools: create, list, select, stats
 *
 * @module tests/unit/tools/database
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import {
  handleDatabaseCreate,
  handleDatabaseList,
  handleDatabaseSelect,
  handleDatabaseStats,
  databaseTools,
} from '../../../src/tools/database.js';
import { resetState, updateConfig, state } from '../../../src/server/state.js';
import { createTempDir, cleanupTempDir, parseResponse } from '../helpers.js';

describe('database tools', () => {
  let dir: string;
  let storagePath: string;

  beforeEach(() => {
    dir = createTempDir('tools-db');
    storagePath = join(dir, 'databases');
    updateConfig({ defaultStoragePath: storagePath });
  });

  afterEach(() => {
    resetState();
    cleanupTempDir(dir);
  });

  it('exposes the four database tools', () => {
    expect(Object.keys(databaseTools)).toEqual(['ocr_db_create', 'ocr_db_list', 'ocr_db_select', 'ocr_db_stats']);
  });

  describe('ocr_db_create', () => {
    it('creates and selects the new database', async () => {
      const result = parseResponse(await handleDatabaseCreate({ name: 'batch-01', description: 'March intake' }));

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({
        name: 'batch-01',
        created: true,
        selected: true,
        description: 'March intake',
      });
      expect(state.currentDatabaseName).toBe('batch-01');
    });

    it('refuses a duplicate name', async () => {
      await handleDatabaseCreate({ name: 'batch-01' });
      const result = parseResponse(await handleDatabaseCreate({ name: 'batch-01' }));

      expect(result.success).toBe(false);
      expect(result.error?.category).toBe('DATABASE_ALREADY_EXISTS');
      expect(result.error?.message).toBe('Database "batch-01" already exists');
    });

    it('rejects names outside the allowed characters', async () => {
      const result = parseResponse(await handleDatabaseCreate({ name: 'batch 01!' }));

      expect(result.error?.category).toBe('VALIDATION_ERROR');
      expect(result.error?.message).toBe(
        'name: Database name must contain only alphanumeric characters, underscores, and hyphens'
      );
    });
  });

  describe('ocr_db_list', () => {
    it('lists every database and marks the selected one', async () => {
      await handleDatabaseCreate({ name: 'first' });
      await handleDatabaseCreate({ name: 'second' });

      const result = parseResponse(await handleDatabaseList({}));
      const data = result.data ?? {};
      const databases = data.databases as Array<{ name: string; selected: boolean; total_pages: number }>;

      expect(data).toMatchObject({ total: 2, returned: 2, offset: 0, limit: 50, has_more: false, storage_path: storagePath });
      expect(databases.map((d) => d.name).sort()).toEqual(['first', 'second']);
      expect(databases.find((d) => d.selected)?.name).toBe('second');
      expect(databases.every((d) => d.total_pages === 0)).toBe(true);
    });

    it('paginates', async () => {
      await handleDatabaseCreate({ name: 'first' });
      await handleDatabaseCreate({ name: 'second' });

      const result = parseResponse(await handleDatabaseList({ limit: 1 }));
      expect(result.data).toMatchObject({ total: 2, returned: 1, has_more: true });
    });
  });

  describe('ocr_db_select', () => {
    it('switches to an existing database and reports its pages', async () => {
      await handleDatabaseCreate({ name: 'first' });
      await handleDatabaseCreate({ name: 'second' });

      const result = parseResponse(await handleDatabaseSelect({ database_name: 'first' }));

      expect(result.data).toMatchObject({ name: 'first', selected: true, total_pages: 0, pages_needing_review: 0 });
      expect(state.currentDatabaseName).toBe('first');
    });

    it('reports an unknown database', async () => {
      const result = parseResponse(await handleDatabaseSelect({ database_name: 'missing' }));

      expect(result.error?.category).toBe('DATABASE_NOT_FOUND');
      expect(result.error?.message).toBe('Database "missing" not found');
    });
  });

  describe('ocr_db_stats', () => {
    it('requires a selected database', async () => {
      const result = parseResponse(await handleDatabaseStats({}));

      expect(result.success).toBe(false);
      expect(result.error?.category).toBe('DATABASE_NOT_SELECTED');
    });

    it('returns statistics for the selected database', async () => {
      await handleDatabaseCreate({ name: 'stats' });
      const result = parseResponse(await handleDatabaseStats({}));

      expect(result.data).toMatchObject({
        name: 'stats',
        total_pages: 0,
        pages_needing_review: 0,
        total_corrections: 0,
        total_spend_usd: 0,
      });
    });

    it('reads another database without switching to it', async () => {
      await handleDatabaseCreate({ name: 'other' });
      await handleDatabaseCreate({ name: 'current' });

      const result = parseResponse(await handleDatabaseStats({ database_name: 'other' }));

      expect(result.data).toMatchObject({ name: 'other', total_pages: 0 });
      expect(state.currentDatabaseName).toBe('current');
    });
  });
});
