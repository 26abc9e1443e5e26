/**
 * Schema Verification Functions
 *
 * Contains functions to verify database schema integrity.
 *
 * @module migrations/verification
 */

import type Database from 'better-sqlite3';
import { REQUIRED_TABLES, REQUIRED_INDEXES } from './schema-definitions.js';

// Columns most likely to be missing after a partial migration
const REQUIRED_COLUMNS: Record<string, string[]> = {
  pages: [
    'page_id',
    'text_path',
    'raw_text_hash',
    'text_revision',
    'quality_status',
    'assessed_revision',
    'rescan_attempts',
    'correction_status',
    'claimed_by',
  ],
  ocr_corrections: ['correction_id', 'page_id', 'original_text', 'corrected_text', 'review_decision'],
  reprocessing_queue: ['queue_id', 'page_id', 'status', 'priority'],
  cost_ledger: ['entry_id', 'cost_usd', 'created_at'],
};

/**
 * Verify all required tables, indexes, and columns exist
 * @param db - Database instance
 * @returns Object with verification results
 */
export function verifySchema(db: Database.Database): {
  valid: boolean;
  missingTables: string[];
  missingIndexes: string[];
  missingColumns: string[];
} {
  const missingTables: string[] = [];
  const missingIndexes: string[] = [];
  const missingColumns: string[] = [];

  for (const tableName of REQUIRED_TABLES) {
    const exists = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`)
      .get(tableName);
    if (!exists) {
      missingTables.push(tableName);
    }
  }

  for (const indexName of REQUIRED_INDEXES) {
    const exists = db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'index' AND name = ?`)
      .get(indexName);
    if (!exists) {
      missingIndexes.push(indexName);
    }
  }

  for (const [table, requiredCols] of Object.entries(REQUIRED_COLUMNS)) {
    if (missingTables.includes(table)) {
      continue;
    }
    const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
    const columnNames = new Set(columns.map((c) => c.name));
    for (const col of requiredCols) {
      if (!columnNames.has(col)) {
        missingColumns.push(`${table}.${col}`);
      }
    }
  }

  return {
    valid: missingTables.length === 0 && missingIndexes.length === 0 && missingColumns.length === 0,
    missingTables,
    missingIndexes,
    missingColumns,
  };
}
