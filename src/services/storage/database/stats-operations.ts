/**
 * Statistics operations for DatabaseService
 *
 * Handles database statistics retrieval and metadata timestamps.
 */

import Database from 'better-sqlite3';
import { statSync } from 'fs';
import { DatabaseStats } from './types.js';
import { sumSpendSince } from './ledger-operations.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Get database statistics
 *
 * @param db - Database connection
 * @param name - Database name
 * @param path - Database file path
 * @returns DatabaseStats - Live statistics from database
 */
export function getStats(db: Database.Database, name: string, path: string): DatabaseStats {
  const pageStats = db
    .prepare(
      `
    SELECT
      COUNT(*) FILTER (WHERE quality_status = 'unchecked') as unchecked,
      COUNT(*) FILTER (WHERE quality_status = 'acceptable') as acceptable,
      COUNT(*) FILTER (WHERE quality_status = 'needs_rescan') as needs_rescan,
      COUNT(*) FILTER (WHERE quality_status = 'needs_correction') as needs_correction,
      COUNT(*) FILTER (WHERE quality_status = 'failed') as failed,
      COUNT(*) FILTER (WHERE correction_status = 'none') as c_none,
      COUNT(*) FILTER (WHERE correction_status = 'completed') as c_completed,
      COUNT(*) FILTER (WHERE correction_status = 'review_required') as c_review_required,
      COUNT(*) FILTER (WHERE correction_status = 'unchanged') as c_unchanged,
      COUNT(*) FILTER (WHERE correction_status = 'reviewed') as c_reviewed,
      COUNT(*) FILTER (WHERE needs_manual_review = 1) as needs_review,
      COUNT(*) FILTER (WHERE claimed_by IS NOT NULL) as claimed,
      COALESCE(SUM(rescan_attempts), 0) as rescan_attempts,
      COUNT(*) as total
    FROM pages
  `
    )
    .get() as {
    unchecked: number;
    acceptable: number;
    needs_rescan: number;
    needs_correction: number;
    failed: number;
    c_none: number;
    c_completed: number;
    c_review_required: number;
    c_unchanged: number;
    c_reviewed: number;
    needs_review: number;
    claimed: number;
    rescan_attempts: number;
    total: number;
  };

  const queueStats = db
    .prepare(
      `
    SELECT
      COUNT(*) FILTER (WHERE status = 'queued') as queued,
      COUNT(*) FILTER (WHERE status = 'processing') as processing,
      COUNT(*) FILTER (WHERE status = 'completed') as completed,
      COUNT(*) FILTER (WHERE status = 'failed') as failed
    FROM reprocessing_queue
  `
    )
    .get() as { queued: number; processing: number; completed: number; failed: number };

  const correctionCount = db.prepare('SELECT COUNT(*) as n FROM ocr_corrections').get() as {
    n: number;
  };
  const totalSpend = db
    .prepare('SELECT COALESCE(SUM(cost_usd), 0) as total FROM cost_ledger')
    .get() as { total: number };

  let storageSize = 0;
  try {
    storageSize = statSync(path).size;
  } catch (error) {
    console.error(
      `[stats-operations] Failed to stat ${path}:`,
      error instanceof Error ? error.message : String(error)
    );
  }

  return {
    name,
    total_pages: pageStats.total,
    pages_by_quality_status: {
      unchecked: pageStats.unchecked,
      acceptable: pageStats.acceptable,
      needs_rescan: pageStats.needs_rescan,
      needs_correction: pageStats.needs_correction,
      failed: pageStats.failed,
    },
    pages_by_correction_status: {
      none: pageStats.c_none,
      completed: pageStats.c_completed,
      review_required: pageStats.c_review_required,
      unchanged: pageStats.c_unchanged,
      reviewed: pageStats.c_reviewed,
    },
    pages_needing_review: pageStats.needs_review,
    pages_claimed: pageStats.claimed,
    total_rescan_attempts: pageStats.rescan_attempts,
    total_corrections: correctionCount.n,
    queue_by_status: queueStats,
    spend_last_24h_usd: sumSpendSince(db, new Date(Date.now() - DAY_MS).toISOString()),
    total_spend_usd: totalSpend.total,
    storage_size_bytes: storageSize,
  };
}

/**
 * Update metadata last_modified_at timestamp
 */
export function updateMetadataModified(db: Database.Database): void {
  db.prepare('UPDATE database_metadata SET last_modified_at = ? WHERE id = 1').run(
    new Date().toISOString()
  );
}
