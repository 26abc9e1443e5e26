/**
 * Reprocessing queue operations for DatabaseService
 *
 * The partial unique index idx_reprocessing_queue_active guarantees at most
 * one queued/processing entry per page; enqueue returns that entry instead
 * of creating a second one.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import {
  QueueEntry,
  QueueStatus,
  ACTIVE_QUEUE_STATUSES,
  QUEUE_TRANSITIONS,
} from '../../../models/queue.js';
import { DatabaseError, DatabaseErrorCode, QueueRow } from './types.js';
import { isUniqueViolation, runWithPageCheck } from './helpers.js';
import { rowToQueueEntry } from './converters.js';

export interface EnqueueResult {
  entry: QueueEntry;
  /** false when an active entry already existed */
  created: boolean;
}

export interface ListQueueOptions {
  status?: QueueStatus;
  limit?: number;
  offset?: number;
}

const ACTIVE_STATUS_PLACEHOLDERS = ACTIVE_QUEUE_STATUSES.map(() => '?').join(', ');

function getActiveEntry(db: Database.Database, pageId: string): QueueEntry | null {
  const row = db
    .prepare(
      `SELECT * FROM reprocessing_queue WHERE page_id = ? AND status IN (${ACTIVE_STATUS_PLACEHOLDERS})`
    )
    .get(pageId, ...ACTIVE_QUEUE_STATUSES) as QueueRow | undefined;
  return row ? rowToQueueEntry(row) : null;
}

/**
 * Idempotent enqueue
 *
 * @throws DatabaseError PAGE_NOT_FOUND
 */
export function enqueuePage(
  db: Database.Database,
  pageId: string,
  reason: string,
  priority: number
): EnqueueResult {
  return db.transaction((): EnqueueResult => {
    const existing = getActiveEntry(db, pageId);
    if (existing) {
      return { entry: existing, created: false };
    }

    const queueId = uuidv4();
    try {
      runWithPageCheck(
        db.prepare(
          `
          INSERT INTO reprocessing_queue (queue_id, page_id, reason, priority, status, created_at)
          VALUES (?, ?, ?, ?, 'queued', ?)
        `
        ),
        [queueId, pageId, reason, priority, new Date().toISOString()],
        pageId
      );
    } catch (error) {
      // Another connection won the race between the read and the insert
      if (isUniqueViolation(error)) {
        const winner = getActiveEntry(db, pageId);
        if (winner) return { entry: winner, created: false };
      }
      throw error;
    }
    return { entry: requireQueueEntry(db, queueId), created: true };
  })();
}

export function getQueueEntry(db: Database.Database, queueId: string): QueueEntry | null {
  const row = db.prepare('SELECT * FROM reprocessing_queue WHERE queue_id = ?').get(queueId) as
    | QueueRow
    | undefined;
  return row ? rowToQueueEntry(row) : null;
}

/**
 * @throws DatabaseError QUEUE_ENTRY_NOT_FOUND
 */
export function requireQueueEntry(db: Database.Database, queueId: string): QueueEntry {
  const entry = getQueueEntry(db, queueId);
  if (!entry) {
    throw new DatabaseError(
      `Queue entry "${queueId}" not found`,
      DatabaseErrorCode.QUEUE_ENTRY_NOT_FOUND
    );
  }
  return entry;
}

/**
 * List queue entries, most urgent first
 */
export function listQueue(db: Database.Database, options: ListQueueOptions = {}): QueueEntry[] {
  const params: unknown[] = [];
  let where = '';
  if (options.status) {
    where = 'WHERE status = ?';
    params.push(options.status);
  }
  params.push(options.limit ?? 50, options.offset ?? 0);
  const rows = db
    .prepare(
      `SELECT * FROM reprocessing_queue ${where} ORDER BY priority DESC, created_at ASC, rowid ASC LIMIT ? OFFSET ?`
    )
    .all(...params) as QueueRow[];
  return rows.map(rowToQueueEntry);
}

/**
 * Move an entry along QUEUE_TRANSITIONS
 *
 * @throws DatabaseError INVALID_STATE for a move outside the table
 */
function transitionQueueEntry(
  db: Database.Database,
  queueId: string,
  to: QueueStatus,
  errorMessage: string | null = null
): QueueEntry {
  return db.transaction(() => {
    const entry = requireQueueEntry(db, queueId);
    if (!QUEUE_TRANSITIONS[entry.status].includes(to)) {
      throw new DatabaseError(
        `Queue entry "${queueId}" cannot move from ${entry.status} to ${to}`,
        DatabaseErrorCode.INVALID_STATE
      );
    }

    const now = new Date().toISOString();
    try {
      switch (to) {
        case 'processing':
          db.prepare(
            "UPDATE reprocessing_queue SET status = 'processing', started_at = ? WHERE queue_id = ?"
          ).run(now, queueId);
          break;
        case 'completed':
          db.prepare(
            "UPDATE reprocessing_queue SET status = 'completed', completed_at = ?, error_message = NULL WHERE queue_id = ?"
          ).run(now, queueId);
          break;
        case 'failed':
          db.prepare(
            "UPDATE reprocessing_queue SET status = 'failed', completed_at = ?, error_message = ? WHERE queue_id = ?"
          ).run(now, errorMessage, queueId);
          break;
        case 'queued':
          db.prepare(
            "UPDATE reprocessing_queue SET status = 'queued', started_at = NULL, completed_at = NULL, error_message = NULL WHERE queue_id = ?"
          ).run(queueId);
          break;
      }
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DatabaseError(
          `Page "${entry.page_id}" already has an active queue entry`,
          DatabaseErrorCode.INVALID_STATE,
          error
        );
      }
      throw error;
    }
    return requireQueueEntry(db, queueId);
  })();
}

/**
 * Claim the most urgent queued entry for an external worker
 */
export function claimNextQueueEntry(db: Database.Database): QueueEntry | null {
  return db.transaction(() => {
    const row = db
      .prepare(
        "SELECT * FROM reprocessing_queue WHERE status = 'queued' ORDER BY priority DESC, created_at ASC, rowid ASC LIMIT 1"
      )
      .get() as QueueRow | undefined;
    if (!row) return null;
    return transitionQueueEntry(db, row.queue_id, 'processing');
  })();
}

export function completeQueueEntry(db: Database.Database, queueId: string): QueueEntry {
  return transitionQueueEntry(db, queueId, 'completed');
}

export function failQueueEntry(
  db: Database.Database,
  queueId: string,
  errorMessage: string
): QueueEntry {
  return transitionQueueEntry(db, queueId, 'failed', errorMessage);
}

/**
 * Manual retry path: failed -> queued
 */
export function retryQueueEntry(db: Database.Database, queueId: string): QueueEntry {
  return transitionQueueEntry(db, queueId, 'queued');
}
