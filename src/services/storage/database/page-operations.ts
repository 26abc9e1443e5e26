/**
 * Page operations for DatabaseService
 *
 * Each write touches only the columns owned by one component: the
 * assessment columns (Quality Assessor), the text and attempt columns
 * (Rescan Engine), the correction columns (Correction Engine) and the
 * claim columns (pipeline workers).
 */

import Database from 'better-sqlite3';
import {
  Page,
  NewPage,
  QualityStatus,
  CorrectionStatus,
  assertQualityTransition,
} from '../../../models/page.js';
import { DatabaseError, DatabaseErrorCode, ListPagesOptions, PageRow } from './types.js';
import { isUniqueViolation } from './helpers.js';
import { rowToPage } from './converters.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Verdict written by the Quality Assessor
 */
export interface AssessmentWrite {
  quality_score: number;
  quality_status: QualityStatus;
  quality_reasons: string[];
  /** text_revision the verdict was computed for */
  assessed_revision: number;
}

/**
 * New canonical text recorded alongside an accepted rescan attempt
 */
export interface TextReplacement {
  raw_text_hash: string;
  raw_text_length: number;
}

/**
 * Candidate selection for a pipeline run
 */
export interface CandidateQuery {
  /** Quality statuses whose pages may still be corrected */
  correctableStatuses: readonly QualityStatus[];
  pageIds?: readonly string[];
  limit?: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CRUD
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Insert a new page in `unchecked` state
 *
 * @throws DatabaseError PAGE_ALREADY_EXISTS when page_id is taken
 */
export function insertPage(db: Database.Database, page: NewPage): Page {
  const now = new Date().toISOString();
  try {
    db.prepare(
      `
      INSERT INTO pages (
        page_id, image_path, text_path, raw_text_hash, raw_text_length,
        created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
    `
    ).run(
      page.page_id,
      page.image_path,
      page.text_path,
      page.raw_text_hash,
      page.raw_text_length,
      now,
      now
    );
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new DatabaseError(
        `Page "${page.page_id}" already exists`,
        DatabaseErrorCode.PAGE_ALREADY_EXISTS,
        error
      );
    }
    throw error;
  }
  return requirePage(db, page.page_id);
}

/**
 * Get a page by ID
 */
export function getPage(db: Database.Database, pageId: string): Page | null {
  const row = db.prepare('SELECT * FROM pages WHERE page_id = ?').get(pageId) as
    | PageRow
    | undefined;
  return row ? rowToPage(row) : null;
}

/**
 * Get a page by ID
 * @throws DatabaseError PAGE_NOT_FOUND
 */
export function requirePage(db: Database.Database, pageId: string): Page {
  const page = getPage(db, pageId);
  if (!page) {
    throw new DatabaseError(`Page "${pageId}" not found`, DatabaseErrorCode.PAGE_NOT_FOUND);
  }
  return page;
}

/**
 * List pages with optional filters, oldest first
 */
export function listPages(db: Database.Database, options: ListPagesOptions = {}): Page[] {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (options.quality_status) {
    conditions.push('quality_status = ?');
    params.push(options.quality_status);
  }
  if (options.correction_status) {
    conditions.push('correction_status = ?');
    params.push(options.correction_status);
  }
  if (options.needs_manual_review !== undefined) {
    conditions.push('needs_manual_review = ?');
    params.push(options.needs_manual_review ? 1 : 0);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  params.push(options.limit ?? 50, options.offset ?? 0);

  const rows = db
    .prepare(`SELECT * FROM pages ${where} ORDER BY created_at ASC, page_id ASC LIMIT ? OFFSET ?`)
    .all(...params) as PageRow[];
  return rows.map(rowToPage);
}

/**
 * Count pages matching the same filters as listPages
 */
export function countPages(db: Database.Database, options: ListPagesOptions = {}): number {
  const conditions: string[] = [];
  const params: unknown[] = [];
  if (options.quality_status) {
    conditions.push('quality_status = ?');
    params.push(options.quality_status);
  }
  if (options.correction_status) {
    conditions.push('correction_status = ?');
    params.push(options.correction_status);
  }
  if (options.needs_manual_review !== undefined) {
    conditions.push('needs_manual_review = ?');
    params.push(options.needs_manual_review ? 1 : 0);
  }
  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const row = db.prepare(`SELECT COUNT(*) as n FROM pages ${where}`).get(...params) as {
    n: number;
  };
  return row.n;
}

/**
 * Select the pages a pipeline run still has work for. Failed pages are
 * never candidates.
 */
export function listCandidatePages(db: Database.Database, query: CandidateQuery): Page[] {
  const params: unknown[] = [];
  const eligibility = [
    "quality_status = 'unchecked'",
    "quality_status = 'needs_rescan'",
    'assessed_revision IS NULL',
    'assessed_revision < text_revision',
  ];
  if (query.correctableStatuses.length > 0) {
    const placeholders = query.correctableStatuses.map(() => '?').join(', ');
    eligibility.push(`(correction_status = 'none' AND quality_status IN (${placeholders}))`);
    params.push(...query.correctableStatuses);
  }

  let sql = `SELECT * FROM pages WHERE quality_status != 'failed' AND (${eligibility.join(' OR ')})`;
  if (query.pageIds && query.pageIds.length > 0) {
    sql += ` AND page_id IN (${query.pageIds.map(() => '?').join(', ')})`;
    params.push(...query.pageIds);
  }
  sql += ' ORDER BY created_at ASC, page_id ASC';
  if (query.limit !== undefined) {
    sql += ' LIMIT ?';
    params.push(query.limit);
  }

  const rows = db.prepare(sql).all(...params) as PageRow[];
  return rows.map(rowToPage);
}

// ═══════════════════════════════════════════════════════════════════════════════
// QUALITY ASSESSOR COLUMNS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Record a verdict. The status write must be in the transition table.
 *
 * @throws IllegalTransitionError when the status move is not allowed
 */
export function writeAssessment(
  db: Database.Database,
  pageId: string,
  assessment: AssessmentWrite
): Page {
  return db.transaction(() => {
    const current = requirePage(db, pageId);
    assertQualityTransition(current.quality_status, assessment.quality_status, pageId);
    db.prepare(
      `
      UPDATE pages SET quality_score = ?, quality_status = ?, quality_reasons = ?,
        assessed_revision = ?, updated_at = ?
      WHERE page_id = ?
    `
    ).run(
      assessment.quality_score,
      assessment.quality_status,
      JSON.stringify(assessment.quality_reasons),
      assessment.assessed_revision,
      new Date().toISOString(),
      pageId
    );
    return requirePage(db, pageId);
  })();
}

// ═══════════════════════════════════════════════════════════════════════════════
// RESCAN ENGINE COLUMNS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Advance the attempt counter, optionally recording replacement text.
 * Compare-and-set on the expected attempt count so one logical attempt is
 * never recorded twice. Callers that also move the text file run this
 * inside their own transaction.
 *
 * @throws DatabaseError INVALID_STATE when the counter moved underneath
 */
export function recordRescanAttempt(
  db: Database.Database,
  pageId: string,
  expectedAttempts: number,
  replacement: TextReplacement | null
): void {
  const now = new Date().toISOString();
  const result = replacement
    ? db
        .prepare(
          `
        UPDATE pages SET rescan_attempts = rescan_attempts + 1, last_attempt_at = ?,
          raw_text_hash = ?, raw_text_length = ?, text_revision = text_revision + 1,
          updated_at = ?
        WHERE page_id = ? AND rescan_attempts = ?
      `
        )
        .run(
          now,
          replacement.raw_text_hash,
          replacement.raw_text_length,
          now,
          pageId,
          expectedAttempts
        )
    : db
        .prepare(
          `
        UPDATE pages SET rescan_attempts = rescan_attempts + 1, last_attempt_at = ?, updated_at = ?
        WHERE page_id = ? AND rescan_attempts = ?
      `
        )
        .run(now, now, pageId, expectedAttempts);

  if (result.changes !== 1) {
    throw new DatabaseError(
      `Rescan attempt ${String(expectedAttempts + 1)} for page "${pageId}" conflicts with the stored counter`,
      DatabaseErrorCode.INVALID_STATE
    );
  }
}

/**
 * Terminal failure after exhausted rescans
 */
export function markPageFailed(db: Database.Database, pageId: string): Page {
  return db.transaction(() => {
    const current = requirePage(db, pageId);
    assertQualityTransition(current.quality_status, 'failed', pageId);
    db.prepare(
      `UPDATE pages SET quality_status = 'failed', needs_manual_review = 1, updated_at = ? WHERE page_id = ?`
    ).run(new Date().toISOString(), pageId);
    return requirePage(db, pageId);
  })();
}

// ═══════════════════════════════════════════════════════════════════════════════
// CORRECTION ENGINE COLUMNS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Update the correction columns of a page
 */
export function updateCorrectionState(
  db: Database.Database,
  pageId: string,
  update: {
    correction_status: CorrectionStatus;
    latest_correction_id?: string;
    needs_manual_review?: boolean;
  }
): void {
  const now = new Date().toISOString();
  const sets = ['correction_status = ?', 'last_attempt_at = ?', 'updated_at = ?'];
  const params: unknown[] = [update.correction_status, now, now];
  if (update.latest_correction_id !== undefined) {
    sets.push('latest_correction_id = ?');
    params.push(update.latest_correction_id);
  }
  if (update.needs_manual_review !== undefined) {
    sets.push('needs_manual_review = ?');
    params.push(update.needs_manual_review ? 1 : 0);
  }
  params.push(pageId);
  const result = db.prepare(`UPDATE pages SET ${sets.join(', ')} WHERE page_id = ?`).run(...params);
  if (result.changes === 0) {
    throw new DatabaseError(`Page "${pageId}" not found`, DatabaseErrorCode.PAGE_NOT_FOUND);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MANUAL RESET
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Move a failed page back to `unchecked`, clearing attempts, review flag
 * and assessment. This is the only way out of `failed`.
 *
 * @throws DatabaseError INVALID_STATE when the page is not failed
 */
export function resetPage(db: Database.Database, pageId: string): Page {
  return db.transaction(() => {
    const current = requirePage(db, pageId);
    if (current.quality_status !== 'failed') {
      throw new DatabaseError(
        `Page "${pageId}" is ${current.quality_status}; only failed pages can be reset`,
        DatabaseErrorCode.INVALID_STATE
      );
    }
    db.prepare(
      `
      UPDATE pages SET quality_status = 'unchecked', quality_score = NULL, quality_reasons = '[]',
        assessed_revision = NULL, rescan_attempts = 0, needs_manual_review = 0, updated_at = ?
      WHERE page_id = ?
    `
    ).run(new Date().toISOString(), pageId);
    return requirePage(db, pageId);
  })();
}

// ═══════════════════════════════════════════════════════════════════════════════
// CLAIMS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Compare-and-set claim. A claim older than `staleBefore` may be taken over.
 *
 * @returns true if this worker now holds the page
 */
export function claimPage(
  db: Database.Database,
  pageId: string,
  workerId: string,
  staleBefore: string
): boolean {
  const result = db
    .prepare(
      `
      UPDATE pages SET claimed_by = ?, claimed_at = ?
      WHERE page_id = ? AND (claimed_by IS NULL OR claimed_at < ?)
    `
    )
    .run(workerId, new Date().toISOString(), pageId, staleBefore);
  return result.changes === 1;
}

/**
 * Release a claim held by this worker. A claim taken over by another
 * worker is left alone.
 */
export function releasePage(db: Database.Database, pageId: string, workerId: string): boolean {
  const result = db
    .prepare(
      'UPDATE pages SET claimed_by = NULL, claimed_at = NULL WHERE page_id = ? AND claimed_by = ?'
    )
    .run(pageId, workerId);
  return result.changes === 1;
}
