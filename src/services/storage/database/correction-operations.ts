/**
 * Correction record operations for DatabaseService
 *
 * Records are append-only. The only post-insert write is the review
 * resolution stamp.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { CorrectionRecord, ReviewDecision } from '../../../models/correction.js';
import { DatabaseError, DatabaseErrorCode, CorrectionRow } from './types.js';
import { runWithPageCheck } from './helpers.js';
import { rowToCorrection } from './converters.js';
import { requirePage, updateCorrectionState } from './page-operations.js';

export type NewCorrectionRecord = Omit<
  CorrectionRecord,
  'correction_id' | 'created_at' | 'reviewed_at' | 'review_decision'
>;

/**
 * Persist a completed two-round correction and point the page at it, in
 * one transaction.
 *
 * @param reviewRequired - routes the page to human review instead of auto-approval
 */
export function insertCorrection(
  db: Database.Database,
  record: NewCorrectionRecord,
  reviewRequired: boolean
): CorrectionRecord {
  const correctionId = uuidv4();
  const createdAt = new Date().toISOString();

  db.transaction(() => {
    runWithPageCheck(
      db.prepare(
        `
        INSERT INTO ocr_corrections (
          correction_id, page_id, original_text, corrected_text, quality_score,
          improvement_level, major_corrections, confidence, needs_review,
          assessment_json, model_id, api_cost_usd, processing_time_ms, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `
      ),
      [
        correctionId,
        record.page_id,
        record.original_text,
        record.corrected_text,
        record.quality_score,
        record.improvement_level,
        JSON.stringify(record.major_corrections),
        record.confidence,
        record.needs_review ? 1 : 0,
        record.assessment_json,
        record.model_id,
        record.api_cost_usd,
        record.processing_time_ms,
        createdAt,
      ],
      record.page_id
    );

    updateCorrectionState(db, record.page_id, {
      correction_status: reviewRequired ? 'review_required' : 'completed',
      latest_correction_id: correctionId,
      ...(reviewRequired ? { needs_manual_review: true } : {}),
    });
  })();

  return requireCorrection(db, correctionId);
}

/**
 * Get a correction record by ID
 */
export function getCorrection(db: Database.Database, correctionId: string): CorrectionRecord | null {
  const row = db
    .prepare('SELECT * FROM ocr_corrections WHERE correction_id = ?')
    .get(correctionId) as CorrectionRow | undefined;
  return row ? rowToCorrection(row) : null;
}

/**
 * @throws DatabaseError CORRECTION_NOT_FOUND
 */
export function requireCorrection(db: Database.Database, correctionId: string): CorrectionRecord {
  const record = getCorrection(db, correctionId);
  if (!record) {
    throw new DatabaseError(
      `Correction "${correctionId}" not found`,
      DatabaseErrorCode.CORRECTION_NOT_FOUND
    );
  }
  return record;
}

/**
 * Latest correction record for a page, authoritative for display
 */
export function getLatestCorrection(db: Database.Database, pageId: string): CorrectionRecord | null {
  const row = db
    .prepare(
      'SELECT * FROM ocr_corrections WHERE page_id = ? ORDER BY created_at DESC, rowid DESC LIMIT 1'
    )
    .get(pageId) as CorrectionRow | undefined;
  return row ? rowToCorrection(row) : null;
}

/**
 * All correction records for a page, newest first
 */
export function listCorrections(db: Database.Database, pageId: string): CorrectionRecord[] {
  const rows = db
    .prepare('SELECT * FROM ocr_corrections WHERE page_id = ? ORDER BY created_at DESC, rowid DESC')
    .all(pageId) as CorrectionRow[];
  return rows.map(rowToCorrection);
}

export function countCorrections(db: Database.Database, pageId?: string): number {
  const row = (
    pageId
      ? db.prepare('SELECT COUNT(*) as n FROM ocr_corrections WHERE page_id = ?').get(pageId)
      : db.prepare('SELECT COUNT(*) as n FROM ocr_corrections').get()
  ) as { n: number };
  return row.n;
}

/**
 * Human review resolution. Stamps the record; when it is the page's latest
 * correction the page moves to `reviewed` and its review flag is cleared.
 *
 * @throws DatabaseError CORRECTION_NOT_FOUND, or INVALID_STATE when already reviewed
 */
export function markCorrectionReviewed(
  db: Database.Database,
  correctionId: string,
  decision: ReviewDecision
): CorrectionRecord {
  return db.transaction(() => {
    const record = requireCorrection(db, correctionId);
    if (record.review_decision !== null) {
      throw new DatabaseError(
        `Correction "${correctionId}" was already reviewed (${record.review_decision})`,
        DatabaseErrorCode.INVALID_STATE
      );
    }

    db.prepare(
      'UPDATE ocr_corrections SET reviewed_at = ?, review_decision = ? WHERE correction_id = ?'
    ).run(new Date().toISOString(), decision, correctionId);

    const page = requirePage(db, record.page_id);
    if (page.latest_correction_id === correctionId) {
      updateCorrectionState(db, record.page_id, {
        correction_status: 'reviewed',
        needs_manual_review: false,
      });
    }
    return requireCorrection(db, correctionId);
  })();
}
