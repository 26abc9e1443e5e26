/**
 * Row conversion functions for DatabaseService
 *
 * Converts database row objects to domain model interfaces.
 */

import {
  Page,
  QualityStatus,
  QUALITY_STATUSES,
  CorrectionStatus,
  CORRECTION_STATUSES,
} from '../../../models/page.js';
import {
  CorrectionRecord,
  Confidence,
  CONFIDENCE_LEVELS,
  ImprovementLevel,
  IMPROVEMENT_LEVELS,
  ReviewDecision,
} from '../../../models/correction.js';
import { QueueEntry, QueueStatus, QUEUE_STATUSES } from '../../../models/queue.js';
import { CostLedgerEntry, BilledOperation } from '../../../models/ledger.js';
import { PageRow, CorrectionRow, QueueRow, LedgerRow } from './types.js';

const VALID_REVIEW_DECISIONS: readonly ReviewDecision[] = ['approved', 'rejected'];

const VALID_OPERATIONS: readonly BilledOperation[] = ['classify', 'correct', 'assess'];

/**
 * Validate that a string value is a member of a union type at runtime.
 * Throws if the stored value is outside the closed set.
 */
function validateEnum<T extends string>(
  value: string,
  validValues: readonly T[],
  fieldName: string,
  id: string
): T {
  const match = validValues.find((v) => v === value);
  if (match === undefined) {
    throw new Error(
      `Invalid ${fieldName} "${value}" in record ${id}. Valid values: ${validValues.join(', ')}`
    );
  }
  return match;
}

/**
 * Parse a JSON string array column, logging and falling back to [] on corrupt data
 */
function parseStringArray(id: string, column: string, raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed)) {
      return parsed.filter((v): v is string => typeof v === 'string');
    }
  } catch (error) {
    console.error(
      `[converters] Corrupt ${column} in record ${id}:`,
      error instanceof Error ? error.message : String(error)
    );
    return [];
  }
  console.error(`[converters] ${column} in record ${id} is not an array`);
  return [];
}

/**
 * Convert page row to Page interface
 */
export function rowToPage(row: PageRow): Page {
  return {
    page_id: row.page_id,
    image_path: row.image_path,
    text_path: row.text_path,
    raw_text_hash: row.raw_text_hash,
    raw_text_length: row.raw_text_length,
    text_revision: row.text_revision,
    quality_score: row.quality_score,
    quality_status: validateEnum<QualityStatus>(
      row.quality_status,
      QUALITY_STATUSES,
      'quality_status',
      row.page_id
    ),
    quality_reasons: parseStringArray(row.page_id, 'quality_reasons', row.quality_reasons),
    assessed_revision: row.assessed_revision,
    rescan_attempts: row.rescan_attempts,
    last_attempt_at: row.last_attempt_at,
    needs_manual_review: row.needs_manual_review === 1,
    correction_status: validateEnum<CorrectionStatus>(
      row.correction_status,
      CORRECTION_STATUSES,
      'correction_status',
      row.page_id
    ),
    latest_correction_id: row.latest_correction_id,
    claimed_by: row.claimed_by,
    claimed_at: row.claimed_at,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * Convert correction row to CorrectionRecord interface
 */
export function rowToCorrection(row: CorrectionRow): CorrectionRecord {
  return {
    correction_id: row.correction_id,
    page_id: row.page_id,
    original_text: row.original_text,
    corrected_text: row.corrected_text,
    quality_score: row.quality_score,
    improvement_level: validateEnum<ImprovementLevel>(
      row.improvement_level,
      IMPROVEMENT_LEVELS,
      'improvement_level',
      row.correction_id
    ),
    major_corrections: parseStringArray(
      row.correction_id,
      'major_corrections',
      row.major_corrections
    ),
    confidence: validateEnum<Confidence>(
      row.confidence,
      CONFIDENCE_LEVELS,
      'confidence',
      row.correction_id
    ),
    needs_review: row.needs_review === 1,
    assessment_json: row.assessment_json,
    model_id: row.model_id,
    api_cost_usd: row.api_cost_usd,
    processing_time_ms: row.processing_time_ms,
    created_at: row.created_at,
    reviewed_at: row.reviewed_at,
    review_decision:
      row.review_decision === null
        ? null
        : validateEnum<ReviewDecision>(
            row.review_decision,
            VALID_REVIEW_DECISIONS,
            'review_decision',
            row.correction_id
          ),
  };
}

/**
 * Convert queue row to QueueEntry interface
 */
export function rowToQueueEntry(row: QueueRow): QueueEntry {
  return {
    queue_id: row.queue_id,
    page_id: row.page_id,
    reason: row.reason,
    priority: row.priority,
    status: validateEnum<QueueStatus>(row.status, QUEUE_STATUSES, 'status', row.queue_id),
    error_message: row.error_message,
    created_at: row.created_at,
    started_at: row.started_at,
    completed_at: row.completed_at,
  };
}

/**
 * Convert ledger row to CostLedgerEntry interface
 */
export function rowToLedgerEntry(row: LedgerRow): CostLedgerEntry {
  return {
    entry_id: row.entry_id,
    page_id: row.page_id,
    operation: validateEnum<BilledOperation>(
      row.operation,
      VALID_OPERATIONS,
      'operation',
      row.entry_id
    ),
    model: row.model,
    input_tokens: row.input_tokens,
    output_tokens: row.output_tokens,
    cost_usd: row.cost_usd,
    created_at: row.created_at,
  };
}
