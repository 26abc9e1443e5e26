/**
 * Type definitions for DatabaseService
 *
 * Contains all interfaces, enums, and row types used by the database service.
 */

import type { CorrectionStatus, QualityStatus } from '../../../models/page.js';
import type { QueueStatus } from '../../../models/queue.js';

/**
 * Database information interface
 */
export interface DatabaseInfo {
  name: string;
  path: string;
  size_bytes: number;
  created_at: string;
  last_modified_at: string;
  total_pages: number;
  error?: string;
  corrupt?: boolean;
}

/**
 * Database statistics interface
 */
export interface DatabaseStats {
  name: string;
  total_pages: number;
  pages_by_quality_status: Record<QualityStatus, number>;
  pages_by_correction_status: Record<CorrectionStatus, number>;
  pages_needing_review: number;
  pages_claimed: number;
  total_rescan_attempts: number;
  total_corrections: number;
  queue_by_status: Record<QueueStatus, number>;
  spend_last_24h_usd: number;
  total_spend_usd: number;
  storage_size_bytes: number;
}

/**
 * Page list options
 */
export interface ListPagesOptions {
  quality_status?: QualityStatus;
  correction_status?: CorrectionStatus;
  needs_manual_review?: boolean;
  limit?: number;
  offset?: number;
}

/**
 * Error codes for database operations
 */
export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  DATABASE_LOCKED = 'DATABASE_LOCKED',
  PAGE_NOT_FOUND = 'PAGE_NOT_FOUND',
  PAGE_ALREADY_EXISTS = 'PAGE_ALREADY_EXISTS',
  QUEUE_ENTRY_NOT_FOUND = 'QUEUE_ENTRY_NOT_FOUND',
  CORRECTION_NOT_FOUND = 'CORRECTION_NOT_FOUND',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  INVALID_NAME = 'INVALID_NAME',
  INVALID_STATE = 'INVALID_STATE',
}

/**
 * Custom error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly code: DatabaseErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/**
 * Database row type for metadata
 */
export interface MetadataRow {
  database_name: string;
  database_version: string;
  created_at: string;
  last_modified_at: string;
}

/**
 * Database row type for pages
 */
export interface PageRow {
  page_id: string;
  image_path: string;
  text_path: string;
  raw_text_hash: string;
  raw_text_length: number;
  text_revision: number;
  quality_score: number | null;
  quality_status: string;
  quality_reasons: string;
  assessed_revision: number | null;
  rescan_attempts: number;
  last_attempt_at: string | null;
  needs_manual_review: number;
  correction_status: string;
  latest_correction_id: string | null;
  claimed_by: string | null;
  claimed_at: string | null;
  created_at: string;
  updated_at: string;
}

/**
 * Database row type for correction records
 */
export interface CorrectionRow {
  correction_id: string;
  page_id: string;
  original_text: string;
  corrected_text: string;
  quality_score: number;
  improvement_level: string;
  major_corrections: string;
  confidence: string;
  needs_review: number;
  assessment_json: string;
  model_id: string;
  api_cost_usd: number;
  processing_time_ms: number;
  created_at: string;
  reviewed_at: string | null;
  review_decision: string | null;
}

/**
 * Database row type for reprocessing queue entries
 */
export interface QueueRow {
  queue_id: string;
  page_id: string;
  reason: string;
  priority: number;
  status: string;
  error_message: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

/**
 * Database row type for cost ledger entries
 */
export interface LedgerRow {
  entry_id: string;
  page_id: string | null;
  operation: string;
  model: string;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
  created_at: string;
}
