/**
 * SQL Schema Definitions for the OCR convergence Page Store
 *
 * Contains all table creation SQL, indexes, and database configuration.
 * These are constants used by the migration system.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 2;

/**
 * Database configuration pragmas for optimal performance and safety
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -64000',
  'PRAGMA wal_autocheckpoint = 1000',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Database metadata table - database info
 */
export const CREATE_DATABASE_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS database_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  database_name TEXT NOT NULL,
  database_version TEXT NOT NULL,
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL
)
`;

/**
 * Pages table - one row per scanned image, updated in place by the
 * Assessor, Rescan Engine and Correction Engine on their own columns.
 */
export const CREATE_PAGES_TABLE = `
CREATE TABLE IF NOT EXISTS pages (
  page_id TEXT PRIMARY KEY,
  image_path TEXT NOT NULL,
  text_path TEXT NOT NULL,
  raw_text_hash TEXT NOT NULL,
  raw_text_length INTEGER NOT NULL DEFAULT 0,
  text_revision INTEGER NOT NULL DEFAULT 0,
  quality_score INTEGER CHECK (quality_score IS NULL OR (quality_score >= 0 AND quality_score <= 100)),
  quality_status TEXT NOT NULL DEFAULT 'unchecked' CHECK (quality_status IN ('unchecked', 'acceptable', 'needs_rescan', 'needs_correction', 'failed')),
  quality_reasons TEXT NOT NULL DEFAULT '[]',
  assessed_revision INTEGER,
  rescan_attempts INTEGER NOT NULL DEFAULT 0 CHECK (rescan_attempts >= 0),
  last_attempt_at TEXT,
  needs_manual_review INTEGER NOT NULL DEFAULT 0 CHECK (needs_manual_review IN (0, 1)),
  correction_status TEXT NOT NULL DEFAULT 'none' CHECK (correction_status IN ('none', 'completed', 'review_required', 'unchanged', 'reviewed')),
  latest_correction_id TEXT,
  claimed_by TEXT,
  claimed_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Correction records - append-only history per page
 */
export const CREATE_OCR_CORRECTIONS_TABLE = `
CREATE TABLE IF NOT EXISTS ocr_corrections (
  correction_id TEXT PRIMARY KEY,
  page_id TEXT NOT NULL,
  original_text TEXT NOT NULL,
  corrected_text TEXT NOT NULL,
  quality_score INTEGER NOT NULL CHECK (quality_score >= 1 AND quality_score <= 100),
  improvement_level TEXT NOT NULL CHECK (improvement_level IN ('minimal', 'moderate', 'significant', 'substantial')),
  major_corrections TEXT NOT NULL DEFAULT '[]',
  confidence TEXT NOT NULL CHECK (confidence IN ('low', 'medium', 'high')),
  needs_review INTEGER NOT NULL CHECK (needs_review IN (0, 1)),
  assessment_json TEXT NOT NULL,
  model_id TEXT NOT NULL,
  api_cost_usd REAL NOT NULL DEFAULT 0,
  processing_time_ms INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  reviewed_at TEXT,
  review_decision TEXT CHECK (review_decision IS NULL OR review_decision IN ('approved', 'rejected')),
  FOREIGN KEY (page_id) REFERENCES pages(page_id)
)
`;

/**
 * Reprocessing queue - work items for pages whose OCR is judged unusable
 */
export const CREATE_REPROCESSING_QUEUE_TABLE = `
CREATE TABLE IF NOT EXISTS reprocessing_queue (
  queue_id TEXT PRIMARY KEY,
  page_id TEXT NOT NULL,
  reason TEXT NOT NULL,
  priority INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL DEFAULT 'queued' CHECK (status IN ('queued', 'processing', 'completed', 'failed')),
  error_message TEXT,
  created_at TEXT NOT NULL,
  started_at TEXT,
  completed_at TEXT,
  FOREIGN KEY (page_id) REFERENCES pages(page_id)
)
`;

/**
 * Cost ledger - append-only log of billed API calls
 */
export const CREATE_COST_LEDGER_TABLE = `
CREATE TABLE IF NOT EXISTS cost_ledger (
  entry_id TEXT PRIMARY KEY,
  page_id TEXT,
  operation TEXT NOT NULL CHECK (operation IN ('classify', 'correct', 'assess')),
  model TEXT NOT NULL,
  input_tokens INTEGER NOT NULL DEFAULT 0,
  output_tokens INTEGER NOT NULL DEFAULT 0,
  cost_usd REAL NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL
)
`;

/**
 * All required indexes for query performance
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_pages_quality_status ON pages(quality_status)',
  'CREATE INDEX IF NOT EXISTS idx_pages_correction_status ON pages(correction_status)',
  'CREATE INDEX IF NOT EXISTS idx_pages_needs_manual_review ON pages(needs_manual_review)',
  'CREATE INDEX IF NOT EXISTS idx_ocr_corrections_page_id ON ocr_corrections(page_id, created_at)',
  'CREATE INDEX IF NOT EXISTS idx_reprocessing_queue_status ON reprocessing_queue(status, priority DESC, created_at)',
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_reprocessing_queue_active ON reprocessing_queue(page_id) WHERE status IN ('queued', 'processing')`,
  'CREATE INDEX IF NOT EXISTS idx_cost_ledger_created_at ON cost_ledger(created_at)',
] as const;

/**
 * Table definitions for creating tables in dependency order
 */
export const TABLE_DEFINITIONS = [
  { name: 'database_metadata', sql: CREATE_DATABASE_METADATA_TABLE },
  { name: 'pages', sql: CREATE_PAGES_TABLE },
  { name: 'ocr_corrections', sql: CREATE_OCR_CORRECTIONS_TABLE },
  { name: 'reprocessing_queue', sql: CREATE_REPROCESSING_QUEUE_TABLE },
  { name: 'cost_ledger', sql: CREATE_COST_LEDGER_TABLE },
] as const;

/**
 * Required tables for schema verification
 */
export const REQUIRED_TABLES = [
  'schema_version',
  'database_metadata',
  'pages',
  'ocr_corrections',
  'reprocessing_queue',
  'cost_ledger',
] as const;

/**
 * Required indexes for schema verification
 */
export const REQUIRED_INDEXES = [
  'idx_pages_quality_status',
  'idx_pages_correction_status',
  'idx_pages_needs_manual_review',
  'idx_ocr_corrections_page_id',
  'idx_reprocessing_queue_status',
  'idx_reprocessing_queue_active',
  'idx_cost_ledger_created_at',
] as const;

/**
 * Columns added after the v1 layout. Every component that persists them
 * ensures they exist before first use.
 */
export const V2_PAGE_COLUMNS = [{ name: 'assessed_revision', definition: 'INTEGER' }] as const;

export const V2_CORRECTION_COLUMNS = [
  { name: 'reviewed_at', definition: 'TEXT' },
  {
    name: 'review_decision',
    definition:
      "TEXT CHECK (review_decision IS NULL OR review_decision IN ('approved', 'rejected'))",
  },
] as const;
