/**
 * Database Migration Operations
 *
 * Contains the main migration functions: initializeDatabase, migrateToLatest,
 * checkSchemaVersion, and getCurrentSchemaVersion.
 *
 * @module migrations/operations
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  SCHEMA_VERSION,
  CREATE_INDEXES,
  V2_PAGE_COLUMNS,
  V2_CORRECTION_COLUMNS,
} from './schema-definitions.js';
import {
  configurePragmas,
  createTables,
  createIndexes,
  initializeDatabaseMetadata,
  initializeSchemaVersion,
  ensureColumns,
} from './schema-helpers.js';

/**
 * Check the current schema version of the database
 * @param db - Database instance
 * @returns Current schema version, or 0 if not initialized
 */
export function checkSchemaVersion(db: Database.Database): number {
  try {
    const tableExists = db
      .prepare(
        `
      SELECT name FROM sqlite_master
      WHERE type = 'table' AND name = 'schema_version'
    `
      )
      .get();

    if (!tableExists) {
      return 0;
    }

    const row = db.prepare('SELECT version FROM schema_version WHERE id = ?').get(1) as
      | { version: number }
      | undefined;

    return row?.version ?? 0;
  } catch (error) {
    throw new MigrationError('Failed to check schema version', 'query', 'schema_version', error);
  }
}

/**
 * Get the current schema version constant
 * @returns The current schema version number
 */
export function getCurrentSchemaVersion(): number {
  return SCHEMA_VERSION;
}

/**
 * Initialize the database with all tables, indexes, and configuration
 *
 * This function is idempotent - safe to call multiple times.
 * Creates tables only if they don't exist.
 *
 * @param db - Database instance from better-sqlite3
 * @throws MigrationError if any operation fails
 */
export function initializeDatabase(db: Database.Database): void {
  // Pragmas cannot run inside a transaction
  configurePragmas(db);

  // Schema version is stamped LAST so a crash before completion leaves
  // version=0 and the next open re-initializes cleanly.
  const initTransaction = db.transaction(() => {
    createTables(db);
    createIndexes(db);
    initializeDatabaseMetadata(db);
    initializeSchemaVersion(db);
  });

  initTransaction();
}

/**
 * Migrate from schema version 1 to version 2
 *
 * Changes in v2:
 * - pages.assessed_revision: tracks which text revision the verdict belongs to
 * - ocr_corrections.reviewed_at, review_decision: human review resolution
 *
 * @param db - Database instance from better-sqlite3
 * @throws MigrationError if migration fails
 */
function migrateV1ToV2(db: Database.Database): void {
  console.error('[MIGRATION] Applying v1 → v2: assessment revision, review resolution columns');
  try {
    const transaction = db.transaction(() => {
      ensureColumns(db, 'pages', V2_PAGE_COLUMNS);
      ensureColumns(db, 'ocr_corrections', V2_CORRECTION_COLUMNS);

      // A v1 verdict was always computed for the text on disk
      db.exec(
        'UPDATE pages SET assessed_revision = text_revision WHERE assessed_revision IS NULL AND quality_score IS NOT NULL'
      );

      for (const indexSql of CREATE_INDEXES) {
        db.exec(indexSql);
      }
    });
    transaction();
  } catch (error) {
    if (error instanceof MigrationError) throw error;
    throw new MigrationError('Failed to migrate from v1 to v2', 'migrate', undefined, error);
  }
}

/**
 * Migrate database to the latest schema version
 *
 * Checks current version and applies any necessary migrations.
 *
 * @param db - Database instance from better-sqlite3
 * @throws MigrationError if migration fails
 */
export function migrateToLatest(db: Database.Database): void {
  const currentVersion = checkSchemaVersion(db);

  if (currentVersion === 0) {
    initializeDatabase(db);
    return;
  }

  if (currentVersion === SCHEMA_VERSION) {
    return;
  }

  if (currentVersion > SCHEMA_VERSION) {
    throw new MigrationError(
      `Database schema version (${String(currentVersion)}) is newer than supported version (${String(SCHEMA_VERSION)}). ` +
        'Please update the application.',
      'version_check',
      undefined
    );
  }

  // Bump schema_version right after each step so a crash between steps
  // only re-runs the remaining ones.
  const bumpVersion = (targetVersion: number): void => {
    try {
      db.prepare('UPDATE schema_version SET version = ?, updated_at = ? WHERE id = 1').run(
        targetVersion,
        new Date().toISOString()
      );
    } catch (error) {
      throw new MigrationError(
        `Failed to update schema version to ${String(targetVersion)} after migration`,
        'update',
        'schema_version',
        error
      );
    }
  };

  if (currentVersion < 2) {
    migrateV1ToV2(db);
    bumpVersion(2);
  }
}
