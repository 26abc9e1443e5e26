/**
 * Schema Helper Functions for Database Migrations
 *
 * Contains helper functions for configuring pragmas, creating tables,
 * indexes, initializing database metadata, and the idempotent column hook.
 *
 * @module migrations/schema-helpers
 */

import type Database from 'better-sqlite3';
import { MigrationError } from './types.js';
import {
  DATABASE_PRAGMAS,
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_INDEXES,
  TABLE_DEFINITIONS,
  SCHEMA_VERSION,
} from './schema-definitions.js';

/**
 * Column to add when missing
 */
export interface ColumnDefinition {
  name: string;
  /** Type and constraints, as written after the column name in ALTER TABLE */
  definition: string;
}

/**
 * Configure database pragmas for optimal performance and safety
 * @param db - Database instance
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw new MigrationError(`Failed to set pragma: ${pragma}`, 'pragma', undefined, error);
    }
  }
}

/**
 * Create schema version table and initialize if needed
 * @param db - Database instance
 */
export function initializeSchemaVersion(db: Database.Database): void {
  try {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);

    const now = new Date().toISOString();
    const stmt = db.prepare(`
      INSERT INTO schema_version (id, version, created_at, updated_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET version = excluded.version, updated_at = excluded.updated_at
    `);
    stmt.run(1, SCHEMA_VERSION, now, now);
  } catch (error) {
    throw new MigrationError(
      'Failed to initialize schema version table',
      'create_table',
      'schema_version',
      error
    );
  }
}

/**
 * Create all tables in dependency order
 * @param db - Database instance
 */
export function createTables(db: Database.Database): void {
  for (const table of TABLE_DEFINITIONS) {
    try {
      db.exec(table.sql);
    } catch (error) {
      throw new MigrationError(
        `Failed to create table: ${table.name}`,
        'create_table',
        table.name,
        error
      );
    }
  }
}

/**
 * Create all required indexes
 * @param db - Database instance
 */
export function createIndexes(db: Database.Database): void {
  for (const indexSql of CREATE_INDEXES) {
    try {
      db.exec(indexSql);
    } catch (error) {
      const match = indexSql.match(/CREATE (?:UNIQUE )?INDEX IF NOT EXISTS (\w+)/);
      const indexName = match ? match[1] : 'unknown';
      throw new MigrationError(
        `Failed to create index: ${indexName}`,
        'create_index',
        indexName,
        error
      );
    }
  }
}

/**
 * Initialize database metadata with default values
 * @param db - Database instance
 */
export function initializeDatabaseMetadata(db: Database.Database): void {
  try {
    const now = new Date().toISOString();
    db.prepare(
      `
      INSERT OR IGNORE INTO database_metadata (id, database_name, database_version, created_at, last_modified_at)
      VALUES (1, ?, ?, ?, ?)
    `
    ).run('ocr-convergence', '1.0.0', now, now);
  } catch (error) {
    throw new MigrationError(
      'Failed to initialize database metadata',
      'insert',
      'database_metadata',
      error
    );
  }
}

/**
 * Check whether a table exists
 */
export function tableExists(db: Database.Database, table: string): boolean {
  const row = db
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`)
    .get(table);
  return row !== undefined;
}

/**
 * Ensure columns exist on a table (check-then-create).
 *
 * Several processes may open the same store for the first time at once, so
 * a concurrent ALTER that wins the race surfaces here as
 * "duplicate column name" and is treated as success.
 *
 * @returns Names of the columns this call added
 */
export function ensureColumns(
  db: Database.Database,
  table: string,
  columns: readonly ColumnDefinition[]
): string[] {
  if (!tableExists(db, table)) {
    throw new MigrationError(
      `Cannot add columns: table "${table}" does not exist`,
      'alter_table',
      table
    );
  }

  const existing = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  const names = new Set(existing.map((c) => c.name));
  const added: string[] = [];

  for (const column of columns) {
    if (names.has(column.name)) continue;
    try {
      db.exec(`ALTER TABLE ${table} ADD COLUMN ${column.name} ${column.definition}`);
      added.push(column.name);
    } catch (error) {
      if (error instanceof Error && /duplicate column name/i.test(error.message)) {
        console.error(`[MIGRATION] Column ${table}.${column.name} added concurrently, continuing`);
        continue;
      }
      throw new MigrationError(
        `Failed to add column ${table}.${column.name}`,
        'alter_table',
        table,
        error
      );
    }
  }

  return added;
}
