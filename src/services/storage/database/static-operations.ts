/**
 * Static operations for DatabaseService - database lifecycle: create, open, list, delete, exists.
 */

import Database from 'better-sqlite3';
import { statSync, existsSync, mkdirSync, readdirSync, unlinkSync, writeFileSync, chmodSync } from 'fs';
import { join } from 'path';
import {
  initializeDatabase,
  migrateToLatest,
  verifySchema,
  configurePragmas,
} from '../migrations/index.js';
import { DatabaseInfo, DatabaseError, DatabaseErrorCode, MetadataRow } from './types.js';
import { DEFAULT_STORAGE_PATH, validateName, getDatabasePath } from './helpers.js';

export interface OpenedDatabase {
  db: Database.Database;
  name: string;
  path: string;
}

function removeQuietly(path: string, context: string): void {
  try {
    unlinkSync(path);
  } catch (cleanupErr) {
    console.error(
      `[static-operations] Failed to clean up db file after ${context}:`,
      cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr)
    );
  }
}

/**
 * Create a new database
 * @throws DatabaseError if name is invalid or database already exists
 */
export function createDatabase(
  name: string,
  description?: string,
  storagePath?: string
): OpenedDatabase {
  validateName(name);
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(basePath)) {
    mkdirSync(basePath, { recursive: true, mode: 0o700 });
  }

  if (existsSync(dbPath)) {
    throw new DatabaseError(
      `Database "${name}" already exists at ${dbPath}`,
      DatabaseErrorCode.DATABASE_ALREADY_EXISTS
    );
  }

  writeFileSync(dbPath, '', { mode: 0o600 });
  chmodSync(dbPath, 0o600);

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    removeQuietly(dbPath, 'creation error');
    throw new DatabaseError(
      `Failed to create database "${name}": ${String(error)}`,
      DatabaseErrorCode.PERMISSION_DENIED,
      error
    );
  }

  try {
    initializeDatabase(db);
    db.prepare('UPDATE database_metadata SET database_name = ? WHERE id = 1').run(
      description ? `${name}: ${description}` : name
    );
  } catch (error) {
    db.close();
    removeQuietly(dbPath, 'init error');
    throw error;
  }

  return { db, name, path: dbPath };
}

/**
 * Open an existing database, applying pending migrations
 * @throws DatabaseError if database doesn't exist or schema is invalid
 */
export function openDatabase(name: string, storagePath?: string): OpenedDatabase {
  validateName(name);
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(dbPath)) {
    throw new DatabaseError(
      `Database "${name}" not found at ${dbPath}`,
      DatabaseErrorCode.DATABASE_NOT_FOUND
    );
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new DatabaseError(
      `Failed to open database "${name}": ${String(error)}`,
      DatabaseErrorCode.DATABASE_LOCKED,
      error
    );
  }

  // Per-connection pragmas (FK enforcement, busy_timeout) are not persistent
  try {
    configurePragmas(db);
    migrateToLatest(db);
  } catch (error) {
    db.close();
    throw error;
  }

  const verification = verifySchema(db);
  if (!verification.valid) {
    db.close();
    throw new DatabaseError(
      `Database schema verification failed. Missing tables: ${verification.missingTables.join(', ')}. Missing indexes: ${verification.missingIndexes.join(', ')}. Missing columns: ${verification.missingColumns.join(', ')}`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }

  return { db, name, path: dbPath };
}

/** List all available databases */
export function listDatabases(storagePath?: string): DatabaseInfo[] {
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  if (!existsSync(basePath)) {
    console.error(`[DATABASE] Storage directory does not exist: ${basePath}. Returning empty database list.`);
    return [];
  }

  const files = readdirSync(basePath).filter((f) => f.endsWith('.db'));
  const databases: DatabaseInfo[] = [];

  for (const file of files) {
    const name = file.slice(0, -'.db'.length);
    const dbPath = join(basePath, file);
    try {
      const stats = statSync(dbPath);
      const db = new Database(dbPath, { readonly: true });
      try {
        const row = db
          .prepare(
            'SELECT database_name, database_version, created_at, last_modified_at FROM database_metadata WHERE id = 1'
          )
          .get() as MetadataRow | undefined;
        const count = db.prepare('SELECT COUNT(*) as n FROM pages').get() as { n: number };
        if (row) {
          databases.push({
            name,
            path: dbPath,
            size_bytes: stats.size,
            created_at: row.created_at,
            last_modified_at: row.last_modified_at,
            total_pages: count.n,
          });
        }
      } finally {
        db.close();
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[static-operations] Failed to read database "${file}": ${message}`);
      databases.push({
        name,
        path: dbPath,
        size_bytes: 0,
        created_at: '',
        last_modified_at: '',
        total_pages: 0,
        error: `Failed to read database: ${message}`,
        corrupt: true,
      });
    }
  }
  return databases;
}

/** Delete a database - throws DatabaseError if database doesn't exist */
export function deleteDatabase(name: string, storagePath?: string): void {
  validateName(name);
  const dbPath = getDatabasePath(name, storagePath);

  if (!existsSync(dbPath)) {
    throw new DatabaseError(
      `Database "${name}" not found at ${dbPath}`,
      DatabaseErrorCode.DATABASE_NOT_FOUND
    );
  }

  unlinkSync(dbPath);
  for (const suffix of ['-wal', '-shm']) {
    const path = `${dbPath}${suffix}`;
    if (existsSync(path)) unlinkSync(path);
  }
}

/** Check if a database exists */
export function databaseExists(name: string, storagePath?: string): boolean {
  try {
    validateName(name);
  } catch (error) {
    console.error(
      '[static-operations] Invalid database name:',
      error instanceof Error ? error.message : String(error)
    );
    return false;
  }
  return existsSync(getDatabasePath(name, storagePath));
}
