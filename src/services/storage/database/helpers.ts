/**
 * Helper functions for DatabaseService
 *
 * Contains utility functions for validation, path resolution,
 * and constraint error handling.
 */

import Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Default storage path for databases
 */
export const DEFAULT_STORAGE_PATH =
  process.env.OCR_CONVERGENCE_DATABASES_PATH ??
  join(homedir(), '.ocr-convergence', 'databases');

/**
 * Valid database name pattern: alphanumeric, underscores, hyphens
 */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Validate database name format
 */
export function validateName(name: string): void {
  if (!name) {
    throw new DatabaseError('Database name is required', DatabaseErrorCode.INVALID_NAME);
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

/**
 * Get full database path
 */
export function getDatabasePath(name: string, storagePath?: string): string {
  const basePath = storagePath ?? DEFAULT_STORAGE_PATH;
  return join(basePath, `${name}.db`);
}

/**
 * Run a statement, converting a FOREIGN KEY failure into PAGE_NOT_FOUND.
 * Every child table in the store references pages(page_id).
 *
 * @param stmt - Prepared statement to run
 * @param params - Parameters to bind
 * @param pageId - Page the row refers to, for the error message
 */
export function runWithPageCheck(
  stmt: Database.Statement,
  params: unknown[],
  pageId: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Page "${pageId}" not found`,
        DatabaseErrorCode.PAGE_NOT_FOUND,
        error
      );
    }
    throw error;
  }
}

/**
 * True when the error is a UNIQUE constraint failure
 */
export function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && error.message.includes('UNIQUE constraint failed');
}
