/**
 * MCP Server State Management
 *
 * Holds the selected Page Store and server configuration. Database switches
 * are refused while a pipeline run or other async operation is in flight.
 *
 * @module server/state
 */

import { DatabaseService } from '../services/storage/database/index.js';
import { DEFAULT_STORAGE_PATH } from '../services/storage/database/helpers.js';
import {
  databaseNotSelectedError,
  databaseNotFoundError,
  databaseAlreadyExistsError,
} from './errors.js';
import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

function defaultConfig(): ServerConfig {
  return {
    defaultStoragePath: DEFAULT_STORAGE_PATH,
    pipelineDeps: {},
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export const state: ServerState = {
  currentDatabase: null,
  currentDatabaseName: null,
  config: defaultConfig(),
};

/** Incremented on every database switch or clear */
let _dbGeneration = 0;

/** In-flight async operations; switches are refused while > 0 */
let _activeOperations = 0;

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @throws MCPError with DATABASE_NOT_SELECTED if no database is selected
 */
export function requireDatabase(): { db: DatabaseService; generation: number } {
  if (!state.currentDatabase) {
    throw databaseNotSelectedError();
  }
  return { db: state.currentDatabase, generation: _dbGeneration };
}

export function validateGeneration(expectedGeneration: number): void {
  if (_dbGeneration !== expectedGeneration) {
    throw new Error(
      `Database generation mismatch: expected ${expectedGeneration}, current ${_dbGeneration}. ` +
        `The database was switched during this operation. Retry with the current database.`
    );
  }
}

/**
 * Run async work against the selected database. The database cannot be
 * switched until it settles.
 */
export async function withDatabaseOperation<T>(
  fn: (db: DatabaseService) => Promise<T>
): Promise<T> {
  const { db, generation } = requireDatabase();
  _activeOperations++;
  try {
    const result = await fn(db);
    validateGeneration(generation);
    return result;
  } finally {
    _activeOperations--;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

function assertNoActiveOperations(action: string): void {
  if (_activeOperations > 0) {
    throw new Error(
      `Cannot ${action} while ${_activeOperations} operation(s) are in-flight. ` +
        `Wait for active operations to complete.`
    );
  }
}

/**
 * Open a database and make it current. The new connection is opened before
 * the old one is closed, except when re-opening the same file.
 *
 * @throws MCPError with DATABASE_NOT_FOUND if database doesn't exist
 */
export function selectDatabase(name: string, storagePath?: string): void {
  const path = storagePath ?? state.config.defaultStoragePath;
  assertNoActiveOperations('switch databases');

  if (!DatabaseService.exists(name, path)) {
    throw databaseNotFoundError(name, path);
  }

  const oldDb = state.currentDatabase;
  const isSameDb = oldDb !== null && state.currentDatabaseName === name;

  // Same file: release the old WAL/SHM mapping first
  if (isSameDb) {
    state.currentDatabase = null;
    state.currentDatabaseName = null;
    oldDb.close();
  }

  const newDb = DatabaseService.open(name, path);

  if (!isSameDb && oldDb) {
    oldDb.close();
  }

  state.currentDatabase = newDb;
  state.currentDatabaseName = name;
  _dbGeneration++;
}

/**
 * Create a new database and select it
 *
 * @throws MCPError with DATABASE_ALREADY_EXISTS if database exists
 */
export function createDatabase(
  name: string,
  description?: string,
  storagePath?: string
): DatabaseService {
  const path = storagePath ?? state.config.defaultStoragePath;
  assertNoActiveOperations('select a new database');

  if (DatabaseService.exists(name, path)) {
    throw databaseAlreadyExistsError(name);
  }

  const db = DatabaseService.create(name, description, path);

  if (state.currentDatabase) {
    state.currentDatabase.close();
  }
  _dbGeneration++;
  state.currentDatabase = db;
  state.currentDatabaseName = name;
  return db;
}

/**
 * Close the current database
 *
 * @param forceClose - skip the in-flight guard (tests and process exit)
 */
export function clearDatabase(forceClose: boolean = false): void {
  if (!forceClose) {
    assertNoActiveOperations('clear the database');
  }

  if (state.currentDatabase) {
    state.currentDatabase.close();
    state.currentDatabase = null;
    state.currentDatabaseName = null;
    _dbGeneration++;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

export function getDefaultStoragePath(): string {
  return state.config.defaultStoragePath;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

export function resetState(): void {
  clearDatabase(true);
  _dbGeneration = 0;
  _activeOperations = 0;
  state.config = defaultConfig();
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

process.on('exit', () => {
  if (state.currentDatabase) {
    try {
      state.currentDatabase.close();
    } catch (error) {
      console.error(
        '[state] database close on exit failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    state.currentDatabase = null;
    state.currentDatabaseName = null;
  }
});
