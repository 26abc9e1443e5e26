/**
 * Storage Service Module
 *
 * Provides the Page Store database, migrations and canonical text storage
 * for the OCR convergence pipeline.
 */

export {
  initializeDatabase,
  checkSchemaVersion,
  migrateToLatest,
  getCurrentSchemaVersion,
  verifySchema,
  ensureColumns,
  MigrationError,
} from './migrations/index.js';

export {
  DatabaseService,
  DatabaseError,
  DatabaseErrorCode,
  type DatabaseInfo,
  type DatabaseStats,
  type ListPagesOptions,
} from './database/index.js';

export { FileTextStore, TextIntegrityError, fingerprint, type TextFingerprint } from './text-store.js';
