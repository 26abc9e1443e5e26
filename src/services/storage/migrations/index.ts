/**
 * Database Schema Migrations for the OCR convergence Page Store
 *
 * Handles SQLite schema initialization, versioned migrations and the
 * idempotent column hook shared by every component that persists fields.
 *
 * Security: All SQL uses parameterized queries via db.prepare()
 * Performance: WAL mode, indexes on every status column
 *
 * @module migrations
 */

export { MigrationError } from './types.js';

export {
  initializeDatabase,
  migrateToLatest,
  checkSchemaVersion,
  getCurrentSchemaVersion,
} from './operations.js';

export { configurePragmas, ensureColumns, tableExists, type ColumnDefinition } from './schema-helpers.js';

export { verifySchema } from './verification.js';
