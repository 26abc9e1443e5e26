/**
 * Database Service Module
 *
 * Re-exports the DatabaseService facade and its types.
 */

export { DatabaseService } from './service.js';
export {
  DatabaseError,
  DatabaseErrorCode,
  type DatabaseInfo,
  type DatabaseStats,
  type ListPagesOptions,
} from './types.js';
export type { AssessmentWrite, CandidateQuery, TextReplacement } from './page-operations.js';
export type { NewCorrectionRecord } from './correction-operations.js';
export type { EnqueueResult, ListQueueOptions } from './queue-operations.js';
export { DEFAULT_STORAGE_PATH, getDatabasePath } from './helpers.js';
