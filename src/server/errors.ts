/**
 * MCP Server Error Handling
 *
 * Every tool failure surfaces as an MCPError with a category and a recovery
 * hint naming the tool an agent should call next.
 *
 * @module server/errors
 */

import { DatabaseError, DatabaseErrorCode } from '../services/storage/database/types.js';
import { MigrationError } from '../services/storage/migrations/types.js';
import { TextIntegrityError } from '../services/storage/text-store.js';
import { IllegalTransitionError } from '../models/page.js';
import { LlmError, RateLimitError } from '../services/llm/errors.js';
import { CircuitBreakerOpenError } from '../services/llm/circuit-breaker.js';
import { OcrError } from '../services/ocr/errors.js';
import { ValidationError } from '../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  | 'VALIDATION_ERROR'

  // Page Store
  | 'DATABASE_NOT_FOUND'
  | 'DATABASE_NOT_SELECTED'
  | 'DATABASE_ALREADY_EXISTS'
  | 'DATABASE_ERROR'
  | 'PAGE_NOT_FOUND'
  | 'CORRECTION_NOT_FOUND'
  | 'QUEUE_ENTRY_NOT_FOUND'
  | 'INVALID_STATE'
  | 'TEXT_INTEGRITY_ERROR'

  // External collaborators
  | 'LLM_API_ERROR'
  | 'LLM_RATE_LIMIT'
  | 'OCR_ERROR'

  | 'PATH_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'CONFIGURATION_ERROR'
  | 'INTERNAL_ERROR';

const DATABASE_CODE_TO_CATEGORY: Record<DatabaseErrorCode, ErrorCategory> = {
  [DatabaseErrorCode.DATABASE_NOT_FOUND]: 'DATABASE_NOT_FOUND',
  [DatabaseErrorCode.DATABASE_ALREADY_EXISTS]: 'DATABASE_ALREADY_EXISTS',
  [DatabaseErrorCode.DATABASE_LOCKED]: 'DATABASE_ERROR',
  [DatabaseErrorCode.PAGE_NOT_FOUND]: 'PAGE_NOT_FOUND',
  [DatabaseErrorCode.PAGE_ALREADY_EXISTS]: 'INVALID_STATE',
  [DatabaseErrorCode.QUEUE_ENTRY_NOT_FOUND]: 'QUEUE_ENTRY_NOT_FOUND',
  [DatabaseErrorCode.CORRECTION_NOT_FOUND]: 'CORRECTION_NOT_FOUND',
  [DatabaseErrorCode.SCHEMA_MISMATCH]: 'DATABASE_ERROR',
  [DatabaseErrorCode.PERMISSION_DENIED]: 'PERMISSION_DENIED',
  [DatabaseErrorCode.INVALID_NAME]: 'VALIDATION_ERROR',
  [DatabaseErrorCode.INVALID_STATE]: 'INVALID_STATE',
};

function categorize(error: Error, defaultCategory: ErrorCategory): ErrorCategory {
  if (error instanceof ValidationError) return 'VALIDATION_ERROR';
  if (error instanceof DatabaseError) return DATABASE_CODE_TO_CATEGORY[error.code];
  if (error instanceof MigrationError) return 'DATABASE_ERROR';
  if (error instanceof IllegalTransitionError) return 'INVALID_STATE';
  if (error instanceof TextIntegrityError) return 'TEXT_INTEGRITY_ERROR';
  if (error instanceof RateLimitError) return 'LLM_RATE_LIMIT';
  if (error instanceof LlmError || error instanceof CircuitBreakerOpenError) return 'LLM_API_ERROR';
  if (error instanceof OcrError) return 'OCR_ERROR';
  return defaultCategory;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      const details: Record<string, unknown> = { originalName: error.name };
      if (error instanceof DatabaseError) details.errorCode = error.code;
      if (error instanceof LlmError) {
        details.errorCode = error.category;
        if (error.status !== undefined) details.status = error.status;
      }
      if (error instanceof TextIntegrityError) {
        details.pageId = error.pageId;
        details.expectedHash = error.expectedHash;
        details.actualHash = error.actualHash;
      }
      if (error instanceof IllegalTransitionError) {
        details.from = error.from;
        details.to = error.to;
      }
      if (error instanceof MigrationError) details.step = error.step;
      details.stack = error.stack;
      return new MCPError(categorize(error, defaultCategory), error.message, details);
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'ocr_page_list', hint: 'Check parameter types and required fields' },
  DATABASE_NOT_FOUND: { tool: 'ocr_db_list', hint: 'Use ocr_db_list to see available databases' },
  DATABASE_NOT_SELECTED: {
    tool: 'ocr_db_select',
    hint: 'Use ocr_db_list to find database names, then ocr_db_select',
  },
  DATABASE_ALREADY_EXISTS: { tool: 'ocr_db_list', hint: 'Choose a unique database name' },
  DATABASE_ERROR: {
    tool: 'ocr_db_stats',
    hint: 'The Page Store could not be read or migrated; check the file and retry',
  },
  PAGE_NOT_FOUND: { tool: 'ocr_page_list', hint: 'Use ocr_page_list to find page ids' },
  CORRECTION_NOT_FOUND: {
    tool: 'ocr_correction_history',
    hint: 'Use ocr_correction_history with the page id to list its corrections',
  },
  QUEUE_ENTRY_NOT_FOUND: { tool: 'ocr_queue_list', hint: 'Use ocr_queue_list to find queue ids' },
  INVALID_STATE: {
    tool: 'ocr_page_get',
    hint: 'The record is not in a state that allows this change; inspect it with ocr_page_get',
  },
  TEXT_INTEGRITY_ERROR: {
    tool: 'ocr_page_get',
    hint: 'The text file no longer matches the recorded hash; restore it or re-register the page',
  },
  LLM_API_ERROR: {
    tool: 'ocr_budget_status',
    hint: 'Check LLM_API_KEY, LLM_BASE_URL and the provider status, then retry the run',
  },
  LLM_RATE_LIMIT: {
    tool: 'ocr_budget_status',
    hint: 'Wait for the provider limit to reset before the next run',
  },
  OCR_ERROR: {
    tool: 'ocr_page_get',
    hint: 'Check that tesseract is installed and the page image exists under OCR_DATA_DIR',
  },
  PATH_NOT_FOUND: { tool: 'ocr_page_register', hint: 'Paths are relative to OCR_DATA_DIR' },
  PERMISSION_DENIED: { tool: 'ocr_db_list', hint: 'Check filesystem permissions on the target path' },
  CONFIGURATION_ERROR: {
    tool: 'ocr_budget_status',
    hint: 'Check environment configuration (LLM_API_KEY, MAX_DAILY_API_COST_USD, OCR_DATA_DIR)',
  },
  INTERNAL_ERROR: { tool: 'ocr_db_stats', hint: 'Inspect the server log on stderr' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function databaseNotSelectedError(): MCPError {
  return new MCPError(
    'DATABASE_NOT_SELECTED',
    'No database selected. Use ocr_db_list to see available databases, then ocr_db_select to choose one.'
  );
}

export function databaseNotFoundError(name: string, storagePath?: string): MCPError {
  return new MCPError('DATABASE_NOT_FOUND', `Database "${name}" not found`, {
    databaseName: name,
    storagePath,
  });
}

export function databaseAlreadyExistsError(name: string): MCPError {
  return new MCPError('DATABASE_ALREADY_EXISTS', `Database "${name}" already exists`, {
    databaseName: name,
  });
}

export function pageNotFoundError(pageId: string): MCPError {
  return new MCPError(
    'PAGE_NOT_FOUND',
    `Page not found: ${pageId}. Use ocr_page_list to browse registered pages.`,
    { pageId }
  );
}

export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}

export function pathNotFoundError(path: string): MCPError {
  return new MCPError('PATH_NOT_FOUND', `Path does not exist: ${path}`, { path });
}
