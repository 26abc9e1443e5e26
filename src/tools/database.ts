/**
 * Database Management MCP Tools
 *
 * Tools: ocr_db_create, ocr_db_list, ocr_db_select, ocr_db_stats
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/database
 */

import { DatabaseService } from '../services/storage/database/index.js';
import {
  state,
  requireDatabase,
  selectDatabase,
  createDatabase,
  getDefaultStoragePath,
} from '../server/state.js';
import { successResult } from '../server/types.js';
import {
  validateInput,
  DatabaseCreateInput,
  DatabaseListInput,
  DatabaseSelectInput,
  DatabaseStatsInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle ocr_db_create - Create a new Page Store and select it
 */
export async function handleDatabaseCreate(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseCreateInput, params);
    const db = createDatabase(input.name, input.description, input.storage_path);
    console.error(`[Database] Created and selected "${input.name}" at ${db.getPath()}`);

    return formatResponse(
      successResult({
        name: input.name,
        path: db.getPath(),
        created: true,
        selected: true,
        description: input.description,
        next_steps: [
          { tool: 'ocr_page_register', description: 'Register pages from image and text files' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle ocr_db_list - List Page Stores in the storage directory
 */
export async function handleDatabaseList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseListInput, params);
    const storagePath = getDefaultStoragePath();
    const all = DatabaseService.list(storagePath);
    const page = all.slice(input.offset, input.offset + input.limit);
    const hasMore = input.offset + input.limit < all.length;

    return formatResponse(
      successResult({
        databases: page.map((info) => ({
          name: info.name,
          path: info.path,
          size_bytes: info.size_bytes,
          total_pages: info.total_pages,
          created_at: info.created_at,
          modified_at: info.last_modified_at,
          selected: info.name === state.currentDatabaseName,
          ...(info.error !== undefined && { error: info.error }),
        })),
        total: all.length,
        returned: page.length,
        offset: input.offset,
        limit: input.limit,
        has_more: hasMore,
        storage_path: storagePath,
        next_steps: hasMore
          ? [{ tool: 'ocr_db_list', description: `Get next page (offset=${input.offset + input.limit})` }]
          : [{ tool: 'ocr_db_select', description: 'Select a database to work with' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle ocr_db_select - Switch the active Page Store
 */
export async function handleDatabaseSelect(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseSelectInput, params);
    selectDatabase(input.database_name);
    const { db } = requireDatabase();
    const stats = db.getStats();

    return formatResponse(
      successResult({
        name: input.database_name,
        selected: true,
        total_pages: stats.total_pages,
        pages_by_quality_status: stats.pages_by_quality_status,
        pages_needing_review: stats.pages_needing_review,
        next_steps: [
          { tool: 'ocr_db_stats', description: 'Full Page Store statistics' },
          { tool: 'ocr_pipeline_run', description: 'Converge pending pages' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle ocr_db_stats - Page, correction, queue and spend statistics
 */
export async function handleDatabaseStats(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DatabaseStatsInput, params);
    const nextSteps = [
      { tool: 'ocr_page_list', description: 'Browse pages by status' },
      { tool: 'ocr_queue_list', description: 'Inspect the reprocessing queue' },
      { tool: 'ocr_budget_status', description: 'Rolling 24h spend against the ceiling' },
    ];

    if (input.database_name && input.database_name !== state.currentDatabaseName) {
      const db = DatabaseService.open(input.database_name, getDefaultStoragePath());
      try {
        return formatResponse(successResult({ ...db.getStats(), next_steps: nextSteps }));
      } finally {
        db.close();
      }
    }

    const { db } = requireDatabase();
    return formatResponse(successResult({ ...db.getStats(), next_steps: nextSteps }));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const databaseTools: Record<string, ToolDefinition> = {
  ocr_db_create: {
    description:
      '[SETUP] Use to create a new Page Store database. The new database is selected automatically.',
    inputSchema: DatabaseCreateInput.shape,
    handler: handleDatabaseCreate,
  },
  ocr_db_list: {
    description: '[ESSENTIAL] Use to list available Page Store databases with page counts.',
    inputSchema: DatabaseListInput.shape,
    handler: handleDatabaseList,
  },
  ocr_db_select: {
    description:
      '[ESSENTIAL] Use to switch the active database. All page, queue and pipeline tools operate on it.',
    inputSchema: DatabaseSelectInput.shape,
    handler: handleDatabaseSelect,
  },
  ocr_db_stats: {
    description:
      '[ESSENTIAL] Use to see pages by quality and correction status, review backlog, queue depth and spend.',
    inputSchema: DatabaseStatsInput.shape,
    handler: handleDatabaseStats,
  },
};
