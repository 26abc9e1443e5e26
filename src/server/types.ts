/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { DatabaseService } from '../services/storage/database/index.js';
import type { PipelineDeps } from '../services/pipeline/factory.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerConfig {
  /** Directory holding the Page Store databases */
  defaultStoragePath: string;

  /** Collaborators handed to every pipeline the server builds */
  pipelineDeps: PipelineDeps;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerState {
  currentDatabase: DatabaseService | null;

  currentDatabaseName: string | null;

  config: ServerConfig;
}
