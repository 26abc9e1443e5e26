/**
 * Shared Startup Validation
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { loadLlmConfig } from '../services/llm/config.js';
import { loadPipelineConfig, validatePipelineConfig } from '../services/pipeline/config.js';
import { selectDatabase, getDefaultStoragePath } from './state.js';
import { DatabaseService } from '../services/storage/database/index.js';

/**
 * Report configuration problems and open OCR_CONVERGENCE_DB when it exists.
 * Warnings only: a misconfigured pipeline still leaves the read tools usable.
 */
export function validateStartupDependencies(): void {
  const messages: string[] = [];
  try {
    const validation = validatePipelineConfig(loadPipelineConfig(), loadLlmConfig());
    messages.push(...validation.issues, ...validation.warnings);
  } catch (error) {
    messages.push(error instanceof Error ? error.message : String(error));
  }

  if (messages.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const m of messages) {
      console.error(`  - ${m}`);
    }
    console.error('========================');
  }

  const dbName = process.env.OCR_CONVERGENCE_DB;
  if (dbName && DatabaseService.exists(dbName, getDefaultStoragePath())) {
    selectDatabase(dbName);
    console.error(`[Config] Selected database "${dbName}" from OCR_CONVERGENCE_DB`);
  }
}
