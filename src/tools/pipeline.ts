/**
 * Pipeline MCP Tools
 *
 * Tools: ocr_pipeline_run, ocr_budget_status
 *
 * A run holds the selected database for its whole duration; database
 * switches are refused until it settles.
 *
 * @module tools/pipeline
 */

import { loadLlmConfig } from '../services/llm/config.js';
import {
  createPipeline,
  loadPipelineConfig,
  validatePipelineConfig,
} from '../services/pipeline/index.js';
import { CostGovernor } from '../services/governor/governor.js';
import { pageView } from './pages.js';
import { requireDatabase, state, withDatabaseOperation } from '../server/state.js';
import { successResult } from '../server/types.js';
import { configurationError } from '../server/errors.js';
import { validateInput, PipelineRunInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * Handle ocr_pipeline_run - Converge candidate pages in process
 */
export async function handlePipelineRun(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PipelineRunInput, params);
    const config = loadPipelineConfig();
    const llmConfig = loadLlmConfig();
    const validation = validatePipelineConfig(config, llmConfig);
    for (const warning of validation.warnings) {
      console.error(`[Pipeline] Warning: ${warning}`);
    }
    if (validation.issues.length > 0) {
      throw configurationError(validation.issues.join('; '), { issues: validation.issues });
    }

    const runOptions = {
      limit: input.limit,
      pageIds: input.page_ids,
      correction: input.correction,
    };

    return await withDatabaseOperation(async (db) => {
      const pipeline = createPipeline(db, config, llmConfig, state.config.pipelineDeps);

      if (input.dry_run) {
        const candidates = pipeline.runner.listCandidates(runOptions);
        return formatResponse(
          successResult({
            dry_run: true,
            candidates: candidates.map(pageView),
            total: candidates.length,
          })
        );
      }

      const summary = await pipeline.runner.run(runOptions);
      return formatResponse(
        successResult({
          summary,
          next_steps:
            summary.counts.reviewRequired > 0
              ? [{ tool: 'ocr_page_list', description: 'List pages with needs_manual_review=true' }]
              : [{ tool: 'ocr_db_stats', description: 'Check convergence progress' }],
        })
      );
    });
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle ocr_budget_status - Rolling 24h spend against the ceiling
 */
export async function handleBudgetStatus(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const { db } = requireDatabase();
    const config = loadPipelineConfig();
    const llmConfig = loadLlmConfig();
    const governor = new CostGovernor(db, {
      maxDailyCostUsd: config.maxDailyCostUsd,
      tokenBufferRatio: config.tokenBufferRatio,
      inputCostPerMTok: llmConfig.inputCostPerMTok,
      outputCostPerMTok: llmConfig.outputCostPerMTok,
    });
    return formatResponse(
      successResult({
        ...governor.getBudgetStatus(),
        billed_calls: db.countLedgerEntries(),
        recent_calls: db.listLedgerEntries({ limit: 10 }),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const pipelineTools: Record<string, ToolDefinition> = {
  ocr_pipeline_run: {
    description:
      '[PROCESSING] Use to assess, rescan and correct candidate pages. Stops gracefully at the daily limit or budget ceiling. Returns the run summary.',
    inputSchema: PipelineRunInput.shape,
    handler: handlePipelineRun,
  },
  ocr_budget_status: {
    description: '[STATUS] Use to see rolling 24h API spend, the ceiling and what remains.',
    inputSchema: {},
    handler: handleBudgetStatus,
  },
};
