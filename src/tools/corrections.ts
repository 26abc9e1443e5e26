/**
 * Correction MCP Tools
 *
 * Tools: ocr_correction_get, ocr_correction_history
 *
 * @module tools/corrections
 */

import type { CorrectionRecord } from '../models/index.js';
import { requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { MCPError, pageNotFoundError } from '../server/errors.js';
import { validateInput, CorrectionGetInput, CorrectionHistoryInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

function correctionView(record: CorrectionRecord, includeText: boolean) {
  return {
    correction_id: record.correction_id,
    page_id: record.page_id,
    quality_score: record.quality_score,
    improvement_level: record.improvement_level,
    confidence: record.confidence,
    needs_review: record.needs_review,
    major_corrections: record.major_corrections,
    model_id: record.model_id,
    api_cost_usd: record.api_cost_usd,
    processing_time_ms: record.processing_time_ms,
    created_at: record.created_at,
    reviewed_at: record.reviewed_at,
    review_decision: record.review_decision,
    ...(includeText && {
      original_text: record.original_text,
      corrected_text: record.corrected_text,
    }),
  };
}

/**
 * Handle ocr_correction_get - Latest correction for a page
 */
export async function handleCorrectionGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(CorrectionGetInput, params);
    const { db } = requireDatabase();
    const page = db.getPage(input.page_id);
    if (!page) {
      throw pageNotFoundError(input.page_id);
    }

    const record = db.getLatestCorrection(input.page_id);
    if (!record) {
      throw new MCPError('CORRECTION_NOT_FOUND', `Page ${input.page_id} has no correction`, {
        pageId: input.page_id,
        correctionStatus: page.correction_status,
      });
    }

    return formatResponse(
      successResult({
        correction: correctionView(record, true),
        correction_status: page.correction_status,
        next_steps:
          page.correction_status === 'review_required'
            ? [{ tool: 'ocr_page_mark_reviewed', description: 'Approve or reject this correction' }]
            : [],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle ocr_correction_history - Every correction for a page, newest first
 */
export async function handleCorrectionHistory(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(CorrectionHistoryInput, params);
    const { db } = requireDatabase();
    if (!db.getPage(input.page_id)) {
      throw pageNotFoundError(input.page_id);
    }

    const records = db.listCorrections(input.page_id);
    return formatResponse(
      successResult({
        page_id: input.page_id,
        corrections: records.map((r) => correctionView(r, input.include_text)),
        total: records.length,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const correctionTools: Record<string, ToolDefinition> = {
  ocr_correction_get: {
    description:
      '[ESSENTIAL] Use to read the latest correction of a page: original and corrected text, score, confidence, needs_review.',
    inputSchema: CorrectionGetInput.shape,
    handler: handleCorrectionGet,
  },
  ocr_correction_history: {
    description:
      '[REVIEW] Use to list all correction records of a page, newest first. Set include_text for full bodies.',
    inputSchema: CorrectionHistoryInput.shape,
    handler: handleCorrectionHistory,
  },
};
