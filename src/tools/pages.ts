/**
 * Page MCP Tools
 *
 * Tools: ocr_page_register, ocr_page_get, ocr_page_list, ocr_page_mark_reviewed,
 * ocr_page_reset
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/pages
 */

import { existsSync } from 'fs';
import { resolve } from 'path';
import type { Page } from '../models/index.js';
import { FileTextStore } from '../services/storage/text-store.js';
import { loadPipelineConfig } from '../services/pipeline/config.js';
import { requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { pathNotFoundError, pageNotFoundError } from '../server/errors.js';
import {
  validateInput,
  PageRegisterInput,
  PageGetInput,
  PageListInput,
  PageResetInput,
  MarkReviewedInput,
} from '../utils/validation.js';
import {
  formatResponse,
  handleError,
  type NextStep,
  type ToolDefinition,
  type ToolResponse,
} from './shared.js';

/**
 * Public view of a page row. Claim columns are internal to the pipeline.
 */
export function pageView(page: Page) {
  return {
    page_id: page.page_id,
    image_path: page.image_path,
    text_path: page.text_path,
    raw_text_hash: page.raw_text_hash,
    raw_text_length: page.raw_text_length,
    text_revision: page.text_revision,
    quality_status: page.quality_status,
    quality_score: page.quality_score,
    quality_reasons: page.quality_reasons,
    assessment_current: page.assessed_revision === page.text_revision,
    rescan_attempts: page.rescan_attempts,
    last_attempt_at: page.last_attempt_at,
    needs_manual_review: page.needs_manual_review,
    correction_status: page.correction_status,
    latest_correction_id: page.latest_correction_id,
    updated_at: page.updated_at,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PAGE TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Handle ocr_page_register - Create a page row from files under the data dir
 */
export async function handlePageRegister(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PageRegisterInput, params);
    const { db } = requireDatabase();
    const config = loadPipelineConfig();
    const store = new FileTextStore(config.dataDir, db);

    const textFile = store.resolvePath(input.text_path);
    if (!existsSync(textFile)) {
      throw pathNotFoundError(textFile);
    }
    const imageFile = resolve(config.dataDir, input.image_path);
    if (!existsSync(imageFile)) {
      throw pathNotFoundError(imageFile);
    }

    const fp = store.describe(input.text_path);
    const page = db.insertPage({
      page_id: input.page_id,
      image_path: input.image_path,
      text_path: input.text_path,
      ...fp,
    });
    console.error(`[Pages] Registered ${page.page_id} (${fp.raw_text_length} chars)`);

    return formatResponse(
      successResult({
        page: pageView(page),
        next_steps: [{ tool: 'ocr_pipeline_run', description: 'Assess and converge the new page' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle ocr_page_get - Quality and correction state of one page
 */
export async function handlePageGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PageGetInput, params);
    const { db } = requireDatabase();
    const page = db.getPage(input.page_id);
    if (!page) {
      throw pageNotFoundError(input.page_id);
    }

    const nextSteps: NextStep[] = [];
    if (page.latest_correction_id) {
      nextSteps.push({ tool: 'ocr_correction_get', description: 'View the latest correction' });
    }
    if (page.quality_status === 'failed') {
      nextSteps.push({ tool: 'ocr_page_reset', description: 'Return the page to the pipeline' });
    }

    return formatResponse(successResult({ page: pageView(page), next_steps: nextSteps }));
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle ocr_page_list - Filtered, paginated page listing
 */
export async function handlePageList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PageListInput, params);
    const { db } = requireDatabase();
    const filter = {
      quality_status: input.quality_status,
      correction_status: input.correction_status,
      needs_manual_review: input.needs_manual_review,
    };
    const pages = db.listPages({ ...filter, limit: input.limit, offset: input.offset });
    const total = db.countPages(filter);
    const hasMore = input.offset + pages.length < total;

    return formatResponse(
      successResult({
        pages: pages.map(pageView),
        total,
        returned: pages.length,
        offset: input.offset,
        limit: input.limit,
        has_more: hasMore,
        next_steps: hasMore
          ? [{ tool: 'ocr_page_list', description: `Get next page (offset=${input.offset + input.limit})` }]
          : [],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle ocr_page_mark_reviewed - Resolve a correction that awaited review
 */
export async function handlePageMarkReviewed(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(MarkReviewedInput, params);
    const { db } = requireDatabase();
    const record = db.markCorrectionReviewed(input.correction_id, input.decision);
    const page = db.requirePage(record.page_id);
    console.error(`[Pages] Correction ${record.correction_id} ${input.decision} for ${page.page_id}`);

    return formatResponse(
      successResult({
        correction_id: record.correction_id,
        review_decision: record.review_decision,
        reviewed_at: record.reviewed_at,
        page: pageView(page),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Handle ocr_page_reset - Manual failed → unchecked path
 */
export async function handlePageReset(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PageResetInput, params);
    const { db } = requireDatabase();
    const page = db.resetPage(input.page_id);
    console.error(`[Pages] Reset failed page ${page.page_id}`);

    return formatResponse(
      successResult({
        page: pageView(page),
        next_steps: [{ tool: 'ocr_pipeline_run', description: 'Re-run the pipeline on this page' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const pageTools: Record<string, ToolDefinition> = {
  ocr_page_register: {
    description:
      '[SETUP] Use to register a page from an image and its OCR text file (paths relative to OCR_DATA_DIR). Computes hash and length.',
    inputSchema: PageRegisterInput.shape,
    handler: handlePageRegister,
  },
  ocr_page_get: {
    description:
      '[ESSENTIAL] Use to see one page: quality status, score, reasons, rescan attempts, review flag and correction status.',
    inputSchema: PageGetInput.shape,
    handler: handlePageGet,
  },
  ocr_page_list: {
    description:
      '[ESSENTIAL] Use to list pages filtered by quality status, correction status or needs_manual_review. Paginated.',
    inputSchema: PageListInput.shape,
    handler: handlePageList,
  },
  ocr_page_mark_reviewed: {
    description:
      '[REVIEW] Use to approve or reject a correction that required human review. Clears the page review flag.',
    inputSchema: MarkReviewedInput.shape,
    handler: handlePageMarkReviewed,
  },
  ocr_page_reset: {
    description:
      '[ADMIN] Use to return a failed page to unchecked. Clears attempts, review flag and assessment. Requires confirm=true.',
    inputSchema: PageResetInput.shape,
    handler: handlePageReset,
  },
};
