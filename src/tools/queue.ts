/**
 * Reprocessing Queue MCP Tools
 *
 * Drive the external high-effort worker: queued → processing →
 * completed | failed, and failed → queued on manual retry.
 *
 * Tools: ocr_queue_list, ocr_queue_enqueue, ocr_queue_claim, ocr_queue_complete,
 * ocr_queue_fail, ocr_queue_retry
 *
 * @module tools/queue
 */

import { HIGH_PRIORITY, type QueueEntry } from '../models/index.js';
import { FileTextStore, TextIntegrityError } from '../services/storage/text-store.js';
import { detectLocalSignals } from '../services/quality/detector.js';
import { priorityForConfidence } from '../services/rescan/engine.js';
import { loadPipelineConfig } from '../services/pipeline/config.js';
import type { DatabaseService } from '../services/storage/database/index.js';
import { requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import {
  validateInput,
  QueueListInput,
  QueueEnqueueInput,
  QueueEntryInput,
  QueueFailInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

/**
 * Priority for an enqueue that names none: how sure local detection is that
 * the current text is unusable. Unreadable text is treated as unusable.
 */
function defaultPriority(db: DatabaseService, pageId: string): number {
  const page = db.requirePage(pageId);
  const config = loadPipelineConfig();
  try {
    const text = new FileTextStore(config.dataDir, db).read(page);
    return priorityForConfidence(
      detectLocalSignals(text, { minTextLength: config.minTextLength }).confidence
    );
  } catch (error) {
    if (error instanceof TextIntegrityError) {
      console.error(`[Queue] ${error.message}; enqueueing at high priority`);
      return HIGH_PRIORITY;
    }
    throw error;
  }
}

function entryResponse(entry: QueueEntry, extra: Record<string, unknown> = {}): ToolResponse {
  return formatResponse(successResult({ entry, ...extra }));
}

export async function handleQueueList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(QueueListInput, params);
    const { db } = requireDatabase();
    const entries = db.listQueue({ status: input.status, limit: input.limit, offset: input.offset });
    return formatResponse(
      successResult({
        entries,
        returned: entries.length,
        offset: input.offset,
        limit: input.limit,
        queue_by_status: db.getStats().queue_by_status,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleQueueEnqueue(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(QueueEnqueueInput, params);
    const { db } = requireDatabase();
    const priority = input.priority ?? defaultPriority(db, input.page_id);
    const { entry, created } = db.enqueuePage(input.page_id, input.reason, priority);
    if (created) {
      console.error(`[Queue] Enqueued ${input.page_id} (${input.reason}, priority ${priority})`);
    }
    return entryResponse(entry, { created });
  } catch (error) {
    return handleError(error);
  }
}

export async function handleQueueClaim(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const { db } = requireDatabase();
    const entry = db.claimNextQueueEntry();
    return formatResponse(
      successResult({
        entry,
        claimed: entry !== null,
        next_steps: entry
          ? [
              { tool: 'ocr_queue_complete', description: 'Mark the entry done' },
              { tool: 'ocr_queue_fail', description: 'Record a failure' },
            ]
          : [],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleQueueComplete(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(QueueEntryInput, params);
    const { db } = requireDatabase();
    return entryResponse(db.completeQueueEntry(input.queue_id));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleQueueFail(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(QueueFailInput, params);
    const { db } = requireDatabase();
    return entryResponse(db.failQueueEntry(input.queue_id, input.error_message), {
      next_steps: [{ tool: 'ocr_queue_retry', description: 'Put the entry back in the queue' }],
    });
  } catch (error) {
    return handleError(error);
  }
}

export async function handleQueueRetry(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(QueueEntryInput, params);
    const { db } = requireDatabase();
    return entryResponse(db.retryQueueEntry(input.queue_id));
  } catch (error) {
    return handleError(error);
  }
}

export const queueTools: Record<string, ToolDefinition> = {
  ocr_queue_list: {
    description: '[QUEUE] Use to list reprocessing queue entries, highest priority first, optionally by status.',
    inputSchema: QueueListInput.shape,
    handler: handleQueueList,
  },
  ocr_queue_enqueue: {
    description:
      '[QUEUE] Use to hand a page to high-effort reprocessing. Idempotent: returns the active entry if one exists.',
    inputSchema: QueueEnqueueInput.shape,
    handler: handleQueueEnqueue,
  },
  ocr_queue_claim: {
    description: '[QUEUE] Use to take the next queued entry (queued → processing). Returns null when empty.',
    inputSchema: {},
    handler: handleQueueClaim,
  },
  ocr_queue_complete: {
    description: '[QUEUE] Use to mark a processing entry completed.',
    inputSchema: QueueEntryInput.shape,
    handler: handleQueueComplete,
  },
  ocr_queue_fail: {
    description: '[QUEUE] Use to mark a processing entry failed with an error message.',
    inputSchema: QueueFailInput.shape,
    handler: handleQueueFail,
  },
  ocr_queue_retry: {
    description: '[QUEUE] Use to put a failed entry back in the queue (failed → queued).',
    inputSchema: QueueEntryInput.shape,
    handler: handleQueueRetry,
  },
};
