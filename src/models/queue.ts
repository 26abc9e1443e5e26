/**
 * Reprocessing queue interfaces
 *
 * Backlog of pages flagged for a higher-effort OCR pass outside the
 * standard rescan loop. At most one active entry exists per page.
 */

export type QueueStatus = 'queued' | 'processing' | 'completed' | 'failed';

export const QUEUE_STATUSES: readonly QueueStatus[] = ['queued', 'processing', 'completed', 'failed'];

/** Statuses covered by the one-active-entry-per-page index */
export const ACTIVE_QUEUE_STATUSES: readonly QueueStatus[] = ['queued', 'processing'];

/**
 * Forward-only transitions plus the manual failed -> queued retry
 */
export const QUEUE_TRANSITIONS: Readonly<Record<QueueStatus, readonly QueueStatus[]>> = {
  queued: ['processing'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: ['queued'],
};

/** Priority for pages whose detection confidence is above 0.8 */
export const HIGH_PRIORITY = 10;

export const NORMAL_PRIORITY = 5;

export interface QueueEntry {
  /** UUID v4 identifier */
  queue_id: string;
  page_id: string;
  reason: string;
  /** Higher = more urgent */
  priority: number;
  status: QueueStatus;
  error_message: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}
