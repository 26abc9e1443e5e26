/**
 * Zod Validation Schemas for MCP tool inputs
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { QUALITY_STATUSES, CORRECTION_STATUSES } from '../models/page.js';
import { QUEUE_STATUSES } from '../models/queue.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

function enumOf<T extends string>(values: readonly T[]) {
  return z.string().refine((v): v is T => values.some((allowed) => allowed === v), {
    message: `Expected one of: ${values.join(', ')}`,
  });
}

export const QualityStatusSchema = enumOf(QUALITY_STATUSES);

export const CorrectionStatusSchema = enumOf(CORRECTION_STATUSES);

export const QueueStatusSchema = enumOf(QUEUE_STATUSES);

export const ReviewDecisionSchema = z.enum(['approved', 'rejected']);

const PageId = z
  .string()
  .min(1, 'page_id is required')
  .max(256, 'page_id must be 256 characters or less');

const Limit = z.number().int().min(1).max(500).default(50);

const Offset = z.number().int().min(0).default(0);

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE MANAGEMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DatabaseCreateInput = z.object({
  name: z
    .string()
    .min(1, 'Database name is required')
    .max(64, 'Database name must be 64 characters or less')
    .regex(
      /^[a-zA-Z0-9_-]+$/,
      'Database name must contain only alphanumeric characters, underscores, and hyphens'
    ),
  description: z.string().max(500, 'Description must be 500 characters or less').optional(),
  storage_path: z.string().optional(),
});

export const DatabaseListInput = z.object({
  limit: Limit.describe('Maximum number of databases to return (default 50)'),
  offset: Offset.describe('Number of databases to skip for pagination'),
});

export const DatabaseSelectInput = z.object({
  database_name: z.string().min(1, 'Database name is required'),
});

export const DatabaseStatsInput = z.object({
  database_name: z.string().optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PAGE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const PageRegisterInput = z.object({
  page_id: PageId,
  image_path: z.string().min(1, 'image_path is required'),
  text_path: z.string().min(1, 'text_path is required'),
});

export const PageGetInput = z.object({
  page_id: PageId,
});

export const PageListInput = z.object({
  quality_status: QualityStatusSchema.optional(),
  correction_status: CorrectionStatusSchema.optional(),
  needs_manual_review: z.boolean().optional(),
  limit: Limit,
  offset: Offset,
});

export const PageResetInput = z.object({
  page_id: PageId,
  confirm: z.literal(true, {
    errorMap: () => ({ message: 'Confirm must be true to reset a failed page' }),
  }),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CORRECTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const CorrectionGetInput = z.object({
  page_id: PageId,
});

export const CorrectionHistoryInput = z.object({
  page_id: PageId,
  include_text: z
    .boolean()
    .default(false)
    .describe('Include original and corrected text bodies for every record'),
});

export const MarkReviewedInput = z.object({
  correction_id: z.string().uuid('correction_id must be a UUID'),
  decision: ReviewDecisionSchema,
});

// ═══════════════════════════════════════════════════════════════════════════════
// QUEUE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const QueueListInput = z.object({
  status: QueueStatusSchema.optional(),
  limit: Limit,
  offset: Offset,
});

export const QueueEnqueueInput = z.object({
  page_id: PageId,
  reason: z.string().min(1).max(200).default('manual'),
  priority: z
    .number()
    .int()
    .min(0)
    .max(100)
    .optional()
    .describe('Defaults to 10 when local detection is confident the page is unusable, else 5'),
});

export const QueueEntryInput = z.object({
  queue_id: z.string().uuid('queue_id must be a UUID'),
});

export const QueueFailInput = z.object({
  queue_id: z.string().uuid('queue_id must be a UUID'),
  error_message: z.string().min(1, 'error_message is required').max(2000),
});

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const PipelineRunInput = z.object({
  limit: z.number().int().min(1).max(10_000).optional(),
  page_ids: z.array(PageId).min(1).max(1000).optional(),
  correction: z.boolean().default(true),
  dry_run: z.boolean().default(false).describe('List candidate pages without claiming them'),
});
