/**
 * Page interfaces for the OCR convergence pipeline
 *
 * A page is one scanned image's text-quality lifecycle record. Rows are
 * created at indexing time and updated in place by the Quality Assessor,
 * Rescan Engine and Correction Engine, each on the columns it owns.
 */

/**
 * Quality status of a page's current raw text
 */
export type QualityStatus =
  | 'unchecked'
  | 'acceptable'
  | 'needs_rescan'
  | 'needs_correction'
  | 'failed';

export const QUALITY_STATUSES: readonly QualityStatus[] = [
  'unchecked',
  'acceptable',
  'needs_rescan',
  'needs_correction',
  'failed',
];

/**
 * Correction lifecycle of a page (owned by the Correction Engine)
 */
export type CorrectionStatus = 'none' | 'completed' | 'review_required' | 'unchanged' | 'reviewed';

export const CORRECTION_STATUSES: readonly CorrectionStatus[] = [
  'none',
  'completed',
  'review_required',
  'unchanged',
  'reviewed',
];

/**
 * Automatic quality transitions. Writing the same status again is always
 * allowed. `failed` only leaves through the manual reset path.
 */
export const QUALITY_TRANSITIONS: Readonly<Record<QualityStatus, readonly QualityStatus[]>> = {
  unchecked: ['acceptable', 'needs_rescan', 'needs_correction'],
  needs_rescan: ['acceptable', 'needs_correction', 'failed'],
  acceptable: [],
  needs_correction: [],
  failed: [],
};

/**
 * Thrown when a status write is not in the transition table
 */
export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string,
    public readonly pageId?: string
  ) {
    super(
      `Illegal quality transition ${from} -> ${to}${pageId ? ` for page ${pageId}` : ''}`
    );
    this.name = 'IllegalTransitionError';
  }
}

export function isQualityTransitionAllowed(from: QualityStatus, to: QualityStatus): boolean {
  return from === to || QUALITY_TRANSITIONS[from].includes(to);
}

export function assertQualityTransition(
  from: QualityStatus,
  to: QualityStatus,
  pageId?: string
): void {
  if (!isQualityTransitionAllowed(from, to)) {
    throw new IllegalTransitionError(from, to, pageId);
  }
}

/**
 * One scanned page's text-quality record
 */
export interface Page {
  /** Stable identifier, shared with the image asset */
  page_id: string;

  /** Source image path, relative to the data directory */
  image_path: string;

  /** Canonical raw OCR text file, relative to the data directory */
  text_path: string;

  /** SHA-256 of the canonical text (format: 'sha256:...') */
  raw_text_hash: string;

  raw_text_length: number;

  /** Bumped on every accepted text replacement */
  text_revision: number;

  /** 0-100, null until assessed */
  quality_score: number | null;

  quality_status: QualityStatus;

  /** Reason codes of the latest verdict */
  quality_reasons: string[];

  /** text_revision the current verdict was computed for */
  assessed_revision: number | null;

  rescan_attempts: number;

  /** ISO 8601 timestamp of the latest rescan or correction attempt */
  last_attempt_at: string | null;

  needs_manual_review: boolean;

  correction_status: CorrectionStatus;

  latest_correction_id: string | null;

  /** Worker holding the page, null when unclaimed */
  claimed_by: string | null;

  claimed_at: string | null;

  created_at: string;

  updated_at: string;
}

/**
 * Fields supplied by the indexer when a page row is created
 */
export interface NewPage {
  page_id: string;
  image_path: string;
  text_path: string;
  raw_text_hash: string;
  raw_text_length: number;
}
