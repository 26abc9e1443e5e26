/**
 * Correction record interfaces
 *
 * Correction records are append-only: one row per successful two-round
 * correction, the latest being authoritative for display. Only the review
 * resolution columns are ever stamped after insert.
 */

export type Confidence = 'low' | 'medium' | 'high';

export const CONFIDENCE_LEVELS: readonly Confidence[] = ['low', 'medium', 'high'];

export type ImprovementLevel = 'minimal' | 'moderate' | 'significant' | 'substantial';

export const IMPROVEMENT_LEVELS: readonly ImprovementLevel[] = [
  'minimal',
  'moderate',
  'significant',
  'substantial',
];

export type ReviewDecision = 'approved' | 'rejected';

/**
 * Structured Round-2 assessment returned by the LLM
 */
export interface CorrectionAssessment {
  /** 1-100 */
  quality_score: number;
  improvement_level: ImprovementLevel;
  major_corrections: string[];
  confidence: Confidence;
  needs_review: boolean;
}

export interface CorrectionRecord extends CorrectionAssessment {
  /** UUID v4 identifier */
  correction_id: string;

  page_id: string;

  /** Raw text the correction was computed from, verbatim */
  original_text: string;

  corrected_text: string;

  /** Raw Round-2 response as received */
  assessment_json: string;

  model_id: string;

  /** Sum of both rounds' billed cost */
  api_cost_usd: number;

  processing_time_ms: number;

  created_at: string;

  reviewed_at: string | null;

  review_decision: ReviewDecision | null;
}
