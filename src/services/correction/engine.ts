/**
 * Correction Engine
 *
 * Two-round LLM workflow: Round 1 repairs the OCR text, Round 2 assesses
 * the repair. A correction record is written only when both rounds
 * succeed; every other path leaves the page's correction state untouched
 * (apart from the no-change rule) and reports why.
 *
 * Every billed call is appended to the cost ledger as soon as it returns,
 * so a Round-2 failure still accounts for Round 1's spend.
 *
 * @module correction/engine
 */

import type { CorrectionRecord } from '../../models/correction.js';
import type { Page } from '../../models/page.js';
import type { DatabaseService } from '../storage/database/index.js';
import type { CompletionRequest, CompletionResult, LlmCompletion } from '../llm/client.js';
import { RateLimitError } from '../llm/errors.js';
import type { CostGovernor } from '../governor/governor.js';
import type { DeferReason } from '../quality/classifier.js';
import { parseAssessment } from './assessment-parser.js';
import {
  ASSESSMENT_SYSTEM_PROMPT,
  buildAssessmentMessage,
  buildCorrectionPrompt,
} from './prompts.js';

const ASSESSMENT_MAX_TOKENS = 1000;

export interface CorrectionEngineOptions {
  documentType: string;
  enableHumanReview: boolean;
  /** Round-2 scores below this go to human review */
  minConfidenceForAutoApproval: number;
}

export type CorrectionDeferReason =
  | DeferReason
  | 'empty_correction'
  | 'assessment_unparsable'
  | 'llm_unavailable';

export type CorrectionOutcome =
  | { kind: 'corrected'; record: CorrectionRecord; reviewRequired: boolean }
  | { kind: 'deferred'; reason: CorrectionDeferReason; detail?: string }
  | { kind: 'unchanged' }
  | { kind: 'skipped'; reason: 'not_eligible' | 'already_corrected' };

type RoundResult =
  | { ok: true; result: CompletionResult; costUsd: number }
  | { ok: false; outcome: CorrectionOutcome };

export class CorrectionEngine {
  private readonly correctionPrompt: string;

  constructor(
    private readonly db: DatabaseService,
    private readonly llm: LlmCompletion,
    private readonly governor: CostGovernor,
    private readonly options: CorrectionEngineOptions
  ) {
    this.correctionPrompt = buildCorrectionPrompt(options.documentType);
  }

  /**
   * Whether the routing rules send an assessment to a human
   */
  requiresReview(assessment: {
    quality_score: number;
    confidence: string;
    needs_review: boolean;
  }): boolean {
    if (!this.options.enableHumanReview) {
      return false;
    }
    return (
      assessment.needs_review ||
      assessment.confidence === 'low' ||
      assessment.quality_score < this.options.minConfidenceForAutoApproval
    );
  }

  async correct(pageId: string, rawText: string): Promise<CorrectionOutcome> {
    const page = this.db.requirePage(pageId);
    const eligibility = this.checkEligibility(page);
    if (eligibility) {
      return eligibility;
    }

    const started = Date.now();

    // Round 1: correction
    const round1 = await this.billedRound(pageId, 'correct', this.correctionPrompt, rawText, {
      messages: [
        { role: 'system', content: this.correctionPrompt },
        { role: 'user', content: rawText },
      ],
    });
    if (!round1.ok) {
      return round1.outcome;
    }

    const correctedText = round1.result.text;
    if (correctedText.trim().length === 0) {
      console.error(`[CorrectionEngine] Empty Round 1 output for page ${pageId}`);
      return { kind: 'deferred', reason: 'empty_correction' };
    }

    if (correctedText.trim() === rawText.trim()) {
      this.db.markCorrectionUnchanged(pageId);
      console.error(`[CorrectionEngine] Page ${pageId} needed no changes`);
      return { kind: 'unchanged' };
    }

    // Round 2: assessment
    const round2 = await this.billedRound(
      pageId,
      'assess',
      ASSESSMENT_SYSTEM_PROMPT,
      `${rawText}\n${correctedText}`,
      {
        messages: [
          { role: 'system', content: ASSESSMENT_SYSTEM_PROMPT },
          { role: 'user', content: buildAssessmentMessage(rawText, correctedText) },
        ],
        temperature: 0,
        maxTokens: ASSESSMENT_MAX_TOKENS,
      }
    );
    if (!round2.ok) {
      return round2.outcome;
    }

    const parsed = parseAssessment(round2.result.text);
    if (!parsed.ok) {
      console.error(
        `[CorrectionEngine] Discarding correction for page ${pageId}: ${parsed.error} ` +
          `(response starts ${JSON.stringify(parsed.raw.slice(0, 120))})`
      );
      return { kind: 'deferred', reason: 'assessment_unparsable', detail: parsed.error };
    }

    const assessment = parsed.value;
    const reviewRequired = this.requiresReview(assessment);
    const modelId =
      round1.result.model === round2.result.model
        ? round1.result.model
        : `${round1.result.model},${round2.result.model}`;

    const record = this.db.insertCorrection(
      {
        page_id: pageId,
        original_text: rawText,
        corrected_text: correctedText,
        quality_score: assessment.quality_score,
        improvement_level: assessment.improvement_level,
        major_corrections: assessment.major_corrections,
        confidence: assessment.confidence,
        needs_review: assessment.needs_review,
        assessment_json: parsed.raw,
        model_id: modelId,
        api_cost_usd: round1.costUsd + round2.costUsd,
        processing_time_ms: Date.now() - started,
      },
      reviewRequired
    );

    console.error(
      `[CorrectionEngine] Page ${pageId} corrected: score=${assessment.quality_score} ` +
        `confidence=${assessment.confidence} ${reviewRequired ? 'review required' : 'auto-approved'} ` +
        `cost=$${record.api_cost_usd.toFixed(4)}`
    );
    return { kind: 'corrected', record, reviewRequired };
  }

  private checkEligibility(page: Page): CorrectionOutcome | null {
    if (page.quality_status !== 'acceptable' && page.quality_status !== 'needs_correction') {
      return { kind: 'skipped', reason: 'not_eligible' };
    }
    if (page.correction_status !== 'none') {
      return { kind: 'skipped', reason: 'already_corrected' };
    }
    return null;
  }

  /**
   * One governed, ledgered LLM call. Failures become deferrals.
   */
  private async billedRound(
    pageId: string,
    operation: 'correct' | 'assess',
    prompt: string,
    text: string,
    request: Omit<CompletionRequest, 'estimatedTokens'>
  ): Promise<RoundResult> {
    const preflight = this.governor.preflight(prompt, text, pageId);
    if (!preflight.ok) {
      return {
        ok: false,
        outcome: { kind: 'deferred', reason: this.governor.signal.reason ?? 'budget_exceeded' },
      };
    }

    try {
      const result = await this.llm.complete({
        ...request,
        estimatedTokens: preflight.estimatedTokens,
      });
      const costUsd = this.governor.recordCall(pageId, operation, result, preflight.estimatedTokens);
      return { ok: true, result, costUsd };
    } catch (error) {
      if (error instanceof RateLimitError) {
        const action = this.governor.handleRateLimit(error, { pageId });
        return {
          ok: false,
          outcome: { kind: 'deferred', reason: action === 'stop_all' ? 'daily_limit' : 'rate_limited' },
        };
      }
      const detail = error instanceof Error ? error.message : String(error);
      console.error(`[CorrectionEngine] ${operation} round failed for page ${pageId}: ${detail}`);
      return { ok: false, outcome: { kind: 'deferred', reason: 'llm_unavailable', detail } };
    }
  }
}
