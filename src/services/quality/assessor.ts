/**
 * Quality Assessor
 *
 * Turns raw OCR text into a verdict: the local detector first, then the
 * optional remote classifier. The assessor owns the quality_score,
 * quality_status, quality_reasons and assessed_revision columns.
 *
 * @module quality/assessor
 */

import type { Page, QualityStatus } from '../../models/page.js';
import type { DatabaseService } from '../storage/database/index.js';
import { detectLocalSignals, type DetectorOptions } from './detector.js';
import type { DeferReason, RemoteClassifier } from './classifier.js';

export interface Verdict {
  /** 0 or 100 */
  quality_score: number;
  quality_status: Extract<QualityStatus, 'acceptable' | 'needs_rescan' | 'needs_correction'>;
  reasons: string[];
  /** Detector confidence, drives reprocessing queue priority */
  confidence: number;
}

export type AssessmentOutcome =
  | { kind: 'assessed'; verdict: Verdict }
  | { kind: 'deferred'; reason: DeferReason };

export class QualityAssessor {
  constructor(
    private readonly options: DetectorOptions,
    /** Null when the remote classifier is disabled */
    private readonly classifier: RemoteClassifier | null
  ) {}

  /**
   * Compute a verdict without writing anything
   */
  async assess(pageId: string, rawText: string): Promise<AssessmentOutcome> {
    const local = detectLocalSignals(rawText, this.options);
    if (!local.passed) {
      return {
        kind: 'assessed',
        verdict: {
          quality_score: 0,
          quality_status: 'needs_rescan',
          reasons: local.hard,
          confidence: local.confidence,
        },
      };
    }

    if (this.classifier) {
      const remote = await this.classifier.classify(pageId, rawText);
      if (remote.kind === 'deferred') {
        return remote;
      }
      if (remote.kind === 'rejected') {
        return {
          kind: 'assessed',
          verdict: {
            quality_score: 0,
            quality_status: 'needs_rescan',
            reasons: [remote.reason],
            confidence: local.confidence,
          },
        };
      }
    }

    return {
      kind: 'assessed',
      verdict: {
        quality_score: 100,
        quality_status: local.soft.length > 0 ? 'needs_correction' : 'acceptable',
        reasons: local.soft,
        confidence: local.confidence,
      },
    };
  }

  /**
   * Assess a page's current text and record the verdict against its
   * text revision. A deferred assessment writes nothing.
   */
  async assessPage(
    db: DatabaseService,
    page: Page,
    rawText: string
  ): Promise<{ outcome: AssessmentOutcome; page: Page }> {
    const outcome = await this.assess(page.page_id, rawText);
    if (outcome.kind === 'deferred') {
      console.error(`[Assessor] Page ${page.page_id} deferred: ${outcome.reason}`);
      return { outcome, page };
    }

    const updated = db.writeAssessment(page.page_id, {
      quality_score: outcome.verdict.quality_score,
      quality_status: outcome.verdict.quality_status,
      quality_reasons: outcome.verdict.reasons,
      assessed_revision: page.text_revision,
    });
    return { outcome, page: updated };
  }
}
