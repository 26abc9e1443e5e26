/**
 * Page Processor
 *
 * Converges one claimed page: assess when the verdict is missing or stale,
 * rescan while the page is flagged and attempts remain, then correct when
 * the page is eligible. Every step re-reads the row, so re-running on a page
 * that already converged does nothing.
 *
 * @module pipeline/page-processor
 */

import type { Page, QualityStatus } from '../../models/page.js';
import type { DatabaseService } from '../storage/database/index.js';
import { TextIntegrityError, type FileTextStore } from '../storage/text-store.js';
import type { QualityAssessor } from '../quality/assessor.js';
import type { RescanEngine, RescanStepOutcome } from '../rescan/engine.js';
import type { CorrectionEngine, CorrectionOutcome } from '../correction/engine.js';
import type { RunSignal } from '../governor/run-signal.js';
import type { CorrectionScope } from './config.js';

export interface PageProcessResult {
  pageId: string;
  assessed: number;
  rescanAttempts: number;
  failed: boolean;
  correction: CorrectionOutcome | null;
  /** Why the page stopped short of converging in this run */
  deferred: string | null;
  finalStatus: QualityStatus;
}

export function correctableStatuses(scope: CorrectionScope): readonly QualityStatus[] {
  switch (scope) {
    case 'all':
      return ['acceptable', 'needs_correction'];
    case 'flagged':
      return ['needs_correction'];
    case 'off':
      return [];
  }
}

export function needsAssessment(page: Page): boolean {
  if (page.quality_status === 'failed') return false;
  return page.quality_status === 'unchecked' || page.assessed_revision !== page.text_revision;
}

export class PageProcessor {
  constructor(
    private readonly db: DatabaseService,
    private readonly textStore: FileTextStore,
    private readonly assessor: QualityAssessor,
    private readonly rescan: RescanEngine,
    /** Null when correction is off for the whole process */
    private readonly correction: CorrectionEngine | null,
    private readonly signal: RunSignal,
    private readonly options: { maxRescanAttempts: number; correctionScope: CorrectionScope }
  ) {}

  async process(pageId: string, runOptions: { correction: boolean } = { correction: true }): Promise<PageProcessResult> {
    let page = this.db.requirePage(pageId);
    const result: PageProcessResult = {
      pageId,
      assessed: 0,
      rescanAttempts: 0,
      failed: false,
      correction: null,
      deferred: null,
      finalStatus: page.quality_status,
    };

    if (page.quality_status === 'failed') {
      return result;
    }

    // Each rescan attempt can add one re-assessment
    const maxSteps = 2 * (this.options.maxRescanAttempts + 1) + 1;
    for (let step = 0; step < maxSteps; step++) {
      if (this.signal.stopped) {
        result.deferred = this.signal.reason;
        break;
      }

      if (needsAssessment(page)) {
        const text = this.readText(page, result);
        if (text === null) break;
        const assessed = await this.assessor.assessPage(this.db, page, text);
        if (assessed.outcome.kind === 'deferred') {
          result.deferred = assessed.outcome.reason;
          break;
        }
        result.assessed++;
        page = assessed.page;
        continue;
      }

      if (page.quality_status !== 'needs_rescan') {
        break;
      }

      let outcome: RescanStepOutcome;
      try {
        outcome = await this.rescan.step(pageId);
      } catch (error) {
        if (error instanceof TextIntegrityError) {
          this.deferIntegrity(error, result);
          break;
        }
        throw error;
      }

      if (outcome.kind === 'noop') {
        break;
      }
      if (outcome.kind === 'exhausted') {
        if (outcome.strategy !== null) result.rescanAttempts++;
        result.failed = true;
        page = outcome.page;
        break;
      }
      result.rescanAttempts++;
      page = outcome.page;
    }

    result.finalStatus = page.quality_status;

    if (this.shouldCorrect(page, runOptions.correction) && this.correction) {
      const text = this.readText(page, result);
      if (text !== null) {
        result.correction = await this.correction.correct(pageId, text);
        if (result.correction.kind === 'deferred') {
          result.deferred = result.correction.reason;
        }
      }
    }

    return result;
  }

  private shouldCorrect(page: Page, enabled: boolean): boolean {
    if (!enabled || this.signal.stopped) return false;
    if (page.correction_status !== 'none' || needsAssessment(page)) return false;
    return correctableStatuses(this.options.correctionScope).includes(page.quality_status);
  }

  private readText(page: Page, result: PageProcessResult): string | null {
    try {
      return this.textStore.read(page);
    } catch (error) {
      if (error instanceof TextIntegrityError) {
        this.deferIntegrity(error, result);
        return null;
      }
      throw error;
    }
  }

  private deferIntegrity(error: TextIntegrityError, result: PageProcessResult): void {
    console.error(`[Pipeline] Deferring page ${error.pageId}: ${error.message}`);
    result.deferred = 'text_integrity';
  }
}
