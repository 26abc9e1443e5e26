/**
 * Rescan Engine
 *
 * Drives bounded re-extraction for pages flagged `needs_rescan`. Each call
 * performs at most one attempt. The engine owns the canonical text, the
 * attempt counter, last_attempt_at, and the `failed` status with its
 * review flag on exhaustion.
 *
 * @module rescan/engine
 */

import type { Page } from '../../models/page.js';
import { HIGH_PRIORITY, NORMAL_PRIORITY } from '../../models/queue.js';
import type { DatabaseService } from '../storage/database/index.js';
import type { FileTextStore } from '../storage/text-store.js';
import type { OcrExtractor } from '../ocr/extractor.js';
import type { ImageStore } from '../ocr/image-store.js';
import { detectLocalSignals, type DetectorOptions } from '../quality/detector.js';
import { nextRescanState, rescanStateFromPage } from './state-machine.js';
import { strategyForAttempt, type RescanStrategyName } from './strategies.js';

export const EXHAUSTED_REASON = 'rescan_exhausted';

/**
 * Queue priority for an explicit enqueue, from the detector's confidence
 * that the page is unusable
 */
export function priorityForConfidence(confidence: number): number {
  return confidence > 0.8 ? HIGH_PRIORITY : NORMAL_PRIORITY;
}

export interface RescanEngineOptions extends DetectorOptions {
  maxRescanAttempts: number;
}

export type RescanStepOutcome =
  | { kind: 'noop'; reason: 'terminal' | 'not_flagged' | 'stale_assessment' }
  | {
      kind: 'attempted';
      accepted: boolean;
      strategy: RescanStrategyName;
      page: Page;
    }
  | {
      kind: 'exhausted';
      /** Strategy of the attempt made in this call, if any */
      strategy: RescanStrategyName | null;
      page: Page;
      queueId: string;
    };

export class RescanEngine {
  constructor(
    private readonly db: DatabaseService,
    private readonly textStore: FileTextStore,
    private readonly extractor: OcrExtractor,
    private readonly images: ImageStore,
    private readonly options: RescanEngineOptions
  ) {}

  /**
   * Run one rescan step. Re-invoking on an acceptable or failed page is a
   * no-op checked before any work is done.
   */
  async step(pageId: string): Promise<RescanStepOutcome> {
    const page = this.db.requirePage(pageId);
    const state = rescanStateFromPage(page);

    if (state.kind === 'acceptable' || state.kind === 'failed') {
      return { kind: 'noop', reason: 'terminal' };
    }
    if (state.kind !== 'scored') {
      return { kind: 'noop', reason: 'not_flagged' };
    }
    if (page.assessed_revision !== page.text_revision) {
      return { kind: 'noop', reason: 'stale_assessment' };
    }

    const decision = nextRescanState(state, {
      type: 'evaluate',
      maxAttempts: this.options.maxRescanAttempts,
    });
    if (decision.kind === 'failed') {
      return this.exhaust(page, null);
    }
    if (decision.kind !== 'rescan_pending') {
      return { kind: 'noop', reason: 'terminal' };
    }

    const strategy = strategyForAttempt(page.rescan_attempts);
    const accepted = await this.attempt(page, strategy.name);
    const after = nextRescanState(decision, { type: 'attempt_completed', accepted });
    const updated = this.db.requirePage(pageId);

    console.error(
      `[RescanEngine] Page ${pageId} attempt ${updated.rescan_attempts}/${this.options.maxRescanAttempts} (${strategy.name}): ${accepted ? 'accepted' : 'rejected'}`
    );

    // A rejected attempt keeps the old text and its zero score
    if (!accepted && after.kind === 'rescored') {
      const rescored = nextRescanState(after, { type: 'score', score: 0 });
      const final = nextRescanState(rescored, {
        type: 'evaluate',
        maxAttempts: this.options.maxRescanAttempts,
      });
      if (final.kind === 'failed') {
        return this.exhaust(updated, strategy.name);
      }
    }

    return { kind: 'attempted', accepted, strategy: strategy.name, page: updated };
  }

  /**
   * Re-extract and replace the text when the candidate is usable and not
   * shorter than the current text. The counter advances either way.
   */
  private async attempt(page: Page, strategyName: RescanStrategyName): Promise<boolean> {
    const previous = this.textStore.read(page);
    const strategy = strategyForAttempt(page.rescan_attempts);

    let candidate: string;
    try {
      const imagePath = this.images.resolveImage(page);
      candidate = await this.extractor.extract(imagePath, strategy);
    } catch (error) {
      console.error(
        `[RescanEngine] Extraction failed for page ${page.page_id} (${strategyName}): ${error instanceof Error ? error.message : String(error)}`
      );
      this.textStore.recordRejected(page);
      return false;
    }

    const check = detectLocalSignals(candidate, this.options);
    const longEnough = candidate.trim().length >= previous.trim().length;
    if (!check.passed || !longEnough) {
      console.error(
        `[RescanEngine] Rejected new text for page ${page.page_id}: ` +
          (check.passed ? `shorter than previous (${candidate.trim().length} < ${previous.trim().length})` : check.hard.join(','))
      );
      this.textStore.recordRejected(page);
      return false;
    }

    this.textStore.replace(page, candidate);
    return true;
  }

  /**
   * Terminal failure: flag for manual review and hand the page to the
   * reprocessing queue (idempotent).
   */
  private exhaust(page: Page, strategy: RescanStrategyName | null): RescanStepOutcome {
    const { failed, queueId } = this.db.transaction(() => {
      const failedPage = this.db.markPageFailed(page.page_id);
      const { entry } = this.db.enqueuePage(page.page_id, EXHAUSTED_REASON, HIGH_PRIORITY);
      return { failed: failedPage, queueId: entry.queue_id };
    });
    console.error(
      `[RescanEngine] Page ${page.page_id} failed after ${failed.rescan_attempts} attempts; queued for manual reprocessing`
    );
    return { kind: 'exhausted', strategy, page: failed, queueId };
  }
}
