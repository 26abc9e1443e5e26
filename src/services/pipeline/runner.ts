/**
 * Pipeline Runner
 *
 * Selects candidate pages and converges them with a fixed pool of workers.
 * Pages are claimed with a compare-and-set on the claim columns, so two
 * runs started against the same store (a cron tick overlapping a slow run)
 * never process the same page at once. Claims older than the TTL are taken
 * over.
 *
 * @module pipeline/runner
 */

import { hostname } from 'os';
import { v4 as uuidv4 } from 'uuid';
import type { Page } from '../../models/page.js';
import type { DatabaseService } from '../storage/database/index.js';
import type { BudgetStatus, CostGovernor } from '../governor/governor.js';
import type { StopReason } from '../governor/run-signal.js';
import { correctableStatuses, type PageProcessor, type PageProcessResult } from './page-processor.js';
import type { CorrectionScope } from './config.js';

export interface RunOptions {
  limit?: number;
  pageIds?: string[];
  /** Set false to skip the correction stage for this run */
  correction?: boolean;
}

export interface RunCounts {
  claimed: number;
  skippedClaimed: number;
  assessed: number;
  rescanAttempts: number;
  failed: number;
  corrected: number;
  reviewRequired: number;
  unchanged: number;
  deferred: number;
  errors: number;
}

export interface RunSummary {
  runId: string;
  status: 'completed' | 'stopped';
  stopReason: StopReason | null;
  candidates: number;
  counts: RunCounts;
  /** Rolling 24h spend at the end of the run */
  spentUsd: number;
  budget: BudgetStatus;
  durationMs: number;
  /** Page being processed when the stop was raised */
  inFlightPageId: string | null;
}

export interface RunnerOptions {
  concurrency: number;
  claimTtlMinutes: number;
  correctionScope: CorrectionScope;
}

function emptyCounts(): RunCounts {
  return {
    claimed: 0,
    skippedClaimed: 0,
    assessed: 0,
    rescanAttempts: 0,
    failed: 0,
    corrected: 0,
    reviewRequired: 0,
    unchanged: 0,
    deferred: 0,
    errors: 0,
  };
}

export class PipelineRunner {
  constructor(
    private readonly db: DatabaseService,
    private readonly processor: PageProcessor,
    private readonly governor: CostGovernor,
    private readonly options: RunnerOptions,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Pages a run would pick up, without claiming them
   */
  listCandidates(options: RunOptions = {}): Page[] {
    const correction = options.correction ?? true;
    return this.db.listCandidatePages({
      correctableStatuses: correction ? correctableStatuses(this.options.correctionScope) : [],
      pageIds: options.pageIds,
      limit: options.limit,
    });
  }

  async run(options: RunOptions = {}): Promise<RunSummary> {
    const started = this.now();
    const runId = `${hostname()}-${process.pid}-${uuidv4().slice(0, 8)}`;
    const counts = emptyCounts();
    const signal = this.governor.signal;

    const candidates = this.listCandidates(options);
    console.error(
      `[Pipeline] Run ${runId}: ${candidates.length} candidate page(s), concurrency ${this.options.concurrency}`
    );

    let next = 0;
    const worker = async (workerId: string): Promise<void> => {
      while (next < candidates.length) {
        if (signal.stopped) return;
        const page = candidates[next++];

        const staleBefore = new Date(
          this.now() - this.options.claimTtlMinutes * 60_000
        ).toISOString();
        if (!this.db.claimPage(page.page_id, workerId, staleBefore)) {
          counts.skippedClaimed++;
          continue;
        }
        counts.claimed++;

        try {
          const result = await this.processor.process(page.page_id, {
            correction: options.correction ?? true,
          });
          this.tally(counts, result);
        } catch (error) {
          counts.errors++;
          console.error(
            `[Pipeline] Page ${page.page_id} failed with an unexpected error: ${error instanceof Error ? error.message : String(error)}`
          );
        } finally {
          this.db.releasePage(page.page_id, workerId);
        }
      }
    };

    const poolSize = Math.max(1, Math.min(this.options.concurrency, candidates.length));
    await Promise.all(
      Array.from({ length: poolSize }, (_, index) => worker(`${runId}:${index}`))
    );

    const budget = this.governor.getBudgetStatus();
    const summary: RunSummary = {
      runId,
      status: signal.stopped ? 'stopped' : 'completed',
      stopReason: signal.reason,
      candidates: candidates.length,
      counts,
      spentUsd: budget.spentUsd,
      budget,
      durationMs: this.now() - started,
      inFlightPageId: signal.context.pageId ?? null,
    };

    console.error(
      `[Pipeline] Run ${runId} ${summary.status}` +
        (summary.stopReason ? ` (${summary.stopReason})` : '') +
        `: claimed=${counts.claimed} assessed=${counts.assessed} rescans=${counts.rescanAttempts} ` +
        `failed=${counts.failed} corrected=${counts.corrected} deferred=${counts.deferred} ` +
        `spent=$${summary.spentUsd.toFixed(4)}/${budget.ceilingUsd.toFixed(2)}`
    );
    return summary;
  }

  private tally(counts: RunCounts, result: PageProcessResult): void {
    counts.assessed += result.assessed;
    counts.rescanAttempts += result.rescanAttempts;
    if (result.failed) counts.failed++;
    if (result.deferred !== null) counts.deferred++;

    const correction = result.correction;
    if (correction?.kind === 'corrected') {
      counts.corrected++;
      if (correction.reviewRequired) counts.reviewRequired++;
    } else if (correction?.kind === 'unchanged') {
      counts.unchanged++;
    }
  }
}
