/**
 * Cost & Rate Governor
 *
 * Cross-cutting policy for every billed call: token estimation, the rolling
 * 24-hour cost ceiling and the 429 decision. Spend is always aggregated from
 * the Cost Ledger, so a restarted process or a concurrent run sees the same
 * remaining budget.
 *
 * @module governor/governor
 */

import type { DatabaseService } from '../storage/database/index.js';
import type { BilledOperation, CostLedgerEntry, NewCostLedgerEntry } from '../../models/ledger.js';
import type { CompletionResult } from '../llm/client.js';
import type { RateLimitError } from '../llm/errors.js';
import { estimateTokens } from './tokens.js';
import { RunSignal, type StopContext } from './run-signal.js';

const WINDOW_MS = 24 * 60 * 60 * 1000;

export interface GovernorConfig {
  maxDailyCostUsd: number;
  tokenBufferRatio: number;
  /** USD per 1M input tokens */
  inputCostPerMTok: number;
  /** USD per 1M output tokens */
  outputCostPerMTok: number;
}

export type RateLimitAction = 'stop_all' | 'defer_page';

export interface BudgetStatus {
  spentUsd: number;
  ceilingUsd: number;
  remainingUsd: number;
  windowStart: string;
}

/**
 * Outcome of the check made before a billed call
 */
export type Preflight =
  | { ok: true; estimatedTokens: number; estimatedCostUsd: number }
  | { ok: false; reason: 'stopped' | 'budget_exceeded' };

export class CostGovernor {
  constructor(
    private readonly db: DatabaseService,
    private readonly config: GovernorConfig,
    readonly signal: RunSignal = new RunSignal(),
    private readonly now: () => number = Date.now
  ) {}

  estimateTokens(prompt: string, text: string): number {
    return estimateTokens(prompt, text, this.config.tokenBufferRatio);
  }

  /**
   * Price an estimate at the input rate. Pricing is flat across models.
   */
  estimateCost(tokens: number, _model?: string): number {
    return (tokens * this.config.inputCostPerMTok) / 1_000_000;
  }

  /**
   * Billed cost of a completed call from reported usage, or from the
   * estimate when the provider omits usage.
   */
  actualCost(result: CompletionResult, estimatedTokens: number): number {
    if (!result.usage) {
      return this.estimateCost(estimatedTokens);
    }
    return (
      (result.usage.inputTokens * this.config.inputCostPerMTok +
        result.usage.outputTokens * this.config.outputCostPerMTok) /
      1_000_000
    );
  }

  private windowStart(): string {
    return new Date(this.now() - WINDOW_MS).toISOString();
  }

  spentInWindow(): number {
    return this.db.sumSpendSince(this.windowStart());
  }

  wouldExceedBudget(estimatedCostUsd: number): boolean {
    return this.spentInWindow() + estimatedCostUsd > this.config.maxDailyCostUsd;
  }

  recordSpend(entry: NewCostLedgerEntry): CostLedgerEntry {
    return this.db.insertLedgerEntry(entry);
  }

  /**
   * Append the ledger entry for a completed call and return its cost
   */
  recordCall(
    pageId: string | null,
    operation: BilledOperation,
    result: CompletionResult,
    estimatedTokens: number
  ): number {
    const cost = this.actualCost(result, estimatedTokens);
    this.recordSpend({
      page_id: pageId,
      operation,
      model: result.model,
      input_tokens: result.usage?.inputTokens ?? estimatedTokens,
      output_tokens: result.usage?.outputTokens ?? 0,
      cost_usd: cost,
    });
    return cost;
  }

  /**
   * Gate a billed call. Raises the run stop when the ceiling would be crossed.
   */
  preflight(prompt: string, text: string, pageId: string): Preflight {
    if (this.signal.stopped) {
      return { ok: false, reason: 'stopped' };
    }
    const estimatedTokens = this.estimateTokens(prompt, text);
    const estimatedCostUsd = this.estimateCost(estimatedTokens);
    if (this.wouldExceedBudget(estimatedCostUsd)) {
      const status = this.getBudgetStatus();
      this.signal.stop('budget_exceeded', {
        pageId,
        spentUsd: status.spentUsd,
        ceilingUsd: status.ceilingUsd,
        remainingUsd: status.remainingUsd,
        detail: `estimate $${estimatedCostUsd.toFixed(4)} for ${estimatedTokens} tokens`,
      });
      return { ok: false, reason: 'budget_exceeded' };
    }
    return { ok: true, estimatedTokens, estimatedCostUsd };
  }

  /**
   * A daily limit stops the whole run; any other 429 defers only this page.
   * Neither is retried.
   */
  handleRateLimit(error: RateLimitError, context: StopContext = {}): RateLimitAction {
    if (error.daily) {
      const status = this.getBudgetStatus();
      this.signal.stop('daily_limit', {
        spentUsd: status.spentUsd,
        ceilingUsd: status.ceilingUsd,
        remainingUsd: status.remainingUsd,
        detail: error.message,
        ...context,
      });
      return 'stop_all';
    }
    console.error(
      `[Governor] Rate limited${context.pageId ? ` on page ${context.pageId}` : ''}, deferring` +
        (error.retryAfterSeconds !== null ? ` (retry after ${error.retryAfterSeconds}s)` : '')
    );
    return 'defer_page';
  }

  getBudgetStatus(): BudgetStatus {
    const spentUsd = this.spentInWindow();
    return {
      spentUsd,
      ceilingUsd: this.config.maxDailyCostUsd,
      remainingUsd: Math.max(0, this.config.maxDailyCostUsd - spentUsd),
      windowStart: this.windowStart(),
    };
  }
}
