/**
 * Cooperative cancellation for a pipeline run
 *
 * Workers check the signal before claiming a page and before starting any
 * billed round. In-flight page work is allowed to finish.
 *
 * @module governor/run-signal
 */

export type StopReason = 'daily_limit' | 'budget_exceeded';

export interface StopContext {
  /** Page in flight when the stop was raised */
  pageId?: string;
  spentUsd?: number;
  ceilingUsd?: number;
  remainingUsd?: number;
  detail?: string;
}

export class RunSignal {
  private stopReason: StopReason | null = null;
  private stopContext: StopContext = {};

  /**
   * Raise the stop flag. The first reason wins.
   */
  stop(reason: StopReason, context: StopContext = {}): void {
    if (this.stopReason !== null) return;
    this.stopReason = reason;
    this.stopContext = context;
    console.error(
      `[Governor] Run stopping: ${reason}` +
        (context.pageId ? ` (page in flight: ${context.pageId})` : '') +
        (context.spentUsd !== undefined
          ? ` spent=$${context.spentUsd.toFixed(4)} ceiling=$${(context.ceilingUsd ?? 0).toFixed(2)} remaining=$${(context.remainingUsd ?? 0).toFixed(4)}`
          : '') +
        (context.detail ? ` - ${context.detail}` : '')
    );
  }

  get stopped(): boolean {
    return this.stopReason !== null;
  }

  get reason(): StopReason | null {
    return this.stopReason;
  }

  get context(): StopContext {
    return this.stopContext;
  }
}
