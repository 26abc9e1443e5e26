/**
 * Rescan state machine
 *
 * Unchecked → Scored → RescanPending → Rescored → Scored ... until the page
 * reaches Acceptable or Failed. Both are terminal for this engine; any
 * event on them throws.
 *
 * @module rescan/state-machine
 */

import { IllegalTransitionError, type Page } from '../../models/page.js';

export type RescanState =
  | { kind: 'unchecked' }
  | { kind: 'scored'; score: number; attempts: number }
  | { kind: 'rescan_pending'; attempts: number }
  | { kind: 'rescored'; attempts: number; accepted: boolean }
  | { kind: 'acceptable' }
  | { kind: 'failed' };

export type RescanEvent =
  /** The assessor produced a score for the current text */
  | { type: 'score'; score: number }
  /** Decide what a score means given the attempt cap */
  | { type: 'evaluate'; maxAttempts: number }
  /** One re-extraction finished, accepted or rejected */
  | { type: 'attempt_completed'; accepted: boolean };

function illegal(state: RescanState, event: RescanEvent): never {
  throw new IllegalTransitionError(state.kind, event.type);
}

export function nextRescanState(state: RescanState, event: RescanEvent): RescanState {
  switch (state.kind) {
    case 'unchecked':
      if (event.type === 'score') {
        return { kind: 'scored', score: event.score, attempts: 0 };
      }
      return illegal(state, event);

    case 'scored':
      if (event.type === 'evaluate') {
        if (state.score > 0) return { kind: 'acceptable' };
        if (state.attempts < event.maxAttempts) {
          return { kind: 'rescan_pending', attempts: state.attempts };
        }
        return { kind: 'failed' };
      }
      return illegal(state, event);

    case 'rescan_pending':
      if (event.type === 'attempt_completed') {
        return { kind: 'rescored', attempts: state.attempts + 1, accepted: event.accepted };
      }
      return illegal(state, event);

    case 'rescored':
      if (event.type === 'score') {
        return { kind: 'scored', score: event.score, attempts: state.attempts };
      }
      return illegal(state, event);

    case 'acceptable':
    case 'failed':
      return illegal(state, event);
  }
}

/**
 * Project a stored page onto the machine
 */
export function rescanStateFromPage(page: Page): RescanState {
  switch (page.quality_status) {
    case 'unchecked':
      return { kind: 'unchecked' };
    case 'needs_rescan':
      return { kind: 'scored', score: page.quality_score ?? 0, attempts: page.rescan_attempts };
    case 'acceptable':
    case 'needs_correction':
      return { kind: 'acceptable' };
    case 'failed':
      return { kind: 'failed' };
  }
}
