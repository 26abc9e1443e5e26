/**
 * Rescan Engine Module
 */

export { RescanEngine, EXHAUSTED_REASON, priorityForConfidence, type RescanEngineOptions, type RescanStepOutcome } from './engine.js';
export { nextRescanState, rescanStateFromPage, type RescanState, type RescanEvent } from './state-machine.js';
export { RESCAN_STRATEGIES, strategyForAttempt, type RescanStrategy, type RescanStrategyName } from './strategies.js';
