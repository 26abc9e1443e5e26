/**
 * Cost & Rate Governor Module
 */

export {
  CostGovernor,
  type GovernorConfig,
  type BudgetStatus,
  type Preflight,
  type RateLimitAction,
} from './governor.js';
export { RunSignal, type StopReason, type StopContext } from './run-signal.js';
export { countTokens, estimateTokens } from './tokens.js';
