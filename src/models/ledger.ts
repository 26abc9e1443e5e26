/**
 * Cost ledger interfaces
 *
 * The ledger is an append-only log of billed API calls. Rolling spend is
 * always aggregated from it, never kept in memory.
 */

export type BilledOperation = 'classify' | 'correct' | 'assess';

export interface CostLedgerEntry {
  /** UUID v4 identifier */
  entry_id: string;
  /** Page the call was made for, null for calls outside a page */
  page_id: string | null;
  operation: BilledOperation;
  model: string;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
  created_at: string;
}

export type NewCostLedgerEntry = Omit<CostLedgerEntry, 'entry_id' | 'created_at'>;
