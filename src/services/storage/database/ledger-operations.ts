/**
 * Cost ledger operations for DatabaseService
 *
 * Append-only. Rolling spend is aggregated on every read.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { CostLedgerEntry, NewCostLedgerEntry } from '../../../models/ledger.js';
import { LedgerRow } from './types.js';
import { rowToLedgerEntry } from './converters.js';

/**
 * Append one billed call
 */
export function insertLedgerEntry(
  db: Database.Database,
  entry: NewCostLedgerEntry
): CostLedgerEntry {
  const record: CostLedgerEntry = {
    ...entry,
    entry_id: uuidv4(),
    created_at: new Date().toISOString(),
  };
  db.prepare(
    `
    INSERT INTO cost_ledger (
      entry_id, page_id, operation, model, input_tokens, output_tokens, cost_usd, created_at
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `
  ).run(
    record.entry_id,
    record.page_id,
    record.operation,
    record.model,
    record.input_tokens,
    record.output_tokens,
    record.cost_usd,
    record.created_at
  );
  return record;
}

/**
 * Total spend recorded at or after `sinceIso`
 */
export function sumSpendSince(db: Database.Database, sinceIso: string): number {
  const row = db
    .prepare('SELECT COALESCE(SUM(cost_usd), 0) as total FROM cost_ledger WHERE created_at >= ?')
    .get(sinceIso) as { total: number };
  return row.total;
}

export function listLedgerEntries(
  db: Database.Database,
  options: { pageId?: string; limit?: number } = {}
): CostLedgerEntry[] {
  const params: unknown[] = [];
  let where = '';
  if (options.pageId !== undefined) {
    where = 'WHERE page_id = ?';
    params.push(options.pageId);
  }
  params.push(options.limit ?? 100);
  const rows = db
    .prepare(`SELECT * FROM cost_ledger ${where} ORDER BY created_at DESC, rowid DESC LIMIT ?`)
    .all(...params) as LedgerRow[];
  return rows.map(rowToLedgerEntry);
}

export function countLedgerEntries(db: Database.Database): number {
  const row = db.prepare('SELECT COUNT(*) as n FROM cost_ledger').get() as { n: number };
  return row.n;
}
