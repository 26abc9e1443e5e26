/**
 * DatabaseService class for all Page Store operations
 *
 * Provides page, correction, queue and cost ledger operations over one
 * SQLite connection. Uses prepared statements for security and performance.
 */

import Database from 'better-sqlite3';
import type { Page, NewPage } from '../../../models/page.js';
import type { CorrectionRecord, ReviewDecision } from '../../../models/correction.js';
import type { QueueEntry } from '../../../models/queue.js';
import type { CostLedgerEntry, NewCostLedgerEntry } from '../../../models/ledger.js';
import { DatabaseInfo, DatabaseStats, ListPagesOptions } from './types.js';
import {
  createDatabase,
  openDatabase,
  listDatabases,
  deleteDatabase,
  databaseExists,
} from './static-operations.js';
import { getStats, updateMetadataModified } from './stats-operations.js';
import * as pageOps from './page-operations.js';
import type { AssessmentWrite, CandidateQuery, TextReplacement } from './page-operations.js';
import * as correctionOps from './correction-operations.js';
import type { NewCorrectionRecord } from './correction-operations.js';
import * as queueOps from './queue-operations.js';
import type { EnqueueResult, ListQueueOptions } from './queue-operations.js';
import * as ledgerOps from './ledger-operations.js';

/**
 * DatabaseService class for all database operations
 */
export class DatabaseService {
  private db: Database.Database;
  private readonly name: string;
  private readonly path: string;

  private constructor(db: Database.Database, name: string, path: string) {
    this.db = db;
    this.name = name;
    this.path = path;
  }

  static create(name: string, description?: string, storagePath?: string): DatabaseService {
    const result = createDatabase(name, description, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static open(name: string, storagePath?: string): DatabaseService {
    const result = openDatabase(name, storagePath);
    return new DatabaseService(result.db, result.name, result.path);
  }

  static list(storagePath?: string): DatabaseInfo[] {
    return listDatabases(storagePath);
  }

  static delete(name: string, storagePath?: string): void {
    deleteDatabase(name, storagePath);
  }

  static exists(name: string, storagePath?: string): boolean {
    return databaseExists(name, storagePath);
  }

  getStats(): DatabaseStats {
    return getStats(this.db, this.name, this.path);
  }

  close(): void {
    try {
      this.db.pragma('optimize');
    } catch (error) {
      console.error(
        '[DatabaseService] pragma optimize failed:',
        error instanceof Error ? error.message : String(error)
      );
    }
    this.db.close();
  }

  getName(): string {
    return this.name;
  }

  getPath(): string {
    return this.path;
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getConnection(): Database.Database {
    return this.db;
  }

  // ==================== PAGE OPERATIONS ====================

  insertPage(page: NewPage): Page {
    const inserted = pageOps.insertPage(this.db, page);
    updateMetadataModified(this.db);
    return inserted;
  }

  getPage(pageId: string): Page | null {
    return pageOps.getPage(this.db, pageId);
  }

  requirePage(pageId: string): Page {
    return pageOps.requirePage(this.db, pageId);
  }

  listPages(options?: ListPagesOptions): Page[] {
    return pageOps.listPages(this.db, options);
  }

  countPages(options?: ListPagesOptions): number {
    return pageOps.countPages(this.db, options);
  }

  listCandidatePages(query: CandidateQuery): Page[] {
    return pageOps.listCandidatePages(this.db, query);
  }

  writeAssessment(pageId: string, assessment: AssessmentWrite): Page {
    return pageOps.writeAssessment(this.db, pageId, assessment);
  }

  recordRescanAttempt(
    pageId: string,
    expectedAttempts: number,
    replacement: TextReplacement | null
  ): void {
    pageOps.recordRescanAttempt(this.db, pageId, expectedAttempts, replacement);
  }

  markPageFailed(pageId: string): Page {
    return pageOps.markPageFailed(this.db, pageId);
  }

  markCorrectionUnchanged(pageId: string): void {
    pageOps.updateCorrectionState(this.db, pageId, { correction_status: 'unchanged' });
  }

  resetPage(pageId: string): Page {
    return pageOps.resetPage(this.db, pageId);
  }

  claimPage(pageId: string, workerId: string, staleBefore: string): boolean {
    return pageOps.claimPage(this.db, pageId, workerId, staleBefore);
  }

  releasePage(pageId: string, workerId: string): boolean {
    return pageOps.releasePage(this.db, pageId, workerId);
  }

  // ==================== CORRECTION OPERATIONS ====================

  insertCorrection(record: NewCorrectionRecord, reviewRequired: boolean): CorrectionRecord {
    return correctionOps.insertCorrection(this.db, record, reviewRequired);
  }

  getCorrection(correctionId: string): CorrectionRecord | null {
    return correctionOps.getCorrection(this.db, correctionId);
  }

  getLatestCorrection(pageId: string): CorrectionRecord | null {
    return correctionOps.getLatestCorrection(this.db, pageId);
  }

  listCorrections(pageId: string): CorrectionRecord[] {
    return correctionOps.listCorrections(this.db, pageId);
  }

  countCorrections(pageId?: string): number {
    return correctionOps.countCorrections(this.db, pageId);
  }

  markCorrectionReviewed(correctionId: string, decision: ReviewDecision): CorrectionRecord {
    return correctionOps.markCorrectionReviewed(this.db, correctionId, decision);
  }

  // ==================== QUEUE OPERATIONS ====================

  enqueuePage(pageId: string, reason: string, priority: number): EnqueueResult {
    return queueOps.enqueuePage(this.db, pageId, reason, priority);
  }

  getQueueEntry(queueId: string): QueueEntry | null {
    return queueOps.getQueueEntry(this.db, queueId);
  }

  listQueue(options?: ListQueueOptions): QueueEntry[] {
    return queueOps.listQueue(this.db, options);
  }

  claimNextQueueEntry(): QueueEntry | null {
    return queueOps.claimNextQueueEntry(this.db);
  }

  completeQueueEntry(queueId: string): QueueEntry {
    return queueOps.completeQueueEntry(this.db, queueId);
  }

  failQueueEntry(queueId: string, errorMessage: string): QueueEntry {
    return queueOps.failQueueEntry(this.db, queueId, errorMessage);
  }

  retryQueueEntry(queueId: string): QueueEntry {
    return queueOps.retryQueueEntry(this.db, queueId);
  }

  // ==================== COST LEDGER OPERATIONS ====================

  insertLedgerEntry(entry: NewCostLedgerEntry): CostLedgerEntry {
    return ledgerOps.insertLedgerEntry(this.db, entry);
  }

  sumSpendSince(sinceIso: string): number {
    return ledgerOps.sumSpendSince(this.db, sinceIso);
  }

  listLedgerEntries(options?: { pageId?: string; limit?: number }): CostLedgerEntry[] {
    return ledgerOps.listLedgerEntries(this.db, options);
  }

  countLedgerEntries(): number {
    return ledgerOps.countLedgerEntries(this.db);
  }
}
