/**
 * Canonical raw text storage
 *
 * A page's raw OCR text lives in a file under the data directory whose
 * SHA-256 is recorded on the page row. Replacement goes through a temp
 * file: write and fsync `<path>.rescan.tmp`, then in one transaction
 * record the attempt and rename the temp file over the canonical path.
 * A failed rename rolls the attempt back, so a reader only ever sees the
 * previous text or the complete new one.
 *
 * @module storage/text-store
 */

import { closeSync, existsSync, fsyncSync, mkdirSync, openSync, readFileSync, renameSync, unlinkSync, writeSync } from 'fs';
import { dirname, isAbsolute, relative, resolve } from 'path';
import type { Page } from '../../models/page.js';
import { computeHash } from '../../utils/hash.js';
import type { DatabaseService } from './database/index.js';

export const TEMP_SUFFIX = '.rescan.tmp';

/**
 * Canonical text does not match the hash recorded in the Page Store
 */
export class TextIntegrityError extends Error {
  constructor(
    message: string,
    public readonly pageId: string,
    public readonly expectedHash: string,
    public readonly actualHash: string | null
  ) {
    super(message);
    this.name = 'TextIntegrityError';
  }
}

export interface TextFingerprint {
  raw_text_hash: string;
  raw_text_length: number;
}

export function fingerprint(text: string): TextFingerprint {
  return { raw_text_hash: computeHash(text), raw_text_length: text.length };
}

export class FileTextStore {
  private readonly dataDir: string;

  constructor(
    dataDir: string,
    private readonly db: DatabaseService
  ) {
    this.dataDir = resolve(dataDir);
  }

  /**
   * Absolute path for a text_path stored on a page. Paths escaping the
   * data directory are rejected.
   */
  resolvePath(textPath: string): string {
    const absolute = resolve(this.dataDir, textPath);
    const rel = relative(this.dataDir, absolute);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new Error(`Text path escapes the data directory: ${textPath}`);
    }
    return absolute;
  }

  /**
   * Fingerprint an existing text file, used when a page is registered
   */
  describe(textPath: string): TextFingerprint {
    return fingerprint(readFileSync(this.resolvePath(textPath), 'utf-8'));
  }

  /**
   * Read the canonical text of a page, discarding any leftover temp file
   * from an interrupted replacement first.
   *
   * @throws TextIntegrityError when the file is missing or its hash disagrees
   */
  read(page: Page): string {
    const canonical = this.resolvePath(page.text_path);
    const temp = canonical + TEMP_SUFFIX;
    if (existsSync(temp)) {
      console.error(`[TextStore] Discarding interrupted replacement for page ${page.page_id}`);
      unlinkSync(temp);
    }

    if (!existsSync(canonical)) {
      throw new TextIntegrityError(
        `Canonical text for page ${page.page_id} is missing: ${page.text_path}`,
        page.page_id,
        page.raw_text_hash,
        null
      );
    }

    const text = readFileSync(canonical, 'utf-8');
    const actual = computeHash(text);
    if (actual !== page.raw_text_hash) {
      throw new TextIntegrityError(
        `Canonical text for page ${page.page_id} does not match the recorded hash`,
        page.page_id,
        page.raw_text_hash,
        actual
      );
    }
    return text;
  }

  /**
   * Replace the canonical text and record the accepted attempt atomically
   */
  replace(page: Page, text: string): TextFingerprint {
    const canonical = this.resolvePath(page.text_path);
    const temp = canonical + TEMP_SUFFIX;
    this.writeTemp(temp, text);

    const next = fingerprint(text);
    try {
      this.db.transaction(() => {
        this.db.recordRescanAttempt(page.page_id, page.rescan_attempts, next);
        this.promote(temp, canonical);
      });
    } catch (error) {
      if (existsSync(temp)) {
        unlinkSync(temp);
      }
      throw error;
    }
    return next;
  }

  /**
   * Record a rejected attempt. The canonical text is left untouched.
   */
  recordRejected(page: Page): void {
    this.db.recordRescanAttempt(page.page_id, page.rescan_attempts, null);
  }

  /**
   * Write text to a new file, used by the indexer hook
   */
  writeNew(textPath: string, text: string): TextFingerprint {
    const canonical = this.resolvePath(textPath);
    const temp = canonical + TEMP_SUFFIX;
    this.writeTemp(temp, text);
    this.promote(temp, canonical);
    return fingerprint(text);
  }

  protected writeTemp(path: string, text: string): void {
    mkdirSync(dirname(path), { recursive: true });
    const fd = openSync(path, 'w', 0o600);
    try {
      writeSync(fd, text, null, 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  protected promote(tempPath: string, canonicalPath: string): void {
    renameSync(tempPath, canonicalPath);
  }
}
