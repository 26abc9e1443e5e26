/**
 * OCR extraction collaborator
 *
 * The Rescan Engine treats extraction as an opaque call that may fail or
 * return an empty string. The production implementation shells out to the
 * tesseract CLI; tests inject scripted extractors.
 *
 * @module ocr/extractor
 */

import { spawn } from 'child_process';
import type { RescanStrategy } from '../rescan/strategies.js';
import { OcrError } from './errors.js';

export interface OcrExtractor {
  extract(imagePath: string, strategy: RescanStrategy): Promise<string>;
}

export interface TesseractOptions {
  /** Binary name or path (default: tesseract) */
  command: string;
  /** Tesseract language code (default: eng) */
  language: string;
  /** Per-pass timeout in ms (default: 120000) */
  timeoutMs: number;
  /** Characters of stdout kept per pass (default: 8MB) */
  maxOutputBytes: number;
}

const DEFAULT_TESSERACT_OPTIONS: TesseractOptions = {
  command: 'tesseract',
  language: 'eng',
  timeoutMs: 120_000,
  maxOutputBytes: 8 * 1024 * 1024,
};

export class TesseractExtractor implements OcrExtractor {
  private readonly options: TesseractOptions;

  constructor(options: Partial<TesseractOptions> = {}) {
    this.options = { ...DEFAULT_TESSERACT_OPTIONS, ...options };
  }

  /**
   * Run every pass of the strategy and keep the longest output. Fails only
   * when every pass fails.
   */
  async extract(imagePath: string, strategy: RescanStrategy): Promise<string> {
    let best: string | null = null;
    const failures: string[] = [];

    for (const passArgs of strategy.passes) {
      try {
        const text = await this.runTesseract(imagePath, passArgs);
        if (best === null || text.trim().length > best.trim().length) {
          best = text;
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push(`${passArgs.join(' ')}: ${message}`);
        console.error(`[RescanEngine] tesseract ${passArgs.join(' ')} failed on ${imagePath}: ${message}`);
      }
    }

    if (best === null) {
      throw new OcrError(
        `All ${strategy.name} passes failed for ${imagePath}: ${failures.join('; ')}`,
        imagePath
      );
    }
    return best;
  }

  private runTesseract(imagePath: string, passArgs: readonly string[]): Promise<string> {
    const args = [imagePath, 'stdout', '-l', this.options.language, ...passArgs];
    const timeout = this.options.timeoutMs;
    const maxOutput = this.options.maxOutputBytes;

    return new Promise((resolve, reject) => {
      const proc = spawn(this.options.command, args, { timeout });
      let stdout = '';
      let stderr = '';
      let settled = false;

      proc.stdout.setEncoding('utf-8');
      proc.stdout.on('data', (d: string) => {
        if (stdout.length < maxOutput) stdout += d.slice(0, maxOutput - stdout.length);
      });
      proc.stderr.on('data', (d: Buffer) => {
        if (stderr.length < 10240) stderr += d.toString();
      });

      proc.on('error', (err) => {
        if (settled) return;
        settled = true;
        reject(new OcrError(`Failed to start ${this.options.command}: ${err.message}`, imagePath, err));
      });

      proc.on('close', (code, signal) => {
        if (settled) return;
        settled = true;

        if (signal === 'SIGTERM' || signal === 'SIGKILL') {
          reject(new OcrError(`tesseract killed by ${signal} (timeout: ${timeout}ms)`, imagePath));
          return;
        }
        if (code === 0) {
          resolve(stdout);
        } else {
          reject(new OcrError(stderr.trim() || `tesseract exit code ${String(code)}`, imagePath));
        }
      });
    });
  }
}
