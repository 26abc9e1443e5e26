#!/usr/bin/env node
/**
 * Batch pipeline entry point, intended for cron
 *
 * Usage:
 *   ocr-convergence-run --db pages --limit 200
 *
 * Exit status: 0 run completed, 2 graceful stop (daily limit or budget), 1 error.
 *
 * @module bin-run
 */

import { main } from './cli/run.js';

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[Pipeline] Fatal:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
);
