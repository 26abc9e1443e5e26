/**
 * Batch pipeline CLI
 *
 * One run per invocation, safe to start from cron while a previous run is
 * still finishing: pages are claimed, so overlapping runs split the work.
 * The run summary is printed to stdout as one JSON document; diagnostics go
 * to stderr.
 *
 * @module cli/run
 */

import { parseArgs } from 'util';
import { loadEnvFile } from '../utils/env.js';
import { DatabaseService } from '../services/storage/database/index.js';
import { loadLlmConfig } from '../services/llm/config.js';
import {
  createPipeline,
  loadPipelineConfig,
  validatePipelineConfig,
  type PipelineConfig,
  type PipelineDeps,
} from '../services/pipeline/index.js';

export const EXIT_COMPLETED = 0;
export const EXIT_ERROR = 1;
export const EXIT_STOPPED = 2;

const USAGE = `Usage: ocr-convergence-run [options]

  --db <name>            Page Store database (default: $OCR_CONVERGENCE_DB or "pages")
  --storage-path <dir>   Database directory (default: $OCR_CONVERGENCE_DATABASES_PATH)
  --limit <n>            Maximum candidate pages for this run
  --concurrency <n>      Worker count (default: $OCR_PIPELINE_CONCURRENCY or 4)
  --page <id>            Only this page (repeatable)
  --no-correction        Skip the correction stage
  --dry-run              List candidate pages without claiming them
  -h, --help             Show this help

Exit status: 0 completed, 2 stopped at the daily limit or budget ceiling, 1 error.`;

export interface RunArgs {
  db: string;
  storagePath?: string;
  limit?: number;
  concurrency?: number;
  pageIds?: string[];
  correction: boolean;
  dryRun: boolean;
  help: boolean;
}

function parsePositiveInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function parseRunArgs(argv: string[]): RunArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      db: { type: 'string' },
      'storage-path': { type: 'string' },
      limit: { type: 'string' },
      concurrency: { type: 'string' },
      page: { type: 'string', multiple: true },
      'no-correction': { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    db: values.db ?? (process.env.OCR_CONVERGENCE_DB || 'pages'),
    storagePath: values['storage-path'],
    limit: parsePositiveInt('--limit', values.limit),
    concurrency: parsePositiveInt('--concurrency', values.concurrency),
    pageIds: values.page,
    correction: !values['no-correction'],
    dryRun: values['dry-run'] ?? false,
    help: values.help ?? false,
  };
}

function writeJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Run the pipeline once and return the process exit status
 */
export async function main(argv: string[], deps: PipelineDeps = {}): Promise<number> {
  loadEnvFile();

  let args: RunArgs;
  try {
    args = parseRunArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return EXIT_ERROR;
  }
  if (args.help) {
    console.error(USAGE);
    return EXIT_COMPLETED;
  }

  const overrides: Partial<PipelineConfig> = {};
  if (args.concurrency !== undefined) overrides.concurrency = args.concurrency;
  if (!args.correction) overrides.correctionScope = 'off';
  const config = loadPipelineConfig(overrides);
  const llmConfig = loadLlmConfig();

  const validation = validatePipelineConfig(config, llmConfig);
  for (const warning of validation.warnings) {
    console.error(`[Pipeline] Warning: ${warning}`);
  }
  if (validation.issues.length > 0) {
    for (const issue of validation.issues) {
      console.error(`[Pipeline] Configuration error: ${issue}`);
    }
    return EXIT_ERROR;
  }

  if (!DatabaseService.exists(args.db, args.storagePath)) {
    console.error(`[Pipeline] Database "${args.db}" not found`);
    return EXIT_ERROR;
  }

  const db = DatabaseService.open(args.db, args.storagePath);
  try {
    const pipeline = createPipeline(db, config, llmConfig, deps);
    const runOptions = { limit: args.limit, pageIds: args.pageIds, correction: args.correction };

    if (args.dryRun) {
      const candidates = pipeline.runner.listCandidates(runOptions);
      writeJson({
        dry_run: true,
        total: candidates.length,
        candidates: candidates.map((p) => ({
          page_id: p.page_id,
          quality_status: p.quality_status,
          correction_status: p.correction_status,
          rescan_attempts: p.rescan_attempts,
        })),
      });
      return EXIT_COMPLETED;
    }

    const summary = await pipeline.runner.run(runOptions);
    writeJson(summary);
    return summary.status === 'completed' ? EXIT_COMPLETED : EXIT_STOPPED;
  } finally {
    db.close();
  }
}
