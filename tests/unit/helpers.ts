/**
 * Shared test helpers
 *
 * Temp Page Stores with real files under a data directory, plus scripted
 * stand-ins for the LLM endpoint and the OCR extractor.
 *
 * @module tests/unit/helpers
 */

import { vi } from 'vitest';
import { mkdtempSync, rmSync, existsSync, mkdirSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import { DatabaseService } from '../../src/services/storage/database/index.js';
import { FileTextStore, fingerprint } from '../../src/services/storage/text-store.js';
import { CostGovernor, type GovernorConfig } from '../../src/services/governor/governor.js';
import { RunSignal } from '../../src/services/governor/run-signal.js';
import type {
  CompletionRequest,
  CompletionResult,
  LlmCompletion,
  TokenUsage,
} from '../../src/services/llm/client.js';
import type { OcrExtractor } from '../../src/services/ocr/extractor.js';
import { OcrError } from '../../src/services/ocr/errors.js';
import { ASSESSMENT_SYSTEM_PROMPT } from '../../src/services/correction/prompts.js';
import type { RescanStrategyName, RescanStrategy } from '../../src/services/rescan/strategies.js';
import type { Page } from '../../src/models/page.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TEMP DIRECTORIES
// ═══════════════════════════════════════════════════════════════════════════════

/** Matches the prefix swept by tests/global-teardown.ts */
export function createTempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `ocrc-${label}-`));
}

export function cleanupTempDir(dir: string): void {
  try {
    if (existsSync(dir)) {
      rmSync(dir, { recursive: true, force: true });
    }
  } catch {
    // Ignore cleanup errors
  }
}

export function createUniqueName(prefix: string): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// PAGE STORE FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

export interface TestStore {
  dir: string;
  dataDir: string;
  storagePath: string;
  name: string;
  db: DatabaseService;
  textStore: FileTextStore;
  cleanup(): void;
}

export function createTestStore(label: string): TestStore {
  const dir = createTempDir(label);
  const dataDir = join(dir, 'data');
  const storagePath = join(dir, 'databases');
  mkdirSync(dataDir, { recursive: true });
  const name = createUniqueName('pages');
  const db = DatabaseService.create(name, undefined, storagePath);
  return {
    dir,
    dataDir,
    storagePath,
    name,
    db,
    textStore: new FileTextStore(dataDir, db),
    cleanup: () => {
      try {
        db.close();
      } catch {
        // Already closed by the test
      }
      cleanupTempDir(dir);
    },
  };
}

export function textPathFor(pageId: string): string {
  return `text/${pageId}.txt`;
}

export function imagePathFor(pageId: string): string {
  return `images/${pageId}.png`;
}

/**
 * Write the text and a placeholder image under the data dir
 */
export function writePageFiles(dataDir: string, pageId: string, text: string): void {
  const textFile = join(dataDir, textPathFor(pageId));
  const imageFile = join(dataDir, imagePathFor(pageId));
  mkdirSync(dirname(textFile), { recursive: true });
  mkdirSync(dirname(imageFile), { recursive: true });
  writeFileSync(textFile, text, 'utf-8');
  writeFileSync(imageFile, 'not really a png');
}

export function registerPage(store: TestStore, pageId: string, text: string): Page {
  writePageFiles(store.dataDir, pageId, text);
  return store.db.insertPage({
    page_id: pageId,
    image_path: imagePathFor(pageId),
    text_path: textPathFor(pageId),
    ...fingerprint(text),
  });
}

export const GOOD_TEXT = 'Exhibit 14 — Deposition of Jane Roe, taken on March 3, 2021.';

/** Passes every hard check but carries one artifact character */
export const FLAGGED_TEXT = 'The quick brown fox | jumps over the lazy dog today.';

export const GARBAGE_TEXT = 'xx';

// ═══════════════════════════════════════════════════════════════════════════════
// GOVERNOR
// ═══════════════════════════════════════════════════════════════════════════════

export const TEST_GOVERNOR_CONFIG: GovernorConfig = {
  maxDailyCostUsd: 5,
  tokenBufferRatio: 0.03,
  inputCostPerMTok: 0.7,
  outputCostPerMTok: 2.8,
};

export function createGovernor(
  db: DatabaseService,
  overrides: Partial<GovernorConfig> = {},
  signal: RunSignal = new RunSignal()
): CostGovernor {
  return new CostGovernor(db, { ...TEST_GOVERNOR_CONFIG, ...overrides }, signal);
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCRIPTED COLLABORATORS
// ═══════════════════════════════════════════════════════════════════════════════

export const DEFAULT_USAGE: TokenUsage = { inputTokens: 100, outputTokens: 50, totalTokens: 150 };

interface ScriptedCompletion {
  text: string;
  model?: string;
  usage?: TokenUsage | null;
}

export type ScriptedReply = string | Error | ScriptedCompletion;

/**
 * LLM stand-in answering from a queue of replies, in order
 */
export class ScriptedLlm implements LlmCompletion {
  readonly model = 'test-model';
  readonly requests: CompletionRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  push(...replies: ScriptedReply[]): void {
    this.replies.push(...replies);
  }

  get remaining(): number {
    return this.replies.length;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    const next = this.replies.shift();
    if (next === undefined) {
      throw new Error('ScriptedLlm: no reply queued');
    }
    if (next instanceof Error) {
      throw next;
    }
    const reply: ScriptedCompletion = typeof next === 'string' ? { text: next } : next;
    return {
      text: reply.text,
      model: reply.model ?? this.model,
      usage: reply.usage === undefined ? DEFAULT_USAGE : reply.usage,
      processingTimeMs: 1,
    };
  }
}

/**
 * OCR stand-in returning queued outputs, in order
 */
export class ScriptedExtractor implements OcrExtractor {
  readonly calls: { imagePath: string; strategy: RescanStrategyName }[] = [];
  private readonly outputs: (string | Error)[];

  constructor(outputs: (string | Error)[] = []) {
    this.outputs = [...outputs];
  }

  async extract(imagePath: string, strategy: RescanStrategy): Promise<string> {
    this.calls.push({ imagePath, strategy: strategy.name });
    const next = this.outputs.shift();
    if (next === undefined) {
      throw new OcrError('ScriptedExtractor: no output queued', imagePath);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

/**
 * LLM stand-in that answers by request shape, so concurrent workers get
 * the same replies in any order: classifier calls get `classifierReply`,
 * assessments get `assessmentJson()`, and corrections fix "Depositon".
 */
export class RoutingLlm implements LlmCompletion {
  readonly model = 'test-model';
  readonly requests: CompletionRequest[] = [];

  constructor(public classifierReply: string | Error = 'ACCEPTABLE') {}

  countRequests(kind: 'classify' | 'correct' | 'assess'): number {
    return this.requests.filter((r) => routeOf(r) === kind).length;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    this.requests.push(request);
    return { text: this.answer(request), model: this.model, usage: DEFAULT_USAGE, processingTimeMs: 1 };
  }

  private answer(request: CompletionRequest): string {
    switch (routeOf(request)) {
      case 'classify':
        if (this.classifierReply instanceof Error) {
          throw this.classifierReply;
        }
        return this.classifierReply;
      case 'assess':
        return assessmentJson();
      case 'correct':
        return request.messages[request.messages.length - 1].content.replace('Depositon', 'Deposition');
    }
  }
}

function routeOf(request: CompletionRequest): 'classify' | 'correct' | 'assess' {
  if (request.maxTokens === 10) return 'classify';
  return request.messages[0].content === ASSESSMENT_SYSTEM_PROMPT ? 'assess' : 'correct';
}

export function assessmentJson(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    quality_score: 92,
    improvement_level: 'moderate',
    major_corrections: ['Fixed "Depositon" to "Deposition"'],
    confidence: 'high',
    needs_review: false,
    ...overrides,
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESPONSES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ParsedToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export function parseResponse(response: {
  content: Array<{ type: string; text: string }>;
}): ParsedToolResponse {
  return JSON.parse(response.content[0].text);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════════

const PIPELINE_ENV = [
  'OCR_MIN_TEXT_LENGTH',
  'OCR_MAX_RESCAN_ATTEMPTS',
  'OCR_TOKEN_BUFFER_RATIO',
  'MAX_DAILY_API_COST_USD',
  'OCR_PIPELINE_CONCURRENCY',
  'OCR_CLAIM_TTL_MINUTES',
  'OCR_MIN_CONFIDENCE_FOR_AUTO_APPROVAL',
  'OCR_ENABLE_HUMAN_REVIEW',
  'OCR_CORRECTION_SCOPE',
  'OCR_CLASSIFIER_ENABLED',
  'OCR_DOCUMENT_TYPE',
  'LLM_MODEL',
  'LLM_FALLBACK_MODEL',
  'LLM_BASE_URL',
  'LLM_INPUT_COST_PER_MTOK',
  'LLM_OUTPUT_COST_PER_MTOK',
  'OCR_CONVERGENCE_DB',
];

/**
 * Pin the environment the pipeline reads: defaults everywhere, the given
 * data dir and a placeholder API key. Undo with vi.unstubAllEnvs().
 */
export function stubPipelineEnv(dataDir: string, apiKey: string = 'test-secret'): void {
  for (const name of PIPELINE_ENV) {
    vi.stubEnv(name, '');
  }
  vi.stubEnv('OCR_DATA_DIR', dataDir);
  vi.stubEnv('LLM_API_KEY', apiKey);
}
