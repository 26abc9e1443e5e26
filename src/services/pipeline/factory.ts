/**
 * Pipeline wiring
 *
 * Builds the assessor, engines, governor and runner around one open Page
 * Store. The three external collaborators (LLM, OCR extractor, image store)
 * can be injected.
 *
 * @module pipeline/factory
 */

import type { DatabaseService } from '../storage/database/index.js';
import { FileTextStore } from '../storage/index.js';
import { LlmClient, type LlmCompletion, type LlmConfig } from '../llm/index.js';
import { CostGovernor, RunSignal } from '../governor/index.js';
import { RemoteClassifier, QualityAssessor } from '../quality/index.js';
import { RescanEngine } from '../rescan/index.js';
import { CorrectionEngine } from '../correction/index.js';
import {
  TesseractExtractor,
  DirectoryImageStore,
  type OcrExtractor,
  type ImageStore,
} from '../ocr/index.js';
import type { PipelineConfig } from './config.js';
import { PageProcessor } from './page-processor.js';
import { PipelineRunner } from './runner.js';

export interface PipelineDeps {
  llm?: LlmCompletion;
  extractor?: OcrExtractor;
  imageStore?: ImageStore;
  signal?: RunSignal;
  now?: () => number;
}

export interface Pipeline {
  runner: PipelineRunner;
  processor: PageProcessor;
  governor: CostGovernor;
  textStore: FileTextStore;
  assessor: QualityAssessor;
  rescan: RescanEngine;
  correction: CorrectionEngine | null;
}

export function createPipeline(
  db: DatabaseService,
  config: PipelineConfig,
  llmConfig: LlmConfig,
  deps: PipelineDeps = {}
): Pipeline {
  const now = deps.now ?? Date.now;
  const signal = deps.signal ?? new RunSignal();
  const governor = new CostGovernor(
    db,
    {
      maxDailyCostUsd: config.maxDailyCostUsd,
      tokenBufferRatio: config.tokenBufferRatio,
      inputCostPerMTok: llmConfig.inputCostPerMTok,
      outputCostPerMTok: llmConfig.outputCostPerMTok,
    },
    signal,
    now
  );

  const needsLlm = config.classifierEnabled || config.correctionScope !== 'off';
  const llm = deps.llm ?? (needsLlm ? new LlmClient(llmConfig) : null);

  const textStore = new FileTextStore(config.dataDir, db);
  const classifier =
    config.classifierEnabled && llm ? new RemoteClassifier(llm, governor, config.documentType) : null;
  const assessor = new QualityAssessor({ minTextLength: config.minTextLength }, classifier);

  const rescan = new RescanEngine(
    db,
    textStore,
    deps.extractor ?? new TesseractExtractor(),
    deps.imageStore ?? new DirectoryImageStore(config.dataDir),
    { maxRescanAttempts: config.maxRescanAttempts, minTextLength: config.minTextLength }
  );

  const correction =
    config.correctionScope !== 'off' && llm
      ? new CorrectionEngine(db, llm, governor, {
          documentType: config.documentType,
          enableHumanReview: config.enableHumanReview,
          minConfidenceForAutoApproval: config.minConfidenceForAutoApproval,
        })
      : null;

  const processor = new PageProcessor(db, textStore, assessor, rescan, correction, signal, {
    maxRescanAttempts: config.maxRescanAttempts,
    correctionScope: config.correctionScope,
  });

  const runner = new PipelineRunner(
    db,
    processor,
    governor,
    {
      concurrency: config.concurrency,
      claimTtlMinutes: config.claimTtlMinutes,
      correctionScope: config.correctionScope,
    },
    now
  );

  return { runner, processor, governor, textStore, assessor, rescan, correction };
}
