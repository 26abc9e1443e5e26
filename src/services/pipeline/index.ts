/**
 * Pipeline Module
 */

export {
  loadPipelineConfig,
  validatePipelineConfig,
  parseBoolEnv,
  PipelineConfigSchema,
  CORRECTION_SCOPES,
  type PipelineConfig,
  type CorrectionScope,
  type ConfigValidation,
} from './config.js';
export { PageProcessor, correctableStatuses, needsAssessment, type PageProcessResult } from './page-processor.js';
export { PipelineRunner, type RunOptions, type RunSummary, type RunCounts, type RunnerOptions } from './runner.js';
export { createPipeline, type Pipeline, type PipelineDeps } from './factory.js';
