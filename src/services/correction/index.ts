/**
 * Correction Engine Module
 */

export {
  CorrectionEngine,
  type CorrectionEngineOptions,
  type CorrectionOutcome,
  type CorrectionDeferReason,
} from './engine.js';
export {
  parseAssessment,
  recoverJson,
  CorrectionAssessmentSchema,
  type AssessmentParseResult,
} from './assessment-parser.js';
export { buildCorrectionPrompt, buildAssessmentMessage, ASSESSMENT_SYSTEM_PROMPT } from './prompts.js';
