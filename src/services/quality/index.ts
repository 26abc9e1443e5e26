/**
 * Quality Assessor Module
 */

export {
  detectLocalSignals,
  DEFAULT_DETECTOR_OPTIONS,
  type DetectorOptions,
  type HardSignal,
  type SoftSignal,
  type LocalCheck,
} from './detector.js';
export {
  RemoteClassifier,
  buildClassifierPrompt,
  parseClassifierAnswer,
  type ClassifierOutcome,
  type DeferReason,
} from './classifier.js';
export { QualityAssessor, type Verdict, type AssessmentOutcome } from './assessor.js';
