export { DecisionEngine, buildDecision, correctDecision } from './decision-engine.js';
export type { DecisionEngineOptions } from './decision-engine.js';

export { RulesEngine } from './rules-engine.js';

export { validateClaim, buildValidationResult, DEFAULT_FIELD_VALIDATOR_OPTIONS } from './field-validator.js';
export type { FieldValidatorOptions } from './field-validator.js';

export {
  CONFIDENCE_FUSIONS,
  minimumFusion,
  geometricMeanFusion,
  confidenceFor,
  meanFieldConfidence,
} from './confidence.js';
export type { ConfidenceFusion } from './confidence.js';

export {
  missingRequiredFields,
  extractedFields,
  documentationEvidence,
  documentationScore,
} from './claim-profile.js';
export type { EvidenceCheck } from './claim-profile.js';

export { runBatch, summarizeBatch } from './batch-runner.js';
export type {
  ClaimSubmission,
  BatchFailureKind,
  BatchFailure,
  BatchItemResult,
  BatchLogger,
  BatchOptions,
  BatchSummary,
} from './batch-runner.js';

export { explainDecision } from './explain.js';
