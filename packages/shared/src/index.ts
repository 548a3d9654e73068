// Types
export type {
  ClaimType,
  DocumentKind,
  SupportingDocument,
  BaseClaim,
  MedicalClaim,
  DentalClaim,
  PrescriptionClaim,
  Claim,
  FieldConfidence,
} from './types/claim.js';

export type {
  IssueSeverity,
  IssueCode,
  ValidationIssue,
  ValidationResult,
  RuleName,
  RuleOutcome,
} from './types/validation.js';

export type {
  Verdict,
  PrecedenceRule,
  Decision,
  ClaimAssessment,
  DecisionCorrection,
} from './types/decision.js';

// Errors
export { SchemaError, ConfigurationError } from './errors.js';

// Schemas
export {
  SupportingDocumentSchema,
  MedicalClaimSchema,
  DentalClaimSchema,
  PrescriptionClaimSchema,
  ClaimSchema,
  FieldConfidenceSchema,
  formatZodIssues,
  parseClaim,
  parseFieldConfidence,
} from './schemas/claim.schema.js';
export type { ClaimInput } from './schemas/claim.schema.js';

export {
  CONFIDENCE_FUSION_NAMES,
  EngineConfigSchema,
  engineConfigFromEnv,
  parseEngineConfig,
} from './schemas/engine-config.schema.js';
export type {
  EngineConfig,
  EngineConfigInput,
  ConfidenceFusionName,
} from './schemas/engine-config.schema.js';

export { DecisionSchema, DecisionCorrectionSchema } from './schemas/decision.schema.js';
export type { DecisionInput, DecisionCorrectionInput } from './schemas/decision.schema.js';

// Constants
export { CLAIM_TYPES, DOCUMENT_KINDS, VERDICTS, isClaimType } from './constants/claims.js';

// Utils
export { sha256, stableStringify } from './utils/hash.js';
export { isCalendarDate, isIsoDateTime, calendarDay, daysBetween } from './utils/date.js';
export { normalizeNpi, isLuhnValid, isTenDigitNpi, isValidNpi, npiCheckDigit } from './utils/npi.js';
export {
  CPT_CODE_RE,
  CDT_CODE_RE,
  ICD10_CODE_RE,
  normalizeCode,
  isValidCpt,
  isValidCdt,
  isValidIcd10,
} from './utils/codes.js';
