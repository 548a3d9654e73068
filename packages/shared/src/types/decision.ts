import type { RuleOutcome, ValidationResult } from './validation.js';

export type Verdict = 'APPROVED' | 'REJECTED' | 'MANUAL_REVIEW';

export type PrecedenceRule =
  | 'VALIDATION_FAILED'
  | 'AMOUNT_EXCEEDS_MAXIMUM'
  | 'AUTO_APPROVAL'
  | 'MANUAL_REVIEW'
  | 'MANUAL_CORRECTION';

export interface Decision {
  /** sha256 of the remaining fields; equal inputs give equal ids. */
  readonly decisionId: string;
  readonly claimId: string;
  readonly verdict: Verdict;
  readonly precedenceRule: PrecedenceRule;
  readonly overallConfidence: number;
  readonly rationale: readonly string[];
  readonly timestamp: string;
  readonly supersedesDecisionId?: string;
}

export interface ClaimAssessment {
  readonly decision: Decision;
  readonly validation: ValidationResult;
  readonly ruleOutcomes: readonly RuleOutcome[];
}

export interface DecisionCorrection {
  verdict: Verdict;
  reason: string;
  correctedBy: string;
}
