export type IssueSeverity = 'error' | 'warning';

export type IssueCode =
  | 'UNKNOWN_CLAIM_TYPE'
  | 'MISSING_FIELD'
  | 'INVALID_NPI'
  | 'INVALID_CODE_FORMAT'
  | 'SERVICE_DATE_OUT_OF_RANGE'
  | 'AMOUNT_OUT_OF_RANGE'
  | 'AMOUNT_PRECISION'
  | 'INVALID_PATIENT_ID'
  | 'INVALID_DATE_RANGE'
  | 'LOW_CONFIDENCE_FIELD';

export interface ValidationIssue {
  field: string;
  severity: IssueSeverity;
  message: string;
  code: IssueCode;
}

export interface ValidationResult {
  readonly issues: readonly ValidationIssue[];
  /** True when no issue has severity `error`. */
  readonly valid: boolean;
  /** Fraction of expected supporting fields/documents present, in [0, 1]. */
  readonly documentationScore: number;
}

export type RuleName =
  | 'validation-clean'
  | 'max-claim-amount'
  | 'service-date-window'
  | 'auto-approval-amount'
  | 'documentation-completeness';

export interface RuleOutcome {
  readonly ruleName: RuleName;
  readonly passed: boolean;
  readonly detail: string;
  readonly observed?: number;
  readonly threshold?: number;
}
