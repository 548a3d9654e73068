import {
  calendarDay,
  daysBetween,
  isCalendarDate,
  isClaimType,
  isIsoDateTime,
  isTenDigitNpi,
  isValidCdt,
  isValidCpt,
  isValidIcd10,
  isValidNpi,
  parseEngineConfig,
  type Claim,
  type EngineConfig,
  type FieldConfidence,
  type ValidationIssue,
  type ValidationResult,
} from '@claimsentry/shared';
import { documentationScore, extractedFields, isBlank, missingRequiredFields } from './claim-profile.js';
import { confidenceFor } from './confidence.js';
import { formatNumber } from './format.js';

export type FieldValidatorOptions = Pick<
  EngineConfig,
  'serviceDateWindowDays' | 'amountHardCeiling' | 'lowConfidenceFloor'
>;

const { serviceDateWindowDays, amountHardCeiling, lowConfidenceFloor } = parseEngineConfig();

export const DEFAULT_FIELD_VALIDATOR_OPTIONS: FieldValidatorOptions = Object.freeze({
  serviceDateWindowDays,
  amountHardCeiling,
  lowConfidenceFloor,
});

const PATIENT_ID_RE = /^[A-Za-z0-9-]{6,20}$/;

export function buildValidationResult(
  issues: readonly ValidationIssue[],
  documentationScore: number,
): ValidationResult {
  return Object.freeze({
    issues: Object.freeze(issues.map((issue) => Object.freeze({ ...issue }))),
    valid: !issues.some((issue) => issue.severity === 'error'),
    documentationScore,
  });
}

function error(field: string, code: ValidationIssue['code'], message: string): ValidationIssue {
  return { field, severity: 'error', code, message };
}

function checkNpi(field: string, raw: string): ValidationIssue[] {
  if (isValidNpi(raw)) return [];
  return [
    error(
      field,
      'INVALID_NPI',
      isTenDigitNpi(raw)
        ? `${field} "${raw}" fails the NPI check digit`
        : `${field} "${raw}" must be exactly 10 digits`,
    ),
  ];
}

function checkCodes(claim: Claim): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  claim.diagnosisCodes.forEach((code, i) => {
    if (!isValidIcd10(code)) {
      issues.push(
        error(`diagnosisCodes[${i}]`, 'INVALID_CODE_FORMAT', `diagnosis code "${code}" is not a valid ICD-10 code`),
      );
    }
  });

  const acceptsCdt = claim.claimType === 'DENTAL';
  claim.procedureCodes.forEach((code, i) => {
    if (isValidCpt(code) || (acceptsCdt && isValidCdt(code))) return;
    issues.push(
      error(
        `procedureCodes[${i}]`,
        'INVALID_CODE_FORMAT',
        `procedure code "${code}" is not a valid ${acceptsCdt ? 'CPT or CDT' : 'CPT'} code`,
      ),
    );
  });
  return issues;
}

function checkServiceDate(claim: Claim, windowDays: number): ValidationIssue[] {
  if (!isCalendarDate(claim.serviceDate)) {
    return [
      error(
        'serviceDate',
        'SERVICE_DATE_OUT_OF_RANGE',
        `service date "${claim.serviceDate}" is not a YYYY-MM-DD calendar date`,
      ),
    ];
  }
  if (!isIsoDateTime(claim.submittedAt)) {
    return [
      error(
        'submittedAt',
        'SERVICE_DATE_OUT_OF_RANGE',
        `submission time "${claim.submittedAt}" is not an ISO-8601 date-time`,
      ),
    ];
  }
  const submitted = calendarDay(claim.submittedAt);
  const age = daysBetween(claim.serviceDate, submitted);
  if (age < 0) {
    return [
      error(
        'serviceDate',
        'SERVICE_DATE_OUT_OF_RANGE',
        `service date ${claim.serviceDate} is after submission date ${submitted}`,
      ),
    ];
  }
  if (age > windowDays) {
    return [
      error(
        'serviceDate',
        'SERVICE_DATE_OUT_OF_RANGE',
        `service date ${claim.serviceDate} is ${age} days before submission; window is ${windowDays} days`,
      ),
    ];
  }
  return [];
}

function checkAmount(amount: number, ceiling: number): ValidationIssue[] {
  if (!Number.isFinite(amount)) {
    return [error('billedAmount', 'AMOUNT_OUT_OF_RANGE', `billed amount ${amount} is not a finite number`)];
  }
  if (amount <= 0) {
    return [error('billedAmount', 'AMOUNT_OUT_OF_RANGE', 'billed amount must be greater than 0')];
  }
  if (amount > ceiling) {
    return [
      error(
        'billedAmount',
        'AMOUNT_OUT_OF_RANGE',
        `billed amount ${formatNumber(amount)} exceeds ceiling ${formatNumber(ceiling)}`,
      ),
    ];
  }
  const cents = amount * 100;
  if (Math.abs(cents - Math.round(cents)) > 1e-6) {
    return [
      {
        field: 'billedAmount',
        severity: 'warning',
        code: 'AMOUNT_PRECISION',
        message: `billed amount ${amount} has more than two decimal places`,
      },
    ];
  }
  return [];
}

function checkVariant(claim: Claim, missing: ReadonlySet<string>): ValidationIssue[] {
  switch (claim.claimType) {
    case 'MEDICAL':
      if (missing.has('admissionDate') || missing.has('dischargeDate')) return [];
      for (const field of ['admissionDate', 'dischargeDate'] as const) {
        if (!isCalendarDate(claim[field])) {
          return [
            error(field, 'INVALID_DATE_RANGE', `${field} "${claim[field]}" is not a YYYY-MM-DD calendar date`),
          ];
        }
      }
      if (daysBetween(claim.admissionDate, claim.dischargeDate) < 0) {
        return [
          error(
            'dischargeDate',
            'INVALID_DATE_RANGE',
            `discharge date ${claim.dischargeDate} is before admission date ${claim.admissionDate}`,
          ),
        ];
      }
      return [];
    case 'PRESCRIPTION':
      return claim.pharmacyNpi === undefined || isBlank(claim.pharmacyNpi)
        ? []
        : checkNpi('pharmacyNpi', claim.pharmacyNpi);
    case 'DENTAL':
      return [];
  }
}

function checkConfidence(claim: Claim, confidence: FieldConfidence, floor: number): ValidationIssue[] {
  return extractedFields(claim)
    .filter((field) => confidenceFor(confidence, field) < floor)
    .map((field) => ({
      field,
      severity: 'warning' as const,
      code: 'LOW_CONFIDENCE_FIELD' as const,
      message: `extraction confidence ${formatNumber(confidenceFor(confidence, field))} is below ${formatNumber(floor)}`,
    }));
}

/**
 * Format and range checks on a single claim. Pure: the submission date on
 * the claim is the reference point for date checks.
 */
export function validateClaim(
  claim: Claim,
  confidence: FieldConfidence = {},
  options: FieldValidatorOptions = DEFAULT_FIELD_VALIDATOR_OPTIONS,
): ValidationResult {
  const claimType: string = claim.claimType;
  if (!isClaimType(claimType)) {
    return buildValidationResult(
      [error('claimType', 'UNKNOWN_CLAIM_TYPE', `claim type "${claimType}" is not recognized`)],
      0,
    );
  }

  const missing = new Set(missingRequiredFields(claim));
  const issues: ValidationIssue[] = [...missing].map((field) =>
    error(field, 'MISSING_FIELD', `${field} is required`),
  );

  if (!missing.has('patientId') && !PATIENT_ID_RE.test(claim.patientId)) {
    issues.push(
      error('patientId', 'INVALID_PATIENT_ID', 'patient ID must be 6-20 letters, digits or hyphens'),
    );
  }
  if (!missing.has('providerNpi')) {
    issues.push(...checkNpi('providerNpi', claim.providerNpi));
  }
  issues.push(...checkCodes(claim));
  if (!missing.has('serviceDate') && !missing.has('submittedAt')) {
    issues.push(...checkServiceDate(claim, options.serviceDateWindowDays));
  }
  issues.push(...checkAmount(claim.billedAmount, options.amountHardCeiling));
  issues.push(...checkVariant(claim, missing));
  issues.push(...checkConfidence(claim, confidence, options.lowConfidenceFloor));

  return buildValidationResult(issues, documentationScore(claim));
}
