import type { Claim, DocumentKind } from '@claimsentry/shared';

/**
 * Per-variant field contracts: which fields must be non-empty, which fields
 * carry an extraction confidence, and what supporting evidence a complete
 * submission has.
 */

const COMMON_REQUIRED = [
  'claimId',
  'patientId',
  'patientName',
  'providerNpi',
  'serviceDate',
  'submittedAt',
  'diagnosisCodes',
] as const;

// Metadata and flags with schema defaults; the extractor never scores them.
const NON_EXTRACTED_FIELDS: ReadonlySet<string> = new Set([
  'claimId',
  'claimType',
  'submittedAt',
  'documents',
  'currency',
  'isEmergency',
  'xRaysTaken',
  'isGeneric',
  'refillNumber',
]);

export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

function blankFields<C extends Claim>(claim: C, fields: readonly (keyof C & string)[]): string[] {
  return fields.filter((field) => isBlank(claim[field]));
}

/** Required fields that are present but empty, in declaration order. */
export function missingRequiredFields(claim: Claim): string[] {
  switch (claim.claimType) {
    case 'MEDICAL':
      return blankFields(claim, [...COMMON_REQUIRED, 'procedureCodes', 'admissionDate', 'dischargeDate']);
    case 'DENTAL':
      return blankFields(claim, [...COMMON_REQUIRED, 'procedureCodes', 'toothNumbers', 'procedureType']);
    case 'PRESCRIPTION':
      return blankFields(claim, [...COMMON_REQUIRED, 'medicationName', 'dosage', 'pharmacyName']);
  }
}

/** Fields present on the claim that the extractor should have scored. */
export function extractedFields(claim: Claim): string[] {
  const entries: [string, unknown][] = Object.entries(claim);
  return entries
    .filter(([field, value]) => !NON_EXTRACTED_FIELDS.has(field) && !isBlank(value))
    .map(([field]) => field);
}

export interface EvidenceCheck {
  label: string;
  present: boolean;
}

function hasDocument(claim: Claim, kind: DocumentKind): EvidenceCheck {
  return { label: `document:${kind}`, present: claim.documents.some((doc) => doc.kind === kind) };
}

export function documentationEvidence(claim: Claim): EvidenceCheck[] {
  const common: EvidenceCheck[] = [
    { label: 'description', present: (claim.description?.trim().length ?? 0) > 10 },
    { label: 'diagnosisCodes', present: claim.diagnosisCodes.length > 0 },
  ];
  const procedures: EvidenceCheck = { label: 'procedureCodes', present: claim.procedureCodes.length > 0 };

  switch (claim.claimType) {
    case 'MEDICAL':
      return [
        ...common,
        procedures,
        { label: 'attendingPhysician', present: !isBlank(claim.attendingPhysician) },
        hasDocument(claim, 'ITEMIZED_BILL'),
        hasDocument(claim, 'MEDICAL_RECORD'),
      ];
    case 'DENTAL':
      return [
        ...common,
        procedures,
        hasDocument(claim, 'ITEMIZED_BILL'),
        ...(claim.xRaysTaken ? [hasDocument(claim, 'XRAY')] : []),
      ];
    case 'PRESCRIPTION':
      return [...common, hasDocument(claim, 'PRESCRIPTION'), hasDocument(claim, 'PHARMACY_RECEIPT')];
  }
}

/** Fraction of expected supporting evidence present, in [0, 1]. */
export function documentationScore(claim: Claim): number {
  const evidence = documentationEvidence(claim);
  if (evidence.length === 0) return 0;
  return evidence.filter((check) => check.present).length / evidence.length;
}
