import type { ClaimType, DocumentKind } from '../types/claim.js';
import type { Verdict } from '../types/decision.js';

export const CLAIM_TYPES = ['MEDICAL', 'DENTAL', 'PRESCRIPTION'] as const satisfies readonly ClaimType[];

export const DOCUMENT_KINDS = [
  'ITEMIZED_BILL',
  'MEDICAL_RECORD',
  'XRAY',
  'PRESCRIPTION',
  'PHARMACY_RECEIPT',
  'REFERRAL',
  'OTHER',
] as const satisfies readonly DocumentKind[];

export const VERDICTS = ['APPROVED', 'REJECTED', 'MANUAL_REVIEW'] as const satisfies readonly Verdict[];

export function isClaimType(value: unknown): value is ClaimType {
  return typeof value === 'string' && CLAIM_TYPES.some((type) => type === value);
}
