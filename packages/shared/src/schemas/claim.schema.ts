import { z } from 'zod';
import { CLAIM_TYPES, DOCUMENT_KINDS, isClaimType } from '../constants/claims.js';
import { SchemaError } from '../errors.js';
import type { Claim, FieldConfidence } from '../types/claim.js';
import { isCalendarDate, isIsoDateTime } from '../utils/date.js';

// Blank values pass the schema on purpose: a present-but-empty field is a
// MISSING_FIELD validation issue, not a structural failure.
const calendarDate = z
  .string()
  .trim()
  .refine((v) => v === '' || isCalendarDate(v), { message: 'Expected a YYYY-MM-DD calendar date' });

const isoDateTime = z
  .string()
  .trim()
  .refine((v) => v === '' || isIsoDateTime(v), { message: 'Expected an ISO-8601 date-time' });

export const SupportingDocumentSchema = z.object({
  kind: z.enum(DOCUMENT_KINDS),
  fileName: z.string(),
});

const baseClaimShape = {
  claimId: z.string().trim(),
  patientId: z.string().trim(),
  patientName: z.string().trim(),
  providerNpi: z.string().trim(),
  providerName: z.string().trim().optional(),
  serviceDate: calendarDate,
  submittedAt: isoDateTime,
  billedAmount: z.number().finite(),
  currency: z.string().trim().default('USD'),
  diagnosisCodes: z.array(z.string()),
  procedureCodes: z.array(z.string()).default([]),
  description: z.string().optional(),
  documents: z.array(SupportingDocumentSchema).default([]),
};

export const MedicalClaimSchema = z.object({
  ...baseClaimShape,
  claimType: z.literal('MEDICAL'),
  procedureCodes: z.array(z.string()),
  admissionDate: calendarDate,
  dischargeDate: calendarDate,
  attendingPhysician: z.string().trim().optional(),
  treatmentType: z.string().trim().optional(),
});

export const DentalClaimSchema = z.object({
  ...baseClaimShape,
  claimType: z.literal('DENTAL'),
  procedureCodes: z.array(z.string()),
  toothNumbers: z.array(z.string()),
  procedureType: z.string().trim(),
  isEmergency: z.boolean().default(false),
  xRaysTaken: z.boolean().default(false),
});

export const PrescriptionClaimSchema = z.object({
  ...baseClaimShape,
  claimType: z.literal('PRESCRIPTION'),
  medicationName: z.string().trim(),
  dosage: z.string().trim(),
  quantity: z.number().int().positive(),
  daysSupply: z.number().int().positive(),
  pharmacyName: z.string().trim(),
  pharmacyNpi: z.string().trim().optional(),
  isGeneric: z.boolean().default(false),
  refillNumber: z.number().int().nonnegative().default(0),
});

export const ClaimSchema = z.discriminatedUnion('claimType', [
  MedicalClaimSchema,
  DentalClaimSchema,
  PrescriptionClaimSchema,
]);

export const FieldConfidenceSchema = z.record(z.string(), z.number().min(0).max(1));

export type ClaimInput = z.input<typeof ClaimSchema>;

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Parse an extractor record into a typed claim.
 * @throws SchemaError for an unknown claim type or structurally absent fields.
 */
export function parseClaim(record: unknown): Claim {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    throw new SchemaError('Claim record must be an object');
  }
  if ('claimType' in record && !isClaimType(record.claimType)) {
    throw new SchemaError(`Unknown claim type "${String(record.claimType)}"`, [
      `claimType: expected one of ${CLAIM_TYPES.join(', ')}`,
    ]);
  }

  const result = ClaimSchema.safeParse(record);
  if (!result.success) {
    throw new SchemaError('Claim record failed schema validation', formatZodIssues(result.error));
  }
  return result.data;
}

/**
 * @throws SchemaError when a score is missing a number or falls outside [0, 1].
 */
export function parseFieldConfidence(input: unknown): FieldConfidence {
  if (input === undefined || input === null) return {};
  const result = FieldConfidenceSchema.safeParse(input);
  if (!result.success) {
    throw new SchemaError('Field confidence map is malformed', formatZodIssues(result.error));
  }
  return result.data;
}
