import type { Claim, DentalClaim, MedicalClaim, PrescriptionClaim } from '@claimsentry/shared';
import { extractedFields } from './claim-profile.js';

export const SUBMITTED_AT = '2026-10-19T09:00:00Z';
export const FIXED_NOW = new Date('2026-10-19T12:00:00.000Z');

export function medicalClaim(overrides: Partial<MedicalClaim> = {}): MedicalClaim {
  return {
    claimId: 'CLM-1001',
    claimType: 'MEDICAL',
    patientId: 'PAT-123456',
    patientName: 'Test Patient',
    providerNpi: '1234567893',
    providerName: 'Riverside Clinic',
    serviceDate: '2026-10-01',
    submittedAt: SUBMITTED_AT,
    billedAmount: 500,
    currency: 'USD',
    diagnosisCodes: ['J96.00'],
    procedureCodes: ['99213'],
    description: 'Inpatient stay for acute respiratory failure',
    documents: [
      { kind: 'ITEMIZED_BILL', fileName: 'bill.pdf' },
      { kind: 'MEDICAL_RECORD', fileName: 'discharge-summary.pdf' },
    ],
    admissionDate: '2026-09-30',
    dischargeDate: '2026-10-02',
    attendingPhysician: 'Dr. Example',
    ...overrides,
  };
}

export function dentalClaim(overrides: Partial<DentalClaim> = {}): DentalClaim {
  return {
    claimId: 'CLM-2001',
    claimType: 'DENTAL',
    patientId: 'PAT-654321',
    patientName: 'Test Patient',
    providerNpi: '9876543213',
    serviceDate: '2026-10-10',
    submittedAt: SUBMITTED_AT,
    billedAmount: 240,
    currency: 'USD',
    diagnosisCodes: ['K02.52'],
    procedureCodes: ['D2740'],
    description: 'Porcelain crown on lower molar',
    documents: [{ kind: 'ITEMIZED_BILL', fileName: 'dental-bill.pdf' }],
    toothNumbers: ['30'],
    procedureType: 'crown',
    isEmergency: false,
    xRaysTaken: false,
    ...overrides,
  };
}

export function prescriptionClaim(overrides: Partial<PrescriptionClaim> = {}): PrescriptionClaim {
  return {
    claimId: 'CLM-3001',
    claimType: 'PRESCRIPTION',
    patientId: 'PAT-777777',
    patientName: 'Test Patient',
    providerNpi: '1234567893',
    serviceDate: '2026-10-15',
    submittedAt: SUBMITTED_AT,
    billedAmount: 42.5,
    currency: 'USD',
    diagnosisCodes: ['J02.9'],
    procedureCodes: [],
    description: 'Antibiotic course for strep throat',
    documents: [
      { kind: 'PRESCRIPTION', fileName: 'rx.pdf' },
      { kind: 'PHARMACY_RECEIPT', fileName: 'receipt.pdf' },
    ],
    medicationName: 'Amoxicillin',
    dosage: '500mg',
    quantity: 30,
    daysSupply: 10,
    pharmacyName: 'Corner Pharmacy',
    isGeneric: true,
    refillNumber: 0,
    ...overrides,
  };
}

/** The same score for every extracted field of the claim. */
export function uniformConfidence(claim: Claim, score: number): Record<string, number> {
  return Object.fromEntries(extractedFields(claim).map((field) => [field, score]));
}
