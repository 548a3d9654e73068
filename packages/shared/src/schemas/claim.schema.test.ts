import { describe, it, expect } from 'vitest';
import { SchemaError } from '../errors.js';
import { ClaimSchema, parseClaim, parseFieldConfidence } from './claim.schema.js';

const validMedical = {
  claimId: 'CLM-1001',
  claimType: 'MEDICAL',
  patientId: 'PAT-123456',
  patientName: 'Test Patient',
  providerNpi: '1234567893',
  serviceDate: '2026-10-01',
  submittedAt: '2026-10-19T09:00:00Z',
  billedAmount: 500,
  diagnosisCodes: ['J96.00'],
  procedureCodes: ['99213'],
  admissionDate: '2026-09-30',
  dischargeDate: '2026-10-02',
};

describe('ClaimSchema', () => {
  it('validates a medical claim and applies defaults', () => {
    const result = ClaimSchema.safeParse(validMedical);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.currency).toBe('USD');
      expect(result.data.documents).toEqual([]);
    }
  });

  it('validates a prescription claim without procedure codes', () => {
    const result = ClaimSchema.safeParse({
      ...validMedical,
      claimType: 'PRESCRIPTION',
      procedureCodes: undefined,
      medicationName: 'Amoxicillin',
      dosage: '500mg',
      quantity: 30,
      daysSupply: 10,
      pharmacyName: 'Corner Pharmacy',
    });
    expect(result.success).toBe(true);
    if (result.success && result.data.claimType === 'PRESCRIPTION') {
      expect(result.data.procedureCodes).toEqual([]);
      expect(result.data.refillNumber).toBe(0);
      expect(result.data.isGeneric).toBe(false);
    }
  });

  it('rejects a medical claim without admission and discharge dates', () => {
    const { admissionDate: _a, dischargeDate: _d, ...missing } = validMedical;
    const result = ClaimSchema.safeParse(missing);
    expect(result.success).toBe(false);
  });

  it('rejects impossible calendar dates', () => {
    const result = ClaimSchema.safeParse({ ...validMedical, serviceDate: '2026-02-30' });
    expect(result.success).toBe(false);
  });

  it('lets blank required strings through for semantic validation', () => {
    const result = ClaimSchema.safeParse({ ...validMedical, providerNpi: '', serviceDate: '' });
    expect(result.success).toBe(true);
  });

  it('rejects a non-positive prescription quantity', () => {
    const result = ClaimSchema.safeParse({
      ...validMedical,
      claimType: 'PRESCRIPTION',
      medicationName: 'Amoxicillin',
      dosage: '500mg',
      quantity: 0,
      daysSupply: 10,
      pharmacyName: 'Corner Pharmacy',
    });
    expect(result.success).toBe(false);
  });
});

describe('parseClaim', () => {
  it('returns a typed claim', () => {
    const claim = parseClaim(validMedical);
    expect(claim.claimType).toBe('MEDICAL');
    expect(claim.claimId).toBe('CLM-1001');
  });

  it('throws SchemaError naming an unknown claim type', () => {
    expect(() => parseClaim({ ...validMedical, claimType: 'VISION' })).toThrow(
      new SchemaError('Unknown claim type "VISION"')
    );
  });

  it('lists structural issues with their paths', () => {
    try {
      parseClaim({ ...validMedical, billedAmount: '500' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      if (err instanceof SchemaError) {
        expect(err.message).toBe('Claim record failed schema validation');
        expect(err.issues).toEqual(['billedAmount: Expected number, received string']);
      }
    }
  });

  it('rejects non-object records', () => {
    expect(() => parseClaim(null)).toThrow('Claim record must be an object');
    expect(() => parseClaim([validMedical])).toThrow('Claim record must be an object');
  });
});

describe('parseFieldConfidence', () => {
  it('treats a missing map as empty', () => {
    expect(parseFieldConfidence(undefined)).toEqual({});
  });

  it('accepts scores in [0, 1]', () => {
    expect(parseFieldConfidence({ patientId: 0.9, billedAmount: 1 })).toEqual({ patientId: 0.9, billedAmount: 1 });
  });

  it('rejects out-of-range scores', () => {
    expect(() => parseFieldConfidence({ patientId: 1.2 })).toThrow(SchemaError);
    expect(() => parseFieldConfidence({ patientId: 'high' })).toThrow('Field confidence map is malformed');
  });
});
