export type ClaimType = 'MEDICAL' | 'DENTAL' | 'PRESCRIPTION';

export type DocumentKind =
  | 'ITEMIZED_BILL'
  | 'MEDICAL_RECORD'
  | 'XRAY'
  | 'PRESCRIPTION'
  | 'PHARMACY_RECEIPT'
  | 'REFERRAL'
  | 'OTHER';

export interface SupportingDocument {
  kind: DocumentKind;
  fileName: string;
}

/**
 * Fields shared by every claim variant. Dates are calendar dates
 * (`YYYY-MM-DD`); `submittedAt` is an ISO-8601 date-time.
 */
export interface BaseClaim {
  claimId: string;
  patientId: string;
  patientName: string;
  providerNpi: string;
  providerName?: string;
  serviceDate: string;
  submittedAt: string;
  billedAmount: number;
  currency: string;
  diagnosisCodes: string[];
  procedureCodes: string[];
  description?: string;
  documents: SupportingDocument[];
}

export interface MedicalClaim extends BaseClaim {
  claimType: 'MEDICAL';
  admissionDate: string;
  dischargeDate: string;
  attendingPhysician?: string;
  treatmentType?: string;
}

export interface DentalClaim extends BaseClaim {
  claimType: 'DENTAL';
  toothNumbers: string[];
  procedureType: string;
  isEmergency: boolean;
  xRaysTaken: boolean;
}

export interface PrescriptionClaim extends BaseClaim {
  claimType: 'PRESCRIPTION';
  medicationName: string;
  dosage: string;
  quantity: number;
  daysSupply: number;
  pharmacyName: string;
  pharmacyNpi?: string;
  isGeneric: boolean;
  refillNumber: number;
}

export type Claim = MedicalClaim | DentalClaim | PrescriptionClaim;

/** Per-field extraction confidence in [0, 1], keyed by claim field name. */
export type FieldConfidence = Readonly<Record<string, number>>;
