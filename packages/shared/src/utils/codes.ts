/** CPT: five digits, optionally followed by a two-character modifier (`99213-25`). */
export const CPT_CODE_RE = /^\d{5}(?:-[A-Z0-9]{2})?$/;

/** CDT (dental procedure) codes: `D` followed by four digits. */
export const CDT_CODE_RE = /^D\d{4}$/;

/** ICD-10: letter, two digits, then an optional '.' and up to four alphanumerics. */
export const ICD10_CODE_RE = /^[A-Z]\d{2}(?:\.?[A-Z0-9]{1,4})?$/;

export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

export function isValidCpt(code: string): boolean {
  return CPT_CODE_RE.test(normalizeCode(code));
}

export function isValidCdt(code: string): boolean {
  return CDT_CODE_RE.test(normalizeCode(code));
}

export function isValidIcd10(code: string): boolean {
  return ICD10_CODE_RE.test(normalizeCode(code));
}
