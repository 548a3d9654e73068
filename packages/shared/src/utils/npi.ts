/**
 * NPI check digits are Luhn digits computed as if the 10-digit number were
 * prefixed with the health-industry issuer prefix 80840.
 */
const NPI_ISSUER_PREFIX = '80840';
const NPI_RE = /^\d{10}$/;

/** Strip the separators extractors commonly leave in (spaces, hyphens). */
export function normalizeNpi(raw: string): string {
  return raw.replace(/[\s-]/g, '');
}

function luhnSum(digits: string): number {
  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    let digit = digits.charCodeAt(digits.length - 1 - i) - 48;
    if (i % 2 === 1) {
      digit *= 2;
      if (digit > 9) digit -= 9;
    }
    sum += digit;
  }
  return sum;
}

export function isLuhnValid(digits: string): boolean {
  return /^\d+$/.test(digits) && luhnSum(digits) % 10 === 0;
}

export function isTenDigitNpi(raw: string): boolean {
  return NPI_RE.test(normalizeNpi(raw));
}

export function isValidNpi(raw: string): boolean {
  const npi = normalizeNpi(raw);
  return NPI_RE.test(npi) && isLuhnValid(NPI_ISSUER_PREFIX + npi);
}

/**
 * Check digit for the first nine digits of an NPI.
 */
export function npiCheckDigit(firstNine: string): number {
  if (!/^\d{9}$/.test(firstNine)) {
    throw new Error(`Expected 9 digits, got "${firstNine}"`);
  }
  const sum = luhnSum(`${NPI_ISSUER_PREFIX}${firstNine}0`);
  return (10 - (sum % 10)) % 10;
}
