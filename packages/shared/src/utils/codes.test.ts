import { describe, it, expect } from 'vitest';
import { isValidCdt, isValidCpt, isValidIcd10, normalizeCode } from './codes.js';

describe('isValidIcd10', () => {
  it.each(['A00', 'A00.1', 'J96.00', 'E11.9', 'S72.001A', 'A001', 'j96.01', ' Z00.00 '])(
    'accepts %s',
    (code) => {
      expect(isValidIcd10(code)).toBe(true);
    },
  );

  it.each(['1234', 'A0', 'A00.', 'A00.12345', 'AA0.1', '', 'J96-00'])('rejects "%s"', (code) => {
    expect(isValidIcd10(code)).toBe(false);
  });
});

describe('isValidCpt', () => {
  it('accepts five-digit codes and modifier forms', () => {
    expect(isValidCpt('99213')).toBe(true);
    expect(isValidCpt('99213-25')).toBe(true);
    expect(isValidCpt('27447-lt')).toBe(true);
  });

  it('rejects other shapes', () => {
    expect(isValidCpt('9921')).toBe(false);
    expect(isValidCpt('992133')).toBe(false);
    expect(isValidCpt('99213-2')).toBe(false);
    expect(isValidCpt('D0120')).toBe(false);
  });
});

describe('isValidCdt', () => {
  it('accepts D-codes only', () => {
    expect(isValidCdt('D0120')).toBe(true);
    expect(isValidCdt('d2740')).toBe(true);
    expect(isValidCdt('99213')).toBe(false);
    expect(isValidCdt('D012')).toBe(false);
  });
});

describe('normalizeCode', () => {
  it('trims and upper-cases', () => {
    expect(normalizeCode('  e11.9 ')).toBe('E11.9');
  });
});
