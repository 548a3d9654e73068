import { describe, it, expect } from 'vitest';
import { parseEngineConfig } from '@claimsentry/shared';
import { validateClaim } from './field-validator.js';
import { RulesEngine } from './rules-engine.js';
import { medicalClaim, uniformConfidence } from './test-fixtures.js';
import type { MedicalClaim } from '@claimsentry/shared';

const engine = new RulesEngine(parseEngineConfig());

function evaluate(claim: MedicalClaim, rules = engine) {
  return rules.evaluate(claim, validateClaim(claim, uniformConfidence(claim, 0.95)));
}

describe('RulesEngine', () => {
  it('evaluates the rules in a fixed order', () => {
    expect(engine.ruleNames).toEqual([
      'validation-clean',
      'max-claim-amount',
      'service-date-window',
      'auto-approval-amount',
      'documentation-completeness',
    ]);
  });

  it('passes every rule for a small, documented claim', () => {
    expect(evaluate(medicalClaim())).toEqual([
      { ruleName: 'validation-clean', passed: true, observed: 0, threshold: 0, detail: 'no error-severity issues' },
      {
        ruleName: 'max-claim-amount',
        passed: true,
        observed: 500,
        threshold: 100000,
        detail: 'billedAmount 500 <= maxClaimAmount 100000',
      },
      {
        ruleName: 'service-date-window',
        passed: true,
        observed: 18,
        threshold: 365,
        detail: 'serviceDate is 18 day(s) before submission (window 365)',
      },
      {
        ruleName: 'auto-approval-amount',
        passed: true,
        observed: 500,
        threshold: 1000,
        detail: 'billedAmount 500 <= autoApprovalAmountCeiling 1000',
      },
      {
        ruleName: 'documentation-completeness',
        passed: true,
        observed: 1,
        threshold: 0.5,
        detail: 'documentationScore 1 >= minDocumentationScore 0.5',
      },
    ]);
  });

  it('fails the auto-approval amount above the ceiling', () => {
    const outcome = evaluate(medicalClaim({ billedAmount: 5000 }))[3];
    expect(outcome).toMatchObject({
      ruleName: 'auto-approval-amount',
      passed: false,
      detail: 'billedAmount 5000 > autoApprovalAmountCeiling 1000',
    });
  });

  it('still records every rule when validation fails', () => {
    const outcomes = evaluate(medicalClaim({ billedAmount: 150_000 }));
    expect(outcomes).toHaveLength(5);
    expect(outcomes[0]).toMatchObject({ passed: false, observed: 1, detail: '1 error-severity issue(s)' });
    expect(outcomes[1]).toMatchObject({ passed: false, detail: 'billedAmount 150000 > maxClaimAmount 100000' });
  });

  it('reports a future service date', () => {
    const outcome = evaluate(medicalClaim({ serviceDate: '2026-10-21', dischargeDate: '2026-10-22' }))[2];
    expect(outcome).toMatchObject({ passed: false, observed: -2, detail: 'serviceDate is 2 day(s) after submission' });
  });

  it('fails documentation completeness below the minimum', () => {
    const outcome = evaluate(medicalClaim({ documents: [], attendingPhysician: undefined, description: '' }))[4];
    expect(outcome).toMatchObject({
      passed: false,
      observed: 2 / 6,
      detail: 'documentationScore 0.3333 < minDocumentationScore 0.5',
    });
  });

  it('reads thresholds from its configuration', () => {
    const strict = new RulesEngine(parseEngineConfig({ autoApprovalAmountCeiling: 100, minDocumentationScore: 1 }));
    const outcomes = evaluate(medicalClaim(), strict);
    expect(outcomes[3]?.detail).toBe('billedAmount 500 > autoApprovalAmountCeiling 100');
    expect(outcomes[4]?.passed).toBe(true);
  });

  it('returns frozen outcomes', () => {
    const outcomes = evaluate(medicalClaim());
    expect(Object.isFrozen(outcomes)).toBe(true);
    expect(Object.isFrozen(outcomes[0])).toBe(true);
  });
});
