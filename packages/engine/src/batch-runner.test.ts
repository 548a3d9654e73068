import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError, type Claim } from '@claimsentry/shared';
import { runBatch, summarizeBatch, type ClaimSubmission } from './batch-runner.js';
import { DecisionEngine } from './decision-engine.js';
import { FIXED_NOW, dentalClaim, medicalClaim, uniformConfidence } from './test-fixtures.js';

function createLogger() {
  return { info: vi.fn(), warn: vi.fn() };
}

function submission(claim: Claim, score = 0.95): ClaimSubmission {
  return { claim, confidence: uniformConfidence(claim, score) };
}

describe('runBatch', () => {
  const engine = new DecisionEngine({}, { clock: () => FIXED_NOW });

  it('isolates a malformed record and keeps going', () => {
    const submissions: ClaimSubmission[] = [
      submission(medicalClaim()),
      { claim: { ...medicalClaim({ claimId: 'CLM-1002' }), claimType: 'VISION' } },
      submission(dentalClaim()),
    ];
    const logger = createLogger();

    const results = runBatch(engine, submissions, { logger });

    expect(results).toHaveLength(3);
    expect(results.map((r) => r.index)).toEqual([0, 1, 2]);
    expect(results.map((r) => r.claimId)).toEqual(['CLM-1001', 'CLM-1002', 'CLM-2001']);
    expect(results[1]).toEqual({
      index: 1,
      claimId: 'CLM-1002',
      status: 'failure',
      error: {
        kind: 'SCHEMA_ERROR',
        message: 'Unknown claim type "VISION"',
        details: ['claimType: expected one of MEDICAL, DENTAL, PRESCRIPTION'],
      },
    });

    const verdicts = results.map((r) => (r.status === 'success' ? r.assessment.decision.verdict : r.status));
    expect(verdicts).toEqual(['APPROVED', 'failure', 'APPROVED']);

    expect(logger.warn).toHaveBeenCalledWith(
      {
        claimId: 'CLM-1002',
        index: 1,
        kind: 'SCHEMA_ERROR',
        details: ['claimType: expected one of MEDICAL, DENTAL, PRESCRIPTION'],
      },
      'Claim failed: Unknown claim type "VISION"',
    );
    expect(logger.info).toHaveBeenCalledWith(
      { total: 3, approved: 2, rejected: 0, manualReview: 0, failed: 1 },
      'Batch processed',
    );
  });

  it('matches assessing each claim on its own', () => {
    const claims: Claim[] = [
      medicalClaim(),
      medicalClaim({ billedAmount: 5000 }),
      dentalClaim({ diagnosisCodes: ['bad'] }),
    ];
    const results = runBatch(engine, claims.map((claim) => submission(claim)));

    results.forEach((result, i) => {
      const claim = claims[i];
      if (result.status !== 'success' || claim === undefined) throw new Error('expected a successful item');
      expect(result.assessment).toEqual(engine.assessRecord(claim, uniformConfidence(claim, 0.95)));
    });
  });

  it('labels records without a claim ID by position', () => {
    const results = runBatch(engine, [{ claim: 'not a claim' }, { claim: { claimId: '  ', claimType: 'DENTAL' } }]);

    expect(results[0]).toMatchObject({
      claimId: 'item-0',
      status: 'failure',
      error: { kind: 'SCHEMA_ERROR', message: 'Claim record must be an object' },
    });
    expect(results[1]).toMatchObject({
      claimId: 'item-1',
      error: { kind: 'SCHEMA_ERROR', message: 'Claim record failed schema validation' },
    });
  });

  it('reports a malformed confidence map as a schema error', () => {
    const [result] = runBatch(engine, [{ claim: medicalClaim(), confidence: { patientId: 'high' } }]);
    expect(result).toMatchObject({
      status: 'failure',
      error: { kind: 'SCHEMA_ERROR', message: 'Field confidence map is malformed' },
    });
  });

  it('reports other item failures as processing errors', () => {
    const failing = new DecisionEngine(
      {},
      {
        fusion: () => {
          throw new Error('fusion unavailable');
        },
      },
    );
    const [result] = runBatch(failing, [submission(medicalClaim())]);
    expect(result).toMatchObject({
      status: 'failure',
      error: { kind: 'PROCESSING_ERROR', message: 'fusion unavailable', details: [] },
    });
  });

  it('stops on a configuration error', () => {
    const broken = new DecisionEngine({}, { fusion: () => Number.NaN });
    expect(() => runBatch(broken, [submission(medicalClaim())])).toThrow(ConfigurationError);
  });

  it('stamps every decision with the batch timestamp', () => {
    const at = new Date('2026-10-19T15:30:00.000Z');
    const results = runBatch(engine, [submission(medicalClaim()), submission(dentalClaim())], { at });
    for (const result of results) {
      expect(result.status === 'success' && result.assessment.decision.timestamp).toBe('2026-10-19T15:30:00.000Z');
    }
  });

  it('returns an empty result for an empty batch', () => {
    const logger = createLogger();
    expect(runBatch(engine, [], { logger })).toEqual([]);
    expect(logger.info).toHaveBeenCalledWith(
      { total: 0, approved: 0, rejected: 0, manualReview: 0, failed: 0 },
      'Batch processed',
    );
  });
});

describe('summarizeBatch', () => {
  it('counts verdicts and failures', () => {
    const engine = new DecisionEngine({}, { clock: () => FIXED_NOW });
    const results = runBatch(engine, [
      submission(medicalClaim()),
      submission(medicalClaim({ billedAmount: 5000 })),
      submission(medicalClaim({ billedAmount: -1 })),
      submission(dentalClaim(), 0.3),
      { claim: null },
    ]);

    expect(summarizeBatch(results)).toEqual({ total: 5, approved: 1, rejected: 1, manualReview: 2, failed: 1 });
  });
});
