import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ZodError } from 'zod';

const { mockDb } = vi.hoisted(() => ({ mockDb: vi.fn() }));

// Mock the db module
vi.mock('../../db/connection.js', () => ({ db: mockDb }));

import {
  getDecision,
  listDecisions,
  recordAssessment,
  recordAssessments,
  recordCorrection,
  serialize,
  type DecisionRow,
} from '../../services/decision.service.js';
import { confidence, manualReviewDecision, medicalRecord, testEngine } from '../helpers/claims.js';
import { FIXED_NOW } from '../helpers/test-app.js';

function mockInsertChain() {
  const mockIgnore = vi.fn().mockResolvedValue([1]);
  const mockOnConflict = vi.fn().mockReturnValue({ ignore: mockIgnore });
  const mockInsert = vi.fn().mockReturnValue({ onConflict: mockOnConflict });
  mockDb.mockReturnValue({ insert: mockInsert });
  return { mockInsert, mockOnConflict, mockIgnore };
}

function rowFor(decision = manualReviewDecision()): DecisionRow {
  return {
    id: decision.decisionId,
    claim_id: decision.claimId,
    verdict: decision.verdict,
    precedence_rule: decision.precedenceRule,
    overall_confidence: decision.overallConfidence,
    rationale_json: [...decision.rationale],
    validation_json: null,
    rule_outcomes_json: null,
    supersedes_decision_id: null,
    decided_at: new Date(decision.timestamp),
    created_at: FIXED_NOW,
  };
}

describe('decision.service', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('recordAssessment', () => {
    it('inserts the decision with its validation and rule outcomes', async () => {
      const assessment = testEngine.assessRecord(medicalRecord(), confidence(0.95));
      const { mockInsert, mockOnConflict, mockIgnore } = mockInsertChain();

      await recordAssessment(assessment);

      expect(mockDb).toHaveBeenCalledWith('claim_decisions');
      expect(mockInsert).toHaveBeenCalledWith([
        {
          id: assessment.decision.decisionId,
          claim_id: 'CLM-1001',
          verdict: 'APPROVED',
          precedence_rule: 'AUTO_APPROVAL',
          overall_confidence: assessment.decision.overallConfidence,
          rationale_json: JSON.stringify(assessment.decision.rationale),
          validation_json: JSON.stringify(assessment.validation),
          rule_outcomes_json: JSON.stringify(assessment.ruleOutcomes),
          supersedes_decision_id: null,
          decided_at: FIXED_NOW,
        },
      ]);
      expect(mockOnConflict).toHaveBeenCalledWith('id');
      expect(mockIgnore).toHaveBeenCalled();
    });
  });

  describe('recordAssessments', () => {
    it('skips the query for an empty list', async () => {
      await recordAssessments([]);
      expect(mockDb).not.toHaveBeenCalled();
    });

    it('inserts every assessment in one statement', async () => {
      const assessments = [
        testEngine.assessRecord(medicalRecord(), confidence(0.95)),
        testEngine.assessRecord(medicalRecord({ claimId: 'CLM-1002', billedAmount: 5000 }), confidence(0.95)),
      ];
      const { mockInsert } = mockInsertChain();

      await recordAssessments(assessments);

      expect(mockInsert).toHaveBeenCalledTimes(1);
      expect(mockInsert.mock.calls[0]?.[0]).toHaveLength(2);
    });
  });

  describe('recordCorrection', () => {
    it('stores the superseded id and no validation data', async () => {
      const previous = manualReviewDecision();
      const corrected = testEngine.correct(previous, {
        verdict: 'APPROVED',
        reason: 'Invoice verified',
        correctedBy: 'reviewer-1',
      });
      const { mockInsert } = mockInsertChain();

      await recordCorrection(corrected);

      expect(mockInsert).toHaveBeenCalledWith(
        expect.objectContaining({
          id: corrected.decisionId,
          precedence_rule: 'MANUAL_CORRECTION',
          supersedes_decision_id: previous.decisionId,
          validation_json: null,
          rule_outcomes_json: null,
        }),
      );
    });
  });

  describe('getDecision', () => {
    it('returns the stored decision', async () => {
      const decision = manualReviewDecision();
      const mockFirst = vi.fn().mockResolvedValue(rowFor(decision));
      const mockWhere = vi.fn().mockReturnValue({ first: mockFirst });
      mockDb.mockReturnValue({ where: mockWhere });

      const result = await getDecision(decision.decisionId);

      expect(mockWhere).toHaveBeenCalledWith({ id: decision.decisionId });
      expect(result).toEqual(decision);
    });

    it('returns undefined for an unknown id', async () => {
      const mockFirst = vi.fn().mockResolvedValue(undefined);
      mockDb.mockReturnValue({ where: vi.fn().mockReturnValue({ first: mockFirst }) });

      expect(await getDecision('missing')).toBeUndefined();
    });
  });

  describe('listDecisions', () => {
    it('orders the history oldest first', async () => {
      const decision = manualReviewDecision();
      const mockOrderBy = vi.fn().mockResolvedValue([rowFor(decision)]);
      const mockWhere = vi.fn().mockReturnValue({ orderBy: mockOrderBy });
      mockDb.mockReturnValue({ where: mockWhere });

      const result = await listDecisions('CLM-1001');

      expect(result).toEqual([decision]);
      expect(mockWhere).toHaveBeenCalledWith({ claim_id: 'CLM-1001' });
      expect(mockOrderBy).toHaveBeenCalledWith([
        { column: 'decided_at', order: 'asc' },
        { column: 'created_at', order: 'asc' },
      ]);
    });
  });

  describe('serialize', () => {
    it('accepts JSON text and string timestamps', () => {
      const decision = manualReviewDecision();
      const row: DecisionRow = {
        ...rowFor(decision),
        overall_confidence: String(decision.overallConfidence),
        rationale_json: JSON.stringify(decision.rationale),
        decided_at: decision.timestamp,
      };
      expect(serialize(row)).toEqual(decision);
    });

    it('keeps the superseded decision id', () => {
      const row: DecisionRow = { ...rowFor(), supersedes_decision_id: 'a'.repeat(64) };
      expect(serialize(row).supersedesDecisionId).toBe('a'.repeat(64));
    });

    it('rejects a row with an unknown verdict', () => {
      expect(() => serialize({ ...rowFor(), verdict: 'MAYBE' })).toThrow(ZodError);
    });
  });
});
