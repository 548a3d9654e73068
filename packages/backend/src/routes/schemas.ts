import { VERDICTS } from '@claimsentry/shared';

/** JSON schemas shared by the claim and decision routes (OpenAPI + response serialization). */

export const errorSchema = {
  type: 'object' as const,
  properties: {
    error: { type: 'string' },
    details: { type: 'array', items: { type: 'string' } },
  },
};

export const decisionObjectSchema = {
  type: 'object' as const,
  additionalProperties: true,
  properties: {
    decisionId: { type: 'string' },
    claimId: { type: 'string' },
    verdict: { type: 'string', enum: [...VERDICTS] },
    precedenceRule: { type: 'string' },
    overallConfidence: { type: 'number' },
    rationale: { type: 'array', items: { type: 'string' } },
    timestamp: { type: 'string' },
    supersedesDecisionId: { type: 'string' },
  },
};

export const assessmentObjectSchema = {
  type: 'object' as const,
  additionalProperties: true,
  properties: {
    decision: decisionObjectSchema,
    validation: { type: 'object', additionalProperties: true },
    ruleOutcomes: { type: 'array', items: { type: 'object', additionalProperties: true } },
  },
};

export const submissionSchema = {
  type: 'object' as const,
  required: ['claim'],
  properties: {
    claim: { description: 'Extractor claim record' },
    confidence: { description: 'Per-field extraction confidence in [0, 1]' },
  },
};
