import { z } from 'zod';
import { VERDICTS } from '../constants/claims.js';

export const DecisionSchema = z.object({
  decisionId: z.string().regex(/^[0-9a-f]{64}$/),
  claimId: z.string(),
  verdict: z.enum(VERDICTS),
  precedenceRule: z.enum([
    'VALIDATION_FAILED',
    'AMOUNT_EXCEEDS_MAXIMUM',
    'AUTO_APPROVAL',
    'MANUAL_REVIEW',
    'MANUAL_CORRECTION',
  ]),
  overallConfidence: z.number().min(0).max(1),
  rationale: z.array(z.string()),
  timestamp: z.string().datetime(),
  supersedesDecisionId: z.string().optional(),
});

export const DecisionCorrectionSchema = z.object({
  verdict: z.enum(VERDICTS),
  reason: z.string().trim().min(1),
  correctedBy: z.string().trim().min(1),
});

export type DecisionInput = z.input<typeof DecisionSchema>;
export type DecisionCorrectionInput = z.input<typeof DecisionCorrectionSchema>;
