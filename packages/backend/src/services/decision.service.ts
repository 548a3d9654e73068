import { DecisionSchema, type ClaimAssessment, type Decision } from '@claimsentry/shared';
import { db } from '../db/connection.js';

export interface DecisionRow {
  id: string;
  claim_id: string;
  verdict: string;
  precedence_rule: string;
  overall_confidence: number | string;
  rationale_json: unknown;
  validation_json: unknown;
  rule_outcomes_json: unknown;
  supersedes_decision_id: string | null;
  decided_at: Date | string;
  created_at: Date;
}

// mysql2 returns JSON columns parsed; other drivers hand back the raw text.
function parseJson(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

/** Convert a snake_case DB row back into a Decision, checking its shape on the way. */
export function serialize(row: DecisionRow): Decision {
  return DecisionSchema.parse({
    decisionId: row.id,
    claimId: row.claim_id,
    verdict: row.verdict,
    precedenceRule: row.precedence_rule,
    overallConfidence: Number(row.overall_confidence),
    rationale: parseJson(row.rationale_json),
    timestamp: toIso(row.decided_at),
    supersedesDecisionId: row.supersedes_decision_id ?? undefined,
  });
}

function toRow(decision: Decision, assessment?: ClaimAssessment) {
  return {
    id: decision.decisionId,
    claim_id: decision.claimId,
    verdict: decision.verdict,
    precedence_rule: decision.precedenceRule,
    overall_confidence: decision.overallConfidence,
    rationale_json: JSON.stringify(decision.rationale),
    validation_json: assessment ? JSON.stringify(assessment.validation) : null,
    rule_outcomes_json: assessment ? JSON.stringify(assessment.ruleOutcomes) : null,
    supersedes_decision_id: decision.supersedesDecisionId ?? null,
    decided_at: new Date(decision.timestamp),
  };
}

/**
 * Persist assessments. A decision id is a content hash, so re-recording an
 * identical decision is a no-op.
 */
export async function recordAssessments(assessments: readonly ClaimAssessment[]): Promise<void> {
  if (assessments.length === 0) return;
  await db('claim_decisions')
    .insert(assessments.map((assessment) => toRow(assessment.decision, assessment)))
    .onConflict('id')
    .ignore();
}

export async function recordAssessment(assessment: ClaimAssessment): Promise<void> {
  return recordAssessments([assessment]);
}

/** Persist a correction; it has no validation or rule outcomes of its own. */
export async function recordCorrection(decision: Decision): Promise<void> {
  await db('claim_decisions').insert(toRow(decision)).onConflict('id').ignore();
}

export async function getDecision(decisionId: string): Promise<Decision | undefined> {
  const row = await db('claim_decisions').where({ id: decisionId }).first();
  return row ? serialize(row) : undefined;
}

/**
 * Decision history for a claim, oldest first. Corrections appear after the
 * decision they supersede.
 */
export async function listDecisions(claimId: string): Promise<Decision[]> {
  const rows: DecisionRow[] = await db('claim_decisions')
    .where({ claim_id: claimId })
    .orderBy([
      { column: 'decided_at', order: 'asc' },
      { column: 'created_at', order: 'asc' },
    ]);
  return rows.map(serialize);
}
