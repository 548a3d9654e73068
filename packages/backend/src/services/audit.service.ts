/**
 * Audit Log Service
 *
 * Writes structured audit events to the audit_log table. Every recorded,
 * corrected or batch-processed decision is logged here.
 *
 * audit_log columns: id, claim_id, event_type, actor_type, actor_id, detail_json, created_at
 */
import { randomUUID } from 'crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { Decision } from '@claimsentry/shared';
import type { BatchSummary } from '@claimsentry/engine';
import { db } from '../db/connection.js';

export type ActorType = 'SYSTEM' | 'USER' | 'ENGINE';

export type AuditEventType = 'DECISION_RECORDED' | 'DECISION_CORRECTED' | 'BATCH_PROCESSED';

export interface AuditEventInput {
  claimId?: string;
  eventType: AuditEventType;
  actorType: ActorType;
  actorId?: string;
  detail: Record<string, unknown>;
}

export type AuditLogger = Pick<FastifyBaseLogger, 'warn'>;

const ENGINE_ACTOR = 'decision-engine';

export async function logAuditEvent(event: AuditEventInput, log: AuditLogger): Promise<void> {
  try {
    await db('audit_log').insert({
      id: randomUUID(),
      claim_id: event.claimId ?? null,
      event_type: event.eventType,
      actor_type: event.actorType,
      actor_id: event.actorId ?? null,
      detail_json: JSON.stringify(event.detail),
      created_at: new Date(),
    });
  } catch (err) {
    // Best-effort: a failed audit write must not fail the decision.
    log.warn({ err, eventType: event.eventType }, 'Audit log write failed');
  }
}

// Convenience wrappers for common events

export async function logDecisionRecorded(decision: Decision, log: AuditLogger): Promise<void> {
  return logAuditEvent({
    claimId: decision.claimId,
    eventType: 'DECISION_RECORDED',
    actorType: 'ENGINE',
    actorId: ENGINE_ACTOR,
    detail: {
      decisionId: decision.decisionId,
      verdict: decision.verdict,
      precedenceRule: decision.precedenceRule,
    },
  }, log);
}

export async function logDecisionCorrected(
  decision: Decision,
  correctedBy: string,
  log: AuditLogger,
): Promise<void> {
  return logAuditEvent({
    claimId: decision.claimId,
    eventType: 'DECISION_CORRECTED',
    actorType: 'USER',
    actorId: correctedBy,
    detail: {
      decisionId: decision.decisionId,
      supersedesDecisionId: decision.supersedesDecisionId,
      verdict: decision.verdict,
    },
  }, log);
}

export async function logBatchProcessed(summary: BatchSummary, log: AuditLogger): Promise<void> {
  return logAuditEvent({
    eventType: 'BATCH_PROCESSED',
    actorType: 'SYSTEM',
    actorId: ENGINE_ACTOR,
    detail: { ...summary },
  }, log);
}
