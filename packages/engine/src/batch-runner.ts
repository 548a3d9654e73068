import { ConfigurationError, SchemaError, type ClaimAssessment, type Verdict } from '@claimsentry/shared';
import type { DecisionEngine } from './decision-engine.js';

/** One extractor output: the raw claim record and its per-field confidence. */
export interface ClaimSubmission {
  claim: unknown;
  confidence?: unknown;
}

export type BatchFailureKind = 'SCHEMA_ERROR' | 'PROCESSING_ERROR';

export interface BatchFailure {
  kind: BatchFailureKind;
  message: string;
  details: readonly string[];
}

export type BatchItemResult =
  | { index: number; claimId: string; status: 'success'; assessment: ClaimAssessment }
  | { index: number; claimId: string; status: 'failure'; error: BatchFailure };

/** Structural subset of a pino logger (Fastify's `request.log` fits). */
export interface BatchLogger {
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
}

export interface BatchOptions {
  logger?: BatchLogger;
  /** One timestamp for every decision in the batch; defaults to the engine clock per item. */
  at?: Date;
}

export interface BatchSummary {
  total: number;
  approved: number;
  rejected: number;
  manualReview: number;
  failed: number;
}

function claimIdOf(record: unknown, index: number): string {
  if (
    typeof record === 'object' &&
    record !== null &&
    'claimId' in record &&
    typeof record.claimId === 'string' &&
    record.claimId.trim() !== ''
  ) {
    return record.claimId.trim();
  }
  return `item-${index}`;
}

function toFailure(err: unknown): BatchFailure {
  if (err instanceof SchemaError) {
    return { kind: 'SCHEMA_ERROR', message: err.message, details: err.issues };
  }
  return { kind: 'PROCESSING_ERROR', message: err instanceof Error ? err.message : String(err), details: [] };
}

/**
 * Assess every submission independently. The result has one entry per input,
 * in input order; a failing item never stops the rest.
 * @throws ConfigurationError, which means the engine itself is unusable.
 */
export function runBatch(
  engine: DecisionEngine,
  submissions: readonly ClaimSubmission[],
  options: BatchOptions = {},
): BatchItemResult[] {
  const { logger, at } = options;

  const results = submissions.map((submission, index): BatchItemResult => {
    const claimId = claimIdOf(submission.claim, index);
    try {
      const assessment = engine.assessRecord(submission.claim, submission.confidence, at);
      return { index, claimId, status: 'success', assessment };
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      const error = toFailure(err);
      logger?.warn({ claimId, index, kind: error.kind, details: error.details }, `Claim failed: ${error.message}`);
      return { index, claimId, status: 'failure', error };
    }
  });

  logger?.info({ ...summarizeBatch(results) }, 'Batch processed');
  return results;
}

const VERDICT_KEYS: Record<Verdict, 'approved' | 'rejected' | 'manualReview'> = {
  APPROVED: 'approved',
  REJECTED: 'rejected',
  MANUAL_REVIEW: 'manualReview',
};

export function summarizeBatch(results: readonly BatchItemResult[]): BatchSummary {
  const summary: BatchSummary = { total: results.length, approved: 0, rejected: 0, manualReview: 0, failed: 0 };
  for (const result of results) {
    if (result.status === 'failure') {
      summary.failed++;
    } else {
      summary[VERDICT_KEYS[result.assessment.decision.verdict]]++;
    }
  }
  return summary;
}
