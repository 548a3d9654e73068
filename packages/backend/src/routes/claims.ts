import type { FastifyInstance } from 'fastify';
import { runBatch, summarizeBatch, type ClaimSubmission, type DecisionEngine } from '@claimsentry/engine';
import { config } from '../config.js';
import * as DecisionService from '../services/decision.service.js';
import * as AuditService from '../services/audit.service.js';
import { assessmentObjectSchema, decisionObjectSchema, errorSchema, submissionSchema } from './schemas.js';

export interface ClaimsRoutesOptions {
  engine: DecisionEngine;
}

export default async function claimsRoutes(app: FastifyInstance, { engine }: ClaimsRoutesOptions) {
  // POST /api/claims/assess: assess and record a single claim
  app.post<{ Body: ClaimSubmission }>(
    '/api/claims/assess',
    {
      schema: {
        tags: ['Claims'],
        summary: 'Assess claim',
        description: 'Validates one extracted claim, evaluates the business rules and records the decision.',
        body: submissionSchema,
        response: {
          200: { description: 'Claim assessment', ...assessmentObjectSchema },
          422: { description: 'Claim record is structurally unusable', ...errorSchema },
        },
      },
    },
    async (request, reply) => {
      const assessment = engine.assessRecord(request.body.claim, request.body.confidence);
      const { decision } = assessment;

      await DecisionService.recordAssessment(assessment);
      await AuditService.logDecisionRecorded(decision, request.log);

      request.log.info(
        { claimId: decision.claimId, decisionId: decision.decisionId, verdict: decision.verdict },
        'Claim assessed',
      );
      return reply.send(assessment);
    },
  );

  // POST /api/claims/batch: assess many claims, isolating per-item failures
  app.post<{ Body: { items: ClaimSubmission[] } }>(
    '/api/claims/batch',
    {
      schema: {
        tags: ['Claims'],
        summary: 'Assess batch',
        description: 'Assesses every item independently; malformed items are reported, not fatal.',
        body: {
          type: 'object',
          required: ['items'],
          properties: {
            items: { type: 'array', maxItems: config.batchMaxItems, items: submissionSchema },
          },
        },
        response: {
          200: {
            description: 'One result per item, in input order',
            type: 'object',
            properties: {
              results: { type: 'array', items: { type: 'object', additionalProperties: true } },
              summary: {
                type: 'object',
                properties: {
                  total: { type: 'integer' },
                  approved: { type: 'integer' },
                  rejected: { type: 'integer' },
                  manualReview: { type: 'integer' },
                  failed: { type: 'integer' },
                },
              },
            },
          },
        },
      },
    },
    async (request, reply) => {
      const results = runBatch(engine, request.body.items, { logger: request.log });
      const summary = summarizeBatch(results);

      const assessments = results.flatMap((result) => (result.status === 'success' ? [result.assessment] : []));
      await DecisionService.recordAssessments(assessments);
      await AuditService.logBatchProcessed(summary, request.log);

      return reply.send({ results, summary });
    },
  );

  // GET /api/claims/:claimId/decisions: decision history, oldest first
  app.get<{ Params: { claimId: string } }>(
    '/api/claims/:claimId/decisions',
    {
      schema: {
        tags: ['Claims'],
        summary: 'Decision history',
        description: 'Returns every decision recorded for a claim, corrections included, oldest first.',
        params: {
          type: 'object',
          properties: {
            claimId: { type: 'string', description: 'The claim identifier' },
          },
          required: ['claimId'],
        },
        response: {
          200: { description: 'Array of decisions', type: 'array', items: decisionObjectSchema },
        },
      },
    },
    async (request, reply) => {
      const decisions = await DecisionService.listDecisions(request.params.claimId);
      return reply.send(decisions);
    },
  );
}
