import type { FastifyInstance } from 'fastify';
import { VERDICTS, type DecisionCorrection } from '@claimsentry/shared';
import type { DecisionEngine } from '@claimsentry/engine';
import * as DecisionService from '../services/decision.service.js';
import * as AuditService from '../services/audit.service.js';
import { decisionObjectSchema, errorSchema } from './schemas.js';

export interface DecisionsRoutesOptions {
  engine: DecisionEngine;
}

export default async function decisionsRoutes(app: FastifyInstance, { engine }: DecisionsRoutesOptions) {
  // POST /api/decisions/:decisionId/corrections: supersede a decision
  app.post<{ Params: { decisionId: string }; Body: DecisionCorrection }>(
    '/api/decisions/:decisionId/corrections',
    {
      schema: {
        tags: ['Decisions'],
        summary: 'Correct decision',
        description: 'Records a reviewer correction as a new decision that supersedes the original.',
        params: {
          type: 'object',
          properties: {
            decisionId: { type: 'string', description: 'Id of the decision being corrected' },
          },
          required: ['decisionId'],
        },
        body: {
          type: 'object',
          required: ['verdict', 'reason', 'correctedBy'],
          properties: {
            verdict: { type: 'string', enum: [...VERDICTS] },
            reason: { type: 'string', minLength: 1 },
            correctedBy: { type: 'string', minLength: 1 },
          },
        },
        response: {
          201: { description: 'Correcting decision', ...decisionObjectSchema },
          404: { description: 'Decision not found', ...errorSchema },
          422: { description: 'Correction is malformed', ...errorSchema },
        },
      },
    },
    async (request, reply) => {
      const previous = await DecisionService.getDecision(request.params.decisionId);
      if (!previous) {
        return reply.status(404).send({ error: 'Decision not found' });
      }

      const corrected = engine.correct(previous, request.body);
      await DecisionService.recordCorrection(corrected);
      await AuditService.logDecisionCorrected(corrected, request.body.correctedBy, request.log);

      request.log.info(
        { claimId: corrected.claimId, decisionId: corrected.decisionId, supersedes: previous.decisionId },
        'Decision corrected',
      );
      return reply.status(201).send(corrected);
    },
  );
}
