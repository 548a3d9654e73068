import { randomUUID } from 'node:crypto';
import Fastify, { type FastifyInstance, type FastifyError, type FastifyRequest, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { SchemaError, parseEngineConfig } from '@claimsentry/shared';
import { DecisionEngine } from '@claimsentry/engine';

import { config } from './config.js';
import healthRoutes from './routes/health.js';
import claimsRoutes from './routes/claims.js';
import decisionsRoutes from './routes/decisions.js';

export interface AppOptions {
  /** Defaults to an engine built from the RULES_* environment. */
  engine?: DecisionEngine;
}

async function appPlugin(app: FastifyInstance, opts: AppOptions) {
  // Throws ConfigurationError for bad RULES_* values, which aborts startup.
  const engine = opts.engine ?? new DecisionEngine(parseEngineConfig(config.rules));

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: false, // API only, no HTML to protect
  });

  // CORS
  await app.register(cors, {
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  // Rate limiting (in-memory store)
  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  // OpenAPI docs
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'ClaimSentry API',
        description: 'Insurance claim validation and decision engine',
        version: '1.0.0',
      },
    },
  });
  await app.register(swaggerUi, { routePrefix: '/api/docs' });

  // Route plugins
  await app.register(healthRoutes);
  await app.register(claimsRoutes, { engine });
  await app.register(decisionsRoutes, { engine });

  // Global error handler
  app.setErrorHandler((err: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (err.validation) {
      return reply.status(400).send({ error: 'Validation error', details: err.validation });
    }
    if (err instanceof SchemaError) {
      request.log.info({ issues: err.issues }, err.message);
      return reply.status(422).send({ error: err.message, details: err.issues });
    }
    if (err.statusCode && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    app.log.error(err, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal server error' });
  });

  app.setNotFoundHandler((_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(404).send({ error: 'Not found' });
  });
}

export default appPlugin;

export async function createApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: { level: config.logLevel },
    genReqId: () => randomUUID(),
    bodyLimit: 2 * 1024 * 1024, // 2MB body limit
  });

  await app.register(appPlugin, opts);
  await app.ready();

  return app;
}
