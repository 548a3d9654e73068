import type { FastifyInstance } from 'fastify';
import { db } from '../db/connection.js';

export default async function healthRoutes(app: FastifyInstance) {
  // GET /api/health: check service health
  app.get(
    '/api/health',
    {
      schema: {
        tags: ['Admin'],
        summary: 'Health check',
        description: 'Returns service health status including MySQL connectivity.',
        response: {
          200: {
            description: 'Health status',
            type: 'object',
            additionalProperties: true,
            properties: {
              status: { type: 'string' },
              services: {
                type: 'object',
                additionalProperties: true,
                properties: {
                  mysql: { type: 'string', enum: ['up', 'down'] },
                },
              },
            },
          },
        },
      },
    },
    async (request, reply) => {
      const services: Record<string, 'up' | 'down'> = {
        mysql: 'down',
      };

      try {
        await db.raw('SELECT 1');
        services.mysql = 'up';
      } catch (err) {
        request.log.warn({ err }, 'MySQL health check failed');
      }

      return reply.send({ status: 'ok', services });
    },
  );
}
