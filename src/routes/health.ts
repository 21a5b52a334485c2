import type { FastifyInstance } from 'fastify';
import type { Knex } from 'knex';

interface HealthDeps {
  db: Knex;
  startTime: number;
}

export async function healthRoutes(fastify: FastifyInstance, deps: HealthDeps) {
  fastify.get('/health', async (_request, reply) => {
    let dbStatus = 'disconnected';

    try {
      await deps.db.raw('SELECT 1');
      dbStatus = 'connected';
    } catch {
      dbStatus = 'disconnected';
    }

    const isHealthy = dbStatus === 'connected';
    const statusCode = isHealthy ? 200 : 503;

    return reply.status(statusCode).send({
      status: isHealthy ? 'ok' : 'degraded',
      version: '1.0.0',
      uptime: Math.floor((Date.now() - deps.startTime) / 1000),
      db: dbStatus,
    });
  });
}
