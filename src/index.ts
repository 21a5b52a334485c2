import Fastify from 'fastify';
import { randomUUID } from 'node:crypto';
import { config } from './config.js';
import { logger } from './utils/logger.js';
import { healthRoutes } from './routes/health.js';
import { segmentRoutes } from './routes/segments.js';
import { registerErrorHandler } from './middleware/errorHandler.js';
import { createReadonlyDb } from './db/readonlyConnection.js';
import { createRecordSource } from './db/recordSource.js';
import { createLapsedCustomerService } from './services/lapsedCustomerService.js';

const startTime = Date.now();

const fastify = Fastify({
  logger: false,
  requestIdHeader: 'x-request-id',
  genReqId: () => randomUUID(),
});

// Read-only database (segmentation never writes)
const readonlyDb = createReadonlyDb(config.database.readonlyUrl, {
  statementTimeoutMs: config.database.statementTimeoutMs,
});

// Request logging
fastify.addHook('onRequest', async (request) => {
  logger.info({ requestId: request.id, method: request.method, url: request.url }, 'Request received');
});

fastify.addHook('onResponse', async (request, reply) => {
  logger.info(
    { requestId: request.id, method: request.method, url: request.url, statusCode: reply.statusCode },
    'Request completed',
  );
});

// Error handler
registerErrorHandler(fastify);

// Services
const recordSource = createRecordSource({ readonlyDb });
const lapsedCustomerService = createLapsedCustomerService({
  recordSource,
  defaultRecencyWindow: {
    months: config.segmentation.recencyWindowMonths,
    days: config.segmentation.recencyWindowDays,
  },
});

// Routes
await fastify.register(
  async (instance) => healthRoutes(instance, { db: readonlyDb, startTime }),
);

await fastify.register(
  async (instance) => segmentRoutes(instance, { lapsedCustomerService }),
);

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down gracefully...');
  await fastify.close();
  await readonlyDb.destroy();
  logger.info('Server shut down');
  process.exit(0);
}

function handleSignal(signal: string) {
  shutdown(signal).catch((err: unknown) => {
    logger.fatal({ err }, 'Shutdown failed');
    process.exit(1);
  });
}

process.on('SIGTERM', () => handleSignal('SIGTERM'));
process.on('SIGINT', () => handleSignal('SIGINT'));

// Start
try {
  await fastify.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host }, 'Server started');
} catch (err) {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
}

export { fastify, readonlyDb };
