import type { FastifyInstance } from 'fastify';
import type { LapsedCustomerService } from '../services/lapsedCustomerService.js';

export interface SegmentRoutesDeps {
  lapsedCustomerService: LapsedCustomerService;
}

interface HighValueLapsedQuery {
  referenceDate?: string;
  recencyMonths?: number;
  recencyDays?: number;
}

const highValueLapsedSchema = {
  querystring: {
    type: 'object' as const,
    additionalProperties: false,
    properties: {
      referenceDate: { type: 'string' as const, minLength: 10, maxLength: 30 },
      recencyMonths: { type: 'integer' as const, minimum: 0, maximum: 120 },
      recencyDays: { type: 'integer' as const, minimum: 0, maximum: 3650 },
    },
  },
};

export async function segmentRoutes(fastify: FastifyInstance, deps: SegmentRoutesDeps) {
  const { lapsedCustomerService } = deps;

  // GET /api/segments/high-value-lapsed — top-decile customers with no recent completed order
  fastify.get<{ Querystring: HighValueLapsedQuery }>(
    '/api/segments/high-value-lapsed',
    { schema: highValueLapsedSchema },
    async (request, reply) => {
      const { referenceDate, recencyMonths, recencyDays } = request.query;

      const report = await lapsedCustomerService.generateReport({
        referenceDate,
        recencyMonths,
        recencyDays,
      });

      return reply.status(200).send({
        success: true,
        data: report,
      });
    },
  );
}
