import type { FastifyPluginAsync } from 'fastify';
import { LATENCY_BUDGETS, checkLatencyBudget } from '@pagecite/shared';
import type { Services } from '../container';
import { abortOnDisconnect } from './reply';

export const searchRoutes: FastifyPluginAsync<{ services: Services }> = async (fastify, { services }) => {
  /**
   * POST /api/v1/search
   * Hybrid passage retrieval, no generation.
   */
  fastify.post('/', async (request, reply) => {
    const startTime = Date.now();
    const requestId = request.id;
    const signal = abortOnDisconnect(reply.raw, 'search');

    const results = await services.engine.search(request.body, { signal });

    const latency = Date.now() - startTime;
    const budget = checkLatencyBudget(latency, LATENCY_BUDGETS.SEARCH, 'search');
    if (budget.exceeded) {
      request.log.warn({ requestId, violation: budget.violation }, 'Search exceeded latency budget');
    }

    request.log.info({ requestId, latency, results: results.length }, 'Search processed');

    return { requestId, results, latency };
  });
};
