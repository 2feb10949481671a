import type { FastifyPluginAsync } from 'fastify';
import type { Services } from '../container';

export const healthRoutes: FastifyPluginAsync<{ services: Services }> = async (fastify, { services }) => {
  fastify.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'pagecite-api',
      version: '0.1.0',
    };
  });

  fastify.get('/ready', async (request, reply) => {
    const entries = await Promise.all(
      Object.entries(services.healthChecks).map(async ([name, check]) => {
        const healthy = await check();
        return [name, healthy ? 'ok' : 'error'] as const;
      })
    );
    const checks = Object.fromEntries(entries);
    const ready = entries.every(([, status]) => status === 'ok');

    if (!ready) {
      request.log.warn({ checks }, 'Readiness check failed');
    }

    return reply.code(ready ? 200 : 503).send({
      status: ready ? 'ready' : 'unavailable',
      checks,
    });
  });
};
