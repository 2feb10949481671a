import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import type { AppConfig } from './config';
import type { Services } from './container';
import { answerRoutes } from './routes/answer';
import { filterRoutes } from './routes/filters';
import { healthRoutes } from './routes/health';
import { ingestRoutes } from './routes/ingest';
import { sendError } from './routes/reply';
import { searchRoutes } from './routes/search';

/**
 * Build the HTTP app without listening, so tests can `inject` into it.
 */
export async function buildApp(services: Services, config: AppConfig): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: { level: config.logLevel },
    requestIdLogLabel: 'reqId',
    disableRequestLogging: false,
    requestIdHeader: 'x-request-id',
    bodyLimit: 32 * 1024 * 1024,
  });

  // Register plugins
  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
  });

  fastify.setErrorHandler((error, request, reply) => sendError(reply, error, request.id));

  // Register routes
  await fastify.register(healthRoutes, { prefix: '/health', services });
  await fastify.register(searchRoutes, { prefix: '/api/v1/search', services });
  await fastify.register(answerRoutes, { prefix: '/api/v1/answer', services });
  await fastify.register(ingestRoutes, { prefix: '/api/v1/ingest', services });
  await fastify.register(filterRoutes, { prefix: '/api/v1/filters', services });

  return fastify;
}
