import 'dotenv/config';
import { buildApp } from './app';
import { loadConfig } from './config';
import { createServices } from './container';
import type { Services } from './container';
import { createLogger } from './utils/logger';

async function start() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  let services: Services;
  try {
    services = await createServices(config, logger);
  } catch (err) {
    logger.error({ err }, 'Failed to initialize services');
    process.exit(1);
  }

  const fastify = await buildApp(services, config);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`);
    try {
      await fastify.close();
      await services.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await fastify.listen({
      port: config.port,
      host: config.host,
    });

    logger.info(`API server running at http://${config.host}:${config.port}`);
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    await services.close();
    process.exit(1);
  }
}

start().catch((err: unknown) => {
  // Config errors land here, before a logger exists.
  console.error(err);
  process.exit(1);
});
