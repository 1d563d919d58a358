import { config } from './config/env.js';
import { buildServer } from './app.js';
import { createGracefulShutdown } from './services/graceful-shutdown.service.js';
import { logger } from './services/logger.service.js';

// Start server
const start = async () => {
  const fastify = await buildServer();

  const shutdown = createGracefulShutdown({
    timeout: config.shutdownTimeoutMs,
    onShutdown: async () => {
      await fastify.close();
    },
  });
  shutdown.registerHandlers();

  await fastify.listen({ port: config.port, host: config.host });
  logger.info(`Scaler API listening on ${config.host}:${config.port}`, { event: 'server.started' });
};

start().catch((error: unknown) => {
  logger.error('Failed to start scaler API', { error });
  process.exit(1);
});
