/**
 * Hosting Service - Main Entry Point
 * Serves published credit scoring models over HTTP
 */

import { ConfigService } from '@creditops/config';
import { Logger } from '@creditops/utils';
import { buildServer } from './app';

async function main() {
  const logger = new Logger('hosting');
  const config = await new ConfigService(logger.child('config')).load();
  logger.setLevel(config.core.logLevel);

  const fastify = await buildServer({
    config,
    serviceLogger: logger,
    logger: {
      level: config.core.logLevel,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    },
  });

  // Start server
  try {
    await fastify.listen({ port: config.server.port, host: config.server.host });
    fastify.log.info(`Hosting service running on ${config.server.host}:${config.server.port}`);
    fastify.log.info(`Immutable versions: ${config.registry.immutableVersions}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }

  // Graceful shutdown
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach((signal) => {
    process.once(signal, () => {
      fastify.log.info(`Received ${signal}, shutting down gracefully...`);
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          fastify.log.error(err);
          process.exit(1);
        }
      );
    });
  });
}

// Start the server
main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
