/**
 * HTTP server entrypoint for the userhub service.
 *
 * This file:
 * - Builds runtime dependencies (config, MongoDB, token service)
 * - Creates the Express app
 * - Starts listening on the configured port
 * - Shuts down gracefully on SIGTERM / SIGINT
 */
import { createServer } from 'http';
import { createApp } from './app';
import { buildRuntimeDeps } from './bootstrap/buildDeps';
import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';

async function main(): Promise<void> {
  const deps = await buildRuntimeDeps();
  const app = createApp(deps);
  const server = createServer(app);

  server.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        env: config.env,
        buildVersion: config.buildVersion,
      },
      'userhub service started',
    );
  });

  const shutdown = (signal: string): void => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      logger.info('HTTP server closed');
      deps
        .shutdown()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Error while releasing resources');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'userhub service failed to start');
  process.exit(1);
});
