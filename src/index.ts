import { createApp } from './app';
import { createContainer, drainContainer } from './container';
import { env } from './config/environment';
import { logger } from './config/logger';
import { closeConnection, testConnection } from './config/database';

/**
 * Application Entry Point
 *
 * Starts the Express server and handles graceful shutdown
 */

const SHUTDOWN_TIMEOUT_MS = 10000;

async function startServer(): Promise<void> {
  const container = createContainer();

  // Verify database connection before starting server
  if (container.storage === 'supabase' && !(await testConnection())) {
    throw new Error('Database connection failed');
  }

  await container.provisioningService.initialize();

  const app = createApp(container);

  const server = app.listen(env.PORT, () => {
    logger.info('Slot Booking API server started', {
      environment: env.NODE_ENV,
      port: env.PORT,
      storage: container.storage,
      factory: container.provisioningService.factoryAccountId,
      docs: `http://localhost:${env.PORT}/docs`,
      health: `http://localhost:${env.PORT}/health`,
    });
  });

  // Graceful shutdown: stop accepting requests, let issued provisioning resolve, then finish queued calls
  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');

      drainContainer(container)
        .then(() => {
          closeConnection();
          logger.info('Shutting down gracefully');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Failed to drain in-flight calls', { error });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
    gracefulShutdown('unhandledRejection');
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
