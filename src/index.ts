import { createApp } from './app';
import { env, matchingConfig, resilienceConfig } from './config';
import { logger, Logging } from './utils';
import {
  connectDatabase,
  disconnectDatabase,
  getDatabase,
  loadSeedFile,
  seedDatabase,
} from './database';
import { disconnectRedis, getRedisClient } from './redis';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    // Connect to database (runs migrations)
    await connectDatabase();

    if (env.SEED_DATABASE) {
      await seedDatabase(getDatabase(), loadSeedFile());
    }

    // Trigger Redis connection (for early logging and availability check)
    getRedisClient();

    const app = createApp();

    const server = app.listen(env.PORT, () => {
      Logging.box('🚀 DISPUTE RESOLUTION BACKEND', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
      Logging.info(
        `Matching: ±${matchingConfig.amountTolerancePercent}% amount, ±${matchingConfig.dateToleranceDays} days, ` +
          `threshold ${matchingConfig.acceptanceThreshold}, top ${matchingConfig.maxCandidates}`
      );
      Logging.info(
        `Outbound: ${resilienceConfig.rateLimit.capacity} calls/min, breaker at ` +
          `${resilienceConfig.circuit.failureThreshold} failures, ${resilienceConfig.retry.maxAttempts} attempts`
      );
    });

    // Graceful shutdown handlers
    const gracefulShutdown = (signal: string): void => {
      logger.info(`\n${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        // Disconnect from Redis (optional - gracefully handle if unavailable)
        disconnectRedis()
          .then(() => disconnectDatabase())
          .then(() => {
            logger.info('Server closed successfully');
            process.exit(0);
          })
          .catch((closeError: unknown) => {
            logger.error('Error while closing connections:', closeError);
            process.exit(1);
          });
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    // Handle termination signals
    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    // Handle uncaught exceptions
    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    // Handle unhandled promise rejections
    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start server
void startServer();
