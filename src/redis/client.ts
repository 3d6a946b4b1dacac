/**
 * Redis Client Module
 *
 * Provides a singleton Redis client with GRACEFUL DEGRADATION.
 *
 * - Redis is an optional cache in front of SQLite
 * - The client is not created at all when REDIS_HOST is unset
 * - Redis errors are logged, never thrown
 *
 * SQLite remains the source of truth.
 */

import Redis from 'ioredis';
import { env } from '../config';
import { logger } from '../utils';

// ============================================
// Configuration
// ============================================

/**
 * Connection options, or null when Redis is not configured
 */
function getRedisConfig() {
  if (!env.REDIS_HOST) {
    return null;
  }

  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    // Limit retries to avoid blocking
    maxRetriesPerRequest: 1,
    // Give up reconnecting after 3 attempts: 100ms, 200ms, 300ms
    retryStrategy: (times: number): number | null => (times > 3 ? null : Math.min(times * 100, 400)),
    lazyConnect: true,
  };
}

// ============================================
// Client State
// ============================================

let redisClient: Redis | null = null;
let isConnected = false;
let connectionAttempted = false;

// ============================================
// Client Initialization
// ============================================

function createRedisClient(): Redis | null {
  const config = getRedisConfig();

  if (!config) {
    logger.info('Redis not configured, snapshot cache disabled');
    return null;
  }

  try {
    const client = new Redis(config);

    client.on('ready', () => {
      isConnected = true;
      logger.info('📦 Redis connected successfully');
    });

    client.on('error', (error: Error) => {
      logger.warn(`Redis error (non-fatal): ${error.message}`);
      isConnected = false;
    });

    client.on('close', () => {
      isConnected = false;
      logger.debug('Redis connection closed');
    });

    client.on('end', () => {
      isConnected = false;
      logger.debug('Redis connection ended');
    });

    return client;
  } catch (error) {
    logger.warn(
      `Failed to create Redis client (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return null;
  }
}

/**
 * Gets the Redis client, creating it if necessary
 *
 * @returns Redis client or null if unavailable
 */
export function getRedisClient(): Redis | null {
  if (!connectionAttempted) {
    connectionAttempted = true;
    redisClient = createRedisClient();

    if (redisClient) {
      redisClient.connect().catch((error: unknown) => {
        logger.warn(
          `Redis initial connection failed (non-fatal): ${error instanceof Error ? error.message : String(error)}`
        );
        isConnected = false;
      });
    }
  }

  return redisClient;
}

/**
 * Checks if Redis is currently connected and available
 */
export function isRedisAvailable(): boolean {
  return isConnected && redisClient !== null;
}

/**
 * Safely disconnects from Redis. Call this during application shutdown.
 */
export async function disconnectRedis(): Promise<void> {
  if (redisClient) {
    try {
      await redisClient.quit();
      logger.info('Redis disconnected');
    } catch (error) {
      logger.warn(
        `Redis disconnect error (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    } finally {
      redisClient = null;
      isConnected = false;
      connectionAttempted = false;
    }
  }
}

// ============================================
// Safe Redis Operations
// ============================================

/**
 * Runs a Redis operation, returning the fallback when Redis is unavailable
 * or the operation fails
 */
export async function safeRedisOperation<T>(
  operation: (client: Redis) => Promise<T>,
  fallback: T,
  operationName = 'Redis operation'
): Promise<T> {
  const client = getRedisClient();

  if (!client || !isConnected) {
    logger.debug(`${operationName}: Redis unavailable, using fallback`);
    return fallback;
  }

  try {
    return await operation(client);
  } catch (error) {
    logger.warn(
      `${operationName} failed (non-fatal): ${error instanceof Error ? error.message : 'Unknown error'}`
    );
    return fallback;
  }
}

/**
 * Fire-and-forget variant for cache writes
 */
export async function safeRedisWrite(
  operation: (client: Redis) => Promise<unknown>,
  operationName = 'Redis write'
): Promise<void> {
  await safeRedisOperation(
    async (client) => {
      await operation(client);
    },
    undefined,
    operationName
  );
}

export default {
  getRedisClient,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
};
