/**
 * Redis Module
 *
 * Redis is an OPTIONAL cache. The application works correctly without it
 * and SQLite remains the source of truth.
 */

// Client exports
export {
  getRedisClient,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';

// Snapshot cache exports
export {
  getTransactionsWithCache,
  getMerchantsWithCache,
  getTransactionsCacheKey,
} from './snapshotCache';
