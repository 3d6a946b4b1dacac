/**
 * Snapshot Cache Module
 *
 * READ-THROUGH caching for the two snapshots every resolution turn reads:
 * a user's transactions and the merchant catalog.
 *
 * - Cache misses and Redis failures fall back to the database
 * - Cached payloads are validated on read; anything malformed is a miss
 *
 * KEY FORMAT:
 * - snapshot:transactions:{userId}
 * - snapshot:merchants
 * TTL: SNAPSHOT_CACHE_TTL_SECONDS
 */

import { z } from 'zod';
import { env } from '../config';
import { logger } from '../utils';
import { safeRedisOperation, safeRedisWrite } from './client';
import type { Merchant, Transaction } from '../matching/types';

// ============================================
// Configuration
// ============================================

const TRANSACTIONS_KEY_PREFIX = 'snapshot:transactions:';
const MERCHANTS_KEY = 'snapshot:merchants';

export const getTransactionsCacheKey = (userId: string): string =>
  `${TRANSACTIONS_KEY_PREFIX}${userId}`;

// ============================================
// Cache Data Structure
// ============================================

const cachedTransactionSchema = z.object({
  id: z.string(),
  userId: z.string(),
  amount: z.number(),
  currency: z.string(),
  date: z
    .string()
    .datetime()
    .transform((value) => new Date(value)),
  merchantId: z.string(),
  status: z.enum(['pending', 'posted', 'refunded']),
  description: z.string(),
  category: z.string().nullable(),
});

const cachedMerchantSchema = z.object({
  id: z.string(),
  canonicalName: z.string(),
  aliases: z.array(z.string()),
  category: z.string(),
  description: z.string().nullable(),
  website: z.string().nullable(),
});

/**
 * Parses a cached payload. Invalid JSON or shape is treated as a miss.
 */
function parseCached<T>(raw: string | null, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  if (!raw) {
    return null;
  }

  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data;
    }
    logger.debug('Snapshot cache entry failed validation, treating as miss');
    return null;
  } catch {
    return null;
  }
}

// ============================================
// Read-Through Helpers
// ============================================

async function readThrough<T>(
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fetchFromDb: () => Promise<T>
): Promise<T> {
  const cached = await safeRedisOperation(
    async (client) => parseCached(await client.get(key), schema),
    null,
    `Snapshot cache GET (${key})`
  );

  if (cached !== null) {
    return cached;
  }

  const fresh = await fetchFromDb();

  // Caching shouldn't slow down the response
  void safeRedisWrite(async (client) => {
    await client.setex(key, env.SNAPSHOT_CACHE_TTL_SECONDS, JSON.stringify(fresh));
  }, `Snapshot cache SET (${key})`);

  return fresh;
}

/**
 * Gets a user's transactions with read-through caching
 */
export function getTransactionsWithCache(
  userId: string,
  fetchFromDb: () => Promise<Transaction[]>
): Promise<Transaction[]> {
  return readThrough(getTransactionsCacheKey(userId), z.array(cachedTransactionSchema), fetchFromDb);
}

/**
 * Gets the merchant catalog with read-through caching
 */
export function getMerchantsWithCache(fetchFromDb: () => Promise<Merchant[]>): Promise<Merchant[]> {
  return readThrough(MERCHANTS_KEY, z.array(cachedMerchantSchema), fetchFromDb);
}

export default {
  getTransactionsWithCache,
  getMerchantsWithCache,
};
