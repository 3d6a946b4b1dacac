/**
 * Tests for the snapshot cache, against an in-memory stand-in for Redis
 */

import {
  getMerchantsWithCache,
  getTransactionsCacheKey,
  getTransactionsWithCache,
} from '../../src/redis/snapshotCache';
import { merchants, transactions } from '../helpers/fixtures';

const mockStore = new Map<string, string>();
const mockClient = {
  get: jest.fn(async (key: string) => mockStore.get(key) ?? null),
  setex: jest.fn(async (key: string, _ttl: number, value: string) => {
    mockStore.set(key, value);
    return 'OK';
  }),
};

jest.mock('../../src/redis/client', () => ({
  safeRedisOperation: async (
    operation: (client: typeof mockClient) => Promise<unknown>,
    fallback: unknown
  ): Promise<unknown> => {
    try {
      return await operation(mockClient);
    } catch {
      return fallback;
    }
  },
  safeRedisWrite: async (operation: (client: typeof mockClient) => Promise<unknown>): Promise<void> => {
    await operation(mockClient);
  },
}));

describe('Snapshot Cache', () => {
  const userTransactions = transactions.filter((transaction) => transaction.userId === 'user_a');

  beforeEach(() => {
    mockStore.clear();
    jest.clearAllMocks();
  });

  describe('getTransactionsCacheKey', () => {
    it('should namespace keys by user', () => {
      expect(getTransactionsCacheKey('user_a')).toBe('snapshot:transactions:user_a');
    });
  });

  describe('getTransactionsWithCache', () => {
    it('should read from the database on a miss and populate the cache', async () => {
      const fetchFromDb = jest.fn().mockResolvedValue(userTransactions);

      const result = await getTransactionsWithCache('user_a', fetchFromDb);

      expect(result).toBe(userTransactions);
      expect(fetchFromDb).toHaveBeenCalledTimes(1);
      expect(mockClient.setex).toHaveBeenCalledWith(
        'snapshot:transactions:user_a',
        expect.any(Number),
        JSON.stringify(userTransactions)
      );
    });

    it('should serve a hit without touching the database', async () => {
      await getTransactionsWithCache('user_a', () => Promise.resolve(userTransactions));
      const fetchFromDb = jest.fn().mockResolvedValue([]);

      const result = await getTransactionsWithCache('user_a', fetchFromDb);

      expect(fetchFromDb).not.toHaveBeenCalled();
      expect(result).toEqual(userTransactions);
      expect(result[0].date).toBeInstanceOf(Date);
    });

    it('should treat a malformed entry as a miss', async () => {
      mockStore.set('snapshot:transactions:user_a', JSON.stringify([{ id: 't1' }]));
      const fetchFromDb = jest.fn().mockResolvedValue(userTransactions);

      await expect(getTransactionsWithCache('user_a', fetchFromDb)).resolves.toBe(userTransactions);
      expect(fetchFromDb).toHaveBeenCalledTimes(1);
    });

    it('should treat invalid JSON as a miss', async () => {
      mockStore.set('snapshot:transactions:user_a', '{not json');
      const fetchFromDb = jest.fn().mockResolvedValue([]);

      await expect(getTransactionsWithCache('user_a', fetchFromDb)).resolves.toEqual([]);
      expect(fetchFromDb).toHaveBeenCalledTimes(1);
    });

    it('should fall back to the database when a read fails', async () => {
      mockClient.get.mockRejectedValueOnce(new Error('connection lost'));
      const fetchFromDb = jest.fn().mockResolvedValue(userTransactions);

      await expect(getTransactionsWithCache('user_a', fetchFromDb)).resolves.toBe(userTransactions);
    });

    it('should keep users apart', async () => {
      await getTransactionsWithCache('user_a', () => Promise.resolve(userTransactions));
      const fetchFromDb = jest.fn().mockResolvedValue([]);

      await expect(getTransactionsWithCache('user_b', fetchFromDb)).resolves.toEqual([]);
      expect(fetchFromDb).toHaveBeenCalledTimes(1);
    });
  });

  describe('getMerchantsWithCache', () => {
    it('should cache the catalog under one key', async () => {
      await getMerchantsWithCache(() => Promise.resolve(merchants));
      const fetchFromDb = jest.fn().mockResolvedValue([]);

      await expect(getMerchantsWithCache(fetchFromDb)).resolves.toEqual(merchants);
      expect(fetchFromDb).not.toHaveBeenCalled();
      expect([...mockStore.keys()]).toEqual(['snapshot:merchants']);
    });
  });
});
