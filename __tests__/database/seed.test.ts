import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ZodError } from 'zod';
import { getDatabase, loadSeedFile, seedDatabase, type SeedData } from '../../src/database';

describe('Seed', () => {
  describe('loadSeedFile', () => {
    it('should load and validate the demo data', () => {
      const data = loadSeedFile();

      expect(data.merchants).toHaveLength(10);
      expect(data.transactions).toHaveLength(20);
      expect(data.transactions[0]).toMatchObject({
        id: 'txn_1001',
        amount: 48.5,
        date: new Date(Date.UTC(2024, 10, 2)),
      });
    });

    it('should reject a file with an invalid date', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'seed-'));
      const file = path.join(dir, 'seed.json');
      fs.writeFileSync(
        file,
        JSON.stringify({
          merchants: [],
          transactions: [
            {
              id: 'txn_bad',
              userId: 'user_x',
              amount: 1,
              date: '2024-02-30',
              merchantId: 'merch_x',
              status: 'posted',
            },
          ],
        })
      );

      try {
        expect(() => loadSeedFile(file)).toThrow(ZodError);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });

  describe('seedDatabase', () => {
    const data: SeedData = {
      merchants: [
        {
          id: 'merch_only',
          canonicalName: 'Only Merchant',
          aliases: ['ONLY MERCH'],
          category: 'retail',
          description: null,
          website: null,
        },
      ],
      transactions: [
        {
          id: 'txn_only',
          userId: 'user_only',
          amount: 9.99,
          currency: 'USD',
          date: new Date(Date.UTC(2024, 0, 15)),
          merchantId: 'merch_only',
          status: 'posted',
          description: '',
          category: null,
        },
      ],
    };

    it('should insert into an empty database', async () => {
      await expect(seedDatabase(getDatabase(), data)).resolves.toBe(1);
    });

    it('should skip once merchants exist', async () => {
      await expect(seedDatabase(getDatabase(), data)).resolves.toBe(0);
    });
  });
});
