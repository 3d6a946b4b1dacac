/**
 * Seeds an empty database with the demo catalog in data/seed.json
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import logger from '../utils/logger';
import { parseCalendarDate } from '../matching/dateProximity';
import { MerchantRepository, TransactionRepository } from './repositories';
import type { AppDatabase } from './client';

export const DEFAULT_SEED_PATH = path.resolve(__dirname, '../../data/seed.json');

const calendarDate = z.string().transform((value, ctx) => {
  const date = parseCalendarDate(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
    return z.NEVER;
  }
  return date;
});

export const seedSchema = z.object({
  merchants: z.array(
    z.object({
      id: z.string().min(1),
      canonicalName: z.string().min(1),
      aliases: z.array(z.string().min(1)).default([]),
      category: z.string().min(1),
      description: z.string().nullable().default(null),
      website: z.string().nullable().default(null),
    })
  ),
  transactions: z.array(
    z.object({
      id: z.string().min(1),
      userId: z.string().min(1),
      amount: z.number().nonnegative(),
      currency: z.string().length(3).default('USD'),
      date: calendarDate,
      merchantId: z.string().min(1),
      status: z.enum(['pending', 'posted', 'refunded']),
      description: z.string().default(''),
      category: z.string().nullable().default(null),
    })
  ),
});

export type SeedData = z.infer<typeof seedSchema>;

export function loadSeedFile(filePath: string = DEFAULT_SEED_PATH): SeedData {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  return seedSchema.parse(raw);
}

/**
 * Inserts merchants and transactions. Skips when merchants already exist.
 *
 * @returns Number of transactions inserted
 */
export async function seedDatabase(db: AppDatabase, data: SeedData): Promise<number> {
  const merchants = new MerchantRepository(db);
  const transactions = new TransactionRepository(db);

  if ((await merchants.count()) > 0) {
    logger.debug('Database already seeded, skipping');
    return 0;
  }

  for (const merchant of data.merchants) {
    await merchants.insert(merchant);
  }
  for (const transaction of data.transactions) {
    await transactions.insert(transaction);
  }

  logger.info(
    `🌱 Seeded ${data.merchants.length} merchants and ${data.transactions.length} transactions`
  );
  return data.transactions.length;
}
