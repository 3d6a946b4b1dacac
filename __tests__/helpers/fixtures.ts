/**
 * Test fixtures
 *
 * A small catalog for unit tests, plus a loader for the demo seed used by
 * the HTTP and service tests.
 */

import { getDatabase, loadSeedFile, seedDatabase } from '../../src/database';
import { parseCalendarDate } from '../../src/matching/dateProximity';
import { MerchantResolver } from '../../src/matching/merchantResolver';
import { DEFAULT_MATCHING_OPTIONS } from '../../src/matching/constants';
import type { Merchant, MatchingOptions, Transaction } from '../../src/matching/types';

export const day = (value: string): Date => {
  const date = parseCalendarDate(value);
  if (!date) {
    throw new Error(`Bad fixture date: ${value}`);
  }
  return date;
};

export const merchants: Merchant[] = [
  {
    id: 'm_coffee',
    canonicalName: 'Coffee Palace',
    aliases: ['CP*COFFEE PALACE'],
    category: 'food',
    description: null,
    website: null,
  },
  {
    id: 'm_books',
    canonicalName: 'The Book Nook',
    aliases: ['BOOKNOOK LLC'],
    category: 'retail',
    description: null,
    website: null,
  },
  {
    id: 'm_fuel',
    canonicalName: 'QuickFuel',
    aliases: [],
    category: 'fuel',
    description: null,
    website: null,
  },
];

export const makeTransaction = (overrides: Partial<Transaction> & Pick<Transaction, 'id'>): Transaction => ({
  userId: 'user_a',
  amount: 10,
  currency: 'USD',
  date: day('2024-03-10'),
  merchantId: 'm_coffee',
  status: 'posted',
  description: 'Card purchase',
  category: null,
  ...overrides,
});

/**
 * user_a: three Coffee Palace purchases, one book, one fuel
 * user_b: one Coffee Palace purchase identical to t1
 */
export const transactions: Transaction[] = [
  makeTransaction({ id: 't1', amount: 48.5, date: day('2024-03-01') }),
  makeTransaction({ id: 't2', amount: 4.75, date: day('2024-03-05') }),
  makeTransaction({ id: 't3', amount: 5.25, date: day('2024-03-09') }),
  makeTransaction({ id: 't4', amount: 32, date: day('2024-03-06'), merchantId: 'm_books' }),
  makeTransaction({ id: 't5', amount: 61.4, date: day('2024-03-07'), merchantId: 'm_fuel' }),
  makeTransaction({ id: 'u2', userId: 'user_b', amount: 48.5, date: day('2024-03-01') }),
];

export const resolver = (): MerchantResolver => new MerchantResolver(merchants);

export const options = (overrides: Partial<MatchingOptions> = {}): MatchingOptions => ({
  ...DEFAULT_MATCHING_OPTIONS,
  ...overrides,
});

/**
 * Loads data/seed.json into the test file's in-memory database
 */
export const seedDemoData = (): Promise<number> => seedDatabase(getDatabase(), loadSeedFile());
