/**
 * Transaction repository - read-only user snapshots
 */

import type { AppDatabase } from '../client';
import type { TransactionStatus } from '../schema';
import type { Transaction } from '../../matching/types';
import { formatCalendarDate, parseCalendarDate } from '../../matching/dateProximity';

interface TransactionRow {
  id: string;
  user_id: string;
  amount_cents: number;
  currency: string;
  transaction_date: string;
  merchant_id: string;
  status: TransactionStatus;
  description: string;
  category: string | null;
}

const COLUMNS = [
  'id',
  'user_id',
  'amount_cents',
  'currency',
  'transaction_date',
  'merchant_id',
  'status',
  'description',
  'category',
] as const;

export const toMinorUnits = (amount: number): number => Math.round(amount * 100);

const toTransaction = (row: TransactionRow): Transaction => {
  const date = parseCalendarDate(row.transaction_date);
  if (!date) {
    throw new Error(`Transaction ${row.id} has an invalid date: ${row.transaction_date}`);
  }

  return {
    id: row.id,
    userId: row.user_id,
    amount: row.amount_cents / 100,
    currency: row.currency,
    date,
    merchantId: row.merchant_id,
    status: row.status,
    description: row.description,
    category: row.category,
  };
};

export class TransactionRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * All of a user's transactions, newest first
   */
  async findByUser(userId: string): Promise<Transaction[]> {
    const rows = await this.db
      .selectFrom('transactions')
      .select(COLUMNS)
      .where('user_id', '=', userId)
      .orderBy('transaction_date', 'desc')
      .orderBy('id')
      .execute();

    return rows.map(toTransaction);
  }

  async findById(transactionId: string): Promise<Transaction | null> {
    const row = await this.db
      .selectFrom('transactions')
      .select(COLUMNS)
      .where('id', '=', transactionId)
      .executeTakeFirst();

    return row ? toTransaction(row) : null;
  }

  async insert(transaction: Transaction): Promise<void> {
    await this.db
      .insertInto('transactions')
      .values({
        id: transaction.id,
        user_id: transaction.userId,
        amount_cents: toMinorUnits(transaction.amount),
        currency: transaction.currency,
        transaction_date: formatCalendarDate(transaction.date),
        merchant_id: transaction.merchantId,
        status: transaction.status,
        description: transaction.description,
        category: transaction.category,
      })
      .execute();
  }
}

export default TransactionRepository;
