/**
 * Transaction Service
 *
 * User-scoped transaction reads: the snapshot used for resolution, filtered
 * search, and single-transaction details.
 *
 * A user only ever sees their own transactions. Looking up another user's
 * transaction id behaves exactly like looking up one that does not exist.
 */

import { getDatabase, TransactionRepository } from '../database';
import { getTransactionsWithCache } from '../redis';
import { resilienceGateway, PROVIDERS } from '../resilience';
import { matchingConfig } from '../config';
import { amountBand } from '../matching/amountProximity';
import { daysBetween, formatCalendarDate } from '../matching/dateProximity';
import type { MerchantResolver } from '../matching/merchantResolver';
import type { Merchant, Transaction, TransactionStatus } from '../matching/types';
import { AppError } from '../utils';
import { getMerchantResolver } from './merchant.service';

// ============================================
// Types
// ============================================

export interface TransactionSummary {
  id: string;
  amount: number;
  currency: string;
  formattedAmount: string;
  date: string;
  merchantId: string;
  merchantName: string;
  description: string;
  category: string | null;
  status: TransactionStatus;
}

export interface TransactionSearchFilters {
  amount?: number;
  date?: Date;
  merchantName?: string;
  category?: string;
  status?: TransactionStatus;
  limit: number;
}

export interface TransactionSearchResult {
  transactions: TransactionSummary[];
  count: number;
  totalShown: number;
  message: string;
}

export interface TransactionDetails {
  transaction: TransactionSummary;
  merchant: Merchant | null;
}

const repository = (): TransactionRepository => new TransactionRepository(getDatabase());

// ============================================
// Formatting
// ============================================

export const formatAmount = (currency: string, amount: number): string =>
  `${currency} ${amount.toFixed(2)}`;

export function summarizeTransaction(
  transaction: Transaction,
  merchants: MerchantResolver
): TransactionSummary {
  return {
    id: transaction.id,
    amount: transaction.amount,
    currency: transaction.currency,
    formattedAmount: formatAmount(transaction.currency, transaction.amount),
    date: formatCalendarDate(transaction.date),
    merchantId: transaction.merchantId,
    merchantName: merchants.getById(transaction.merchantId)?.canonicalName ?? transaction.merchantId,
    description: transaction.description,
    category: transaction.category,
    status: transaction.status,
  };
}

// ============================================
// Snapshot
// ============================================

/**
 * All of a user's transactions, newest first
 */
export function getUserSnapshot(userId: string, signal?: AbortSignal): Promise<Transaction[]> {
  return resilienceGateway.execute(
    PROVIDERS.STORAGE,
    () => getTransactionsWithCache(userId, () => repository().findByUser(userId)),
    { signal }
  );
}

// ============================================
// Search
// ============================================

function buildSearchMessage(total: number, limit: number): string {
  if (total === 0) return 'No matching transactions found.';
  if (total === 1) return 'Found 1 matching transaction.';
  if (total > limit) return `Found ${total} matching transactions. Showing top ${limit}.`;
  return `Found ${total} matching transactions.`;
}

/**
 * Filters a user's transactions.
 *
 * - amount: within the configured tolerance band
 * - date: within the configured tolerance in days
 * - merchantName: any merchant found by name or alias search
 * - category, status: exact (category is case-insensitive)
 */
export async function searchTransactions(
  userId: string,
  filters: TransactionSearchFilters
): Promise<TransactionSearchResult> {
  const [snapshot, merchants] = await Promise.all([getUserSnapshot(userId), getMerchantResolver()]);

  let merchantIds: Set<string> | null = null;
  if (filters.merchantName !== undefined) {
    const matched = merchants.search(filters.merchantName);
    if (matched.length === 0) {
      return {
        transactions: [],
        count: 0,
        totalShown: 0,
        message: `No merchant found matching '${filters.merchantName}'.`,
      };
    }
    merchantIds = new Set(matched.map((merchant) => merchant.id));
  }

  const category = filters.category?.toLowerCase();

  const matches = snapshot.filter((transaction) => {
    if (
      filters.amount !== undefined &&
      Math.abs(transaction.amount - filters.amount) >
        amountBand(filters.amount, matchingConfig.amountTolerancePercent)
    ) {
      return false;
    }
    if (
      filters.date !== undefined &&
      daysBetween(filters.date, transaction.date) > matchingConfig.dateToleranceDays
    ) {
      return false;
    }
    if (merchantIds && !merchantIds.has(transaction.merchantId)) {
      return false;
    }
    if (category !== undefined && transaction.category?.toLowerCase() !== category) {
      return false;
    }
    if (filters.status !== undefined && transaction.status !== filters.status) {
      return false;
    }
    return true;
  });

  const shown = matches
    .slice(0, filters.limit)
    .map((transaction) => summarizeTransaction(transaction, merchants));

  return {
    transactions: shown,
    count: matches.length,
    totalShown: shown.length,
    message: buildSearchMessage(matches.length, filters.limit),
  };
}

// ============================================
// Details
// ============================================

/**
 * @throws AppError 404 when the transaction is not one of the user's
 */
export async function getTransactionDetails(
  userId: string,
  transactionId: string
): Promise<TransactionDetails> {
  const [snapshot, merchants] = await Promise.all([getUserSnapshot(userId), getMerchantResolver()]);
  const transaction = snapshot.find((txn) => txn.id === transactionId);

  if (!transaction) {
    throw AppError.notFound(`Transaction ${transactionId} not found for this user`);
  }

  return {
    transaction: summarizeTransaction(transaction, merchants),
    merchant: merchants.getById(transaction.merchantId) ?? null,
  };
}

export const transactionService = {
  getUserSnapshot,
  searchTransactions,
  getTransactionDetails,
  summarizeTransaction,
};

export default transactionService;
