/**
 * Transaction Ranking
 *
 * Entry point of the resolution engine. Scores every transaction in a
 * user's snapshot against a query, orders the survivors and classifies the
 * result.
 *
 * Flow:
 * 1. Direct lookup when the query names a transaction id
 * 2. Resolve the active weight table
 * 3. Score each of the user's transactions
 * 4. Drop candidates below the acceptance threshold
 * 5. Sort (score desc, date desc, id asc) and truncate
 * 6. Classify as unique / ambiguous / empty
 */

import { scoreAmount } from './amountProximity';
import { scoreDate } from './dateProximity';
import { calculateCompositeScore, resolveActiveWeights } from './compositeScore';
import { NO_WEIGHTS } from './constants';
import { scoreMerchant, type MerchantResolver } from './merchantResolver';
import type {
  MatchCandidate,
  MatchingOptions,
  MatchOutcome,
  MatchQuery,
  MatchResult,
  Transaction,
} from './types';

export interface RankRequest {
  query: MatchQuery;
  userId: string;
  transactions: readonly Transaction[];
  merchants: MerchantResolver;
  options: MatchingOptions;
}

/**
 * Deterministic candidate order: higher score, then more recent, then id
 */
export function compareCandidates(a: MatchCandidate, b: MatchCandidate): number {
  if (b.compositeScore !== a.compositeScore) {
    return b.compositeScore - a.compositeScore;
  }

  const byDate = b.transaction.date.getTime() - a.transaction.date.getTime();
  if (byDate !== 0) {
    return byDate;
  }

  if (a.transaction.id < b.transaction.id) return -1;
  if (a.transaction.id > b.transaction.id) return 1;
  return 0;
}

/**
 * Classifies an ordered candidate list.
 *
 * - 0 candidates → empty
 * - 1 candidate, or rank 1 leads rank 2 by more than epsilon → unique
 * - otherwise → ambiguous
 */
export function classifyCandidates(candidates: readonly MatchCandidate[], epsilon: number): MatchOutcome {
  if (candidates.length === 0) {
    return 'empty';
  }
  if (candidates.length === 1) {
    return 'unique';
  }

  const gap = candidates[0].compositeScore - candidates[1].compositeScore;
  return gap > epsilon ? 'unique' : 'ambiguous';
}

function directLookup(request: RankRequest, transactionId: string): MatchResult {
  const transaction = request.transactions.find(
    (txn) => txn.id === transactionId && txn.userId === request.userId
  );

  if (!transaction) {
    return { outcome: 'empty', candidates: [], weights: { ...NO_WEIGHTS } };
  }

  const candidate: MatchCandidate = {
    transaction,
    amountScore: 1,
    dateScore: 1,
    merchantScore: 1,
    compositeScore: 1,
  };

  return { outcome: 'unique', candidates: [candidate], best: candidate, weights: { ...NO_WEIGHTS } };
}

/**
 * Ranks a user's transactions against a query.
 *
 * This function is pure: the same request always yields the same result,
 * and nothing outside the returned value is modified.
 *
 * @example
 * const result = rankTransactions({
 *   query: { amount: 50, merchantText: 'Coffee Palace' },
 *   userId: 'user_001',
 *   transactions,
 *   merchants: new MerchantResolver(catalog),
 *   options: DEFAULT_MATCHING_OPTIONS,
 * });
 * // result.outcome === 'unique', result.best.compositeScore ≈ 0.94
 */
export function rankTransactions(request: RankRequest): MatchResult {
  const { query, userId, transactions, merchants, options } = request;

  if (query.transactionId !== undefined) {
    return directLookup(request, query.transactionId);
  }

  const weights = resolveActiveWeights(query, options.weights);

  const scored: MatchCandidate[] = [];

  for (const transaction of transactions) {
    if (transaction.userId !== userId) {
      continue;
    }

    const scores = {
      amountScore:
        query.amount !== undefined
          ? scoreAmount(query.amount, transaction.amount, options.amountTolerancePercent)
          : 1,
      dateScore:
        query.date !== undefined
          ? scoreDate(query.date, transaction.date, options.dateToleranceDays)
          : 1,
      merchantScore: scoreMerchant(query.merchantText, merchants.getById(transaction.merchantId)),
    };

    const compositeScore = calculateCompositeScore(scores, weights);

    // Below-threshold candidates are excluded, not ranked last
    if (compositeScore < options.acceptanceThreshold) {
      continue;
    }

    scored.push({ transaction, ...scores, compositeScore });
  }

  const candidates = scored.sort(compareCandidates).slice(0, options.maxCandidates);
  const outcome = classifyCandidates(candidates, options.ambiguityEpsilon);

  return {
    outcome,
    candidates,
    best: candidates[0],
    weights,
  };
}

export default rankTransactions;
