/**
 * Composite Score Calculator
 *
 * Combines per-dimension scores into a single score in [0, 1].
 *
 * Weights are resolved once per query into an explicit table. A dimension
 * the query does not set gets weight 0 and the base weights of the
 * remaining dimensions are rescaled to sum to 1.
 *
 * Formula: composite = wAmount × amount + wDate × date + wMerchant × merchant
 */

import { NO_WEIGHTS } from './constants';
import type { ActiveWeights, DimensionScores, MatchQuery } from './types';

/**
 * Builds the active weight table for a query.
 *
 * @example
 * resolveActiveWeights({ amount: 50, merchantText: 'Coffee Palace' }, DEFAULT_WEIGHTS)
 * // Returns: { amount: 0.2, date: 0, merchant: 0.8 }
 */
export function resolveActiveWeights(query: MatchQuery, base: ActiveWeights): ActiveWeights {
  const present = {
    amount: query.amount !== undefined ? base.amount : 0,
    date: query.date !== undefined ? base.date : 0,
    merchant: query.merchantText !== undefined ? base.merchant : 0,
  };

  const total = present.amount + present.date + present.merchant;
  if (total <= 0) {
    return { ...NO_WEIGHTS };
  }

  return {
    amount: present.amount / total,
    date: present.date / total,
    merchant: present.merchant / total,
  };
}

/**
 * Applies a weight table to dimension scores, clamped to [0, 1]
 */
export function calculateCompositeScore(scores: DimensionScores, weights: ActiveWeights): number {
  const composite =
    weights.amount * scores.amountScore +
    weights.date * scores.dateScore +
    weights.merchant * scores.merchantScore;

  return Math.min(1, Math.max(0, composite));
}

/**
 * Human-readable breakdown for logs and API responses
 */
export function explainScore(scores: DimensionScores, weights: ActiveWeights): string {
  const parts: string[] = [];

  if (weights.amount > 0) {
    parts.push(`amount ${scores.amountScore.toFixed(2)} × ${weights.amount.toFixed(2)}`);
  }
  if (weights.date > 0) {
    parts.push(`date ${scores.dateScore.toFixed(2)} × ${weights.date.toFixed(2)}`);
  }
  if (weights.merchant > 0) {
    parts.push(`merchant ${scores.merchantScore.toFixed(2)} × ${weights.merchant.toFixed(2)}`);
  }

  const total = calculateCompositeScore(scores, weights);
  return parts.length > 0 ? `${parts.join(' + ')} = ${total.toFixed(2)}` : 'direct lookup';
}

export default calculateCompositeScore;
