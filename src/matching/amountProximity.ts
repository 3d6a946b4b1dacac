/**
 * Amount Proximity Scoring
 *
 * Users rarely remember exact amounts. A transaction inside the tolerance
 * band scores linearly from 1.0 (exact) down towards 0 at the band edge.
 * Anything outside the band scores exactly 0.
 */

import { BAND_SLACK, IN_BAND_FLOOR, SMALLEST_CURRENCY_UNIT } from './constants';

/**
 * Width of the tolerance band around a query amount
 */
export function amountBand(queryAmount: number, tolerancePercent: number): number {
  return (tolerancePercent / 100) * Math.max(queryAmount, SMALLEST_CURRENCY_UNIT);
}

/**
 * Scores how close a transaction amount is to the remembered amount.
 *
 * @param queryAmount - Amount the user remembers
 * @param transactionAmount - Amount on the transaction
 * @param tolerancePercent - Band width as a percentage of the query amount
 * @returns Score from 0 to 1
 *
 * @example
 * scoreAmount(50, 50, 10)   // 1
 * scoreAmount(50, 48.5, 10) // 0.7
 * scoreAmount(50, 44, 10)   // 0
 */
export function scoreAmount(
  queryAmount: number,
  transactionAmount: number,
  tolerancePercent: number
): number {
  const difference = Math.abs(queryAmount - transactionAmount);

  if (difference === 0) {
    return 1;
  }

  const band = amountBand(queryAmount, tolerancePercent);
  if (difference > band * (1 + BAND_SLACK)) {
    return 0;
  }

  return Math.min(1, Math.max(IN_BAND_FLOOR, 1 - difference / band));
}

export default scoreAmount;
