/**
 * Constants for the Fuzzy Transaction Resolution Engine
 *
 * Runtime defaults live in config and can be overridden per environment.
 * The values here are the fixed parts of the scoring formulas.
 */

import type { ActiveWeights, MatchingOptions } from './types';

// ============================================
// AMOUNT
// ============================================

/**
 * Smallest currency unit. Keeps the tolerance band non-zero for a
 * zero-amount query.
 */
export const SMALLEST_CURRENCY_UNIT = 0.01;

/**
 * Relative slack when comparing a difference against its tolerance band,
 * so binary rounding of decimal amounts does not push a boundary value out.
 */
export const BAND_SLACK = 1e-9;

/**
 * Lowest score a value inside its tolerance band can get. A value exactly on
 * the boundary is still a match, unlike one just outside it.
 */
export const IN_BAND_FLOOR = 1e-6;

// ============================================
// DATE
// ============================================

export const MS_PER_DAY = 1000 * 60 * 60 * 24;

// ============================================
// WEIGHTS
// ============================================

/**
 * Base weights before redistribution over the dimensions a query sets.
 *
 * With amount and merchant present this becomes 0.2 / 0.8:
 * - exact merchant, amount 3% off a 10% band → 0.2 × 0.7 + 0.8 × 1.0 = 0.94
 */
export const DEFAULT_WEIGHTS: ActiveWeights = {
  amount: 0.15,
  date: 0.25,
  merchant: 0.6,
};

export const NO_WEIGHTS: ActiveWeights = { amount: 0, date: 0, merchant: 0 };

// ============================================
// RANKING
// ============================================

export const DEFAULT_MATCHING_OPTIONS: MatchingOptions = {
  amountTolerancePercent: 10,
  dateToleranceDays: 3,
  acceptanceThreshold: 0.5,
  ambiguityEpsilon: 0.05,
  maxCandidates: 5,
  weights: DEFAULT_WEIGHTS,
};

// ============================================
// MERCHANT SUGGESTIONS
// ============================================

/**
 * Minimum Jaro-Winkler similarity (0-1) for a "did you mean" suggestion
 */
export const SUGGESTION_MIN_SIMILARITY = 0.8;

export const MAX_SUGGESTIONS = 3;
