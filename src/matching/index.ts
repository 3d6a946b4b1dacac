/**
 * Fuzzy Transaction Resolution Engine
 *
 * Pure, deterministic functions for finding the transaction a user is
 * describing from an approximate amount, date and merchant name.
 *
 * Usage:
 * ```typescript
 * import { rankTransactions, validateMatchQuery } from './matching';
 *
 * const validated = validateMatchQuery(body);
 * if (validated.success) {
 *   const result = rankTransactions({ query: validated.data, userId, transactions, merchants, options });
 *   console.log(result.outcome); // 'unique' | 'ambiguous' | 'empty'
 * }
 * ```
 */

// Main function
export { rankTransactions, compareCandidates, classifyCandidates } from './rankTransactions';
export type { RankRequest } from './rankTransactions';

// Query validation
export { validateMatchQuery, fingerprintQuery, matchQuerySchema } from './validateQuery';
export type { QueryValidationResult, InvalidQuery, QueryIssue } from './validateQuery';

// Individual scoring functions
export { scoreAmount, amountBand } from './amountProximity';
export { scoreDate, daysBetween, parseCalendarDate, formatCalendarDate } from './dateProximity';
export { resolveActiveWeights, calculateCompositeScore, explainScore } from './compositeScore';
export { MerchantResolver, scoreMerchant } from './merchantResolver';
export type { MerchantSuggestion } from './merchantResolver';
export { normalizeMerchantName } from './normalizeName';
export { calculateNameSimilarity } from './nameSimilarity';

// Constants
export {
  DEFAULT_MATCHING_OPTIONS,
  DEFAULT_WEIGHTS,
  SMALLEST_CURRENCY_UNIT,
  SUGGESTION_MIN_SIMILARITY,
} from './constants';

// Types
export type {
  Transaction,
  TransactionStatus,
  Merchant,
  MatchQuery,
  MatchCandidate,
  MatchOutcome,
  MatchResult,
  MatchingOptions,
  ActiveWeights,
  DimensionScores,
} from './types';
