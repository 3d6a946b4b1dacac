/**
 * Type Definitions for the Fuzzy Transaction Resolution Engine
 *
 * These types define the input/output contracts for scoring and ranking.
 * The engine is pure and deterministic - no database or external dependencies.
 */

// ============================================
// Catalog Records
// ============================================

export type TransactionStatus = 'pending' | 'posted' | 'refunded';

/**
 * A card transaction as read from a user-scoped snapshot
 */
export interface Transaction {
  id: string;
  userId: string;
  /** Amount in major currency units */
  amount: number;
  currency: string;
  /** Calendar date at UTC midnight */
  date: Date;
  merchantId: string;
  status: TransactionStatus;
  description: string;
  category: string | null;
}

export interface Merchant {
  id: string;
  canonicalName: string;
  aliases: string[];
  category: string;
  description: string | null;
  website: string | null;
}

// ============================================
// Query
// ============================================

/**
 * Structured description of the transaction a user is asking about.
 * At least one field is always set once validated.
 */
export interface MatchQuery {
  amount?: number;
  date?: Date;
  merchantText?: string;
  transactionId?: string;
}

// ============================================
// Scoring
// ============================================

/**
 * Weight per scoring dimension. Dimensions the query leaves out carry 0,
 * and the remaining weights always sum to 1.
 */
export interface ActiveWeights {
  amount: number;
  date: number;
  merchant: number;
}

export interface DimensionScores {
  amountScore: number;
  dateScore: number;
  merchantScore: number;
}

export interface MatchCandidate extends DimensionScores {
  transaction: Transaction;
  compositeScore: number;
}

export type MatchOutcome = 'unique' | 'ambiguous' | 'empty';

export interface MatchResult {
  outcome: MatchOutcome;
  /** Ordered best first, never longer than the configured maximum */
  candidates: MatchCandidate[];
  best?: MatchCandidate;
  weights: ActiveWeights;
}

/**
 * Tunables for a ranking call
 */
export interface MatchingOptions {
  amountTolerancePercent: number;
  dateToleranceDays: number;
  acceptanceThreshold: number;
  ambiguityEpsilon: number;
  maxCandidates: number;
  weights: ActiveWeights;
}
