/**
 * Type Definitions for session-scoped disambiguation
 */

import type { ActiveWeights, MatchCandidate, MatchQuery, MatchResult } from '../matching/types';

export type DisambiguationStatus = 'idle' | 'awaiting_clarification';

/**
 * Candidates held for a session while the user picks one
 */
export interface PendingDisambiguation {
  queryFingerprint: string;
  candidates: MatchCandidate[];
  weights: ActiveWeights;
  /** Epoch milliseconds */
  createdAt: number;
  /** Session turn on which the candidates were offered */
  createdTurn: number;
}

/**
 * Answer to a clarification request
 */
export type Selection =
  | { transactionId: string }
  | { rank: number }
  | { query: MatchQuery };

export interface ClarificationOption {
  /** 1-based position in the offered list; stable until the pending state changes */
  reference: number;
  transactionId: string;
  amount: number;
  currency: string;
  date: string;
  merchantName: string;
  description: string;
  compositeScore: number;
}

export interface ClarificationRequest {
  queryFingerprint: string;
  options: ClarificationOption[];
}

export interface TurnResult {
  result: MatchResult;
  clarification: ClarificationRequest | null;
}

export interface DisambiguationOptions {
  /** Turns a pending selection survives after the one that created it */
  maxPendingTurns: number;
  pendingTtlMs: number;
  now?: () => number;
}
