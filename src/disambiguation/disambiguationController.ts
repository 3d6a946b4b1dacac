/**
 * Disambiguation Controller
 *
 * Session-scoped state machine: idle → awaiting_clarification → idle.
 *
 * - An ambiguous result stores its candidates as the session's pending state
 *   and produces a clarification request with a 1-based reference per candidate.
 * - The next turn answers with a transaction id, a reference number, or a
 *   refined query. A refined query is ranked against the pending candidates
 *   only, so answers converge instead of widening the search.
 * - Pending state lives for maxPendingTurns turns after the one that created
 *   it, and never longer than pendingTtlMs. After that any selection fails
 *   with StaleReference.
 *
 * State belongs to a single session. Callers serialize a session's turns
 * (see SessionLock); nothing here is shared between sessions.
 */

import { AppError, logger } from '../utils';
import { fingerprintQuery } from '../matching/validateQuery';
import { formatCalendarDate } from '../matching/dateProximity';
import { rankTransactions } from '../matching/rankTransactions';
import type { MerchantResolver } from '../matching/merchantResolver';
import type { MatchCandidate, MatchingOptions, MatchQuery, MatchResult } from '../matching/types';
import type {
  ClarificationRequest,
  DisambiguationOptions,
  DisambiguationStatus,
  PendingDisambiguation,
  Selection,
  TurnResult,
} from './types';

interface SessionState {
  turn: number;
  lastActivity: number;
  pending: PendingDisambiguation | null;
}

export class DisambiguationController {
  private readonly sessions = new Map<string, SessionState>();
  private readonly now: () => number;

  constructor(
    private readonly options: DisambiguationOptions,
    private readonly matching: MatchingOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  // ============================================
  // Turn lifecycle
  // ============================================

  /**
   * Starts a new turn for a session and expires pending state that has
   * outlived its turn or time budget.
   *
   * @returns The session's turn number
   */
  beginTurn(sessionId: string): number {
    const now = this.now();
    this.pruneIdleSessions(now);

    const state = this.sessions.get(sessionId) ?? { turn: 0, lastActivity: now, pending: null };
    state.turn += 1;
    state.lastActivity = now;

    if (state.pending && this.isExpired(state.pending, state.turn, now)) {
      logger.debug(`Pending disambiguation expired for session ${sessionId}`);
      state.pending = null;
    }

    this.sessions.set(sessionId, state);
    return state.turn;
  }

  status(sessionId: string): DisambiguationStatus {
    return this.sessions.get(sessionId)?.pending ? 'awaiting_clarification' : 'idle';
  }

  /**
   * Drops all state for a session
   */
  endSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  // ============================================
  // Results and selections
  // ============================================

  /**
   * Records the result of a fresh query. Any earlier pending state is
   * replaced, so candidates never carry over to an unrelated query.
   */
  recordResult(
    sessionId: string,
    query: MatchQuery,
    result: MatchResult,
    merchants: MerchantResolver
  ): TurnResult {
    const state = this.requireSession(sessionId);

    if (result.outcome !== 'ambiguous') {
      state.pending = null;
      return { result, clarification: null };
    }

    state.pending = {
      queryFingerprint: fingerprintQuery(query),
      candidates: result.candidates,
      weights: result.weights,
      createdAt: this.now(),
      createdTurn: state.turn,
    };

    return { result, clarification: this.buildClarification(state.pending, merchants) };
  }

  /**
   * Resolves a clarification answer against the pending candidates
   *
   * @throws AppError StaleReference when nothing is pending or the
   *         reference is not among the pending candidates
   */
  select(
    sessionId: string,
    userId: string,
    selection: Selection,
    merchants: MerchantResolver
  ): TurnResult {
    const state = this.sessions.get(sessionId);
    const pending = state?.pending;

    if (!state || !pending) {
      throw AppError.staleReference('There is no pending selection for this session');
    }

    if ('query' in selection) {
      return this.refine(state, pending, userId, selection.query, merchants);
    }

    const candidate =
      'rank' in selection
        ? pending.candidates[selection.rank - 1]
        : pending.candidates.find((c) => c.transaction.id === selection.transactionId);

    if (!candidate) {
      throw AppError.staleReference('The selected candidate is not in the pending list');
    }

    state.pending = null;

    return {
      result: { outcome: 'unique', candidates: [candidate], best: candidate, weights: pending.weights },
      clarification: null,
    };
  }

  // ============================================
  // Internals
  // ============================================

  private refine(
    state: SessionState,
    pending: PendingDisambiguation,
    userId: string,
    query: MatchQuery,
    merchants: MerchantResolver
  ): TurnResult {
    const result = rankTransactions({
      query,
      userId,
      transactions: pending.candidates.map((candidate) => candidate.transaction),
      merchants,
      options: this.matching,
    });

    if (result.outcome !== 'ambiguous') {
      state.pending = null;
      return { result, clarification: null };
    }

    state.pending = {
      queryFingerprint: fingerprintQuery(query),
      candidates: result.candidates,
      weights: result.weights,
      createdAt: this.now(),
      createdTurn: state.turn,
    };

    return { result, clarification: this.buildClarification(state.pending, merchants) };
  }

  private buildClarification(
    pending: PendingDisambiguation,
    merchants: MerchantResolver
  ): ClarificationRequest {
    return {
      queryFingerprint: pending.queryFingerprint,
      options: pending.candidates.map((candidate: MatchCandidate, index) => ({
        reference: index + 1,
        transactionId: candidate.transaction.id,
        amount: candidate.transaction.amount,
        currency: candidate.transaction.currency,
        date: formatCalendarDate(candidate.transaction.date),
        merchantName:
          merchants.getById(candidate.transaction.merchantId)?.canonicalName ??
          candidate.transaction.merchantId,
        description: candidate.transaction.description,
        compositeScore: candidate.compositeScore,
      })),
    };
  }

  private requireSession(sessionId: string): SessionState {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      return existing;
    }

    const created: SessionState = { turn: 0, lastActivity: this.now(), pending: null };
    this.sessions.set(sessionId, created);
    return created;
  }

  private isExpired(pending: PendingDisambiguation, turn: number, now: number): boolean {
    return (
      turn - pending.createdTurn > this.options.maxPendingTurns ||
      now - pending.createdAt > this.options.pendingTtlMs
    );
  }

  private pruneIdleSessions(now: number): void {
    for (const [sessionId, state] of this.sessions) {
      if (now - state.lastActivity > this.options.pendingTtlMs) {
        this.sessions.delete(sessionId);
      }
    }
  }
}

export default DisambiguationController;
