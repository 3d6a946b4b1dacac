/**
 * Resolution Service
 *
 * Drives a conversation session through the resolution flow:
 *
 * 1. resolve(): validate the query, read the user's snapshot, rank it and
 *    record the outcome with the session's disambiguation controller
 * 2. select(): answer a clarification by transaction id, reference number
 *    or a refined query
 * 3. endSession(): drop session state and cancel the session's in-flight
 *    storage calls
 *
 * Sessions are keyed by user and session id, so one user can never answer
 * another user's clarification. Turns of a session run one at a time.
 */

import { z } from 'zod';
import { disambiguationConfig, matchingConfig } from '../config';
import {
  DisambiguationController,
  SessionLock,
  type ClarificationRequest,
  type DisambiguationStatus,
  type Selection,
  type TurnResult,
} from '../disambiguation';
import {
  explainScore,
  rankTransactions,
  validateMatchQuery,
  type ActiveWeights,
  type MatchCandidate,
  type MatchOutcome,
  type MatchQuery,
  type MerchantResolver,
  type QueryIssue,
} from '../matching';
import { AppError, logger } from '../utils';
import { recordEvent } from './audit.service';
import { getMerchantResolver } from './merchant.service';
import { getUserSnapshot, summarizeTransaction, type TransactionSummary } from './transaction.service';

// ============================================
// Types
// ============================================

export interface CandidateView extends TransactionSummary {
  reference: number;
  scores: {
    amount: number;
    date: number;
    merchant: number;
    composite: number;
  };
  explanation: string;
}

export interface ResolutionResponse {
  sessionId: string;
  status: DisambiguationStatus;
  outcome: MatchOutcome;
  /** Set to EmptyResult when nothing matched */
  kind: 'EmptyResult' | null;
  best: CandidateView | null;
  candidates: CandidateView[];
  clarification: ClarificationRequest | null;
  weights: ActiveWeights;
  message: string;
}

export interface EndSessionResult {
  sessionId: string;
  ended: boolean;
  cancelledCalls: number;
}

// ============================================
// Input parsing
// ============================================

const selectionSchema = z.union([
  z.object({ transactionId: z.string().trim().min(1) }).strict(),
  z.object({ rank: z.number().int().positive() }).strict(),
  z.object({ query: z.record(z.unknown()) }).strict(),
]);

const describeIssues = (issues: QueryIssue[]): string =>
  issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ');

/**
 * @throws AppError InvalidQuery
 */
export function parseQuery(raw: unknown): MatchQuery {
  const validated = validateMatchQuery(raw);
  if (!validated.success) {
    throw AppError.invalidQuery(`Invalid query - ${describeIssues(validated.error.issues)}`);
  }
  return validated.data;
}

/**
 * @throws AppError InvalidQuery
 */
export function parseSelection(raw: unknown): Selection {
  const parsed = selectionSchema.safeParse(raw);
  if (!parsed.success) {
    throw AppError.invalidQuery('A selection needs exactly one of transactionId, rank or query');
  }

  const selection = parsed.data;
  if ('transactionId' in selection) return { transactionId: selection.transactionId };
  if ('rank' in selection) return { rank: selection.rank };
  return { query: parseQuery(selection.query) };
}

// ============================================
// Presentation
// ============================================

function toCandidateView(
  candidate: MatchCandidate,
  index: number,
  merchants: MerchantResolver,
  weights: ActiveWeights
): CandidateView {
  return {
    ...summarizeTransaction(candidate.transaction, merchants),
    reference: index + 1,
    scores: {
      amount: candidate.amountScore,
      date: candidate.dateScore,
      merchant: candidate.merchantScore,
      composite: candidate.compositeScore,
    },
    explanation: explainScore(candidate, weights),
  };
}

function describeOutcome(outcome: MatchOutcome, best: CandidateView | null, count: number): string {
  if (outcome === 'unique' && best) {
    return `Found the transaction: ${best.merchantName} ${best.formattedAmount} on ${best.date}.`;
  }
  if (outcome === 'ambiguous') {
    return `Found ${count} possible transactions. Ask the user which one they mean.`;
  }
  return 'No transaction matched the description.';
}

// ============================================
// Service
// ============================================

export class ResolutionService {
  private readonly inFlight = new Map<string, Set<AbortController>>();

  constructor(
    private readonly controller = new DisambiguationController(disambiguationConfig, matchingConfig),
    private readonly lock = new SessionLock()
  ) {}

  /**
   * Resolves a fresh query. Any earlier pending clarification is replaced.
   *
   * @throws AppError InvalidQuery before any storage access
   */
  async resolve(userId: string, sessionId: string, rawQuery: unknown): Promise<ResolutionResponse> {
    const query = parseQuery(rawQuery);
    const key = this.sessionKey(userId, sessionId);

    return this.lock.runExclusive(key, () =>
      this.withCancellation(key, async (signal) => {
        this.controller.beginTurn(key);

        const [transactions, merchants] = await Promise.all([
          getUserSnapshot(userId, signal),
          getMerchantResolver(signal),
        ]);

        const result = rankTransactions({ query, userId, transactions, merchants, options: matchingConfig });
        const turn = this.controller.recordResult(key, query, result, merchants);

        return this.finishTurn(userId, sessionId, key, turn, merchants, 'query');
      })
    );
  }

  /**
   * Answers the session's pending clarification
   *
   * @throws AppError StaleReference when nothing matching is pending
   */
  async select(userId: string, sessionId: string, rawSelection: unknown): Promise<ResolutionResponse> {
    const selection = parseSelection(rawSelection);
    const key = this.sessionKey(userId, sessionId);

    return this.lock.runExclusive(key, () =>
      this.withCancellation(key, async (signal) => {
        this.controller.beginTurn(key);

        const merchants = await getMerchantResolver(signal);
        const turn = this.controller.select(key, userId, selection, merchants);

        return this.finishTurn(userId, sessionId, key, turn, merchants, 'selection');
      })
    );
  }

  /**
   * Drops the session and aborts its in-flight calls
   */
  endSession(userId: string, sessionId: string): EndSessionResult {
    const key = this.sessionKey(userId, sessionId);
    const controllers = this.inFlight.get(key);
    const cancelledCalls = controllers?.size ?? 0;

    controllers?.forEach((controller) => controller.abort());
    this.inFlight.delete(key);

    const ended = this.controller.endSession(key);
    if (ended || cancelledCalls > 0) {
      logger.info(`Session ${sessionId} ended for ${userId} (${cancelledCalls} call(s) cancelled)`);
    }

    return { sessionId, ended, cancelledCalls };
  }

  getStatus(userId: string, sessionId: string): DisambiguationStatus {
    return this.controller.status(this.sessionKey(userId, sessionId));
  }

  // ============================================
  // Internals
  // ============================================

  private sessionKey(userId: string, sessionId: string): string {
    return `${userId}:${sessionId}`;
  }

  private async withCancellation<T>(key: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const abort = new AbortController();
    const controllers = this.inFlight.get(key) ?? new Set<AbortController>();
    controllers.add(abort);
    this.inFlight.set(key, controllers);

    try {
      return await fn(abort.signal);
    } finally {
      controllers.delete(abort);
      if (controllers.size === 0 && this.inFlight.get(key) === controllers) {
        this.inFlight.delete(key);
      }
    }
  }

  private async finishTurn(
    userId: string,
    sessionId: string,
    key: string,
    turn: TurnResult,
    merchants: MerchantResolver,
    via: 'query' | 'selection'
  ): Promise<ResolutionResponse> {
    const { result, clarification } = turn;
    const candidates = result.candidates.map((candidate, index) =>
      toCandidateView(candidate, index, merchants, result.weights)
    );
    const best = result.outcome === 'unique' ? candidates[0] ?? null : null;

    if (best) {
      await recordEvent({
        userId,
        event: 'transaction_resolved',
        entityId: best.id,
        details: { sessionId, via, compositeScore: best.scores.composite },
      });
    } else if (clarification) {
      await recordEvent({
        userId,
        event: 'clarification_requested',
        entityId: null,
        details: {
          sessionId,
          transactionIds: clarification.options.map((option) => option.transactionId),
        },
      });
    }

    return {
      sessionId,
      status: this.controller.status(key),
      outcome: result.outcome,
      kind: result.outcome === 'empty' ? 'EmptyResult' : null,
      best,
      candidates,
      clarification,
      weights: result.weights,
      message: describeOutcome(result.outcome, best, candidates.length),
    };
  }
}

// Singleton instance
export const resolutionService = new ResolutionService();

export default resolutionService;
