/**
 * Dispute Service
 *
 * Flags a resolved transaction for dispute review.
 *
 * BUSINESS RULES:
 * - The transaction must belong to the user; anything else is a 404
 * - A transaction has at most one dispute that is not yet resolved
 * - New disputes start as "flagged"
 */

import { v4 as uuidv4 } from 'uuid';
import {
  getDatabase,
  DisputeRepository,
  TransactionRepository,
  type Dispute,
} from '../database';
import { resilienceGateway, PROVIDERS } from '../resilience';
import { AppError, logger } from '../utils';
import { recordEvent } from './audit.service';
import { getMerchantResolver } from './merchant.service';
import { summarizeTransaction, type TransactionSummary } from './transaction.service';

// ============================================
// Types
// ============================================

export interface FlagDisputeParams {
  transactionId: string;
  complaint: string;
}

export interface DisputeWithTransaction {
  dispute: Dispute;
  transaction: TransactionSummary;
}

export interface FlagDisputeResult extends DisputeWithTransaction {
  message: string;
  nextSteps: string[];
}

export const DISPUTE_NEXT_STEPS: readonly string[] = [
  'The dispute team reviews the transaction within 2 business days',
  'The merchant may be contacted for their side of the charge',
  'The user is notified when the status of the dispute changes',
];

const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 'SQLITE_CONSTRAINT_UNIQUE';

const disputes = (): DisputeRepository => new DisputeRepository(getDatabase());
const transactions = (): TransactionRepository => new TransactionRepository(getDatabase());

// ============================================
// Flagging
// ============================================

/**
 * @throws AppError 404 when the transaction is not one of the user's
 * @throws AppError 409 when the transaction already has an open dispute
 */
export async function flagDispute(userId: string, params: FlagDisputeParams): Promise<FlagDisputeResult> {
  const transaction = await resilienceGateway.execute(PROVIDERS.STORAGE, () =>
    transactions().findById(params.transactionId)
  );

  if (!transaction || transaction.userId !== userId) {
    throw AppError.notFound(`Transaction ${params.transactionId} not found for this user`);
  }

  const open = await resilienceGateway.execute(PROVIDERS.STORAGE, () =>
    disputes().findOpenForTransaction(transaction.id)
  );

  if (open) {
    throw AppError.conflict(
      `Transaction ${transaction.id} already has an open dispute (${open.id}, ${open.status})`
    );
  }

  const now = new Date().toISOString();
  const dispute = await resilienceGateway
    .execute(PROVIDERS.STORAGE, () =>
      disputes().create({
        id: uuidv4(),
        transactionId: transaction.id,
        userId,
        complaint: params.complaint,
        status: 'flagged',
        resolutionNotes: null,
        createdAt: now,
        updatedAt: now,
      })
    )
    .catch((error: unknown) => {
      // A concurrent flag inserted first
      if (isUniqueViolation(error)) {
        throw AppError.conflict(`Transaction ${transaction.id} already has an open dispute`);
      }
      throw error;
    });

  const summary = summarizeTransaction(transaction, await getMerchantResolver());

  logger.info(`Dispute ${dispute.id} flagged for ${transaction.id} by ${userId}`);

  await recordEvent({
    userId,
    event: 'dispute_flagged',
    entityId: dispute.id,
    details: { transactionId: transaction.id, complaint: params.complaint },
  });

  return {
    dispute,
    transaction: summary,
    message: `Dispute flagged for ${summary.merchantName} ${summary.formattedAmount} on ${summary.date}.`,
    nextSteps: [...DISPUTE_NEXT_STEPS],
  };
}

// ============================================
// Retrieval
// ============================================

/**
 * @throws AppError 404 when the dispute does not exist or is another user's
 */
export async function getDispute(userId: string, disputeId: string): Promise<DisputeWithTransaction> {
  const dispute = await resilienceGateway.execute(PROVIDERS.STORAGE, () =>
    disputes().findById(disputeId)
  );

  if (!dispute || dispute.userId !== userId) {
    throw AppError.notFound(`Dispute not found: ${disputeId}`);
  }

  const transaction = await resilienceGateway.execute(PROVIDERS.STORAGE, () =>
    transactions().findById(dispute.transactionId)
  );

  if (!transaction) {
    throw AppError.internal(`Dispute ${disputeId} references a missing transaction`);
  }

  return {
    dispute,
    transaction: summarizeTransaction(transaction, await getMerchantResolver()),
  };
}

/**
 * A user's disputes, newest first
 */
export function listDisputes(userId: string): Promise<Dispute[]> {
  return resilienceGateway.execute(PROVIDERS.STORAGE, () => disputes().findByUser(userId));
}

export const disputeService = {
  flagDispute,
  getDispute,
  listDisputes,
};

export default disputeService;
