/**
 * Dispute repository - durable dispute records
 */

import type { AppDatabase } from '../client';
import type { DisputeStatus } from '../schema';

export interface Dispute {
  id: string;
  transactionId: string;
  userId: string;
  complaint: string;
  status: DisputeStatus;
  resolutionNotes: string | null;
  createdAt: string;
  updatedAt: string;
}

interface DisputeRow {
  id: string;
  transaction_id: string;
  user_id: string;
  complaint: string;
  status: DisputeStatus;
  resolution_notes: string | null;
  created_at: string;
  updated_at: string;
}

const toDispute = (row: DisputeRow): Dispute => ({
  id: row.id,
  transactionId: row.transaction_id,
  userId: row.user_id,
  complaint: row.complaint,
  status: row.status,
  resolutionNotes: row.resolution_notes,
  createdAt: row.created_at,
  updatedAt: row.updated_at,
});

export class DisputeRepository {
  constructor(private readonly db: AppDatabase) {}

  async create(dispute: Dispute): Promise<Dispute> {
    await this.db
      .insertInto('disputes')
      .values({
        id: dispute.id,
        transaction_id: dispute.transactionId,
        user_id: dispute.userId,
        complaint: dispute.complaint,
        status: dispute.status,
        resolution_notes: dispute.resolutionNotes,
        created_at: dispute.createdAt,
        updated_at: dispute.updatedAt,
      })
      .execute();

    return dispute;
  }

  async findById(disputeId: string): Promise<Dispute | null> {
    const row = await this.db
      .selectFrom('disputes')
      .selectAll()
      .where('id', '=', disputeId)
      .executeTakeFirst();

    return row ? toDispute(row) : null;
  }

  /**
   * A user's disputes, newest first
   */
  async findByUser(userId: string): Promise<Dispute[]> {
    const rows = await this.db
      .selectFrom('disputes')
      .selectAll()
      .where('user_id', '=', userId)
      .orderBy('created_at', 'desc')
      .orderBy('id', 'desc')
      .execute();

    return rows.map(toDispute);
  }

  /**
   * The dispute still open for a transaction, if any
   */
  async findOpenForTransaction(transactionId: string): Promise<Dispute | null> {
    const row = await this.db
      .selectFrom('disputes')
      .selectAll()
      .where('transaction_id', '=', transactionId)
      .where('status', '!=', 'resolved')
      .executeTakeFirst();

    return row ? toDispute(row) : null;
  }
}

export default DisputeRepository;
