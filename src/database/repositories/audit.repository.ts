/**
 * Audit repository - append-only event log
 */

import type { AppDatabase } from '../client';

export interface AuditEvent {
  id: number;
  userId: string;
  event: string;
  entityId: string | null;
  details: Record<string, unknown>;
  createdAt: string;
}

export interface NewAuditEvent {
  userId: string;
  event: string;
  entityId: string | null;
  details: Record<string, unknown>;
  createdAt: string;
}

const parseDetails = (raw: string): Record<string, unknown> => {
  const value: unknown = JSON.parse(raw);
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : { value };
};

export class AuditRepository {
  constructor(private readonly db: AppDatabase) {}

  async create(entry: NewAuditEvent): Promise<number> {
    const { id } = await this.db
      .insertInto('audit_events')
      .values({
        user_id: entry.userId,
        event: entry.event,
        entity_id: entry.entityId,
        details: JSON.stringify(entry.details),
        created_at: entry.createdAt,
      })
      .returning('id')
      .executeTakeFirstOrThrow();

    return id;
  }

  /**
   * A user's events in insertion order
   */
  async findByUser(userId: string): Promise<AuditEvent[]> {
    const rows = await this.db
      .selectFrom('audit_events')
      .selectAll()
      .where('user_id', '=', userId)
      .orderBy('id')
      .execute();

    return rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      event: row.event,
      entityId: row.entity_id,
      details: parseDetails(row.details),
      createdAt: row.created_at,
    }));
  }
}

export default AuditRepository;
