/**
 * Audit Service
 *
 * Append-only trail of what the resolution flow did for a user:
 * transactions resolved, clarifications asked for, disputes flagged.
 *
 * Recording is best-effort. A failed write is logged and never fails the
 * user's request.
 */

import { getDatabase, AuditRepository, type AuditEvent } from '../database';
import { resilienceGateway, PROVIDERS } from '../resilience';
import { logger } from '../utils';

// ============================================
// Types
// ============================================

export type AuditEventType = 'transaction_resolved' | 'clarification_requested' | 'dispute_flagged';

export interface RecordEventParams {
  userId: string;
  event: AuditEventType;
  entityId: string | null;
  details?: Record<string, unknown>;
}

const repository = (): AuditRepository => new AuditRepository(getDatabase());

// ============================================
// Recording
// ============================================

/**
 * @returns The new event id, or null when the write failed
 */
export async function recordEvent(params: RecordEventParams): Promise<number | null> {
  try {
    const id = await resilienceGateway.execute(PROVIDERS.STORAGE, () =>
      repository().create({
        userId: params.userId,
        event: params.event,
        entityId: params.entityId,
        details: params.details ?? {},
        createdAt: new Date().toISOString(),
      })
    );

    logger.debug(`Audit ${params.event} recorded for ${params.userId} (${params.entityId ?? '-'})`);
    return id;
  } catch (error) {
    logger.warn(
      `Audit ${params.event} not recorded for ${params.userId}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
    return null;
  }
}

// ============================================
// Retrieval
// ============================================

export function getEventsForUser(userId: string): Promise<AuditEvent[]> {
  return resilienceGateway.execute(PROVIDERS.STORAGE, () => repository().findByUser(userId));
}

export const auditService = {
  recordEvent,
  getEventsForUser,
};

export default auditService;
