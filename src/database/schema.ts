/**
 * Database schema
 *
 * Amounts are stored as integer minor units. Calendar dates are stored as
 * YYYY-MM-DD text and timestamps as ISO-8601 text.
 */

import type { ColumnType, Generated } from 'kysely';

export type TransactionStatus = 'pending' | 'posted' | 'refunded';
export type DisputeStatus = 'flagged' | 'under_review' | 'resolved';

export interface MerchantsTable {
  id: string;
  canonical_name: string;
  category: string;
  description: string | null;
  website: string | null;
  created_at: ColumnType<string, string | undefined, never>;
}

export interface MerchantAliasesTable {
  id: Generated<number>;
  merchant_id: string;
  alias: string;
}

export interface TransactionsTable {
  id: string;
  user_id: string;
  amount_cents: number;
  currency: string;
  transaction_date: string;
  merchant_id: string;
  status: TransactionStatus;
  description: string;
  category: string | null;
  created_at: ColumnType<string, string | undefined, never>;
}

export interface DisputesTable {
  id: string;
  transaction_id: string;
  user_id: string;
  complaint: string;
  status: DisputeStatus;
  resolution_notes: string | null;
  created_at: string;
  updated_at: string;
}

export interface AuditEventsTable {
  id: Generated<number>;
  user_id: string;
  event: string;
  entity_id: string | null;
  details: string;
  created_at: string;
}

export interface DatabaseSchema {
  merchants: MerchantsTable;
  merchant_aliases: MerchantAliasesTable;
  transactions: TransactionsTable;
  disputes: DisputesTable;
  audit_events: AuditEventsTable;
}
