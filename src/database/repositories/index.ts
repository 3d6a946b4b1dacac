export { MerchantRepository } from './merchant.repository';
export { TransactionRepository, toMinorUnits } from './transaction.repository';
export { DisputeRepository, type Dispute } from './dispute.repository';
export { AuditRepository, type AuditEvent, type NewAuditEvent } from './audit.repository';
