export { healthService, HealthService, type ReadinessReport, type ProviderReport } from './health.service';
export { auditService } from './audit.service';
export * from './audit.service';
export { merchantService } from './merchant.service';
export * from './merchant.service';
export { transactionService } from './transaction.service';
export * from './transaction.service';
export { disputeService } from './dispute.service';
export * from './dispute.service';
export { resolutionService, ResolutionService } from './resolution.service';
export * from './resolution.service';
