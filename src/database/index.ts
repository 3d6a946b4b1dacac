export {
  getDatabase,
  createDatabase,
  migrateDatabase,
  connectDatabase,
  disconnectDatabase,
  checkDatabaseHealth,
  type AppDatabase,
} from './client';
export { seedDatabase, loadSeedFile, seedSchema, type SeedData } from './seed';
export * from './repositories';
export type { DatabaseSchema, DisputeStatus, TransactionStatus } from './schema';
