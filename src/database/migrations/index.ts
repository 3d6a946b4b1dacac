import type { Migration, MigrationProvider } from 'kysely';
import * as initialSchema from './001_initial_schema';

const migrations: Record<string, Migration> = {
  '001_initial_schema': initialSchema,
};

/**
 * Migrations compiled into the bundle, so dist/ needs no migration folder
 */
export const migrationProvider: MigrationProvider = {
  getMigrations: async () => migrations,
};
