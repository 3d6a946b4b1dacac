/**
 * SQLite database access through Kysely
 *
 * One connection per process. ":memory:" gives an ephemeral store (tests).
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { Kysely, Migrator, SqliteDialect, sql } from 'kysely';
import { env } from '../config';
import logger from '../utils/logger';
import { migrationProvider } from './migrations';
import type { DatabaseSchema } from './schema';

export type AppDatabase = Kysely<DatabaseSchema>;

const IN_MEMORY = ':memory:';

/**
 * Creates and configures a database instance
 */
export function createDatabase(dbPath: string = env.DATABASE_PATH): AppDatabase {
  if (dbPath !== IN_MEMORY) {
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const sqliteDb = new Database(dbPath);

  sqliteDb.pragma('foreign_keys = ON');
  if (dbPath !== IN_MEMORY) {
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('synchronous = NORMAL');
  }

  return new Kysely<DatabaseSchema>({
    dialect: new SqliteDialect({ database: sqliteDb }),
  });
}

// Singleton - created on first use
let database: AppDatabase | null = null;

export function getDatabase(): AppDatabase {
  if (!database) {
    database = createDatabase();
  }
  return database;
}

/**
 * Applies pending migrations
 */
export async function migrateDatabase(db: AppDatabase = getDatabase()): Promise<void> {
  const migrator = new Migrator({ db, provider: migrationProvider });
  const { error, results } = await migrator.migrateToLatest();

  for (const result of results ?? []) {
    if (result.status === 'Success') {
      logger.info(`Migration "${result.migrationName}" executed successfully`);
    } else if (result.status === 'Error') {
      logger.error(`Migration "${result.migrationName}" failed`);
    }
  }

  if (error) {
    throw error instanceof Error ? error : new Error(`Migration failed: ${String(error)}`);
  }
}

/**
 * Connect to database
 */
export const connectDatabase = async (): Promise<void> => {
  try {
    await migrateDatabase();
    logger.info(`📦 Database ready at ${env.DATABASE_PATH}`);
  } catch (error) {
    logger.error('❌ Database initialization failed:', error);
    throw error;
  }
};

/**
 * Disconnect from database
 */
export const disconnectDatabase = async (): Promise<void> => {
  if (!database) {
    return;
  }

  const db = database;
  database = null;
  await db.destroy();
  logger.info('📦 Database disconnected');
};

/**
 * Check database health
 */
export const checkDatabaseHealth = async (): Promise<boolean> => {
  try {
    await sql`select 1`.execute(getDatabase());
    return true;
  } catch (error) {
    logger.warn(`Database health check failed: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
};

export default getDatabase;
