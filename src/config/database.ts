import knex, { Knex } from 'knex';
import { defaults, types } from 'pg';
import { config } from './index';
import { commerceMigrationSource } from '../migrations';
import type { ComponentStatus } from '../types';
import { parseTimestamp } from '../utils/date-buckets';
import { logger } from '../utils/logger';

const TIMESTAMP_WITHOUT_TZ_OID = 1114;

// Zone-less timestamps are stored as UTC; pg would otherwise read them in local time
types.setTypeParser(TIMESTAMP_WITHOUT_TZ_OID, (value: string) => parseTimestamp(value));
defaults.parseInputDatesAsUTC = true;

const MAX_RETRIES = 5;
const RETRY_DELAY = 2000; // Base delay in milliseconds

export function createDatabase(): Knex {
  return knex({
    client: 'pg',
    connection: {
      host: config.database.host,
      port: config.database.port,
      database: config.database.database,
      user: config.database.user,
      password: config.database.password,
    },
    pool: {
      min: config.database.pool.min,
      max: config.database.pool.max,
      createTimeoutMillis: 3000,
      acquireTimeoutMillis: 30000,
      idleTimeoutMillis: 30000,
    },
    acquireConnectionTimeout: 30000,
    migrations: {
      migrationSource: commerceMigrationSource,
      tableName: 'knex_migrations',
    },
  });
}

/**
 * Open a pool and verify it with `SELECT 1`, retrying with exponential backoff.
 */
export async function connectDatabase(): Promise<Knex> {
  for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
    const db = createDatabase();
    try {
      logger.info(`Database connection attempt ${attempt}/${MAX_RETRIES}...`);
      await db.raw('SELECT 1');
      logger.info('Database connection established', {
        host: config.database.host,
        database: config.database.database,
      });
      return db;
    } catch (error) {
      await db.destroy();
      logger.error(`Database connection attempt ${attempt} failed`, { error });
      if (attempt === MAX_RETRIES) {
        throw error;
      }
      const delay = RETRY_DELAY * Math.pow(2, attempt - 1);
      logger.info(`Retrying in ${delay}ms...`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw new Error('Unreachable: database retries exhausted');
}

export function createDatabaseProbe(db: Knex): () => Promise<ComponentStatus> {
  return async () => {
    try {
      await db.raw('SELECT 1');
      return 'connected';
    } catch (error) {
      logger.warn('Database health check failed', { error });
      return 'disconnected';
    }
  };
}

export async function closeDatabase(db: Knex): Promise<void> {
  await db.destroy();
  logger.info('Database connection closed');
}
