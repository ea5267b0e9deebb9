import 'dotenv/config';
import type { Knex } from 'knex';
import { AnalyticsEngine } from './analytics-engine/analytics-engine';
import { config } from './config';
import { closeDatabase, connectDatabase, createDatabaseProbe } from './config/database';
import { DataSnapshot } from './models/data-snapshot';
import { createKnexTableReader } from './models/commerce-tables';
import { createServer } from './server';
import { dataLoaderService } from './services/data-loader.service';
import type { ComponentStatus } from './types';
import { logger } from './utils/logger';

const disconnected = async (): Promise<ComponentStatus> => 'disconnected';

async function openDatabase(): Promise<Knex | null> {
  if (config.dataSource.type !== 'database') return null;
  try {
    return await connectDatabase();
  } catch (error) {
    logger.error('Database unavailable, continuing without data', { error });
    return null;
  }
}

async function loadSnapshot(db: Knex | null): Promise<DataSnapshot | null> {
  try {
    if (config.dataSource.type === 'database') {
      return db ? await dataLoaderService.loadFromDatabase(createKnexTableReader(db)) : null;
    }
    return await dataLoaderService.loadFromCsv(config.dataSource.csvPath);
  } catch (error) {
    // The service still answers health and status without data
    logger.error('Failed to load data', { error, source: config.dataSource.type });
    return null;
  }
}

async function startService() {
  try {
    logger.info('Starting Commerce Analytics Service...');

    const db = await openDatabase();
    const snapshot = await loadSnapshot(db);

    const engine = new AnalyticsEngine(snapshot);
    const probe = db ? createDatabaseProbe(db) : config.dataSource.type === 'database' ? disconnected : undefined;
    const app = await createServer(engine, probe);

    await app.listen({ port: config.port, host: config.host });
    logger.info(`Commerce Analytics Service running on ${config.host}:${config.port}`, {
      dataLoaded: engine.isReady(),
    });

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`${signal} received, shutting down gracefully...`);
      try {
        await app.close();
        if (db) await closeDatabase(db);
        logger.info('Server closed');
        process.exit(0);
      } catch (err) {
        logger.error('Error during shutdown', { error: err });
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start Commerce Analytics Service', { error });
    process.exit(1);
  }
}

void startService();
