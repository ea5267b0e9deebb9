import 'dotenv/config';
import { config } from '../config';
import { closeDatabase, connectDatabase } from '../config/database';
import {
  customerToRow,
  eventToRow,
  productToRow,
  TableRow,
  transactionToRow,
} from '../models/commerce-tables';
import { buildDataQualityReport } from '../services/data-quality.service';
import { dataLoaderService } from '../services/data-loader.service';
import type { EntityName } from '../types';
import { createLogger } from '../utils/logger';

const log = createLogger('setup-database');

const BATCH_SIZE = 500;

async function setupDatabase(): Promise<void> {
  const db = await connectDatabase();

  try {
    const [batch, applied] = await db.migrate.latest();
    log.info('Migrations applied', { batch, migrations: applied });

    const snapshot = await dataLoaderService.loadFromCsv(config.dataSource.csvPath);

    const tables: [EntityName, TableRow[]][] = [
      ['customers', snapshot.customers.map(customerToRow)],
      ['transactions', snapshot.transactions.map(transactionToRow)],
      ['events', snapshot.events.map(eventToRow)],
      ['products', snapshot.products.map(productToRow)],
    ];

    await db.transaction(async (trx) => {
      for (const [table, rows] of tables) {
        await trx(table).del();
        await trx.batchInsert(table, rows, BATCH_SIZE);
        log.info(`Loaded ${rows.length} records into ${table}`);
      }
    });

    const report = buildDataQualityReport(snapshot);
    log.info('Data quality report', { ...report });
    log.info('Database setup completed', { completedAt: new Date().toISOString() });
  } finally {
    await closeDatabase(db);
  }
}

setupDatabase().catch((error: unknown) => {
  log.error('Database setup failed', { error });
  process.exitCode = 1;
});
