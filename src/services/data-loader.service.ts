import { access, readFile } from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import type { z } from 'zod';
import { CONSTANTS } from '../config/constants';
import { DataSnapshot } from '../models/data-snapshot';
import { CommerceTableReader } from '../models/commerce-tables';
import {
  customerRowSchema,
  eventRowSchema,
  productRowSchema,
  transactionRowSchema,
} from '../schemas/validation';
import type { CommerceDataset, EntityName } from '../types';
import { DataLoadError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { analyticsMetrics } from '../utils/metrics';

type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const REQUIRED_ENTITIES: readonly EntityName[] = ['customers', 'transactions'];

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export class DataLoaderService {
  private log = createLogger('DataLoaderService');

  /**
   * Build a snapshot from `customers.csv`, `transactions.csv`, `events.csv`
   * and `products.csv` in `directory`. Events and products are optional.
   */
  async loadFromCsv(directory: string): Promise<DataSnapshot> {
    this.log.info('Loading data from CSV files', { directory });

    const readEntity = async <T>(entity: EntityName, schema: RowSchema<T>): Promise<T[] | null> => {
      const filePath = path.join(directory, CONSTANTS.DATA_FILES[entity]);
      if (!(await fileExists(filePath))) {
        this.log.warn(`File not found: ${filePath}`);
        return null;
      }

      const text = await readFile(filePath, 'utf8');
      const parsed = Papa.parse<Record<string, string>>(text, {
        header: true,
        skipEmptyLines: true,
      });
      if (parsed.errors.length > 0) {
        this.log.warn('CSV parse reported errors', {
          entity,
          errors: parsed.errors.length,
          first: parsed.errors[0].message,
        });
      }

      return this.parseRows(entity, parsed.data, schema);
    };

    const dataset = {
      customers: await readEntity('customers', customerRowSchema),
      transactions: await readEntity('transactions', transactionRowSchema),
      events: await readEntity('events', eventRowSchema),
      products: await readEntity('products', productRowSchema),
    };

    return this.buildSnapshot(dataset, 'csv');
  }

  /**
   * Build a snapshot from the `customers`, `transactions`, `events` and
   * `products` tables.
   */
  async loadFromDatabase(reader: CommerceTableReader): Promise<DataSnapshot> {
    this.log.info('Loading data from database');

    const readEntity = async <T>(entity: EntityName, schema: RowSchema<T>): Promise<T[] | null> => {
      if (!(await reader.hasTable(entity))) {
        this.log.warn(`Table not found: ${entity}`);
        return null;
      }
      const rows = await reader.selectAll(entity);
      return this.parseRows(entity, rows, schema);
    };

    const dataset = {
      customers: await readEntity('customers', customerRowSchema),
      transactions: await readEntity('transactions', transactionRowSchema),
      events: await readEntity('events', eventRowSchema),
      products: await readEntity('products', productRowSchema),
    };

    return this.buildSnapshot(dataset, 'database');
  }

  /**
   * Validate raw rows, dropping the ones that do not match the schema.
   */
  parseRows<T>(entity: EntityName, rows: readonly unknown[], schema: RowSchema<T>): T[] {
    const valid: T[] = [];
    let skipped = 0;
    let firstIssue: string | undefined;

    rows.forEach((row) => {
      const result = schema.safeParse(row);
      if (result.success) {
        valid.push(result.data);
      } else {
        skipped++;
        if (firstIssue === undefined) {
          const [issue] = result.error.issues;
          firstIssue = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid row';
        }
      }
    });

    if (skipped > 0) {
      this.log.warn(`Skipped ${skipped} malformed ${entity} rows`, { entity, skipped, firstIssue });
    }

    return valid;
  }

  private buildSnapshot(
    dataset: { [K in keyof CommerceDataset]: CommerceDataset[K] | null },
    source: 'csv' | 'database'
  ): DataSnapshot {
    const missing = REQUIRED_ENTITIES.filter((entity) => dataset[entity] === null);
    if (missing.length > 0) {
      throw new DataLoadError(`Required data not found: ${missing.join(', ')}`);
    }

    const snapshot = new DataSnapshot(
      {
        customers: dataset.customers ?? [],
        transactions: dataset.transactions ?? [],
        events: dataset.events ?? [],
        products: dataset.products ?? [],
      },
      source
    );

    const summary = snapshot.summary();
    Object.entries(summary).forEach(([entity, count]) => analyticsMetrics.dataRows(entity, count));
    this.log.info('Data loaded', { source, ...summary });

    return snapshot;
  }
}

export const dataLoaderService = new DataLoaderService();
