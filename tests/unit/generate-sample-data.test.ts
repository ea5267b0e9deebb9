/**
 * Sample Data Generator Unit Tests
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { createRandom, generateSampleData, writeSampleData } from '../../src/scripts/generate-sample-data';
import { DataLoaderService } from '../../src/services/data-loader.service';
import { customerRowSchema, transactionRowSchema } from '../../src/schemas/validation';

const options = {
  customers: 5,
  transactions: 40,
  events: 10,
  products: 3,
  seed: 7,
  now: new Date('2024-06-30T12:00:00.000Z'),
};

describe('generate-sample-data', () => {
  it('should produce a repeatable stream for a seed', () => {
    const a = createRandom(42);
    const b = createRandom(42);
    const first = [a(), a(), a()];

    expect([b(), b(), b()]).toEqual(first);
    first.forEach((value) => {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    });
  });

  it('should generate the requested row counts deterministically', () => {
    const dataset = generateSampleData(options);

    expect(dataset.customers).toHaveLength(5);
    expect(dataset.transactions).toHaveLength(40);
    expect(dataset.events).toHaveLength(10);
    expect(dataset.products).toHaveLength(3);
    expect(generateSampleData(options)).toEqual(dataset);
  });

  it('should generate rows the loader accepts', () => {
    const dataset = generateSampleData(options);

    expect(dataset.customers.every((row) => customerRowSchema.safeParse(row).success)).toBe(true);
    expect(dataset.transactions.every((row) => transactionRowSchema.safeParse(row).success)).toBe(true);
  });

  it('should reference only generated customers', () => {
    const dataset = generateSampleData(options);
    const ids = new Set(dataset.customers.map((row) => row.customer_id));

    expect(dataset.transactions.every((row) => ids.has(row.customer_id))).toBe(true);
  });

  it('should write CSV files that load into a snapshot', async () => {
    const directory = await mkdtemp(path.join(os.tmpdir(), 'sample-data-'));
    try {
      await writeSampleData(generateSampleData(options), directory);

      const header = (await readFile(path.join(directory, 'transactions.csv'), 'utf8')).split('\n')[0];
      expect(header).toBe(
        'transaction_id,customer_id,transaction_date,amount,currency,transaction_type,merchant,category,payment_method,status'
      );

      const snapshot = await new DataLoaderService().loadFromCsv(directory);
      expect(snapshot.summary()).toEqual({ customers: 5, transactions: 40, events: 10, products: 3 });
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
