/**
 * Sample data generator
 *
 * Writes customers.csv, transactions.csv, events.csv and products.csv with a
 * fixed seed so repeated runs produce the same files for the same `now`.
 *
 * Usage: npm run generate:data -- [outputDir]
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import { config } from '../config';
import { CONSTANTS } from '../config/constants';
import { addUtcDays } from '../utils/date-buckets';
import { createLogger } from '../utils/logger';
import vocabulary from './sample-vocabulary.json';

const log = createLogger('generate-sample-data');

export interface SampleDataOptions {
  customers: number;
  transactions: number;
  events: number;
  products: number;
  seed: number;
  now: Date;
}

export const DEFAULT_SAMPLE_OPTIONS: Omit<SampleDataOptions, 'now'> = {
  customers: 1000,
  transactions: 10000,
  events: 5000,
  products: 500,
  seed: 42,
};

export type CsvRow = Record<string, string | number | boolean>;

export interface SampleDataset {
  customers: CsvRow[];
  transactions: CsvRow[];
  events: CsvRow[];
  products: CsvRow[];
}

// mulberry32
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

class SampleRandom {
  constructor(private readonly next: () => number) {}

  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  float(min: number, max: number, decimals = 2): number {
    return parseFloat((this.next() * (max - min) + min).toFixed(decimals));
  }

  pick<T>(items: readonly T[]): T {
    return items[Math.floor(this.next() * items.length)];
  }

  weighted<T>(items: readonly T[], weights: readonly number[]): T {
    const total = weights.reduce((a, b) => a + b, 0);
    let roll = this.next() * total;
    for (let i = 0; i < items.length; i++) {
      roll -= weights[i];
      if (roll < 0) return items[i];
    }
    return items[items.length - 1];
  }
}

const pad = (value: number, width: number): string => String(value).padStart(width, '0');

function formatDateTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function generateSampleData(options: SampleDataOptions): SampleDataset {
  const random = new SampleRandom(createRandom(options.seed));
  const { now } = options;

  const daysAgo = (min: number, max: number): Date =>
    new Date(addUtcDays(now, -random.int(min, max)).getTime() - random.int(0, 86399) * 1000);

  const customerId = () => `CUST_${pad(random.int(1, options.customers), 6)}`;

  const customers = Array.from({ length: options.customers }, (_, i) => ({
    customer_id: `CUST_${pad(i + 1, 6)}`,
    first_name: random.pick(vocabulary.firstNames),
    last_name: random.pick(vocabulary.lastNames),
    email: `customer${i + 1}@example.com`,
    phone: `+1${random.int(1000000000, 9999999999)}`,
    registration_date: formatDate(daysAgo(1, 365)),
    age: random.int(18, 80),
    city: random.pick(vocabulary.cities),
    state: random.pick(vocabulary.states),
    segment: random.pick(vocabulary.segments),
    is_active: random.weighted([true, false], [0.8, 0.2]),
  }));

  const transactions = Array.from({ length: options.transactions }, (_, i) => ({
    transaction_id: `TXN_${pad(i + 1, 8)}`,
    customer_id: customerId(),
    transaction_date: formatDateTime(daysAgo(0, 365)),
    amount: random.float(10, 1000),
    currency: random.weighted(vocabulary.currencies, [0.7, 0.2, 0.1]),
    transaction_type: random.pick(vocabulary.transactionTypes),
    merchant: random.pick(vocabulary.merchants),
    category: random.pick(vocabulary.transactionCategories),
    payment_method: random.pick(vocabulary.paymentMethods),
    status: random.weighted(CONSTANTS.TRANSACTION_STATUSES, [0.85, 0.1, 0.05]),
  }));

  const events = Array.from({ length: options.events }, (_, i) => ({
    event_id: `EVT_${pad(i + 1, 8)}`,
    customer_id: customerId(),
    timestamp: formatDateTime(daysAgo(0, 90)),
    event_type: random.pick(vocabulary.eventTypes),
    page_url: `/page/${random.int(1, 50)}`,
    session_id: `SESS_${pad(random.int(1, 2000), 6)}`,
    device_type: random.weighted(vocabulary.deviceTypes, [0.5, 0.4, 0.1]),
    browser: random.pick(vocabulary.browsers),
  }));

  const products = Array.from({ length: options.products }, (_, i) => {
    const category = random.pick(vocabulary.productCategories);
    return {
      product_id: `PROD_${pad(i + 1, 6)}`,
      name: `${category} Product ${i + 1}`,
      category,
      subcategory: `${category} Sub ${random.int(1, 5)}`,
      price: random.float(10, 500),
      cost: random.float(5, 300),
      stock_quantity: random.int(0, 1000),
      supplier: `Supplier ${random.int(1, 20)}`,
      created_date: formatDate(daysAgo(30, 730)),
      is_active: random.weighted([true, false], [0.9, 0.1]),
    };
  });

  return { customers, transactions, events, products };
}

export async function writeSampleData(dataset: SampleDataset, directory: string): Promise<void> {
  await mkdir(directory, { recursive: true });

  const entities = ['customers', 'transactions', 'events', 'products'] as const;
  for (const entity of entities) {
    const filePath = path.join(directory, CONSTANTS.DATA_FILES[entity]);
    await writeFile(filePath, `${Papa.unparse(dataset[entity], { newline: '\n' })}\n`, 'utf8');
    log.info(`Wrote ${dataset[entity].length} ${entity} records`, { filePath });
  }
}

async function main(): Promise<void> {
  const directory = process.argv[2] ?? config.dataSource.csvPath;
  const dataset = generateSampleData({ ...DEFAULT_SAMPLE_OPTIONS, now: new Date() });
  await writeSampleData(dataset, directory);
  log.info('Sample data generated', { directory });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    log.error('Sample data generation failed', { error });
    process.exitCode = 1;
  });
}
