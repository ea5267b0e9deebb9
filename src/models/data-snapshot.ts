import type {
  CommerceDataset,
  Customer,
  CustomerEvent,
  DataSummary,
  Product,
  Transaction,
} from '../types';

export type SnapshotSource = 'csv' | 'database' | 'memory';

const copyDate = (date: Date): Date => new Date(date.getTime());

// Object.freeze does not reach a Date's internal time value, so dates are
// copied and the loader's instances never end up shared with analyzers.
function freezeRows<T extends object>(rows: readonly T[], copy: (row: T) => T): readonly Readonly<T>[] {
  return Object.freeze(rows.map((row) => Object.freeze(copy(row))));
}

const copyCustomer = (row: Customer): Customer => ({ ...row, registrationDate: copyDate(row.registrationDate) });

const copyTransaction = (row: Transaction): Transaction => ({
  ...row,
  transactionDate: copyDate(row.transactionDate),
});

const copyEvent = (row: CustomerEvent): CustomerEvent => ({ ...row, timestamp: copyDate(row.timestamp) });

const copyProduct = (row: Product): Product => ({
  ...row,
  createdDate: row.createdDate === undefined ? undefined : copyDate(row.createdDate),
});

/**
 * Immutable view of the four entity collections, loaded once and shared by
 * every analyzer call.
 */
export class DataSnapshot {
  readonly customers: readonly Readonly<Customer>[];
  readonly transactions: readonly Readonly<Transaction>[];
  readonly events: readonly Readonly<CustomerEvent>[];
  readonly products: readonly Readonly<Product>[];
  readonly loadedAt: Date;
  readonly source: SnapshotSource;

  constructor(
    dataset: Partial<CommerceDataset> & Pick<CommerceDataset, 'customers' | 'transactions'>,
    source: SnapshotSource = 'memory',
    loadedAt: Date = new Date()
  ) {
    this.customers = freezeRows(dataset.customers, copyCustomer);
    this.transactions = freezeRows(dataset.transactions, copyTransaction);
    this.events = freezeRows(dataset.events ?? [], copyEvent);
    this.products = freezeRows(dataset.products ?? [], copyProduct);
    this.source = source;
    this.loadedAt = new Date(loadedAt.getTime());
    Object.freeze(this);
  }

  summary(): DataSummary {
    return {
      customers: this.customers.length,
      transactions: this.transactions.length,
      events: this.events.length,
      products: this.products.length,
    };
  }
}
