import type { Knex } from 'knex';
import type { Customer, CustomerEvent, EntityName, Product, Transaction } from '../types';

/**
 * Read access to the raw entity tables.
 */
export interface CommerceTableReader {
  hasTable(table: EntityName): Promise<boolean>;
  selectAll(table: EntityName): Promise<unknown[]>;
}

export function createKnexTableReader(db: Knex): CommerceTableReader {
  return {
    hasTable: (table) => db.schema.hasTable(table),
    selectAll: async (table) => db(table).select('*'),
  };
}

export type TableRow = Record<string, string | number | boolean | Date | null>;

const orNull = <T>(value: T | undefined): T | null => (value === undefined ? null : value);

export function customerToRow(c: Customer): TableRow {
  return {
    customer_id: c.customerId,
    first_name: orNull(c.firstName),
    last_name: orNull(c.lastName),
    email: orNull(c.email),
    phone: orNull(c.phone),
    registration_date: c.registrationDate,
    age: orNull(c.age),
    city: orNull(c.city),
    state: orNull(c.state),
    segment: orNull(c.segment),
    is_active: orNull(c.isActive),
  };
}

export function transactionToRow(t: Transaction): TableRow {
  return {
    transaction_id: t.transactionId,
    customer_id: t.customerId,
    transaction_date: t.transactionDate,
    amount: t.amount,
    currency: orNull(t.currency),
    transaction_type: orNull(t.transactionType),
    merchant: orNull(t.merchant),
    category: orNull(t.category),
    payment_method: orNull(t.paymentMethod),
    status: t.status,
  };
}

export function eventToRow(e: CustomerEvent): TableRow {
  return {
    event_id: e.eventId,
    customer_id: e.customerId,
    timestamp: e.timestamp,
    event_type: e.eventType,
    page_url: orNull(e.pageUrl),
    session_id: orNull(e.sessionId),
    device_type: orNull(e.deviceType),
    browser: orNull(e.browser),
  };
}

export function productToRow(p: Product): TableRow {
  return {
    product_id: p.productId,
    name: p.name,
    category: p.category,
    subcategory: orNull(p.subcategory),
    price: p.price,
    cost: orNull(p.cost),
    stock_quantity: orNull(p.stockQuantity),
    supplier: orNull(p.supplier),
    created_date: orNull(p.createdDate),
    is_active: orNull(p.isActive),
  };
}
