/**
 * Input Validation Schemas
 *
 * Row schemas accept both CSV text and database values (snake_case columns)
 * and produce the typed entities. Query schemas turn raw request parameters
 * into analyzer parameters.
 */

import { z } from 'zod';
import { CONSTANTS, TransactionStatus, TrendPeriod } from '../config/constants';
import type { Customer, CustomerEvent, Product, Transaction } from '../types';
import { addUtcDays, parseTimestamp } from '../utils/date-buckets';

// =============================================================================
// Common Schemas
// =============================================================================

const blankToUndefined = (value: unknown): unknown => {
  if (value === null) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
};

const requiredString = z.preprocess(
  (value) => (typeof value === 'number' ? String(value) : blankToUndefined(value)),
  z.string().trim().min(1)
);

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const requiredNumber = z.preprocess(blankToUndefined, z.coerce.number().finite());

const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().finite().optional());

const optionalInteger = z.preprocess(blankToUndefined, z.coerce.number().int().optional());

const optionalBoolean = z.preprocess((value) => {
  const normalized = blankToUndefined(value);
  if (typeof normalized === 'string') {
    return ['true', '1', 'yes', 't'].includes(normalized.trim().toLowerCase());
  }
  if (typeof normalized === 'number') return normalized !== 0;
  return normalized;
}, z.boolean().optional());

const isValidTimestamp = (value: string | Date): boolean => !Number.isNaN(parseTimestamp(value).getTime());

const timestampSchema = z
  .union([z.date(), z.string().trim().min(1)])
  .refine(isValidTimestamp, { message: 'Invalid timestamp' })
  .transform(parseTimestamp);

const optionalTimestamp = z.preprocess(blankToUndefined, timestampSchema.optional());

const statusSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(CONSTANTS.TRANSACTION_STATUSES)
);

// =============================================================================
// Row Schemas
// =============================================================================

export const customerRowSchema: z.ZodType<Customer, z.ZodTypeDef, unknown> = z
  .object({
    customer_id: requiredString,
    registration_date: timestampSchema,
    first_name: optionalString,
    last_name: optionalString,
    email: optionalString,
    phone: optionalString,
    age: optionalInteger,
    city: optionalString,
    state: optionalString,
    segment: optionalString,
    is_active: optionalBoolean,
  })
  .transform((row) => ({
    customerId: row.customer_id,
    registrationDate: row.registration_date,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    phone: row.phone,
    age: row.age,
    city: row.city,
    state: row.state,
    segment: row.segment,
    isActive: row.is_active,
  }));

export const transactionRowSchema: z.ZodType<Transaction, z.ZodTypeDef, unknown> = z
  .object({
    transaction_id: requiredString,
    customer_id: requiredString,
    transaction_date: timestampSchema,
    amount: requiredNumber,
    status: statusSchema,
    currency: optionalString,
    transaction_type: optionalString,
    merchant: optionalString,
    category: optionalString,
    payment_method: optionalString,
  })
  .transform((row) => ({
    transactionId: row.transaction_id,
    customerId: row.customer_id,
    transactionDate: row.transaction_date,
    amount: row.amount,
    status: row.status,
    currency: row.currency,
    transactionType: row.transaction_type,
    merchant: row.merchant,
    category: row.category,
    paymentMethod: row.payment_method,
  }));

export const eventRowSchema: z.ZodType<CustomerEvent, z.ZodTypeDef, unknown> = z
  .object({
    event_id: requiredString,
    customer_id: requiredString,
    timestamp: timestampSchema,
    event_type: requiredString,
    page_url: optionalString,
    session_id: optionalString,
    device_type: optionalString,
    browser: optionalString,
  })
  .transform((row) => ({
    eventId: row.event_id,
    customerId: row.customer_id,
    timestamp: row.timestamp,
    eventType: row.event_type,
    pageUrl: row.page_url,
    sessionId: row.session_id,
    deviceType: row.device_type,
    browser: row.browser,
  }));

export const productRowSchema: z.ZodType<Product, z.ZodTypeDef, unknown> = z
  .object({
    product_id: requiredString,
    name: requiredString,
    category: requiredString,
    price: requiredNumber,
    subcategory: optionalString,
    cost: optionalNumber,
    stock_quantity: optionalInteger,
    supplier: optionalString,
    created_date: optionalTimestamp,
    is_active: optionalBoolean,
  })
  .transform((row) => ({
    productId: row.product_id,
    name: row.name,
    category: row.category,
    price: row.price,
    subcategory: row.subcategory,
    cost: row.cost,
    stockQuantity: row.stock_quantity,
    supplier: row.supplier,
    createdDate: row.created_date,
    isActive: row.is_active,
  }));

// =============================================================================
// Analytics Query Schemas
// =============================================================================

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

const queryTimestamp = (name: string) =>
  z
    .string()
    .trim()
    .refine(isValidTimestamp, { message: `${name} must be an ISO-8601 date or timestamp` });

const limitSchema = (name: string, fallback: number) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(1, `${name} must be between 1 and 100`)
    .max(100, `${name} must be between 1 and 100`)
    .default(fallback);

export interface ChurnQuery {
  at_risk_days?: number | string;
  churn_days?: number | string;
  as_of?: string;
}

export interface ChurnParams {
  atRiskDays: number;
  churnDays: number;
  asOf?: Date;
}

export function createChurnQuerySchema(defaults: {
  atRiskDays: number;
  churnDays: number;
}): z.ZodType<ChurnParams, z.ZodTypeDef, unknown> {
  const days = (name: string, fallback: number) =>
    z.coerce
      .number({ invalid_type_error: `${name} must be a number` })
      .int(`${name} must be an integer`)
      .min(0, `${name} must be between 0 and ${CONSTANTS.CHURN.MAX_DAYS}`)
      .max(CONSTANTS.CHURN.MAX_DAYS, `${name} must be between 0 and ${CONSTANTS.CHURN.MAX_DAYS}`)
      .default(fallback);

  return z
    .object({
      at_risk_days: days('at_risk_days', defaults.atRiskDays),
      churn_days: days('churn_days', defaults.churnDays),
      as_of: queryTimestamp('as_of').optional(),
    })
    .refine((query) => query.at_risk_days < query.churn_days, {
      message: 'at_risk_days must be less than churn_days',
      path: ['at_risk_days'],
    })
    .transform((query) => ({
      atRiskDays: query.at_risk_days,
      churnDays: query.churn_days,
      asOf: query.as_of === undefined ? undefined : parseTimestamp(query.as_of),
    }));
}

export interface AnomalyQuery {
  recent_limit?: number | string;
}

export interface AnomalyParams {
  recentLimit: number;
}

export const anomalyQuerySchema: z.ZodType<AnomalyParams, z.ZodTypeDef, unknown> = z
  .object({
    recent_limit: limitSchema('recent_limit', CONSTANTS.ANOMALY.RECENT_LIMIT),
  })
  .transform((query) => ({ recentLimit: query.recent_limit }));

export interface SegmentationQuery {
  top_limit?: number | string;
}

export interface SegmentationParams {
  topLimit: number;
}

export const segmentationQuerySchema: z.ZodType<SegmentationParams, z.ZodTypeDef, unknown> = z
  .object({
    top_limit: limitSchema('top_limit', CONSTANTS.SEGMENTATION.TOP_CUSTOMERS_LIMIT),
  })
  .transform((query) => ({ topLimit: query.top_limit }));

export interface RevenueTrendQuery {
  period?: string;
  status?: string;
  start_date?: string;
  end_date?: string;
}

export interface RevenueTrendParams {
  period: TrendPeriod;
  status?: TransactionStatus;
  startDate?: Date;
  endDate?: Date;
}

export const revenueTrendQuerySchema: z.ZodType<RevenueTrendParams, z.ZodTypeDef, unknown> = z
  .object({
    period: z
      .enum(CONSTANTS.TREND_PERIODS, {
        errorMap: () => ({ message: 'Invalid period. Use: daily, weekly, or monthly' }),
      })
      .default('daily'),
    status: z
      .enum(CONSTANTS.TRANSACTION_STATUSES, {
        errorMap: () => ({ message: 'Invalid status. Use: completed, pending, or failed' }),
      })
      .optional(),
    start_date: queryTimestamp('start_date').optional(),
    end_date: queryTimestamp('end_date').optional(),
  })
  .transform((query) => ({
    period: query.period,
    status: query.status,
    startDate: query.start_date === undefined ? undefined : parseTimestamp(query.start_date),
    // A bare date closes the window at the end of that day
    endDate:
      query.end_date === undefined
        ? undefined
        : DATE_ONLY.test(query.end_date)
          ? new Date(addUtcDays(parseTimestamp(query.end_date), 1).getTime() - 1)
          : parseTimestamp(query.end_date),
  }))
  .refine(
    (params) => !params.startDate || !params.endDate || params.startDate.getTime() <= params.endDate.getTime(),
    { message: 'start_date must be before or equal to end_date', path: ['start_date'] }
  );

export type EmptyParams = Record<string, unknown>;

export const emptyQuerySchema: z.ZodType<EmptyParams, z.ZodTypeDef, unknown> = z
  .object({})
  .transform((): EmptyParams => ({}));
