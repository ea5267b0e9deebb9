import type { TransactionStatus, TrendPeriod } from '../../config/constants';
import type { RevenueTrends, RevenueTrendSummary, TimeBucketMetrics, Transaction } from '../../types';
import { bucketFor } from '../../utils/date-buckets';
import { roundTo, sum } from '../../utils/statistics';

export interface TrendOptions {
  period: TrendPeriod;
  status?: TransactionStatus;
  startDate?: Date;
  endDate?: Date;
}

interface BucketAccumulator {
  label: string;
  start: Date;
  transactions: number;
  revenue: number;
  customers: Set<string>;
}

export function filterTransactions(
  transactions: readonly Transaction[],
  options: Omit<TrendOptions, 'period'>
): Transaction[] {
  const { status, startDate, endDate } = options;
  return transactions.filter((txn) => {
    const time = txn.transactionDate.getTime();
    if (status && txn.status !== status) return false;
    if (startDate && time < startDate.getTime()) return false;
    if (endDate && time > endDate.getTime()) return false;
    return true;
  });
}

/**
 * One row per non-empty bucket, ascending by bucket start.
 */
export function aggregateBuckets(transactions: readonly Transaction[], period: TrendPeriod): TimeBucketMetrics[] {
  const buckets = new Map<string, BucketAccumulator>();

  for (const txn of transactions) {
    const bucket = bucketFor(txn.transactionDate, period);
    let acc = buckets.get(bucket.key);
    if (!acc) {
      acc = { label: bucket.label, start: bucket.start, transactions: 0, revenue: 0, customers: new Set() };
      buckets.set(bucket.key, acc);
    }
    acc.transactions++;
    acc.revenue += txn.amount;
    acc.customers.add(txn.customerId);
  }

  return Array.from(buckets.values())
    .sort((a, b) => a.start.getTime() - b.start.getTime())
    .map((acc) => ({
      period: acc.label,
      bucketStart: acc.start.toISOString(),
      transactions: acc.transactions,
      revenue: roundTo(acc.revenue),
      avgOrderValue: roundTo(acc.revenue / acc.transactions),
      uniqueCustomers: acc.customers.size,
    }));
}

export function summarizeBuckets(buckets: readonly TimeBucketMetrics[]): RevenueTrendSummary {
  if (buckets.length === 0) {
    return { avgRevenuePerBucket: 0, peakBucket: null, revenueGrowthPct: 0 };
  }

  const peakBucket = buckets.reduce((peak, bucket) => (bucket.revenue > peak.revenue ? bucket : peak));

  let revenueGrowthPct: number | null = 0;
  if (buckets.length >= 2) {
    const first = buckets[0].revenue;
    const last = buckets[buckets.length - 1].revenue;
    revenueGrowthPct = first === 0 ? null : roundTo((last / first - 1) * 100);
  }

  return {
    avgRevenuePerBucket: roundTo(sum(buckets.map((b) => b.revenue)) / buckets.length),
    peakBucket,
    revenueGrowthPct,
  };
}

export function calculateRevenueTrends(transactions: readonly Transaction[], options: TrendOptions): RevenueTrends {
  const filtered = filterTransactions(transactions, options);
  const revenueTrends = aggregateBuckets(filtered, options.period);

  return {
    period: options.period,
    totalRevenue: roundTo(sum(filtered.map((t) => t.amount))),
    totalTransactions: filtered.length,
    dataPoints: revenueTrends.length,
    revenueTrends,
    summary: summarizeBuckets(revenueTrends),
  };
}
