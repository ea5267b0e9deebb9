import type { CustomerSpendProfile, RenderedSpendProfile, Transaction } from '../../types';
import { roundTo } from '../../utils/statistics';

/**
 * Per-customer aggregates over every transaction, in first-seen order.
 * Customer ids without a matching customer record are kept.
 */
export function buildSpendProfiles(transactions: readonly Transaction[]): CustomerSpendProfile[] {
  const byCustomer = new Map<string, { count: number; total: number; first: Date; last: Date }>();

  for (const txn of transactions) {
    const existing = byCustomer.get(txn.customerId);
    if (!existing) {
      byCustomer.set(txn.customerId, {
        count: 1,
        total: txn.amount,
        first: txn.transactionDate,
        last: txn.transactionDate,
      });
      continue;
    }

    existing.count++;
    existing.total += txn.amount;
    if (txn.transactionDate.getTime() < existing.first.getTime()) existing.first = txn.transactionDate;
    if (txn.transactionDate.getTime() > existing.last.getTime()) existing.last = txn.transactionDate;
  }

  return Array.from(byCustomer, ([customerId, acc]) => ({
    customerId,
    transactionCount: acc.count,
    totalSpent: roundTo(acc.total),
    avgOrderValue: roundTo(acc.total / acc.count),
    firstPurchase: acc.first,
    lastPurchase: acc.last,
  }));
}

export function renderSpendProfile(profile: CustomerSpendProfile): RenderedSpendProfile {
  return {
    customerId: profile.customerId,
    transactionCount: profile.transactionCount,
    totalSpent: profile.totalSpent,
    avgOrderValue: profile.avgOrderValue,
    firstPurchase: profile.firstPurchase.toISOString(),
    lastPurchase: profile.lastPurchase.toISOString(),
  };
}
