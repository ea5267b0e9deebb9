import type { ChurnMetrics, Customer, Transaction } from '../../types';
import { wholeDaysBetween } from '../../utils/date-buckets';
import { roundTo, safeDivide } from '../../utils/statistics';

export interface ChurnOptions {
  now: Date;
  atRiskDays: number;
  churnDays: number;
}

export type RecencyClass = 'active' | 'at_risk' | 'churned';

export function classifyRecency(daysSinceLast: number, atRiskDays: number, churnDays: number): RecencyClass {
  if (daysSinceLast > churnDays) return 'churned';
  if (daysSinceLast > atRiskDays) return 'at_risk';
  return 'active';
}

/**
 * Recency-based churn classification. Only customers present in the customer
 * collection are classified, so the rate stays within [0, 100].
 */
export function calculateChurnMetrics(
  customers: readonly Customer[],
  transactions: readonly Transaction[],
  options: ChurnOptions
): ChurnMetrics {
  const { now, atRiskDays, churnDays } = options;

  const lastPurchase = new Map<string, Date>();
  for (const txn of transactions) {
    const current = lastPurchase.get(txn.customerId);
    if (!current || txn.transactionDate.getTime() > current.getTime()) {
      lastPurchase.set(txn.customerId, txn.transactionDate);
    }
  }

  const knownIds = new Set(customers.map((c) => c.customerId));
  const counts: Record<RecencyClass, number> = { active: 0, at_risk: 0, churned: 0 };
  let orphanCustomers = 0;

  lastPurchase.forEach((last, customerId) => {
    if (!knownIds.has(customerId)) {
      orphanCustomers++;
      return;
    }
    counts[classifyRecency(wholeDaysBetween(now, last), atRiskDays, churnDays)]++;
  });

  const totalCustomers = knownIds.size;
  const classified = counts.active + counts.at_risk + counts.churned;

  return {
    churnRate: roundTo(safeDivide(counts.churned, totalCustomers) * 100),
    churnedCustomers: counts.churned,
    atRiskCustomers: counts.at_risk,
    recentlyActiveCustomers: counts.active,
    totalCustomers,
    activeCustomers: totalCustomers - counts.churned,
    customersWithoutPurchases: totalCustomers - classified,
    orphanCustomers,
    atRiskThresholdDays: atRiskDays,
    churnThresholdDays: churnDays,
    asOf: now.toISOString(),
  };
}
