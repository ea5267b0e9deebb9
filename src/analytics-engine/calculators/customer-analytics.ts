import { CONSTANTS } from '../../config/constants';
import type { Customer, CustomerAnalytics, Transaction } from '../../types';
import { toMonthKey } from '../../utils/date-buckets';
import { mean, quantileSorted, roundTo, sortAscending } from '../../utils/statistics';
import { buildSpendProfiles } from './spend-profiles';

/**
 * Registrations per UTC month, keeping only the most recent `months` months
 * that have at least one registration.
 */
export function customerAcquisition(
  customers: readonly Customer[],
  months: number = CONSTANTS.CUSTOMER_ANALYTICS.ACQUISITION_MONTHS
): CustomerAnalytics['customerAcquisition'] {
  const perMonth = new Map<string, number>();
  for (const customer of customers) {
    const key = toMonthKey(customer.registrationDate);
    perMonth.set(key, (perMonth.get(key) ?? 0) + 1);
  }

  return Array.from(perMonth, ([month, count]) => ({ month, customers: count }))
    .sort((a, b) => a.month.localeCompare(b.month))
    .slice(-months);
}

export function calculateCustomerAnalytics(
  customers: readonly Customer[],
  transactions: readonly Transaction[]
): CustomerAnalytics {
  const profiles = buildSpendProfiles(transactions);
  const lifetimeValues = sortAscending(profiles.map((p) => p.totalSpent));
  const frequencies = sortAscending(profiles.map((p) => p.transactionCount));
  const oneTimeBuyers = frequencies.filter((count) => count === 1).length;

  return {
    totalCustomers: customers.length,
    customersWithPurchases: profiles.length,
    customerLifetimeValue: {
      mean: roundTo(mean(lifetimeValues)),
      median: roundTo(quantileSorted(lifetimeValues, 0.5)),
      percentile75: roundTo(quantileSorted(lifetimeValues, 0.75)),
      percentile95: roundTo(quantileSorted(lifetimeValues, 0.95)),
    },
    purchaseFrequency: {
      mean: roundTo(mean(frequencies)),
      median: roundTo(quantileSorted(frequencies, 0.5)),
      oneTimeBuyers,
      repeatCustomers: profiles.length - oneTimeBuyers,
    },
    customerAcquisition: customerAcquisition(customers),
  };
}
