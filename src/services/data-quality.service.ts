import { DataSnapshot } from '../models/data-snapshot';
import type { DataSummary } from '../types';

export interface DataQualityReport {
  rowCounts: DataSummary;
  negativeAmounts: number;
  orphanTransactions: number;
  missingEmails: number;
}

/**
 * Row-level checks run after a load; nothing here rejects data.
 */
export function buildDataQualityReport(snapshot: DataSnapshot): DataQualityReport {
  const customerIds = new Set(snapshot.customers.map((c) => c.customerId));

  return {
    rowCounts: snapshot.summary(),
    negativeAmounts: snapshot.transactions.filter((t) => t.amount < 0).length,
    orphanTransactions: snapshot.transactions.filter((t) => !customerIds.has(t.customerId)).length,
    missingEmails: snapshot.customers.filter((c) => !c.email).length,
  };
}
