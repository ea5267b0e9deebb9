import { CONSTANTS } from '../../config/constants';
import type {
  AnomalousTransaction,
  AnomalyMetrics,
  DailyVolumeAnomalies,
  LargeTransactionAnomalies,
  Transaction,
} from '../../types';
import { toDateKey } from '../../utils/date-buckets';
import { mean, roundTo, sampleStdDev, sum } from '../../utils/statistics';

export interface AnomalyOptions {
  recentLimit: number;
  amountSigma?: number;
  dailyVolumeSigma?: number;
}

/**
 * Transactions whose amount sits above mean + k standard deviations.
 */
export function detectAmountAnomalies(
  transactions: readonly Transaction[],
  sigma: number = CONSTANTS.ANOMALY.AMOUNT_SIGMA
): { summary: LargeTransactionAnomalies; flagged: Transaction[] } {
  const amounts = transactions.map((t) => t.amount);
  const avg = mean(amounts);
  const std = sampleStdDev(amounts);
  const threshold = avg + sigma * std;

  const flagged = transactions.filter((t) => t.amount > threshold);
  const flaggedAmounts = flagged.map((t) => t.amount);

  return {
    summary: {
      count: flagged.length,
      threshold: roundTo(threshold),
      mean: roundTo(avg),
      standardDeviation: roundTo(std),
      totalValue: roundTo(sum(flaggedAmounts)),
      avgAmount: roundTo(mean(flaggedAmounts)),
    },
    flagged,
  };
}

/**
 * Days whose transaction count falls outside mean ± k standard deviations of
 * the daily counts. Only days with at least one transaction are counted.
 */
export function detectDailyVolumeAnomalies(
  transactions: readonly Transaction[],
  sigma: number = CONSTANTS.ANOMALY.DAILY_VOLUME_SIGMA
): DailyVolumeAnomalies {
  const perDay = new Map<string, number>();
  for (const txn of transactions) {
    const key = toDateKey(txn.transactionDate);
    perDay.set(key, (perDay.get(key) ?? 0) + 1);
  }

  const counts = Array.from(perDay.values());
  const avg = mean(counts);
  const std = sampleStdDev(counts);
  const upper = avg + sigma * std;
  const lower = Math.max(0, avg - sigma * std);

  const anomalousDates = Array.from(perDay)
    .filter(([, count]) => count > upper || count < lower)
    .map(([day]) => day)
    .sort();

  return {
    anomalousDays: anomalousDates.length,
    upperThreshold: roundTo(upper),
    lowerThreshold: roundTo(lower),
    normalDailyRange: { low: roundTo(avg - std), high: roundTo(avg + std) },
    daysAnalyzed: perDay.size,
    anomalousDates,
  };
}

export function mostRecent(flagged: readonly Transaction[], limit: number): AnomalousTransaction[] {
  return [...flagged]
    .sort((a, b) => b.transactionDate.getTime() - a.transactionDate.getTime())
    .slice(0, limit)
    .map((t) => ({
      transactionId: t.transactionId,
      customerId: t.customerId,
      amount: t.amount,
      transactionDate: t.transactionDate.toISOString(),
    }));
}

export function calculateAnomalyMetrics(
  transactions: readonly Transaction[],
  options: AnomalyOptions
): AnomalyMetrics {
  const amount = detectAmountAnomalies(transactions, options.amountSigma);

  return {
    largeTransactions: amount.summary,
    dailyVolumeAnomalies: detectDailyVolumeAnomalies(transactions, options.dailyVolumeSigma),
    recentAnomalies: mostRecent(amount.flagged, options.recentLimit),
  };
}
