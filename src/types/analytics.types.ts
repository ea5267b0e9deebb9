import type { TierName, TrendPeriod } from '../config/constants';

// =============================================================================
// Churn
// =============================================================================

export interface ChurnMetrics {
  churnRate: number;
  churnedCustomers: number;
  atRiskCustomers: number;
  // Customers with purchases inside the at-risk window
  recentlyActiveCustomers: number;
  totalCustomers: number;
  // totalCustomers - churnedCustomers
  activeCustomers: number;
  customersWithoutPurchases: number;
  // Customer ids seen in transactions but absent from the customer collection
  orphanCustomers: number;
  atRiskThresholdDays: number;
  churnThresholdDays: number;
  asOf: string;
}

// =============================================================================
// Anomalies
// =============================================================================

export interface AnomalousTransaction {
  transactionId: string;
  customerId: string;
  amount: number;
  transactionDate: string;
}

export interface LargeTransactionAnomalies {
  count: number;
  threshold: number;
  mean: number;
  standardDeviation: number;
  totalValue: number;
  avgAmount: number;
}

export interface DailyVolumeAnomalies {
  anomalousDays: number;
  upperThreshold: number;
  lowerThreshold: number;
  normalDailyRange: { low: number; high: number };
  daysAnalyzed: number;
  anomalousDates: string[];
}

export interface AnomalyMetrics {
  largeTransactions: LargeTransactionAnomalies;
  dailyVolumeAnomalies: DailyVolumeAnomalies;
  recentAnomalies: AnomalousTransaction[];
}

// =============================================================================
// Segmentation
// =============================================================================

export interface CustomerSpendProfile {
  customerId: string;
  transactionCount: number;
  totalSpent: number;
  avgOrderValue: number;
  firstPurchase: Date;
  lastPurchase: Date;
}

export interface RenderedSpendProfile {
  customerId: string;
  transactionCount: number;
  totalSpent: number;
  avgOrderValue: number;
  firstPurchase: string;
  lastPurchase: string;
}

export interface ValueTier {
  segment: TierName;
  customerCount: number;
  avgRevenue: number;
  totalRevenue: number;
  minSpend: number;
  maxSpend: number;
  percentage: number;
  lowerBound: number;
  // null for the open-ended top tier
  upperBound: number | null;
}

export interface SegmentationResult {
  highValueThreshold: number;
  totalHighValueCustomers: number;
  profiledCustomers: number;
  customerSegments: ValueTier[];
  topCustomers: RenderedSpendProfile[];
}

// =============================================================================
// Revenue trends
// =============================================================================

export interface TimeBucketMetrics {
  period: string;
  bucketStart: string;
  transactions: number;
  revenue: number;
  avgOrderValue: number;
  uniqueCustomers: number;
}

export interface RevenueTrendSummary {
  avgRevenuePerBucket: number;
  peakBucket: TimeBucketMetrics | null;
  // null when the first bucket has zero revenue
  revenueGrowthPct: number | null;
}

export interface RevenueTrends {
  period: TrendPeriod;
  totalRevenue: number;
  totalTransactions: number;
  dataPoints: number;
  revenueTrends: TimeBucketMetrics[];
  summary: RevenueTrendSummary;
}

// =============================================================================
// Customer analytics
// =============================================================================

export interface CustomerAnalytics {
  totalCustomers: number;
  customersWithPurchases: number;
  customerLifetimeValue: {
    mean: number;
    median: number;
    percentile75: number;
    percentile95: number;
  };
  purchaseFrequency: {
    mean: number;
    median: number;
    oneTimeBuyers: number;
    repeatCustomers: number;
  };
  customerAcquisition: { month: string; customers: number }[];
}
