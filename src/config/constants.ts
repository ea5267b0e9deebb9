export const CONSTANTS = {
  MS_PER_DAY: 1000 * 60 * 60 * 24,

  // Churn windows (in days)
  CHURN: {
    AT_RISK_DAYS: 60,
    CHURN_DAYS: 90,
    MAX_DAYS: 3650,
  },

  // Sigma multipliers for outlier thresholds
  ANOMALY: {
    AMOUNT_SIGMA: 3,
    DAILY_VOLUME_SIGMA: 2,
    RECENT_LIMIT: 10,
  },

  SEGMENTATION: {
    HIGH_VALUE_PERCENTILE: 0.8,
    TOP_CUSTOMERS_LIMIT: 10,
    // Ordered from the highest cut point down
    TIERS: [
      { name: 'Platinum', percentile: 0.95 },
      { name: 'Gold', percentile: 0.8 },
      { name: 'Silver', percentile: 0.6 },
      { name: 'Bronze', percentile: 0.4 },
    ],
  },

  CUSTOMER_ANALYTICS: {
    ACQUISITION_MONTHS: 12,
  },

  TREND_PERIODS: ['daily', 'weekly', 'monthly'],

  TRANSACTION_STATUSES: ['completed', 'pending', 'failed'],

  DATA_FILES: {
    customers: 'customers.csv',
    transactions: 'transactions.csv',
    events: 'events.csv',
    products: 'products.csv',
  },
} as const;

export type TrendPeriod = (typeof CONSTANTS.TREND_PERIODS)[number];
export type TransactionStatus = (typeof CONSTANTS.TRANSACTION_STATUSES)[number];
export type TierName = (typeof CONSTANTS.SEGMENTATION.TIERS)[number]['name'];
