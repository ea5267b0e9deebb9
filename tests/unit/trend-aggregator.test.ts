/**
 * Trend Aggregator Unit Tests
 */

import {
  aggregateBuckets,
  calculateRevenueTrends,
  summarizeBuckets,
} from '../../src/analytics-engine/calculators/trend-aggregator';
import { makeTransaction } from '../fixtures/commerce';

describe('TrendAggregator', () => {
  const twoMonths = [
    makeTransaction('C1', 100, '2024-01-15T10:00:00.000Z'),
    makeTransaction('C1', 60, '2024-02-10T10:00:00.000Z'),
    makeTransaction('C2', 90, '2024-02-20T10:00:00.000Z'),
  ];

  describe('calculateRevenueTrends', () => {
    it('should compute monthly buckets and growth', () => {
      const result = calculateRevenueTrends(twoMonths, { period: 'monthly' });

      expect(result.revenueTrends).toEqual([
        {
          period: '2024-01',
          bucketStart: '2024-01-01T00:00:00.000Z',
          transactions: 1,
          revenue: 100,
          avgOrderValue: 100,
          uniqueCustomers: 1,
        },
        {
          period: '2024-02',
          bucketStart: '2024-02-01T00:00:00.000Z',
          transactions: 2,
          revenue: 150,
          avgOrderValue: 75,
          uniqueCustomers: 2,
        },
      ]);
      expect(result.period).toBe('monthly');
      expect(result.totalRevenue).toBe(250);
      expect(result.totalTransactions).toBe(3);
      expect(result.dataPoints).toBe(2);
      expect(result.summary.avgRevenuePerBucket).toBe(125);
      expect(result.summary.peakBucket?.period).toBe('2024-02');
      expect(result.summary.revenueGrowthPct).toBe(50);
    });

    it('should label weekly buckets with their Monday to Sunday range', () => {
      const result = calculateRevenueTrends(
        [
          makeTransaction('C1', 10, '2024-03-10T23:00:00.000Z'),
          makeTransaction('C1', 20, '2024-03-11T01:00:00.000Z'),
        ],
        { period: 'weekly' }
      );

      expect(result.revenueTrends.map((b) => b.period)).toEqual(['2024-03-04/2024-03-10', '2024-03-11/2024-03-17']);
    });

    it('should emit daily buckets in ascending order without gaps filled', () => {
      const result = calculateRevenueTrends(
        [
          makeTransaction('C1', 10, '2024-03-05T12:00:00.000Z'),
          makeTransaction('C2', 10, '2024-03-01T12:00:00.000Z'),
        ],
        { period: 'daily' }
      );

      expect(result.revenueTrends.map((b) => b.period)).toEqual(['2024-03-01', '2024-03-05']);
    });

    it('should apply the status filter to buckets and totals alike', () => {
      const result = calculateRevenueTrends(
        [...twoMonths, makeTransaction('C3', 500, '2024-02-25T10:00:00.000Z', 'failed')],
        { period: 'monthly', status: 'completed' }
      );

      expect(result.totalRevenue).toBe(250);
      expect(result.totalTransactions).toBe(3);
      expect(result.revenueTrends[1].revenue).toBe(150);
    });

    it('should apply an inclusive date window', () => {
      const result = calculateRevenueTrends(twoMonths, {
        period: 'monthly',
        startDate: new Date('2024-02-10T10:00:00.000Z'),
        endDate: new Date('2024-02-20T10:00:00.000Z'),
      });

      expect(result.totalTransactions).toBe(2);
      expect(result.dataPoints).toBe(1);
    });

    it('should make bucket revenue add up to the total', () => {
      const transactions = Array.from({ length: 40 }, (_, i) =>
        makeTransaction(`C${i % 7}`, (i % 9) * 12.5 + 3, new Date(Date.UTC(2024, 0, 1 + i * 3, 9)))
      );

      for (const period of ['daily', 'weekly', 'monthly'] as const) {
        const result = calculateRevenueTrends(transactions, { period });
        const bucketSum = result.revenueTrends.reduce((total, bucket) => total + bucket.revenue, 0);
        const bucketCount = result.revenueTrends.reduce((total, bucket) => total + bucket.transactions, 0);

        expect(bucketSum).toBeCloseTo(result.totalRevenue, 6);
        expect(bucketCount).toBe(result.totalTransactions);
      }
    });

    it('should return zero totals without transactions', () => {
      expect(calculateRevenueTrends([], { period: 'daily' })).toEqual({
        period: 'daily',
        totalRevenue: 0,
        totalTransactions: 0,
        dataPoints: 0,
        revenueTrends: [],
        summary: { avgRevenuePerBucket: 0, peakBucket: null, revenueGrowthPct: 0 },
      });
    });
  });

  describe('summarizeBuckets', () => {
    it('should report zero growth for a single bucket', () => {
      const buckets = aggregateBuckets([makeTransaction('C1', 80, '2024-01-02')], 'monthly');

      expect(summarizeBuckets(buckets).revenueGrowthPct).toBe(0);
    });

    it('should report null growth when the first bucket has no revenue', () => {
      const buckets = aggregateBuckets(
        [
          makeTransaction('C1', 50, '2024-01-02'),
          makeTransaction('C1', -50, '2024-01-03'),
          makeTransaction('C1', 100, '2024-02-03'),
        ],
        'monthly'
      );

      expect(buckets[0].revenue).toBe(0);
      expect(summarizeBuckets(buckets).revenueGrowthPct).toBeNull();
    });

    it('should pick the first bucket among equal peaks', () => {
      const buckets = aggregateBuckets(
        [
          makeTransaction('C1', 70, '2024-01-02'),
          makeTransaction('C1', 70, '2024-02-02'),
          makeTransaction('C1', 10, '2024-03-02'),
        ],
        'monthly'
      );

      expect(summarizeBuckets(buckets).peakBucket?.period).toBe('2024-01');
    });
  });
});
