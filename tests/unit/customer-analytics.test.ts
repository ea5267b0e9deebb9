/**
 * Customer Analytics Unit Tests
 */

import {
  calculateCustomerAnalytics,
  customerAcquisition,
} from '../../src/analytics-engine/calculators/customer-analytics';
import { makeCustomer, makeTransaction } from '../fixtures/commerce';

describe('CustomerAnalytics', () => {
  const customers = [
    makeCustomer('C1', '2023-01-15T00:00:00.000Z'),
    makeCustomer('C2', '2023-01-20T00:00:00.000Z'),
    makeCustomer('C3', '2023-03-02T00:00:00.000Z'),
    makeCustomer('C4', '2024-02-01T00:00:00.000Z'),
  ];

  const transactions = [
    makeTransaction('C1', 100, '2024-01-01'),
    makeTransaction('C1', 200, '2024-01-05'),
    makeTransaction('C2', 50, '2024-01-07'),
    makeTransaction('C3', 400, '2024-02-01'),
    makeTransaction('C3', 100, '2024-02-02'),
    makeTransaction('C3', 100, '2024-02-03'),
  ];

  describe('calculateCustomerAnalytics', () => {
    it('should summarise lifetime value, frequency and acquisition', () => {
      expect(calculateCustomerAnalytics(customers, transactions)).toEqual({
        totalCustomers: 4,
        customersWithPurchases: 3,
        customerLifetimeValue: {
          mean: 316.67,
          median: 300,
          percentile75: 450,
          percentile95: 570,
        },
        purchaseFrequency: {
          mean: 2,
          median: 2,
          oneTimeBuyers: 1,
          repeatCustomers: 2,
        },
        customerAcquisition: [
          { month: '2023-01', customers: 2 },
          { month: '2023-03', customers: 1 },
          { month: '2024-02', customers: 1 },
        ],
      });
    });

    it('should return zero values without transactions', () => {
      const result = calculateCustomerAnalytics(customers, []);

      expect(result.customersWithPurchases).toBe(0);
      expect(result.customerLifetimeValue).toEqual({ mean: 0, median: 0, percentile75: 0, percentile95: 0 });
      expect(result.purchaseFrequency).toEqual({ mean: 0, median: 0, oneTimeBuyers: 0, repeatCustomers: 0 });
    });
  });

  describe('customerAcquisition', () => {
    it('should keep only the most recent months', () => {
      const registrations = Array.from({ length: 14 }, (_, i) =>
        makeCustomer(`R${i}`, new Date(Date.UTC(2023, i, 10)).toISOString())
      );

      const result = customerAcquisition(registrations);

      expect(result).toHaveLength(12);
      expect(result[0].month).toBe('2023-03');
      expect(result[11].month).toBe('2024-02');
    });
  });
});
