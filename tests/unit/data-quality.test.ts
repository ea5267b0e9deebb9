/**
 * Data Quality Report Unit Tests
 */

import { buildDataQualityReport } from '../../src/services/data-quality.service';
import { makeCustomer, makeSnapshot, makeTransaction } from '../fixtures/commerce';

describe('buildDataQualityReport', () => {
  it('should count suspicious rows', () => {
    const noEmail = { ...makeCustomer('C2'), email: undefined };
    const snapshot = makeSnapshot(
      [makeCustomer('C1'), noEmail],
      [
        makeTransaction('C1', 20, '2024-01-01'),
        makeTransaction('C1', -5, '2024-01-02'),
        makeTransaction('GHOST', 10, '2024-01-03'),
      ]
    );

    expect(buildDataQualityReport(snapshot)).toEqual({
      rowCounts: { customers: 2, transactions: 3, events: 0, products: 0 },
      negativeAmounts: 1,
      orphanTransactions: 1,
      missingEmails: 1,
    });
  });
});
