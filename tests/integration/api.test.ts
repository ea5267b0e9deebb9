/**
 * HTTP API Integration Tests
 */

import { FastifyInstance } from 'fastify';
import { AnalyticsEngine } from '../../src/analytics-engine/analytics-engine';
import { buildApp } from '../../src/app';
import { daysBefore, makeCustomer, makeSnapshot, makeTransaction, NOW } from '../fixtures/commerce';

const snapshot = makeSnapshot(
  [makeCustomer('C1'), makeCustomer('C2'), makeCustomer('C3')],
  [
    makeTransaction('C1', 100, daysBefore(NOW, 10)),
    makeTransaction('C2', 250, daysBefore(NOW, 75)),
    makeTransaction('C3', 40, daysBefore(NOW, 150)),
    makeTransaction('C1', 60, daysBefore(NOW, 40), 'failed'),
  ]
);

describe('HTTP API', () => {
  let app: FastifyInstance;
  let unloadedApp: FastifyInstance;

  beforeAll(async () => {
    app = await buildApp({ engine: new AnalyticsEngine(snapshot, { clock: () => NOW }), rateLimit: false });
    unloadedApp = await buildApp({ engine: new AnalyticsEngine(null), rateLimit: false });
    await app.ready();
    await unloadedApp.ready();
  });

  afterAll(async () => {
    await app.close();
    await unloadedApp.close();
  });

  describe('GET /', () => {
    it('should describe the service', async () => {
      const response = await app.inject({ method: 'GET', url: '/' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.success).toBe(true);
      expect(body.data.service).toBe('commerce-analytics-service');
      expect(body.data.status).toBe('running');
    });
  });

  describe('health', () => {
    it('should report healthy when data is loaded', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual({ status: 'healthy', dataLoaded: true, database: 'not_configured' });
    });

    it('should return 503 when data is not loaded', async () => {
      const response = await unloadedApp.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      const body = response.json();
      expect(body.success).toBe(false);
      expect(body.error).toEqual({ message: 'Data not loaded', code: 'DATA_UNAVAILABLE', statusCode: 503 });
      expect(typeof body.timestamp).toBe('string');
    });

    it('should stay live without data but not ready', async () => {
      const live = await unloadedApp.inject({ method: 'GET', url: '/health/live' });
      const ready = await unloadedApp.inject({ method: 'GET', url: '/health/ready' });

      expect(live.statusCode).toBe(200);
      expect(ready.statusCode).toBe(503);
    });
  });

  describe('GET /metrics/churn', () => {
    it('should return churn metrics in the success envelope', async () => {
      const response = await app.inject({ method: 'GET', url: '/metrics/churn' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.message).toBe('Churn metrics calculated');
      expect(body.data).toMatchObject({
        churnRate: 33.33,
        churnedCustomers: 1,
        atRiskCustomers: 1,
        recentlyActiveCustomers: 1,
        totalCustomers: 3,
        activeCustomers: 2,
      });
    });

    it('should honour threshold parameters', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/metrics/churn',
        query: { at_risk_days: '30', churn_days: '60' },
      });

      expect(response.json().data.churnedCustomers).toBe(2);
    });

    it('should return 503 when data is not loaded', async () => {
      const response = await unloadedApp.inject({ method: 'GET', url: '/metrics/churn' });

      expect(response.statusCode).toBe(503);
      expect(response.json().error.code).toBe('DATA_UNAVAILABLE');
    });
  });

  describe('GET /metrics/anomalies', () => {
    it('should return anomaly metrics', async () => {
      const response = await app.inject({ method: 'GET', url: '/metrics/anomalies' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.largeTransactions.count).toBe(0);
      expect(response.json().data.dailyVolumeAnomalies.daysAnalyzed).toBe(4);
    });
  });

  describe('GET /segments/high_value', () => {
    it('should return segments with the requested top list size', async () => {
      const response = await app.inject({ method: 'GET', url: '/segments/high_value?top_limit=1' });

      expect(response.statusCode).toBe(200);
      const data = response.json().data;
      expect(data.topCustomers).toHaveLength(1);
      expect(data.topCustomers[0].customerId).toBe('C2');
    });

    it('should reject a non-numeric limit', async () => {
      const response = await app.inject({ method: 'GET', url: '/segments/high_value?top_limit=many' });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toEqual({
        message: 'top_limit must be a number',
        code: 'INVALID_PARAMETER',
        statusCode: 400,
        detail: 'top_limit: top_limit must be a number',
      });
    });
  });

  describe('GET /analytics/revenue', () => {
    it('should aggregate by the requested period', async () => {
      const response = await app.inject({ method: 'GET', url: '/analytics/revenue?period=monthly&status=completed' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.message).toBe('Revenue trends calculated (monthly)');
      expect(body.data.period).toBe('monthly');
      expect(body.data.totalRevenue).toBe(390);
      expect(body.data.totalTransactions).toBe(3);
    });

    it('should reject an unknown period with 400', async () => {
      const response = await app.inject({ method: 'GET', url: '/analytics/revenue?period=invalid' });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.success).toBe(false);
      expect(body.error.code).toBe('INVALID_PARAMETER');
      expect(body.error.message).toBe('Invalid period. Use: daily, weekly, or monthly');
    });
  });

  describe('GET /analytics/customers', () => {
    it('should return customer analytics', async () => {
      const response = await app.inject({ method: 'GET', url: '/analytics/customers' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.totalCustomers).toBe(3);
      expect(response.json().data.customersWithPurchases).toBe(3);
    });
  });

  describe('status and metrics', () => {
    it('should report data status and row counts', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/status' });

      expect(response.statusCode).toBe(200);
      const data = response.json().data;
      expect(data.data).toEqual({
        status: 'loaded',
        source: 'memory',
        loadedAt: NOW.toISOString(),
        rows: { customers: 3, transactions: 4, events: 0, products: 0 },
      });
      expect(data.database).toBe('not_configured');
      expect(data.endpoints).toContain('/analytics/revenue');
    });

    it('should report missing data in status', async () => {
      const response = await unloadedApp.inject({ method: 'GET', url: '/api/status' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data.data).toEqual({ status: 'not_loaded' });
    });

    it('should expose request counters in Prometheus format', async () => {
      await app.inject({ method: 'GET', url: '/analytics/customers' });
      const response = await app.inject({ method: 'GET', url: '/prometheus/metrics' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
      expect(response.body).toContain(
        'analytics_http_requests_total{method="GET",path="/analytics/customers",status="200"}'
      );
    });
  });

  describe('unknown routes', () => {
    it('should use the error envelope', async () => {
      const response = await app.inject({ method: 'GET', url: '/nope' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error).toEqual({
        message: 'Route GET /nope not found',
        code: 'NOT_FOUND',
        statusCode: 404,
      });
    });
  });
});
