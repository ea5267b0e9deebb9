import { FastifyReply, FastifyRequest } from 'fastify';
import { AnalyticsEngine } from '../analytics-engine/analytics-engine';
import { config } from '../config';
import { getPrometheusMetrics } from '../utils/metrics';
import { BaseController } from './base.controller';
import { DatabaseProbe, notConfigured } from './health.controller';

export const ANALYTICS_ENDPOINTS = [
  '/metrics/churn',
  '/metrics/anomalies',
  '/segments/high_value',
  '/analytics/revenue',
  '/analytics/customers',
] as const;

export class StatusController extends BaseController {
  private readonly startedAt = new Date();

  constructor(
    private readonly engine: AnalyticsEngine,
    private readonly probeDatabase: DatabaseProbe = notConfigured
  ) {
    super();
  }

  status = async (_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    const snapshot = this.engine.getSnapshot();

    return this.success(reply, {
      service: config.serviceName,
      version: config.version,
      environment: config.env,
      startTime: this.startedAt.toISOString(),
      uptimeSeconds: Math.floor((Date.now() - this.startedAt.getTime()) / 1000),
      database: await this.probeDatabase(),
      data: snapshot
        ? {
            status: 'loaded',
            source: snapshot.source,
            loadedAt: snapshot.loadedAt.toISOString(),
            rows: snapshot.summary(),
          }
        : { status: 'not_loaded' },
      endpoints: ANALYTICS_ENDPOINTS,
    });
  };

  prometheus = async (_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    return reply.type('text/plain; version=0.0.4').send(getPrometheusMetrics());
  };
}
