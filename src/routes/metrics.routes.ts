import { FastifyInstance } from 'fastify';
import type { AnomalyQuery, ChurnQuery } from '../schemas/validation';
import type { RouteOptions } from './index';

export default async function metricsRoutes(app: FastifyInstance, opts: RouteOptions) {
  const { analytics } = opts.controllers;

  app.get<{ Querystring: ChurnQuery }>('/churn', analytics.getChurnMetrics);

  app.get<{ Querystring: AnomalyQuery }>('/anomalies', analytics.getAnomalies);
}
