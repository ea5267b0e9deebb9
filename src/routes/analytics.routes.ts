import { FastifyInstance } from 'fastify';
import type { RevenueTrendQuery } from '../schemas/validation';
import type { RouteOptions } from './index';

export default async function analyticsRoutes(app: FastifyInstance, opts: RouteOptions) {
  const { analytics } = opts.controllers;

  // period: daily | weekly | monthly
  app.get<{ Querystring: RevenueTrendQuery }>('/revenue', analytics.getRevenueTrends);

  app.get('/customers', analytics.getCustomerAnalytics);
}
