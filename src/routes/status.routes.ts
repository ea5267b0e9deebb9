import { FastifyInstance } from 'fastify';
import type { RouteOptions } from './index';

export default async function statusRoutes(app: FastifyInstance, opts: RouteOptions) {
  const { status } = opts.controllers;

  app.get('/api/status', status.status);

  app.get('/prometheus/metrics', status.prometheus);
}
