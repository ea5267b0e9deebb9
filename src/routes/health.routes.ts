import { FastifyInstance } from 'fastify';
import type { RouteOptions } from './index';

export default async function healthRoutes(app: FastifyInstance, opts: RouteOptions) {
  const { health } = opts.controllers;

  app.get('/', health.root);

  // Data and database status
  app.get('/health', health.health);

  app.get('/health/ready', health.readiness);

  app.get('/health/live', health.liveness);
}
