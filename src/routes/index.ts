import { FastifyInstance, FastifyPluginOptions } from 'fastify';
import type { AnalyticsController } from '../controllers/analytics.controller';
import type { HealthController } from '../controllers/health.controller';
import type { StatusController } from '../controllers/status.controller';
import analyticsRoutes from './analytics.routes';
import healthRoutes from './health.routes';
import metricsRoutes from './metrics.routes';
import segmentsRoutes from './segments.routes';
import statusRoutes from './status.routes';

export interface Controllers {
  analytics: AnalyticsController;
  health: HealthController;
  status: StatusController;
}

export interface RouteOptions extends FastifyPluginOptions {
  controllers: Controllers;
}

export default async function routes(fastify: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { controllers } = opts;

  await fastify.register(healthRoutes, { controllers });
  await fastify.register(statusRoutes, { controllers });
  await fastify.register(metricsRoutes, { controllers, prefix: '/metrics' });
  await fastify.register(segmentsRoutes, { controllers, prefix: '/segments' });
  await fastify.register(analyticsRoutes, { controllers, prefix: '/analytics' });
}
