import { FastifyInstance } from 'fastify';
import { AnalyticsEngine } from './analytics-engine/analytics-engine';
import { buildApp } from './app';
import type { DatabaseProbe } from './controllers/health.controller';

export async function createServer(engine: AnalyticsEngine, probeDatabase?: DatabaseProbe): Promise<FastifyInstance> {
  const app = await buildApp({ engine, probeDatabase });
  return app;
}
