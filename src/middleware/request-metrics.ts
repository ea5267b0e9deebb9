import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { analyticsMetrics } from '../utils/metrics';

export async function recordRequestMetrics(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  // Route pattern keeps label cardinality bounded
  const path = request.routeOptions.url ?? 'unmatched';
  analyticsMetrics.requestsTotal(request.method, path, reply.statusCode);
  analyticsMetrics.requestDuration(request.method, path, reply.elapsedTime / 1000);
}

export async function registerRequestMetrics(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onResponse', recordRequestMetrics);
}
