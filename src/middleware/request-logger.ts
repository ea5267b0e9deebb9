/**
 * Structured request/response logging with sensitive headers redacted.
 */

import { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { createLogger } from '../utils/logger';

const log = createLogger('http');

const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-api-key'];
const SKIP_PATHS = ['/health', '/prometheus/metrics'];

export function sanitizeHeaders(headers: FastifyRequest['headers']): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(headers)) {
    sanitized[key] = SENSITIVE_HEADERS.includes(key.toLowerCase()) ? '[REDACTED]' : value;
  }
  return sanitized;
}

export function shouldSkip(url: string): boolean {
  return SKIP_PATHS.some((p) => url.startsWith(p));
}

export async function logRequestStart(request: FastifyRequest): Promise<void> {
  if (shouldSkip(request.url)) return;

  log.info(`${request.method} ${request.url}`, {
    event: 'request_started',
    requestId: request.id,
    headers: sanitizeHeaders(request.headers),
    ip: request.ip,
  });
}

export async function logRequestCompletion(request: FastifyRequest, reply: FastifyReply): Promise<void> {
  if (shouldSkip(request.url)) return;

  const durationMs = reply.elapsedTime;
  log.info(`${request.method} ${request.url} ${reply.statusCode} ${durationMs.toFixed(0)}ms`, {
    event: 'request_completed',
    requestId: request.id,
    statusCode: reply.statusCode,
    durationMs: durationMs.toFixed(2),
  });
}

export async function registerRequestLogger(fastify: FastifyInstance): Promise<void> {
  fastify.addHook('onRequest', logRequestStart);
  fastify.addHook('onResponse', logRequestCompletion);
}
