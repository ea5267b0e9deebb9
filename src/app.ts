import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { AnalyticsEngine } from './analytics-engine/analytics-engine';
import { config } from './config';
import { AnalyticsController } from './controllers/analytics.controller';
import { DatabaseProbe, HealthController, notConfigured } from './controllers/health.controller';
import { StatusController } from './controllers/status.controller';
import { registerRequestLogger } from './middleware/request-logger';
import { registerRequestMetrics } from './middleware/request-metrics';
import routes from './routes';
import type { ServiceErrorResponse } from './types';
import { AppError, NotFoundError } from './utils/errors';
import { logger } from './utils/logger';

export interface BuildAppOptions {
  engine: AnalyticsEngine;
  probeDatabase?: DatabaseProbe;
  rateLimit?: boolean;
}

function errorBody(message: string, code: string, statusCode: number, detail?: string): ServiceErrorResponse {
  return {
    success: false,
    error: { message, code, statusCode, ...(detail ? { detail } : {}) },
    timestamp: new Date().toISOString(),
  };
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { engine, probeDatabase = notConfigured } = options;

  const app = Fastify({
    logger:
      config.env === 'test'
        ? false
        : {
            level: config.env === 'development' ? 'debug' : 'info',
            transport:
              config.env === 'development'
                ? {
                    target: 'pino-pretty',
                    options: {
                      translateTime: 'HH:MM:ss Z',
                      ignore: 'pid,hostname',
                    },
                  }
                : undefined,
          },
    trustProxy: true,
    requestIdHeader: 'x-request-id',
    // Requests are logged through winston in the request logger hooks
    disableRequestLogging: true,
  });

  // Register plugins
  await app.register(cors, {
    origin: config.http.allowedOrigins.includes('*') ? true : config.http.allowedOrigins,
    methods: ['GET'],
  });

  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
      },
    },
  });

  if (options.rateLimit ?? config.env !== 'test') {
    await app.register(rateLimit, {
      global: true,
      max: config.http.rateLimitMax,
      timeWindow: config.http.rateLimitWindow,
    });
  }

  await registerRequestLogger(app);
  await registerRequestMetrics(app);

  await app.register(routes, {
    controllers: {
      analytics: new AnalyticsController(engine),
      health: new HealthController(engine, probeDatabase),
      status: new StatusController(engine, probeDatabase),
    },
  });

  app.setNotFoundHandler((request, reply) => {
    const error = new NotFoundError(`Route ${request.method} ${request.url}`);
    reply.status(error.statusCode).send(errorBody(error.message, error.code, error.statusCode));
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError | AppError, request, reply) => {
    if (error instanceof AppError) {
      reply.status(error.statusCode).send(errorBody(error.message, error.code, error.statusCode, error.detail));
      return;
    }

    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    if (statusCode >= 500) {
      logger.error('Unhandled request error', { error, path: request.url });
    }

    reply
      .status(statusCode)
      .send(
        errorBody(
          statusCode >= 500 ? 'Internal Server Error' : error.message,
          error.code ?? 'INTERNAL_ERROR',
          statusCode
        )
      );
  });

  return app;
}
