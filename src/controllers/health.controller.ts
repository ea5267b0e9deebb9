import { FastifyReply, FastifyRequest } from 'fastify';
import { AnalyticsEngine } from '../analytics-engine/analytics-engine';
import { config } from '../config';
import type { ComponentStatus } from '../types';
import { DataUnavailableError } from '../utils/errors';
import { BaseController } from './base.controller';

export type DatabaseProbe = () => Promise<ComponentStatus>;

export const notConfigured: DatabaseProbe = async () => 'not_configured';

export class HealthController extends BaseController {
  constructor(
    private readonly engine: AnalyticsEngine,
    private readonly probeDatabase: DatabaseProbe = notConfigured
  ) {
    super();
  }

  root = async (_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    return this.success(reply, {
      service: config.serviceName,
      version: config.version,
      status: 'running',
      timestamp: new Date().toISOString(),
    });
  };

  health = async (_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    if (!this.engine.isReady()) {
      return this.handleError(new DataUnavailableError('Data not loaded'), reply);
    }

    return this.success(reply, {
      status: 'healthy',
      dataLoaded: true,
      database: await this.probeDatabase(),
    });
  };

  readiness = async (_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    if (!this.engine.isReady()) {
      return this.handleError(new DataUnavailableError('Service not ready'), reply);
    }
    return this.success(reply, { status: 'ready' });
  };

  liveness = async (_request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    return this.success(reply, { status: 'alive' });
  };
}
