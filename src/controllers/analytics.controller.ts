import { FastifyReply, FastifyRequest } from 'fastify';
import { AnalyticsEngine } from '../analytics-engine/analytics-engine';
import type {
  AnomalyQuery,
  ChurnQuery,
  RevenueTrendQuery,
  SegmentationQuery,
} from '../schemas/validation';
import { BaseController } from './base.controller';

export class AnalyticsController extends BaseController {
  constructor(private readonly engine: AnalyticsEngine) {
    super();
  }

  getChurnMetrics = async (
    request: FastifyRequest<{ Querystring: ChurnQuery }>,
    reply: FastifyReply
  ): Promise<FastifyReply> => {
    return this.respond(reply, this.engine.getChurnMetrics(request.query), 'Churn metrics calculated');
  };

  getAnomalies = async (
    request: FastifyRequest<{ Querystring: AnomalyQuery }>,
    reply: FastifyReply
  ): Promise<FastifyReply> => {
    return this.respond(reply, this.engine.getAnomalyMetrics(request.query), 'Anomaly detection completed');
  };

  getHighValueSegments = async (
    request: FastifyRequest<{ Querystring: SegmentationQuery }>,
    reply: FastifyReply
  ): Promise<FastifyReply> => {
    return this.respond(reply, this.engine.getCustomerSegments(request.query), 'Customer segments calculated');
  };

  getRevenueTrends = async (
    request: FastifyRequest<{ Querystring: RevenueTrendQuery }>,
    reply: FastifyReply
  ): Promise<FastifyReply> => {
    const result = this.engine.getRevenueTrends(request.query);
    const period = result.isOk() ? result.value.period : 'daily';
    return this.respond(reply, result, `Revenue trends calculated (${period})`);
  };

  getCustomerAnalytics = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply> => {
    return this.respond(reply, this.engine.getCustomerAnalytics(request.query), 'Customer analytics calculated');
  };
}
