import { FastifyInstance } from 'fastify';
import type { SegmentationQuery } from '../schemas/validation';
import type { RouteOptions } from './index';

export default async function segmentsRoutes(app: FastifyInstance, opts: RouteOptions) {
  const { analytics } = opts.controllers;

  app.get<{ Querystring: SegmentationQuery }>('/high_value', analytics.getHighValueSegments);
}
