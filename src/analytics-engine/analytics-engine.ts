import { err, ok, Result } from 'neverthrow';
import type { z } from 'zod';
import { config } from '../config';
import { DataSnapshot } from '../models/data-snapshot';
import {
  anomalyQuerySchema,
  AnomalyParams,
  ChurnParams,
  createChurnQuerySchema,
  emptyQuerySchema,
  revenueTrendQuerySchema,
  segmentationQuerySchema,
} from '../schemas/validation';
import type {
  AnomalyMetrics,
  ChurnMetrics,
  CustomerAnalytics,
  RevenueTrends,
  SegmentationResult,
} from '../types';
import {
  AnalyticsError,
  ComputationError,
  DataUnavailableError,
  InvalidParameterError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import { analyticsMetrics, startTimer } from '../utils/metrics';
import { calculateAnomalyMetrics } from './calculators/anomaly-detector';
import { calculateChurnMetrics } from './calculators/churn-analyzer';
import { calculateCustomerAnalytics } from './calculators/customer-analytics';
import { calculateCustomerSegments } from './calculators/segmentation-engine';
import { calculateRevenueTrends } from './calculators/trend-aggregator';

type ParamSchema<P> = z.ZodType<P, z.ZodTypeDef, unknown>;

export type AnalysisName = 'churn' | 'anomalies' | 'segments' | 'revenue_trends' | 'customer_analytics';

export interface AnalyticsEngineOptions {
  clock?: () => Date;
  churnDefaults?: { atRiskDays: number; churnDays: number };
}

/**
 * Entry point for every analyzer. Each call checks readiness, validates its
 * parameters and then computes over the current snapshot; the first failure
 * wins and is returned, never thrown.
 */
export class AnalyticsEngine {
  private log = createLogger('AnalyticsEngine');
  private snapshot: DataSnapshot | null;
  private readonly clock: () => Date;
  private readonly churnSchema: ParamSchema<ChurnParams>;

  constructor(snapshot: DataSnapshot | null = null, options: AnalyticsEngineOptions = {}) {
    this.snapshot = snapshot;
    this.clock = options.clock ?? (() => new Date());
    this.churnSchema = createChurnQuerySchema(options.churnDefaults ?? config.analytics);
  }

  isReady(): boolean {
    return this.snapshot !== null;
  }

  getSnapshot(): DataSnapshot | null {
    return this.snapshot;
  }

  /**
   * Swap in a freshly loaded snapshot. Calls already running keep the one
   * they started with.
   */
  setSnapshot(snapshot: DataSnapshot | null): void {
    this.snapshot = snapshot;
  }

  getChurnMetrics(query: unknown = {}): Result<ChurnMetrics, AnalyticsError> {
    return this.run('churn', this.churnSchema, query, (data, params) =>
      calculateChurnMetrics(data.customers, data.transactions, {
        now: params.asOf ?? this.clock(),
        atRiskDays: params.atRiskDays,
        churnDays: params.churnDays,
      })
    );
  }

  getAnomalyMetrics(query: unknown = {}): Result<AnomalyMetrics, AnalyticsError> {
    return this.run('anomalies', anomalyQuerySchema, query, (data, params: AnomalyParams) =>
      calculateAnomalyMetrics(data.transactions, { recentLimit: params.recentLimit })
    );
  }

  getCustomerSegments(query: unknown = {}): Result<SegmentationResult, AnalyticsError> {
    return this.run('segments', segmentationQuerySchema, query, (data, params) =>
      calculateCustomerSegments(data.transactions, { topLimit: params.topLimit })
    );
  }

  getRevenueTrends(query: unknown = {}): Result<RevenueTrends, AnalyticsError> {
    return this.run('revenue_trends', revenueTrendQuerySchema, query, (data, params) =>
      calculateRevenueTrends(data.transactions, params)
    );
  }

  getCustomerAnalytics(query: unknown = {}): Result<CustomerAnalytics, AnalyticsError> {
    return this.run('customer_analytics', emptyQuerySchema, query, (data) =>
      calculateCustomerAnalytics(data.customers, data.transactions)
    );
  }

  private run<P, T>(
    analysis: AnalysisName,
    schema: ParamSchema<P>,
    query: unknown,
    compute: (snapshot: DataSnapshot, params: P) => T
  ): Result<T, AnalyticsError> {
    const snapshot = this.snapshot;
    if (!snapshot) {
      return err(new DataUnavailableError());
    }

    const parsed = schema.safeParse(query ?? {});
    if (!parsed.success) {
      return err(InvalidParameterError.fromZod(parsed.error));
    }

    const elapsed = startTimer();
    try {
      const result = compute(snapshot, parsed.data);
      analyticsMetrics.analysisCompleted(analysis, 'success', elapsed());
      return ok(result);
    } catch (error) {
      analyticsMetrics.analysisCompleted(analysis, 'error', elapsed());
      this.log.error(`Failed to calculate ${analysis}`, { error });
      return err(new ComputationError(`Failed to calculate ${analysis.replace(/_/g, ' ')}`));
    }
  }
}
