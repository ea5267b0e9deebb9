/**
 * Metrics Utility
 *
 * In-process counters, gauges and histograms rendered in the Prometheus
 * text exposition format.
 */

// =============================================================================
// Types
// =============================================================================

interface MetricLabels {
  [key: string]: string | number;
}

interface CounterEntry {
  value: number;
  labels: MetricLabels;
}

interface GaugeEntry {
  value: number;
  labels: MetricLabels;
  timestamp: number;
}

interface HistogramEntry {
  sum: number;
  count: number;
  buckets: number[];
  labels: MetricLabels;
}

// =============================================================================
// In-Memory Metrics Store (for Prometheus scraping)
// =============================================================================

const counters = new Map<string, CounterEntry[]>();
const gauges = new Map<string, GaugeEntry[]>();
const histograms = new Map<string, HistogramEntry[]>();

const HISTOGRAM_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

function sameLabels(a: MetricLabels, b: MetricLabels): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

function formatLabels(labels: MetricLabels): string {
  return Object.entries(labels).map(([k, v]) => `${k}="${v}"`).join(',');
}

// =============================================================================
// Counter Operations
// =============================================================================

export function incrementCounter(name: string, value = 1, labels: MetricLabels = {}): void {
  const existing = counters.get(name) || [];

  const entry = existing.find(e => sameLabels(e.labels, labels));
  if (entry) {
    entry.value += value;
  } else {
    existing.push({ value, labels });
  }

  counters.set(name, existing);
}

// =============================================================================
// Gauge Operations
// =============================================================================

export function setGauge(name: string, value: number, labels: MetricLabels = {}): void {
  const existing = gauges.get(name) || [];
  const idx = existing.findIndex(e => sameLabels(e.labels, labels));

  const entry = { value, labels, timestamp: Date.now() };
  if (idx >= 0) {
    existing[idx] = entry;
  } else {
    existing.push(entry);
  }

  gauges.set(name, existing);
}

// =============================================================================
// Histogram Operations
// =============================================================================

export function observeHistogram(name: string, value: number, labels: MetricLabels = {}): void {
  const existing = histograms.get(name) || [];
  const entry = existing.find(e => sameLabels(e.labels, labels));

  if (entry) {
    entry.sum += value;
    entry.count++;
    for (let i = 0; i < HISTOGRAM_BUCKETS.length; i++) {
      if (value <= HISTOGRAM_BUCKETS[i]) {
        entry.buckets[i]++;
      }
    }
  } else {
    const buckets = HISTOGRAM_BUCKETS.map(b => (value <= b ? 1 : 0));
    existing.push({ sum: value, count: 1, buckets, labels });
  }

  histograms.set(name, existing);
}

// =============================================================================
// Timer Utility
// =============================================================================

export function startTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    return Number(end - start) / 1_000_000_000; // seconds
  };
}

// =============================================================================
// Pre-defined Analytics Metrics
// =============================================================================

export const analyticsMetrics = {
  // Request metrics
  requestsTotal: (method: string, path: string, status: number) =>
    incrementCounter('analytics_http_requests_total', 1, { method, path, status: status.toString() }),

  requestDuration: (method: string, path: string, durationSec: number) =>
    observeHistogram('analytics_http_request_duration_seconds', durationSec, { method, path }),

  // Engine metrics
  analysisCompleted: (analysis: string, status: 'success' | 'error', durationSec: number) => {
    observeHistogram('analytics_analysis_duration_seconds', durationSec, { analysis, status });
    incrementCounter('analytics_analysis_total', 1, { analysis, status });
  },

  dataRows: (entity: string, count: number) => setGauge('analytics_data_rows', count, { entity }),
};

// =============================================================================
// Prometheus Export Format
// =============================================================================

export function getPrometheusMetrics(): string {
  const lines: string[] = [];

  counters.forEach((values, name) => {
    lines.push(`# TYPE ${name} counter`);
    values.forEach(({ value, labels }) => {
      const labelStr = formatLabels(labels);
      lines.push(`${name}${labelStr ? `{${labelStr}}` : ''} ${value}`);
    });
  });

  gauges.forEach((values, name) => {
    lines.push(`# TYPE ${name} gauge`);
    values.forEach(({ value, labels }) => {
      const labelStr = formatLabels(labels);
      lines.push(`${name}${labelStr ? `{${labelStr}}` : ''} ${value}`);
    });
  });

  histograms.forEach((values, name) => {
    lines.push(`# TYPE ${name} histogram`);
    values.forEach(({ sum, count, buckets, labels }) => {
      const labelStr = formatLabels(labels);
      const baseLabels = labelStr ? `${labelStr},` : '';

      buckets.forEach((bucketCount, i) => {
        lines.push(`${name}_bucket{${baseLabels}le="${HISTOGRAM_BUCKETS[i]}"} ${bucketCount}`);
      });
      lines.push(`${name}_bucket{${baseLabels}le="+Inf"} ${count}`);
      lines.push(`${name}_sum${labelStr ? `{${labelStr}}` : ''} ${sum}`);
      lines.push(`${name}_count${labelStr ? `{${labelStr}}` : ''} ${count}`);
    });
  });

  return lines.join('\n');
}

export function resetMetrics(): void {
  counters.clear();
  gauges.clear();
  histograms.clear();
}
