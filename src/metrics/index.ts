import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import pino from 'pino';
import type { EventRecord } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyState = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  lastMs: number;
};

type LatencySnapshot = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
  lastMs: number;
};

type HistogramSnapshot = Record<string, number>;

type DetectorMetricState = {
  counters: Map<string, number>;
  lastRunAt: number | null;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
};

type DetectorSnapshot = {
  counters: CounterMap;
  lastRunAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
};

type MetricsSnapshot = {
  createdAt: string;
  events: {
    total: number;
    lastEventAt: string | null;
    byDetector: CounterMap;
    bySeverity: CounterMap;
  };
  logs: {
    byLevel: CounterMap;
    byComponent: Record<string, CounterMap>;
    currentLevel: string;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  counters: CounterMap;
  gauges: CounterMap;
  latencies: Record<string, LatencySnapshot>;
  histograms: Record<string, HistogramSnapshot>;
  detectors: Record<string, DetectorSnapshot>;
};

type PrometheusOptions = {
  prefix?: string;
  labels?: Record<string, string>;
};

type PrometheusLogLevelOptions = PrometheusOptions & {
  levelMetricName?: string;
  stateMetricName?: string;
};

const DEFAULT_PREFIX = 'camlight';
const LATENCY_BUCKETS_MS = [5, 10, 17, 25, 33, 50, 100, 250, 500, 1000];

class MetricsRegistry {
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();
  private readonly latencyStats = new Map<string, LatencyState>();
  private readonly histograms = new Map<string, Map<string, number>>();
  private readonly detectorMetrics = new Map<string, DetectorMetricState>();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByComponent = new Map<string, Map<string, number>>();
  private readonly eventsByDetector = new Map<string, number>();
  private readonly eventsBySeverity = new Map<string, number>();
  private readonly resetEmitter = new EventEmitter();
  private currentLogLevel = 'info';
  private totalEvents = 0;
  private lastEventTimestamp: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;

  reset() {
    this.counters.clear();
    this.gauges.clear();
    this.latencyStats.clear();
    this.histograms.clear();
    this.detectorMetrics.clear();
    this.logLevelCounters.clear();
    this.logLevelByComponent.clear();
    this.eventsByDetector.clear();
    this.eventsBySeverity.clear();
    this.totalEvents = 0;
    this.lastEventTimestamp = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.resetEmitter.emit('reset');
  }

  onReset(listener: () => void) {
    this.resetEmitter.on('reset', listener);
    return () => {
      this.resetEmitter.off('reset', listener);
    };
  }

  incrementCounter(name: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    this.counters.set(name, (this.counters.get(name) ?? 0) + amount);
  }

  setGauge(name: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    this.gauges.set(name, value);
  }

  adjustGauge(name: string, delta: number) {
    this.setGauge(name, (this.gauges.get(name) ?? 0) + delta);
  }

  incrementLogLevel(level: string, context?: { message?: string; component?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.component) {
      const componentMap = this.logLevelByComponent.get(context.component) ?? new Map<string, number>();
      componentMap.set(normalized, (componentMap.get(normalized) ?? 0) + 1);
      this.logLevelByComponent.set(context.component, componentMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string) {
    this.currentLogLevel = level.toLowerCase();
  }

  recordEvent(event: EventRecord) {
    this.totalEvents += 1;
    this.lastEventTimestamp = event.ts;
    this.eventsByDetector.set(event.detector, (this.eventsByDetector.get(event.detector) ?? 0) + 1);
    this.eventsBySeverity.set(event.severity, (this.eventsBySeverity.get(event.severity) ?? 0) + 1);
  }

  recordDetectorError(detector: string, message: string) {
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    const now = Date.now();
    state.lastRunAt = now;
    state.lastErrorAt = now;
    state.lastErrorMessage = message;
    state.counters.set('errors', (state.counters.get('errors') ?? 0) + 1);
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs)) {
      return;
    }
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0,
      lastMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs),
      lastMs: durationMs
    });

    const histogram = this.histograms.get(metric) ?? new Map<string, number>();
    const bucket = resolveHistogramBucket(durationMs, LATENCY_BUCKETS_MS);
    histogram.set(bucket, (histogram.get(bucket) ?? 0) + 1);
    this.histograms.set(metric, histogram);
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportLogLevelCountersForPrometheus(options: PrometheusLogLevelOptions = {}) {
    const prefix = options.prefix ?? DEFAULT_PREFIX;
    const baseLabels = options.labels ?? {};
    const lines: string[] = [];

    const levelMetric = options.levelMetricName ?? `${prefix}_log_level_total`;
    lines.push(`# HELP ${levelMetric} Total log events grouped by Pino level`);
    lines.push(`# TYPE ${levelMetric} counter`);
    const levels = Array.from(this.logLevelCounters.entries()).sort(
      ([a], [b]) => resolveLevelIndex(a) - resolveLevelIndex(b)
    );
    for (const [level, value] of levels) {
      lines.push(`${levelMetric}${formatLabels({ ...baseLabels, level })} ${value}`);
    }

    const stateMetric = options.stateMetricName ?? `${prefix}_log_level_state`;
    lines.push(`# HELP ${stateMetric} Current active Pino log level`);
    lines.push(`# TYPE ${stateMetric} gauge`);
    lines.push(`${stateMetric}${formatLabels({ ...baseLabels, level: this.currentLogLevel })} 1`);

    return `${lines.join('\n')}\n`;
  }

  exportPrometheus(options: PrometheusOptions = {}) {
    const prefix = options.prefix ?? DEFAULT_PREFIX;
    const baseLabels = options.labels ?? {};
    const lines: string[] = [];

    for (const [name, value] of sortedEntries(this.counters)) {
      const metric = `${prefix}_${sanitizeMetricName(name)}_total`;
      lines.push(`# TYPE ${metric} counter`);
      lines.push(`${metric}${formatLabels(baseLabels)} ${value}`);
    }

    for (const [name, value] of sortedEntries(this.gauges)) {
      const metric = `${prefix}_${sanitizeMetricName(name)}`;
      lines.push(`# TYPE ${metric} gauge`);
      lines.push(`${metric}${formatLabels(baseLabels)} ${value}`);
    }

    for (const [name, stats] of sortedEntries(this.latencyStats)) {
      const metric = `${prefix}_${sanitizeMetricName(name)}_ms`;
      const histogram = this.histograms.get(name) ?? new Map<string, number>();
      lines.push(`# TYPE ${metric} histogram`);
      let cumulative = 0;
      for (const bound of LATENCY_BUCKETS_MS) {
        cumulative += histogram.get(`<${bound}`) ?? 0;
        lines.push(`${metric}_bucket${formatLabels({ ...baseLabels, le: String(bound) })} ${cumulative}`);
      }
      lines.push(`${metric}_bucket${formatLabels({ ...baseLabels, le: '+Inf' })} ${stats.count}`);
      lines.push(`${metric}_sum${formatLabels(baseLabels)} ${roundTo(stats.totalMs, 3)}`);
      lines.push(`${metric}_count${formatLabels(baseLabels)} ${stats.count}`);
    }

    for (const [detector, state] of sortedEntries(this.detectorMetrics)) {
      for (const [counter, value] of sortedEntries(state.counters)) {
        const metric = `${prefix}_detector_${sanitizeMetricName(counter)}_total`;
        lines.push(`${metric}${formatLabels({ ...baseLabels, detector })} ${value}`);
      }
    }

    const eventsMetric = `${prefix}_events_total`;
    lines.push(`# TYPE ${eventsMetric} counter`);
    for (const [detector, value] of sortedEntries(this.eventsByDetector)) {
      lines.push(`${eventsMetric}${formatLabels({ ...baseLabels, detector })} ${value}`);
    }

    const body = lines.length > 0 ? `${lines.join('\n')}\n` : '';
    return body + this.exportLogLevelCountersForPrometheus({ prefix, labels: baseLabels });
  }

  snapshot(): MetricsSnapshot {
    const latencies: Record<string, LatencySnapshot> = {};
    for (const [metric, stats] of this.latencyStats) {
      latencies[metric] = {
        count: stats.count,
        totalMs: stats.totalMs,
        minMs: stats.count === 0 ? 0 : stats.minMs,
        maxMs: stats.maxMs,
        averageMs: stats.count === 0 ? 0 : stats.totalMs / stats.count,
        lastMs: stats.lastMs
      };
    }

    const detectors: Record<string, DetectorSnapshot> = {};
    for (const [detector, state] of this.detectorMetrics) {
      detectors[detector] = {
        counters: mapFrom(state.counters),
        lastRunAt: state.lastRunAt ? new Date(state.lastRunAt).toISOString() : null,
        lastErrorAt: state.lastErrorAt ? new Date(state.lastErrorAt).toISOString() : null,
        lastErrorMessage: state.lastErrorMessage
      };
    }

    const histograms: Record<string, HistogramSnapshot> = {};
    for (const [metric, histogram] of this.histograms) {
      histograms[metric] = mapFrom(histogram);
    }

    return {
      createdAt: new Date().toISOString(),
      events: {
        total: this.totalEvents,
        lastEventAt: this.lastEventTimestamp ? new Date(this.lastEventTimestamp).toISOString() : null,
        byDetector: mapFrom(this.eventsByDetector),
        bySeverity: mapFrom(this.eventsBySeverity)
      },
      logs: {
        byLevel: mapFrom(this.logLevelCounters),
        byComponent: mapFromNested(this.logLevelByComponent),
        currentLevel: this.currentLogLevel,
        lastErrorAt: this.lastErrorAt ? new Date(this.lastErrorAt).toISOString() : null,
        lastErrorMessage: this.lastErrorMessage
      },
      counters: mapFrom(this.counters),
      gauges: mapFrom(this.gauges),
      latencies,
      histograms,
      detectors
    };
  }
}

function getDetectorMetricState(map: Map<string, DetectorMetricState>, detector: string) {
  const existing = map.get(detector);
  if (existing) {
    return existing;
  }
  const created: DetectorMetricState = {
    counters: new Map(),
    lastRunAt: null,
    lastErrorAt: null,
    lastErrorMessage: null
  };
  map.set(detector, created);
  return created;
}

function mapFrom(map: Map<string, number>): CounterMap {
  return Object.fromEntries(map.entries());
}

function mapFromNested(map: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  for (const [key, nested] of map) {
    result[key] = mapFrom(nested);
  }
  return result;
}

function sortedEntries<T>(map: Map<string, T>): Array<[string, T]> {
  return Array.from(map.entries()).sort(([a], [b]) => a.localeCompare(b));
}

function resolveHistogramBucket(value: number, buckets: number[]) {
  for (const bucket of buckets) {
    if (value < bucket) {
      return `<${bucket}`;
    }
  }
  return `${buckets[buckets.length - 1]}+`;
}

function resolveLevelIndex(level: string) {
  const value = pino.levels.values[level];
  return typeof value === 'number' ? value : Number.MAX_SAFE_INTEGER;
}

function sanitizeMetricName(name: string) {
  return name.replace(/[^a-zA-Z0-9_]/g, '_');
}

function formatLabels(labels: Record<string, string>) {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }
  const formatted = entries
    .map(([key, value]) => `${key}="${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`)
    .join(',');
  return `{${formatted}}`;
}

function roundTo(value: number, digits: number) {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

const defaultRegistry = new MetricsRegistry();

export type {
  DetectorSnapshot,
  HistogramSnapshot,
  LatencySnapshot,
  MetricsSnapshot,
  PrometheusLogLevelOptions,
  PrometheusOptions
};
export { MetricsRegistry };
export default defaultRegistry;
