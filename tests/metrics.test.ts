import { afterEach, describe, expect, it } from 'vitest';
import metrics, { MetricsRegistry } from '../src/metrics/index.js';
import { getAvailableLogLevels, getLogLevel, onLogLevelChange, setLogLevel } from '../src/logger.js';

describe('MetricsRegistry', () => {
  it('MetricsCountersAndGauges', () => {
    const registry = new MetricsRegistry();
    registry.incrementCounter('device.writes');
    registry.incrementCounter('device.writes', 2);
    registry.incrementCounter('device.writes', Number.NaN);
    registry.setGauge('stream.active_sessions', 3);
    registry.adjustGauge('stream.active_sessions', -1);

    const snapshot = registry.snapshot();
    expect(snapshot.counters).toEqual({ 'device.writes': 3 });
    expect(snapshot.gauges).toEqual({ 'stream.active_sessions': 2 });
  });

  it('MetricsRecordsEventsAndDetectorErrors', () => {
    const registry = new MetricsRegistry();
    registry.recordEvent({
      ts: 1_000,
      source: 'camera',
      detector: 'motion',
      severity: 'info',
      message: 'Motion detected',
      meta: undefined
    });
    registry.recordDetectorError('notify', 'Pushover responded with 500');

    const snapshot = registry.snapshot();
    expect(snapshot.events).toEqual({
      total: 1,
      lastEventAt: '1970-01-01T00:00:01.000Z',
      byDetector: { motion: 1 },
      bySeverity: { info: 1 }
    });
    expect(snapshot.detectors.notify.counters).toEqual({ errors: 1 });
    expect(snapshot.detectors.notify.lastErrorMessage).toBe('Pushover responded with 500');
    expect(registry.exportPrometheus()).toContain('camlight_detector_errors_total{detector="notify"} 1\n');
    expect(registry.exportPrometheus()).toContain('\ncamlight_events_total{detector="motion"} 1\n');
  });

  it('MetricsLatencyTimer', async () => {
    const registry = new MetricsRegistry();
    await registry.time('snapshot.encode', async () => {
      await new Promise(resolve => setTimeout(resolve, 5));
    });
    registry.observeLatency('snapshot.encode', 2);

    const latency = registry.snapshot().latencies['snapshot.encode'];
    expect(latency.count).toBe(2);
    expect(latency.minMs).toBe(2);
    expect(latency.lastMs).toBe(2);
    expect(latency.maxMs).toBeGreaterThan(2);
  });

  it('MetricsPrometheusExport', () => {
    const registry = new MetricsRegistry();
    registry.incrementCounter('notify.sent', 2);
    registry.setGauge('stream.active_sessions', 3);
    registry.observeLatency('stream.encode', 12);

    expect(registry.exportPrometheus()).toBe(
      [
        '# TYPE camlight_notify_sent_total counter',
        'camlight_notify_sent_total 2',
        '# TYPE camlight_stream_active_sessions gauge',
        'camlight_stream_active_sessions 3',
        '# TYPE camlight_stream_encode_ms histogram',
        'camlight_stream_encode_ms_bucket{le="5"} 0',
        'camlight_stream_encode_ms_bucket{le="10"} 0',
        'camlight_stream_encode_ms_bucket{le="17"} 1',
        'camlight_stream_encode_ms_bucket{le="25"} 1',
        'camlight_stream_encode_ms_bucket{le="33"} 1',
        'camlight_stream_encode_ms_bucket{le="50"} 1',
        'camlight_stream_encode_ms_bucket{le="100"} 1',
        'camlight_stream_encode_ms_bucket{le="250"} 1',
        'camlight_stream_encode_ms_bucket{le="500"} 1',
        'camlight_stream_encode_ms_bucket{le="1000"} 1',
        'camlight_stream_encode_ms_bucket{le="+Inf"} 1',
        'camlight_stream_encode_ms_sum 12',
        'camlight_stream_encode_ms_count 1',
        '# TYPE camlight_events_total counter',
        '# HELP camlight_log_level_total Total log events grouped by Pino level',
        '# TYPE camlight_log_level_total counter',
        '# HELP camlight_log_level_state Current active Pino log level',
        '# TYPE camlight_log_level_state gauge',
        'camlight_log_level_state{level="info"} 1',
        ''
      ].join('\n')
    );
  });

  it('MetricsResetNotifiesListeners', () => {
    const registry = new MetricsRegistry();
    let resets = 0;
    const detach = registry.onReset(() => {
      resets += 1;
    });
    registry.incrementCounter('acquisition.frames');
    registry.reset();
    detach();
    registry.reset();

    expect(resets).toBe(1);
    expect(registry.snapshot().counters).toEqual({});
  });
});

describe('LogLevel', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
  });

  it('LogLevelChangesNotifyListeners', () => {
    const changes: Array<[string, string]> = [];
    const detach = onLogLevelChange((level, previous) => changes.push([level, previous]));

    expect(setLogLevel(' FATAL ')).toBe('fatal');
    expect(getLogLevel()).toBe('fatal');
    expect(setLogLevel('fatal')).toBe('fatal');
    detach();

    expect(changes).toEqual([['fatal', initial]]);
    expect(metrics.snapshot().logs.currentLevel).toBe('fatal');
  });

  it('LogLevelRejectsUnknownLevels', () => {
    expect(getAvailableLogLevels()).toContain('silent');
    expect(() => setLogLevel('loud')).toThrow(/^Unknown log level "loud" \(available: /);
    expect(getLogLevel()).toBe(initial);
  });

  it('LogLevelSurvivesMetricsReset', () => {
    setLogLevel('fatal');
    metrics.reset();
    expect(metrics.snapshot().logs.currentLevel).toBe('fatal');
  });
});
