import { beforeEach, describe, expect, it, vi } from 'vitest';
import { clearEvents, listEvents, pruneEventsOlderThan, storeEvent } from '../src/db.js';
import { EventBus } from '../src/eventBus.js';
import logger from '../src/logger.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import type { EventRecord } from '../src/types.js';

function record(overrides: Partial<EventRecord> = {}): EventRecord {
  return {
    ts: 1_000,
    source: 'camera',
    detector: 'motion',
    severity: 'info',
    message: 'Motion detected',
    meta: undefined,
    ...overrides
  };
}

describe('EventJournal', () => {
  beforeEach(() => {
    clearEvents();
  });

  it('JournalStoresAndListsNewestFirst', () => {
    storeEvent(record({ ts: 1_000, message: 'Motion detected' }));
    storeEvent(record({ ts: 3_000, message: 'Motion cleared', meta: { seq: 9 } }));
    storeEvent(record({ ts: 2_000, detector: 'device', source: 'light', message: 'LED turned off (Off).' }));

    const result = listEvents();
    expect(result.total).toBe(3);
    expect(result.items.map(item => item.message)).toEqual([
      'Motion cleared',
      'LED turned off (Off).',
      'Motion detected'
    ]);
    expect(result.items[0].meta).toEqual({ seq: 9 });
    expect(result.items[2].meta).toBeUndefined();
  });

  it('JournalFiltersByDetectorSourceAndSince', () => {
    storeEvent(record({ ts: 1_000 }));
    storeEvent(record({ ts: 2_000 }));
    storeEvent(record({ ts: 3_000, detector: 'snapshot' }));
    storeEvent(record({ ts: 4_000, source: 'light', detector: 'device' }));

    expect(listEvents({ detector: 'motion' }).total).toBe(2);
    expect(listEvents({ source: 'light' }).items[0].detector).toBe('device');
    expect(listEvents({ since: 2_500 }).total).toBe(2);
    expect(listEvents({ detector: 'motion', since: 1_500 }).items.map(item => item.ts)).toEqual([2_000]);
  });

  it('JournalClampsLimit', () => {
    for (let index = 0; index < 5; index += 1) {
      storeEvent(record({ ts: index }));
    }
    expect(listEvents({ limit: 0 }).items).toHaveLength(1);
    expect(listEvents({ limit: 2, offset: 1 }).items.map(item => item.ts)).toEqual([3, 2]);
    expect(listEvents({ limit: 500 }).items).toHaveLength(5);
  });

  it('JournalPrunesOldEvents', () => {
    storeEvent(record({ ts: 100 }));
    storeEvent(record({ ts: 200 }));
    storeEvent(record({ ts: 300 }));

    expect(pruneEventsOlderThan(250)).toBe(2);
    expect(listEvents().items.map(item => item.ts)).toEqual([300]);
  });
});

describe('EventBus', () => {
  it('EventBusStoresCountsAndLogs', () => {
    const stored: EventRecord[] = [];
    const registry = new MetricsRegistry();
    const info = vi.spyOn(logger, 'info');
    const bus = new EventBus({ store: event => stored.push(event), log: logger, metrics: registry });

    bus.emitEvent({
      ts: new Date(5_000),
      source: 'camera',
      detector: 'motion',
      severity: 'info',
      message: 'Motion detected',
      meta: { seq: 3 }
    });

    expect(stored).toEqual([record({ ts: 5_000, meta: { seq: 3 } })]);
    expect(registry.snapshot().events).toMatchObject({
      total: 1,
      byDetector: { motion: 1 },
      bySeverity: { info: 1 }
    });
    expect(info).toHaveBeenCalledWith(
      { component: 'events', detector: 'motion', source: 'camera', severity: 'info', meta: { seq: 3 } },
      'Motion detected'
    );
    info.mockRestore();
  });

  it('EventBusLogsBySeverityAndNotifiesListeners', () => {
    const registry = new MetricsRegistry();
    const warn = vi.spyOn(logger, 'warn');
    const error = vi.spyOn(logger, 'error');
    const bus = new EventBus({ store: () => undefined, log: logger, metrics: registry });
    const seen: EventRecord[] = [];
    bus.on('event', (event: EventRecord) => seen.push(event));

    bus.emitEvent({ ts: 1, source: 'camera', detector: 'acquisition', severity: 'warning', message: 'Frame capture failed' });
    bus.emitEvent({ ts: 2, source: 'camera', detector: 'acquisition', severity: 'critical', message: 'Camera gone' });

    expect(warn).toHaveBeenCalledWith(
      { component: 'events', detector: 'acquisition', source: 'camera', severity: 'warning', meta: undefined },
      'Frame capture failed'
    );
    expect(error).toHaveBeenCalledWith(
      { component: 'events', detector: 'acquisition', source: 'camera', severity: 'critical', meta: undefined },
      'Camera gone'
    );
    expect(seen.map(event => event.ts)).toEqual([1, 2]);
    warn.mockRestore();
    error.mockRestore();
  });

  it('EventBusKeepsGoingWhenStoreFails', () => {
    const registry = new MetricsRegistry();
    const error = vi.spyOn(logger, 'error');
    const bus = new EventBus({
      store: () => {
        throw new Error('disk full');
      },
      log: logger,
      metrics: registry
    });

    expect(bus.emitEvent({ source: 'camera', detector: 'motion', severity: 'warning', message: 'x' })).toBe(false);
    expect(registry.snapshot().events.total).toBe(1);
    expect(error).toHaveBeenCalledTimes(1);
    error.mockRestore();
  });
});
