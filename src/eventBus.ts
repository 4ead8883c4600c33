import { EventEmitter } from 'node:events';
import logger from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { storeEvent } from './db.js';
import type { EventPayload, EventRecord, EventSeverity } from './types.js';

const COMPONENT = 'events';

/** What pipeline components need from the bus. Tests pass recording fakes. */
export interface EventSink {
  emitEvent(payload: EventPayload): boolean;
}

interface EventBusDependencies {
  store: (event: EventRecord) => void;
  log: typeof logger;
  metrics?: MetricsRegistry;
}

const LOG_METHOD: Record<EventSeverity, 'info' | 'warn' | 'error'> = {
  info: 'info',
  warning: 'warn',
  critical: 'error'
};

/**
 * Journals camera, light and system events. Every record is stored, counted
 * and logged at a level matching its severity, then re-emitted as `event` for
 * in-process listeners.
 */
class EventBus extends EventEmitter implements EventSink {
  private readonly store: (event: EventRecord) => void;
  private readonly log: typeof logger;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: EventBusDependencies = { store: storeEvent, log: logger }) {
    super();
    this.store = dependencies.store;
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;
  }

  emitEvent(payload: EventPayload): boolean {
    const record: EventRecord = {
      ts: normalizeTimestamp(payload.ts),
      source: payload.source,
      detector: payload.detector,
      severity: payload.severity,
      message: payload.message,
      meta: payload.meta
    };

    let stored = true;
    try {
      this.store(record);
    } catch (error) {
      stored = false;
      this.log.error({ component: COMPONENT, err: error, detector: record.detector }, 'Failed to store event');
    }

    this.metrics.recordEvent(record);
    this.log[LOG_METHOD[record.severity]](
      {
        component: COMPONENT,
        detector: record.detector,
        source: record.source,
        severity: record.severity,
        meta: record.meta
      },
      record.message
    );

    this.emit('event', record);
    return stored;
  }
}

function normalizeTimestamp(ts?: number | Date): number {
  if (typeof ts === 'undefined') {
    return Date.now();
  }
  return ts instanceof Date ? ts.getTime() : ts;
}

const eventBus = new EventBus();

export default eventBus;
export { EventBus };
