import { performance } from 'node:perf_hooks';
import eventBus, { type EventSink } from '../eventBus.js';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import { autoModeLabel } from '../device/controller.js';
import { commandName } from '../device/colors.js';
import { EncodeError, FrameUnavailableError } from '../errors.js';
import type { NotificationSink } from '../notify/notifier.js';
import type { DeviceState, LatestFrame, PublishedSnapshot } from '../types.js';
import type { FrameEncoder } from './encoder.js';
import type { FrameHub } from './frameHub.js';

const COMPONENT = 'snapshot';

export interface SnapshotDevice {
  getState(): DeviceState;
  flash(durationMs: number): Promise<void>;
}

export interface SnapshotServiceOptions {
  hub: FrameHub;
  encoder: FrameEncoder;
  device: SnapshotDevice;
  notifications: NotificationSink;
  quality: number;
  timeoutMs: number;
  flashMs: number;
  bus?: EventSink;
  now?: () => Date;
}

function pad(value: number) {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYYMMDD_HHMMSS`. */
export function formatSnapshotTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class SnapshotService {
  private readonly options: SnapshotServiceOptions;
  private readonly bus: EventSink;

  constructor(options: SnapshotServiceOptions) {
    this.options = options;
    this.bus = options.bus ?? eventBus;
  }

  async capture(): Promise<PublishedSnapshot> {
    const { hub, encoder, quality, timeoutMs, flashMs } = this.options;
    const requestedAt = (this.options.now ?? (() => new Date()))();

    let latest: LatestFrame;
    try {
      latest = await hub.waitForNewer(hub.sequence, AbortSignal.timeout(timeoutMs));
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        metrics.incrementCounter('snapshot.timeouts');
        throw new FrameUnavailableError(`No frame captured within ${timeoutMs} ms`);
      }
      throw error;
    }

    const { frame } = latest;
    const startedAt = performance.now();
    let jpeg: Buffer;
    try {
      jpeg = await encoder.encode(frame, { quality });
    } catch (error) {
      metrics.incrementCounter('snapshot.encode_errors');
      throw error instanceof EncodeError ? error : new EncodeError(frame.seq, error);
    }
    metrics.observeLatency('snapshot.encode', performance.now() - startedAt);

    if (flashMs > 0) {
      this.options.device.flash(flashMs).catch(error => {
        logger.error({ component: COMPONENT, err: error }, 'Snapshot flash failed');
      });
    }

    const timestamp = formatSnapshotTimestamp(requestedAt);
    const deviceState = this.options.device.getState();
    this.options.notifications.dispatch({
      title: 'Snapshot',
      message:
        `Snapshot captured at ${timestamp}.\n` +
        `LED: ${commandName(deviceState.command)}\n` +
        `Auto LED: ${autoModeLabel(deviceState.autoMode)}`,
      attachment: { filename: `capture_${timestamp}.jpg`, contentType: 'image/jpeg', data: jpeg }
    });

    metrics.incrementCounter('snapshot.captured');
    this.bus.emitEvent({
      source: 'camera',
      detector: COMPONENT,
      severity: 'info',
      message: 'Snapshot captured',
      meta: { seq: frame.seq, width: frame.width, height: frame.height, bytes: jpeg.length }
    });

    return {
      seq: frame.seq,
      width: frame.width,
      height: frame.height,
      jpeg,
      capturedAt: frame.capturedAt
    };
  }
}

export default SnapshotService;
