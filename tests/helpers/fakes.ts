import { SourceUnavailableError } from '../../src/errors.js';
import type { EventSink } from '../../src/eventBus.js';
import type { NotificationMessage, NotificationSink } from '../../src/notify/notifier.js';
import type { OutputDevice } from '../../src/device/outputDevice.js';
import type { EncodeOptions, FrameEncoder } from '../../src/video/encoder.js';
import type { FrameSource } from '../../src/video/source.js';
import type { CapturedImage, EventPayload, Frame, RgbColor } from '../../src/types.js';

export class RecordingBus implements EventSink {
  readonly events: EventPayload[] = [];

  emitEvent(payload: EventPayload): boolean {
    this.events.push(payload);
    return true;
  }

  messages(): string[] {
    return this.events.map(event => event.message);
  }
}

export class RecordingSink implements NotificationSink {
  readonly messages: NotificationMessage[] = [];

  dispatch(message: NotificationMessage): void {
    this.messages.push(message);
  }
}

export class RecordingDevice implements OutputDevice {
  readonly writes: RgbColor[] = [];
  closed = false;
  failNextWrite: Error | null = null;

  async write(color: RgbColor): Promise<void> {
    const failure = this.failNextWrite;
    if (failure) {
      this.failNextWrite = null;
      throw failure;
    }
    this.writes.push(color);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

type Step = CapturedImage | Error;

/**
 * Hands out scripted captures in order. Once the script runs out, captures
 * stay pending until `stop()` rejects them.
 */
export class ScriptedSource implements FrameSource {
  readonly steps: Step[];
  captures = 0;
  stopped = false;
  private pending: Array<(error: Error) => void> = [];

  constructor(steps: Step[]) {
    this.steps = [...steps];
  }

  async captureHighRes(): Promise<CapturedImage> {
    this.captures += 1;
    const next = this.steps.shift();
    if (next instanceof Error) {
      throw next;
    }
    if (next) {
      return next;
    }
    return new Promise<CapturedImage>((_, reject) => {
      this.pending.push(reject);
    });
  }

  async stop(): Promise<void> {
    this.stopped = true;
    const pending = this.pending;
    this.pending = [];
    for (const reject of pending) {
      reject(new SourceUnavailableError('Source stopped'));
    }
  }
}

export function image(frame: Frame): CapturedImage {
  return {
    width: frame.width,
    height: frame.height,
    format: frame.format,
    data: frame.data,
    capturedAt: frame.capturedAt
  };
}

/** Encodes to `jpeg:<seq>:<width>x<height>` after a macrotask. */
export class FakeEncoder implements FrameEncoder {
  readonly calls: Array<{ seq: number; options: EncodeOptions }> = [];
  failSeqs = new Set<number>();

  async encode(frame: Frame, options: EncodeOptions): Promise<Buffer> {
    this.calls.push({ seq: frame.seq, options });
    await new Promise(resolve => setImmediate(resolve));
    if (this.failSeqs.has(frame.seq)) {
      throw new Error(`cannot encode ${frame.seq}`);
    }
    const width = options.width ?? frame.width;
    const height = options.height ?? frame.height;
    return Buffer.from(`jpeg:${frame.seq}:${width}x${height}`);
  }
}
