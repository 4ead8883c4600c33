import { performance } from 'node:perf_hooks';
import { setTimeout as sleep } from 'node:timers/promises';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import { EncodeError, FrameUnavailableError } from '../errors.js';
import type { Frame } from '../types.js';
import type { FrameEncoder } from './encoder.js';
import type { FrameHub } from './frameHub.js';

const COMPONENT = 'stream';

export type PreviewChunk = {
  seq: number;
  jpeg: Buffer;
  /** One self-delimited multipart unit, ready to write to the response. */
  part: Buffer;
};

export interface PreviewSession extends AsyncIterable<PreviewChunk> {
  readonly id: number;
  close(): void;
}

export interface StreamMultiplexerOptions {
  hub: FrameHub;
  encoder: FrameEncoder;
  width: number;
  height: number;
  quality: number;
  maxFps: number;
  boundary: string;
}

export function buildMultipartPart(boundary: string, jpeg: Buffer): Buffer {
  const header = Buffer.from(
    `--${boundary}\r\nContent-Type: image/jpeg\r\nContent-Length: ${jpeg.length}\r\n\r\n`,
    'ascii'
  );
  return Buffer.concat([header, jpeg, Buffer.from('\r\n', 'ascii')]);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Fans the latest frame out to any number of preview sessions. Each session
 * pulls at its own pace; frames it misses are skipped, never queued.
 */
export class StreamMultiplexer {
  private readonly options: StreamMultiplexerOptions;
  private readonly inflight = new Map<number, Promise<Buffer>>();
  private readonly sessions = new Map<number, AbortController>();
  private running = 0;
  private nextId = 1;

  constructor(options: StreamMultiplexerOptions) {
    this.options = options;
  }

  get activeSessions(): number {
    return this.running;
  }

  open(options: { signal?: AbortSignal } = {}): PreviewSession {
    const id = this.nextId;
    this.nextId += 1;

    const controller = new AbortController();
    const outer = options.signal;
    const release = () => {
      outer?.removeEventListener('abort', onOuterAbort);
      this.sessions.delete(id);
    };
    const onOuterAbort = () => {
      controller.abort(outer?.reason);
      release();
    };

    if (outer?.aborted) {
      controller.abort(outer.reason);
    } else {
      outer?.addEventListener('abort', onOuterAbort, { once: true });
      this.sessions.set(id, controller);
    }

    const iterator = this.run(id, controller.signal, release);
    return {
      id,
      [Symbol.asyncIterator]: () => iterator,
      close: () => {
        controller.abort();
        release();
      }
    };
  }

  async getLatestFrame(): Promise<Buffer> {
    const latest = this.options.hub.readLatest();
    if (!latest) {
      throw new FrameUnavailableError();
    }
    return this.encodePreview(latest.frame);
  }

  closeAll() {
    for (const controller of this.sessions.values()) {
      controller.abort();
    }
    this.sessions.clear();
  }

  private async *run(
    id: number,
    signal: AbortSignal,
    release: () => void
  ): AsyncGenerator<PreviewChunk, void, undefined> {
    this.running += 1;
    metrics.setGauge('stream.active_sessions', this.running);
    logger.debug({ component: COMPONENT, session: id }, 'Preview session opened');

    const minIntervalMs = 1000 / this.options.maxFps;
    let lastSeq = 0;

    try {
      while (!signal.aborted) {
        let frame: Frame;
        try {
          const latest = await this.options.hub.waitForNewer(lastSeq, signal);
          frame = latest.frame;
        } catch (error) {
          if (signal.aborted) {
            return;
          }
          throw error;
        }
        lastSeq = frame.seq;

        let jpeg: Buffer;
        try {
          jpeg = await this.encodePreview(frame);
        } catch (error) {
          metrics.incrementCounter('stream.encode_errors');
          logger.warn({ component: COMPONENT, session: id, err: error }, 'Skipping preview frame');
          continue;
        }
        if (signal.aborted) {
          return;
        }

        const emittedAt = performance.now();
        metrics.incrementCounter('stream.frames_sent');
        yield { seq: frame.seq, jpeg, part: buildMultipartPart(this.options.boundary, jpeg) };

        const waitMs = minIntervalMs - (performance.now() - emittedAt);
        if (waitMs > 0) {
          try {
            await sleep(waitMs, undefined, { signal });
          } catch (error) {
            if (isAbortError(error) || signal.aborted) {
              return;
            }
            throw error;
          }
        }
      }
    } finally {
      this.running -= 1;
      release();
      metrics.setGauge('stream.active_sessions', this.running);
      logger.debug({ component: COMPONENT, session: id }, 'Preview session closed');
    }
  }

  private encodePreview(frame: Frame): Promise<Buffer> {
    const existing = this.inflight.get(frame.seq);
    if (existing) {
      return existing;
    }

    const startedAt = performance.now();
    const pending = this.options.encoder
      .encode(frame, {
        width: Math.min(this.options.width, frame.width),
        height: Math.min(this.options.height, frame.height),
        quality: this.options.quality
      })
      .then(jpeg => {
        metrics.observeLatency('stream.encode', performance.now() - startedAt);
        return jpeg;
      })
      .catch((error: unknown) => {
        throw error instanceof EncodeError ? error : new EncodeError(frame.seq, error);
      })
      .finally(() => {
        this.inflight.delete(frame.seq);
      });

    this.inflight.set(frame.seq, pending);
    return pending;
  }
}

export default StreamMultiplexer;
