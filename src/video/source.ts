import ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import type { Writable } from 'node:stream';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import { SourceUnavailableError, toError } from '../errors.js';
import type { CapturedImage } from '../types.js';
import { PNG_SIGNATURE, decodePng, slicePng } from './utils.js';

const DEFAULT_CAPTURE_TIMEOUT_MS = 2000;
const DEFAULT_MAX_BUFFER_BYTES = 32 * 1024 * 1024;
const COMPONENT = 'frame-source';

/**
 * The camera capability. Only the acquisition loop calls `captureHighRes`, one
 * call at a time.
 */
export interface FrameSource {
  captureHighRes(): Promise<CapturedImage>;
  stop(): Promise<void>;
}

/** The part of a fluent-ffmpeg command the source relies on. */
export interface FrameCommand extends EventEmitter {
  pipe(): Writable;
  kill(signal: string): unknown;
}

export type FrameCommandOptions = {
  input: string;
  inputFormat?: string;
  width: number;
  height: number;
  framesPerSecond: number;
  inputArgs?: string[];
};

export type FfmpegFrameSourceOptions = FrameCommandOptions & {
  captureTimeoutMs?: number;
  maxBufferBytes?: number;
  commandFactory?: (options: FrameCommandOptions) => FrameCommand;
  decode?: (png: Buffer, capturedAt: number) => CapturedImage;
};

type PendingCapture = {
  resolve: (image: CapturedImage) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
};

type ReceivedPng = {
  id: number;
  png: Buffer;
  receivedAt: number;
};

export function createFfmpegCommand(options: FrameCommandOptions): FrameCommand {
  const command = ffmpeg(options.input);

  const inputOptions: string[] = [];
  if (options.inputFormat) {
    inputOptions.push('-f', options.inputFormat);
    if (options.inputFormat === 'v4l2') {
      inputOptions.push(
        '-video_size',
        `${options.width}x${options.height}`,
        '-framerate',
        String(options.framesPerSecond)
      );
    }
  }
  if (options.inputArgs?.length) {
    inputOptions.push(...options.inputArgs);
  }
  if (inputOptions.length > 0) {
    command.inputOptions(inputOptions);
  }

  return command
    .outputOptions('-vf', `fps=${options.framesPerSecond}`)
    .outputOptions('-f', 'image2pipe')
    .outputOptions('-vcodec', 'png');
}

/**
 * Keeps one long-running ffmpeg process that writes PNG frames to a pipe and
 * hands out the newest complete frame on each capture. A process that exits or
 * fails rejects pending captures; the next capture starts a new one.
 */
export class FfmpegFrameSource extends EventEmitter implements FrameSource {
  private readonly options: FfmpegFrameSourceOptions;
  private command: FrameCommand | null = null;
  private stream: Writable | null = null;
  private commandCleanup: (() => void) | null = null;
  private buffer = Buffer.alloc(0);
  private latest: ReceivedPng | null = null;
  private receivedCount = 0;
  private deliveredId = 0;
  private readonly pending = new Set<PendingCapture>();
  private stopped = false;

  constructor(options: FfmpegFrameSourceOptions) {
    super();
    this.options = options;
  }

  get running(): boolean {
    return this.command !== null;
  }

  captureHighRes(): Promise<CapturedImage> {
    if (this.stopped) {
      return Promise.reject(new SourceUnavailableError('Frame source is stopped'));
    }

    try {
      this.ensureCommand();
    } catch (error) {
      return Promise.reject(new SourceUnavailableError('Failed to start ffmpeg', error));
    }

    const latest = this.latest;
    if (latest && latest.id > this.deliveredId) {
      try {
        return Promise.resolve(this.deliver(latest));
      } catch (error) {
        return Promise.reject(error);
      }
    }

    const timeoutMs = this.options.captureTimeoutMs ?? DEFAULT_CAPTURE_TIMEOUT_MS;
    return new Promise<CapturedImage>((resolve, reject) => {
      const capture: PendingCapture = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.pending.delete(capture);
          reject(new SourceUnavailableError(`No frame received within ${timeoutMs} ms`));
        }, timeoutMs)
      };
      this.pending.add(capture);
    });
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.rejectPending(new SourceUnavailableError('Frame source is stopped'));
    this.teardownCommand(true);
  }

  private ensureCommand() {
    if (this.command) {
      return;
    }

    const factory = this.options.commandFactory ?? createFfmpegCommand;
    const command = factory({
      input: this.options.input,
      inputFormat: this.options.inputFormat,
      width: this.options.width,
      height: this.options.height,
      framesPerSecond: this.options.framesPerSecond,
      inputArgs: this.options.inputArgs
    });

    const onError = (error: unknown) => {
      this.handleCommandExit(command, toError(error));
    };
    const onEnd = () => {
      this.handleCommandExit(command, new Error('ffmpeg exited'));
    };
    command.on('error', onError);
    command.on('end', onEnd);

    const stream = command.pipe();
    const onData = (chunk: Buffer) => {
      this.handleChunk(chunk);
    };
    const onStreamError = (error: unknown) => {
      this.handleCommandExit(command, toError(error));
    };
    stream.on('data', onData);
    stream.on('error', onStreamError);

    this.command = command;
    this.stream = stream;
    this.buffer = Buffer.alloc(0);
    this.commandCleanup = () => {
      command.off('error', onError);
      command.off('end', onEnd);
      stream.off('data', onData);
      stream.off('error', onStreamError);
    };

    metrics.incrementCounter('source.starts');
    logger.info({ component: COMPONENT, input: this.options.input }, 'Started ffmpeg capture');
  }

  private handleChunk(chunk: Buffer) {
    let working = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : chunk;
    const maxBuffer = this.options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
    let newest: Buffer | null = null;

    while (true) {
      const pngStart = working.indexOf(PNG_SIGNATURE);
      if (pngStart === -1) {
        working = Buffer.alloc(0);
        break;
      }
      if (pngStart > 0) {
        working = working.subarray(pngStart);
      }

      const sliced = slicePng(working);
      if (!sliced) {
        break;
      }
      newest = sliced.png;
      working = sliced.remainder;
    }

    if (working.length > maxBuffer) {
      metrics.incrementCounter('source.buffer_overflows');
      logger.warn({ component: COMPONENT, bytes: working.length }, 'Discarding oversized ffmpeg buffer');
      working = Buffer.alloc(0);
    }
    this.buffer = Buffer.from(working);

    if (!newest) {
      return;
    }

    this.receivedCount += 1;
    metrics.incrementCounter('source.frames_received');
    this.latest = { id: this.receivedCount, png: Buffer.from(newest), receivedAt: Date.now() };

    const waiting = Array.from(this.pending);
    if (waiting.length === 0) {
      return;
    }
    this.pending.clear();

    let image: CapturedImage;
    try {
      image = this.deliver(this.latest);
    } catch (error) {
      for (const capture of waiting) {
        clearTimeout(capture.timer);
        capture.reject(toError(error));
      }
      return;
    }
    for (const capture of waiting) {
      clearTimeout(capture.timer);
      capture.resolve(image);
    }
  }

  private deliver(received: ReceivedPng): CapturedImage {
    this.deliveredId = received.id;
    const decode = this.options.decode ?? decodePng;
    try {
      return decode(received.png, received.receivedAt);
    } catch (error) {
      metrics.incrementCounter('source.decode_errors');
      throw new SourceUnavailableError('Failed to decode frame from ffmpeg', error);
    }
  }

  private handleCommandExit(command: FrameCommand, error: Error) {
    if (command !== this.command) {
      return;
    }

    metrics.incrementCounter('source.exits');
    logger.warn({ component: COMPONENT, err: error }, 'ffmpeg capture stopped');
    this.teardownCommand(false);
    this.rejectPending(new SourceUnavailableError('ffmpeg capture stopped', error));
  }

  private teardownCommand(kill: boolean) {
    const command = this.command;
    const stream = this.stream;
    this.commandCleanup?.();
    this.commandCleanup = null;
    this.command = null;
    this.stream = null;
    this.buffer = Buffer.alloc(0);

    if (stream && !stream.destroyed) {
      stream.destroy();
    }

    if (command && kill) {
      // ffmpeg may already have exited
      command.on('error', () => undefined);
      try {
        command.kill('SIGKILL');
      } catch (error) {
        logger.debug({ component: COMPONENT, err: error }, 'ffmpeg kill failed');
      }
    }
  }

  private rejectPending(error: Error) {
    for (const capture of this.pending) {
      clearTimeout(capture.timer);
      capture.reject(error);
    }
    this.pending.clear();
  }
}

export default FfmpegFrameSource;
