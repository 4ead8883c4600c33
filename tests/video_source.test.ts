import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { PNG } from 'pngjs';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import metrics from '../src/metrics/index.js';
import { SourceUnavailableError } from '../src/errors.js';
import { FfmpegFrameSource, type FrameCommand } from '../src/video/source.js';
import { slicePng } from '../src/video/utils.js';

class FakeCommand extends EventEmitter implements FrameCommand {
  readonly stream = new PassThrough();
  readonly kills: string[] = [];

  pipe() {
    return this.stream;
  }

  kill(signal: string) {
    this.kills.push(signal);
    return this;
  }
}

function encodePng(width: number, height: number, value = 128): Buffer {
  const png = new PNG({ width, height });
  png.data.fill(value);
  return PNG.sync.write(png);
}

function createSource(options: { captureTimeoutMs?: number } = {}) {
  const commands: FakeCommand[] = [];
  const source = new FfmpegFrameSource({
    input: 'test-input',
    width: 4,
    height: 2,
    framesPerSecond: 30,
    captureTimeoutMs: options.captureTimeoutMs ?? 1_000,
    commandFactory: () => {
      const command = new FakeCommand();
      commands.push(command);
      return command;
    }
  });
  return { source, commands };
}

describe('FfmpegFrameSource', () => {
  beforeEach(() => {
    metrics.reset();
  });

  it('SourceStartsCommandLazily', async () => {
    const { source, commands } = createSource();
    expect(commands).toHaveLength(0);
    expect(source.running).toBe(false);

    const capture = source.captureHighRes();
    expect(commands).toHaveLength(1);
    expect(source.running).toBe(true);

    commands[0].stream.write(encodePng(4, 2));
    const image = await capture;
    expect(image.width).toBe(4);
    expect(image.height).toBe(2);
    expect(image.format).toBe('rgba');
    expect(image.data.length).toBe(4 * 2 * 4);
    expect(image.data[0]).toBe(128);
    await source.stop();
  });

  it('SourceReassemblesFramesSplitAcrossChunks', async () => {
    const { source, commands } = createSource();
    const capture = source.captureHighRes();
    const png = encodePng(3, 1);
    commands[0].stream.write(png.subarray(0, 20));
    commands[0].stream.write(png.subarray(20));

    const image = await capture;
    expect(image.width).toBe(3);
    expect(metrics.snapshot().counters['source.frames_received']).toBe(1);
    await source.stop();
  });

  it('SourceDeliversNewestFrameOnly', async () => {
    const { source, commands } = createSource({ captureTimeoutMs: 20 });
    await expect(source.captureHighRes()).rejects.toThrow('No frame received within 20 ms');

    commands[0].stream.write(Buffer.concat([encodePng(2, 1), encodePng(5, 1)]));
    await vi.waitFor(() => expect(metrics.snapshot().counters['source.frames_received']).toBe(1));

    const image = await source.captureHighRes();
    expect(image.width).toBe(5);

    await expect(source.captureHighRes()).rejects.toBeInstanceOf(SourceUnavailableError);
    await source.stop();
  });

  it('SourceRestartsAfterCommandError', async () => {
    const { source, commands } = createSource();
    const capture = source.captureHighRes();
    commands[0].emit('error', new Error('ffmpeg crashed'));

    await expect(capture).rejects.toThrow('ffmpeg capture stopped');
    expect(source.running).toBe(false);
    expect(metrics.snapshot().counters['source.exits']).toBe(1);

    const next = source.captureHighRes();
    expect(commands).toHaveLength(2);
    commands[1].stream.write(encodePng(4, 2));
    await expect(next).resolves.toMatchObject({ width: 4, height: 2 });
    await source.stop();
  });

  it('SourceRejectsPendingOnEnd', async () => {
    const { source, commands } = createSource();
    const capture = source.captureHighRes();
    commands[0].emit('end');
    await expect(capture).rejects.toBeInstanceOf(SourceUnavailableError);
    await source.stop();
  });

  it('SourceStopKillsCommandAndRejects', async () => {
    const { source, commands } = createSource();
    const capture = source.captureHighRes();
    await source.stop();

    await expect(capture).rejects.toThrow('Frame source is stopped');
    expect(commands[0].kills).toEqual(['SIGKILL']);
    expect(commands[0].stream.destroyed).toBe(true);
    await expect(source.captureHighRes()).rejects.toThrow('Frame source is stopped');
    expect(commands).toHaveLength(1);
  });

  it('SourceReportsDecodeFailures', async () => {
    const commands: FakeCommand[] = [];
    const source = new FfmpegFrameSource({
      input: 'test-input',
      width: 4,
      height: 2,
      framesPerSecond: 30,
      commandFactory: () => {
        const command = new FakeCommand();
        commands.push(command);
        return command;
      },
      decode: () => {
        throw new Error('corrupt');
      }
    });

    const capture = source.captureHighRes();
    commands[0].stream.write(encodePng(4, 2));
    await expect(capture).rejects.toThrow('Failed to decode frame from ffmpeg');
    expect(metrics.snapshot().counters['source.decode_errors']).toBe(1);
    await source.stop();
  });
});

describe('PngSlicing', () => {
  it('SliceReturnsNullForIncompleteImage', () => {
    const png = encodePng(2, 2);
    expect(slicePng(png.subarray(0, png.length - 1))).toBeNull();
  });

  it('SliceSplitsConcatenatedImages', () => {
    const first = encodePng(2, 2);
    const second = encodePng(3, 3);
    const sliced = slicePng(Buffer.concat([first, second]));
    expect(sliced?.png.equals(first)).toBe(true);
    expect(sliced?.remainder.equals(second)).toBe(true);
  });
});
