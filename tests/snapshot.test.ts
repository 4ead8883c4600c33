import { beforeEach, describe, expect, it } from 'vitest';
import metrics from '../src/metrics/index.js';
import { FrameUnavailableError } from '../src/errors.js';
import { DeviceController, initialDeviceState } from '../src/device/controller.js';
import { FrameHub } from '../src/video/frameHub.js';
import { SnapshotService, formatSnapshotTimestamp, type SnapshotDevice } from '../src/video/snapshot.js';
import { FakeEncoder, RecordingBus, RecordingDevice, RecordingSink } from './helpers/fakes.js';
import { grayFrame } from './helpers/frames.js';

const REQUESTED_AT = new Date(2024, 0, 2, 3, 4, 5);

function publish(hub: FrameHub, seq: number) {
  hub.publish(grayFrame(seq), { detected: false, frameSeq: seq, changedRatio: 0 });
}

class FlashRecorder implements SnapshotDevice {
  readonly flashes: number[] = [];

  getState() {
    return initialDeviceState(true, 0);
  }

  async flash(durationMs: number) {
    this.flashes.push(durationMs);
  }
}

describe('SnapshotService', () => {
  beforeEach(() => {
    metrics.reset();
  });

  it('SnapshotTimestampUsesLocalTime', () => {
    expect(formatSnapshotTimestamp(REQUESTED_AT)).toBe('20240102_030405');
  });

  it('SnapshotEncodesNextFrameAndNotifies', async () => {
    const hub = new FrameHub();
    const encoder = new FakeEncoder();
    const device = new FlashRecorder();
    const sink = new RecordingSink();
    const bus = new RecordingBus();
    const service = new SnapshotService({
      hub,
      encoder,
      device,
      notifications: sink,
      quality: 92,
      timeoutMs: 1_000,
      flashMs: 2_000,
      bus,
      now: () => REQUESTED_AT
    });

    publish(hub, 1);
    const capture = service.capture();
    publish(hub, 2);
    const snapshot = await capture;

    expect(snapshot).toEqual({
      seq: 2,
      width: 10,
      height: 10,
      jpeg: Buffer.from('jpeg:2:10x10'),
      capturedAt: 1_002
    });
    expect(encoder.calls).toEqual([{ seq: 2, options: { quality: 92 } }]);
    expect(device.flashes).toEqual([2_000]);
    expect(sink.messages).toHaveLength(1);
    expect(sink.messages[0].title).toBe('Snapshot');
    expect(sink.messages[0].message).toBe(
      'Snapshot captured at 20240102_030405.\nLED: Off\nAuto LED: Enabled'
    );
    expect(sink.messages[0].attachment?.filename).toBe('capture_20240102_030405.jpg');
    expect(sink.messages[0].attachment?.contentType).toBe('image/jpeg');
    expect(bus.messages()).toEqual(['Snapshot captured']);
  });

  it('SnapshotSkipsFlashWhenDisabled', async () => {
    const hub = new FrameHub();
    const device = new FlashRecorder();
    const service = new SnapshotService({
      hub,
      encoder: new FakeEncoder(),
      device,
      notifications: new RecordingSink(),
      quality: 92,
      timeoutMs: 1_000,
      flashMs: 0,
      bus: new RecordingBus()
    });

    const capture = service.capture();
    publish(hub, 1);
    await capture;
    expect(device.flashes).toEqual([]);
  });

  it('SnapshotTimesOutWithoutNewFrame', async () => {
    const hub = new FrameHub();
    publish(hub, 1);
    const sink = new RecordingSink();
    const service = new SnapshotService({
      hub,
      encoder: new FakeEncoder(),
      device: new FlashRecorder(),
      notifications: sink,
      quality: 92,
      timeoutMs: 30,
      flashMs: 0,
      bus: new RecordingBus()
    });

    const attempt = service.capture();
    await expect(attempt).rejects.toBeInstanceOf(FrameUnavailableError);
    await expect(attempt).rejects.toThrow('No frame captured within 30 ms');
    expect(sink.messages).toHaveLength(0);
    expect(hub.pendingWaiters).toBe(0);
    expect(metrics.snapshot().counters['snapshot.timeouts']).toBe(1);
  });

  it('SnapshotPropagatesEncodeFailure', async () => {
    const hub = new FrameHub();
    const encoder = new FakeEncoder();
    encoder.failSeqs.add(1);
    const service = new SnapshotService({
      hub,
      encoder,
      device: new FlashRecorder(),
      notifications: new RecordingSink(),
      quality: 92,
      timeoutMs: 1_000,
      flashMs: 0,
      bus: new RecordingBus()
    });

    const capture = service.capture();
    publish(hub, 1);
    await expect(capture).rejects.toThrow('Failed to encode frame 1: cannot encode 1');
  });

  it('SnapshotDuringMotionLeavesTransitionIntact', async () => {
    const hub = new FrameHub();
    const device = new RecordingDevice();
    const sink = new RecordingSink();
    const controller = new DeviceController({ device, notifications: sink, bus: new RecordingBus() });
    const service = new SnapshotService({
      hub,
      encoder: new FakeEncoder(),
      device: controller,
      notifications: sink,
      quality: 92,
      timeoutMs: 1_000,
      flashMs: 20,
      bus: new RecordingBus(),
      now: () => REQUESTED_AT
    });

    const transition = controller.onMotionTransition(true);
    const capture = service.capture();
    publish(hub, 1);

    const [state] = await Promise.all([transition, capture]);
    expect(state.command).toEqual({ kind: 'color', color: { red: 0, green: 0, blue: 100 } });
    expect(state.cause).toBe('motion');
    expect(controller.getState()).toBe(state);
    expect(sink.messages.map(message => message.title)).toEqual(['LED Status', 'Snapshot']);
    expect(sink.messages[1].message).toBe('Snapshot captured at 20240102_030405.\nLED: Blue\nAuto LED: Enabled');

    await controller.close();
    expect(device.writes[0]).toEqual({ red: 0, green: 0, blue: 100 });
  });
});
