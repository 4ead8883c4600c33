import config from 'config';
import { EventEmitter } from 'node:events';
import path from 'node:path';
import eventBus, { type EventSink } from './eventBus.js';
import logger, { getLogLevel, setLogLevel } from './logger.js';
import metrics from './metrics/index.js';
import {
  ConfigManager,
  validateConfig,
  type CamlightConfig,
  type ConfigReloadEvent
} from './config/index.js';
import { DeviceController } from './device/controller.js';
import { LoggingOutputDevice, SysfsPwmRgbDevice, type OutputDevice } from './device/outputDevice.js';
import {
  LogNotifier,
  NotificationDispatcher,
  PushoverNotifier,
  type Notifier
} from './notify/notifier.js';
import type { CaptureRetriesExhaustedError } from './errors.js';
import { AcquisitionLoop, type AcquisitionStatus } from './video/acquisitionLoop.js';
import { SharpFrameEncoder, type FrameEncoder } from './video/encoder.js';
import { FrameHub } from './video/frameHub.js';
import { MotionDetector } from './video/motionDetector.js';
import { SnapshotService } from './video/snapshot.js';
import { FfmpegFrameSource, type FrameSource } from './video/source.js';
import { StreamMultiplexer, type PreviewSession } from './video/streamMultiplexer.js';
import type { DeviceState, MotionState, PublishedSnapshot } from './types.js';

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

const shutdownHooks: RegisteredHook[] = [];

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      results.push({
        name: entry.name,
        status: 'error',
        error: error instanceof Error ? error : new Error(String(error))
      });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  shutdownHooks.splice(0, shutdownHooks.length);
}

const MOTION_KEYS = [
  'diffThreshold',
  'areaThreshold',
  'referenceRefreshFrames',
  'sampleStep',
  'blur'
] as const;

export type CameraServiceStatus = {
  status: AcquisitionStatus;
  startedAt: number | null;
  lastSeq: number;
  consecutiveFailures: number;
  lastError: string | null;
  motion: MotionState | null;
  device: DeviceState;
  activeSessions: number;
  pendingNotifications: number;
};

export interface CameraServiceDependencies {
  config: CamlightConfig;
  source: FrameSource;
  device: OutputDevice;
  notifier: Notifier;
  encoder?: FrameEncoder;
  bus?: EventSink;
}

/**
 * Composition root for the pipeline. Everything the web layer needs goes
 * through these methods.
 */
export class CameraService extends EventEmitter {
  readonly hub: FrameHub;
  readonly detector: MotionDetector;
  readonly loop: AcquisitionLoop;
  readonly controller: DeviceController;
  readonly multiplexer: StreamMultiplexer;
  readonly snapshots: SnapshotService;
  readonly notifications: NotificationDispatcher;
  private readonly source: FrameSource;
  private config: CamlightConfig;
  private startedAt: number | null = null;

  constructor(dependencies: CameraServiceDependencies) {
    super();
    const { config: serviceConfig } = dependencies;
    const bus = dependencies.bus ?? eventBus;
    const encoder = dependencies.encoder ?? new SharpFrameEncoder();

    this.config = serviceConfig;
    this.source = dependencies.source;
    this.hub = new FrameHub();
    this.detector = new MotionDetector(serviceConfig.motion);
    this.notifications = new NotificationDispatcher(dependencies.notifier, {
      timeoutMs: serviceConfig.notifications.timeoutMs
    });
    this.controller = new DeviceController({
      device: dependencies.device,
      notifications: this.notifications,
      motionColor: serviceConfig.device.motionColor,
      autoMode: serviceConfig.device.autoMode,
      bus
    });
    this.loop = new AcquisitionLoop({
      source: dependencies.source,
      detector: this.detector,
      hub: this.hub,
      onMotionTransition: detected => this.controller.onMotionTransition(detected),
      framesPerSecond: serviceConfig.camera.framesPerSecond,
      retryDelayMs: serviceConfig.camera.retryDelayMs,
      maxConsecutiveFailures: serviceConfig.camera.maxConsecutiveFailures,
      bus
    });
    this.multiplexer = new StreamMultiplexer({
      hub: this.hub,
      encoder,
      width: serviceConfig.preview.width,
      height: serviceConfig.preview.height,
      quality: serviceConfig.preview.quality,
      maxFps: serviceConfig.preview.maxFps,
      boundary: serviceConfig.preview.boundary
    });
    this.snapshots = new SnapshotService({
      hub: this.hub,
      encoder,
      device: this.controller,
      notifications: this.notifications,
      quality: serviceConfig.snapshot.quality,
      timeoutMs: serviceConfig.snapshot.timeoutMs,
      flashMs: serviceConfig.snapshot.flashMs,
      bus
    });

    this.loop.on('fatal', (error: CaptureRetriesExhaustedError) => {
      this.emit('fatal', error);
    });
  }

  get previewBoundary(): string {
    return this.config.preview.boundary;
  }

  async start(): Promise<void> {
    if (this.startedAt !== null) {
      return;
    }
    this.startedAt = Date.now();
    await this.controller.start();
    this.loop.start();
    logger.info(
      {
        component: 'service',
        input: this.config.camera.input,
        fps: this.config.camera.framesPerSecond,
        autoMode: this.controller.getState().autoMode
      },
      'Camera service started'
    );
  }

  async stop(): Promise<void> {
    const loopStopped = this.loop.stop();
    await this.source.stop();
    await loopStopped;
    this.multiplexer.closeAll();
    await this.controller.close();
    await this.notifications.flush();
    this.startedAt = null;
    logger.info({ component: 'service' }, 'Camera service stopped');
  }

  /** Applies the settings that can change without a restart. */
  applyConfig(next: CamlightConfig) {
    const previous = this.config;
    this.config = next;

    if (next.logging.level !== getLogLevel()) {
      try {
        setLogLevel(next.logging.level);
      } catch (error) {
        logger.warn({ component: 'service', err: error }, 'Ignoring reloaded log level');
      }
    }

    const motionChanged = MOTION_KEYS.some(key => next.motion[key] !== previous.motion[key]);
    if (motionChanged) {
      this.detector.updateOptions(next.motion);
      logger.info({ component: 'service', motion: next.motion }, 'Motion settings reloaded');
    }
  }

  getLivePreviewFrame(): Promise<Buffer> {
    return this.multiplexer.getLatestFrame();
  }

  openPreviewStream(signal?: AbortSignal): PreviewSession {
    return this.multiplexer.open({ signal });
  }

  getMotionStatus(): { detected: boolean } {
    return { detected: this.hub.readMotion()?.detected ?? false };
  }

  captureSnapshot(): Promise<PublishedSnapshot> {
    return this.snapshots.capture();
  }

  setDeviceColor(red: unknown, green: unknown, blue: unknown): Promise<DeviceState> {
    return this.controller.setColor({ red, green, blue });
  }

  turnDeviceOff(): Promise<DeviceState> {
    return this.controller.turnOff();
  }

  async toggleAutoMode(): Promise<{ autoMode: boolean }> {
    const autoMode = await this.controller.toggleAutoMode();
    return { autoMode };
  }

  getDeviceState(): DeviceState {
    return this.controller.getState();
  }

  getStatus(): CameraServiceStatus {
    return {
      status: this.loop.status,
      startedAt: this.startedAt,
      lastSeq: this.hub.sequence,
      consecutiveFailures: this.loop.failures,
      lastError: this.loop.lastCaptureError?.message ?? null,
      motion: this.hub.readMotion(),
      device: this.controller.getState(),
      activeSessions: this.multiplexer.activeSessions,
      pendingNotifications: this.notifications.pending
    };
  }
}

export function createOutputDevice(deviceConfig: CamlightConfig['device']): OutputDevice {
  if (deviceConfig.driver === 'pwm' && deviceConfig.pwm) {
    return new SysfsPwmRgbDevice(deviceConfig.pwm);
  }
  return new LoggingOutputDevice();
}

export function createNotifier(notificationsConfig: CamlightConfig['notifications']): Notifier {
  const pushover = notificationsConfig.pushover;
  if (notificationsConfig.provider === 'pushover' && pushover) {
    return new PushoverNotifier({
      token: pushover.token,
      user: pushover.user,
      priority: pushover.priority,
      timeoutMs: notificationsConfig.timeoutMs
    });
  }
  return new LogNotifier();
}

export function createCameraService(
  serviceConfig: CamlightConfig,
  overrides: Partial<Omit<CameraServiceDependencies, 'config'>> = {}
): CameraService {
  const camera = serviceConfig.camera;
  return new CameraService({
    config: serviceConfig,
    source:
      overrides.source ??
      new FfmpegFrameSource({
        input: camera.input,
        inputFormat: camera.inputFormat,
        width: camera.width,
        height: camera.height,
        framesPerSecond: camera.framesPerSecond,
        inputArgs: camera.inputArgs,
        captureTimeoutMs: camera.captureTimeoutMs
      }),
    device: overrides.device ?? createOutputDevice(serviceConfig.device),
    notifier: overrides.notifier ?? createNotifier(serviceConfig.notifications),
    encoder: overrides.encoder,
    bus: overrides.bus
  });
}

export function loadAppConfig(): CamlightConfig {
  const loaded: unknown = config.util.toObject(config);
  validateConfig(loaded);
  return loaded;
}

export type BootstrapOptions = {
  config?: CamlightConfig;
  configPath?: string;
  watchConfig?: boolean;
  overrides?: Partial<Omit<CameraServiceDependencies, 'config'>>;
};

export type BootstrapResult = {
  service: CameraService;
  config: CamlightConfig;
  stopWatching: () => void;
};

export async function bootstrap(options: BootstrapOptions = {}): Promise<BootstrapResult> {
  logger.info('camlight bootstrap starting');

  const appConfig = options.config ?? loadAppConfig();
  const service = createCameraService(appConfig, options.overrides);

  let stopWatching = () => {};
  if (options.watchConfig ?? true) {
    const manager = new ConfigManager(
      options.configPath ?? path.resolve(process.cwd(), 'config/default.json')
    );
    manager.on('reload', ({ next }: ConfigReloadEvent) => {
      service.applyConfig({ ...next, server: appConfig.server });
    });
    manager.on('error', (error: Error) => {
      logger.warn({ err: error }, 'Ignoring invalid configuration change');
    });
    stopWatching = manager.watch();
  }

  service.on('fatal', (error: CaptureRetriesExhaustedError) => {
    metrics.incrementCounter('service.fatal');
    logger.fatal({ err: error }, 'Camera unavailable; restart required');
  });

  registerShutdownHook('camera-service', async () => {
    stopWatching();
    await service.stop();
  });

  await service.start();

  eventBus.emitEvent({
    source: 'system',
    detector: 'bootstrap',
    severity: 'info',
    message: 'system up',
    meta: {
      input: appConfig.camera.input,
      device: appConfig.device.driver,
      notifications: appConfig.notifications.provider
    }
  });

  logger.info('Bootstrap completed');
  return { service, config: appConfig, stopWatching };
}
