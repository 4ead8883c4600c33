import eventBus, { type EventSink } from '../eventBus.js';
import logger from '../logger.js';
import metrics from '../metrics/index.js';
import { DeviceError } from '../errors.js';
import type { NotificationSink } from '../notify/notifier.js';
import type { DeviceCommand, DeviceState, RgbColor } from '../types.js';
import {
  BLUE_COLOR,
  WHITE_COLOR,
  commandColor,
  commandName,
  sameCommand,
  validateColor
} from './colors.js';
import type { OutputDevice } from './outputDevice.js';

const COMPONENT = 'device';
const STATUS_TITLE = 'LED Status';

export type DeviceAction =
  | { type: 'set-color'; color: RgbColor; at: number }
  | { type: 'turn-off'; at: number }
  | { type: 'toggle-auto'; at: number }
  | { type: 'motion'; detected: boolean; motionColor: RgbColor; at: number };

export function initialDeviceState(autoMode: boolean, at = Date.now()): DeviceState {
  return { command: { kind: 'off' }, autoMode, cause: 'startup', updatedAt: at };
}

/**
 * Next state for an action. Returns the same object when the action changes
 * nothing, which callers use to skip the device write and the notification.
 */
export function reduceDeviceState(state: DeviceState, action: DeviceAction): DeviceState {
  switch (action.type) {
    case 'set-color':
      return {
        command: { kind: 'color', color: action.color },
        autoMode: state.autoMode,
        cause: 'manual',
        updatedAt: action.at
      };
    case 'turn-off':
      return { command: { kind: 'off' }, autoMode: state.autoMode, cause: 'manual', updatedAt: action.at };
    case 'toggle-auto':
      return { ...state, autoMode: !state.autoMode, updatedAt: action.at };
    case 'motion': {
      if (!state.autoMode) {
        return state;
      }
      const command: DeviceCommand = action.detected
        ? { kind: 'color', color: action.motionColor }
        : { kind: 'off' };
      if (sameCommand(command, state.command)) {
        return state;
      }
      return { command, autoMode: state.autoMode, cause: 'motion', updatedAt: action.at };
    }
  }
}

export function autoModeLabel(autoMode: boolean) {
  return autoMode ? 'Enabled' : 'Disabled';
}

function describeTransition(state: DeviceState): string {
  const name = commandName(state.command);
  const auto = `Auto LED: ${autoModeLabel(state.autoMode)}`;
  if (state.cause === 'motion') {
    return state.command.kind === 'off'
      ? `Motion cleared: LED turned off (Off).\n${auto}`
      : `Motion detected: LED set to ${name}.\n${auto}`;
  }
  return state.command.kind === 'off'
    ? `LED turned off (Off).\n${auto}`
    : `LED set to ${name}.\n${auto}`;
}

export interface DeviceControllerOptions {
  device: OutputDevice;
  notifications: NotificationSink;
  motionColor?: RgbColor;
  autoMode?: boolean;
  bus?: EventSink;
  now?: () => number;
}

/**
 * Owns the commanded light state. Every transition runs on one promise chain,
 * so a call always sees the result of the calls made before it.
 */
export class DeviceController {
  private readonly device: OutputDevice;
  private readonly notifications: NotificationSink;
  private readonly bus: EventSink;
  private readonly now: () => number;
  private motionColor: RgbColor;
  private state: DeviceState;
  private queue: Promise<unknown> = Promise.resolve();
  private flashTimer: NodeJS.Timeout | null = null;

  constructor(options: DeviceControllerOptions) {
    this.device = options.device;
    this.notifications = options.notifications;
    this.bus = options.bus ?? eventBus;
    this.now = options.now ?? Date.now;
    this.motionColor = options.motionColor ?? BLUE_COLOR;
    this.state = initialDeviceState(options.autoMode ?? true, this.now());
  }

  getState(): DeviceState {
    return this.state;
  }

  get flashing(): boolean {
    return this.flashTimer !== null;
  }

  start(): Promise<DeviceState> {
    return this.enqueue(async () => {
      await this.writeOutput(commandColor(this.state.command));
      return this.state;
    });
  }

  setMotionColor(color: RgbColor) {
    this.motionColor = validateColor(color);
  }

  async setColor(color: { red: unknown; green: unknown; blue: unknown }): Promise<DeviceState> {
    const validated = validateColor(color);
    return this.transition(at => ({ type: 'set-color', color: validated, at }));
  }

  turnOff(): Promise<DeviceState> {
    return this.transition(at => ({ type: 'turn-off', at }));
  }

  toggleAutoMode(): Promise<boolean> {
    return this.enqueue(async () => {
      this.state = reduceDeviceState(this.state, { type: 'toggle-auto', at: this.now() });
      metrics.setGauge('device.auto_mode', this.state.autoMode ? 1 : 0);
      this.emitEvent(`Auto LED ${this.state.autoMode ? 'enabled' : 'disabled'}`);
      return this.state.autoMode;
    });
  }

  onMotionTransition(detected: boolean): Promise<DeviceState> {
    return this.transition(at => ({ type: 'motion', detected, motionColor: this.motionColor, at }));
  }

  /**
   * Drives the light white for `durationMs` without touching the commanded
   * state. Writes for transitions made meanwhile happen when the flash ends.
   */
  flash(durationMs: number): Promise<void> {
    return this.enqueue(async () => {
      const alreadyFlashing = this.flashTimer !== null;
      if (this.flashTimer) {
        clearTimeout(this.flashTimer);
      }
      this.flashTimer = setTimeout(() => {
        this.flashTimer = null;
        this.enqueue(() => this.writeOutput(commandColor(this.state.command))).catch(error => {
          logger.error({ component: COMPONENT, err: error }, 'Failed to restore LED after flash');
        });
      }, durationMs);
      metrics.incrementCounter('device.flashes');

      if (!alreadyFlashing) {
        await this.device
          .write(WHITE_COLOR)
          .catch(error => this.recordWriteFailure(error));
      }
    });
  }

  /** Cancels a running flash, waits for queued transitions and closes the device. */
  async close(): Promise<void> {
    await this.enqueue(async () => {
      if (this.flashTimer) {
        clearTimeout(this.flashTimer);
        this.flashTimer = null;
      }
      try {
        await this.device.close();
      } catch (error) {
        logger.warn({ component: COMPONENT, err: error }, 'Failed to close output device');
      }
    });
  }

  private transition(build: (at: number) => DeviceAction): Promise<DeviceState> {
    return this.enqueue(async () => {
      const previous = this.state;
      const next = reduceDeviceState(previous, build(this.now()));
      if (next === previous) {
        return previous;
      }

      this.state = next;
      metrics.incrementCounter(`device.transitions.${next.cause}`);
      this.notifications.dispatch({ title: STATUS_TITLE, message: describeTransition(next) });
      this.emitEvent(describeTransition(next).split('\n')[0]);
      await this.writeOutput(commandColor(next.command));
      return next;
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async writeOutput(color: RgbColor) {
    if (this.flashTimer) {
      return;
    }
    try {
      await this.device.write(color);
      metrics.incrementCounter('device.writes');
    } catch (error) {
      this.recordWriteFailure(error);
    }
  }

  private recordWriteFailure(error: unknown) {
    const err = error instanceof DeviceError ? error : new DeviceError('Output device write failed', error);
    metrics.incrementCounter('device.write_errors');
    metrics.recordDetectorError(COMPONENT, err.message);
    logger.error({ component: COMPONENT, err, command: this.state.command }, 'Output device write failed');
  }

  private emitEvent(message: string) {
    this.bus.emitEvent({
      source: 'light',
      detector: COMPONENT,
      severity: 'info',
      message,
      meta: {
        cause: this.state.cause,
        autoMode: this.state.autoMode,
        color: commandName(this.state.command)
      }
    });
  }
}

export default DeviceController;
