import fs from 'node:fs/promises';
import path from 'node:path';
import logger from '../logger.js';
import { DeviceError } from '../errors.js';
import type { PwmChannelMap } from '../config/index.js';
import type { RgbColor } from '../types.js';

/** The RGB light capability. Intensities are percentages. */
export interface OutputDevice {
  write(color: RgbColor): Promise<void>;
  close(): Promise<void>;
}

export class LoggingOutputDevice implements OutputDevice {
  private last: RgbColor | null = null;

  get lastWritten(): RgbColor | null {
    return this.last;
  }

  async write(color: RgbColor): Promise<void> {
    this.last = color;
    logger.info({ component: 'device', ...color }, 'LED output updated');
  }

  async close(): Promise<void> {
    this.last = null;
  }
}

export type SysfsPwmOptions = {
  chipPath: string;
  channels: PwmChannelMap;
  periodNs: number;
  commonAnode: boolean;
};

const CHANNEL_ORDER = ['red', 'green', 'blue'] as const;
const NEAR_OFF = 0.02;

/**
 * Duty cycle for one channel. Common-anode LEDs are lit by pulling the pin low,
 * so the output is inverted, and levels within 2% of off are snapped to off.
 */
export function dutyCycleNs(percent: number, periodNs: number, commonAnode: boolean): number {
  const level = Math.min(1, Math.max(0, percent / 100));
  let output = commonAnode ? 1 - level : level;
  if (commonAnode && output > 1 - NEAR_OFF) {
    output = 1;
  } else if (!commonAnode && output < NEAR_OFF) {
    output = 0;
  }
  return Math.round(output * periodNs);
}

/** Drives three channels of a Linux PWM chip through sysfs. */
export class SysfsPwmRgbDevice implements OutputDevice {
  private readonly options: SysfsPwmOptions;
  private initialized: Promise<void> | null = null;

  constructor(options: SysfsPwmOptions) {
    this.options = options;
  }

  async write(color: RgbColor): Promise<void> {
    await this.ensureInitialized();
    try {
      for (const channel of CHANNEL_ORDER) {
        const duty = dutyCycleNs(color[channel], this.options.periodNs, this.options.commonAnode);
        await fs.writeFile(this.channelFile(channel, 'duty_cycle'), String(duty));
      }
    } catch (error) {
      throw new DeviceError('Failed to write PWM duty cycle', error);
    }
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    this.initialized = null;
    try {
      for (const channel of CHANNEL_ORDER) {
        await fs.writeFile(this.channelFile(channel, 'enable'), '0');
      }
    } catch (error) {
      throw new DeviceError('Failed to disable PWM channels', error);
    }
  }

  private ensureInitialized(): Promise<void> {
    if (!this.initialized) {
      this.initialized = this.initialize().catch((error: unknown) => {
        this.initialized = null;
        throw error instanceof DeviceError ? error : new DeviceError('Failed to set up PWM channels', error);
      });
    }
    return this.initialized;
  }

  private async initialize() {
    for (const channel of CHANNEL_ORDER) {
      const index = this.options.channels[channel];
      const directory = path.join(this.options.chipPath, `pwm${index}`);
      const exported = await fs
        .stat(directory)
        .then(stats => stats.isDirectory())
        .catch(() => false);
      if (!exported) {
        await fs.writeFile(path.join(this.options.chipPath, 'export'), String(index));
      }
      await fs.writeFile(path.join(directory, 'period'), String(this.options.periodNs));
      await fs.writeFile(path.join(directory, 'enable'), '1');
    }
    logger.info({ component: 'device', chip: this.options.chipPath }, 'PWM channels ready');
  }

  private channelFile(channel: (typeof CHANNEL_ORDER)[number], file: string) {
    return path.join(this.options.chipPath, `pwm${this.options.channels[channel]}`, file);
  }
}
