import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import type { RgbColor } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type DatabaseConfig = {
  path: string;
};

export type CameraConfig = {
  input: string;
  inputFormat?: string;
  width: number;
  height: number;
  framesPerSecond: number;
  inputArgs?: string[];
  captureTimeoutMs: number;
  retryDelayMs: number;
  maxConsecutiveFailures: number;
};

export type MotionConfig = {
  diffThreshold: number;
  areaThreshold: number;
  referenceRefreshFrames: number;
  sampleStep: number;
  blur: boolean;
};

export type PreviewConfig = {
  width: number;
  height: number;
  quality: number;
  maxFps: number;
  boundary: string;
};

export type SnapshotConfig = {
  quality: number;
  timeoutMs: number;
  flashMs: number;
};

export type DeviceDriver = 'log' | 'pwm';

export type PwmChannelMap = {
  red: number;
  green: number;
  blue: number;
};

export type PwmConfig = {
  chipPath: string;
  channels: PwmChannelMap;
  periodNs: number;
  commonAnode: boolean;
};

export type DeviceConfig = {
  driver: DeviceDriver;
  autoMode: boolean;
  motionColor: RgbColor;
  pwm?: PwmConfig;
};

export type NotifyProvider = 'log' | 'pushover';

export type PushoverConfig = {
  token: string;
  user: string;
  priority?: number;
};

export type NotificationsConfig = {
  provider: NotifyProvider;
  timeoutMs: number;
  pushover?: PushoverConfig;
};

export type ServerConfig = {
  host: string;
  port: number;
};

export type CamlightConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  database: DatabaseConfig;
  camera: CameraConfig;
  motion: MotionConfig;
  preview: PreviewConfig;
  snapshot: SnapshotConfig;
  device: DeviceConfig;
  notifications: NotificationsConfig;
  server: ServerConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  integer?: boolean;
};

const percentSchema: JsonSchema = { type: 'number', minimum: 0, maximum: 100 };

const colorSchema: JsonSchema = {
  type: 'object',
  required: ['red', 'green', 'blue'],
  additionalProperties: false,
  properties: {
    red: percentSchema,
    green: percentSchema,
    blue: percentSchema
  }
};

const pwmChannelSchema: JsonSchema = { type: 'number', minimum: 0, integer: true };

const camlightConfigSchema: JsonSchema = {
  type: 'object',
  required: [
    'app',
    'logging',
    'database',
    'camera',
    'motion',
    'preview',
    'snapshot',
    'device',
    'notifications',
    'server'
  ],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    database: {
      type: 'object',
      required: ['path'],
      additionalProperties: false,
      properties: {
        path: { type: 'string' }
      }
    },
    camera: {
      type: 'object',
      required: [
        'input',
        'width',
        'height',
        'framesPerSecond',
        'captureTimeoutMs',
        'retryDelayMs',
        'maxConsecutiveFailures'
      ],
      additionalProperties: false,
      properties: {
        input: { type: 'string' },
        inputFormat: { type: 'string' },
        width: { type: 'number', minimum: 1, integer: true },
        height: { type: 'number', minimum: 1, integer: true },
        framesPerSecond: { type: 'number', minimum: 1, maximum: 240 },
        inputArgs: { type: 'array', items: { type: 'string' } },
        captureTimeoutMs: { type: 'number', minimum: 1 },
        retryDelayMs: { type: 'number', minimum: 0 },
        maxConsecutiveFailures: { type: 'number', minimum: 1, integer: true }
      }
    },
    motion: {
      type: 'object',
      required: ['diffThreshold', 'areaThreshold', 'referenceRefreshFrames', 'sampleStep', 'blur'],
      additionalProperties: false,
      properties: {
        diffThreshold: { type: 'number', minimum: 0, maximum: 255 },
        areaThreshold: { type: 'number', minimum: 0, maximum: 1 },
        referenceRefreshFrames: { type: 'number', minimum: 1, integer: true },
        sampleStep: { type: 'number', minimum: 1, integer: true },
        blur: { type: 'boolean' }
      }
    },
    preview: {
      type: 'object',
      required: ['width', 'height', 'quality', 'maxFps', 'boundary'],
      additionalProperties: false,
      properties: {
        width: { type: 'number', minimum: 1, integer: true },
        height: { type: 'number', minimum: 1, integer: true },
        quality: { type: 'number', minimum: 1, maximum: 100, integer: true },
        maxFps: { type: 'number', minimum: 1, maximum: 240 },
        boundary: { type: 'string' }
      }
    },
    snapshot: {
      type: 'object',
      required: ['quality', 'timeoutMs', 'flashMs'],
      additionalProperties: false,
      properties: {
        quality: { type: 'number', minimum: 1, maximum: 100, integer: true },
        timeoutMs: { type: 'number', minimum: 1 },
        flashMs: { type: 'number', minimum: 0 }
      }
    },
    device: {
      type: 'object',
      required: ['driver', 'autoMode', 'motionColor'],
      additionalProperties: false,
      properties: {
        driver: { type: 'string', enum: ['log', 'pwm'] },
        autoMode: { type: 'boolean' },
        motionColor: colorSchema,
        pwm: {
          type: 'object',
          required: ['chipPath', 'channels', 'periodNs', 'commonAnode'],
          additionalProperties: false,
          properties: {
            chipPath: { type: 'string' },
            channels: {
              type: 'object',
              required: ['red', 'green', 'blue'],
              additionalProperties: false,
              properties: {
                red: pwmChannelSchema,
                green: pwmChannelSchema,
                blue: pwmChannelSchema
              }
            },
            periodNs: { type: 'number', minimum: 1, integer: true },
            commonAnode: { type: 'boolean' }
          }
        }
      }
    },
    notifications: {
      type: 'object',
      required: ['provider', 'timeoutMs'],
      additionalProperties: false,
      properties: {
        provider: { type: 'string', enum: ['log', 'pushover'] },
        timeoutMs: { type: 'number', minimum: 1 },
        pushover: {
          type: 'object',
          required: ['token', 'user'],
          additionalProperties: false,
          properties: {
            token: { type: 'string' },
            user: { type: 'string' },
            priority: { type: 'number', minimum: -2, maximum: 2, integer: true }
          }
        }
      }
    },
    server: {
      type: 'object',
      required: ['host', 'port'],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535, integer: true }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    const required = schema.required ?? [];

    for (const key of required) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (definedProperties.has(key)) {
          continue;
        }
        errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (schema.integer && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  return errors;
}

export function validateConfig(config: unknown): asserts config is CamlightConfig {
  const errors = validateAgainstSchema(camlightConfigSchema, config, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  validateLogicalConfig(config as CamlightConfig);
}

export function parseConfig(contents: string): CamlightConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): CamlightConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: CamlightConfig) {
  const messages: string[] = [];

  if (config.preview.width > config.camera.width) {
    messages.push(
      `config.preview.width (${config.preview.width}) must not exceed config.camera.width (${config.camera.width})`
    );
  }
  if (config.preview.height > config.camera.height) {
    messages.push(
      `config.preview.height (${config.preview.height}) must not exceed config.camera.height (${config.camera.height})`
    );
  }

  if (config.preview.boundary.trim().length === 0) {
    messages.push('config.preview.boundary must not be empty');
  }

  if (config.device.driver === 'pwm') {
    const pwm = config.device.pwm;
    if (!pwm) {
      messages.push('config.device.pwm is required when driver is "pwm"');
    } else {
      const channels = [pwm.channels.red, pwm.channels.green, pwm.channels.blue];
      if (new Set(channels).size !== channels.length) {
        messages.push('config.device.pwm.channels must be distinct');
      }
    }
  }

  if (config.notifications.provider === 'pushover') {
    const pushover = config.notifications.pushover;
    if (!pushover || !pushover.token || !pushover.user) {
      messages.push('config.notifications.pushover.token and user are required when provider is "pushover"');
    }
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export type ConfigReloadEvent = {
  previous: CamlightConfig;
  next: CamlightConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: CamlightConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): CamlightConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): CamlightConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private recreateWatcher() {
    this.closeWatcher();
    this.watcher = this.createWatcher();
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: CamlightConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    if (!this.lastGoodRaw) {
      return;
    }

    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit('error', err);
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

export { camlightConfigSchema };
