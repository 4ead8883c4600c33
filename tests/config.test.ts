import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  ConfigManager,
  loadConfigFromFile,
  parseConfig,
  validateConfig,
  type CamlightConfig,
  type ConfigReloadEvent
} from '../src/config/index.js';

const DEFAULT_CONFIG_PATH = path.resolve('config/default.json');

function baseConfig(): CamlightConfig {
  return structuredClone(loadConfigFromFile(DEFAULT_CONFIG_PATH));
}

describe('ConfigValidation', () => {
  it('ConfigDefaultFileIsValid', () => {
    const config = loadConfigFromFile(DEFAULT_CONFIG_PATH);
    expect(config.app.name).toBe('camlight');
    expect(config.camera.framesPerSecond).toBe(60);
    expect(config.preview).toMatchObject({ width: 1280, height: 720, maxFps: 30, boundary: 'frame' });
    expect(config.device.motionColor).toEqual({ red: 0, green: 0, blue: 100 });
  });

  it('ConfigRejectsMalformedJson', () => {
    expect(() => parseConfig('{ "app": ')).toThrow(/^Failed to parse configuration: /);
  });

  it('ConfigReportsSchemaViolations', () => {
    const config: Record<string, unknown> = { ...baseConfig() };
    config.motion = { ...baseConfig().motion, areaThreshold: 2 };
    config.camera = { ...baseConfig().camera, zoom: 2 };

    expect(() => validateConfig(config)).toThrow(
      'config.camera.zoom is not allowed; config.motion.areaThreshold must be <= 1'
    );
  });

  it('ConfigRequiresSections', () => {
    const config: Record<string, unknown> = { ...baseConfig() };
    delete config.server;
    expect(() => validateConfig(config)).toThrow('config.server is required');
  });

  it('ConfigRejectsPreviewLargerThanCapture', () => {
    const config = baseConfig();
    config.preview.width = 4000;
    expect(() => validateConfig(config)).toThrow(
      'config.preview.width (4000) must not exceed config.camera.width (1920)'
    );
  });

  it('ConfigRequiresDistinctPwmChannels', () => {
    const config = baseConfig();
    config.device.driver = 'pwm';
    if (config.device.pwm) {
      config.device.pwm.channels = { red: 0, green: 0, blue: 2 };
    }
    expect(() => validateConfig(config)).toThrow('config.device.pwm.channels must be distinct');
  });

  it('ConfigRequiresPushoverCredentials', () => {
    const config = baseConfig();
    config.notifications.provider = 'pushover';
    expect(() => validateConfig(config)).toThrow(
      'config.notifications.pushover.token and user are required when provider is "pushover"'
    );

    config.notifications.pushover = { token: 'test-token', user: 'test-user' };
    expect(() => validateConfig(config)).not.toThrow();
  });
});

describe('ConfigManager', () => {
  const directories: string[] = [];

  afterEach(() => {
    for (const directory of directories.splice(0)) {
      fs.rmSync(directory, { recursive: true, force: true });
    }
  });

  function writeTempConfig(config: CamlightConfig) {
    const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'camlight-config-'));
    directories.push(directory);
    const filePath = path.join(directory, 'config.json');
    fs.writeFileSync(filePath, JSON.stringify(config, null, 2));
    return filePath;
  }

  it('ConfigManagerReloadEmitsPreviousAndNext', () => {
    const filePath = writeTempConfig(baseConfig());
    const manager = new ConfigManager(filePath);
    const events: ConfigReloadEvent[] = [];
    manager.on('reload', (event: ConfigReloadEvent) => events.push(event));

    const updated = baseConfig();
    updated.motion.diffThreshold = 40;
    fs.writeFileSync(filePath, JSON.stringify(updated));
    const next = manager.reload();

    expect(next.motion.diffThreshold).toBe(40);
    expect(manager.getConfig()).toBe(next);
    expect(events).toHaveLength(1);
    expect(events[0].previous.motion.diffThreshold).toBe(25);
    expect(events[0].next.motion.diffThreshold).toBe(40);
  });

  it('ConfigManagerKeepsPreviousConfigOnInvalidReload', () => {
    const filePath = writeTempConfig(baseConfig());
    const manager = new ConfigManager(filePath);
    const before = manager.getConfig();

    fs.writeFileSync(filePath, '{ not json');
    expect(() => manager.reload()).toThrow('Failed to parse configuration');
    expect(manager.getConfig()).toBe(before);
  });

  it('ConfigManagerWatchAppliesFileChanges', async () => {
    const filePath = writeTempConfig(baseConfig());
    const manager = new ConfigManager(filePath);
    const levels: string[] = [];
    manager.on('reload', ({ next }: ConfigReloadEvent) => levels.push(next.logging.level));
    const stopWatching = manager.watch();

    try {
      const updated = baseConfig();
      updated.logging.level = 'debug';
      fs.writeFileSync(filePath, JSON.stringify(updated));
      await vi.waitFor(() => expect(levels).toContain('debug'), { timeout: 3_000, interval: 50 });
    } finally {
      stopWatching();
    }
  });

  it('ConfigManagerWatchRestoresLastGoodFileOnError', async () => {
    const original = baseConfig();
    const filePath = writeTempConfig(original);
    const manager = new ConfigManager(filePath);
    const errors: Error[] = [];
    manager.on('error', (error: Error) => errors.push(error));
    const stopWatching = manager.watch();

    try {
      fs.writeFileSync(filePath, '{ broken');
      await vi.waitFor(() => expect(errors.length).toBeGreaterThan(0), { timeout: 3_000, interval: 50 });
      expect(manager.getConfig().logging.level).toBe('info');
      expect(JSON.parse(fs.readFileSync(filePath, 'utf-8'))).toEqual(original);
    } finally {
      stopWatching();
    }
  });
});
