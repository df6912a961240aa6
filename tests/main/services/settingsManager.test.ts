/**
 * Tests for Settings Manager
 *
 * Covers validation and clamping, API key resolution, serialization,
 * file persistence, corrupt files and change listeners.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DEFAULT_SETTINGS } from '../../../src/shared/types';
import { Logger } from '../../../src/main/services/logger';
import {
  API_KEY_ENV_VAR,
  SettingsManager,
  clampNumber,
  deserializeSettings,
  getDefaultSettingsDir,
  resolveRemoteApiKey,
  serializeSettings,
  validateSettings,
} from '../../../src/main/services/settingsManager';

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'settings-test-'));
}

describe('Settings Manager', () => {
  describe('getDefaultSettingsDir', () => {
    it('should end with the app directory', () => {
      expect(path.basename(getDefaultSettingsDir())).toBe('stem-router');
    });
  });

  describe('clampNumber', () => {
    it('should round and clamp', () => {
      expect(clampNumber(4.6, 1, 10, 3)).toBe(5);
      expect(clampNumber(-2, 1, 10, 3)).toBe(1);
      expect(clampNumber(99, 1, 10, 3)).toBe(10);
    });

    it('should fall back for non-numbers', () => {
      expect(clampNumber('7', 1, 10, 3)).toBe(3);
      expect(clampNumber(Number.NaN, 1, 10, 3)).toBe(3);
      expect(clampNumber(undefined, 1, 10, 3)).toBe(3);
    });
  });

  describe('validateSettings', () => {
    it('should return defaults for non-objects', () => {
      expect(validateSettings(null)).toEqual(DEFAULT_SETTINGS);
      expect(validateSettings([1, 2])).toEqual(DEFAULT_SETTINGS);
      expect(validateSettings('x')).toEqual(DEFAULT_SETTINGS);
    });

    it('should keep valid values', () => {
      const settings = validateSettings({
        outputDir: '  /stems  ',
        defaultBackend: 'remote',
        qualityFallback: false,
        localDevice: 'cpu',
        remoteApiKey: ' test-api-key ',
      });
      expect(settings.outputDir).toBe('/stems');
      expect(settings.defaultBackend).toBe('remote');
      expect(settings.qualityFallback).toBe(false);
      expect(settings.localDevice).toBe('cpu');
      expect(settings.remoteApiKey).toBe('test-api-key');
    });

    it('should reject invalid enum values', () => {
      const settings = validateSettings({ defaultBackend: 'gpu', localDevice: 'tpu' });
      expect(settings.defaultBackend).toBe('auto');
      expect(settings.localDevice).toBe('auto');
    });

    it('should keep an explicit null cacheDir and default an empty one', () => {
      expect(validateSettings({ cacheDir: null }).cacheDir).toBeNull();
      expect(validateSettings({ cacheDir: '' }).cacheDir).toBe(DEFAULT_SETTINGS.cacheDir);
    });

    it('should clamp numeric settings', () => {
      const settings = validateSettings({
        localSizeThresholdMb: 0,
        remotePollIntervalMs: 10,
        remoteTimeoutMs: 10 * 60 * 60 * 1000,
        localTimeoutMs: 'soon',
      });
      expect(settings.localSizeThresholdMb).toBe(1);
      expect(settings.remotePollIntervalMs).toBe(500);
      expect(settings.remoteTimeoutMs).toBe(6 * 60 * 60 * 1000);
      expect(settings.localTimeoutMs).toBe(DEFAULT_SETTINGS.localTimeoutMs);
    });

    it('should trim and deduplicate priority groups', () => {
      const settings = validateSettings({ priorityGroups: [' Peak ', 'Peak', '', 3, 'Warmup'] });
      expect(settings.priorityGroups).toEqual(['Peak', 'Warmup']);
    });

    it('should only accept http(s) base URLs and strip trailing slashes', () => {
      expect(validateSettings({ remoteBaseUrl: 'https://example.test/api//' }).remoteBaseUrl).toBe(
        'https://example.test/api',
      );
      expect(validateSettings({ remoteBaseUrl: 'ftp://example.test' }).remoteBaseUrl).toBe(
        DEFAULT_SETTINGS.remoteBaseUrl,
      );
    });

    it('should not share the defaults array', () => {
      const settings = validateSettings({});
      settings.priorityGroups.push('mutated');
      expect(DEFAULT_SETTINGS.priorityGroups).toEqual([]);
    });
  });

  describe('resolveRemoteApiKey', () => {
    it('should prefer the configured key', () => {
      expect(
        resolveRemoteApiKey({ remoteApiKey: 'test-api-key' }, { [API_KEY_ENV_VAR]: 'other' }),
      ).toBe('test-api-key');
    });

    it('should fall back to the environment variable', () => {
      expect(resolveRemoteApiKey({ remoteApiKey: '' }, { [API_KEY_ENV_VAR]: ' test-secret ' })).toBe(
        'test-secret',
      );
    });

    it('should return an empty string when neither is set', () => {
      expect(resolveRemoteApiKey({ remoteApiKey: '' }, {})).toBe('');
    });
  });

  describe('serializeSettings / deserializeSettings', () => {
    it('should read back serialized settings', () => {
      const settings = validateSettings({ priorityGroups: ['Peak'] });
      expect(deserializeSettings(serializeSettings(settings))).toEqual(settings);
    });

    it('should return null for invalid JSON and non-objects', () => {
      expect(deserializeSettings('{nope')).toBeNull();
      expect(deserializeSettings('[1]')).toBeNull();
      expect(deserializeSettings('null')).toBeNull();
    });
  });

  describe('SettingsManager', () => {
    let tempDir: string;
    let logger: Logger;

    beforeEach(async () => {
      tempDir = createTempDir();
      logger = new Logger({ writeToFile: false });
      await logger.initialize();
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should use defaults when no file exists', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir, logger });
      await manager.initialize();
      expect(manager.isInitialized()).toBe(true);
      expect(manager.get()).toEqual(DEFAULT_SETTINGS);
      expect(logger.size).toBe(0);
    });

    it('should persist and reload saved settings', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir });
      await manager.initialize();
      const saved = await manager.save({ defaultBackend: 'local', priorityGroups: ['Peak'] });
      expect(saved.defaultBackend).toBe('local');

      const reloaded = new SettingsManager({ settingsDir: tempDir });
      await reloaded.initialize();
      expect(reloaded.get().defaultBackend).toBe('local');
      expect(reloaded.get().priorityGroups).toEqual(['Peak']);
    });

    it('should validate values on save', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir });
      await manager.initialize();
      const saved = await manager.save({ remotePollIntervalMs: 1 });
      expect(saved.remotePollIntervalMs).toBe(500);
    });

    it('should keep defaults and warn on a corrupt file', async () => {
      fs.writeFileSync(path.join(tempDir, 'settings.json'), 'not json');
      const manager = new SettingsManager({ settingsDir: tempDir, logger });
      await manager.initialize();
      expect(manager.get()).toEqual(DEFAULT_SETTINGS);
      expect(logger.getWarnings()[0].message).toBe(
        'Settings file is not a JSON object, using defaults',
      );
    });

    it('should reset to defaults', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir, fileName: 'custom.json' });
      await manager.initialize();
      await manager.save({ skipExisting: false });
      const reset = await manager.reset();
      expect(reset).toEqual(DEFAULT_SETTINGS);
      expect(manager.getFilePath()).toBe(path.join(tempDir, 'custom.json'));
      expect(JSON.parse(fs.readFileSync(manager.getFilePath(), 'utf-8'))).toEqual(DEFAULT_SETTINGS);
    });

    it('should return copies from get()', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir });
      await manager.initialize();
      manager.get().priorityGroups.push('mutated');
      expect(manager.get().priorityGroups).toEqual([]);
    });

    it('should notify listeners until unsubscribed', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir });
      await manager.initialize();
      const listener = vi.fn();
      const unsubscribe = manager.onChange(listener);
      expect(manager.getListenerCount()).toBe(1);

      await manager.save({ recursiveScan: false });
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0].recursiveScan).toBe(false);

      unsubscribe();
      await manager.save({ recursiveScan: true });
      expect(listener).toHaveBeenCalledTimes(1);
      expect(manager.getListenerCount()).toBe(0);
    });

    it('should log a throwing listener and still call the rest', async () => {
      const manager = new SettingsManager({ settingsDir: tempDir, logger });
      await manager.initialize();
      const after = vi.fn();
      manager.onChange(() => {
        throw new Error('listener broke');
      });
      manager.onChange(after);

      await manager.save({ qualityFallback: false });
      expect(after).toHaveBeenCalledTimes(1);
      expect(logger.getWarnings()[0].cause).toBe('listener broke');
    });
  });
});
