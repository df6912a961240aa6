/**
 * Settings Manager Service for the Stem Router
 *
 * Persists StemSettings as JSON at %APPDATA%/stem-router/settings.json
 * (Windows) or ~/.config/stem-router/settings.json (other platforms).
 * Every field is validated on load and on save; invalid values fall back to
 * the defaults, numeric values are clamped to sane ranges.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { BackendPreference, DEFAULT_SETTINGS, StemSettings } from '../../shared/types';
import { errorMessage } from './errors';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for configuring the SettingsManager */
export interface SettingsManagerOptions {
  /** Custom directory for the settings file. Defaults to platform appdata */
  settingsDir?: string;
  /** Custom filename for the settings file. Defaults to 'settings.json' */
  fileName?: string;
  logger?: Logger;
}

/** Listener callback type for settings changes */
export type SettingsChangeListener = (settings: StemSettings) => void;

// ─── Constants ───────────────────────────────────────────────────────────────

const APP_DIR_NAME = 'stem-router';

const DEFAULT_SETTINGS_FILENAME = 'settings.json';

/** Environment variable consulted when no remote API key is configured */
export const API_KEY_ENV_VAR = 'STEM_ROUTER_API_KEY';

const MIN_POLL_INTERVAL_MS = 500;
const MAX_POLL_INTERVAL_MS = 60_000;
const MIN_TIMEOUT_MS = 10_000;
const MAX_TIMEOUT_MS = 6 * 60 * 60 * 1000;

// ─── Helper Functions ────────────────────────────────────────────────────────

/**
 * Returns the default settings directory path based on the platform.
 */
export function getDefaultSettingsDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isBackendPreference(value: unknown): value is BackendPreference {
  return value === 'auto' || value === 'local' || value === 'remote';
}

function isLocalDevice(value: unknown): value is StemSettings['localDevice'] {
  return value === 'auto' || value === 'cuda' || value === 'cpu';
}

/**
 * Rounds and clamps a numeric setting. Non-numbers return the fallback.
 */
export function clampNumber(value: unknown, min: number, max: number, fallback: number): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, Math.round(value)));
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

/**
 * Validates a partial settings object and merges it over the defaults.
 */
export function validateSettings(partial: unknown): StemSettings {
  if (!isRecord(partial)) {
    return { ...DEFAULT_SETTINGS, priorityGroups: [] };
  }

  const raw = partial;
  const validated: StemSettings = { ...DEFAULT_SETTINGS, priorityGroups: [] };

  validated.outputDir = nonEmptyString(raw.outputDir) ?? DEFAULT_SETTINGS.outputDir;

  // cacheDir: explicit null disables the cache
  if (raw.cacheDir === null) {
    validated.cacheDir = null;
  } else {
    validated.cacheDir = nonEmptyString(raw.cacheDir) ?? DEFAULT_SETTINGS.cacheDir;
  }

  validated.dbPath = nonEmptyString(raw.dbPath);

  if (isBackendPreference(raw.defaultBackend)) {
    validated.defaultBackend = raw.defaultBackend;
  }

  if (typeof raw.qualityFallback === 'boolean') {
    validated.qualityFallback = raw.qualityFallback;
  }

  if (typeof raw.skipExisting === 'boolean') {
    validated.skipExisting = raw.skipExisting;
  }

  validated.localSizeThresholdMb = clampNumber(
    raw.localSizeThresholdMb,
    1,
    10_000,
    DEFAULT_SETTINGS.localSizeThresholdMb,
  );

  // priorityGroups: trimmed, non-empty, unique
  if (Array.isArray(raw.priorityGroups)) {
    const groups = new Set<string>();
    for (const group of raw.priorityGroups) {
      const name = nonEmptyString(group);
      if (name) groups.add(name);
    }
    validated.priorityGroups = [...groups];
  }

  if (typeof raw.recursiveScan === 'boolean') {
    validated.recursiveScan = raw.recursiveScan;
  }

  validated.localCommand = nonEmptyString(raw.localCommand) ?? DEFAULT_SETTINGS.localCommand;
  validated.localModel = nonEmptyString(raw.localModel) ?? DEFAULT_SETTINGS.localModel;

  if (isLocalDevice(raw.localDevice)) {
    validated.localDevice = raw.localDevice;
  }

  validated.localTimeoutMs = clampNumber(
    raw.localTimeoutMs,
    MIN_TIMEOUT_MS,
    MAX_TIMEOUT_MS,
    DEFAULT_SETTINGS.localTimeoutMs,
  );

  if (typeof raw.remoteApiKey === 'string') {
    validated.remoteApiKey = raw.remoteApiKey.trim();
  }

  const baseUrl = nonEmptyString(raw.remoteBaseUrl);
  if (baseUrl && /^https?:\/\//.test(baseUrl)) {
    validated.remoteBaseUrl = baseUrl.replace(/\/+$/, '');
  }

  validated.remotePollIntervalMs = clampNumber(
    raw.remotePollIntervalMs,
    MIN_POLL_INTERVAL_MS,
    MAX_POLL_INTERVAL_MS,
    DEFAULT_SETTINGS.remotePollIntervalMs,
  );

  validated.remoteTimeoutMs = clampNumber(
    raw.remoteTimeoutMs,
    MIN_TIMEOUT_MS,
    MAX_TIMEOUT_MS,
    DEFAULT_SETTINGS.remoteTimeoutMs,
  );

  return validated;
}

/**
 * The configured remote API key, or the environment variable when the
 * configured value is empty.
 */
export function resolveRemoteApiKey(
  settings: Pick<StemSettings, 'remoteApiKey'>,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (settings.remoteApiKey) {
    return settings.remoteApiKey;
  }
  return env[API_KEY_ENV_VAR]?.trim() ?? '';
}

export function serializeSettings(settings: StemSettings): string {
  return JSON.stringify(settings, null, 2);
}

/**
 * Parses settings JSON. Returns null when the content is not a JSON object.
 */
export function deserializeSettings(json: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Manages settings with file-based persistence.
 *
 * Usage:
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize();
 *
 * const settings = manager.get();
 * await manager.save({ defaultBackend: 'local' });
 * await manager.reset();
 * ```
 */
export class SettingsManager {
  private settings: StemSettings;
  private readonly settingsDir: string;
  private readonly fileName: string;
  private readonly logger?: Logger;
  private readonly listeners: SettingsChangeListener[] = [];
  private initialized = false;

  constructor(options?: SettingsManagerOptions) {
    this.settingsDir = options?.settingsDir ?? getDefaultSettingsDir();
    this.fileName = options?.fileName ?? DEFAULT_SETTINGS_FILENAME;
    this.logger = options?.logger;
    this.settings = validateSettings({});
  }

  /**
   * Loads settings from file. A missing file keeps the defaults; an
   * unreadable or corrupt one keeps the defaults and logs a warning.
   */
  async initialize(): Promise<void> {
    const filePath = this.getFilePath();

    if (fs.existsSync(filePath)) {
      try {
        const content = await fs.promises.readFile(filePath, 'utf-8');
        const parsed = deserializeSettings(content);
        if (parsed) {
          this.settings = validateSettings(parsed);
        } else {
          this.logger?.warn('Settings file is not a JSON object, using defaults', {
            filePath,
            step: 'settings',
          });
        }
      } catch (error: unknown) {
        this.logger?.warn('Failed to read settings file, using defaults', {
          filePath,
          step: 'settings',
          cause: errorMessage(error),
        });
      }
    }

    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Returns a copy of the current settings.
   */
  get(): StemSettings {
    return { ...this.settings, priorityGroups: [...this.settings.priorityGroups] };
  }

  /**
   * Merges a partial update, validates, persists and notifies listeners.
   */
  async save(updates: Partial<StemSettings>): Promise<StemSettings> {
    this.settings = validateSettings({ ...this.settings, ...updates });
    await this.writeToFile();
    this.notifyListeners();
    return this.get();
  }

  /**
   * Resets all settings to defaults and persists.
   */
  async reset(): Promise<StemSettings> {
    this.settings = validateSettings({});
    await this.writeToFile();
    this.notifyListeners();
    return this.get();
  }

  getFilePath(): string {
    return path.join(this.settingsDir, this.fileName);
  }

  getSettingsDir(): string {
    return this.settingsDir;
  }

  /**
   * Registers a listener for settings changes. Returns an unsubscribe function.
   */
  onChange(listener: SettingsChangeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    };
  }

  getListenerCount(): number {
    return this.listeners.length;
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private async writeToFile(): Promise<void> {
    await fs.promises.mkdir(this.settingsDir, { recursive: true });
    await fs.promises.writeFile(this.getFilePath(), serializeSettings(this.settings), 'utf-8');
  }

  /**
   * A throwing listener is logged and does not stop the others.
   */
  private notifyListeners(): void {
    const settingsCopy = this.get();
    for (const listener of this.listeners) {
      try {
        listener(settingsCopy);
      } catch (error: unknown) {
        this.logger?.warn('Settings listener failed', {
          step: 'settings',
          cause: errorMessage(error),
        });
      }
    }
  }
}
