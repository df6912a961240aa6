/**
 * stem-router - entry point
 *
 * Wires settings, logger, backends, ledger, cache, analyzer, pipeline,
 * scanner and scheduler into one service handle.
 */

import * as path from 'path';
import type { StemSettings } from '../shared/types';
import { TagReader } from './services/audioReader';
import { CloudBackend } from './services/backends/cloudBackend';
import { LocalModelBackend } from './services/backends/localModelBackend';
import type { SeparationBackend } from './services/backends/separationBackend';
import { BatchScheduler } from './services/batchScheduler';
import { DEFAULT_LEDGER_FILENAME, JobLedger } from './services/jobLedger';
import { LibraryScanner } from './services/libraryScanner';
import { Logger } from './services/logger';
import { QualityAnalyzer, StemQualityScorer } from './services/qualityAnalyzer';
import {
  SettingsManager,
  SettingsManagerOptions,
  resolveRemoteApiKey,
  validateSettings,
} from './services/settingsManager';
import { StemCache } from './services/stemCache';
import { StemLayout } from './services/stemLayout';
import { StemPipeline } from './services/stemPipeline';

// ─── Interfaces ──────────────────────────────────────────────────────────

export interface StemServiceOptions {
  /** Defaults to a file logger in the default log directory */
  logger?: Logger;
  /** Prebuilt backends; defaults to the local and cloud backends from settings */
  backends?: SeparationBackend[];
  /** Defaults to the SI-SDR QualityAnalyzer */
  analyzer?: StemQualityScorer;
  /** Defaults to music-metadata */
  tagReader?: TagReader;
  /** Environment consulted for the remote API key */
  env?: NodeJS.ProcessEnv;
}

export interface StemService {
  settings: StemSettings;
  logger: Logger;
  backends: SeparationBackend[];
  ledger: JobLedger;
  cache: StemCache | null;
  layout: StemLayout;
  pipeline: StemPipeline;
  scanner: LibraryScanner;
  scheduler: BatchScheduler;
  /** Closes the ledger database */
  close(): void;
}

// ─── Composition ─────────────────────────────────────────────────────────

/**
 * Builds and initializes every component from settings.
 * Unknown or out-of-range settings fall back to their defaults.
 */
export async function createStemService(
  settings: Partial<StemSettings> = {},
  options: StemServiceOptions = {},
): Promise<StemService> {
  const resolved = validateSettings(settings);

  const logger = options.logger ?? new Logger();
  if (!logger.isInitialized()) {
    await logger.initialize();
  }

  const backends = options.backends ?? [
    new LocalModelBackend({
      command: resolved.localCommand,
      model: resolved.localModel,
      device: resolved.localDevice,
      timeoutMs: resolved.localTimeoutMs,
      logger,
    }),
    new CloudBackend({
      apiKey: resolveRemoteApiKey(resolved, options.env),
      baseUrl: resolved.remoteBaseUrl,
      pollIntervalMs: resolved.remotePollIntervalMs,
      timeoutMs: resolved.remoteTimeoutMs,
      logger,
    }),
  ];
  await Promise.all(backends.map((backend) => backend.initialize()));

  const ledger = new JobLedger({
    dbPath: resolved.dbPath ?? path.join(resolved.outputDir, DEFAULT_LEDGER_FILENAME),
  });
  ledger.initialize();

  let cache: StemCache | null = null;
  if (resolved.cacheDir !== null) {
    cache = new StemCache(resolved.cacheDir, { logger });
    await cache.initialize();
  }

  const layout = new StemLayout(resolved.outputDir, { tagReader: options.tagReader, logger });
  const pipeline = new StemPipeline({
    backends,
    ledger,
    analyzer: options.analyzer ?? new QualityAnalyzer({ logger }),
    layout,
    cache,
    logger,
    localSizeThresholdBytes: resolved.localSizeThresholdMb * 1024 * 1024,
    defaults: {
      backend: resolved.defaultBackend,
      skipIfExisting: resolved.skipExisting,
      qualityFallback: resolved.qualityFallback,
    },
  });
  const scanner = new LibraryScanner({
    priorityGroups: resolved.priorityGroups,
    tagReader: options.tagReader,
    logger,
  });
  const scheduler = new BatchScheduler({
    pipeline,
    scanner,
    logger,
    recursive: resolved.recursiveScan,
  });

  const available = backends.filter((backend) => backend.isAvailable()).map((b) => b.name);
  logger.info(
    `Stem service ready (backends: ${available.length > 0 ? available.join(', ') : 'none'})`,
    { step: 'startup' },
  );

  return {
    settings: resolved,
    logger,
    backends,
    ledger,
    cache,
    layout,
    pipeline,
    scanner,
    scheduler,
    close: () => ledger.close(),
  };
}

/**
 * Loads persisted settings and builds the service from them.
 */
export async function loadStemService(
  managerOptions: SettingsManagerOptions = {},
  options: StemServiceOptions = {},
): Promise<StemService> {
  const logger = options.logger ?? new Logger();
  if (!logger.isInitialized()) {
    await logger.initialize();
  }
  const manager = new SettingsManager({ ...managerOptions, logger });
  await manager.initialize();
  return createStemService(manager.get(), { ...options, logger });
}

// ─── Public API ──────────────────────────────────────────────────────────

export * from '../shared/types';
export * from './services/errors';
export { Logger } from './services/logger';
export { SettingsManager, validateSettings } from './services/settingsManager';
export { LocalModelBackend } from './services/backends/localModelBackend';
export { CloudBackend } from './services/backends/cloudBackend';
export type { SeparationBackend } from './services/backends/separationBackend';
export { StemPipeline } from './services/stemPipeline';
export type { PipelineResult, SeparateOptions } from './services/stemPipeline';
export { QualityAnalyzer, calculateSiSdr, evaluateQuality } from './services/qualityAnalyzer';
export { StemCache } from './services/stemCache';
export { JobLedger } from './services/jobLedger';
export { LibraryScanner } from './services/libraryScanner';
export type { ScanResult } from './services/libraryScanner';
export { BatchScheduler } from './services/batchScheduler';
export type { BatchProgress, BatchResult, BatchRunOptions } from './services/batchScheduler';
