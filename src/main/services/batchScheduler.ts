/**
 * Batch Scheduler
 *
 * Drives the stem pipeline over a priority-ordered list of tracks, one file
 * at a time. Backends parallelize internally; the scheduler does not.
 *
 * - Per-track error isolation (one failure never stops the batch)
 * - Graceful cancellation (finishes the current track, then stops)
 * - Resume: re-running with skipIfExisting skips tracks that have stems
 * - Progress callback after every track
 */

import { BackendPreference, CACHED_BACKEND_ID, ScannedTrack } from '../../shared/types';
import { errorMessage } from './errors';
import { LibraryScanner } from './libraryScanner';
import type { Logger } from './logger';
import { PipelineResult, SeparationPipeline } from './stemPipeline';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Counters for one batch run */
export interface BatchProgress {
  total: number;
  completed: number;
  failed: number;
  /** Tracks answered from existing output or the cache */
  skipped: number;
  remaining: number;
  /** (completed + skipped) / total × 100; 0 for an empty batch */
  percentComplete: number;
  /** Seconds left at the current average pace, null before the first track */
  estimatedTimeRemaining: number | null;
}

export type ProgressCallback = (progress: BatchProgress, track: ScannedTrack) => void;

export interface TrackOutcome {
  track: ScannedTrack;
  result: PipelineResult;
}

export interface TrackError {
  /** Null for errors that concern the scan root rather than a track */
  track: ScannedTrack | null;
  message: string;
}

export interface BatchResult {
  progress: BatchProgress;
  outcomes: TrackOutcome[];
  errors: TrackError[];
  elapsedSeconds: number;
  cancelled: boolean;
}

export interface BatchRunOptions {
  backend?: BackendPreference;
  skipIfExisting?: boolean;
  qualityFallback?: boolean;
  /** Process at most this many tracks, highest priority first */
  limit?: number;
  recursive?: boolean;
  onProgress?: ProgressCallback;
}

export interface BatchSchedulerOptions {
  pipeline: SeparationPipeline;
  scanner: LibraryScanner;
  logger?: Logger;
  /** Scan subdirectories unless a run says otherwise. Defaults to true */
  recursive?: boolean;
  /** Clock in ms. Defaults to Date.now */
  now?: () => number;
}

interface Counters {
  total: number;
  completed: number;
  failed: number;
  skipped: number;
}

// ─── Helpers ─────────────────────────────────────────────────────────────

/**
 * Progress snapshot from raw counters and elapsed time.
 */
export function createProgress(counters: Counters, elapsedMs: number): BatchProgress {
  const { total, completed, failed, skipped } = counters;
  const processed = completed + failed + skipped;
  const remaining = total - processed;

  let estimatedTimeRemaining: number | null = null;
  if (processed > 0) {
    estimatedTimeRemaining = Math.round((remaining * (elapsedMs / processed)) / 1000);
  }

  return {
    total,
    completed,
    failed,
    skipped,
    remaining,
    percentComplete: total === 0 ? 0 : ((completed + skipped) / total) * 100,
    estimatedTimeRemaining,
  };
}

function emptyBatch(message: string): BatchResult {
  return {
    progress: createProgress({ total: 0, completed: 0, failed: 0, skipped: 0 }, 0),
    outcomes: [],
    errors: [{ track: null, message }],
    elapsedSeconds: 0,
    cancelled: false,
  };
}

// ─── BatchScheduler Class ────────────────────────────────────────────────

export class BatchScheduler {
  private readonly pipeline: SeparationPipeline;
  private readonly scanner: LibraryScanner;
  private readonly logger?: Logger;
  private readonly recursive: boolean;
  private readonly now: () => number;

  private running = false;
  private cancelRequested = false;

  constructor(options: BatchSchedulerOptions) {
    this.pipeline = options.pipeline;
    this.scanner = options.scanner;
    this.logger = options.logger;
    this.recursive = options.recursive ?? true;
    this.now = options.now ?? Date.now;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Stops after the track currently being processed.
   */
  cancel(): void {
    if (this.running) {
      this.cancelRequested = true;
      this.logger?.info('Batch cancelled by user');
    }
  }

  /**
   * Scans a directory and processes its tracks in priority order.
   * A missing root returns an empty result with one error.
   */
  async processDirectory(dirPath: string, options: BatchRunOptions = {}): Promise<BatchResult> {
    const scan = await this.scanner.scanDirectory(dirPath, options.recursive ?? this.recursive);
    if (scan.totalFiles === 0 && scan.errors.length > 0) {
      return emptyBatch(scan.errors[0]);
    }

    const tracks =
      options.limit !== undefined && options.limit > 0
        ? scan.tracks.slice(0, options.limit)
        : scan.tracks;
    return this.processTracks(tracks, options);
  }

  /**
   * Processes a pre-scanned list in the order given.
   */
  async processTracks(tracks: ScannedTrack[], options: BatchRunOptions = {}): Promise<BatchResult> {
    const start = this.now();
    const counters: Counters = { total: tracks.length, completed: 0, failed: 0, skipped: 0 };
    const outcomes: TrackOutcome[] = [];
    const errors: TrackError[] = [];

    this.running = true;
    this.cancelRequested = false;
    this.logger?.info(`Starting batch: ${tracks.length} tracks`, { step: 'batch' });

    try {
      for (const track of tracks) {
        if (this.cancelRequested) break;

        try {
          const result = await this.pipeline.separate(track.path, {
            backend: options.backend,
            skipIfExisting: options.skipIfExisting,
            qualityFallback: options.qualityFallback,
          });
          outcomes.push({ track, result });

          if (!result.success) {
            counters.failed++;
            errors.push({ track, message: result.error ?? 'Unknown error' });
          } else if (result.backendId === CACHED_BACKEND_ID) {
            counters.skipped++;
          } else {
            counters.completed++;
          }
        } catch (error: unknown) {
          counters.failed++;
          errors.push({ track, message: errorMessage(error) });
          this.logger?.logError(error, { filePath: track.path, step: 'batch' });
        }

        options.onProgress?.(createProgress(counters, this.now() - start), track);
      }
    } finally {
      this.running = false;
    }

    const cancelled = this.cancelRequested;
    this.cancelRequested = false;
    const elapsedMs = this.now() - start;

    this.logger?.info(
      `Batch complete: ${counters.completed} separated, ${counters.failed} failed, ${counters.skipped} skipped in ${(elapsedMs / 1000).toFixed(1)}s`,
      { step: 'batch' },
    );

    return {
      progress: createProgress(counters, elapsedMs),
      outcomes,
      errors,
      elapsedSeconds: elapsedMs / 1000,
      cancelled,
    };
  }

  /**
   * Re-runs a directory, skipping every track whose stems already exist.
   */
  async resume(
    dirPath: string,
    onProgress?: ProgressCallback,
    options: Omit<BatchRunOptions, 'skipIfExisting' | 'onProgress'> = {},
  ): Promise<BatchResult> {
    return this.processDirectory(dirPath, { ...options, skipIfExisting: true, onProgress });
  }

  /**
   * Scanned tracks that do not have stems yet. Runs nothing.
   * A track whose output cannot be checked counts as pending.
   */
  async pendingTracks(dirPath: string, recursive = this.recursive): Promise<ScannedTrack[]> {
    const scan = await this.scanner.scanDirectory(dirPath, recursive);
    const pending: ScannedTrack[] = [];
    for (const track of scan.tracks) {
      if (!(await this.outputExists(track))) {
        pending.push(track);
      }
    }
    return pending;
  }

  private async outputExists(track: ScannedTrack): Promise<boolean> {
    try {
      return await this.pipeline.hasExistingOutput(track.path);
    } catch (error: unknown) {
      this.logger?.warn(`Could not check existing stems: ${errorMessage(error)}`, {
        filePath: track.path,
        step: 'batch',
      });
      return false;
    }
  }
}
