/**
 * Stem Pipeline
 *
 * Routes a separation request to a backend, judges the output and retries
 * once on a different backend when the quality is poor.
 *
 * Per file:
 * 1. Identity: content hash, tags, output folder (skip if stems exist)
 * 2. Track row in the ledger
 * 3. Backend selection (explicit, or auto by size and availability)
 * 4. Content cache lookup for (hash, backend)
 * 5. State machine: attempt → evaluate → fallback? → finalize
 *                   attempt → failed
 *
 * Routing errors (EngineUnavailable, NoEngineAvailable, PathTraversal) are
 * thrown. Backend execution failures come back as failed results and are
 * recorded on the job. Any other error fails every job the run opened and
 * is rethrown.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  BackendPreference,
  CACHED_BACKEND_ID,
  NO_BACKEND_ID,
  QualityScores,
  STEM_NAMES,
  SeparationResult,
  StemPaths,
  TrackIdentity,
  hasAllStems,
} from '../../shared/types';
import { SeparationBackend, failedResult } from './backends/separationBackend';
import {
  EngineUnavailableError,
  NoEngineAvailableError,
  errorMessage,
  isPipelineError,
} from './errors';
import { JobLedger, JobUpdate, LedgerStats } from './jobLedger';
import type { Logger } from './logger';
import { StemQualityScorer, evaluateQuality } from './qualityAnalyzer';
import { CacheEntry, StemCache } from './stemCache';
import { FallbackInfo, StemLayout } from './stemLayout';

// ─── Interfaces ──────────────────────────────────────────────────────────

export interface SeparateOptions {
  /** Backend choice. Defaults to the pipeline's default */
  backend?: BackendPreference;
  /** Return at once when all four stems already exist */
  skipIfExisting?: boolean;
  /** Retry once on another backend when quality is poor */
  qualityFallback?: boolean;
}

/** Outcome of one pipeline run */
export interface PipelineResult extends SeparationResult {
  /** Content hash (null when the input was missing) */
  fileHash: string | null;
  /** Track output folder (null when the input was missing) */
  outputDir: string | null;
  /** Per-stem scores of the returned output */
  qualityScores: QualityScores;
  fallbackAttempted: boolean;
  /** Why the fallback failed, when it did */
  fallbackError: string | null;
  /** Ledger jobs created by this run, in order */
  jobIds: number[];
}

/** Minimal pipeline surface the batch scheduler depends on */
export interface SeparationPipeline {
  separate(filePath: string, options?: SeparateOptions): Promise<PipelineResult>;
  hasExistingOutput(filePath: string): Promise<boolean>;
}

export interface StemPipelineOptions {
  backends: SeparationBackend[];
  ledger: JobLedger;
  analyzer: StemQualityScorer;
  layout: StemLayout;
  /** Content cache; omitted or null disables cache lookups */
  cache?: StemCache | null;
  logger?: Logger;
  /** Files below this size go local in auto mode. Defaults to 50MB */
  localSizeThresholdBytes?: number;
  /** Defaults applied when a call omits an option */
  defaults?: SeparateOptions;
}

export interface BackendStatus {
  name: string;
  kind: SeparationBackend['kind'];
  available: boolean;
  parallelism: number;
}

export interface PipelineStats {
  outputDir: string;
  backends: BackendStatus[];
  ledger: LedgerStats;
}

/** One backend run and what became of it */
interface Attempt {
  backend: SeparationBackend;
  jobId: number;
  result: SeparationResult;
  scores: QualityScores;
}

/** Per-file facts shared by every stage */
interface RunContext {
  identity: TrackIdentity;
  trackId: number;
  qualityFallback: boolean;
  /** Jobs created by this run that have not reached a terminal status */
  openJobs: Set<number>;
}

type PipelineState =
  | { stage: 'attempt'; backend: SeparationBackend }
  | { stage: 'evaluate'; primary: Attempt }
  | { stage: 'fallback'; primary: Attempt; backend: SeparationBackend }
  | { stage: 'finalize'; primary: Attempt; fallback: Attempt | null }
  | { stage: 'failed'; primary: Attempt };

// ─── Constants ───────────────────────────────────────────────────────────

export const DEFAULT_LOCAL_SIZE_THRESHOLD = 50 * 1024 * 1024;

/** Fallback output lands here and is moved into place only on success */
export const FALLBACK_STAGING_DIR = '.fallback-staging';

const DEFAULT_OPTIONS: Required<SeparateOptions> = {
  backend: 'auto',
  skipIfExisting: true,
  qualityFallback: true,
};

// ─── StemPipeline Class ──────────────────────────────────────────────────

export class StemPipeline implements SeparationPipeline {
  private readonly backends: SeparationBackend[];
  private readonly ledger: JobLedger;
  private readonly analyzer: StemQualityScorer;
  private readonly layout: StemLayout;
  private readonly cache: StemCache | null;
  private readonly logger?: Logger;
  private readonly localSizeThresholdBytes: number;
  private readonly defaults: Required<SeparateOptions>;

  constructor(options: StemPipelineOptions) {
    this.backends = [...options.backends];
    this.ledger = options.ledger;
    this.analyzer = options.analyzer;
    this.layout = options.layout;
    this.cache = options.cache ?? null;
    this.logger = options.logger;
    this.localSizeThresholdBytes = options.localSizeThresholdBytes ?? DEFAULT_LOCAL_SIZE_THRESHOLD;
    this.defaults = { ...DEFAULT_OPTIONS, ...options.defaults };
  }

  /**
   * Separates one file into four stems.
   * @throws EngineUnavailableError if an explicitly requested backend is unavailable
   * @throws NoEngineAvailableError if auto mode finds no usable backend
   * @throws PathTraversalError if the output folder would escape the base dir
   */
  async separate(filePath: string, options?: SeparateOptions): Promise<PipelineResult> {
    const backendChoice = options?.backend ?? this.defaults.backend;
    const skipIfExisting = options?.skipIfExisting ?? this.defaults.skipIfExisting;
    const qualityFallback = options?.qualityFallback ?? this.defaults.qualityFallback;
    const resolvedPath = path.resolve(filePath);

    if (!fs.existsSync(resolvedPath)) {
      return {
        ...failedResult(NO_BACKEND_ID, `File not found: ${resolvedPath}`, 0),
        fileHash: null,
        outputDir: null,
        qualityScores: {},
        fallbackAttempted: false,
        fallbackError: null,
        jobIds: [],
      };
    }

    const identity = await this.layout.resolveTrack(resolvedPath);

    if (skipIfExisting && this.layout.stemsExist(identity.outputDir)) {
      this.logger?.logSkippedFile(resolvedPath, 'stems already exist');
      const metadata = await this.layout.readMetadata(identity.outputDir);
      return this.cachedResult(identity, this.layout.stemPaths(identity.outputDir), metadata?.qualityScores ?? {});
    }

    const track = this.ledger.addTrack(resolvedPath, identity.fileHash, identity.tags);
    const fileSize = fs.statSync(resolvedPath).size;
    const backend = this.selectBackend(backendChoice, fileSize);

    const cacheCandidates = [backend];
    const fallbackCandidate = qualityFallback ? this.fallbackBackendFor(backend) : null;
    if (fallbackCandidate) cacheCandidates.push(fallbackCandidate);

    const restored = await this.restoreFromCache(identity, cacheCandidates);
    if (restored) {
      return restored;
    }

    if (this.ledger.hasSuccessfulJob(identity.fileHash)) {
      this.logger?.info('Ledger records a completed job but stems are missing; reprocessing', {
        filePath: resolvedPath,
        step: 'routing',
      });
    }

    await this.layout.ensureDir(identity.outputDir);
    const context: RunContext = {
      identity,
      trackId: track.id,
      qualityFallback,
      openJobs: new Set<number>(),
    };

    try {
      return await this.run(context, backend);
    } catch (error: unknown) {
      this.abandonJobs(context, error);
      throw error;
    }
  }

  /**
   * Drives the state machine for one file.
   */
  private async run(context: RunContext, backend: SeparationBackend): Promise<PipelineResult> {
    const { identity } = context;
    let state: PipelineState = { stage: 'attempt', backend };
    for (;;) {
      switch (state.stage) {
        case 'attempt': {
          const primary = await this.runAttempt(context, state.backend, identity.outputDir);
          state = primary.result.success
            ? { stage: 'evaluate', primary }
            : { stage: 'failed', primary };
          break;
        }

        case 'evaluate': {
          const primary = await this.scoreAttempt(context, state.primary);
          const verdict = evaluateQuality(primary.scores);
          const fallbackBackend =
            context.qualityFallback && verdict.needsFallback
              ? this.fallbackBackendFor(primary.backend)
              : null;

          if (fallbackBackend) {
            this.logger?.info(
              `Quality below threshold (${verdict.insufficient.join(', ')}), retrying with ${fallbackBackend.name}`,
              { filePath: identity.filePath, step: 'evaluating' },
            );
            state = { stage: 'fallback', primary, backend: fallbackBackend };
          } else {
            state = { stage: 'finalize', primary, fallback: null };
          }
          break;
        }

        case 'fallback': {
          const fallback = await this.runFallback(context, state.backend);
          state = { stage: 'finalize', primary: state.primary, fallback };
          break;
        }

        case 'finalize':
          return this.finalize(context, state.primary, state.fallback);

        case 'failed':
          return this.fail(context, state.primary);
      }
    }
  }

  /**
   * True if all four stems already exist in the file's output folder.
   */
  async hasExistingOutput(filePath: string): Promise<boolean> {
    const identity = await this.layout.resolveTrack(filePath);
    return this.layout.stemsExist(identity.outputDir);
  }

  /**
   * True if stems exist on disk or the ledger records a completed job.
   */
  async isProcessed(filePath: string): Promise<boolean> {
    const identity = await this.layout.resolveTrack(filePath);
    return (
      this.layout.stemsExist(identity.outputDir) || this.ledger.hasSuccessfulJob(identity.fileHash)
    );
  }

  getStats(): PipelineStats {
    return {
      outputDir: this.layout.getBaseDir(),
      backends: this.backends.map((backend) => ({
        name: backend.name,
        kind: backend.kind,
        available: backend.isAvailable(),
        parallelism: backend.recommendedParallelism(),
      })),
      ledger: this.ledger.getStats(),
    };
  }

  // ─── Routing ──────────────────────────────────────────────────────────

  /**
   * Picks the backend for a request.
   * Auto mode prefers local for files under the size threshold or when the
   * remote backend is unavailable, remote otherwise.
   */
  selectBackend(choice: BackendPreference, fileSizeBytes: number): SeparationBackend {
    if (choice !== 'auto') {
      const requested = this.firstAvailable(choice);
      if (!requested) {
        throw new EngineUnavailableError(`The ${choice} backend is not available`, choice);
      }
      return requested;
    }

    const local = this.firstAvailable('local');
    const remote = this.firstAvailable('remote');

    if (local && (fileSizeBytes < this.localSizeThresholdBytes || !remote)) {
      return local;
    }
    if (remote) {
      return remote;
    }
    throw new NoEngineAvailableError('No separation backend is available');
  }

  /**
   * A distinct available backend, preferring the other kind.
   */
  fallbackBackendFor(primary: SeparationBackend): SeparationBackend | null {
    const candidates = this.backends.filter(
      (backend) => backend !== primary && backend.name !== primary.name && backend.isAvailable(),
    );
    return candidates.find((backend) => backend.kind !== primary.kind) ?? candidates[0] ?? null;
  }

  private firstAvailable(kind: SeparationBackend['kind']): SeparationBackend | null {
    return this.backends.find((backend) => backend.kind === kind && backend.isAvailable()) ?? null;
  }

  // ─── Stages ───────────────────────────────────────────────────────────

  /**
   * Creates a job, runs the backend and checks the stems it claims to have
   * written. The job is left in `processing`.
   */
  private async runAttempt(
    context: RunContext,
    backend: SeparationBackend,
    outputDir: string,
  ): Promise<Attempt> {
    const job = this.ledger.createJob(context.trackId, backend.name);
    context.openJobs.add(job.id);
    this.ledger.updateJobStatus(job.id, 'processing');
    this.logger?.info(`Separating with ${backend.name}`, {
      filePath: context.identity.filePath,
      step: 'separating',
    });

    let result: SeparationResult;
    try {
      result = await backend.separate(context.identity.filePath, outputDir);
    } catch (error: unknown) {
      result = failedResult(backend.name, errorMessage(error), 0);
    }

    if (result.success && !stemsOnDisk(result.stems)) {
      result = {
        ...result,
        success: false,
        error: `${backend.name} reported success but not all stem files exist`,
      };
    }

    return { backend, jobId: job.id, result, scores: {} };
  }

  /**
   * Scores an attempt's stems and stores the scores on its job.
   */
  private async scoreAttempt(context: RunContext, attempt: Attempt): Promise<Attempt> {
    const scores = await this.analyzer.analyzeAllStems(
      attempt.result.stems,
      context.identity.filePath,
    );
    this.ledger.addQualityScores(attempt.jobId, scores);
    return { ...attempt, scores };
  }

  /**
   * Runs the fallback into a staging folder; on success the stems are
   * scored, moved over the primary's and the job completed, otherwise the
   * job fails and the primary output is left alone.
   */
  private async runFallback(context: RunContext, backend: SeparationBackend): Promise<Attempt> {
    const outputDir = context.identity.outputDir;
    const stagingDir = path.join(outputDir, FALLBACK_STAGING_DIR);
    await fs.promises.rm(stagingDir, { recursive: true, force: true });

    try {
      let attempt = await this.runAttempt(context, backend, stagingDir);

      if (attempt.result.success) {
        attempt = await this.scoreAttempt(context, attempt);
        const stems = await this.promoteStems(attempt.result.stems, outputDir);
        attempt = { ...attempt, result: { ...attempt.result, stems } };
        this.closeJob(context, attempt.jobId, 'completed', {
          elapsedSeconds: attempt.result.elapsedSeconds,
        });
      } else {
        this.closeJob(context, attempt.jobId, 'failed', {
          elapsedSeconds: attempt.result.elapsedSeconds,
          error: attempt.result.error ?? 'Unknown error',
        });
        this.logger?.warn(`Fallback on ${backend.name} failed: ${attempt.result.error ?? 'Unknown error'}`, {
          category: 'SeparationFailure',
          filePath: context.identity.filePath,
          step: 'fallback',
        });
      }

      return attempt;
    } finally {
      await fs.promises.rm(stagingDir, { recursive: true, force: true });
    }
  }

  private closeJob(
    context: RunContext,
    jobId: number,
    status: 'completed' | 'failed',
    update: JobUpdate,
  ): void {
    this.ledger.updateJobStatus(jobId, status, update);
    context.openJobs.delete(jobId);
  }

  /**
   * Fails every job the run left open after an unexpected error.
   */
  private abandonJobs(context: RunContext, error: unknown): void {
    const message = errorMessage(error);
    for (const jobId of context.openJobs) {
      try {
        this.ledger.updateJobStatus(jobId, 'failed', { error: message });
      } catch (ledgerError: unknown) {
        this.logger?.logError(ledgerError, { filePath: context.identity.filePath, step: 'ledger' });
      }
    }
    context.openJobs.clear();
  }

  private async promoteStems(stems: StemPaths, outputDir: string): Promise<StemPaths> {
    const targets = this.layout.stemPaths(outputDir);
    const promoted: StemPaths = {};
    for (const name of STEM_NAMES) {
      const source = stems[name];
      if (!source) continue;
      await fs.promises.rename(source, targets[name]);
      promoted[name] = targets[name];
    }
    return promoted;
  }

  /**
   * Writes metadata.json, caches the final stems, completes the primary job.
   */
  private async finalize(
    context: RunContext,
    primary: Attempt,
    fallback: Attempt | null,
  ): Promise<PipelineResult> {
    const { identity } = context;
    const fallbackUsed = fallback !== null && fallback.result.success;
    const final = fallback && fallbackUsed ? fallback : primary;

    if (fallback && fallbackUsed) {
      this.ledger.markSuperseded(primary.jobId, fallback.jobId);
    }

    const fallbackInfo: FallbackInfo = {
      attempted: fallback !== null,
      backendId: fallback?.backend.name ?? null,
      used: fallbackUsed,
      error: fallback && !fallbackUsed ? (fallback.result.error ?? 'Unknown error') : null,
    };

    await this.layout.writeMetadata(identity.outputDir, {
      sourceFile: identity.filePath,
      fileHash: identity.fileHash,
      artist: identity.tags.artist,
      title: identity.tags.title,
      backendId: final.result.backendId,
      elapsedSeconds: final.result.elapsedSeconds,
      success: true,
      qualityScores: final.scores,
      stems: final.result.stems,
      fallback: fallbackInfo,
      createdAt: new Date().toISOString(),
    });

    await this.storeInCache(identity, final);

    this.closeJob(context, primary.jobId, 'completed', {
      elapsedSeconds: primary.result.elapsedSeconds,
    });

    this.logger?.info(`Separated with ${final.backend.name}`, {
      filePath: identity.filePath,
      step: 'finalizing',
    });

    return {
      ...final.result,
      fileHash: identity.fileHash,
      outputDir: identity.outputDir,
      qualityScores: final.scores,
      fallbackAttempted: fallback !== null,
      fallbackError: fallbackInfo.error,
      jobIds: fallback ? [primary.jobId, fallback.jobId] : [primary.jobId],
    };
  }

  private fail(context: RunContext, primary: Attempt): PipelineResult {
    const error = primary.result.error ?? 'Unknown error';
    this.closeJob(context, primary.jobId, 'failed', {
      elapsedSeconds: primary.result.elapsedSeconds,
      error,
    });
    this.logger?.error(`Separation failed on ${primary.backend.name}: ${error}`, {
      category: 'SeparationFailure',
      filePath: context.identity.filePath,
      step: 'separating',
    });

    return {
      ...primary.result,
      success: false,
      error,
      fileHash: context.identity.fileHash,
      outputDir: context.identity.outputDir,
      qualityScores: {},
      fallbackAttempted: false,
      fallbackError: null,
      jobIds: [primary.jobId],
    };
  }

  // ─── Cache ────────────────────────────────────────────────────────────

  /**
   * Copies the first valid cache entry for (hash, candidate) into the output
   * folder. Candidates are the routed backend, then its fallback.
   * Returns null on a miss; lookup errors are logged and count as a miss.
   */
  private async restoreFromCache(
    identity: TrackIdentity,
    candidates: SeparationBackend[],
  ): Promise<PipelineResult | null> {
    const cache = this.cache;
    if (!cache) return null;

    try {
      let entry: CacheEntry | null = null;
      for (const candidate of candidates) {
        entry = await cache.getByHash(identity.fileHash, candidate.name);
        if (entry) break;
      }
      if (!entry) return null;

      await this.layout.ensureDir(identity.outputDir);
      const targets = this.layout.stemPaths(identity.outputDir);
      for (const name of STEM_NAMES) {
        await fs.promises.copyFile(entry.stems[name], targets[name]);
      }

      await this.layout.writeMetadata(identity.outputDir, {
        sourceFile: identity.filePath,
        fileHash: identity.fileHash,
        artist: identity.tags.artist,
        title: identity.tags.title,
        backendId: entry.backendId,
        elapsedSeconds: 0,
        success: true,
        qualityScores: entry.qualityScores,
        stems: targets,
        fallback: { attempted: false, backendId: null, used: false, error: null },
        createdAt: new Date().toISOString(),
      });

      this.logger?.logSkippedFile(identity.filePath, `restored from cache (${entry.backendId})`);
      return this.cachedResult(identity, targets, entry.qualityScores);
    } catch (error: unknown) {
      if (isPipelineError(error) && error.category === 'PathTraversal') {
        throw error;
      }
      this.logger?.warn(`Cache lookup failed: ${errorMessage(error)}`, {
        category: 'CacheCorruption',
        filePath: identity.filePath,
        step: 'cache_lookup',
      });
      return null;
    }
  }

  private async storeInCache(identity: TrackIdentity, final: Attempt): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.putByHash(
        identity.fileHash,
        final.backend.name,
        final.result.stems,
        final.scores,
      );
    } catch (error: unknown) {
      this.logger?.warn(`Could not cache stems: ${errorMessage(error)}`, {
        filePath: identity.filePath,
        step: 'cache_store',
      });
    }
  }

  private cachedResult(
    identity: TrackIdentity,
    stems: StemPaths,
    qualityScores: QualityScores,
  ): PipelineResult {
    return {
      success: true,
      stems,
      elapsedSeconds: 0,
      backendId: CACHED_BACKEND_ID,
      error: null,
      fileHash: identity.fileHash,
      outputDir: identity.outputDir,
      qualityScores,
      fallbackAttempted: false,
      fallbackError: null,
      jobIds: [],
    };
  }
}

function stemsOnDisk(stems: StemPaths): boolean {
  return hasAllStems(stems) && STEM_NAMES.every((name) => fs.existsSync(stems[name]));
}
