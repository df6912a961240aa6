/**
 * Content Cache for separated stems
 *
 * Keyed by (content hash, backend id), so an identical file is never
 * separated twice by the same backend, wherever it lives on disk.
 *
 *   <cacheDir>/<hash>_<backendId>/
 *     vocals.wav  drums.wav  bass.wav  other.wav
 *     cache_meta.json
 *
 * The sidecar is written last; an entry is valid only when it lists exactly
 * the four canonical stems, each existing inside the entry folder. Invalid
 * entries are purged and reported as misses.
 */

import * as fs from 'fs';
import * as path from 'path';
import { QualityScores, STEM_NAMES, StemName, StemPaths, hasAllStems } from '../../shared/types';
import { computeFileHash, isContentHash } from '../utils/fileHash';
import { isInside, resolveWithin } from '../utils/pathGuard';
import { CacheCorruptionError, PathTraversalError, errorMessage } from './errors';
import type { Logger } from './logger';
import { stemPathsIn } from './stemLayout';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** A valid cached separation */
export interface CacheEntry {
  fileHash: string;
  backendId: string;
  createdAt: Date;
  /** Absolute paths of the cached stems */
  stems: Record<StemName, string>;
  qualityScores: QualityScores;
  entryDir: string;
}

/** On-disk sidecar format */
interface CacheMeta {
  fileHash: string;
  backendId: string;
  createdAt: string;
  /** Stem name → path relative to the entry folder */
  stemPaths: Record<string, string>;
  qualityScores: QualityScores;
}

export interface CacheStats {
  totalEntries: number;
  totalSizeBytes: number;
  totalSizeMb: number;
  cacheDir: string;
}

export interface StemCacheOptions {
  logger?: Logger;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

// ─── Constants ───────────────────────────────────────────────────────────

export const CACHE_META_FILENAME = 'cache_meta.json';

const BACKEND_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ─── Helpers ─────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toQualityScores(value: unknown): QualityScores {
  const scores: QualityScores = {};
  if (!isRecord(value)) return scores;
  for (const name of STEM_NAMES) {
    const score = value[name];
    if (typeof score === 'number') scores[name] = score;
  }
  return scores;
}

/**
 * Parses sidecar JSON. Returns null when required fields are missing.
 */
export function parseCacheMeta(json: string): CacheMeta | null {
  const parsed: unknown = JSON.parse(json);
  if (
    !isRecord(parsed) ||
    typeof parsed.fileHash !== 'string' ||
    typeof parsed.backendId !== 'string' ||
    typeof parsed.createdAt !== 'string' ||
    !isRecord(parsed.stemPaths)
  ) {
    return null;
  }

  const stemPaths: Record<string, string> = {};
  for (const [name, relative] of Object.entries(parsed.stemPaths)) {
    if (typeof relative === 'string') stemPaths[name] = relative;
  }

  return {
    fileHash: parsed.fileHash,
    backendId: parsed.backendId,
    createdAt: parsed.createdAt,
    stemPaths,
    qualityScores: toQualityScores(parsed.qualityScores),
  };
}

export function cacheKey(fileHash: string, backendId: string): string {
  return `${fileHash}_${backendId}`;
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(fullPath);
    } else if (entry.isFile()) {
      total += (await fs.promises.stat(fullPath)).size;
    }
  }
  return total;
}

// ─── StemCache Class ─────────────────────────────────────────────────────

export class StemCache {
  private readonly cacheDir: string;
  private readonly logger?: Logger;
  private readonly getCurrentDate: () => Date;

  constructor(cacheDir: string, options?: StemCacheOptions) {
    this.cacheDir = path.resolve(cacheDir);
    this.logger = options?.logger;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  getCacheDir(): string {
    return this.cacheDir;
  }

  /**
   * Creates the cache directory.
   */
  async initialize(): Promise<void> {
    await fs.promises.mkdir(this.cacheDir, { recursive: true });
  }

  /**
   * Entry folder for a (hash, backend) pair.
   * @throws PathTraversalError for malformed hashes or backend ids
   */
  entryDir(fileHash: string, backendId: string): string {
    const validBackendId = BACKEND_ID_PATTERN.test(backendId) && !backendId.includes('..');
    if (!isContentHash(fileHash) || !validBackendId) {
      throw new PathTraversalError(
        `Invalid cache key "${cacheKey(fileHash, backendId)}"`,
        this.cacheDir,
        path.join(this.cacheDir, cacheKey(fileHash, backendId)),
        { step: 'cache_lookup' },
      );
    }
    return resolveWithin(this.cacheDir, cacheKey(fileHash, backendId));
  }

  // ─── Lookup ──────────────────────────────────────────────────────────

  async get(filePath: string, backendId: string): Promise<CacheEntry | null> {
    return this.getByHash(await computeFileHash(filePath), backendId);
  }

  /**
   * Returns a valid entry or null. Corrupt entries are purged.
   */
  async getByHash(fileHash: string, backendId: string): Promise<CacheEntry | null> {
    const entryDir = this.entryDir(fileHash, backendId);
    const metaPath = path.join(entryDir, CACHE_META_FILENAME);

    if (!fs.existsSync(metaPath)) {
      if (fs.existsSync(entryDir)) {
        await this.purge(entryDir, 'Cache sidecar is missing');
      }
      return null;
    }

    let meta: CacheMeta | null;
    try {
      meta = parseCacheMeta(await fs.promises.readFile(metaPath, 'utf-8'));
    } catch (error: unknown) {
      await this.purge(entryDir, `Unreadable cache sidecar: ${errorMessage(error)}`);
      return null;
    }

    if (!meta) {
      await this.purge(entryDir, 'Cache sidecar is missing required fields');
      return null;
    }

    const stems: StemPaths = {};
    for (const name of STEM_NAMES) {
      const relative = meta.stemPaths[name];
      if (relative === undefined) continue;
      const stemPath = path.resolve(entryDir, relative);
      if (!isInside(entryDir, stemPath)) {
        await this.purge(entryDir, `Cache stem "${name}" points outside its entry`);
        return null;
      }
      if (fs.existsSync(stemPath)) {
        stems[name] = stemPath;
      }
    }

    if (!hasAllStems(stems) || Object.keys(meta.stemPaths).length !== STEM_NAMES.length) {
      await this.purge(entryDir, 'Cache entry does not hold exactly four stems');
      return null;
    }

    const createdAt = new Date(meta.createdAt);
    if (Number.isNaN(createdAt.getTime())) {
      await this.purge(entryDir, 'Cache sidecar has an invalid creation time');
      return null;
    }

    return {
      fileHash: meta.fileHash,
      backendId: meta.backendId,
      createdAt,
      stems,
      qualityScores: meta.qualityScores,
      entryDir,
    };
  }

  async exists(filePath: string, backendId: string): Promise<boolean> {
    return (await this.get(filePath, backendId)) !== null;
  }

  // ─── Storage ─────────────────────────────────────────────────────────

  async put(
    filePath: string,
    backendId: string,
    stems: StemPaths,
    qualityScores: QualityScores = {},
  ): Promise<CacheEntry> {
    return this.putByHash(await computeFileHash(filePath), backendId, stems, qualityScores);
  }

  /**
   * Copies the four stems into a fresh entry folder, then writes the
   * sidecar. A failed copy removes the partial entry and rethrows.
   */
  async putByHash(
    fileHash: string,
    backendId: string,
    stems: StemPaths,
    qualityScores: QualityScores = {},
  ): Promise<CacheEntry> {
    if (!hasAllStems(stems)) {
      throw new Error(`Cannot cache an incomplete separation for ${backendId}`);
    }

    const entryDir = this.entryDir(fileHash, backendId);
    const createdAt = this.getCurrentDate();
    const cached = stemPathsIn(entryDir);

    await fs.promises.rm(entryDir, { recursive: true, force: true });
    await fs.promises.mkdir(entryDir, { recursive: true });

    try {
      for (const name of STEM_NAMES) {
        await fs.promises.copyFile(stems[name], cached[name]);
      }

      const meta: CacheMeta = {
        fileHash,
        backendId,
        createdAt: createdAt.toISOString(),
        stemPaths: Object.fromEntries(
          STEM_NAMES.map((name) => [name, path.basename(cached[name])]),
        ),
        qualityScores,
      };
      await fs.promises.writeFile(
        path.join(entryDir, CACHE_META_FILENAME),
        JSON.stringify(meta, null, 2),
        'utf-8',
      );
    } catch (error: unknown) {
      await fs.promises.rm(entryDir, { recursive: true, force: true });
      throw error;
    }

    return { fileHash, backendId, createdAt, stems: cached, qualityScores, entryDir };
  }

  // ─── Removal ─────────────────────────────────────────────────────────

  /**
   * Removes a cached entry. Returns false if there was none.
   */
  async invalidate(filePath: string, backendId: string): Promise<boolean> {
    const entryDir = this.entryDir(await computeFileHash(filePath), backendId);
    if (!fs.existsSync(entryDir)) {
      return false;
    }
    await fs.promises.rm(entryDir, { recursive: true, force: true });
    return true;
  }

  /**
   * Removes entries whose recorded creation time is older than
   * `olderThanDays`, or all entries when no age is given. Entries with a
   * missing or unreadable sidecar are always eligible.
   * @returns Number of entries removed
   */
  async clearCache(olderThanDays?: number): Promise<number> {
    if (!fs.existsSync(this.cacheDir)) {
      return 0;
    }

    const cutoff =
      olderThanDays !== undefined
        ? this.getCurrentDate().getTime() - olderThanDays * MS_PER_DAY
        : null;

    let cleared = 0;
    const entries = await fs.promises.readdir(this.cacheDir, { withFileTypes: true });

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const entryDir = path.join(this.cacheDir, entry.name);

      if (cutoff !== null) {
        const createdAt = await this.readCreatedAt(entryDir);
        if (createdAt !== null && createdAt >= cutoff) continue;
      }

      await fs.promises.rm(entryDir, { recursive: true, force: true });
      cleared++;
    }

    if (cleared > 0) {
      this.logger?.info(`Cleared ${cleared} cache entr${cleared === 1 ? 'y' : 'ies'}`, {
        step: 'cache_clear',
      });
    }
    return cleared;
  }

  async getStats(): Promise<CacheStats> {
    let totalEntries = 0;
    let totalSizeBytes = 0;

    if (fs.existsSync(this.cacheDir)) {
      const entries = await fs.promises.readdir(this.cacheDir, { withFileTypes: true });
      for (const entry of entries) {
        if (!entry.isDirectory()) continue;
        totalEntries++;
        totalSizeBytes += await directorySize(path.join(this.cacheDir, entry.name));
      }
    }

    return {
      totalEntries,
      totalSizeBytes,
      totalSizeMb: totalSizeBytes / (1024 * 1024),
      cacheDir: this.cacheDir,
    };
  }

  // ─── Private Helpers ─────────────────────────────────────────────────

  /** Creation time in ms, or null when the sidecar is missing or unreadable */
  private async readCreatedAt(entryDir: string): Promise<number | null> {
    const metaPath = path.join(entryDir, CACHE_META_FILENAME);
    if (!fs.existsSync(metaPath)) return null;
    try {
      const meta = parseCacheMeta(await fs.promises.readFile(metaPath, 'utf-8'));
      const time = meta ? new Date(meta.createdAt).getTime() : Number.NaN;
      return Number.isNaN(time) ? null : time;
    } catch (error: unknown) {
      this.logger?.warn(`Unreadable cache sidecar: ${errorMessage(error)}`, {
        category: 'CacheCorruption',
        filePath: metaPath,
        step: 'cache_clear',
      });
      return null;
    }
  }

  private async purge(entryDir: string, reason: string): Promise<void> {
    this.logger?.logPipelineError(
      new CacheCorruptionError(reason, entryDir, { filePath: entryDir }),
      'WARN',
    );
    await fs.promises.rm(entryDir, { recursive: true, force: true });
  }
}
