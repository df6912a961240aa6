/**
 * Stem Layout
 *
 * Per-track output folders under the stems base directory:
 *
 *   <outputDir>/<Artist> - <Title>_<hash8>/
 *     vocals.wav  drums.wav  bass.wav  other.wav
 *     metadata.json
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  QualityScores,
  STEM_NAMES,
  StemName,
  StemPaths,
  TrackIdentity,
  TrackTags,
} from '../../shared/types';
import { computeFileHash, shortHash } from '../utils/fileHash';
import { sanitizeFilename } from '../utils/fileScanner';
import { resolveWithin } from '../utils/pathGuard';
import { TagReader, readTrackTags } from './audioReader';
import { errorMessage, wrapError } from './errors';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Fallback details recorded in metadata.json */
export interface FallbackInfo {
  attempted: boolean;
  /** Backend the fallback ran on (null if none ran) */
  backendId: string | null;
  /** Whether the fallback's output replaced the primary output */
  used: boolean;
  error: string | null;
}

/** Contents of a track's metadata.json */
export interface TrackMetadataDocument {
  sourceFile: string;
  fileHash: string;
  artist: string;
  title: string;
  backendId: string;
  elapsedSeconds: number;
  success: boolean;
  qualityScores: QualityScores;
  stems: StemPaths;
  fallback: FallbackInfo;
  createdAt: string;
}

export interface StemLayoutOptions {
  /** Tag reader used to name output folders. Defaults to music-metadata */
  tagReader?: TagReader;
  logger?: Logger;
}

// ─── Constants ───────────────────────────────────────────────────────────

export const METADATA_FILENAME = 'metadata.json';

export const STEM_EXTENSION = '.wav';

const UNNAMED = 'Unknown';

// ─── Helpers ─────────────────────────────────────────────────────────────

/**
 * Folder name for a track: "Artist - Title_hash8", each part sanitized.
 */
export function outputDirName(tags: Pick<TrackTags, 'artist' | 'title'>, fileHash: string): string {
  const artist = sanitizeFilename(tags.artist) || UNNAMED;
  const title = sanitizeFilename(tags.title) || UNNAMED;
  return `${artist} - ${title}_${shortHash(fileHash)}`;
}

/**
 * Canonical stem file paths inside a directory.
 */
export function stemPathsIn(dir: string): Record<StemName, string> {
  return {
    vocals: path.join(dir, `vocals${STEM_EXTENSION}`),
    drums: path.join(dir, `drums${STEM_EXTENSION}`),
    bass: path.join(dir, `bass${STEM_EXTENSION}`),
    other: path.join(dir, `other${STEM_EXTENSION}`),
  };
}

/**
 * True if all four canonical stem files exist in a directory.
 */
export function allStemsExist(dir: string): boolean {
  const paths = stemPathsIn(dir);
  return STEM_NAMES.every((name) => fs.existsSync(paths[name]));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isMetadataDocument(value: unknown): value is TrackMetadataDocument {
  return (
    isRecord(value) &&
    typeof value.sourceFile === 'string' &&
    typeof value.backendId === 'string' &&
    typeof value.success === 'boolean' &&
    isRecord(value.stems) &&
    isRecord(value.qualityScores) &&
    isRecord(value.fallback)
  );
}

/**
 * Drops scores JSON could not carry (infinite scores are written as null).
 */
function numericScores(scores: Record<string, unknown>): QualityScores {
  const result: QualityScores = {};
  for (const name of STEM_NAMES) {
    const score = scores[name];
    if (typeof score === 'number') result[name] = score;
  }
  return result;
}

// ─── StemLayout Class ────────────────────────────────────────────────────

export class StemLayout {
  private readonly baseDir: string;
  private readonly tagReader: TagReader;
  private readonly logger?: Logger;

  constructor(baseDir: string, options?: StemLayoutOptions) {
    this.baseDir = path.resolve(baseDir);
    this.logger = options?.logger;
    this.tagReader = options?.tagReader ?? ((filePath) => readTrackTags(filePath, this.logger));
  }

  getBaseDir(): string {
    return this.baseDir;
  }

  /**
   * Hashes a source file, reads its tags and computes its output folder.
   * Nothing is created on disk.
   * @throws FileReadError if the file cannot be hashed or its tags read
   * @throws PathTraversalError if the folder would land outside the base dir
   */
  async resolveTrack(filePath: string): Promise<TrackIdentity> {
    const resolvedPath = path.resolve(filePath);
    const fileHash = await computeFileHash(resolvedPath);

    let tags: TrackTags;
    try {
      tags = await this.tagReader(resolvedPath);
    } catch (error: unknown) {
      throw wrapError(error, 'FileReadError', { filePath: resolvedPath, step: 'reading_tags' });
    }

    return {
      filePath: resolvedPath,
      fileHash,
      tags,
      outputDir: this.outputDirFor(tags, fileHash),
    };
  }

  /**
   * Absolute output folder for a track.
   * @throws PathTraversalError if the folder would land outside the base dir
   */
  outputDirFor(tags: Pick<TrackTags, 'artist' | 'title'>, fileHash: string): string {
    return resolveWithin(this.baseDir, outputDirName(tags, fileHash));
  }

  stemPaths(outputDir: string): Record<StemName, string> {
    return stemPathsIn(outputDir);
  }

  stemsExist(outputDir: string): boolean {
    return allStemsExist(outputDir);
  }

  async ensureDir(outputDir: string): Promise<void> {
    await fs.promises.mkdir(outputDir, { recursive: true });
  }

  metadataPath(outputDir: string): string {
    return path.join(outputDir, METADATA_FILENAME);
  }

  async writeMetadata(outputDir: string, document: TrackMetadataDocument): Promise<void> {
    await this.ensureDir(outputDir);
    await fs.promises.writeFile(
      this.metadataPath(outputDir),
      JSON.stringify(document, null, 2),
      'utf-8',
    );
  }

  /**
   * Reads a track's metadata.json. Missing or malformed files return null.
   */
  async readMetadata(outputDir: string): Promise<TrackMetadataDocument | null> {
    const filePath = this.metadataPath(outputDir);
    if (!fs.existsSync(filePath)) {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
      if (isMetadataDocument(parsed)) {
        return { ...parsed, qualityScores: numericScores(parsed.qualityScores) };
      }
      this.logger?.warn('Malformed metadata.json', { filePath, step: 'reading_metadata' });
    } catch (error: unknown) {
      this.logger?.warn(`Unreadable metadata.json: ${errorMessage(error)}`, {
        filePath,
        step: 'reading_metadata',
      });
    }
    return null;
  }
}
