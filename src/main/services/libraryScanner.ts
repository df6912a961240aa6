/**
 * Library Scanner
 *
 * Finds audio files under one or more roots, reads their tags and orders
 * them for batch separation.
 *
 * Priority (first match wins):
 * 1. Parent folder is a configured priority group → HIGHEST
 * 2. Genre contains a house-family keyword → HIGH
 * 3. BPM > 120 → MEDIUM
 * 4. Genre contains a vocal-genre keyword → NORMAL
 * 5. Everything else → LOW
 */

import * as fs from 'fs';
import * as path from 'path';
import { PriorityTier, ScannedTrack, TrackTags } from '../../shared/types';
import { isSupportedAudioFile, walkFiles } from '../utils/fileScanner';
import { TagReader, readTrackTags } from './audioReader';
import { errorMessage } from './errors';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────

export interface ScanResult {
  /** Tracks sorted by (priority, display name) */
  tracks: ScannedTrack[];
  /** Every regular file seen */
  totalFiles: number;
  /** Files with a supported audio extension */
  audioFiles: number;
  errors: string[];
}

export interface LibraryScannerOptions {
  /** Folder names that put a track in the highest tier (case-insensitive) */
  priorityGroups?: string[];
  /** Tag reader. Defaults to music-metadata */
  tagReader?: TagReader;
  logger?: Logger;
}

// ─── Constants ───────────────────────────────────────────────────────────

export const HOUSE_GENRE_KEYWORDS: readonly string[] = [
  'house',
  'deep house',
  'tech house',
  'progressive house',
  'electro house',
  'future house',
  'tropical house',
];

export const VOCAL_GENRE_KEYWORDS: readonly string[] = [
  'pop',
  'r&b',
  'rnb',
  'soul',
  'hip-hop',
  'hip hop',
  'vocal',
];

export const HIGH_BPM_THRESHOLD = 120;

// ─── Helpers ─────────────────────────────────────────────────────────────

function genreMatches(genre: string | null, keywords: readonly string[]): boolean {
  if (!genre) return false;
  const lower = genre.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

/**
 * Tier for a track given its tags and the priority group it sits in, if any.
 */
export function calculatePriority(tags: TrackTags, group: string | null): PriorityTier {
  if (group !== null) return PriorityTier.HIGHEST;
  if (genreMatches(tags.genre, HOUSE_GENRE_KEYWORDS)) return PriorityTier.HIGH;
  if (tags.bpm !== null && tags.bpm > HIGH_BPM_THRESHOLD) return PriorityTier.MEDIUM;
  if (genreMatches(tags.genre, VOCAL_GENRE_KEYWORDS)) return PriorityTier.NORMAL;
  return PriorityTier.LOW;
}

/** Sort order: tier ascending, then display name by code point */
export function compareTracks(a: ScannedTrack, b: ScannedTrack): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.displayName < b.displayName) return -1;
  if (a.displayName > b.displayName) return 1;
  return 0;
}

function emptyResult(): ScanResult {
  return { tracks: [], totalFiles: 0, audioFiles: 0, errors: [] };
}

// ─── LibraryScanner Class ────────────────────────────────────────────────

export class LibraryScanner {
  private readonly priorityGroups: Set<string>;
  private readonly tagReader: TagReader;
  private readonly logger?: Logger;

  constructor(options?: LibraryScannerOptions) {
    this.priorityGroups = new Set(
      (options?.priorityGroups ?? []).map((group) => group.trim().toLowerCase()),
    );
    this.logger = options?.logger;
    this.tagReader =
      options?.tagReader ?? ((filePath: string) => readTrackTags(filePath, this.logger));
  }

  /**
   * Priority group a file belongs to, matched on its parent folder name.
   */
  groupFor(filePath: string): string | null {
    const parent = path.basename(path.dirname(filePath)).toLowerCase();
    return this.priorityGroups.has(parent) ? parent : null;
  }

  /**
   * Scans one root. A missing root yields an empty result with one error.
   */
  async scanDirectory(dirPath: string, recursive = true): Promise<ScanResult> {
    const root = path.resolve(dirPath);
    const result = emptyResult();

    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      result.errors.push(`Directory not found: ${root}`);
      return result;
    }

    const files = walkFiles(root, {
      recursive,
      onError: (dir, message) => result.errors.push(`Cannot read ${dir}: ${message}`),
    });
    result.totalFiles = files.length;

    for (const filePath of files) {
      if (!isSupportedAudioFile(filePath)) continue;
      result.audioFiles++;

      try {
        result.tracks.push(await this.scanFile(filePath));
      } catch (error: unknown) {
        const message = `Error scanning ${filePath}: ${errorMessage(error)}`;
        result.errors.push(message);
        this.logger?.warn(message, { filePath, step: 'scanning' });
      }
    }

    result.tracks.sort(compareTracks);
    this.logger?.info(
      `Scanned ${root}: ${result.audioFiles} audio files of ${result.totalFiles}`,
      { step: 'scanning' },
    );
    return result;
  }

  /**
   * Scans several roots and merges them into one ordering.
   */
  async scanMultiple(dirPaths: string[], recursive = true): Promise<ScanResult> {
    const combined = emptyResult();

    for (const dirPath of dirPaths) {
      const result = await this.scanDirectory(dirPath, recursive);
      combined.tracks.push(...result.tracks);
      combined.totalFiles += result.totalFiles;
      combined.audioFiles += result.audioFiles;
      combined.errors.push(...result.errors);
    }

    combined.tracks.sort(compareTracks);
    return combined;
  }

  /**
   * Yields tracks in priority order, at most `limit` of them.
   */
  async *iterPrioritized(dirPath: string, limit?: number): AsyncGenerator<ScannedTrack> {
    const { tracks } = await this.scanDirectory(dirPath);
    const count = limit !== undefined && limit > 0 ? Math.min(limit, tracks.length) : tracks.length;
    for (let i = 0; i < count; i++) {
      yield tracks[i];
    }
  }

  private async scanFile(filePath: string): Promise<ScannedTrack> {
    const tags = await this.tagReader(filePath);
    const group = this.groupFor(filePath);
    return {
      path: filePath,
      artist: tags.artist,
      title: tags.title,
      bpm: tags.bpm,
      key: tags.key,
      genre: tags.genre,
      priority: calculatePriority(tags, group),
      group,
      displayName: `${tags.artist} - ${tags.title}`,
    };
  }
}
