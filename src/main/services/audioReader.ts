/**
 * Audio Reader Service
 *
 * Reads the tags the router needs (artist, title, BPM, key, genre) with the
 * music-metadata library. Reading is best effort: a file with broken or
 * missing tags still yields usable values.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as mm from 'music-metadata';
import { TrackTags } from '../../shared/types';
import { errorMessage } from './errors';
import type { Logger } from './logger';

export const UNKNOWN_ARTIST = 'Unknown Artist';

/** Reads tags for one file */
export type TagReader = (filePath: string) => Promise<TrackTags>;

/**
 * Tags derived from the file name alone.
 */
export function fallbackTags(filePath: string): TrackTags {
  return {
    artist: UNKNOWN_ARTIST,
    title: path.parse(filePath).name,
    bpm: null,
    key: null,
    genre: null,
  };
}

/**
 * Parses a BPM tag value. Returns null for anything that isn't a positive number.
 */
export function parseBpm(value: unknown): number | null {
  const bpm = typeof value === 'string' ? Number.parseFloat(value) : value;
  if (typeof bpm !== 'number' || !Number.isFinite(bpm) || bpm <= 0) {
    return null;
  }
  return bpm;
}

/**
 * Maps parsed music-metadata results to TrackTags.
 */
export function mapToTrackTags(filePath: string, metadata: mm.IAudioMetadata): TrackTags {
  const common = metadata.common;
  const fallback = fallbackTags(filePath);

  return {
    artist: common.artist?.trim() || fallback.artist,
    title: common.title?.trim() || fallback.title,
    bpm: parseBpm(common.bpm),
    key: common.key?.trim() || null,
    genre: common.genre && common.genre.length > 0 ? common.genre.join(', ') : null,
  };
}

/**
 * Reads a file's tags. Unparseable files fall back to the file name.
 * @throws Error if the file does not exist
 */
export async function readTrackTags(filePath: string, logger?: Logger): Promise<TrackTags> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  let metadata: mm.IAudioMetadata;
  try {
    metadata = await mm.parseFile(filePath, {
      duration: false,
      skipCovers: true,
    });
  } catch (error: unknown) {
    logger?.warn(`Could not read tags, using file name: ${errorMessage(error)}`, {
      filePath,
      step: 'reading_tags',
    });
    return fallbackTags(filePath);
  }

  return mapToTrackTags(filePath, metadata);
}
