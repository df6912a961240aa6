/**
 * File Scanner Utility
 *
 * Walks directories for files and picks out supported audio files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SUPPORTED_EXTENSIONS } from '../../shared/types';
import { errorMessage } from '../services/errors';

/** Options for directory walks */
export interface WalkOptions {
  /** Descend into subdirectories. Defaults to true */
  recursive?: boolean;
  /** Called for every directory that cannot be read */
  onError?: (dirPath: string, message: string) => void;
}

/** Maximum length of a sanitized path component */
const MAX_NAME_LENGTH = 100;

/**
 * Checks if a file has a supported audio extension.
 */
export function isSupportedAudioFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.includes(ext);
}

/**
 * Lists every regular file under a directory, sorted.
 * Unreadable directories are reported through `onError` and skipped.
 */
export function walkFiles(dirPath: string, options?: WalkOptions): string[] {
  const recursive = options?.recursive ?? true;
  const files: string[] = [];

  function walk(currentPath: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(currentPath, { withFileTypes: true });
    } catch (error: unknown) {
      options?.onError?.(currentPath, errorMessage(error));
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(currentPath, entry.name);

      if (entry.isDirectory()) {
        if (recursive) walk(fullPath);
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }
  }

  walk(dirPath);
  return files.sort();
}

/**
 * Makes a string safe to use as a single path component: strips characters
 * invalid on Windows and control characters, neutralizes `..`, trims
 * leading/trailing dots, spaces and underscores, caps the length.
 * Returns an empty string when nothing usable is left.
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/[<>:"/\\|?*\x00-\x1f]/g, '_')
    .replace(/\.\./g, '_')
    .replace(/\s+/g, ' ')
    .replace(/^[. _]+|[. _]+$/g, '')
    .slice(0, MAX_NAME_LENGTH)
    .replace(/[. _]+$/, '');
}
