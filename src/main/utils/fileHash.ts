/**
 * Content hashing for source audio files.
 *
 * The whole-file SHA-256 identifies a track everywhere: the ledger's track
 * key, the content cache key and the suffix of the per-track output folder.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { FileReadError, errorMessage } from '../services/errors';

/** Hex characters of the hash used in output folder names */
export const SHORT_HASH_LENGTH = 8;

/**
 * Computes the SHA-256 (hex) of a file's full contents, streaming it in chunks.
 * @throws FileReadError if the file cannot be read
 */
export async function computeFileHash(filePath: string): Promise<string> {
  const resolvedPath = path.resolve(filePath);
  const hash = crypto.createHash('sha256');

  try {
    for await (const chunk of fs.createReadStream(resolvedPath)) {
      hash.update(chunk);
    }
  } catch (error: unknown) {
    throw new FileReadError(`Failed to hash file: ${errorMessage(error)}`, {
      filePath: resolvedPath,
      step: 'hashing',
      cause: error instanceof Error ? error : undefined,
    });
  }

  return hash.digest('hex');
}

/**
 * True for a 64-character lowercase hex SHA-256 digest.
 */
export function isContentHash(value: string): boolean {
  return /^[0-9a-f]{64}$/.test(value);
}

export function shortHash(fileHash: string): string {
  return fileHash.slice(0, SHORT_HASH_LENGTH);
}
