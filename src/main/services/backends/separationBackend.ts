/**
 * Separation backend contract.
 *
 * A backend turns one audio file into the four canonical stems. The pipeline
 * receives constructed backends, calls `initialize()` once, and from then on
 * only asks `isAvailable()` and `separate()`.
 */

import {
  BackendKind,
  STEM_NAMES,
  SeparationResult,
  StemName,
  StemPaths,
  hasAllStems,
} from '../../../shared/types';

export interface SeparationBackend {
  /** Identifier recorded on jobs, cache entries and results */
  readonly name: string;
  /** Where the work happens; routing policy keys off this */
  readonly kind: BackendKind;
  /**
   * Probes availability and resources. Called once before first use;
   * must not throw for a missing tool or credential.
   */
  initialize(): Promise<void>;
  /** Whether the backend can run now (false until initialized) */
  isAvailable(): boolean;
  /**
   * Separates `inputPath` into `outputDir`. Never rejects: failures come
   * back as `success: false` with an error message.
   */
  separate(inputPath: string, outputDir: string): Promise<SeparationResult>;
  /** How many files the backend could usefully process at once */
  recommendedParallelism(): number;
}

/**
 * Seconds elapsed since a `Date.now()` reading.
 */
export function secondsSince(startMs: number, now: () => number = Date.now): number {
  return Math.max(0, (now() - startMs) / 1000);
}

export function failedResult(
  backendId: string,
  error: string,
  elapsedSeconds: number,
  stems: StemPaths = {},
): SeparationResult {
  return { success: false, stems, elapsedSeconds, backendId, error };
}

/**
 * Success only when all four stems are present; otherwise a failure naming
 * the missing stems.
 */
export function completedResult(
  backendId: string,
  stems: StemPaths,
  elapsedSeconds: number,
): SeparationResult {
  if (hasAllStems(stems)) {
    return { success: true, stems, elapsedSeconds, backendId, error: null };
  }
  return failedResult(
    backendId,
    `Missing stems: ${missingStemNames(stems).join(', ')}`,
    elapsedSeconds,
    stems,
  );
}

export function missingStemNames(stems: StemPaths): StemName[] {
  return STEM_NAMES.filter((name) => !stems[name]);
}
