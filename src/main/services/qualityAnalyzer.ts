/**
 * Quality Analyzer
 *
 * Scores separated stems with scale-invariant signal-to-distortion ratio
 * (SI-SDR) measured against the original mixture. There is no ground-truth
 * stem to compare with, so the score is an approximation used for routing,
 * not a benchmark figure.
 *
 * Labels: excellent >= 12 dB, good >= 8 dB, acceptable >= 5 dB, else poor.
 * Reprocessing threshold: vocals < 7 dB, other stems < 5 dB.
 */

import * as fs from 'fs';
import { QualityScores, STEM_NAMES, StemName, StemPaths } from '../../shared/types';
import { DecodeOptions, MonoSignal, loadMonoSignal, resampleLinear } from '../utils/audioDecoder';
import { errorMessage } from './errors';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────

export type QualityLabel = 'excellent' | 'good' | 'acceptable' | 'poor';

/** Outcome of judging a set of stem scores */
export interface QualityVerdict {
  /** Stems whose score is below their reprocessing threshold */
  insufficient: StemName[];
  /** True when at least one stem is insufficient */
  needsFallback: boolean;
}

/** What the pipeline needs from a quality analyzer */
export interface StemQualityScorer {
  analyzeAllStems(stems: StemPaths, originalPath: string): Promise<QualityScores>;
}

export interface QualityAnalyzerOptions extends DecodeOptions {
  logger?: Logger;
}

// ─── Constants ───────────────────────────────────────────────────────────

export const THRESHOLD_EXCELLENT = 12;
export const THRESHOLD_GOOD = 8;
export const THRESHOLD_ACCEPTABLE = 5;
export const VOCAL_QUALITY_THRESHOLD = 7;

/** Energies below this count as silence */
const ENERGY_FLOOR = 1e-10;

// ─── Scoring ─────────────────────────────────────────────────────────────

function mean(signal: Float64Array, length: number): number {
  let sum = 0;
  for (let i = 0; i < length; i++) sum += signal[i];
  return length > 0 ? sum / length : 0;
}

/**
 * SI-SDR in dB of `estimate` against `reference`.
 *
 * Both are truncated to the shorter length and mean-centered; the estimate is
 * projected onto the reference to split it into target and noise.
 * Silent reference → -Infinity; zero noise → +Infinity.
 */
export function calculateSiSdr(reference: ArrayLike<number>, estimate: ArrayLike<number>): number {
  const length = Math.min(reference.length, estimate.length);
  const ref = Float64Array.from({ length }, (_, i) => reference[i]);
  const est = Float64Array.from({ length }, (_, i) => estimate[i]);

  const refMean = mean(ref, length);
  const estMean = mean(est, length);

  let refEnergy = 0;
  let dot = 0;
  for (let i = 0; i < length; i++) {
    ref[i] -= refMean;
    est[i] -= estMean;
    refEnergy += ref[i] * ref[i];
    dot += ref[i] * est[i];
  }

  if (refEnergy < ENERGY_FLOOR) {
    return Number.NEGATIVE_INFINITY;
  }

  const scale = dot / refEnergy;
  let targetEnergy = 0;
  let noiseEnergy = 0;
  for (let i = 0; i < length; i++) {
    const target = scale * ref[i];
    const noise = est[i] - target;
    targetEnergy += target * target;
    noiseEnergy += noise * noise;
  }

  if (noiseEnergy < ENERGY_FLOOR) {
    return Number.POSITIVE_INFINITY;
  }

  return 10 * Math.log10(targetEnergy / noiseEnergy);
}

export function qualityLabel(score: number): QualityLabel {
  if (score >= THRESHOLD_EXCELLENT) return 'excellent';
  if (score >= THRESHOLD_GOOD) return 'good';
  if (score >= THRESHOLD_ACCEPTABLE) return 'acceptable';
  return 'poor';
}

/**
 * Vocals use a stricter threshold than the other stems.
 */
export function needsReprocessing(stem: StemName, score: number): boolean {
  const threshold = stem === 'vocals' ? VOCAL_QUALITY_THRESHOLD : THRESHOLD_ACCEPTABLE;
  return score < threshold;
}

/**
 * Judges a set of scores. Unscored stems are not held against the result.
 */
export function evaluateQuality(scores: QualityScores): QualityVerdict {
  const insufficient = STEM_NAMES.filter((stem) => {
    const score = scores[stem];
    return score !== undefined && needsReprocessing(stem, score);
  });
  return { insufficient, needsFallback: insufficient.length > 0 };
}

/**
 * Scores a decoded stem against a decoded mixture, resampling the stem to
 * the mixture's rate when they differ.
 */
export function scoreSignals(stem: MonoSignal, original: MonoSignal): number {
  const estimate = resampleLinear(stem.samples, stem.sampleRate, original.sampleRate);
  return calculateSiSdr(original.samples, estimate);
}

// ─── QualityAnalyzer Class ───────────────────────────────────────────────

export class QualityAnalyzer implements StemQualityScorer {
  private readonly decodeOptions: DecodeOptions;
  private readonly logger?: Logger;

  constructor(options?: QualityAnalyzerOptions) {
    this.decodeOptions = { ffmpegPath: options?.ffmpegPath, timeoutMs: options?.timeoutMs };
    this.logger = options?.logger;
  }

  /**
   * Scores one stem. Returns null if either file cannot be decoded.
   */
  async analyzeStem(stemPath: string, originalPath: string): Promise<number | null> {
    const original = await this.load(originalPath);
    if (!original) return null;
    return this.scoreAgainst(stemPath, original);
  }

  /**
   * Scores every stem that exists on disk, decoding the mixture once.
   * Stems that cannot be decoded or score NaN are left out.
   */
  async analyzeAllStems(stems: StemPaths, originalPath: string): Promise<QualityScores> {
    const scores: QualityScores = {};
    const original = await this.load(originalPath);
    if (!original) return scores;

    for (const name of STEM_NAMES) {
      const stemPath = stems[name];
      if (!stemPath || !fs.existsSync(stemPath)) continue;

      const score = await this.scoreAgainst(stemPath, original);
      if (score === null) continue;
      if (Number.isNaN(score)) {
        this.logger?.warn(`Unscorable ${name} stem: signal contains NaN samples`, {
          filePath: stemPath,
          step: 'scoring',
        });
        continue;
      }
      scores[name] = score;
    }

    return scores;
  }

  private async scoreAgainst(stemPath: string, original: MonoSignal): Promise<number | null> {
    const stem = await this.load(stemPath);
    return stem ? scoreSignals(stem, original) : null;
  }

  private async load(filePath: string): Promise<MonoSignal | null> {
    try {
      return await loadMonoSignal(filePath, this.decodeOptions);
    } catch (error: unknown) {
      this.logger?.warn(`Could not decode audio for scoring: ${errorMessage(error)}`, {
        filePath,
        step: 'scoring',
      });
      return null;
    }
  }
}
