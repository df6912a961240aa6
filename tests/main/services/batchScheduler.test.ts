import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { TrackTags } from '../../../src/shared/types';
import { LibraryScanner } from '../../../src/main/services/libraryScanner';
import { FileReadError } from '../../../src/main/services/errors';
import { Logger } from '../../../src/main/services/logger';
import {
  BatchProgress,
  BatchScheduler,
  createProgress,
} from '../../../src/main/services/batchScheduler';
import type {
  PipelineResult,
  SeparateOptions,
  SeparationPipeline,
} from '../../../src/main/services/stemPipeline';

type Outcome = 'separated' | 'cached' | 'failed' | 'throws';

const STEP_MS = 2000;

/** Pipeline stand-in: each call advances the shared clock by STEP_MS */
class FakePipeline implements SeparationPipeline {
  readonly calls: Array<{ filePath: string; options?: SeparateOptions }> = [];
  readonly existing = new Set<string>();
  readonly unreadable = new Set<string>();

  constructor(
    private readonly outcomes: Record<string, Outcome>,
    private readonly tick: () => void,
  ) {}

  async separate(filePath: string, options?: SeparateOptions): Promise<PipelineResult> {
    this.calls.push({ filePath, options });
    this.tick();

    const outcome = this.outcomes[path.basename(filePath)] ?? 'separated';
    if (outcome === 'throws') {
      throw new Error('disk full');
    }
    return {
      success: outcome !== 'failed',
      stems: {},
      elapsedSeconds: STEP_MS / 1000,
      backendId: outcome === 'cached' ? 'cached' : 'local-test',
      error: outcome === 'failed' ? 'backend exploded' : null,
      fileHash: null,
      outputDir: null,
      qualityScores: {},
      fallbackAttempted: false,
      fallbackError: null,
      jobIds: [],
    };
  }

  async hasExistingOutput(filePath: string): Promise<boolean> {
    const name = path.basename(filePath);
    if (this.unreadable.has(name)) {
      throw new FileReadError(`Cannot read ${name}`, { filePath });
    }
    return this.existing.has(name);
  }
}

/** a: house (HIGH), b: 128 BPM (MEDIUM), c and d: LOW */
async function tagsFromName(filePath: string): Promise<TrackTags> {
  const name = path.basename(filePath, path.extname(filePath));
  return {
    artist: name,
    title: 'Song',
    bpm: name === 'b' ? 128 : null,
    key: null,
    genre: name === 'a' ? 'House' : null,
  };
}

describe('batchScheduler', () => {
  describe('createProgress', () => {
    it('should have no estimate before the first track', () => {
      expect(createProgress({ total: 3, completed: 0, failed: 0, skipped: 0 }, 0)).toEqual({
        total: 3,
        completed: 0,
        failed: 0,
        skipped: 0,
        remaining: 3,
        percentComplete: 0,
        estimatedTimeRemaining: null,
      });
    });

    it('should estimate from the average pace', () => {
      const progress = createProgress({ total: 10, completed: 2, failed: 1, skipped: 1 }, 8000);
      expect(progress.remaining).toBe(6);
      expect(progress.percentComplete).toBeCloseTo(30, 10);
      expect(progress.estimatedTimeRemaining).toBe(12);
    });

    it('should report 0% for an empty batch', () => {
      const progress = createProgress({ total: 0, completed: 0, failed: 0, skipped: 0 }, 0);
      expect(progress.percentComplete).toBe(0);
    });
  });

  describe('BatchScheduler', () => {
    let tempDir: string;
    let clock: number;
    let logger: Logger;
    let pipeline: FakePipeline;
    let scheduler: BatchScheduler;

    function filePath(name: string): string {
      return path.join(tempDir, name);
    }

    beforeEach(async () => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stem-batch-test-'));
      for (const name of ['a.mp3', 'b.mp3', 'c.mp3', 'd.mp3']) {
        fs.writeFileSync(filePath(name), '');
      }

      clock = 1_000_000;
      logger = new Logger({ writeToFile: false });
      await logger.initialize();
      pipeline = new FakePipeline(
        { 'a.mp3': 'separated', 'b.mp3': 'cached', 'c.mp3': 'failed', 'd.mp3': 'throws' },
        () => {
          clock += STEP_MS;
        },
      );
      scheduler = new BatchScheduler({
        pipeline,
        scanner: new LibraryScanner({ tagReader: tagsFromName }),
        logger,
        now: () => clock,
      });
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should process tracks in priority order and count outcomes', async () => {
      const seen: Array<[string, BatchProgress]> = [];
      const result = await scheduler.processDirectory(tempDir, {
        onProgress: (progress, track) => seen.push([track.displayName, progress]),
      });

      expect(pipeline.calls.map((c) => path.basename(c.filePath))).toEqual([
        'a.mp3',
        'b.mp3',
        'c.mp3',
        'd.mp3',
      ]);
      expect(seen.map(([name, p]) => [name, p.percentComplete, p.estimatedTimeRemaining])).toEqual([
        ['a - Song', 25, 6],
        ['b - Song', 50, 4],
        ['c - Song', 50, 2],
        ['d - Song', 50, 0],
      ]);

      expect(result.progress).toEqual({
        total: 4,
        completed: 1,
        failed: 2,
        skipped: 1,
        remaining: 0,
        percentComplete: 50,
        estimatedTimeRemaining: 0,
      });
      expect(result.elapsedSeconds).toBe(8);
      expect(result.cancelled).toBe(false);
      expect(result.outcomes.map((o) => o.result.backendId)).toEqual([
        'local-test',
        'cached',
        'local-test',
      ]);
      expect(result.errors.map((e) => [e.track?.path, e.message])).toEqual([
        [filePath('c.mp3'), 'backend exploded'],
        [filePath('d.mp3'), 'disk full'],
      ]);
    });

    it('should log a thrown track error and the summary', async () => {
      await scheduler.processDirectory(tempDir);

      expect(logger.getErrors()[0]).toMatchObject({
        message: 'disk full',
        filePath: filePath('d.mp3'),
        step: 'batch',
      });
      const info = logger.getEntries({ level: 'INFO' }).map((e) => e.message);
      expect(info[0]).toBe('Starting batch: 4 tracks');
      expect(info[info.length - 1]).toBe('Batch complete: 1 separated, 2 failed, 1 skipped in 8.0s');
    });

    it('should pass request options through to the pipeline', async () => {
      await scheduler.processDirectory(tempDir, {
        backend: 'remote',
        qualityFallback: false,
        limit: 2,
      });

      expect(pipeline.calls).toHaveLength(2);
      expect(pipeline.calls[0].options).toEqual({
        backend: 'remote',
        skipIfExisting: undefined,
        qualityFallback: false,
      });
    });

    it('should stop after the current track when cancelled', async () => {
      let runningDuringBatch = false;
      const result = await scheduler.processDirectory(tempDir, {
        onProgress: () => {
          runningDuringBatch = scheduler.isRunning();
          scheduler.cancel();
        },
      });

      expect(runningDuringBatch).toBe(true);
      expect(result.cancelled).toBe(true);
      expect(result.outcomes).toHaveLength(1);
      expect(result.progress.remaining).toBe(3);
      expect(scheduler.isRunning()).toBe(false);
      expect(logger.getEntries({ level: 'INFO' }).map((e) => e.message)).toContain(
        'Batch cancelled by user',
      );
    });

    it('should ignore cancel when idle', () => {
      scheduler.cancel();
      expect(logger.size).toBe(0);
    });

    it('should return one error for a missing root', async () => {
      const missing = filePath('nowhere');
      const result = await scheduler.processDirectory(missing);

      expect(result).toEqual({
        progress: {
          total: 0,
          completed: 0,
          failed: 0,
          skipped: 0,
          remaining: 0,
          percentComplete: 0,
          estimatedTimeRemaining: null,
        },
        outcomes: [],
        errors: [{ track: null, message: `Directory not found: ${missing}` }],
        elapsedSeconds: 0,
        cancelled: false,
      });
      expect(pipeline.calls).toHaveLength(0);
    });

    it('should finish an empty folder with no errors', async () => {
      const empty = filePath('empty');
      fs.mkdirSync(empty);
      const result = await scheduler.processDirectory(empty);

      expect(result.progress.total).toBe(0);
      expect(result.errors).toEqual([]);
    });

    it('should resume with skipping forced on', async () => {
      const progressCalls: number[] = [];
      await scheduler.resume(tempDir, (progress) => progressCalls.push(progress.total), {
        backend: 'local',
      });

      expect(pipeline.calls[0].options).toEqual({
        backend: 'local',
        skipIfExisting: true,
        qualityFallback: undefined,
      });
      expect(progressCalls).toEqual([4, 4, 4, 4]);
    });

    it('should list tracks without stems', async () => {
      pipeline.existing.add('a.mp3');
      pipeline.existing.add('c.mp3');

      const pending = await scheduler.pendingTracks(tempDir);

      expect(pending.map((t) => path.basename(t.path))).toEqual(['b.mp3', 'd.mp3']);
      expect(pipeline.calls).toHaveLength(0);
    });

    it('should treat a track it cannot check as pending', async () => {
      pipeline.existing.add('a.mp3');
      pipeline.existing.add('b.mp3');
      pipeline.unreadable.add('c.mp3');

      const pending = await scheduler.pendingTracks(tempDir);

      expect(pending.map((t) => path.basename(t.path))).toEqual(['c.mp3', 'd.mp3']);
      expect(logger.getWarnings()[0]).toMatchObject({
        message: 'Could not check existing stems: Cannot read c.mp3',
        filePath: filePath('c.mp3'),
        step: 'batch',
      });
    });
  });
});
