import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LedgerError } from '../../../src/main/services/errors';
import { JobLedger } from '../../../src/main/services/jobLedger';

const HASH_A = 'a'.repeat(64);
const HASH_B = 'b'.repeat(64);

describe('JobLedger', () => {
  let ledger: JobLedger;
  let currentDate: Date;

  beforeEach(() => {
    currentDate = new Date('2025-02-17T14:30:00.000Z');
    ledger = new JobLedger({ inMemory: true, getCurrentDate: () => currentDate });
    ledger.initialize();
  });

  afterEach(() => {
    ledger.close();
  });

  describe('lifecycle', () => {
    it('should refuse operations before initialize', () => {
      const closed = new JobLedger({ inMemory: true });
      expect(() => closed.trackExists(HASH_A)).toThrow(LedgerError);
      expect(() => closed.trackExists(HASH_A)).toThrow(
        'Job ledger is not initialized. Call initialize() first.',
      );
    });

    it('should report open state', () => {
      expect(ledger.isOpen()).toBe(true);
      ledger.close();
      expect(ledger.isOpen()).toBe(false);
      expect(ledger.getPath()).toBe(':memory:');
    });

    it('should create the database folder and persist across reopen', () => {
      const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'stem-ledger-test-'));
      try {
        const dbPath = path.join(tempDir, 'nested', 'ledger.db');
        const first = new JobLedger({ dbPath });
        first.initialize();
        first.addTrack('/music/a.mp3', HASH_A);
        first.close();

        const second = new JobLedger({ dbPath });
        second.initialize();
        expect(second.trackExists(HASH_A)).toBe(true);
        second.close();
      } finally {
        fs.rmSync(tempDir, { recursive: true, force: true });
      }
    });
  });

  describe('tracks', () => {
    it('should insert a track with its tags', () => {
      const track = ledger.addTrack('/music/a.mp3', HASH_A, {
        artist: 'Test Artist',
        title: 'Song',
        bpm: 124,
        genre: 'House',
      });

      expect(track).toEqual({
        id: 1,
        path: '/music/a.mp3',
        fileHash: HASH_A,
        artist: 'Test Artist',
        title: 'Song',
        bpm: 124,
        key: null,
        genre: 'House',
        createdAt: '2025-02-17T14:30:00.000Z',
      });
      expect(ledger.getTrack(1)).toEqual(track);
      expect(ledger.getTrackByHash(HASH_A)).toEqual(track);
    });

    it('should return the existing row for a known hash', () => {
      const first = ledger.addTrack('/music/a.mp3', HASH_A, { artist: 'First' });
      const again = ledger.addTrack('/elsewhere/copy.mp3', HASH_A, { artist: 'Second' });

      expect(again).toEqual(first);
      expect(ledger.getStats().totalTracks).toBe(1);
    });

    it('should return null for unknown tracks', () => {
      expect(ledger.getTrack(42)).toBeNull();
      expect(ledger.getTrackByHash(HASH_B)).toBeNull();
      expect(ledger.trackExists(HASH_B)).toBe(false);
    });
  });

  describe('jobs', () => {
    let trackId: number;

    beforeEach(() => {
      trackId = ledger.addTrack('/music/a.mp3', HASH_A).id;
    });

    it('should create pending jobs', () => {
      expect(ledger.createJob(trackId, 'demucs_htdemucs')).toEqual({
        id: 1,
        trackId,
        backend: 'demucs_htdemucs',
        status: 'pending',
        elapsedSeconds: null,
        error: null,
        supersededBy: null,
        createdAt: '2025-02-17T14:30:00.000Z',
        completedAt: null,
      });
    });

    it('should refuse jobs for unknown tracks', () => {
      expect(() => ledger.createJob(99, 'cloud')).toThrow(
        'Cannot create job: track 99 does not exist',
      );
    });

    it('should move a job through processing to completed', () => {
      const job = ledger.createJob(trackId, 'cloud');
      expect(ledger.updateJobStatus(job.id, 'processing').completedAt).toBeNull();

      currentDate = new Date('2025-02-17T14:31:00.000Z');
      const done = ledger.updateJobStatus(job.id, 'completed', { elapsedSeconds: 42.5 });
      expect(done.status).toBe('completed');
      expect(done.elapsedSeconds).toBe(42.5);
      expect(done.completedAt).toBe('2025-02-17T14:31:00.000Z');
      expect(ledger.hasSuccessfulJob(HASH_A)).toBe(true);
    });

    it('should record the error of a failed job', () => {
      const job = ledger.createJob(trackId, 'cloud');
      const failed = ledger.updateJobStatus(job.id, 'failed', { error: 'upload refused' });
      expect(failed.status).toBe('failed');
      expect(failed.error).toBe('upload refused');
      expect(failed.completedAt).toBe('2025-02-17T14:30:00.000Z');
      expect(ledger.hasSuccessfulJob(HASH_A)).toBe(false);
    });

    it('should reject illegal transitions', () => {
      const job = ledger.createJob(trackId, 'cloud');
      expect(() => ledger.updateJobStatus(job.id, 'completed')).toThrow(
        `Illegal job transition pending → completed for job ${job.id}`,
      );

      ledger.updateJobStatus(job.id, 'processing');
      ledger.updateJobStatus(job.id, 'failed');
      expect(() => ledger.updateJobStatus(job.id, 'processing')).toThrow(LedgerError);
      expect(() => ledger.updateJobStatus(job.id, 'completed')).toThrow(
        `Illegal job transition failed → completed for job ${job.id}`,
      );
    });

    it('should reject updates for unknown jobs', () => {
      expect(() => ledger.updateJobStatus(77, 'processing')).toThrow('Job 77 does not exist');
    });

    it('should list jobs oldest first and find the latest', () => {
      const first = ledger.createJob(trackId, 'demucs_htdemucs');
      const second = ledger.createJob(trackId, 'cloud');

      expect(ledger.getJobsForTrack(trackId).map((j) => j.id)).toEqual([first.id, second.id]);
      expect(ledger.getLatestJobForTrack(trackId)?.backend).toBe('cloud');
      expect(ledger.getLatestJobForTrack(12345)).toBeNull();
    });

    it('should link a superseded job to its replacement', () => {
      const primary = ledger.createJob(trackId, 'demucs_htdemucs');
      const fallback = ledger.createJob(trackId, 'cloud');

      ledger.markSuperseded(primary.id, fallback.id);
      expect(ledger.getJob(primary.id)?.supersededBy).toBe(fallback.id);
      expect(ledger.getJob(fallback.id)?.supersededBy).toBeNull();
    });

    it('should reject invalid supersede links', () => {
      const primary = ledger.createJob(trackId, 'demucs_htdemucs');
      expect(() => ledger.markSuperseded(primary.id, primary.id)).toThrow(
        `Job ${primary.id} cannot supersede itself`,
      );
      expect(() => ledger.markSuperseded(primary.id, 500)).toThrow('Job 500 does not exist');
      expect(() => ledger.markSuperseded(600, primary.id)).toThrow('Job 600 does not exist');
    });
  });

  describe('quality scores', () => {
    let jobId: number;

    beforeEach(() => {
      const trackId = ledger.addTrack('/music/a.mp3', HASH_A).id;
      jobId = ledger.createJob(trackId, 'cloud').id;
    });

    it('should store scores in stem order', () => {
      ledger.addQualityScores(jobId, { other: 4, vocals: 8 });
      expect(ledger.getQualityScores(jobId)).toEqual([
        { id: 1, jobId, stemName: 'vocals', score: 8 },
        { id: 2, jobId, stemName: 'other', score: 4 },
      ]);
      expect(ledger.getAverageQuality(jobId)).toBe(6);
    });

    it('should add a single score', () => {
      ledger.addQualityScore(jobId, 'bass', 7.25);
      expect(ledger.getQualityScores(jobId)[0].score).toBe(7.25);
    });

    it('should return null average without scores', () => {
      expect(ledger.getAverageQuality(jobId)).toBeNull();
    });

    it('should reject NaN scores without storing any of the set', () => {
      expect(() => ledger.addQualityScores(jobId, { vocals: 8, drums: NaN })).toThrow(
        `Invalid drums score for job ${jobId}: NaN`,
      );
      expect(() => ledger.addQualityScore(jobId, 'bass', NaN)).toThrow(LedgerError);
      expect(ledger.getQualityScores(jobId)).toEqual([]);
    });

    it('should store infinite scores', () => {
      ledger.addQualityScore(jobId, 'vocals', Number.POSITIVE_INFINITY);
      expect(ledger.getQualityScores(jobId)[0].score).toBe(Number.POSITIVE_INFINITY);
    });

    it('should refuse scores for unknown jobs', () => {
      expect(() => ledger.addQualityScores(404, { vocals: 1 })).toThrow('Job 404 does not exist');
      expect(ledger.getQualityScores(404)).toEqual([]);
    });
  });

  describe('getStats', () => {
    it('should count tracks and jobs by status', () => {
      const a = ledger.addTrack('/music/a.mp3', HASH_A).id;
      const b = ledger.addTrack('/music/b.mp3', HASH_B).id;
      const done = ledger.createJob(a, 'cloud');
      ledger.updateJobStatus(done.id, 'processing');
      ledger.updateJobStatus(done.id, 'completed');
      ledger.updateJobStatus(ledger.createJob(b, 'cloud').id, 'failed');
      ledger.createJob(b, 'demucs_htdemucs');

      expect(ledger.getStats()).toEqual({
        totalTracks: 2,
        totalJobs: 3,
        jobsByStatus: { pending: 1, processing: 0, completed: 1, failed: 1 },
      });
    });
  });
});
