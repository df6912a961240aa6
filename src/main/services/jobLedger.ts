/**
 * Job Ledger (SQLite)
 *
 * Durable record of every track seen and every separation attempt made:
 *
 * 1. tracks: one row per content hash (natural key)
 * 2. jobs: one row per backend attempt, status pending → processing →
 *    completed | failed (or pending → failed); terminal rows never reopen
 * 3. quality_scores: per-stem scores attached to a job that ran
 *
 * WAL journal so readers are not blocked, a 30s busy timeout for competing
 * writers, and every write inside an IMMEDIATE transaction.
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { JobStatus, QualityScores, STEM_NAMES, StemName, TrackTags } from '../../shared/types';
import { LedgerError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

export interface TrackRecord {
  id: number;
  path: string;
  fileHash: string;
  artist: string | null;
  title: string | null;
  bpm: number | null;
  key: string | null;
  genre: string | null;
  createdAt: string;
}

export interface JobRecord {
  id: number;
  trackId: number;
  backend: string;
  status: JobStatus;
  elapsedSeconds: number | null;
  error: string | null;
  /** Fallback job whose output replaced this job's output */
  supersededBy: number | null;
  createdAt: string;
  completedAt: string | null;
}

export interface QualityRecord {
  id: number;
  jobId: number;
  stemName: StemName;
  score: number;
}

export interface LedgerStats {
  totalTracks: number;
  totalJobs: number;
  jobsByStatus: Record<JobStatus, number>;
}

/** Fields that may accompany a status change */
export interface JobUpdate {
  elapsedSeconds?: number;
  error?: string | null;
}

/** Options for JobLedger */
export interface JobLedgerOptions {
  /** Path to the SQLite database file */
  dbPath?: string;
  /** Whether to use an in-memory database (for testing) */
  inMemory?: boolean;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

interface TrackRow {
  id: number;
  path: string;
  file_hash: string;
  artist: string | null;
  title: string | null;
  bpm: number | null;
  key: string | null;
  genre: string | null;
  created_at: string;
}

interface JobRow {
  id: number;
  track_id: number;
  backend: string;
  status: JobStatus;
  elapsed_seconds: number | null;
  error: string | null;
  superseded_by: number | null;
  created_at: string;
  completed_at: string | null;
}

interface QualityRow {
  id: number;
  job_id: number;
  stem_name: StemName;
  score: number;
}

// ─── Constants ───────────────────────────────────────────────────────────

/** Current schema version for migration support */
const SCHEMA_VERSION = 1;

/** Bounded wait for a competing writer (ms) */
export const BUSY_TIMEOUT_MS = 30_000;

export const DEFAULT_LEDGER_FILENAME = 'stem-ledger.db';

/** Statuses each status may be entered from */
const ALLOWED_PREDECESSORS: Record<JobStatus, readonly JobStatus[]> = {
  pending: [],
  processing: ['pending'],
  completed: ['processing'],
  failed: ['pending', 'processing'],
};

const TERMINAL_STATUSES: readonly JobStatus[] = ['completed', 'failed'];

// ─── Row Mapping ─────────────────────────────────────────────────────────

function toTrackRecord(row: TrackRow): TrackRecord {
  return {
    id: row.id,
    path: row.path,
    fileHash: row.file_hash,
    artist: row.artist,
    title: row.title,
    bpm: row.bpm,
    key: row.key,
    genre: row.genre,
    createdAt: row.created_at,
  };
}

function toJobRecord(row: JobRow): JobRecord {
  return {
    id: row.id,
    trackId: row.track_id,
    backend: row.backend,
    status: row.status,
    elapsedSeconds: row.elapsed_seconds,
    error: row.error,
    supersededBy: row.superseded_by,
    createdAt: row.created_at,
    completedAt: row.completed_at,
  };
}

/**
 * SQLite stores NaN as NULL, which the score column rejects.
 * @throws LedgerError for a NaN score
 */
function assertScore(jobId: number, stemName: StemName, score: number): void {
  if (Number.isNaN(score)) {
    throw new LedgerError(`Invalid ${stemName} score for job ${jobId}: NaN`);
  }
}

// ─── JobLedger Class ─────────────────────────────────────────────────────

export class JobLedger {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly inMemory: boolean;
  private readonly getCurrentDate: () => Date;

  constructor(options: JobLedgerOptions = {}) {
    this.inMemory = options.inMemory ?? false;
    this.dbPath = this.inMemory
      ? ':memory:'
      : path.resolve(options.dbPath ?? DEFAULT_LEDGER_FILENAME);
    this.getCurrentDate = options.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Opens the database and creates tables if they don't exist.
   * Must be called before any other operation.
   */
  initialize(): void {
    if (this.db) return;

    if (!this.inMemory) {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath, { timeout: BUSY_TIMEOUT_MS });
    db.pragma('journal_mode = WAL');
    db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
    db.pragma('foreign_keys = ON');

    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tracks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        path TEXT NOT NULL,
        file_hash TEXT NOT NULL UNIQUE,
        artist TEXT,
        title TEXT,
        bpm REAL,
        key TEXT,
        genre TEXT,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS jobs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        track_id INTEGER NOT NULL REFERENCES tracks(id),
        backend TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending'
          CHECK (status IN ('pending', 'processing', 'completed', 'failed')),
        elapsed_seconds REAL,
        error TEXT,
        superseded_by INTEGER REFERENCES jobs(id),
        created_at TEXT NOT NULL,
        completed_at TEXT
      );

      CREATE TABLE IF NOT EXISTS quality_scores (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        job_id INTEGER NOT NULL REFERENCES jobs(id),
        stem_name TEXT NOT NULL,
        score REAL NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tracks_hash ON tracks(file_hash);
      CREATE INDEX IF NOT EXISTS idx_jobs_track ON jobs(track_id);
      CREATE INDEX IF NOT EXISTS idx_jobs_status ON jobs(status);
      CREATE INDEX IF NOT EXISTS idx_quality_job ON quality_scores(job_id);
    `);

    const versionRow = db
      .prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1')
      .get();
    if (!versionRow) {
      db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
    }

    this.db = db;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  getPath(): string {
    return this.dbPath;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  // ─── Tracks ─────────────────────────────────────────────────────────

  /**
   * Inserts a track on first sight. Re-adding a known hash returns the
   * existing row unchanged.
   */
  addTrack(filePath: string, fileHash: string, tags?: Partial<TrackTags>): TrackRecord {
    return this.write(() => {
      this.database
        .prepare(
          `INSERT INTO tracks (path, file_hash, artist, title, bpm, key, genre, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(file_hash) DO NOTHING`,
        )
        .run(
          filePath,
          fileHash,
          tags?.artist ?? null,
          tags?.title ?? null,
          tags?.bpm ?? null,
          tags?.key ?? null,
          tags?.genre ?? null,
          this.now(),
        );

      const track = this.getTrackByHash(fileHash);
      if (!track) {
        throw new LedgerError(`Track ${fileHash} missing after insert`, { filePath });
      }
      return track;
    });
  }

  getTrackByHash(fileHash: string): TrackRecord | null {
    const row = this.database
      .prepare<[string], TrackRow>('SELECT * FROM tracks WHERE file_hash = ?')
      .get(fileHash);
    return row ? toTrackRecord(row) : null;
  }

  getTrack(trackId: number): TrackRecord | null {
    const row = this.database
      .prepare<[number], TrackRow>('SELECT * FROM tracks WHERE id = ?')
      .get(trackId);
    return row ? toTrackRecord(row) : null;
  }

  trackExists(fileHash: string): boolean {
    const row = this.database
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM tracks WHERE file_hash = ?')
      .get(fileHash);
    return row !== undefined;
  }

  // ─── Jobs ───────────────────────────────────────────────────────────

  /**
   * Creates a pending job for a track.
   */
  createJob(trackId: number, backend: string): JobRecord {
    return this.write(() => {
      if (!this.getTrack(trackId)) {
        throw new LedgerError(`Cannot create job: track ${trackId} does not exist`);
      }
      const result = this.database
        .prepare(
          `INSERT INTO jobs (track_id, backend, status, created_at)
             VALUES (?, ?, 'pending', ?)`,
        )
        .run(trackId, backend, this.now());
      return this.requireJob(Number(result.lastInsertRowid));
    });
  }

  /**
   * Moves a job forward. Terminal statuses stamp completed_at.
   * @throws LedgerError for unknown jobs and illegal transitions
   */
  updateJobStatus(jobId: number, status: JobStatus, update: JobUpdate = {}): JobRecord {
    const allowed = ALLOWED_PREDECESSORS[status];

    return this.write(() => {
      const current = this.getJob(jobId);
      if (!current) {
        throw new LedgerError(`Job ${jobId} does not exist`);
      }
      if (!allowed.includes(current.status)) {
        throw new LedgerError(
          `Illegal job transition ${current.status} → ${status} for job ${jobId}`,
        );
      }

      const terminal = TERMINAL_STATUSES.includes(status);
      const placeholders = allowed.map(() => '?').join(', ');
      const result = this.database
        .prepare(
          `UPDATE jobs
              SET status = ?,
                  elapsed_seconds = COALESCE(?, elapsed_seconds),
                  error = COALESCE(?, error),
                  completed_at = ?
            WHERE id = ? AND status IN (${placeholders})`,
        )
        .run(
          status,
          update.elapsedSeconds ?? null,
          update.error ?? null,
          terminal ? this.now() : null,
          jobId,
          ...allowed,
        );

      if (result.changes === 0) {
        throw new LedgerError(`Job ${jobId} changed status concurrently`);
      }
      return this.requireJob(jobId);
    });
  }

  /**
   * Records that `jobId`'s output was replaced by `supersededBy`'s output.
   */
  markSuperseded(jobId: number, supersededBy: number): void {
    this.write(() => {
      if (jobId === supersededBy) {
        throw new LedgerError(`Job ${jobId} cannot supersede itself`);
      }
      this.requireJob(supersededBy);
      const result = this.database
        .prepare('UPDATE jobs SET superseded_by = ? WHERE id = ?')
        .run(supersededBy, jobId);
      if (result.changes === 0) {
        throw new LedgerError(`Job ${jobId} does not exist`);
      }
    });
  }

  getJob(jobId: number): JobRecord | null {
    const row = this.database
      .prepare<[number], JobRow>('SELECT * FROM jobs WHERE id = ?')
      .get(jobId);
    return row ? toJobRecord(row) : null;
  }

  /**
   * All jobs for a track, oldest first.
   */
  getJobsForTrack(trackId: number): JobRecord[] {
    return this.database
      .prepare<[number], JobRow>('SELECT * FROM jobs WHERE track_id = ? ORDER BY id')
      .all(trackId)
      .map(toJobRecord);
  }

  getLatestJobForTrack(trackId: number): JobRecord | null {
    const row = this.database
      .prepare<[number], JobRow>('SELECT * FROM jobs WHERE track_id = ? ORDER BY id DESC LIMIT 1')
      .get(trackId);
    return row ? toJobRecord(row) : null;
  }

  /**
   * True if any job for the content hash completed.
   */
  hasSuccessfulJob(fileHash: string): boolean {
    const row = this.database
      .prepare<[string], { found: number }>(
        `SELECT 1 AS found
           FROM jobs j JOIN tracks t ON t.id = j.track_id
          WHERE t.file_hash = ? AND j.status = 'completed'
          LIMIT 1`,
      )
      .get(fileHash);
    return row !== undefined;
  }

  // ─── Quality Scores ─────────────────────────────────────────────────

  addQualityScore(jobId: number, stemName: StemName, score: number): void {
    assertScore(jobId, stemName, score);
    this.write(() => {
      this.requireJob(jobId);
      this.database
        .prepare('INSERT INTO quality_scores (job_id, stem_name, score) VALUES (?, ?, ?)')
        .run(jobId, stemName, score);
    });
  }

  /**
   * Stores a set of scores in one transaction.
   */
  addQualityScores(jobId: number, scores: QualityScores): void {
    for (const name of STEM_NAMES) {
      const score = scores[name];
      if (score !== undefined) assertScore(jobId, name, score);
    }
    this.write(() => {
      this.requireJob(jobId);
      const insert = this.database.prepare(
        'INSERT INTO quality_scores (job_id, stem_name, score) VALUES (?, ?, ?)',
      );
      for (const name of STEM_NAMES) {
        const score = scores[name];
        if (score !== undefined) insert.run(jobId, name, score);
      }
    });
  }

  getQualityScores(jobId: number): QualityRecord[] {
    return this.database
      .prepare<[number], QualityRow>('SELECT * FROM quality_scores WHERE job_id = ? ORDER BY id')
      .all(jobId)
      .map((row) => ({ id: row.id, jobId: row.job_id, stemName: row.stem_name, score: row.score }));
  }

  /**
   * Mean score over a job's stems, or null if it has none.
   */
  getAverageQuality(jobId: number): number | null {
    const row = this.database
      .prepare<[number], { average: number | null }>(
        'SELECT AVG(score) AS average FROM quality_scores WHERE job_id = ?',
      )
      .get(jobId);
    return row?.average ?? null;
  }

  // ─── Stats ──────────────────────────────────────────────────────────

  getStats(): LedgerStats {
    const tracks = this.database
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM tracks')
      .get();
    const rows = this.database
      .prepare<[], { status: JobStatus; count: number }>(
        'SELECT status, COUNT(*) AS count FROM jobs GROUP BY status',
      )
      .all();

    const jobsByStatus: Record<JobStatus, number> = {
      pending: 0,
      processing: 0,
      completed: 0,
      failed: 0,
    };
    let totalJobs = 0;
    for (const row of rows) {
      jobsByStatus[row.status] = row.count;
      totalJobs += row.count;
    }

    return { totalTracks: tracks?.count ?? 0, totalJobs, jobsByStatus };
  }

  // ─── Private Helpers ────────────────────────────────────────────────

  private get database(): Database.Database {
    if (!this.db) {
      throw new LedgerError('Job ledger is not initialized. Call initialize() first.');
    }
    return this.db;
  }

  /**
   * Runs `fn` inside an IMMEDIATE transaction.
   */
  private write<T>(fn: () => T): T {
    return this.database.transaction(fn).immediate();
  }

  private requireJob(jobId: number): JobRecord {
    const job = this.getJob(jobId);
    if (!job) {
      throw new LedgerError(`Job ${jobId} does not exist`);
    }
    return job;
  }

  private now(): string {
    return this.getCurrentDate().toISOString();
  }
}
