/**
 * Shared type definitions for the stem router.
 * Used by the backends, the pipeline, the scanner and the scheduler.
 */

/** Canonical stem names, in output order */
export const STEM_NAMES = ['vocals', 'drums', 'bass', 'other'] as const;

/** A canonical stem: vocal, percussive, low-frequency or residual */
export type StemName = (typeof STEM_NAMES)[number];

/** Stem name → absolute file path. Partial while a separation is incomplete. */
export type StemPaths = Partial<Record<StemName, string>>;

/** Stem name → quality score in dB */
export type QualityScores = Partial<Record<StemName, number>>;

/** Audio file extensions the library scanner picks up (with dot prefix) */
export const SUPPORTED_EXTENSIONS: readonly string[] = [
  '.mp3',
  '.wav',
  '.flac',
  '.aiff',
  '.aif',
  '.m4a',
  '.ogg',
] as const;

/** Where a backend does its work */
export type BackendKind = 'local' | 'remote';

/** Backend choice for a separation request */
export type BackendPreference = 'auto' | BackendKind;

/** Backend id reported when outputs were already on disk or restored from cache */
export const CACHED_BACKEND_ID = 'cached';

/** Backend id reported when no backend ran at all (e.g. missing input) */
export const NO_BACKEND_ID = 'none';

/** Outcome of one backend run */
export interface SeparationResult {
  /** True only when all four stems were produced */
  success: boolean;
  /** Produced stems (may be partial on failure) */
  stems: StemPaths;
  /** Wall-clock seconds spent in the backend */
  elapsedSeconds: number;
  /** Name of the backend that produced the result */
  backendId: string;
  /** Error message when success is false */
  error: string | null;
}

/** Tag metadata read from an audio file */
export interface TrackTags {
  artist: string;
  title: string;
  bpm: number | null;
  key: string | null;
  genre: string | null;
}

/** Identity of a source file as seen by the pipeline */
export interface TrackIdentity {
  /** Absolute path to the source file */
  filePath: string;
  /** Whole-file SHA-256 (hex) */
  fileHash: string;
  /** Best-effort tags */
  tags: TrackTags;
  /** Per-track output directory */
  outputDir: string;
}

/** Job lifecycle states */
export type JobStatus = 'pending' | 'processing' | 'completed' | 'failed';

/** Processing priority tiers (lower sorts first) */
export const PriorityTier = {
  HIGHEST: 1,
  HIGH: 2,
  MEDIUM: 3,
  NORMAL: 4,
  LOW: 5,
} as const;

export type PriorityTier = (typeof PriorityTier)[keyof typeof PriorityTier];

/** A file discovered by the library scanner */
export interface ScannedTrack {
  path: string;
  artist: string;
  title: string;
  bpm: number | null;
  key: string | null;
  genre: string | null;
  priority: PriorityTier;
  /** Priority group (crate) the track was matched through */
  group: string | null;
  /** "Artist - Title" */
  displayName: string;
}

/** Application settings */
export interface StemSettings {
  /** Base directory for per-track stem folders */
  outputDir: string;
  /** Content cache directory (null disables the cache) */
  cacheDir: string | null;
  /** Ledger database path (null = <outputDir>/stem-ledger.db) */
  dbPath: string | null;
  /** Backend choice used when a caller does not pass one */
  defaultBackend: BackendPreference;
  /** Retry once on another backend when quality is poor */
  qualityFallback: boolean;
  /** Skip files whose four stems already exist */
  skipExisting: boolean;
  /** Files below this size (MB) go to the local backend in auto mode */
  localSizeThresholdMb: number;
  /** Folder names that put a track in the highest priority tier */
  priorityGroups: string[];
  /** Scan subdirectories */
  recursiveScan: boolean;
  /** Separation command for the local backend */
  localCommand: string;
  /** Model name passed to the local command */
  localModel: string;
  /** Accelerator for the local backend */
  localDevice: 'auto' | 'cuda' | 'cpu';
  /** Upper bound for one local separation run (ms) */
  localTimeoutMs: number;
  /** Remote service API key (empty = remote backend unavailable) */
  remoteApiKey: string;
  /** Remote service base URL */
  remoteBaseUrl: string;
  /** Fixed interval between remote status polls (ms) */
  remotePollIntervalMs: number;
  /** Hard upper bound on waiting for a remote job (ms) */
  remoteTimeoutMs: number;
}

/** Default application settings */
export const DEFAULT_SETTINGS: StemSettings = {
  outputDir: 'data/stems',
  cacheDir: 'data/cache',
  dbPath: null,
  defaultBackend: 'auto',
  qualityFallback: true,
  skipExisting: true,
  localSizeThresholdMb: 50,
  priorityGroups: [],
  recursiveScan: true,
  localCommand: 'demucs',
  localModel: 'htdemucs',
  localDevice: 'auto',
  localTimeoutMs: 30 * 60 * 1000,
  remoteApiKey: '',
  remoteBaseUrl: 'https://www.lalal.ai/api',
  remotePollIntervalMs: 5000,
  remoteTimeoutMs: 600 * 1000,
};

/**
 * Type guard: true when every canonical stem has a path.
 */
export function hasAllStems(stems: StemPaths): stems is Record<StemName, string> {
  return STEM_NAMES.every((name) => typeof stems[name] === 'string');
}
