/**
 * Logger Service for the Stem Router
 *
 * Structured logging with levels, error categorization and integration with
 * the PipelineError classes. Entries are kept in memory for the current
 * session and, when enabled, appended to a daily log file with size rotation.
 *
 * Log levels: ERROR (failed separations, ledger errors), WARN (skipped or
 * cached tracks, corrupt cache entries, fallback failures), INFO (progress)
 *
 * Default log directory: <appdata>/stem-router/logs/
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { PipelineError, isPipelineError, errorMessage, ErrorCategory } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO';

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** Source file being processed (if applicable) */
  filePath: string | null;
  /** Processing step (if applicable) */
  step: string | null;
  /** Original error message (from cause chain, if applicable) */
  cause: string | null;
}

/** Context fields accepted by the logging methods */
export interface LogContext {
  category?: ErrorCategory;
  filePath?: string;
  step?: string;
  cause?: string;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory to store log files. Defaults to <appdata>/stem-router/logs/ */
  logDir?: string;
  /** Minimum log level to write (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to true */
  writeToFile?: boolean;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

/** Summary of log entries */
export interface LogSummary {
  totalEntries: number;
  errorCount: number;
  warnCount: number;
  infoCount: number;
  /** Breakdown of errors by category */
  errorsByCategory: Record<string, number>;
  /** Log file path (if file logging is enabled) */
  logFilePath: string | null;
}

/** Filter options for retrieving log entries */
export interface LogFilter {
  level?: LogLevel;
  category?: ErrorCategory;
  /** Substring match on the file path */
  filePath?: string;
  /** Keep only the last N matching entries */
  limit?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────

const APP_DIR_NAME = 'stem-router';

const LOG_DIR_NAME = 'logs';

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory path.
 * Uses %APPDATA% when set, ~/.config otherwise.
 */
export function getDefaultLogDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME, LOG_DIR_NAME);
}

/**
 * Generates a log filename (YYYY-MM-DD.log) from a Date.
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats a LogEntry as a single line.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | filePath: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [`[${entry.timestamp}]`, entry.level];

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }

  parts.push(entry.message);

  if (entry.filePath) {
    parts.push(`| filePath: ${entry.filePath}`);
  }
  if (entry.step) {
    parts.push(`| step: ${entry.step}`);
  }
  if (entry.cause) {
    parts.push(`| cause: ${entry.cause}`);
  }

  return parts.join(' ');
}

/**
 * True if `level` passes the `minLevel` threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

/**
 * Creates a LogEntry from a PipelineError.
 */
export function createLogEntryFromError(
  error: PipelineError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message: error.message,
    category: error.category,
    filePath: error.filePath,
    step: error.step,
    cause: error.cause?.message ?? null,
  };
}

/**
 * Creates a LogEntry from a plain message.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  options?: LogContext,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: options?.category ?? null,
    filePath: options?.filePath ?? null,
    step: options?.step ?? null,
    cause: options?.cause ?? null,
  };
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Session logger.
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ logDir: '/path/to/logs' });
 * await logger.initialize();
 * logger.info('Separating', { filePath: '/music/track.flac', step: 'separating' });
 * logger.logPipelineError(new RemoteTimeoutError('no result after 600s', 600000));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private readonly maxFileSize: number;
  private readonly getCurrentDate: () => Date;
  private writeToFile: boolean;

  /** In-memory log entries for the current session */
  private entries: LogEntry[] = [];

  private initialized = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. If it can't be created, file logging
   * is switched off and a WARN entry is kept in memory.
   */
  async initialize(): Promise<void> {
    if (this.writeToFile) {
      try {
        await fs.promises.mkdir(this.logDir, { recursive: true });
      } catch (error: unknown) {
        this.disableFileOutput(`Failed to create log directory "${this.logDir}"`, error);
      }
    }
    this.initialized = true;
  }

  /** Current log file path based on today's date */
  getLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  getLogDir(): string {
    return this.logDir;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Whether entries are still being appended to the log file */
  isWritingToFile(): boolean {
    return this.writeToFile;
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, options?: LogContext): void {
    this.log('ERROR', message, options);
  }

  warn(message: string, options?: LogContext): void {
    this.log('WARN', message, options);
  }

  info(message: string, options?: LogContext): void {
    this.log('INFO', message, options);
  }

  /**
   * Logs a PipelineError with its category, file, step and cause.
   */
  logPipelineError(error: PipelineError, level: LogLevel = 'ERROR'): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntryFromError(error, level, this.getCurrentDate));
  }

  /**
   * Logs any thrown value. PipelineErrors keep their context; anything else
   * becomes a plain ERROR entry.
   */
  logError(error: unknown, context?: { filePath?: string; step?: string }): void {
    if (isPipelineError(error)) {
      this.logPipelineError(error);
      return;
    }

    this.error(errorMessage(error), {
      filePath: context?.filePath,
      step: context?.step,
      cause: error instanceof Error ? error.message : undefined,
    });
  }

  /**
   * Logs a skipped file at WARN level.
   */
  logSkippedFile(filePath: string, reason: string): void {
    this.warn(`File skipped: ${reason}`, { filePath, step: 'processing' });
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, options?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, options, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.writeToFile && this.initialized) {
      this.writeEntryToFile(entry);
    }
  }

  /**
   * Appends an entry to the current log file, rotating it first when it
   * has reached maxFileSize. A write failure switches file output off.
   */
  private writeEntryToFile(entry: LogEntry): void {
    const logFilePath = this.getLogFilePath();
    try {
      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        this.rotateLogFile(logFilePath);
      }
      fs.mkdirSync(path.dirname(logFilePath), { recursive: true });
      fs.appendFileSync(logFilePath, formatLogEntry(entry) + '\n', 'utf-8');
    } catch (error: unknown) {
      this.disableFileOutput(`Failed to write log file "${logFilePath}"`, error);
    }
  }

  /**
   * Renames a full log file with the next free numeric suffix.
   * e.g., 2026-01-15.log → 2026-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    let rotatedPath = `${base}.${rotationIndex}${ext}`;
    while (fs.existsSync(rotatedPath)) {
      rotationIndex++;
      rotatedPath = `${base}.${rotationIndex}${ext}`;
    }

    fs.renameSync(logFilePath, rotatedPath);
  }

  private disableFileOutput(reason: string, error: unknown): void {
    this.writeToFile = false;
    this.entries.push(
      createLogEntry(
        'WARN',
        `${reason}: ${errorMessage(error)}. File logging disabled.`,
        undefined,
        this.getCurrentDate,
      ),
    );
  }

  // ─── Retrieval Methods ─────────────────────────────────────────────

  /**
   * Returns in-memory log entries, optionally filtered.
   */
  getEntries(filter?: LogFilter): LogEntry[] {
    let entries = [...this.entries];

    if (filter?.level) {
      entries = entries.filter((e) => e.level === filter.level);
    }
    if (filter?.category) {
      entries = entries.filter((e) => e.category === filter.category);
    }
    if (filter?.filePath) {
      const search = filter.filePath.toLowerCase();
      entries = entries.filter((e) => e.filePath?.toLowerCase().includes(search));
    }
    if (filter?.limit && filter.limit > 0) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  getErrors(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'ERROR', limit });
  }

  getWarnings(limit?: number): LogEntry[] {
    return this.getEntries({ level: 'WARN', limit });
  }

  /**
   * Counts entries by level and errors by category.
   */
  getSummary(): LogSummary {
    const errorsByCategory: Record<string, number> = {};
    let errorCount = 0;
    let warnCount = 0;
    let infoCount = 0;

    for (const entry of this.entries) {
      switch (entry.level) {
        case 'ERROR':
          errorCount++;
          if (entry.category) {
            errorsByCategory[entry.category] = (errorsByCategory[entry.category] ?? 0) + 1;
          }
          break;
        case 'WARN':
          warnCount++;
          break;
        case 'INFO':
          infoCount++;
          break;
      }
    }

    return {
      totalEntries: this.entries.length,
      errorCount,
      warnCount,
      infoCount,
      errorsByCategory,
      logFilePath: this.writeToFile ? this.getLogFilePath() : null,
    };
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Clears in-memory entries. Log files are left alone.
   */
  clear(): void {
    this.entries = [];
  }
}
