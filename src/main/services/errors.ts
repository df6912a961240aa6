/**
 * Custom Error Classes for the Stem Router
 *
 * Provides categorized error types for routing, separation, caching and
 * ledger failures, enabling structured logging and per-track error reporting.
 *
 * Poor separation quality is not an error: it is reported as a
 * QualityVerdict by the quality analyzer and drives the fallback hop.
 */

/**
 * Error categories.
 */
export type ErrorCategory =
  | 'EngineUnavailable'
  | 'NoEngineAvailable'
  | 'SeparationFailure'
  | 'RemoteTimeout'
  | 'CacheCorruption'
  | 'PathTraversal'
  | 'LedgerError'
  | 'FileReadError';

/** Context shared by every error constructor */
export interface ErrorContext {
  filePath?: string;
  step?: string;
  cause?: Error;
}

/**
 * Base class for all stem router errors.
 * Extends the native Error class with additional context fields.
 */
export class PipelineError extends Error {
  /** Error category for classification */
  readonly category: ErrorCategory;
  /** The file being processed when the error occurred (if applicable) */
  readonly filePath: string | null;
  /** The processing step where the error occurred */
  readonly step: string;
  /** The original error that caused this error (if wrapping) */
  readonly cause: Error | null;
  /** Timestamp when the error was created */
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: ErrorContext) {
    super(message);
    this.name = category;
    this.category = category;
    this.filePath = options?.filePath ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    // Ensure prototype chain works correctly
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a structured object representation of the error for logging.
   */
  toLogObject(): {
    category: ErrorCategory;
    message: string;
    filePath: string | null;
    step: string;
    timestamp: string;
    stack: string | undefined;
    cause: string | null;
  } {
    return {
      category: this.category,
      message: this.message,
      filePath: this.filePath,
      step: this.step,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause?.message ?? null,
    };
  }

  /**
   * Returns a user-facing error message (no stack traces).
   */
  toUserMessage(): string {
    const fileInfo = this.filePath ? ` [${this.filePath}]` : '';
    return `${this.category}${fileInfo}: ${this.message}`;
  }
}

/**
 * An explicitly requested backend cannot be used.
 */
export class EngineUnavailableError extends PipelineError {
  /** Name or kind of the requested backend */
  readonly backend: string;

  constructor(message: string, backend: string, options?: ErrorContext) {
    super(message, 'EngineUnavailable', { step: 'routing', ...options });
    this.backend = backend;
  }
}

/**
 * Automatic routing found no usable backend.
 */
export class NoEngineAvailableError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'NoEngineAvailable', { step: 'routing', ...options });
  }
}

/**
 * A backend ran but did not produce usable output.
 */
export class SeparationFailureError extends PipelineError {
  readonly backendId: string | null;

  constructor(message: string, options?: ErrorContext & { backendId?: string }) {
    super(message, 'SeparationFailure', { step: 'separating', ...options });
    this.backendId = options?.backendId ?? null;
  }
}

/**
 * A remote job did not finish within its polling bound.
 */
export class RemoteTimeoutError extends PipelineError {
  /** The bound that was exceeded, in milliseconds */
  readonly timeoutMs: number;
  /** Remote job id (if one was assigned) */
  readonly remoteJobId: string | null;

  constructor(
    message: string,
    timeoutMs: number,
    options?: ErrorContext & { remoteJobId?: string },
  ) {
    super(message, 'RemoteTimeout', { step: 'polling', ...options });
    this.timeoutMs = timeoutMs;
    this.remoteJobId = options?.remoteJobId ?? null;
  }

  override toLogObject(): ReturnType<PipelineError['toLogObject']> & {
    timeoutMs: number;
    remoteJobId: string | null;
  } {
    return {
      ...super.toLogObject(),
      timeoutMs: this.timeoutMs,
      remoteJobId: this.remoteJobId,
    };
  }
}

/**
 * A cache entry was incomplete or unreadable. Purged and reported as a miss.
 */
export class CacheCorruptionError extends PipelineError {
  /** Entry directory that was found corrupt */
  readonly entryDir: string;

  constructor(message: string, entryDir: string, options?: ErrorContext) {
    super(message, 'CacheCorruption', { step: 'cache_lookup', ...options });
    this.entryDir = entryDir;
  }
}

/**
 * A computed path escaped the root it must stay inside.
 */
export class PathTraversalError extends PipelineError {
  readonly root: string;
  readonly candidate: string;

  constructor(message: string, root: string, candidate: string, options?: ErrorContext) {
    super(message, 'PathTraversal', { step: 'resolving_path', ...options });
    this.root = root;
    this.candidate = candidate;
  }
}

/**
 * The job ledger rejected an operation (e.g. an illegal status transition).
 */
export class LedgerError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'LedgerError', { step: 'ledger', ...options });
  }
}

/**
 * Reading or hashing a source file failed.
 */
export class FileReadError extends PipelineError {
  constructor(message: string, options?: ErrorContext) {
    super(message, 'FileReadError', { step: 'reading', ...options });
  }
}

/**
 * Type guard to check if an error is a PipelineError.
 */
export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Returns the message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps a generic error in the given PipelineError category.
 * If the error is already a PipelineError, it is returned as-is.
 *
 * Categories that need extra constructor data (backend, timeout, paths)
 * are wrapped with neutral values for that data.
 */
export function wrapError(
  error: unknown,
  category: ErrorCategory,
  options?: {
    filePath?: string;
    step?: string;
  },
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';

  switch (category) {
    case 'EngineUnavailable':
      return new EngineUnavailableError(message, 'unknown', { ...options, cause });
    case 'NoEngineAvailable':
      return new NoEngineAvailableError(message, { ...options, cause });
    case 'SeparationFailure':
      return new SeparationFailureError(message, { ...options, cause });
    case 'RemoteTimeout':
      return new RemoteTimeoutError(message, 0, { ...options, cause });
    case 'CacheCorruption':
      return new CacheCorruptionError(message, options?.filePath ?? '', { ...options, cause });
    case 'PathTraversal':
      return new PathTraversalError(message, '', options?.filePath ?? '', { ...options, cause });
    case 'LedgerError':
      return new LedgerError(message, { ...options, cause });
    case 'FileReadError':
      return new FileReadError(message, { ...options, cause });
  }
}
