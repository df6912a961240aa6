/**
 * Remote cloud backend.
 *
 * Uploads the source file to the separation service, polls the job at a fixed
 * interval with a hard upper bound, then downloads the four stems:
 *
 *   POST <base>/upload/          Authorization: license <key>  → { id }
 *   GET  <base>/check/?id=<id>   → { status: 'done' | 'error' | ..., result }
 *
 * The result map names stems vocal / drum / bass / other.
 */

import * as fs from 'fs';
import * as path from 'path';
import axios from 'axios';
import {
  BackendKind,
  STEM_NAMES,
  SeparationResult,
  StemName,
  StemPaths,
} from '../../../shared/types';
import { RemoteTimeoutError, errorMessage, isPipelineError } from '../errors';
import type { Logger } from '../logger';
import { stemPathsIn } from '../stemLayout';
import {
  SeparationBackend,
  completedResult,
  failedResult,
  secondsSince,
} from './separationBackend';

// ─── Interfaces ──────────────────────────────────────────────────────────

export interface CloudBackendOptions {
  /** Service license key. The backend is unavailable without one */
  apiKey: string;
  /** Service base URL. Defaults to https://www.lalal.ai/api */
  baseUrl?: string;
  /** Fixed interval between status polls in ms. Defaults to 5s */
  pollIntervalMs?: number;
  /** Hard bound on waiting for the remote job in ms. Defaults to 600s */
  timeoutMs?: number;
  /** HTTP timeout for upload and stem downloads in ms. Defaults to 120s */
  transferTimeoutMs?: number;
  /** Injectable clock (for testing) */
  now?: () => number;
  /** Injectable delay (for testing) */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/** Terminal or in-progress state of a remote job */
export interface RemoteJobStatus {
  status: string;
  /** Remote stem name → download URL (present when done) */
  result: Record<string, string>;
  error: string | null;
}

/** Type guard for axios-like errors (works with both real and mocked axios) */
interface AxiosLikeError extends Error {
  isAxiosError: boolean;
  response?: {
    status: number;
    data?: unknown;
  };
}

// ─── Constants ───────────────────────────────────────────────────────────

export const CLOUD_BACKEND_NAME = 'cloud';

/** Extensions the service accepts */
export const CLOUD_ALLOWED_EXTENSIONS: readonly string[] = [
  '.mp3',
  '.wav',
  '.flac',
  '.ogg',
  '.m4a',
  '.aac',
  '.wma',
];

/** Upload size limit (100 MB) */
export const CLOUD_MAX_UPLOAD_BYTES = 100 * 1024 * 1024;

/** Canonical stem → the service's stem name */
export const REMOTE_STEM_NAMES: Record<StemName, string> = {
  vocals: 'vocal',
  drums: 'drum',
  bass: 'bass',
  other: 'other',
};

const DEFAULT_BASE_URL = 'https://www.lalal.ai/api';
const DEFAULT_POLL_INTERVAL = 5000;
const DEFAULT_TIMEOUT = 600 * 1000;
const DEFAULT_TRANSFER_TIMEOUT = 120 * 1000;
const CHECK_TIMEOUT = 30 * 1000;

// ─── Helpers ─────────────────────────────────────────────────────────────

function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return (
    error !== null &&
    typeof error === 'object' &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Checks a file against the service's extension and size limits.
 * @returns An error message, or null if the file can be uploaded
 */
export function validateUpload(filePath: string): string | null {
  const ext = path.extname(filePath).toLowerCase();
  if (!CLOUD_ALLOWED_EXTENSIONS.includes(ext)) {
    return `Unsupported file type: ${ext || '(none)'}`;
  }
  if (!fs.existsSync(filePath)) {
    return 'File does not exist';
  }
  const size = fs.statSync(filePath).size;
  if (size > CLOUD_MAX_UPLOAD_BYTES) {
    return `File too large: ${(size / (1024 * 1024)).toFixed(1)}MB (max 100MB)`;
  }
  return null;
}

/**
 * Normalizes a status response. Anything without a string `status` reads
 * as an error.
 */
export function parseJobStatus(data: unknown): RemoteJobStatus {
  if (!isRecord(data) || typeof data.status !== 'string') {
    return { status: 'error', result: {}, error: 'Invalid status response' };
  }

  const result: Record<string, string> = {};
  if (isRecord(data.result)) {
    for (const [key, value] of Object.entries(data.result)) {
      if (typeof value === 'string') result[key] = value;
    }
  }

  return {
    status: data.status,
    result,
    error: typeof data.error === 'string' ? data.error : null,
  };
}

// ─── CloudBackend Class ──────────────────────────────────────────────────

export class CloudBackend implements SeparationBackend {
  readonly kind: BackendKind = 'remote';
  readonly name = CLOUD_BACKEND_NAME;

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly transferTimeoutMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: Logger;
  private available = false;

  constructor(options: CloudBackendOptions) {
    this.apiKey = options.apiKey.trim();
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.transferTimeoutMs = options.transferTimeoutMs ?? DEFAULT_TRANSFER_TIMEOUT;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
  }

  async initialize(): Promise<void> {
    this.available = this.apiKey.length > 0;
    if (!this.available) {
      this.logger?.info('Cloud backend disabled: no API key configured', { step: 'initializing' });
    }
  }

  isAvailable(): boolean {
    return this.available;
  }

  recommendedParallelism(): number {
    return 1;
  }

  async separate(inputPath: string, outputDir: string): Promise<SeparationResult> {
    const start = this.now();
    const stems: StemPaths = {};

    if (!this.available) {
      return failedResult(this.name, 'Cloud API key not configured', 0);
    }

    const invalid = validateUpload(inputPath);
    if (invalid) {
      return failedResult(this.name, invalid, 0);
    }

    try {
      await fs.promises.mkdir(outputDir, { recursive: true });

      this.logger?.info(`Uploading ${path.basename(inputPath)}`, {
        filePath: inputPath,
        step: 'uploading',
      });
      const jobId = await this.upload(inputPath);
      const status = await this.waitForCompletion(jobId, inputPath);

      if (status.status !== 'done') {
        throw new Error(`Remote processing error: ${status.error ?? 'Unknown'}`);
      }

      const targets = stemPathsIn(outputDir);
      for (const name of STEM_NAMES) {
        const url = status.result[REMOTE_STEM_NAMES[name]];
        if (!url) continue;
        await this.download(url, targets[name]);
        stems[name] = targets[name];
      }

      return completedResult(this.name, stems, secondsSince(start, this.now));
    } catch (error: unknown) {
      if (isPipelineError(error)) {
        this.logger?.logPipelineError(error);
      } else {
        this.logger?.error(`Cloud separation failed: ${errorMessage(error)}`, {
          category: 'SeparationFailure',
          filePath: inputPath,
          step: 'separating',
        });
      }
      return failedResult(this.name, errorMessage(error), secondsSince(start, this.now), stems);
    }
  }

  // ─── HTTP Steps ────────────────────────────────────────────────────

  private authHeaders(): Record<string, string> {
    return { Authorization: `license ${this.apiKey}` };
  }

  /**
   * Uploads the file and returns the remote job id.
   */
  private async upload(inputPath: string): Promise<string> {
    const content = await fs.promises.readFile(inputPath);
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(content)]), path.basename(inputPath));

    let data: unknown;
    try {
      const response = await axios.post<unknown>(`${this.baseUrl}/upload/`, form, {
        headers: this.authHeaders(),
        timeout: this.transferTimeoutMs,
      });
      data = response.data;
    } catch (error: unknown) {
      if (isAxiosLikeError(error) && error.response) {
        throw new Error(`Upload failed with status ${error.response.status}`);
      }
      throw new Error(`Upload request failed: ${errorMessage(error)}`);
    }

    if (!isRecord(data) || typeof data.id !== 'string' || data.id.length === 0) {
      throw new Error('Invalid upload response: missing id');
    }
    return data.id;
  }

  /**
   * One status request. Network errors and 5xx responses read as still
   * processing; 4xx responses read as an error.
   */
  private async checkStatus(jobId: string): Promise<RemoteJobStatus> {
    try {
      const response = await axios.get<unknown>(`${this.baseUrl}/check/`, {
        headers: this.authHeaders(),
        params: { id: jobId },
        timeout: CHECK_TIMEOUT,
      });
      return parseJobStatus(response.data);
    } catch (error: unknown) {
      const status = isAxiosLikeError(error) ? error.response?.status : undefined;
      if (status !== undefined && status >= 400 && status < 500) {
        return { status: 'error', result: {}, error: `Status check failed with status ${status}` };
      }
      this.logger?.warn(`Status check failed, retrying: ${errorMessage(error)}`, {
        step: 'polling',
      });
      return { status: 'pending', result: {}, error: null };
    }
  }

  /**
   * Polls until the job is done or errored.
   * @throws RemoteTimeoutError once timeoutMs has elapsed
   */
  private async waitForCompletion(jobId: string, inputPath: string): Promise<RemoteJobStatus> {
    const start = this.now();

    while (this.now() - start < this.timeoutMs) {
      const status = await this.checkStatus(jobId);
      if (status.status === 'done' || status.status === 'error') {
        return status;
      }
      await this.sleep(this.pollIntervalMs);
    }

    throw new RemoteTimeoutError(
      `Remote job ${jobId} did not finish within ${Math.round(this.timeoutMs / 1000)}s`,
      this.timeoutMs,
      { remoteJobId: jobId, filePath: inputPath },
    );
  }

  private async download(url: string, targetPath: string): Promise<void> {
    const response = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout: this.transferTimeoutMs,
    });
    await fs.promises.writeFile(targetPath, Buffer.from(response.data));
  }
}
