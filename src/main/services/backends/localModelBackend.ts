/**
 * Local model backend.
 *
 * Drives the demucs command line on this machine:
 *   demucs -n <model> -o <work> --filename {stem}.{ext} [-d <device>] <input>
 *
 * The command writes into a scratch folder inside the track's output folder;
 * the four stems are then moved into place and the scratch folder removed.
 */

import * as fs from 'fs';
import * as path from 'path';
import { BackendKind, STEM_NAMES, SeparationResult, StemPaths } from '../../../shared/types';
import { CommandError, runCommand } from '../../utils/commandRunner';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import { stemPathsIn } from '../stemLayout';
import {
  SeparationBackend,
  completedResult,
  failedResult,
  secondsSince,
} from './separationBackend';

// ─── Interfaces ──────────────────────────────────────────────────────────

export type LocalDevice = 'auto' | 'cuda' | 'cpu';

export interface LocalModelBackendOptions {
  /** Separation executable. Defaults to 'demucs' */
  command?: string;
  /** Model name. Defaults to 'htdemucs' */
  model?: string;
  /** Accelerator. 'auto' uses CUDA when nvidia-smi reports a GPU */
  device?: LocalDevice;
  /** Upper bound for one separation run in ms. Defaults to 30 minutes */
  timeoutMs?: number;
  /** GPU query executable. Defaults to 'nvidia-smi' */
  gpuQueryCommand?: string;
  logger?: Logger;
}

// ─── Constants ───────────────────────────────────────────────────────────

export const WORK_DIR_NAME = '.separation-work';

const DEFAULT_COMMAND = 'demucs';
const DEFAULT_MODEL = 'htdemucs';
const DEFAULT_TIMEOUT = 30 * 60 * 1000;
const PROBE_TIMEOUT = 60 * 1000;

// ─── Helpers ─────────────────────────────────────────────────────────────

/**
 * Parallelism hint from accelerator memory: >=16GB → 4, >=12GB → 2, else 1.
 */
export function parallelismForMemory(memoryGb: number | null): number {
  if (memoryGb === null) return 1;
  if (memoryGb >= 16) return 4;
  if (memoryGb >= 12) return 2;
  return 1;
}

/**
 * Parses `nvidia-smi --query-gpu=memory.total --format=csv,noheader,nounits`
 * output (MiB per line) into GB for the first GPU.
 */
export function parseGpuMemoryGb(stdout: string): number | null {
  const firstLine = stdout.trim().split(/\r?\n/)[0] ?? '';
  const mib = Number.parseFloat(firstLine);
  if (!Number.isFinite(mib) || mib <= 0) return null;
  return mib / 1024;
}

/**
 * Finds `<stem>.wav` files anywhere below the scratch folder.
 */
async function collectStemFiles(workDir: string, found: StemPaths = {}): Promise<StemPaths> {
  const entries = await fs.promises.readdir(workDir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(workDir, entry.name);
    if (entry.isDirectory()) {
      await collectStemFiles(fullPath, found);
      continue;
    }
    const stem = STEM_NAMES.find((name) => entry.name === `${name}.wav`);
    if (stem && !found[stem]) {
      found[stem] = fullPath;
    }
  }

  return found;
}

// ─── LocalModelBackend Class ─────────────────────────────────────────────

export class LocalModelBackend implements SeparationBackend {
  readonly kind: BackendKind = 'local';
  readonly name: string;

  private readonly command: string;
  private readonly model: string;
  private readonly device: LocalDevice;
  private readonly timeoutMs: number;
  private readonly gpuQueryCommand: string;
  private readonly logger?: Logger;

  private available = false;
  private gpuMemoryGb: number | null = null;

  constructor(options?: LocalModelBackendOptions) {
    this.command = options?.command ?? DEFAULT_COMMAND;
    this.model = options?.model ?? DEFAULT_MODEL;
    this.device = options?.device ?? 'auto';
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT;
    this.gpuQueryCommand = options?.gpuQueryCommand ?? 'nvidia-smi';
    this.logger = options?.logger;
    this.name = `demucs_${this.model}`;
  }

  /**
   * Probes the separation command and, unless forced to CPU, the GPU.
   */
  async initialize(): Promise<void> {
    try {
      await runCommand(this.command, ['--help'], { timeoutMs: PROBE_TIMEOUT });
      this.available = true;
    } catch (error: unknown) {
      this.available = false;
      const reason =
        error instanceof CommandError && error.notFound
          ? `"${this.command}" is not installed`
          : errorMessage(error);
      this.logger?.warn(`Local backend unavailable: ${reason}`, {
        category: 'EngineUnavailable',
        step: 'initializing',
      });
      return;
    }

    if (this.device === 'cpu') {
      this.gpuMemoryGb = null;
      return;
    }

    try {
      const { stdout } = await runCommand(
        this.gpuQueryCommand,
        ['--query-gpu=memory.total', '--format=csv,noheader,nounits'],
        { timeoutMs: PROBE_TIMEOUT },
      );
      this.gpuMemoryGb = parseGpuMemoryGb(stdout);
    } catch (error: unknown) {
      this.gpuMemoryGb = null;
      this.logger?.info(`No GPU detected, running on CPU: ${errorMessage(error)}`, {
        step: 'initializing',
      });
    }
  }

  isAvailable(): boolean {
    return this.available;
  }

  recommendedParallelism(): number {
    if (this.device === 'cpu') return 1;
    return parallelismForMemory(this.gpuMemoryGb);
  }

  /** Device passed to the command, or null to let it choose */
  resolvedDevice(): 'cuda' | 'cpu' | null {
    if (this.device !== 'auto') return this.device;
    return this.gpuMemoryGb !== null ? 'cuda' : null;
  }

  /** Command-line arguments for one run */
  buildArgs(inputPath: string, workDir: string): string[] {
    const args = ['-n', this.model, '-o', workDir, '--filename', '{stem}.{ext}'];
    const device = this.resolvedDevice();
    if (device) {
      args.push('-d', device);
    }
    args.push(inputPath);
    return args;
  }

  async separate(inputPath: string, outputDir: string): Promise<SeparationResult> {
    const start = Date.now();

    if (!this.available) {
      return failedResult(this.name, `${this.name} is not available`, 0);
    }

    const workDir = path.join(outputDir, WORK_DIR_NAME);
    const stems: StemPaths = {};

    try {
      await fs.promises.rm(workDir, { recursive: true, force: true });
      await fs.promises.mkdir(workDir, { recursive: true });

      await runCommand(this.command, this.buildArgs(inputPath, workDir), {
        timeoutMs: this.timeoutMs,
      });

      const produced = await collectStemFiles(workDir);
      const targets = stemPathsIn(outputDir);
      for (const name of STEM_NAMES) {
        const source = produced[name];
        if (!source) continue;
        await fs.promises.rename(source, targets[name]);
        stems[name] = targets[name];
      }

      return completedResult(this.name, stems, secondsSince(start));
    } catch (error: unknown) {
      this.logger?.error(`Local separation failed: ${errorMessage(error)}`, {
        category: 'SeparationFailure',
        filePath: inputPath,
        step: 'separating',
      });
      return failedResult(this.name, errorMessage(error), secondsSince(start), stems);
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }
}
