/**
 * Audio decoding for quality scoring.
 *
 * WAV files are decoded with wavefile; anything else is transcoded to a
 * temporary mono WAV with ffmpeg first. Channels are averaged to mono.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { WaveFile } from 'wavefile';
import { runCommand } from './commandRunner';

/** A mono signal with its sample rate */
export interface MonoSignal {
  samples: Float64Array;
  sampleRate: number;
}

export interface DecodeOptions {
  /** ffmpeg executable used for non-WAV input. Defaults to 'ffmpeg' */
  ffmpegPath?: string;
  /** Timeout for the transcode in ms. Defaults to 2 minutes */
  timeoutMs?: number;
}

const DEFAULT_TRANSCODE_TIMEOUT = 2 * 60 * 1000;

function readSampleRate(fmt: object): number {
  if ('sampleRate' in fmt && typeof fmt.sampleRate === 'number' && fmt.sampleRate > 0) {
    return fmt.sampleRate;
  }
  throw new Error('WAV header has no sample rate');
}

function toChannels(block: unknown): Float64Array[] {
  if (block instanceof Float64Array) {
    return [block];
  }
  if (Array.isArray(block)) {
    return block.filter((channel): channel is Float64Array => channel instanceof Float64Array);
  }
  return [];
}

/**
 * Averages channels into one signal.
 */
export function downmixToMono(channels: Float64Array[]): Float64Array {
  if (channels.length === 0) return new Float64Array(0);
  if (channels.length === 1) return channels[0];

  const length = Math.min(...channels.map((channel) => channel.length));
  const mono = new Float64Array(length);
  for (const channel of channels) {
    for (let i = 0; i < length; i++) {
      mono[i] += channel[i];
    }
  }
  for (let i = 0; i < length; i++) {
    mono[i] /= channels.length;
  }
  return mono;
}

/**
 * Decodes WAV bytes into a mono float signal in [-1, 1].
 * @throws Error if the bytes are not a readable WAV file
 */
export function decodeWav(buffer: Uint8Array): MonoSignal {
  const wave = new WaveFile(buffer);
  const sampleRate = readSampleRate(wave.fmt);
  if (wave.bitDepth !== '32f') {
    wave.toBitDepth('32f');
  }

  const block: unknown = wave.getSamples(false, Float64Array);
  const channels = toChannels(block);
  if (channels.length === 0) {
    throw new Error('WAV file has no audio channels');
  }

  return { samples: downmixToMono(channels), sampleRate };
}

/**
 * Loads any audio file as a mono signal.
 * @throws Error if the file cannot be read or decoded
 */
export async function loadMonoSignal(
  filePath: string,
  options?: DecodeOptions,
): Promise<MonoSignal> {
  if (path.extname(filePath).toLowerCase() === '.wav') {
    return decodeWav(await fs.promises.readFile(filePath));
  }

  const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'stem-decode-'));
  const wavPath = path.join(tempDir, 'decoded.wav');
  try {
    await runCommand(
      options?.ffmpegPath ?? 'ffmpeg',
      ['-v', 'error', '-y', '-i', filePath, '-ac', '1', '-f', 'wav', wavPath],
      { timeoutMs: options?.timeoutMs ?? DEFAULT_TRANSCODE_TIMEOUT },
    );
    return decodeWav(await fs.promises.readFile(wavPath));
  } finally {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  }
}

/**
 * Linear-interpolation resampling. Returns the input when the rates match.
 */
export function resampleLinear(
  samples: Float64Array,
  fromRate: number,
  toRate: number,
): Float64Array {
  if (fromRate === toRate || samples.length === 0) {
    return samples;
  }

  const outLength = Math.max(1, Math.round((samples.length * toRate) / fromRate));
  const out = new Float64Array(outLength);
  const step = fromRate / toRate;

  for (let i = 0; i < outLength; i++) {
    const position = i * step;
    const index = Math.floor(position);
    if (index >= samples.length - 1) {
      out[i] = samples[samples.length - 1];
      continue;
    }
    const fraction = position - index;
    out[i] = samples[index] * (1 - fraction) + samples[index + 1] * fraction;
  }

  return out;
}
