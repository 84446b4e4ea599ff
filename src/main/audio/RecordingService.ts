/**
 * RecordingService - microphone capture through ffmpeg
 *
 * One capture at a time. ffmpeg writes a 16 kHz mono 16-bit WAV file and
 * streams the same audio as raw PCM on stdout, which drives the level meter.
 *
 *   ffmpeg -f <input> -i <device> -ar 16000 -ac 1 -c:a pcm_s16le out.wav
 *                                 -ar 16000 -ac 1 -f s16le pipe:1
 */

import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { EventEmitter } from 'events';
import { mkdir, stat, unlink } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { randomUUID } from 'crypto';
import type { AudioArtifact } from '../../shared/types.js';
import { SAFE_CHILD_ENV } from '../platform/childProcess.js';
import { AudioLevelMeter, decibelsFromRms, pcm16Rms } from './audioUtils.js';
import { createLogger } from '../utils/Logger.js';

const logger = createLogger('Recording');

// ============================================================================
// Types
// ============================================================================

export type RecordingErrorKind = 'permissionDenied' | 'deviceUnavailable' | 'setupFailed' | 'recordingFailed';

export class RecordingError extends Error {
  readonly kind: RecordingErrorKind;

  constructor(kind: RecordingErrorKind, message: string) {
    super(message);
    this.name = 'RecordingError';
    this.kind = kind;
  }
}

/**
 * Display string for anything `startRecording` rejects with.
 */
export function describeRecordingError(error: unknown): string {
  if (error instanceof RecordingError) {
    return error.message;
  }
  return `Could not start recording: ${error instanceof Error ? error.message : String(error)}`;
}

export interface RecordingOptions {
  /** ffmpeg input device; `default` picks the system default */
  device?: string;
  outputDirectory?: string;
  platform?: NodeJS.Platform;
  ffmpegPath?: string;
  /** How long to wait for the first audio before giving up */
  startTimeoutMs?: number;
  /** How long ffmpeg gets to finalise the file after SIGINT */
  stopTimeoutMs?: number;
}

// ============================================================================
// Constants
// ============================================================================

export const SAMPLE_RATE = 16000;
const BYTES_PER_SECOND = SAMPLE_RATE * 2;
const WAV_HEADER_BYTES = 44;
const LEVEL_INTERVAL_MS = 1000 / 60;

/**
 * Input arguments per platform.
 */
export function buildInputArgs(platform: NodeJS.Platform, device: string): string[] {
  switch (platform) {
    case 'darwin':
      // ":device" means audio-only (no video input)
      return ['-f', 'avfoundation', '-i', `:${device}`];
    case 'win32':
      return ['-f', 'dshow', '-i', `audio=${device}`];
    default:
      return ['-f', 'pulse', '-i', device];
  }
}

export function buildFfmpegArgs(platform: NodeJS.Platform, device: string, outputPath: string): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-nostdin',
    '-y',
    ...buildInputArgs(platform, device),
    '-ar', String(SAMPLE_RATE), '-ac', '1', '-c:a', 'pcm_s16le', outputPath,
    '-ar', String(SAMPLE_RATE), '-ac', '1', '-f', 's16le', 'pipe:1',
  ];
}

function classifyStartFailure(stderr: string): RecordingError {
  const lower = stderr.toLowerCase();
  if (lower.includes('permission') || lower.includes('not authorized') || lower.includes('not granted')) {
    return new RecordingError('permissionDenied', 'Microphone access denied. Grant permission in your system privacy settings.');
  }
  const lastLine = stderr.trim().split('\n').pop() ?? '';
  return new RecordingError(
    'deviceUnavailable',
    lastLine ? `Could not open the microphone: ${lastLine}` : 'Could not open the microphone.'
  );
}

// ============================================================================
// RecordingService
// ============================================================================

export class RecordingService extends EventEmitter {
  private readonly options: Required<RecordingOptions>;
  private process: ChildProcess | null = null;
  private outputPath: string | null = null;
  /** Path of the last finished recording, until deleted */
  private artifactPath: string | null = null;
  private pcmBytes = 0;
  private meter = new AudioLevelMeter();
  private lastLevelEmit = 0;

  constructor(options: RecordingOptions = {}) {
    super();
    this.options = {
      device: options.device ?? 'default',
      outputDirectory: options.outputDirectory ?? join(tmpdir(), 'hotmic'),
      platform: options.platform ?? process.platform,
      ffmpegPath: options.ffmpegPath ?? 'ffmpeg',
      startTimeoutMs: options.startTimeoutMs ?? 3000,
      stopTimeoutMs: options.stopTimeoutMs ?? 5000,
    };
  }

  get isRecording(): boolean {
    return this.process !== null;
  }

  get audioLevel(): number {
    return this.meter.current;
  }

  onAudioLevel(callback: (level: number) => void): () => void {
    this.on('level', callback);
    return () => this.off('level', callback);
  }

  /**
   * Capture died after it had started (device unplugged, ffmpeg crashed).
   */
  onInterrupted(callback: (error: RecordingError) => void): () => void {
    this.on('interrupted', callback);
    return () => this.off('interrupted', callback);
  }

  /**
   * Resolves once audio is flowing. Rejects with `RecordingError`.
   */
  async startRecording(): Promise<void> {
    if (this.process) {
      logger.warn('Capture already running, stopping it first');
      await this.stopRecording();
      await this.deleteRecording();
    }

    try {
      await mkdir(this.options.outputDirectory, { recursive: true });
    } catch (error) {
      throw new RecordingError(
        'setupFailed',
        `Could not create recording directory: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const outputPath = join(this.options.outputDirectory, `recording-${randomUUID()}.wav`);
    const args = buildFfmpegArgs(this.options.platform, this.options.device, outputPath);
    logger.info(`Starting capture: device=${this.options.device}, output=${outputPath}`);

    const child = spawn(this.options.ffmpegPath, args, {
      env: SAFE_CHILD_ENV,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    this.process = child;
    this.outputPath = outputPath;
    this.pcmBytes = 0;
    this.meter.reset();

    let stderr = '';
    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf8');
    });

    await new Promise<void>((resolve, reject) => {
      let settled = false;

      const fail = (error: RecordingError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(startTimer);
        this.process = null;
        this.outputPath = null;
        reject(error);
      };

      const startTimer = setTimeout(() => {
        child.kill('SIGKILL');
        fail(new RecordingError('deviceUnavailable', 'No audio received from the microphone.'));
      }, this.options.startTimeoutMs);

      child.once('error', (error: NodeJS.ErrnoException) => {
        fail(
          new RecordingError(
            'setupFailed',
            error.code === 'ENOENT' ? 'ffmpeg not found on PATH. Install ffmpeg to record audio.' : `ffmpeg failed to start: ${error.message}`
          )
        );
      });

      child.once('exit', (code) => {
        if (!settled) {
          fail(classifyStartFailure(stderr));
          return;
        }
        if (this.process === child) {
          logger.error(`Capture process exited unexpectedly (code ${code}): ${stderr.trim()}`);
          this.process = null;
          this.outputPath = null;
          this.artifactPath = outputPath;
          this.emit('interrupted', new RecordingError('recordingFailed', 'Recording stopped unexpectedly.'));
        }
      });

      child.stdout?.on('data', (chunk: Buffer) => {
        this.handlePcm(chunk);
        if (!settled) {
          settled = true;
          clearTimeout(startTimer);
          resolve();
        }
      });
    });
  }

  /**
   * Finalise the file and hand it over. Null when nothing was recorded.
   */
  async stopRecording(): Promise<AudioArtifact | null> {
    const child = this.process;
    const outputPath = this.outputPath;
    this.process = null;
    this.outputPath = null;
    this.meter.reset();
    this.emit('level', 0);

    if (!child || !outputPath) {
      return null;
    }

    await this.terminate(child);

    let size: number;
    try {
      size = (await stat(outputPath)).size;
    } catch {
      logger.warn(`Recording file missing after stop: ${outputPath}`);
      return null;
    }

    this.artifactPath = outputPath;
    if (size <= WAV_HEADER_BYTES) {
      logger.warn('Recording contains no audio');
      await this.deleteRecording();
      return null;
    }

    const durationMs = Math.round((this.pcmBytes / BYTES_PER_SECOND) * 1000);
    logger.info(`Capture stopped: ${outputPath} (${size} bytes, ${durationMs}ms)`);
    return { path: outputPath, sizeBytes: size, durationMs };
  }

  /**
   * Remove a recording (the last one by default). Safe to call when there is none.
   */
  async deleteRecording(path: string | null = this.artifactPath): Promise<void> {
    if (path === this.artifactPath) {
      this.artifactPath = null;
    }
    if (!path) return;

    try {
      await unlink(path);
      logger.debug(`Deleted recording ${path}`);
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT') {
        logger.warn(`Failed to delete recording ${path}:`, error instanceof Error ? error.message : String(error));
      }
    }
  }

  /**
   * Stop without waiting; used by emergency resets.
   */
  abort(): void {
    const child = this.process;
    const outputPath = this.outputPath;
    this.process = null;
    this.outputPath = null;
    this.meter.reset();
    if (child && child.exitCode === null) {
      child.kill('SIGKILL');
    }
    if (outputPath) {
      this.artifactPath = outputPath;
    }
  }

  private terminate(child: ChildProcess): Promise<void> {
    if (child.exitCode !== null || child.signalCode !== null) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const forceKill = setTimeout(() => {
        logger.warn(`Force-killing capture process (${this.options.stopTimeoutMs}ms timeout exceeded)`);
        child.kill('SIGKILL');
      }, this.options.stopTimeoutMs);

      child.once('exit', () => {
        clearTimeout(forceKill);
        resolve();
      });

      // SIGINT lets ffmpeg finalise the WAV header
      child.kill('SIGINT');
    });
  }

  private handlePcm(chunk: Buffer): void {
    this.pcmBytes += chunk.byteLength;
    const level = this.meter.update(decibelsFromRms(pcm16Rms(chunk)));

    const now = Date.now();
    if (now - this.lastLevelEmit >= LEVEL_INTERVAL_MS) {
      this.lastLevelEmit = now;
      this.emit('level', level);
    }
  }
}
