/**
 * LocalWhisperProvider - on-device transcription through whisper.cpp
 *
 * Runs the `whisper-cli` executable against a ggml model from the models
 * directory. Every invocation goes through the process-wide serial execution
 * context: the recogniser is never run concurrently.
 *
 * Model resolution order:
 * 1. The model selected in settings, if its file exists
 * 2. The bundled default (`tiny`), if present
 * 3. Any other downloaded `ggml-*.bin`
 *
 * A Silero voice-activity model (`ggml-silero-*.bin`) in the same directory is
 * not a speech model; when present it switches on whisper.cpp's VAD pass.
 */

import { existsSync } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import type { AudioArtifact } from '../../shared/types.js';
import type { SettingsReader } from '../settings/SettingsManager.js';
import { CommandError, runCommand } from '../platform/childProcess.js';
import type { CancellationToken } from './CancellationToken.js';
import { SerialExecutor, whisperExecutionContext } from './SerialExecutor.js';
import { filterTranscriptionOutput } from './TranscriptionOutputFilter.js';
import { TranscriptionCancelledError, TranscriptionError } from './types.js';
import type { TranscriptionProvider } from './types.js';
import { createLogger } from '../utils/Logger.js';

const logger = createLogger('LocalWhisper');

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MODEL_ID = 'tiny';

const MODEL_FILE_PATTERN = /^ggml-(.+)\.bin$/;

const VAD_MODEL_PATTERN = /^ggml-silero-.+\.bin$/;

/** Silero thresholds: speech >= 250ms, gaps >= 100ms, 30ms padding */
const VAD_ARGS = [
  '--vad-threshold', '0.5',
  '--vad-min-speech-duration-ms', '250',
  '--vad-min-silence-duration-ms', '100',
  '--vad-speech-pad-ms', '30',
  '--vad-samples-overlap', '0.1',
];

/** whisper.cpp can take a while on long recordings with larger models */
const WHISPER_TIMEOUT_MS = 5 * 60 * 1000;

export function modelFileName(modelId: string): string {
  return `ggml-${modelId}.bin`;
}

export interface ResolvedModel {
  id: string;
  path: string;
}

export interface WhisperInvocation {
  modelPath: string;
  audioPath: string;
  language: string;
  vadModelPath: string | null;
}

export function buildWhisperArgs({ modelPath, audioPath, language, vadModelPath }: WhisperInvocation): string[] {
  const args = ['-m', modelPath, '-f', audioPath, '-l', language, '-nt', '-np'];
  if (vadModelPath) {
    args.push('--vad', '--vad-model', vadModelPath, ...VAD_ARGS);
  }
  return args;
}

// ============================================================================
// LocalWhisperProvider
// ============================================================================

export class LocalWhisperProvider implements TranscriptionProvider {
  readonly mode = 'local' as const;
  private readonly settings: SettingsReader;
  private readonly executor: SerialExecutor;

  constructor(settings: SettingsReader, executor: SerialExecutor = whisperExecutionContext) {
    this.settings = settings;
    this.executor = executor;
  }

  /**
   * Model ids with a file present in the models directory, sorted.
   */
  async listDownloadedModels(): Promise<string[]> {
    const ids: string[] = [];
    for (const entry of await this.readModelsDirectory()) {
      const match = MODEL_FILE_PATTERN.exec(entry);
      if (match && !VAD_MODEL_PATTERN.test(entry)) {
        ids.push(match[1]);
      }
    }
    return ids.sort();
  }

  /**
   * Path of the newest-named Silero VAD model, or null to run without VAD.
   */
  async resolveVadModel(): Promise<string | null> {
    const candidates = (await this.readModelsDirectory()).filter((entry) => VAD_MODEL_PATTERN.test(entry)).sort();
    const latest = candidates.pop();
    return latest ? join(this.settings.getModelsDirectory(), latest) : null;
  }

  async resolveModel(): Promise<ResolvedModel | null> {
    const directory = this.settings.getModelsDirectory();
    const downloaded = await this.listDownloadedModels();

    const candidates: string[] = [];
    const selected = this.settings.get('selectedModel');
    if (selected) {
      candidates.push(selected);
    }
    candidates.push(DEFAULT_MODEL_ID, ...downloaded);

    for (const id of candidates) {
      if (downloaded.includes(id)) {
        if (selected && id !== selected) {
          logger.warn(`Selected model "${selected}" not found, falling back to "${id}"`);
        }
        return { id, path: join(directory, modelFileName(id)) };
      }
    }
    return null;
  }

  async validateConfiguration(): Promise<string | null> {
    const downloaded = await this.listDownloadedModels();
    if (downloaded.length === 0) {
      return `No speech model installed. Download a ggml model into ${this.settings.getModelsDirectory()}.`;
    }
    return null;
  }

  private async readModelsDirectory(): Promise<string[]> {
    const directory = this.settings.getModelsDirectory();
    if (!existsSync(directory)) {
      return [];
    }
    return readdir(directory);
  }

  async transcribe(artifact: AudioArtifact, token: CancellationToken): Promise<string> {
    return this.executor.run(async () => {
      if (token.isCancelled) {
        throw new TranscriptionCancelledError();
      }

      const model = await this.resolveModel();
      if (!model) {
        throw new TranscriptionError({ kind: 'noModelAvailable' });
      }

      await assertReadableAudio(artifact.path);

      const language = this.settings.get('language').trim() || 'auto';
      const binary = this.settings.get('whisperBinary');
      const vadModelPath = await this.resolveVadModel();
      const startTime = Date.now();
      logger.info(
        `Transcribing ${artifact.path} with model ${model.id} (language: ${language}, vad: ${vadModelPath ? 'on' : 'off'})`
      );

      const abort = new AbortController();
      const unsubscribe = token.onCancel(() => abort.abort());
      let stdout: Buffer;
      try {
        ({ stdout } = await runCommand(
          binary,
          buildWhisperArgs({ modelPath: model.path, audioPath: artifact.path, language, vadModelPath }),
          { timeoutMs: WHISPER_TIMEOUT_MS, signal: abort.signal }
        ));
      } catch (error) {
        if (token.isCancelled) {
          throw new TranscriptionCancelledError();
        }
        throw mapWhisperError(binary, error);
      } finally {
        unsubscribe();
      }

      const text = filterTranscriptionOutput(stdout.toString('utf8'));
      logger.info(`Transcription finished in ${Date.now() - startTime}ms (${text.length} chars)`);
      return text;
    });
  }
}

// ============================================================================
// Helpers
// ============================================================================

async function assertReadableAudio(path: string): Promise<void> {
  let size: number;
  try {
    size = (await stat(path)).size;
  } catch {
    throw new TranscriptionError({ kind: 'audioUnreadable', detail: 'file not found' });
  }
  if (size === 0) {
    throw new TranscriptionError({ kind: 'audioUnreadable', detail: 'file is empty' });
  }
}

function mapWhisperError(binary: string, error: unknown): TranscriptionError {
  if (error instanceof CommandError) {
    if (error.notFound) {
      return new TranscriptionError({ kind: 'modelLoadFailed', detail: `${binary} not found on PATH` });
    }
    if (/failed to (load|initialize) (the )?model/i.test(error.stderr)) {
      return new TranscriptionError({ kind: 'modelLoadFailed', detail: error.stderr.trim().split('\n').pop() ?? error.message });
    }
    if (/failed to (read|open) (the )?(audio|wav|input)/i.test(error.stderr)) {
      return new TranscriptionError({ kind: 'audioUnreadable', detail: 'the recogniser could not decode it' });
    }
    return new TranscriptionError({ kind: 'backendRejected', message: error.message });
  }
  return new TranscriptionError({
    kind: 'backendRejected',
    message: error instanceof Error ? error.message : String(error),
  });
}
