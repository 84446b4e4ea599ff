/**
 * CloudTranscriptionProvider - OpenAI-compatible transcription endpoint
 *
 * Works with OpenAI (default), Groq, Azure OpenAI, or any server exposing
 * `POST .../audio/transcriptions` with a multipart upload.
 */

import { readFile, stat } from 'fs/promises';
import { basename, extname } from 'path';
import { z } from 'zod';
import type { AudioArtifact } from '../../shared/types.js';
import type { SettingsReader } from '../settings/SettingsManager.js';
import type { CancellationToken } from './CancellationToken.js';
import { cleanTranscriptionText } from './TranscriptionOutputFilter.js';
import { TranscriptionCancelledError, TranscriptionError } from './types.js';
import type { TranscriptionProvider } from './types.js';
import { createLogger } from '../utils/Logger.js';

const logger = createLogger('CloudTranscription');

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_TRANSCRIPTION_ENDPOINT = 'https://api.openai.com/v1/audio/transcriptions';
export const DEFAULT_CLOUD_MODEL = 'whisper-1';

const MIME_TYPES: Record<string, string> = {
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.mp4': 'audio/mp4',
  '.webm': 'audio/webm',
  '.flac': 'audio/flac',
  '.ogg': 'audio/ogg',
};

const transcriptionResponseSchema = z.object({ text: z.string() });

const apiErrorSchema = z.object({
  error: z.object({ message: z.string() }),
});

// ============================================================================
// Helpers
// ============================================================================

/**
 * A configured URL containing `audio/transcriptions` is a full endpoint
 * (Azure deployments carry it plus a query string); anything else is a base URL.
 */
export function resolveTranscriptionEndpoint(baseURL: string): string {
  const custom = baseURL.trim();
  if (custom.length === 0) {
    return DEFAULT_TRANSCRIPTION_ENDPOINT;
  }
  if (custom.includes('audio/transcriptions')) {
    return custom;
  }
  const base = custom.endsWith('/') ? custom.slice(0, -1) : custom;
  return `${base}/audio/transcriptions`;
}

export function isAzureEndpoint(baseURL: string): boolean {
  return baseURL.includes('.openai.azure.com');
}

export function mimeTypeForFile(fileName: string): string {
  return MIME_TYPES[extname(fileName).toLowerCase()] ?? 'audio/wav';
}

/**
 * OpenAI error message if the body has one, else the start of the raw body.
 */
export function parseApiErrorMessage(body: string): string {
  const parsed = apiErrorSchema.safeParse(tryParseJson(body));
  if (parsed.success) {
    return parsed.data.error.message;
  }
  const trimmed = body.trim();
  return trimmed.length > 0 ? trimmed.slice(0, 200) : 'Unknown error';
}

function tryParseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function requestTimeoutMs(durationMs: number): number {
  return Math.min(180_000, Math.max(30_000, Math.round(durationMs * 1.8)));
}

// ============================================================================
// CloudTranscriptionProvider
// ============================================================================

export class CloudTranscriptionProvider implements TranscriptionProvider {
  readonly mode = 'cloud' as const;
  private readonly settings: SettingsReader;

  constructor(settings: SettingsReader) {
    this.settings = settings;
  }

  async validateConfiguration(): Promise<string | null> {
    if (!this.settings.getApiKey()) {
      return 'Add your API key with `hotmic config set cloudApiKey <key>` or set HOTMIC_API_KEY.';
    }
    return null;
  }

  async transcribe(artifact: AudioArtifact, token: CancellationToken): Promise<string> {
    if (token.isCancelled) {
      throw new TranscriptionCancelledError();
    }

    const apiKey = this.settings.getApiKey();
    if (!apiKey) {
      logger.error('API key is missing');
      throw new TranscriptionError({ kind: 'credentialMissing' });
    }

    const audio = await readAudio(artifact.path);
    const baseURL = this.settings.get('cloudBaseURL');
    const endpoint = resolveTranscriptionEndpoint(baseURL);
    const model = this.settings.get('cloudModel').trim() || DEFAULT_CLOUD_MODEL;
    const language = this.settings.get('language').trim();
    const fileName = basename(artifact.path);

    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(audio)], { type: mimeTypeForFile(fileName) }), fileName);
    form.append('model', model);
    form.append('response_format', 'json');
    form.append('temperature', String(this.settings.get('cloudTemperature')));
    if (language.length > 0) {
      form.append('language', language);
    }

    const headers: Record<string, string> = isAzureEndpoint(baseURL)
      ? { 'api-key': apiKey }
      : { Authorization: `Bearer ${apiKey}` };

    let host: string;
    try {
      host = new URL(endpoint).host;
    } catch {
      throw new TranscriptionError({ kind: 'backendRejected', message: "The server address isn't valid." });
    }

    logger.info(`Uploading ${fileName} (${audio.byteLength} bytes) to ${host} with model ${model}`);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), requestTimeoutMs(artifact.durationMs));
    const unsubscribe = token.onCancel(() => controller.abort());

    let status: number;
    let ok: boolean;
    let body: string;
    try {
      const response = await fetch(endpoint, {
        method: 'POST',
        headers,
        body: form,
        signal: controller.signal,
      });
      status = response.status;
      ok = response.ok;
      body = await response.text();
    } catch (error) {
      if (token.isCancelled) {
        throw new TranscriptionCancelledError();
      }
      const detail = controller.signal.aborted
        ? 'the request timed out'
        : error instanceof Error
          ? error.message
          : String(error);
      logger.error('Network request failed:', detail);
      throw new TranscriptionError({ kind: 'networkError', detail });
    } finally {
      clearTimeout(timeout);
      unsubscribe();
    }

    if (!ok) {
      const message = parseApiErrorMessage(body);
      logger.error(`API request failed with status ${status}: ${message}`);
      throw new TranscriptionError({ kind: 'backendRejected', message: `Server error (${status}): ${message}` });
    }

    const parsed = transcriptionResponseSchema.safeParse(tryParseJson(body));
    if (!parsed.success) {
      logger.error('Failed to decode response');
      logger.debug('Raw response:', body.slice(0, 500));
      throw new TranscriptionError({
        kind: 'backendRejected',
        message: 'Received an unexpected response from the server.',
      });
    }

    const text = parsed.data.text;
    if (text.trim().length === 0) {
      logger.warn('API returned empty transcription');
      throw new TranscriptionError({ kind: 'noTextReturned' });
    }

    return cleanTranscriptionText(text);
  }
}

async function readAudio(path: string): Promise<Buffer> {
  let size: number;
  try {
    size = (await stat(path)).size;
  } catch {
    throw new TranscriptionError({ kind: 'audioUnreadable', detail: 'file not found' });
  }
  if (size === 0) {
    throw new TranscriptionError({ kind: 'audioUnreadable', detail: 'file is empty' });
  }
  try {
    return await readFile(path);
  } catch (error) {
    throw new TranscriptionError({
      kind: 'audioUnreadable',
      detail: error instanceof Error ? error.message : String(error),
    });
  }
}
