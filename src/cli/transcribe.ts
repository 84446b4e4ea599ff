/**
 * `hotmic transcribe` - one-shot transcription of an existing audio file.
 */

import { randomUUID } from 'crypto';
import { stat } from 'fs/promises';
import { extname } from 'path';
import type { AudioArtifact, TranscriptionMode } from '../shared/types.js';
import { CancellationToken } from '../main/transcription/CancellationToken.js';
import type { TranscriptionCoordinator } from '../main/transcription/TranscriptionCoordinator.js';
import { describeTranscriptionFailure } from '../main/transcription/types.js';
import type { TranscriptionFailure } from '../main/transcription/types.js';
import { HotmicCliError } from './errors.js';

const PCM_BYTES_PER_SECOND = 16000 * 2;
const WAV_HEADER_BYTES = 44;

export type TranscribeResult = { status: 'completed'; text: string } | { status: 'cancelled' };

/**
 * Missing models, keys and unreadable input are the user's to fix; the rest
 * is the backend's fault.
 */
export function severityForFailure(failure: TranscriptionFailure): 'user' | 'system' {
  switch (failure.kind) {
    case 'noModelAvailable':
    case 'credentialMissing':
    case 'audioUnreadable':
      return 'user';
    default:
      return 'system';
  }
}

/**
 * Duration from the file size, assuming 16 kHz mono 16-bit PCM. Only WAV
 * files get an estimate; other formats report 0.
 */
export function estimateDurationMs(path: string, sizeBytes: number): number {
  if (extname(path).toLowerCase() !== '.wav' || sizeBytes <= WAV_HEADER_BYTES) {
    return 0;
  }
  return Math.round(((sizeBytes - WAV_HEADER_BYTES) / PCM_BYTES_PER_SECOND) * 1000);
}

export async function loadArtifact(path: string): Promise<AudioArtifact> {
  let sizeBytes: number;
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new HotmicCliError(`Not a file: ${path}`, 'user');
    }
    sizeBytes = info.size;
  } catch (error) {
    if (error instanceof HotmicCliError) throw error;
    throw new HotmicCliError(`Audio file not found: ${path}`, 'user');
  }
  return { path, sizeBytes, durationMs: estimateDurationMs(path, sizeBytes) };
}

export async function transcribeFile(
  coordinator: Pick<TranscriptionCoordinator, 'transcribe'>,
  path: string,
  options: { mode?: TranscriptionMode; token?: CancellationToken } = {}
): Promise<TranscribeResult> {
  const artifact = await loadArtifact(path);
  const outcome = await coordinator.transcribe({
    sessionId: randomUUID(),
    artifact,
    token: options.token ?? new CancellationToken(),
    mode: options.mode,
  });

  switch (outcome.status) {
    case 'cancelled':
      return outcome;
    case 'failed':
      throw new HotmicCliError(describeTranscriptionFailure(outcome.failure), severityForFailure(outcome.failure));
    case 'completed':
      if (outcome.text.trim().length === 0) {
        throw new HotmicCliError('No speech detected in the recording.', 'user');
      }
      return { status: 'completed', text: outcome.text.trim() };
  }
}
