/**
 * Transcription types
 *
 * Providers throw `TranscriptionError`; the coordinator turns every outcome
 * into a `TranscriptionOutcome` so nothing unstructured reaches the session.
 */

import type { AudioArtifact, TranscriptionMode } from '../../shared/types.js';
import type { CancellationToken } from './CancellationToken.js';

// ============================================================================
// Failures
// ============================================================================

export type TranscriptionFailure =
  | { kind: 'noModelAvailable' }
  | { kind: 'modelLoadFailed'; detail: string }
  | { kind: 'audioUnreadable'; detail: string }
  | { kind: 'networkError'; detail: string }
  | { kind: 'backendRejected'; message: string }
  | { kind: 'noTextReturned' }
  | { kind: 'credentialMissing' }
  | { kind: 'busy' };

export type TranscriptionOutcome =
  | { status: 'completed'; text: string }
  | { status: 'failed'; failure: TranscriptionFailure }
  | { status: 'cancelled' };

export class TranscriptionError extends Error {
  readonly failure: TranscriptionFailure;

  constructor(failure: TranscriptionFailure) {
    super(describeTranscriptionFailure(failure));
    this.name = 'TranscriptionError';
    this.failure = failure;
  }
}

/**
 * Thrown by a provider that observed cancellation at a checkpoint.
 */
export class TranscriptionCancelledError extends Error {
  constructor() {
    super('Transcription cancelled');
    this.name = 'TranscriptionCancelledError';
  }
}

/**
 * Display string for the session's error state.
 */
export function describeTranscriptionFailure(failure: TranscriptionFailure): string {
  switch (failure.kind) {
    case 'noModelAvailable':
      return 'No speech model installed.';
    case 'modelLoadFailed':
      return `Could not load the speech model: ${failure.detail}`;
    case 'audioUnreadable':
      return `The recording could not be read: ${failure.detail}`;
    case 'networkError':
      return `Couldn't connect: ${failure.detail}`;
    case 'backendRejected':
      return failure.message;
    case 'noTextReturned':
      return "The server didn't return any text.";
    case 'credentialMissing':
      return 'No API key. Add one with `hotmic config set cloudApiKey <key>`.';
    case 'busy':
      return 'A transcription is already running for this session.';
  }
}

// ============================================================================
// Providers
// ============================================================================

export interface TranscriptionProvider {
  readonly mode: TranscriptionMode;
  /**
   * Resolves with the cleaned text (possibly empty). Rejects with
   * `TranscriptionError` or `TranscriptionCancelledError`.
   */
  transcribe(artifact: AudioArtifact, token: CancellationToken): Promise<string>;
  /** Human-readable reason the provider cannot run, or null when ready. */
  validateConfiguration(): Promise<string | null>;
}

export interface TranscriptionRequest {
  sessionId: string;
  artifact: AudioArtifact;
  token: CancellationToken;
  /** Overrides `transcriptionMode` for this request only */
  mode?: TranscriptionMode;
}
