/**
 * Transcription Module
 *
 * Two backends behind one coordinator:
 * - local: whisper.cpp on this machine (default, no account needed)
 * - cloud: any OpenAI-compatible transcription endpoint
 */

export { TranscriptionCoordinator } from './TranscriptionCoordinator.js';
export { LocalWhisperProvider, DEFAULT_MODEL_ID, modelFileName } from './LocalWhisperProvider.js';
export {
  CloudTranscriptionProvider,
  DEFAULT_TRANSCRIPTION_ENDPOINT,
  DEFAULT_CLOUD_MODEL,
  resolveTranscriptionEndpoint,
} from './CloudTranscriptionProvider.js';
export { CancellationToken } from './CancellationToken.js';
export { SerialExecutor, whisperExecutionContext } from './SerialExecutor.js';
export { filterTranscriptionOutput, cleanTranscriptionText } from './TranscriptionOutputFilter.js';
export {
  TranscriptionError,
  TranscriptionCancelledError,
  describeTranscriptionFailure,
} from './types.js';
export type {
  TranscriptionFailure,
  TranscriptionOutcome,
  TranscriptionProvider,
  TranscriptionRequest,
} from './types.js';
