/**
 * Shared types for hotmic
 *
 * Session states and events, insertion results, and the persisted settings
 * shape. Everything here is plain data so it can cross module boundaries
 * without pulling in runtime dependencies.
 */

// =============================================================================
// Session State
// =============================================================================

/**
 * The single authoritative dictation session state.
 * `error` carries a human-readable message for the presentation layer.
 */
export type DictationState =
  | { kind: 'idle' }
  | { kind: 'recording' }
  | { kind: 'processing' }
  | { kind: 'success' }
  | { kind: 'copiedToClipboard' }
  | { kind: 'error'; message: string }
  | { kind: 'empty' }
  | { kind: 'cancelled' };

export type DictationStateKind = DictationState['kind'];

export function describeState(state: DictationState): string {
  return state.kind === 'error' ? `error(${state.message})` : state.kind;
}

// =============================================================================
// Session Events
// =============================================================================

export type DictationEvent =
  | { type: 'hotkeyPressed' }
  | { type: 'stopRecording' }
  | { type: 'transcriptionStarted' }
  | { type: 'transcriptionCompleted'; text: string }
  | { type: 'transcriptionFailed'; reason: string }
  | { type: 'escapePressed' }
  | { type: 'dismissCompleted' }
  | { type: 'forceReset' };

export type DictationEventType = DictationEvent['type'];

// =============================================================================
// Insertion
// =============================================================================

/**
 * Outcome of delivering text to the focused application.
 * - inserted: pasted, and the user's clipboard restored (or deliberately left
 *   alone because something else overwrote it during the paste)
 * - copiedToClipboardOnly: synthetic input unavailable, text left on the clipboard
 * - failed: nothing delivered
 */
export type InsertionResult = 'inserted' | 'copiedToClipboardOnly' | 'failed';

// =============================================================================
// Audio
// =============================================================================

/**
 * A finished recording on disk. Owned by the session that produced it and
 * deleted once transcription finishes or the session is abandoned.
 */
export interface AudioArtifact {
  path: string;
  sizeBytes: number;
  durationMs: number;
}

// =============================================================================
// Settings
// =============================================================================

export type TranscriptionMode = 'local' | 'cloud';

export interface AppSettings {
  transcriptionMode: TranscriptionMode;
  /** ISO-639-1 code; empty string means auto-detect */
  language: string;
  /** Empty means the OpenAI default endpoint */
  cloudBaseURL: string;
  /** Empty means whisper-1 */
  cloudModel: string;
  cloudTemperature: number;
  cloudApiKey: string;
  selectedModel: string | null;
  /** Empty means ~/.hotmic/models */
  modelsDirectory: string;
  whisperBinary: string;
  audioDevice: string;
  hasLaunchedBefore: boolean;
  debugMode: boolean;
}
