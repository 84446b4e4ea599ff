/**
 * DictationStateMachine - single source of truth for the dictation session
 *
 * State flow:
 *   IDLE -> RECORDING -> PROCESSING -> SUCCESS | COPIED | EMPTY | ERROR -> IDLE
 *                    \-> CANCELLED -> IDLE
 *
 * Events are processed one at a time, in arrival order. A transition and its
 * side effects (including awaiting text insertion) finish before the next
 * event is looked at. `forceReset` is the exception: it snaps to idle at once,
 * calls no collaborator, and invalidates whatever transition is in flight.
 */

import { EventEmitter } from 'events';
import type {
  DictationEvent,
  DictationEventType,
  DictationState,
  DictationStateKind,
  InsertionResult,
} from '../shared/types.js';
import { describeState } from '../shared/types.js';
import { createLogger } from './utils/Logger.js';

const logger = createLogger('StateMachine');

// ============================================================================
// Collaborator contract
// ============================================================================

/**
 * Side effects the state machine asks for. Implemented by the process owner.
 */
export interface DictationCollaborator {
  onShowPanel(): void;
  /** Called after a result is reached so the panel can play its dismiss sequence */
  onHidePanel(state: DictationState): void;
  onStartRecording(): void;
  /** Stop capture and hand the artifact to transcription */
  onStopRecording(): void;
  /** Cancel transcription, stop and delete the recording, hide the panel */
  onCancel(): void;
  onInsertText(text: string): Promise<InsertionResult>;
}

// ============================================================================
// Transition table
// ============================================================================

/**
 * Events each state reacts to. Every other (state, event) pair is ignored.
 * `forceReset` is accepted everywhere and handled outside this table.
 */
export const ACCEPTED_EVENTS: Record<DictationStateKind, readonly DictationEventType[]> = {
  idle: ['hotkeyPressed'],
  recording: ['hotkeyPressed', 'stopRecording', 'transcriptionStarted', 'transcriptionCompleted', 'transcriptionFailed', 'escapePressed'],
  processing: ['transcriptionCompleted', 'transcriptionFailed', 'escapePressed'],
  success: ['dismissCompleted'],
  copiedToClipboard: ['dismissCompleted'],
  error: ['dismissCompleted'],
  empty: ['dismissCompleted'],
  cancelled: ['dismissCompleted'],
};

export const INSERTION_FAILED_MESSAGE = 'Insertion failed';

export function mapInsertionResult(result: InsertionResult): DictationState {
  switch (result) {
    case 'inserted':
      return { kind: 'success' };
    case 'copiedToClipboardOnly':
      return { kind: 'copiedToClipboard' };
    case 'failed':
      return { kind: 'error', message: INSERTION_FAILED_MESSAGE };
  }
}

// ============================================================================
// DictationStateMachine
// ============================================================================

export class DictationStateMachine extends EventEmitter {
  private state: DictationState = { kind: 'idle' };
  private collaborator: DictationCollaborator;
  private mockMode = false;
  private queue: Promise<void> = Promise.resolve();
  /** Bumped by forceReset; transitions started under an older epoch are dropped */
  private epoch = 0;

  constructor(collaborator: DictationCollaborator) {
    super();
    this.collaborator = collaborator;
  }

  getState(): DictationState {
    return this.state;
  }

  isMockMode(): boolean {
    return this.mockMode;
  }

  /**
   * Drive UI states without recording or transcription. Cleared on return to idle.
   */
  setMockMode(enabled: boolean): void {
    this.mockMode = enabled;
    logger.info(`Mock mode ${enabled ? 'enabled' : 'disabled'}`);
  }

  onStateChange(callback: (state: DictationState, previous: DictationState) => void): () => void {
    this.on('stateChange', callback);
    return () => this.off('stateChange', callback);
  }

  /**
   * Queue an event. Resolves once it has been fully processed.
   */
  send(event: DictationEvent): Promise<void> {
    if (event.type === 'forceReset') {
      this.forceReset();
      return Promise.resolve();
    }

    const run = this.queue.then(() => this.process(event));
    this.queue = run.catch((error: unknown) => {
      logger.error(`Event ${event.type} failed:`, error instanceof Error ? error.message : String(error));
    });
    return run;
  }

  /**
   * Emergency return to idle for system-level interruptions. Never waits and
   * never calls a collaborator; the caller owns resource cleanup.
   */
  forceReset(): void {
    const previous = this.state;
    this.epoch++;
    this.mockMode = false;
    logger.warn(`Emergency reset from ${describeState(previous)}`);
    this.setState({ kind: 'idle' });
  }

  // ==========================================================================
  // Event processing
  // ==========================================================================

  private async process(event: DictationEvent): Promise<void> {
    const from = this.state;
    if (!ACCEPTED_EVENTS[from.kind].includes(event.type)) {
      logger.debug(`Ignoring ${event.type} in ${describeState(from)}`);
      return;
    }

    switch (event.type) {
      case 'hotkeyPressed':
        if (from.kind === 'idle') {
          this.setState({ kind: 'recording' });
          this.collaborator.onShowPanel();
          if (!this.mockMode) {
            this.collaborator.onStartRecording();
          }
        } else {
          this.stopRecording();
        }
        return;

      case 'stopRecording':
        this.stopRecording();
        return;

      case 'transcriptionStarted':
        this.setState({ kind: 'processing' });
        return;

      case 'transcriptionCompleted':
        await this.handleResult(event.text);
        return;

      case 'transcriptionFailed':
        this.finish({ kind: 'error', message: event.reason });
        return;

      case 'escapePressed':
        this.setState({ kind: 'cancelled' });
        if (!this.mockMode) {
          this.collaborator.onCancel();
        }
        return;

      case 'dismissCompleted':
        this.mockMode = false;
        this.setState({ kind: 'idle' });
        return;

      case 'forceReset':
        this.forceReset();
        return;
    }
  }

  private stopRecording(): void {
    // State stays `recording` until transcription actually starts
    if (!this.mockMode) {
      this.collaborator.onStopRecording();
    }
  }

  private async handleResult(text: string): Promise<void> {
    const trimmed = text.trim();
    if (trimmed.length === 0) {
      this.finish({ kind: 'empty' });
      return;
    }

    if (this.mockMode) {
      this.finish({ kind: 'success' });
      return;
    }

    const epoch = this.epoch;
    let result: InsertionResult;
    try {
      result = await this.collaborator.onInsertText(trimmed);
    } catch (error) {
      logger.error('Text insertion threw:', error instanceof Error ? error.message : String(error));
      result = 'failed';
    }

    if (epoch !== this.epoch) {
      logger.info(`Discarding insertion result (${result}) after reset`);
      return;
    }
    this.finish(mapInsertionResult(result));
  }

  private finish(state: DictationState): void {
    this.setState(state);
    this.collaborator.onHidePanel(state);
  }

  private setState(next: DictationState): void {
    const previous = this.state;
    this.state = next;
    if (next.kind === 'idle') {
      this.mockMode = false;
    }
    logger.info(`${describeState(previous)} -> ${describeState(next)}`);
    this.emit('stateChange', next, previous);
  }
}
