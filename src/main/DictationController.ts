/**
 * DictationController - owns one dictation pipeline for the life of the process
 *
 * Created once at start-up. Implements the state machine's collaborator
 * contract by driving recording, transcription and insertion, and forwards
 * state to whatever presenter is attached (the terminal UI in the CLI).
 *
 * Per session it holds at most one transcription task and one cancellation
 * token. The recording artifact is deleted when the task finishes, or when the
 * session is cancelled or reset.
 */

import { randomUUID } from 'crypto';
import type { DictationEvent, DictationState, InsertionResult } from '../shared/types.js';
import { describeState } from '../shared/types.js';
import { DictationStateMachine } from './DictationStateMachine.js';
import type { DictationCollaborator } from './DictationStateMachine.js';
import type { RecordingService } from './audio/RecordingService.js';
import { describeRecordingError } from './audio/RecordingService.js';
import type { TranscriptionCoordinator } from './transcription/TranscriptionCoordinator.js';
import { CancellationToken } from './transcription/CancellationToken.js';
import { describeTranscriptionFailure } from './transcription/types.js';
import type { TextInsertionService } from './output/TextInsertionService.js';
import type { AccessibilityChecker } from './platform/types.js';
import { createLogger } from './utils/Logger.js';

const logger = createLogger('DictationController');

// ============================================================================
// Types
// ============================================================================

/**
 * Presentation layer. Rendering and dismiss animations live behind this.
 */
export interface DictationPresenter {
  showPanel(): void;
  showState(state: DictationState): void;
  /** Play the dismiss sequence for `state`, then call `onDismissed` */
  hidePanel(state: DictationState, onDismissed: () => void): void;
  /** Tear down immediately, no callback (emergency reset) */
  hideImmediately(): void;
  setAudioLevel(level: number): void;
}

export type RecordingCapture = Pick<
  RecordingService,
  'startRecording' | 'stopRecording' | 'deleteRecording' | 'abort' | 'onAudioLevel' | 'onInterrupted'
>;

export interface DictationControllerDeps {
  recorder: RecordingCapture;
  coordinator: Pick<TranscriptionCoordinator, 'transcribe'>;
  insertion: Pick<TextInsertionService, 'insertText'>;
  accessibility: AccessibilityChecker;
  presenter: DictationPresenter;
  /** Delay before the panel switches from recording to processing */
  transcriptionStartDelayMs?: number;
}

interface ActiveSession {
  id: string;
  token: CancellationToken;
  /** Settles (never rejects) once capture is running or has failed to start */
  started: Promise<void>;
  stopRequested: boolean;
  startTimer: NodeJS.Timeout | null;
}

const NO_RECORDING_MESSAGE = 'No recording available';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// DictationController
// ============================================================================

export class DictationController implements DictationCollaborator {
  readonly stateMachine: DictationStateMachine;
  private readonly deps: DictationControllerDeps;
  private readonly transcriptionStartDelayMs: number;
  private session: ActiveSession | null = null;
  private tasks: Set<Promise<void>> = new Set();
  private unsubscribers: Array<() => void> = [];

  constructor(deps: DictationControllerDeps) {
    this.deps = deps;
    this.transcriptionStartDelayMs = deps.transcriptionStartDelayMs ?? 100;
    this.stateMachine = new DictationStateMachine(this);

    this.unsubscribers.push(
      this.stateMachine.onStateChange((state) => this.handleStateChange(state)),
      deps.recorder.onAudioLevel((level) => deps.presenter.setAudioLevel(level)),
      deps.recorder.onInterrupted((error) => {
        const session = this.session;
        if (!session || session.stopRequested) return;
        this.abandonSession();
        this.track(this.deps.recorder.deleteRecording());
        this.post({ type: 'transcriptionFailed', reason: error.message });
      })
    );
  }

  getState(): DictationState {
    return this.stateMachine.getState();
  }

  // ==========================================================================
  // Inbound triggers
  // ==========================================================================

  /**
   * Toggle: start from idle, stop while recording, ignore otherwise.
   */
  async handleHotkey(): Promise<void> {
    const state = this.stateMachine.getState();
    if (state.kind === 'idle' || state.kind === 'recording') {
      await this.dispatch({ type: 'hotkeyPressed' });
    } else {
      logger.debug(`Hotkey ignored in ${describeState(state)}`);
    }
  }

  /**
   * Escape only counts while the session UI is visible.
   */
  async handleEscape(): Promise<void> {
    if (this.stateMachine.getState().kind === 'idle') {
      return;
    }
    await this.dispatch({ type: 'escapePressed' });
  }

  /**
   * System-level interruption: clean up without waiting on anything, then
   * force the state machine back to idle.
   */
  emergencyReset(reason: string): void {
    logger.warn(`Emergency reset: ${reason}`);
    this.abandonSession();
    this.deps.recorder.abort();
    void this.deps.recorder.deleteRecording().catch((error: unknown) => {
      logger.warn('Failed to delete recording during reset:', errorMessage(error));
    });
    this.deps.presenter.hideImmediately();
    this.stateMachine.forceReset();
  }

  /**
   * Wait for background work (transcription tasks, cleanup) to settle.
   */
  async whenIdle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(this.tasks);
    }
  }

  async shutdown(): Promise<void> {
    this.emergencyReset('shutdown');
    await this.whenIdle();
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
  }

  // ==========================================================================
  // DictationCollaborator
  // ==========================================================================

  onShowPanel(): void {
    this.deps.presenter.showPanel();
  }

  onHidePanel(state: DictationState): void {
    this.deps.presenter.hidePanel(state, () => this.post({ type: 'dismissCompleted' }));
  }

  onStartRecording(): void {
    const session: ActiveSession = {
      id: randomUUID(),
      token: new CancellationToken(),
      started: Promise.resolve(),
      stopRequested: false,
      startTimer: null,
    };
    this.abandonSession();
    this.session = session;
    logger.info(`Session ${session.id} started`);
    this.track(this.warnIfClipboardOnly());

    session.started = this.deps.recorder.startRecording().catch((error: unknown) => {
      if (this.session !== session || session.token.isCancelled) {
        return;
      }
      const reason = describeRecordingError(error);
      logger.error(`Session ${session.id}: ${reason}`);
      this.session = null;
      this.post({ type: 'transcriptionFailed', reason });
    });
  }

  onStopRecording(): void {
    const session = this.session;
    if (!session) {
      this.post({ type: 'transcriptionFailed', reason: NO_RECORDING_MESSAGE });
      return;
    }
    if (session.stopRequested) {
      logger.debug(`Session ${session.id}: stop already requested`);
      return;
    }
    session.stopRequested = true;
    this.track(this.runTranscription(session));
  }

  onCancel(): void {
    const session = this.session;
    this.abandonSession();
    this.track(this.discardRecording(session));
    this.deps.presenter.hidePanel({ kind: 'cancelled' }, () => this.post({ type: 'dismissCompleted' }));
  }

  onInsertText(text: string): Promise<InsertionResult> {
    return this.deps.insertion.insertText(text);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async runTranscription(session: ActiveSession): Promise<void> {
    await session.started;
    if (session.token.isCancelled) {
      return;
    }

    const artifact = await this.deps.recorder.stopRecording();
    if (session.token.isCancelled) {
      await this.deps.recorder.deleteRecording(artifact?.path ?? null);
      return;
    }
    if (!artifact) {
      this.finishSession(session);
      await this.dispatch({ type: 'transcriptionFailed', reason: NO_RECORDING_MESSAGE });
      return;
    }

    session.startTimer = setTimeout(() => {
      session.startTimer = null;
      if (!session.token.isCancelled) {
        this.post({ type: 'transcriptionStarted' });
      }
    }, this.transcriptionStartDelayMs);

    try {
      const outcome = await this.deps.coordinator.transcribe({
        sessionId: session.id,
        artifact,
        token: session.token,
      });

      this.clearStartTimer(session);
      if (session.token.isCancelled || outcome.status === 'cancelled') {
        logger.info(`Session ${session.id}: transcription result discarded`);
        return;
      }

      this.finishSession(session);
      if (outcome.status === 'completed') {
        await this.dispatch({ type: 'transcriptionCompleted', text: outcome.text });
      } else {
        await this.dispatch({ type: 'transcriptionFailed', reason: describeTranscriptionFailure(outcome.failure) });
      }
    } finally {
      this.clearStartTimer(session);
      await this.deps.recorder.deleteRecording(artifact.path);
    }
  }

  private async discardRecording(session: ActiveSession | null): Promise<void> {
    if (session) {
      await session.started;
    }
    // A newer session owns the recorder now; its start already replaced this capture
    if (this.session !== null) {
      logger.debug(`Session ${session?.id ?? 'none'}: capture already handed over, nothing to discard`);
      return;
    }
    const artifact = await this.deps.recorder.stopRecording();
    if (artifact) {
      await this.deps.recorder.deleteRecording(artifact.path);
    }
  }

  private async warnIfClipboardOnly(): Promise<void> {
    if (!(await this.deps.accessibility.isGranted())) {
      logger.warn('Synthetic input not available; text will be copied to the clipboard only');
    }
  }

  /**
   * Cancel the current session's token and timers and forget it.
   */
  private abandonSession(): void {
    const session = this.session;
    if (!session) return;
    session.token.cancel();
    this.clearStartTimer(session);
    this.session = null;
    logger.info(`Session ${session.id} abandoned`);
  }

  private finishSession(session: ActiveSession): void {
    if (this.session === session) {
      this.session = null;
    }
  }

  private clearStartTimer(session: ActiveSession): void {
    if (session.startTimer) {
      clearTimeout(session.startTimer);
      session.startTimer = null;
    }
  }

  private handleStateChange(state: DictationState): void {
    this.deps.presenter.showState(state);
    // Mock sessions skip onCancel, so the panel still needs dismissing
    if (state.kind === 'cancelled' && this.stateMachine.isMockMode()) {
      this.deps.presenter.hidePanel(state, () => this.post({ type: 'dismissCompleted' }));
    }
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((error: unknown) => {
        logger.error('Background task failed:', errorMessage(error));
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }

  private async dispatch(event: DictationEvent): Promise<void> {
    try {
      await this.stateMachine.send(event);
    } catch (error) {
      logger.error(`Failed to process ${event.type}:`, errorMessage(error));
    }
  }

  private post(event: DictationEvent): void {
    this.track(this.dispatch(event));
  }
}
