/**
 * `hotmic listen` - interactive dictation in the terminal.
 *
 * The keyboard stands in for the global hotkey: Space/Enter toggles
 * recording, Esc cancels, Ctrl+C quits. With `--mock` the session walks
 * through its states without touching the microphone, recogniser or
 * clipboard, cycling through a success, an empty result and a failure.
 */

import type { DictationApp } from '../main/createDictationApp.js';
import type { DictationEvent } from '../shared/types.js';
import type { KeyAction } from './KeypressListener.js';
import { createLogger } from '../main/utils/Logger.js';

const logger = createLogger('Listen');

export const MOCK_TRANSCRIPTION_DELAY_MS = 600;

const MOCK_RESULTS: readonly DictationEvent[] = [
  { type: 'transcriptionCompleted', text: 'This is a mock transcription.' },
  { type: 'transcriptionCompleted', text: '' },
  { type: 'transcriptionFailed', reason: 'Simulated transcription failure' },
];

export interface ListenSessionOptions {
  mock?: boolean;
  onQuit: () => void;
}

/**
 * Routes key actions to the controller; in mock mode also plays the
 * transcription events the recorder would otherwise produce.
 */
export class ListenSession {
  private readonly app: Pick<DictationApp, 'controller'>;
  private readonly options: ListenSessionOptions;
  private mockIndex = 0;
  private mockTimer: NodeJS.Timeout | null = null;

  constructor(app: Pick<DictationApp, 'controller'>, options: ListenSessionOptions) {
    this.app = app;
    this.options = options;
  }

  async handle(action: KeyAction): Promise<void> {
    switch (action) {
      case 'toggle':
        await this.toggle();
        return;
      case 'cancel':
        this.clearMockTimer();
        await this.app.controller.handleEscape();
        return;
      case 'quit':
        this.clearMockTimer();
        this.options.onQuit();
        return;
    }
  }

  dispose(): void {
    this.clearMockTimer();
  }

  private async toggle(): Promise<void> {
    const { controller } = this.app;
    const kind = controller.getState().kind;

    if (!this.options.mock) {
      await controller.handleHotkey();
      return;
    }

    if (kind === 'idle') {
      controller.stateMachine.setMockMode(true);
      await controller.handleHotkey();
    } else if (kind === 'recording' && !this.mockTimer) {
      await controller.handleHotkey();
      await controller.stateMachine.send({ type: 'transcriptionStarted' });
      const result = MOCK_RESULTS[this.mockIndex % MOCK_RESULTS.length];
      this.mockIndex++;
      this.mockTimer = setTimeout(() => {
        this.mockTimer = null;
        controller.stateMachine.send(result).catch((error: unknown) => {
          logger.error('Mock result failed:', error instanceof Error ? error.message : String(error));
        });
      }, MOCK_TRANSCRIPTION_DELAY_MS);
    }
  }

  private clearMockTimer(): void {
    if (this.mockTimer) {
      clearTimeout(this.mockTimer);
      this.mockTimer = null;
    }
  }
}
