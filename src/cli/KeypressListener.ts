/**
 * KeypressListener - terminal stand-in for the global hotkey
 *
 * Puts stdin in raw mode and maps single keys to session actions. Raw mode
 * swallows the terminal's own Ctrl+C handling, so Ctrl+C is mapped to `quit`.
 */

import { emitKeypressEvents } from 'readline';
import { createLogger } from '../main/utils/Logger.js';

const logger = createLogger('Keypress');

export type KeyAction = 'toggle' | 'cancel' | 'quit';

export interface KeyInfo {
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
}

export type KeypressInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export function actionForKey(key: KeyInfo | undefined): KeyAction | null {
  if (!key) return null;
  if (key.ctrl && (key.name === 'c' || key.name === 'd')) {
    return 'quit';
  }
  if (key.ctrl || key.meta) {
    return null;
  }
  switch (key.name) {
    case 'space':
    case 'return':
    case 'enter':
      return 'toggle';
    case 'escape':
      return 'cancel';
    case 'q':
      return 'quit';
    default:
      return null;
  }
}

export class KeypressListener {
  private readonly input: KeypressInput;
  private listener: ((chunk: string | undefined, key: KeyInfo | undefined) => void) | null = null;

  constructor(input: KeypressInput = process.stdin) {
    this.input = input;
  }

  get isListening(): boolean {
    return this.listener !== null;
  }

  start(onAction: (action: KeyAction) => void): void {
    this.stop();
    emitKeypressEvents(this.input);
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(true);
    }

    const listener = (_chunk: string | undefined, key: KeyInfo | undefined): void => {
      const action = actionForKey(key);
      if (action) {
        logger.debug(`Key ${key?.name ?? '?'} -> ${action}`);
        onAction(action);
      }
    };
    this.listener = listener;
    this.input.on('keypress', listener);
    this.input.resume();
  }

  stop(): void {
    if (!this.listener) return;
    this.input.off('keypress', this.listener);
    this.listener = null;
    if (this.input.isTTY && this.input.setRawMode) {
      this.input.setRawMode(false);
    }
    this.input.pause();
  }
}
