/**
 * TerminalPresenter - the dictation panel, drawn in the terminal
 *
 * One status line per state. While recording on a TTY the line is redrawn in
 * place with a level meter. Terminal states stay on screen for a per-state
 * delay before the dismissal is reported back.
 */

import type { DictationState, DictationStateKind } from '../shared/types.js';
import type { DictationPresenter } from '../main/DictationController.js';
import { SYMBOLS } from './output.js';

export type DismissibleState = Exclude<DictationStateKind, 'idle' | 'recording' | 'processing'>;

export const DISMISS_DELAYS_MS: Record<DismissibleState, number> = {
  success: 900,
  copiedToClipboard: 1400,
  error: 1800,
  empty: 700,
  cancelled: 300,
};

const METER_WIDTH = 20;
const CLEAR_LINE = '\r\x1b[2K';

export interface TerminalOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export function dismissDelayFor(state: DictationState): number {
  switch (state.kind) {
    case 'idle':
    case 'recording':
    case 'processing':
      return 0;
    default:
      return DISMISS_DELAYS_MS[state.kind];
  }
}

export function renderMeter(level: number, width: number = METER_WIDTH): string {
  const clamped = Math.min(1, Math.max(0, level));
  const filled = Math.round(clamped * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

export function describeForTerminal(state: DictationState): string {
  switch (state.kind) {
    case 'idle':
      return `${SYMBOLS.arrow} Press Space or Enter to dictate, Esc to cancel, Ctrl+C to quit`;
    case 'recording':
      return `${SYMBOLS.dot} Listening${SYMBOLS.ellipsis}`;
    case 'processing':
      return `${SYMBOLS.arrow} Transcribing${SYMBOLS.ellipsis}`;
    case 'success':
      return `${SYMBOLS.check} Inserted`;
    case 'copiedToClipboard':
      return `${SYMBOLS.check} Copied to clipboard, paste it where you need it`;
    case 'error':
      return `${SYMBOLS.cross} ${state.message}`;
    case 'empty':
      return `${SYMBOLS.bullet} Nothing heard`;
    case 'cancelled':
      return `${SYMBOLS.cross} Cancelled`;
  }
}

export class TerminalPresenter implements DictationPresenter {
  private readonly output: TerminalOutput;
  private dismissTimer: NodeJS.Timeout | null = null;
  private recording = false;
  /** True while the cursor sits on a line that will be redrawn */
  private lineOpen = false;

  constructor(output: TerminalOutput = process.stdout) {
    this.output = output;
  }

  showPanel(): void {
    this.cancelDismiss();
  }

  showState(state: DictationState): void {
    this.recording = state.kind === 'recording';
    if (this.recording && this.output.isTTY) {
      this.redraw(`  ${describeForTerminal(state)} ${renderMeter(0)}`);
      return;
    }
    this.writeLine(`  ${describeForTerminal(state)}`);
  }

  setAudioLevel(level: number): void {
    if (!this.recording || !this.output.isTTY) {
      return;
    }
    this.redraw(`  ${describeForTerminal({ kind: 'recording' })} ${renderMeter(level)}`);
  }

  hidePanel(state: DictationState, onDismissed: () => void): void {
    this.cancelDismiss();
    this.dismissTimer = setTimeout(() => {
      this.dismissTimer = null;
      onDismissed();
    }, dismissDelayFor(state));
  }

  hideImmediately(): void {
    this.cancelDismiss();
    this.recording = false;
    if (this.lineOpen) {
      this.output.write(CLEAR_LINE);
      this.lineOpen = false;
    }
  }

  private cancelDismiss(): void {
    if (this.dismissTimer) {
      clearTimeout(this.dismissTimer);
      this.dismissTimer = null;
    }
  }

  private redraw(line: string): void {
    this.output.write(`${CLEAR_LINE}${line}`);
    this.lineOpen = true;
  }

  private writeLine(line: string): void {
    if (this.lineOpen) {
      this.output.write(CLEAR_LINE);
      this.lineOpen = false;
    }
    this.output.write(`${line}\n`);
  }
}
