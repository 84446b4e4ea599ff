/**
 * Platform adapter contracts
 *
 * The insertion protocol only talks to these interfaces; the system
 * implementations live beside them and tests substitute in-memory fakes.
 */

export interface ClipboardEntry {
  /** Platform format identifier (`public.utf8-plain-text`, `image/png`, ...) */
  format: string;
  data: Buffer;
}

export interface ClipboardItem {
  entries: ClipboardEntry[];
}

/**
 * Everything on the clipboard at one point in time, every item and every format.
 */
export interface ClipboardSnapshot {
  items: ClipboardItem[];
}

export interface ClipboardAdapter {
  readSnapshot(): Promise<ClipboardSnapshot>;
  /** Replace the clipboard with the snapshot; an empty snapshot clears it. */
  restoreSnapshot(snapshot: ClipboardSnapshot): Promise<void>;
  writeText(text: string): Promise<void>;
  readText(): Promise<string | null>;
  /** Monotonic counter that changes whenever the clipboard is written. */
  getRevision(): Promise<number>;
}

export interface PasteKeystroke {
  /** Modifier down, V down, V up, modifier up. */
  sendPaste(): Promise<void>;
}

export interface AccessibilityChecker {
  /** Whether this process may post synthetic input to other applications. */
  isGranted(): Promise<boolean>;
}

export class UnsupportedPlatformError extends Error {
  constructor(feature: string, platform: string) {
    super(`${feature} is not supported on ${platform}`);
    this.name = 'UnsupportedPlatformError';
  }
}
