/**
 * TextInsertionService - delivers text to the focused application by paste.
 *
 * Protocol:
 * 1. Acquire the process-wide insertion lock (reject if held)
 * 2. Without synthetic-input permission, leave the text on the clipboard
 * 3. Snapshot every clipboard item and format
 * 4. Write the text, wait for the clipboard revision to move, read it back;
 *    up to 3 attempts with escalating delays
 * 5. Stabilise, send the paste shortcut, let the target consume it
 * 6. Restore the snapshot unless someone else replaced our text meanwhile
 *
 * Never rejects: every path resolves to an `InsertionResult`.
 */

import type { InsertionResult } from '../../shared/types.js';
import type { AccessibilityChecker, ClipboardAdapter, ClipboardSnapshot, PasteKeystroke } from '../platform/types.js';
import { InsertionLock, insertionLock } from './InsertionLock.js';
import { createLogger } from '../utils/Logger.js';

const logger = createLogger('TextInsertion');

// ============================================================================
// Timing
// ============================================================================

export interface InsertionTiming {
  writeAttempts: number;
  /** How long to wait for a write to show up as a new clipboard revision */
  commitWindowMs: number;
  commitPollIntervalMs: number;
  /** Multiplied by the attempt number before each retry */
  retryBackoffMs: number;
  stabilizeMs: number;
  pasteSettleMs: number;
}

export const DEFAULT_INSERTION_TIMING: InsertionTiming = {
  writeAttempts: 3,
  commitWindowMs: 200,
  commitPollIntervalMs: 10,
  retryBackoffMs: 25,
  stabilizeMs: 50,
  pasteSettleMs: 150,
};

export interface TextInsertionDeps {
  clipboard: ClipboardAdapter;
  keystroke: PasteKeystroke;
  accessibility: AccessibilityChecker;
  lock?: InsertionLock;
  timing?: Partial<InsertionTiming>;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// TextInsertionService
// ============================================================================

export class TextInsertionService {
  private readonly clipboard: ClipboardAdapter;
  private readonly keystroke: PasteKeystroke;
  private readonly accessibility: AccessibilityChecker;
  private readonly lock: InsertionLock;
  private readonly timing: InsertionTiming;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: TextInsertionDeps) {
    this.clipboard = deps.clipboard;
    this.keystroke = deps.keystroke;
    this.accessibility = deps.accessibility;
    this.lock = deps.lock ?? insertionLock;
    this.timing = { ...DEFAULT_INSERTION_TIMING, ...deps.timing };
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async insertText(text: string): Promise<InsertionResult> {
    if (!this.lock.tryAcquire()) {
      logger.warn('Insertion already in progress, rejecting concurrent call');
      return 'failed';
    }

    try {
      return await this.insertLocked(text);
    } finally {
      this.lock.release();
    }
  }

  private async insertLocked(text: string): Promise<InsertionResult> {
    let granted: boolean;
    try {
      granted = await this.accessibility.isGranted();
    } catch (error) {
      logger.warn('Accessibility check failed:', errorMessage(error));
      granted = false;
    }

    if (!granted) {
      logger.warn('Synthetic input unavailable, leaving text on the clipboard');
      try {
        await this.clipboard.writeText(text);
        return 'copiedToClipboardOnly';
      } catch (error) {
        logger.error('Clipboard write failed:', errorMessage(error));
        return 'failed';
      }
    }

    let snapshot: ClipboardSnapshot;
    try {
      snapshot = await this.clipboard.readSnapshot();
    } catch (error) {
      logger.error('Could not read clipboard, aborting before any change:', errorMessage(error));
      return 'failed';
    }

    let verified: boolean;
    try {
      verified = await this.writeAndVerify(text);
    } catch (error) {
      logger.error('Clipboard write failed:', errorMessage(error));
      await this.restore(snapshot);
      return 'failed';
    }
    if (!verified) {
      logger.error(`Clipboard write not verified after ${this.timing.writeAttempts} attempts`);
      await this.restore(snapshot);
      return 'failed';
    }

    try {
      await this.sleep(this.timing.stabilizeMs);
      await this.keystroke.sendPaste();
      await this.sleep(this.timing.pasteSettleMs);
    } catch (error) {
      logger.error('Paste keystroke failed:', errorMessage(error));
      await this.restoreUnlessReplaced(snapshot, text);
      return 'failed';
    }

    // The paste has been sent; from here on the result is `inserted`
    await this.restoreUnlessReplaced(snapshot, text);
    return 'inserted';
  }

  /**
   * Restore only while the clipboard still holds our text; a newer copy by
   * someone else stays in place.
   */
  private async restoreUnlessReplaced(snapshot: ClipboardSnapshot, text: string): Promise<void> {
    let current: string | null;
    try {
      current = await this.clipboard.readText();
    } catch (error) {
      logger.warn('Could not read clipboard before restoring, restoring anyway:', errorMessage(error));
      await this.restore(snapshot);
      return;
    }

    if (current === text) {
      await this.restore(snapshot);
      logger.debug('Clipboard restored');
    } else {
      logger.info('Clipboard changed during paste, leaving new contents in place');
    }
  }

  /**
   * Write, wait for the revision to move, and read back. True once the
   * clipboard demonstrably holds `text`.
   */
  private async writeAndVerify(text: string): Promise<boolean> {
    for (let attempt = 1; attempt <= this.timing.writeAttempts; attempt++) {
      if (attempt > 1) {
        await this.sleep(this.timing.retryBackoffMs * (attempt - 1));
      }

      const before = await this.clipboard.getRevision();
      await this.clipboard.writeText(text);

      if (!(await this.waitForRevisionChange(before))) {
        logger.warn(`Clipboard write attempt ${attempt} did not commit`);
        continue;
      }

      const readBack = await this.clipboard.readText();
      if (readBack === text) {
        return true;
      }
      logger.warn(`Clipboard write attempt ${attempt} read back different content`);
    }
    return false;
  }

  private async waitForRevisionChange(before: number): Promise<boolean> {
    const polls = Math.max(1, Math.ceil(this.timing.commitWindowMs / this.timing.commitPollIntervalMs));
    for (let poll = 0; poll <= polls; poll++) {
      if ((await this.clipboard.getRevision()) !== before) {
        return true;
      }
      if (poll < polls) {
        await this.sleep(this.timing.commitPollIntervalMs);
      }
    }
    return false;
  }

  private async restore(snapshot: ClipboardSnapshot): Promise<void> {
    try {
      await this.clipboard.restoreSnapshot(snapshot);
    } catch (error) {
      logger.error('Clipboard restore failed:', errorMessage(error));
    }
  }
}
