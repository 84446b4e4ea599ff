/**
 * TextInsertionService Unit Tests
 *
 * Runs the paste protocol against an in-memory clipboard:
 * - Snapshot, write-verify, paste, restore
 * - Leaving a clipboard alone that changed during the paste
 * - Retry and failure paths
 * - Clipboard-only fallback and the insertion lock
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { TextInsertionService } from '../../src/main/output/TextInsertionService.js';
import { InsertionLock } from '../../src/main/output/InsertionLock.js';
import type { ClipboardAdapter, ClipboardSnapshot } from '../../src/main/platform/types.js';

// =============================================================================
// Fakes
// =============================================================================

function textSnapshot(text: string): ClipboardSnapshot {
  return { items: [{ entries: [{ format: 'text/plain', data: Buffer.from(text) }] }] };
}

const ORIGINAL: ClipboardSnapshot = {
  items: [
    {
      entries: [
        { format: 'text/plain', data: Buffer.from('original') },
        { format: 'text/html', data: Buffer.from('<b>original</b>') },
      ],
    },
    { entries: [{ format: 'image/png', data: Buffer.from([1, 2, 3]) }] },
  ],
};

class FakeClipboard implements ClipboardAdapter {
  snapshot: ClipboardSnapshot = ORIGINAL;
  revision = 7;
  log: string[] = [];
  /** Writes that are accepted but never land */
  droppedWrites = 0;
  staleReadBack: string | null = null;
  failReadText = false;
  failReadSnapshot = false;
  failRestore = false;

  async readSnapshot(): Promise<ClipboardSnapshot> {
    this.log.push('readSnapshot');
    if (this.failReadSnapshot) throw new Error('pasteboard unavailable');
    return this.snapshot;
  }

  async restoreSnapshot(snapshot: ClipboardSnapshot): Promise<void> {
    this.log.push('restore');
    if (this.failRestore) throw new Error('restore refused');
    this.snapshot = snapshot;
    this.revision++;
  }

  async writeText(text: string): Promise<void> {
    this.log.push(`write:${text}`);
    if (this.droppedWrites > 0) {
      this.droppedWrites--;
      return;
    }
    this.replace(text);
  }

  async readText(): Promise<string | null> {
    if (this.failReadText) throw new Error('read failed');
    if (this.staleReadBack !== null) return this.staleReadBack;
    const first = this.snapshot.items[0]?.entries.find((entry) => entry.format === 'text/plain');
    return first ? first.data.toString('utf8') : null;
  }

  async getRevision(): Promise<number> {
    return this.revision;
  }

  /** Simulates any writer, us or another application */
  replace(text: string): void {
    this.snapshot = textSnapshot(text);
    this.revision++;
  }
}

// =============================================================================
// Tests
// =============================================================================

describe('TextInsertionService', () => {
  let clipboard: FakeClipboard;
  let keystroke: { sendPaste: Mock<() => Promise<void>> };
  let accessibility: { isGranted: Mock<() => Promise<boolean>> };
  let lock: InsertionLock;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let service: TextInsertionService;

  beforeEach(() => {
    clipboard = new FakeClipboard();
    keystroke = { sendPaste: vi.fn(async () => {}) };
    accessibility = { isGranted: vi.fn(async () => true) };
    lock = new InsertionLock();
    sleep = vi.fn(async (_ms: number) => {});
    service = new TextInsertionService({ clipboard, keystroke, accessibility, lock, sleep });
  });

  describe('paste and restore', () => {
    it('pastes the text and restores every original item and format', async () => {
      const result = await service.insertText('hello');

      expect(result).toBe('inserted');
      expect(keystroke.sendPaste).toHaveBeenCalledTimes(1);
      expect(clipboard.log).toEqual(['readSnapshot', 'write:hello', 'restore']);
      expect(clipboard.snapshot).toEqual(ORIGINAL);
    });

    it('stabilises before the paste and lets it settle afterwards', async () => {
      await service.insertText('hello');

      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([50, 150]);
    });

    it('restores an empty clipboard to empty', async () => {
      clipboard.snapshot = { items: [] };

      await service.insertText('hello');

      expect(clipboard.snapshot).toEqual({ items: [] });
    });

    it('leaves the clipboard alone if another app replaced it during the paste', async () => {
      keystroke.sendPaste.mockImplementationOnce(async () => {
        clipboard.replace('copied by someone else');
      });

      const result = await service.insertText('hello');

      expect(result).toBe('inserted');
      expect(clipboard.log).not.toContain('restore');
      expect(await clipboard.readText()).toBe('copied by someone else');
    });

    it('still restores when the post-paste check cannot read the clipboard', async () => {
      keystroke.sendPaste.mockImplementationOnce(async () => {
        clipboard.failReadText = true;
      });

      const result = await service.insertText('hello');

      expect(result).toBe('inserted');
      expect(clipboard.snapshot).toEqual(ORIGINAL);
    });
  });

  describe('write verification', () => {
    it('retries a write that did not commit', async () => {
      clipboard.droppedWrites = 1;

      const result = await service.insertText('hello');

      expect(result).toBe('inserted');
      expect(clipboard.log.filter((entry) => entry === 'write:hello')).toHaveLength(2);
      expect(sleep).toHaveBeenCalledWith(25);
    });

    it('fails and restores after three uncommitted writes', async () => {
      clipboard.droppedWrites = 3;

      const result = await service.insertText('hello');

      expect(result).toBe('failed');
      expect(keystroke.sendPaste).not.toHaveBeenCalled();
      expect(clipboard.log.filter((entry) => entry.startsWith('write:'))).toHaveLength(3);
      expect(clipboard.snapshot).toEqual(ORIGINAL);
      // 20 polls of 10 ms per attempt, plus the 25 and 50 ms backoffs
      expect(sleep.mock.calls.filter(([ms]) => ms === 10)).toHaveLength(60);
      expect(sleep).toHaveBeenCalledWith(25);
      expect(sleep).toHaveBeenCalledWith(50);
    });

    it('fails when the read-back never matches', async () => {
      clipboard.staleReadBack = 'something else';

      const result = await service.insertText('hello');

      expect(result).toBe('failed');
      expect(keystroke.sendPaste).not.toHaveBeenCalled();
      expect(clipboard.log.at(-1)).toBe('restore');
    });

    it('resolves failed even when the restore itself fails', async () => {
      clipboard.droppedWrites = 3;
      clipboard.failRestore = true;

      await expect(service.insertText('hello')).resolves.toBe('failed');
    });
  });

  describe('adapter errors', () => {
    it('aborts before touching the clipboard when the snapshot fails', async () => {
      clipboard.failReadSnapshot = true;

      const result = await service.insertText('hello');

      expect(result).toBe('failed');
      expect(clipboard.log).toEqual(['readSnapshot']);
    });

    it('restores when the paste keystroke fails', async () => {
      keystroke.sendPaste.mockRejectedValueOnce(new Error('event post refused'));

      const result = await service.insertText('hello');

      expect(result).toBe('failed');
      expect(clipboard.snapshot).toEqual(ORIGINAL);
    });

    it('keeps a newer copy when the paste keystroke fails after it', async () => {
      keystroke.sendPaste.mockImplementationOnce(async () => {
        clipboard.replace('copied by someone else');
        throw new Error('event post refused');
      });

      const result = await service.insertText('hello');

      expect(result).toBe('failed');
      expect(clipboard.log).toEqual(['readSnapshot', 'write:hello']);
      expect(await clipboard.readText()).toBe('copied by someone else');
    });
  });

  describe('without synthetic input', () => {
    it('leaves the text on the clipboard', async () => {
      accessibility.isGranted.mockResolvedValueOnce(false);

      const result = await service.insertText('hello');

      expect(result).toBe('copiedToClipboardOnly');
      expect(keystroke.sendPaste).not.toHaveBeenCalled();
      expect(clipboard.log).toEqual(['write:hello']);
      expect(await clipboard.readText()).toBe('hello');
    });

    it('treats a failing permission check as not granted', async () => {
      accessibility.isGranted.mockRejectedValueOnce(new Error('osascript missing'));

      await expect(service.insertText('hello')).resolves.toBe('copiedToClipboardOnly');
    });

    it('fails when even the clipboard write fails', async () => {
      accessibility.isGranted.mockResolvedValueOnce(false);
      vi.spyOn(clipboard, 'writeText').mockRejectedValueOnce(new Error('no display'));

      await expect(service.insertText('hello')).resolves.toBe('failed');
    });
  });

  describe('insertion lock', () => {
    it('rejects a second insertion while one is in flight', async () => {
      let releasePaste: () => void = () => {};
      keystroke.sendPaste.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            releasePaste = resolve;
          })
      );

      const first = service.insertText('first');
      await vi.waitFor(() => expect(keystroke.sendPaste).toHaveBeenCalled());

      const second = await service.insertText('second');
      expect(second).toBe('failed');
      expect(clipboard.log).not.toContain('write:second');

      releasePaste();
      await expect(first).resolves.toBe('inserted');
      expect(lock.isHeld).toBe(false);
    });

    it('releases the lock after a failure', async () => {
      clipboard.failReadSnapshot = true;
      await service.insertText('hello');

      expect(lock.isHeld).toBe(false);
    });

    it('rejects immediately when another holder has the lock', async () => {
      lock.tryAcquire();

      await expect(service.insertText('hello')).resolves.toBe('failed');
      expect(clipboard.log).toEqual([]);
      expect(lock.isHeld).toBe(true);
    });
  });
});
