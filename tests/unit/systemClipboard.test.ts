/**
 * X11Clipboard Unit Tests
 *
 * xclip is mocked at the child process helpers; the fake selection below is
 * what each `xclip -o -t <target>` call would print.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { X11Clipboard } from '../../src/main/platform/SystemClipboard.js';
import { CommandError, runCommand, runDetachingCommand } from '../../src/main/platform/childProcess.js';
import type { CommandResult } from '../../src/main/platform/childProcess.js';

vi.mock('../../src/main/platform/childProcess.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/main/platform/childProcess.js')>();
  return { ...actual, runCommand: vi.fn(), runDetachingCommand: vi.fn() };
});

const runCommandMock = vi.mocked(runCommand);
const runDetachingCommandMock = vi.mocked(runDetachingCommand);

const BROWSER_COPY: Record<string, string> = {
  'text/html': '<b>hello</b>',
  UTF8_STRING: 'hello',
};

describe('X11Clipboard', () => {
  let selection: Record<string, string>;

  function output(text: string): CommandResult {
    return { stdout: Buffer.from(text), stderr: '' };
  }

  beforeEach(() => {
    selection = { ...BROWSER_COPY };

    runCommandMock.mockReset();
    runCommandMock.mockImplementation(async (_command, args) => {
      const targetIndex = args.indexOf('-t');
      if (targetIndex === -1) {
        const text = selection.UTF8_STRING;
        if (text === undefined) {
          throw new CommandError('xclip', 'xclip failed: target STRING not available', { exitCode: 1 });
        }
        return output(text);
      }
      const target = args[targetIndex + 1];
      if (target === 'TARGETS') {
        return output(['TARGETS', 'TIMESTAMP', ...Object.keys(selection)].join('\n') + '\n');
      }
      const data = selection[target];
      if (data === undefined) {
        throw new CommandError('xclip', `xclip failed: target ${target} not available`, { exitCode: 1 });
      }
      return output(data);
    });

    runDetachingCommandMock.mockReset();
    runDetachingCommandMock.mockResolvedValue(undefined);
  });

  describe('readSnapshot', () => {
    it('captures every data target and skips the meta targets', async () => {
      const snapshot = await new X11Clipboard().readSnapshot();

      expect(snapshot.items).toHaveLength(1);
      expect(snapshot.items[0].entries.map((entry) => [entry.format, entry.data.toString('utf8')])).toEqual([
        ['text/html', '<b>hello</b>'],
        ['UTF8_STRING', 'hello'],
      ]);
    });

    it('is empty when the selection has no owner', async () => {
      selection = {};

      await expect(new X11Clipboard().readSnapshot()).resolves.toEqual({ items: [] });
    });
  });

  describe('restoreSnapshot', () => {
    it('puts plain text back ahead of richer targets', async () => {
      const clipboard = new X11Clipboard();
      const snapshot = await clipboard.readSnapshot();

      await clipboard.restoreSnapshot(snapshot);

      expect(runDetachingCommandMock).toHaveBeenCalledTimes(1);
      const [command, args, input] = runDetachingCommandMock.mock.calls[0];
      expect(command).toBe('xclip');
      expect(args).toEqual(['-selection', 'clipboard', '-t', 'UTF8_STRING', '-i']);
      expect(input).toEqual(Buffer.from('hello'));
    });

    it('falls back to an image when there is no text', async () => {
      const clipboard = new X11Clipboard();

      await clipboard.restoreSnapshot({
        items: [
          {
            entries: [
              { format: 'text/html', data: Buffer.from('<img>') },
              { format: 'image/png', data: Buffer.from([1, 2, 3]) },
            ],
          },
        ],
      });

      expect(runDetachingCommandMock.mock.calls[0][1]).toEqual(['-selection', 'clipboard', '-t', 'image/png', '-i']);
    });

    it('restores an empty snapshot as an empty selection', async () => {
      await new X11Clipboard().restoreSnapshot({ items: [] });

      expect(runDetachingCommandMock).toHaveBeenCalledWith('xclip', ['-selection', 'clipboard', '-i'], '');
    });
  });

  describe('getRevision', () => {
    it('counts our own writes and changes made by others', async () => {
      const clipboard = new X11Clipboard();

      await clipboard.writeText('dictated');
      expect(runDetachingCommandMock).toHaveBeenCalledWith(
        'xclip',
        ['-selection', 'clipboard', '-t', 'UTF8_STRING', '-i'],
        'dictated'
      );
      await expect(clipboard.getRevision()).resolves.toBe(1);

      selection = { UTF8_STRING: 'copied elsewhere' };

      await expect(clipboard.getRevision()).resolves.toBe(2);
      await expect(clipboard.getRevision()).resolves.toBe(2);
    });
  });
});
