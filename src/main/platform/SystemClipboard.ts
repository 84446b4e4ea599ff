/**
 * System clipboard adapters.
 *
 * macOS goes through JXA (`osascript -l JavaScript`) against NSPasteboard, which
 * exposes every item, every type and the real change count. Linux/X11 goes
 * through xclip; X11 selections have no change counter, so the revision is
 * derived from content and from our own writes.
 */

import { createHash } from 'crypto';
import { z } from 'zod';
import { CommandError, runCommand, runDetachingCommand } from './childProcess.js';
import type { ClipboardAdapter, ClipboardEntry, ClipboardSnapshot } from './types.js';
import { UnsupportedPlatformError } from './types.js';
import { createLogger } from '../utils/Logger.js';

const logger = createLogger('Clipboard');

// ============================================================================
// macOS (NSPasteboard via JXA)
// ============================================================================

const JXA_READ_SNAPSHOT = `
ObjC.import('AppKit');
function run() {
  const pb = $.NSPasteboard.generalPasteboard;
  const items = pb.pasteboardItems;
  const out = [];
  const count = items.isNil() ? 0 : items.count;
  for (let i = 0; i < count; i++) {
    const item = items.objectAtIndex(i);
    const types = item.types;
    const entries = [];
    for (let j = 0; j < types.count; j++) {
      const type = types.objectAtIndex(j);
      const data = item.dataForType(type);
      if (!data.isNil()) {
        entries.push({ format: ObjC.unwrap(type), data: ObjC.unwrap(data.base64EncodedStringWithOptions(0)) });
      }
    }
    if (entries.length > 0) out.push({ entries: entries });
  }
  return JSON.stringify({ changeCount: pb.changeCount, items: out });
}`;

const JXA_WRITE_SNAPSHOT = `
ObjC.import('AppKit');
ObjC.import('Foundation');
function run() {
  const raw = $.NSFileHandle.fileHandleWithStandardInput.readDataToEndOfFile;
  const payload = JSON.parse(ObjC.unwrap($.NSString.alloc.initWithDataEncoding(raw, $.NSUTF8StringEncoding)));
  const pb = $.NSPasteboard.generalPasteboard;
  pb.clearContents;
  const objects = [];
  for (const item of payload.items) {
    const pbItem = $.NSPasteboardItem.alloc.init;
    for (const entry of item.entries) {
      const data = $.NSData.alloc.initWithBase64EncodedStringOptions(entry.data, 0);
      pbItem.setDataForType(data, entry.format);
    }
    objects.push(pbItem);
  }
  if (objects.length > 0) pb.writeObjects($(objects));
  return String(pb.changeCount);
}`;

const JXA_READ_TEXT = `
ObjC.import('AppKit');
function run() {
  const value = $.NSPasteboard.generalPasteboard.stringForType($.NSPasteboardTypeString);
  return JSON.stringify({ text: value.isNil() ? null : ObjC.unwrap(value) });
}`;

const JXA_CHANGE_COUNT = `
ObjC.import('AppKit');
function run() {
  return String($.NSPasteboard.generalPasteboard.changeCount);
}`;

const MAC_TEXT_FORMAT = 'public.utf8-plain-text';

const wireSnapshotSchema = z.object({
  changeCount: z.number().optional(),
  items: z.array(
    z.object({
      entries: z.array(z.object({ format: z.string(), data: z.string() })),
    })
  ),
});

const readTextSchema = z.object({ text: z.string().nullable() });

function runJxa(script: string, input?: string): Promise<string> {
  return runCommand('osascript', ['-l', 'JavaScript', '-e', script], { input, timeoutMs: 5000 }).then((result) =>
    result.stdout.toString('utf8').trim()
  );
}

function parseChangeCount(output: string): number {
  const value = Number.parseInt(output, 10);
  if (Number.isNaN(value)) {
    throw new Error(`Unexpected pasteboard change count: ${output}`);
  }
  return value;
}

export class MacClipboard implements ClipboardAdapter {
  async readSnapshot(): Promise<ClipboardSnapshot> {
    const parsed = wireSnapshotSchema.parse(JSON.parse(await runJxa(JXA_READ_SNAPSHOT)));
    return {
      items: parsed.items.map((item) => ({
        entries: item.entries.map((entry) => ({ format: entry.format, data: Buffer.from(entry.data, 'base64') })),
      })),
    };
  }

  async restoreSnapshot(snapshot: ClipboardSnapshot): Promise<void> {
    const payload = {
      items: snapshot.items.map((item) => ({
        entries: item.entries.map((entry) => ({ format: entry.format, data: entry.data.toString('base64') })),
      })),
    };
    await runJxa(JXA_WRITE_SNAPSHOT, JSON.stringify(payload));
  }

  async writeText(text: string): Promise<void> {
    await this.restoreSnapshot({
      items: [{ entries: [{ format: MAC_TEXT_FORMAT, data: Buffer.from(text, 'utf8') }] }],
    });
  }

  async readText(): Promise<string | null> {
    return readTextSchema.parse(JSON.parse(await runJxa(JXA_READ_TEXT))).text;
  }

  async getRevision(): Promise<number> {
    return parseChangeCount(await runJxa(JXA_CHANGE_COUNT));
  }
}

// ============================================================================
// Linux / X11 (xclip)
// ============================================================================

/** Selection targets that describe the selection rather than hold data */
const X11_META_TARGETS = new Set(['TARGETS', 'TIMESTAMP', 'MULTIPLE', 'SAVE_TARGETS', 'DELETE', 'INSERT_PROPERTY', 'INSERT_SELECTION']);

/** xclip serves a single target; plain text wins so every consumer can still paste */
const X11_RESTORE_PREFERENCE = ['UTF8_STRING', 'text/plain;charset=utf-8', 'text/plain', 'STRING', 'image/png', 'text/html', 'text/uri-list'];

const X11_TEXT_TARGET = 'UTF8_STRING';

export class X11Clipboard implements ClipboardAdapter {
  private revision = 0;
  private lastFingerprint: string | null = null;

  async readSnapshot(): Promise<ClipboardSnapshot> {
    const targets = await this.readTargets();
    const entries: ClipboardEntry[] = [];

    for (const format of targets) {
      try {
        const { stdout } = await runCommand('xclip', ['-selection', 'clipboard', '-o', '-t', format], { timeoutMs: 2000 });
        entries.push({ format, data: stdout });
      } catch (error) {
        logger.debug(`Skipping clipboard target ${format}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return { items: entries.length > 0 ? [{ entries }] : [] };
  }

  async restoreSnapshot(snapshot: ClipboardSnapshot): Promise<void> {
    const entries = snapshot.items.flatMap((item) => item.entries);
    const preferred = pickRestoreEntry(entries);

    if (!preferred) {
      await runDetachingCommand('xclip', ['-selection', 'clipboard', '-i'], '');
    } else {
      await runDetachingCommand('xclip', ['-selection', 'clipboard', '-t', preferred.format, '-i'], preferred.data);
    }
    this.revision++;
    this.lastFingerprint = await this.fingerprint();
  }

  async writeText(text: string): Promise<void> {
    await runDetachingCommand('xclip', ['-selection', 'clipboard', '-t', X11_TEXT_TARGET, '-i'], text);
    this.revision++;
    this.lastFingerprint = await this.fingerprint();
  }

  async readText(): Promise<string | null> {
    try {
      const { stdout } = await runCommand('xclip', ['-selection', 'clipboard', '-o'], { timeoutMs: 2000 });
      return stdout.toString('utf8');
    } catch (error) {
      if (error instanceof CommandError && !error.notFound) {
        // xclip exits non-zero when the selection holds no text
        return null;
      }
      throw error;
    }
  }

  async getRevision(): Promise<number> {
    const fingerprint = await this.fingerprint();
    if (this.lastFingerprint !== null && fingerprint !== this.lastFingerprint) {
      this.revision++;
    }
    this.lastFingerprint = fingerprint;
    return this.revision;
  }

  private async readTargets(): Promise<string[]> {
    try {
      const { stdout } = await runCommand('xclip', ['-selection', 'clipboard', '-o', '-t', 'TARGETS'], { timeoutMs: 2000 });
      return stdout
        .toString('utf8')
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0 && !X11_META_TARGETS.has(line));
    } catch (error) {
      if (error instanceof CommandError && !error.notFound) {
        return [];
      }
      throw error;
    }
  }

  private async fingerprint(): Promise<string> {
    const targets = await this.readTargets();
    const text = targets.length > 0 ? await this.readText() : null;
    return createHash('sha256')
      .update(targets.join('\n'))
      .update('\0')
      .update(text ?? '')
      .digest('hex');
  }
}

function pickRestoreEntry(entries: ClipboardEntry[]): ClipboardEntry | null {
  for (const format of X11_RESTORE_PREFERENCE) {
    const match = entries.find((entry) => entry.format === format);
    if (match) return match;
  }
  return entries[0] ?? null;
}

// ============================================================================
// Factory
// ============================================================================

class UnsupportedClipboard implements ClipboardAdapter {
  constructor(private readonly platform: string) {}

  private fail(): never {
    throw new UnsupportedPlatformError('Clipboard access', this.platform);
  }

  async readSnapshot(): Promise<ClipboardSnapshot> {
    this.fail();
  }

  async restoreSnapshot(): Promise<void> {
    this.fail();
  }

  async writeText(): Promise<void> {
    this.fail();
  }

  async readText(): Promise<string | null> {
    this.fail();
  }

  async getRevision(): Promise<number> {
    this.fail();
  }
}

export function createSystemClipboard(platform: NodeJS.Platform = process.platform): ClipboardAdapter {
  switch (platform) {
    case 'darwin':
      return new MacClipboard();
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return new X11Clipboard();
    default:
      return new UnsupportedClipboard(platform);
  }
}
