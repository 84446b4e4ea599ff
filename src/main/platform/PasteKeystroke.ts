/**
 * Synthetic paste shortcut.
 *
 * Both implementations post the four explicit key events (modifier down,
 * V down, V up, modifier up) rather than a combined "type Cmd+V" call, which
 * some applications ignore.
 */

import { runCommand } from './childProcess.js';
import type { PasteKeystroke } from './types.js';
import { UnsupportedPlatformError } from './types.js';

/**
 * CGEvent sequence on a combined-session event source. Local keyboard input is
 * suppressed for the duration; mouse and system-defined events still pass.
 */
const JXA_PASTE = `
ObjC.import('CoreGraphics');
function run() {
  const source = $.CGEventSourceCreate($.kCGEventSourceStateCombinedSessionState);
  $.CGEventSourceSetLocalEventsFilterDuringSuppressionState(
    source,
    $.kCGEventFilterMaskPermitLocalMouseEvents | $.kCGEventFilterMaskPermitSystemDefinedEvents,
    $.kCGEventSuppressionStateSuppressionInterval
  );
  const COMMAND = 0x37;
  const V = 0x09;
  const cmdDown = $.CGEventCreateKeyboardEvent(source, COMMAND, true);
  const vDown = $.CGEventCreateKeyboardEvent(source, V, true);
  const vUp = $.CGEventCreateKeyboardEvent(source, V, false);
  const cmdUp = $.CGEventCreateKeyboardEvent(source, COMMAND, false);
  $.CGEventSetFlags(vDown, $.kCGEventFlagMaskCommand);
  $.CGEventSetFlags(vUp, $.kCGEventFlagMaskCommand);
  $.CGEventPost($.kCGHIDEventTap, cmdDown);
  $.CGEventPost($.kCGHIDEventTap, vDown);
  $.CGEventPost($.kCGHIDEventTap, vUp);
  $.CGEventPost($.kCGHIDEventTap, cmdUp);
  return 'ok';
}`;

export class MacPasteKeystroke implements PasteKeystroke {
  async sendPaste(): Promise<void> {
    await runCommand('osascript', ['-l', 'JavaScript', '-e', JXA_PASTE], { timeoutMs: 5000 });
  }
}

/**
 * xdotool runs the chained commands in order within one invocation.
 * `--clearmodifiers` lifts keys the user is still holding for the duration.
 */
export class X11PasteKeystroke implements PasteKeystroke {
  async sendPaste(): Promise<void> {
    await runCommand(
      'xdotool',
      ['keydown', '--clearmodifiers', 'ctrl', 'keydown', 'v', 'keyup', 'v', 'keyup', 'ctrl'],
      { timeoutMs: 5000 }
    );
  }
}

class UnsupportedPasteKeystroke implements PasteKeystroke {
  constructor(private readonly platform: string) {}

  async sendPaste(): Promise<void> {
    throw new UnsupportedPlatformError('Synthetic paste', this.platform);
  }
}

export function createPasteKeystroke(platform: NodeJS.Platform = process.platform): PasteKeystroke {
  switch (platform) {
    case 'darwin':
      return new MacPasteKeystroke();
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return new X11PasteKeystroke();
    default:
      return new UnsupportedPasteKeystroke(platform);
  }
}
