/**
 * Platform adapters: clipboard, synthetic paste and accessibility.
 */

export { createSystemClipboard, MacClipboard, X11Clipboard } from './SystemClipboard.js';
export { createPasteKeystroke, MacPasteKeystroke, X11PasteKeystroke } from './PasteKeystroke.js';
export { createAccessibilityChecker, MacAccessibilityChecker, X11AccessibilityChecker } from './AccessibilityChecker.js';
export { SAFE_CHILD_ENV, CommandError, runCommand, runDetachingCommand } from './childProcess.js';
export { UnsupportedPlatformError } from './types.js';
export type {
  AccessibilityChecker,
  ClipboardAdapter,
  ClipboardEntry,
  ClipboardItem,
  ClipboardSnapshot,
  PasteKeystroke,
} from './types.js';
