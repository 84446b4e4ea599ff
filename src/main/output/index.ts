/**
 * Output Module
 *
 * Delivers transcribed text to the focused application through the clipboard.
 */

export { InsertionLock, insertionLock } from './InsertionLock.js';
export { TextInsertionService, DEFAULT_INSERTION_TIMING } from './TextInsertionService.js';
export type { InsertionTiming, TextInsertionDeps } from './TextInsertionService.js';
