/**
 * Output cleanup for recognised text.
 *
 * `filterTranscriptionOutput` runs after every on-device transcription and
 * strips model artifacts (`[BLANK_AUDIO]`, `(music)`, `<TAG>...</TAG>`) plus
 * filler words. `cleanTranscriptionText` is the lighter pass applied to cloud
 * results, which keep their fillers.
 */

import { createLogger } from '../utils/Logger.js';

const logger = createLogger('OutputFilter');

const TAG_BLOCK_PATTERN = /<([A-Za-z][A-Za-z0-9:_-]*)[^>]*>[\s\S]*?<\/\1>/g;

const HALLUCINATION_PATTERNS = [
  /\[.*?\]/g, // [BLANK_AUDIO], [MUSIC]
  /\(.*?\)/g, // (music), (laughs)
  /\{.*?\}/g, // {inaudible}
];

const FILLER_WORDS = [
  'uh', 'um', 'uhm', 'umm', 'uhh', 'uhhh',
  'ah', 'eh', 'hmm', 'hm', 'mmm', 'mm', 'mh', 'ha', 'ehh',
];

const FILLER_PATTERNS = FILLER_WORDS.map((word) => new RegExp(`\\b${word}\\b[,.]?`, 'gi'));

export function filterTranscriptionOutput(text: string): string {
  let filtered = text.replace(TAG_BLOCK_PATTERN, '');

  for (const pattern of HALLUCINATION_PATTERNS) {
    filtered = filtered.replace(pattern, '');
  }

  for (const pattern of FILLER_PATTERNS) {
    filtered = filtered.replace(pattern, '');
  }

  filtered = filtered.replace(/\s{2,}/g, ' ').trim();

  if (filtered !== text) {
    logger.debug(`Filtered transcription: "${filtered}"`);
  }

  return filtered;
}

/**
 * Remove `[...]` and `(...)` markers, innermost first, then normalise whitespace.
 */
export function cleanTranscriptionText(text: string): string {
  let cleaned = text;

  let previousLength = -1;
  while (cleaned.length !== previousLength) {
    previousLength = cleaned.length;
    cleaned = cleaned.replace(/\[[^[\]]*\]/g, '');
  }

  previousLength = -1;
  while (cleaned.length !== previousLength) {
    previousLength = cleaned.length;
    cleaned = cleaned.replace(/\([^()]*\)/g, '');
  }

  return cleaned.trim().replace(/\s+/g, ' ');
}
