/**
 * Sentence Segmenter
 *
 * Splits text into sentence-like spans on a fixed set of terminators.
 * Terminators stay attached to the span they close, so joining the spans
 * gives back the input unchanged.
 */

import { TextSpan } from './types';
import { createTextSpan } from './scriptDetector';

/**
 * Characters that close a sentence.
 */
export const SENTENCE_TERMINATORS: ReadonlySet<string> = new Set([
  '.', '!', '?', '‡', '•', '§',
]);

/**
 * Split text into spans, each ending in a terminator except possibly the last.
 */
export function segmentText(text: string): TextSpan[] {
  const spans: TextSpan[] = [];
  let current = '';

  // for...of walks code points, so surrogate pairs are never split
  for (const char of text) {
    current += char;
    if (SENTENCE_TERMINATORS.has(char)) {
      spans.push(createTextSpan(current));
      current = '';
    }
  }

  if (current.length > 0) {
    spans.push(createTextSpan(current));
  }

  return spans;
}
