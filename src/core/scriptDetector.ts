import { ScriptMix, TextSpan } from './types';

// Devanagari block and ASCII letters
const DEVANAGARI_PATTERN = /[\u0900-\u097F]/;
const LATIN_PATTERN = /[a-zA-Z]/;

/**
 * Detect whether text contains Devanagari and/or Latin letters
 */
export function detectScripts(text: string): ScriptMix {
  return {
    hasHindi: DEVANAGARI_PATTERN.test(text),
    hasEnglish: LATIN_PATTERN.test(text),
  };
}

/**
 * Build a frozen span with its script attributes derived from the content
 */
export function createTextSpan(content: string): TextSpan {
  const { hasHindi, hasEnglish } = detectScripts(content);
  return Object.freeze({
    content,
    hasHindiScript: hasHindi,
    hasEnglishScript: hasEnglish,
  });
}
