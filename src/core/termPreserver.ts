/**
 * Term Preservation
 *
 * Capitalized words and numbers/dates are swapped for placeholder tokens
 * before a sentence goes to the translation service, and swapped back after.
 *
 * A term must not touch a letter, digit or `_` of any script on either side,
 * so `Ramको` stays whole and `१२/०५/२०२३` is one term.
 *
 * Placeholders are `<prefix><index>`. The prefix must end in `_` so the
 * number pass never matches the index digits. When the input already
 * contains the prefix, a numbered variant that does not occur is chosen.
 */

import { ConfigurationError } from './errors';
import { PreservationResult, PreservedTerm } from './types';

export const DEFAULT_PLACEHOLDER_PREFIX = 'PRESERVED_';

const CAPITALIZED_WORD = /(?<![\p{L}\p{N}_])[A-Z][a-zA-Z]*(?![\p{L}\p{N}_])/gu;
const NUMBER_OR_DATE = /(?<![\p{L}\p{N}_])\p{Nd}+(?:[-/.]\p{Nd}+)*(?![\p{L}\p{N}_])/gu;
const VALID_PREFIX = /^[A-Za-z][A-Za-z0-9]*_$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pick a prefix that does not already occur in the text.
 * `PRESERVED_` -> `PRESERVED1_` -> `PRESERVED2_` ...
 */
export function choosePlaceholderPrefix(text: string, prefix: string = DEFAULT_PLACEHOLDER_PREFIX): string {
  if (!VALID_PREFIX.test(prefix)) {
    throw new ConfigurationError(
      `Invalid placeholder prefix "${prefix}": expected a letter, then letters or digits, ending in "_"`
    );
  }

  const stem = prefix.slice(0, -1);
  let candidate = prefix;
  for (let n = 1; text.includes(candidate); n++) {
    candidate = `${stem}${n}_`;
  }
  return candidate;
}

/**
 * Mask capitalized words, then numbers and dates, with indexed placeholders.
 */
export function preserveTerms(text: string, prefix: string = DEFAULT_PLACEHOLDER_PREFIX): PreservationResult {
  const marker = choosePlaceholderPrefix(text, prefix);
  const terms: PreservedTerm[] = [];

  const mask = (match: string): string => {
    const placeholder = `${marker}${terms.length}`;
    terms.push({ index: terms.length, originalText: match, placeholder });
    return placeholder;
  };

  const maskedText = text
    .replace(CAPITALIZED_WORD, mask)
    .replace(NUMBER_OR_DATE, mask);

  return { maskedText, terms };
}

/**
 * Put preserved terms back in place of their placeholders.
 *
 * Single pass, longest placeholder first, so `PRESERVED_1` cannot eat
 * the head of `PRESERVED_12`.
 */
export function restoreTerms(text: string, terms: readonly PreservedTerm[]): string {
  if (terms.length === 0) {
    return text;
  }

  const byPlaceholder = new Map<string, string>();
  for (const term of terms) {
    byPlaceholder.set(term.placeholder, term.originalText);
  }

  const alternation = [...byPlaceholder.keys()]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');

  return text.replace(new RegExp(alternation, 'g'), (placeholder) => byPlaceholder.get(placeholder) ?? placeholder);
}
