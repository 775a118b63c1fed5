/**
 * Core types for the Hinglish translator
 */

import type { ServiceError } from './errors';

/**
 * Source language accepted by the translation service
 */
export type SourceLanguage = 'auto' | 'hi';

/**
 * Target language accepted by the translation service
 */
export type TargetLanguage = 'hi' | 'en';

/**
 * Which scripts appear in a piece of text
 */
export interface ScriptMix {
  hasHindi: boolean;
  hasEnglish: boolean;
}

/**
 * Immutable slice of input text with its script attributes
 */
export interface TextSpan {
  readonly content: string;
  readonly hasHindiScript: boolean;
  readonly hasEnglishScript: boolean;
}

/**
 * A literal term pulled out of a sentence before translation
 */
export interface PreservedTerm {
  index: number;
  originalText: string;
  /** Exact token written into the masked text */
  placeholder: string;
}

export interface PreservationResult {
  maskedText: string;
  terms: PreservedTerm[];
}

/**
 * External translation collaborator
 */
export interface TranslationService {
  translate(text: string, sourceLang: SourceLanguage, targetLang: TargetLanguage): Promise<string>;
}

export type TranslationResult =
  | { ok: true; text: string }
  | { ok: false; error: ServiceError; message: string };

export interface HistoryEntry {
  original: string;
  translation: string;
  submittedAt: string;
}

/**
 * History row using the column names shown to users
 */
export interface HistoryRow {
  Original: string;
  Translation: string;
}

/**
 * Sink for diagnostic lines
 */
export type Logger = (message: string) => void;
