/**
 * Hinglish translation library
 *
 * Script detection, segmentation, term preservation and routing, plus the
 * orchestrating translator. Bring your own TranslationService.
 */

export { HinglishTranslator, FAILURE_MESSAGE } from './hinglishTranslator';
export type { HinglishTranslatorOptions } from './hinglishTranslator';

export { detectScripts, createTextSpan } from './scriptDetector';
export { segmentText, SENTENCE_TERMINATORS } from './segmenter';
export {
  preserveTerms,
  restoreTerms,
  choosePlaceholderPrefix,
  DEFAULT_PLACEHOLDER_PREFIX,
} from './termPreserver';
export { selectRoute, routeSentence } from './router';
export type { RouteName, TranslationRoute, TranslationStep } from './router';

export { ServiceError, ConfigurationError, errorMessage } from './errors';
export type { ServiceErrorKind } from './errors';

export type {
  SourceLanguage,
  TargetLanguage,
  ScriptMix,
  TextSpan,
  PreservedTerm,
  PreservationResult,
  TranslationService,
  TranslationResult,
  HistoryEntry,
  HistoryRow,
  Logger,
} from './types';
