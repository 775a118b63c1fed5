/**
 * Hinglish Translator
 *
 * Segments input into sentences and translates each one through the route
 * picked for its script mix, keeping proper nouns, numbers and dates intact.
 *
 * Failures come back as a tagged result rather than an exception: the first
 * ServiceError stops the remaining sentences and yields FAILURE_MESSAGE.
 */

import { ServiceError, errorMessage } from './errors';
import { segmentText } from './segmenter';
import { preserveTerms, restoreTerms, choosePlaceholderPrefix, DEFAULT_PLACEHOLDER_PREFIX } from './termPreserver';
import { routeSentence } from './router';
import { Logger, TextSpan, TranslationResult, TranslationService } from './types';

export const FAILURE_MESSAGE = 'Translation failed. Please try again.';

export interface HinglishTranslatorOptions {
  /** Prefix of the tokens that stand in for preserved terms */
  placeholderPrefix?: string;
  /** Translate sentences concurrently; output order is unchanged */
  parallelSentences?: boolean;
  /** Receives `[Translator]` and `[Router]` lines; silent when omitted */
  logger?: Logger;
}

export class HinglishTranslator {
  private readonly service: TranslationService;
  private readonly placeholderPrefix: string;
  private readonly parallelSentences: boolean;
  private readonly log: Logger;

  constructor(service: TranslationService, options: HinglishTranslatorOptions = {}) {
    this.service = service;
    this.placeholderPrefix = options.placeholderPrefix ?? DEFAULT_PLACEHOLDER_PREFIX;
    this.parallelSentences = options.parallelSentences ?? false;
    this.log = options.logger ?? (() => undefined);

    // Reject a bad prefix at construction rather than on first use
    choosePlaceholderPrefix('', this.placeholderPrefix);
  }

  /**
   * Translate full text into English.
   * Blank input returns an empty string without calling the service.
   */
  async translate(text: string): Promise<TranslationResult> {
    if (!text.trim()) {
      return { ok: true, text: '' };
    }

    const sentences = segmentText(text).filter(span => span.content.trim().length > 0);
    this.log(`[Translator] Translating ${sentences.length} sentence(s)${this.parallelSentences ? ' in parallel' : ''}`);

    try {
      const parts = this.parallelSentences
        ? await Promise.all(sentences.map(span => this.translateSentence(span)))
        : await this.translateSequentially(sentences);

      return { ok: true, text: parts.join(' ') };
    } catch (error) {
      const serviceError = error instanceof ServiceError
        ? error
        : new ServiceError('unexpected', errorMessage(error));
      this.log(`[Translator] Translation error: ${serviceError.message}`);
      return { ok: false, error: serviceError, message: FAILURE_MESSAGE };
    }
  }

  /**
   * Translate and report: the translated text, or FAILURE_MESSAGE.
   * Never rejects.
   */
  async translateOrReport(text: string): Promise<string> {
    const result = await this.translate(text);
    return result.ok ? result.text : result.message;
  }

  private async translateSequentially(sentences: TextSpan[]): Promise<string[]> {
    const parts: string[] = [];
    for (const span of sentences) {
      parts.push(await this.translateSentence(span));
    }
    return parts;
  }

  private async translateSentence(span: TextSpan): Promise<string> {
    const { maskedText, terms } = preserveTerms(span.content, this.placeholderPrefix);
    const translated = await routeSentence(
      maskedText,
      { hasHindi: span.hasHindiScript, hasEnglish: span.hasEnglishScript },
      this.service,
      this.log
    );
    return restoreTerms(translated, terms);
  }
}
