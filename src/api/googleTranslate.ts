/**
 * Google Translate client
 *
 * Calls the public "gtx" endpoint. The response body looks like
 * [[["translated", "original", ...], ["more", "text", ...]], null, "hi", ...]
 * and the translation is the concatenation of each segment's first element.
 */

import fetch from 'node-fetch';
import { ServiceError, errorMessage } from '../core/errors';
import { SourceLanguage, TargetLanguage, TranslationService } from '../core/types';
import { log } from '../ipc/protocol';
import { DEFAULT_SERVICE_URL } from '../config/settings';

/** The endpoint rejects longer queries */
export const MAX_TEXT_LENGTH = 5000;

export interface GoogleTranslateOptions {
  baseUrl?: string;
}

/**
 * Pull the translated text out of a gtx response body
 */
export function parseGtxResponse(body: unknown): string {
  if (!Array.isArray(body) || !Array.isArray(body[0])) {
    throw new ServiceError('parse', 'Unexpected response shape from translation service');
  }

  const segments: unknown[] = body[0];
  let translated = '';
  for (const segment of segments) {
    if (!Array.isArray(segment) || typeof segment[0] !== 'string') {
      throw new ServiceError('parse', 'Unexpected segment in translation response');
    }
    translated += segment[0];
  }
  return translated;
}

export class GoogleTranslateClient implements TranslationService {
  private readonly baseUrl: string;

  constructor(options: GoogleTranslateOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_SERVICE_URL).replace(/\/+$/, '');
  }

  /**
   * Build the request URL for one translation
   */
  buildUrl(text: string, sourceLang: SourceLanguage, targetLang: TargetLanguage): string {
    const params = new URLSearchParams({
      client: 'gtx',
      sl: sourceLang,
      tl: targetLang,
      dt: 't',
      q: text,
    });
    return `${this.baseUrl}/translate_a/single?${params.toString()}`;
  }

  /**
   * Translate text with one request.
   *
   * Blank text, and text whose source already equals the target, come back
   * unchanged without a request.
   *
   * @throws ServiceError on transport, HTTP, quota or parse failure
   */
  async translate(text: string, sourceLang: SourceLanguage, targetLang: TargetLanguage): Promise<string> {
    if (text.length > MAX_TEXT_LENGTH) {
      throw new ServiceError(
        'invalid-request',
        `Text too long: ${text.length} characters (max ${MAX_TEXT_LENGTH})`
      );
    }

    const trimmed = text.trim();
    if (trimmed.length === 0 || sourceLang === targetLang) {
      return trimmed;
    }

    log(`[GoogleTranslate] ${sourceLang} → ${targetLang} (${trimmed.length} chars)`);

    let body: string;
    try {
      const response = await fetch(this.buildUrl(trimmed, sourceLang, targetLang));

      if (!response.ok) {
        const errorText = await response.text();
        if (response.status === 429) {
          throw new ServiceError('rate-limit', 'Translation service rate limit exceeded', 429);
        }
        throw new ServiceError(
          'http',
          `Translation service error ${response.status}: ${errorText.substring(0, 200)}`,
          response.status
        );
      }

      body = await response.text();
    } catch (error) {
      if (error instanceof ServiceError) {
        throw error;
      }
      throw new ServiceError('network', `Network error: ${errorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      throw new ServiceError('parse', `Invalid JSON from translation service: ${errorMessage(error)}`);
    }

    return parseGtxResponse(parsed);
  }
}
