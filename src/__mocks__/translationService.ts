/**
 * Fake translation service
 *
 * Deterministic stand-in for the external service. By default it returns
 * `[<source>→<target>] <text>`; tests can register exact responses or make
 * a given call fail.
 */

import { SourceLanguage, TargetLanguage, TranslationService } from '../core/types';

export interface RecordedCall {
  text: string;
  sourceLang: SourceLanguage;
  targetLang: TargetLanguage;
}

export class FakeTranslationService implements TranslationService {
  /** Track calls for assertions */
  readonly calls: RecordedCall[] = [];

  private responses = new Map<string, string>();
  private failures = new Map<number, Error>();

  /**
   * Return `response` whenever `text` is translated from `sourceLang` to `targetLang`
   */
  setResponse(text: string, sourceLang: SourceLanguage, targetLang: TargetLanguage, response: string): void {
    this.responses.set(`${sourceLang}:${targetLang}:${text}`, response);
  }

  /**
   * Make the call with this 0-based ordinal throw `error`
   */
  failOnCall(callIndex: number, error: Error): void {
    this.failures.set(callIndex, error);
  }

  async translate(text: string, sourceLang: SourceLanguage, targetLang: TargetLanguage): Promise<string> {
    const callIndex = this.calls.length;
    this.calls.push({ text, sourceLang, targetLang });

    const failure = this.failures.get(callIndex);
    if (failure) {
      throw failure;
    }

    return this.responses.get(`${sourceLang}:${targetLang}:${text}`) ?? `[${sourceLang}→${targetLang}] ${text}`;
  }
}
