/**
 * Translation session
 *
 * Holds the translator and the history of one user session. History is
 * append-only, in submission order, and lives only as long as the session.
 */

import { HinglishTranslator } from '../core/hinglishTranslator';
import { HistoryEntry, HistoryRow, TranslationResult } from '../core/types';
import { log } from '../ipc/protocol';

export class TranslationSession {
  readonly id: string;
  readonly createdAt: string;
  private readonly translator: HinglishTranslator;
  private history: HistoryEntry[] = [];
  private ended = false;

  constructor(id: string, translator: HinglishTranslator) {
    this.id = id;
    this.translator = translator;
    this.createdAt = new Date().toISOString();
  }

  get isEnded(): boolean {
    return this.ended;
  }

  /**
   * Translate text and record it in history when it succeeds.
   * Blank input is not recorded.
   */
  async submit(text: string): Promise<TranslationResult> {
    if (this.ended) {
      throw new Error(`Session ${this.id} has ended`);
    }

    const result = await this.translator.translate(text);

    // Re-check: the session may have ended while the translation was in flight
    if (result.ok && text.trim() && !this.ended) {
      this.history.push({
        original: text,
        translation: result.text,
        submittedAt: new Date().toISOString(),
      });
      log(`[Session] ${this.id}: history now has ${this.history.length} entries`);
    }

    return result;
  }

  getHistory(): readonly HistoryEntry[] {
    return this.history.map(entry => ({ ...entry }));
  }

  getHistoryRows(): HistoryRow[] {
    return this.history.map(entry => ({
      Original: entry.original,
      Translation: entry.translation,
    }));
  }

  /**
   * End the session and discard its history
   */
  end(): void {
    this.ended = true;
    this.history = [];
    log(`[Session] ${this.id} ended`);
  }
}
