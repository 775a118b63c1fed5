import { randomUUID } from 'crypto';
import { HinglishTranslator } from '../core/hinglishTranslator';
import { log } from '../ipc/protocol';
import { TranslationSession } from './session';

/**
 * Creates the translator for a new session
 */
export type TranslatorFactory = () => HinglishTranslator;

/**
 * Tracks live sessions by id
 */
export class SessionManager {
  private readonly sessions = new Map<string, TranslationSession>();
  private readonly createTranslator: TranslatorFactory;

  constructor(createTranslator: TranslatorFactory) {
    this.createTranslator = createTranslator;
  }

  get size(): number {
    return this.sessions.size;
  }

  start(): TranslationSession {
    const session = new TranslationSession(randomUUID(), this.createTranslator());
    this.sessions.set(session.id, session);
    log(`[Session] Started ${session.id}`);
    return session;
  }

  get(id: string): TranslationSession | undefined {
    return this.sessions.get(id);
  }

  /**
   * End and forget a session. Returns false if it was not live.
   */
  end(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }
    session.end();
    this.sessions.delete(id);
    return true;
  }

  endAll(): void {
    for (const id of [...this.sessions.keys()]) {
      this.end(id);
    }
  }
}
