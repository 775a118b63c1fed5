/**
 * Translator IPC Handlers
 *
 * Request handlers for the `hinglish` domain. Each returns a plain object
 * with `success` and either the result fields or an `error` string.
 */

import { IPCMessage, getDataString, sendBroadcast, log } from '../ipc/protocol';
import { registerHandler, MessageHandler } from '../ipc/handlers';
import { detectScripts } from '../core/scriptDetector';
import { segmentText } from '../core/segmenter';
import { selectRoute } from '../core/router';
import { HistoryRow } from '../core/types';
import { SessionManager } from './manager';
import { TranslationSession } from './session';

export const DOMAIN = 'hinglish';
export const EMPTY_INPUT_MESSAGE = 'Please enter text to translate.';

export type HandlerResponse<T> = ({ success: true } & T) | { success: false; error: string };

/**
 * Resolve the message's session, or an error string
 */
function findSession(manager: SessionManager, message: IPCMessage): TranslationSession | string {
  const sessionId = getDataString(message, 'sessionId');
  if (!sessionId) {
    return 'Missing sessionId';
  }
  return manager.get(sessionId) ?? `Unknown session: ${sessionId}`;
}

export function createSessionHandlers(manager: SessionManager): Record<string, MessageHandler> {
  /**
   * Start a new session with empty history
   */
  function handleSessionStart(): HandlerResponse<{ sessionId: string }> {
    const session = manager.start();
    return { success: true, sessionId: session.id };
  }

  /**
   * Translate text within a session and record it in history
   */
  async function handleTranslate(
    message: IPCMessage
  ): Promise<HandlerResponse<{ original: string; translation: string }>> {
    const session = findSession(manager, message);
    if (typeof session === 'string') {
      return { success: false, error: session };
    }

    const text = getDataString(message, 'text') ?? '';
    if (!text.trim()) {
      return { success: false, error: EMPTY_INPUT_MESSAGE };
    }

    const result = await session.submit(text);
    if (!result.ok) {
      log(`[Session] Translation failed (${result.error.kind}): ${result.error.message}`);
      return { success: false, error: result.message };
    }

    return { success: true, original: text, translation: result.text };
  }

  function handleHistory(message: IPCMessage): HandlerResponse<{ rows: HistoryRow[] }> {
    const session = findSession(manager, message);
    if (typeof session === 'string') {
      return { success: false, error: session };
    }
    return { success: true, rows: session.getHistoryRows() };
  }

  function handleSessionEnd(message: IPCMessage): HandlerResponse<{ sessionId: string }> {
    const sessionId = getDataString(message, 'sessionId');
    if (!sessionId || !manager.end(sessionId)) {
      return { success: false, error: `Unknown session: ${sessionId ?? ''}` };
    }
    sendBroadcast(DOMAIN, 'session-ended', { sessionId });
    return { success: true, sessionId };
  }

  function handleDetectScript(
    message: IPCMessage
  ): HandlerResponse<{ hasHindi: boolean; hasEnglish: boolean; route: string }> {
    const text = getDataString(message, 'text');
    if (text === undefined) {
      return { success: false, error: 'Missing text' };
    }
    const mix = detectScripts(text);
    return { success: true, ...mix, route: selectRoute(mix).name };
  }

  function handleSegment(message: IPCMessage): HandlerResponse<{ sentences: string[] }> {
    const text = getDataString(message, 'text');
    if (text === undefined) {
      return { success: false, error: 'Missing text' };
    }
    return { success: true, sentences: segmentText(text).map(span => span.content) };
  }

  return {
    'session-start': handleSessionStart,
    'translate': handleTranslate,
    'history': handleHistory,
    'session-end': handleSessionEnd,
    'detect-script': handleDetectScript,
    'segment': handleSegment,
  };
}

/**
 * Register every `hinglish:*` handler
 */
export function registerSessionHandlers(manager: SessionManager): void {
  for (const [action, handler] of Object.entries(createSessionHandlers(manager))) {
    registerHandler(DOMAIN, action, handler);
  }
}
