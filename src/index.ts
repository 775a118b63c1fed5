#!/usr/bin/env node

/**
 * Hinglish Translator Service
 *
 * Translates mixed Hindi/English text into English. Clients talk to it with
 * line-delimited JSON on stdin/stdout; logs go to stderr and the log file.
 */

import { startListening } from './ipc/handlers';
import { log } from './ipc/protocol';
import { getTranslatorSettings } from './config/settings';
import { GoogleTranslateClient } from './api/googleTranslate';
import { HinglishTranslator } from './core/hinglishTranslator';
import { SessionManager } from './session/manager';
import { registerSessionHandlers } from './session/handlers';
import { errorMessage } from './core/errors';

const VERSION = '1.0.0';

async function main(): Promise<void> {
  log(`Starting Hinglish translator v${VERSION}`);

  const sessions = new SessionManager(() => {
    const settings = getTranslatorSettings();
    return new HinglishTranslator(new GoogleTranslateClient({ baseUrl: settings.serviceUrl }), {
      placeholderPrefix: settings.placeholderPrefix,
      parallelSentences: settings.parallelSentences,
      logger: log,
    });
  });

  registerSessionHandlers(sessions);

  await startListening(process.stdin);

  sessions.endAll();
  log('Translator stopped');
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  log(`[Fatal] Uncaught exception: ${error.message}`);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  log(`[Fatal] Unhandled rejection: ${errorMessage(reason)}`);
  process.exit(1);
});

// Start
main().catch((error: unknown) => {
  log(`[Fatal] Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
