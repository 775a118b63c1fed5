import * as readline from 'readline';
import { Readable } from 'stream';
import { IPCMessage, isIPCMessage, sendResponse, sendError, log } from './protocol';
import { errorMessage } from '../core/errors';

/**
 * Message handler function type
 */
export type MessageHandler = (message: IPCMessage) => Promise<unknown> | unknown;

/**
 * Registry of message handlers by domain:action
 */
const handlers = new Map<string, MessageHandler>();

/**
 * Register a handler for a specific domain:action
 */
export function registerHandler(
  domain: string,
  action: string,
  handler: MessageHandler
): void {
  const key = `${domain}:${action}`;
  handlers.set(key, handler);
  log(`Registered handler: ${key}`);
}

/**
 * Drop all registered handlers
 */
export function clearHandlers(): void {
  handlers.clear();
}

/**
 * Dispatch a parsed IPC message to the appropriate handler.
 * Handler failures on requests are answered with an error message.
 */
export async function dispatchMessage(message: IPCMessage): Promise<void> {
  const key = `${message.domain}:${message.action}`;

  log(`Parsed message - flow: ${message.flow}, domain: ${message.domain}, action: ${message.action}, _msgId: ${message._msgId || 'none'}`);

  const handler = handlers.get(key);
  if (!handler) {
    // For broadcast messages, no handler is not an error (just ignore)
    if (message.flow === 'brdc') {
      log(`No handler for broadcast: ${key} (ignoring)`);
      return;
    }

    log(`No handler for: ${key} (available: ${Array.from(handlers.keys()).join(', ')})`);
    sendError(message, `No handler registered for ${key}`);
    return;
  }

  let result: unknown;
  try {
    result = await handler(message);
  } catch (error) {
    log(`Handler failed for ${key}: ${errorMessage(error)}`);
    if (message.flow === 'req') {
      sendError(message, errorMessage(error));
    }
    return;
  }

  // Only send response for request messages, not broadcasts
  if (message.flow === 'req') {
    sendResponse(message, result);
    log(`Response sent for: ${key}`);
  }
}

/**
 * Parse one input line and dispatch it. Lines that are not valid
 * messages are logged and dropped.
 */
export async function handleLine(line: string): Promise<void> {
  log(`Received raw line: ${line.substring(0, 200)}${line.length > 200 ? '...' : ''}`);

  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (error) {
    log(`Failed to parse message: ${errorMessage(error)}`);
    return;
  }

  if (!isIPCMessage(parsed)) {
    log('Ignoring line that is not an IPC message');
    return;
  }

  await dispatchMessage(parsed);
}

/**
 * Start listening for IPC messages, one JSON object per line.
 * Resolves when the input closes.
 */
export function startListening(input: Readable = process.stdin): Promise<void> {
  const rl = readline.createInterface({
    input,
    terminal: false,
  });

  // Lines are handled in order so a session's history follows submission order
  let queue: Promise<void> = Promise.resolve();

  rl.on('line', (line: string) => {
    queue = queue.then(() => handleLine(line)).catch((error: unknown) => {
      log(`Error processing message: ${errorMessage(error)}`);
    });
  });

  log('IPC listener started');

  return new Promise((resolve) => {
    rl.on('close', () => {
      log('Input closed');
      resolve(queue);
    });
  });
}
