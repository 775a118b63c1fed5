/**
 * IPC Protocol for the translator service
 *
 * Messages are single JSON lines:
 * {
 *   flow: 'req' | 'res' | 'err' | 'brdc',
 *   domain: string,
 *   action: string,
 *   clientId: string,
 *   data: unknown,
 *   _msgId?: string
 * }
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Writable } from 'stream';

export type MessageFlow = 'req' | 'res' | 'err' | 'brdc';

export interface IPCMessage {
  flow: MessageFlow;
  domain: string;
  action: string;
  clientId: string;
  data: unknown;
  _msgId?: string;
}

const FLOWS: readonly string[] = ['req', 'res', 'err', 'brdc'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed JSON value as an IPC message
 */
export function isIPCMessage(value: unknown): value is IPCMessage {
  if (!isRecord(value)) return false;
  return (
    typeof value.flow === 'string' && FLOWS.includes(value.flow) &&
    typeof value.domain === 'string' &&
    typeof value.action === 'string' &&
    typeof value.clientId === 'string' &&
    (value._msgId === undefined || typeof value._msgId === 'string')
  );
}

/**
 * Read a string field from a message payload
 */
export function getDataString(message: IPCMessage, key: string): string | undefined {
  if (!isRecord(message.data)) return undefined;
  const value = message.data[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Output stream for sending messages (defaults to process.stdout)
 */
let outputStream: Writable = process.stdout;

/**
 * Set the output transport for all protocol messages
 */
export function setTransport(stream: Writable): void {
  outputStream = stream;
}

function writeMessage(message: IPCMessage): void {
  outputStream.write(`${JSON.stringify(message)}\n`);
}

/**
 * Send response message
 */
export function sendResponse(request: IPCMessage, data: unknown): void {
  writeMessage({
    flow: 'res',
    domain: request.domain,
    action: request.action,
    clientId: request.clientId,
    data,
    _msgId: request._msgId,
  });
}

/**
 * Send error message
 */
export function sendError(request: IPCMessage, error: Error | string): void {
  const errorMessage = typeof error === 'string' ? error : error.message;

  writeMessage({
    flow: 'err',
    domain: request.domain,
    action: request.action,
    clientId: request.clientId,
    data: {
      error: errorMessage,
    },
    _msgId: request._msgId,
  });
}

/**
 * Send broadcast message to every listening client
 */
export function sendBroadcast(domain: string, action: string, data: unknown): void {
  writeMessage({
    flow: 'brdc',
    domain,
    action,
    clientId: '*',
    data,
  });
}

// Log file path
const LOG_DIR = process.env.HINGLISH_LOG_DIR || path.join(os.homedir(), '.hinglish-translator', 'logs');
const LOG_FILE = path.join(LOG_DIR, 'translator.log');

let logDirReady = false;

/**
 * Create the log directory on first write
 */
function ensureLogDir(): void {
  if (logDirReady) {
    return;
  }
  fs.mkdirSync(LOG_DIR, { recursive: true });
  logDirReady = true;
}

/**
 * Log to both stderr and file
 */
export function log(message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const formattedMessage = `[${timestamp}] [hinglish] ${message}`;
  const fullMessage = args.length > 0
    ? `${formattedMessage} ${args.map(a => JSON.stringify(a)).join(' ')}`
    : formattedMessage;

  // stdout carries protocol messages, so logs go to stderr
  console.error(fullMessage);

  try {
    ensureLogDir();
    fs.appendFileSync(LOG_FILE, fullMessage + '\n', 'utf-8');
  } catch (error) {
    console.error('[hinglish] Failed to write to log file:', error);
  }
}
