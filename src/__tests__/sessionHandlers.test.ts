/**
 * Tests for the hinglish:* IPC handlers
 */

import { Writable } from 'stream';
import { IPCMessage, setTransport } from '../ipc/protocol';
import { clearHandlers, dispatchMessage } from '../ipc/handlers';
import { registerSessionHandlers, EMPTY_INPUT_MESSAGE } from '../session/handlers';
import { SessionManager } from '../session/manager';
import { HinglishTranslator, FAILURE_MESSAGE } from '../core/hinglishTranslator';
import { ServiceError } from '../core/errors';
import { FakeTranslationService } from '../__mocks__/translationService';

interface OutputMessage {
  flow: string;
  action: string;
  data: Record<string, unknown>;
}

describe('Session handlers', () => {
  let capturedOutput: OutputMessage[];
  let service: FakeTranslationService;
  let manager: SessionManager;
  let counter = 0;

  const request = (action: string, data: Record<string, unknown> = {}): IPCMessage => ({
    flow: 'req',
    domain: 'hinglish',
    action,
    clientId: 'client-1',
    data,
    _msgId: `msg-${++counter}`,
  });

  /** Dispatch a request and return the last message written */
  const call = async (action: string, data: Record<string, unknown> = {}): Promise<OutputMessage> => {
    await dispatchMessage(request(action, data));
    return capturedOutput[capturedOutput.length - 1];
  };

  const startSession = async (): Promise<string> => {
    const response = await call('session-start');
    const sessionId = response.data.sessionId;
    if (typeof sessionId !== 'string') {
      throw new Error('session-start returned no sessionId');
    }
    return sessionId;
  };

  beforeEach(() => {
    capturedOutput = [];
    setTransport(new Writable({
      write(chunk: Buffer, _encoding, callback) {
        capturedOutput.push(JSON.parse(chunk.toString()));
        callback();
      },
    }));

    service = new FakeTranslationService();
    manager = new SessionManager(() => new HinglishTranslator(service));
    registerSessionHandlers(manager);
  });

  afterEach(() => {
    setTransport(process.stdout);
    clearHandlers();
  });

  it('should start a session', async () => {
    const response = await call('session-start');

    expect(response.flow).toBe('res');
    expect(response.data.success).toBe(true);
    expect(manager.size).toBe(1);
  });

  it('should translate within a session and list the history', async () => {
    const sessionId = await startSession();

    const translated = await call('translate', { sessionId, text: 'main theek hoon' });
    expect(translated.data).toEqual({
      success: true,
      original: 'main theek hoon',
      translation: '[auto→en] main theek hoon',
    });

    const history = await call('history', { sessionId });
    expect(history.data).toEqual({
      success: true,
      rows: [{ Original: 'main theek hoon', Translation: '[auto→en] main theek hoon' }],
    });
  });

  it('should ask for text when the input is blank', async () => {
    const sessionId = await startSession();

    const response = await call('translate', { sessionId, text: '  ' });

    expect(response.data).toEqual({ success: false, error: EMPTY_INPUT_MESSAGE });
    expect(service.calls).toHaveLength(0);
  });

  it('should report the failure message when the service fails', async () => {
    const sessionId = await startSession();
    service.failOnCall(0, new ServiceError('rate-limit', 'Too many requests', 429));

    const response = await call('translate', { sessionId, text: 'main theek hoon' });

    expect(response.data).toEqual({ success: false, error: FAILURE_MESSAGE });
    expect((await call('history', { sessionId })).data).toEqual({ success: true, rows: [] });
  });

  it('should reject unknown or missing sessions', async () => {
    expect((await call('translate', { text: 'hi' })).data).toEqual({ success: false, error: 'Missing sessionId' });
    expect((await call('history', { sessionId: 'nope' })).data).toEqual({
      success: false,
      error: 'Unknown session: nope',
    });
  });

  it('should end a session, broadcast it and forget it', async () => {
    const sessionId = await startSession();
    const before = capturedOutput.length;

    await dispatchMessage(request('session-end', { sessionId }));

    expect(capturedOutput.slice(before)).toEqual([
      { flow: 'brdc', domain: 'hinglish', action: 'session-ended', clientId: '*', data: { sessionId } },
      expect.objectContaining({ flow: 'res', data: { success: true, sessionId } }),
    ]);
    expect(manager.get(sessionId)).toBeUndefined();
    expect((await call('session-end', { sessionId })).data).toEqual({
      success: false,
      error: `Unknown session: ${sessionId}`,
    });
  });

  it('should report script mix and route', async () => {
    const response = await call('detect-script', { text: 'मैं movie dekhne ja raha hoon' });

    expect(response.data).toEqual({ success: true, hasHindi: true, hasEnglish: true, route: 'mixed' });
  });

  it('should segment text', async () => {
    const response = await call('segment', { text: 'Hello. राम।' });

    expect(response.data).toEqual({ success: true, sentences: ['Hello.', ' राम।'] });
  });

  it('should require text for detect-script and segment', async () => {
    expect((await call('detect-script')).data).toEqual({ success: false, error: 'Missing text' });
    expect((await call('segment')).data).toEqual({ success: false, error: 'Missing text' });
  });
});
