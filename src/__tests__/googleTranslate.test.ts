/**
 * Tests for the Google Translate client (node-fetch is mocked)
 */

import fetch, { Response } from 'node-fetch';
import { GoogleTranslateClient, parseGtxResponse, MAX_TEXT_LENGTH } from '../api/googleTranslate';
import { ServiceError } from '../core/errors';

jest.mock('node-fetch', () => {
  const actual = jest.requireActual('node-fetch');
  return {
    __esModule: true,
    ...actual,
    default: jest.fn(),
  };
});

const mockFetch = jest.mocked(fetch);

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status });

describe('parseGtxResponse', () => {
  it('should join the first element of every segment', () => {
    const body = [[['I am going ', 'मैं जा', null], ['home.', 'रहा हूँ', null]], null, 'hi'];

    expect(parseGtxResponse(body)).toBe('I am going home.');
  });

  it('should reject other shapes', () => {
    expect(() => parseGtxResponse({ text: 'hi' })).toThrow(ServiceError);
    expect(() => parseGtxResponse([null])).toThrow('Unexpected response shape');
    expect(() => parseGtxResponse([[[42]]])).toThrow('Unexpected segment');
  });
});

describe('GoogleTranslateClient', () => {
  let client: GoogleTranslateClient;

  beforeEach(() => {
    mockFetch.mockReset();
    client = new GoogleTranslateClient({ baseUrl: 'http://translate.test/' });
  });

  it('should build a gtx request URL', () => {
    expect(client.buildUrl('kya haal hai', 'auto', 'en')).toBe(
      'http://translate.test/translate_a/single?client=gtx&sl=auto&tl=en&dt=t&q=kya+haal+hai'
    );
  });

  it('should return the translated text', async () => {
    mockFetch.mockResolvedValue(jsonResponse([[['How are you?', 'kya haal hai', null]], null, 'hi']));

    await expect(client.translate('  kya haal hai ', 'auto', 'en')).resolves.toBe('How are you?');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe(
      'http://translate.test/translate_a/single?client=gtx&sl=auto&tl=en&dt=t&q=kya+haal+hai'
    );
  });

  it('should not call the service for blank text', async () => {
    await expect(client.translate('   ', 'auto', 'en')).resolves.toBe('');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should not call the service when source and target match', async () => {
    await expect(client.translate('नमस्ते', 'hi', 'hi')).resolves.toBe('नमस्ते');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should refuse text over the length limit', async () => {
    const text = 'a'.repeat(MAX_TEXT_LENGTH + 1);

    await expect(client.translate(text, 'auto', 'en')).rejects.toMatchObject({ kind: 'invalid-request' });
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should report rate limiting', async () => {
    mockFetch.mockResolvedValue(new Response('Too Many Requests', { status: 429 }));

    await expect(client.translate('hello', 'auto', 'en')).rejects.toMatchObject({
      kind: 'rate-limit',
      status: 429,
    });
  });

  it('should report other HTTP errors with their status', async () => {
    mockFetch.mockResolvedValue(new Response('Service Unavailable', { status: 503 }));

    await expect(client.translate('hello', 'auto', 'en')).rejects.toMatchObject({
      kind: 'http',
      status: 503,
      message: 'Translation service error 503: Service Unavailable',
    });
  });

  it('should report network failures', async () => {
    mockFetch.mockRejectedValue(new Error('getaddrinfo ENOTFOUND translate.test'));

    await expect(client.translate('hello', 'auto', 'en')).rejects.toMatchObject({
      kind: 'network',
      message: 'Network error: getaddrinfo ENOTFOUND translate.test',
    });
  });

  it('should report a body that is not JSON', async () => {
    mockFetch.mockResolvedValue(new Response('<html>captcha</html>', { status: 200 }));

    await expect(client.translate('hello', 'auto', 'en')).rejects.toMatchObject({ kind: 'parse' });
  });

  it('should report JSON in an unexpected shape', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ error: 'nope' }));

    await expect(client.translate('hello', 'auto', 'en')).rejects.toMatchObject({ kind: 'parse' });
  });
});
