/**
 * HTTP transport tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  FetchHttpTransport,
  MockHttpTransport,
  jsonResponse,
  parseJsonObject,
} from '../src/core/transport.js';
import { AuthErrorKind } from '../src/errors/index.js';

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Fetch stand-in that never settles until its signal aborts.
 */
function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(abortError()));
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('FetchHttpTransport', () => {
  it('should return status, lower-cased headers and body', async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response('{"ok":true}', { status: 200, headers: { 'X-Request-Id': 'req-1' } })
    );
    vi.stubGlobal('fetch', fetchMock);

    const response = await new FetchHttpTransport().send({
      method: 'GET',
      url: 'https://api.example.test/thing',
      headers: { accept: 'application/json' },
    });

    expect(response.status).toBe(200);
    expect(response.body).toBe('{"ok":true}');
    expect(response.headers['x-request-id']).toBe('req-1');
    expect(fetchMock.mock.calls[0]?.[1]?.redirect).toBe('manual');
  });

  it('should refuse redirects', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(null, { status: 302, headers: { location: 'https://elsewhere.test' } }))
    );

    await expect(
      new FetchHttpTransport().send({ method: 'GET', url: 'https://api.example.test/a' })
    ).rejects.toMatchObject({
      kind: AuthErrorKind.AuthenticationFailed,
      statusCode: 302,
      message: 'Unexpected redirect from https://api.example.test/a to https://elsewhere.test',
    });
  });

  it('should reject oversized bodies', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('x'.repeat(64))));

    await expect(
      new FetchHttpTransport({ maxResponseSize: 16 }).send({
        method: 'GET',
        url: 'https://api.example.test/big',
      })
    ).rejects.toThrow(/^Response too large/);
  });

  it('should time out', async () => {
    vi.stubGlobal('fetch', vi.fn(hangingFetch));

    await expect(
      new FetchHttpTransport().send({
        method: 'GET',
        url: 'https://api.example.test/slow',
        timeout: 10,
      })
    ).rejects.toMatchObject({
      kind: AuthErrorKind.AuthenticationFailed,
      message: 'Request to https://api.example.test/slow timed out after 10ms',
    });
  });

  it('should report caller cancellation', async () => {
    vi.stubGlobal('fetch', vi.fn(hangingFetch));
    const controller = new AbortController();

    const pending = new FetchHttpTransport().send({
      method: 'POST',
      url: 'https://api.example.test/slow',
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toMatchObject({
      kind: AuthErrorKind.Cancelled,
      message: 'POST https://api.example.test/slow cancelled',
    });
  });

  it('should wrap network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(
      new FetchHttpTransport().send({ method: 'GET', url: 'https://api.example.test/down' })
    ).rejects.toThrow('Request to https://api.example.test/down failed: fetch failed');
  });
});

describe('MockHttpTransport', () => {
  it('should replay queued responses then the default', async () => {
    const transport = new MockHttpTransport()
      .queueJsonResponse(201, { id: 1 })
      .setDefaultResponse(jsonResponse(404, {}));

    const first = await transport.send({ method: 'GET', url: 'https://a.test' });
    const second = await transport.send({ method: 'GET', url: 'https://b.test' });

    expect(first.status).toBe(201);
    expect(first.statusText).toBe('OK');
    expect(second.status).toBe(404);
    expect(second.statusText).toBe('Error');
    expect(transport.getRequests().map((r) => r.url)).toEqual(['https://a.test', 'https://b.test']);
  });

  it('should compute responses from handlers', async () => {
    const transport = new MockHttpTransport().queueResponse((request) =>
      jsonResponse(200, { echoed: request.url })
    );

    const response = await transport.send({ method: 'GET', url: 'https://echo.test' });

    expect(JSON.parse(response.body)).toEqual({ echoed: 'https://echo.test' });
  });

  it('should fail when nothing is queued', async () => {
    await expect(
      new MockHttpTransport().send({ method: 'GET', url: 'https://a.test' })
    ).rejects.toThrow('No mock response available');
  });

  it('should clear history', async () => {
    const transport = new MockHttpTransport().setDefaultResponse(jsonResponse(200, {}));
    await transport.send({ method: 'GET', url: 'https://a.test' });

    transport.clearHistory();

    expect(transport.getRequests()).toEqual([]);
    expect(transport.getLastRequest()).toBeUndefined();
  });
});

describe('parseJsonObject', () => {
  it('should only accept JSON objects', () => {
    expect(parseJsonObject('{"a":1}')).toEqual({ a: 1 });
    expect(parseJsonObject('[1]')).toBeUndefined();
    expect(parseJsonObject('null')).toBeUndefined();
    expect(parseJsonObject('nope')).toBeUndefined();
  });
});
