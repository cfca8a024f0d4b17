/**
 * Tests for the fetch transport
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { FetchTransport } from './transport.js';
import { NetworkError } from '../error/index.js';
import { ErrorClassifier } from '../error/classifier.js';

function hangingFetch() {
  return vi.fn(
    (_url: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(Object.assign(new Error('aborted'), { name: 'AbortError' })));
      })
  );
}

describe('FetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should send the request and collect the response', async () => {
    const fetchMock = vi.fn(
      async (_url: string | URL | Request, _init?: RequestInit) =>
        new Response('<ok/>', { status: 201, headers: { 'X-Amzn-RequestId': 'req-1' } })
    );
    vi.stubGlobal('fetch', fetchMock);

    const response = await new FetchTransport().send({
      method: 'POST',
      url: 'https://sts.us-east-1.amazonaws.com',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: 'Action=GetCallerIdentity',
    });

    expect(response.status).toBe(201);
    expect(response.body).toBe('<ok/>');
    expect(response.headers['x-amzn-requestid']).toBe('req-1');
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://sts.us-east-1.amazonaws.com');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('Action=GetCallerIdentity');
  });

  it('should wrap transport failures with their system cause', async () => {
    const cause = Object.assign(new Error('getaddrinfo ENOTFOUND sts.invalid'), { code: 'ENOTFOUND' });
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed', { cause });
      })
    );

    const failure = new FetchTransport().send({ method: 'GET', url: 'https://sts.invalid/', headers: {} });

    await expect(failure).rejects.toBeInstanceOf(NetworkError);
    await failure.catch((error: unknown) => {
      expect(error).toHaveProperty('message', 'GET https://sts.invalid/: getaddrinfo ENOTFOUND sts.invalid');
      expect(new ErrorClassifier().isNetworkReachabilityError(error)).toBe(true);
    });
  });

  it('should time out slow requests', async () => {
    vi.stubGlobal('fetch', hangingFetch());

    await expect(
      new FetchTransport({ timeoutMs: 5 }).send({ method: 'GET', url: 'http://169.254.169.254/', headers: {} })
    ).rejects.toMatchObject({ code: 'NETWORK', message: 'request timeout after 5ms' });
  });

  it('should report caller cancellation', async () => {
    vi.stubGlobal('fetch', hangingFetch());
    const controller = new AbortController();

    const pending = new FetchTransport().send({
      method: 'GET',
      url: 'http://169.254.169.254/',
      headers: {},
      signal: controller.signal,
    });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'CANCELLED' });
  });

  it('should not call fetch for an aborted signal', async () => {
    const fetchMock = hangingFetch();
    vi.stubGlobal('fetch', fetchMock);

    await expect(
      new FetchTransport().send({ method: 'GET', url: 'http://169.254.169.254/', headers: {}, signal: AbortSignal.abort() })
    ).rejects.toMatchObject({ code: 'CANCELLED' });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
