/**
 * Fetch-based HTTP transport.
 *
 * @module http/transport
 */

import { NetworkError, cancelledError, throwIfAborted } from '../error/index.js';
import type { HttpClient, HttpRequest, HttpResponse } from './types.js';

export interface FetchTransportConfig {
  /** Default request timeout in milliseconds. */
  timeoutMs?: number;
}

/**
 * HTTP transport built on the global Fetch API.
 *
 * Transport failures become {@link NetworkError}s whose cause is the error
 * fetch raised, so system codes such as `ENOTFOUND` stay reachable through
 * the cause chain.
 *
 * @example
 * ```typescript
 * const transport = new FetchTransport({ timeoutMs: 10000 });
 * const response = await transport.send({
 *   method: 'GET',
 *   url: 'http://169.254.169.254/latest/meta-data/',
 *   headers: {},
 * });
 * ```
 */
export class FetchTransport implements HttpClient {
  private readonly timeoutMs: number;

  constructor(config: FetchTransportConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 30000;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const { signal } = request;
    throwIfAborted(signal);

    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const body = await response.text();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw cancelledError(signal.reason);
      }
      if (timedOut) {
        throw new NetworkError(`request timeout after ${timeoutMs}ms`, {
          operation: request.method,
          url: request.url,
          cause: error,
        });
      }
      // fetch reports transport failures as TypeError with the system error as cause
      if (error instanceof TypeError) {
        const detail = error.cause instanceof Error ? error.cause.message : error.message;
        throw new NetworkError(`${request.method} ${request.url}: ${detail}`, {
          operation: request.method,
          url: request.url,
          cause: error,
        });
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
