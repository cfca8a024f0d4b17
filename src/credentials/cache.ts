/**
 * Caching credential provider.
 *
 * @module credentials/cache
 */

import { cancelledError, throwIfAborted } from '../error/index.js';
import type { AwsCredentials, CredentialProvider, RetrieveOptions } from '../types/common.js';

/**
 * Configuration for the credential cache.
 */
export interface CacheOptions {
  /**
   * Time before expiration at which cached credentials count as expired,
   * in milliseconds. Defaults to 5 minutes.
   */
  expiryWindowMs?: number;

  /** Clock, for tests. */
  now?: () => number;
}

/**
 * Default expiry window: 5 minutes before expiration.
 */
const DEFAULT_EXPIRY_WINDOW_MS = 5 * 60 * 1000;

/**
 * A shared upstream call and the callers still waiting on it.
 */
interface Refresh {
  readonly promise: Promise<AwsCredentials>;
  readonly controller: AbortController;
  waiters: number;
}

function cloneCredentials(credentials: AwsCredentials): AwsCredentials {
  return {
    ...credentials,
    ...(credentials.expiration ? { expiration: new Date(credentials.expiration.getTime()) } : {}),
  };
}

/**
 * Settle with `promise`, or reject with `CANCELLED` as soon as `signal` fires.
 */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancelledError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Wraps exactly one upstream provider and serves its credentials until they
 * expire.
 *
 * Refreshes are single-flight: concurrent callers that find the cache empty
 * or expired share one upstream call and observe the same result. A failed
 * refresh leaves the cache empty, and the next caller starts a new one.
 * Credentials without an expiration never expire.
 *
 * A caller's signal cancels only that caller's wait. The upstream call is
 * aborted once every waiter has given up on it.
 *
 * @example
 * ```typescript
 * const cached = new CachingCredentialProvider(new ImdsCredentialProvider(client));
 * const [a, b] = await Promise.all([cached.retrieve(), cached.retrieve()]);
 * // one metadata round-trip
 * ```
 */
export class CachingCredentialProvider implements CredentialProvider {
  private readonly upstream: CredentialProvider;
  private readonly expiryWindowMs: number;
  private readonly now: () => number;
  private cached: AwsCredentials | undefined;
  private inFlight: Refresh | undefined;

  constructor(upstream: CredentialProvider, options: CacheOptions = {}) {
    this.upstream = upstream;
    this.expiryWindowMs = options.expiryWindowMs ?? DEFAULT_EXPIRY_WINDOW_MS;
    this.now = options.now ?? Date.now;
  }

  async retrieve(options: RetrieveOptions = {}): Promise<AwsCredentials> {
    const { signal } = options;
    throwIfAborted(signal);

    if (this.cached && !this.isExpired()) {
      return cloneCredentials(this.cached);
    }

    const refresh = this.inFlight ?? this.startRefresh();
    refresh.waiters++;
    try {
      return cloneCredentials(await untilAborted(refresh.promise, signal));
    } finally {
      refresh.waiters--;
      if (refresh.waiters === 0 && signal?.aborted) {
        this.abandon(refresh, signal.reason);
      }
    }
  }

  /**
   * Whether the cached credentials are missing or inside the expiry window.
   */
  isExpired(): boolean {
    if (!this.cached) {
      return true;
    }
    if (!this.cached.expiration) {
      return false;
    }
    return this.cached.expiration.getTime() - this.expiryWindowMs <= this.now();
  }

  /**
   * Drop the cached credentials so the next call goes upstream.
   */
  invalidate(): void {
    this.cached = undefined;
  }

  private startRefresh(): Refresh {
    const controller = new AbortController();
    const promise = this.refresh(controller.signal).finally(() => {
      if (this.inFlight?.promise === promise) {
        this.inFlight = undefined;
      }
    });
    const refresh: Refresh = { promise, controller, waiters: 0 };
    this.inFlight = refresh;
    return refresh;
  }

  private abandon(refresh: Refresh, reason: unknown): void {
    if (this.inFlight === refresh) {
      this.inFlight = undefined;
    }
    refresh.controller.abort(reason);
  }

  private async refresh(signal: AbortSignal): Promise<AwsCredentials> {
    this.cached = undefined;
    const credentials = await this.upstream.retrieve({ signal });
    this.cached = cloneCredentials(credentials);
    return credentials;
  }
}
