/**
 * Mock infrastructure for testing.
 */

import { NetworkError, cancelledError } from '../error/index.js';
import type { HttpClient, HttpRequest, HttpResponse } from '../http/types.js';
import { sleep } from '../resilience/retry.js';

/**
 * Selects the requests a mock reply applies to. Unset fields match anything.
 */
export interface MockRoute {
  method?: string;
  /** URL path, without the query string. */
  path?: string;
  /** URL origin, for example `http://169.254.169.254`. */
  origin?: string;
  /** `Action` parameter of a form-encoded body. */
  action?: string;
}

/**
 * Mock reply: a response, or an error thrown by `send`.
 */
export type MockReply =
  | { status: number; body?: string; headers?: Record<string, string>; delayMs?: number }
  | { error: unknown; delayMs?: number };

interface RouteEntry {
  route: MockRoute;
  replies: MockReply[];
}

/**
 * Parameters of a form-encoded request body.
 */
export function formParams(request: HttpRequest): URLSearchParams {
  return new URLSearchParams(request.body ?? '');
}

function matches(route: MockRoute, request: HttpRequest): boolean {
  const url = new URL(request.url);
  if (route.method !== undefined && route.method !== request.method) {
    return false;
  }
  if (route.path !== undefined && route.path !== url.pathname) {
    return false;
  }
  if (route.origin !== undefined && route.origin !== url.origin) {
    return false;
  }
  if (route.action !== undefined && route.action !== formParams(request).get('Action')) {
    return false;
  }
  return true;
}

/**
 * In-process {@link HttpClient} with routed, queued replies.
 *
 * Routes are checked in registration order. Each route replays its queued
 * replies in order and repeats the last one once the queue is down to one.
 * Unmatched requests get the default reply (HTTP 404, empty body).
 *
 * @example
 * ```typescript
 * const http = new MockHttpClient()
 *   .on({ action: 'GetCallerIdentity' }, stsCallerIdentityReply('123456789012'));
 * ```
 */
export class MockHttpClient implements HttpClient {
  private readonly routes: RouteEntry[] = [];
  private readonly recorded: HttpRequest[] = [];

  constructor(private readonly defaultReply: MockReply = { status: 404, body: '' }) {}

  /**
   * Queue one or more replies for a route.
   */
  on(route: MockRoute, ...replies: MockReply[]): this {
    const existing = this.routes.find((entry) => sameRoute(entry.route, route));
    if (existing) {
      existing.replies.push(...replies);
    } else {
      this.routes.push({ route, replies: [...replies] });
    }
    return this;
  }

  /**
   * Every request sent so far.
   */
  get requests(): readonly HttpRequest[] {
    return [...this.recorded];
  }

  /**
   * Requests matching a route.
   */
  requestsFor(route: MockRoute): HttpRequest[] {
    return this.recorded.filter((request) => matches(route, request));
  }

  clearRequests(): this {
    this.recorded.length = 0;
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw cancelledError(request.signal.reason);
    }
    this.recorded.push(request);

    const reply = this.nextReply(request);
    if (reply.delayMs) {
      await sleep(reply.delayMs, request.signal);
    }

    if ('error' in reply) {
      throw reply.error;
    }
    return {
      status: reply.status,
      headers: reply.headers ?? {},
      body: reply.body ?? '',
    };
  }

  private nextReply(request: HttpRequest): MockReply {
    const entry = this.routes.find((candidate) => matches(candidate.route, request));
    if (!entry || entry.replies.length === 0) {
      return this.defaultReply;
    }
    if (entry.replies.length > 1) {
      return entry.replies.shift() ?? this.defaultReply;
    }
    return entry.replies[0] ?? this.defaultReply;
  }
}

function sameRoute(a: MockRoute, b: MockRoute): boolean {
  return a.method === b.method && a.path === b.path && a.origin === b.origin && a.action === b.action;
}

// ============================================================================
// Mock Fixtures
// ============================================================================

/**
 * Temporary credentials used in STS and metadata fixtures.
 */
export interface FixtureCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  expiration: Date;
}

export function fixtureCredentials(overrides: Partial<FixtureCredentials> = {}): FixtureCredentials {
  return {
    accessKeyId: 'ASIATESTASSUMED',
    secretAccessKey: 'test-secret-assumed',
    sessionToken: 'test-session-token',
    expiration: new Date(Date.now() + 60 * 60 * 1000),
    ...overrides,
  };
}

function credentialsXml(credentials: FixtureCredentials): string {
  return [
    '<Credentials>',
    `<AccessKeyId>${credentials.accessKeyId}</AccessKeyId>`,
    `<SecretAccessKey>${credentials.secretAccessKey}</SecretAccessKey>`,
    `<SessionToken>${credentials.sessionToken}</SessionToken>`,
    `<Expiration>${credentials.expiration.toISOString()}</Expiration>`,
    '</Credentials>',
  ].join('');
}

/**
 * Successful AssumeRole reply.
 */
export function stsAssumeRoleReply(credentials: FixtureCredentials = fixtureCredentials()): MockReply {
  return {
    status: 200,
    body:
      '<AssumeRoleResponse xmlns="https://sts.amazonaws.com/doc/2011-06-15/"><AssumeRoleResult>' +
      credentialsXml(credentials) +
      '<AssumedRoleUser><Arn>arn:aws:sts::123456789012:assumed-role/Test/session</Arn></AssumedRoleUser>' +
      '</AssumeRoleResult><ResponseMetadata><RequestId>req-assume</RequestId></ResponseMetadata></AssumeRoleResponse>',
  };
}

/**
 * Successful AssumeRoleWithWebIdentity reply.
 */
export function stsWebIdentityReply(credentials: FixtureCredentials = fixtureCredentials()): MockReply {
  return {
    status: 200,
    body:
      '<AssumeRoleWithWebIdentityResponse xmlns="https://sts.amazonaws.com/doc/2011-06-15/"><AssumeRoleWithWebIdentityResult>' +
      credentialsXml(credentials) +
      '</AssumeRoleWithWebIdentityResult></AssumeRoleWithWebIdentityResponse>',
  };
}

/**
 * Successful GetCallerIdentity reply.
 */
export function stsCallerIdentityReply(
  account = '123456789012',
  arn = `arn:aws:iam::${account}:user/test`
): MockReply {
  return {
    status: 200,
    body:
      '<GetCallerIdentityResponse xmlns="https://sts.amazonaws.com/doc/2011-06-15/"><GetCallerIdentityResult>' +
      `<Arn>${arn}</Arn><UserId>AIDATESTUSER</UserId><Account>${account}</Account>` +
      '</GetCallerIdentityResult></GetCallerIdentityResponse>',
  };
}

/**
 * STS error reply.
 */
export function stsErrorReply(code: string, message: string, status = 403): MockReply {
  return {
    status,
    body:
      `<ErrorResponse><Error><Type>Sender</Type><Code>${code}</Code><Message>${message}</Message></Error>` +
      '<RequestId>req-error</RequestId></ErrorResponse>',
  };
}

/**
 * Instance or container metadata credentials document.
 */
export function metadataCredentialsReply(credentials: FixtureCredentials = fixtureCredentials()): MockReply {
  return {
    status: 200,
    body: JSON.stringify({
      Code: 'Success',
      Type: 'AWS-HMAC',
      AccessKeyId: credentials.accessKeyId,
      SecretAccessKey: credentials.secretAccessKey,
      Token: credentials.sessionToken,
      Expiration: credentials.expiration.toISOString(),
    }),
  };
}

/**
 * Plain-text reply.
 */
export function textReply(body: string, status = 200): MockReply {
  return { status, body };
}

function systemError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

/**
 * Transport failure caused by a DNS lookup failure.
 */
export function hostNotFoundError(host = 'sts.us-east-1.amazonaws.com'): NetworkError {
  return new NetworkError(`request to https://${host}/ failed`, {
    cause: systemError('ENOTFOUND', `getaddrinfo ENOTFOUND ${host}`),
  });
}

/**
 * Transport failure caused by a refused connection.
 */
export function connectionRefusedError(address = '127.0.0.1:443'): NetworkError {
  return new NetworkError(`request to ${address} failed`, {
    cause: systemError('ECONNREFUSED', `connect ECONNREFUSED ${address}`),
  });
}

/**
 * Transport failure that is not a reachability problem.
 */
export function connectionResetError(): NetworkError {
  return new NetworkError('socket hang up', { cause: systemError('ECONNRESET', 'read ECONNRESET') });
}
