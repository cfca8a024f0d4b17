/**
 * AWS Signature Version 4 (SigV4) request signing.
 *
 * @see https://docs.aws.amazon.com/general/latest/gr/signature-version-4.html
 *
 * @module signing/v4
 */

import * as crypto from 'crypto';
import type { HttpRequest } from '../http/types.js';

/**
 * AWS Signature V4 algorithm identifier.
 */
const ALGORITHM = 'AWS4-HMAC-SHA256';

/**
 * Termination string for signing key derivation.
 */
const AWS4_REQUEST = 'aws4_request';

/**
 * Credentials used to sign a request.
 */
export interface SigningCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

/**
 * Signing parameters
 */
export interface SigningParams {
  /** AWS region */
  region: string;
  /** AWS service name */
  service: string;
  /** AWS credentials */
  credentials: SigningCredentials;
  /** Request date (defaults to now) */
  date?: Date;
}

/**
 * Request signer interface
 */
export interface RequestSigner {
  /**
   * Return a copy of the request carrying authentication headers.
   */
  sign(request: HttpRequest, params: SigningParams): HttpRequest;
}

function sha256Hex(data: string): string {
  return crypto.createHash('sha256').update(data, 'utf8').digest('hex');
}

function hmac(key: crypto.BinaryLike, data: string): Buffer {
  return crypto.createHmac('sha256', key).update(data, 'utf8').digest();
}

/**
 * Format a date as `YYYYMMDD'T'HHMMSS'Z'`.
 */
export function formatAmzDate(date: Date): string {
  return date.toISOString().replace(/[:-]|\.\d{3}/g, '');
}

/**
 * RFC 3986 encoding as SigV4 expects it.
 */
function uriEncode(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

function canonicalQueryString(params: URLSearchParams): string {
  return [...params.entries()]
    .map(([key, value]) => [uriEncode(key), uriEncode(value)] as const)
    .sort(([a, av], [b, bv]) => (a === b ? (av < bv ? -1 : av > bv ? 1 : 0) : a < b ? -1 : 1))
    .map(([key, value]) => `${key}=${value}`)
    .join('&');
}

/**
 * Derive the signing key for a date, region and service.
 */
export function deriveSigningKey(secretAccessKey: string, dateStamp: string, region: string, service: string): Buffer {
  const kDate = hmac(`AWS4${secretAccessKey}`, dateStamp);
  const kRegion = hmac(kDate, region);
  const kService = hmac(kRegion, service);
  return hmac(kService, AWS4_REQUEST);
}

/**
 * SigV4 signer using Node's crypto module.
 *
 * @example
 * ```typescript
 * const signed = new SigV4Signer().sign(request, {
 *   region: 'us-east-1',
 *   service: 'sts',
 *   credentials,
 * });
 * ```
 */
export class SigV4Signer implements RequestSigner {
  sign(request: HttpRequest, params: SigningParams): HttpRequest {
    const url = new URL(request.url);
    const amzDate = formatAmzDate(params.date ?? new Date());
    const dateStamp = amzDate.slice(0, 8);
    const body = request.body ?? '';
    const payloadHash = sha256Hex(body);

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(request.headers)) {
      headers[name.toLowerCase()] = value;
    }
    headers['host'] = url.host;
    headers['x-amz-date'] = amzDate;
    if (params.credentials.sessionToken) {
      headers['x-amz-security-token'] = params.credentials.sessionToken;
    }

    // user-agent stays out of the signature
    const signedNames = Object.keys(headers)
      .filter((name) => name !== 'user-agent')
      .sort();
    const canonicalHeaders = signedNames
      .map((name) => `${name}:${(headers[name] ?? '').trim().replace(/\s+/g, ' ')}\n`)
      .join('');
    const signedHeaders = signedNames.join(';');

    const canonicalRequest = [
      request.method.toUpperCase(),
      url.pathname || '/',
      canonicalQueryString(url.searchParams),
      canonicalHeaders,
      signedHeaders,
      payloadHash,
    ].join('\n');

    const scope = `${dateStamp}/${params.region}/${params.service}/${AWS4_REQUEST}`;
    const stringToSign = [ALGORITHM, amzDate, scope, sha256Hex(canonicalRequest)].join('\n');
    const signingKey = deriveSigningKey(params.credentials.secretAccessKey, dateStamp, params.region, params.service);
    const signature = crypto.createHmac('sha256', signingKey).update(stringToSign, 'utf8').digest('hex');

    headers['authorization'] =
      `${ALGORITHM} Credential=${params.credentials.accessKeyId}/${scope}, ` +
      `SignedHeaders=${signedHeaders}, Signature=${signature}`;

    return { ...request, headers };
  }
}
