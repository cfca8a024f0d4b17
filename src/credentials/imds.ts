/**
 * EC2 Instance Metadata Service (IMDS) client and credential provider.
 *
 * @module credentials/imds
 */

import { z } from 'zod';
import { CredentialChainError, metadataError } from '../error/index.js';
import type { HttpClient, HttpResponse } from '../http/types.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { RetryPolicy } from '../resilience/retry.js';
import type { AwsCredentials, CredentialProvider, RetrieveOptions } from '../types/common.js';
import { assertMetadataResponse, parseMetadataCredentials } from './metadata.js';
import { EC2_ROLE_SOURCE } from './sources.js';

/**
 * Default IMDS endpoint.
 */
export const DEFAULT_IMDS_ENDPOINT = 'http://169.254.169.254';

/**
 * IMDS API paths.
 */
export const IMDS_PATHS = {
  TOKEN: '/latest/api/token',
  ROLE: '/latest/meta-data/iam/security-credentials/',
  IDENTITY_DOCUMENT: '/latest/dynamic/instance-identity/document',
} as const;

/** Session token lifetime requested from IMDS, in seconds. */
const TOKEN_TTL_SECONDS = 21600;

/** Token reuse window; refreshed an hour before IMDS expires it. */
const TOKEN_REUSE_MS = 5 * 60 * 60 * 1000;

const IdentityDocumentSchema = z.object({
  region: z.string().min(1),
});

/**
 * Configuration for the IMDS client.
 */
export interface ImdsClientConfig {
  httpClient: HttpClient;
  /** IMDS endpoint URL. */
  endpoint?: string;
  /** Timeout for each request in milliseconds. Defaults to 1000ms. */
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  userAgent?: string;
  logger?: Logger;
}

/**
 * Minimal IMDSv2 client.
 *
 * Obtains a session token with `PUT /latest/api/token` and sends it on every
 * read. When the token endpoint answers 404 or 405 the client falls back to
 * IMDSv1 reads without a token.
 */
export class ImdsClient {
  readonly endpoint: string;
  private readonly httpClient: HttpClient;
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly userAgent?: string;
  private readonly logger: Logger;

  private sessionToken: string | null = null;
  private sessionTokenExpiry = 0;

  constructor(config: ImdsClientConfig) {
    this.endpoint = (config.endpoint ?? DEFAULT_IMDS_ENDPOINT).replace(/\/+$/, '');
    this.httpClient = config.httpClient;
    this.timeoutMs = config.timeoutMs ?? 1000;
    this.retryPolicy = config.retryPolicy ?? new RetryPolicy();
    this.userAgent = config.userAgent;
    this.logger = config.logger ?? new NoopLogger();
  }

  /**
   * Read a metadata path as text.
   */
  async get(path: string, options: RetrieveOptions = {}): Promise<string> {
    return this.retryPolicy.execute(
      async ({ signal }) => {
        const token = await this.ensureSessionToken(signal);
        const headers = this.baseHeaders();
        if (token) {
          headers['x-aws-ec2-metadata-token'] = token;
        }

        const response = await this.httpClient.send({
          method: 'GET',
          url: `${this.endpoint}${path}`,
          headers,
          timeoutMs: this.timeoutMs,
          signal,
        });

        if (response.status === 401) {
          // token rejected; fetch a new one on the next attempt
          this.sessionToken = null;
          throw metadataError(`IMDS GET ${path}: HTTP 401`, { statusCode: 401, retryable: true });
        }
        assertMetadataResponse(response, `IMDS GET ${path}`);
        return response.body;
      },
      { signal: options.signal, operationName: 'imds:get' }
    );
  }

  /**
   * Region of the instance, from the instance identity document.
   */
  async getInstanceRegion(options: RetrieveOptions = {}): Promise<string> {
    const body = await this.get(IMDS_PATHS.IDENTITY_DOCUMENT, options);
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw metadataError('IMDS instance identity document is not JSON', { cause: error });
    }
    const result = IdentityDocumentSchema.safeParse(json);
    if (!result.success) {
      throw metadataError('IMDS instance identity document has no region', { cause: result.error });
    }
    return result.data.region;
  }

  private baseHeaders(): Record<string, string> {
    return this.userAgent ? { 'user-agent': this.userAgent } : {};
  }

  /**
   * Returns a valid session token, or null when IMDSv1 is in use.
   */
  private async ensureSessionToken(signal?: AbortSignal): Promise<string | null> {
    if (this.sessionToken && Date.now() < this.sessionTokenExpiry) {
      return this.sessionToken;
    }

    const response: HttpResponse = await this.httpClient.send({
      method: 'PUT',
      url: `${this.endpoint}${IMDS_PATHS.TOKEN}`,
      headers: {
        ...this.baseHeaders(),
        'x-aws-ec2-metadata-token-ttl-seconds': String(TOKEN_TTL_SECONDS),
      },
      timeoutMs: this.timeoutMs,
      signal,
    });

    if (response.status === 404 || response.status === 405) {
      this.logger.debug('IMDSv2 token endpoint unavailable, using IMDSv1');
      return null;
    }
    assertMetadataResponse(response, 'IMDS session token');

    this.sessionToken = response.body.trim();
    this.sessionTokenExpiry = Date.now() + TOKEN_REUSE_MS;
    return this.sessionToken;
  }
}

/**
 * Provider that retrieves role credentials from the EC2 instance metadata
 * service.
 *
 * @example
 * ```typescript
 * const provider = new ImdsCredentialProvider(new ImdsClient({ httpClient }));
 * const credentials = await provider.retrieve();
 * ```
 */
export class ImdsCredentialProvider implements CredentialProvider {
  constructor(private readonly client: ImdsClient) {}

  async retrieve(options: RetrieveOptions = {}): Promise<AwsCredentials> {
    try {
      const listing = await this.client.get(IMDS_PATHS.ROLE, options);
      const roleName = listing.split('\n').map((line) => line.trim()).find((line) => line.length > 0);
      if (!roleName) {
        throw metadataError('no IAM role attached to this instance');
      }

      const document = await this.client.get(`${IMDS_PATHS.ROLE}${encodeURIComponent(roleName)}`, options);
      return parseMetadataCredentials(document, EC2_ROLE_SOURCE);
    } catch (error) {
      if (error instanceof CredentialChainError) {
        throw error;
      }
      throw metadataError(`failed to retrieve credentials from IMDS at ${this.client.endpoint}`, { cause: error });
    }
  }
}
