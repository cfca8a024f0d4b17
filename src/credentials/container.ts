/**
 * ECS container credentials provider.
 *
 * @module credentials/container
 */

import type { HttpClient } from '../http/types.js';
import { RetryPolicy } from '../resilience/retry.js';
import type { AwsCredentials, CredentialProvider, RetrieveOptions } from '../types/common.js';
import { assertMetadataResponse, parseMetadataCredentials } from './metadata.js';
import { CONTAINER_SOURCE } from './sources.js';

/**
 * Host serving container credentials.
 */
export const CONTAINER_CREDENTIALS_HOST = 'http://169.254.170.2';

export interface ContainerCredentialProviderConfig {
  httpClient: HttpClient;
  /** Value of `AWS_CONTAINER_CREDENTIALS_RELATIVE_URI`. */
  relativeUri: string;
  /** Timeout per request in milliseconds. Defaults to 2000ms. */
  timeoutMs?: number;
  retryPolicy?: RetryPolicy;
  userAgent?: string;
}

/**
 * Provider reading task-role credentials from the ECS credentials endpoint.
 */
export class ContainerCredentialProvider implements CredentialProvider {
  readonly url: string;
  private readonly httpClient: HttpClient;
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly userAgent?: string;

  constructor(config: ContainerCredentialProviderConfig) {
    const path = config.relativeUri.startsWith('/') ? config.relativeUri : `/${config.relativeUri}`;
    this.url = `${CONTAINER_CREDENTIALS_HOST}${path}`;
    this.httpClient = config.httpClient;
    this.timeoutMs = config.timeoutMs ?? 2000;
    this.retryPolicy = config.retryPolicy ?? new RetryPolicy();
    this.userAgent = config.userAgent;
  }

  async retrieve(options: RetrieveOptions = {}): Promise<AwsCredentials> {
    const body = await this.retryPolicy.execute(
      async ({ signal }) => {
        const response = await this.httpClient.send({
          method: 'GET',
          url: this.url,
          headers: {
            accept: 'application/json',
            ...(this.userAgent ? { 'user-agent': this.userAgent } : {}),
          },
          timeoutMs: this.timeoutMs,
          signal,
        });
        assertMetadataResponse(response, `container credentials ${this.url}`);
        return response.body;
      },
      { signal: options.signal, operationName: 'container:credentials' }
    );

    return parseMetadataCredentials(body, CONTAINER_SOURCE);
  }
}
