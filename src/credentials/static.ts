/**
 * Static and environment credential providers.
 *
 * @module credentials/static
 */

import { configurationError, credentialsNotFoundError } from '../error/index.js';
import type { AmbientValues } from '../types/config.js';
import type { AwsCredentials, CredentialProvider } from '../types/common.js';
import { ENVIRONMENT_SOURCE, STATIC_SOURCE } from './sources.js';

/**
 * Provider returning a fixed set of credentials.
 *
 * @example
 * ```typescript
 * const provider = new StaticCredentialProvider({
 *   accessKeyId: 'AKIDEXAMPLE',
 *   secretAccessKey: 'test-secret',
 * });
 * ```
 */
export class StaticCredentialProvider implements CredentialProvider {
  private readonly credentials: AwsCredentials;

  constructor(
    credentials: { accessKeyId: string; secretAccessKey: string; sessionToken?: string },
    source: string = STATIC_SOURCE
  ) {
    if (!credentials.accessKeyId || !credentials.secretAccessKey) {
      throw configurationError(`${source}: access key ID and secret access key are required`);
    }

    this.credentials = {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
      ...(credentials.sessionToken ? { sessionToken: credentials.sessionToken } : {}),
      source,
    };
  }

  async retrieve(): Promise<AwsCredentials> {
    return { ...this.credentials };
  }

  isExpired(): boolean {
    return false;
  }
}

/**
 * Provider reading `AWS_ACCESS_KEY_ID`, `AWS_SECRET_ACCESS_KEY` and
 * `AWS_SESSION_TOKEN` as captured in the configuration snapshot.
 */
export class EnvironmentCredentialProvider implements CredentialProvider {
  constructor(private readonly ambient: AmbientValues) {}

  /**
   * Whether the environment carries a usable key pair.
   */
  static isAvailable(ambient: AmbientValues): boolean {
    return Boolean(ambient.accessKeyId && ambient.secretAccessKey);
  }

  async retrieve(): Promise<AwsCredentials> {
    const { accessKeyId, secretAccessKey, sessionToken } = this.ambient;
    if (!accessKeyId || !secretAccessKey) {
      throw credentialsNotFoundError(
        'AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are not set in the environment'
      );
    }

    return {
      accessKeyId,
      secretAccessKey,
      ...(sessionToken ? { sessionToken } : {}),
      source: ENVIRONMENT_SOURCE,
    };
  }

  isExpired(): boolean {
    return false;
  }
}
