/**
 * Web identity federation provider.
 *
 * @module credentials/web-identity
 */

import { readFile } from 'fs/promises';
import {
  cancelledError,
  cannotAssumeRoleError,
  configurationError,
  isCancellationError,
} from '../error/index.js';
import type { StsService } from '../sts/service.js';
import type { AwsCredentials, CredentialProvider, RetrieveOptions } from '../types/common.js';
import type { WebIdentitySpec } from '../types/config.js';
import { WEB_IDENTITY_SOURCE } from './sources.js';

export interface WebIdentityCredentialProviderOptions {
  /** Token file used when the role names neither a token nor a token file. */
  fallbackTokenFile?: string;
}

/**
 * Generate a session name for calls that did not configure one.
 */
export function defaultSessionName(now: number = Date.now()): string {
  return `aws-credential-chain-${now}`;
}

/**
 * Provider exchanging a web identity token for role credentials through
 * STS AssumeRoleWithWebIdentity.
 *
 * The token is re-read on every retrieval so that rotated token files are
 * picked up.
 */
export class WebIdentityCredentialProvider implements CredentialProvider {
  private readonly tokenFile: string | undefined;

  constructor(
    private readonly role: WebIdentitySpec,
    private readonly sts: StsService,
    options: WebIdentityCredentialProviderOptions = {}
  ) {
    this.tokenFile = role.webIdentityTokenFile ?? options.fallbackTokenFile;
    if (!role.webIdentityToken && !this.tokenFile) {
      throw configurationError(
        `web identity role ${role.roleArn}: no web identity token or token file configured`
      );
    }
  }

  async retrieve(options: RetrieveOptions = {}): Promise<AwsCredentials> {
    const webIdentityToken = await this.loadToken(options.signal);

    try {
      const assumed = await this.sts.assumeRoleWithWebIdentity(
        {
          roleArn: this.role.roleArn,
          sessionName: this.role.sessionName ?? defaultSessionName(),
          webIdentityToken,
          durationSeconds: this.role.durationSeconds,
          policy: this.role.policy,
          policyArns: this.role.policyArns,
        },
        options
      );

      return {
        accessKeyId: assumed.accessKeyId,
        secretAccessKey: assumed.secretAccessKey,
        sessionToken: assumed.sessionToken,
        expiration: assumed.expiration,
        source: WEB_IDENTITY_SOURCE,
      };
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      throw cannotAssumeRoleError(this.role.roleArn, error);
    }
  }

  private async loadToken(signal?: AbortSignal): Promise<string> {
    if (this.role.webIdentityToken) {
      return this.role.webIdentityToken;
    }

    const path = this.tokenFile;
    if (!path) {
      throw configurationError(`web identity role ${this.role.roleArn}: no web identity token file configured`);
    }

    let token: string;
    try {
      token = await readFile(path, { encoding: 'utf-8', signal });
    } catch (error) {
      if (isCancellationError(error)) {
        throw cancelledError(signal?.reason);
      }
      throw configurationError(`unable to read web identity token file ${path}`, error);
    }

    token = token.trim();
    if (!token) {
      throw configurationError(`web identity token file ${path} is empty`);
    }
    return token;
  }
}
