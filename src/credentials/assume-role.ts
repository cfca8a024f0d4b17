/**
 * Role assumption over a base provider.
 *
 * @module credentials/assume-role
 */

import { cannotAssumeRoleError, isCancellationError } from '../error/index.js';
import { NoopLogger, errorContext, type Logger } from '../observability/logging.js';
import type { StsService } from '../sts/service.js';
import type { AwsCredentials, CredentialProvider, RetrieveOptions } from '../types/common.js';
import type { AssumeRoleSpec } from '../types/config.js';
import { CachingCredentialProvider, type CacheOptions } from './cache.js';
import { ASSUME_ROLE_SOURCE } from './sources.js';
import { defaultSessionName } from './web-identity.js';

/**
 * Provider calling STS AssumeRole with credentials from a base provider.
 *
 * Every retrieval issues a new STS call; wrap it in a
 * {@link CachingCredentialProvider} to reuse unexpired results. Failures of
 * the base provider propagate unchanged; STS failures become
 * `CANNOT_ASSUME_ROLE` with the STS error as cause. Transport errors and
 * throttling are retried inside {@link StsService}; authorization rejections
 * are not.
 */
export class AssumeRoleCredentialProvider implements CredentialProvider {
  constructor(
    private readonly base: CredentialProvider,
    private readonly role: AssumeRoleSpec,
    private readonly sts: StsService,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  async retrieve(options: RetrieveOptions = {}): Promise<AwsCredentials> {
    const baseCredentials = await this.base.retrieve(options);
    const sessionName = this.role.sessionName ?? defaultSessionName();

    try {
      const assumed = await this.sts.assumeRole({ ...this.role, sessionName }, baseCredentials, options);
      this.logger.debug('Assumed IAM role', {
        roleArn: this.role.roleArn,
        sessionName,
        baseSource: baseCredentials.source,
        expiration: assumed.expiration.toISOString(),
      });

      return {
        accessKeyId: assumed.accessKeyId,
        secretAccessKey: assumed.secretAccessKey,
        sessionToken: assumed.sessionToken,
        expiration: assumed.expiration,
        source: ASSUME_ROLE_SOURCE,
      };
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      this.logger.warn('Role assumption failed', { roleArn: this.role.roleArn, ...errorContext(error) });
      throw cannotAssumeRoleError(this.role.roleArn, error);
    }
  }
}

/**
 * Applies configured role assumption on top of a resolved provider.
 *
 * @example
 * ```typescript
 * const decorator = new AssumeRoleDecorator(sts);
 * const provider = decorator.decorate(resolved.provider, {
 *   roleArn: 'arn:aws:iam::123456789012:role/Deploy',
 *   sessionName: 'release',
 * });
 * ```
 */
export class AssumeRoleDecorator {
  constructor(
    private readonly sts: StsService,
    private readonly logger: Logger = new NoopLogger(),
    private readonly cacheOptions: CacheOptions = {}
  ) {}

  /**
   * Wrap `base` with role assumption, cached at the outer layer.
   */
  decorate(base: CredentialProvider, role: AssumeRoleSpec): CachingCredentialProvider {
    return new CachingCredentialProvider(
      new AssumeRoleCredentialProvider(base, role, this.sts, this.logger),
      this.cacheOptions
    );
  }
}
