/**
 * Session validation and account lookup.
 *
 * @module validation/session
 */

import {
  configurationError,
  credentialValidationError,
  isCancellationError,
} from '../error/index.js';
import { NoopLogger, errorContext, type Logger } from '../observability/logging.js';
import type { StsService } from '../sts/service.js';
import type {
  AccountInfo,
  CallerIdentity,
  CredentialProvider,
  RetrieveOptions,
} from '../types/common.js';

/**
 * Components of an ARN.
 */
export interface Arn {
  partition: string;
  service: string;
  region: string;
  accountId: string;
  resource: string;
}

/**
 * Region-name prefixes of the non-standard partitions, longest first.
 */
const PARTITION_PREFIXES: ReadonlyArray<readonly [string, string]> = [
  ['us-isob-', 'aws-iso-b'],
  ['us-iso-', 'aws-iso'],
  ['eu-isoe-', 'aws-iso-e'],
  ['us-isof-', 'aws-iso-f'],
  ['us-gov-', 'aws-us-gov'],
  ['cn-', 'aws-cn'],
];

/**
 * Split an ARN into its components.
 *
 * @throws {CredentialChainError} `CONFIGURATION` for strings that are not ARNs
 */
export function parseArn(arn: string): Arn {
  const parts = arn.split(':');
  const [prefix, partition, service, region, accountId] = parts;
  if (
    parts.length < 6 ||
    prefix !== 'arn' ||
    !partition ||
    !service ||
    region === undefined ||
    accountId === undefined
  ) {
    throw configurationError(`invalid ARN: ${arn}`);
  }
  return {
    partition,
    service,
    region,
    accountId,
    resource: parts.slice(5).join(':'),
  };
}

/**
 * Partition a region belongs to, from its name prefix.
 */
export function partitionForRegion(region: string): string {
  for (const [prefix, partition] of PARTITION_PREFIXES) {
    if (region.startsWith(prefix)) {
      return partition;
    }
  }
  return 'aws';
}

/**
 * Confirms that resolved credentials work and identifies their account.
 *
 * @example
 * ```typescript
 * const validator = new SessionValidator(sts);
 * const identity = await validator.validate(provider);
 * console.log(identity.account);
 * ```
 */
export class SessionValidator {
  private readonly logger: Logger;

  constructor(
    private readonly sts: StsService,
    logger?: Logger
  ) {
    this.logger = logger ?? new NoopLogger();
  }

  /**
   * Call GetCallerIdentity with the provider's credentials.
   *
   * @throws {CredentialChainError} `CREDENTIAL_VALIDATION_FAILED` with the failure as cause
   */
  async validate(provider: CredentialProvider, options: RetrieveOptions = {}): Promise<CallerIdentity> {
    try {
      const credentials = await provider.retrieve(options);
      const identity = await this.sts.getCallerIdentity(credentials, options);
      this.logger.debug('Validated credentials', { arn: identity.arn, source: credentials.source });
      return identity;
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      this.logger.warn('Credential validation failed', errorContext(error));
      throw credentialValidationError(error);
    }
  }

  /**
   * Account ID and partition of the provider's credentials.
   *
   * When `skipRequestingAccountId` is set no call is made: the account ID is
   * empty and the partition comes from the region name.
   */
  async getAccountIdAndPartition(
    provider: CredentialProvider,
    region: string,
    options: RetrieveOptions & { skipRequestingAccountId?: boolean } = {}
  ): Promise<AccountInfo> {
    if (options.skipRequestingAccountId) {
      return { accountId: '', partition: partitionForRegion(region) };
    }

    const identity = await this.validate(provider, { signal: options.signal });
    const arn = parseArn(identity.arn);
    return { accountId: identity.account, partition: arn.partition };
  }
}
