/**
 * Entry points: resolve configuration, credentials and account information.
 *
 * @module client
 */

import { ConfigResolver } from '../config/index.js';
import type { AmbientEnvironment } from '../config/environment.js';
import { AssumeRoleDecorator } from '../credentials/assume-role.js';
import { CredentialProviderChain, resolveCredentialsProvider } from '../credentials/chain.js';
import { ImdsClient } from '../credentials/imds.js';
import { configurationError, isCancellationError } from '../error/index.js';
import { FetchTransport } from '../http/transport.js';
import type { HttpClient } from '../http/types.js';
import { createLogger, errorContext, type Logger } from '../observability/logging.js';
import { RetryPolicy } from '../resilience/retry.js';
import type { RequestSigner } from '../signing/v4.js';
import { StsService } from '../sts/service.js';
import type { AccountInfo, CallerIdentity, CredentialProvider, RetrieveOptions } from '../types/common.js';
import type { AwsConfig, ConfigurationSnapshot } from '../types/config.js';
import { buildUserAgent, type RuntimeInfo } from '../useragent/index.js';
import { SessionValidator, parseArn } from '../validation/session.js';

/** STS signing region while no region has been resolved yet. */
export const DEFAULT_STS_REGION = 'us-east-1';

/**
 * Injectable collaborators. Everything defaults to the process environment
 * and real network access.
 */
export interface AwsConfigDependencies {
  environment?: AmbientEnvironment;
  httpClient?: HttpClient;
  signer?: RequestSigner;
  logger?: Logger;
  /** Runtime facts for the user agent; defaults to the current process. */
  runtime?: RuntimeInfo;
}

/**
 * Everything needed to call AWS with the resolved credentials.
 */
export interface AwsConfigResult {
  readonly region: string;
  /** Cached provider; retrieve from it before each signed request. */
  readonly credentials: CredentialProvider;
  /** Label of the tier the base credentials came from. */
  readonly credentialSource: string;
  readonly retryPolicy: RetryPolicy;
  readonly userAgent: string;
  readonly sts: StsService;
  readonly snapshot: ConfigurationSnapshot;
  /** Caller identity, when validation ran. */
  readonly identity?: CallerIdentity;
  readonly logger: Logger;
}

async function resolveRegion(
  snapshot: ConfigurationSnapshot,
  imds: () => ImdsClient,
  logger: Logger,
  options: RetrieveOptions
): Promise<string> {
  if (snapshot.region) {
    return snapshot.region;
  }
  if (snapshot.skipMetadataApiCheck) {
    throw configurationError('no region configured: set region, AWS_REGION or a profile region');
  }

  try {
    const region = await imds().getInstanceRegion(options);
    logger.debug('Using region from instance metadata', { region });
    return region;
  } catch (error) {
    if (isCancellationError(error)) {
      throw error;
    }
    logger.debug('Instance metadata region unavailable', errorContext(error));
    throw configurationError(
      'no region configured and none available from instance metadata',
      error
    );
  }
}

/**
 * Resolve configuration and credentials.
 *
 * Builds the configuration snapshot, selects and (optionally) decorates the
 * credential provider and retrieves once. The region is resolved only after
 * credentials, so a missing credential source is reported before a missing
 * region. The credentials are then validated with GetCallerIdentity unless
 * `skipCredentialsValidation` is set.
 *
 * @example
 * ```typescript
 * const aws = await getAwsConfig({
 *   region: 'us-west-2',
 *   profile: 'deploy',
 *   assumeRole: { roleArn: 'arn:aws:iam::123456789012:role/Release' },
 * });
 * const credentials = await aws.credentials.retrieve();
 * ```
 *
 * @throws {CredentialChainError} classified by the failing stage
 */
export async function getAwsConfig(
  config: AwsConfig,
  deps: AwsConfigDependencies = {},
  options: RetrieveOptions = {}
): Promise<AwsConfigResult> {
  const logger = createLogger({ logger: deps.logger, debugLogging: config.debugLogging });
  const snapshot = await new ConfigResolver(deps.environment).resolve(config, options);
  const httpClient = deps.httpClient ?? new FetchTransport();

  const retryPolicy = new RetryPolicy(
    {
      maxAttempts: snapshot.maxRetries,
      baseDelayMs: snapshot.retryBaseDelayMs,
      maxDelayMs: snapshot.retryMaxDelayMs,
    },
    { logger }
  );
  const userAgent = buildUserAgent(snapshot.userAgentProducts, snapshot.appendedUserAgent, deps.runtime);

  const stsFor = (region: string): StsService =>
    new StsService({
      region,
      endpoint: snapshot.stsEndpoint,
      httpClient,
      signer: deps.signer,
      retryPolicy,
      userAgent,
      logger,
    });

  // Credentials come first; STS signs in the fallback region until one is known.
  const knownStsRegion = snapshot.stsRegion ?? (snapshot.region || undefined);
  const credentialSts = stsFor(knownStsRegion ?? DEFAULT_STS_REGION);
  const chain = new CredentialProviderChain({ httpClient, sts: credentialSts, retryPolicy, userAgent, logger });
  const decorator = new AssumeRoleDecorator(credentialSts, logger);
  const resolved = await resolveCredentialsProvider(snapshot, chain, decorator, options);

  const region = await resolveRegion(
    snapshot,
    () =>
      new ImdsClient({
        httpClient,
        endpoint: snapshot.ec2MetadataServiceEndpoint,
        retryPolicy,
        userAgent,
        logger,
      }),
    logger,
    options
  );
  const sts = knownStsRegion === undefined ? stsFor(region) : credentialSts;

  let identity: CallerIdentity | undefined;
  if (!snapshot.skipCredentialsValidation) {
    identity = await new SessionValidator(sts, logger).validate(resolved.provider, options);
  }

  return {
    region,
    credentials: resolved.provider,
    credentialSource: resolved.source,
    retryPolicy,
    userAgent,
    sts,
    snapshot,
    identity,
    logger,
  };
}

/**
 * Account ID and partition for a resolved configuration.
 *
 * Honours `skipRequestingAccountId`: no STS call is made and the account ID
 * is empty.
 */
export async function getAccountIdAndPartition(
  aws: AwsConfigResult,
  options: RetrieveOptions = {}
): Promise<AccountInfo> {
  if (aws.identity && !aws.snapshot.skipRequestingAccountId) {
    return { accountId: aws.identity.account, partition: parseArn(aws.identity.arn).partition };
  }

  return new SessionValidator(aws.sts, aws.logger).getAccountIdAndPartition(aws.credentials, aws.region, {
    skipRequestingAccountId: aws.snapshot.skipRequestingAccountId,
    signal: options.signal,
  });
}
