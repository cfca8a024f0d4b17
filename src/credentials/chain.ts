/**
 * Credential provider chain.
 *
 * @module credentials/chain
 */

import {
  CredentialChainError,
  cancelledError,
  isCancellationError,
  noValidCredentialSourcesError,
} from '../error/index.js';
import type { HttpClient } from '../http/types.js';
import { NoopLogger, errorContext, type Logger } from '../observability/logging.js';
import type { RetryPolicy } from '../resilience/retry.js';
import type { StsService } from '../sts/service.js';
import type { ConfigurationSnapshot } from '../types/config.js';
import type { CredentialProvider, ResolvedProvider, RetrieveOptions } from '../types/common.js';
import type { AssumeRoleDecorator } from './assume-role.js';
import { CachingCredentialProvider, type CacheOptions } from './cache.js';
import { ContainerCredentialProvider } from './container.js';
import { ImdsClient, ImdsCredentialProvider } from './imds.js';
import { SharedConfigResolver } from './shared-config.js';
import {
  CONTAINER_SOURCE,
  EC2_ROLE_SOURCE,
  ENVIRONMENT_SOURCE,
  STATIC_SOURCE,
  WEB_IDENTITY_SOURCE,
} from './sources.js';
import { EnvironmentCredentialProvider, StaticCredentialProvider } from './static.js';
import { WebIdentityCredentialProvider } from './web-identity.js';

/**
 * Collaborators of the chain.
 */
export interface CredentialProviderChainDependencies {
  httpClient: HttpClient;
  sts: StsService;
  /** Policy for metadata-endpoint calls. */
  retryPolicy?: RetryPolicy;
  userAgent?: string;
  logger?: Logger;
  cacheOptions?: CacheOptions;
}

/**
 * Candidate tiers, highest precedence first.
 */
export const CHAIN_TIERS = [
  'static',
  'web-identity',
  'named-profile',
  'environment',
  'environment-web-identity',
  'default-profile',
  'container',
  'instance-metadata',
] as const;

export type ChainTier = (typeof CHAIN_TIERS)[number];

interface Candidate extends ResolvedProvider {
  readonly tier: ChainTier;
}

/**
 * Selects the credential source for a configuration snapshot.
 *
 * Tiers are tried in {@link CHAIN_TIERS} order and the first applicable one
 * wins; nothing is merged across tiers. Only instance metadata is probed,
 * since its availability cannot be read from the snapshot. The selected
 * provider is returned wrapped in a {@link CachingCredentialProvider}.
 *
 * @example
 * ```typescript
 * const chain = new CredentialProviderChain({ httpClient, sts });
 * const { provider, source } = await chain.resolve(snapshot);
 * ```
 */
export class CredentialProviderChain {
  private readonly logger: Logger;

  constructor(private readonly deps: CredentialProviderChainDependencies) {
    this.logger = deps.logger ?? new NoopLogger();
  }

  async resolve(snapshot: ConfigurationSnapshot, options: RetrieveOptions = {}): Promise<ResolvedProvider> {
    const candidate = this.select(snapshot);
    if (candidate) {
      this.logger.info('Resolved credential source', { tier: candidate.tier, source: candidate.source });
      return {
        provider: new CachingCredentialProvider(candidate.provider, this.deps.cacheOptions),
        source: candidate.source,
      };
    }

    if (snapshot.skipMetadataApiCheck) {
      this.logger.debug('Skipping instance metadata credentials');
      throw noValidCredentialSourcesError();
    }

    const provider = new CachingCredentialProvider(
      new ImdsCredentialProvider(this.imdsClient(snapshot)),
      this.deps.cacheOptions
    );

    try {
      await provider.retrieve(options);
    } catch (error) {
      if (isCancellationError(error)) {
        throw error;
      }
      this.logger.debug('Instance metadata credentials unavailable', errorContext(error));
      throw noValidCredentialSourcesError(error);
    }

    this.logger.info('Resolved credential source', { tier: 'instance-metadata', source: EC2_ROLE_SOURCE });
    return { provider, source: EC2_ROLE_SOURCE };
  }

  /**
   * First applicable tier above instance metadata, if any.
   */
  private select(snapshot: ConfigurationSnapshot): Candidate | undefined {
    const env = snapshot.environment;

    if (snapshot.accessKey && snapshot.secretKey) {
      const provider = new StaticCredentialProvider({
        accessKeyId: snapshot.accessKey,
        secretAccessKey: snapshot.secretKey,
        sessionToken: snapshot.token,
      });
      return { tier: 'static', provider, source: STATIC_SOURCE };
    }

    const webIdentity = snapshot.assumeRoleWithWebIdentity;
    if (webIdentity) {
      return {
        tier: 'web-identity',
        provider: new WebIdentityCredentialProvider(
          { ...webIdentity, sessionName: webIdentity.sessionName ?? env.roleSessionName },
          this.deps.sts,
          { fallbackTokenFile: env.webIdentityTokenFile }
        ),
        source: WEB_IDENTITY_SOURCE,
      };
    }

    if (snapshot.profileExplicit) {
      return { tier: 'named-profile', ...this.sharedConfig(snapshot).resolve(snapshot.profile) };
    }
    this.logger.debug('No profile named, skipping named-profile tier');

    if (EnvironmentCredentialProvider.isAvailable(env)) {
      return { tier: 'environment', provider: new EnvironmentCredentialProvider(env), source: ENVIRONMENT_SOURCE };
    }

    if (env.roleArn && env.webIdentityTokenFile) {
      return {
        tier: 'environment-web-identity',
        provider: new WebIdentityCredentialProvider(
          { roleArn: env.roleArn, sessionName: env.roleSessionName, webIdentityTokenFile: env.webIdentityTokenFile },
          this.deps.sts
        ),
        source: WEB_IDENTITY_SOURCE,
      };
    }

    if (snapshot.profiles.hasCredentialDirectives(snapshot.profile)) {
      return { tier: 'default-profile', ...this.sharedConfig(snapshot).resolve(snapshot.profile) };
    }

    if (env.containerCredentialsRelativeUri) {
      return {
        tier: 'container',
        provider: this.containerProvider(env.containerCredentialsRelativeUri),
        source: CONTAINER_SOURCE,
      };
    }

    return undefined;
  }

  private sharedConfig(snapshot: ConfigurationSnapshot): SharedConfigResolver {
    return new SharedConfigResolver({
      profiles: snapshot.profiles,
      environment: snapshot.environment,
      sts: this.deps.sts,
      instanceMetadataProvider: () => new ImdsCredentialProvider(this.imdsClient(snapshot)),
      containerProvider: (relativeUri) => this.containerProvider(relativeUri),
      logger: this.logger,
    });
  }

  private imdsClient(snapshot: ConfigurationSnapshot): ImdsClient {
    return new ImdsClient({
      httpClient: this.deps.httpClient,
      endpoint: snapshot.ec2MetadataServiceEndpoint,
      retryPolicy: this.deps.retryPolicy,
      userAgent: this.deps.userAgent,
      logger: this.logger,
    });
  }

  private containerProvider(relativeUri: string): CredentialProvider {
    return new ContainerCredentialProvider({
      httpClient: this.deps.httpClient,
      relativeUri,
      retryPolicy: this.deps.retryPolicy,
      userAgent: this.deps.userAgent,
    });
  }
}

const AUTHORITATIVE_CODES = new Set(['CONFIGURATION', 'CANNOT_ASSUME_ROLE', 'CANCELLED', 'NO_VALID_CREDENTIAL_SOURCES']);

/**
 * Map a failure of the first retrieval to its resolution-time classification.
 *
 * Configuration, role-assumption and cancellation errors keep their code;
 * anything else means the selected source could not produce credentials.
 */
export function classifyResolutionError(error: unknown): CredentialChainError {
  if (error instanceof CredentialChainError && AUTHORITATIVE_CODES.has(error.code)) {
    return error;
  }
  if (isCancellationError(error)) {
    return cancelledError(error);
  }
  return noValidCredentialSourcesError(error);
}

/**
 * Resolve the base provider, apply configured role assumption on top of it
 * and retrieve once so that failures surface now rather than on first use.
 *
 * The returned source is the base tier's label; credentials retrieved from
 * a decorated provider carry `AssumeRoleProvider`.
 */
export async function resolveCredentialsProvider(
  snapshot: ConfigurationSnapshot,
  chain: CredentialProviderChain,
  decorator: AssumeRoleDecorator,
  options: RetrieveOptions = {}
): Promise<ResolvedProvider> {
  const base = await chain.resolve(snapshot, options);
  const provider = snapshot.assumeRole ? decorator.decorate(base.provider, snapshot.assumeRole) : base.provider;

  try {
    await provider.retrieve(options);
  } catch (error) {
    throw classifyResolutionError(error);
  }

  return { provider, source: base.source };
}
