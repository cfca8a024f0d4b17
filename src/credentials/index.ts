/**
 * Credential providers and the resolution chain.
 *
 * @module credentials
 */

export {
  STATIC_SOURCE,
  ENVIRONMENT_SOURCE,
  SHARED_CONFIG_SOURCE,
  CONTAINER_SOURCE,
  EC2_ROLE_SOURCE,
  WEB_IDENTITY_SOURCE,
  ASSUME_ROLE_SOURCE,
  sharedConfigSource,
} from './sources.js';

export { StaticCredentialProvider, EnvironmentCredentialProvider } from './static.js';
export { CachingCredentialProvider, type CacheOptions } from './cache.js';
export { parseMetadataCredentials } from './metadata.js';
export {
  ImdsClient,
  ImdsCredentialProvider,
  DEFAULT_IMDS_ENDPOINT,
  IMDS_PATHS,
  type ImdsClientConfig,
} from './imds.js';
export {
  ContainerCredentialProvider,
  CONTAINER_CREDENTIALS_HOST,
  type ContainerCredentialProviderConfig,
} from './container.js';
export {
  WebIdentityCredentialProvider,
  defaultSessionName,
  type WebIdentityCredentialProviderOptions,
} from './web-identity.js';
export { AssumeRoleCredentialProvider, AssumeRoleDecorator } from './assume-role.js';
export { SharedConfigResolver, type SharedConfigResolverContext } from './shared-config.js';
export {
  CredentialProviderChain,
  CHAIN_TIERS,
  classifyResolutionError,
  resolveCredentialsProvider,
  type ChainTier,
  type CredentialProviderChainDependencies,
} from './chain.js';
