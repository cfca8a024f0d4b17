/**
 * Type exports.
 *
 * @module types
 */

export type {
  AwsCredentials,
  RetrieveOptions,
  CredentialProvider,
  ResolvedProvider,
  CallerIdentity,
  AccountInfo,
} from './common.js';

export type {
  AssumeRoleSpec,
  WebIdentitySpec,
  UserAgentProduct,
  AwsConfig,
  AmbientValues,
  ConfigurationSnapshot,
} from './config.js';
