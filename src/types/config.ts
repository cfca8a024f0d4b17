/**
 * Configuration types.
 *
 * @module types/config
 */

import type { SharedProfiles } from '../config/shared-files.js';

/**
 * Parameters of an STS AssumeRole call.
 */
export interface AssumeRoleSpec {
  /** ARN of the role to assume. */
  readonly roleArn: string;
  /** Session name; generated when omitted. */
  readonly sessionName?: string;
  /** Session duration in seconds (900-43200). */
  readonly durationSeconds?: number;
  readonly externalId?: string;
  /** Inline session policy document (JSON). */
  readonly policy?: string;
  /** Managed policy ARNs applied to the session. */
  readonly policyArns?: readonly string[];
  /** Session tags. */
  readonly tags?: Readonly<Record<string, string>>;
  readonly transitiveTagKeys?: readonly string[];
}

/**
 * Parameters of an STS AssumeRoleWithWebIdentity call.
 *
 * The token is taken from `webIdentityToken`, else read from
 * `webIdentityTokenFile`.
 */
export interface WebIdentitySpec {
  readonly roleArn: string;
  readonly sessionName?: string;
  readonly webIdentityToken?: string;
  readonly webIdentityTokenFile?: string;
  readonly durationSeconds?: number;
  readonly policy?: string;
  readonly policyArns?: readonly string[];
}

/**
 * A product entry prepended to the user agent, rendered as
 * `name/version (extra; ...)`.
 */
export interface UserAgentProduct {
  readonly name: string;
  readonly version?: string;
  readonly extra?: readonly string[];
}

/**
 * User-supplied configuration.
 */
export interface AwsConfig {
  accessKey?: string;
  secretKey?: string;
  token?: string;
  /** Shared-config profile; falls back to `AWS_PROFILE`. */
  profile?: string;
  region?: string;
  /** Replace `AWS_CONFIG_FILE` and `~/.aws/config`. */
  sharedConfigFiles?: string[];
  /** Replace `AWS_SHARED_CREDENTIALS_FILE` and `~/.aws/credentials`. */
  sharedCredentialsFiles?: string[];
  stsEndpoint?: string;
  /** Region used to sign STS calls; defaults to `region`. */
  stsRegion?: string;
  ec2MetadataServiceEndpoint?: string;
  assumeRole?: AssumeRoleSpec;
  assumeRoleWithWebIdentity?: WebIdentitySpec;
  /** Attempt ceiling for outbound calls; 0 or unset selects the default of 3. */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  skipCredentialsValidation?: boolean;
  skipMetadataApiCheck?: boolean;
  skipRequestingAccountId?: boolean;
  userAgent?: UserAgentProduct[];
  debugLogging?: boolean;
}

/**
 * Values read from the ambient environment.
 */
export interface AmbientValues {
  readonly accessKeyId?: string;
  readonly secretAccessKey?: string;
  readonly sessionToken?: string;
  readonly profile?: string;
  readonly sharedCredentialsFile?: string;
  readonly configFile?: string;
  readonly region?: string;
  readonly roleArn?: string;
  readonly roleSessionName?: string;
  readonly webIdentityTokenFile?: string;
  readonly containerCredentialsRelativeUri?: string;
  readonly ec2MetadataDisabled: boolean;
  readonly appendUserAgent?: string;
}

/**
 * Immutable result of configuration resolution.
 *
 * Precedence across sources is a total order decided by the credential
 * chain; nothing here is merged across tiers.
 */
export interface ConfigurationSnapshot {
  readonly accessKey?: string;
  readonly secretKey?: string;
  readonly token?: string;
  /** Profile to read; `default` when none was named. */
  readonly profile: string;
  /** Whether `profile` came from configuration or `AWS_PROFILE`. */
  readonly profileExplicit: boolean;
  readonly sharedConfigFiles: readonly string[];
  readonly sharedCredentialsFiles: readonly string[];
  /** Profiles parsed from the shared files. */
  readonly profiles: SharedProfiles;
  readonly region?: string;
  readonly stsEndpoint?: string;
  readonly stsRegion?: string;
  readonly ec2MetadataServiceEndpoint?: string;
  readonly assumeRole?: AssumeRoleSpec;
  readonly assumeRoleWithWebIdentity?: WebIdentitySpec;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
  readonly retryMaxDelayMs: number;
  readonly skipCredentialsValidation: boolean;
  readonly skipMetadataApiCheck: boolean;
  readonly skipRequestingAccountId: boolean;
  readonly userAgentProducts: readonly UserAgentProduct[];
  readonly appendedUserAgent?: string;
  readonly debugLogging: boolean;
  readonly environment: AmbientValues;
}
