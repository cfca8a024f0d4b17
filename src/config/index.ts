/**
 * Configuration resolution.
 *
 * Turns user configuration, the ambient environment and the shared files into
 * a frozen {@link ConfigurationSnapshot}.
 *
 * @module config
 */

import { join } from 'path';
import { z } from 'zod';
import { configurationError } from '../error/index.js';
import type {
  AssumeRoleSpec,
  AwsConfig,
  ConfigurationSnapshot,
  UserAgentProduct,
  WebIdentitySpec,
} from '../types/config.js';
import {
  ProcessEnvironment,
  readAmbientValues,
  type AmbientEnvironment,
} from './environment.js';
import { loadSharedProfiles } from './shared-files.js';

/** Default attempt ceiling for outbound calls. */
export const DEFAULT_MAX_RETRIES = 3;

/** Default base backoff delay in milliseconds. */
export const DEFAULT_RETRY_BASE_DELAY_MS = 100;

/** Default maximum backoff delay in milliseconds. */
export const DEFAULT_RETRY_MAX_DELAY_MS = 20000;

/** Default profile name. */
export const DEFAULT_PROFILE = 'default';

const ROLE_ARN_PATTERN = /^arn:[\w-]+:iam::\d{12}:role\/[\w+=,.@/-]+$/;

const SESSION_NAME_PATTERN = /^[\w+=,.@-]{2,64}$/;

const AssumeRoleSpecSchema: z.ZodType<AssumeRoleSpec> = z.object({
  roleArn: z.string().regex(ROLE_ARN_PATTERN, 'Invalid role ARN'),
  sessionName: z.string().regex(SESSION_NAME_PATTERN, 'Invalid session name').optional(),
  durationSeconds: z.number().int().min(900).max(43200).optional(),
  externalId: z.string().min(2).max(1224).optional(),
  policy: z.string().min(1).optional(),
  policyArns: z.array(z.string().min(20)).optional(),
  tags: z.record(z.string()).optional(),
  transitiveTagKeys: z.array(z.string()).optional(),
});

const WebIdentitySpecSchema: z.ZodType<WebIdentitySpec> = z.object({
  roleArn: z.string().regex(ROLE_ARN_PATTERN, 'Invalid role ARN'),
  sessionName: z.string().regex(SESSION_NAME_PATTERN, 'Invalid session name').optional(),
  webIdentityToken: z.string().min(1).optional(),
  webIdentityTokenFile: z.string().min(1).optional(),
  durationSeconds: z.number().int().min(900).max(43200).optional(),
  policy: z.string().min(1).optional(),
  policyArns: z.array(z.string().min(20)).optional(),
});

const UserAgentProductSchema: z.ZodType<UserAgentProduct> = z.object({
  name: z.string().min(1),
  version: z.string().min(1).optional(),
  extra: z.array(z.string()).optional(),
});

/**
 * Schema for {@link AwsConfig}.
 */
export const AwsConfigSchema: z.ZodType<AwsConfig> = z
  .object({
    accessKey: z.string().min(1).optional(),
    secretKey: z.string().min(1).optional(),
    token: z.string().min(1).optional(),
    profile: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    sharedConfigFiles: z.array(z.string().min(1)).optional(),
    sharedCredentialsFiles: z.array(z.string().min(1)).optional(),
    stsEndpoint: z.string().url().optional(),
    stsRegion: z.string().min(1).optional(),
    ec2MetadataServiceEndpoint: z.string().url().optional(),
    assumeRole: AssumeRoleSpecSchema.optional(),
    assumeRoleWithWebIdentity: WebIdentitySpecSchema.optional(),
    maxRetries: z.number().int().min(0).max(100).optional(),
    retryBaseDelayMs: z.number().int().min(0).optional(),
    retryMaxDelayMs: z.number().int().min(0).optional(),
    skipCredentialsValidation: z.boolean().optional(),
    skipMetadataApiCheck: z.boolean().optional(),
    skipRequestingAccountId: z.boolean().optional(),
    userAgent: z.array(UserAgentProductSchema).optional(),
    debugLogging: z.boolean().optional(),
  })
  .superRefine((config, ctx) => {
    if (Boolean(config.accessKey) !== Boolean(config.secretKey)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [config.accessKey ? 'secretKey' : 'accessKey'],
        message: 'accessKey and secretKey must be set together',
      });
    }
    if (config.token && !config.accessKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['token'],
        message: 'token requires accessKey and secretKey',
      });
    }
  });

/**
 * Validate user configuration.
 *
 * @throws {CredentialChainError} `CONFIGURATION` listing every issue path
 */
export function validateConfig(config: AwsConfig): AwsConfig {
  const result = AwsConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw configurationError(`invalid configuration: ${issues}`, result.error);
  }
  return result.data;
}

function expandHome(path: string, home: string): string {
  if (path === '~') {
    return home;
  }
  if (path.startsWith('~/')) {
    return join(home, path.slice(2));
  }
  return path;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Builds configuration snapshots.
 *
 * File precedence: explicit file lists replace `AWS_SHARED_CREDENTIALS_FILE`
 * and `AWS_CONFIG_FILE`, which replace `~/.aws/credentials` and
 * `~/.aws/config`.
 *
 * @example
 * ```typescript
 * const resolver = new ConfigResolver(new ProcessEnvironment());
 * const snapshot = await resolver.resolve({ region: 'us-west-2', profile: 'ci' });
 * ```
 */
export class ConfigResolver {
  constructor(private readonly environment: AmbientEnvironment = new ProcessEnvironment()) {}

  async resolve(config: AwsConfig, options: { signal?: AbortSignal } = {}): Promise<ConfigurationSnapshot> {
    const validated = validateConfig(config);
    const ambient = readAmbientValues(this.environment);
    const home = this.environment.homeDirectory();

    const sharedCredentialsFiles = this.resolveFiles(
      validated.sharedCredentialsFiles,
      ambient.sharedCredentialsFile,
      join(home, '.aws', 'credentials')
    );
    const sharedConfigFiles = this.resolveFiles(
      validated.sharedConfigFiles,
      ambient.configFile,
      join(home, '.aws', 'config')
    );

    const profiles = await loadSharedProfiles(sharedConfigFiles, sharedCredentialsFiles, {
      signal: options.signal,
    });

    const namedProfile = validated.profile ?? ambient.profile;
    const profile = namedProfile ?? DEFAULT_PROFILE;
    const region = validated.region ?? ambient.region ?? profiles.get(profile)?.values['region'];

    const snapshot: ConfigurationSnapshot = {
      accessKey: validated.accessKey,
      secretKey: validated.secretKey,
      token: validated.token,
      profile,
      profileExplicit: namedProfile !== undefined,
      sharedConfigFiles,
      sharedCredentialsFiles,
      profiles,
      region,
      stsEndpoint: validated.stsEndpoint,
      stsRegion: validated.stsRegion,
      ec2MetadataServiceEndpoint: validated.ec2MetadataServiceEndpoint,
      assumeRole: validated.assumeRole,
      assumeRoleWithWebIdentity: validated.assumeRoleWithWebIdentity,
      maxRetries: validated.maxRetries || DEFAULT_MAX_RETRIES,
      retryBaseDelayMs: validated.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: validated.retryMaxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS,
      skipCredentialsValidation: validated.skipCredentialsValidation ?? false,
      skipMetadataApiCheck: (validated.skipMetadataApiCheck ?? false) || ambient.ec2MetadataDisabled,
      skipRequestingAccountId: validated.skipRequestingAccountId ?? false,
      userAgentProducts: validated.userAgent ?? [],
      appendedUserAgent: ambient.appendUserAgent,
      debugLogging: validated.debugLogging ?? false,
      environment: ambient,
    };

    return deepFreeze(snapshot);
  }

  private resolveFiles(explicit: string[] | undefined, ambient: string | undefined, fallback: string): string[] {
    const home = this.environment.homeDirectory();
    if (explicit && explicit.length > 0) {
      return explicit.map((path) => expandHome(path, home));
    }
    if (ambient) {
      return [expandHome(ambient, home)];
    }
    return [fallback];
  }
}

export { ProcessEnvironment, StaticEnvironment, ENV_VARS, readAmbientValues } from './environment.js';
export type { AmbientEnvironment } from './environment.js';
export { SharedProfiles, loadSharedProfiles, parseIni, CREDENTIAL_DIRECTIVES } from './shared-files.js';
export type { SharedProfile, IniData } from './shared-files.js';
