/**
 * Ambient environment access.
 *
 * All process environment reads go through an {@link AmbientEnvironment}
 * injected into the config resolver; the credential chain itself never reads
 * `process.env`.
 *
 * @module config/environment
 */

import { homedir } from 'os';
import type { AmbientValues } from '../types/config.js';

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  ACCESS_KEY_ID: 'AWS_ACCESS_KEY_ID',
  SECRET_ACCESS_KEY: 'AWS_SECRET_ACCESS_KEY',
  SESSION_TOKEN: 'AWS_SESSION_TOKEN',
  PROFILE: 'AWS_PROFILE',
  SHARED_CREDENTIALS_FILE: 'AWS_SHARED_CREDENTIALS_FILE',
  CONFIG_FILE: 'AWS_CONFIG_FILE',
  REGION: 'AWS_REGION',
  DEFAULT_REGION: 'AWS_DEFAULT_REGION',
  ROLE_ARN: 'AWS_ROLE_ARN',
  ROLE_SESSION_NAME: 'AWS_ROLE_SESSION_NAME',
  WEB_IDENTITY_TOKEN_FILE: 'AWS_WEB_IDENTITY_TOKEN_FILE',
  CONTAINER_CREDENTIALS_RELATIVE_URI: 'AWS_CONTAINER_CREDENTIALS_RELATIVE_URI',
  EC2_METADATA_DISABLED: 'AWS_EC2_METADATA_DISABLED',
  APPEND_USER_AGENT: 'AWS_APPEND_USER_AGENT',
} as const;

/**
 * Read-only view of the process environment.
 */
export interface AmbientEnvironment {
  /** Value of a variable; empty strings read as unset. */
  get(name: string): string | undefined;
  /** The user's home directory, used for default file locations. */
  homeDirectory(): string;
}

/**
 * Environment backed by `process.env`.
 */
export class ProcessEnvironment implements AmbientEnvironment {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  get(name: string): string | undefined {
    const value = this.env[name];
    return value === undefined || value === '' ? undefined : value;
  }

  homeDirectory(): string {
    return homedir();
  }
}

/**
 * Environment backed by a fixed map.
 *
 * @example
 * ```typescript
 * const env = new StaticEnvironment({ AWS_PROFILE: 'staging' }, '/home/ci');
 * ```
 */
export class StaticEnvironment implements AmbientEnvironment {
  private readonly vars: Readonly<Record<string, string | undefined>>;

  constructor(
    vars: Record<string, string | undefined> = {},
    private readonly home: string = '/nonexistent'
  ) {
    this.vars = { ...vars };
  }

  get(name: string): string | undefined {
    const value = this.vars[name];
    return value === undefined || value === '' ? undefined : value;
  }

  homeDirectory(): string {
    return this.home;
  }
}

/**
 * Capture every variable the chain cares about.
 */
export function readAmbientValues(env: AmbientEnvironment): AmbientValues {
  return {
    accessKeyId: env.get(ENV_VARS.ACCESS_KEY_ID),
    secretAccessKey: env.get(ENV_VARS.SECRET_ACCESS_KEY),
    sessionToken: env.get(ENV_VARS.SESSION_TOKEN),
    profile: env.get(ENV_VARS.PROFILE),
    sharedCredentialsFile: env.get(ENV_VARS.SHARED_CREDENTIALS_FILE),
    configFile: env.get(ENV_VARS.CONFIG_FILE),
    region: env.get(ENV_VARS.REGION) ?? env.get(ENV_VARS.DEFAULT_REGION),
    roleArn: env.get(ENV_VARS.ROLE_ARN),
    roleSessionName: env.get(ENV_VARS.ROLE_SESSION_NAME),
    webIdentityTokenFile: env.get(ENV_VARS.WEB_IDENTITY_TOKEN_FILE),
    containerCredentialsRelativeUri: env.get(ENV_VARS.CONTAINER_CREDENTIALS_RELATIVE_URI),
    ec2MetadataDisabled: env.get(ENV_VARS.EC2_METADATA_DISABLED)?.toLowerCase() === 'true',
    appendUserAgent: env.get(ENV_VARS.APPEND_USER_AGENT),
  };
}
