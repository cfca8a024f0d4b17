/**
 * Shared-config profile resolution.
 *
 * @module credentials/shared-config
 */

import type { SharedProfile, SharedProfiles } from '../config/shared-files.js';
import { configurationError } from '../error/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { StsService } from '../sts/service.js';
import type { AmbientValues, AssumeRoleSpec } from '../types/config.js';
import type { CredentialProvider, ResolvedProvider } from '../types/common.js';
import { AssumeRoleCredentialProvider } from './assume-role.js';
import { sharedConfigSource } from './sources.js';
import { EnvironmentCredentialProvider, StaticCredentialProvider } from './static.js';
import { WebIdentityCredentialProvider } from './web-identity.js';

/**
 * Collaborators needed to build the providers a profile can refer to.
 */
export interface SharedConfigResolverContext {
  profiles: SharedProfiles;
  environment: AmbientValues;
  sts: StsService;
  /** Builds the instance metadata provider for `credential_source = Ec2InstanceMetadata`. */
  instanceMetadataProvider: () => CredentialProvider;
  /** Builds the container provider for `credential_source = EcsContainer`. */
  containerProvider: (relativeUri: string) => CredentialProvider;
  logger?: Logger;
}

function profileSource(profile: SharedProfile): string {
  const origin =
    profile.origins['aws_access_key_id'] ??
    profile.origins['role_arn'] ??
    Object.values(profile.origins)[0] ??
    '';
  return sharedConfigSource(origin);
}

function parseDuration(profile: SharedProfile): number | undefined {
  const raw = profile.values['duration_seconds'];
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw configurationError(`profile ${profile.name}: invalid duration_seconds "${raw}"`);
  }
  return value;
}

/**
 * Resolves a named profile into a provider.
 *
 * A profile resolves to, in order of the directives it carries:
 * - web identity, for `role_arn` with `web_identity_token_file`;
 * - role assumption, for `role_arn` over the provider named by
 *   `source_profile` (resolved recursively) or `credential_source`;
 * - static credentials, for `aws_access_key_id`/`aws_secret_access_key`.
 *
 * Anything else is a `CONFIGURATION` error.
 */
export class SharedConfigResolver {
  private readonly logger: Logger;

  constructor(private readonly context: SharedConfigResolverContext) {
    this.logger = context.logger ?? new NoopLogger();
  }

  resolve(profileName: string): ResolvedProvider {
    return this.resolveProfile(profileName, []);
  }

  private resolveProfile(name: string, visited: readonly string[]): ResolvedProvider {
    const profile = this.context.profiles.get(name);
    if (!profile) {
      throw configurationError(`failed to get shared config profile, ${name}`);
    }

    const values = profile.values;
    const source = profileSource(profile);
    const roleArn = values['role_arn'];

    if (roleArn && values['web_identity_token_file']) {
      this.logger.debug('Profile resolves to web identity', { profile: name });
      return {
        provider: new WebIdentityCredentialProvider(
          {
            roleArn,
            sessionName: values['role_session_name'],
            webIdentityTokenFile: values['web_identity_token_file'],
            durationSeconds: parseDuration(profile),
          },
          this.context.sts
        ),
        source,
      };
    }

    if (roleArn) {
      const base = this.resolveBase(profile, visited);
      const role: AssumeRoleSpec = {
        roleArn,
        sessionName: values['role_session_name'],
        externalId: values['external_id'],
        durationSeconds: parseDuration(profile),
      };
      this.logger.debug('Profile resolves to role assumption', { profile: name, roleArn });
      return {
        provider: new AssumeRoleCredentialProvider(base, role, this.context.sts, this.logger),
        source,
      };
    }

    if (values['source_profile'] || values['credential_source']) {
      throw configurationError(
        `profile ${name}: source_profile and credential_source require role_arn`
      );
    }

    if (values['aws_access_key_id']) {
      return { provider: this.staticProvider(profile, source), source };
    }

    throw configurationError(
      `profile ${name} has no credentials: expected aws_access_key_id, or role_arn with source_profile or credential_source`
    );
  }

  private resolveBase(profile: SharedProfile, visited: readonly string[]): CredentialProvider {
    const sourceProfile = profile.values['source_profile'];
    const credentialSource = profile.values['credential_source'];

    if (sourceProfile && credentialSource) {
      throw configurationError(
        `profile ${profile.name}: source_profile and credential_source are mutually exclusive`
      );
    }

    if (sourceProfile) {
      if (sourceProfile === profile.name) {
        return this.staticProvider(profile, profileSource(profile));
      }
      if (visited.includes(sourceProfile)) {
        throw configurationError(
          `source_profile cycle: ${[...visited, profile.name, sourceProfile].join(' -> ')}`
        );
      }
      return this.resolveProfile(sourceProfile, [...visited, profile.name]).provider;
    }

    if (credentialSource) {
      return this.credentialSourceProvider(profile.name, credentialSource);
    }

    throw configurationError(
      `profile ${profile.name}: role_arn requires source_profile or credential_source`
    );
  }

  private credentialSourceProvider(profileName: string, credentialSource: string): CredentialProvider {
    switch (credentialSource) {
      case 'Ec2InstanceMetadata':
        return this.context.instanceMetadataProvider();

      case 'EcsContainer': {
        const relativeUri = this.context.environment.containerCredentialsRelativeUri;
        if (!relativeUri) {
          throw configurationError(
            `profile ${profileName}: credential_source EcsContainer requires AWS_CONTAINER_CREDENTIALS_RELATIVE_URI`
          );
        }
        return this.context.containerProvider(relativeUri);
      }

      case 'Environment':
        if (!EnvironmentCredentialProvider.isAvailable(this.context.environment)) {
          throw configurationError(
            `profile ${profileName}: credential_source Environment requires AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY`
          );
        }
        return new EnvironmentCredentialProvider(this.context.environment);

      default:
        throw configurationError(
          `profile ${profileName}: unsupported credential_source ${credentialSource}`
        );
    }
  }

  private staticProvider(profile: SharedProfile, source: string): StaticCredentialProvider {
    return new StaticCredentialProvider(
      {
        accessKeyId: profile.values['aws_access_key_id'] ?? '',
        secretAccessKey: profile.values['aws_secret_access_key'] ?? '',
        sessionToken: profile.values['aws_session_token'],
      },
      source
    );
  }
}
