/**
 * Source labels attached to resolved credentials.
 *
 * @module credentials/sources
 */

export const STATIC_SOURCE = 'StaticCredentials';
export const ENVIRONMENT_SOURCE = 'EnvConfigCredentials';
export const SHARED_CONFIG_SOURCE = 'SharedConfigCredentials';
export const CONTAINER_SOURCE = 'CredentialsEndpointProvider';
export const EC2_ROLE_SOURCE = 'EC2RoleProvider';
export const WEB_IDENTITY_SOURCE = 'WebIdentityCredentials';
export const ASSUME_ROLE_SOURCE = 'AssumeRoleProvider';

/**
 * Label for credentials read from a shared file.
 */
export function sharedConfigSource(filename: string): string {
  return `${SHARED_CONFIG_SOURCE}: ${filename}`;
}
