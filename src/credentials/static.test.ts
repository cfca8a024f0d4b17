/**
 * Tests for static and environment credentials
 */

import { describe, it, expect } from 'vitest';
import { EnvironmentCredentialProvider, StaticCredentialProvider } from './static.js';

describe('StaticCredentialProvider', () => {
  it('should return the configured keys', async () => {
    const provider = new StaticCredentialProvider({ accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' });

    expect(await provider.retrieve()).toEqual({
      accessKeyId: 'AKIDEXAMPLE',
      secretAccessKey: 'test-secret',
      source: 'StaticCredentials',
    });
    expect(provider.isExpired()).toBe(false);
  });

  it('should hand out copies', async () => {
    const provider = new StaticCredentialProvider({ accessKeyId: 'AKIDEXAMPLE', secretAccessKey: 'test-secret' });

    const first = await provider.retrieve();
    const second = await provider.retrieve();

    expect(first).not.toBe(second);
    expect(first).toEqual(second);
  });

  it('should reject a missing secret key', () => {
    expect(() => new StaticCredentialProvider({ accessKeyId: 'AKIDEXAMPLE', secretAccessKey: '' })).toThrow(
      'StaticCredentials: access key ID and secret access key are required'
    );
  });
});

describe('EnvironmentCredentialProvider', () => {
  it('should report availability only for a full key pair', () => {
    expect(EnvironmentCredentialProvider.isAvailable({ accessKeyId: 'AKID', ec2MetadataDisabled: false })).toBe(false);
    expect(EnvironmentCredentialProvider.isAvailable({ accessKeyId: 'AKID', secretAccessKey: 'test-secret', ec2MetadataDisabled: false })).toBe(
      true
    );
  });

  it('should include the session token', async () => {
    const provider = new EnvironmentCredentialProvider({
      accessKeyId: 'ASIAENV',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-token',
      ec2MetadataDisabled: false,
    });

    expect(await provider.retrieve()).toEqual({
      accessKeyId: 'ASIAENV',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-token',
      source: 'EnvConfigCredentials',
    });
  });

  it('should fail when the environment has no keys', async () => {
    await expect(new EnvironmentCredentialProvider({ ec2MetadataDisabled: false }).retrieve()).rejects.toMatchObject({
      code: 'CREDENTIALS_NOT_FOUND',
    });
  });
});
