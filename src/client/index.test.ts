/**
 * Tests for the top-level entry points
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { getAccountIdAndPartition, getAwsConfig, type AwsConfigDependencies } from './index.js';
import { StaticEnvironment } from '../config/environment.js';
import {
  MockHttpClient,
  connectionRefusedError,
  fixtureCredentials,
  formParams,
  stsAssumeRoleReply,
  stsCallerIdentityReply,
  stsErrorReply,
  textReply,
} from '../mocks/index.js';
import type { AwsConfig } from '../types/config.js';

const RUNTIME = { platform: 'linux', arch: 'x64', nodeVersion: '20.11.1' };

const WITHOUT_REGION: AwsConfig = {
  accessKey: 'AKIDEXAMPLE',
  secretKey: 'test-secret',
  maxRetries: 2,
  retryBaseDelayMs: 0,
};

const STATIC: AwsConfig = { ...WITHOUT_REGION, region: 'us-east-1' };

describe('getAwsConfig', () => {
  let http: MockHttpClient;
  let deps: AwsConfigDependencies;

  beforeEach(() => {
    http = new MockHttpClient();
    deps = { environment: new StaticEnvironment({}), httpClient: http, runtime: RUNTIME };
  });

  it('should resolve static credentials and validate them', async () => {
    http.on({ action: 'GetCallerIdentity' }, stsCallerIdentityReply());

    const aws = await getAwsConfig(STATIC, deps);

    expect(aws.region).toBe('us-east-1');
    expect(aws.credentialSource).toBe('StaticCredentials');
    expect(aws.identity?.account).toBe('123456789012');
    expect(aws.userAgent).toBe(
      'aws-credential-chain/0.1.0 os/linux lang/nodejs/20.11.1 md/platform/linux md/arch/x64'
    );

    const [request] = http.requests;
    expect(request?.url).toBe('https://sts.us-east-1.amazonaws.com');
    expect(request?.headers['user-agent']).toBe(aws.userAgent);
  });

  it('should skip validation when asked', async () => {
    const aws = await getAwsConfig({ ...STATIC, skipCredentialsValidation: true }, deps);

    expect(aws.identity).toBeUndefined();
    expect(http.requests).toHaveLength(0);
    expect((await aws.credentials.retrieve()).accessKeyId).toBe('AKIDEXAMPLE');
  });

  it('should read credentials from the environment', async () => {
    const aws = await getAwsConfig(
      { region: 'us-east-1', skipCredentialsValidation: true },
      {
        ...deps,
        environment: new StaticEnvironment({ AWS_ACCESS_KEY_ID: 'AKIDENV', AWS_SECRET_ACCESS_KEY: 'test-secret' }),
      }
    );

    expect(aws.credentialSource).toBe('EnvConfigCredentials');
    expect((await aws.credentials.retrieve()).accessKeyId).toBe('AKIDENV');
  });

  it('should use the STS region and endpoint overrides', async () => {
    http.on({ action: 'GetCallerIdentity' }, stsCallerIdentityReply());

    await getAwsConfig({ ...STATIC, stsRegion: 'eu-west-1' }, deps);
    await getAwsConfig({ ...STATIC, stsEndpoint: 'https://sts.internal.example' }, deps);

    expect(http.requests.map((request) => request.url)).toEqual([
      'https://sts.eu-west-1.amazonaws.com',
      'https://sts.internal.example',
    ]);
  });

  it('should assume the configured role', async () => {
    http.on({ action: 'AssumeRole' }, stsAssumeRoleReply(fixtureCredentials({ accessKeyId: 'ASIAROLE' })));

    const aws = await getAwsConfig(
      {
        ...STATIC,
        skipCredentialsValidation: true,
        assumeRole: { roleArn: 'arn:aws:iam::123456789012:role/Deploy', sessionName: 'release' },
      },
      deps
    );

    expect(aws.credentialSource).toBe('StaticCredentials');
    expect((await aws.credentials.retrieve()).accessKeyId).toBe('ASIAROLE');
    expect(http.requests).toHaveLength(1);
    const [request] = http.requests;
    expect(request && formParams(request).get('RoleSessionName')).toBe('release');
  });

  it('should report rejected credentials as a validation failure', async () => {
    http.on({ action: 'GetCallerIdentity' }, stsErrorReply('InvalidClientTokenId', 'invalid token'));

    await expect(getAwsConfig(STATIC, deps)).rejects.toMatchObject({
      code: 'CREDENTIAL_VALIDATION_FAILED',
      message: 'validating provider credentials: InvalidClientTokenId: invalid token',
    });
  });

  it('should require a region when metadata is skipped', async () => {
    await expect(getAwsConfig({ ...WITHOUT_REGION, skipMetadataApiCheck: true }, deps)).rejects.toMatchObject({
      code: 'CONFIGURATION',
      message: 'no region configured: set region, AWS_REGION or a profile region',
    });
    expect(http.requests).toHaveLength(0);
  });

  it('should take the region from instance metadata', async () => {
    http
      .on({ method: 'PUT', path: '/latest/api/token' }, textReply('test-imds-token'))
      .on(
        { path: '/latest/dynamic/instance-identity/document' },
        textReply(JSON.stringify({ region: 'eu-north-1', instanceId: 'i-0test' }))
      );
    const aws = await getAwsConfig({ ...WITHOUT_REGION, skipCredentialsValidation: true }, deps);

    expect(aws.region).toBe('eu-north-1');
    const document = http.requestsFor({ path: '/latest/dynamic/instance-identity/document' });
    expect(document[0]?.headers['x-aws-ec2-metadata-token']).toBe('test-imds-token');
  });

  it('should fail when instance metadata has no region', async () => {
    await expect(getAwsConfig(WITHOUT_REGION, deps)).rejects.toMatchObject({
      code: 'CONFIGURATION',
      message: 'no region configured and none available from instance metadata',
    });
  });

  it('should report missing credential sources before a missing region', async () => {
    const unreachable = new MockHttpClient({ error: connectionRefusedError('169.254.169.254:80') });

    await expect(
      getAwsConfig({ maxRetries: 2, retryBaseDelayMs: 0 }, { ...deps, httpClient: unreachable })
    ).rejects.toMatchObject({ code: 'NO_VALID_CREDENTIAL_SOURCES' });
    expect(unreachable.requestsFor({ path: '/latest/dynamic/instance-identity/document' })).toHaveLength(0);
  });

  it('should validate in the region found in instance metadata', async () => {
    http
      .on({ method: 'PUT', path: '/latest/api/token' }, textReply('test-imds-token'))
      .on(
        { path: '/latest/dynamic/instance-identity/document' },
        textReply(JSON.stringify({ region: 'eu-north-1', instanceId: 'i-0test' }))
      )
      .on({ action: 'GetCallerIdentity' }, stsCallerIdentityReply());

    const aws = await getAwsConfig(WITHOUT_REGION, deps);

    expect(aws.identity?.account).toBe('123456789012');
    expect(http.requestsFor({ action: 'GetCallerIdentity' })[0]?.url).toBe('https://sts.eu-north-1.amazonaws.com');
  });
});

describe('getAccountIdAndPartition', () => {
  let http: MockHttpClient;
  let deps: AwsConfigDependencies;

  beforeEach(() => {
    http = new MockHttpClient();
    deps = { environment: new StaticEnvironment({}), httpClient: http, runtime: RUNTIME };
  });

  it('should reuse the validated identity', async () => {
    http.on(
      { action: 'GetCallerIdentity' },
      stsCallerIdentityReply('210987654321', 'arn:aws:iam::210987654321:user/ci')
    );
    const aws = await getAwsConfig(STATIC, deps);

    const info = await getAccountIdAndPartition(aws);

    expect(info).toEqual({ accountId: '210987654321', partition: 'aws' });
    expect(http.requests).toHaveLength(1);
  });

  it('should look the account up when validation was skipped', async () => {
    http.on(
      { action: 'GetCallerIdentity' },
      stsCallerIdentityReply('210987654321', 'arn:aws-cn:iam::210987654321:user/ci')
    );
    const aws = await getAwsConfig({ ...STATIC, region: 'cn-north-1', skipCredentialsValidation: true }, deps);

    const info = await getAccountIdAndPartition(aws);

    expect(info).toEqual({ accountId: '210987654321', partition: 'aws-cn' });
    expect(http.requests).toHaveLength(1);
  });

  it('should return an empty account ID when the lookup is skipped', async () => {
    const aws = await getAwsConfig(
      { ...STATIC, region: 'us-gov-west-1', skipCredentialsValidation: true, skipRequestingAccountId: true },
      deps
    );

    const info = await getAccountIdAndPartition(aws);

    expect(info).toEqual({ accountId: '', partition: 'aws-us-gov' });
    expect(http.requests).toHaveLength(0);
  });
});
