/**
 * Tests for instance metadata credentials
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ImdsClient, ImdsCredentialProvider } from './imds.js';
import { parseMetadataCredentials } from './metadata.js';
import { MockHttpClient, fixtureCredentials, metadataCredentialsReply, textReply } from '../mocks/index.js';
import { RetryPolicy } from '../resilience/retry.js';

const ROLE_PATH = '/latest/meta-data/iam/security-credentials/';

describe('parseMetadataCredentials', () => {
  it('should map the document fields', () => {
    const credentials = parseMetadataCredentials(
      JSON.stringify({
        Code: 'Success',
        AccessKeyId: 'ASIAMETA',
        SecretAccessKey: 'test-secret',
        Token: 'test-token',
        Expiration: '2030-01-01T00:00:00Z',
      }),
      'EC2RoleProvider'
    );

    expect(credentials).toEqual({
      accessKeyId: 'ASIAMETA',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-token',
      expiration: new Date('2030-01-01T00:00:00.000Z'),
      source: 'EC2RoleProvider',
    });
  });

  it('should reject a failure code', () => {
    expect(() =>
      parseMetadataCredentials(
        JSON.stringify({ Code: 'AssumeRoleUnauthorizedAccess', Message: 'denied', AccessKeyId: 'A', SecretAccessKey: 'S' }),
        'EC2RoleProvider'
      )
    ).toThrow('EC2RoleProvider: returned code AssumeRoleUnauthorizedAccess: denied');
  });

  it('should reject bodies that are not JSON', () => {
    expect(() => parseMetadataCredentials('<html>', 'EC2RoleProvider')).toThrow(
      'EC2RoleProvider: credential document is not JSON'
    );
  });

  it('should reject documents without keys', () => {
    expect(() => parseMetadataCredentials('{"Code":"Success"}', 'EC2RoleProvider')).toThrow(
      'EC2RoleProvider: invalid credential document'
    );
  });
});

describe('ImdsClient', () => {
  let http: MockHttpClient;
  let client: ImdsClient;

  beforeEach(() => {
    http = new MockHttpClient();
    client = new ImdsClient({
      httpClient: http,
      retryPolicy: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 }),
      userAgent: 'app/1.0',
    });
  });

  it('should reuse the session token', async () => {
    http
      .on({ method: 'PUT', path: '/latest/api/token' }, textReply('test-imds-token\n'))
      .on({ method: 'GET' }, textReply('value'));

    await client.get('/latest/meta-data/instance-id');
    await client.get('/latest/meta-data/ami-id');

    const puts = http.requestsFor({ method: 'PUT' });
    expect(puts).toHaveLength(1);
    expect(puts[0]?.url).toBe('http://169.254.169.254/latest/api/token');
    expect(puts[0]?.headers['x-aws-ec2-metadata-token-ttl-seconds']).toBe('21600');
    const gets = http.requestsFor({ method: 'GET' });
    expect(gets.map((request) => request.headers['x-aws-ec2-metadata-token'])).toEqual([
      'test-imds-token',
      'test-imds-token',
    ]);
    expect(gets[0]?.headers['user-agent']).toBe('app/1.0');
  });

  it('should fall back to reads without a token', async () => {
    http.on({ method: 'PUT' }, textReply('', 405)).on({ method: 'GET' }, textReply('i-0test'));

    expect(await client.get('/latest/meta-data/instance-id')).toBe('i-0test');
    expect(http.requestsFor({ method: 'GET' })[0]?.headers['x-aws-ec2-metadata-token']).toBeUndefined();
  });

  it('should fetch a new token after a 401', async () => {
    http
      .on({ method: 'PUT' }, textReply('test-token-one'), textReply('test-token-two'))
      .on({ method: 'GET' }, textReply('', 401), textReply('i-0test'));

    expect(await client.get('/latest/meta-data/instance-id')).toBe('i-0test');
    expect(http.requestsFor({ method: 'PUT' })).toHaveLength(2);
    expect(http.requestsFor({ method: 'GET' })[1]?.headers['x-aws-ec2-metadata-token']).toBe('test-token-two');
  });

  it('should trim a trailing slash from a custom endpoint', () => {
    expect(new ImdsClient({ httpClient: http, endpoint: 'http://[fd00:ec2::254]/' }).endpoint).toBe(
      'http://[fd00:ec2::254]'
    );
  });

  it('should reject an identity document without a region', async () => {
    http.on({ method: 'GET' }, textReply('{"instanceId":"i-0test"}'));

    await expect(client.getInstanceRegion()).rejects.toThrow('IMDS instance identity document has no region');
  });
});

describe('ImdsCredentialProvider', () => {
  let http: MockHttpClient;
  let provider: ImdsCredentialProvider;

  beforeEach(() => {
    http = new MockHttpClient();
    provider = new ImdsCredentialProvider(
      new ImdsClient({ httpClient: http, retryPolicy: new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0 }) })
    );
  });

  it('should read the credentials of the first listed role', async () => {
    http
      .on({ path: ROLE_PATH }, textReply('web-role\nother-role\n'))
      .on({ path: `${ROLE_PATH}web-role` }, metadataCredentialsReply(fixtureCredentials({ accessKeyId: 'ASIAEC2' })));

    const credentials = await provider.retrieve();

    expect(credentials.accessKeyId).toBe('ASIAEC2');
    expect(credentials.source).toBe('EC2RoleProvider');
  });

  it('should fail when no role is attached', async () => {
    http.on({ path: ROLE_PATH }, textReply('\n'));

    await expect(provider.retrieve()).rejects.toMatchObject({
      code: 'METADATA',
      message: 'no IAM role attached to this instance',
    });
  });

  it('should retry server errors', async () => {
    http
      .on({ path: ROLE_PATH }, textReply('', 503), textReply('web-role'))
      .on({ path: `${ROLE_PATH}web-role` }, metadataCredentialsReply());

    await provider.retrieve();

    expect(http.requestsFor({ path: ROLE_PATH })).toHaveLength(2);
  });
});
