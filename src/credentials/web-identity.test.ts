/**
 * Tests for web identity federation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { WebIdentityCredentialProvider } from './web-identity.js';
import {
  MockHttpClient,
  fixtureCredentials,
  formParams,
  stsErrorReply,
  stsWebIdentityReply,
} from '../mocks/index.js';
import { RetryPolicy } from '../resilience/retry.js';
import { StsService } from '../sts/service.js';

const ROLE_ARN = 'arn:aws:iam::123456789012:role/Federated';

describe('WebIdentityCredentialProvider', () => {
  let dir: string;
  let tokenFile: string;
  let http: MockHttpClient;
  let sts: StsService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'web-identity-'));
    tokenFile = join(dir, 'token');
    http = new MockHttpClient();
    sts = new StsService({
      region: 'us-east-1',
      httpClient: http,
      retryPolicy: new RetryPolicy({ maxAttempts: 2, baseDelayMs: 0 }),
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should exchange an inline token', async () => {
    http.on({ action: 'AssumeRoleWithWebIdentity' }, stsWebIdentityReply(fixtureCredentials({ accessKeyId: 'ASIAWEB' })));
    const provider = new WebIdentityCredentialProvider(
      { roleArn: ROLE_ARN, sessionName: 'pod', webIdentityToken: 'test-web-token' },
      sts
    );

    const credentials = await provider.retrieve();

    expect(credentials.accessKeyId).toBe('ASIAWEB');
    expect(credentials.source).toBe('WebIdentityCredentials');
    const [request] = http.requests;
    const params = request ? formParams(request) : new URLSearchParams();
    expect(params.get('RoleArn')).toBe(ROLE_ARN);
    expect(params.get('RoleSessionName')).toBe('pod');
    expect(params.get('WebIdentityToken')).toBe('test-web-token');
  });

  it('should re-read a rotated token file', async () => {
    http.on({ action: 'AssumeRoleWithWebIdentity' }, stsWebIdentityReply());
    const provider = new WebIdentityCredentialProvider({ roleArn: ROLE_ARN, webIdentityTokenFile: tokenFile }, sts);

    await writeFile(tokenFile, 'test-token-one\n');
    await provider.retrieve();
    await writeFile(tokenFile, 'test-token-two\n');
    await provider.retrieve();

    expect(http.requests.map((request) => formParams(request).get('WebIdentityToken'))).toEqual([
      'test-token-one',
      'test-token-two',
    ]);
  });

  it('should use the fallback token file', async () => {
    http.on({ action: 'AssumeRoleWithWebIdentity' }, stsWebIdentityReply());
    await writeFile(tokenFile, 'test-env-token');
    const provider = new WebIdentityCredentialProvider({ roleArn: ROLE_ARN }, sts, { fallbackTokenFile: tokenFile });

    await provider.retrieve();

    expect(http.requests[0] && formParams(http.requests[0]).get('WebIdentityToken')).toBe('test-env-token');
  });

  it('should require a token source', () => {
    expect(() => new WebIdentityCredentialProvider({ roleArn: ROLE_ARN }, sts)).toThrow(
      `web identity role ${ROLE_ARN}: no web identity token or token file configured`
    );
  });

  it('should reject an empty token file', async () => {
    await writeFile(tokenFile, '  \n');
    const provider = new WebIdentityCredentialProvider({ roleArn: ROLE_ARN, webIdentityTokenFile: tokenFile }, sts);

    await expect(provider.retrieve()).rejects.toMatchObject({
      code: 'CONFIGURATION',
      message: `web identity token file ${tokenFile} is empty`,
    });
    expect(http.requests).toHaveLength(0);
  });

  it('should report a missing token file as a configuration error', async () => {
    const missing = join(dir, 'missing');
    const provider = new WebIdentityCredentialProvider({ roleArn: ROLE_ARN, webIdentityTokenFile: missing }, sts);

    await expect(provider.retrieve()).rejects.toMatchObject({
      code: 'CONFIGURATION',
      message: `unable to read web identity token file ${missing}`,
    });
  });

  it('should wrap STS rejections', async () => {
    http.on({ action: 'AssumeRoleWithWebIdentity' }, stsErrorReply('InvalidIdentityToken', 'token expired', 400));
    const provider = new WebIdentityCredentialProvider({ roleArn: ROLE_ARN, webIdentityToken: 'test-web-token' }, sts);

    await expect(provider.retrieve()).rejects.toMatchObject({
      code: 'CANNOT_ASSUME_ROLE',
      message: `cannot assume IAM Role (${ROLE_ARN}): InvalidIdentityToken: token expired`,
    });
    expect(http.requests).toHaveLength(1);
  });
});
