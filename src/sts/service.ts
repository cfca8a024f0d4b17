/**
 * AWS STS Service
 *
 * STS uses POST requests with application/x-www-form-urlencoded bodies and
 * answers in XML.
 *
 * @module sts/service
 */

import { mapStsError } from '../error/sts.js';
import type { HttpClient, HttpRequest } from '../http/types.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { RetryPolicy } from '../resilience/retry.js';
import { SigV4Signer, type RequestSigner, type SigningCredentials } from '../signing/v4.js';
import type { CallerIdentity, RetrieveOptions } from '../types/common.js';
import type { AssumeRoleSpec } from '../types/config.js';
import {
  parseAssumeRoleResponse,
  parseAssumeRoleWithWebIdentityResponse,
  parseCallerIdentityResponse,
  type StsCredentials,
} from './xml.js';

/**
 * STS client configuration.
 */
export interface StsServiceConfig {
  /** Region used for the endpoint and the signature scope. */
  region: string;
  /** Custom endpoint URL; defaults to the regional endpoint. */
  endpoint?: string;
  httpClient: HttpClient;
  signer?: RequestSigner;
  /** Retries transport failures and throttling; defaults to {@link RetryPolicy} defaults. */
  retryPolicy?: RetryPolicy;
  /** Sent as the `user-agent` header. */
  userAgent?: string;
  logger?: Logger;
}

/**
 * AssumeRole request; the session name is required on the wire.
 */
export interface AssumeRoleRequest extends AssumeRoleSpec {
  readonly sessionName: string;
}

/**
 * AssumeRoleWithWebIdentity request.
 */
export interface AssumeRoleWithWebIdentityRequest {
  readonly roleArn: string;
  readonly sessionName: string;
  readonly webIdentityToken: string;
  readonly durationSeconds?: number;
  readonly policy?: string;
  readonly policyArns?: readonly string[];
}

type FormParams = Record<string, string | number>;

/**
 * Regional STS endpoint for a region.
 */
export function resolveStsEndpoint(region: string): string {
  const suffix = region.startsWith('cn-') ? 'amazonaws.com.cn' : 'amazonaws.com';
  return `https://sts.${region}.${suffix}`;
}

function addPolicyArns(params: FormParams, policyArns: readonly string[] | undefined): void {
  policyArns?.forEach((arn, index) => {
    params[`PolicyArns.member.${index + 1}.arn`] = arn;
  });
}

/**
 * AWS Security Token Service client.
 *
 * Credentials are passed per call so that one client serves every provider
 * in a chain.
 *
 * @example
 * ```typescript
 * const sts = new StsService({ region: 'us-east-1', httpClient: new FetchTransport() });
 *
 * const assumed = await sts.assumeRole(
 *   { roleArn: 'arn:aws:iam::123456789012:role/Deploy', sessionName: 'ci' },
 *   baseCredentials
 * );
 * ```
 */
export class StsService {
  /**
   * STS API version
   */
  static readonly VERSION = '2011-06-15';

  readonly endpoint: string;
  private readonly region: string;
  private readonly httpClient: HttpClient;
  private readonly signer: RequestSigner;
  private readonly retryPolicy: RetryPolicy;
  private readonly userAgent?: string;
  private readonly logger: Logger;

  constructor(config: StsServiceConfig) {
    this.region = config.region;
    this.endpoint = config.endpoint ?? resolveStsEndpoint(config.region);
    this.httpClient = config.httpClient;
    this.signer = config.signer ?? new SigV4Signer();
    this.retryPolicy = config.retryPolicy ?? new RetryPolicy();
    this.userAgent = config.userAgent;
    this.logger = config.logger ?? new NoopLogger();
  }

  /**
   * Assume an IAM role, signing the call with `credentials`.
   */
  async assumeRole(
    request: AssumeRoleRequest,
    credentials: SigningCredentials,
    options: RetrieveOptions = {}
  ): Promise<StsCredentials> {
    const params: FormParams = {
      RoleArn: request.roleArn,
      RoleSessionName: request.sessionName,
    };

    if (request.durationSeconds !== undefined) {
      params.DurationSeconds = request.durationSeconds;
    }
    if (request.externalId) {
      params.ExternalId = request.externalId;
    }
    if (request.policy) {
      params.Policy = request.policy;
    }
    addPolicyArns(params, request.policyArns);

    if (request.tags) {
      Object.keys(request.tags)
        .sort()
        .forEach((key, index) => {
          params[`Tags.member.${index + 1}.Key`] = key;
          params[`Tags.member.${index + 1}.Value`] = request.tags?.[key] ?? '';
        });
    }

    request.transitiveTagKeys?.forEach((key, index) => {
      params[`TransitiveTagKeys.member.${index + 1}`] = key;
    });

    const body = await this.request('AssumeRole', params, credentials, options.signal);
    return parseAssumeRoleResponse(body);
  }

  /**
   * Assume a role with a web identity token. The call is not signed.
   */
  async assumeRoleWithWebIdentity(
    request: AssumeRoleWithWebIdentityRequest,
    options: RetrieveOptions = {}
  ): Promise<StsCredentials> {
    const params: FormParams = {
      RoleArn: request.roleArn,
      RoleSessionName: request.sessionName,
      WebIdentityToken: request.webIdentityToken,
    };

    if (request.durationSeconds !== undefined) {
      params.DurationSeconds = request.durationSeconds;
    }
    if (request.policy) {
      params.Policy = request.policy;
    }
    addPolicyArns(params, request.policyArns);

    const body = await this.request('AssumeRoleWithWebIdentity', params, undefined, options.signal);
    return parseAssumeRoleWithWebIdentityResponse(body);
  }

  /**
   * Identify the principal behind `credentials`.
   */
  async getCallerIdentity(credentials: SigningCredentials, options: RetrieveOptions = {}): Promise<CallerIdentity> {
    const body = await this.request('GetCallerIdentity', {}, credentials, options.signal);
    return parseCallerIdentityResponse(body);
  }

  private buildFormBody(action: string, params: FormParams): string {
    const urlParams = new URLSearchParams();
    urlParams.append('Action', action);
    urlParams.append('Version', StsService.VERSION);
    for (const [key, value] of Object.entries(params)) {
      urlParams.append(key, String(value));
    }
    return urlParams.toString();
  }

  private async request(
    action: string,
    params: FormParams,
    credentials: SigningCredentials | undefined,
    signal?: AbortSignal
  ): Promise<string> {
    const body = this.buildFormBody(action, params);

    return this.retryPolicy.execute(
      async ({ attempt, signal: attemptSignal }) => {
        let request: HttpRequest = {
          method: 'POST',
          url: this.endpoint,
          headers: {
            'content-type': 'application/x-www-form-urlencoded; charset=utf-8',
            ...(this.userAgent ? { 'user-agent': this.userAgent } : {}),
          },
          body,
          signal: attemptSignal,
        };

        if (credentials) {
          request = this.signer.sign(request, {
            region: this.region,
            service: 'sts',
            credentials,
          });
        }

        this.logger.debug('Sending STS request', { action, attempt, endpoint: this.endpoint });
        const response = await this.httpClient.send(request);

        if (response.status >= 400) {
          throw mapStsError(response.body, response.status);
        }

        return response.body;
      },
      { signal, operationName: `sts:${action}` }
    );
  }
}
