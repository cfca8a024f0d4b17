/**
 * STS error response mapping.
 *
 * @module error/sts
 */

import { CredentialChainError } from './index.js';

function extractElement(xml: string, tag: string): string | undefined {
  const regex = new RegExp(`<${tag}>([^<]*)</${tag}>`, 's');
  const match = xml.match(regex);
  return match?.[1]?.trim();
}

const RETRYABLE_CODES = new Set([
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'IDPCommunicationError',
  'InternalError',
  'InternalFailure',
  'InternalServiceError',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'RequestTimeout',
  'RequestTimeoutException',
]);

/**
 * Map an STS XML error response to a {@link CredentialChainError}.
 *
 * STS returns errors like:
 * ```xml
 * <ErrorResponse>
 *   <Error>
 *     <Type>Sender</Type>
 *     <Code>InvalidClientTokenId</Code>
 *     <Message>The security token included in the request is invalid.</Message>
 *   </Error>
 *   <RequestId>4c4a1f0e-0000-0000-0000-000000000000</RequestId>
 * </ErrorResponse>
 * ```
 *
 * Throttling and service-side faults are retryable. Authorization and
 * validation failures are not.
 */
export function mapStsError(xml: string, statusCode?: number): CredentialChainError {
  const serviceCode = extractElement(xml, 'Code') || 'Unknown';
  const message = extractElement(xml, 'Message') || serviceCode;
  const requestId = extractElement(xml, 'RequestId');

  let retryable = RETRYABLE_CODES.has(serviceCode);
  if (serviceCode === 'Unknown' && statusCode !== undefined) {
    retryable = statusCode >= 500 || statusCode === 429;
  }

  return new CredentialChainError(`${serviceCode}: ${message}`, 'STS', {
    retryable,
    requestId,
    statusCode,
    serviceCode,
  });
}
