/**
 * STS XML response parsing.
 *
 * @module sts/xml
 */

import { CredentialChainError } from '../error/index.js';
import type { CallerIdentity } from '../types/common.js';

/**
 * Temporary credentials returned by AssumeRole and AssumeRoleWithWebIdentity.
 */
export interface StsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken: string;
  expiration: Date;
  /** ARN of the assumed-role session, when present. */
  assumedRoleArn?: string;
}

/**
 * Extract text content from an XML element.
 */
function getTextContent(xml: string, tagName: string): string | undefined {
  const regex = new RegExp(`<${tagName}>([^<]*)</${tagName}>`, 'i');
  const match = xml.match(regex);
  return match?.[1]?.trim();
}

function getElement(xml: string, tagName: string): string | undefined {
  const regex = new RegExp(`<${tagName}>([\\s\\S]*?)</${tagName}>`, 'i');
  return xml.match(regex)?.[1];
}

function malformed(action: string, field: string): CredentialChainError {
  return new CredentialChainError(`malformed ${action} response: missing ${field}`, 'STS');
}

function required(xml: string, tagName: string, action: string): string {
  const value = getTextContent(xml, tagName);
  if (!value) {
    throw malformed(action, tagName);
  }
  return value;
}

function parseCredentials(xml: string, action: string): StsCredentials {
  const block = getElement(xml, 'Credentials');
  if (block === undefined) {
    throw malformed(action, 'Credentials');
  }

  const expiration = new Date(required(block, 'Expiration', action));
  if (Number.isNaN(expiration.getTime())) {
    throw malformed(action, 'Expiration');
  }

  const credentials: StsCredentials = {
    accessKeyId: required(block, 'AccessKeyId', action),
    secretAccessKey: required(block, 'SecretAccessKey', action),
    sessionToken: required(block, 'SessionToken', action),
    expiration,
  };

  const user = getElement(xml, 'AssumedRoleUser');
  const arn = user === undefined ? undefined : getTextContent(user, 'Arn');
  if (arn) {
    credentials.assumedRoleArn = arn;
  }

  return credentials;
}

/**
 * Parse an AssumeRole response body.
 */
export function parseAssumeRoleResponse(xml: string): StsCredentials {
  return parseCredentials(xml, 'AssumeRole');
}

/**
 * Parse an AssumeRoleWithWebIdentity response body.
 */
export function parseAssumeRoleWithWebIdentityResponse(xml: string): StsCredentials {
  return parseCredentials(xml, 'AssumeRoleWithWebIdentity');
}

/**
 * Parse a GetCallerIdentity response body.
 */
export function parseCallerIdentityResponse(xml: string): CallerIdentity {
  return {
    account: required(xml, 'Account', 'GetCallerIdentity'),
    arn: required(xml, 'Arn', 'GetCallerIdentity'),
    userId: required(xml, 'UserId', 'GetCallerIdentity'),
  };
}
