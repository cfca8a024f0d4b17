/**
 * Shared handling of metadata-endpoint credential documents.
 *
 * @module credentials/metadata
 */

import { z } from 'zod';
import { metadataError } from '../error/index.js';
import type { HttpResponse } from '../http/types.js';
import type { AwsCredentials } from '../types/common.js';

/**
 * Credential document served by the instance metadata service and the
 * container credentials endpoint.
 */
const MetadataCredentialsSchema = z.object({
  Code: z.string().optional(),
  Message: z.string().optional(),
  AccessKeyId: z.string().min(1),
  SecretAccessKey: z.string().min(1),
  Token: z.string().optional(),
  Expiration: z.string().datetime({ offset: true }).optional(),
});

/**
 * Parse a credential document into {@link AwsCredentials}.
 *
 * @throws {CredentialChainError} `METADATA` when the body is not a valid document
 */
export function parseMetadataCredentials(body: string, source: string): AwsCredentials {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw metadataError(`${source}: credential document is not JSON`, { cause: error });
  }

  const result = MetadataCredentialsSchema.safeParse(json);
  if (!result.success) {
    throw metadataError(`${source}: invalid credential document`, { cause: result.error });
  }

  const document = result.data;
  if (document.Code !== undefined && document.Code !== 'Success') {
    throw metadataError(`${source}: returned code ${document.Code}${document.Message ? `: ${document.Message}` : ''}`);
  }

  return {
    accessKeyId: document.AccessKeyId,
    secretAccessKey: document.SecretAccessKey,
    ...(document.Token ? { sessionToken: document.Token } : {}),
    ...(document.Expiration ? { expiration: new Date(document.Expiration) } : {}),
    source,
  };
}

/**
 * Turn a non-2xx metadata response into an error; 5xx and 429 are retryable.
 */
export function assertMetadataResponse(response: HttpResponse, what: string): void {
  if (response.status >= 200 && response.status < 300) {
    return;
  }
  throw metadataError(`${what}: HTTP ${response.status}`, {
    statusCode: response.status,
    retryable: response.status >= 500 || response.status === 429,
  });
}
