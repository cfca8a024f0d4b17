/**
 * STS module exports.
 *
 * @module sts
 */

export {
  StsService,
  resolveStsEndpoint,
  type StsServiceConfig,
  type AssumeRoleRequest,
  type AssumeRoleWithWebIdentityRequest,
} from './service.js';

export {
  parseAssumeRoleResponse,
  parseAssumeRoleWithWebIdentityResponse,
  parseCallerIdentityResponse,
  type StsCredentials,
} from './xml.js';
