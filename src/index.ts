/**
 * AWS credential resolution with classified retries.
 *
 * @example
 * ```typescript
 * import { getAwsConfig, getAccountIdAndPartition } from 'aws-credential-chain';
 *
 * const aws = await getAwsConfig({ region: 'us-east-1', profile: 'deploy' });
 * const credentials = await aws.credentials.retrieve();
 * const { accountId, partition } = await getAccountIdAndPartition(aws);
 * ```
 *
 * @packageDocumentation
 */

// Entry points
export {
  getAwsConfig,
  getAccountIdAndPartition,
  type AwsConfigDependencies,
  type AwsConfigResult,
} from './client/index.js';

// Configuration
export {
  ConfigResolver,
  AwsConfigSchema,
  validateConfig,
  DEFAULT_MAX_RETRIES,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  DEFAULT_PROFILE,
  ProcessEnvironment,
  StaticEnvironment,
  ENV_VARS,
  readAmbientValues,
  SharedProfiles,
  loadSharedProfiles,
  parseIni,
  CREDENTIAL_DIRECTIVES,
  type AmbientEnvironment,
  type SharedProfile,
  type IniData,
} from './config/index.js';

// Credentials
export * from './credentials/index.js';

// Errors
export * from './error/index.js';
export { mapStsError } from './error/sts.js';
export { ErrorClassifier, MAX_NETWORK_RETRY_COUNT, type ErrorClass } from './error/classifier.js';

// Retries
export {
  RetryPolicy,
  DEFAULT_RETRY_CONFIG,
  sleep,
  type RetryConfig,
  type AttemptResult,
  type RetryContext,
  type ExecuteOptions,
  type RetryOutcome,
  type RetryPolicyOptions,
} from './resilience/retry.js';

// Transport, signing and STS
export * from './http/index.js';
export {
  SigV4Signer,
  formatAmzDate,
  deriveSigningKey,
  type RequestSigner,
  type SigningCredentials,
  type SigningParams,
} from './signing/v4.js';
export * from './sts/index.js';

// Validation
export { SessionValidator, parseArn, partitionForRegion, type Arn } from './validation/session.js';

// User agent
export {
  buildUserAgent,
  formatProduct,
  normalizeOs,
  currentRuntime,
  LIBRARY_NAME,
  LIBRARY_VERSION,
  type RuntimeInfo,
} from './useragent/index.js';

// Logging
export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  errorContext,
  type Logger,
  type LogLevel,
  type LogContext,
} from './observability/logging.js';

// Types
export type * from './types/index.js';
