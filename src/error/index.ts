/**
 * Credential chain error types.
 *
 * Every failure surfaced by this package is a {@link CredentialChainError}
 * carrying a classification code, retryability and the original cause, so
 * callers can branch on predicates instead of matching message text.
 *
 * @module error
 */

/**
 * Credential chain error codes.
 */
export type CredentialChainErrorCode =
  | 'NO_VALID_CREDENTIAL_SOURCES' // No candidate provider produced credentials
  | 'CANNOT_ASSUME_ROLE' // STS rejected a role assumption
  | 'CREDENTIAL_VALIDATION_FAILED' // Identity check with resolved credentials failed
  | 'RETRY_EXHAUSTED' // Attempt ceiling reached
  | 'CONFIGURATION' // Invalid or contradictory configuration
  | 'CREDENTIALS_NOT_FOUND' // A single provider had nothing to offer
  | 'METADATA' // Instance or container metadata endpoint failure
  | 'STS' // STS API error response
  | 'NETWORK' // Transport-level failure
  | 'CANCELLED' // Caller aborted the operation
  | 'UNKNOWN';

export interface CredentialChainErrorOptions {
  /** Whether the failed operation may be attempted again. */
  retryable?: boolean;
  /** AWS request ID, when the error came from an AWS response. */
  requestId?: string;
  /** HTTP status code, when the error came from an HTTP response. */
  statusCode?: number;
  /** Service error code such as `InvalidClientTokenId`. */
  serviceCode?: string;
  /** Underlying error. */
  cause?: unknown;
}

/**
 * Base error class for the package.
 *
 * @example
 * ```typescript
 * throw new CredentialChainError('Role not assumable', 'CANNOT_ASSUME_ROLE', {
 *   cause: stsError,
 * });
 * ```
 */
export class CredentialChainError extends Error {
  public readonly code: CredentialChainErrorCode;
  public readonly retryable: boolean;
  public readonly requestId?: string;
  public readonly statusCode?: number;
  public readonly serviceCode?: string;

  constructor(message: string, code: CredentialChainErrorCode, options: CredentialChainErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CredentialChainError';
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.requestId = options.requestId;
    this.statusCode = options.statusCode;
    this.serviceCode = options.serviceCode;

    // Maintain proper stack trace in V8 engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Transport-level failure of a network operation.
 *
 * The Node system error (for example `ENOTFOUND` or `ECONNREFUSED`) is kept
 * as the cause so the classifier can tell reachability failures apart from
 * other transport errors.
 */
export class NetworkError extends CredentialChainError {
  public readonly operation: string;
  public readonly url?: string;

  constructor(message: string, options: { operation?: string; url?: string; cause?: unknown } = {}) {
    super(message, 'NETWORK', { retryable: true, cause: options.cause });
    this.name = 'NetworkError';
    this.operation = options.operation ?? 'request';
    this.url = options.url;
  }
}

/**
 * Terminal error recorded when a retry ceiling is reached.
 */
export class MaxAttemptsError extends CredentialChainError {
  public readonly attempt: number;

  constructor(attempt: number, cause: unknown) {
    super(
      `exceeded maximum number of attempts, ${attempt}, ${describeError(cause)}`,
      'RETRY_EXHAUSTED',
      { cause }
    );
    this.name = 'MaxAttemptsError';
    this.attempt = attempt;
  }
}

/**
 * Render any thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Walk `error.cause` links, starting with the error itself.
 *
 * Stops at ten levels so that a self-referencing cause cannot loop.
 */
export function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && chain.length < 10) {
    if (chain.includes(current)) {
      break;
    }
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

// ============================================================================
// Factories
// ============================================================================

export function configurationError(message: string, cause?: unknown): CredentialChainError {
  return new CredentialChainError(message, 'CONFIGURATION', { cause });
}

export function credentialsNotFoundError(message: string): CredentialChainError {
  return new CredentialChainError(message, 'CREDENTIALS_NOT_FOUND');
}

export function noValidCredentialSourcesError(cause?: unknown): CredentialChainError {
  const detail = cause === undefined ? '' : `: ${describeError(cause)}`;
  return new CredentialChainError(
    `no valid credential sources found${detail}`,
    'NO_VALID_CREDENTIAL_SOURCES',
    { cause }
  );
}

export function cannotAssumeRoleError(roleArn: string, cause: unknown): CredentialChainError {
  return new CredentialChainError(
    `cannot assume IAM Role (${roleArn}): ${describeError(cause)}`,
    'CANNOT_ASSUME_ROLE',
    { cause }
  );
}

export function credentialValidationError(cause: unknown): CredentialChainError {
  return new CredentialChainError(
    `validating provider credentials: ${describeError(cause)}`,
    'CREDENTIAL_VALIDATION_FAILED',
    { cause }
  );
}

export function metadataError(
  message: string,
  options: { statusCode?: number; retryable?: boolean; cause?: unknown } = {}
): CredentialChainError {
  return new CredentialChainError(message, 'METADATA', options);
}

export function cancelledError(reason?: unknown): CredentialChainError {
  return new CredentialChainError('operation cancelled', 'CANCELLED', { cause: reason });
}

/**
 * Throw a `CANCELLED` error when the signal has already fired.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancelledError(signal.reason);
  }
}

// ============================================================================
// Predicates
// ============================================================================

function hasCode(error: unknown, code: CredentialChainErrorCode): boolean {
  return error instanceof CredentialChainError && error.code === code;
}

export function isNoValidCredentialSourcesError(error: unknown): boolean {
  return hasCode(error, 'NO_VALID_CREDENTIAL_SOURCES');
}

export function isCannotAssumeRoleError(error: unknown): boolean {
  return hasCode(error, 'CANNOT_ASSUME_ROLE');
}

export function isCredentialValidationError(error: unknown): boolean {
  return hasCode(error, 'CREDENTIAL_VALIDATION_FAILED');
}

export function isRetryExhaustedError(error: unknown): boolean {
  return hasCode(error, 'RETRY_EXHAUSTED');
}

export function isConfigurationError(error: unknown): boolean {
  return hasCode(error, 'CONFIGURATION');
}

/**
 * True for `CANCELLED` errors and for the `AbortError` raised by fetch and timers.
 */
export function isCancellationError(error: unknown): boolean {
  if (hasCode(error, 'CANCELLED')) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}
