/**
 * Error classification for credential resolution and retries.
 *
 * @module error/classifier
 */

import {
  CredentialChainError,
  NetworkError,
  causeChain,
  isCancellationError,
} from './index.js';

/**
 * Outcome of classifying a failure.
 */
export type ErrorClass =
  | 'retryable'
  | 'fatal'
  | 'no_valid_credential_sources'
  | 'cannot_assume_role';

/**
 * Attempt ceiling for DNS and connection-refused failures.
 *
 * Counted separately from the general retry ceiling; these failures point at
 * the environment rather than at a transient service fault.
 */
export const MAX_NETWORK_RETRY_COUNT = 9;

const REACHABILITY_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'ECONNREFUSED']);

const REACHABILITY_MESSAGES = ['no such host', 'connection refused'];

const SYSTEM_ERROR_CODE = /^E[A-Z_]+$/;

function errorCodeOf(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

function messageOf(value: unknown): string {
  return value instanceof Error ? value.message.toLowerCase() : '';
}

/**
 * Categorizes failures independently of the provider that raised them.
 *
 * @example
 * ```typescript
 * const classifier = new ErrorClassifier();
 * if (classifier.classify(error) === 'retryable') {
 *   // back off and try again
 * }
 * ```
 */
export class ErrorClassifier {
  classify(error: unknown): ErrorClass {
    if (isCancellationError(error)) {
      return 'fatal';
    }

    if (error instanceof CredentialChainError) {
      if (error.code === 'NO_VALID_CREDENTIAL_SOURCES') {
        return 'no_valid_credential_sources';
      }
      if (error.code === 'CANNOT_ASSUME_ROLE') {
        return 'cannot_assume_role';
      }
    }

    const selfDescribed = this.selfDescribedRetryable(error);
    if (selfDescribed !== undefined) {
      return selfDescribed ? 'retryable' : 'fatal';
    }

    if (this.isNetworkOperationError(error)) {
      return 'retryable';
    }

    return 'fatal';
  }

  isRetryable(error: unknown): boolean {
    return this.classify(error) === 'retryable';
  }

  /**
   * True when a network operation failed because the host could not be
   * resolved or refused the connection.
   */
  isNetworkReachabilityError(error: unknown): boolean {
    if (!this.isNetworkOperationError(error)) {
      return false;
    }
    return causeChain(error).some((link) => {
      const code = errorCodeOf(link);
      if (code !== undefined && REACHABILITY_CODES.has(code)) {
        return true;
      }
      const message = messageOf(link);
      return REACHABILITY_MESSAGES.some((fragment) => message.includes(fragment));
    });
  }

  /**
   * A transport failure: a {@link NetworkError} or anything whose cause chain
   * carries a Node system error code.
   */
  isNetworkOperationError(error: unknown): boolean {
    return causeChain(error).some((link) => {
      if (link instanceof NetworkError) {
        return true;
      }
      const code = errorCodeOf(link);
      return code !== undefined && SYSTEM_ERROR_CODE.test(code);
    });
  }

  private selfDescribedRetryable(error: unknown): boolean | undefined {
    if (typeof error === 'object' && error !== null && 'retryable' in error && typeof error.retryable === 'boolean') {
      return error.retryable;
    }
    return undefined;
  }
}
