/**
 * Retry policy with exponential backoff, jitter and a separate ceiling for
 * network-reachability failures.
 *
 * @module resilience/retry
 */

import { ErrorClassifier, MAX_NETWORK_RETRY_COUNT } from '../error/classifier.js';
import {
  MaxAttemptsError,
  cancelledError,
  describeError,
  isCancellationError,
} from '../error/index.js';
import { NoopLogger, errorContext, type Logger } from '../observability/logging.js';

/**
 * Retry configuration.
 */
export interface RetryConfig {
  /** Maximum number of attempts, including the first. */
  maxAttempts: number;
  /** Base delay in milliseconds for exponential backoff; 0 disables waiting. */
  baseDelayMs: number;
  /** Maximum delay in milliseconds between attempts. */
  maxDelayMs: number;
  /** Jitter factor (0.0 to 1.0) added on top of the computed delay. */
  jitterFactor?: number;
  /** Attempt ceiling for DNS and connection-refused failures. */
  maxNetworkAttempts?: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 20000,
  jitterFactor: 0.5,
  maxNetworkAttempts: MAX_NETWORK_RETRY_COUNT,
};

/**
 * Outcome of a single attempt.
 */
export interface AttemptResult {
  /** 1-based attempt number. */
  readonly attempt: number;
  /** Failure of this attempt; absent when it succeeded. */
  readonly error?: unknown;
  /** Whether the failure was classified retryable. */
  readonly retryable: boolean;
  /** Whether another attempt followed. */
  readonly retried: boolean;
}

/**
 * What an operation sees of the retry loop.
 */
export interface RetryContext {
  readonly attempt: number;
  readonly signal?: AbortSignal;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Name used in log lines. */
  operationName?: string;
}

export type RetryOutcome<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: readonly AttemptResult[] }
  | { readonly ok: false; readonly error: unknown; readonly attempts: readonly AttemptResult[] };

export interface RetryPolicyOptions {
  classifier?: ErrorClassifier;
  logger?: Logger;
}

/**
 * Wait for `ms` milliseconds, rejecting with a `CANCELLED` error on abort.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(cancelledError(signal.reason));
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(cancelledError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Executes operations with classified retries.
 *
 * Each call to {@link execute} or {@link executeWithAttempts} keeps its own
 * attempt log. The operation receives only its attempt number and signal, so
 * a policy used again inside the operation starts from an empty log.
 *
 * @example
 * ```typescript
 * const policy = new RetryPolicy({ maxAttempts: 5 });
 * const body = await policy.execute(({ signal }) => http.send({ ...request, signal }));
 * ```
 */
export class RetryPolicy {
  private readonly config: RetryConfig;
  private readonly classifier: ErrorClassifier;
  private readonly logger: Logger;

  constructor(config: Partial<RetryConfig> = {}, options: RetryPolicyOptions = {}) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    this.classifier = options.classifier ?? new ErrorClassifier();
    this.logger = options.logger ?? new NoopLogger();
  }

  get maxAttempts(): number {
    return Math.max(1, this.config.maxAttempts);
  }

  get maxNetworkAttempts(): number {
    return Math.max(1, this.config.maxNetworkAttempts ?? MAX_NETWORK_RETRY_COUNT);
  }

  /**
   * Execute an operation, returning its value or throwing the terminal error.
   *
   * Exhausted retries throw a {@link MaxAttemptsError} whose cause is the last
   * failure; non-retryable failures are rethrown unchanged.
   */
  async execute<T>(operation: (context: RetryContext) => Promise<T>, options: ExecuteOptions = {}): Promise<T> {
    const outcome = await this.executeWithAttempts(operation, options);
    if (outcome.ok) {
      return outcome.value;
    }
    throw outcome.error;
  }

  /**
   * Execute an operation and return the outcome together with the attempt log.
   */
  async executeWithAttempts<T>(
    operation: (context: RetryContext) => Promise<T>,
    options: ExecuteOptions = {}
  ): Promise<RetryOutcome<T>> {
    const { signal } = options;
    const operationName = options.operationName ?? 'operation';
    const attempts: AttemptResult[] = [];
    let networkFailures = 0;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        return { ok: false, error: cancelledError(signal.reason), attempts };
      }

      try {
        const value = await operation({ attempt, signal });
        attempts.push({ attempt, retryable: false, retried: false });
        return { ok: true, value, attempts };
      } catch (error) {
        if (isCancellationError(error) || signal?.aborted) {
          const cancelled = isCancellationError(error) ? error : cancelledError(signal?.reason);
          attempts.push({ attempt, error: cancelled, retryable: false, retried: false });
          return { ok: false, error: cancelled, attempts };
        }

        if (!this.classifier.isRetryable(error)) {
          attempts.push({ attempt, error, retryable: false, retried: false });
          return { ok: false, error, attempts };
        }

        const reachability = this.classifier.isNetworkReachabilityError(error);
        if (reachability) {
          networkFailures++;
        }

        if (attempt >= this.maxAttempts || (reachability && networkFailures >= this.maxNetworkAttempts)) {
          const exhausted = new MaxAttemptsError(attempt, error);
          attempts.push({ attempt, error: exhausted, retryable: true, retried: false });
          this.logger.warn('Retry attempts exhausted', {
            operation: operationName,
            attempts: attempt,
            networkFailures,
            ...errorContext(error),
          });
          return { ok: false, error: exhausted, attempts };
        }

        attempts.push({ attempt, error, retryable: true, retried: true });

        const delay = this.calculateDelay(attempt);
        this.logger.debug('Retrying after failure', {
          operation: operationName,
          attempt,
          delayMs: delay,
          reason: describeError(error),
        });

        try {
          await sleep(delay, signal);
        } catch (sleepError) {
          // cancelled during backoff: no retry followed
          attempts[attempts.length - 1] = { attempt, error: sleepError, retryable: false, retried: false };
          return { ok: false, error: sleepError, attempts };
        }
      }
    }
  }

  /**
   * Calculate the delay before the attempt following `attempt`.
   *
   * Exponential backoff `baseDelayMs * 2^(attempt-1)` capped at `maxDelayMs`,
   * plus up to `jitterFactor` of the capped delay.
   */
  calculateDelay(attempt: number): number {
    if (this.config.baseDelayMs <= 0) {
      return 0;
    }

    const exponentialDelay = this.config.baseDelayMs * Math.pow(2, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterFactor = this.config.jitterFactor ?? 0;
    const jitter = cappedDelay * Math.random() * jitterFactor;

    return Math.floor(cappedDelay + jitter);
  }
}
