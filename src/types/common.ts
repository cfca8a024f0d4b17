/**
 * Credential and provider types.
 *
 * @module types/common
 */

/**
 * AWS security credentials together with the name of the provider that
 * produced them.
 */
export interface AwsCredentials {
  /** AWS access key ID. */
  readonly accessKeyId: string;

  /** AWS secret access key. */
  readonly secretAccessKey: string;

  /** Session token for temporary credentials. */
  readonly sessionToken?: string;

  /** When temporary credentials stop being valid. */
  readonly expiration?: Date;

  /**
   * Label of the producing provider, for example `StaticCredentials` or
   * `SharedConfigCredentials: /home/user/.aws/credentials`.
   */
  readonly source: string;
}

/**
 * Per-call options threaded through every network-touching operation.
 */
export interface RetrieveOptions {
  /** Aborts in-flight requests, file reads and backoff sleeps. */
  signal?: AbortSignal;
}

/**
 * A source of AWS credentials.
 *
 * Implementations return a fresh {@link AwsCredentials} object on every
 * successful call and reject with a `CredentialChainError` otherwise.
 */
export interface CredentialProvider {
  retrieve(options?: RetrieveOptions): Promise<AwsCredentials>;

  /**
   * Whether previously returned credentials have expired.
   */
  isExpired?(): boolean;
}

/**
 * A provider paired with the label of the source it was selected from.
 */
export interface ResolvedProvider {
  readonly provider: CredentialProvider;
  readonly source: string;
}

/**
 * Identity returned by STS GetCallerIdentity.
 */
export interface CallerIdentity {
  readonly account: string;
  readonly arn: string;
  readonly userId: string;
}

/**
 * Account ID and partition of the resolved credentials.
 */
export interface AccountInfo {
  /** Empty when the lookup was skipped. */
  readonly accountId: string;
  readonly partition: string;
}
