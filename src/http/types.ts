/**
 * HTTP types shared by the STS and metadata clients.
 *
 * @module http/types
 */

/**
 * HTTP request
 */
export interface HttpRequest {
  /** HTTP method */
  method: string;
  /** Request URL */
  url: string;
  /** Request headers */
  headers: Record<string, string>;
  /** Request body */
  body?: string;
  /** Per-request timeout in milliseconds, overriding the transport default */
  timeoutMs?: number;
  /** Cancels the request */
  signal?: AbortSignal;
}

/**
 * HTTP response
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;
  /** Response headers, keys lower-cased */
  headers: Record<string, string>;
  /** Response body */
  body: string;
}

/**
 * HTTP client interface for making requests.
 *
 * Implementations reject with a `NetworkError` for transport failures and
 * with a `CANCELLED` error when the request signal fires; any HTTP status is
 * a successful send.
 */
export interface HttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
}
