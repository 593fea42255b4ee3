import type { Result } from 'neverthrow';

/**
 * HTTP request configuration.
 */
export interface HttpRequest {
  readonly url: string;
  readonly method: 'GET';
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * HTTP response. Any status code is a response; only transport
 * failures are errors.
 */
export interface HttpResponse<T> {
  readonly status: number;
  readonly statusText: string;
  /** Response headers with lower-cased names */
  readonly headers: Readonly<Record<string, string>>;
  readonly body: T;
}

/**
 * Transport-level failure: the request never produced a response.
 */
export interface HttpError {
  readonly type: 'network' | 'timeout';
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * HTTP client for async code.
 * Abstraction over fetch for dependency injection and testing.
 */
export interface HttpClient {
  /**
   * Makes an HTTP request. The body is parsed as JSON when possible
   * and is undefined otherwise.
   * @param request - The request configuration
   * @returns Result with the response or a transport error
   */
  readonly request: (request: HttpRequest) => Promise<Result<HttpResponse<unknown>, HttpError>>;

  /**
   * Aborts every in-flight request.
   */
  readonly close: () => void;
}

/**
 * HTTP client that blocks the calling thread until the response arrives.
 */
export interface SyncHttpClient {
  /**
   * Makes an HTTP request synchronously.
   * @param request - The request configuration
   * @returns Result with the response or a transport error
   */
  readonly request: (request: HttpRequest) => Result<HttpResponse<unknown>, HttpError>;
}

/**
 * Options for creating an HTTP client.
 */
export interface HttpClientOptions {
  /** Request timeout in milliseconds (default: 5000) */
  readonly timeoutMs?: number;
  /** Base headers to include in all requests */
  readonly baseHeaders?: Readonly<Record<string, string>>;
}
