/**
 * Error codes for failed flag evaluations.
 */
export type FlagErrorCode =
  | 'AUTHENTICATION_ERROR'
  | 'RATE_LIMIT_ERROR'
  | 'NETWORK_ERROR'
  | 'API_ERROR'
  | 'UNEXPECTED_ERROR';

/**
 * A failed flag lookup. Produced inside the evaluation pipeline and
 * absorbed there; callers of evaluate() never see one.
 */
export interface FlagError {
  readonly code: FlagErrorCode;
  readonly message: string;
  /** HTTP status of the response that caused the failure */
  readonly status?: number | undefined;
  /** Seconds to wait before retrying, from the Retry-After header */
  readonly retryAfterSeconds?: number | undefined;
  readonly cause?: unknown;
}

/**
 * Creates a FlagError for a rejected credential (HTTP 401).
 */
export const createAuthenticationError = (status = 401): FlagError => ({
  code: 'AUTHENTICATION_ERROR',
  message: 'Invalid API key',
  status,
});

/**
 * Creates a FlagError for a throttled request (HTTP 429).
 *
 * @param retryAfterSeconds - Hint from the Retry-After header, if any
 */
export const createRateLimitError = (retryAfterSeconds?: number): FlagError => ({
  code: 'RATE_LIMIT_ERROR',
  message: 'Rate limit exceeded',
  status: 429,
  retryAfterSeconds,
});

/**
 * Creates a FlagError for a transport failure (timeout, connection refused, ...).
 *
 * @param message - Error message
 * @param cause - Original error
 */
export const createNetworkError = (message: string, cause?: unknown): FlagError => ({
  code: 'NETWORK_ERROR',
  message,
  cause,
});

/**
 * Creates a FlagError for an unclassified response.
 *
 * @param message - Error message
 * @param status - HTTP status of the response
 * @param cause - Original error
 */
export const createApiError = (message: string, status: number, cause?: unknown): FlagError => ({
  code: 'API_ERROR',
  message,
  status,
  cause,
});

/**
 * Maps anything thrown by a collaborator to a FlagError.
 *
 * @param error - The thrown value
 */
export const createUnexpectedError = (error: unknown): FlagError => ({
  code: 'UNEXPECTED_ERROR',
  message: error instanceof Error ? error.message : 'Unexpected error',
  cause: error,
});

/**
 * Error thrown when the client cannot be constructed from its options
 * and environment (e.g. no API key). This is the only error a flag client
 * lets escape.
 *
 * @example
 * ```typescript
 * try {
 *   const client = createFlagClient();
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.error(error.issues.join('\n'));
 *   }
 * }
 * ```
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR' as const;

  /**
   * Individual problems found in the configuration.
   */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [message]) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
