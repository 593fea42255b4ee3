import type { Result } from 'neverthrow';
import type { HttpClient, HttpError, HttpRequest, HttpResponse, SyncHttpClient } from '../http/types.js';
import { createNetworkError, type FlagError } from '../errors.js';
import type { FlagFetcher, FlagLookupResponse, SyncFlagFetcher } from './types.js';

/**
 * Builds the lookup request for one flag.
 *
 * @param baseUrl - Service base URL, ending in "/"
 * @param flagKey - The flag key
 * @param subject - Optional subject, sent as `user_id`
 *
 * @example
 * ```typescript
 * buildFlagRequest('https://api.example.com/v1/', 'new-checkout', 'user-123');
 * // { url: 'https://api.example.com/v1/flags/new-checkout?user_id=user-123', method: 'GET' }
 * ```
 */
export const buildFlagRequest = (baseUrl: string, flagKey: string, subject?: string): HttpRequest => {
  const url = new URL(`flags/${encodeURIComponent(flagKey)}`, baseUrl);
  if (subject !== undefined && subject.length > 0) {
    url.searchParams.set('user_id', subject);
  }
  return { url: url.toString(), method: 'GET' };
};

const toLookupResult = (
  result: Result<HttpResponse<unknown>, HttpError>
): Result<FlagLookupResponse, FlagError> =>
  result
    .map(({ status, body, headers }) => ({ status, body, headers }))
    .mapErr((error) =>
      createNetworkError(
        error.type === 'timeout' ? error.message : `Network error: ${error.message}`,
        error.cause
      )
    );

/**
 * Creates the flag lookup used by async evaluations.
 *
 * @param getClient - Returns the HTTP client to use (lets the caller create it lazily)
 * @param baseUrl - Service base URL, ending in "/"
 */
export const createFlagFetcher =
  (getClient: () => HttpClient, baseUrl: string): FlagFetcher =>
  async (flagKey, subject) =>
    toLookupResult(await getClient().request(buildFlagRequest(baseUrl, flagKey, subject)));

/**
 * Creates the flag lookup used by blocking evaluations.
 *
 * @param getClient - Returns the blocking HTTP client to use
 * @param baseUrl - Service base URL, ending in "/"
 */
export const createSyncFlagFetcher =
  (getClient: () => SyncHttpClient, baseUrl: string): SyncFlagFetcher =>
  (flagKey, subject) =>
    toLookupResult(getClient().request(buildFlagRequest(baseUrl, flagKey, subject)));
