import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { HttpClient, HttpClientOptions, HttpRequest, HttpResponse, HttpError } from './types.js';
import { DEFAULT_TIMEOUT_MS, extractHeaders, parseJsonBody } from './body.js';

/**
 * Creates an HTTP client using the native fetch API.
 *
 * @param options - Optional client configuration
 * @returns An HttpClient instance
 *
 * @example
 * ```typescript
 * const client = createFetchClient({ timeoutMs: 2000 });
 * const result = await client.request({ url: 'https://api.example.com/flags/beta', method: 'GET' });
 *
 * if (result.isOk()) {
 *   console.log(result.value.status, result.value.body);
 * } else {
 *   console.error(result.error.message);
 * }
 *
 * client.close();
 * ```
 */
export const createFetchClient = (options: HttpClientOptions = {}): HttpClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {} } = options;

  /** Controllers of requests that have not settled yet */
  const inFlight = new Set<AbortController>();

  const request = async (
    httpRequest: HttpRequest
  ): Promise<Result<HttpResponse<unknown>, HttpError>> => {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    inFlight.add(controller);

    try {
      const fetchOptions: RequestInit = {
        method: httpRequest.method,
        headers: {
          Accept: 'application/json',
          ...baseHeaders,
          ...httpRequest.headers,
        },
        signal: controller.signal,
      };

      const response = await fetch(httpRequest.url, fetchOptions);
      const text = await response.text();

      return ok({
        status: response.status,
        statusText: response.statusText,
        headers: extractHeaders(response.headers),
        body: parseJsonBody(text),
      });
    } catch (error) {
      if (timedOut) {
        return err({
          type: 'timeout',
          message: `Request timed out after ${String(timeoutMs)}ms`,
          cause: error,
        });
      }

      if (error instanceof Error && error.name === 'AbortError') {
        return err({ type: 'network', message: 'Request aborted', cause: error });
      }

      return err({
        type: 'network',
        message: error instanceof Error ? error.message : 'Network error',
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      inFlight.delete(controller);
    }
  };

  const close = (): void => {
    for (const controller of inFlight) {
      controller.abort();
    }
    inFlight.clear();
  };

  return {
    request,
    close,
  };
};
