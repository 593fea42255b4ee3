import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import {
  createApiError,
  createAuthenticationError,
  createRateLimitError,
  type FlagError,
} from '../errors.js';
import type { FlagLookupResponse } from './types.js';

/**
 * Truthiness of a decoded JSON value: null, false, 0, "" and empty
 * arrays or objects are false.
 */
const isTruthy = (value: unknown): boolean => {
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === 'object' && value !== null) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
};

const evaluatedFlagSchema = z
  .object({
    enabled: z.unknown().transform(isTruthy),
  })
  .passthrough();

const errorBodySchema = z
  .object({
    message: z.string(),
  })
  .passthrough();

/**
 * Reads a header regardless of the case of its name.
 */
const getHeader = (headers: Readonly<Record<string, string>>, name: string): string | undefined => {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
};

/**
 * Parses a Retry-After header given in whole seconds.
 * HTTP-date values and anything else non-numeric yield undefined.
 */
export const parseRetryAfter = (value: string | undefined): number | undefined => {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
};

/**
 * Turns a flag lookup response into a decision.
 *
 * | status | outcome                                   |
 * |--------|-------------------------------------------|
 * | 200    | truthiness of `body.enabled`              |
 * | 401    | AUTHENTICATION_ERROR                      |
 * | 404    | false (an unknown flag is a disabled one) |
 * | 429    | RATE_LIMIT_ERROR with Retry-After hint    |
 * | other  | API_ERROR, message from `body.message`    |
 *
 * @param response - The raw lookup response
 * @returns Result with the decision or the classified failure
 */
export const decideFromResponse = (response: FlagLookupResponse): Result<boolean, FlagError> => {
  const { status, body, headers } = response;

  switch (status) {
    case 200: {
      const parsed = evaluatedFlagSchema.safeParse(body);
      if (!parsed.success) {
        return err(createApiError('Invalid flag response body', status, parsed.error));
      }
      return ok(parsed.data.enabled);
    }
    case 401:
      return err(createAuthenticationError(status));
    case 404:
      return ok(false);
    case 429:
      return err(createRateLimitError(parseRetryAfter(getHeader(headers, 'Retry-After'))));
    default: {
      const parsed = errorBodySchema.safeParse(body);
      return err(createApiError(parsed.success ? parsed.data.message : `HTTP ${String(status)}`, status));
    }
  }
};
