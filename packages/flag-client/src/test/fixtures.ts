/**
 * Shared test fixtures and constants.
 */

import type { FlagLookupResponse } from '../flags/types.js';
import type { HttpResponse } from '../http/types.js';

// ============================================================================
// Time Constants
// ============================================================================

/** Short TTL for expiry tests */
export const SHORT_TTL_MS = 100;

/** Starting point of the fake monotonic clock */
export const CLOCK_START_MS = 1_000;

// ============================================================================
// Client Configuration
// ============================================================================

export const TEST_API_KEY = 'test-api-key';
export const TEST_BASE_URL = 'https://flags.example.com/v1/';

// ============================================================================
// Flags and Subjects
// ============================================================================

export const TEST_FLAG_KEY = 'new-checkout';
export const OTHER_FLAG_KEY = 'dark-mode';
export const MISSING_FLAG_KEY = 'missing-flag';

export const TEST_SUBJECT = 'user-123';
export const OTHER_SUBJECT = 'user-456';

// ============================================================================
// Response Fixtures
// ============================================================================

/**
 * Creates a flag lookup response.
 */
export const createLookupResponse = (
  status: number,
  body?: unknown,
  headers: Record<string, string> = {}
): FlagLookupResponse => ({ status, body, headers });

/**
 * Creates an HTTP response as returned by a transport.
 */
export const createHttpResponse = (
  status: number,
  body?: unknown,
  headers: Record<string, string> = {}
): HttpResponse<unknown> => ({
  status,
  statusText: status === 200 ? 'OK' : 'Error',
  headers,
  body,
});
