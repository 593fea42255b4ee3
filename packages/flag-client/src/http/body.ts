/** Default request timeout: 5 seconds */
export const DEFAULT_TIMEOUT_MS = 5_000;

/**
 * Parses a response body as JSON.
 *
 * @param text - Raw response text
 * @returns The parsed value, or undefined for an empty or non-JSON body
 */
export const parseJsonBody = (text: string): unknown => {
  if (text.trim().length === 0) {
    return undefined;
  }

  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
};

/**
 * Extracts headers from a fetch Response into a plain object.
 * Names come out lower-cased.
 */
export const extractHeaders = (headers: Headers): Record<string, string> => {
  const result: Record<string, string> = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
};
