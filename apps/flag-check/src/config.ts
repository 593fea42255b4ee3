/**
 * flag-check argument handling
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';

export const USAGE =
  'Usage: flag-check <flag-key> [--subject <id>] [--fallback] [--sync] [--base-url <url>] [--ttl-ms <ms>]';

/**
 * Parsed command line of one flag check.
 */
export interface CheckConfig {
  readonly flagKey: string;
  readonly subject?: string | undefined;
  /** Decision to print when evaluation fails */
  readonly fallback: boolean;
  /** Use the blocking evaluation path */
  readonly sync: boolean;
  readonly baseUrl?: string | undefined;
  readonly cacheTtlMs?: number | undefined;
}

/**
 * Parses flag-check arguments. The API key comes from FLAG_CLIENT_API_KEY.
 *
 * @throws Error with a usage message when the arguments are invalid
 */
export function parseCheckArgs(args: readonly string[]): CheckConfig {
  const { values, positionals } = parseArgs({
    args: [...args],
    allowPositionals: true,
    options: {
      subject: { type: 'string', short: 's' },
      fallback: { type: 'boolean', default: false },
      sync: { type: 'boolean', default: false },
      'base-url': { type: 'string' },
      'ttl-ms': { type: 'string' },
    },
  });

  const [flagKey, ...rest] = positionals;
  if (flagKey === undefined || flagKey.length === 0 || rest.length > 0) {
    throw new Error(USAGE);
  }

  const ttl = values['ttl-ms'];
  const cacheTtlMs = ttl === undefined ? undefined : Number(ttl);
  if (cacheTtlMs !== undefined && !Number.isFinite(cacheTtlMs)) {
    throw new Error(`--ttl-ms must be a number, got "${String(ttl)}"`);
  }

  return {
    flagKey,
    subject: values.subject,
    fallback: values.fallback === true,
    sync: values.sync === true,
    baseUrl: values['base-url'],
    cacheTtlMs,
  };
}
