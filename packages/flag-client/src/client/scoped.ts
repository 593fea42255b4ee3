import type { FlagClient, FlagClientDependencies, FlagClientOptions } from '../types.js';
import { createFlagClient } from './flag-client.js';

/**
 * Runs a callback with a fresh client and closes the client afterwards,
 * whether the callback returns or throws.
 *
 * @example
 * ```typescript
 * const enabled = await withFlagClient({ apiKey }, (flags) =>
 *   flags.evaluate('new-checkout', { subject: 'user-123' })
 * );
 * ```
 */
export const withFlagClient = async <T>(
  options: FlagClientOptions,
  callback: (client: FlagClient) => Promise<T>,
  dependencies?: FlagClientDependencies
): Promise<T> => {
  const client = createFlagClient(options, dependencies);
  try {
    return await callback(client);
  } finally {
    client.close();
  }
};

/**
 * Blocking version of withFlagClient().
 */
export const withFlagClientSync = <T>(
  options: FlagClientOptions,
  callback: (client: FlagClient) => T,
  dependencies?: FlagClientDependencies
): T => {
  const client = createFlagClient(options, dependencies);
  try {
    return callback(client);
  } finally {
    client.close();
  }
};
