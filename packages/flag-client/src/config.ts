import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_CACHE_TTL_MS } from './cache/ttl-cache.js';
import { DEFAULT_TIMEOUT_MS } from './http/body.js';
import type { FlagClientOptions, ResolvedClientConfig } from './types.js';

/** Default flag service URL */
export const DEFAULT_BASE_URL = 'https://api.flaglite.dev/v1';

export const API_KEY_ENV_VAR = 'FLAG_CLIENT_API_KEY';
export const BASE_URL_ENV_VAR = 'FLAG_CLIENT_BASE_URL';

const optionsSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url(),
  cacheTtlMs: z.number().finite().nonnegative(),
  disableCache: z.boolean(),
  timeoutMs: z.number().finite().positive(),
  cleanupIntervalMs: z.number().finite().positive().optional(),
});

/** Treats an empty string as unset */
const nonEmpty = (value: string | undefined): string | undefined =>
  value === undefined || value.length === 0 ? undefined : value;

/**
 * Resolves client options against the environment and defaults.
 *
 * Explicit options win over FLAG_CLIENT_API_KEY and FLAG_CLIENT_BASE_URL.
 * The base URL always ends in "/" so lookup paths resolve beneath it.
 *
 * @param options - Options passed to the client
 * @param env - Environment to fall back to (default: process.env)
 * @returns The resolved configuration
 * @throws ConfigurationError when no API key is available or an option is invalid
 */
export const resolveClientConfig = (
  options: FlagClientOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedClientConfig => {
  const apiKey = nonEmpty(options.apiKey) ?? nonEmpty(env[API_KEY_ENV_VAR]);
  if (apiKey === undefined) {
    throw new ConfigurationError(
      `API key required. Pass apiKey or set ${API_KEY_ENV_VAR}.`
    );
  }

  const parsed = optionsSchema.safeParse({
    apiKey,
    baseUrl: nonEmpty(options.baseUrl) ?? nonEmpty(env[BASE_URL_ENV_VAR]) ?? DEFAULT_BASE_URL,
    cacheTtlMs: options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS,
    disableCache: options.disableCache ?? false,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    cleanupIntervalMs: options.cleanupIntervalMs,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid flag client options: ${issues.join('; ')}`, issues);
  }

  const config = parsed.data;
  return {
    ...config,
    baseUrl: config.baseUrl.endsWith('/') ? config.baseUrl : `${config.baseUrl}/`,
    cacheEnabled: !config.disableCache && config.cacheTtlMs > 0,
  };
};
