import { Logger, type ILogObj } from 'tslog';

/**
 * Logging surface the client needs. A tslog Logger satisfies it, and so
 * does `console`; hosts can pass their own.
 */
export interface FlagLogger {
  readonly debug: (...args: unknown[]) => unknown;
  readonly warn: (...args: unknown[]) => unknown;
  readonly error: (...args: unknown[]) => unknown;
}

/** tslog level numbers: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal */
const DEFAULT_MIN_LEVEL = 3;

/**
 * Reads the minimum log level from FLAG_CLIENT_LOG_LEVEL.
 */
export const resolveLogLevel = (value: string | undefined): number => {
  if (value === undefined || !/^[0-6]$/.test(value.trim())) {
    return DEFAULT_MIN_LEVEL;
  }
  return Number.parseInt(value.trim(), 10);
};

/**
 * Creates the default client logger.
 *
 * @param env - Environment to read FLAG_CLIENT_LOG_LEVEL from
 */
export const createDefaultLogger = (env: NodeJS.ProcessEnv = process.env): Logger<ILogObj> =>
  new Logger<ILogObj>({
    name: 'flag-client',
    type: 'pretty',
    minLevel: resolveLogLevel(env['FLAG_CLIENT_LOG_LEVEL']),
    hideLogPositionForProduction: true,
    prettyLogTimeZone: 'UTC',
  });
