import {
  withFlagClient,
  withFlagClientSync,
  type FlagClientDependencies,
  type FlagClientOptions,
} from 'flag-client';
import type { CheckConfig } from './config.js';

/**
 * Evaluates the configured flag once and formats the decision.
 */
export async function runCheck(
  config: CheckConfig,
  dependencies?: FlagClientDependencies
): Promise<string> {
  const options: FlagClientOptions = { baseUrl: config.baseUrl, cacheTtlMs: config.cacheTtlMs };
  const evaluateOptions = { subject: config.subject, fallback: config.fallback };

  const enabled = config.sync
    ? withFlagClientSync(
        options,
        (client) => client.evaluateSync(config.flagKey, evaluateOptions),
        dependencies
      )
    : await withFlagClient(
        options,
        (client) => client.evaluate(config.flagKey, evaluateOptions),
        dependencies
      );

  const target = config.subject === undefined ? '' : ` for ${config.subject}`;
  return `${config.flagKey}${target}: ${enabled ? 'enabled' : 'disabled'}`;
}
