#!/usr/bin/env node

/**
 * flag-check: evaluates one feature flag and prints the decision.
 *
 * Reads FLAG_CLIENT_API_KEY (and optionally FLAG_CLIENT_BASE_URL,
 * FLAG_CLIENT_LOG_LEVEL) from the environment or a .env file.
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import { ConfigurationError } from 'flag-client';
import { runCheck } from './check.js';
import { parseCheckArgs } from './config.js';

async function main(): Promise<void> {
  const config = parseCheckArgs(process.argv.slice(2));
  console.log(await runCheck(config));
}

// Only run main if this is the entry point
const isMainModule =
  Boolean(process.argv[1]?.endsWith('index.js')) || Boolean(process.argv[1]?.endsWith('index.ts'));
if (isMainModule) {
  main().catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`[flag-check] ${error.issues.join('\n')}`);
    } else {
      console.error('[flag-check]', error instanceof Error ? error.message : error);
    }
    process.exit(1);
  });
}
