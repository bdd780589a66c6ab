#!/usr/bin/env -S npx tsx

/**
 * init-secret CLI — Entry Point
 *
 * Usage:
 *   init-secret <key> --generate [--length <bytes>]   Append a random secret
 *   init-secret <key> --value                         Append a secret typed at a masked prompt
 *   init-secret --version                             Print version
 *   init-secret --help                                Show help
 */

import { logger } from '@dotsecret/logger';
import { run } from './run.js';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
