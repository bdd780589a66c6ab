/**
 * Init Command
 *
 * Appends one secret value to `.env/<key>.txt`, sourced either from masked
 * input (--value) or from the CSPRNG (--generate).
 *
 * Steps: validate → ensure store directory → source value → persist.
 * Validation runs first so a rejected invocation never touches disk.
 */

import { logger, setLogMode } from '@dotsecret/logger';
import { SecretStore, generateSecret } from '@dotsecret/secrets';
import type { InitRequest } from '@dotsecret/types';
import { parseInitArgs, resolveInitRequest } from '../args.js';
import { readSecretValue } from '../ui/prompt.js';

export interface InitCommandOptions {
  /** Directory the `.env/` store is resolved against (default: process.cwd()) */
  cwd?: string;
}

async function sourceSecret(request: InitRequest): Promise<string> {
  if (request.source === 'value') {
    return readSecretValue();
  }

  const secret = generateSecret(request.length);
  // Echoed before the write
  console.log(`Generated random secret: ${secret}`);
  return secret;
}

export async function initCommand(args: string[], options: InitCommandOptions = {}): Promise<void> {
  const flags = parseInitArgs(args);
  setLogMode(flags.verbose ? 'debug' : 'error');

  const request = resolveInitRequest(flags);
  logger.debug('Initializing secret', { key: request.key, source: request.source });

  const store = await SecretStore.open({ cwd: options.cwd });
  const secret = await sourceSecret(request);

  await store.append(request.key, secret);
  logger.info('Secret written', { key: request.key, file: store.filePath(request.key) });
}
