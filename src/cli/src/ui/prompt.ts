/**
 * Masked secret entry.
 *
 * On a terminal the value is read with a @clack/prompts password prompt,
 * every typed character rendered as `*`. When stdin is a pipe there is
 * nothing to mask, so the first line of the stream is taken as the value.
 *
 * Only stdin decides: a piped value wins even when the process also has a
 * controlling terminal, and /dev/tty is never opened. This keeps
 * `printf '%s\n' "$TOKEN" | init-secret api_token --value` non-interactive
 * inside a terminal session.
 */

import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import * as p from '@clack/prompts';
import { logger } from '@dotsecret/logger';
import { SecretInitError } from '@dotsecret/secrets';

export const SECRET_PROMPT = 'Secret Value';
export const MASK_CHARACTER = '*';

export interface SecretInput extends Readable {
  isTTY?: boolean;
}

/**
 * Read the secret verbatim: no trimming, no validation, empty allowed.
 */
export async function readSecretValue(input: SecretInput = process.stdin): Promise<string> {
  if (!input.isTTY) {
    logger.debug('stdin is not a terminal, reading secret from the stream');
    return readFirstLine(input);
  }

  const value = await p.password({ message: SECRET_PROMPT, mask: MASK_CHARACTER });

  if (p.isCancel(value)) {
    throw new SecretInitError('CANCELLED', 'Secret entry cancelled, nothing was written');
  }

  // clack resolves undefined when the prompt is submitted empty
  return value ?? '';
}

async function readFirstLine(input: Readable): Promise<string> {
  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });

  try {
    for await (const line of rl) {
      return line;
    }
    return '';
  } finally {
    rl.close();
  }
}
