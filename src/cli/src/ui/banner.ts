/**
 * TUI Banner
 *
 * Name and version line shown at the top of the help output.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { theme } from './theme.js';

const packageSchema = z.object({ version: z.string() });

// version is read lazily from the CLI package manifest
let cachedVersion: string | undefined;

function getVersion(): string {
  if (cachedVersion === undefined) {
    try {
      const raw = readFileSync(new URL('../../package.json', import.meta.url), 'utf8');
      const parsed = packageSchema.safeParse(JSON.parse(raw));
      cachedVersion = parsed.success ? parsed.data.version : 'unknown';
    } catch {
      cachedVersion = 'unknown';
    }
  }
  return cachedVersion;
}

/**
 * Print the banner to stdout
 */
export function showBanner(): void {
  console.log();
  console.log(
    `  ${theme.brand('dotsecret')} ${theme.dim('v' + getVersion())} ${theme.dim('·')} ${theme.dim('local secrets for your runtime environment')}`,
  );
  console.log();
}

export { getVersion };
