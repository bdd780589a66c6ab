/**
 * Command runner: dispatches help, version and the init command, and is
 * the one place errors become printed messages and exit codes.
 */

import { logger } from '@dotsecret/logger';
import { isSecretInitError } from '@dotsecret/secrets';
import { findEarlyExitFlag } from './args.js';
import { initCommand } from './commands/init.js';
import type { InitCommandOptions } from './commands/init.js';
import { getVersion, showBanner } from './ui/banner.js';
import { theme } from './ui/theme.js';

// ── Help text ──────────────────────────────────────────────────────────

export function showHelp(): void {
  showBanner();
  console.log(`  ${theme.label('Usage')}`);
  console.log(`    ${theme.cmd('init-secret')} ${theme.dim('<key> (--value | --generate) [--length <bytes>]')}`);
  console.log();
  console.log(`  ${theme.label('Secret sources')} ${theme.dim('(exactly one)')}`);
  console.log(`    ${theme.dim('--value')}            Enter the secret interactively (input is masked)`);
  console.log(`    ${theme.dim('--generate')}         Generate a random URL-safe secret`);
  console.log();
  console.log(`  ${theme.label('Options')}`);
  console.log(`    ${theme.dim('--length <bytes>')}   Bytes of randomness for --generate (default: 32)`);
  console.log(`    ${theme.dim('--verbose')}          Show debug-level logs`);
  console.log(`    ${theme.dim('--version, -v')}      Show version number`);
  console.log(`    ${theme.dim('--help, -h')}         Show this help message`);
  console.log();
  console.log(`  ${theme.label('Examples')}`);
  console.log(`    ${theme.cmd('init-secret db_password --generate --length 16')}`);
  console.log(`    ${theme.cmd('init-secret api_token --value')}`);
  console.log();
  console.log(`  Secrets are appended to ${theme.label('.env/<key>.txt')} in the current directory.`);
  console.log();
}

// ── Error reporting ────────────────────────────────────────────────────

function reportError(error: unknown): number {
  if (isSecretInitError(error)) {
    console.error(theme.error(`Error: ${error.message}`));
    if (error.code === 'INVALID_ARGUMENT') {
      console.error(theme.dim('Use --help for usage information.'));
    }
    logger.debug('Secret initialization failed', error.toJSON());
    return error.exitCode;
  }

  logger.error('Fatal error:', error);
  return 1;
}

/**
 * Run `init-secret` with the given arguments and resolve to its exit code.
 */
export async function run(args: string[], options: InitCommandOptions = {}): Promise<number> {
  switch (findEarlyExitFlag(args)) {
    case 'help':
      showHelp();
      return 0;
    case 'version':
      console.log(getVersion());
      return 0;
    case null:
      break;
  }

  try {
    await initCommand(args, options);
    return 0;
  } catch (error) {
    return reportError(error);
  }
}
