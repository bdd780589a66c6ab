/**
 * Argument parsing and validation for `init-secret`.
 *
 * Parsing turns argv into InitFlags and only rejects what cannot be read
 * (unknown options, extra positionals, a malformed --length). Validation
 * then applies the invocation rules in a fixed order.
 */

import { z } from 'zod';
import { DEFAULT_SECRET_LENGTH } from '@dotsecret/types';
import type { InitFlags, InitRequest } from '@dotsecret/types';
import {
  SecretInitError,
  assertValidKey,
  describeLengthRule,
  secretLengthSchema,
} from '@dotsecret/secrets';

// Plain decimal digits only: Number() would also take hex, exponents and padding
const lengthArgSchema = z
  .string()
  .regex(/^-?\d+$/)
  .transform(Number)
  .pipe(secretLengthSchema);

function parseLength(raw: string): number {
  const parsed = lengthArgSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SecretInitError(
      'INVALID_ARGUMENT',
      `Invalid --length ${JSON.stringify(raw)}: expected ${describeLengthRule()}`,
      { length: raw },
    );
  }
  return parsed.data;
}

/**
 * Report the first option that ends the run early. Anything after `--`
 * is never an option.
 */
export function findEarlyExitFlag(args: string[]): 'help' | 'version' | null {
  const end = args.indexOf('--');
  const options = end === -1 ? args : args.slice(0, end);

  for (const arg of options) {
    if (arg === '--help' || arg === '-h') return 'help';
    if (arg === '--version' || arg === '-v') return 'version';
  }
  return null;
}

export function parseInitArgs(args: string[]): InitFlags {
  const flags: InitFlags = {
    value: false,
    generate: false,
    length: DEFAULT_SECRET_LENGTH,
    verbose: false,
  };
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }

    if (arg === '--value') {
      flags.value = true;
    } else if (arg === '--generate') {
      flags.generate = true;
    } else if (arg === '--verbose') {
      flags.verbose = true;
    } else if (arg === '--length') {
      const raw: string | undefined = args[i + 1];
      if (raw === undefined) {
        throw new SecretInitError('INVALID_ARGUMENT', '--length expects a number of bytes');
      }
      flags.length = parseLength(raw);
      i++;
    } else if (arg.startsWith('--length=')) {
      flags.length = parseLength(arg.slice('--length='.length));
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new SecretInitError('INVALID_ARGUMENT', `Unrecognized option: ${arg}`, { option: arg });
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length > 1) {
    throw new SecretInitError(
      'INVALID_ARGUMENT',
      `Unexpected argument: ${positionals[1]}`,
      { argument: positionals[1] },
    );
  }

  if (positionals.length === 1) {
    flags.key = positionals[0];
  }

  return flags;
}

/**
 * Apply the invocation rules in order: key present, sources not both set,
 * at least one source set, key addresses a file inside the store.
 */
export function resolveInitRequest(flags: InitFlags): InitRequest {
  if (!flags.key) {
    throw new SecretInitError('MISSING_KEY', 'Key name is required. Use --help for usage information.');
  }

  if (flags.value && flags.generate) {
    throw new SecretInitError('CONFLICTING_SOURCE', 'Cannot specify both --value and --generate');
  }

  if (!flags.value && !flags.generate) {
    throw new SecretInitError('NO_SOURCE', 'Must specify secret source using --value or --generate');
  }

  assertValidKey(flags.key);

  return {
    key: flags.key,
    source: flags.value ? 'value' : 'generate',
    length: flags.length,
  };
}
