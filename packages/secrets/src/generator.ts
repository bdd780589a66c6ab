/**
 * Random secret generation.
 *
 * Secrets are `length` bytes from the platform CSPRNG, encoded as unpadded
 * base64url so they can be pasted into URLs, headers and connection strings
 * without escaping.
 */

import { randomBytes } from 'node:crypto';
import { z } from 'zod';
import { DEFAULT_SECRET_LENGTH, MAX_SECRET_LENGTH } from '@dotsecret/types';
import { SecretInitError } from './errors.js';

/** Bytes of entropy for a generated secret. */
export const secretLengthSchema = z.number().int().nonnegative().max(MAX_SECRET_LENGTH);

export function describeLengthRule(): string {
  return `a whole number of bytes between 0 and ${MAX_SECRET_LENGTH}`;
}

/**
 * Number of characters `generateSecret(length)` produces: 4 characters per
 * 3 bytes, without padding.
 */
export function encodedSecretLength(length: number): number {
  return Math.ceil((length * 4) / 3);
}

export function generateSecret(length: number = DEFAULT_SECRET_LENGTH): string {
  const parsed = secretLengthSchema.safeParse(length);
  if (!parsed.success) {
    throw new SecretInitError(
      'INVALID_ARGUMENT',
      `Secret length must be ${describeLengthRule()} (got ${length})`,
      { length },
    );
  }

  return randomBytes(parsed.data).toString('base64url');
}
