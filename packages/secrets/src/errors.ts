/**
 * Secret Initializer Error Types
 */

import { EXIT_CODES } from '@dotsecret/types';
import type { SecretErrorCode } from '@dotsecret/types';

/**
 * Error raised for every expected failure of a secret initialization:
 * validation, argument parsing, filesystem access and prompt cancellation.
 *
 * The message is operator-facing and never contains the secret value.
 */
export class SecretInitError extends Error {
  /**
   * Error code for programmatic handling
   */
  public readonly code: SecretErrorCode;

  /**
   * Additional context (key names, paths; never secret values)
   */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: SecretErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SecretInitError';
    this.code = code;
    this.details = details;

    // Maintain proper stack trace for V8 engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SecretInitError);
    }
  }

  /** Process exit status for this failure */
  get exitCode(): number {
    return EXIT_CODES[this.code];
  }

  /**
   * Wrap a filesystem error, keeping the original as `cause`.
   */
  static io(message: string, cause: unknown, details?: Record<string, unknown>): SecretInitError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new SecretInitError('IO_FAILURE', `${message}: ${reason}`, details, { cause });
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Check if an error is a SecretInitError
 */
export function isSecretInitError(error: unknown): error is SecretInitError {
  return error instanceof SecretInitError;
}

/**
 * Check if an error is a SecretInitError with a specific code
 */
export function isSecretErrorCode(error: unknown, code: SecretErrorCode): boolean {
  return isSecretInitError(error) && error.code === code;
}
