/**
 * Secrets Public API
 *
 * File-per-key secret store, random secret generation and the error type
 * every failure is reported through.
 */

export type { SecretStoreConfig, SecretStoreInterface } from '@dotsecret/types';
export { SecretInitError, isSecretErrorCode, isSecretInitError } from './errors.js';
export {
  describeLengthRule,
  encodedSecretLength,
  generateSecret,
  secretLengthSchema,
} from './generator.js';
export { SecretStore, assertValidKey } from './store.js';
