// Shared type definitions for dotsecret

// ---------------------------------------------------------------------------
// Store layout
// ---------------------------------------------------------------------------

/** Store directory, relative to the working directory at invocation time. */
export const DEFAULT_STORE_DIR = '.env';

/** Every key maps to `<key><SECRET_FILE_EXTENSION>` inside the store. */
export const SECRET_FILE_EXTENSION = '.txt';

/** Bytes of randomness drawn for a generated secret when `--length` is absent. */
export const DEFAULT_SECRET_LENGTH = 32;

/** Largest byte count `crypto.randomBytes` accepts. */
export const MAX_SECRET_LENGTH = 2 ** 31 - 1;

export interface SecretStoreConfig {
  /** Directory the store path is resolved against (default: process.cwd()) */
  cwd?: string;
  /** Store directory (default: DEFAULT_STORE_DIR) */
  path?: string;
  /** File extension appended to every key (default: SECRET_FILE_EXTENSION) */
  extension?: string;
}

export interface SecretStoreInterface {
  /** Absolute path of the store directory */
  readonly path: string;
  filePath(key: string): string;
  append(key: string, value: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Invocation
// ---------------------------------------------------------------------------

export type SecretSource = 'value' | 'generate';

/** Command line as parsed, before validation. */
export interface InitFlags {
  key?: string;
  value: boolean;
  generate: boolean;
  length: number;
  verbose: boolean;
}

/** A validated invocation: one key, exactly one source. */
export interface InitRequest {
  key: string;
  source: SecretSource;
  length: number;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type SecretErrorCode =
  | 'MISSING_KEY'
  | 'CONFLICTING_SOURCE'
  | 'NO_SOURCE'
  | 'INVALID_KEY'
  | 'INVALID_ARGUMENT'
  | 'IO_FAILURE'
  | 'CANCELLED';

export const EXIT_CODES: Record<SecretErrorCode, number> = {
  MISSING_KEY: 1,
  CONFLICTING_SOURCE: 1,
  NO_SOURCE: 1,
  INVALID_KEY: 1,
  IO_FAILURE: 1,
  INVALID_ARGUMENT: 2,
  CANCELLED: 130,
};
