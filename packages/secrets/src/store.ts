/**
 * Secret Store
 *
 * A plain directory holding one text file per secret key. Values are
 * appended raw: no newline, no delimiter, no encoding. Nothing in here
 * truncates or deletes a file.
 *
 * Layout (relative to the working directory):
 *   .env/
 *     <key>.txt
 */

import { mkdir, open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { logger } from '@dotsecret/logger';
import { DEFAULT_STORE_DIR, SECRET_FILE_EXTENSION } from '@dotsecret/types';
import type { SecretStoreConfig, SecretStoreInterface } from '@dotsecret/types';
import { SecretInitError } from './errors.js';

const FORBIDDEN_KEY_CHARS = /[/\\\0]/;

/**
 * Reject keys that would address a file outside the store.
 */
export function assertValidKey(key: string): void {
  if (key.length === 0) {
    throw new SecretInitError('MISSING_KEY', 'Key name is required. Use --help for usage information.');
  }
  if (FORBIDDEN_KEY_CHARS.test(key)) {
    throw new SecretInitError(
      'INVALID_KEY',
      `Invalid key name ${JSON.stringify(key)}: keys cannot contain path separators`,
      { key },
    );
  }
}

export class SecretStore implements SecretStoreInterface {
  readonly path: string;
  private readonly extension: string;

  private constructor(path: string, extension: string) {
    this.path = path;
    this.extension = extension;
  }

  /**
   * Resolve the store directory and create it if it does not exist yet.
   * Opening an existing store is a no-op.
   */
  static async open(config: SecretStoreConfig = {}): Promise<SecretStore> {
    const cwd = config.cwd ?? process.cwd();
    const path = resolve(cwd, config.path ?? DEFAULT_STORE_DIR);

    try {
      await mkdir(path, { recursive: true });
    } catch (err) {
      throw SecretInitError.io(`Could not create secret store ${path}`, err, { path });
    }

    logger.debug('Secret store ready', { path });
    return new SecretStore(path, config.extension ?? SECRET_FILE_EXTENSION);
  }

  filePath(key: string): string {
    assertValidKey(key);
    return join(this.path, `${key}${this.extension}`);
  }

  /**
   * Append `value` to the key's file, creating the file on first write.
   * The handle is closed whether or not the write succeeds.
   */
  async append(key: string, value: string): Promise<void> {
    const file = this.filePath(key);
    let handle: FileHandle | undefined;

    try {
      handle = await open(file, 'a');
      await handle.appendFile(value, 'utf8');
    } catch (err) {
      throw SecretInitError.io(`Could not write secret file ${file}`, err, { key });
    } finally {
      await handle?.close();
    }

    logger.debug('Secret appended', { key, file });
  }
}
