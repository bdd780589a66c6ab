/**
 * Tests for the SecretStore class.
 *
 * Each test uses a unique temp directory so tests are fully isolated
 * and never touch a real .env/ store.
 */

import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SecretStore, assertValidKey } from '../src/store.js';
import { isSecretErrorCode } from '../src/errors.js';

let tmpDir: string;

function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

beforeEach(() => {
  tmpDir = join(
    tmpdir(),
    `dotsecret-store-test-${Date.now()}-${Math.random().toString(36).slice(2)}`,
  );
  mkdirSync(tmpDir, { recursive: true });
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

// -----------------------------------------------------------------------
// open()
// -----------------------------------------------------------------------

describe('SecretStore.open', () => {
  test('creates the .env directory under cwd', async () => {
    const store = await SecretStore.open({ cwd: tmpDir });

    expect(store.path).toBe(join(tmpDir, '.env'));
    expect(statSync(store.path).isDirectory()).toBe(true);
  });

  test('opening twice does not fail', async () => {
    await SecretStore.open({ cwd: tmpDir });
    const again = await SecretStore.open({ cwd: tmpDir });

    expect(existsSync(again.path)).toBe(true);
  });

  test('does not create any secret file', async () => {
    const store = await SecretStore.open({ cwd: tmpDir });
    expect(readdirSync(store.path)).toEqual([]);
  });

  test('honours a custom path and extension', async () => {
    const store = await SecretStore.open({ cwd: tmpDir, path: 'secrets', extension: '.secret' });

    expect(store.path).toBe(join(tmpDir, 'secrets'));
    expect(store.filePath('api')).toBe(join(tmpDir, 'secrets', 'api.secret'));
  });

  test('fails with IO_FAILURE when the store path is a regular file', async () => {
    writeFileSync(join(tmpDir, '.env'), 'NODE_ENV=development\n');

    const error = await SecretStore.open({ cwd: tmpDir }).catch((err: unknown) => err);

    expect(isSecretErrorCode(error, 'IO_FAILURE')).toBe(true);
    expect(readFileSync(join(tmpDir, '.env'), 'utf8')).toBe('NODE_ENV=development\n');
  });
});

// -----------------------------------------------------------------------
// append()
// -----------------------------------------------------------------------

describe('SecretStore.append', () => {
  test('writes the raw value to <key>.txt', async () => {
    const store = await SecretStore.open({ cwd: tmpDir });
    await store.append('db_password', 'test-secret');

    expect(readFileSync(join(tmpDir, '.env', 'db_password.txt'), 'utf8')).toBe('test-secret');
  });

  test('appends without any separator', async () => {
    const store = await SecretStore.open({ cwd: tmpDir });
    await store.append('token', 'abc');
    await store.append('token', 'def');

    expect(readFileSync(store.filePath('token'), 'utf8')).toBe('abcdef');
  });

  test('keeps whitespace and newlines verbatim', async () => {
    const store = await SecretStore.open({ cwd: tmpDir });
    await store.append('padded', '  spaced out \n');

    expect(readFileSync(store.filePath('padded'), 'utf8')).toBe('  spaced out \n');
  });

  test('an empty value still creates the file', async () => {
    const store = await SecretStore.open({ cwd: tmpDir });
    await store.append('empty', '');

    expect(existsSync(store.filePath('empty'))).toBe(true);
    expect(readFileSync(store.filePath('empty'), 'utf8')).toBe('');
  });

  test('only touches the file for the given key', async () => {
    const store = await SecretStore.open({ cwd: tmpDir });
    await store.append('first', 'one');
    await store.append('second', 'two');

    expect(readdirSync(store.path).sort()).toEqual(['first.txt', 'second.txt']);
    expect(readFileSync(store.filePath('first'), 'utf8')).toBe('one');
  });

  test('fails with IO_FAILURE when the key file is a directory', async () => {
    const store = await SecretStore.open({ cwd: tmpDir });
    mkdirSync(join(store.path, 'blocked.txt'));

    const error = await store.append('blocked', 'value').catch((err: unknown) => err);

    expect(isSecretErrorCode(error, 'IO_FAILURE')).toBe(true);
    expect(error).toMatchObject({
      message: expect.stringContaining(`Could not write secret file ${join(store.path, 'blocked.txt')}`),
    });
  });

  test('rejects keys with path separators before touching disk', async () => {
    const store = await SecretStore.open({ cwd: tmpDir });

    await expect(store.append('../escape', 'value')).rejects.toMatchObject({ code: 'INVALID_KEY' });
    expect(existsSync(join(tmpDir, 'escape.txt'))).toBe(false);
  });
});

// -----------------------------------------------------------------------
// assertValidKey()
// -----------------------------------------------------------------------

describe('assertValidKey', () => {
  test('accepts ordinary key names', () => {
    expect(() => assertValidKey('db_password')).not.toThrow();
    expect(() => assertValidKey('jwt.signing-key')).not.toThrow();
  });

  test('reports an empty key as MISSING_KEY', () => {
    expect(captureError(() => assertValidKey(''))).toMatchObject({ code: 'MISSING_KEY' });
  });

  test.each(['nested/key', 'win\\key', 'nul\0key'])('rejects %j as INVALID_KEY', (key) => {
    expect(captureError(() => assertValidKey(key))).toMatchObject({ code: 'INVALID_KEY' });
  });
});
