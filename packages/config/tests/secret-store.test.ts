import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { Logger, createSilentLogger } from '@clipfilter/core';
import type { LogEntry } from '@clipfilter/core';
import {
  AesGcmSecretStore,
  PROTECTED_PREFIX,
  isProtectedToken,
  loadOrCreateSecretKey,
  loadSecretKey,
} from '../src/secret-store.js';

function key(fill: number): Uint8Array {
  return new Uint8Array(32).fill(fill);
}

describe('AesGcmSecretStore', () => {
  test('protects and recovers a key', async () => {
    const store = new AesGcmSecretStore(key(7), createSilentLogger());
    const token = await store.protect('test-secret');

    expect(token.startsWith(PROTECTED_PREFIX)).toBe(true);
    expect(token.includes('test-secret')).toBe(false);
    expect(await store.unprotect(token)).toBe('test-secret');
  });

  test('uses a fresh IV for every token', async () => {
    const store = new AesGcmSecretStore(key(7), createSilentLogger());
    expect(await store.protect('test-secret')).not.toBe(await store.protect('test-secret'));
  });

  test('empty values stay empty', async () => {
    const store = new AesGcmSecretStore(key(7), createSilentLogger());
    expect(await store.protect('')).toBe('');
    expect(await store.unprotect('')).toBe('');
  });

  test('unprefixed values pass through', async () => {
    const store = new AesGcmSecretStore(key(7), createSilentLogger());
    expect(await store.unprotect('legacy-plaintext')).toBe('legacy-plaintext');
  });

  test('a token sealed with another key yields an empty string and an error log', async () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ console: false, sinks: [e => entries.push(e)] });
    const token = await new AesGcmSecretStore(key(1), logger).protect('test-secret');

    expect(await new AesGcmSecretStore(key(2), logger).unprotect(token)).toBe('');
    expect(entries.map(e => [e.level, e.message])).toEqual([['error', 'API key could not be decrypted']]);
  });

  test('a truncated token yields an empty string', async () => {
    const store = new AesGcmSecretStore(key(7), createSilentLogger());
    expect(await store.unprotect(`${PROTECTED_PREFIX}AAAA`)).toBe('');
    expect(await store.unprotect(`${PROTECTED_PREFIX}@@@`)).toBe('');
  });

  test('requires a 32-byte key', () => {
    expect(() => new AesGcmSecretStore(new Uint8Array(16))).toThrow('Secret key must be 32 bytes, got 16');
  });

  test('isProtectedToken checks the prefix', () => {
    expect(isProtectedToken('enc:v1:abc')).toBe(true);
    expect(isProtectedToken('sk-plain')).toBe(false);
  });
});

describe('loadOrCreateSecretKey', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'clipfilter-key-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('creates a private key file and reuses it', () => {
    const path = join(dir, 'nested', 'secret.key');
    const created = loadOrCreateSecretKey(path);

    expect(created.byteLength).toBe(32);
    expect(statSync(path).mode & 0o777).toBe(0o600);
    expect(readFileSync(path, 'utf8').endsWith('\n')).toBe(true);
    expect(loadOrCreateSecretKey(path)).toEqual(created);
  });

  test('replaces an invalid key file', () => {
    const path = join(dir, 'secret.key');
    writeFileSync(path, 'c2hvcnQ=\n');

    const replaced = loadOrCreateSecretKey(path, createSilentLogger());

    expect(replaced.byteLength).toBe(32);
    expect(loadOrCreateSecretKey(path)).toEqual(replaced);
  });
});

describe('loadSecretKey', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'clipfilter-key-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('reads the key file when it is usable', () => {
    const path = join(dir, 'secret.key');
    const created = loadOrCreateSecretKey(path);
    expect(loadSecretKey(path, createSilentLogger())).toEqual(created);
  });

  test('an unusable directory yields a session key and a persistence error', async () => {
    const blocker = join(dir, 'file');
    writeFileSync(blocker, 'not a directory');
    const entries: LogEntry[] = [];
    const logger = new Logger({ console: false, sinks: [e => entries.push(e)] });

    const sessionKey = loadSecretKey(join(blocker, 'clipfilter', 'secret.key'), logger);

    expect(sessionKey.byteLength).toBe(32);
    expect(entries.map(e => [e.level, e.message, e.error?.name])).toEqual([
      ['error', 'Secret key file unavailable, using a session key', 'PersistenceError'],
    ]);
    const store = new AesGcmSecretStore(sessionKey, logger);
    expect(await store.unprotect(await store.protect('test-secret'))).toBe('test-secret');
  });
});
