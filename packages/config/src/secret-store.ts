/**
 * API key protection at rest
 *
 * AES-256-GCM through the Web Crypto API. A protected token is
 * `enc:v1:` followed by base64 of the 12-byte IV and the ciphertext.
 * Values without the prefix are legacy plaintext and pass through unchanged.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { webcrypto } from 'node:crypto';
import {
  ErrorCodes,
  Logger,
  PersistenceError,
  base64ToBytes,
  bytesToBase64,
  errorMessage,
  getRandomBytes,
} from '@clipfilter/core';
import type { SecretStore } from '@clipfilter/core';

export const PROTECTED_PREFIX = 'enc:v1:';

const KEY_LENGTH = 32;
const IV_LENGTH = 12;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function isProtectedToken(value: string): boolean {
  return value.startsWith(PROTECTED_PREFIX);
}

export class AesGcmSecretStore implements SecretStore {
  private keyPromise?: Promise<webcrypto.CryptoKey>;
  private readonly logger: Logger;

  /**
   * @param keyBytes - 32-byte AES key
   */
  constructor(private readonly keyBytes: Uint8Array, logger?: Logger) {
    if (keyBytes.byteLength !== KEY_LENGTH) {
      throw new Error(`Secret key must be ${KEY_LENGTH} bytes, got ${keyBytes.byteLength}`);
    }
    this.logger = logger ?? new Logger({ scope: 'secrets' });
  }

  private key(): Promise<webcrypto.CryptoKey> {
    if (!this.keyPromise) {
      this.keyPromise = globalThis.crypto.subtle.importKey(
        'raw',
        this.keyBytes,
        { name: 'AES-GCM' },
        false,
        ['encrypt', 'decrypt']
      );
    }
    return this.keyPromise;
  }

  /**
   * @throws Error when encryption fails
   */
  async protect(plaintext: string): Promise<string> {
    if (plaintext === '') return '';
    const iv = getRandomBytes(IV_LENGTH);
    const ciphertext = await globalThis.crypto.subtle.encrypt(
      { name: 'AES-GCM', iv },
      await this.key(),
      encoder.encode(plaintext)
    );

    const sealed = new Uint8Array(IV_LENGTH + ciphertext.byteLength);
    sealed.set(iv, 0);
    sealed.set(new Uint8Array(ciphertext), IV_LENGTH);
    return PROTECTED_PREFIX + bytesToBase64(sealed);
  }

  /**
   * Decrypt a token. Unprefixed values are returned unchanged; a token that
   * cannot be decrypted (wrong key, corrupt data) yields '' and an error log.
   */
  async unprotect(token: string): Promise<string> {
    if (token === '') return '';
    if (!isProtectedToken(token)) return token;

    try {
      const sealed = base64ToBytes(token.substring(PROTECTED_PREFIX.length));
      if (!sealed || sealed.byteLength <= IV_LENGTH) {
        throw new Error('Protected token is truncated');
      }
      const plaintext = await globalThis.crypto.subtle.decrypt(
        { name: 'AES-GCM', iv: sealed.subarray(0, IV_LENGTH) },
        await this.key(),
        sealed.subarray(IV_LENGTH)
      );
      return decoder.decode(plaintext);
    } catch (error) {
      this.logger.error('API key could not be decrypted', error);
      return '';
    }
  }
}

/**
 * Read the secret key file, creating it with a random key (mode 0600) when
 * missing or unreadable as a 32-byte base64 key.
 *
 * @throws Error when the file cannot be read or written
 */
export function loadOrCreateSecretKey(path: string, logger?: Logger): Uint8Array {
  if (existsSync(path)) {
    const existing = base64ToBytes(readFileSync(path, 'utf8'));
    if (existing && existing.byteLength === KEY_LENGTH) {
      return existing;
    }
    logger?.warn(`Secret key file ${path} is invalid, generating a new key`);
  }

  const key = getRandomBytes(KEY_LENGTH);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, bytesToBase64(key) + '\n', { encoding: 'utf8', mode: 0o600 });
  return key;
}

/**
 * Like {@link loadOrCreateSecretKey}, but a key file that cannot be read or
 * written yields a random key for this session only. Keys protected under
 * it cannot be read back by a later session.
 */
export function loadSecretKey(path: string, logger: Logger): Uint8Array {
  try {
    return loadOrCreateSecretKey(path, logger);
  } catch (error) {
    logger.error('Secret key file unavailable, using a session key', new PersistenceError(
      ErrorCodes.SECRET_KEY_UNAVAILABLE,
      `Secret key file ${path} could not be used: ${errorMessage(error)}`,
      path
    ));
    return getRandomBytes(KEY_LENGTH);
  }
}
