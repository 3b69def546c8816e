/**
 * Crypto-secure randomness on the Web Crypto API (globalThis.crypto, Node.js 20)
 *
 * @module @clipfilter/core/runtime/crypto
 */

/**
 * Generate crypto-secure random bytes
 */
export function getRandomBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length);
  globalThis.crypto.getRandomValues(bytes);
  return bytes;
}

/**
 * Convert bytes to a lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Random hex string of `byteLength` bytes (twice as many characters)
 *
 * @example
 * ```typescript
 * const boundary = `----clipfilter${randomHex(16)}`;
 * ```
 */
export function randomHex(byteLength: number): string {
  return bytesToHex(getRandomBytes(byteLength));
}
