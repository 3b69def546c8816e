/**
 * Base64 and data-URL helpers
 *
 * @module @clipfilter/core/runtime/base64
 */

const DATA_URL_PREFIX = /^data:[^;,]+;base64,/;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Convert bytes to a base64 string
 *
 * @example
 * ```typescript
 * bytesToBase64(new Uint8Array([72, 101, 108, 108, 111])); // "SGVsbG8="
 * ```
 */
export function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Decode a base64 string (with or without a data-URL prefix)
 *
 * Whitespace is ignored. Returns undefined when the text is not base64
 * or decodes to nothing.
 */
export function base64ToBytes(base64: string): Uint8Array | undefined {
  const clean = base64.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
  if (!isBase64(clean)) return undefined;
  const buffer = Buffer.from(clean, 'base64');
  if (buffer.byteLength === 0) return undefined;
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

/**
 * Check that a string is non-empty, well-formed base64 (whitespace ignored)
 */
export function isBase64(input: string): boolean {
  const clean = input.replace(/\s+/g, '');
  return clean.length > 0 && clean.length % 4 !== 1 && BASE64_BODY.test(clean);
}

/**
 * Create a data URL from base64 data
 *
 * @example
 * ```typescript
 * toDataUrl('iVBORw0KGgo=', 'image/png'); // "data:image/png;base64,iVBORw0KGgo="
 * ```
 */
export function toDataUrl(base64: string, mimeType = 'image/png'): string {
  return `data:${mimeType};base64,${base64}`;
}

/**
 * Check if a string is a base64 data URL
 */
export function isDataUri(input: string): boolean {
  return DATA_URL_PREFIX.test(input);
}

/**
 * Drop everything up to and including the first comma when the value
 * carries a `data:image` URL; other values are returned unchanged.
 */
export function stripImageDataUrl(value: string): string {
  if (!value.includes('data:image')) return value;
  const comma = value.indexOf(',');
  return comma === -1 ? value : value.substring(comma + 1);
}
