/**
 * MIME Type Detection Utility
 *
 * Detects image types from actual data (magic bytes) so that a decoded API
 * result is only treated as an image when it really is one.
 *
 * Uses the `file-type` package for comprehensive format detection, with a
 * manual check for PNG in synchronous contexts.
 */

import { fileTypeFromBuffer } from 'file-type';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Detect the MIME type of binary data
 *
 * @returns Detected MIME type (e.g. "image/png"), or undefined for unknown data
 *
 * @example
 * ```typescript
 * const mime = await detectMimeType(bytes);
 * if (mime?.startsWith('image/')) { ... }
 * ```
 */
export async function detectMimeType(bytes: Uint8Array): Promise<string | undefined> {
  const result = await fileTypeFromBuffer(bytes);
  return result?.mime;
}

/**
 * Detect an image MIME type; undefined when the data is not a known image format
 */
export async function detectImageMimeType(bytes: Uint8Array): Promise<string | undefined> {
  const mime = await detectMimeType(bytes);
  return mime !== undefined && mime.startsWith('image/') ? mime : undefined;
}

/**
 * Synchronous PNG signature check (89 50 4E 47 0D 0A 1A 0A)
 */
export function isPng(bytes: Uint8Array): boolean {
  if (bytes.length < PNG_SIGNATURE.length) return false;
  return PNG_SIGNATURE.every((b, i) => bytes[i] === b);
}
