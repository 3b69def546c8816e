/**
 * Resource limits for response parsing and HTTP requests
 */

import { getEnvNumber } from '../runtime/env.js';

/**
 * Default resource limits
 *
 * - MAX_RESPONSE_SIZE: 64MB of JSON text (inline base64 images)
 * - REQUEST_TIMEOUT: 120s
 * - MAX_JSON_DEPTH: 100 levels
 */
export const DEFAULT_LIMITS = {
  MAX_RESPONSE_SIZE: 64 * 1024 * 1024,
  REQUEST_TIMEOUT: 120000,
  MAX_JSON_DEPTH: 100,
};

/**
 * Request timeout for HTTP transports: CLIPFILTER_REQUEST_TIMEOUT_MS or the default
 */
export function resolveRequestTimeout(): number {
  return getEnvNumber('CLIPFILTER_REQUEST_TIMEOUT_MS', DEFAULT_LIMITS.REQUEST_TIMEOUT);
}

export interface FetchedText {
  response: Response;
  body: string;
}

/**
 * Execute a fetch and read its body under one timeout. The timer covers
 * the body as well as the headers, so a stalled body is aborted too.
 *
 * @param url - The URL to fetch
 * @param options - Fetch options (method, headers, body, etc.)
 * @param timeoutMs - Timeout in milliseconds
 * @throws Error (AbortError) if the request times out
 */
export async function fetchTextWithTimeout(
  url: string,
  options: RequestInit = {},
  timeoutMs: number = DEFAULT_LIMITS.REQUEST_TIMEOUT
): Promise<FetchedText> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });
    const body = await response.text();
    return { response, body };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * JSON parse with size and depth limits
 *
 * @param text - JSON string to parse
 * @param maxDepth - Maximum nesting depth in levels
 * @returns Parsed value
 * @throws Error if JSON exceeds depth limit, size limit, or is invalid
 *
 * @example
 * ```typescript
 * const data = safeJsonParse(responseText);
 * ```
 */
export function safeJsonParse(
  text: string,
  maxDepth: number = DEFAULT_LIMITS.MAX_JSON_DEPTH
): unknown {
  if (text.length > DEFAULT_LIMITS.MAX_RESPONSE_SIZE) {
    throw new Error('JSON string exceeds maximum size');
  }

  const parsed: unknown = JSON.parse(text);

  function checkDepth(value: unknown, depth: number): void {
    if (depth > maxDepth) {
      throw new Error(`JSON nesting depth exceeds maximum of ${maxDepth}`);
    }

    if (typeof value === 'object' && value !== null) {
      for (const child of Object.values(value)) {
        checkDepth(child, depth + 1);
      }
    }
  }

  checkDepth(parsed, 0);
  return parsed;
}
