/**
 * Result paths: dotted keys with optional bracketed indexes
 * (`choices[0].message.content`, `data[0].b64_json`, `output[1][0].text`)
 *
 * Only this subset is supported; there are no wildcards, filters or quoting.
 */

import { safeJsonParse } from '@clipfilter/core';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type PathSegment =
  | { kind: 'key'; key: string }
  | { kind: 'index'; index: number };

const SEGMENT_PATTERN = /^([^[\]]*)((?:\[\d+\])*)$/;

/**
 * Parse a result path into key and index steps.
 *
 * @returns Steps in order, or undefined when the path is empty or has an
 *   empty or malformed segment
 */
export function parseResultPath(path: string): PathSegment[] | undefined {
  if (path === '') return undefined;

  const segments: PathSegment[] = [];
  for (const part of path.split('.')) {
    const match = SEGMENT_PATTERN.exec(part);
    if (!match || part === '') return undefined;

    const [, key, indexes] = match;
    if (key !== '') segments.push({ kind: 'key', key });
    for (const index of indexes.matchAll(/\[(\d+)\]/g)) {
      segments.push({ kind: 'index', index: Number.parseInt(index[1], 10) });
    }
  }
  return segments;
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk parsed JSON. Object keys must exist and indexes must be in bounds;
 * any miss yields undefined.
 */
export function walkJsonPath(value: JsonValue, segments: readonly PathSegment[]): JsonValue | undefined {
  let current: JsonValue = value;
  for (const segment of segments) {
    if (segment.kind === 'key') {
      if (!isJsonObject(current) || !Object.prototype.hasOwnProperty.call(current, segment.key)) {
        return undefined;
      }
      current = current[segment.key];
    } else {
      if (!Array.isArray(current) || segment.index >= current.length) {
        return undefined;
      }
      current = current[segment.index];
    }
  }
  return current;
}

/**
 * Narrow an unknown parse result to a JSON value tree
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Parse response text into a JSON value tree; undefined when it is not JSON
 */
export function parseJson(text: string): JsonValue | undefined {
  try {
    const parsed = safeJsonParse(text);
    return isJsonValue(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Render an extracted value: strings as-is, anything else as JSON text.
 * `null` counts as not found.
 */
export function renderJsonValue(value: JsonValue | undefined): string | undefined {
  if (value === undefined || value === null) return undefined;
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Extract the value at `path` from raw response text.
 * Never throws: bad JSON, an invalid path or a miss all yield undefined.
 *
 * @example
 * ```typescript
 * extractByPath('{"choices":[{"message":{"content":"hello"}}]}', 'choices[0].message.content');
 * // "hello"
 * ```
 */
export function extractByPath(raw: string, path: string): string | undefined {
  const segments = parseResultPath(path);
  if (!segments) return undefined;
  const root = parseJson(raw);
  if (root === undefined) return undefined;
  return renderJsonValue(walkJsonPath(root, segments));
}
