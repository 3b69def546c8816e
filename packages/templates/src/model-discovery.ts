/**
 * Model discovery
 *
 * Lists the models a provider serves (through its `models` descriptor) and
 * picks a model for each filter kind by ordered name patterns.
 */

import {
  ConfigurationError,
  ErrorCodes,
  ExtractionError,
  TransportError,
  err,
  ok,
} from '@clipfilter/core';
import type { ApiProvider, ClipFilterError, HttpTransport, Logger, Result } from '@clipfilter/core';
import { resolveEndpoint } from './endpoint-resolver.js';
import { parseJson } from './json-path.js';
import type { JsonValue } from './json-path.js';
import { substitutePlaceholders } from './placeholders.js';
import type { PlaceholderContext } from './placeholders.js';

/**
 * Preference order for text models: cheaper and faster tiers first
 */
export const TEXT_MODEL_PATTERNS: readonly string[] = [
  'gpt-.*-nano',
  'gemini-.*-flash-lite',
  'gpt-.*-mini',
  'gemini-.*-flash',
  'gpt-.*',
  'claude-.*-haiku',
  'gemini-.*-pro',
  'claude-.*-sonnet',
];

/**
 * Preference order for image generation models
 */
export const IMAGE_MODEL_PATTERNS: readonly string[] = [
  'gpt.*image.*mini',
  'gemini.*image',
  'gpt.*image',
];

export interface FetchModelsOptions {
  provider: ApiProvider;
  /** Server base; the provider's default endpoint when empty */
  serverUrl: string;
  apiKey: string;
  transport: HttpTransport;
  logger?: Logger;
}

const encoder = new TextEncoder();

function isObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Ask the provider for its model ids.
 *
 * @returns Model ids in response order, or the reason none could be listed
 */
export async function fetchModels(options: FetchModelsOptions): Promise<Result<string[], ClipFilterError>> {
  const { provider, apiKey, transport, logger } = options;
  const descriptor = provider.models;
  if (!descriptor || descriptor.endpoint === '') {
    return err(new ConfigurationError(
      ErrorCodes.MODELS_ENDPOINT_MISSING,
      `Provider "${provider.id}" declares no models endpoint`,
      { providerId: provider.id }
    ));
  }

  const context: PlaceholderContext = { model: '', apiKey };
  const serverUrl = options.serverUrl.trim() === '' ? provider.defaultEndpoint : options.serverUrl;
  const endpoint = resolveEndpoint(serverUrl, substitutePlaceholders(descriptor.endpoint, context));
  if (!endpoint) {
    return err(new ConfigurationError(
      ErrorCodes.INVALID_ENDPOINT,
      `Cannot resolve models endpoint for provider "${provider.id}"`,
      { serverUrl }
    ));
  }

  const headers = descriptor.headers.map(([name, value]) => [name, substitutePlaceholders(value, context)] as const);
  const response = await transport.send({
    ...endpoint,
    method: descriptor.method,
    headers,
    body: descriptor.method === 'POST' ? encoder.encode(substitutePlaceholders(descriptor.payload, context)) : undefined,
  });

  if (response.error) {
    logger?.warn(`Models request reported an error: ${response.error}`, { providerId: provider.id, status: response.status });
  }
  if (response.body === '') {
    return err(new TransportError(
      ErrorCodes.EMPTY_RESPONSE,
      `Models request for provider "${provider.id}" returned no body`,
      response.status,
      { error: response.error }
    ));
  }

  const root = parseJson(response.body);
  if (root === undefined) {
    return err(new ExtractionError(
      ErrorCodes.RESULT_NOT_FOUND,
      `Models response for provider "${provider.id}" is not JSON`
    ));
  }

  let current: JsonValue = root;
  for (const part of descriptor.resultPath.split('.')) {
    if (part === '') continue;
    if (!isObject(current) || !Object.prototype.hasOwnProperty.call(current, part)) {
      return err(new ExtractionError(
        ErrorCodes.MODELS_PATH_INVALID,
        `Models result path "${descriptor.resultPath}" not found`,
        { providerId: provider.id, segment: part }
      ));
    }
    current = current[part];
  }

  if (!Array.isArray(current)) {
    return err(new ExtractionError(
      ErrorCodes.MODELS_PATH_INVALID,
      `Models result path "${descriptor.resultPath}" is not a list`,
      { providerId: provider.id }
    ));
  }

  const models: string[] = [];
  for (const item of current) {
    if (typeof item === 'string') {
      models.push(item);
    } else if (isObject(item) && typeof item.id === 'string') {
      models.push(item.id);
    }
  }

  if (models.length === 0) {
    return err(new ExtractionError(
      ErrorCodes.NO_MODELS_RETURNED,
      `Provider "${provider.id}" returned no models`
    ));
  }

  logger?.debug(`Provider "${provider.id}" lists ${models.length} model(s)`);
  return ok(models);
}

function compilePattern(pattern: string): RegExp | undefined {
  try {
    return new RegExp(pattern, 'i');
  } catch {
    return undefined;
  }
}

/**
 * Pick a model by ordered patterns. The first pattern matching any model wins;
 * without a match the first model is returned.
 *
 * @example
 * ```typescript
 * pickModelByPatterns(['gpt-4o', 'gpt-4o-mini'], ['gpt-.*-mini', 'gpt-.*']); // 'gpt-4o-mini'
 * ```
 */
export function pickModelByPatterns(models: readonly string[], patterns: readonly string[]): string | undefined {
  for (const pattern of patterns) {
    const regex = compilePattern(pattern);
    if (!regex) continue;
    const match = models.find(model => regex.test(model));
    if (match !== undefined) return match;
  }
  return models[0];
}
