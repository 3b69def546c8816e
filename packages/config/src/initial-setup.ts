/**
 * First-run setup: discover the provider's models and build a configuration
 * with one model per (input, output) pair.
 */

import { ConfigurationError, ErrorCodes, Logger, err, ok } from '@clipfilter/core';
import type {
  AppConfig,
  ClipFilterError,
  FilterDefinition,
  HotkeyBinding,
  HttpTransport,
  IOKind,
  ModelConfig,
  Result,
} from '@clipfilter/core';
import {
  IMAGE_MODEL_PATTERNS,
  TEXT_MODEL_PATTERNS,
  fetchModels,
  pickModelByPatterns,
} from '@clipfilter/templates';
import type { ProviderCatalog } from '@clipfilter/templates';
import { DEFAULT_HOTKEY_KEY, DEFAULT_HOTKEY_MODIFIERS } from './config-store.js';
import type { ConfigDocument } from './config-store.js';

export interface InitialSetupOptions {
  catalog: ProviderCatalog;
  providerId: string;
  /** Server base; the provider's default endpoint when empty */
  serverUrl: string;
  apiKey: string;
  transport: HttpTransport;
  language?: string;
  hotkey?: HotkeyBinding;
  /** First-run defaults (see `ConfigStore.loadDefaults`) */
  defaults: ConfigDocument;
  logger?: Logger;
}

/**
 * Models created by setup, in index order
 */
const SETUP_SLOTS: ReadonlyArray<{ name: string; input: IOKind; output: IOKind; patterns: readonly string[] }> = [
  { name: 'Text/Text', input: 'text', output: 'text', patterns: TEXT_MODEL_PATTERNS },
  { name: 'Text/Image', input: 'text', output: 'image', patterns: IMAGE_MODEL_PATTERNS },
  { name: 'Image/Text', input: 'image', output: 'text', patterns: TEXT_MODEL_PATTERNS },
  { name: 'Image/Image', input: 'image', output: 'image', patterns: IMAGE_MODEL_PATTERNS },
];

/**
 * Index of the setup model serving a filter's (input, output) pair
 */
export function setupModelIndexFor(input: IOKind, output: IOKind): number {
  const index = SETUP_SLOTS.findIndex(slot => slot.input === input && slot.output === output);
  return index === -1 ? 0 : index;
}

/**
 * Build the first configuration from the provider's model list.
 *
 * @returns The configuration (API keys in plaintext), or why discovery failed
 */
export async function performInitialSetup(options: InitialSetupOptions): Promise<Result<AppConfig, ClipFilterError>> {
  const { catalog, providerId, apiKey, transport, defaults } = options;
  const logger = options.logger ?? new Logger({ scope: 'setup' });

  if (catalog.isEmpty) {
    return err(new ConfigurationError(ErrorCodes.UNKNOWN_PROVIDER, 'No providers are available'));
  }
  const provider = catalog.findProvider(providerId);
  if (!provider) {
    return err(new ConfigurationError(
      ErrorCodes.UNKNOWN_PROVIDER,
      `Unknown provider "${providerId}"`,
      { providerId }
    ));
  }

  const serverUrl = options.serverUrl.trim() === '' ? provider.defaultEndpoint : options.serverUrl;
  const listed = await fetchModels({ provider, serverUrl, apiKey, transport, logger });
  if (!listed.ok) {
    logger.error(`Model discovery failed for provider "${provider.id}"`, listed.error);
    return listed;
  }

  const models: ModelConfig[] = SETUP_SLOTS.map(slot => ({
    name: slot.name,
    serverUrl,
    modelName: pickModelByPatterns(listed.value, slot.patterns) ?? listed.value[0],
    apiKey,
    providerId: provider.id,
  }));

  const baseFilters: FilterDefinition[] = defaults.filters && defaults.filters.length > 0
    ? defaults.filters
    : [{ title: 'Translate', input: 'text', output: 'text', modelIndex: 0, prompt: 'Translate into English.' }];
  const filters = baseFilters.map(filter => ({
    ...filter,
    modelIndex: setupModelIndexFor(filter.input, filter.output),
  }));

  logger.info(`Setup selected models: ${models.map(m => `${m.name}=${m.modelName}`).join(', ')}`);

  return ok({
    language: options.language ?? defaults.language ?? 'en',
    hotkey: options.hotkey ?? {
      modifiers: defaults.hotkey?.modifiers ?? DEFAULT_HOTKEY_MODIFIERS,
      key: defaults.hotkey?.key ?? DEFAULT_HOTKEY_KEY,
    },
    models,
    filters,
  });
}
