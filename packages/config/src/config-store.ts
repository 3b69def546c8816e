/**
 * Configuration persistence
 *
 * `config.json` holds the user's models, filters, hotkey and language, with
 * API keys protected by a {@link SecretStore}. Loading is lenient: entries
 * without a name/title are dropped, unknown fields are ignored, and a file
 * that cannot be parsed leaves the built-in defaults in place.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import Ajv from 'ajv';
import type { SchemaObject } from 'ajv';
import {
  ErrorCodes,
  Logger,
  PersistenceError,
  err,
  errorMessage,
  ok,
  parseIOKind,
  safeJsonParse,
} from '@clipfilter/core';
import type {
  AppConfig,
  FilterDefinition,
  HotkeyBinding,
  ModelConfig,
  Result,
  SecretStore,
} from '@clipfilter/core';
import { normalizeProviderId } from '@clipfilter/templates';
import type { ProviderCatalog } from '@clipfilter/templates';
import type { ConfigPaths } from './config-paths.js';

/** MOD_ALT | MOD_WIN */
export const DEFAULT_HOTKEY_MODIFIERS = 0x0001 | 0x0008;
/** 'V' */
export const DEFAULT_HOTKEY_KEY = 0x56;

/**
 * Parsed configuration document. Fields absent from the file are undefined;
 * model `apiKey` values are still in their stored (protected) form.
 */
export interface ConfigDocument {
  language?: string;
  hotkey?: Partial<HotkeyBinding>;
  models?: ModelConfig[];
  filters?: FilterDefinition[];
}

/**
 * State before any file is applied
 */
export function createInitialConfig(): AppConfig {
  return {
    language: 'en',
    hotkey: { modifiers: DEFAULT_HOTKEY_MODIFIERS, key: DEFAULT_HOTKEY_KEY },
    models: [
      { name: 'Translate', serverUrl: 'https://api.openai.com', modelName: 'gpt-5.1', apiKey: '', providerId: 'OpenAI' },
    ],
    filters: [],
  };
}

/**
 * Defaults used on first run when no `defconf.json` is available
 */
export function createFallbackDefaults(): ConfigDocument {
  return {
    language: 'en',
    hotkey: { modifiers: DEFAULT_HOTKEY_MODIFIERS, key: DEFAULT_HOTKEY_KEY },
    models: [
      { name: 'Translate', serverUrl: 'https://api.openai.com', modelName: 'gpt-5.1', apiKey: '', providerId: 'OpenAI' },
    ],
    filters: [
      { title: 'Translate', input: 'text', output: 'text', modelIndex: 0, prompt: 'Translate into English.' },
    ],
  };
}

/**
 * Filters installed when a configuration ends up with none
 */
export function createStarterFilters(): FilterDefinition[] {
  return [
    { title: 'Translate into English', input: 'text', output: 'text', modelIndex: 0, prompt: 'Translate into English.' },
    { title: 'Summarize', input: 'text', output: 'text', modelIndex: 0, prompt: 'Summarize the following text.' },
  ];
}

// ============================================================================
// Parsing and serialization
// ============================================================================

interface RawConfigDocument {
  language?: string;
  hotkey?: { modifiers?: number; key?: number };
  models?: unknown[];
  filters?: unknown[];
}

const configSchema: SchemaObject = {
  type: 'object',
  properties: {
    language: { type: 'string' },
    hotkey: {
      type: 'object',
      properties: {
        modifiers: { type: 'number' },
        key: { type: 'number' },
      },
    },
    models: { type: 'array' },
    filters: { type: 'array' },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<RawConfigDocument>(configSchema);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string, fallback: string): string {
  const value = record[key];
  return typeof value === 'string' ? value : fallback;
}

function readNumber(record: Record<string, unknown>, key: string, fallback: number): number {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function parseModel(record: Record<string, unknown>): ModelConfig {
  return {
    name: readString(record, 'name', ''),
    serverUrl: readString(record, 'serverUrl', ''),
    modelName: readString(record, 'modelName', ''),
    providerId: normalizeProviderId(readString(record, 'providerId', '')),
    apiKey: readString(record, 'apiKey', ''),
  };
}

function parseFilter(record: Record<string, unknown>): FilterDefinition {
  const index = Math.trunc(readNumber(record, 'modelIndex', 0));
  return {
    title: readString(record, 'title', ''),
    input: parseIOKind(readString(record, 'input', 'text')),
    output: parseIOKind(readString(record, 'output', 'text')),
    modelIndex: index >= 0 ? index : 0,
    prompt: readString(record, 'prompt', ''),
  };
}

/**
 * Parse a configuration document. Models without a name and filters without
 * a title are dropped; provider ids are normalized.
 */
export function parseConfigDocument(text: string, path?: string): Result<ConfigDocument, PersistenceError> {
  let parsed: unknown;
  try {
    parsed = safeJsonParse(text);
  } catch (error) {
    return err(new PersistenceError(
      ErrorCodes.CONFIG_PARSE_FAILED,
      `Configuration is not valid JSON: ${errorMessage(error)}`,
      path
    ));
  }

  if (!validateConfig(parsed)) {
    const reason = (validateConfig.errors ?? [])
      .map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    return err(new PersistenceError(ErrorCodes.CONFIG_PARSE_FAILED, `Configuration is invalid: ${reason}`, path));
  }

  const document: ConfigDocument = {};
  if (parsed.language !== undefined) document.language = parsed.language;
  if (parsed.hotkey !== undefined) {
    document.hotkey = {};
    if (parsed.hotkey.modifiers !== undefined) document.hotkey.modifiers = parsed.hotkey.modifiers;
    if (parsed.hotkey.key !== undefined) document.hotkey.key = parsed.hotkey.key;
  }
  if (parsed.models !== undefined) {
    document.models = parsed.models.filter(isRecord).map(parseModel).filter(m => m.name !== '');
  }
  if (parsed.filters !== undefined) {
    document.filters = parsed.filters.filter(isRecord).map(parseFilter).filter(f => f.title !== '');
  }
  return ok(document);
}

/**
 * Apply a document over a configuration. Non-empty model and filter lists
 * replace the current ones; empty lists leave them in place.
 */
export function applyConfigDocument(base: AppConfig, document: ConfigDocument): AppConfig {
  return {
    language: document.language ?? base.language,
    hotkey: {
      modifiers: document.hotkey?.modifiers ?? base.hotkey.modifiers,
      key: document.hotkey?.key ?? base.hotkey.key,
    },
    models: document.models && document.models.length > 0
      ? document.models.map(m => ({ ...m }))
      : base.models.map(m => ({ ...m })),
    filters: document.filters && document.filters.length > 0
      ? document.filters.map(f => ({ ...f }))
      : base.filters.map(f => ({ ...f })),
  };
}

/**
 * Serialize a configuration whose API keys are already in stored form
 */
export function serializeConfig(config: AppConfig): string {
  const document = {
    language: config.language,
    hotkey: { modifiers: config.hotkey.modifiers, key: config.hotkey.key },
    models: config.models.map(m => ({
      name: m.name,
      serverUrl: m.serverUrl,
      modelName: m.modelName,
      providerId: m.providerId,
      apiKey: m.apiKey,
    })),
    filters: config.filters.map(f => ({
      title: f.title,
      input: f.input,
      output: f.output,
      modelIndex: f.modelIndex,
      prompt: f.prompt,
    })),
  };
  return JSON.stringify(document, null, 2) + '\n';
}

/**
 * Give every model without a provider the first catalog provider
 */
export function ensureModelProviders(models: ModelConfig[], catalog: ProviderCatalog): void {
  const first = catalog.firstProvider();
  if (!first) return;
  for (const model of models) {
    if (model.providerId === '') model.providerId = first.id;
  }
}

/**
 * Point out-of-range filter model indexes at model 0
 */
export function clampModelIndexes(filters: FilterDefinition[], modelCount: number): void {
  for (const filter of filters) {
    if (filter.modelIndex >= modelCount) filter.modelIndex = 0;
  }
}

// ============================================================================
// Store
// ============================================================================

export interface ConfigStoreOptions {
  paths: Pick<ConfigPaths, 'configFile' | 'defaultConfigFile'>;
  secretStore: SecretStore;
  logger?: Logger;
}

export class ConfigStore {
  private readonly paths: Pick<ConfigPaths, 'configFile' | 'defaultConfigFile'>;
  private readonly secretStore: SecretStore;
  private readonly logger: Logger;

  constructor(options: ConfigStoreOptions) {
    this.paths = options.paths;
    this.secretStore = options.secretStore;
    this.logger = options.logger ?? new Logger({ scope: 'config' });
  }

  /** True when a user configuration file exists (first run otherwise) */
  exists(): boolean {
    return existsSync(this.paths.configFile);
  }

  /**
   * First-run defaults: `defconf.json` when present and valid, else the
   * built-in fallback
   */
  loadDefaults(): ConfigDocument {
    const path = this.paths.defaultConfigFile;
    if (!existsSync(path)) {
      this.logger.debug(`No default configuration at ${path}`);
      return createFallbackDefaults();
    }

    const parsed = this.readDocument(path);
    if (!parsed.ok) {
      this.logger.error('Default configuration skipped', parsed.error);
      return createFallbackDefaults();
    }
    return parsed.value;
  }

  /**
   * Load the configuration with API keys in plaintext. Never throws.
   */
  async load(catalog: ProviderCatalog): Promise<AppConfig> {
    let document: ConfigDocument;
    if (this.exists()) {
      const parsed = this.readDocument(this.paths.configFile);
      if (parsed.ok) {
        document = parsed.value;
      } else {
        this.logger.error('Configuration could not be loaded, using defaults', parsed.error);
        document = {};
      }
    } else {
      document = this.loadDefaults();
    }

    const config = applyConfigDocument(createInitialConfig(), document);
    for (const model of config.models) {
      model.apiKey = await this.secretStore.unprotect(model.apiKey);
    }

    clampModelIndexes(config.filters, config.models.length);
    ensureModelProviders(config.models, catalog);
    if (config.filters.length === 0) {
      config.filters = createStarterFilters();
    }

    this.logger.info(`Configuration loaded: ${config.models.length} model(s), ${config.filters.length} filter(s)`);
    return config;
  }

  /**
   * Save the configuration, protecting API keys. A key that cannot be
   * protected is stored as given. The in-memory configuration is not modified
   * except for provider backfill.
   *
   * @returns false when the file could not be written
   */
  async save(config: AppConfig, catalog: ProviderCatalog): Promise<boolean> {
    ensureModelProviders(config.models, catalog);

    const models: ModelConfig[] = [];
    for (const model of config.models) {
      models.push({ ...model, apiKey: await this.protectKey(model) });
    }

    const path = this.paths.configFile;
    try {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, serializeConfig({ ...config, models }), 'utf8');
    } catch (error) {
      this.logger.error('Configuration could not be saved', new PersistenceError(
        ErrorCodes.CONFIG_WRITE_FAILED,
        `Failed to write ${path}: ${errorMessage(error)}`,
        path
      ));
      return false;
    }

    this.logger.debug(`Configuration saved to ${path}`);
    return true;
  }

  private async protectKey(model: ModelConfig): Promise<string> {
    if (model.apiKey === '') return '';
    try {
      const token = await this.secretStore.protect(model.apiKey);
      return token === '' ? model.apiKey : token;
    } catch (error) {
      this.logger.warn(`API key of model "${model.name}" could not be protected, storing it as entered`, {
        reason: errorMessage(error),
      });
      return model.apiKey;
    }
  }

  private readDocument(path: string): Result<ConfigDocument, PersistenceError> {
    let text: string;
    try {
      text = readFileSync(path, 'utf8');
    } catch (error) {
      return err(new PersistenceError(
        ErrorCodes.CONFIG_PARSE_FAILED,
        `Failed to read ${path}: ${errorMessage(error)}`,
        path
      ));
    }
    return parseConfigDocument(text, path);
  }
}
