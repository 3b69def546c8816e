/**
 * Provider Catalog
 *
 * Loads API providers from JSON definition documents (one file per provider)
 * and answers template lookups. The catalog is immutable once built; reloading
 * means building a new one.
 *
 * Document shape:
 * ```json
 * {
 *   "default-endpoint": "https://api.openai.com",
 *   "models": { "endpoint": "/v1/models", "method": "GET", "result": "data", "headers": {} },
 *   "text-text": { "endpoint": "/v1/chat/completions", "result": "choices[0].message.content", "headers": {}, "payload": {} }
 * }
 * ```
 */

import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import Ajv from 'ajv';
import type { SchemaObject } from 'ajv';
import {
  ErrorCodes,
  PersistenceError,
  errorMessage,
  err,
  ok,
  parseIOKind,
  safeJsonParse,
} from '@clipfilter/core';
import type {
  ApiProvider,
  HeaderList,
  HttpMethod,
  IOKind,
  Logger,
  ModelsDescriptor,
  Result,
  TemplateDefinition,
} from '@clipfilter/core';

/** Reserved document keys that are never templates */
const DEFAULT_ENDPOINT_KEY = 'default-endpoint';
const MODELS_KEY = 'models';

/**
 * Directory of the provider definitions shipped with the package
 */
export const BUNDLED_DEFINITIONS_DIR = fileURLToPath(new URL('../apidef/', import.meta.url));

/**
 * One raw definition document: `name` is the provider id (file base name)
 */
export interface DefinitionDocument {
  name: string;
  text: string;
}

/**
 * Supplies definition documents to the catalog
 */
export interface DefinitionSource {
  /** Human-readable origin for log lines */
  readonly description: string;
  readDocuments(): DefinitionDocument[];
}

/**
 * Reads every `*.json` file of a directory, sorted by file name
 *
 * @example
 * ```typescript
 * const catalog = loadProviderCatalog(new DirectoryDefinitionSource(BUNDLED_DEFINITIONS_DIR), logger);
 * ```
 */
export class DirectoryDefinitionSource implements DefinitionSource {
  constructor(private readonly directory: string) {}

  get description(): string {
    return this.directory;
  }

  /**
   * @throws Error when the directory cannot be listed
   */
  readDocuments(): DefinitionDocument[] {
    const files = readdirSync(this.directory)
      .filter(name => name.toLowerCase().endsWith('.json'))
      .filter(name => statSync(join(this.directory, name)).isFile())
      .sort();

    return files.map(fileName => ({
      name: fileName.substring(0, fileName.lastIndexOf('.')),
      text: readFileSync(join(this.directory, fileName), 'utf8'),
    }));
  }
}

/**
 * In-memory documents, for tests and embedded definitions
 */
export class StaticDefinitionSource implements DefinitionSource {
  readonly description = 'static definitions';

  constructor(private readonly documents: DefinitionDocument[]) {}

  readDocuments(): DefinitionDocument[] {
    return [...this.documents];
  }
}

// ============================================================================
// Document validation
// ============================================================================

interface RawTemplate {
  endpoint?: string;
  result?: string;
  headers?: Record<string, string>;
  payload?: unknown;
}

interface RawModels extends RawTemplate {
  method?: string;
}

interface RawDocument {
  [DEFAULT_ENDPOINT_KEY]?: string;
  [key: string]: unknown;
}

const headersSchema: SchemaObject = {
  type: 'object',
  additionalProperties: { type: 'string' },
};

const templateSchema: SchemaObject = {
  type: 'object',
  properties: {
    endpoint: { type: 'string' },
    result: { type: 'string' },
    headers: headersSchema,
  },
};

const modelsSchema: SchemaObject = {
  type: 'object',
  properties: {
    endpoint: { type: 'string' },
    method: { type: 'string' },
    result: { type: 'string' },
    headers: headersSchema,
  },
};

const documentSchema: SchemaObject = {
  type: 'object',
  properties: {
    [DEFAULT_ENDPOINT_KEY]: { type: 'string' },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateDocument = ajv.compile<RawDocument>(documentSchema);
const validateTemplate = ajv.compile<RawTemplate>(templateSchema);
const validateModels = ajv.compile<RawModels>(modelsSchema);

function formatAjvErrors(validate: { errors?: Array<{ instancePath: string; message?: string }> | null }): string {
  return (validate.errors ?? [])
    .map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    .join('; ');
}

function toHeaderList(headers: Record<string, string> | undefined): HeaderList {
  return Object.entries(headers ?? {}).map(([name, value]) => [name, value] as const);
}

function stringifyPayload(payload: unknown): string {
  return payload === undefined ? '' : JSON.stringify(payload);
}

/**
 * Split a template key at the first hyphen into input/output kinds.
 * A key without a hyphen uses the whole key for both.
 */
function parseTemplateKey(key: string): { input: IOKind; output: IOKind } {
  const sep = key.indexOf('-');
  const input = sep === -1 ? key : key.substring(0, sep);
  const output = sep === -1 ? key : key.substring(sep + 1);
  return { input: parseIOKind(input), output: parseIOKind(output) };
}

/**
 * Parse one provider definition document.
 *
 * @returns The provider, `null` when the document declares no templates,
 *   or a `PersistenceError` when it is not valid JSON or not a valid definition
 */
export function parseProviderDocument(id: string, text: string): Result<ApiProvider | null, PersistenceError> {
  let parsed: unknown;
  try {
    parsed = safeJsonParse(text);
  } catch (error) {
    return err(new PersistenceError(
      ErrorCodes.DEFINITION_PARSE_FAILED,
      `Definition "${id}" is not valid JSON: ${errorMessage(error)}`,
      undefined,
      { providerId: id }
    ));
  }

  if (!validateDocument(parsed)) {
    return err(new PersistenceError(
      ErrorCodes.DEFINITION_PARSE_FAILED,
      `Definition "${id}" is invalid: ${formatAjvErrors(validateDocument)}`,
      undefined,
      { providerId: id }
    ));
  }

  const templates: TemplateDefinition[] = [];
  let models: ModelsDescriptor | undefined;

  for (const [key, value] of Object.entries(parsed)) {
    if (key === DEFAULT_ENDPOINT_KEY) continue;

    // Scalars and arrays are ignored, objects are templates or the models descriptor
    if (typeof value !== 'object' || value === null || Array.isArray(value)) continue;

    if (key === MODELS_KEY) {
      if (!validateModels(value)) {
        return err(new PersistenceError(
          ErrorCodes.DEFINITION_PARSE_FAILED,
          `Models descriptor of definition "${id}" is invalid: ${formatAjvErrors(validateModels)}`,
          undefined,
          { providerId: id }
        ));
      }
      const method: HttpMethod = /post/i.test(value.method ?? 'GET') ? 'POST' : 'GET';
      models = {
        endpoint: value.endpoint ?? '',
        method,
        headers: toHeaderList(value.headers),
        payload: stringifyPayload(value.payload),
        resultPath: value.result ?? 'data',
      };
      continue;
    }

    if (!validateTemplate(value)) {
      return err(new PersistenceError(
        ErrorCodes.DEFINITION_PARSE_FAILED,
        `Template "${key}" of definition "${id}" is invalid: ${formatAjvErrors(validateTemplate)}`,
        undefined,
        { providerId: id, templateId: key }
      ));
    }

    const { input, output } = parseTemplateKey(key);
    templates.push({
      id: key,
      providerId: id,
      input,
      output,
      endpoint: value.endpoint ?? '/',
      resultPath: value.result ?? '',
      headers: toHeaderList(value.headers),
      payload: stringifyPayload(value.payload),
    });
  }

  if (id === '' || templates.length === 0) {
    return ok(null);
  }

  return ok({
    id,
    defaultEndpoint: parsed[DEFAULT_ENDPOINT_KEY] ?? '',
    templates,
    models,
  });
}

/**
 * Normalize a stored provider id: legacy ids carry a variant suffix after a
 * hyphen (`OpenAI-v2` → `OpenAI`).
 */
export function normalizeProviderId(raw: string): string {
  const sep = raw.indexOf('-');
  return sep === -1 ? raw : raw.substring(0, sep);
}

/**
 * Immutable set of providers in load order
 */
export class ProviderCatalog {
  private readonly byId: Map<string, ApiProvider>;

  constructor(readonly providers: readonly ApiProvider[] = []) {
    this.byId = new Map(providers.map(provider => [provider.id, provider]));
  }

  get isEmpty(): boolean {
    return this.providers.length === 0;
  }

  findProvider(id: string): ApiProvider | undefined {
    return this.byId.get(id);
  }

  firstProvider(): ApiProvider | undefined {
    return this.providers[0];
  }

  /**
   * First template with the given id, across providers in catalog order
   */
  findTemplateById(id: string): TemplateDefinition | undefined {
    for (const provider of this.providers) {
      const template = provider.templates.find(t => t.id === id);
      if (template) return template;
    }
    return undefined;
  }

  findTemplateByIO(provider: ApiProvider, input: IOKind, output: IOKind): TemplateDefinition | undefined {
    return provider.templates.find(t => t.input === input && t.output === output);
  }

  /**
   * Search all providers in catalog order; first match wins
   */
  findTemplateAny(input: IOKind, output: IOKind): TemplateDefinition | undefined {
    for (const provider of this.providers) {
      const template = this.findTemplateByIO(provider, input, output);
      if (template) return template;
    }
    return undefined;
  }
}

/**
 * Load a catalog from a definition source. Never throws: an unreadable source
 * yields an empty catalog, a bad document is skipped; both are logged.
 */
export function loadProviderCatalog(source: DefinitionSource, logger: Logger): ProviderCatalog {
  let documents: DefinitionDocument[];
  try {
    documents = source.readDocuments();
  } catch (error) {
    logger.warn(`Definition source unavailable: ${source.description}`, { reason: errorMessage(error) });
    return new ProviderCatalog();
  }

  const providers: ApiProvider[] = [];
  for (const document of documents) {
    if (document.text.trim() === '') {
      logger.warn(`Definition "${document.name}" is empty, skipped`);
      continue;
    }

    const parsed = parseProviderDocument(document.name, document.text);
    if (!parsed.ok) {
      logger.error(`Definition "${document.name}" skipped`, parsed.error);
      continue;
    }
    if (parsed.value === null) {
      logger.debug(`Definition "${document.name}" has no templates, skipped`);
      continue;
    }
    providers.push(parsed.value);
  }

  logger.info(`Loaded ${providers.length} provider(s) from ${source.description}`);
  return new ProviderCatalog(providers);
}
