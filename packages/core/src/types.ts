/**
 * Core domain types shared by the catalog, the request engine and the filter executor
 */

/** Kind of clipboard content a template consumes or produces */
export type IOKind = 'text' | 'image';

/** Ordered header name/value pairs; values may carry placeholders until rendered */
export type HeaderList = ReadonlyArray<readonly [name: string, value: string]>;

export type HttpMethod = 'GET' | 'POST';

/**
 * One (input kind, output kind) API call for a provider.
 * Created at catalog load and never mutated afterwards.
 */
export interface TemplateDefinition {
  /** Unique within the provider, conventionally `<input>-<output>` (e.g. `text-image`) */
  readonly id: string;
  readonly providerId: string;
  readonly input: IOKind;
  readonly output: IOKind;
  /** Path fragment or absolute URL; absolute URLs override the server base */
  readonly endpoint: string;
  /** Dotted/indexed result path such as `choices[0].message.content`; may be empty */
  readonly resultPath: string;
  readonly headers: HeaderList;
  /** Raw payload text (usually JSON) with placeholders */
  readonly payload: string;
}

/** How to list the models a provider serves */
export interface ModelsDescriptor {
  readonly endpoint: string;
  readonly method: HttpMethod;
  readonly headers: HeaderList;
  readonly payload: string;
  readonly resultPath: string;
}

/** A named API vendor grouping templates and an optional model listing */
export interface ApiProvider {
  readonly id: string;
  readonly defaultEndpoint: string;
  readonly templates: readonly TemplateDefinition[];
  readonly models?: ModelsDescriptor;
}

/** User-configured model endpoint. The API key is plaintext in memory only. */
export interface ModelConfig {
  name: string;
  serverUrl: string;
  modelName: string;
  apiKey: string;
  providerId: string;
}

/** A clipboard transformation bound to a model by index */
export interface FilterDefinition {
  title: string;
  input: IOKind;
  output: IOKind;
  modelIndex: number;
  prompt: string;
}

export interface HotkeyBinding {
  modifiers: number;
  key: number;
}

/** In-memory application configuration (API keys in plaintext) */
export interface AppConfig {
  language: string;
  hotkey: HotkeyBinding;
  models: ModelConfig[];
  filters: FilterDefinition[];
}

/** Default image handle: encoded image bytes plus their MIME type */
export interface EncodedImage {
  readonly data: Uint8Array;
  readonly mimeType: string;
}

/** Result of one template call, keyed by the template's output kind */
export type ApiCallResult<TImage = EncodedImage> =
  | { kind: 'text'; text: string }
  | { kind: 'image'; image: TImage };

/** Explicit success/failure value for routine, expected failures */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Parse an input/output kind. Anything other than `image` (any case) is text.
 */
export function parseIOKind(raw: string): IOKind {
  return raw.trim().toLowerCase() === 'image' ? 'image' : 'text';
}
