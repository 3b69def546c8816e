/**
 * Request Builder
 *
 * Renders a template into a concrete HTTP request: endpoint, headers and body.
 * The body is the rendered JSON payload, or a multipart/form-data body when a
 * header declares that content type.
 */

import {
  ConfigurationError,
  ErrorCodes,
  base64ToBytes,
  err,
  ok,
  randomHex,
} from '@clipfilter/core';
import type { HeaderList, ModelConfig, Result, TemplateDefinition } from '@clipfilter/core';
import { resolveEndpoint } from './endpoint-resolver.js';
import type { ResolvedEndpoint } from './endpoint-resolver.js';
import { substitutePlaceholders } from './placeholders.js';
import type { PlaceholderContext } from './placeholders.js';

const MULTIPART_MARKER = 'multipart/form-data';

/**
 * Image attached to a request, in both wire forms
 */
export interface RequestImage {
  base64: string;
  dataUrl: string;
}

export interface TemplateRequestInput {
  template: TemplateDefinition;
  model: ModelConfig;
  systemPrompt: string;
  prompt: string;
  image?: RequestImage;
  /** Server base used instead of `model.serverUrl` (e.g. the provider default) */
  serverUrl?: string;
}

export type BodyEncoding = 'json' | 'multipart';

export interface RenderedRequest {
  endpoint: ResolvedEndpoint;
  method: 'POST';
  headers: HeaderList;
  body: Uint8Array;
  encoding: BodyEncoding;
}

export interface MultipartFields {
  model: string;
  prompt: string;
}

const encoder = new TextEncoder();

/**
 * Random multipart boundary token
 */
export function createBoundary(): string {
  return `----clipfilter${randomHex(16)}`;
}

/**
 * Build a multipart/form-data body with `model`, `prompt` and an optional
 * binary `image` part (`image.png`, `image/png`).
 *
 * An image whose base64 does not decode is left out.
 */
export function buildMultipartBody(boundary: string, fields: MultipartFields, imageBase64?: string): Uint8Array {
  const chunks: Uint8Array[] = [];
  const text = (value: string) => chunks.push(encoder.encode(value));

  const addField = (name: string, value: string) => {
    text(`--${boundary}\r\n`);
    text(`Content-Disposition: form-data; name="${name}"\r\n\r\n`);
    text(`${value}\r\n`);
  };

  addField('model', fields.model);
  addField('prompt', fields.prompt);

  const image = imageBase64 ? base64ToBytes(imageBase64) : undefined;
  if (image) {
    text(`--${boundary}\r\n`);
    text('Content-Disposition: form-data; name="image"; filename="image.png"\r\n');
    text('Content-Type: image/png\r\n\r\n');
    chunks.push(image);
    text('\r\n');
  }

  text(`--${boundary}--\r\n`);
  return concatBytes(chunks);
}

function concatBytes(chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return out;
}

/**
 * Index of the first header whose value declares multipart/form-data
 * (case-insensitive), or -1
 */
export function findMultipartHeader(headers: HeaderList): number {
  return headers.findIndex(([, value]) => value.toLowerCase().includes(MULTIPART_MARKER));
}

/**
 * Append `; boundary=<token>` right after the multipart/form-data marker
 */
function injectBoundary(value: string, boundary: string): string {
  const at = value.toLowerCase().indexOf(MULTIPART_MARKER);
  const end = at + MULTIPART_MARKER.length;
  return `${value.substring(0, end)}; boundary=${boundary}${value.substring(end)}`;
}

/**
 * Render a template into a request.
 *
 * Endpoint and header values are substituted as-is; the payload is
 * substituted with JSON-string escaping.
 *
 * @param createBoundaryToken - Boundary generator (random by default)
 */
export function buildTemplateRequest(
  input: TemplateRequestInput,
  createBoundaryToken: () => string = createBoundary
): Result<RenderedRequest, ConfigurationError> {
  const { template, model, systemPrompt, prompt, image } = input;
  const context: PlaceholderContext = {
    model: model.modelName,
    systemPrompt,
    prompt,
    apiKey: model.apiKey,
    imageBase64: image?.base64 ?? '',
    imageDataUrl: image?.dataUrl ?? '',
  };

  const serverUrl = input.serverUrl ?? model.serverUrl;
  const fragment = substitutePlaceholders(template.endpoint, context);
  const endpoint = resolveEndpoint(serverUrl, fragment);
  if (!endpoint) {
    return err(new ConfigurationError(
      ErrorCodes.INVALID_ENDPOINT,
      `Cannot resolve endpoint for template "${template.id}"`,
      { serverUrl, endpoint: fragment }
    ));
  }

  const headers: Array<readonly [string, string]> = template.headers.map(
    ([name, value]) => [name, substitutePlaceholders(value, context)] as const
  );

  const multipartIndex = findMultipartHeader(headers);
  if (multipartIndex !== -1) {
    const boundary = createBoundaryToken();
    const [name, value] = headers[multipartIndex];
    headers[multipartIndex] = [name, injectBoundary(value, boundary)];
    return ok({
      endpoint,
      method: 'POST',
      headers,
      body: buildMultipartBody(boundary, { model: model.modelName, prompt }, image?.base64),
      encoding: 'multipart',
    });
  }

  return ok({
    endpoint,
    method: 'POST',
    headers,
    body: encoder.encode(substitutePlaceholders(template.payload, context, { escapeForJson: true })),
    encoding: 'json',
  });
}
