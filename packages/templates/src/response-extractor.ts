/**
 * Response Extractor
 *
 * Pulls the result out of a raw response: the template's result path first,
 * then the heuristic scanners. Text and image outputs use separate chains.
 */

import {
  ErrorCodes,
  ExtractionError,
  base64ToBytes,
  detectImageMimeType,
  err,
  ok,
  stripImageDataUrl,
} from '@clipfilter/core';
import type { Result, TemplateDefinition } from '@clipfilter/core';
import { extractByPath } from './json-path.js';
import { scanB64JsonField, scanChatImageUrl, scanContentField } from './heuristic-scan.js';

export type ImageStrategyName = 'result-path' | 'b64-json' | 'content' | 'chat-image-url';

export type ExtractedResult =
  | { kind: 'text'; text: string }
  | { kind: 'image'; base64: string; strategy: ImageStrategyName };

export interface ImageExtractionStrategy {
  name: ImageStrategyName;
  extract(raw: string, template: TemplateDefinition): string | undefined;
}

/**
 * Image candidates, tried in order. The first one that decodes to a known
 * image format wins; anything else falls through to the next strategy.
 */
export const IMAGE_EXTRACTION_STRATEGIES: readonly ImageExtractionStrategy[] = [
  {
    name: 'result-path',
    extract: (raw, template) => {
      const value = extractByPath(raw, template.resultPath);
      return value === undefined ? undefined : stripImageDataUrl(value);
    },
  },
  {
    name: 'b64-json',
    extract: raw => scanB64JsonField(raw),
  },
  {
    name: 'content',
    extract: raw => {
      const value = scanContentField(raw);
      return value === undefined ? undefined : stripImageDataUrl(value);
    },
  },
  {
    name: 'chat-image-url',
    extract: raw => scanChatImageUrl(raw),
  },
];

/**
 * Text result: result path, then the first `"content"` field
 */
export function extractTextResult(raw: string, template: TemplateDefinition): string | undefined {
  const fromPath = template.resultPath === '' ? undefined : extractByPath(raw, template.resultPath);
  if (fromPath) return fromPath;
  const scanned = scanContentField(raw);
  return scanned ? scanned : undefined;
}

async function decodesToImage(candidate: string): Promise<boolean> {
  const bytes = base64ToBytes(candidate);
  return bytes !== undefined && (await detectImageMimeType(bytes)) !== undefined;
}

/**
 * Image result as base64, with the strategy that produced it
 */
export async function extractImageBase64(
  raw: string,
  template: TemplateDefinition,
  strategies: readonly ImageExtractionStrategy[] = IMAGE_EXTRACTION_STRATEGIES
): Promise<{ base64: string; strategy: ImageStrategyName } | undefined> {
  for (const strategy of strategies) {
    const candidate = strategy.extract(raw, template)?.trim();
    if (candidate && await decodesToImage(candidate)) {
      return { base64: candidate, strategy: strategy.name };
    }
  }
  return undefined;
}

/**
 * Extract the result of a template call from the raw response body
 *
 * @example
 * ```typescript
 * const result = await extractResponse(body, template);
 * if (result.ok && result.value.kind === 'text') {
 *   await clipboard.writeText(result.value.text);
 * }
 * ```
 */
export async function extractResponse(
  raw: string,
  template: TemplateDefinition
): Promise<Result<ExtractedResult, ExtractionError>> {
  if (template.output === 'text') {
    const text = extractTextResult(raw, template);
    if (text === undefined) {
      return err(new ExtractionError(
        ErrorCodes.RESULT_NOT_FOUND,
        'Response contains no text result',
        { templateId: template.id, resultPath: template.resultPath }
      ));
    }
    const result: ExtractedResult = { kind: 'text', text };
    return ok(result);
  }

  const image = await extractImageBase64(raw, template);
  if (!image) {
    return err(new ExtractionError(
      ErrorCodes.RESULT_NOT_FOUND,
      'Response contains no image data',
      { templateId: template.id, resultPath: template.resultPath }
    ));
  }
  const result: ExtractedResult = { kind: 'image', ...image };
  return ok(result);
}
