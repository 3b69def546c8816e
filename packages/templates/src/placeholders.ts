/**
 * Placeholder substitution for template strings
 *
 * Tokens are written `<<name>>`. Every occurrence of a recognized token is
 * replaced in a single left-to-right pass, so substituted values are never
 * scanned again. Unknown tokens are left verbatim.
 */

/**
 * Runtime values available to templates
 */
export interface PlaceholderContext {
  model?: string;
  systemPrompt?: string;
  prompt?: string;
  apiKey?: string;
  /** Image as plain base64 */
  imageBase64?: string;
  /** Image as a `data:image/png;base64,...` URL */
  imageDataUrl?: string;
}

export interface SubstituteOptions {
  /** Escape substituted values for embedding inside a JSON string literal */
  escapeForJson?: boolean;
}

/**
 * Recognized token names and the context value each one reads
 */
export const PLACEHOLDER_TOKENS = {
  model: 'model',
  system_prompt: 'systemPrompt',
  prompt: 'prompt',
  input_text: 'prompt',
  api_key: 'apiKey',
  image: 'imageBase64',
  image_url: 'imageDataUrl',
} as const satisfies Record<string, keyof PlaceholderContext>;

type TokenName = keyof typeof PLACEHOLDER_TOKENS;

const TOKEN_PATTERN = /<<([a-z_]+)>>/g;

function isTokenName(name: string): name is TokenName {
  return Object.prototype.hasOwnProperty.call(PLACEHOLDER_TOKENS, name);
}

/**
 * Escape a value for a JSON string literal: backslash, double quote,
 * newline, carriage return and tab.
 */
export function escapeJsonString(value: string): string {
  let out = '';
  for (const ch of value) {
    switch (ch) {
      case '\\': out += '\\\\'; break;
      case '"': out += '\\"'; break;
      case '\n': out += '\\n'; break;
      case '\r': out += '\\r'; break;
      case '\t': out += '\\t'; break;
      default: out += ch;
    }
  }
  return out;
}

/**
 * Replace recognized tokens with context values. Missing values render as ''.
 *
 * @example
 * ```typescript
 * substitutePlaceholders('{"model":"<<model>>"}', { model: 'gpt-5.1' }, { escapeForJson: true });
 * // '{"model":"gpt-5.1"}'
 * ```
 */
export function substitutePlaceholders(
  template: string,
  context: PlaceholderContext,
  options: SubstituteOptions = {}
): string {
  return template.replace(TOKEN_PATTERN, (match: string, name: string) => {
    if (!isTokenName(name)) return match;
    const value = context[PLACEHOLDER_TOKENS[name]] ?? '';
    return options.escapeForJson ? escapeJsonString(value) : value;
  });
}

/**
 * Names of the recognized tokens a template uses
 */
export function listPlaceholders(template: string): string[] {
  const found = new Set<string>();
  for (const match of template.matchAll(TOKEN_PATTERN)) {
    if (isTokenName(match[1])) found.add(match[1]);
  }
  return [...found];
}
