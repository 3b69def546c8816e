/**
 * Heuristic response scanners
 *
 * Fallbacks for responses whose shape does not match the template's result
 * path. They search the raw text for well-known field names and never parse
 * the document, so truncated or non-standard JSON still yields a value.
 */

/**
 * Escape sequences a scanner decodes. Unlisted sequences are kept verbatim.
 */
interface EscapeRules {
  simple: Readonly<Record<string, string>>;
  /** Decode `\uXXXX` */
  unicode: boolean;
}

const CONTENT_ESCAPES: EscapeRules = {
  simple: { n: '\n', '"': '"' },
  unicode: false,
};

const B64_ESCAPES: EscapeRules = {
  simple: { '"': '"', '\\': '\\', '/': '/' },
  unicode: false,
};

const STANDARD_ESCAPES: EscapeRules = {
  simple: { '"': '"', '\\': '\\', '/': '/', n: '\n', r: '\r', t: '\t', b: '\b', f: '\f' },
  unicode: true,
};

/**
 * Read a string literal whose opening quote is at `start - 1`.
 * A backslash always consumes the following character, so an escaped
 * quote never ends the literal.
 *
 * @returns The unescaped value, or undefined when the literal is unterminated
 */
function readStringLiteral(raw: string, start: number, escapes: EscapeRules): string | undefined {
  let out = '';
  let i = start;
  while (i < raw.length) {
    const ch = raw[i];
    if (ch === '"') return out;
    if (ch === '\\' && i + 1 < raw.length) {
      const next = raw[i + 1];
      if (next === 'u' && escapes.unicode && /^[0-9a-fA-F]{4}$/.test(raw.substring(i + 2, i + 6))) {
        out += String.fromCharCode(Number.parseInt(raw.substring(i + 2, i + 6), 16));
        i += 6;
        continue;
      }
      out += Object.prototype.hasOwnProperty.call(escapes.simple, next) ? escapes.simple[next] : ch + next;
      i += 2;
      continue;
    }
    out += ch;
    i++;
  }
  return undefined;
}

/**
 * First string value of `field`, searching from `from`
 */
function scanStringField(raw: string, field: string, escapes: EscapeRules, from = 0): string | undefined {
  const pattern = new RegExp(`"${field}"\\s*:\\s*"`, 'g');
  pattern.lastIndex = from;
  const match = pattern.exec(raw);
  if (!match) return undefined;
  return readStringLiteral(raw, match.index + match[0].length, escapes);
}

/**
 * Value of the first `"content"` string field.
 * Only `\n` and `\"` are unescaped; other escapes are kept as written.
 *
 * @example
 * ```typescript
 * scanContentField('{"message":{"content":"hi \\"there\\""}}'); // 'hi "there"'
 * ```
 */
export function scanContentField(raw: string): string | undefined {
  return scanStringField(raw, 'content', CONTENT_ESCAPES);
}

/**
 * Value of the first `"b64_json"` string field, unescaping `\"`, `\\` and `\/`
 */
export function scanB64JsonField(raw: string): string | undefined {
  return scanStringField(raw, 'b64_json', B64_ESCAPES);
}

/**
 * Image from a chat-style response:
 * `"images"` (or `"image_url"`) → `"image_url"` / `"imageUrl"` → `"url"`.
 * The URL is JSON-unescaped and a `data:` prefix up to the first comma is dropped.
 */
export function scanChatImageUrl(raw: string): string | undefined {
  let anchor = raw.indexOf('"images"');
  if (anchor === -1) anchor = raw.indexOf('"image_url"');
  if (anchor === -1) return undefined;

  let urlObject = raw.indexOf('"image_url"', anchor);
  if (urlObject === -1) urlObject = raw.indexOf('"imageUrl"', anchor);
  if (urlObject === -1) return undefined;

  const url = scanStringField(raw, 'url', STANDARD_ESCAPES, urlObject);
  if (url === undefined) return undefined;

  const comma = url.indexOf(',');
  return url.startsWith('data:') && comma !== -1 ? url.substring(comma + 1) : url;
}
