/**
 * Capability interfaces the engine consumes from its host application.
 *
 * Clipboard access, bitmap conversion and HTTP are provided by the shell;
 * the engine only depends on these narrow contracts.
 */

import type { EncodedImage, HeaderList, HttpMethod } from './types.js';

export type ClipboardContentKind = 'none' | 'text' | 'bitmap';

export interface ClipboardSource<TImage = EncodedImage> {
  detectContentKind(): Promise<ClipboardContentKind>;
  /** Clipboard text, or an empty string when there is none */
  readText(): Promise<string>;
  /** A handle the caller owns, or null when the clipboard holds no image */
  readImage(): Promise<TImage | null>;
}

/**
 * Both writes throw when the platform clipboard cannot be acquired.
 */
export interface ClipboardSink<TImage = EncodedImage> {
  writeText(text: string): Promise<void>;
  writeImage(image: TImage): Promise<void>;
}

export interface HttpRequest {
  host: string;
  path: string;
  secure: boolean;
  method: HttpMethod;
  headers: HeaderList;
  body?: Uint8Array;
}

/**
 * Transport reply. Failures are signalled in `error`, separately from the body:
 * a 4xx/5xx response keeps its body, a connection failure leaves it empty.
 */
export interface HttpResponse {
  body: string;
  status?: number;
  error?: string;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Converts between image handles and the base64 PNG form used on the wire
 */
export interface ImageCodec<TImage = EncodedImage> {
  /** Throws when the image cannot be encoded */
  toPngBase64(image: TImage): Promise<string>;
  /** Decoded image, or null when the data is not an image */
  fromBase64(base64: string): Promise<TImage | null>;
  release(image: TImage): void;
}

/**
 * Protects API keys at rest. Protected tokens carry a prefix; `unprotect`
 * returns unprefixed (legacy plaintext) values unchanged.
 */
export interface SecretStore {
  protect(plaintext: string): Promise<string>;
  unprotect(token: string): Promise<string>;
}
