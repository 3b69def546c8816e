/**
 * HTTP transport on global fetch
 */

import {
  Logger,
  errorMessage,
  fetchTextWithTimeout,
  resolveRequestTimeout,
} from '@clipfilter/core';
import type { HttpRequest, HttpResponse, HttpTransport } from '@clipfilter/core';
import { endpointToUrl } from '@clipfilter/templates';

export interface FetchHttpTransportOptions {
  /** Request timeout; CLIPFILTER_REQUEST_TIMEOUT_MS or 120s when omitted */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Sends requests with `fetch` and a per-request timeout.
 * Never throws: HTTP error statuses keep their body, network failures and
 * timeouts come back with an empty body, both with `error` set.
 */
export class FetchHttpTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: FetchHttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? resolveRequestTimeout();
    this.logger = options.logger ?? new Logger({ scope: 'http' });
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const url = endpointToUrl(request);
    try {
      const { response, body } = await fetchTextWithTimeout(url, {
        method: request.method,
        headers: request.headers.map(([name, value]): [string, string] => [name, value]),
        body: request.body,
      }, this.timeoutMs);
      this.logger.debug(`${request.method} ${url} → ${response.status}`, { bytes: body.length });

      if (response.status >= 400) {
        return { body, status: response.status, error: `HTTP status ${response.status}` };
      }
      return { body, status: response.status };
    } catch (error) {
      const message = error instanceof Error && error.name === 'AbortError'
        ? `Request timed out after ${this.timeoutMs}ms`
        : errorMessage(error);
      this.logger.warn(`${request.method} ${url} failed: ${message}`);
      return { body: '', error: message };
    }
  }
}
