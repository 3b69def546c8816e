import { afterEach, describe, expect, test, vi } from 'vitest';
import {
  DEFAULT_LIMITS,
  fetchTextWithTimeout,
  resolveRequestTimeout,
  safeJsonParse,
} from '../src/security/resource-limits.js';
import { clearRuntimeEnv, setRuntimeEnv } from '../src/runtime/env.js';

afterEach(() => {
  clearRuntimeEnv();
  vi.unstubAllGlobals();
});

describe('safeJsonParse', () => {
  test('parses ordinary documents', () => {
    expect(safeJsonParse('{"a":[1,{"b":null}]}')).toEqual({ a: [1, { b: null }] });
  });

  test('rejects documents nested beyond the limit', () => {
    const deep = '['.repeat(5) + ']'.repeat(5);
    expect(() => safeJsonParse(deep, 3)).toThrow('JSON nesting depth exceeds maximum of 3');
    expect(safeJsonParse(deep, 5)).toEqual([[[[[]]]]]);
  });

  test('rejects invalid JSON', () => {
    expect(() => safeJsonParse('{"a":')).toThrow();
  });
});

describe('request timeout', () => {
  test('defaults and environment override', () => {
    setRuntimeEnv({});
    expect(resolveRequestTimeout()).toBe(DEFAULT_LIMITS.REQUEST_TIMEOUT);
    setRuntimeEnv({ CLIPFILTER_REQUEST_TIMEOUT_MS: '2500' });
    expect(resolveRequestTimeout()).toBe(2500);
  });

  test('fetchTextWithTimeout passes an abort signal to fetch and reads the body', async () => {
    const fetchMock = vi.fn(async (_url: string, init?: RequestInit) => {
      expect(init?.signal).toBeInstanceOf(AbortSignal);
      expect(init?.method).toBe('POST');
      return new Response('ok', { status: 201 });
    });
    vi.stubGlobal('fetch', fetchMock);

    const { response, body } = await fetchTextWithTimeout('https://example.test/v1', { method: 'POST' }, 1000);
    expect(response.status).toBe(201);
    expect(body).toBe('ok');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('fetchTextWithTimeout aborts a request that does not answer', async () => {
    vi.stubGlobal('fetch', (_url: string, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => reject(abortError()));
    }));

    await expect(fetchTextWithTimeout('https://example.test/slow', {}, 10)).rejects.toMatchObject({ name: 'AbortError' });
  });

  test('fetchTextWithTimeout aborts a body that stalls after the headers', async () => {
    vi.stubGlobal('fetch', async (_url: string, init?: RequestInit) =>
      new Response(stalledBody(init?.signal), { status: 200 }));

    await expect(fetchTextWithTimeout('https://example.test/stall', {}, 10)).rejects.toMatchObject({ name: 'AbortError' });
  });
});

function abortError(): Error {
  const abort = new Error('This operation was aborted');
  abort.name = 'AbortError';
  return abort;
}

/** Sends the start of a JSON document, then nothing until the signal aborts */
function stalledBody(signal: AbortSignal | null | undefined): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"choices":'));
      signal?.addEventListener('abort', () => controller.error(abortError()));
    },
  });
}
