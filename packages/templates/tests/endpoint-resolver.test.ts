import { describe, expect, test } from 'vitest';
import { DEFAULT_ENDPOINT_PATH, endpointToUrl, resolveEndpoint } from '../src/endpoint-resolver.js';

describe('resolveEndpoint', () => {
  test('joins a host with a fragment', () => {
    expect(resolveEndpoint('https://api.openai.com', '/v1/models')).toEqual({
      host: 'api.openai.com',
      path: '/v1/models',
      secure: true,
    });
  });

  test('keeps a path carried by the server base', () => {
    expect(resolveEndpoint('https://openrouter.ai/api', '/v1/chat/completions')).toEqual({
      host: 'openrouter.ai',
      path: '/api/v1/chat/completions',
      secure: true,
    });
  });

  test('a fragment with or without a leading slash resolves the same', () => {
    expect(resolveEndpoint('https://openrouter.ai/api', 'v1/chat/completions'))
      .toEqual(resolveEndpoint('https://openrouter.ai/api', '/v1/chat/completions'));
    expect(resolveEndpoint('api.example.test', 'v1/x')).toEqual(resolveEndpoint('api.example.test', '/v1/x'));
  });

  test('drops a trailing slash of the base path', () => {
    expect(resolveEndpoint('http://localhost:11434/', '/api/chat')).toEqual({
      host: 'localhost:11434',
      path: '/api/chat',
      secure: false,
    });
  });

  test('defaults to a secure connection without a scheme', () => {
    expect(resolveEndpoint('localhost:8080', '/v1/x')?.secure).toBe(true);
  });

  test('an empty fragment uses the default path', () => {
    expect(resolveEndpoint('https://api.example.test', '  ')?.path).toBe(DEFAULT_ENDPOINT_PATH);
  });

  test('an absolute fragment overrides the server base', () => {
    expect(resolveEndpoint('https://api.example.test/base', 'http://other.test:9000/v2/run')).toEqual({
      host: 'other.test:9000',
      path: '/v2/run',
      secure: false,
    });
  });

  test('an empty host does not resolve', () => {
    expect(resolveEndpoint('', '/v1/models')).toBeUndefined();
    expect(resolveEndpoint('https://', '/v1/models')).toBeUndefined();
  });
});

describe('endpointToUrl', () => {
  test('renders the scheme from the secure flag', () => {
    expect(endpointToUrl({ host: 'localhost:11434', path: '/api/chat', secure: false })).toBe('http://localhost:11434/api/chat');
    expect(endpointToUrl({ host: 'api.example.test', path: '/v1', secure: true })).toBe('https://api.example.test/v1');
  });
});
