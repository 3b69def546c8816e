import { beforeEach, describe, expect, test, vi } from 'vitest';
import { createSilentLogger } from '@clipfilter/core';
import type { FilterDefinition, ModelConfig } from '@clipfilter/core';
import { StaticDefinitionSource, loadProviderCatalog } from '@clipfilter/templates';
import { FilterExecutor } from '../src/filter-executor.js';
import type { FilterContext, FilterRunState } from '../src/filter-executor.js';
import { SingleFlightGate } from '../src/single-flight.js';
import { buildSystemPrompt } from '../src/system-prompt.js';
import { CountingImageCodec, FakeClipboard, FakeTransport, PNG_1X1, pngImage } from './fakes.js';

const EXAMPLE_DEFINITION = JSON.stringify({
  'default-endpoint': 'https://api.example.test',
  'text-text': {
    endpoint: '/v1/chat',
    result: 'choices[0].message.content',
    headers: { 'Content-Type': 'application/json', Authorization: 'Bearer <<api_key>>' },
    payload: {
      model: '<<model>>',
      messages: [
        { role: 'system', content: '<<system_prompt>>' },
        { role: 'user', content: '<<prompt>>' },
      ],
    },
  },
  'text-image': {
    endpoint: '/v1/images',
    result: 'data[0].b64_json',
    payload: { prompt: '<<prompt>>' },
  },
  'image-text': {
    endpoint: '/v1/vision',
    result: 'choices[0].message.content',
    payload: { prompt: '<<prompt>>', image: '<<image_url>>' },
  },
});

const catalog = loadProviderCatalog(
  new StaticDefinitionSource([{ name: 'Example', text: EXAMPLE_DEFINITION }]),
  createSilentLogger()
);

const model: ModelConfig = {
  name: 'Default',
  serverUrl: 'https://api.example.test',
  modelName: 'gpt-test',
  apiKey: 'test-secret',
  providerId: 'Example',
};

function filter(overrides: Partial<FilterDefinition> = {}): FilterDefinition {
  return { title: 'Translate', input: 'text', output: 'text', modelIndex: 0, prompt: 'Translate.', ...overrides };
}

function chatBody(content: string): string {
  return JSON.stringify({ choices: [{ message: { content } }] });
}

function decodeBody(body: Uint8Array | undefined): unknown {
  return JSON.parse(new TextDecoder().decode(body));
}

describe('FilterExecutor', () => {
  let clipboard: FakeClipboard;
  let codec: CountingImageCodec;
  let context: FilterContext;

  beforeEach(() => {
    clipboard = new FakeClipboard();
    codec = new CountingImageCodec();
    context = { catalog, models: [model] };
  });

  function executor(transport: FakeTransport, gate = new SingleFlightGate(), states: FilterRunState[] = []) {
    return new FilterExecutor({
      clipboard,
      transport,
      imageCodec: codec,
      logger: createSilentLogger(),
      gate,
      onStateChange: state => states.push(state),
    });
  }

  test('runs a text filter end to end', async () => {
    clipboard.text = 'bonjour';
    const transport = new FakeTransport({ body: chatBody('hello'), status: 200 });
    const states: FilterRunState[] = [];
    const run = executor(transport, new SingleFlightGate(), states);

    const outcome = await run.run(filter(), context);

    expect(outcome).toEqual({ status: 'success', output: { kind: 'text', text: 'hello' }, warnings: [] });
    expect(clipboard.writtenText).toEqual(['hello']);
    expect(states).toEqual([
      'resolving-template',
      'acquiring-input',
      'requesting',
      'extracting-result',
      'writing-output',
      'success',
    ]);
    expect(run.state).toBe('idle');

    const [request] = transport.requests;
    expect(request).toMatchObject({ host: 'api.example.test', path: '/v1/chat', secure: true, method: 'POST' });
    expect(request.headers).toEqual([
      ['Content-Type', 'application/json'],
      ['Authorization', 'Bearer test-secret'],
    ]);
    expect(decodeBody(request.body)).toEqual({
      model: 'gpt-test',
      messages: [
        { role: 'system', content: buildSystemPrompt('text', 'text') },
        { role: 'user', content: 'Translate.\n\nbonjour' },
      ],
    });
  });

  test('writes a generated image to the clipboard', async () => {
    clipboard.text = 'a red square';
    const transport = new FakeTransport({ body: JSON.stringify({ data: [{ b64_json: PNG_1X1 }] }) });

    const outcome = await executor(transport).run(filter({ output: 'image' }), context);

    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success' || outcome.output.kind !== 'image') throw new Error('expected an image');
    expect(outcome.output.image.mimeType).toBe('image/png');
    expect(clipboard.writtenImages).toHaveLength(1);
    expect(transport.requests[0].path).toBe('/v1/images');
  });

  test('sends a clipboard image as a data URL and releases it', async () => {
    clipboard.image = pngImage();
    const transport = new FakeTransport({ body: chatBody('a small square') });

    const outcome = await executor(transport).run(filter({ input: 'image', prompt: 'Describe.' }), context);

    expect(outcome).toMatchObject({ status: 'success', output: { kind: 'text', text: 'a small square' } });
    expect(decodeBody(transport.requests[0].body)).toEqual({
      prompt: 'Describe.\n\n',
      image: `data:image/png;base64,${PNG_1X1}`,
    });
    expect(codec.released).toBe(1);
  });

  test('rejects a second run while one is in flight', async () => {
    clipboard.text = 'bonjour';
    const transport = new FakeTransport({ body: chatBody('hello') });
    transport.holdResponses();
    const gate = new SingleFlightGate();
    const first = executor(transport, gate);
    const second = executor(transport, gate);

    const pending = first.run(filter(), context);
    const rejected = await second.run(filter(), context);

    expect(rejected.status).toBe('rejected');
    if (rejected.status !== 'rejected') return;
    expect(rejected.error.code).toBe('FILTER_BUSY');
    expect(first.isBusy).toBe(true);

    transport.open();
    expect((await pending).status).toBe('success');
    expect(transport.requests).toHaveLength(1);
    expect(clipboard.reads).toBe(1);
    expect(gate.isBusy).toBe(false);
  });

  test('falls back to model 0 for an out-of-range index', async () => {
    clipboard.text = 'x';
    const transport = new FakeTransport({ body: chatBody('ok') });
    const models = [
      { ...model, name: 'First', serverUrl: 'https://first.test' },
      { ...model, name: 'Second', serverUrl: 'https://second.test' },
    ];

    const outcome = await executor(transport).run(filter({ modelIndex: 7 }), { catalog, models });

    expect(outcome).toMatchObject({ status: 'success', warnings: ['Model index 7 is out of range, using model 0'] });
    expect(transport.requests[0].host).toBe('first.test');
  });

  test('uses another provider template and its default endpoint', async () => {
    const twoProviders = loadProviderCatalog(new StaticDefinitionSource([
      { name: 'First', text: JSON.stringify({ 'text-text': {} }) },
      {
        name: 'Second',
        text: JSON.stringify({ 'default-endpoint': 'https://second.test/api', 'text-image': { endpoint: '/img', result: 'data[0].b64_json' } }),
      },
    ]), createSilentLogger());
    clipboard.text = 'a cat';
    const transport = new FakeTransport({ body: JSON.stringify({ data: [{ b64_json: PNG_1X1 }] }) });

    const outcome = await executor(transport).run(
      filter({ output: 'image' }),
      { catalog: twoProviders, models: [{ ...model, serverUrl: '', providerId: 'First' }] }
    );

    expect(outcome.status).toBe('success');
    expect(transport.requests[0]).toMatchObject({ host: 'second.test', path: '/api/img' });
  });

  test('fails without models', async () => {
    const transport = new FakeTransport({ body: chatBody('never') });
    const outcome = await executor(transport).run(filter(), { catalog, models: [] });

    expect(outcome).toMatchObject({ status: 'failed', stage: 'resolving-template' });
    if (outcome.status !== 'failed') return;
    expect(outcome.error.code).toBe('NO_MODELS_CONFIGURED');
    expect(clipboard.reads).toBe(0);
  });

  test('fails when no provider serves the pair', async () => {
    const transport = new FakeTransport({ body: chatBody('never') });
    const outcome = await executor(transport).run(filter({ input: 'image', output: 'image' }), context);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'resolving-template' });
    if (outcome.status !== 'failed') return;
    expect(outcome.error.code).toBe('NO_MATCHING_TEMPLATE');
    expect(outcome.error.message).toBe('No matching template');
  });

  test('fails on an empty clipboard without sending', async () => {
    const transport = new FakeTransport({ body: chatBody('never') });
    const textOutcome = await executor(transport).run(filter(), context);
    const imageOutcome = await executor(transport).run(filter({ input: 'image' }), context);

    for (const outcome of [textOutcome, imageOutcome]) {
      expect(outcome).toMatchObject({ status: 'failed', stage: 'acquiring-input' });
      if (outcome.status === 'failed') expect(outcome.error.code).toBe('CLIPBOARD_EMPTY');
    }
    expect(transport.requests).toHaveLength(0);
  });

  test('fails to encode a non-PNG clipboard image and still releases it', async () => {
    clipboard.image = { data: new Uint8Array([0xff, 0xd8, 0xff, 0xe0]), mimeType: 'image/jpeg' };
    const transport = new FakeTransport({ body: chatBody('never') });

    const outcome = await executor(transport).run(filter({ input: 'image' }), context);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'acquiring-input' });
    if (outcome.status === 'failed') expect(outcome.error.code).toBe('IMAGE_ENCODE_FAILED');
    expect(codec.released).toBe(1);
  });

  test('an empty body fails and keeps the transport error as a warning', async () => {
    clipboard.text = 'x';
    const transport = new FakeTransport({ body: '', error: 'connect ECONNREFUSED' });

    const outcome = await executor(transport).run(filter(), context);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'requesting', warnings: ['connect ECONNREFUSED'] });
    if (outcome.status === 'failed') expect(outcome.error.code).toBe('EMPTY_RESPONSE');
  });

  test('an error status with a usable body still succeeds', async () => {
    clipboard.text = 'x';
    const transport = new FakeTransport({ body: chatBody('partial'), status: 500 });

    const outcome = await executor(transport).run(filter(), context);

    expect(outcome).toEqual({ status: 'success', output: { kind: 'text', text: 'partial' }, warnings: ['HTTP status 500'] });
  });

  test('a throwing transport fails the request stage', async () => {
    clipboard.text = 'x';
    const transport = new FakeTransport(new Error('socket hang up'));

    const outcome = await executor(transport).run(filter(), context);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'requesting' });
    if (outcome.status !== 'failed') return;
    expect(outcome.error.code).toBe('REQUEST_FAILED');
    expect(outcome.error.message).toBe('Request failed: socket hang up');
  });

  test('a response without a result fails extraction', async () => {
    clipboard.text = 'x';
    const transport = new FakeTransport({ body: '{"usage":{}}' });

    const outcome = await executor(transport).run(filter(), context);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'extracting-result' });
    if (outcome.status === 'failed') expect(outcome.error.code).toBe('RESULT_NOT_FOUND');
    expect(clipboard.writtenText).toEqual([]);
  });

  test('base64 that is not an image is not a result', async () => {
    clipboard.text = 'x';
    const transport = new FakeTransport({ body: '{"data":[{"b64_json":"SGVsbG8="}]}' });

    const outcome = await executor(transport).run(filter({ output: 'image' }), context);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'extracting-result' });
    if (outcome.status === 'failed') expect(outcome.error.code).toBe('RESULT_NOT_FOUND');
    expect(clipboard.writtenImages).toEqual([]);
  });

  test('an image the codec cannot decode fails decoding', async () => {
    clipboard.text = 'x';
    vi.spyOn(codec, 'fromBase64').mockResolvedValue(null);
    const transport = new FakeTransport({ body: JSON.stringify({ data: [{ b64_json: PNG_1X1 }] }) });

    const outcome = await executor(transport).run(filter({ output: 'image' }), context);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'extracting-result' });
    if (outcome.status !== 'failed') return;
    expect(outcome.error.code).toBe('IMAGE_DECODE_FAILED');
    expect(outcome.error.details).toEqual({ base64Length: PNG_1X1.length });
  });

  test('a failed image write releases the image', async () => {
    clipboard.text = 'x';
    clipboard.failWrites = true;
    const transport = new FakeTransport({ body: JSON.stringify({ data: [{ b64_json: PNG_1X1 }] }) });

    const outcome = await executor(transport).run(filter({ output: 'image' }), context);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'writing-output' });
    if (outcome.status === 'failed') expect(outcome.error.code).toBe('CLIPBOARD_WRITE_FAILED');
    expect(codec.released).toBe(1);
  });

  test('a failed text write is reported', async () => {
    clipboard.text = 'x';
    clipboard.failWrites = true;
    const transport = new FakeTransport({ body: chatBody('hello') });

    const outcome = await executor(transport).run(filter(), context);

    expect(outcome).toMatchObject({ status: 'failed', stage: 'writing-output' });
    if (outcome.status === 'failed') expect(outcome.error.message).toBe('Clipboard write failed: clipboard locked');
  });

  test('the gate is released after a failure', async () => {
    const gate = new SingleFlightGate();
    const transport = new FakeTransport({ body: '' });
    await executor(transport, gate).run(filter(), context);
    expect(gate.isBusy).toBe(false);
    expect(gate.tryAcquire()).toBe(true);
  });
});
