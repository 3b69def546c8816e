/**
 * Filter Executor
 *
 * Runs one filter end to end:
 *
 *   idle → resolving-template → acquiring-input → requesting
 *        → extracting-result → writing-output → success | failed
 *
 * Routine failures (empty clipboard, network errors, unexpected response
 * shapes) end the run in `failed` with a typed error; nothing is thrown.
 * Only one run may be in flight per gate; the default gate is process-wide.
 *
 * @example
 * ```typescript
 * const executor = new FilterExecutor({ clipboard, transport, imageCodec: new PngImageCodec() });
 * const outcome = await executor.run(filter, { catalog, models });
 * if (outcome.status !== 'success') notifyUser('Filter execution failed');
 * ```
 */

import {
  AcquisitionError,
  ClipFilterError,
  ConfigurationError,
  ErrorCodes,
  ExtractionError,
  Logger,
  TransportError,
  errorMessage,
  toDataUrl,
} from '@clipfilter/core';
import type {
  ApiCallResult,
  ApiProvider,
  ClipboardSink,
  ClipboardSource,
  EncodedImage,
  FilterDefinition,
  HttpResponse,
  HttpTransport,
  ImageCodec,
  ModelConfig,
  TemplateDefinition,
} from '@clipfilter/core';
import { buildTemplateRequest, extractResponse } from '@clipfilter/templates';
import type { ProviderCatalog, RequestImage } from '@clipfilter/templates';
import { processFilterGate } from './single-flight.js';
import type { SingleFlightGate } from './single-flight.js';
import { buildSystemPrompt, buildUserPrompt } from './system-prompt.js';

export type FilterRunStage =
  | 'resolving-template'
  | 'acquiring-input'
  | 'requesting'
  | 'extracting-result'
  | 'writing-output';

export type FilterRunState = 'idle' | FilterRunStage | 'success' | 'failed';

/**
 * What a run reads: the catalog and the current model list, owned by the caller
 */
export interface FilterContext {
  catalog: ProviderCatalog;
  models: readonly ModelConfig[];
}

export type FilterRunOutcome<TImage = EncodedImage> =
  | {
      status: 'success';
      /** Value written to the clipboard; a written image belongs to the clipboard sink */
      output: ApiCallResult<TImage>;
      warnings: string[];
    }
  | { status: 'failed'; stage: FilterRunStage; error: ClipFilterError; warnings: string[] }
  | { status: 'rejected'; error: ClipFilterError };

export interface FilterExecutorOptions<TImage = EncodedImage> {
  clipboard: ClipboardSource<TImage> & ClipboardSink<TImage>;
  transport: HttpTransport;
  imageCodec: ImageCodec<TImage>;
  logger?: Logger;
  /** Defaults to the process-wide gate */
  gate?: SingleFlightGate;
  onStateChange?: (state: FilterRunState, filter: FilterDefinition) => void;
}

/**
 * Stage failure carried through the run
 */
class StageFailure extends Error {
  constructor(readonly stage: FilterRunStage, readonly error: ClipFilterError) {
    super(error.message);
    this.name = 'StageFailure';
  }
}

interface ResolvedTarget {
  model: ModelConfig;
  template: TemplateDefinition;
  serverUrl: string;
}

interface AcquiredInput {
  text: string;
  image?: RequestImage;
}

export class FilterExecutor<TImage = EncodedImage> {
  private readonly clipboard: ClipboardSource<TImage> & ClipboardSink<TImage>;
  private readonly transport: HttpTransport;
  private readonly imageCodec: ImageCodec<TImage>;
  private readonly logger: Logger;
  private readonly gate: SingleFlightGate;
  private readonly onStateChange?: (state: FilterRunState, filter: FilterDefinition) => void;
  private currentState: FilterRunState = 'idle';

  constructor(options: FilterExecutorOptions<TImage>) {
    this.clipboard = options.clipboard;
    this.transport = options.transport;
    this.imageCodec = options.imageCodec;
    this.logger = options.logger ?? new Logger({ scope: 'filter' });
    this.gate = options.gate ?? processFilterGate;
    this.onStateChange = options.onStateChange;
  }

  /** True while a run holds this executor's gate */
  get isBusy(): boolean {
    return this.gate.isBusy;
  }

  get state(): FilterRunState {
    return this.currentState;
  }

  /**
   * Run a filter. Rejected immediately, without touching clipboard or
   * network, while another run holds the gate.
   */
  async run(filter: FilterDefinition, context: FilterContext): Promise<FilterRunOutcome<TImage>> {
    if (!this.gate.tryAcquire()) {
      this.logger.warn(`Filter "${filter.title}" rejected: another filter is running`);
      return {
        status: 'rejected',
        error: new ClipFilterError(ErrorCodes.FILTER_BUSY, 'Another filter is already running'),
      };
    }

    const warnings: string[] = [];
    try {
      this.logger.info(`Running filter "${filter.title}"`, { input: filter.input, output: filter.output });
      const output = await this.execute(filter, context, warnings);
      this.enter('success', filter);
      return { status: 'success', output, warnings };
    } catch (error) {
      const failure = error instanceof StageFailure
        ? error
        : new StageFailure(
            this.currentStage(),
            new ClipFilterError(ErrorCodes.REQUEST_FAILED, errorMessage(error), { unexpected: true })
          );
      this.logger.error(`Filter "${filter.title}" failed while ${failure.stage}`, failure.error, failure.error.details);
      this.enter('failed', filter);
      return { status: 'failed', stage: failure.stage, error: failure.error, warnings };
    } finally {
      this.currentState = 'idle';
      this.gate.release();
    }
  }

  private async execute(
    filter: FilterDefinition,
    context: FilterContext,
    warnings: string[]
  ): Promise<ApiCallResult<TImage>> {
    this.enter('resolving-template', filter);
    const target = this.resolveTarget(filter, context, warnings);

    this.enter('acquiring-input', filter);
    const input = await this.acquireInput(target.template);

    this.enter('requesting', filter);
    const body = await this.request(filter, target, input, warnings);

    this.enter('extracting-result', filter);
    const extracted = await extractResponse(body, target.template);
    if (!extracted.ok) {
      throw new StageFailure('extracting-result', extracted.error);
    }

    if (extracted.value.kind === 'text') {
      this.enter('writing-output', filter);
      await this.writeText(extracted.value.text);
      return { kind: 'text', text: extracted.value.text };
    }

    this.logger.debug(`Image result found by ${extracted.value.strategy}`);
    const image = await this.decodeImage(extracted.value.base64);

    this.enter('writing-output', filter);
    await this.writeImage(image);
    return { kind: 'image', image };
  }

  /**
   * Model by clamped index, provider by id (else the first one), template by
   * (input, output) within the provider and then across the catalog
   */
  private resolveTarget(filter: FilterDefinition, context: FilterContext, warnings: string[]): ResolvedTarget {
    const { catalog, models } = context;
    if (models.length === 0) {
      throw new StageFailure('resolving-template', new ConfigurationError(
        ErrorCodes.NO_MODELS_CONFIGURED,
        'No models are configured'
      ));
    }

    let index = filter.modelIndex;
    if (!Number.isInteger(index) || index < 0 || index >= models.length) {
      const warning = `Model index ${filter.modelIndex} is out of range, using model 0`;
      this.logger.warn(warning);
      warnings.push(warning);
      index = 0;
    }
    const model = models[index];

    const provider: ApiProvider | undefined = catalog.findProvider(model.providerId) ?? catalog.firstProvider();
    const template = (provider ? catalog.findTemplateByIO(provider, filter.input, filter.output) : undefined)
      ?? catalog.findTemplateAny(filter.input, filter.output);

    if (!template) {
      throw new StageFailure('resolving-template', new ConfigurationError(
        ErrorCodes.NO_MATCHING_TEMPLATE,
        'No matching template',
        { providerId: model.providerId, input: filter.input, output: filter.output }
      ));
    }

    const serverUrl = model.serverUrl.trim() !== ''
      ? model.serverUrl
      : catalog.findProvider(template.providerId)?.defaultEndpoint ?? '';

    this.logger.debug(`Resolved template ${template.providerId}/${template.id}`, { model: model.name });
    return { model, template, serverUrl };
  }

  private async acquireInput(template: TemplateDefinition): Promise<AcquiredInput> {
    if (template.input === 'text') {
      const text = await this.guard('acquiring-input', () => this.clipboard.readText(), error =>
        new AcquisitionError(ErrorCodes.CLIPBOARD_EMPTY, `Clipboard text could not be read: ${errorMessage(error)}`));
      if (text === '') {
        throw new StageFailure('acquiring-input', new AcquisitionError(
          ErrorCodes.CLIPBOARD_EMPTY,
          'No text in clipboard'
        ));
      }
      return { text };
    }

    const image = await this.guard('acquiring-input', () => this.clipboard.readImage(), error =>
      new AcquisitionError(ErrorCodes.CLIPBOARD_EMPTY, `Clipboard image could not be read: ${errorMessage(error)}`));
    if (image === null) {
      throw new StageFailure('acquiring-input', new AcquisitionError(
        ErrorCodes.CLIPBOARD_EMPTY,
        'No image in clipboard'
      ));
    }

    try {
      const base64 = await this.guard('acquiring-input', () => this.imageCodec.toPngBase64(image), error =>
        new AcquisitionError(ErrorCodes.IMAGE_ENCODE_FAILED, `Clipboard image could not be encoded: ${errorMessage(error)}`));
      return { text: '', image: { base64, dataUrl: toDataUrl(base64, 'image/png') } };
    } finally {
      this.imageCodec.release(image);
    }
  }

  /**
   * Send the rendered request and return the response body. Transport errors
   * and HTTP error statuses become warnings; only an empty body fails.
   */
  private async request(
    filter: FilterDefinition,
    target: ResolvedTarget,
    input: AcquiredInput,
    warnings: string[]
  ): Promise<string> {
    const rendered = buildTemplateRequest({
      template: target.template,
      model: target.model,
      systemPrompt: buildSystemPrompt(filter.input, filter.output),
      prompt: buildUserPrompt(filter.prompt, input.text),
      image: input.image,
      serverUrl: target.serverUrl,
    });
    if (!rendered.ok) {
      throw new StageFailure('requesting', rendered.error);
    }

    const { endpoint, method, headers, body, encoding } = rendered.value;
    this.logger.info(`Request ${method} ${endpoint.host}${endpoint.path}`, { encoding, bytes: body.byteLength });

    const response: HttpResponse = await this.guard('requesting', () => this.transport.send({
      ...endpoint,
      method,
      headers,
      body,
    }), error => new TransportError(ErrorCodes.REQUEST_FAILED, `Request failed: ${errorMessage(error)}`));

    if (response.error || (response.status !== undefined && response.status >= 400)) {
      const warning = response.error ?? `HTTP status ${response.status}`;
      this.logger.warn(`Request reported an error: ${warning}`, { status: response.status });
      warnings.push(warning);
    }

    if (response.body === '') {
      throw new StageFailure('requesting', new TransportError(
        ErrorCodes.EMPTY_RESPONSE,
        'Response body is empty',
        response.status,
        { error: response.error }
      ));
    }

    return response.body;
  }

  private async decodeImage(base64: string): Promise<TImage> {
    const image = await this.guard('extracting-result', () => this.imageCodec.fromBase64(base64), error =>
      new ExtractionError(ErrorCodes.IMAGE_DECODE_FAILED, `Image could not be decoded: ${errorMessage(error)}`));
    if (image === null) {
      throw new StageFailure('extracting-result', new ExtractionError(
        ErrorCodes.IMAGE_DECODE_FAILED,
        'Response image could not be decoded',
        { base64Length: base64.length }
      ));
    }
    return image;
  }

  private async writeText(text: string): Promise<void> {
    await this.guard('writing-output', () => this.clipboard.writeText(text), error =>
      new ClipFilterError(ErrorCodes.CLIPBOARD_WRITE_FAILED, `Clipboard write failed: ${errorMessage(error)}`));
  }

  private async writeImage(image: TImage): Promise<void> {
    try {
      await this.clipboard.writeImage(image);
    } catch (error) {
      this.imageCodec.release(image);
      throw new StageFailure('writing-output', new ClipFilterError(
        ErrorCodes.CLIPBOARD_WRITE_FAILED,
        `Clipboard image write failed: ${errorMessage(error)}`
      ));
    }
  }

  /**
   * Run a collaborator call, mapping anything it throws to a stage failure
   */
  private async guard<T>(
    stage: FilterRunStage,
    call: () => Promise<T>,
    toError: (error: unknown) => ClipFilterError
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof StageFailure) throw error;
      throw new StageFailure(stage, toError(error));
    }
  }

  private currentStage(): FilterRunStage {
    const state = this.currentState;
    return state === 'idle' || state === 'success' || state === 'failed' ? 'resolving-template' : state;
  }

  private enter(state: FilterRunState, filter: FilterDefinition): void {
    this.currentState = state;
    this.logger.debug(`Filter "${filter.title}" → ${state}`);
    this.onStateChange?.(state, filter);
  }
}
