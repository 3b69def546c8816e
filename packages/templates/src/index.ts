/**
 * @clipfilter/templates
 *
 * Provider catalog, request templating and response extraction
 */

export {
  BUNDLED_DEFINITIONS_DIR,
  DirectoryDefinitionSource,
  StaticDefinitionSource,
  ProviderCatalog,
  loadProviderCatalog,
  parseProviderDocument,
  normalizeProviderId
} from './provider-catalog.js';

export type { DefinitionDocument, DefinitionSource } from './provider-catalog.js';

export {
  PLACEHOLDER_TOKENS,
  escapeJsonString,
  substitutePlaceholders,
  listPlaceholders
} from './placeholders.js';

export type { PlaceholderContext, SubstituteOptions } from './placeholders.js';

export { DEFAULT_ENDPOINT_PATH, resolveEndpoint, endpointToUrl } from './endpoint-resolver.js';

export type { ResolvedEndpoint } from './endpoint-resolver.js';

export {
  createBoundary,
  buildMultipartBody,
  buildTemplateRequest,
  findMultipartHeader
} from './request-builder.js';

export type {
  RequestImage,
  TemplateRequestInput,
  RenderedRequest,
  BodyEncoding,
  MultipartFields
} from './request-builder.js';

export {
  parseResultPath,
  walkJsonPath,
  isJsonValue,
  parseJson,
  renderJsonValue,
  extractByPath
} from './json-path.js';

export type { JsonValue, PathSegment } from './json-path.js';

export { scanContentField, scanB64JsonField, scanChatImageUrl } from './heuristic-scan.js';

export {
  IMAGE_EXTRACTION_STRATEGIES,
  extractTextResult,
  extractImageBase64,
  extractResponse
} from './response-extractor.js';

export type { ExtractedResult, ImageExtractionStrategy, ImageStrategyName } from './response-extractor.js';

export {
  TEXT_MODEL_PATTERNS,
  IMAGE_MODEL_PATTERNS,
  fetchModels,
  pickModelByPatterns
} from './model-discovery.js';

export type { FetchModelsOptions } from './model-discovery.js';
