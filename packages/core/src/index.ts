/**
 * @clipfilter/core
 *
 * Core types, errors, logging and runtime helpers for clipfilter
 *
 * This module re-exports from:
 * - types.ts - Domain model (providers, templates, models, filters, results)
 * - collaborators.ts - Capability interfaces implemented by the host application
 * - errors.ts - Error hierarchy and codes
 * - observability/logger.ts - Leveled logger with sinks
 * - runtime/* - Environment, base64 and randomness helpers
 */

export type {
  IOKind,
  HeaderList,
  HttpMethod,
  TemplateDefinition,
  ModelsDescriptor,
  ApiProvider,
  ModelConfig,
  FilterDefinition,
  HotkeyBinding,
  AppConfig,
  EncodedImage,
  ApiCallResult,
  Result
} from './types.js';

export { ok, err, parseIOKind } from './types.js';

// Collaborator capability interfaces
export type {
  ClipboardContentKind,
  ClipboardSource,
  ClipboardSink,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  ImageCodec,
  SecretStore
} from './collaborators.js';

// Error handling
export {
  ErrorCodes,
  ClipFilterError,
  ConfigurationError,
  AcquisitionError,
  TransportError,
  ExtractionError,
  PersistenceError,
  errorMessage
} from './errors.js';

export type { ErrorCode } from './errors.js';

// Logging
export {
  Logger,
  createLogger,
  createSilentLogger,
  createFileSink,
  formatLogLine,
  parseLogLevel,
  redactSensitive
} from './observability/logger.js';

export type { LogLevel, LogEntry, LogSink, LoggerOptions } from './observability/logger.js';

// Runtime environment
export {
  setRuntimeEnv,
  getRuntimeEnv,
  clearRuntimeEnv,
  getEnv,
  getEnvNumber
} from './runtime/env.js';

export type { RuntimeEnv } from './runtime/env.js';

export {
  bytesToBase64,
  base64ToBytes,
  isBase64,
  toDataUrl,
  isDataUri,
  stripImageDataUrl
} from './runtime/base64.js';

export { getRandomBytes, bytesToHex, randomHex } from './runtime/crypto.js';

// Resource limits
export {
  DEFAULT_LIMITS,
  resolveRequestTimeout,
  fetchTextWithTimeout,
  safeJsonParse
} from './security/resource-limits.js';

export type { FetchedText } from './security/resource-limits.js';

// MIME detection
export { detectMimeType, detectImageMimeType, isPng } from './mime-detection.js';
