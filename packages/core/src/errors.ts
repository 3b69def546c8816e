/**
 * clipfilter error classes
 *
 * Engine operations return these inside `Result` values or run outcomes;
 * they are thrown only by collaborators and programming mistakes.
 */

/**
 * Error codes used across the engine
 */
export const ErrorCodes = {
  // Configuration
  NO_MATCHING_TEMPLATE: 'NO_MATCHING_TEMPLATE',
  NO_MODELS_CONFIGURED: 'NO_MODELS_CONFIGURED',
  INVALID_ENDPOINT: 'INVALID_ENDPOINT',
  MODELS_ENDPOINT_MISSING: 'MODELS_ENDPOINT_MISSING',
  UNKNOWN_PROVIDER: 'UNKNOWN_PROVIDER',

  // Acquisition
  CLIPBOARD_EMPTY: 'CLIPBOARD_EMPTY',
  IMAGE_ENCODE_FAILED: 'IMAGE_ENCODE_FAILED',

  // Transport
  REQUEST_FAILED: 'REQUEST_FAILED',
  EMPTY_RESPONSE: 'EMPTY_RESPONSE',

  // Extraction
  RESULT_NOT_FOUND: 'RESULT_NOT_FOUND',
  IMAGE_DECODE_FAILED: 'IMAGE_DECODE_FAILED',
  MODELS_PATH_INVALID: 'MODELS_PATH_INVALID',
  NO_MODELS_RETURNED: 'NO_MODELS_RETURNED',

  // Output
  CLIPBOARD_WRITE_FAILED: 'CLIPBOARD_WRITE_FAILED',

  // Persistence
  DEFINITION_PARSE_FAILED: 'DEFINITION_PARSE_FAILED',
  CONFIG_PARSE_FAILED: 'CONFIG_PARSE_FAILED',
  CONFIG_WRITE_FAILED: 'CONFIG_WRITE_FAILED',
  SECRET_KEY_UNAVAILABLE: 'SECRET_KEY_UNAVAILABLE',

  // Scheduling
  FILTER_BUSY: 'FILTER_BUSY',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base error class for all clipfilter errors
 */
export class ClipFilterError extends Error {
  readonly code: ErrorCode;
  /** Additional diagnostic details (logged, never shown to the user) */
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ClipFilterError';
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * No provider/template match, invalid endpoint or missing descriptor
 */
export class ConfigurationError extends ClipFilterError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Clipboard empty or holding the wrong kind of content, or image encoding failed
 */
export class AcquisitionError extends ClipFilterError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'AcquisitionError';
  }
}

/**
 * Connection or HTTP status failure
 */
export class TransportError extends ClipFilterError {
  /** HTTP status code when the server answered */
  readonly statusCode?: number;

  constructor(code: ErrorCode, message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TransportError';
    this.statusCode = statusCode;
  }

  override toJSON() {
    return { ...super.toJSON(), statusCode: this.statusCode };
  }
}

/**
 * Result path miss, empty result or undecodable image
 */
export class ExtractionError extends ClipFilterError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ExtractionError';
  }
}

/**
 * Definition or configuration file could not be read, parsed or written
 */
export class PersistenceError extends ClipFilterError {
  /** File the failure relates to */
  readonly path?: string;

  constructor(code: ErrorCode, message: string, path?: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PersistenceError';
    this.path = path;
  }

  override toJSON() {
    return { ...super.toJSON(), path: this.path };
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
