/**
 * Runtime Environment Configuration
 *
 * Environment variable access with an explicit override layer, so the host
 * application (and tests) can configure the engine without touching process.env.
 *
 * @module @clipfilter/core/runtime/env
 */

/**
 * Runtime environment configuration
 */
export interface RuntimeEnv {
  /**
   * Minimum log level: debug, info, warn or error
   */
  CLIPFILTER_LOG_LEVEL?: string;

  /**
   * Directory holding config.json, defconf.json, secret.key and the log file
   */
  CLIPFILTER_CONFIG_DIR?: string;

  /**
   * Directory of provider definition documents (*.json)
   */
  CLIPFILTER_APIDEF_DIR?: string;

  /**
   * Request timeout of the fetch transport, in milliseconds
   */
  CLIPFILTER_REQUEST_TIMEOUT_MS?: string;

  /**
   * Additional environment variables
   */
  [key: string]: string | undefined;
}

let globalRuntimeEnv: RuntimeEnv | null = null;

/**
 * Set global runtime environment configuration
 *
 * Values set here take precedence over process.env.
 *
 * @example
 * ```typescript
 * setRuntimeEnv({ CLIPFILTER_LOG_LEVEL: 'debug' });
 * ```
 */
export function setRuntimeEnv(env: RuntimeEnv): void {
  globalRuntimeEnv = env;
}

/**
 * Get global runtime environment configuration
 */
export function getRuntimeEnv(): RuntimeEnv | null {
  return globalRuntimeEnv;
}

/**
 * Clear global runtime environment configuration (for testing)
 */
export function clearRuntimeEnv(): void {
  globalRuntimeEnv = null;
}

/**
 * Get environment variable value
 *
 * Priority:
 * 1. Explicitly set runtime env (via setRuntimeEnv)
 * 2. process.env
 * 3. defaultValue
 */
export function getEnv(key: string, defaultValue?: string): string | undefined {
  if (globalRuntimeEnv && key in globalRuntimeEnv) {
    return globalRuntimeEnv[key];
  }

  if (typeof process !== 'undefined' && process.env) {
    const value = process.env[key];
    if (value !== undefined) {
      return value;
    }
  }

  return defaultValue;
}

/**
 * Get a positive integer environment variable, falling back when unset or invalid
 */
export function getEnvNumber(key: string, defaultValue: number): number {
  const raw = getEnv(key);
  if (raw === undefined || raw.trim() === '') return defaultValue;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}
