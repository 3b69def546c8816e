/**
 * @clipfilter/config
 *
 * Configuration persistence, API key protection and first-run setup
 */

export { resolveConfigPaths } from './config-paths.js';

export type { ConfigPaths } from './config-paths.js';

export {
  DEFAULT_HOTKEY_MODIFIERS,
  DEFAULT_HOTKEY_KEY,
  ConfigStore,
  createInitialConfig,
  createFallbackDefaults,
  createStarterFilters,
  parseConfigDocument,
  applyConfigDocument,
  serializeConfig,
  ensureModelProviders,
  clampModelIndexes
} from './config-store.js';

export type { ConfigDocument, ConfigStoreOptions } from './config-store.js';

export {
  PROTECTED_PREFIX,
  AesGcmSecretStore,
  isProtectedToken,
  loadOrCreateSecretKey,
  loadSecretKey
} from './secret-store.js';

export { performInitialSetup, setupModelIndexFor } from './initial-setup.js';

export type { InitialSetupOptions } from './initial-setup.js';

export { initializeApplication } from './bootstrap.js';

export type { ApplicationServices, InitializeOptions } from './bootstrap.js';
