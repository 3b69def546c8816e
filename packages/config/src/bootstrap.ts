/**
 * Application wiring: paths, file logging, provider catalog, secrets and
 * configuration store, built from the runtime environment.
 */

import { mkdirSync } from 'node:fs';
import { Logger, createFileSink, errorMessage } from '@clipfilter/core';
import type { LogSink } from '@clipfilter/core';
import { DirectoryDefinitionSource, loadProviderCatalog } from '@clipfilter/templates';
import type { ProviderCatalog } from '@clipfilter/templates';
import { resolveConfigPaths } from './config-paths.js';
import type { ConfigPaths } from './config-paths.js';
import { ConfigStore } from './config-store.js';
import { AesGcmSecretStore, loadSecretKey } from './secret-store.js';

export interface ApplicationServices {
  paths: ConfigPaths;
  logger: Logger;
  catalog: ProviderCatalog;
  secretStore: AesGcmSecretStore;
  configStore: ConfigStore;
}

export interface InitializeOptions {
  /** Overrides of the resolved paths */
  paths?: Partial<ConfigPaths>;
  /** Echo log lines to the console as well as the log file (default: false) */
  console?: boolean;
}

/**
 * Build the application services. The config directory is created when
 * missing. A log file that cannot be created leaves console logging only,
 * and a secret key file that cannot be used leaves a session-only key.
 */
export function initializeApplication(options: InitializeOptions = {}): ApplicationServices {
  const paths: ConfigPaths = { ...resolveConfigPaths(), ...options.paths };

  const sinks: LogSink[] = [];
  try {
    mkdirSync(paths.configDir, { recursive: true });
    sinks.push(createFileSink(paths.logFile));
  } catch (error) {
    console.error(`[clipfilter] log file unavailable: ${errorMessage(error)}`);
  }

  const logger = new Logger({
    console: options.console ?? sinks.length === 0,
    sinks,
  });

  const catalog = loadProviderCatalog(new DirectoryDefinitionSource(paths.definitionsDir), logger.child('catalog'));
  const secretsLogger = logger.child('secrets');
  const secretStore = new AesGcmSecretStore(loadSecretKey(paths.secretKeyFile, secretsLogger), secretsLogger);
  const configStore = new ConfigStore({ paths, secretStore, logger: logger.child('config') });

  return { paths, logger, catalog, secretStore, configStore };
}
