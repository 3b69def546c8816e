/**
 * Locations of the configuration directory and its files
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { getEnv } from '@clipfilter/core';
import { BUNDLED_DEFINITIONS_DIR } from '@clipfilter/templates';

export interface ConfigPaths {
  configDir: string;
  /** User configuration (models, filters, hotkey, language) */
  configFile: string;
  /** Defaults applied on first run */
  defaultConfigFile: string;
  /** Key used to protect API keys at rest */
  secretKeyFile: string;
  logFile: string;
  /** Provider definition documents */
  definitionsDir: string;
}

const APP_DIR_NAME = 'clipfilter';

/**
 * Resolve paths from the runtime environment.
 *
 * The directory is `CLIPFILTER_CONFIG_DIR`, else `%APPDATA%/clipfilter`,
 * else `~/.config/clipfilter`. Definitions come from `CLIPFILTER_APIDEF_DIR`
 * or the bundled set.
 */
export function resolveConfigPaths(): ConfigPaths {
  const appData = getEnv('APPDATA');
  const configDir = getEnv('CLIPFILTER_CONFIG_DIR')
    ?? (appData ? join(appData, APP_DIR_NAME) : join(homedir(), '.config', APP_DIR_NAME));

  return {
    configDir,
    configFile: join(configDir, 'config.json'),
    defaultConfigFile: join(configDir, 'defconf.json'),
    secretKeyFile: join(configDir, 'secret.key'),
    logFile: join(configDir, 'clipfilter.log'),
    definitionsDir: getEnv('CLIPFILTER_APIDEF_DIR') ?? BUNDLED_DEFINITIONS_DIR,
  };
}
