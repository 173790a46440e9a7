import type { DefaultConfig } from './config-defaults.js';

/**
 * Fully resolved application configuration: every setting present,
 * directories absolute
 */
export type AppConfig = DefaultConfig;

/**
 * Directories derived from `configDir`
 */
export type ConfigPaths = {
  subscriptionsDir: string;
  hooksDir: string;
};
