import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, isErrnoException, errorMessage } from '../errors/custom-errors.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { expandHome } from '../utils/fs-utils.js';
import { getDefaults } from './config-defaults.js';
import { type Config, ConfigSchema, parseWithSchema } from './config-schema.js';
import type { AppConfig, ConfigPaths } from './resolved-config.types.js';

/**
 * Default config file path
 */
export const DEFAULT_CONFIG_PATH = '~/.config/podkeep/config.yaml';

/**
 * Load, validate and resolve configuration from a YAML file
 *
 * Without `configPath` the default location is read, and a missing file
 * there means "all defaults". An explicitly given path must exist.
 *
 * @throws ConfigError if the file is missing (explicit path only) or invalid
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const absolutePath = resolve(expandHome(configPath ?? DEFAULT_CONFIG_PATH));

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    if (configPath === undefined && isErrnoException(error) && error.code === 'ENOENT') {
      return resolveConfig({});
    }
    throw new ConfigError(`Cannot read configuration file "${absolutePath}": ${errorMessage(error)}`);
  }

  return resolveConfig(parseConfigYaml(content, absolutePath));
}

/**
 * Parse YAML text into a validated (not yet resolved) config
 */
export function parseConfigYaml(content: string, source: string): Config {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML in ${source}: ${errorMessage(error)}`);
  }

  // An empty file is an empty config
  if (raw === undefined || raw === null) {
    raw = {};
  }

  return parseWithSchema(ConfigSchema, resolveEnvRecursive(raw), source);
}

/**
 * Merge a validated config over the defaults and make directories absolute
 */
export function resolveConfig(config: Config): AppConfig {
  const defaults = getDefaults();
  const dir = (value: string) => resolve(expandHome(value));

  return {
    configDir: dir(config.configDir ?? defaults.configDir),
    indexDir: dir(config.indexDir ?? defaults.indexDir),
    contentDir: dir(config.contentDir ?? defaults.contentDir),
    filenameTemplate: config.filenameTemplate ?? defaults.filenameTemplate,
    updateWorkers: config.updateWorkers ?? defaults.updateWorkers,
    downloadWorkers: config.downloadWorkers ?? defaults.downloadWorkers,
    ignore: config.ignore ?? defaults.ignore,
    contentTypes: normalizeContentTypes({ ...defaults.contentTypes, ...config.contentTypes }),
    logLevel: config.logLevel ?? defaults.logLevel,
    listLimit: config.listLimit ?? defaults.listLimit,
    daemon: {
      updateInterval: config.daemon?.updateInterval ?? defaults.daemon.updateInterval,
    },
    player: {
      command: config.player?.command ?? defaults.player.command,
    },
  };
}

export function getConfigPaths(config: AppConfig): ConfigPaths {
  return {
    subscriptionsDir: join(config.configDir, 'subscriptions'),
    hooksDir: join(config.configDir, 'hooks'),
  };
}

function normalizeContentTypes(map: Record<string, string>): Record<string, string> {
  return Object.fromEntries(Object.entries(map).map(([type, ext]) => [type.toLowerCase(), ext.toLowerCase()]));
}
