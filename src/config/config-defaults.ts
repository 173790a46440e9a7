import { LogLevel } from '../utils/logger.js';

export type DefaultConfig = {
  configDir: string;
  indexDir: string;
  contentDir: string;
  filenameTemplate: string;
  updateWorkers: number;
  downloadWorkers: number;
  ignore: string[];
  contentTypes: Record<string, string>;
  logLevel: LogLevel;
  listLimit: number;

  daemon: {
    updateInterval: number;
  };

  player: {
    command: string;
  };
};

/**
 * Built-in MIME type -> file extension map
 */
export const DEFAULT_CONTENT_TYPES: Readonly<Record<string, string>> = {
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/x-mpeg': 'mp3',
  'audio/mp4': 'm4a',
  'audio/x-m4a': 'm4a',
  'audio/aac': 'aac',
  'audio/ogg': 'ogg',
  'audio/opus': 'opus',
  'audio/flac': 'flac',
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'video/mp4': 'mp4',
  'video/x-m4v': 'm4v',
  'video/quicktime': 'mov',
  'video/webm': 'webm',
  'video/ogg': 'ogv',
  'video/x-matroska': 'mkv',
};

export const defaults: DefaultConfig = {
  configDir: '~/.config/podkeep',
  indexDir: '~/.local/share/podkeep/index',
  contentDir: '~/Podcasts',
  filenameTemplate: '{pub_date}_{title}',
  updateWorkers: 1,
  downloadWorkers: 1,
  ignore: [],
  contentTypes: { ...DEFAULT_CONTENT_TYPES },
  logLevel: LogLevel.INFO,
  listLimit: 20,
  daemon: {
    updateInterval: 60,
  },
  player: {
    command: 'mpv',
  },
};

/**
 * Default configuration values
 */
export function getDefaults(): DefaultConfig {
  return {
    ...defaults,
    ignore: [...defaults.ignore],
    contentTypes: { ...defaults.contentTypes },
    daemon: { ...defaults.daemon },
    player: { ...defaults.player },
  };
}
