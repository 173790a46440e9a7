import { createInterface } from 'node:readline/promises';
import {
  boolean,
  command,
  extendType,
  flag,
  number,
  option,
  optional,
  positional,
  restPositionals,
  string,
  subcommands,
} from 'cmd-ts';
import { loadConfig, getConfigPaths } from './config/config-loader.js';
import type { AppConfig } from './config/resolved-config.types.js';
import { DownloadScheduler } from './downloader/download-scheduler.js';
import { HttpMediaDownloader, type MediaDownloader } from './downloader/http-downloader.js';
import { ConfigError, PodkeepError, errorMessage } from './errors/custom-errors.js';
import { ConsoleSink } from './events/console-sink.js';
import { EventDispatcher } from './events/event-dispatcher.js';
import { type HookRunner, HookSink, execaRunner } from './events/hook-sink.js';
import { FeedDiffEngine } from './feed/feed-diff.js';
import { type FeedSource, HttpFeedSource } from './feed/feed-source.js';
import { type EditorRunner, editDefinition, execaEditorRunner } from './library/definition-editor.js';
import { Library } from './library/library.js';
import {
  formatEpisode,
  formatEpisodeChoice,
  formatNowPlaying,
  formatPurgeResult,
  formatSubscriptionSummary,
  formatUpdateReport,
  hasFailures,
} from './output/formatters.js';
import { CmdPlayer, type PlayerRunner, execaPlayerRunner } from './player/cmd-player.js';
import { Daemon } from './scheduler/daemon.js';
import { EpisodeIndexStore } from './store/episode-index.js';
import { SubscriptionStore } from './store/subscription-store.js';
import { SyncEngine } from './sync/sync-engine.js';
import type { SubscriptionChanges } from './types/subscription.types.js';
import { LogLevel, logger } from './utils/logger.js';
import { parseDateArg } from './utils/time-utils.js';

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  createFeedSource: () => FeedSource;
  createDownloader: () => MediaDownloader;
  hookRunner: HookRunner;
  playerRunner: PlayerRunner;
  editorRunner: EditorRunner;
  /** Command output (not logging) */
  print: (line: string) => void;
  /** Ask a question on the terminal and return the answer */
  prompt: (question: string) => Promise<string>;
};

async function promptLine(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

export const defaultDependencies: AppDependencies = {
  loadConfig,
  createFeedSource: () => new HttpFeedSource(),
  createDownloader: () => new HttpMediaDownloader(),
  hookRunner: execaRunner,
  playerRunner: execaPlayerRunner,
  editorRunner: execaEditorRunner,
  print: (line) => console.log(line),
  prompt: promptLine,
};

export type GlobalArgs = {
  config?: string;
  verbose: boolean;
  quiet: boolean;
};

/**
 * Everything a command works with, built from the configuration
 */
export type Services = {
  config: AppConfig;
  index: EpisodeIndexStore;
  store: SubscriptionStore;
  events: EventDispatcher;
  library: Library;
  sync: SyncEngine;
  player: CmdPlayer;
  editorRunner: EditorRunner;
  print: (line: string) => void;
  prompt: (question: string) => Promise<string>;
};

export async function createServices(args: GlobalArgs, deps: AppDependencies = defaultDependencies): Promise<Services> {
  const config = await deps.loadConfig(args.config);
  logger.setLevel(args.verbose ? LogLevel.DEBUG : args.quiet ? LogLevel.ERROR : config.logLevel);

  const paths = getConfigPaths(config);
  const index = new EpisodeIndexStore(config.indexDir);
  const store = new SubscriptionStore({
    subscriptionsDir: paths.subscriptionsDir,
    contentDir: config.contentDir,
    filenameTemplate: config.filenameTemplate,
    index,
    contentTypes: config.contentTypes,
  });

  const events = new EventDispatcher();
  events.register(new ConsoleSink(), 10);
  events.register(new HookSink(paths.hooksDir, deps.hookRunner));

  const downloads = new DownloadScheduler({
    index,
    downloader: deps.createDownloader(),
    events,
    workers: config.downloadWorkers,
  });
  const sync = new SyncEngine({
    store,
    index,
    diff: new FeedDiffEngine(deps.createFeedSource(), config.contentTypes),
    downloads,
    events,
    updateWorkers: config.updateWorkers,
    ignore: config.ignore,
  });
  const library = new Library({ store, index, events, ignore: config.ignore });

  return {
    config,
    index,
    store,
    events,
    library,
    sync,
    player: new CmdPlayer(config.player.command, deps.playerRunner),
    editorRunner: deps.editorRunner,
    print: deps.print,
    prompt: deps.prompt,
  };
}

/**
 * Build services, run a command and wait for event sinks to finish
 *
 * @returns the process exit code
 */
export async function runCommand(
  args: GlobalArgs,
  action: (services: Services) => Promise<number>,
  deps: AppDependencies = defaultDependencies,
): Promise<number> {
  let services: Services | undefined;
  try {
    services = await createServices(args, deps);
    return await action(services);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(`Configuration error: ${error.message}`);
    } else {
      logger.error(`Error: ${errorMessage(error)}`);
    }
    return 1;
  } finally {
    await services?.events.drain();
  }
}

export type UpdateArgs = {
  names: string[];
  force: boolean;
};

export async function updateCommand(services: Services, args: UpdateArgs): Promise<number> {
  const report = await services.sync.update(args.names, { force: args.force });
  for (const line of formatUpdateReport(report)) {
    services.print(line);
  }
  return hasFailures(report) ? 1 : 0;
}

export type AddArgs = {
  url: string;
  name?: string;
  maxEpisodes?: number;
  template?: string;
  directory?: string;
  noUpdate: boolean;
};

export async function addCommand(services: Services, args: AddArgs): Promise<number> {
  const subscription = await services.library.addSubscription({
    feedUrl: args.url,
    name: args.name,
    maxEpisodes: args.maxEpisodes,
    filenameTemplate: args.template,
    contentDir: args.directory,
  });
  services.print(`Added ${subscription.name} (${subscription.contentDir})`);

  if (args.noUpdate) {
    return 0;
  }
  return updateCommand(services, { names: [subscription.name], force: false });
}

export type DelArgs = {
  names: string[];
  episodes: boolean;
};

export async function delCommand(services: Services, args: DelArgs): Promise<number> {
  for (const name of args.names) {
    await services.library.removeSubscription(name, args.episodes);
    services.print(`Removed ${name}`);
  }
  return 0;
}

export type EditArgs = {
  name: string;
  newName?: string;
  url?: string;
  title?: string;
  keep?: number;
  template?: string;
  directory?: string;
  enable: boolean;
  disable: boolean;
  /** Leave downloaded files where they are */
  noMove?: boolean;
};

/**
 * Changes requested on the command line. An empty string resets a setting
 * to its default.
 */
export function editChanges(args: EditArgs): SubscriptionChanges {
  if (args.enable && args.disable) {
    throw new PodkeepError('--enable and --disable cannot be combined');
  }

  const reset = (value: string | undefined) => (value === undefined ? undefined : value === '' ? null : value);
  const changes: SubscriptionChanges = {};
  if (args.newName !== undefined) changes.name = args.newName;
  if (args.url !== undefined) changes.feedUrl = args.url;
  if (args.title !== undefined) changes.title = reset(args.title);
  if (args.template !== undefined) changes.filenameTemplate = reset(args.template);
  if (args.directory !== undefined) changes.contentDir = reset(args.directory);
  if (args.keep !== undefined) changes.maxEpisodes = args.keep;
  if (args.enable) changes.enabled = true;
  if (args.disable) changes.enabled = false;
  return changes;
}

/**
 * Apply the options given, or open the definition in an editor when there
 * are none
 */
export async function editCommand(services: Services, args: EditArgs): Promise<number> {
  let changes = editChanges(args);
  if (Object.keys(changes).length === 0) {
    const edited = await editDefinition(services.store, args.name, services.editorRunner);
    if (edited === undefined || Object.keys(edited).length === 0) {
      logger.warning('No changes were made');
      return 0;
    }
    changes = edited;
  }

  const subscription = await services.library.editSubscription(args.name, changes, { moveFiles: !args.noMove });
  return showCommand(services, [subscription.name]);
}

export async function showCommand(services: Services, names: string[]): Promise<number> {
  for (const summary of await services.library.showSubscriptions(names)) {
    for (const line of formatSubscriptionSummary(summary)) {
      services.print(line);
    }
  }
  return 0;
}

export type LsArgs = {
  names: string[];
  since?: string;
  until?: string;
  newest?: number;
  all: boolean;
  path: boolean;
};

export async function lsCommand(services: Services, args: LsArgs): Promise<number> {
  const episodes = await services.library.listEpisodes({
    patterns: args.names,
    since: args.since,
    until: args.until,
    // A date range lists every episode in it
    limit:
      args.all || args.since !== undefined || args.until !== undefined
        ? undefined
        : (args.newest ?? services.config.listLimit),
  });
  for (const episode of episodes) {
    for (const line of formatEpisode(episode, args.path)) {
      services.print(line);
    }
  }
  return 0;
}

export type PlayArgs = {
  names: string[];
  wait: boolean;
};

/**
 * Offer the newest episodes as a numbered menu and play the chosen one
 */
export async function playCommand(services: Services, args: PlayArgs): Promise<number> {
  const episodes = await services.library.listEpisodes({ patterns: args.names, limit: services.config.listLimit });
  if (episodes.length === 0) {
    services.print('No episodes found');
    return 0;
  }

  services.print('Select episode');
  for (const [position, episode] of episodes.entries()) {
    services.print(formatEpisodeChoice(position + 1, episode));
  }

  while (true) {
    const answer = (await services.prompt('Play episode <number>: ')).trim();
    if (answer === '') {
      services.print('No episode selected');
      return 0;
    }

    const episode = /^\d+$/.test(answer) ? episodes[Number(answer) - 1] : undefined;
    if (episode === undefined) {
      services.print(`Invalid episode number "${answer}"`);
      continue;
    }

    for (const line of formatNowPlaying(episode)) {
      services.print(line);
    }
    await services.player.play(episode, { wait: args.wait });
    return 0;
  }
}

export async function purgeCommand(services: Services, names: string[], simulate: boolean): Promise<number> {
  const results = await services.library.purge(names, simulate);
  for (const result of results) {
    for (const line of formatPurgeResult(result, simulate)) {
      services.print(line);
    }
  }
  return results.some((result) => result.purged.some((item) => item.fileErrors.length > 0)) ? 1 : 0;
}

export async function markCommand(services: Services, name: string, ids: string[], unread: boolean): Promise<number> {
  const result = await services.library.markRead(name, ids, !unread);
  for (const id of result.unknown) {
    logger.warning(`${name} has no episode "${id}"`);
  }
  return result.unknown.length > 0 ? 1 : 0;
}

/**
 * Handle graceful shutdown
 */
export async function handleShutdown(daemon: Daemon, events: EventDispatcher): Promise<void> {
  logger.info('Shutting down gracefully...');

  try {
    await daemon.stop();
    await events.drain();
    logger.success('Shutdown complete');
  } catch (error) {
    logger.error(`Error during shutdown: ${errorMessage(error)}`);
  }
}

export async function daemonCommand(services: Services): Promise<number> {
  const daemon = new Daemon({
    intervalMinutes: services.config.daemon.updateInterval,
    runUpdate: (signal) => services.sync.update([], { signal }),
    onReport: (report) => {
      for (const line of formatUpdateReport(report)) {
        services.print(line);
      }
    },
  });

  const onSignal = (): void => {
    handleShutdown(daemon, services.events).catch((error: unknown) => {
      logger.error(`Error during shutdown: ${errorMessage(error)}`);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await daemon.start();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
  return 0;
}

// Define CLI using cmd-ts

const DateArg = extendType(string, {
  displayName: 'date',
  description: 'yyyy-mm-dd, today, yesterday, <N>d or <N>w',
  async from(value) {
    return parseDateArg(value);
  },
});

const globalArgs = {
  config: option({
    type: optional(string),
    long: 'config',
    short: 'c',
    description: 'Path to configuration file (default: ~/.config/podkeep/config.yaml)',
  }),
  verbose: flag({
    type: boolean,
    long: 'verbose',
    short: 'v',
    description: 'Log debug output',
  }),
  quiet: flag({
    type: boolean,
    long: 'quiet',
    short: 'q',
    description: 'Log errors only',
  }),
};

const names = restPositionals({
  type: string,
  displayName: 'name',
  description: 'Subscription names; shell wildcards allowed',
});

function exitWith(code: number): void {
  process.exitCode = code;
}

const updateCmd = command({
  name: 'update',
  description: 'Check feeds and download new episodes',
  args: {
    ...globalArgs,
    names,
    force: flag({ type: boolean, long: 'force', short: 'f', description: 'Ignore feed cache validators' }),
  },
  handler: async (args) => exitWith(await runCommand(args, (services) => updateCommand(services, args))),
});

const addCmd = command({
  name: 'add',
  description: 'Subscribe to a feed',
  args: {
    ...globalArgs,
    url: positional({ type: string, displayName: 'url', description: 'Feed URL' }),
    name: option({ type: optional(string), long: 'name', short: 'n', description: 'Subscription name' }),
    maxEpisodes: option({
      type: optional(number),
      long: 'max-episodes',
      short: 'm',
      description: 'Episodes to keep (0 = all)',
    }),
    template: option({ type: optional(string), long: 'template', short: 't', description: 'Filename template' }),
    directory: option({ type: optional(string), long: 'directory', short: 'd', description: 'Content directory' }),
    noUpdate: flag({ type: boolean, long: 'no-update', description: 'Do not download right away' }),
  },
  handler: async (args) => exitWith(await runCommand(args, (services) => addCommand(services, args))),
});

const delCmd = command({
  name: 'del',
  description: 'Remove subscriptions',
  args: {
    ...globalArgs,
    names: restPositionals({ type: string, displayName: 'name', description: 'Subscription names' }),
    episodes: flag({ type: boolean, long: 'episodes', short: 'e', description: 'Delete downloaded files too' }),
  },
  handler: async (args) => exitWith(await runCommand(args, (services) => delCommand(services, args))),
});

const editCmd = command({
  name: 'edit',
  description: 'Change a subscription; without options, open it in $EDITOR',
  args: {
    ...globalArgs,
    name: positional({ type: string, displayName: 'name', description: 'Subscription name' }),
    newName: option({ type: optional(string), long: 'name', short: 'n', description: 'Rename the subscription' }),
    url: option({ type: optional(string), long: 'url', short: 'u', description: 'Feed URL' }),
    title: option({ type: optional(string), long: 'title', description: 'Display title' }),
    keep: option({ type: optional(number), long: 'keep', short: 'k', description: 'Episodes to keep (0 = all)' }),
    template: option({ type: optional(string), long: 'template', short: 't', description: 'Filename template' }),
    directory: option({ type: optional(string), long: 'directory', short: 'd', description: 'Content directory' }),
    enable: flag({ type: boolean, long: 'enable', description: 'Include in updates' }),
    disable: flag({ type: boolean, long: 'disable', description: 'Leave out of updates' }),
    noMove: flag({ type: boolean, long: 'no-move', description: 'Do not rename downloaded files' }),
  },
  handler: async (args) => exitWith(await runCommand(args, (services) => editCommand(services, args))),
});

const showCmd = command({
  name: 'show',
  description: 'Show subscription settings',
  args: { ...globalArgs, names },
  handler: async (args) => exitWith(await runCommand(args, (services) => showCommand(services, args.names))),
});

const lsCmd = command({
  name: 'ls',
  description: 'List downloaded episodes, newest first',
  args: {
    ...globalArgs,
    names,
    since: option({ type: optional(DateArg), long: 'since', short: 's', description: 'First publish day' }),
    until: option({ type: optional(DateArg), long: 'until', short: 'u', description: 'Last publish day' }),
    newest: option({ type: optional(number), long: 'newest', short: 'n', description: 'Number of episodes' }),
    all: flag({ type: boolean, long: 'all', short: 'a', description: 'List every episode' }),
    path: flag({ type: boolean, long: 'path', short: 'p', description: 'Print file paths' }),
  },
  handler: async (args) => exitWith(await runCommand(args, (services) => lsCommand(services, args))),
});

const playCmd = command({
  name: 'play',
  description: 'Choose a downloaded episode and play it',
  args: {
    ...globalArgs,
    names,
    wait: flag({ type: boolean, long: 'wait', description: 'Wait for the player to finish' }),
  },
  handler: async (args) => exitWith(await runCommand(args, (services) => playCommand(services, args))),
});

const purgeCmd = command({
  name: 'purge',
  description: 'Delete episodes beyond the retention count',
  args: {
    ...globalArgs,
    names,
    simulate: flag({ type: boolean, long: 'simulate', short: 's', description: 'Only report what would go' }),
  },
  handler: async (args) =>
    exitWith(await runCommand(args, (services) => purgeCommand(services, args.names, args.simulate))),
});

const markCmd = command({
  name: 'mark',
  description: 'Mark episodes as read',
  args: {
    ...globalArgs,
    name: positional({ type: string, displayName: 'name', description: 'Subscription name' }),
    ids: restPositionals({ type: string, displayName: 'id', description: 'Episode ids' }),
    unread: flag({ type: boolean, long: 'unread', description: 'Mark as unread instead' }),
  },
  handler: async (args) =>
    exitWith(await runCommand(args, (services) => markCommand(services, args.name, args.ids, args.unread))),
});

const daemonCmd = command({
  name: 'daemon',
  description: 'Update all subscriptions periodically until interrupted',
  args: { ...globalArgs },
  handler: async (args) => exitWith(await runCommand(args, daemonCommand)),
});

export const cli = subcommands({
  name: 'podkeep',
  description: 'Podcast fetcher: keeps a bounded local archive of subscribed feeds',
  version: '0.1.0',
  cmds: {
    update: updateCmd,
    add: addCmd,
    del: delCmd,
    edit: editCmd,
    show: showCmd,
    ls: lsCmd,
    play: playCmd,
    purge: purgeCmd,
    mark: markCmd,
    daemon: daemonCmd,
  },
});
