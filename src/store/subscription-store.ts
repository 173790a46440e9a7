import { readdir, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { DEFAULT_CONTENT_TYPES } from '../config/config-defaults.js';
import { type SubscriptionFile, SubscriptionFileSchema, SubscriptionNameSchema, parseWithSchema } from '../config/config-schema.js';
import { relocateFiles } from '../downloader/file-relocator.js';
import { validateTemplate } from '../downloader/filename-templater.js';
import {
  AlreadyExistsError,
  ConfigError,
  NotFoundError,
  errorMessage,
  isErrnoException,
  toErrorInfo,
  toFilesystemError,
} from '../errors/custom-errors.js';
import type { ErrorInfo } from '../types/report.types.js';
import type { NewSubscription, Subscription, SubscriptionChanges } from '../types/subscription.types.js';
import { deleteIfExists, expandHome, pathExists, writeFileAtomic } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';
import { nameFromUrl } from '../utils/url-utils.js';
import type { EpisodeIndexStore } from './episode-index.js';

const log = logger.child('subscriptions');

const FILE_EXTENSION = '.yaml';

export type SubscriptionStoreOptions = {
  /** Directory holding one `<name>.yaml` per subscription */
  subscriptionsDir: string;
  /** Parent of the default content directory `<contentDir>/<name>` */
  contentDir: string;
  /** Template used when a subscription sets none */
  filenameTemplate: string;
  index: EpisodeIndexStore;
  /** MIME type to extension map, used to tell audio from video when files move */
  contentTypes?: Readonly<Record<string, string>>;
};

export type UpdateOptions = {
  /** Move downloaded files to the paths the changed settings render */
  moveFiles?: boolean;
};

export type SubscriptionListing = {
  subscriptions: Subscription[];
  /** Definitions that could not be read */
  errors: { name: string; error: ErrorInfo }[];
};

/**
 * Durable set of subscription definitions
 *
 * Every mutation is written to disk before the call returns; nothing is
 * cached in memory between calls.
 */
export class SubscriptionStore {
  constructor(private readonly options: SubscriptionStoreOptions) {}

  /**
   * All readable subscriptions, sorted by name
   */
  async list(): Promise<Subscription[]> {
    const { subscriptions, errors } = await this.listAll();
    for (const { name, error } of errors) {
      log.error(`Skipping subscription "${name}": ${error.message}`);
    }
    return subscriptions;
  }

  /**
   * All subscriptions plus the definitions that failed to load
   */
  async listAll(): Promise<SubscriptionListing> {
    const listing: SubscriptionListing = { subscriptions: [], errors: [] };

    for (const name of await this.names()) {
      try {
        listing.subscriptions.push(await this.get(name));
      } catch (error) {
        listing.errors.push({ name, error: toErrorInfo(error) });
      }
    }

    return listing;
  }

  /**
   * @throws NotFoundError if there is no such subscription
   * @throws ConfigError if its definition is invalid
   */
  async get(name: string): Promise<Subscription> {
    return this.toSubscription(name, await this.readDefinition(name));
  }

  /**
   * The stored definition, without resolved defaults
   *
   * @throws NotFoundError if there is no such subscription
   */
  async getDefinition(name: string): Promise<SubscriptionFile> {
    return this.readDefinition(name);
  }

  async exists(name: string): Promise<boolean> {
    return pathExists(this.pathFor(name));
  }

  /**
   * Create a subscription. Without a name, one is derived from the feed URL
   * and made unique with a numeric suffix.
   *
   * @throws AlreadyExistsError if an explicit name is taken
   * @throws ConfigError if the definition is invalid
   */
  async add(request: NewSubscription): Promise<Subscription> {
    let name: string;
    if (request.name !== undefined) {
      name = this.validateName(request.name);
      if (await this.exists(name)) {
        throw new AlreadyExistsError(name);
      }
    } else {
      name = await this.uniqueName(this.deriveName(request.feedUrl));
    }

    const definition = this.validateDefinition(name, {
      feedUrl: request.feedUrl,
      title: request.title,
      contentDir: request.contentDir,
      filenameTemplate: request.filenameTemplate,
      maxEpisodes: request.maxEpisodes,
      enabled: request.enabled,
    });

    await this.writeDefinition(name, definition);
    log.info(`Added subscription "${name}" for ${definition.feedUrl}`);
    return this.toSubscription(name, definition);
  }

  /**
   * Delete a subscription and its index. With `deleteEpisodes`, every file
   * recorded in the index is deleted first.
   *
   * @returns the removed subscription
   * @throws NotFoundError if there is no such subscription
   */
  async remove(name: string, deleteEpisodes: boolean): Promise<Subscription> {
    const subscription = await this.get(name);

    if (deleteEpisodes) {
      const index = await this.options.index.load(name);
      for (const episode of index.all()) {
        for (const file of episode.files) {
          try {
            await deleteIfExists(file);
          } catch (error) {
            throw toFilesystemError(error, file);
          }
        }
      }
    }

    await this.options.index.delete(name);
    try {
      await deleteIfExists(this.pathFor(name));
    } catch (error) {
      throw toFilesystemError(error, this.pathFor(name));
    }

    log.info(`Removed subscription "${name}"`);
    return subscription;
  }

  /**
   * Change fields of a subscription. A new `name` renames the definition and
   * its index. With `moveFiles`, downloaded files are moved when the name,
   * title, content directory or template changed; otherwise they stay where
   * they are.
   *
   * @throws NotFoundError if there is no such subscription
   * @throws AlreadyExistsError if the new name is taken
   * @throws InvalidTemplateError if the new template cannot be rendered
   */
  async update(name: string, changes: SubscriptionChanges, options: UpdateOptions = {}): Promise<Subscription> {
    const current = await this.readDefinition(name);

    const merged: SubscriptionFile = { ...current };
    if (changes.feedUrl !== undefined) merged.feedUrl = changes.feedUrl;
    if (changes.enabled !== undefined) merged.enabled = changes.enabled;
    // null resets a setting to its default
    if (changes.title !== undefined) merged.title = changes.title ?? undefined;
    if (changes.contentDir !== undefined) merged.contentDir = changes.contentDir ?? undefined;
    if (changes.filenameTemplate !== undefined) merged.filenameTemplate = changes.filenameTemplate ?? undefined;
    if (changes.maxEpisodes !== undefined) merged.maxEpisodes = changes.maxEpisodes ?? undefined;

    const newName = changes.name !== undefined ? this.validateName(changes.name) : name;
    const definition = this.validateDefinition(newName, merged);
    const before = this.toSubscription(name, current);
    const after = this.toSubscription(newName, definition);
    if (after.filenameTemplate !== before.filenameTemplate) {
      validateTemplate(after);
    }

    if (newName !== name) {
      if (await this.exists(newName)) {
        throw new AlreadyExistsError(newName);
      }
      await this.writeDefinition(newName, definition);
      await this.options.index.rename(name, newName);
      await deleteIfExists(this.pathFor(name));
      log.info(`Renamed subscription "${name}" to "${newName}"`);
    } else {
      await this.writeDefinition(name, definition);
    }

    if (options.moveFiles && affectsPaths(before, after)) {
      const contentTypes = this.options.contentTypes ?? DEFAULT_CONTENT_TYPES;
      const result = await this.options.index.update(newName, (index) => relocateFiles(after, index, contentTypes));
      if (result.moved > 0) {
        log.info(`Moved ${result.moved} file(s) of "${newName}"`);
      }
      if (result.failed.length > 0) {
        log.warning(`${result.failed.length} file(s) of "${newName}" could not be moved`);
      }
    }

    return after;
  }

  private pathFor(name: string): string {
    return join(this.options.subscriptionsDir, `${name}${FILE_EXTENSION}`);
  }

  private async names(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.options.subscriptionsDir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw toFilesystemError(error, this.options.subscriptionsDir);
    }

    return entries
      .filter((entry) => entry.endsWith(FILE_EXTENSION) && !entry.startsWith('.'))
      .map((entry) => entry.slice(0, -FILE_EXTENSION.length))
      .sort();
  }

  private async readDefinition(name: string): Promise<SubscriptionFile> {
    if (!SubscriptionNameSchema.safeParse(name).success) {
      throw new NotFoundError(name);
    }

    const path = this.pathFor(name);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(name);
      }
      throw toFilesystemError(error, path);
    }

    let raw: unknown;
    try {
      raw = yaml.load(content);
    } catch (error) {
      throw new ConfigError(`Failed to parse YAML in ${path}: ${errorMessage(error)}`);
    }

    return parseWithSchema(SubscriptionFileSchema, raw ?? {}, path);
  }

  private async writeDefinition(name: string, definition: SubscriptionFile): Promise<void> {
    const path = this.pathFor(name);
    try {
      // skipInvalid leaves out unset (undefined) settings
      await writeFileAtomic(path, yaml.dump(definition, { skipInvalid: true }));
    } catch (error) {
      throw toFilesystemError(error, path);
    }
  }

  private validateName(name: string): string {
    return parseWithSchema(SubscriptionNameSchema, name, 'subscription name');
  }

  private validateDefinition(name: string, definition: SubscriptionFile): SubscriptionFile {
    return parseWithSchema(SubscriptionFileSchema, definition, `subscription "${name}"`);
  }

  private deriveName(feedUrl: string): string {
    let name: string;
    try {
      name = nameFromUrl(feedUrl);
    } catch {
      throw new ConfigError(`Cannot derive a subscription name from "${feedUrl}"`);
    }
    return this.validateName(name);
  }

  private async uniqueName(base: string): Promise<string> {
    const taken = new Set(await this.names());
    let name = base;
    let counter = 1;
    while (taken.has(name)) {
      name = `${base}-${counter}`;
      counter++;
    }
    return name;
  }

  private toSubscription(name: string, definition: SubscriptionFile): Subscription {
    const subscription: Subscription = {
      name,
      feedUrl: definition.feedUrl,
      contentDir: definition.contentDir
        ? resolve(expandHome(definition.contentDir))
        : join(this.options.contentDir, name),
      filenameTemplate: definition.filenameTemplate ?? this.options.filenameTemplate,
      maxEpisodes: Math.max(0, definition.maxEpisodes ?? 0),
      enabled: definition.enabled ?? true,
    };
    if (definition.title !== undefined) {
      subscription.title = definition.title;
    }
    return subscription;
  }
}

function affectsPaths(before: Subscription, after: Subscription): boolean {
  return (
    before.name !== after.name ||
    before.title !== after.title ||
    before.contentDir !== after.contentDir ||
    before.filenameTemplate !== after.filenameTemplate
  );
}
