import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { StoreError, errorMessage, isErrnoException } from '../errors/custom-errors.js';
import {
  createEmptyIndex,
  type Episode,
  type FeedCacheToken,
  type IndexData,
  IndexDataSchema,
  INDEX_VERSION,
} from '../types/episode.types.js';
import { deleteIfExists, pathExists, writeFileAtomic } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';
import { KeyedMutex } from '../utils/mutex.js';

const log = logger.child('index');

/**
 * In-memory index of one subscription: known episodes plus the feed cache token
 */
export class EpisodeIndex {
  private episodes: Episode[];
  private token: FeedCacheToken;
  private changed = false;

  constructor(data: IndexData = createEmptyIndex()) {
    this.episodes = data.episodes.map((episode) => ({ ...episode, files: [...episode.files] }));
    this.token = { ...data.cacheToken };
  }

  get cacheToken(): FeedCacheToken {
    return { ...this.token };
  }

  /**
   * Whether anything was changed since the index was loaded
   */
  get modified(): boolean {
    return this.changed;
  }

  get size(): number {
    return this.episodes.length;
  }

  contains(id: string): boolean {
    return this.episodes.some((episode) => episode.id === id);
  }

  get(id: string): Episode | undefined {
    return this.episodes.find((episode) => episode.id === id);
  }

  /**
   * All episodes in insertion order
   */
  all(): Episode[] {
    return [...this.episodes];
  }

  /**
   * Episodes with at least one local file
   */
  downloaded(): Episode[] {
    return this.episodes.filter((episode) => episode.files.length > 0);
  }

  /**
   * Append the episode, or replace the entry with the same id in place
   */
  recordDownload(episode: Episode): void {
    const position = this.episodes.findIndex((existing) => existing.id === episode.id);
    if (position === -1) {
      this.episodes.push(episode);
    } else {
      this.episodes[position] = episode;
    }
    this.changed = true;
  }

  /**
   * @returns whether an entry was removed
   */
  remove(id: string): boolean {
    const before = this.episodes.length;
    this.episodes = this.episodes.filter((episode) => episode.id !== id);
    const removed = this.episodes.length !== before;
    if (removed) this.changed = true;
    return removed;
  }

  /**
   * @returns whether the episode exists
   */
  setRead(id: string, read: boolean): boolean {
    const episode = this.get(id);
    if (!episode) return false;
    if (episode.read !== read) this.changed = true;
    episode.read = read;
    return true;
  }

  updateCacheToken(etag: string | undefined, lastModified: string | undefined): void {
    this.token = {};
    if (etag !== undefined) this.token.etag = etag;
    if (lastModified !== undefined) this.token.lastModified = lastModified;
    this.changed = true;
  }

  toData(): IndexData {
    return {
      version: INDEX_VERSION,
      cacheToken: this.cacheToken,
      episodes: this.episodes.map((episode) => ({ ...episode, files: [...episode.files] })),
    };
  }
}

/**
 * Persistence of per-subscription indexes as `<indexDir>/<name>.json`
 *
 * Files are replaced atomically. Read-modify-write cycles for one
 * subscription should run inside `withLock` (or `update`), which serialises
 * them per subscription name.
 */
export class EpisodeIndexStore {
  private readonly mutex = new KeyedMutex();

  constructor(private readonly indexDir: string) {}

  pathFor(subscriptionName: string): string {
    return join(this.indexDir, `${subscriptionName}.json`);
  }

  /**
   * Load the index of a subscription; an index that does not exist yet is empty
   *
   * @throws StoreError if the file cannot be read or is malformed
   */
  async load(subscriptionName: string): Promise<EpisodeIndex> {
    const path = this.pathFor(subscriptionName);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return new EpisodeIndex();
      }
      throw new StoreError(`Failed to read index: ${errorMessage(error)}`, path);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StoreError(`Index is not valid JSON: ${errorMessage(error)}`, path);
    }

    const result = IndexDataSchema.safeParse(raw);
    if (!result.success) {
      throw new StoreError(`Index has an unexpected structure: ${result.error.issues[0]?.message ?? 'invalid'}`, path);
    }
    if (result.data.version > INDEX_VERSION) {
      log.warning(`Index ${path} has version ${result.data.version}, newer than ${INDEX_VERSION}; reading known fields`);
    }

    return new EpisodeIndex(result.data);
  }

  /**
   * Replace the persisted index atomically
   *
   * @throws StoreError if the file cannot be written
   */
  async save(subscriptionName: string, index: EpisodeIndex): Promise<void> {
    const path = this.pathFor(subscriptionName);
    try {
      await writeFileAtomic(path, `${JSON.stringify(index.toData(), null, 2)}\n`);
    } catch (error) {
      throw new StoreError(`Failed to write index: ${errorMessage(error)}`, path);
    }
  }

  /**
   * Execute a function while holding the subscription's index lock
   */
  withLock<T>(subscriptionName: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.withLock(subscriptionName, fn);
  }

  /**
   * Load, modify and save under the subscription's lock. Nothing is
   * written when `fn` leaves the index unmodified.
   *
   * @returns the result of `fn`
   */
  update<T>(subscriptionName: string, fn: (index: EpisodeIndex) => T | Promise<T>): Promise<T> {
    return this.withLock(subscriptionName, async () => {
      const index = await this.load(subscriptionName);
      const result = await fn(index);
      if (index.modified) {
        await this.save(subscriptionName, index);
      }
      return result;
    });
  }

  /**
   * Delete the index file of a subscription, if any
   */
  async delete(subscriptionName: string): Promise<void> {
    const path = this.pathFor(subscriptionName);
    await this.withLock(subscriptionName, async () => {
      try {
        await deleteIfExists(path);
      } catch (error) {
        throw new StoreError(`Failed to delete index: ${errorMessage(error)}`, path);
      }
    });
  }

  /**
   * Move an index to a new subscription name, rewriting the back-references
   */
  async rename(from: string, to: string): Promise<void> {
    await this.withLock(from, async () => {
      if (!(await pathExists(this.pathFor(from)))) {
        return;
      }
      const index = await this.load(from);
      for (const episode of index.all()) {
        index.recordDownload({ ...episode, subscriptionName: to });
      }
      await this.save(to, index);
      try {
        await deleteIfExists(this.pathFor(from));
      } catch (error) {
        throw new StoreError(`Failed to remove old index: ${errorMessage(error)}`, this.pathFor(from));
      }
    });
  }
}
