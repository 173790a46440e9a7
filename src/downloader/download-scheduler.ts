import { createWriteStream } from 'node:fs';
import { mkdir, rename } from 'node:fs/promises';
import { dirname } from 'node:path';
import { pipeline } from 'node:stream/promises';
import {
  DownloadError,
  PodkeepError,
  errorMessage,
  isErrnoException,
  toErrorInfo,
  toFilesystemError,
} from '../errors/custom-errors.js';
import type { EventEmitterLike } from '../events/event-dispatcher.js';
import { WorkerPool } from '../queue/worker-pool.js';
import type { EpisodeIndexStore } from '../store/episode-index.js';
import type { Episode } from '../types/episode.types.js';
import type { NewEpisode } from '../types/feed.types.js';
import type { DownloadReport, EpisodeOutcome } from '../types/report.types.js';
import type { Subscription } from '../types/subscription.types.js';
import { deleteIfExists, pathExists, tempPathFor } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';
import { KeyedMutex } from '../utils/mutex.js';
import { disambiguate, renderPath } from './filename-templater.js';
import type { MediaDownloader } from './http-downloader.js';

const log = logger.child('download');

export const SKIPPED_CANCELLED = 'cancelled';
export const SKIPPED_KNOWN = 'already in index';

export type DownloadSchedulerOptions = {
  index: EpisodeIndexStore;
  downloader: MediaDownloader;
  events: EventEmitterLike;
  /** Episodes downloaded at once per subscription */
  workers: number;
  now?: () => Date;
};

export type RunOptions = {
  feedTitle?: string;
  signal?: AbortSignal;
};

/**
 * Downloads new episodes of a subscription with bounded parallelism
 *
 * Every enclosure is streamed into a hidden temp file beside its target and
 * renamed into place once complete. An episode is recorded in the index
 * only when all of its enclosures are in place; a failed episode leaves no
 * files and no index entry behind, so the next run retries it.
 */
export class DownloadScheduler {
  private readonly reserved = new Set<string>();
  private readonly pathLock = new KeyedMutex();
  private readonly now: () => Date;

  constructor(private readonly options: DownloadSchedulerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Download the episodes and report one outcome per episode, in input order
   */
  async run(subscription: Subscription, episodes: readonly NewEpisode[], options: RunOptions = {}): Promise<DownloadReport> {
    const report: DownloadReport = { subscriptionName: subscription.name, outcomes: [] };
    if (episodes.length === 0) {
      return report;
    }

    try {
      await mkdir(subscription.contentDir, { recursive: true });
    } catch (error) {
      const reason = toErrorInfo(toFilesystemError(error, subscription.contentDir));
      report.outcomes = episodes.map(
        (episode): EpisodeOutcome => ({ status: 'failed', episodeId: episode.id, title: episode.title, reason }),
      );
      return report;
    }

    const outcomes: (EpisodeOutcome | undefined)[] = episodes.map(() => undefined);
    const pool = new WorkerPool<number>(
      async (position) => {
        const episode = episodes[position];
        if (episode) {
          outcomes[position] = await this.process(subscription, episode, options);
        }
      },
      { concurrency: this.options.workers },
    );

    const { signal } = options;
    const onAbort = (): void => {
      const unstarted = pool.stop();
      if (unstarted.length > 0) {
        log.info(`${subscription.name}: cancelled, ${unstarted.length} episode(s) not started`);
      }
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      if (signal?.aborted) {
        onAbort();
      } else {
        pool.addAll(episodes.map((_, position) => position));
      }
      await pool.drain();
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    report.outcomes = episodes.map(
      (episode, position) => outcomes[position] ?? skipped(episode, SKIPPED_CANCELLED),
    );
    return report;
  }

  private async process(subscription: Subscription, episode: NewEpisode, options: RunOptions): Promise<EpisodeOutcome> {
    const { signal } = options;
    if (signal?.aborted) {
      return skipped(episode, SKIPPED_CANCELLED);
    }

    let paths: string[] = [];
    const written: string[] = [];
    try {
      const index = await this.options.index.load(subscription.name);
      if (index.contains(episode.id)) {
        log.debug(`${subscription.name}: "${episode.title}" is already in the index`);
        return skipped(episode, SKIPPED_KNOWN);
      }

      paths = await this.reservePaths(subscription, episode, options.feedTitle);
      for (const [position, enclosure] of episode.enclosures.entries()) {
        const target = paths[position];
        if (target === undefined) {
          continue;
        }
        await this.transfer(enclosure.url, target, signal);
        written.push(target);
      }

      const record: Episode = {
        id: episode.id,
        subscriptionName: subscription.name,
        publishDate: episode.publishDate.toISOString(),
        title: episode.title,
        files: [...written],
        downloadedAt: this.now().toISOString(),
        read: false,
      };
      if (episode.link !== undefined) {
        record.link = episode.link;
      }

      const committed = await this.options.index.update(subscription.name, (current) => {
        if (current.contains(episode.id)) {
          return false;
        }
        current.recordDownload(record);
        return true;
      });
      if (!committed) {
        await this.discard(written);
        return skipped(episode, SKIPPED_KNOWN);
      }

      log.success(`${subscription.name}: downloaded "${episode.title}"`);
      this.options.events.emit({
        kind: 'episode_downloaded',
        subscriptionName: subscription.name,
        contentDir: subscription.contentDir,
        episodeId: episode.id,
        title: episode.title,
        files: [...written],
      });
      return { status: 'downloaded', episodeId: episode.id, title: episode.title, files: [...written] };
    } catch (error) {
      await this.discard(written);
      if (signal?.aborted) {
        log.debug(`${subscription.name}: "${episode.title}" aborted`);
        return skipped(episode, SKIPPED_CANCELLED);
      }
      const reason = toErrorInfo(error);
      log.error(`${subscription.name}: "${episode.title}" failed: ${reason.message}`);
      return { status: 'failed', episodeId: episode.id, title: episode.title, reason };
    } finally {
      for (const path of paths) {
        this.reserved.delete(path);
      }
    }
  }

  /**
   * Render and reserve a free path for every enclosure of the episode.
   * Paths are resolved one episode at a time per content directory.
   */
  private reservePaths(subscription: Subscription, episode: NewEpisode, feedTitle?: string): Promise<string[]> {
    return this.pathLock.withLock(subscription.contentDir, async () => {
      const index = await this.options.index.load(subscription.name);
      const owned = new Set(
        index
          .all()
          .filter((known) => known.id !== episode.id)
          .flatMap((known) => known.files),
      );
      const isTaken = async (candidate: string): Promise<boolean> =>
        this.reserved.has(candidate) || owned.has(candidate) || (await pathExists(candidate));

      const paths: string[] = [];
      for (const [enclosureIndex, enclosure] of episode.enclosures.entries()) {
        const rendered = renderPath(subscription.filenameTemplate, {
          subscription,
          episode,
          enclosure,
          enclosureIndex,
          feedTitle,
        });
        const path = await disambiguate(rendered, episode.id, isTaken);
        if (path !== rendered) {
          log.debug(`${subscription.name}: ${rendered} is taken, using ${path}`);
        }
        this.reserved.add(path);
        paths.push(path);
      }
      return paths;
    });
  }

  private async transfer(url: string, target: string, signal?: AbortSignal): Promise<void> {
    const tempPath = tempPathFor(target);
    try {
      // Templates may render into subdirectories
      await mkdir(dirname(target), { recursive: true });
      const body = await this.options.downloader.download(url, signal);
      await pipeline(body, createWriteStream(tempPath), { signal });
      await rename(tempPath, target);
    } catch (error) {
      await this.discard([tempPath]);
      throw wrapTransferError(error, url, target);
    }
  }

  private async discard(paths: readonly string[]): Promise<void> {
    for (const path of paths) {
      try {
        await deleteIfExists(path);
      } catch (error) {
        log.warning(`Could not delete ${path}: ${errorMessage(error)}`);
      }
    }
  }
}

function skipped(episode: NewEpisode, reason: string): EpisodeOutcome {
  return { status: 'skipped', episodeId: episode.id, title: episode.title, reason };
}

function wrapTransferError(error: unknown, url: string, target: string): PodkeepError {
  if (error instanceof PodkeepError) {
    return error;
  }
  if (isErrnoException(error) && error.syscall !== undefined) {
    return toFilesystemError(error, target);
  }
  return new DownloadError(`Transfer failed: ${errorMessage(error)}`, url);
}
