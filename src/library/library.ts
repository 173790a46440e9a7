import { NotFoundError } from '../errors/custom-errors.js';
import type { EventEmitterLike } from '../events/event-dispatcher.js';
import { purge } from '../retention/purge-engine.js';
import type { EpisodeIndexStore } from '../store/episode-index.js';
import { selectSubscriptions } from '../store/subscription-selection.js';
import type { SubscriptionStore, UpdateOptions } from '../store/subscription-store.js';
import type { Episode } from '../types/episode.types.js';
import type { PurgedEpisode } from '../types/report.types.js';
import type { NewSubscription, Subscription, SubscriptionChanges } from '../types/subscription.types.js';
import { logger } from '../utils/logger.js';
import { formatLocalDate } from '../utils/time-utils.js';

const log = logger.child('library');

export type LibraryOptions = {
  store: SubscriptionStore;
  index: EpisodeIndexStore;
  events: EventEmitterLike;
  ignore?: readonly string[];
};

export type SubscriptionSummary = {
  subscription: Subscription;
  /** Episodes in the index */
  episodeCount: number;
  lastDownloadedAt?: string;
};

export type EpisodeQuery = {
  patterns?: readonly string[];
  /** First publish day to include, `yyyy-mm-dd` */
  since?: string;
  /** Last publish day to include, `yyyy-mm-dd` */
  until?: string;
  /** Newest N episodes; all when omitted */
  limit?: number;
};

export type PurgeResult = {
  subscriptionName: string;
  purged: PurgedEpisode[];
};

export type MarkResult = {
  changed: string[];
  /** Ids not present in the index */
  unknown: string[];
};

/**
 * Subscription and episode management behind the CLI commands other than
 * `update`
 */
export class Library {
  constructor(private readonly options: LibraryOptions) {}

  async addSubscription(request: NewSubscription): Promise<Subscription> {
    const subscription = await this.options.store.add(request);
    this.options.events.emit({
      kind: 'subscription_added',
      subscriptionName: subscription.name,
      contentDir: subscription.contentDir,
    });
    return subscription;
  }

  async removeSubscription(name: string, deleteEpisodes = false): Promise<Subscription> {
    const subscription = await this.options.store.remove(name, deleteEpisodes);
    this.options.events.emit({
      kind: 'subscription_removed',
      subscriptionName: subscription.name,
      contentDir: subscription.contentDir,
    });
    return subscription;
  }

  editSubscription(name: string, changes: SubscriptionChanges, options: UpdateOptions = {}): Promise<Subscription> {
    return this.options.store.update(name, changes, options);
  }

  /**
   * @throws NotFoundError if a plain name matches no subscription
   */
  async showSubscriptions(patterns: readonly string[] = []): Promise<SubscriptionSummary[]> {
    const subscriptions = await this.select(patterns);
    const summaries: SubscriptionSummary[] = [];

    for (const subscription of subscriptions) {
      const index = await this.options.index.load(subscription.name);
      const summary: SubscriptionSummary = { subscription, episodeCount: index.size };
      const last = index
        .all()
        .map((episode) => episode.downloadedAt)
        .sort()
        .at(-1);
      if (last !== undefined) {
        summary.lastDownloadedAt = last;
      }
      summaries.push(summary);
    }

    return summaries;
  }

  /**
   * Episodes of the selected subscriptions, newest first by publish date
   *
   * @throws NotFoundError if a plain name matches no subscription
   */
  async listEpisodes(query: EpisodeQuery = {}): Promise<Episode[]> {
    const subscriptions = await this.select(query.patterns ?? []);
    const episodes: Episode[] = [];

    for (const subscription of subscriptions) {
      const index = await this.options.index.load(subscription.name);
      for (const episode of index.all()) {
        const day = formatLocalDate(new Date(episode.publishDate));
        if (query.since !== undefined && day < query.since) continue;
        if (query.until !== undefined && day > query.until) continue;
        episodes.push(episode);
      }
    }

    episodes.sort(
      (a, b) =>
        Date.parse(b.publishDate) - Date.parse(a.publishDate) || Date.parse(b.downloadedAt) - Date.parse(a.downloadedAt),
    );
    return query.limit === undefined ? episodes : episodes.slice(0, Math.max(0, query.limit));
  }

  /**
   * Apply retention to the selected subscriptions. Without `dryRun` files
   * are deleted and the indexes saved.
   *
   * @throws NotFoundError if a plain name matches no subscription
   */
  async purge(patterns: readonly string[] = [], dryRun = false): Promise<PurgeResult[]> {
    const subscriptions = await this.select(patterns);
    const results: PurgeResult[] = [];

    for (const subscription of subscriptions) {
      if (subscription.maxEpisodes <= 0) {
        log.debug(`${subscription.name}: no retention limit`);
        results.push({ subscriptionName: subscription.name, purged: [] });
        continue;
      }

      const purged = dryRun
        ? await purge(subscription, await this.options.index.load(subscription.name), true)
        : await this.options.index.update(subscription.name, (index) => purge(subscription, index));
      results.push({ subscriptionName: subscription.name, purged });
    }

    return results;
  }

  /**
   * Set the read flag of episodes
   *
   * @throws NotFoundError if there is no such subscription
   */
  async markRead(name: string, ids: readonly string[], read = true): Promise<MarkResult> {
    await this.options.store.get(name);

    return this.options.index.update(name, (index) => {
      const result: MarkResult = { changed: [], unknown: [] };
      for (const id of ids) {
        if (index.setRead(id, read)) {
          result.changed.push(id);
        } else {
          result.unknown.push(id);
        }
      }
      return result;
    });
  }

  private async select(patterns: readonly string[]): Promise<Subscription[]> {
    const selection = await selectSubscriptions(this.options.store, patterns, this.options.ignore);
    const [missing] = selection.missing;
    if (missing !== undefined) {
      throw new NotFoundError(missing);
    }
    for (const { name, error } of selection.errors) {
      log.error(`Skipping subscription "${name}": ${error.message}`);
    }
    return selection.subscriptions;
  }
}
