import { createHash } from 'node:crypto';
import type { EpisodeIndex } from '../store/episode-index.js';
import type { FeedCacheToken } from '../types/episode.types.js';
import type { FeedEntry, MediaEnclosure, NewEpisode } from '../types/feed.types.js';
import type { Subscription } from '../types/subscription.types.js';
import { logger } from '../utils/logger.js';
import type { FeedSource } from './feed-source.js';
import { classifyEnclosure } from './media-type.js';

const log = logger.child('diff');

export type DiffOptions = {
  /** Fetch unconditionally, ignoring the stored cache token */
  force?: boolean;
  signal?: AbortSignal;
};

export type DiffResult =
  | { status: 'not-modified' }
  | {
      status: 'fetched';
      /** Oldest first */
      newEpisodes: NewEpisode[];
      token: FeedCacheToken;
      feedTitle?: string;
    };

/**
 * Stable id of a feed entry: its guid, or the SHA-1 of link, title and
 * publish date, NUL-separated, when the guid is missing
 */
export function episodeId(entry: FeedEntry): string {
  const guid = entry.guid?.trim();
  if (guid) {
    return guid;
  }
  return createHash('sha1')
    .update([entry.link ?? '', entry.title, entry.publishDate?.toISOString() ?? ''].join('\0'))
    .digest('hex');
}

/**
 * Decides which feed entries are new for a subscription
 */
export class FeedDiffEngine {
  constructor(
    private readonly source: FeedSource,
    private readonly contentTypes: Readonly<Record<string, string>>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Fetch the subscription's feed (conditionally unless forced) and return
   * the entries the index does not know yet. Reads the index, never writes it.
   *
   * @throws FetchError if the feed cannot be fetched or parsed
   */
  async diff(subscription: Subscription, index: EpisodeIndex, options: DiffOptions = {}): Promise<DiffResult> {
    const token = options.force ? undefined : index.cacheToken;
    const result = await this.source.fetch(subscription.feedUrl, token, options.signal);

    if (result.status === 'not-modified') {
      return result;
    }

    const newEpisodes = this.selectNew(result.feed.entries, index);
    log.debug(`${subscription.name}: ${result.feed.entries.length} entries, ${newEpisodes.length} new`);

    const diff: DiffResult = { status: 'fetched', newEpisodes, token: result.token };
    if (result.feed.title !== undefined) {
      diff.feedTitle = result.feed.title;
    }
    return diff;
  }

  /**
   * Entries whose id is not in the index and that carry at least one audio
   * or video enclosure, sorted by publish date ascending. Undated entries
   * follow in feed order and are stamped with the current time.
   */
  selectNew(entries: readonly FeedEntry[], index: EpisodeIndex): NewEpisode[] {
    const seen = new Set<string>();
    const dated: NewEpisode[] = [];
    const undated: NewEpisode[] = [];
    const stamp = this.now();

    for (const entry of entries) {
      const id = episodeId(entry);
      if (seen.has(id) || index.contains(id)) {
        continue;
      }
      seen.add(id);

      const enclosures = entry.enclosures.flatMap((enclosure): MediaEnclosure[] => {
        const media = classifyEnclosure(enclosure, this.contentTypes);
        return media ? [media] : [];
      });
      if (enclosures.length === 0) {
        log.debug(`Ignoring "${entry.title}": no audio or video enclosure`);
        continue;
      }

      const episode: NewEpisode = {
        id,
        title: entry.title,
        publishDate: entry.publishDate ?? stamp,
        enclosures,
      };
      if (entry.link !== undefined) {
        episode.link = entry.link;
      }

      (entry.publishDate ? dated : undated).push(episode);
    }

    // Array.prototype.sort is stable, so equal dates keep feed order
    dated.sort((a, b) => a.publishDate.getTime() - b.publishDate.getTime());
    return [...dated, ...undated];
  }
}
