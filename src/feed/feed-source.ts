import { FetchError, errorMessage } from '../errors/custom-errors.js';
import type { FeedCacheToken } from '../types/episode.types.js';
import type { FeedFetchResult } from '../types/feed.types.js';
import { logger } from '../utils/logger.js';
import { parseFeed } from './feed-parser.js';

const log = logger.child('feed');

/**
 * Conditional feed fetch
 */
export interface FeedSource {
  /**
   * Fetch and parse a feed. With a cache token the request is conditional
   * and may come back as `not-modified`.
   *
   * @throws FetchError if the feed is unreachable or unparsable
   */
  fetch(url: string, token?: FeedCacheToken, signal?: AbortSignal): Promise<FeedFetchResult>;
}

export type HttpFeedSourceOptions = {
  fetch?: typeof fetch;
  userAgent?: string;
};

export const DEFAULT_USER_AGENT = 'podkeep/0.1 (+podcast downloader)';

/**
 * Feed source over HTTP using If-None-Match / If-Modified-Since
 */
export class HttpFeedSource implements FeedSource {
  private readonly fetchImpl: typeof fetch;
  private readonly userAgent: string;

  constructor(options: HttpFeedSourceOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async fetch(url: string, token?: FeedCacheToken, signal?: AbortSignal): Promise<FeedFetchResult> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5',
    };

    if (token?.etag) {
      headers['If-None-Match'] = token.etag;
    }
    if (token?.lastModified) {
      headers['If-Modified-Since'] = token.lastModified;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers, signal });
    } catch (error) {
      throw new FetchError(`Failed to fetch feed: ${errorMessage(error)}`, url);
    }

    if (response.status === 304) {
      log.debug(`${url} not modified`);
      return { status: 'not-modified' };
    }

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status}: ${response.statusText}`, url, response.status);
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new FetchError(`Failed to read feed: ${errorMessage(error)}`, url);
    }

    const fresh: FeedCacheToken = {};
    const etag = response.headers.get('etag');
    const lastModified = response.headers.get('last-modified');
    if (etag) fresh.etag = etag;
    if (lastModified) fresh.lastModified = lastModified;

    return { status: 'fetched', feed: parseFeed(body, url), token: fresh };
  }
}
