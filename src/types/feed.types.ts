import { createEnum } from '../utils/create-enum.js';
import type { FeedCacheToken } from './episode.types.js';

const mediaKind = createEnum(['audio', 'video'] as const);

export const MediaKind = mediaKind.object;

export type MediaKind = typeof mediaKind.type;

/**
 * Media attachment of a feed entry
 */
export type FeedEnclosure = {
  url: string;
  contentType?: string;
};

/**
 * Normalized feed entry, independent of RSS or Atom
 */
export type FeedEntry = {
  guid?: string;
  link?: string;
  title: string;
  publishDate?: Date;
  enclosures: FeedEnclosure[];
};

export type FeedDocument = {
  title?: string;
  entries: FeedEntry[];
};

/**
 * Result of a conditional feed fetch
 */
export type FeedFetchResult =
  | { status: 'not-modified' }
  | { status: 'fetched'; feed: FeedDocument; token: FeedCacheToken };

/**
 * Enclosure selected for download, with its file extension and kind
 */
export type MediaEnclosure = {
  url: string;
  contentType?: string;
  ext: string;
  kind: MediaKind;
};

/**
 * Feed entry not yet in the index
 */
export type NewEpisode = {
  id: string;
  title: string;
  link?: string;
  publishDate: Date;
  enclosures: MediaEnclosure[];
};
