import { z } from 'zod';

/**
 * Downloaded episode record in the index
 */
export const EpisodeSchema = z.object({
  /** Feed guid, or a content hash when the feed has none */
  id: z.string().min(1),
  subscriptionName: z.string(),
  /** ISO 8601 timestamp */
  publishDate: z.string(),
  title: z.string(),
  link: z.string().optional(),
  /** Local file paths, one per enclosure, in feed order */
  files: z.array(z.string()),
  /** ISO 8601 timestamp */
  downloadedAt: z.string(),
  read: z.boolean().default(false),
});

export type Episode = z.infer<typeof EpisodeSchema>;

/**
 * Conditional-fetch validators captured from the last fresh feed response
 */
export const FeedCacheTokenSchema = z.object({
  etag: z.string().optional(),
  lastModified: z.string().optional(),
});

export type FeedCacheToken = z.infer<typeof FeedCacheTokenSchema>;

export const INDEX_VERSION = 1;

/**
 * Index file structure. Unknown fields are dropped on read.
 */
export const IndexDataSchema = z.object({
  version: z.number().int().positive(),
  cacheToken: FeedCacheTokenSchema.default({}),
  episodes: z.array(EpisodeSchema).default([]),
});

export type IndexData = z.infer<typeof IndexDataSchema>;

/**
 * Create a new empty index
 */
export function createEmptyIndex(): IndexData {
  return {
    version: INDEX_VERSION,
    cacheToken: {},
    episodes: [],
  };
}

export function sameCacheToken(a: FeedCacheToken, b: FeedCacheToken): boolean {
  return a.etag === b.etag && a.lastModified === b.lastModified;
}
