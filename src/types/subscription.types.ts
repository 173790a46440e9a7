/**
 * A configured podcast feed, with every setting resolved
 */
export type Subscription = {
  /** Unique, directory-safe identifier */
  name: string;
  feedUrl: string;
  /** Display title */
  title?: string;
  /** Absolute content directory */
  contentDir: string;
  filenameTemplate: string;
  /** Retention count, 0 = unlimited */
  maxEpisodes: number;
  enabled: boolean;
};

/**
 * Input of SubscriptionStore.add
 */
export type NewSubscription = {
  feedUrl: string;
  /** Derived from the feed URL when omitted */
  name?: string;
  title?: string;
  contentDir?: string;
  filenameTemplate?: string;
  maxEpisodes?: number;
  enabled?: boolean;
};

/**
 * Fields SubscriptionStore.update may change. `null` resets an optional
 * setting to its default.
 */
export type SubscriptionChanges = {
  name?: string;
  feedUrl?: string;
  title?: string | null;
  contentDir?: string | null;
  filenameTemplate?: string | null;
  maxEpisodes?: number | null;
  enabled?: boolean;
};
