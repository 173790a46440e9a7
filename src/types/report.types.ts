import type { Episode } from './episode.types.js';

/**
 * Reported error: the error class name and its message
 */
export type ErrorInfo = {
  kind: string;
  message: string;
};

export type EpisodeOutcome =
  | { status: 'downloaded'; episodeId: string; title: string; files: string[] }
  | { status: 'failed'; episodeId: string; title: string; reason: ErrorInfo }
  | { status: 'skipped'; episodeId: string; title: string; reason: string };

export type DownloadReport = {
  subscriptionName: string;
  outcomes: EpisodeOutcome[];
};

/**
 * Episode removed (or, in a dry run, selected for removal) by purge
 */
export type PurgedEpisode = {
  episode: Episode;
  /** Files that could not be deleted, with the reason */
  fileErrors: { path: string; error: ErrorInfo }[];
};

export type SubscriptionStatus = 'updated' | 'unchanged' | 'not-modified' | 'failed' | 'disabled' | 'cancelled';

export type SubscriptionReport = {
  subscriptionName: string;
  status: SubscriptionStatus;
  episodes: EpisodeOutcome[];
  purged: PurgedEpisode[];
  error?: ErrorInfo;
};

export type UpdateReport = {
  subscriptions: SubscriptionReport[];
  cancelled: boolean;
};
