import { createEnum } from '../utils/create-enum.js';

const eventKind = createEnum([
  'subscription_added',
  'subscription_removed',
  'subscription_updated',
  'episode_downloaded',
  'updates_complete',
] as const);

export const EventKind = eventKind.object;

export type EventKind = typeof eventKind.type;

export const EventKindValues = eventKind.values;

type SubscriptionPayload = {
  subscriptionName: string;
  contentDir: string;
};

export type SubscriptionAddedEvent = SubscriptionPayload & { kind: 'subscription_added' };

export type SubscriptionRemovedEvent = SubscriptionPayload & { kind: 'subscription_removed' };

export type SubscriptionUpdatedEvent = SubscriptionPayload & {
  kind: 'subscription_updated';
  downloadedCount: number;
};

export type EpisodeDownloadedEvent = SubscriptionPayload & {
  kind: 'episode_downloaded';
  episodeId: string;
  title: string;
  files: string[];
};

export type UpdatesCompleteEvent = {
  kind: 'updates_complete';
  /** Subscriptions that got at least one new episode */
  updated: SubscriptionPayload[];
  downloadedCount: number;
  failedCount: number;
  cancelled: boolean;
};

export type SyncEvent =
  | SubscriptionAddedEvent
  | SubscriptionRemovedEvent
  | SubscriptionUpdatedEvent
  | EpisodeDownloadedEvent
  | UpdatesCompleteEvent;

/**
 * Event payload for a given kind
 */
export type SyncEventOf<K extends EventKind> = Extract<SyncEvent, { kind: K }>;
