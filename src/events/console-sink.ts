import type { SyncEvent } from '../types/event.types.js';
import { type Logger, logger } from '../utils/logger.js';
import type { EventSink } from './event-sink.js';

/**
 * Sink that logs every event
 */
export class ConsoleSink implements EventSink {
  readonly name = 'console';

  constructor(private readonly log: Logger = logger.child('event')) {}

  handle(event: SyncEvent): void {
    this.log.info(describeEvent(event));
  }
}

export function describeEvent(event: SyncEvent): string {
  switch (event.kind) {
    case 'subscription_added':
      return `Subscription "${event.subscriptionName}" added (${event.contentDir})`;
    case 'subscription_removed':
      return `Subscription "${event.subscriptionName}" removed`;
    case 'subscription_updated':
      return `Subscription "${event.subscriptionName}" updated: ${event.downloadedCount} new episode(s)`;
    case 'episode_downloaded':
      return `Downloaded "${event.title}" for ${event.subscriptionName} (${event.files.length} file(s))`;
    case 'updates_complete':
      return `Updates complete: ${event.downloadedCount} downloaded, ${event.failedCount} failed${event.cancelled ? ', cancelled' : ''}`;
  }
}
