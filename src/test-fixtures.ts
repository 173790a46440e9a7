import type { Episode } from './types/episode.types.js';
import type { Subscription } from './types/subscription.types.js';

export function makeEpisode(overrides: Partial<Episode> & Pick<Episode, 'id'>): Episode {
  return {
    subscriptionName: 'news',
    publishDate: '2024-01-01T00:00:00.000Z',
    title: `Episode ${overrides.id}`,
    files: [],
    downloadedAt: '2024-01-02T00:00:00.000Z',
    read: false,
    ...overrides,
  };
}

export function makeSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    name: 'news',
    feedUrl: 'http://feeds.example.com/news.xml',
    contentDir: '/tmp/podkeep-test/news',
    filenameTemplate: '{pub_date}_{title}',
    maxEpisodes: 0,
    enabled: true,
    ...overrides,
  };
}
