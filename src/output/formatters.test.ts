import { describe, expect, it } from 'vitest';
import { makeEpisode, makeSubscription } from '../test-fixtures.js';
import type { UpdateReport } from '../types/report.types.js';
import {
  formatEpisode,
  formatEpisodeChoice,
  formatNowPlaying,
  formatPurgeResult,
  formatSubscriptionSummary,
  formatUpdateReport,
  hasFailures,
} from './formatters.js';

const report: UpdateReport = {
  cancelled: false,
  subscriptions: [
    {
      subscriptionName: 'news',
      status: 'updated',
      episodes: [
        { status: 'downloaded', episodeId: 'a', title: 'A', files: ['/x/a.mp3'] },
        {
          status: 'failed',
          episodeId: 'b',
          title: 'B',
          reason: { kind: 'DownloadError', message: 'HTTP 404: Not Found' },
        },
      ],
      purged: [],
    },
    { subscriptionName: 'sport', status: 'not-modified', episodes: [], purged: [] },
    {
      subscriptionName: 'tech',
      status: 'failed',
      episodes: [],
      purged: [],
      error: { kind: 'FetchError', message: 'HTTP 500: Internal Server Error' },
    },
  ],
};

describe('formatUpdateReport', () => {
  it('should summarise every subscription', () => {
    expect(formatUpdateReport(report)).toEqual([
      'news: updated, 1 downloaded, 1 failed',
      '  failed "B": DownloadError: HTTP 404: Not Found',
      'sport: not-modified',
      'tech: failed (FetchError: HTTP 500: Internal Server Error)',
    ]);
  });

  it('should note a cancelled batch', () => {
    expect(formatUpdateReport({ subscriptions: [], cancelled: true })).toEqual(['Update cancelled']);
  });
});

describe('hasFailures', () => {
  it('should detect failed subscriptions and episodes', () => {
    expect(hasFailures(report)).toBe(true);
    expect(
      hasFailures({
        cancelled: false,
        subscriptions: [{ subscriptionName: 'sport', status: 'not-modified', episodes: [], purged: [] }],
      }),
    ).toBe(false);
  });
});

describe('formatSubscriptionSummary', () => {
  it('should list the settings', () => {
    const subscription = makeSubscription({ title: 'Daily News', maxEpisodes: 3 });
    expect(formatSubscriptionSummary({ subscription, episodeCount: 2 })).toEqual([
      'news',
      '  url:       http://feeds.example.com/news.xml',
      '  title:     Daily News',
      '  directory: /tmp/podkeep-test/news',
      '  template:  {pub_date}_{title}',
      '  keep:      3',
      '  enabled:   yes',
      '  episodes:  2',
    ]);
  });
});

describe('formatEpisode', () => {
  it('should mark unread episodes', () => {
    const episode = makeEpisode({ id: 'a', title: 'Pilot', publishDate: '2024-03-05T12:00:00.000Z', files: ['/x/a.mp3'] });
    expect(formatEpisode(episode)).toEqual(['2024-03-05 news: Pilot *']);
    expect(formatEpisode({ ...episode, read: true })).toEqual(['2024-03-05 news: Pilot']);
    expect(formatEpisode(episode, true)).toEqual(['/x/a.mp3']);
  });
});

describe('formatPurgeResult', () => {
  it('should phrase dry runs differently', () => {
    const episode = makeEpisode({ id: 'a', title: 'Old', publishDate: '2024-01-01T12:00:00.000Z' });
    const result = {
      subscriptionName: 'news',
      purged: [{ episode, fileErrors: [{ path: '/x/a.mp3', error: { kind: 'FilesystemError', message: 'denied' } }] }],
    };

    expect(formatPurgeResult(result, true)).toEqual([
      'news: would remove 1 episode',
      '  2024-01-01 Old',
      '    could not delete /x/a.mp3: denied',
    ]);
    expect(formatPurgeResult({ subscriptionName: 'news', purged: [] }, false)).toEqual(['news: removed 0 episodes']);
  });
});

describe('play output', () => {
  const episode = makeEpisode({
    id: 'a',
    subscriptionName: 'a-rather-long-subscription',
    title: 'Show',
    publishDate: '2024-01-01T12:00:00.000Z',
  });

  it('should align menu entries', () => {
    expect(formatEpisodeChoice(3, episode)).toBe(' 3 | a-rather-long-su | Show');
    expect(formatEpisodeChoice(12, { ...episode, subscriptionName: 'news' })).toBe('12 | news             | Show');
  });

  it('should describe the episode being played', () => {
    expect(formatNowPlaying(episode)).toEqual([
      '*** Playing ***',
      'Podcast:   a-rather-long-subscription',
      'Episode:   Show',
      'Published: 2024-01-01',
    ]);
  });
});
