import { createHash } from 'node:crypto';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { type Mock, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DownloadError } from '../errors/custom-errors.js';
import type { EventEmitterLike } from '../events/event-dispatcher.js';
import { EpisodeIndexStore } from '../store/episode-index.js';
import { makeEpisode, makeSubscription } from '../test-fixtures.js';
import type { NewEpisode } from '../types/feed.types.js';
import type { Subscription } from '../types/subscription.types.js';
import { DownloadScheduler } from './download-scheduler.js';
import type { MediaDownloader } from './http-downloader.js';

class FakeDownloader implements MediaDownloader {
  readonly requested: string[] = [];

  constructor(private readonly missing: ReadonlySet<string> = new Set()) {}

  async download(url: string): Promise<Readable> {
    this.requested.push(url);
    if (this.missing.has(url)) {
      throw new DownloadError('HTTP 404: Not Found', url, 404);
    }
    return Readable.from([`bytes of ${url}`]);
  }
}

function newEpisode(id: string, overrides: Partial<NewEpisode> = {}): NewEpisode {
  return {
    id,
    title: `Episode ${id}`,
    publishDate: new Date('2024-01-01T10:00:00Z'),
    enclosures: [{ url: `http://media.example.com/${id}.mp3`, ext: 'mp3', kind: 'audio' }],
    ...overrides,
  };
}

describe('DownloadScheduler', () => {
  let dir: string;
  let index: EpisodeIndexStore;
  let subscription: Subscription;
  let events: { emit: Mock<EventEmitterLike['emit']> };

  const createScheduler = (downloader: MediaDownloader, workers = 1) =>
    new DownloadScheduler({
      index,
      downloader,
      events,
      workers,
      now: () => new Date('2024-02-01T00:00:00Z'),
    });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'podkeep-download-'));
    index = new EpisodeIndexStore(join(dir, 'index'));
    subscription = makeSubscription({ contentDir: join(dir, 'content', 'news') });
    events = { emit: vi.fn<EventEmitterLike['emit']>() };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should record successes and keep going after a failed episode', async () => {
    const downloader = new FakeDownloader(new Set(['http://media.example.com/b.mp3']));
    const episodes = [
      newEpisode('a', { publishDate: new Date('2024-01-01T10:00:00Z') }),
      newEpisode('b', { publishDate: new Date('2024-01-02T10:00:00Z') }),
      newEpisode('c', { publishDate: new Date('2024-01-03T10:00:00Z') }),
    ];

    const report = await createScheduler(downloader).run(subscription, episodes);

    expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['downloaded', 'failed', 'downloaded']);
    expect(report.outcomes[1]).toEqual({
      status: 'failed',
      episodeId: 'b',
      title: 'Episode b',
      reason: { kind: 'DownloadError', message: 'HTTP 404: Not Found' },
    });

    const stored = await index.load('news');
    expect(stored.all().map((episode) => episode.id)).toEqual(['a', 'c']);
    expect(stored.get('a')).toEqual(
      makeEpisode({
        id: 'a',
        publishDate: '2024-01-01T10:00:00.000Z',
        files: [join(subscription.contentDir, '2024-01-01_Episode a.mp3')],
        downloadedAt: '2024-02-01T00:00:00.000Z',
      }),
    );

    expect((await readdir(subscription.contentDir)).sort()).toEqual(['2024-01-01_Episode a.mp3', '2024-01-03_Episode c.mp3']);
    expect(await readFile(join(subscription.contentDir, '2024-01-03_Episode c.mp3'), 'utf-8')).toBe(
      'bytes of http://media.example.com/c.mp3',
    );
    expect(events.emit).toHaveBeenCalledTimes(2);
    expect(events.emit).toHaveBeenCalledWith({
      kind: 'episode_downloaded',
      subscriptionName: 'news',
      contentDir: subscription.contentDir,
      episodeId: 'c',
      title: 'Episode c',
      files: [join(subscription.contentDir, '2024-01-03_Episode c.mp3')],
    });
  });

  it('should remove every file of an episode when one enclosure fails', async () => {
    const downloader = new FakeDownloader(new Set(['http://media.example.com/a-video.mp4']));
    const episode = newEpisode('a', {
      enclosures: [
        { url: 'http://media.example.com/a.mp3', ext: 'mp3', kind: 'audio' },
        { url: 'http://media.example.com/a-video.mp4', ext: 'mp4', kind: 'video' },
      ],
    });

    const report = await createScheduler(downloader).run(subscription, [episode]);

    expect(report.outcomes.map((outcome) => outcome.status)).toEqual(['failed']);
    expect(downloader.requested).toEqual(['http://media.example.com/a.mp3', 'http://media.example.com/a-video.mp4']);
    expect(await readdir(subscription.contentDir)).toEqual([]);
    expect((await index.load('news')).size).toBe(0);
    expect(events.emit).not.toHaveBeenCalled();
  });

  it('should name later enclosures with a position suffix', async () => {
    const episode = newEpisode('a', {
      enclosures: [
        { url: 'http://media.example.com/a.mp3', ext: 'mp3', kind: 'audio' },
        { url: 'http://media.example.com/a-2.mp3', ext: 'mp3', kind: 'audio' },
      ],
    });

    const report = await createScheduler(new FakeDownloader()).run(subscription, [episode]);

    expect(report.outcomes[0]).toEqual({
      status: 'downloaded',
      episodeId: 'a',
      title: 'Episode a',
      files: [
        join(subscription.contentDir, '2024-01-01_Episode a.mp3'),
        join(subscription.contentDir, '2024-01-01_Episode a-2.mp3'),
      ],
    });
  });

  it('should create subdirectories the template renders into', async () => {
    subscription = makeSubscription({ contentDir: join(dir, 'content', 'news'), filenameTemplate: '{year}/{title}' });

    const report = await createScheduler(new FakeDownloader()).run(subscription, [newEpisode('a')]);

    const target = join(subscription.contentDir, '2024', 'Episode a.mp3');
    expect(report.outcomes).toEqual([{ status: 'downloaded', episodeId: 'a', title: 'Episode a', files: [target] }]);
    expect(await readdir(join(subscription.contentDir, '2024'))).toEqual(['Episode a.mp3']);
    expect(await readFile(target, 'utf-8')).toBe('bytes of http://media.example.com/a.mp3');
  });

  it('should give colliding episodes distinct file names', async () => {
    const episodes = [newEpisode('a', { title: 'Same' }), newEpisode('b', { title: 'Same' })];
    const hash = createHash('sha1').update('b').digest('hex').slice(0, 8);

    const report = await createScheduler(new FakeDownloader()).run(subscription, episodes);

    expect(report.outcomes.map((outcome) => (outcome.status === 'downloaded' ? outcome.files : []))).toEqual([
      [join(subscription.contentDir, '2024-01-01_Same.mp3')],
      [join(subscription.contentDir, `2024-01-01_Same_${hash}.mp3`)],
    ]);
  });

  it('should skip episodes that are already in the index', async () => {
    await index.update('news', (current) => {
      current.recordDownload(makeEpisode({ id: 'a', files: ['/elsewhere/a.mp3'] }));
    });
    const downloader = new FakeDownloader();

    const report = await createScheduler(downloader).run(subscription, [newEpisode('a')]);

    expect(report.outcomes).toEqual([{ status: 'skipped', episodeId: 'a', title: 'Episode a', reason: 'already in index' }]);
    expect(downloader.requested).toEqual([]);
  });

  it('should serialise index commits of parallel downloads', async () => {
    const episodes = ['a', 'b', 'c', 'd', 'e'].map((id) => newEpisode(id));

    const report = await createScheduler(new FakeDownloader(), 3).run(subscription, episodes);

    expect(report.outcomes.map((outcome) => outcome.episodeId)).toEqual(['a', 'b', 'c', 'd', 'e']);
    expect(report.outcomes.every((outcome) => outcome.status === 'downloaded')).toBe(true);
    expect((await index.load('news')).size).toBe(5);
    expect(await readdir(subscription.contentDir)).toHaveLength(5);
  });

  it('should skip everything when cancelled before starting', async () => {
    const controller = new AbortController();
    controller.abort();
    const downloader = new FakeDownloader();

    const report = await createScheduler(downloader).run(subscription, [newEpisode('a'), newEpisode('b')], {
      signal: controller.signal,
    });

    expect(report.outcomes.map((outcome) => [outcome.status, outcome.status === 'skipped' ? outcome.reason : ''])).toEqual([
      ['skipped', 'cancelled'],
      ['skipped', 'cancelled'],
    ]);
    expect(downloader.requested).toEqual([]);
  });

  it('should leave no partial file when a transfer is aborted', async () => {
    const controller = new AbortController();
    const downloader: MediaDownloader = {
      download: async (url) => {
        controller.abort();
        throw new DownloadError('This operation was aborted', url);
      },
    };

    const report = await createScheduler(downloader).run(subscription, [newEpisode('a'), newEpisode('b')], {
      signal: controller.signal,
    });

    expect(report.outcomes).toEqual([
      { status: 'skipped', episodeId: 'a', title: 'Episode a', reason: 'cancelled' },
      { status: 'skipped', episodeId: 'b', title: 'Episode b', reason: 'cancelled' },
    ]);
    expect(await readdir(subscription.contentDir)).toEqual([]);
    expect((await index.load('news')).size).toBe(0);
  });
});
