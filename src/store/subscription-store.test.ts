import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AlreadyExistsError, ConfigError, NotFoundError } from '../errors/custom-errors.js';
import { makeEpisode } from '../test-fixtures.js';
import { pathExists } from '../utils/fs-utils.js';
import { EpisodeIndexStore } from './episode-index.js';
import { SubscriptionStore } from './subscription-store.js';

describe('SubscriptionStore', () => {
  let dir: string;
  let index: EpisodeIndexStore;
  let store: SubscriptionStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'podkeep-subs-'));
    index = new EpisodeIndexStore(join(dir, 'index'));
    store = new SubscriptionStore({
      subscriptionsDir: join(dir, 'subscriptions'),
      contentDir: join(dir, 'content'),
      filenameTemplate: '{pub_date}_{title}',
      index,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should list nothing before the first add', async () => {
    expect(await store.list()).toEqual([]);
  });

  it('should add a subscription and resolve defaults', async () => {
    const added = await store.add({ feedUrl: 'http://feeds.example.com/news.xml', name: 'news', maxEpisodes: 3 });

    expect(added).toEqual({
      name: 'news',
      feedUrl: 'http://feeds.example.com/news.xml',
      contentDir: join(dir, 'content', 'news'),
      filenameTemplate: '{pub_date}_{title}',
      maxEpisodes: 3,
      enabled: true,
    });
    expect(await store.get('news')).toEqual(added);
    expect(await readFile(join(dir, 'subscriptions', 'news.yaml'), 'utf-8')).toBe(
      'feedUrl: http://feeds.example.com/news.xml\nmaxEpisodes: 3\n',
    );
  });

  it('should reject an explicit name that is taken', async () => {
    await store.add({ feedUrl: 'http://example.com/a.xml', name: 'news' });
    await expect(store.add({ feedUrl: 'http://example.com/b.xml', name: 'news' })).rejects.toThrow(
      AlreadyExistsError,
    );
  });

  it('should derive unique names from the feed URL', async () => {
    const first = await store.add({ feedUrl: 'http://www.example.com/a.xml' });
    const second = await store.add({ feedUrl: 'http://example.com/b.xml' });
    const third = await store.add({ feedUrl: 'https://example.com/c.xml' });

    expect([first.name, second.name, third.name]).toEqual(['example.com', 'example.com-1', 'example.com-2']);
  });

  it('should reject invalid names and URLs', async () => {
    await expect(store.add({ feedUrl: 'http://example.com/a.xml', name: '../escape' })).rejects.toThrow(ConfigError);
    await expect(store.add({ feedUrl: 'not a url', name: 'news' })).rejects.toThrow(ConfigError);
  });

  it('should raise NotFoundError for unknown names', async () => {
    await expect(store.get('missing')).rejects.toThrow(NotFoundError);
    await expect(store.remove('missing', false)).rejects.toThrow(NotFoundError);
    await expect(store.update('missing', { enabled: false })).rejects.toThrow(NotFoundError);
  });

  it('should update fields and reset them with null', async () => {
    await store.add({ feedUrl: 'http://example.com/a.xml', name: 'news', title: 'News', maxEpisodes: 5 });

    const updated = await store.update('news', { enabled: false, maxEpisodes: null, title: 'Daily News' });

    expect(updated.enabled).toBe(false);
    expect(updated.maxEpisodes).toBe(0);
    expect(updated.title).toBe('Daily News');
    expect(await store.get('news')).toEqual(updated);
  });

  it('should read negative retention counts as unlimited', async () => {
    await mkdir(join(dir, 'subscriptions'), { recursive: true });
    await writeFile(join(dir, 'subscriptions', 'old.yaml'), 'feedUrl: http://example.com/a.xml\nmaxEpisodes: -1\n');

    expect((await store.get('old')).maxEpisodes).toBe(0);
  });

  it('should rename the definition and the index', async () => {
    await store.add({ feedUrl: 'http://example.com/a.xml', name: 'news' });
    await index.update('news', (current) => {
      current.recordDownload(makeEpisode({ id: 'a' }));
    });
    await store.add({ feedUrl: 'http://example.com/b.xml', name: 'taken' });

    await expect(store.update('news', { name: 'taken' })).rejects.toThrow(AlreadyExistsError);

    const renamed = await store.update('news', { name: 'daily' });

    expect(renamed.name).toBe('daily');
    expect(renamed.contentDir).toBe(join(dir, 'content', 'daily'));
    expect(await store.exists('news')).toBe(false);
    expect((await index.load('daily')).get('a')?.subscriptionName).toBe('daily');
  });

  it('should move downloaded files along with a rename when asked', async () => {
    await store.add({ feedUrl: 'http://example.com/a.xml', name: 'news' });
    const oldFile = join(dir, 'content', 'news', '2024-01-01_Episode a.mp3');
    await mkdir(join(dir, 'content', 'news'), { recursive: true });
    await writeFile(oldFile, 'audio');
    await index.update('news', (current) => current.recordDownload(makeEpisode({ id: 'a', files: [oldFile] })));

    await store.update('news', { name: 'daily', filenameTemplate: '{subscription_name}-{title}' }, { moveFiles: true });

    const newFile = join(dir, 'content', 'daily', 'daily-Episode a.mp3');
    expect((await index.load('daily')).get('a')?.files).toEqual([newFile]);
    expect(await readFile(newFile, 'utf-8')).toBe('audio');
    expect(await pathExists(oldFile)).toBe(false);
  });

  it('should leave files in place without moveFiles', async () => {
    await store.add({ feedUrl: 'http://example.com/a.xml', name: 'news' });
    const oldFile = join(dir, 'content', 'news', '2024-01-01_Episode a.mp3');
    await mkdir(join(dir, 'content', 'news'), { recursive: true });
    await writeFile(oldFile, 'audio');
    await index.update('news', (current) => current.recordDownload(makeEpisode({ id: 'a', files: [oldFile] })));

    await store.update('news', { title: 'Daily' });

    expect((await index.load('news')).get('a')?.files).toEqual([oldFile]);
    expect(await pathExists(oldFile)).toBe(true);
  });

  it('should refuse a template that cannot be rendered', async () => {
    await store.add({ feedUrl: 'http://example.com/a.xml', name: 'news' });

    await expect(store.update('news', { filenameTemplate: '{nope}' })).rejects.toThrow('Unknown placeholder "{nope}"');
    expect((await store.get('news')).filenameTemplate).toBe('{pub_date}_{title}');
  });

  it('should remove the index and optionally the downloaded files', async () => {
    await store.add({ feedUrl: 'http://example.com/a.xml', name: 'keep' });
    await store.add({ feedUrl: 'http://example.com/b.xml', name: 'wipe' });
    await mkdir(join(dir, 'content'), { recursive: true });
    const keptFile = join(dir, 'content', 'keep.mp3');
    const wipedFile = join(dir, 'content', 'wipe.mp3');
    await writeFile(keptFile, 'x');
    await writeFile(wipedFile, 'x');
    await index.update('keep', (current) => current.recordDownload(makeEpisode({ id: 'a', files: [keptFile] })));
    await index.update('wipe', (current) => current.recordDownload(makeEpisode({ id: 'b', files: [wipedFile] })));

    await store.remove('keep', false);
    await store.remove('wipe', true);

    expect(await store.list()).toEqual([]);
    expect(await pathExists(index.pathFor('keep'))).toBe(false);
    expect(await pathExists(keptFile)).toBe(true);
    expect(await pathExists(wipedFile)).toBe(false);
  });

  it('should report broken definitions without hiding the others', async () => {
    await store.add({ feedUrl: 'http://example.com/a.xml', name: 'good' });
    await writeFile(join(dir, 'subscriptions', 'broken.yaml'), 'feedUrl: [unterminated');

    const listing = await store.listAll();

    expect(listing.subscriptions.map((subscription) => subscription.name)).toEqual(['good']);
    expect(listing.errors).toHaveLength(1);
    expect(listing.errors[0]?.name).toBe('broken');
    expect(listing.errors[0]?.error.kind).toBe('ConfigError');
  });
});
