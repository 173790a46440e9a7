import { describe, expect, it, vi } from 'vitest';
import { FetchError } from '../errors/custom-errors.js';
import { HttpFeedSource } from './feed-source.js';

const FEED = `<rss version="2.0"><channel><title>T</title>
<item><guid>a</guid><title>A</title><enclosure url="http://example.com/a.mp3" type="audio/mpeg"/></item>
</channel></rss>`;

function fakeFetch(response: Response) {
  return vi.fn<typeof fetch>().mockResolvedValue(response);
}

describe('HttpFeedSource', () => {
  it('should send conditional headers from the cache token', async () => {
    const fetchMock = fakeFetch(new Response(null, { status: 304 }));
    const source = new HttpFeedSource({ fetch: fetchMock, userAgent: 'test-agent' });

    const result = await source.fetch('http://example.com/feed.xml', {
      etag: '"v1"',
      lastModified: 'Mon, 01 Jan 2024 00:00:00 GMT',
    });

    expect(result).toEqual({ status: 'not-modified' });
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({
      'User-Agent': 'test-agent',
      Accept: 'application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.5',
      'If-None-Match': '"v1"',
      'If-Modified-Since': 'Mon, 01 Jan 2024 00:00:00 GMT',
    });
  });

  it('should return the parsed feed and fresh token', async () => {
    const source = new HttpFeedSource({
      fetch: fakeFetch(new Response(FEED, { status: 200, headers: { ETag: '"v2"' } })),
    });

    const result = await source.fetch('http://example.com/feed.xml');

    expect(result.status).toBe('fetched');
    if (result.status === 'fetched') {
      expect(result.token).toEqual({ etag: '"v2"' });
      expect(result.feed.entries.map((entry) => entry.guid)).toEqual(['a']);
    }
  });

  it('should raise FetchError for HTTP errors and network failures', async () => {
    const notFound = new HttpFeedSource({ fetch: fakeFetch(new Response('gone', { status: 404 })) });
    await expect(notFound.fetch('http://example.com/feed.xml')).rejects.toMatchObject({
      name: 'FetchError',
      status: 404,
    });

    const offline = new HttpFeedSource({ fetch: vi.fn<typeof fetch>().mockRejectedValue(new Error('ECONNREFUSED')) });
    await expect(offline.fetch('http://example.com/feed.xml')).rejects.toThrow(FetchError);
  });
});
