import { describe, expect, it } from 'vitest';
import { FetchError } from '../errors/custom-errors.js';
import { parseFeed } from './feed-parser.js';

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Test Radio</title>
    <item>
      <title>First Show</title>
      <link>http://example.com/shows/1</link>
      <guid isPermaLink="false">show-1</guid>
      <pubDate>Sun, 29 Mar 2015 10:00:00 GMT</pubDate>
      <enclosure url="http://example.com/media/1.mp3" type="audio/mpeg" length="100"/>
    </item>
    <item>
      <title>Second Show</title>
      <pubDate>not a date</pubDate>
      <enclosure url="http://example.com/media/2a.mp3"/>
      <enclosure url=" http://example.com/media/2b.m4a " type="audio/x-m4a"/>
      <enclosure type="audio/mpeg"/>
    </item>
  </channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Cast</title>
  <entry>
    <title>Atom One</title>
    <id>urn:uuid:0001</id>
    <updated>2020-01-02T03:04:05Z</updated>
    <link href="http://example.com/atom/1"/>
    <link rel="enclosure" type="video/mp4" href="http://example.com/atom/1.mp4"/>
  </entry>
</feed>`;

describe('parseFeed', () => {
  it('should parse RSS items', () => {
    const feed = parseFeed(RSS, 'http://example.com/feed.xml');

    expect(feed.title).toBe('Test Radio');
    expect(feed.entries).toEqual([
      {
        guid: 'show-1',
        link: 'http://example.com/shows/1',
        title: 'First Show',
        publishDate: new Date('2015-03-29T10:00:00.000Z'),
        enclosures: [{ url: 'http://example.com/media/1.mp3', contentType: 'audio/mpeg' }],
      },
      {
        guid: undefined,
        link: undefined,
        title: 'Second Show',
        publishDate: undefined,
        enclosures: [
          { url: 'http://example.com/media/2a.mp3' },
          { url: 'http://example.com/media/2b.m4a', contentType: 'audio/x-m4a' },
        ],
      },
    ]);
  });

  it('should parse Atom entries', () => {
    const feed = parseFeed(ATOM, 'http://example.com/atom.xml');

    expect(feed.title).toBe('Atom Cast');
    expect(feed.entries).toEqual([
      {
        guid: 'urn:uuid:0001',
        link: 'http://example.com/atom/1',
        title: 'Atom One',
        publishDate: new Date('2020-01-02T03:04:05Z'),
        enclosures: [{ url: 'http://example.com/atom/1.mp4', contentType: 'video/mp4' }],
      },
    ]);
  });

  it('should reject documents that are not feeds', () => {
    expect(() => parseFeed('<html><body>hi</body></html>', 'http://example.com/')).toThrow(FetchError);
  });
});
