import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { FetchError } from '../errors/custom-errors.js';
import type { FeedDocument, FeedEnclosure, FeedEntry } from '../types/feed.types.js';

/**
 * Parse an RSS 2.0 or Atom document into normalized entries
 *
 * @param xml - Feed document
 * @param url - Feed URL, used in errors
 * @throws FetchError if the document is neither RSS nor Atom
 */
export function parseFeed(xml: string, url: string): FeedDocument {
  const $ = cheerio.load(xml, { xml: true });

  const channel = $('rss > channel').first();
  if (channel.length > 0) {
    return {
      title: textOf(channel, 'title'),
      entries: channel
        .children('item')
        .toArray()
        .map((item) => parseRssItem($, item)),
    };
  }

  const feed = $('feed').first();
  if (feed.length > 0) {
    return {
      title: textOf(feed, 'title'),
      entries: feed
        .children('entry')
        .toArray()
        .map((entry) => parseAtomEntry($, entry)),
    };
  }

  throw new FetchError('Document is neither an RSS nor an Atom feed', url);
}

function parseRssItem($: cheerio.CheerioAPI, item: Element): FeedEntry {
  const $item = $(item);

  const enclosures: FeedEnclosure[] = $item
    .children('enclosure')
    .toArray()
    .flatMap((element) => {
      const $enclosure = $(element);
      return toEnclosure($enclosure.attr('url'), $enclosure.attr('type'));
    });

  return {
    guid: textOf($item, 'guid'),
    link: textOf($item, 'link'),
    title: textOf($item, 'title') ?? '',
    publishDate: parseDate(textOf($item, 'pubDate')),
    enclosures,
  };
}

function parseAtomEntry($: cheerio.CheerioAPI, entry: Element): FeedEntry {
  const $entry = $(entry);
  const links = $entry.children('link').toArray();

  let link: string | undefined;
  const enclosures: FeedEnclosure[] = [];
  for (const element of links) {
    const $link = $(element);
    const rel = $link.attr('rel') ?? 'alternate';
    if (rel === 'enclosure') {
      enclosures.push(...toEnclosure($link.attr('href'), $link.attr('type')));
    } else if (rel === 'alternate' && link === undefined) {
      link = $link.attr('href')?.trim() || undefined;
    }
  }

  return {
    guid: textOf($entry, 'id'),
    link,
    title: textOf($entry, 'title') ?? '',
    publishDate: parseDate(textOf($entry, 'published') ?? textOf($entry, 'updated')),
    enclosures,
  };
}

function toEnclosure(url: string | undefined, type: string | undefined): FeedEnclosure[] {
  const trimmed = url?.trim();
  if (!trimmed) {
    return [];
  }
  const contentType = type?.trim();
  return [contentType ? { url: trimmed, contentType } : { url: trimmed }];
}

/**
 * Trimmed text of the first child element with the given tag, if non-empty
 */
function textOf(parent: cheerio.Cheerio<Element>, tag: string): string | undefined {
  const text = parent.children(tag).first().text().trim();
  return text.length > 0 ? text : undefined;
}

function parseDate(value: string | undefined): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
