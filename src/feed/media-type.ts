import type { FeedEnclosure, MediaEnclosure, MediaKind } from '../types/feed.types.js';
import { extensionFromUrl } from '../utils/url-utils.js';

const FALLBACK_EXTENSION = 'bin';

/**
 * MIME type without parameters, lower-cased
 */
export function baseContentType(contentType: string | undefined): string | undefined {
  const base = contentType?.split(';')[0]?.trim().toLowerCase();
  return base ? base : undefined;
}

function kindOf(contentType: string | undefined): MediaKind | undefined {
  if (contentType?.startsWith('audio/')) return 'audio';
  if (contentType?.startsWith('video/')) return 'video';
  return undefined;
}

/**
 * Decide whether an enclosure is downloadable media and which file extension
 * and kind it gets.
 *
 * The extension comes from the content-type map, then from the URL path, and
 * falls back to `bin`. The kind comes from the content type; when that is
 * missing or generic, the URL extension is looked up among the map's values.
 *
 * @returns undefined for enclosures that are neither audio nor video
 */
export function classifyEnclosure(
  enclosure: FeedEnclosure,
  contentTypes: Readonly<Record<string, string>>,
): MediaEnclosure | undefined {
  const type = baseContentType(enclosure.contentType);
  const urlExt = extensionFromUrl(enclosure.url);

  let kind = kindOf(type);
  if (kind === undefined && urlExt !== undefined) {
    const match = Object.entries(contentTypes).find(([, ext]) => ext === urlExt);
    kind = kindOf(match?.[0]);
  }
  if (kind === undefined) {
    return undefined;
  }

  const mapped = type !== undefined ? contentTypes[type] : undefined;
  const media: MediaEnclosure = {
    url: enclosure.url,
    ext: mapped ?? urlExt ?? FALLBACK_EXTENSION,
    kind,
  };
  if (enclosure.contentType !== undefined) {
    media.contentType = enclosure.contentType;
  }
  return media;
}
