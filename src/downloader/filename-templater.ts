import { createHash } from 'node:crypto';
import { extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { InvalidTemplateError } from '../errors/custom-errors.js';
import type { MediaEnclosure } from '../types/feed.types.js';
import type { Subscription } from '../types/subscription.types.js';
import { sanitizeFilename } from '../utils/filename-sanitizer.js';

export const PLACEHOLDERS = [
  'pub_date',
  'year',
  'month',
  'day',
  'hour',
  'minute',
  'second',
  'title',
  'feed_title',
  'subscription_name',
  'id',
  'ext',
  'kind',
] as const;

export type Placeholder = (typeof PLACEHOLDERS)[number];

type TemplatePart = { literal: string } | { placeholder: Placeholder };

/**
 * Episode data a template is rendered from
 */
export type TemplateContext = {
  subscription: Pick<Subscription, 'name' | 'title' | 'contentDir'>;
  episode: { id: string; title: string; publishDate: Date };
  enclosure: Pick<MediaEnclosure, 'ext' | 'kind'>;
  /** Position of the enclosure within the episode, 0-based */
  enclosureIndex?: number;
  feedTitle?: string;
};

function isPlaceholder(name: string): name is Placeholder {
  return PLACEHOLDERS.some((placeholder) => placeholder === name);
}

/**
 * Split a template into literal text and placeholders
 *
 * @throws InvalidTemplateError on unknown placeholders or unbalanced braces
 */
export function parseTemplate(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let position = 0;

  while (position < template.length) {
    const open = template.indexOf('{', position);
    const strayClose = template.indexOf('}', position);

    if (strayClose !== -1 && (open === -1 || strayClose < open)) {
      throw new InvalidTemplateError(`Unbalanced "}" at position ${strayClose}`, template);
    }
    if (open === -1) {
      parts.push({ literal: template.slice(position) });
      break;
    }
    if (open > position) {
      parts.push({ literal: template.slice(position, open) });
    }

    const close = template.indexOf('}', open);
    if (close === -1) {
      throw new InvalidTemplateError(`Unbalanced "{" at position ${open}`, template);
    }
    const name = template.slice(open + 1, close);
    if (!isPlaceholder(name)) {
      throw new InvalidTemplateError(`Unknown placeholder "{${name}}"`, template);
    }
    parts.push({ placeholder: name });
    position = close + 1;
  }

  return parts;
}

function pad(value: number, length = 2): string {
  return value.toString().padStart(length, '0');
}

function placeholderValues(context: TemplateContext): Record<Placeholder, string> {
  const date = context.episode.publishDate;
  const year = pad(date.getUTCFullYear(), 4);
  const month = pad(date.getUTCMonth() + 1);
  const day = pad(date.getUTCDate());

  return {
    pub_date: `${year}-${month}-${day}`,
    year,
    month,
    day,
    hour: pad(date.getUTCHours()),
    minute: pad(date.getUTCMinutes()),
    second: pad(date.getUTCSeconds()),
    title: sanitizeFilename(context.episode.title),
    feed_title: sanitizeFilename(context.feedTitle ?? context.subscription.title ?? context.subscription.name),
    subscription_name: context.subscription.name,
    id: sanitizeFilename(context.episode.id),
    ext: context.enclosure.ext,
    kind: context.enclosure.kind,
  };
}

/**
 * Render the absolute file path of one enclosure
 *
 * `.<ext>` is appended unless the file name already ends with it, even
 * when `{ext}` appears elsewhere in the template. The second and later
 * enclosures of an episode get `-2`, `-3`, ... before the extension.
 *
 * @throws InvalidTemplateError if the template is invalid or the path
 *   would leave the content directory
 */
export function renderPath(template: string, context: TemplateContext): string {
  const parts = parseTemplate(template);
  const values = placeholderValues(context);

  let rendered = parts.map((part) => ('literal' in part ? part.literal : values[part.placeholder])).join('');
  if (rendered.length === 0 || rendered.endsWith('/')) {
    throw new InvalidTemplateError('Template does not render to a file name', template);
  }

  const ext = `.${context.enclosure.ext}`;
  if (!rendered.toLowerCase().endsWith(ext.toLowerCase())) {
    rendered += ext;
  }

  const position = context.enclosureIndex ?? 0;
  if (position > 0) {
    rendered = `${rendered.slice(0, -ext.length)}-${position + 1}${rendered.slice(-ext.length)}`;
  }

  const contentDir = resolve(context.subscription.contentDir);
  const path = resolve(join(contentDir, rendered));
  const inside = relative(contentDir, path);
  if (inside === '' || inside === '..' || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
    throw new InvalidTemplateError(`Rendered path "${rendered}" leaves the content directory`, template);
  }

  return path;
}

/**
 * Check a subscription's template before any network work is done
 *
 * @throws InvalidTemplateError
 */
export function validateTemplate(subscription: Pick<Subscription, 'name' | 'title' | 'contentDir' | 'filenameTemplate'>): void {
  renderPath(subscription.filenameTemplate, {
    subscription,
    episode: { id: 'id', title: 'title', publishDate: new Date(0) },
    enclosure: { ext: 'mp3', kind: 'audio' },
  });
}

/**
 * First free path for an episode: the rendered path, then with
 * `_<first 8 hex of sha1(id)>`, then with that and `-1`, `-2`, ...
 *
 * @param isTaken - whether a path belongs to another episode
 */
export async function disambiguate(
  path: string,
  episodeId: string,
  isTaken: (candidate: string) => boolean | Promise<boolean>,
): Promise<string> {
  if (!(await isTaken(path))) {
    return path;
  }

  const ext = extname(path);
  const stem = ext ? path.slice(0, -ext.length) : path;
  const hash = createHash('sha1').update(episodeId).digest('hex').slice(0, 8);

  const hashed = `${stem}_${hash}${ext}`;
  if (!(await isTaken(hashed))) {
    return hashed;
  }

  for (let counter = 1; ; counter++) {
    const candidate = `${stem}_${hash}-${counter}${ext}`;
    if (!(await isTaken(candidate))) {
      return candidate;
    }
  }
}
