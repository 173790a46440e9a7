import { copyFile, mkdir, rename, unlink } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import { errorMessage, isErrnoException, toFilesystemError } from '../errors/custom-errors.js';
import type { EpisodeIndex } from '../store/episode-index.js';
import type { MediaKind } from '../types/feed.types.js';
import type { Subscription } from '../types/subscription.types.js';
import { pathExists } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';
import { disambiguate, renderPath } from './filename-templater.js';

const log = logger.child('relocate');

export type RelocationResult = {
  /** Files moved to a new path */
  moved: number;
  /** Files left where they were because they could not be moved */
  failed: string[];
};

/**
 * Kind of a downloaded file, looked up from its extension in the
 * content-type map
 */
export function kindForExtension(ext: string, contentTypes: Readonly<Record<string, string>>): MediaKind {
  const match = Object.entries(contentTypes).find(([, mapped]) => mapped === ext.toLowerCase());
  return match?.[0].startsWith('video/') ? 'video' : 'audio';
}

async function moveFile(from: string, to: string): Promise<void> {
  await mkdir(dirname(to), { recursive: true });
  try {
    await rename(from, to);
  } catch (error) {
    // The new content directory may live on another device
    if (!isErrnoException(error) || error.code !== 'EXDEV') {
      throw error;
    }
    await copyFile(from, to);
    await unlink(from);
  }
}

/**
 * Move every downloaded file of `index` to the path the subscription's
 * current template renders for it, and record the new paths in the index.
 *
 * Files that are missing on disk or cannot be moved keep their recorded
 * path.
 */
export async function relocateFiles(
  subscription: Subscription,
  index: EpisodeIndex,
  contentTypes: Readonly<Record<string, string>>,
): Promise<RelocationResult> {
  const result: RelocationResult = { moved: 0, failed: [] };
  const assigned = new Set<string>();

  for (const episode of index.downloaded()) {
    const files: string[] = [];

    for (const [position, file] of episode.files.entries()) {
      const ext = extname(file).slice(1);
      const rendered = renderPath(subscription.filenameTemplate, {
        subscription,
        episode: { id: episode.id, title: episode.title, publishDate: new Date(episode.publishDate) },
        enclosure: { ext, kind: kindForExtension(ext, contentTypes) },
        enclosureIndex: position,
      });
      const target = await disambiguate(
        rendered,
        episode.id,
        async (candidate) => assigned.has(candidate) || (candidate !== file && (await pathExists(candidate))),
      );

      if (target === file) {
        assigned.add(file);
        files.push(file);
        continue;
      }
      if (!(await pathExists(file))) {
        log.warning(`${subscription.name}: ${file} is missing, not moved`);
        assigned.add(file);
        files.push(file);
        continue;
      }

      try {
        await moveFile(file, target);
        log.debug(`${subscription.name}: moved ${file} to ${target}`);
        assigned.add(target);
        files.push(target);
        result.moved++;
      } catch (error) {
        log.error(`${subscription.name}: cannot move ${file}: ${errorMessage(toFilesystemError(error, target))}`);
        assigned.add(file);
        files.push(file);
        result.failed.push(file);
      }
    }

    if (files.some((file, position) => file !== episode.files[position])) {
      index.recordDownload({ ...episode, files });
    }
  }

  return result;
}
