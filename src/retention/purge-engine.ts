import { toErrorInfo, toFilesystemError } from '../errors/custom-errors.js';
import type { EpisodeIndex } from '../store/episode-index.js';
import type { Episode } from '../types/episode.types.js';
import type { PurgedEpisode } from '../types/report.types.js';
import type { Subscription } from '../types/subscription.types.js';
import { deleteIfExists } from '../utils/fs-utils.js';
import { logger } from '../utils/logger.js';

const log = logger.child('purge');

/**
 * Downloaded episodes beyond the retention count, ranked newest first by
 * publish date, then by download time
 */
export function selectForRemoval(subscription: Pick<Subscription, 'maxEpisodes'>, index: EpisodeIndex): Episode[] {
  const keep = subscription.maxEpisodes;
  if (keep <= 0) {
    return [];
  }

  const ranked = index
    .downloaded()
    .sort(
      (a, b) =>
        Date.parse(b.publishDate) - Date.parse(a.publishDate) || Date.parse(b.downloadedAt) - Date.parse(a.downloadedAt),
    );
  return ranked.slice(keep);
}

/**
 * Remove episodes beyond `maxEpisodes`: delete their files and drop them
 * from the in-memory index. A file that is already gone counts as deleted;
 * other deletion failures are logged and reported on the episode.
 *
 * With `dryRun` nothing is deleted and the index is left as is. The caller
 * persists the index after a real purge.
 */
export async function purge(subscription: Subscription, index: EpisodeIndex, dryRun = false): Promise<PurgedEpisode[]> {
  const candidates = selectForRemoval(subscription, index);
  const purged: PurgedEpisode[] = [];

  for (const episode of candidates) {
    const result: PurgedEpisode = { episode: { ...episode, files: [...episode.files] }, fileErrors: [] };
    purged.push(result);

    if (dryRun) {
      log.info(`${subscription.name}: would remove "${episode.title}"`);
      continue;
    }

    for (const file of episode.files) {
      try {
        await deleteIfExists(file);
      } catch (error) {
        const reason = toErrorInfo(toFilesystemError(error, file));
        log.error(`${subscription.name}: could not delete ${file}: ${reason.message}`);
        result.fileErrors.push({ path: file, error: reason });
      }
    }
    index.remove(episode.id);
    log.info(`${subscription.name}: removed "${episode.title}"`);
  }

  return purged;
}
