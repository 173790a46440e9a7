import type { PurgeResult, SubscriptionSummary } from '../library/library.js';
import type { Episode } from '../types/episode.types.js';
import type { SubscriptionReport, UpdateReport } from '../types/report.types.js';
import { formatLocalDate } from '../utils/time-utils.js';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * One summary line per subscription, followed by an indented line per
 * failed episode or undeletable file
 */
export function formatUpdateReport(report: UpdateReport): string[] {
  const lines = report.subscriptions.flatMap(formatSubscriptionReport);
  if (report.cancelled) {
    lines.push('Update cancelled');
  }
  return lines;
}

export function formatSubscriptionReport(report: SubscriptionReport): string[] {
  if (report.status === 'failed') {
    const reason = report.error ? ` (${report.error.kind}: ${report.error.message})` : '';
    return [`${report.subscriptionName}: failed${reason}`];
  }

  const counts: string[] = [];
  const downloaded = report.episodes.filter((outcome) => outcome.status === 'downloaded').length;
  const failed = report.episodes.filter((outcome) => outcome.status === 'failed').length;
  const skipped = report.episodes.filter((outcome) => outcome.status === 'skipped').length;
  if (downloaded > 0) counts.push(`${downloaded} downloaded`);
  if (failed > 0) counts.push(`${failed} failed`);
  if (skipped > 0) counts.push(`${skipped} skipped`);
  if (report.purged.length > 0) counts.push(`${report.purged.length} purged`);

  const lines = [[`${report.subscriptionName}: ${report.status}`, ...counts].join(', ')];
  for (const outcome of report.episodes) {
    if (outcome.status === 'failed') {
      lines.push(`  failed "${outcome.title}": ${outcome.reason.kind}: ${outcome.reason.message}`);
    }
  }
  for (const { path, error } of report.purged.flatMap((item) => item.fileErrors)) {
    lines.push(`  could not delete ${path}: ${error.message}`);
  }
  return lines;
}

/**
 * Whether an update should end with a failing exit status
 */
export function hasFailures(report: UpdateReport): boolean {
  return report.subscriptions.some(
    (subscription) =>
      subscription.status === 'failed' || subscription.episodes.some((outcome) => outcome.status === 'failed'),
  );
}

export function formatSubscriptionSummary({ subscription, episodeCount, lastDownloadedAt }: SubscriptionSummary): string[] {
  const lines = [subscription.name, `  url:       ${subscription.feedUrl}`];
  if (subscription.title !== undefined) {
    lines.push(`  title:     ${subscription.title}`);
  }
  lines.push(
    `  directory: ${subscription.contentDir}`,
    `  template:  ${subscription.filenameTemplate}`,
    `  keep:      ${subscription.maxEpisodes > 0 ? subscription.maxEpisodes : 'all'}`,
    `  enabled:   ${subscription.enabled ? 'yes' : 'no'}`,
    `  episodes:  ${episodeCount}`,
  );
  if (lastDownloadedAt !== undefined) {
    lines.push(`  last:      ${formatLocalDate(new Date(lastDownloadedAt))}`);
  }
  return lines;
}

/**
 * `ls` output: one line per episode, or its file paths with `paths`
 */
export function formatEpisode(episode: Episode, paths = false): string[] {
  if (paths) {
    return [...episode.files];
  }
  const marker = episode.read ? '' : ' *';
  return [`${formatLocalDate(new Date(episode.publishDate))} ${episode.subscriptionName}: ${episode.title}${marker}`];
}

export function formatPurgeResult(result: PurgeResult, dryRun: boolean): string[] {
  const verb = dryRun ? 'would remove' : 'removed';
  const lines = [`${result.subscriptionName}: ${verb} ${plural(result.purged.length, 'episode')}`];
  for (const { episode, fileErrors } of result.purged) {
    lines.push(`  ${formatLocalDate(new Date(episode.publishDate))} ${episode.title}`);
    for (const { path, error } of fileErrors) {
      lines.push(`    could not delete ${path}: ${error.message}`);
    }
  }
  return lines;
}

/**
 * Numbered `play` menu entry, counting from 1
 */
export function formatEpisodeChoice(number: number, episode: Episode): string {
  const subscription = episode.subscriptionName.slice(0, 16).padEnd(16);
  return `${String(number).padStart(2)} | ${subscription} | ${episode.title.slice(0, 55)}`;
}

export function formatNowPlaying(episode: Episode): string[] {
  return [
    '*** Playing ***',
    `Podcast:   ${episode.subscriptionName}`,
    `Episode:   ${episode.title}`,
    `Published: ${formatLocalDate(new Date(episode.publishDate))}`,
  ];
}
