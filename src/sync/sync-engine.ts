import { type DownloadScheduler, SKIPPED_CANCELLED } from '../downloader/download-scheduler.js';
import { validateTemplate } from '../downloader/filename-templater.js';
import { NotFoundError, errorMessage, toErrorInfo } from '../errors/custom-errors.js';
import type { EventEmitterLike } from '../events/event-dispatcher.js';
import type { FeedDiffEngine } from '../feed/feed-diff.js';
import { WorkerPool } from '../queue/worker-pool.js';
import { purge } from '../retention/purge-engine.js';
import type { EpisodeIndexStore } from '../store/episode-index.js';
import { selectSubscriptions } from '../store/subscription-selection.js';
import type { SubscriptionStore } from '../store/subscription-store.js';
import { sameCacheToken } from '../types/episode.types.js';
import type { EpisodeOutcome, SubscriptionReport, UpdateReport } from '../types/report.types.js';
import type { Subscription } from '../types/subscription.types.js';
import { logger } from '../utils/logger.js';
import { formatDuration } from '../utils/time-utils.js';

const log = logger.child('sync');

export type SyncEngineOptions = {
  store: SubscriptionStore;
  index: EpisodeIndexStore;
  diff: FeedDiffEngine;
  downloads: DownloadScheduler;
  events: EventEmitterLike;
  /** Subscriptions processed at once */
  updateWorkers: number;
  /** Name patterns left out of wildcard and select-all updates */
  ignore?: readonly string[];
};

export type UpdateOptions = {
  /** Refetch feeds unconditionally */
  force?: boolean;
  /** Stops new work and aborts transfers in flight */
  signal?: AbortSignal;
};

type Slot = { report: SubscriptionReport; subscription?: Subscription };

/**
 * Runs update batches: diff, download, cache token, retention, events
 *
 * Errors are contained per episode and per subscription; a batch always
 * returns a report for every selected subscription.
 */
export class SyncEngine {
  constructor(private readonly options: SyncEngineOptions) {}

  async update(patterns: readonly string[] = [], options: UpdateOptions = {}): Promise<UpdateReport> {
    const startedAt = Date.now();
    const { signal } = options;
    const selection = await selectSubscriptions(this.options.store, patterns, this.options.ignore);

    const slots: Slot[] = [
      ...selection.missing.map((name) => ({
        report: failedReport(name, toErrorInfo(new NotFoundError(name))),
      })),
      ...selection.errors.map(({ name, error }) => ({ report: failedReport(name, error) })),
      ...selection.subscriptions.map((subscription) => ({
        subscription,
        report: emptyReport(subscription.name, subscription.enabled ? 'cancelled' : 'disabled'),
      })),
    ];

    const runnable = slots.filter((slot) => slot.subscription?.enabled === true);
    const pool = new WorkerPool<Slot>(
      async (slot) => {
        if (slot.subscription) {
          slot.report = await this.updateSubscription(slot.subscription, options);
        }
      },
      { concurrency: this.options.updateWorkers },
    );

    const onAbort = (): void => {
      const unstarted = pool.stop();
      const status = pool.getStatus();
      log.warning(
        `Update cancelled: ${unstarted.length} subscription(s) not started, ${status.activeCount} still running, ` +
          `${status.processedCount + status.failedCount} finished`,
      );
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      if (signal?.aborted) {
        onAbort();
      } else {
        pool.addAll(runnable);
      }
      await pool.drain();
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    const cancelled = signal?.aborted ?? false;
    if (!cancelled) {
      for (const slot of runnable) {
        await this.purgeSubscription(slot);
      }
    }

    const reports = slots.map((slot) => slot.report);
    const downloaded = (report: SubscriptionReport) => countOutcomes(report.episodes, 'downloaded');
    const failedCount = reports.reduce(
      (total, report) => total + countOutcomes(report.episodes, 'failed') + (report.status === 'failed' ? 1 : 0),
      0,
    );

    this.options.events.emit({
      kind: 'updates_complete',
      updated: slots.flatMap((slot) =>
        slot.subscription && downloaded(slot.report) > 0
          ? [{ subscriptionName: slot.subscription.name, contentDir: slot.subscription.contentDir }]
          : [],
      ),
      downloadedCount: reports.reduce((total, report) => total + downloaded(report), 0),
      failedCount,
      cancelled,
    });

    log.info(`Update of ${reports.length} subscription(s) finished in ${formatDuration(Date.now() - startedAt)}`);
    return { subscriptions: reports, cancelled };
  }

  private async updateSubscription(subscription: Subscription, options: UpdateOptions): Promise<SubscriptionReport> {
    const { name } = subscription;
    const { signal } = options;
    if (signal?.aborted) {
      return emptyReport(name, 'cancelled');
    }

    try {
      const index = await this.options.index.load(name);
      validateTemplate(subscription);

      log.info(`Checking ${name}`);
      const diff = await this.options.diff.diff(subscription, index, { force: options.force, signal });
      if (diff.status === 'not-modified') {
        log.info(`${name}: feed not modified`);
        return emptyReport(name, 'not-modified');
      }

      const download = await this.options.downloads.run(subscription, diff.newEpisodes, {
        feedTitle: diff.feedTitle,
        signal,
      });
      const episodes = download.outcomes;

      // Keep the old token after failures so that the next run refetches and retries
      const incomplete = episodes.some(
        (outcome) => outcome.status === 'failed' || (outcome.status === 'skipped' && outcome.reason === SKIPPED_CANCELLED),
      );
      if (!incomplete && !sameCacheToken(index.cacheToken, diff.token)) {
        await this.options.index.update(name, (current) => {
          current.updateCacheToken(diff.token.etag, diff.token.lastModified);
        });
      }

      const downloadedCount = countOutcomes(episodes, 'downloaded');
      if (downloadedCount > 0) {
        this.options.events.emit({
          kind: 'subscription_updated',
          subscriptionName: name,
          contentDir: subscription.contentDir,
          downloadedCount,
        });
      }

      const status = signal?.aborted ? 'cancelled' : downloadedCount > 0 ? 'updated' : 'unchanged';
      return { ...emptyReport(name, status), episodes };
    } catch (error) {
      if (signal?.aborted) {
        return emptyReport(name, 'cancelled');
      }
      const reason = toErrorInfo(error);
      log.error(`${name}: update failed: ${reason.message}`);
      return failedReport(name, reason);
    }
  }

  private async purgeSubscription(slot: Slot): Promise<void> {
    const { subscription, report } = slot;
    if (!subscription || subscription.maxEpisodes <= 0 || report.status === 'failed' || report.status === 'cancelled') {
      return;
    }

    try {
      report.purged = await this.options.index.update(subscription.name, (index) => purge(subscription, index));
    } catch (error) {
      log.error(`${subscription.name}: purge failed: ${errorMessage(error)}`);
      report.status = 'failed';
      report.error = toErrorInfo(error);
    }
  }
}

function emptyReport(subscriptionName: string, status: SubscriptionReport['status']): SubscriptionReport {
  return { subscriptionName, status, episodes: [], purged: [] };
}

function failedReport(subscriptionName: string, error: SubscriptionReport['error']): SubscriptionReport {
  return { ...emptyReport(subscriptionName, 'failed'), error };
}

function countOutcomes(outcomes: readonly EpisodeOutcome[], status: EpisodeOutcome['status']): number {
  return outcomes.filter((outcome) => outcome.status === status).length;
}
