/**
 * Daemon - runs update batches on a fixed interval until stopped
 *
 * The daemon owns one AbortController per run. `stop()` signals it, which
 * ends the wait between batches and cancels the batch in flight, then
 * resolves once the loop has exited.
 */

import { DaemonError, errorMessage } from '../errors/custom-errors.js';
import type { UpdateReport } from '../types/report.types.js';
import { logger } from '../utils/logger.js';
import { formatDuration, sleep } from '../utils/time-utils.js';

const log = logger.child('daemon');

const MINUTE_MS = 60 * 1000;

/**
 * One update batch; must honour the signal
 */
export type UpdateRunner = (signal: AbortSignal) => Promise<UpdateReport>;

export type DaemonOptions = {
  /** Minutes between the end of one batch and the start of the next */
  intervalMinutes: number;
  runUpdate: UpdateRunner;
  onReport?: (report: UpdateReport) => void;
  /** Injected for tests */
  sleep?: typeof sleep;
};

export class Daemon {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly sleep: typeof sleep;

  constructor(private readonly options: DaemonOptions) {
    if (!(options.intervalMinutes > 0)) {
      throw new DaemonError(`Update interval must be positive, got ${options.intervalMinutes}`);
    }
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Start the loop
   *
   * @returns a promise that resolves when the daemon has stopped
   * @throws DaemonError if it is already running
   */
  start(): Promise<void> {
    if (this.loop) {
      throw new DaemonError('Daemon is already running');
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal).finally(() => {
      this.loop = null;
      this.controller = null;
    });
    return this.loop;
  }

  /**
   * Cancel the batch in flight, or the wait between batches, and resolve
   * once the loop has exited
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop || !this.controller) {
      return;
    }
    log.info('Stopping daemon...');
    this.controller.abort();
    await loop;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  private async run(signal: AbortSignal): Promise<void> {
    const intervalMs = this.options.intervalMinutes * MINUTE_MS;
    log.info(`Daemon started, updating every ${formatDuration(intervalMs)}`);

    while (!signal.aborted) {
      try {
        const report = await this.options.runUpdate(signal);
        this.options.onReport?.(report);
      } catch (error) {
        log.error(`Update failed: ${errorMessage(error)}`);
      }

      if (signal.aborted) {
        break;
      }
      log.info(`Next update in ${formatDuration(intervalMs)}`);
      await this.sleep(intervalMs, signal);
    }

    log.success('Daemon stopped');
  }
}
