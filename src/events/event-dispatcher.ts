import { errorMessage } from '../errors/custom-errors.js';
import type { SyncEvent } from '../types/event.types.js';
import { logger } from '../utils/logger.js';
import type { EventSink } from './event-sink.js';

const log = logger.child('events');

/**
 * Anything events can be emitted to
 */
export type EventEmitterLike = {
  emit(event: SyncEvent): void;
};

/**
 * Dispatcher that broadcasts events to registered sinks
 * Sinks can be added with priority (higher = called first)
 *
 * Emitting never throws and never waits: sink failures are logged, and
 * asynchronous sink work is tracked until `drain()`.
 */
export class EventDispatcher implements EventEmitterLike {
  private sinks: Array<{ sink: EventSink; priority: number }> = [];
  private pending = new Set<Promise<void>>();

  /**
   * Register a sink
   * @param sink - Sink instance to add
   * @param priority - Priority (higher = called first). Default: 0
   */
  register(sink: EventSink, priority = 0): void {
    this.sinks.push({ sink, priority });
    this.sinks.sort((a, b) => b.priority - a.priority);
  }

  unregister(sink: EventSink): void {
    this.sinks = this.sinks.filter((entry) => entry.sink !== sink);
  }

  /**
   * Deliver an event to every interested sink
   */
  emit(event: SyncEvent): void {
    for (const { sink } of this.sinks) {
      if (sink.kinds && !sink.kinds.includes(event.kind)) {
        continue;
      }

      let result: Promise<void> | void;
      try {
        result = sink.handle(event);
      } catch (error) {
        this.report(sink, event, error);
        continue;
      }

      if (result instanceof Promise) {
        this.track(
          result.catch((error: unknown) => {
            this.report(sink, event, error);
          }),
        );
      }
    }
  }

  /**
   * Wait for all asynchronous sink work, including work started while waiting
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled([...this.pending]);
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private track(work: Promise<void>): void {
    this.pending.add(work);
    void work.finally(() => {
      this.pending.delete(work);
    });
  }

  private report(sink: EventSink, event: SyncEvent, error: unknown): void {
    log.error(`Sink "${sink.name}" failed on ${event.kind}: ${errorMessage(error)}`);
  }
}
