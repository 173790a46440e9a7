import type { EventKind, SyncEvent } from '../types/event.types.js';

/**
 * Receiver of sync events
 *
 * `handle` is called synchronously from the emitting code. A sink that has
 * slow work to do returns a promise; the dispatcher tracks it without
 * waiting for it.
 */
export type EventSink = {
  /** Used in log messages */
  readonly name: string;
  /** Event kinds this sink wants; all kinds when omitted */
  readonly kinds?: readonly EventKind[];
  handle(event: SyncEvent): Promise<void> | void;
};
