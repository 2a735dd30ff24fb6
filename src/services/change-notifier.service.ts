/**
 * Change Notifier
 *
 * The single funnel through which every record change is announced:
 * interactive writes, batch ingestion, dispatcher status transitions and
 * remote-confirmed merges all call `publish` after their transaction has
 * committed. Events carry no origin, so consumers handle every path alike.
 *
 * Listeners run synchronously in subscription order. A listener that throws
 * or returns a rejected promise is logged; it never affects the write or the
 * remaining listeners.
 *
 * @module services/change-notifier
 */

import { createLogger, errorMessage } from '../utils/logger';
import type { RecordChangedEvent } from '../shared/types/sync.types';

// ============================================================================
// Types
// ============================================================================

export type RecordChangeListener = (event: RecordChangedEvent) => void | Promise<void>;

export interface ChangeFilter {
  userID?: string;
  entityTypes?: string[];
}

interface Subscription {
  listener: RecordChangeListener;
  filter: ChangeFilter | undefined;
}

// ============================================================================
// Logger
// ============================================================================

const log = createLogger('change-notifier');

// ============================================================================
// Change Notifier
// ============================================================================

function matches(filter: ChangeFilter | undefined, event: RecordChangedEvent): boolean {
  if (!filter) {
    return true;
  }
  if (filter.userID !== undefined && filter.userID !== event.userID) {
    return false;
  }
  if (filter.entityTypes !== undefined && !filter.entityTypes.includes(event.entityType)) {
    return false;
  }
  return true;
}

export class ChangeNotifier {
  private subscriptions: Subscription[] = [];

  /**
   * @returns unsubscribe function
   */
  subscribe(listener: RecordChangeListener, filter?: ChangeFilter): () => void {
    const subscription: Subscription = { listener, filter };
    this.subscriptions = [...this.subscriptions, subscription];

    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s !== subscription);
    };
  }

  /**
   * Deliver an event to every matching listener. Must only be called once
   * the change is committed.
   */
  publish(event: RecordChangedEvent): void {
    // Snapshot: listeners added or removed during delivery apply to the next event
    for (const { listener, filter } of this.subscriptions) {
      if (!matches(filter, event)) {
        continue;
      }
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => {
            log.error('Async change listener rejected', {
              localId: event.localID,
              change: event.change,
              error: errorMessage(error),
            });
          });
        }
      } catch (error) {
        log.error('Change listener threw', {
          localId: event.localID,
          change: event.change,
          error: errorMessage(error),
        });
      }
    }
  }

  publishAll(events: RecordChangedEvent[]): void {
    for (const event of events) {
      this.publish(event);
    }
  }

  listenerCount(): number {
    return this.subscriptions.length;
  }

  clear(): void {
    this.subscriptions = [];
  }
}

// ============================================================================
// Idempotent Consumption
// ============================================================================

const DEFAULT_MEMORY = 1000;

/**
 * Wrap a listener so that a given (localID, updatedAt, change) triple is
 * applied once, however many times it is delivered.
 *
 * Remembers the most recent `memory` triples.
 */
export function createIdempotentListener(
  listener: RecordChangeListener,
  memory: number = DEFAULT_MEMORY
): RecordChangeListener {
  const seen = new Set<string>();

  return (event) => {
    const key = `${event.localID}|${event.updatedAt}|${event.change}`;
    if (seen.has(key)) {
      return;
    }
    seen.add(key);
    if (seen.size > memory) {
      // Sets iterate in insertion order
      const oldest = seen.values().next();
      if (!oldest.done) {
        seen.delete(oldest.value);
      }
    }
    return listener(event);
  };
}
