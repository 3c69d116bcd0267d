/**
 * @tallybridge/event-store: In-memory EventStore implementation.
 *
 * Suitable for tests and short-lived processes. All state is lost on
 * process exit.
 */

import type { StoredEvent } from "./types.js";
import { IndexedEventStore } from "./indexed-store.js";

export class InMemoryEventStore extends IndexedEventStore {
  protected override persist(_events: readonly StoredEvent[]): void {
    // Nothing to persist; the index is the store.
  }
}
