/**
 * @tallybridge/event-store: Shared in-memory index for EventStore backends.
 *
 * Both backends keep the full log in memory:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - A global array for readAll, global subscriptions and the hash chain
 *
 * Subclasses decide what happens to a batch before it becomes visible
 * by overriding `persist`. If `persist` throws, nothing is committed.
 *
 * Subscribers run synchronously once a batch is committed. A subscriber
 * that throws is reported through `onSubscriberError`; the append itself
 * still succeeds and the remaining subscribers still run.
 */

import type { DomainEvent } from "@tallybridge/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
  UnhashedEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export type SubscriberErrorHandler = (error: unknown, event: StoredEvent) => void;

export interface IndexedEventStoreOptions {
  /** Called when a subscriber throws. Defaults to a process warning. */
  readonly onSubscriberError?: SubscriberErrorHandler;
}

export abstract class IndexedEventStore implements EventStore {
  private readonly _onSubscriberError: SubscriberErrorHandler;
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private _lastHash: string = GENESIS_HASH;

  constructor(options: IndexedEventStoreOptions = {}) {
    this._onSubscriberError = options.onSubscriberError ?? warnSubscriberError;
  }

  /**
   * Durably record a batch before it is indexed and dispatched.
   */
  protected abstract persist(events: readonly StoredEvent[]): void;

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    const fromVersion = currentVersion + 1;
    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = [];
    let previousHash = this._lastHash;
    let position = this._globalLog.length;

    events.forEach((event, i) => {
      position += 1;
      const unhashed: UnhashedEvent = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: fromVersion + i,
        globalPosition: position,
        appendedAt,
      };
      const hash = computeEventHash(unhashed, previousHash);
      stored.push({ ...unhashed, hash, previousHash });
      previousHash = hash;
    });

    this.persist(stored);

    for (const event of stored) {
      this.index(event);
    }
    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  /**
   * Add an already-persisted event to the index without dispatching it.
   * Used when loading a log from durable storage.
   */
  protected index(event: StoredEvent): void {
    let stream = this._streams.get(event.streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(event.streamId, stream);
    }
    stream.push(event);
    this._globalLog.push(event);
    this._lastHash = event.hash;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const result =
      options?.direction === "backward"
        ? stream.filter((e) => e.version <= fromVersion).reverse()
        : stream.filter((e) => e.version >= fromVersion);

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    const result =
      options?.direction === "backward"
        ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
        : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];
    for (const handler of handlers) {
      for (const event of events) {
        this._deliver(handler, event);
      }
    }
  }

  private _deliver(handler: EventHandler, event: StoredEvent): void {
    try {
      handler(event);
    } catch (err) {
      this._onSubscriberError(err, event);
    }
  }
}

function warnSubscriberError(error: unknown, event: StoredEvent): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.emitWarning(
    `Subscriber failed on ${event.event.type} at position ${event.globalPosition}: ${reason}`,
    "SubscriberWarning",
  );
}

function validateStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function checkExpectedVersion(
  streamId: string,
  currentVersion: number,
  expected: AppendOptions["expectedVersion"],
): void {
  if (expected === undefined || expected === "any") return;

  if (expected === "no_stream") {
    if (currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    return;
  }

  if (currentVersion !== expected) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
      streamId,
    );
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
