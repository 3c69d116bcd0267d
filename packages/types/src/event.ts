/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state change on the settlement side is captured as a DomainEvent,
 * and the event log is what external indexers and auditors consume.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Events are replayable: same events → same state
 * - No UPDATE, no DELETE; only new events
 */

/**
 * Which settlement component emitted an event.
 */
export type EventSource = "transport" | "registry" | "gateway" | "oracle";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp (derived from ledger time) */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string | undefined;

  /** ID for grouping related events (the receipt id for deliveries) */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vote.cast", "proposal.opened") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
