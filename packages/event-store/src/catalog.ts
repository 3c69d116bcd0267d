/**
 * @tallybridge/event-store: Event Catalog.
 *
 * Registry of known event types with:
 * - Typed event definitions (type string → payload shape)
 * - A schema version per event type
 * - Runtime payload validation, used before append and on replay
 *
 * Unknown event types are not rejected by the store; the catalog only
 * answers whether a payload matches what its type promises.
 */

import type { DomainEvent, EventSource } from "@tallybridge/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "vote.cast") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which component emits this event */
  readonly source: EventSource;

  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same type and version is a no-op; registering a
   * different version of a known type replaces it.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  /**
   * Throw unless the event's type is registered and its payload is valid.
   */
  assertValid(event: DomainEvent): void {
    if (!this.has(event.type)) {
      throw new CatalogError(`Unknown event type "${event.type}"`);
    }
    if (!this.validate(event.type, event.payload)) {
      throw new CatalogError(`Invalid payload for event type "${event.type}"`);
    }
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
