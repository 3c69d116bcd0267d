/**
 * @tallybridge/event-store: Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - EventCatalog for payload validation
 * - Relay domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH, GENESIS_ANCHOR } from "./hash-chain.js";
export type { ChainAnchor } from "./hash-chain.js";

// Implementations
export { IndexedEventStore } from "./indexed-store.js";
export type { IndexedEventStoreOptions, SubscriberErrorHandler } from "./indexed-store.js";
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Relay domain events
export {
  RELAY_EVENTS,
  REJECTIONS_STREAM,
  PRICES_STREAM,
  proposalStream,
  createRelayCatalog,
  isProposalCreatedPayload,
  isProposalOpenedPayload,
  isProposalClosedPayload,
  isProposalArchivedPayload,
  isVoteCastPayload,
  isVoteRejectedPayload,
  isReceiptsPrunedPayload,
  isPricePublishedPayload,
} from "./relay-events.js";
export type {
  RelayEventType,
  ProposalCreatedPayload,
  ProposalOpenedPayload,
  ProposalClosedPayload,
  ProposalArchivedPayload,
  VoteCastPayload,
  VoteRejectedPayload,
  ReceiptsPrunedPayload,
  PricePublishedPayload,
} from "./relay-events.js";
