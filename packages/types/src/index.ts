/**
 * @tallybridge/types: Shared domain types for the settlement relay.
 *
 * These types are used across all packages:
 * - Proposals and their lifecycle
 * - Vote payloads, delivery receipts, price snapshots
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Proposal types
export type {
  ProposalState,
  ProposalMode,
  ProposalDefinition,
  Proposal,
} from "./proposal.js";

// Vote types
export type {
  VotePayload,
  DeliveryReceipt,
  PriceSnapshot,
  RejectionReason,
  VoteSource,
} from "./vote.js";

// Event types
export type { EventSource, EventMetadata, DomainEvent } from "./event.js";

// Runtime guards
export {
  isRecord,
  isUint8,
  isUint32,
  isReceiptId,
  isBaseUnitAmount,
  isProposalState,
  isProposalMode,
  isRejectionReason,
  isPriceSnapshot,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
