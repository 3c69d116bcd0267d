/**
 * Runtime Type Guards
 *
 * Narrowing functions for settlement domain types.
 * These enable safe runtime validation at system boundaries
 * (transport calls, API inputs, replayed event payloads).
 */

import type { ProposalMode, ProposalState } from "./proposal.js";
import type { PriceSnapshot, RejectionReason } from "./vote.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Primitives
// =============================================================================

const UINT32_MAX = 0xffffffff;
const RECEIPT_ID_PATTERN = /^[0-9a-f]{64}$/;
const BASE_UNIT_PATTERN = /^(0|[1-9]\d*)$/;
const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isUint8(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 0xff;
}

export function isUint32(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= UINT32_MAX;
}

/** 32-byte receipt identifier as 64 lower-case hex characters. */
export function isReceiptId(value: unknown): value is string {
  return typeof value === "string" && RECEIPT_ID_PATTERN.test(value);
}

/** Non-negative integer amount in base units, without leading zeros. */
export function isBaseUnitAmount(value: unknown): value is string {
  return typeof value === "string" && BASE_UNIT_PATTERN.test(value);
}

// =============================================================================
// Proposal guards
// =============================================================================

const PROPOSAL_STATES = new Set<string>(["draft", "open", "closed", "archived"]);
const PROPOSAL_MODES = new Set<string>(["payment", "identity"]);

export function isProposalState(value: unknown): value is ProposalState {
  return typeof value === "string" && PROPOSAL_STATES.has(value);
}

export function isProposalMode(value: unknown): value is ProposalMode {
  return typeof value === "string" && PROPOSAL_MODES.has(value);
}

// =============================================================================
// Vote guards
// =============================================================================

const REJECTION_REASONS = new Set<string>([
  "badDelivery",
  "badPayload",
  "duplicate",
  "unknownOrClosed",
  "modeMismatch",
  "invalidChoice",
  "noPrice",
  "staleOracle",
  "badSignature",
  "computeExhausted",
  "internalError",
]);

export function isRejectionReason(value: unknown): value is RejectionReason {
  return typeof value === "string" && REJECTION_REASONS.has(value);
}

export function isPriceSnapshot(value: unknown): value is PriceSnapshot {
  if (!isRecord(value)) return false;
  return (
    typeof value.asset === "string" &&
    value.asset.length > 0 &&
    typeof value.price === "string" &&
    DECIMAL_PATTERN.test(value.price) &&
    typeof value.observedAt === "number" &&
    Number.isInteger(value.observedAt) &&
    value.observedAt >= 0
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["transport", "registry", "gateway", "oracle"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
