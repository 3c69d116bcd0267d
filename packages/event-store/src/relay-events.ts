/**
 * @tallybridge/event-store: Relay Domain Event Definitions.
 *
 * Naming convention: `<entity>.<action>`
 * - proposal.created / opened / closed / archived
 * - vote.cast / vote.rejected
 * - receipts.pruned
 * - oracle.price.published
 *
 * Streams:
 * - `proposal:<id>` carries a proposal's lifecycle, its accepted votes and
 *   receipt pruning
 * - `relay:rejections` carries every rejected delivery
 * - `oracle:prices` carries every accepted price snapshot
 *
 * Payloads are plain JSON: weights and amounts are decimal strings, hints
 * are lower-case hex.
 */

import {
  isBaseUnitAmount,
  isPriceSnapshot,
  isProposalMode,
  isRecord,
  isRejectionReason,
  isUint32,
  isUint8,
} from "@tallybridge/types";
import type { PriceSnapshot, ProposalMode, RejectionReason, VoteSource } from "@tallybridge/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

export const RELAY_EVENTS = {
  PROPOSAL_CREATED: "proposal.created",
  PROPOSAL_OPENED: "proposal.opened",
  PROPOSAL_CLOSED: "proposal.closed",
  PROPOSAL_ARCHIVED: "proposal.archived",
  VOTE_CAST: "vote.cast",
  VOTE_REJECTED: "vote.rejected",
  RECEIPTS_PRUNED: "receipts.pruned",
  PRICE_PUBLISHED: "oracle.price.published",
} as const;

export type RelayEventType = (typeof RELAY_EVENTS)[keyof typeof RELAY_EVENTS];

export const REJECTIONS_STREAM = "relay:rejections";

export const PRICES_STREAM = "oracle:prices";

export function proposalStream(proposalId: number): string {
  return `proposal:${proposalId}`;
}

// =============================================================================
// Payloads
// =============================================================================

export type ProposalCreatedPayload = {
  readonly proposalId: number;
  readonly choiceCount: number;
  readonly opensAt: number;
  readonly closesAt: number;
  readonly treasuryRoute: string;
  readonly mode: ProposalMode;
  readonly title: string | null;
  readonly createdAt: number;
};

export type ProposalOpenedPayload = {
  readonly proposalId: number;
  readonly opensAt: number;
  readonly closesAt: number;
  readonly openedAt: number;
};

export type ProposalClosedPayload = {
  readonly proposalId: number;
  readonly closedAt: number;
  /** "window" when the close was triggered by reaching closesAt */
  readonly trigger: "admin" | "window";
};

export type ProposalArchivedPayload = {
  readonly proposalId: number;
  readonly archivedAt: number;
};

export type VoteCastPayload = {
  readonly proposalId: number;
  readonly choiceId: number;
  readonly normalizedWeight: string;
  readonly receiptId: string;
  readonly hint: string | null;
  readonly staleOracle: boolean;
  readonly rawAmount: string;
  readonly asset: string;
  readonly nonce: number;
  readonly source: VoteSource;
};

export type VoteRejectedPayload = {
  readonly reason: RejectionReason;
  readonly receiptId: string;
  readonly rawAmount: string;
  readonly asset: string;
  /** Where the delivered value went; null when no value was in flight */
  readonly route: string | null;
  readonly proposalId: number | null;
  /** Whether this delivery consumed its receipt id */
  readonly consumed: boolean;
  readonly source: VoteSource;
};

export type ReceiptsPrunedPayload = {
  readonly proposalId: number;
  readonly count: number;
};

export type PricePublishedPayload = PriceSnapshot;

// =============================================================================
// Validators
// =============================================================================

const HINT_HEX = /^[0-9a-f]{40}$/;

function isTime(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function isVoteSource(value: unknown): value is VoteSource {
  return value === "transport" || value === "signed";
}

export function isProposalCreatedPayload(p: unknown): p is ProposalCreatedPayload {
  return (
    isRecord(p) &&
    isUint32(p.proposalId) &&
    isUint8(p.choiceCount) &&
    p.choiceCount >= 1 &&
    isTime(p.opensAt) &&
    isTime(p.closesAt) &&
    typeof p.treasuryRoute === "string" &&
    isProposalMode(p.mode) &&
    (p.title === null || typeof p.title === "string") &&
    isTime(p.createdAt)
  );
}

export function isProposalOpenedPayload(p: unknown): p is ProposalOpenedPayload {
  return (
    isRecord(p) &&
    isUint32(p.proposalId) &&
    isTime(p.opensAt) &&
    isTime(p.closesAt) &&
    isTime(p.openedAt)
  );
}

export function isProposalClosedPayload(p: unknown): p is ProposalClosedPayload {
  return (
    isRecord(p) &&
    isUint32(p.proposalId) &&
    isTime(p.closedAt) &&
    (p.trigger === "admin" || p.trigger === "window")
  );
}

export function isProposalArchivedPayload(p: unknown): p is ProposalArchivedPayload {
  return isRecord(p) && isUint32(p.proposalId) && isTime(p.archivedAt);
}

export function isVoteCastPayload(p: unknown): p is VoteCastPayload {
  return (
    isRecord(p) &&
    isUint32(p.proposalId) &&
    isUint8(p.choiceId) &&
    isBaseUnitAmount(p.normalizedWeight) &&
    typeof p.receiptId === "string" &&
    (p.hint === null || (typeof p.hint === "string" && HINT_HEX.test(p.hint))) &&
    typeof p.staleOracle === "boolean" &&
    isBaseUnitAmount(p.rawAmount) &&
    typeof p.asset === "string" &&
    isUint32(p.nonce) &&
    isVoteSource(p.source)
  );
}

export function isVoteRejectedPayload(p: unknown): p is VoteRejectedPayload {
  return (
    isRecord(p) &&
    isRejectionReason(p.reason) &&
    typeof p.receiptId === "string" &&
    typeof p.rawAmount === "string" &&
    typeof p.asset === "string" &&
    (p.route === null || typeof p.route === "string") &&
    (p.proposalId === null || isUint32(p.proposalId)) &&
    typeof p.consumed === "boolean" &&
    isVoteSource(p.source)
  );
}

export function isReceiptsPrunedPayload(p: unknown): p is ReceiptsPrunedPayload {
  return isRecord(p) && isUint32(p.proposalId) && isTime(p.count);
}

export function isPricePublishedPayload(p: unknown): p is PricePublishedPayload {
  return isPriceSnapshot(p);
}

// =============================================================================
// Catalog
// =============================================================================

const RELAY_SCHEMAS: readonly EventSchema[] = [
  {
    type: RELAY_EVENTS.PROPOSAL_CREATED,
    version: 1,
    description: "A proposal was registered in Draft state",
    source: "registry",
    validate: isProposalCreatedPayload,
  },
  {
    type: RELAY_EVENTS.PROPOSAL_OPENED,
    version: 1,
    description: "A proposal started accepting votes within its window",
    source: "registry",
    validate: isProposalOpenedPayload,
  },
  {
    type: RELAY_EVENTS.PROPOSAL_CLOSED,
    version: 1,
    description: "A proposal stopped accepting votes; its tallies are final",
    source: "registry",
    validate: isProposalClosedPayload,
  },
  {
    type: RELAY_EVENTS.PROPOSAL_ARCHIVED,
    version: 1,
    description: "A closed proposal was archived",
    source: "registry",
    validate: isProposalArchivedPayload,
  },
  {
    type: RELAY_EVENTS.VOTE_CAST,
    version: 1,
    description: "A vote was counted toward a choice tally",
    source: "transport",
    validate: isVoteCastPayload,
  },
  {
    type: RELAY_EVENTS.VOTE_REJECTED,
    version: 1,
    description: "A delivery was not counted; its value was forwarded",
    source: "transport",
    validate: isVoteRejectedPayload,
  },
  {
    type: RELAY_EVENTS.RECEIPTS_PRUNED,
    version: 1,
    description: "Idempotency records of an archived proposal were dropped",
    source: "registry",
    validate: isReceiptsPrunedPayload,
  },
  {
    type: RELAY_EVENTS.PRICE_PUBLISHED,
    version: 1,
    description: "The oracle accepted a price snapshot for an asset",
    source: "oracle",
    validate: isPricePublishedPayload,
  },
];

/**
 * Create a catalog with every relay event type registered.
 */
export function createRelayCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of RELAY_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
