/**
 * Vote & Delivery Types
 *
 * A vote starts life as a memo written by an origin-ledger client, travels
 * through the transport network attached to a transfer, and arrives at the
 * settlement side as a delivery receipt.
 *
 * Rules:
 * - Amounts are strings (base units) so that they survive JSON intact
 * - Receipt ids are 32-byte values in lower-case hex
 * - Prices are decimal strings, never floats
 */

/**
 * The decoded vote intent carried in a memo.
 */
export interface VotePayload {
  /** Layout version (uint8) */
  readonly version: number;

  /** Target proposal (uint32) */
  readonly proposalId: number;

  /** Chosen option (uint8) */
  readonly choiceId: number;

  /** Client-chosen nonce (uint32), lets one holder vote repeatedly */
  readonly nonce: number;

  /** Optional opaque 20-byte reference (e.g. a referrer or origin address) */
  readonly hint?: Uint8Array | undefined;
}

/**
 * A transport delivery as it reaches the settlement side.
 */
export interface DeliveryReceipt {
  /** Transport-supplied identifier, 64 lower-case hex characters */
  readonly receiptId: string;

  /** Delivered amount in the asset's base units (non-negative integer string) */
  readonly rawAmount: string;

  /** Asset identifier as named by the transport (e.g. "BTC.BTC") */
  readonly asset: string;

  /** The decoded vote */
  readonly payload: VotePayload;
}

/**
 * A price observation published by the oracle collaborator.
 */
export interface PriceSnapshot {
  readonly asset: string;

  /** Positive decimal string, weight units per base unit (e.g. "2.0") */
  readonly price: string;

  /** Ledger time (seconds) the price was observed */
  readonly observedAt: number;
}

/**
 * Why a delivery was not tallied.
 */
export type RejectionReason =
  | "badDelivery"
  | "badPayload"
  | "duplicate"
  | "unknownOrClosed"
  | "modeMismatch"
  | "invalidChoice"
  | "noPrice"
  | "staleOracle"
  | "badSignature"
  | "computeExhausted"
  | "internalError";

/**
 * Which entry point a vote arrived through.
 */
export type VoteSource = "transport" | "signed";
