/**
 * @tallybridge/settlement: Core types.
 *
 * Shapes shared by the registry, the engine, the transport adapter and the
 * signed-vote gateway, plus the error classes they throw.
 */

import type { RejectionReason, VoteSource } from "@tallybridge/types";

// ─── Idempotency ─────────────────────────────────────────────────────────

export interface IdempotencyRecord {
  readonly receiptId: string;

  /** Ledger time (seconds) at which the receipt was consumed */
  readonly consumedAt: number;

  /** Proposal the receipt was bound to; absent for undecodable memos */
  readonly proposalId?: number | undefined;
}

export interface ConsumeContext {
  readonly consumedAt: number;
  readonly proposalId?: number | undefined;
}

// ─── Normalization ───────────────────────────────────────────────────────

/**
 * - normalized: weight = floor(rawAmount × oracle price)
 * - raw: weight = rawAmount, oracle never consulted
 */
export type WeightMode = "normalized" | "raw";

/**
 * What to do with a vote whose price snapshot is older than the window.
 */
export type StaleOraclePolicy = "flag" | "reject";

export interface NormalizerConfig {
  readonly mode: WeightMode;
  readonly stalenessWindowSeconds: number;
  readonly staleOraclePolicy: StaleOraclePolicy;
}

export type NormalizationResult =
  | {
      readonly ok: true;
      readonly weight: bigint;
      /** Price used, or null in raw mode */
      readonly price: string | null;
      readonly staleOracle: boolean;
      readonly snapshotObservedAt: number | null;
    }
  | {
      readonly ok: false;
      readonly reason: "noPrice" | "staleOracle";
    };

// ─── Settlement ──────────────────────────────────────────────────────────

/**
 * Result of processing one delivery or signed submission.
 *
 * The transport contract is void; the outcome exists for the host's
 * logging and for HTTP responses.
 */
export type DeliveryOutcome =
  | {
      readonly status: "accepted";
      readonly receiptId: string;
      readonly proposalId: number;
      readonly choiceId: number;
      readonly weight: string;
      readonly staleOracle: boolean;
    }
  | {
      readonly status: "rejected";
      readonly receiptId: string;
      readonly reason: RejectionReason;
      /** Where the value went; null when none was in flight */
      readonly route: string | null;
    };

/**
 * A delivery that could not reach `settle` (bad envelope, bad memo,
 * bad signature, exhausted budget or an internal fault).
 */
export interface UnsettledDelivery {
  readonly reason: RejectionReason;
  readonly receiptId: string;
  readonly rawAmount: string;
  readonly asset: string;
  readonly source: VoteSource;

  /** Whether value arrived with the call and must be forwarded */
  readonly carriesValue: boolean;

  /** Record the receipt as consumed without a proposal binding */
  readonly consumeUnbound?: boolean | undefined;
}

// ─── Transport ───────────────────────────────────────────────────────────

/**
 * What the transport hands over on arrival.
 *
 * Fields are taken as given; the adapter validates them.
 */
export interface TransportDelivery {
  readonly receiptId: string;
  readonly rawAmount: string;
  readonly asset: string;
  readonly memo: Uint8Array;
}

// ─── Signed votes ────────────────────────────────────────────────────────

export interface SignedVoteSubmission {
  readonly proposalId: number;
  readonly choiceId: number;
  readonly nonce: number;

  /** Origin-ledger key or address that signed */
  readonly signer: string;

  /** Detached signature, hex */
  readonly signature: string;

  /** Holding attested by the verifier, in base units */
  readonly attestedAmount: string;
  readonly asset: string;

  /** Optional 20-byte reference, hex */
  readonly hint?: string | undefined;
}

/**
 * External capability that checks a detached signature over a message.
 */
export interface SignatureVerifier {
  verify(signer: string, message: string, signature: Uint8Array): boolean;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type SettlementErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_PRICE"
  | "STALE_PUBLICATION"
  | "COMPUTE_CEILING_TOO_LOW"
  | "PRUNE_REFUSED"
  | "STORE_NOT_EMPTY"
  | "INVALID_EVENT"
  | "INVALID_SUBMISSION"
  | "CLOCK_REWIND"
  | "UNAUTHORIZED_CALLER";

export class SettlementError extends Error {
  public readonly code: SettlementErrorCode;

  constructor(code: SettlementErrorCode, message: string) {
    super(message);
    this.name = "SettlementError";
    this.code = code;
  }
}

/**
 * Thrown by the transport adapter when anything other than the trusted
 * transport calls it. The only abort on the delivery path.
 */
export class UnauthorizedCallerError extends SettlementError {
  public readonly caller: string;

  constructor(caller: string) {
    super("UNAUTHORIZED_CALLER", `Caller "${caller}" is not the trusted transport`);
    this.name = "UnauthorizedCallerError";
    this.caller = caller;
  }
}

export type RegistryErrorCode =
  | "PROPOSAL_EXISTS"
  | "PROPOSAL_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "INVALID_PROPOSAL";

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}
