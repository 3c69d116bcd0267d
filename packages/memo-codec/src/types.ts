/**
 * @tallybridge/memo-codec domain types.
 *
 * Binary vote payload layout (big-endian):
 *
 *   offset  size  field
 *   0       1     version
 *   1       4     proposalId
 *   5       1     choiceId
 *   6       4     nonce
 *   10      1     flags (bit 0: hint present, bits 1-7 reserved)
 *   11      20    hint (only when flag bit 0 is set)
 */

import type { VotePayload } from "@tallybridge/types";

// =============================================================================
// Layout constants
// =============================================================================

/** The only payload layout version this codec understands */
export const PAYLOAD_VERSION = 1;

/** Size of a payload without hint */
export const BASE_PAYLOAD_SIZE = 11;

/** Size of the optional hint */
export const HINT_SIZE = 20;

/** Flag bit signalling that a hint follows the fixed header */
export const FLAG_HINT = 0x01;

/** Memo budget on the origin ledger; longer inputs are never parsed */
export const MAX_MEMO_BYTES = 80;

// =============================================================================
// Decode result
// =============================================================================

export type DecodeErrorKind = "BadVersion" | "Truncated" | "TrailingBytes";

export interface DecodeError {
  readonly kind: DecodeErrorKind;
  readonly message: string;
}

/**
 * Decoding never throws; callers branch on `ok`.
 */
export type DecodeResult =
  | { readonly ok: true; readonly payload: VotePayload }
  | { readonly ok: false; readonly error: DecodeError };

// =============================================================================
// Memo framing
// =============================================================================

/**
 * A vote memo as attached to an origin-ledger transfer.
 *
 * All fields are upper-case hex, per the origin ledger's memo convention:
 * - type: identifies the memo purpose (hex of "tallybridge/vote/v1")
 * - data: the binary payload
 * - format: optional encoding hint
 */
export interface VoteMemo {
  readonly type: string;
  readonly data: string;
  readonly format?: string | undefined;
}

// =============================================================================
// Errors
// =============================================================================

export type CodecErrorCode = "FIELD_OUT_OF_RANGE" | "UNSUPPORTED_VERSION";

/**
 * Thrown by the encoder only. Decoding reports failures as values.
 */
export class CodecError extends Error {
  public readonly code: CodecErrorCode;

  constructor(code: CodecErrorCode, message: string) {
    super(message);
    this.name = "CodecError";
    this.code = code;
  }
}
