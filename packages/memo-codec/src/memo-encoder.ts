/**
 * Vote Memo Encoder
 *
 * Frames binary vote payloads as origin-ledger memos and unframes delivered
 * memos back into payloads.
 *
 * Memos are hex-encoded strings on the origin ledger:
 * - type: identifies the memo purpose (hex of "tallybridge/vote/v1")
 * - data: the binary payload (hex)
 * - format: encoding format hint (hex of "application/octet-stream")
 */

import type { VotePayload } from "@tallybridge/types";
import { decodePayload, encodePayload } from "./payload-codec.js";
import type { DecodeResult, VoteMemo } from "./types.js";

/** The memo type identifier for vote payloads */
export const MEMO_TYPE = "tallybridge/vote/v1";

/** The memo format for binary payloads */
export const MEMO_FORMAT = "application/octet-stream";

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

/**
 * Encode a vote payload as a memo.
 */
export function encodeMemo(payload: VotePayload): VoteMemo {
  return {
    type: textToHex(MEMO_TYPE),
    data: toHex(encodePayload(payload)),
    format: textToHex(MEMO_FORMAT),
  };
}

/**
 * Decode a memo back into a vote payload.
 *
 * A memo of another type, or one whose data is not hex, is reported
 * as BadVersion: it is not a layout this codec knows.
 */
export function decodeMemo(memo: VoteMemo): DecodeResult {
  if (!isVoteMemo(memo)) {
    return {
      ok: false,
      error: { kind: "BadVersion", message: `Unexpected memo type, expected "${MEMO_TYPE}"` },
    };
  }

  const bytes = fromHex(memo.data);
  if (bytes === undefined) {
    return {
      ok: false,
      error: { kind: "BadVersion", message: "Memo data is not valid hex" },
    };
  }

  return decodePayload(bytes);
}

/**
 * Check if a memo is a vote memo.
 */
export function isVoteMemo(memo: VoteMemo): boolean {
  const type = fromHex(memo.type);
  return type !== undefined && Buffer.from(type).toString("utf8") === MEMO_TYPE;
}

// =============================================================================
// Hex encoding/decoding helpers
// =============================================================================

/**
 * Convert bytes to upper-case hex (origin ledger memo convention).
 */
export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex").toUpperCase();
}

/**
 * Convert hex back to bytes. Returns undefined for odd-length or
 * non-hex input (Buffer would silently truncate it).
 */
export function fromHex(hex: string): Uint8Array | undefined {
  if (!HEX_PATTERN.test(hex)) {
    return undefined;
  }
  return new Uint8Array(Buffer.from(hex, "hex"));
}

function textToHex(text: string): string {
  return toHex(Buffer.from(text, "utf8"));
}
