/**
 * @tallybridge/memo-codec: Compact vote payload codec.
 *
 * Provides:
 * - Fixed-layout, versioned binary encoding of vote payloads
 * - Non-throwing decoding with explicit failure variants
 * - Hex memo framing for origin-ledger transfers
 *
 * @packageDocumentation
 */

export { encodePayload, decodePayload } from "./payload-codec.js";

export {
  encodeMemo,
  decodeMemo,
  isVoteMemo,
  toHex,
  fromHex,
  MEMO_TYPE,
  MEMO_FORMAT,
} from "./memo-encoder.js";

export {
  PAYLOAD_VERSION,
  BASE_PAYLOAD_SIZE,
  HINT_SIZE,
  FLAG_HINT,
  MAX_MEMO_BYTES,
  CodecError,
} from "./types.js";

export type {
  DecodeErrorKind,
  DecodeError,
  DecodeResult,
  VoteMemo,
  CodecErrorCode,
} from "./types.js";
