/**
 * Vote Payload Codec
 *
 * Encodes vote payloads into the fixed binary layout carried in origin-ledger
 * memos, and decodes delivered bytes back into payloads.
 *
 * Decoding is a pure function over at most MAX_MEMO_BYTES bytes: no lookups,
 * no allocation proportional to input size, no exceptions. Unknown versions
 * and reserved flag bits fail closed.
 */

import { isUint32, isUint8 } from "@tallybridge/types";
import type { VotePayload } from "@tallybridge/types";
import {
  BASE_PAYLOAD_SIZE,
  CodecError,
  FLAG_HINT,
  HINT_SIZE,
  MAX_MEMO_BYTES,
  PAYLOAD_VERSION,
} from "./types.js";
import type { DecodeError, DecodeResult } from "./types.js";

/**
 * Encode a vote payload.
 *
 * @throws CodecError if a field is outside its integer range or the hint
 *   is not exactly 20 bytes
 */
export function encodePayload(payload: VotePayload): Uint8Array {
  if (payload.version !== PAYLOAD_VERSION) {
    throw new CodecError(
      "UNSUPPORTED_VERSION",
      `Cannot encode payload version ${String(payload.version)}, only ${PAYLOAD_VERSION} is supported`,
    );
  }
  if (!isUint32(payload.proposalId)) {
    throw new CodecError("FIELD_OUT_OF_RANGE", `proposalId must be a uint32, got ${String(payload.proposalId)}`);
  }
  if (!isUint8(payload.choiceId)) {
    throw new CodecError("FIELD_OUT_OF_RANGE", `choiceId must be a uint8, got ${String(payload.choiceId)}`);
  }
  if (!isUint32(payload.nonce)) {
    throw new CodecError("FIELD_OUT_OF_RANGE", `nonce must be a uint32, got ${String(payload.nonce)}`);
  }

  const hint = payload.hint;
  if (hint !== undefined && hint.length !== HINT_SIZE) {
    throw new CodecError(
      "FIELD_OUT_OF_RANGE",
      `hint must be exactly ${HINT_SIZE} bytes, got ${hint.length}`,
    );
  }

  const size = BASE_PAYLOAD_SIZE + (hint !== undefined ? HINT_SIZE : 0);
  const bytes = new Uint8Array(size);
  const view = new DataView(bytes.buffer);

  view.setUint8(0, payload.version);
  view.setUint32(1, payload.proposalId, false);
  view.setUint8(5, payload.choiceId);
  view.setUint32(6, payload.nonce, false);
  view.setUint8(10, hint !== undefined ? FLAG_HINT : 0);

  if (hint !== undefined) {
    bytes.set(hint, BASE_PAYLOAD_SIZE);
  }

  return bytes;
}

/**
 * Decode delivered memo bytes.
 *
 * Checks run in a fixed order: budget, version, header length,
 * reserved flags, declared length.
 */
export function decodePayload(bytes: Uint8Array): DecodeResult {
  if (bytes.length === 0) {
    return fail("Truncated", "Empty payload");
  }
  if (bytes.length > MAX_MEMO_BYTES) {
    return fail(
      "TrailingBytes",
      `Payload of ${bytes.length} bytes exceeds the ${MAX_MEMO_BYTES}-byte memo budget`,
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  const version = view.getUint8(0);
  if (version !== PAYLOAD_VERSION) {
    return fail("BadVersion", `Unsupported payload version ${version}`);
  }

  if (bytes.length < BASE_PAYLOAD_SIZE) {
    return fail(
      "Truncated",
      `Expected at least ${BASE_PAYLOAD_SIZE} bytes, got ${bytes.length}`,
    );
  }

  const flags = view.getUint8(10);
  if ((flags & ~FLAG_HINT) !== 0) {
    return fail("BadVersion", `Reserved flag bits set: 0x${flags.toString(16).padStart(2, "0")}`);
  }

  const hasHint = (flags & FLAG_HINT) !== 0;
  const expected = BASE_PAYLOAD_SIZE + (hasHint ? HINT_SIZE : 0);

  if (bytes.length < expected) {
    return fail("Truncated", `Expected ${expected} bytes, got ${bytes.length}`);
  }
  if (bytes.length > expected) {
    return fail(
      "TrailingBytes",
      `Expected ${expected} bytes, got ${bytes.length}`,
    );
  }

  const base = {
    version,
    proposalId: view.getUint32(1, false),
    choiceId: view.getUint8(5),
    nonce: view.getUint32(6, false),
  };

  const payload: VotePayload = hasHint
    ? { ...base, hint: bytes.slice(BASE_PAYLOAD_SIZE, expected) }
    : base;

  return { ok: true, payload };
}

function fail(kind: DecodeError["kind"], message: string): DecodeResult {
  return { ok: false, error: { kind, message } };
}
