/**
 * @tallybridge/event-store: Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward,
 * which is what lets an external auditor trust an exported tally log.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedEvent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

function canonicalEventContent(event: UnhashedEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(
  event: UnhashedEvent,
  previousHash: string,
): string {
  const input = canonicalEventContent(event) + previousHash;
  return createHash("sha256").update(input).digest("hex");
}

/**
 * A point in the chain that verification resumes from.
 */
export interface ChainAnchor {
  /** Hash of the event at `position` (GENESIS_HASH for position 0) */
  readonly hash: string;
  readonly position: number;
}

export const GENESIS_ANCHOR: ChainAnchor = { hash: GENESIS_HASH, position: 0 };

/**
 * Verify the hash chain of a sequence of events in global position order.
 *
 * With an anchor, `events` are the ones following it: the first must link
 * to `anchor.hash`. This lets a caller that already verified a prefix
 * check only what was appended since.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
  anchor: ChainAnchor = GENESIS_ANCHOR,
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = anchor.hash;
  let lastVerifiedPosition = anchor.position;

  for (const event of events) {
    if (event.previousHash !== previousHash) {
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    previousHash = event.hash;
    lastVerifiedPosition = event.globalPosition;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
