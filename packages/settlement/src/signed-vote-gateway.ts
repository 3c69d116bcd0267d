/**
 * @tallybridge/settlement: Signed-vote gateway.
 *
 * Entry for identity-mode proposals. A verifier (external capability)
 * checks a detached signature over the canonical vote message; a valid
 * submission is settled through the same path as a transport delivery,
 * under a synthetic receipt id derived from the signature, so a replayed
 * signature is a duplicate.
 *
 * No value travels with a signed vote: rejections carry route null.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { isBaseUnitAmount, isUint32, isUint8 } from "@tallybridge/types";
import type { VotePayload } from "@tallybridge/types";
import { fromHex, HINT_SIZE, PAYLOAD_VERSION } from "@tallybridge/memo-codec";
import type { SettlementEngine } from "./settlement-engine.js";
import type { DeliveryOutcome, SignatureVerifier, SignedVoteSubmission } from "./types.js";
import { SettlementError } from "./types.js";

export const SIGNED_VOTE_DOMAIN = "tallybridge/signed-vote/v1";

/**
 * The exact string a voter signs.
 */
export function signedVoteMessage(proposalId: number, choiceId: number, nonce: number): string {
  return canonicalize({ domain: SIGNED_VOTE_DOMAIN, proposalId, choiceId, nonce });
}

/**
 * Receipt id for a signed vote: SHA-256 of the signature bytes.
 */
export function syntheticReceiptId(signature: Uint8Array): string {
  return createHash("sha256").update(signature).digest("hex");
}

export class SignedVoteGateway {
  private readonly _engine: SettlementEngine;
  private readonly _verifier: SignatureVerifier;

  constructor(engine: SettlementEngine, verifier: SignatureVerifier) {
    this._engine = engine;
    this._verifier = verifier;
  }

  /**
   * @throws SettlementError INVALID_SUBMISSION for out-of-range fields
   */
  submit(submission: SignedVoteSubmission): DeliveryOutcome {
    const hint = validateSubmission(submission);
    const signature = fromHex(submission.signature);

    if (signature === undefined || signature.length === 0) {
      return this._badSignature(submission, submission.signature.toLowerCase());
    }

    const receiptId = syntheticReceiptId(signature);
    const message = signedVoteMessage(submission.proposalId, submission.choiceId, submission.nonce);
    if (!this._verifier.verify(submission.signer, message, signature)) {
      return this._badSignature(submission, receiptId);
    }

    const payload: VotePayload =
      hint === undefined
        ? {
            version: PAYLOAD_VERSION,
            proposalId: submission.proposalId,
            choiceId: submission.choiceId,
            nonce: submission.nonce,
          }
        : {
            version: PAYLOAD_VERSION,
            proposalId: submission.proposalId,
            choiceId: submission.choiceId,
            nonce: submission.nonce,
            hint,
          };

    return this._engine.settle(
      { receiptId, rawAmount: submission.attestedAmount, asset: submission.asset, payload },
      { source: "signed", carriesValue: false },
    );
  }

  private _badSignature(submission: SignedVoteSubmission, receiptId: string): DeliveryOutcome {
    return this._engine.reject({
      reason: "badSignature",
      receiptId,
      rawAmount: submission.attestedAmount,
      asset: submission.asset,
      source: "signed",
      carriesValue: false,
    });
  }
}

function validateSubmission(submission: SignedVoteSubmission): Uint8Array | undefined {
  const problems: string[] = [];
  if (!isUint32(submission.proposalId)) problems.push("proposalId must be a uint32");
  if (!isUint8(submission.choiceId)) problems.push("choiceId must be a uint8");
  if (!isUint32(submission.nonce)) problems.push("nonce must be a uint32");
  if (!isBaseUnitAmount(submission.attestedAmount)) problems.push("attestedAmount must be base units");
  if (submission.asset.length === 0) problems.push("asset is required");
  if (submission.signer.length === 0) problems.push("signer is required");

  let hint: Uint8Array | undefined;
  if (submission.hint !== undefined) {
    hint = fromHex(submission.hint);
    if (hint === undefined || hint.length !== HINT_SIZE) {
      problems.push(`hint must be ${HINT_SIZE} bytes of hex`);
    }
  }

  if (problems.length > 0) {
    throw new SettlementError("INVALID_SUBMISSION", problems.join("; "));
  }
  return hint;
}
