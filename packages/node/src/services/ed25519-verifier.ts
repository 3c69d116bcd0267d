/**
 * Ed25519 signature verifier for signed votes.
 *
 * The signer is the raw 32-byte public key in hex; the signature is the
 * 64-byte detached signature over the UTF-8 vote message.
 */

import { createPublicKey, verify } from "node:crypto";
import type { KeyObject } from "node:crypto";
import { fromHex } from "@tallybridge/memo-codec";
import type { SignatureVerifier } from "@tallybridge/settlement";

// DER header of an Ed25519 SubjectPublicKeyInfo; the raw key follows it.
const ED25519_SPKI_PREFIX = Buffer.from("302a300506032b6570032100", "hex");

const PUBLIC_KEY_SIZE = 32;
const SIGNATURE_SIZE = 64;

export class Ed25519SignatureVerifier implements SignatureVerifier {
  verify(signer: string, message: string, signature: Uint8Array): boolean {
    if (signature.length !== SIGNATURE_SIZE) {
      return false;
    }
    const key = publicKeyFromHex(signer);
    if (key === undefined) {
      return false;
    }
    return verify(null, Buffer.from(message, "utf8"), key, signature);
  }
}

/**
 * @returns undefined when the hex is not a usable Ed25519 public key
 */
export function publicKeyFromHex(hex: string): KeyObject | undefined {
  const raw = fromHex(hex);
  if (raw === undefined || raw.length !== PUBLIC_KEY_SIZE) {
    return undefined;
  }
  try {
    return createPublicKey({
      key: Buffer.concat([ED25519_SPKI_PREFIX, raw]),
      format: "der",
      type: "spki",
    });
  } catch (err) {
    // OpenSSL refuses some byte strings as curve points; such a signer
    // cannot have produced a valid signature.
    if (err instanceof Error) return undefined;
    throw err;
  }
}
