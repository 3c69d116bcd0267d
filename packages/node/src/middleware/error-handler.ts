/**
 * Global error handler.
 *
 * Maps domain error codes (RegistryError, SettlementError,
 * EventStoreError, ...) to HTTP statuses and wraps every failure in the
 * error envelope. Unknown errors become a 500 without internal details.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Registry
  PROPOSAL_EXISTS: 409,
  PROPOSAL_NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  INVALID_PROPOSAL: 400,

  // Settlement
  UNAUTHORIZED_CALLER: 403,
  INVALID_AMOUNT: 400,
  INVALID_PRICE: 400,
  INVALID_SUBMISSION: 400,
  STALE_PUBLICATION: 409,
  PRUNE_REFUSED: 409,

  // Event store
  CONCURRENCY_CONFLICT: 409,
  INVALID_STREAM_ID: 400,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = errorCode(err);
  const status = code === undefined ? 500 : (STATUS_MAP[code] ?? 500);

  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
}
