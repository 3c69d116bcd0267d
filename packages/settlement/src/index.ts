/**
 * @tallybridge/settlement: Settlement side of the memo-vote relay.
 *
 * Provides:
 * - TransportAdapter, the only entry point the transport calls
 * - SettlementEngine, the single writer over tallies and receipts
 * - ProposalRegistry, IdempotencyStore, WeightNormalizer
 * - SignedVoteGateway for identity-mode proposals
 * - Collaborator interfaces: PriceOracle, ValueRouter, LedgerClock
 *
 * @packageDocumentation
 */

// Types & errors
export type {
  IdempotencyRecord,
  ConsumeContext,
  WeightMode,
  StaleOraclePolicy,
  NormalizerConfig,
  NormalizationResult,
  DeliveryOutcome,
  UnsettledDelivery,
  TransportDelivery,
  SignedVoteSubmission,
  SignatureVerifier,
  SettlementErrorCode,
  RegistryErrorCode,
} from "./types.js";
export { SettlementError, UnauthorizedCallerError, RegistryError } from "./types.js";

// Arithmetic
export {
  PRICE_DECIMALS,
  parseBaseUnits,
  parseDecimal,
  formatDecimal,
  tryParsePrice,
  applyPrice,
  sumBaseUnits,
} from "./amounts.js";

// Clock
export type { LedgerClock } from "./clock.js";
export { SystemLedgerClock, ManualLedgerClock, toIsoTimestamp } from "./clock.js";

// Collaborators
export type { IdempotencyStore } from "./idempotency-store.js";
export { InMemoryIdempotencyStore } from "./idempotency-store.js";
export type { PriceOracle, PriceBook } from "./price-oracle.js";
export { InMemoryPriceOracle } from "./price-oracle.js";
export type { MovementKind, ValueMovement, ValueRouter } from "./value-router.js";
export { InMemoryValueRouter, escrowRoute } from "./value-router.js";

// Core
export { WeightNormalizer, DEFAULT_NORMALIZER_CONFIG } from "./weight-normalizer.js";
export { ProposalRegistry, MAX_CHOICES } from "./proposal-registry.js";
export type { ComputeStep } from "./compute-meter.js";
export {
  ComputeMeter,
  COMPUTE_COSTS,
  TAIL_RESERVE,
  WORST_CASE_DELIVERY_COST,
  DEFAULT_COMPUTE_CEILING,
} from "./compute-meter.js";
export type { SettlementEngineOptions, SettleContext } from "./settlement-engine.js";
export { SettlementEngine } from "./settlement-engine.js";
export type { TransportAdapterOptions } from "./transport-adapter.js";
export { TransportAdapter } from "./transport-adapter.js";
export {
  SignedVoteGateway,
  SIGNED_VOTE_DOMAIN,
  signedVoteMessage,
  syntheticReceiptId,
} from "./signed-vote-gateway.js";
