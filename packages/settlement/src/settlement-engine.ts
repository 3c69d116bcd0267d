/**
 * @tallybridge/settlement: Settlement Engine (tally ledger).
 *
 * Single writer over the registry, the idempotency store, the tallies and
 * the event log. Every method is synchronous, so each delivery is one
 * atomic transition on the event loop.
 *
 * API surface:
 * - createProposal() / openProposal() / closeProposal() / archiveProposal()
 * - closeExpired() - sweep open proposals whose window has ended
 * - pruneProposal() - drop idempotency records of an archived proposal
 * - publishPrice() - record a price snapshot and make it current
 * - settle() - the vote path shared by transport and signed votes
 * - reject() - record a delivery that never reached settle()
 * - getTally() / getProposal() / listProposals()
 *
 * State is derived from the event log: SettlementEngine.restore() replays
 * a store and arrives at the same registry, tallies, consumed receipts and
 * prices. Every change is appended to the log before it is applied, so a
 * failed append leaves the engine as it was.
 */

import { randomUUID } from "node:crypto";
import type {
  DeliveryReceipt,
  DomainEvent,
  EventSource,
  PriceSnapshot,
  Proposal,
  ProposalDefinition,
  ProposalState,
  RejectionReason,
  VoteSource,
} from "@tallybridge/types";
import {
  createRelayCatalog,
  isProposalArchivedPayload,
  isProposalClosedPayload,
  isProposalCreatedPayload,
  isProposalOpenedPayload,
  isPricePublishedPayload,
  isReceiptsPrunedPayload,
  isVoteCastPayload,
  isVoteRejectedPayload,
  PRICES_STREAM,
  proposalStream,
  REJECTIONS_STREAM,
  RELAY_EVENTS,
} from "@tallybridge/event-store";
import type { EventCatalog, EventStore, StoredEvent } from "@tallybridge/event-store";
import { parseBaseUnits } from "./amounts.js";
import { toIsoTimestamp } from "./clock.js";
import type { LedgerClock } from "./clock.js";
import type { ComputeMeter } from "./compute-meter.js";
import { InMemoryIdempotencyStore } from "./idempotency-store.js";
import type { IdempotencyStore } from "./idempotency-store.js";
import type { PriceBook } from "./price-oracle.js";
import { ProposalRegistry } from "./proposal-registry.js";
import { escrowRoute } from "./value-router.js";
import type { ValueRouter } from "./value-router.js";
import { WeightNormalizer } from "./weight-normalizer.js";
import type { DeliveryOutcome, NormalizerConfig, UnsettledDelivery } from "./types.js";
import { SettlementError } from "./types.js";

// =============================================================================
// Options
// =============================================================================

export interface SettlementEngineOptions {
  readonly events: EventStore;
  readonly oracle: PriceBook;
  readonly router: ValueRouter;
  readonly clock: LedgerClock;

  /** Where value goes when no proposal can be identified */
  readonly fallbackRoute: string;

  readonly normalizer?: Partial<NormalizerConfig> | undefined;

  /** Emit VoteRejected(duplicate) for re-deliveries. Default: true */
  readonly emitDuplicateRejections?: boolean | undefined;

  /** Default: a fresh InMemoryIdempotencyStore */
  readonly idempotency?: IdempotencyStore | undefined;

  /** Recorded as the actor of emitted events. Default: "settlement" */
  readonly actor?: string | undefined;
}

export interface SettleContext {
  readonly source: VoteSource;

  /** Whether value arrived with the call and must be routed */
  readonly carriesValue: boolean;

  readonly meter?: ComputeMeter | undefined;
}

interface RejectionTarget {
  readonly receiptId: string;
  readonly rawAmount: string;
  readonly asset: string;
  readonly proposalId: number | null;
  readonly source: VoteSource;
  readonly carriesValue: boolean;
  readonly meter?: ComputeMeter | undefined;
}

const EVENT_SOURCE: Readonly<Record<VoteSource, EventSource>> = {
  transport: "transport",
  signed: "gateway",
};

// =============================================================================
// Engine
// =============================================================================

export class SettlementEngine {
  private readonly _events: EventStore;
  private readonly _router: ValueRouter;
  private readonly _clock: LedgerClock;
  private readonly _fallbackRoute: string;
  private readonly _prices: PriceBook;
  private readonly _normalizer: WeightNormalizer;
  private readonly _emitDuplicates: boolean;
  private readonly _idempotency: IdempotencyStore;
  private readonly _actor: string;
  private readonly _catalog: EventCatalog = createRelayCatalog();
  private readonly _registry = new ProposalRegistry();
  private readonly _tallies = new Map<number, bigint[]>();

  private constructor(options: SettlementEngineOptions) {
    if (options.fallbackRoute.trim().length === 0) {
      throw new SettlementError("INVALID_SUBMISSION", "A global fallback route is required");
    }
    this._events = options.events;
    this._router = options.router;
    this._clock = options.clock;
    this._fallbackRoute = options.fallbackRoute;
    this._prices = options.oracle;
    this._normalizer = new WeightNormalizer(options.oracle, options.normalizer);
    this._emitDuplicates = options.emitDuplicateRejections ?? true;
    this._idempotency = options.idempotency ?? new InMemoryIdempotencyStore();
    this._actor = options.actor ?? "settlement";
  }

  /**
   * Start an engine over an empty event store.
   */
  static create(options: SettlementEngineOptions): SettlementEngine {
    if (options.events.globalPosition() > 0) {
      throw new SettlementError(
        "STORE_NOT_EMPTY",
        "Event store already holds events; use SettlementEngine.restore()",
      );
    }
    return new SettlementEngine(options);
  }

  /**
   * Rebuild an engine by replaying every event in the store.
   */
  static restore(options: SettlementEngineOptions): SettlementEngine {
    const engine = new SettlementEngine(options);
    for (const stored of options.events.readAll()) {
      engine._replay(stored);
    }
    return engine;
  }

  // ─── Administration ──────────────────────────────────────────────────

  createProposal(def: ProposalDefinition): Proposal {
    const now = this._clock.now();
    const proposal = this._registry.planCreate(def, now);
    this._emit(proposalStream(proposal.id), RELAY_EVENTS.PROPOSAL_CREATED, "registry", `proposal:${proposal.id}`, {
      proposalId: proposal.id,
      choiceCount: proposal.choiceCount,
      opensAt: proposal.opensAt,
      closesAt: proposal.closesAt,
      treasuryRoute: proposal.treasuryRoute,
      mode: proposal.mode,
      title: proposal.title ?? null,
      createdAt: now,
    });
    this._tallies.set(proposal.id, new Array<bigint>(proposal.choiceCount).fill(0n));
    return this._registry.commit(proposal);
  }

  openProposal(id: number): Proposal {
    const now = this._clock.now();
    const proposal = this._registry.planOpen(id, now);
    this._emit(proposalStream(id), RELAY_EVENTS.PROPOSAL_OPENED, "registry", `proposal:${id}`, {
      proposalId: id,
      opensAt: proposal.opensAt,
      closesAt: proposal.closesAt,
      openedAt: now,
    });
    return this._registry.commit(proposal);
  }

  closeProposal(id: number): Proposal {
    const now = this._clock.now();
    const proposal = this._registry.planClose(id, now);
    this._emitClosed(proposal, now, "admin");
    return this._registry.commit(proposal);
  }

  archiveProposal(id: number): Proposal {
    const now = this._clock.now();
    const proposal = this._registry.planArchive(id, now);
    this._emit(proposalStream(id), RELAY_EVENTS.PROPOSAL_ARCHIVED, "registry", `proposal:${id}`, {
      proposalId: id,
      archivedAt: now,
    });
    return this._registry.commit(proposal);
  }

  /**
   * Close every open proposal whose window has ended.
   */
  closeExpired(): readonly Proposal[] {
    const now = this._clock.now();
    const closed: Proposal[] = [];
    for (const open of this._registry.list("open")) {
      const proposal = this._closeByWindow(open.id, now);
      if (proposal !== undefined) closed.push(proposal);
    }
    return closed;
  }

  /**
   * Drop the idempotency records bound to an archived proposal. An
   * archived proposal never accepts votes again, so a re-delivered receipt
   * is still rejected, just as unknownOrClosed instead of duplicate.
   *
   * @returns number of records dropped
   */
  pruneProposal(id: number): number {
    const proposal = this._registry.require(id);
    if (proposal.state !== "archived") {
      throw new SettlementError(
        "PRUNE_REFUSED",
        `Proposal ${id} is ${proposal.state}; only archived proposals can be pruned`,
      );
    }
    const count = this._idempotency.boundTo(id);
    this._emit(proposalStream(id), RELAY_EVENTS.RECEIPTS_PRUNED, "registry", `proposal:${id}`, {
      proposalId: id,
      count,
    });
    return this._idempotency.pruneProposal(id);
  }

  // ─── Prices ──────────────────────────────────────────────────────────

  /**
   * Record a price snapshot and make it the asset's current price.
   *
   * @throws SettlementError INVALID_PRICE or STALE_PUBLICATION
   */
  publishPrice(snapshot: PriceSnapshot): PriceSnapshot {
    const accepted = this._prices.check(snapshot);
    this._emit(PRICES_STREAM, RELAY_EVENTS.PRICE_PUBLISHED, "oracle", `price:${accepted.asset}`, {
      asset: accepted.asset,
      price: accepted.price,
      observedAt: accepted.observedAt,
    });
    this._prices.publish(accepted);
    return accepted;
  }

  // ─── Vote path ───────────────────────────────────────────────────────

  /**
   * Settle a decoded delivery. Never throws for a well-formed receipt.
   *
   * Order of checks:
   * 1. receipt already consumed → duplicate
   * 2. proposal unknown or not accepting → unknownOrClosed
   * 3. source does not match proposal mode → modeMismatch
   * 4. choice out of range → invalidChoice
   * 5. no usable price → noPrice / staleOracle
   * 6. emit VoteCast, then consume and tally += weight
   *
   * Every outcome past step 1 consumes the receipt, bound to the target
   * proposal, once its event is written.
   */
  settle(receipt: DeliveryReceipt, context: SettleContext): DeliveryOutcome {
    const { payload } = receipt;
    const now = this._clock.now();
    const meter = context.meter;
    const target: RejectionTarget = {
      receiptId: receipt.receiptId,
      rawAmount: receipt.rawAmount,
      asset: receipt.asset,
      proposalId: payload.proposalId,
      source: context.source,
      carriesValue: context.carriesValue,
      meter,
    };

    if (meter !== undefined && !meter.charge("idempotency")) {
      return this._reject(target, "computeExhausted", undefined, false);
    }
    if (this._idempotency.has(receipt.receiptId)) {
      const known = this._registry.get(payload.proposalId);
      return this._reject(target, "duplicate", known, false, this._emitDuplicates);
    }

    if (meter !== undefined && !meter.charge("proposalLookup")) {
      return this._reject(target, "computeExhausted", this._registry.get(payload.proposalId), true);
    }
    const proposal = this._closeByWindow(payload.proposalId, now) ?? this._registry.get(payload.proposalId);
    if (proposal === undefined || !this._registry.isAcceptingVotes(proposal.id, now)) {
      return this._reject(target, "unknownOrClosed", proposal, true);
    }

    const expectedMode = context.source === "signed" ? "identity" : "payment";
    if (proposal.mode !== expectedMode) {
      return this._reject(target, "modeMismatch", proposal, true);
    }

    if (payload.choiceId >= proposal.choiceCount) {
      return this._reject(target, "invalidChoice", proposal, true);
    }

    if (meter !== undefined && !meter.charge("normalize")) {
      return this._reject(target, "computeExhausted", proposal, true);
    }
    const normalized = this._normalizer.normalize(parseBaseUnits(receipt.rawAmount), receipt.asset, now);
    if (!normalized.ok) {
      return this._reject(target, normalized.reason, proposal, true);
    }

    if (meter !== undefined && !meter.charge("tally")) {
      return this._reject(target, "computeExhausted", proposal, true);
    }
    const weight = normalized.weight.toString();
    this._emit(proposalStream(proposal.id), RELAY_EVENTS.VOTE_CAST, EVENT_SOURCE[context.source], receipt.receiptId, {
      proposalId: proposal.id,
      choiceId: payload.choiceId,
      normalizedWeight: weight,
      receiptId: receipt.receiptId,
      hint: payload.hint === undefined ? null : Buffer.from(payload.hint).toString("hex"),
      staleOracle: normalized.staleOracle,
      rawAmount: receipt.rawAmount,
      asset: receipt.asset,
      nonce: payload.nonce,
      source: context.source,
    });
    this._idempotency.tryConsume(receipt.receiptId, { consumedAt: now, proposalId: proposal.id });
    this._addToTally(proposal.id, payload.choiceId, normalized.weight);

    if (context.carriesValue) {
      this._router.move({
        receiptId: receipt.receiptId,
        kind: "escrow",
        route: escrowRoute(proposal.id),
        asset: receipt.asset,
        amount: receipt.rawAmount,
      });
    }
    meter?.chargeTail();

    return {
      status: "accepted",
      receiptId: receipt.receiptId,
      proposalId: proposal.id,
      choiceId: payload.choiceId,
      weight,
      staleOracle: normalized.staleOracle,
    };
  }

  /**
   * Record a delivery that could not be settled. Its value, if any, goes
   * to the global fallback route. With consumeUnbound, a receipt seen
   * before is reported as a duplicate instead.
   */
  reject(delivery: UnsettledDelivery, meter?: ComputeMeter): DeliveryOutcome {
    const target: RejectionTarget = {
      receiptId: delivery.receiptId,
      rawAmount: delivery.rawAmount,
      asset: delivery.asset,
      proposalId: null,
      source: delivery.source,
      carriesValue: delivery.carriesValue,
      meter,
    };

    if (delivery.consumeUnbound === true) {
      if (this._idempotency.has(delivery.receiptId)) {
        return this._reject(target, "duplicate", undefined, false, this._emitDuplicates);
      }
      return this._reject(target, delivery.reason, undefined, true);
    }

    return this._reject(target, delivery.reason, undefined, false);
  }

  /**
   * Move value to the fallback route without recording an event. Only for
   * hosts whose event log has failed mid-delivery.
   */
  forwardToFallback(receiptId: string, asset: string, amount: string): string {
    this._router.move({ receiptId, kind: "forward", route: this._fallbackRoute, asset, amount });
    return this._fallbackRoute;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Accumulated weight per choice as decimal strings.
   */
  getTally(proposalId: number): readonly string[] | undefined {
    return this._tallies.get(proposalId)?.map((w) => w.toString());
  }

  getProposal(id: number): Proposal | undefined {
    return this._registry.get(id);
  }

  listProposals(state?: ProposalState): readonly Proposal[] {
    return this._registry.list(state);
  }

  isConsumed(receiptId: string): boolean {
    return this._idempotency.has(receiptId);
  }

  get events(): EventStore {
    return this._events;
  }

  get fallbackRoute(): string {
    return this._fallbackRoute;
  }

  get normalizerConfig(): NormalizerConfig {
    return this._normalizer.config;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _reject(
    target: RejectionTarget,
    reason: RejectionReason,
    proposal: Proposal | undefined,
    consumed: boolean,
    emit = true,
  ): DeliveryOutcome {
    const route = target.carriesValue ? (proposal?.treasuryRoute ?? this._fallbackRoute) : null;

    if (emit) {
      this._emit(REJECTIONS_STREAM, RELAY_EVENTS.VOTE_REJECTED, EVENT_SOURCE[target.source], target.receiptId, {
        reason,
        receiptId: target.receiptId,
        rawAmount: target.rawAmount,
        asset: target.asset,
        route,
        proposalId: target.proposalId,
        consumed,
        source: target.source,
      });
    }
    if (consumed) {
      const consumedAt = this._clock.now();
      this._idempotency.tryConsume(
        target.receiptId,
        target.proposalId === null ? { consumedAt } : { consumedAt, proposalId: target.proposalId },
      );
    }
    if (route !== null) {
      this._router.move({
        receiptId: target.receiptId,
        kind: "forward",
        route,
        asset: target.asset,
        amount: target.rawAmount,
      });
    }
    target.meter?.chargeTail();

    return { status: "rejected", receiptId: target.receiptId, reason, route };
  }

  private _closeByWindow(id: number, now: number): Proposal | undefined {
    if (this._registry.get(id) === undefined) return undefined;
    const closed = this._registry.planCloseIfExpired(id, now);
    if (closed === undefined) return undefined;
    this._emitClosed(closed, now, "window");
    return this._registry.commit(closed);
  }

  private _emitClosed(proposal: Proposal, now: number, trigger: "admin" | "window"): void {
    this._emit(proposalStream(proposal.id), RELAY_EVENTS.PROPOSAL_CLOSED, "registry", `proposal:${proposal.id}`, {
      proposalId: proposal.id,
      closedAt: proposal.closedAt ?? now,
      trigger,
    });
  }

  private _addToTally(proposalId: number, choiceId: number, weight: bigint): void {
    const tally = this._tallies.get(proposalId);
    if (tally === undefined || choiceId >= tally.length) {
      throw new SettlementError("INVALID_EVENT", `No tally slot for proposal ${proposalId} choice ${choiceId}`);
    }
    tally[choiceId] = (tally[choiceId] ?? 0n) + weight;
  }

  private _emit(
    streamId: string,
    type: string,
    source: EventSource,
    correlationId: string,
    payload: Readonly<Record<string, unknown>>,
  ): void {
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: toIsoTimestamp(this._clock.now()),
        actor: this._actor,
        correlationId,
        source,
      },
      payload,
    };
    this._catalog.assertValid(event);
    this._events.append(streamId, [event]);
  }

  // ─── Replay ──────────────────────────────────────────────────────────

  private _replay(stored: StoredEvent): void {
    const { type, payload, metadata } = stored.event;
    const at = Math.floor(Date.parse(metadata.timestamp) / 1000);
    const invalid = (): SettlementError =>
      new SettlementError("INVALID_EVENT", `Cannot replay ${type} at position ${stored.globalPosition}`);

    switch (type) {
      case RELAY_EVENTS.PROPOSAL_CREATED: {
        if (!isProposalCreatedPayload(payload)) throw invalid();
        this._registry.create(
          {
            id: payload.proposalId,
            choiceCount: payload.choiceCount,
            opensAt: payload.opensAt,
            closesAt: payload.closesAt,
            treasuryRoute: payload.treasuryRoute,
            mode: payload.mode,
            title: payload.title ?? undefined,
          },
          payload.createdAt,
        );
        this._tallies.set(payload.proposalId, new Array<bigint>(payload.choiceCount).fill(0n));
        return;
      }
      case RELAY_EVENTS.PROPOSAL_OPENED: {
        if (!isProposalOpenedPayload(payload)) throw invalid();
        this._registry.open(payload.proposalId, payload.openedAt);
        return;
      }
      case RELAY_EVENTS.PROPOSAL_CLOSED: {
        if (!isProposalClosedPayload(payload)) throw invalid();
        if (payload.trigger === "admin") {
          this._registry.close(payload.proposalId, payload.closedAt);
        } else if (this._registry.closeIfExpired(payload.proposalId, payload.closedAt) === undefined) {
          throw invalid();
        }
        return;
      }
      case RELAY_EVENTS.PROPOSAL_ARCHIVED: {
        if (!isProposalArchivedPayload(payload)) throw invalid();
        this._registry.archive(payload.proposalId, payload.archivedAt);
        return;
      }
      case RELAY_EVENTS.VOTE_CAST: {
        if (!isVoteCastPayload(payload)) throw invalid();
        this._idempotency.tryConsume(payload.receiptId, { consumedAt: at, proposalId: payload.proposalId });
        this._addToTally(payload.proposalId, payload.choiceId, BigInt(payload.normalizedWeight));
        return;
      }
      case RELAY_EVENTS.VOTE_REJECTED: {
        if (!isVoteRejectedPayload(payload)) throw invalid();
        if (payload.consumed) {
          this._idempotency.tryConsume(
            payload.receiptId,
            payload.proposalId === null
              ? { consumedAt: at }
              : { consumedAt: at, proposalId: payload.proposalId },
          );
        }
        return;
      }
      case RELAY_EVENTS.RECEIPTS_PRUNED: {
        if (!isReceiptsPrunedPayload(payload)) throw invalid();
        this._idempotency.pruneProposal(payload.proposalId);
        return;
      }
      case RELAY_EVENTS.PRICE_PUBLISHED: {
        if (!isPricePublishedPayload(payload)) throw invalid();
        this._prices.publish(payload);
        return;
      }
      default:
        // Event types this engine does not know about carry no settlement state.
        return;
    }
  }
}
