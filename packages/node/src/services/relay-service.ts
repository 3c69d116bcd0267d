/**
 * RelayService: Composition root for the settlement packages.
 *
 * Route handlers delegate to this service; they never import the
 * settlement packages directly. One service owns one engine, so every
 * mutation goes through the engine's single-writer methods.
 */

import { fromHex } from "@tallybridge/memo-codec";
import { GENESIS_ANCHOR, InMemoryEventStore, verifyHashChain } from "@tallybridge/event-store";
import type {
  ChainAnchor,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@tallybridge/event-store";
import {
  InMemoryPriceOracle,
  InMemoryValueRouter,
  SettlementEngine,
  SignedVoteGateway,
  SystemLedgerClock,
  TransportAdapter,
} from "@tallybridge/settlement";
import type {
  DeliveryOutcome,
  LedgerClock,
  NormalizerConfig,
  SignatureVerifier,
  SignedVoteSubmission,
  ValueMovement,
} from "@tallybridge/settlement";
import type { PriceSnapshot, Proposal, ProposalDefinition, ProposalState } from "@tallybridge/types";
import { Ed25519SignatureVerifier } from "./ed25519-verifier.js";

// =============================================================================
// Configuration
// =============================================================================

export interface RelayServiceConfig {
  readonly trustedTransport: string;
  readonly fallbackRoute: string;
  readonly computeCeiling?: number | undefined;
  readonly normalizer?: Partial<NormalizerConfig> | undefined;
  readonly emitDuplicateRejections?: boolean | undefined;

  /** Default: InMemoryEventStore. A non-empty store is replayed. */
  readonly events?: EventStore | undefined;

  /** Default: SystemLedgerClock */
  readonly clock?: LedgerClock | undefined;

  /** Default: Ed25519SignatureVerifier */
  readonly verifier?: SignatureVerifier | undefined;

  /** Told about delivery faults turned into internalError rejections */
  readonly onInternalError?: ((error: unknown, receiptId: string) => void) | undefined;
}

export interface DeliveryInput {
  readonly receiptId: string;
  readonly rawAmount: string;
  readonly asset: string;
  /** Memo payload as hex; anything that is not hex is delivered as no bytes */
  readonly memo: string;
}

export interface TallyView {
  readonly proposalId: number;
  readonly state: ProposalState;
  readonly choices: readonly { readonly choiceId: number; readonly weight: string }[];
  readonly total: string;
}

// =============================================================================
// Service
// =============================================================================

export class RelayService {
  readonly engine: SettlementEngine;
  readonly oracle: InMemoryPriceOracle;
  readonly router: InMemoryValueRouter;
  readonly clock: LedgerClock;

  private readonly _events: EventStore;
  private readonly _adapter: TransportAdapter;
  private readonly _gateway: SignedVoteGateway;
  private _verified: ChainAnchor = GENESIS_ANCHOR;
  private _ready = false;

  constructor(config: RelayServiceConfig) {
    this._events = config.events ?? new InMemoryEventStore();
    this.clock = config.clock ?? new SystemLedgerClock();
    this.oracle = new InMemoryPriceOracle();
    this.router = new InMemoryValueRouter();

    const engineOptions = {
      events: this._events,
      oracle: this.oracle,
      router: this.router,
      clock: this.clock,
      fallbackRoute: config.fallbackRoute,
      normalizer: config.normalizer,
      emitDuplicateRejections: config.emitDuplicateRejections,
    };
    this.engine =
      this._events.globalPosition() > 0
        ? SettlementEngine.restore(engineOptions)
        : SettlementEngine.create(engineOptions);

    this._adapter = new TransportAdapter({
      engine: this.engine,
      trustedTransport: config.trustedTransport,
      computeCeiling: config.computeCeiling,
      onInternalError: config.onInternalError,
    });
    this._gateway = new SignedVoteGateway(this.engine, config.verifier ?? new Ed25519SignatureVerifier());

    this._ready = true;
  }

  // ─── Votes ─────────────────────────────────────────────────────────

  /**
   * @throws UnauthorizedCallerError when caller is not the trusted transport
   */
  authorizeTransport(caller: string): void {
    this._adapter.authorize(caller);
  }

  /**
   * @throws UnauthorizedCallerError when caller is not the trusted transport
   */
  deliver(caller: string, input: DeliveryInput): DeliveryOutcome {
    return this._adapter.onDelivery(caller, {
      receiptId: input.receiptId,
      rawAmount: input.rawAmount,
      asset: input.asset,
      memo: fromHex(input.memo) ?? new Uint8Array(0),
    });
  }

  submitSignedVote(submission: SignedVoteSubmission): DeliveryOutcome {
    return this._gateway.submit(submission);
  }

  // ─── Oracle ────────────────────────────────────────────────────────

  publishPrice(asset: string, price: string, observedAt?: number): PriceSnapshot {
    return this.engine.publishPrice({ asset, price, observedAt: observedAt ?? this.clock.now() });
  }

  listPrices(): readonly PriceSnapshot[] {
    return this.oracle.list();
  }

  // ─── Proposals ─────────────────────────────────────────────────────

  createProposal(def: ProposalDefinition): Proposal {
    return this.engine.createProposal(def);
  }

  openProposal(id: number): Proposal {
    return this.engine.openProposal(id);
  }

  closeProposal(id: number): Proposal {
    return this.engine.closeProposal(id);
  }

  archiveProposal(id: number): Proposal {
    return this.engine.archiveProposal(id);
  }

  closeExpired(): readonly Proposal[] {
    return this.engine.closeExpired();
  }

  pruneProposal(id: number): number {
    return this.engine.pruneProposal(id);
  }

  getProposal(id: number): Proposal | undefined {
    return this.engine.getProposal(id);
  }

  listProposals(state?: ProposalState): readonly Proposal[] {
    return this.engine.listProposals(state);
  }

  getTally(id: number): TallyView | undefined {
    const proposal = this.engine.getProposal(id);
    const tally = this.engine.getTally(id);
    if (proposal === undefined || tally === undefined) {
      return undefined;
    }
    return {
      proposalId: id,
      state: proposal.state,
      choices: tally.map((weight, choiceId) => ({ choiceId, weight })),
      total: tally.reduce((sum, w) => sum + BigInt(w), 0n).toString(),
    };
  }

  // ─── Value ─────────────────────────────────────────────────────────

  movementsFor(receiptId: string): readonly ValueMovement[] {
    return this.router.movementsFor(receiptId);
  }

  // ─── Events ────────────────────────────────────────────────────────

  get events(): EventStore {
    return this._events;
  }

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this._events.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this._events.read(streamId, options);
  }

  // ─── Health & Integrity ────────────────────────────────────────────

  /**
   * Verify the hash chain past the last position already found intact.
   * A broken chain is re-checked from the same anchor on every call.
   */
  checkIntegrity(): EventStoreIntegrityResult {
    const fresh = this._events.readAll({ fromPosition: this._verified.position + 1 });
    const result = verifyHashChain(fresh, this._verified);
    const last = fresh[fresh.length - 1];
    if (result.valid && last !== undefined) {
      this._verified = { hash: last.hash, position: last.globalPosition };
    }
    return result;
  }

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
  }
}
