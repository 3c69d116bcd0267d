/**
 * Shared test wiring: a settlement engine over in-memory collaborators,
 * driven by a manual ledger clock.
 */

import { encodePayload } from "@tallybridge/memo-codec";
import { InMemoryEventStore } from "@tallybridge/event-store";
import type { ProposalDefinition } from "@tallybridge/types";
import { ManualLedgerClock } from "../src/clock.js";
import { InMemoryPriceOracle } from "../src/price-oracle.js";
import { InMemoryValueRouter } from "../src/value-router.js";
import { SettlementEngine } from "../src/settlement-engine.js";
import { TransportAdapter } from "../src/transport-adapter.js";
import type { NormalizerConfig, TransportDelivery } from "../src/types.js";

export const TRANSPORT = "transport-caller";
export const FALLBACK = "fallback-route";
export const TREASURY = "treasury-route";
export const ASSET = "ORIGIN.COIN";
export const START = 1_000;
/** Ledger time a harness starts at, before proposal windows open */
export const SETUP = START - 100;

export interface Harness {
  readonly clock: ManualLedgerClock;
  readonly oracle: InMemoryPriceOracle;
  readonly router: InMemoryValueRouter;
  readonly events: InMemoryEventStore;
  readonly engine: SettlementEngine;
  readonly adapter: TransportAdapter;
}

export interface HarnessOptions {
  readonly normalizer?: Partial<NormalizerConfig>;
  readonly emitDuplicateRejections?: boolean;
  readonly price?: string | null;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const clock = new ManualLedgerClock(SETUP);
  const oracle = new InMemoryPriceOracle();
  const router = new InMemoryValueRouter();
  const events = new InMemoryEventStore();

  const price = options.price === undefined ? "2.0" : options.price;
  if (price !== null) {
    oracle.publish({ asset: ASSET, price, observedAt: START });
  }

  const engine = SettlementEngine.create({
    events,
    oracle,
    router,
    clock,
    fallbackRoute: FALLBACK,
    normalizer: options.normalizer,
    emitDuplicateRejections: options.emitDuplicateRejections,
  });
  const adapter = new TransportAdapter({ engine, trustedTransport: TRANSPORT });

  return { clock, oracle, router, events, engine, adapter };
}

export function proposalDef(overrides: Partial<ProposalDefinition> = {}): ProposalDefinition {
  return {
    id: 7,
    choiceCount: 3,
    opensAt: START,
    closesAt: START + 1_000,
    treasuryRoute: TREASURY,
    ...overrides,
  };
}

/**
 * Create and open proposals (by default one: id 7, three choices, window
 * [1000, 2000)), then move the clock to START if it is still before it.
 */
export function openProposal(h: Harness, ...overrides: Partial<ProposalDefinition>[]): void {
  for (const override of overrides.length === 0 ? [{}] : overrides) {
    const def = proposalDef(override);
    h.engine.createProposal(def);
    h.engine.openProposal(def.id);
  }
  if (h.clock.now() < START) {
    h.clock.set(START);
  }
}

export function receiptId(n: number): string {
  return n.toString(16).padStart(64, "0");
}

export function delivery(
  n: number,
  vote: { proposalId?: number; choiceId?: number; nonce?: number } = {},
  rawAmount = "1000000",
): TransportDelivery {
  return {
    receiptId: receiptId(n),
    rawAmount,
    asset: ASSET,
    memo: encodePayload({
      version: 1,
      proposalId: vote.proposalId ?? 7,
      choiceId: vote.choiceId ?? 0,
      nonce: vote.nonce ?? n,
    }),
  };
}

export function eventTypes(h: Harness): string[] {
  return h.events.readAll().map((e) => e.event.type);
}

export function lastPayload(h: Harness): Readonly<Record<string, unknown>> | undefined {
  const all = h.events.readAll();
  return all[all.length - 1]?.event.payload;
}
