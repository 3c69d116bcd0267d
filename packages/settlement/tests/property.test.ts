/**
 * Property-Based Tests for @tallybridge/settlement
 *
 * Drives random delivery sequences (valid votes, unknown proposals, bad
 * choices, garbage memos, re-used receipts, a moving clock) through the
 * transport adapter and checks:
 *
 * 1. Idempotence: re-delivering accepted receipts changes nothing
 * 2. Conservation: tallies equal the sum of VoteCast weights
 * 3. Window enforcement: deliveries at or after closesAt never move a tally
 * 4. No stranding: every delivery moves its value exactly once
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { isVoteCastPayload } from "@tallybridge/event-store";
import type { TransportDelivery } from "../src/types.js";
import { TRANSPORT, createHarness, delivery, openProposal } from "./fixtures.js";
import type { Harness } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

interface Step {
  readonly delivery: TransportDelivery;
  readonly advance: number;
}

const arbStep: fc.Arbitrary<Step> = fc
  .record({
    n: fc.integer({ min: 1, max: 12 }),
    proposalId: fc.constantFrom(7, 8, 99),
    choiceId: fc.integer({ min: 0, max: 4 }),
    rawAmount: fc.bigInt({ min: 0n, max: 10n ** 12n }),
    garbage: fc.option(fc.uint8Array({ maxLength: 40 }), { nil: undefined, freq: 5 }),
    advance: fc.integer({ min: 0, max: 150 }),
  })
  .map(({ n, proposalId, choiceId, rawAmount, garbage, advance }) => {
    const base = delivery(n, { proposalId, choiceId }, rawAmount.toString());
    return { delivery: garbage === undefined ? base : { ...base, memo: garbage }, advance };
  });

const arbSteps = fc.array(arbStep, { minLength: 1, maxLength: 30 });

function setup(): Harness {
  const h = createHarness();
  openProposal(h, {}, { id: 8, choiceCount: 2, closesAt: 1_500 });
  return h;
}

function tallies(h: Harness): string[][] {
  return [7, 8].map((id) => [...(h.engine.getTally(id) ?? [])]);
}

function castWeights(h: Harness, proposalId: number): bigint {
  let sum = 0n;
  for (const stored of h.events.read(`proposal:${proposalId}`)) {
    const payload = stored.event.payload;
    if (stored.event.type === "vote.cast" && isVoteCastPayload(payload)) {
      sum += BigInt(payload.normalizedWeight);
    }
  }
  return sum;
}

// =============================================================================
// Properties
// =============================================================================

describe("settlement properties", () => {
  it("re-delivering accepted receipts leaves tallies and VoteCast events unchanged", () => {
    fc.assert(
      fc.property(arbSteps, (steps) => {
        const h = setup();
        const accepted: TransportDelivery[] = [];
        for (const step of steps) {
          h.clock.advance(step.advance);
          if (h.adapter.onDelivery(TRANSPORT, step.delivery).status === "accepted") {
            accepted.push(step.delivery);
          }
        }

        const before = tallies(h);
        const castCount = h.events.readAll().filter((e) => e.event.type === "vote.cast").length;
        for (const d of accepted) {
          expect(h.adapter.onDelivery(TRANSPORT, d).status).toBe("rejected");
        }

        expect(tallies(h)).toEqual(before);
        expect(h.events.readAll().filter((e) => e.event.type === "vote.cast")).toHaveLength(castCount);
      }),
    );
  });

  it("keeps each tally equal to the sum of its VoteCast weights", () => {
    fc.assert(
      fc.property(arbSteps, (steps) => {
        const h = setup();
        for (const step of steps) {
          h.clock.advance(step.advance);
          h.adapter.onDelivery(TRANSPORT, step.delivery);
        }

        for (const id of [7, 8]) {
          const total = (h.engine.getTally(id) ?? []).reduce((acc, w) => acc + BigInt(w), 0n);
          expect(total).toBe(castWeights(h, id));
        }
      }),
    );
  });

  it("never moves a tally for a delivery at or after closesAt", () => {
    fc.assert(
      fc.property(arbSteps, (steps) => {
        const h = setup();
        for (const step of steps) {
          h.clock.advance(step.advance);
          const before = tallies(h);
          h.adapter.onDelivery(TRANSPORT, step.delivery);
          const after = tallies(h);

          const now = h.clock.now();
          if (now >= 2_000) expect(after[0]).toEqual(before[0]);
          if (now >= 1_500) expect(after[1]).toEqual(before[1]);
        }
      }),
    );
  });

  it("moves the delivered value exactly once per delivery", () => {
    fc.assert(
      fc.property(arbSteps, (steps) => {
        const h = setup();
        for (const step of steps) {
          h.clock.advance(step.advance);
          const count = h.router.movements().length;

          h.adapter.onDelivery(TRANSPORT, step.delivery);

          const moved = h.router.movements().slice(count);
          expect(moved).toHaveLength(1);
          expect(moved[0]?.amount).toBe(step.delivery.rawAmount);
          expect(moved[0]?.asset).toBe(step.delivery.asset);
        }
      }),
    );
  });
});
