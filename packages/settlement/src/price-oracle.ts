/**
 * @tallybridge/settlement: Price oracle collaborator.
 *
 * The normalizer only ever reads the latest snapshot per asset. Who
 * publishes prices, and how they are sourced, is outside the core.
 */

import { isPriceSnapshot } from "@tallybridge/types";
import type { PriceSnapshot } from "@tallybridge/types";
import { tryParsePrice } from "./amounts.js";
import { SettlementError } from "./types.js";

export interface PriceOracle {
  latest(asset: string): PriceSnapshot | undefined;
}

/**
 * An oracle the settlement engine can write to. `check` validates a
 * publication without applying it so the engine can record it first.
 */
export interface PriceBook extends PriceOracle {
  /**
   * @returns the snapshot as it would be stored
   * @throws SettlementError INVALID_PRICE or STALE_PUBLICATION
   */
  check(snapshot: PriceSnapshot): PriceSnapshot;

  publish(snapshot: PriceSnapshot): void;
}

/**
 * Oracle fed by explicit publications (from the oracle address via the
 * node API, or directly in tests).
 */
export class InMemoryPriceOracle implements PriceBook {
  private readonly _latest = new Map<string, PriceSnapshot>();

  /**
   * @throws SettlementError INVALID_PRICE for a malformed or zero price,
   *   STALE_PUBLICATION when observedAt moves backwards for the asset
   */
  publish(snapshot: PriceSnapshot): void {
    const accepted = this.check(snapshot);
    this._latest.set(accepted.asset, accepted);
  }

  check(snapshot: PriceSnapshot): PriceSnapshot {
    if (!isPriceSnapshot(snapshot)) {
      throw new SettlementError("INVALID_PRICE", "Malformed price snapshot");
    }

    const scaled = tryParsePrice(snapshot.price);
    if (scaled === undefined || scaled === 0n) {
      throw new SettlementError(
        "INVALID_PRICE",
        `Price for "${snapshot.asset}" must be a positive decimal with at most 18 places, got "${snapshot.price}"`,
      );
    }

    const previous = this._latest.get(snapshot.asset);
    if (previous !== undefined && snapshot.observedAt < previous.observedAt) {
      throw new SettlementError(
        "STALE_PUBLICATION",
        `Snapshot for "${snapshot.asset}" observed at ${snapshot.observedAt} is older than the current one (${previous.observedAt})`,
      );
    }

    return { asset: snapshot.asset, price: snapshot.price, observedAt: snapshot.observedAt };
  }

  latest(asset: string): PriceSnapshot | undefined {
    return this._latest.get(asset);
  }

  list(): readonly PriceSnapshot[] {
    return [...this._latest.values()];
  }
}
