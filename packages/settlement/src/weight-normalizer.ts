/**
 * @tallybridge/settlement: Weight Normalizer.
 *
 * Converts a delivered amount into a comparable voting weight using the
 * latest oracle snapshot for the asset.
 *
 *   age    = observedAt - snapshot.observedAt
 *   stale  = age > stalenessWindowSeconds
 *   weight = floor(rawAmount × price)
 *
 * The oracle is read, never written.
 */

import { applyPrice, tryParsePrice } from "./amounts.js";
import type { PriceOracle } from "./price-oracle.js";
import type { NormalizationResult, NormalizerConfig } from "./types.js";

export const DEFAULT_NORMALIZER_CONFIG: NormalizerConfig = {
  mode: "normalized",
  stalenessWindowSeconds: 3600,
  staleOraclePolicy: "flag",
};

export class WeightNormalizer {
  private readonly _oracle: PriceOracle;
  private readonly _config: NormalizerConfig;

  constructor(oracle: PriceOracle, config: Partial<NormalizerConfig> = {}) {
    this._oracle = oracle;
    this._config = { ...DEFAULT_NORMALIZER_CONFIG, ...config };
  }

  get config(): NormalizerConfig {
    return this._config;
  }

  normalize(rawAmount: bigint, asset: string, observedAt: number): NormalizationResult {
    if (this._config.mode === "raw") {
      return { ok: true, weight: rawAmount, price: null, staleOracle: false, snapshotObservedAt: null };
    }

    const snapshot = this._oracle.latest(asset);
    const scaled = snapshot === undefined ? undefined : tryParsePrice(snapshot.price);
    if (snapshot === undefined || scaled === undefined) {
      return { ok: false, reason: "noPrice" };
    }

    const staleOracle = observedAt - snapshot.observedAt > this._config.stalenessWindowSeconds;
    if (staleOracle && this._config.staleOraclePolicy === "reject") {
      return { ok: false, reason: "staleOracle" };
    }

    return {
      ok: true,
      weight: applyPrice(rawAmount, scaled),
      price: snapshot.price,
      staleOracle,
      snapshotObservedAt: snapshot.observedAt,
    };
  }
}
