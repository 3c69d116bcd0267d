/**
 * @tallybridge/settlement: Transport Boundary Adapter.
 *
 * The only entry point the transport network calls. Past the caller check
 * nothing throws: every delivery ends as an accepted vote or a recorded
 * rejection whose value has been forwarded.
 */

import { isBaseUnitAmount, isReceiptId } from "@tallybridge/types";
import { decodePayload } from "@tallybridge/memo-codec";
import {
  ComputeMeter,
  DEFAULT_COMPUTE_CEILING,
  WORST_CASE_DELIVERY_COST,
} from "./compute-meter.js";
import type { SettlementEngine } from "./settlement-engine.js";
import type { DeliveryOutcome, TransportDelivery } from "./types.js";
import { SettlementError, UnauthorizedCallerError } from "./types.js";

export interface TransportAdapterOptions {
  readonly engine: SettlementEngine;

  /** Address of the transport network's caller */
  readonly trustedTransport: string;

  /** Per-call compute budget. Default: DEFAULT_COMPUTE_CEILING */
  readonly computeCeiling?: number | undefined;

  /**
   * Told about faults that were turned into internalError rejections.
   */
  readonly onInternalError?: ((error: unknown, receiptId: string) => void) | undefined;
}

export class TransportAdapter {
  private readonly _engine: SettlementEngine;
  private readonly _trustedTransport: string;
  private readonly _ceiling: number;
  private readonly _onInternalError: ((error: unknown, receiptId: string) => void) | undefined;

  /**
   * @throws SettlementError COMPUTE_CEILING_TOO_LOW when the worst-case
   *   delivery would not fit the ceiling
   */
  constructor(options: TransportAdapterOptions) {
    const ceiling = options.computeCeiling ?? DEFAULT_COMPUTE_CEILING;
    if (ceiling < WORST_CASE_DELIVERY_COST) {
      throw new SettlementError(
        "COMPUTE_CEILING_TOO_LOW",
        `Compute ceiling ${ceiling} is below the worst-case delivery cost ${WORST_CASE_DELIVERY_COST}`,
      );
    }
    if (options.trustedTransport.length === 0) {
      throw new SettlementError("INVALID_SUBMISSION", "A trusted transport address is required");
    }
    this._engine = options.engine;
    this._trustedTransport = options.trustedTransport;
    this._ceiling = ceiling;
    this._onInternalError = options.onInternalError;
  }

  get computeCeiling(): number {
    return this._ceiling;
  }

  /**
   * Handle one delivery from the transport.
   *
   * @throws UnauthorizedCallerError when the caller is not the trusted
   *   transport; nothing else escapes
   */
  onDelivery(caller: string, delivery: TransportDelivery): DeliveryOutcome {
    const meter = new ComputeMeter(this._ceiling);
    meter.charge("callerCheck");
    this.authorize(caller);

    try {
      return this._process(delivery, meter);
    } catch (err) {
      return this._internalError(delivery, err);
    }
  }

  /**
   * @throws UnauthorizedCallerError when the caller is not the trusted transport
   */
  authorize(caller: string): void {
    if (caller !== this._trustedTransport) {
      throw new UnauthorizedCallerError(caller);
    }
  }

  private _process(delivery: TransportDelivery, meter: ComputeMeter): DeliveryOutcome {
    const unsettled = {
      receiptId: delivery.receiptId,
      rawAmount: delivery.rawAmount,
      asset: delivery.asset,
      source: "transport",
      carriesValue: true,
    } as const;

    if (!meter.charge("envelope")) {
      return this._engine.reject({ ...unsettled, reason: "computeExhausted" }, meter);
    }
    if (!isReceiptId(delivery.receiptId) || !isBaseUnitAmount(delivery.rawAmount) || delivery.asset.length === 0) {
      return this._engine.reject({ ...unsettled, reason: "badDelivery" }, meter);
    }

    if (!meter.charge("decode")) {
      return this._engine.reject({ ...unsettled, reason: "computeExhausted" }, meter);
    }
    const decoded = decodePayload(delivery.memo);
    if (!decoded.ok) {
      return this._engine.reject({ ...unsettled, reason: "badPayload", consumeUnbound: true }, meter);
    }

    return this._engine.settle(
      {
        receiptId: delivery.receiptId,
        rawAmount: delivery.rawAmount,
        asset: delivery.asset,
        payload: decoded.payload,
      },
      { source: "transport", carriesValue: true, meter },
    );
  }

  private _internalError(delivery: TransportDelivery, err: unknown): DeliveryOutcome {
    this._onInternalError?.(err, delivery.receiptId);
    try {
      return this._engine.reject({
        receiptId: delivery.receiptId,
        rawAmount: delivery.rawAmount,
        asset: delivery.asset,
        source: "transport",
        carriesValue: true,
        reason: "internalError",
      });
    } catch (secondary) {
      // The event log itself is failing; the value still has to leave the call.
      this._onInternalError?.(secondary, delivery.receiptId);
      return {
        status: "rejected",
        receiptId: delivery.receiptId,
        reason: "internalError",
        route: this._engine.forwardToFallback(delivery.receiptId, delivery.asset, delivery.rawAmount),
      };
    }
  }
}
