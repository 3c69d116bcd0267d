/**
 * @tallybridge/settlement: Compute metering.
 *
 * The transport gives each delivery call a fixed compute budget. Every
 * step on the delivery path has a fixed cost that does not grow with the
 * number of proposals, receipts or choices, so the worst case is a
 * constant that can be checked once when the adapter is built.
 *
 * Every delivery ends by moving its value and emitting one event. That
 * tail is reserved up front, so a meter can always finish the call.
 */

export const COMPUTE_COSTS = {
  callerCheck: 2_000,
  envelope: 5_000,
  decode: 20_000,
  idempotency: 30_000,
  proposalLookup: 20_000,
  normalize: 60_000,
  tally: 40_000,
  forward: 60_000,
  emit: 80_000,
} as const;

export type ComputeStep = keyof typeof COMPUTE_COSTS;

/** Cost of moving value and emitting the outcome event. */
export const TAIL_RESERVE = COMPUTE_COSTS.forward + COMPUTE_COSTS.emit;

/**
 * Cost of the most expensive path through a delivery: every check, the
 * tally update and the tail.
 */
export const WORST_CASE_DELIVERY_COST =
  COMPUTE_COSTS.callerCheck +
  COMPUTE_COSTS.envelope +
  COMPUTE_COSTS.decode +
  COMPUTE_COSTS.idempotency +
  COMPUTE_COSTS.proposalLookup +
  COMPUTE_COSTS.normalize +
  COMPUTE_COSTS.tally +
  COMPUTE_COSTS.forward +
  COMPUTE_COSTS.emit;

export const DEFAULT_COMPUTE_CEILING = 400_000;

export class ComputeMeter {
  private readonly _ceiling: number;
  private _used = 0;
  private _exhausted = false;

  constructor(ceiling: number) {
    this._ceiling = ceiling;
  }

  /**
   * Charge a step unless doing so would eat into the tail reserve.
   *
   * @returns false (and charges nothing) when the budget is exhausted
   */
  charge(step: ComputeStep): boolean {
    const cost = COMPUTE_COSTS[step];
    if (this._used + cost + TAIL_RESERVE > this._ceiling) {
      this._exhausted = true;
      return false;
    }
    this._used += cost;
    return true;
  }

  /** Spend the reserved tail. */
  chargeTail(): void {
    this._used += TAIL_RESERVE;
  }

  get used(): number {
    return this._used;
  }

  get ceiling(): number {
    return this._ceiling;
  }

  get exhausted(): boolean {
    return this._exhausted;
  }
}
